import type { AnyNode } from 'domhandler';
import { hasChildren, isTag, isText } from 'domhandler';
import { LINE_BREAK, transformCodeFences } from './code-fence.js';
import { sanitizeMarkup } from './sanitize-markup.js';

/**
 * Collects the text nodes under `node`, trims each one and joins the
 * non-empty pieces with single spaces. Used for the Front field, which
 * Anki shows as plain text.
 */
export function toPlainText(node: AnyNode): string {
  const pieces: string[] = [];

  const visit = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.trim();
      if (text) pieces.push(text);
    } else if (hasChildren(current)) {
      current.children.forEach(visit);
    }
  };

  visit(node);
  return pieces.join(' ');
}

/**
 * Builds the Back field from the raw inner HTML of a cell.
 *
 * The cell is sanitized first. Line breaks then become newlines so that
 * fences spanning several lines can be found, and whatever newlines remain
 * outside code blocks turn back into `<br/>`.
 *
 * @throws {UnterminatedFenceError} when a ``` marker has no partner.
 */
export function convertBack(html: string): string {
  const cleaned = sanitizeMarkup(html.replace(/\r\n?/g, '\n'));
  const withNewlines = cleaned.replace(/<br\s*\/?>/gi, '\n');
  return transformCodeFences(withNewlines).replace(/\n/g, LINE_BREAK);
}

/**
 * Returns the raw tag strings of a Tags cell. Notion renders each value of
 * a multi-select property as its own `selected-value` chip; when there are
 * none the whole cell text is one raw string.
 */
export function extractTagTexts(cell: AnyNode): string[] {
  const chips: string[] = [];

  const visit = (current: AnyNode): void => {
    if (isTag(current) && hasClass(current.attribs.class, 'selected-value')) {
      chips.push(toPlainText(current));
      return;
    }
    if (hasChildren(current)) {
      current.children.forEach(visit);
    }
  };

  visit(cell);
  if (chips.length > 0) return chips;

  const text = toPlainText(cell);
  return text ? [text] : [];
}

function hasClass(classAttr: string | undefined, name: string): boolean {
  return classAttr !== undefined && classAttr.split(/\s+/).includes(name);
}
