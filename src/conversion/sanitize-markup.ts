import { CssSyntaxError, parse as parseCss, type Root } from 'postcss';
import sanitizeHtml from 'sanitize-html';

/**
 * Notion's text color palette mapped to CSS named colors.
 * Names outside this table are passed through unchanged.
 */
export const NOTION_COLORS: Readonly<Record<string, string>> = {
  default: 'black',
  gray: 'gray',
  brown: 'saddlebrown',
  orange: 'orange',
  yellow: 'gold',
  teal: 'teal',
  blue: 'blue',
  purple: 'purple',
  pink: 'deeppink',
  red: 'red',
};

const COLOR_CLASS = /^(?:highlight|block-color)-([a-z_]+)$/;

// Inline styles that survive sanitization, with the values accepted for each.
// Named colors take the same characters as a color class suffix.
const STYLE_VALUES: Record<string, RegExp> = {
  color: /^(?:#[0-9a-f]{3,8}|[a-z][a-z_]*|rgba?\([\d\s.,%]+\))$/i,
  'font-family': /^[\w\s,'"-]+$/,
  'white-space': /^(?:pre|pre-wrap|pre-line|normal|nowrap)$/,
};

// Not in ALLOWED_TAGS, so sanitize-html drops the element and keeps its text.
const UNWRAP_TAG = 'notion-unwrap';

const ALLOWED_TAGS = [
  // Text formatting
  'strong',
  'b',
  'em',
  'i',
  'u',
  // Code
  'code',
  'pre',
  // Structure
  'span',
  'br',
  'div',
  // Lists
  'ul',
  'ol',
  'li',
  // Links
  'a',
];

type StyleDeclaration = [property: string, value: string];

/**
 * Reads declarations with postcss, the parser sanitize-html filters styles
 * with, so both passes agree on what a declaration is.
 */
function parseStyle(style: string): StyleDeclaration[] {
  if (!style.trim()) return [];

  let root: Root;
  try {
    root = parseCss(`span{${style}}`);
  } catch (error) {
    // sanitize-html drops a style attribute it cannot parse
    if (error instanceof CssSyntaxError) return [];
    throw error;
  }

  const declarations: StyleDeclaration[] = [];
  root.walkDecls((decl) => {
    declarations.push([decl.prop.toLowerCase(), decl.value]);
  });
  return declarations;
}

function isAllowedDeclaration([property, value]: StyleDeclaration): boolean {
  const pattern = STYLE_VALUES[property];
  return pattern !== undefined && pattern.test(value);
}

/**
 * Resolves a Notion color class to a CSS color.
 * Returns null for classes that are not color classes or that only set a
 * background (`highlight-red_background`).
 */
export function colorFromClass(className: string): string | null {
  const match = COLOR_CLASS.exec(className);
  if (!match) return null;
  const key = match[1];
  if (key.endsWith('_background')) return null;
  return NOTION_COLORS[key] ?? key;
}

/**
 * Rewrites Notion color classes into an inline `color` and keeps only the
 * style declarations we render. `<mark>` becomes a `<span>`, and a span
 * left without any style is unwrapped.
 */
const rewriteElement: sanitizeHtml.Transformer = (tagName, attribs) => {
  const { class: className = '', style = '', ...rest } = attribs;

  const declarations = parseStyle(style).filter(isAllowedDeclaration);
  for (const cls of className.split(/\s+/)) {
    const color = colorFromClass(cls);
    if (color === null) continue;
    const candidate: StyleDeclaration = ['color', color];
    if (!isAllowedDeclaration(candidate)) continue;
    const existing = declarations.findIndex(([prop]) => prop === 'color');
    if (existing === -1) {
      declarations.push(candidate);
    } else {
      declarations[existing] = candidate;
    }
  }

  const nextStyle = declarations
    .map(([property, value]) => `${property}:${value}`)
    .join(';');
  const nextTag = tagName === 'mark' ? 'span' : tagName;

  if (nextTag === 'span' && !nextStyle) {
    return { tagName: UNWRAP_TAG, attribs: {} };
  }

  return {
    tagName: nextTag,
    attribs: nextStyle ? { ...rest, style: nextStyle } : rest,
  };
};

const allowedStyleValues = Object.fromEntries(
  Object.entries(STYLE_VALUES).map(([property, pattern]) => [
    property,
    [pattern],
  ]),
);

const SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: ALLOWED_TAGS,
  allowedAttributes: {
    a: ['href'],
    '*': ['style'],
  },
  allowedStyles: {
    '*': allowedStyleValues,
  },
  transformTags: {
    '*': rewriteElement,
  },
};

/**
 * Cleans the HTML of a Back cell.
 *
 * Keeps bold, italic, underline, lists, links (href only), code and the
 * text colors produced from Notion's color classes. Everything else is
 * unwrapped down to its text. Running it on its own output is a no-op.
 */
export function sanitizeMarkup(html: string): string {
  return sanitizeHtml(html, SANITIZE_OPTIONS);
}
