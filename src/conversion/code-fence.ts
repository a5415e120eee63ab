import { UnterminatedFenceError } from './errors.js';

const FENCE_MARKER = '```';

export const CODE_BLOCK_STYLE =
  "font-family:Menlo,Consolas,'Courier New',monospace;white-space:pre";

export const LINE_BREAK = '<br/>';

// Always read as a hint when alone on the opening line, even in a fence
// that closes on the same line as its last line of code.
const LANGUAGE_HINTS = new Set([
  'bash',
  'c',
  'cpp',
  'csharp',
  'css',
  'go',
  'html',
  'java',
  'javascript',
  'js',
  'json',
  'kotlin',
  'plaintext',
  'powershell',
  'python',
  'py',
  'ruby',
  'rust',
  'sh',
  'shell',
  'sql',
  'swift',
  'text',
  'ts',
  'typescript',
  'yaml',
]);

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

const HINT_PATTERN = /^[\w+#.-]+$/;

/**
 * Drops a language hint (`python`, `cisco`) alone on the opening line.
 *
 * Any single token counts when the closing marker sits on its own line.
 * When the fence closes right after the code (```enable\nconf t```),
 * only a known language name does, so a one-word first command is kept.
 */
function stripLanguageHint(lines: string[]): string[] {
  if (lines.length < 2) return lines;
  const hint = lines[0].trim();
  if (!HINT_PATTERN.test(hint)) return lines;

  const closesOnOwnLine = isBlank(lines[lines.length - 1]);
  return closesOnOwnLine || LANGUAGE_HINTS.has(hint.toLowerCase())
    ? lines.slice(1)
    : lines;
}

/**
 * Renders the body of one fence as a monospace block.
 * Blank lines at the edges are trimmed; indentation and interior blank
 * lines are kept.
 */
export function renderCodeBlock(body: string): string {
  let lines = stripLanguageHint(body.split('\n'));
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) start++;
  while (end > start && isBlank(lines[end - 1])) end--;
  lines = lines.slice(start, end);

  return `<div style="${CODE_BLOCK_STYLE}">${lines.join(LINE_BREAK)}</div>`;
}

/**
 * Replaces every ```-delimited region of `text` with a monospace `<div>`.
 * Lines in `text` are separated by `\n`. Text outside fences is returned
 * untouched.
 *
 * @throws {UnterminatedFenceError} when the markers do not pair up.
 */
export function transformCodeFences(text: string): string {
  const parts = text.split(FENCE_MARKER);
  const markerCount = parts.length - 1;
  if (markerCount % 2 !== 0) {
    throw new UnterminatedFenceError(markerCount);
  }

  // Even indexes are plain text, odd indexes are fence bodies.
  return parts
    .map((part, index) => (index % 2 === 1 ? renderCodeBlock(part) : part))
    .join('');
}
