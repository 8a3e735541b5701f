/**
 * Text helpers for slicing function source
 */

const WHITESPACE_ONLY_LINE = /^[ \t]+$/gm;
const LEADING_WHITESPACE = /^[ \t]*/;

/**
 * First non-blank line of `text`, trimmed. Undefined for missing or blank text.
 */
export function firstLine(text: string | undefined): string | undefined {
  if (text === undefined) return undefined;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

/**
 * Remove the whitespace prefix shared by every non-blank line.
 *
 * Lines holding only whitespace are emptied and do not take part in the
 * margin. Tabs and spaces are not considered equivalent.
 */
export function dedent(text: string): string {
  const normalized = text.replace(WHITESPACE_ONLY_LINE, '');

  let margin: string | undefined;
  for (const line of normalized.split('\n')) {
    if (!line) continue;
    const indent = LEADING_WHITESPACE.exec(line)?.[0] ?? '';
    if (margin === undefined) {
      margin = indent;
      continue;
    }
    margin = commonPrefix(margin, indent);
    if (!margin) break;
  }

  if (!margin) return normalized;
  const prefix = margin;
  return normalized
    .split('\n')
    .map((line) => (line.startsWith(prefix) ? line.slice(prefix.length) : line))
    .join('\n');
}

function commonPrefix(a: string, b: string): string {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return a.slice(0, i);
}
