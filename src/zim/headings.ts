import { foldDiacritics, foldTypography, singleLine } from './text.js';

/** `====== Title ======` at any level (2 to 6 `=`). */
const HEADING_RE = /^\s*(={2,6})(?!=)\s*(.*?)\s*(?<!=)\1\s*$/;

/**
 * Comparison key for a heading or title. Typography, diacritics, case,
 * underscores, quotes and markup characters are all folded away so that the
 * converter's rendering of a title compares equal to the title itself.
 */
export function headingKey(text: string): string {
  return singleLine(
    foldDiacritics(foldTypography(text))
      .toLowerCase()
      .replace(/_/g, ' ')
      .replace(/[^\p{L}\p{N}\s]+/gu, '')
  );
}

/** Text of a Zim heading line, or undefined when the line is not a heading. */
export function parseHeading(line: string): string | undefined {
  const match = HEADING_RE.exec(line);
  return match ? match[2] : undefined;
}

/**
 * Drop the converter's echo of the title.
 *
 * Only the first non-blank line is considered: when it is a heading matching
 * the title (or the file name, for notes without a title) it is removed along
 * with the blank lines that follow. Later headings with the same text are body
 * content and stay.
 */
export function removeDuplicateHeading(body: string, title: string | undefined, fallbackName: string): string {
  const lines = body.split(/\r?\n/);
  const first = lines.findIndex(line => line.trim() !== '');
  if (first === -1) return body;

  const headingText = parseHeading(lines[first]);
  if (headingText === undefined) return body;

  const key = headingKey(headingText);
  if (!key) return body;

  const candidates = [title, fallbackName]
    .filter((c): c is string => typeof c === 'string')
    .map(headingKey)
    .filter(k => k.length > 0);
  if (!candidates.includes(key)) return body;

  let next = first + 1;
  while (next < lines.length && lines[next].trim() === '') next++;
  return lines.slice(next).join('\n');
}
