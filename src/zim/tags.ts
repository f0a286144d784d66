import { foldDiacritics, foldTypography } from './text.js';

/**
 * Zim recognises a tag as `@` followed by word characters. Anything else in a
 * free-form tag is either dropped (quotes, apostrophes, a literal `@`) or turned
 * into `_`. Hierarchy separators become `_` too, so `Projects/AI2Zim` keeps both
 * levels as `projects_ai2zim`.
 */
export function formatTag(raw: string): string {
  return foldDiacritics(foldTypography(raw))
    .toLowerCase()
    .replace(/['"@]/g, '')
    .replace(/[^\p{L}\p{N}_]+/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/** Format, drop empties and de-duplicate, keeping first-seen order. */
export function formatTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const formatted = formatTag(tag);
    if (formatted) seen.add(formatted);
  }
  return [...seen];
}

/** `**Tags:** @one @two`, or an empty string when there is nothing to show. */
export function formatTagLine(tags: readonly string[]): string {
  const formatted = formatTags(tags);
  if (formatted.length === 0) return '';
  return `**Tags:** ${formatted.map(t => `@${t}`).join(' ')}`;
}
