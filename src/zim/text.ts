/** Text helpers shared by the slug, tag and heading code. */

const QUOTE_FOLDS: [RegExp, string][] = [
  [/[\u2018\u2019\u201A\u201B\u2032\u02BC`\u00B4]/g, "'"],
  [/[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, '-'],
  [/\u2026/g, '...'],
  [/[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g, ' '],
  [/[\u200B-\u200D\uFEFF]/g, ''],
];

/** NFKC plus folding of typographic quotes, dashes and spaces to ASCII. */
export function foldTypography(text: string): string {
  let result = text.normalize('NFKC');
  for (const [pattern, replacement] of QUOTE_FOLDS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/** `café` → `cafe`. */
export function foldDiacritics(text: string): string {
  return text.normalize('NFKD').replace(/\p{M}+/gu, '');
}

/** Collapse whitespace (including newlines) into single spaces. */
export function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
