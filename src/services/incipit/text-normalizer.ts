/**
 * Note text cleanup applied before parsing and on pass-through notes.
 */

// "p." / "pp." directly before a page number, after whitespace, comma or "("
const PAGE_PREFIX_PATTERN = /(?<=[\s(,])p{1,2}\.\s*(?=\d)/g;

// Hyphenated digit ranges become en-dash ranges
const HYPHEN_RANGE_PATTERN = /(\d)-(\d)/g;

export const EN_DASH = '–';

export function normalizeNoteText(text: string): string {
  return text
    .replace(PAGE_PREFIX_PATTERN, '')
    .replace(HYPHEN_RANGE_PATTERN, `$1${EN_DASH}$2`)
    .trim();
}
