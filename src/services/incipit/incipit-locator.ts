/**
 * Incipit Locator
 * Finds the opening words of the sentence in which a note reference sits.
 */

// Titles and the "v." of case names never end a sentence (case-sensitive)
const SENTENCE_BOUNDARY =
  /(?<!\b(?:Dr|Mr|Ms|Mrs|Prof|Rev|Sen|Rep|v)[.?!])(?<=[.?!])\s+(?=[A-Z])/;

const LEADING_QUOTES = /^["'“‘\s]+/;
const TRAILING_PUNCTUATION = /[.,;:!?"'”’]+$/;

/**
 * Return the first `wordCount` words of the sentence containing `offset`.
 *
 * @param paragraphText - Full concatenated run text of the paragraph
 * @param offset - Character offset of the reference marker
 * @param wordCount - Number of words to capture
 */
export function locateIncipit(paragraphText: string, offset: number, wordCount: number): string {
  const textBefore = paragraphText.slice(0, Math.max(0, offset));
  if (!textBefore) return '';

  const sentences = textBefore.split(SENTENCE_BOUNDARY);
  const current = (sentences[sentences.length - 1] ?? '').trim().replace(LEADING_QUOTES, '');

  const words = current.split(/\s+/).filter(w => w.length > 0).slice(0, Math.max(0, wordCount));
  if (words.length === 0) return '';

  words[words.length - 1] = words[words.length - 1].replace(TRAILING_PUNCTUATION, '');
  return words.join(' ');
}
