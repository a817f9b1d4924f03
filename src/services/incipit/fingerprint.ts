/**
 * Work fingerprints used to detect repeated citations.
 *
 * The memo table is process-wide and keyed only by (author, title); it holds
 * no document state, so it is never reset between conversions.
 */

import { config } from '../../config';

const NON_WORD = /[^\p{L}\p{N}_]+/gu;
const TITLE_KEY_LENGTH = 25;
const NO_AUTHOR = 'no_auth';

const memo = new Map<string, string>();

function memoKey(author: string | null | undefined, title: string): string {
  return `${author ?? ''}\u0000${title}`;
}

function computeFingerprint(author: string | null | undefined, title: string): string {
  const authorKey = author ? author.replace(NON_WORD, '').toLowerCase() : NO_AUTHOR;
  const titleKey = title.replace(NON_WORD, '').toLowerCase().slice(0, TITLE_KEY_LENGTH);
  return `${authorKey}_${titleKey}`;
}

/**
 * Normalized dedup key for a work, or null when there is no title.
 * Titles that only differ after their 25th normalized character collide.
 */
export function generateFingerprint(
  author: string | null | undefined,
  title: string | null | undefined
): string | null {
  if (!title) return null;

  const key = memoKey(author, title);
  const cached = memo.get(key);
  if (cached !== undefined) {
    // LRU: move to end by deleting and re-adding
    memo.delete(key);
    memo.set(key, cached);
    return cached;
  }

  if (memo.size >= config.fingerprintCacheSize) {
    const oldest = memo.keys().next().value;
    if (oldest !== undefined) memo.delete(oldest);
  }

  const fingerprint = computeFingerprint(author, title);
  memo.set(key, fingerprint);
  return fingerprint;
}

export function fingerprintCacheSize(): number {
  return memo.size;
}

export function clearFingerprintCache(): void {
  memo.clear();
}
