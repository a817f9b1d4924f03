/**
 * Citation Matchers
 * Ordered table of type-specific matchers tried by the citation parser.
 * Each matcher reports matched / no_match / faulted instead of throwing.
 */

import type { CitationMatcher, MatchedFields, MatchResult } from './incipit.types';

// Psychiatric and general medical journals recognized by name
export const MEDICAL_JOURNALS: readonly string[] = [
  'Am J Psychiatry',
  'American Journal of Psychiatry',
  'JAMA',
  'NEJM',
  'New England Journal of Medicine',
  'Arch Gen Psychiatry',
  'Archives of General Psychiatry',
  'Lancet',
  'BMJ',
  'British Medical Journal',
  'Psychiatric Services',
  'J Clin Psychiatry',
  'Journal of Clinical Psychiatry',
  'Biological Psychiatry',
  'Psychological Medicine',
  'Hospital and Community Psychiatry',
  'Bulletin of the Menninger Clinic',
  'J Nerv Ment Dis',
  'Journal of Nervous and Mental Disease',
];

const ARCHIVAL_PATTERNS: readonly RegExp[] = [
  /^(.+?)\s*,\s*(Box|Folder|Tape|Reel|Carton)\s+(\d+)/i,
  /^(.+?)\s+Arbitration\s+(Videos?|Tapes?|Transcripts?)(?:,\s*(.+))?/i,
  /^(.+?)\s+Papers\s*,\s*(.+)/i,
  /^(.+?)\s+Archives?\s*,\s*(.+)/i,
  /^(.+?)\s+Collection\s*,\s*(.+)/i,
  /^(.+?)\s+Personal\s+Archive(?:,\s*(.+))?/i,
];

const TRANSCRIPT_KEYWORDS: readonly string[] = ['Deposition', 'Testimony', 'Transcript'];

const LEGAL_PARTIES = /\s+v\.\s+/;

// Period, whitespace, then a capital letter or opening quote
const SENTENCE_SPLIT = /\.\s+(?=[A-Z"'“])/;

const ET_AL = /\bet\s+al\.?/gi;

// One word of a place name: "York", "St.", "D.C."; a short word with a
// period ("Day.") ends a title, not a place
const PLACE_WORD = "(?:[A-Z][A-Za-z'’-]*|(?:St|Ste|Ft|Mt|Pt)\\.|(?:[A-Z]\\.){2,})";

// State or country after the city: "Cambridge, Mass.", "Washington, D.C."
const PLACE_REGION = "(?:,\\s+(?:[A-Z][a-z]{1,4}\\.|(?:[A-Z]\\.){2,}))?";

// "City: Publisher, YYYY", optionally parenthesized
const PUBLICATION = new RegExp(
  `\\(?(${PLACE_WORD}(?:\\s+${PLACE_WORD})*${PLACE_REGION}:\\s*[^,()]+,\\s*\\d{4})\\)?`
);

// "Last, First[ M.]" with an optional "Jr." / "Sr." / "III" after the last name
const LEADING_AUTHOR_NAME =
  /^([A-Z][\p{L}\p{N}_'-]+)(?:,\s+(Jr\.|Sr\.|III))?,\s+([A-Z][\p{L}\p{N}_'.-]+(?:\s+[A-Z]\.)?)/u;

const NO_MATCH: MatchResult = { status: 'no_match' };

function matched(fields: Partial<MatchedFields> & Pick<MatchedFields, 'type'>): MatchResult {
  return {
    status: 'matched',
    fields: {
      author: null,
      title: null,
      pub: null,
      details: null,
      ...fields,
    },
  };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Split at the first ". " that precedes a capital letter or quote.
 */
export function splitAtSentence(text: string): { head: string; rest: string | null } {
  const match = SENTENCE_SPLIT.exec(text);
  if (!match) return { head: text, rest: null };
  return { head: text.slice(0, match.index), rest: text.slice(match.index + match[0].length) };
}

/**
 * "Last, First" becomes "First Last"; text without a comma is returned as is.
 */
export function reorderName(name: string): string {
  const comma = name.indexOf(',');
  if (comma === -1) return name.trim();
  const last = name.slice(0, comma).trim();
  const first = name.slice(comma + 1).trim();
  return `${first} ${last}`;
}

export function normalizeEtAl(author: string): string {
  return author.replace(ET_AL, 'et al.');
}

export function matchArchival(text: string): MatchResult {
  for (const pattern of ARCHIVAL_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    if (text.includes('Arbitration')) {
      return matched({
        type: 'archival',
        title: match[0].split(',')[0].trim(),
        details: text,
      });
    }

    return matched({
      type: 'archival',
      title: match[1].trim(),
      details: match[0],
    });
  }
  return NO_MATCH;
}

export function matchTranscript(text: string): MatchResult {
  if (!TRANSCRIPT_KEYWORDS.some(keyword => text.includes(keyword))) return NO_MATCH;

  const comma = text.indexOf(',');
  const head = (comma === -1 ? text : text.slice(0, comma)).trim();
  if (!head) {
    return { status: 'faulted', reason: 'transcript has no name before its first comma' };
  }

  return matched({
    type: 'transcript',
    author: head,
    title: head,
    pub: comma === -1 ? null : nonEmpty(text.slice(comma + 1)),
  });
}

export function matchLegal(text: string): MatchResult {
  if (!LEGAL_PARTIES.test(text)) return NO_MATCH;
  return matched({ type: 'legal', title: text });
}

function parseMedicalAt(text: string, journal: string): MatchResult {
  const at = text.indexOf(journal);
  const preJournal = text.slice(0, at).trim();
  const postJournal = text.slice(at + journal.length).trim();

  if (!preJournal) {
    return { status: 'faulted', reason: `no author or title before "${journal}"` };
  }

  const { head, rest } = splitAtSentence(preJournal);
  let author = nonEmpty(head);
  const title = rest !== null ? rest.replace(/^[ .]+|[ .]+$/g, '') : 'Title Unknown';

  if (author) {
    author = normalizeEtAl(author);
    if (author.includes(',') && !author.includes('et al.')) {
      author = reorderName(author);
    }
  }

  return matched({
    type: 'medical',
    author,
    title: title || 'Title Unknown',
    pub: `${journal} ${postJournal}`.trim(),
  });
}

export function matchMedical(text: string): MatchResult {
  const candidates = MEDICAL_JOURNALS
    .filter(journal => text.includes(journal))
    .sort((a, b) => b.length - a.length);

  let lastFault: MatchResult = NO_MATCH;
  for (const journal of candidates) {
    const result = parseMedicalAt(text, journal);
    if (result.status === 'matched') return result;
    lastFault = result;
  }
  return lastFault;
}

export function matchBook(text: string): MatchResult {
  const pubMatch = PUBLICATION.exec(text);
  if (!pubMatch) return NO_MATCH;

  const pub = pubMatch[1];
  const prePub = text.slice(0, pubMatch.index).trim().replace(/[.,]+$/, '');

  const nameMatch = LEADING_AUTHOR_NAME.exec(prePub);
  if (nameMatch) {
    const [whole, last, suffix, given] = nameMatch;
    // "Martin." loses its sentence period, an initial like "S." keeps it
    const first = given.replace(/(\p{L}{2,})\.$/u, '$1');
    return matched({
      type: 'book',
      author: suffix ? `${first} ${last} ${suffix}` : `${first} ${last}`,
      title: nonEmpty(prePub.slice(whole.length).replace(/^[., ]+|[., ]+$/g, '')),
      pub,
    });
  }

  const { head, rest } = splitAtSentence(prePub);
  if (rest !== null) {
    return matched({
      type: 'book',
      author: nonEmpty(head),
      title: nonEmpty(rest),
      pub,
    });
  }

  return matched({ type: 'book', title: nonEmpty(prePub), pub });
}

/**
 * Fallback: "Last, First. Title..." is a journal citation, anything else is a
 * generic note whose whole text is the title.
 */
export function matchGeneric(text: string): MatchResult {
  const { head, rest } = splitAtSentence(text);
  if (rest !== null && head.includes(',')) {
    return matched({
      type: 'journal',
      author: reorderName(head),
      title: nonEmpty(rest),
    });
  }
  return matched({ type: 'generic', title: nonEmpty(text) });
}

/** Priority order: first match wins */
export const CITATION_MATCHERS: readonly CitationMatcher[] = [
  { name: 'archival', match: matchArchival },
  { name: 'transcript', match: matchTranscript },
  { name: 'legal', match: matchLegal },
  { name: 'medical', match: matchMedical },
  { name: 'book', match: matchBook },
  { name: 'generic', match: matchGeneric },
];
