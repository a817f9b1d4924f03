/**
 * Citation History Engine
 * Decides, note by note in document order, between "Ibid.", a short note
 * and a full note. One engine per document conversion; never reuse one.
 */

import { normalizeNoteText } from './text-normalizer';
import { generateFingerprint } from './fingerprint';
import { CitationParserService, citationParserService } from './citation-parser.service';
import type { CitationRecord, HistoryEntry } from './incipit.types';

const MAX_SHORT_TITLE_WORDS = 5;

/**
 * Short title for subsequent notes: subtitle after a colon dropped, leading
 * article dropped, at most five words.
 * Example: "The Quiet Revolution: A Study of Reform" → "Quiet Revolution"
 */
export function getShortTitle(fullTitle: string | null | undefined): string {
  if (!fullTitle) return '';

  const mainTitle = fullTitle.split(':')[0];
  const withoutArticle = mainTitle.replace(/^(The|A|An)\s+/, '');
  const words = withoutArticle.split(/\s+/).filter(w => w.length > 0);

  return words.slice(0, MAX_SHORT_TITLE_WORDS).join(' ');
}

function withPage(text: string, page: string | null): string {
  return page ? `${text}, ${page}` : text;
}

function joinAuthor(author: string | null, title: string): string {
  return [author, title].filter(part => !!part).join(', ');
}

export class CitationHistoryEngine {
  private readonly entries: HistoryEntry[] = [];
  private readonly seenWorks = new Map<string, CitationRecord>();

  constructor(private readonly parser: CitationParserService = citationParserService) {}

  /** Entries in processing order; pass-through notes are not included */
  get history(): readonly HistoryEntry[] {
    return this.entries;
  }

  get seenWorkCount(): number {
    return this.seenWorks.size;
  }

  /**
   * Format one note. Must be called in ascending numeric note id order.
   */
  process(rawText: string): string {
    const parsed = this.parser.parse(rawText);

    if (!parsed.author && !parsed.title) {
      return normalizeNoteText(rawText);
    }

    const fingerprint = generateFingerprint(parsed.author, parsed.title);
    const previous = this.entries.length > 0 ? this.entries[this.entries.length - 1] : null;

    let formatted: string;
    if (fingerprint !== null && previous?.fingerprint === fingerprint) {
      formatted = withPage('Ibid.', parsed.page);
    } else {
      const firstSeen = fingerprint !== null ? this.seenWorks.get(fingerprint) : undefined;
      if (firstSeen) {
        formatted = withPage(this.formatShortNote(parsed, firstSeen), parsed.page);
      } else {
        if (fingerprint !== null) this.seenWorks.set(fingerprint, parsed);
        formatted = withPage(this.formatFullNote(parsed), parsed.page);
      }
    }

    this.entries.push({ ...parsed, fingerprint });
    return formatted;
  }

  private formatShortNote(record: CitationRecord, firstSeen: CitationRecord): string {
    const title = record.title ?? '';
    switch (record.type) {
      case 'legal':
        return title.split(',')[0];
      case 'archival':
      case 'transcript':
        return title;
      default: {
        const shortTitle = getShortTitle(firstSeen.title);
        return joinAuthor(record.author, shortTitle);
      }
    }
  }

  private formatFullNote(record: CitationRecord): string {
    const title = record.title ?? '';
    const authorTitle = joinAuthor(record.author, title);
    switch (record.type) {
      case 'legal':
        return title;
      case 'archival':
        return `${title}, ${record.details ?? ''}`;
      case 'book':
        return record.pub ? `${authorTitle} (${record.pub})` : authorTitle;
      case 'medical':
        return record.pub ? `${authorTitle} ${record.pub}` : authorTitle;
      default:
        return authorTitle;
    }
  }
}

/** Fresh engine for one document conversion */
export function createCitationHistoryEngine(
  parser: CitationParserService = citationParserService
): CitationHistoryEngine {
  return new CitationHistoryEngine(parser);
}
