/**
 * Citation Parser Service
 * Decomposes a free-text note into a typed CitationRecord by trying the
 * matcher table in priority order.
 */

import { logger } from '../../lib/logger';
import { normalizeNoteText } from './text-normalizer';
import { CITATION_MATCHERS } from './citation-matchers';
import type {
  CitationMatcher,
  CitationRecord,
  MatchResult,
  MatchTraceStep,
  ParseTrace,
} from './incipit.types';

// ", 45" / ". 12–14" at the very end, optionally followed by a period
const TRAILING_PAGE = /[,.]\s*(\d+[-–]?\d*)\.?$/;

export interface TrailingPage {
  text: string;
  page: string | null;
}

export function extractTrailingPage(text: string): TrailingPage {
  const match = TRAILING_PAGE.exec(text);
  if (!match) return { text, page: null };
  return {
    text: text.slice(0, match.index).trim().replace(/[.,]+$/, ''),
    page: match[1],
  };
}

function runMatcher(matcher: CitationMatcher, text: string): MatchResult {
  try {
    return matcher.match(text);
  } catch (error: unknown) {
    return {
      status: 'faulted',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

export class CitationParserService {
  constructor(private readonly matchers: readonly CitationMatcher[] = CITATION_MATCHERS) {}

  parse(text: string): CitationRecord {
    return this.parseWithTrace(text).record;
  }

  /**
   * Parse and keep the per-matcher decision trace.
   * A faulted matcher counts as no match; the cascade moves on.
   */
  parseWithTrace(rawText: string): ParseTrace {
    const cleaned = normalizeNoteText(rawText);
    const { text, page } = extractTrailingPage(cleaned);
    const steps: MatchTraceStep[] = [];

    for (const matcher of this.matchers) {
      const result = runMatcher(matcher, text);

      if (result.status === 'faulted') {
        logger.debug(`[CitationParser] ${matcher.name} matcher faulted: ${result.reason}`);
        steps.push({ matcher: matcher.name, status: 'faulted', reason: result.reason });
        continue;
      }

      steps.push({ matcher: matcher.name, status: result.status });
      if (result.status === 'matched') {
        return {
          record: { raw: rawText, page, ...result.fields },
          steps,
        };
      }
    }

    return {
      record: {
        raw: rawText,
        type: 'generic',
        author: null,
        title: null,
        pub: null,
        page,
        details: null,
      },
      steps,
    };
  }
}

export const citationParserService = new CitationParserService();
