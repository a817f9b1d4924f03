/**
 * Incipit Notes Type Definitions
 * Citation records, history state and the edit-instruction contract
 * shared between the restructurer and the document-model collaborator.
 */

import type { EmphasisStyle } from '../../config';

// ============================================
// CITATION TYPES
// ============================================

export type CitationType =
  | 'archival'
  | 'transcript'
  | 'legal'
  | 'medical'
  | 'book'
  | 'journal'
  | 'generic';

/** Structured fields decomposed from one free-text note */
export interface CitationRecord {
  raw: string;
  type: CitationType;
  author: string | null;
  title: string | null;
  pub: string | null;
  page: string | null;
  details: string | null;      // archival only: matched box/folder/collection text
  fingerprint?: string | null; // set once the record enters history
}

/** Record as appended to a CitationHistoryEngine's ordered history */
export interface HistoryEntry extends CitationRecord {
  fingerprint: string | null;
}

/** Matcher output before the trailing page is attached */
export type MatchedFields = Omit<CitationRecord, 'raw' | 'page' | 'fingerprint'>;

export type MatchResult =
  | { status: 'matched'; fields: MatchedFields }
  | { status: 'no_match' }
  | { status: 'faulted'; reason: string };

export interface CitationMatcher {
  name: CitationType;
  match: (text: string) => MatchResult;
}

/** One step of the parser cascade, in priority order */
export interface MatchTraceStep {
  matcher: CitationType;
  status: MatchResult['status'];
  reason?: string;
}

export interface ParseTrace {
  record: CitationRecord;
  steps: MatchTraceStep[];
}

// ============================================
// DOCUMENT INPUT TYPES
// ============================================

/** Raw note text keyed by its numeric id */
export interface NoteInput {
  id: string;
  rawText: string;
}

/** Where one reference marker sits in its paragraph's concatenated run text */
export interface ReferenceSite {
  paragraphText: string;
  referenceId: string;
  characterOffset: number;
}

export interface ReferenceAnchor {
  noteId: string;
  characterOffset: number;
  bookmarkId: string;
  bookmarkName: string;
}

// ============================================
// OUTPUT TYPES
// ============================================

export interface RestructureOptions {
  wordCount: number;
  emphasisStyle: EmphasisStyle;
  applyCitationStyle: boolean;
  appendToBody: boolean;
}

export type DocumentEdit =
  | {
      kind: 'insert-bookmark';
      siteIndex: number;
      anchor: ReferenceAnchor;
    }
  | {
      kind: 'remove-reference-marker';
      siteIndex: number;
      noteId: string;
    };

/**
 * How a note's citation text was produced:
 * - formatted: citation engine output
 * - verbatim: citation formatting disabled
 * - fallback: engine failed for this note, original text kept
 */
export type CitationSource = 'formatted' | 'verbatim' | 'fallback';

export interface Note {
  id: string;
  rawText: string;
  incipit: string;
  citation: string;
  citationSource: CitationSource;
}

export interface RenderedNoteBlock extends Note {
  bookmarkName: string;
  fieldInstruction: string;  // e.g. " PAGEREF REF_NOTE_3 \h "
  separator: string;
  emphasis: EmphasisStyle;
  labelSuffix: string;
}

export interface NotesSection {
  heading: string;
  pageBreakBefore: boolean;
  blocks: RenderedNoteBlock[];
}

export interface RestructureResult {
  edits: DocumentEdit[];
  section: NotesSection;
  notesProcessed: number;
}

export interface NotePreviewEntry {
  id: string;
  raw: string;
  processed: string;
  type: CitationType | null;
  fingerprint: string | null;
}
