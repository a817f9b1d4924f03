/**
 * Document Restructurer Service
 * Turns reference sites and raw notes into bookmark edits plus one
 * consolidated, numerically ordered notes section.
 *
 * The output is format-free: the document-model collaborator applies the
 * edits and renders the section.
 */

import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import {
  BOOKMARK_NAME_PREFIX,
  FIRST_BOOKMARK_ID,
  INCIPIT_LABEL_SUFFIX,
  NOTES_HEADING,
  NOTE_NUMBER_SEPARATOR,
  compareNoteIds,
  isSeparatorNoteId,
} from '../../constants/notes.constants';
import { locateIncipit } from './incipit-locator';
import { CitationHistoryEngine, createCitationHistoryEngine } from './citation-history.service';
import {
  parseRestructureInput,
  parseRestructureOptions,
  type RestructureOptionsInput,
} from './incipit.schemas';
import type {
  CitationSource,
  DocumentEdit,
  NoteInput,
  ReferenceAnchor,
  ReferenceSite,
  RenderedNoteBlock,
  RestructureResult,
} from './incipit.types';

export interface RestructureRequest {
  notes: NoteInput[];
  references: ReferenceSite[];
}

interface FormattedCitation {
  citation: string;
  citationSource: CitationSource;
}

export function bookmarkNameFor(noteId: string): string {
  return `${BOOKMARK_NAME_PREFIX}${noteId}`;
}

export function pageRefInstruction(bookmarkName: string): string {
  return ` PAGEREF ${bookmarkName} \\h `;
}

export class DocumentRestructurerService {
  constructor(
    private readonly createEngine: () => CitationHistoryEngine = createCitationHistoryEngine
  ) {}

  restructure(request: RestructureRequest, options?: RestructureOptionsInput): RestructureResult {
    const opts = parseRestructureOptions(options);
    const { notes, references } = parseRestructureInput(request);

    // 1-2. Anchors, incipits and bookmark edits per reference site
    const anchors = new Map<string, ReferenceAnchor>();
    const incipits = new Map<string, string>();
    const edits: DocumentEdit[] = [];
    let nextBookmarkId = FIRST_BOOKMARK_ID;

    references.forEach((site, siteIndex) => {
      const noteId = site.referenceId;
      if (isSeparatorNoteId(noteId)) return;

      if (anchors.has(noteId)) {
        throw AppError.structural(
          `Note ${noteId} is referenced more than once; bookmark ${bookmarkNameFor(noteId)} would be ambiguous`,
          'DUPLICATE_REFERENCE'
        );
      }

      const anchor: ReferenceAnchor = {
        noteId,
        characterOffset: site.characterOffset,
        bookmarkId: String(nextBookmarkId++),
        bookmarkName: bookmarkNameFor(noteId),
      };
      anchors.set(noteId, anchor);
      incipits.set(noteId, locateIncipit(site.paragraphText, site.characterOffset, opts.wordCount));

      edits.push({ kind: 'insert-bookmark', siteIndex, anchor });
      edits.push({ kind: 'remove-reference-marker', siteIndex, noteId });
    });

    const notesById = new Map<string, NoteInput>();
    for (const note of notes) {
      if (isSeparatorNoteId(note.id)) continue;
      if (notesById.has(note.id)) {
        throw AppError.structural(`Note ${note.id} appears more than once`, 'INVALID_NOTE_INPUT');
      }
      notesById.set(note.id, note);
    }

    // 3. Consolidated section in ascending note id order
    const engine = opts.applyCitationStyle ? this.createEngine() : null;
    const blocks: RenderedNoteBlock[] = [];

    for (const noteId of [...anchors.keys()].sort(compareNoteIds)) {
      const note = notesById.get(noteId);
      const anchor = anchors.get(noteId);
      if (!note || !anchor) {
        logger.warn(`[DocumentRestructurer] Reference to note ${noteId} has no note text; skipped`);
        continue;
      }

      const { citation, citationSource } = this.formatCitation(engine, note);
      blocks.push({
        id: noteId,
        rawText: note.rawText,
        incipit: incipits.get(noteId) ?? '',
        citation,
        citationSource,
        bookmarkName: anchor.bookmarkName,
        fieldInstruction: pageRefInstruction(anchor.bookmarkName),
        separator: NOTE_NUMBER_SEPARATOR,
        emphasis: opts.emphasisStyle,
        labelSuffix: INCIPIT_LABEL_SUFFIX,
      });
    }

    logger.info(`[DocumentRestructurer] Converted ${blocks.length} notes (${edits.length} edits)`);

    return {
      edits,
      section: {
        heading: NOTES_HEADING,
        // 4. Page break before the section when appending to an existing body
        pageBreakBefore: opts.appendToBody,
        blocks,
      },
      notesProcessed: blocks.length,
    };
  }

  private formatCitation(engine: CitationHistoryEngine | null, note: NoteInput): FormattedCitation {
    if (!engine) {
      return { citation: note.rawText, citationSource: 'verbatim' };
    }

    try {
      return { citation: engine.process(note.rawText), citationSource: 'formatted' };
    } catch (error: unknown) {
      logger.warn(
        `[DocumentRestructurer] Citation formatting failed for note ${note.id}; keeping original text`,
        error instanceof Error ? error : undefined
      );
      return { citation: note.rawText, citationSource: 'fallback' };
    }
  }
}

export const documentRestructurerService = new DocumentRestructurerService();
