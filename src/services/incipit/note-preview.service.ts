/**
 * Note Preview Service
 * Audits what citation formatting would do to each note without touching
 * the document.
 */

import { compareNoteIds, isSeparatorNoteId } from '../../constants/notes.constants';
import { CitationHistoryEngine, createCitationHistoryEngine } from './citation-history.service';
import type { NoteInput, NotePreviewEntry } from './incipit.types';

export class NotePreviewService {
  constructor(
    private readonly createEngine: () => CitationHistoryEngine = createCitationHistoryEngine
  ) {}

  preview(notes: NoteInput[]): NotePreviewEntry[] {
    const engine = this.createEngine();
    const ordered = notes
      .filter(note => !isSeparatorNoteId(note.id) && note.rawText.trim().length > 0)
      .sort((a, b) => compareNoteIds(a.id, b.id));

    return ordered.map(note => {
      const historyLength = engine.history.length;
      const processed = engine.process(note.rawText);
      const entry = engine.history.length > historyLength
        ? engine.history[engine.history.length - 1]
        : null;

      return {
        id: note.id,
        raw: note.rawText,
        processed,
        type: entry ? entry.type : null,
        fingerprint: entry ? entry.fingerprint : null,
      };
    });
  }
}

export const notePreviewService = new NotePreviewService();
