/**
 * Incipit Notes Services - Central Exports
 */

// Services
export { citationParserService, CitationParserService, extractTrailingPage } from './citation-parser.service';
export {
  CitationHistoryEngine,
  createCitationHistoryEngine,
  getShortTitle,
} from './citation-history.service';
export {
  documentRestructurerService,
  DocumentRestructurerService,
  bookmarkNameFor,
} from './document-restructurer.service';
export type { RestructureRequest } from './document-restructurer.service';
export { notePreviewService, NotePreviewService } from './note-preview.service';

// Pure helpers
export { normalizeNoteText } from './text-normalizer';
export { generateFingerprint, clearFingerprintCache } from './fingerprint';
export { locateIncipit } from './incipit-locator';
export { CITATION_MATCHERS, MEDICAL_JOURNALS } from './citation-matchers';

// Types
export type * from './incipit.types';

// Schemas
export * from './incipit.schemas';
