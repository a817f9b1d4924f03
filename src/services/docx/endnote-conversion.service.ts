/**
 * Endnote Conversion Service
 * Converts a document's endnotes into a consolidated, incipit-labelled notes
 * section. Works on the word/document.xml and word/endnotes.xml parts;
 * unpacking and repacking the archive is the caller's job.
 */

import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { documentRestructurerService } from '../incipit/document-restructurer.service';
import { notePreviewService } from '../incipit/note-preview.service';
import type { RestructureOptionsInput } from '../incipit/incipit.schemas';
import type { NotePreviewEntry } from '../incipit/incipit.types';
import { assertWellFormed, sanitizeXml } from './docx-xml.utils';
import { endnoteExtractorService } from './endnote-extractor.service';
import { endnoteWriterService } from './endnote-writer.service';

export interface DocxNoteParts {
  documentXml?: string | null;
  endnotesXml?: string | null;
}

export interface EndnoteConversionResult {
  documentXml: string;
  notesProcessed: number;
  message: string;
}

function requirePart(xml: string | null | undefined, partName: string): string {
  if (!xml) {
    throw AppError.structural(`Invalid DOCX: ${partName} not found`, 'MISSING_DOCUMENT_PART');
  }
  const sanitized = sanitizeXml(xml);
  assertWellFormed(sanitized, partName);
  return sanitized;
}

class EndnoteConversionService {
  /**
   * Returns a new document part; the input strings are never modified, so a
   * failed conversion leaves the original document as it was.
   */
  convert(parts: DocxNoteParts, options?: RestructureOptionsInput): EndnoteConversionResult {
    try {
      const documentXml = requirePart(parts.documentXml, 'word/document.xml');
      const endnotesXml = requirePart(parts.endnotesXml, 'word/endnotes.xml');

      const extraction = endnoteExtractorService.extract(documentXml, endnotesXml);
      const result = documentRestructurerService.restructure(
        { notes: extraction.notes, references: extraction.references },
        options
      );
      const converted = endnoteWriterService.apply(documentXml, extraction, result);

      const message = `Converted ${result.notesProcessed} notes`;
      logger.info(`[EndnoteConversion] ${message}`);
      return { documentXml: converted, notesProcessed: result.notesProcessed, message };
    } catch (error: unknown) {
      logger.error('[EndnoteConversion] Conversion failed', error instanceof Error ? error : undefined);
      throw error;
    }
  }

  preview(endnotesXml: string | null | undefined): NotePreviewEntry[] {
    const xml = requirePart(endnotesXml, 'word/endnotes.xml');
    const notes = endnoteExtractorService.extractNotes(xml);
    return notePreviewService.preview(notes);
  }
}

export const endnoteConversionService = new EndnoteConversionService();
