/**
 * Endnote Extractor Service
 * Reads reference sites from word/document.xml and note texts from
 * word/endnotes.xml.
 */

import { logger } from '../../lib/logger';
import { isSeparatorNoteId } from '../../constants/notes.constants';
import { extractParagraphs, extractRuns } from './docx-xml.utils';
import type { NoteInput, ReferenceSite } from '../incipit/incipit.types';

/** Position of the run holding a reference, parallel to the site list */
export interface ReferenceRunLocation {
  start: number;
  end: number;
  xml: string;
}

export interface ExtractedEndnote extends NoteInput {
  runsXml: string[];   // note runs without the endnoteRef mark, for verbatim copies
}

export interface EndnoteExtraction {
  references: ReferenceSite[];
  locations: ReferenceRunLocation[];
  notes: ExtractedEndnote[];
}

const ENDNOTE_PATTERN = /<w:endnote\b([^>]*)>([\s\S]*?)<\/w:endnote>/g;
const ID_ATTRIBUTE = /\bw:id="(-?\d+)"/;

class EndnoteExtractorService {
  extract(documentXml: string, endnotesXml: string): EndnoteExtraction {
    const { references, locations } = this.extractReferenceSites(documentXml);
    const notes = this.extractNotes(endnotesXml);

    logger.debug(`[EndnoteExtractor] ${references.length} reference sites, ${notes.length} notes`);
    return { references, locations, notes };
  }

  /**
   * A reference's offset is the paragraph text length up to and including
   * the run that carries it.
   */
  extractReferenceSites(documentXml: string): Pick<EndnoteExtraction, 'references' | 'locations'> {
    const references: ReferenceSite[] = [];
    const locations: ReferenceRunLocation[] = [];

    for (const paragraph of extractParagraphs(documentXml)) {
      let position = 0;
      for (const run of paragraph.runs) {
        position += run.text.length;
        if (run.endnoteId === null || isSeparatorNoteId(run.endnoteId)) continue;

        references.push({
          paragraphText: paragraph.text,
          referenceId: run.endnoteId,
          characterOffset: position,
        });
        locations.push({ start: run.start, end: run.start + run.xml.length, xml: run.xml });
      }
    }

    return { references, locations };
  }

  extractNotes(endnotesXml: string): ExtractedEndnote[] {
    const notes: ExtractedEndnote[] = [];

    for (const match of endnotesXml.matchAll(ENDNOTE_PATTERN)) {
      const idMatch = ID_ATTRIBUTE.exec(match[1]);
      if (!idMatch) {
        logger.warn('[EndnoteExtractor] Endnote without w:id skipped');
        continue;
      }

      const id = idMatch[1];
      if (isSeparatorNoteId(id)) continue;

      const runs = extractRuns(match[2]).filter(run => !run.isEndnoteRefMark);
      notes.push({
        id,
        rawText: runs.map(run => run.text).join(''),
        runsXml: runs.map(run => run.xml),
      });
    }

    return notes;
  }
}

export const endnoteExtractorService = new EndnoteExtractorService();
