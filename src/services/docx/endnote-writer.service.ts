/**
 * Endnote Writer Service
 * Applies restructuring edits to word/document.xml and renders the
 * consolidated notes section as WordprocessingML.
 */

import { AppError } from '../../utils/app-error';
import { escapeXml, stripReferenceMarker } from './docx-xml.utils';
import type { EndnoteExtraction, ReferenceRunLocation } from './endnote-extractor.service';
import type {
  NotesSection,
  ReferenceAnchor,
  RenderedNoteBlock,
  RestructureResult,
} from '../incipit/incipit.types';

interface SiteEdit {
  anchor?: ReferenceAnchor;
  removeMarker: boolean;
}

function textRun(text: string, runProperties = ''): string {
  return `<w:r>${runProperties}<w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`;
}

class EndnoteWriterService {
  apply(documentXml: string, extraction: EndnoteExtraction, result: RestructureResult): string {
    const withBookmarks = this.applyEdits(documentXml, extraction, result);
    return this.appendSection(withBookmarks, this.renderSection(result.section, extraction));
  }

  /**
   * Bracket each reference run with a bookmark pair and strip its marker.
   * Runs are rewritten from the end of the part so earlier indexes stay valid.
   */
  applyEdits(documentXml: string, extraction: EndnoteExtraction, result: RestructureResult): string {
    const siteEdits = new Map<number, SiteEdit>();
    for (const edit of result.edits) {
      const current = siteEdits.get(edit.siteIndex) ?? { removeMarker: false };
      if (edit.kind === 'insert-bookmark') {
        current.anchor = edit.anchor;
      } else {
        current.removeMarker = true;
      }
      siteEdits.set(edit.siteIndex, current);
    }

    const ordered = [...siteEdits.entries()].sort(([a], [b]) => {
      return this.locationOf(extraction, b).start - this.locationOf(extraction, a).start;
    });

    let xml = documentXml;
    for (const [siteIndex, edit] of ordered) {
      const location = this.locationOf(extraction, siteIndex);
      const run = edit.removeMarker ? stripReferenceMarker(location.xml) : location.xml;
      const replacement = edit.anchor
        ? `<w:bookmarkStart w:id="${edit.anchor.bookmarkId}" w:name="${escapeXml(edit.anchor.bookmarkName)}"/>` +
          run +
          `<w:bookmarkEnd w:id="${edit.anchor.bookmarkId}"/>`
        : run;
      xml = xml.slice(0, location.start) + replacement + xml.slice(location.end);
    }
    return xml;
  }

  renderSection(section: NotesSection, extraction: EndnoteExtraction): string {
    const runsById = new Map(extraction.notes.map(note => [note.id, note.runsXml]));
    const paragraphs: string[] = [];

    if (section.pageBreakBefore) {
      paragraphs.push('<w:p><w:r><w:br w:type="page"/></w:r></w:p>');
    }
    paragraphs.push(
      `<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr>${textRun(section.heading)}</w:p>`
    );
    for (const block of section.blocks) {
      paragraphs.push(this.renderBlock(block, runsById.get(block.id) ?? []));
    }
    return paragraphs.join('');
  }

  renderBlock(block: RenderedNoteBlock, originalRuns: string[]): string {
    const parts: string[] = [
      '<w:pPr><w:spacing w:after="240"/></w:pPr>',
      `<w:fldSimple w:instr="${escapeXml(block.fieldInstruction)}"><w:r><w:t>0</w:t></w:r></w:fldSimple>`,
      textRun(block.separator),
    ];

    if (block.incipit) {
      const emphasis = block.emphasis === 'bold' ? '<w:b/>' : '<w:i/>';
      parts.push(textRun(block.incipit, `<w:rPr>${emphasis}</w:rPr>`));
      parts.push(textRun(block.labelSuffix));
    }

    // Unformatted notes keep their original runs and formatting
    if (block.citationSource !== 'formatted' && originalRuns.length > 0) {
      parts.push(...originalRuns);
    } else {
      parts.push(textRun(block.citation));
    }

    return `<w:p>${parts.join('')}</w:p>`;
  }

  /**
   * Insert before the body-level w:sectPr, which must stay last in w:body.
   */
  appendSection(documentXml: string, sectionXml: string): string {
    const bodyEnd = documentXml.lastIndexOf('</w:body>');
    if (bodyEnd === -1) {
      throw AppError.structural('Invalid DOCX: document body not found', 'MISSING_DOCUMENT_PART');
    }

    const lastBlockEnd = Math.max(
      documentXml.lastIndexOf('</w:p>', bodyEnd),
      documentXml.lastIndexOf('</w:tbl>', bodyEnd)
    );
    const sectPr = documentXml.lastIndexOf('<w:sectPr', bodyEnd);
    const insertAt = sectPr > lastBlockEnd ? sectPr : bodyEnd;

    return documentXml.slice(0, insertAt) + sectionXml + documentXml.slice(insertAt);
  }

  private locationOf(extraction: EndnoteExtraction, siteIndex: number): ReferenceRunLocation {
    const location = extraction.locations[siteIndex];
    if (!location) {
      throw AppError.structural(`No reference run for site ${siteIndex}`, 'MISSING_DOCUMENT_PART');
    }
    return location;
  }
}

export const endnoteWriterService = new EndnoteWriterService();
