/**
 * DOCX Endnote Services - Central Exports
 */

export { endnoteConversionService } from './endnote-conversion.service';
export type { DocxNoteParts, EndnoteConversionResult } from './endnote-conversion.service';
export { endnoteExtractorService } from './endnote-extractor.service';
export type { EndnoteExtraction, ExtractedEndnote, ReferenceRunLocation } from './endnote-extractor.service';
export { endnoteWriterService } from './endnote-writer.service';
export { decodeXmlEntities, escapeXml } from './docx-xml.utils';
