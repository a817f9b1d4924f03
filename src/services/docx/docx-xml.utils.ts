/**
 * WordprocessingML string helpers.
 * Paragraphs and runs are located with regexes over the raw part XML so
 * untouched markup is written back byte for byte.
 */

import { XMLValidator } from 'fast-xml-parser';
import { config } from '../../config';
import { AppError } from '../../utils/app-error';

export interface RunXml {
  xml: string;
  start: number;         // index of the run within the part XML
  text: string;          // decoded w:t text
  endnoteId: string | null;
  isEndnoteRefMark: boolean;
}

export interface ParagraphXml {
  xml: string;
  start: number;
  runs: RunXml[];
  text: string;
}

interface ElementSpan {
  xml: string;
  start: number;
}

const PARAGRAPH_TAG = 'w:p';
const RUN_TAG = 'w:r';
const TEXT_BOX_TAG = 'w:txbxContent';
// Highest code point a character reference may name
const MAX_CODE_POINT = 0x10ffff;
const TEXT_PATTERN = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g;
const ENDNOTE_REFERENCE_PATTERN = /<w:endnoteReference\b[^>]*?\bw:id="(-?\d+)"[^>]*?\/>/;
const ENDNOTE_REF_MARK_PATTERN = /<w:endnoteRef\b[^>]*?\/>/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g, (entity, body: string) => {
    if (!body.startsWith('#')) return NAMED_ENTITIES[body] ?? entity;

    const codePoint = body.startsWith('#x')
      ? parseInt(body.slice(2), 16)
      : parseInt(body.slice(1), 10);
    if (codePoint > MAX_CODE_POINT) {
      throw AppError.structural(`Invalid character reference ${entity}`, 'MALFORMED_XML');
    }
    return String.fromCodePoint(codePoint);
  });
}

/**
 * Outermost `tag` elements of a fragment. Same-named elements nested inside
 * one (paragraphs and runs of a text box) stay part of it.
 */
function findOutermostElements(xml: string, tag: string): ElementSpan[] {
  const pattern = new RegExp(`<(/?)${tag}\\b[^>]*?(/?)>`, 'g');
  const spans: ElementSpan[] = [];
  let depth = 0;
  let openedAt = 0;

  for (const match of xml.matchAll(pattern)) {
    const index = match.index ?? 0;
    const [tagXml, closing, selfClosing] = match;

    if (closing) {
      if (depth === 0) continue;
      depth--;
      if (depth === 0) {
        spans.push({ xml: xml.slice(openedAt, index + tagXml.length), start: openedAt });
      }
    } else if (selfClosing) {
      if (depth === 0) spans.push({ xml: tagXml, start: index });
    } else {
      if (depth === 0) openedAt = index;
      depth++;
    }
  }
  return spans;
}

/**
 * Run markup without its text box content, which belongs to other paragraphs.
 */
function withoutTextBoxes(runXml: string): string {
  let own = '';
  let cursor = 0;
  for (const box of findOutermostElements(runXml, TEXT_BOX_TAG)) {
    own += runXml.slice(cursor, box.start);
    cursor = box.start + box.xml.length;
  }
  return own + runXml.slice(cursor);
}

/**
 * Strip DOCTYPE and entity declarations (XXE) before any parsing.
 */
export function sanitizeXml(xml: string): string {
  return xml
    .replace(/<!DOCTYPE[^>]*>/gi, '')
    .replace(/<!ENTITY[^>]*>/gi, '');
}

/**
 * Reject a part that is oversized or not well-formed.
 */
export function assertWellFormed(xml: string, partName: string): void {
  if (xml.length > config.maxXmlSize) {
    throw AppError.structural(
      `${partName} too large: ${xml.length} bytes (max: ${config.maxXmlSize})`,
      'XML_TOO_LARGE'
    );
  }

  const result = XMLValidator.validate(xml);
  if (result !== true) {
    const { msg, line, col } = result.err;
    throw AppError.structural(`${partName} is not well-formed XML: ${msg} (line ${line}, column ${col})`, 'MALFORMED_XML');
  }
}

export function extractRunText(runXml: string): string {
  let text = '';
  for (const match of runXml.matchAll(TEXT_PATTERN)) {
    text += decodeXmlEntities(match[1]);
  }
  return text;
}

export function extractRuns(xml: string, offset = 0): RunXml[] {
  const runs: RunXml[] = [];
  for (const run of findOutermostElements(xml, RUN_TAG)) {
    const own = withoutTextBoxes(run.xml);
    const reference = ENDNOTE_REFERENCE_PATTERN.exec(own);
    runs.push({
      xml: run.xml,
      start: offset + run.start,
      text: extractRunText(own),
      endnoteId: reference ? reference[1] : null,
      isEndnoteRefMark: ENDNOTE_REF_MARK_PATTERN.test(own),
    });
  }
  return runs;
}

/**
 * All top-level paragraphs with their runs and combined text.
 * Text split across several w:t elements is joined; text box content is not
 * part of the paragraph that anchors the box.
 */
export function extractParagraphs(xml: string): ParagraphXml[] {
  const paragraphs: ParagraphXml[] = [];
  for (const paragraph of findOutermostElements(xml, PARAGRAPH_TAG)) {
    const runs = extractRuns(paragraph.xml, paragraph.start);
    paragraphs.push({
      xml: paragraph.xml,
      start: paragraph.start,
      runs,
      text: runs.map(run => run.text).join(''),
    });
  }
  return paragraphs;
}

/**
 * Remove the reference element and its visible marker text from a run,
 * keeping run properties.
 */
export function stripReferenceMarker(runXml: string): string {
  return runXml
    .replace(new RegExp(ENDNOTE_REFERENCE_PATTERN.source, 'g'), '')
    .replace(TEXT_PATTERN, '')
    .replace(/<w:t\b[^>]*\/>/g, '');
}
