import { describe, it, expect } from 'vitest';
import {
  assertWellFormed,
  decodeXmlEntities,
  escapeXml,
  extractParagraphs,
  extractRuns,
  sanitizeXml,
  stripReferenceMarker,
} from '../../../../src/services/docx/docx-xml.utils';
import { AppError } from '../../../../src/utils/app-error';

describe('docx-xml.utils', () => {
  describe('escapeXml / decodeXmlEntities', () => {
    it('should escape markup characters', () => {
      expect(escapeXml(`a < b & "c" 'd'`)).toBe('a &lt; b &amp; &quot;c&quot; &apos;d&apos;');
    });

    it('should decode named and numeric entities', () => {
      expect(decodeXmlEntities('Tom &amp; Jerry &#8211; &#x2014; &lt;x&gt;')).toBe('Tom & Jerry – — <x>');
    });

    it('should leave unknown entities alone', () => {
      expect(decodeXmlEntities('a &unknown; b')).toBe('a &unknown; b');
    });

    it('should reject character references past the Unicode range', () => {
      try {
        decodeXmlEntities('Bad &#x110000; char');
        expect.unreachable();
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.code).toBe('MALFORMED_XML');
          expect(error.message).toBe('Invalid character reference &#x110000;');
        }
      }
    });

    it('should decode the highest valid code point', () => {
      expect(decodeXmlEntities('&#x10FFFF;')).toBe(String.fromCodePoint(0x10ffff));
    });
  });

  describe('sanitizeXml', () => {
    it('should remove DOCTYPE declarations', () => {
      expect(sanitizeXml('<!DOCTYPE note><a/>')).toBe('<a/>');
    });
  });

  describe('assertWellFormed', () => {
    it('should accept well-formed XML', () => {
      expect(() => assertWellFormed('<a><b/></a>', 'word/document.xml')).not.toThrow();
    });

    it('should reject mismatched tags', () => {
      try {
        assertWellFormed('<a><b></a>', 'word/document.xml');
        expect.unreachable();
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.code).toBe('MALFORMED_XML');
          expect(error.message).toContain('word/document.xml is not well-formed XML');
        }
      }
    });
  });

  describe('extractParagraphs', () => {
    const xml =
      '<w:body><w:p/><w:p><w:pPr><w:pStyle w:val="Normal"/></w:pPr>' +
      '<w:r><w:t>Hello </w:t></w:r><w:r><w:t xml:space="preserve">world</w:t></w:r></w:p></w:body>';

    it('should find self-closing and full paragraphs', () => {
      const paragraphs = extractParagraphs(xml);

      expect(paragraphs).toHaveLength(2);
      expect(paragraphs[0].xml).toBe('<w:p/>');
      expect(paragraphs[0].text).toBe('');
      expect(paragraphs[1].start).toBe(14);
      expect(paragraphs[1].text).toBe('Hello world');
    });

    it('should record run positions within the whole part', () => {
      const [, paragraph] = extractParagraphs(xml);

      expect(paragraph.runs).toHaveLength(2);
      for (const run of paragraph.runs) {
        expect(xml.slice(run.start, run.start + run.xml.length)).toBe(run.xml);
      }
    });
  });

  describe('extractParagraphs with text boxes', () => {
    const xml =
      '<w:body><w:p><w:r><w:t xml:space="preserve">Intro. </w:t></w:r>' +
      '<w:r><w:pict><w:txbxContent><w:p><w:r><w:t>Boxed</w:t></w:r></w:p></w:txbxContent></w:pict></w:r>' +
      '<w:r><w:endnoteReference w:id="4"/></w:r></w:p></w:body>';

    it('should keep the anchoring paragraph whole', () => {
      const paragraphs = extractParagraphs(xml);

      expect(paragraphs).toHaveLength(1);
      expect(paragraphs[0].xml).toBe(xml.slice('<w:body>'.length, -'</w:body>'.length));
      expect(paragraphs[0].runs.map(run => run.endnoteId)).toEqual([null, null, '4']);
    });

    it('should leave text box content out of the paragraph text', () => {
      const [paragraph] = extractParagraphs(xml);

      expect(paragraph.text).toBe('Intro. ');
      expect(paragraph.runs[1].text).toBe('');
    });
  });

  describe('extractRuns', () => {
    it('should tell reference runs from endnote marks', () => {
      const runs = extractRuns(
        '<w:r><w:endnoteReference w:id="7"/></w:r><w:r><w:endnoteRef/></w:r><w:r><w:t>x &amp; y</w:t></w:r>'
      );

      expect(runs.map(run => run.endnoteId)).toEqual(['7', null, null]);
      expect(runs.map(run => run.isEndnoteRefMark)).toEqual([false, true, false]);
      expect(runs[2].text).toBe('x & y');
    });
  });

  describe('stripReferenceMarker', () => {
    it('should drop the reference and its marker text but keep run properties', () => {
      const run =
        '<w:r><w:rPr><w:vertAlign w:val="superscript"/></w:rPr><w:endnoteReference w:id="3"/><w:t>3</w:t></w:r>';

      expect(stripReferenceMarker(run)).toBe('<w:r><w:rPr><w:vertAlign w:val="superscript"/></w:rPr></w:r>');
    });
  });
});
