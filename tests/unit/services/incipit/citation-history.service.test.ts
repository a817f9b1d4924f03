/**
 * Citation History Engine Tests
 *
 * Full / short / Ibid. decisions over document-ordered notes
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  CitationHistoryEngine,
  createCitationHistoryEngine,
  getShortTitle,
} from '../../../../src/services/incipit/citation-history.service';
import { CitationParserService } from '../../../../src/services/incipit/citation-parser.service';

const FREUD_45 = 'Freud, S. The Interpretation of Dreams. New York: Macmillan, 1913, 45.';
const FREUD_60 = 'Freud, S. The Interpretation of Dreams. New York: Macmillan, 1913, 60.';
const SMITH = 'Smith, John. Essays on Reform';
const OSHEROFF_CASE = 'Osheroff v. Chestnut Lodge, Inc., 490 A.2d 720 (Md. Ct. Spec. App. 1985)';

describe('getShortTitle', () => {
  it('should drop the subtitle and the leading article', () => {
    expect(getShortTitle('The Quiet Revolution: A Study of Reform')).toBe('Quiet Revolution');
  });

  it('should truncate to five words', () => {
    expect(getShortTitle('An Essay on the Principle of Population and Its Effects')).toBe(
      'Essay on the Principle of'
    );
  });

  it('should only strip whole-word articles', () => {
    expect(getShortTitle('Theory of Mind')).toBe('Theory of Mind');
  });

  it('should return an empty string without a title', () => {
    expect(getShortTitle(null)).toBe('');
    expect(getShortTitle('')).toBe('');
  });
});

describe('CitationHistoryEngine', () => {
  let engine: CitationHistoryEngine;

  beforeEach(() => {
    engine = createCitationHistoryEngine();
  });

  it('should emit full, Ibid. and short notes for the same work', () => {
    expect(engine.process(FREUD_45)).toBe(
      'S. Freud, The Interpretation of Dreams (New York: Macmillan, 1913), 45'
    );
    expect(engine.process(FREUD_45)).toBe('Ibid., 45');
    expect(engine.process(SMITH)).toBe('John Smith, Essays on Reform');
    expect(engine.process(FREUD_60)).toBe('S. Freud, Interpretation of Dreams, 60');
  });

  it('should track books whose titles end in a short word', () => {
    expect(engine.process('Smith, J. The Cold War. New York: Penguin, 2000, 12.')).toBe(
      'J. Smith, The Cold War (New York: Penguin, 2000), 12'
    );
    expect(engine.process('Smith, J. The Cold War. New York: Penguin, 2000, 12.')).toBe('Ibid., 12');
    expect(engine.process('Smith, John. The Last Day. New York: Penguin, 2000, 3.')).toBe(
      'John Smith, The Last Day (New York: Penguin, 2000), 3'
    );
    expect(engine.process('Smith, J. The Cold War. New York: Penguin, 2000, 14.')).toBe(
      'J. Smith, Cold War, 14'
    );
  });

  it('should emit a bare "Ibid." when no page was given', () => {
    expect(engine.process(SMITH)).toBe('John Smith, Essays on Reform');
    expect(engine.process(SMITH)).toBe('Ibid.');
  });

  it('should never emit "Ibid." when another work came between', () => {
    engine.process(SMITH);
    engine.process(FREUD_45);
    expect(engine.process(SMITH)).toBe('John Smith, Essays on Reform');
    expect(engine.history.map(e => e.type)).toEqual(['journal', 'book', 'journal']);
  });

  it('should shorten from the first-seen title', () => {
    expect(engine.process('Smith, John. The Quiet Revolution: A Study of Reform')).toBe(
      'John Smith, The Quiet Revolution: A Study of Reform'
    );
    engine.process(FREUD_45);
    expect(engine.process('Smith, John. The Quiet Revolution: A Study of Reform, 88.')).toBe(
      'John Smith, Quiet Revolution, 88'
    );
  });

  it('should shorten legal citations to the text before the first comma', () => {
    expect(engine.process(OSHEROFF_CASE)).toBe(OSHEROFF_CASE);
    engine.process(SMITH);
    expect(engine.process('Osheroff v. Chestnut Lodge, Inc., 490 A.2d 720, 725.')).toBe(
      'Osheroff v. Chestnut Lodge, 725'
    );
  });

  it('should repeat the archival title as its short form', () => {
    expect(engine.process('Osheroff Papers, Box 3')).toBe('Osheroff Papers, Osheroff Papers, Box 3');
    engine.process(SMITH);
    expect(engine.process('Osheroff Papers, Box 5')).toBe('Osheroff Papers');
  });

  it('should repeat the deponent as the transcript short form', () => {
    expect(engine.process('Klerman Deposition, 42.')).toBe('Klerman Deposition, Klerman Deposition, 42');
    engine.process(SMITH);
    expect(engine.process('Klerman Deposition, 57.')).toBe('Klerman Deposition, 57');
  });

  it('should append the journal to medical full notes', () => {
    expect(engine.process('Stone, Alan. Psychiatric malpractice. JAMA 250 (1983), 1043.')).toBe(
      'Alan Stone, Psychiatric malpractice JAMA 250 (1983), 1043'
    );
  });

  it('should pass unparseable notes through without touching history', () => {
    expect(engine.process(', pp. 4-5')).toBe(', 4–5');
    expect(engine.process('')).toBe('');
    expect(engine.history).toHaveLength(0);
  });

  it('should keep adjacency across pass-through notes', () => {
    engine.process(SMITH);
    engine.process(', 45');
    expect(engine.process(SMITH)).toBe('Ibid.');
  });

  it('should record fingerprints in history and remember each work once', () => {
    engine.process(FREUD_45);
    engine.process(FREUD_45);
    engine.process(SMITH);

    expect(engine.history.map(e => e.fingerprint)).toEqual([
      'sfreud_theinterpretationofdreams',
      'sfreud_theinterpretationofdreams',
      'johnsmith_essaysonreform',
    ]);
    expect(engine.seenWorkCount).toBe(2);
  });

  it('should not share history between engines', () => {
    engine.process(SMITH);
    const other = createCitationHistoryEngine();
    expect(other.process(SMITH)).toBe('John Smith, Essays on Reform');
  });

  it('should never treat title-less records as repeats', () => {
    const parser = new CitationParserService([
      {
        name: 'book',
        match: () => ({
          status: 'matched',
          fields: {
            type: 'book',
            author: 'S. Freud',
            title: null,
            pub: 'Vienna: Deuticke, 1899',
            details: null,
          },
        }),
      },
    ]);
    const titleless = new CitationHistoryEngine(parser);

    expect(titleless.process('first')).toBe('S. Freud (Vienna: Deuticke, 1899)');
    expect(titleless.process('second')).toBe('S. Freud (Vienna: Deuticke, 1899)');
    expect(titleless.history.map(e => e.fingerprint)).toEqual([null, null]);
    expect(titleless.seenWorkCount).toBe(0);
  });
});
