import { describe, it, expect } from 'vitest';
import { normalizeNoteText } from '../../../../src/services/incipit/text-normalizer';

describe('normalizeNoteText', () => {
  it('should remove "pp." before a page range and use an en dash', () => {
    expect(normalizeNoteText('See pp. 10-12.')).toBe('See 10–12.');
  });

  it('should remove "p." after an open parenthesis', () => {
    expect(normalizeNoteText('(p.45)')).toBe('(45)');
  });

  it('should remove "p." after a comma', () => {
    expect(normalizeNoteText('Essays,p. 7')).toBe('Essays,7');
  });

  it('should leave "p." alone when it ends a word', () => {
    expect(normalizeNoteText('Ch. app. 5')).toBe('Ch. app. 5');
  });

  it('should not touch hyphens between letters', () => {
    expect(normalizeNoteText('Jean-Paul Sartre')).toBe('Jean-Paul Sartre');
  });

  it('should trim surrounding whitespace', () => {
    expect(normalizeNoteText('   Freud, S.  ')).toBe('Freud, S.');
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeNoteText('  ')).toBe('');
  });
});
