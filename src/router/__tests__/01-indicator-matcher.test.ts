/**
 * Tests for indicator matching
 */

import { findPhrase, matchIndicators, normalizeText, scanText } from '../indicator-matcher';
import { humanMessage } from '../../testing';

describe('normalizeText', () => {
  it('should lowercase, unify apostrophes and collapse whitespace', () => {
    expect(normalizeText('  I Can’t   COPE\nanymore ')).toBe("i can't cope anymore");
  });
});

describe('findPhrase', () => {
  it('should match whole words only', () => {
    expect(findPhrase('what a crusade', 'sad')).toBe(-1);
    expect(findPhrase('i feel sad today', 'sad')).toBe(7);
  });

  it('should match multi-word phrases', () => {
    expect(findPhrase('list the pros and cons please', 'pros and cons')).toBe(9);
    expect(findPhrase('pros or cons', 'pros and cons')).toBe(-1);
  });

  it('should ignore case in the phrase', () => {
    expect(findPhrase('ask gemini', 'Gemini')).toBe(4);
  });

  it('should match phrases made of punctuation', () => {
    expect(findPhrase('see ```ts code```', '```')).toBe(4);
    expect(findPhrase('use r+ for this', 'r+')).toBe(4);
  });

  it('should treat regex characters literally', () => {
    expect(findPhrase('price is 5.0', '5.0')).toBe(9);
    expect(findPhrase('price is 500', '5.0')).toBe(-1);
  });
});

describe('matchIndicators', () => {
  it('should return matches in indicator order', () => {
    const text = 'there is a bug in this code';
    expect(matchIndicators(text, ['code', 'function', 'bug'])).toEqual(['code', 'bug']);
  });
});

describe('scanText', () => {
  it('should include attachment text and kind tokens', () => {
    const message = humanMessage({
      body: 'Look',
      attachments: [
        { kind: 'image' },
        { kind: 'text', extractedText: 'Quarterly REPORT' },
      ],
    });
    expect(scanText(message)).toBe('look quarterly report attachment:image attachment:text');
  });
});
