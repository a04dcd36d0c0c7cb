/**
 * Emotion reaction tests
 */

import { loadEmotionTable, pickReaction } from '../reactions';

describe('pickReaction', () => {
  it('should prefer stage actions over everything else', () => {
    expect(pickReaction('*waves happily* Great to see you!')).toBe('🎭');
    expect(pickReaction('She giggles.')).toBe('🎭');
  });

  it('should pick the category with the most keyword hits', () => {
    expect(pickReaction('That is great, I love it')).toBe('😄');
    expect(pickReaction("Sorry, I'm so sad about it.")).toBe('😢');
  });

  it('should count shared keywords for every category', () => {
    // "ugh" is both sadness and anger; "annoyed" tips it to anger
    expect(pickReaction('Ugh, I am annoyed.')).toBe('😠');
  });

  it('should break ties by table order', () => {
    expect(pickReaction('Wow, great.')).toBe('😄');
  });

  it('should fall back to the default reaction', () => {
    expect(pickReaction('The capital is Paris.')).toBe('👍');
  });

  it('should load the built-in table once', () => {
    const table = loadEmotionTable();
    expect(loadEmotionTable()).toBe(table);
    expect(table.categories.map(c => c.name)).toEqual([
      'joy',
      'sadness',
      'anger',
      'fear',
      'surprise',
      'neutral',
    ]);
  });
});
