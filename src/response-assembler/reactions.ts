/**
 * Emotion reaction for a finished response (data/emotions.json)
 */

import { z } from 'zod';
import emotionData from '../../data/emotions.json';

const emotionTableSchema = z.object({
  expressive: z.object({
    reaction: z.string().min(1),
    keywords: z.array(z.string().min(1)),
  }),
  defaultReaction: z.string().min(1),
  categories: z.array(
    z.object({
      name: z.string().min(1),
      reaction: z.string().min(1),
      keywords: z.array(z.string().min(1)),
    })
  ).min(1),
});

export type EmotionTable = z.infer<typeof emotionTableSchema>;

let builtIn: EmotionTable | null = null;

export function loadEmotionTable(): EmotionTable {
  builtIn ??= emotionTableSchema.parse(emotionData);
  return builtIn;
}

/**
 * Non-overlapping occurrences of `needle`
 */
function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = 0;
  let at: number;
  while ((at = haystack.indexOf(needle, from)) !== -1) {
    count++;
    from = at + needle.length;
  }
  return count;
}

/**
 * Stage actions win outright; otherwise the category with most keyword
 * occurrences, earlier categories first on a tie.
 */
export function pickReaction(text: string, table: EmotionTable = loadEmotionTable()): string {
  const lower = text.toLowerCase();

  if (table.expressive.keywords.some(keyword => lower.includes(keyword))) {
    return table.expressive.reaction;
  }

  let best: { reaction: string; hits: number } | null = null;
  for (const category of table.categories) {
    const hits = category.keywords.reduce((sum, keyword) => sum + countOccurrences(lower, keyword), 0);
    if (hits > 0 && (best === null || hits > best.hits)) {
      best = { reaction: category.reaction, hits };
    }
  }
  return best?.reaction ?? table.defaultReaction;
}
