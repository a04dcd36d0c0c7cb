/**
 * Sentence Chunker
 *
 * Groups streamed text into chunks of whole sentences. A boundary needs
 * terminal punctuation followed by whitespace, so the split never
 * depends on how the backend sized its fragments.
 */

import type { Chunk, ChunkerConfig } from './types';

const FENCE_MARKERS = ['```', '~~~'] as const;

type FenceMarker = (typeof FENCE_MARKERS)[number];

// Terminal mark, optional closing quotes/brackets, then whitespace
const SENTENCE_END = /[.!?…]+["'”’)\]]*\s+/g;

// Characters a sentence end can still grow from once more text arrives
const TRAILING_MARK = /[.!?…"'”’)\]]/;

/**
 * Fence state after the line `text[start, end)`
 */
function toggleFence(open: FenceMarker | null, text: string, start: number, end: number): FenceMarker | null {
  let head = start;
  while (head < end && /\s/.test(text.charAt(head))) head++;

  for (const marker of FENCE_MARKERS) {
    if (head + marker.length > end || !text.startsWith(marker, head)) continue;
    if (open === null) return marker;
    return open === marker ? null : open;
  }
  return open;
}

/**
 * Fence state of a growing buffer. Lines are folded in once, so queries
 * must come with non-decreasing offsets until `reset`.
 */
class FenceTracker {
  private open: FenceMarker | null = null;
  /** Start of the first line not folded into `open` */
  private lineStart = 0;
  /** No newline between `lineStart` and here */
  private searchFrom = 0;

  isOpenAt(text: string, index: number): boolean {
    for (;;) {
      const newline = text.indexOf('\n', Math.max(this.lineStart, this.searchFrom));
      if (newline === -1) {
        this.searchFrom = text.length;
        break;
      }
      if (newline >= index) {
        this.searchFrom = newline;
        break;
      }
      this.open = toggleFence(this.open, text, this.lineStart, newline);
      this.lineStart = newline + 1;
    }
    return toggleFence(this.open, text, this.lineStart, index) !== null;
  }

  reset(): void {
    this.open = null;
    this.lineStart = 0;
    this.searchFrom = 0;
  }
}

/**
 * Whether `text` ends inside an unclosed code fence
 */
export function endsInsideFence(text: string): boolean {
  return new FenceTracker().isOpenAt(text, text.length);
}

/**
 * Offset just past the first sentence end in `text` that lies outside a
 * code fence, or -1
 */
export function findSentenceEnd(text: string): number {
  const fence = new FenceTracker();
  SENTENCE_END.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = SENTENCE_END.exec(text)) !== null) {
    if (!fence.isOpenAt(text, match.index)) {
      return match.index + match[0].length;
    }
  }
  return -1;
}

export class SentenceChunker {
  /** Text after the last sentence end */
  private partial = '';
  /** Complete sentences not yet released */
  private held = '';
  private heldSentences = 0;
  private emitted = 0;
  /** Where the next scan of `partial` starts; everything before it is settled */
  private cursor = 0;
  private fence = new FenceTracker();

  constructor(private config: ChunkerConfig) {}

  push(text: string): Chunk[] {
    this.partial += text;
    const chunks: Chunk[] = [];

    let end: number;
    while ((end = this.nextSentenceEnd()) !== -1) {
      this.held += this.partial.slice(0, end);
      this.partial = this.partial.slice(end);
      this.heldSentences++;
      this.rewind();

      if (this.heldSentences >= this.config.maxSentencesPerChunk
        || this.held.trim().length >= this.config.minChunkChars) {
        const chunk = this.release(this.held, this.heldSentences);
        if (chunk) chunks.push(chunk);
        this.held = '';
        this.heldSentences = 0;
      }
    }

    return chunks;
  }

  /**
   * End of stream: release whatever is left, terminated or not
   */
  flush(): Chunk | null {
    // Held count stays below the maximum, so one more sentence still fits
    const sentences = this.heldSentences + (this.partial.trim() ? 1 : 0);
    const chunk = this.release(this.held + this.partial, sentences);
    this.held = '';
    this.partial = '';
    this.heldSentences = 0;
    this.rewind();
    return chunk;
  }

  get bufferedLength(): number {
    return this.held.length + this.partial.length;
  }

  /**
   * Like `findSentenceEnd` on `partial`, resuming where the last push
   * stopped
   */
  private nextSentenceEnd(): number {
    SENTENCE_END.lastIndex = this.cursor;

    let match: RegExpExecArray | null;
    while ((match = SENTENCE_END.exec(this.partial)) !== null) {
      if (!this.fence.isOpenAt(this.partial, match.index)) {
        return match.index + match[0].length;
      }
      this.cursor = SENTENCE_END.lastIndex;
    }

    // A trailing run of marks may still become a sentence end
    let settled = this.partial.length;
    while (settled > this.cursor && TRAILING_MARK.test(this.partial.charAt(settled - 1))) settled--;
    this.cursor = settled;
    return -1;
  }

  private rewind(): void {
    this.cursor = 0;
    this.fence.reset();
  }

  private release(raw: string, sentences: number): Chunk | null {
    const text = raw.trim();
    if (!text) return null;
    return { text, index: this.emitted++, sentences };
  }
}

export function createSentenceChunker(config: ChunkerConfig): SentenceChunker {
  return new SentenceChunker(config);
}
