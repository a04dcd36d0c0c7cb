/**
 * Response Assembler - public API
 */

export { ResponseAssembler } from './ResponseAssembler';
export type { RerollOptions, RunOptions, RunResult } from './ResponseAssembler';
export { ResponseStream } from './ResponseStream';
export type { StreamDependencies } from './ResponseStream';
export { SentenceChunker, createSentenceChunker, findSentenceEnd, endsInsideFence } from './sentence-chunker';
export { pacingDelay, sleep } from './pacing';
export { pickReaction, loadEmotionTable } from './reactions';
export type { EmotionTable } from './reactions';
export type {
  AssemblyRequest,
  Chunk,
  ChunkerConfig,
  ChunkSink,
  PacingConfig,
  RerollSettings,
  ResponseAssemblerConfig,
  ResponseStreamState,
} from './types';
