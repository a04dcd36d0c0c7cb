/**
 * Response Assembler - Type Definitions
 */

import type { Message } from '../context-store/types';
import type { SamplingSettings } from '../generation/types';
import type { HandlerDescriptor } from '../handler-registry/types';

/**
 * One display unit: 1 to maxSentencesPerChunk complete sentences
 */
export interface Chunk {
  text: string;
  /** Position within the response, from 0 */
  index: number;
  sentences: number;
}

export interface ChunkerConfig {
  /** Held sentences are released once they reach this length */
  minChunkChars: number;
  maxSentencesPerChunk: number;
}

export interface PacingConfig {
  enabled: boolean;
  baseDelayMs: number;
  perCharDelayMs: number;
  maxDelayMs: number;
}

export interface RerollSettings {
  temperatureStep: number;
  maxTemperature: number;
}

export type ResponseStreamState =
  | 'pending'
  | 'streaming'
  | 'completed'
  | 'committed'
  | 'failed'
  | 'cancelled'
  | 'discarded';

/**
 * Everything needed to (re)generate one response
 */
export interface AssemblyRequest {
  handler: Readonly<HandlerDescriptor>;
  /** Rendered prompt; reused unchanged on reroll */
  systemPrompt: string;
  /** History shown to the handler, without the message being answered */
  window: readonly Message[];
  /** The human message being answered */
  message: Message;
  sampling: SamplingSettings;
  signal?: AbortSignal;
}

/**
 * Receives chunks as soon as they are complete; nothing is durable yet
 */
export type ChunkSink = (chunk: Chunk) => void | Promise<void>;

export interface ResponseAssemblerConfig {
  chunker: ChunkerConfig;
  pacing: PacingConfig;
  reroll: RerollSettings;
  /** Used when neither the request nor the handler sets a temperature */
  defaultTemperature: number;
  /** Author id recorded on response messages */
  botAuthorId: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  newId?: () => string;
}
