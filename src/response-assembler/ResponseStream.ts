/**
 * Response Stream
 *
 * One generation attempt. Iterating it runs the backend once and yields
 * sentence chunks; nothing reaches the store until commit().
 *
 *   pending -> streaming -> completed -> committed
 *                 |            |
 *                 |            +-> discarded
 *                 +-> failed | cancelled | discarded
 */

import type { ContextStore } from '../context-store/ContextStore';
import type { Message } from '../context-store/types';
import { GenerationFailedError, InvalidArgumentError, describeCause } from '../errors';
import { buildHistory, buildMessageContent } from '../generation/history';
import type { GenerationBackend, GenerationRequest } from '../generation/types';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import { createLogger } from '../logger';
import { pacingDelay } from './pacing';
import { createSentenceChunker } from './sentence-chunker';
import type {
  AssemblyRequest,
  Chunk,
  ChunkSink,
  ResponseAssemblerConfig,
  ResponseStreamState,
} from './types';

const log = createLogger('response-assembler');

export interface StreamDependencies {
  backend: GenerationBackend;
  store: ContextStore;
  registry: HandlerRegistry;
  config: ResponseAssemblerConfig;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  newId: () => string;
}

export class ResponseStream implements AsyncIterable<Chunk> {
  private _state: ResponseStreamState = 'pending';
  private _text = '';
  private _chunks: Chunk[] = [];
  private _error: GenerationFailedError | null = null;
  private committed: Message | null = null;
  private committing: Promise<Message> | null = null;
  private abort = new AbortController();
  private onCallerAbort = () => this.abort.abort();

  constructor(
    readonly request: AssemblyRequest,
    readonly temperature: number,
    private deps: StreamDependencies
  ) {
    if (request.signal?.aborted) {
      this.abort.abort();
    } else {
      request.signal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get state(): ResponseStreamState {
    return this._state;
  }

  get handlerId(): string {
    return this.request.handler.handlerId;
  }

  /** Full generated text so far */
  get text(): string {
    return this._text;
  }

  get chunks(): readonly Chunk[] {
    return this._chunks;
  }

  get error(): GenerationFailedError | null {
    return this._error;
  }

  /** The stored response once committed */
  get message(): Message | null {
    return this.committed;
  }

  // ============================================================================
  // Streaming
  // ============================================================================

  [Symbol.asyncIterator](): AsyncIterator<Chunk> {
    return this.generate();
  }

  /**
   * Stream every chunk into `sink`; resolves with the full text
   */
  async pipeTo(sink: ChunkSink): Promise<string> {
    for await (const chunk of this) {
      await sink(chunk);
    }
    return this._text;
  }

  private async *generate(): AsyncGenerator<Chunk, void, undefined> {
    if (this._state !== 'pending') {
      throw new InvalidArgumentError('response stream', `cannot iterate a ${this._state} response`);
    }
    this._state = 'streaming';

    const { backend, config } = this.deps;
    const chunker = createSentenceChunker(config.chunker);
    const request = this.buildGenerationRequest();

    let drained = false;
    try {
      for await (const fragment of backend.generate(request)) {
        if (this.abort.signal.aborted) break;
        this._text += fragment;

        for (const chunk of chunker.push(fragment)) {
          yield this.record(chunk);
          await this.pace(chunk);
        }
      }
      drained = !this.abort.signal.aborted;
    } catch (error) {
      if (!this.abort.signal.aborted) {
        throw this.fail(error);
      }
    } finally {
      // Consumer stopped early, or the caller aborted
      if (!drained && this._state === 'streaming') {
        this.abort.abort();
        this._state = 'cancelled';
        log.info('Response cancelled', { handlerId: this.handlerId, messageId: this.request.message.id });
      }
      // Generation is over either way
      this.detachCallerSignal();
    }

    if (this._state !== 'streaming') return;

    const last = chunker.flush();
    if (last) yield this.record(last);

    if (!this._text.trim()) {
      throw this.fail(new GenerationFailedError('network', 'Handler returned an empty response', {
        handlerId: this.handlerId,
      }));
    }
    this._state = 'completed';
  }

  private buildGenerationRequest(): GenerationRequest {
    const { handler, window, message, systemPrompt, sampling } = this.request;
    return {
      handlerId: handler.handlerId,
      model: handler.model,
      systemPrompt,
      history: buildHistory(window, handler, this.deps.registry),
      message: buildMessageContent(message, handler),
      sampling: { ...sampling, temperature: this.temperature },
      signal: this.abort.signal,
    };
  }

  private detachCallerSignal(): void {
    this.request.signal?.removeEventListener('abort', this.onCallerAbort);
  }

  private record(chunk: Chunk): Chunk {
    this._chunks.push(chunk);
    return chunk;
  }

  private async pace(chunk: Chunk): Promise<void> {
    const delay = pacingDelay(chunk.text, this.deps.config.pacing);
    if (delay > 0) await this.deps.sleep(delay);
  }

  private fail(error: unknown): GenerationFailedError {
    const failure = error instanceof GenerationFailedError
      ? error
      : new GenerationFailedError('network', describeCause(error), { handlerId: this.handlerId });
    this._error = failure;
    this._state = 'failed';
    log.warn('Generation failed', {
      handlerId: this.handlerId,
      messageId: this.request.message.id,
      kind: failure.kind,
      error: failure.message,
    });
    return failure;
  }

  // ============================================================================
  // Outcome
  // ============================================================================

  /**
   * Persist the finished response. Runs once; later calls return the
   * same stored message.
   */
  async commit(): Promise<Message> {
    if (this.committed) return this.committed;
    if (this.committing) return this.committing;
    if (this._state !== 'completed') {
      throw new InvalidArgumentError('response stream', `cannot commit a ${this._state} response`, {
        handlerId: this.handlerId,
      });
    }

    this.committing = this.persist();
    try {
      return await this.committing;
    } finally {
      this.committing = null;
    }
  }

  /**
   * Drop a response that was never committed
   */
  discard(): void {
    if (this._state === 'committed') {
      throw new InvalidArgumentError('response stream', 'a committed response cannot be discarded', {
        handlerId: this.handlerId,
      });
    }
    if (this._state === 'discarded') return;

    this.abort.abort();
    this.detachCallerSignal();
    this._state = 'discarded';
    log.debug('Response discarded', { handlerId: this.handlerId, messageId: this.request.message.id });
  }

  private async persist(): Promise<Message> {
    const { handler, message } = this.request;
    const stored = await this.deps.store.append({
      id: this.deps.newId(),
      channelId: message.channelId,
      authorId: this.deps.config.botAuthorId,
      authorDisplayName: handler.displayName,
      body: this._text.trim(),
      attachments: [],
      createdAt: this.deps.now(),
      handlerId: handler.handlerId,
      isResponse: true,
    });

    this.committed = stored;
    this._state = 'committed';
    log.info('Response committed', {
      handlerId: handler.handlerId,
      channelId: message.channelId,
      replyTo: message.id,
      responseId: stored.id,
      chunks: this._chunks.length,
    });
    return stored;
  }
}
