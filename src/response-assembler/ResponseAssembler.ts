/**
 * Response Assembler
 *
 * Invokes a handler through the generation backend and hands back a
 * ResponseStream. Generation runs without any channel lock; the store
 * lane is held only for the final append in commit().
 */

import { nanoid } from 'nanoid';
import type { ContextStore } from '../context-store/ContextStore';
import type { Message } from '../context-store/types';
import type { GenerationBackend, SamplingSettings } from '../generation/types';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import { createLogger } from '../logger';
import { sleep } from './pacing';
import { ResponseStream, type StreamDependencies } from './ResponseStream';
import type { AssemblyRequest, ChunkSink, ResponseAssemblerConfig } from './types';

const log = createLogger('response-assembler');

export interface RunOptions {
  /** Persist as soon as the stream completes (default true) */
  autoCommit?: boolean;
}

export interface RerollOptions {
  /** Cancels the new attempt */
  signal?: AbortSignal;
}

export interface RunResult {
  stream: ResponseStream;
  /** Stored response, when committed */
  message: Message | null;
}

export class ResponseAssembler {
  private deps: StreamDependencies;

  constructor(
    backend: GenerationBackend,
    store: ContextStore,
    registry: HandlerRegistry,
    private config: ResponseAssemblerConfig
  ) {
    this.deps = {
      backend,
      store,
      registry,
      config,
      sleep: config.sleep ?? sleep,
      now: config.now ?? Date.now,
      newId: config.newId ?? (() => nanoid()),
    };
  }

  /**
   * Lazy: nothing is generated until the stream is iterated
   */
  invoke(request: AssemblyRequest): ResponseStream {
    const temperature = request.sampling.temperature
      ?? request.handler.temperature
      ?? this.config.defaultTemperature;

    log.debug('Invoking handler', {
      handlerId: request.handler.handlerId,
      messageId: request.message.id,
      history: request.window.length,
      temperature,
    });
    return new ResponseStream(request, temperature, this.deps);
  }

  /**
   * Stream a response into `sink` and, unless told otherwise, commit it
   */
  async run(request: AssemblyRequest, sink: ChunkSink, options: RunOptions = {}): Promise<RunResult> {
    return this.drive(this.invoke(request), sink, options);
  }

  /**
   * Generate again with the same handler, prompt and window. An
   * uncommitted previous attempt is discarded; a committed one stays in
   * history and the new response is appended after it.
   */
  reroll(previous: ResponseStream, sampling: SamplingSettings = {}, options: RerollOptions = {}): ResponseStream {
    if (previous.state !== 'committed') {
      previous.discard();
    }

    const temperature = sampling.temperature ?? this.nextTemperature(previous.temperature);
    log.info('Rerolling response', {
      handlerId: previous.handlerId,
      messageId: previous.request.message.id,
      temperature,
    });

    // The earlier turn's signal belongs to that turn
    return this.invoke({
      ...previous.request,
      sampling: { ...previous.request.sampling, ...sampling, temperature },
      signal: options.signal,
    });
  }

  async rerollAndRun(
    previous: ResponseStream,
    sink: ChunkSink,
    sampling: SamplingSettings = {},
    options: RunOptions & RerollOptions = {}
  ): Promise<RunResult> {
    return this.drive(this.reroll(previous, sampling, options), sink, options);
  }

  nextTemperature(current: number): number {
    const { temperatureStep, maxTemperature } = this.config.reroll;
    return Math.min(maxTemperature, Math.round((current + temperatureStep) * 100) / 100);
  }

  private async drive(stream: ResponseStream, sink: ChunkSink, options: RunOptions): Promise<RunResult> {
    await stream.pipeTo(sink);

    if (stream.state !== 'completed' || options.autoCommit === false) {
      return { stream, message: null };
    }
    return { stream, message: await stream.commit() };
  }
}
