/**
 * OpenAI-compatible chat completions backend
 * Streams `data:` SSE lines until `[DONE]`
 */

import { z } from 'zod';
import { GenerationFailedError, type GenerationFailureKind } from '../errors';
import { createLogger } from '../logger';
import type {
  GenerationBackend,
  GenerationRequest,
  OpenAICompatibleConfig,
} from './types';

const log = createLogger('generation');

// ============================================================================
// Wire Types
// ============================================================================

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | OpenAIContentPart[];
}

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  error: z
    .object({
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).nullish(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.union([z.string(), z.number()]).nullish(),
    type: z.string().nullish(),
  }),
});

// ============================================================================
// Backend
// ============================================================================

export class OpenAICompatibleBackend implements GenerationBackend {
  readonly name = 'openai-compatible';
  private fetchImpl: typeof fetch;

  constructor(private config: OpenAICompatibleConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  async *generate(request: GenerationRequest): AsyncIterable<string> {
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.config.timeoutMs);
    const onCallerAbort = () => timeout.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`, {
          method: 'POST',
          headers: this.getHeaders(),
          body: JSON.stringify(this.buildRequestBody(request)),
          signal: timeout.signal,
        });
      } catch (error) {
        if (request.signal?.aborted) return;
        throw this.transportError(error, timeout.signal.aborted, request.handlerId);
      }

      if (!response.ok) {
        throw await this.responseError(response, request.handlerId);
      }
      if (!response.body) {
        throw new GenerationFailedError('network', 'Provider returned an empty stream', {
          handlerId: request.handlerId,
        });
      }

      try {
        yield* this.parseSSEStream(response.body, request.handlerId);
      } catch (error) {
        if (request.signal?.aborted) return;
        if (error instanceof GenerationFailedError) throw error;
        throw this.transportError(error, timeout.signal.aborted, request.handlerId);
      }
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
      // Consumer may have stopped early; drop the connection
      timeout.abort();
    }
  }

  // ============================================================================
  // Request Building
  // ============================================================================

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }

  private buildRequestBody(request: GenerationRequest): Record<string, unknown> {
    const messages: OpenAIMessage[] = [
      { role: 'system', content: request.systemPrompt },
      ...request.history.map(turn => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: this.convertMessageContent(request) },
    ];

    const body: Record<string, unknown> = {
      model: request.model,
      messages,
      stream: true,
      max_tokens: request.sampling.maxTokens ?? this.config.maxTokens,
    };
    if (request.sampling.temperature !== undefined) {
      body.temperature = request.sampling.temperature;
    }
    return body;
  }

  private convertMessageContent(request: GenerationRequest): string | OpenAIContentPart[] {
    const { text, imageUrls } = request.message;
    if (imageUrls.length === 0) return text;

    return [
      { type: 'text', text },
      ...imageUrls.map((url): OpenAIContentPart => ({ type: 'image_url', image_url: { url } })),
    ];
  }

  // ============================================================================
  // SSE Stream Parsing
  // ============================================================================

  private async *parseSSEStream(stream: ReadableStream<Uint8Array>, handlerId: string): AsyncIterable<string> {
    const reader = stream.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          const data = this.dataOf(line);
          if (data === null) continue;
          if (data === '[DONE]') return;

          const text = this.textOf(data, handlerId);
          if (text) yield text;
        }
      }

      const data = this.dataOf(buffer);
      if (data !== null && data !== '[DONE]') {
        const text = this.textOf(data, handlerId);
        if (text) yield text;
      }
    } finally {
      reader.releaseLock();
    }
  }

  private dataOf(line: string): string | null {
    const trimmed = line.trim();
    if (!trimmed.startsWith('data:')) return null;
    return trimmed.slice(5).trim();
  }

  private textOf(data: string, handlerId: string): string | null {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      log.debug('Skipping non-JSON SSE payload', { data: data.slice(0, 100) });
      return null;
    }

    const parsed = streamChunkSchema.safeParse(json);
    if (!parsed.success) return null;

    if (parsed.data.error) {
      const code = parsed.data.error.code;
      throw new GenerationFailedError('network', parsed.data.error.message ?? 'Provider stream error', {
        providerCode: code === null || code === undefined ? undefined : String(code),
        handlerId,
      });
    }

    return parsed.data.choices?.[0]?.delta?.content ?? null;
  }

  // ============================================================================
  // Error Mapping
  // ============================================================================

  private async responseError(response: Response, handlerId: string): Promise<GenerationFailedError> {
    let message = `Provider returned HTTP ${response.status}`;
    let providerCode: string | undefined;

    try {
      const parsed = errorBodySchema.safeParse(await response.json());
      if (parsed.success) {
        message = parsed.data.error.message ?? message;
        const code = parsed.data.error.code ?? parsed.data.error.type;
        providerCode = code === null || code === undefined ? undefined : String(code);
      }
    } catch {
      log.debug('Error response had no JSON body', { status: response.status });
    }

    const kind = classifyStatus(response.status, providerCode);
    log.warn('Generation request failed', { handlerId, status: response.status, kind, providerCode });
    return new GenerationFailedError(kind, message, { statusCode: response.status, providerCode, handlerId });
  }

  private transportError(error: unknown, timedOut: boolean, handlerId: string): GenerationFailedError {
    const message = timedOut
      ? `Provider did not answer within ${this.config.timeoutMs}ms`
      : error instanceof Error ? error.message : String(error);
    log.warn('Generation transport failed', { handlerId, timedOut, message });
    return new GenerationFailedError('network', message, { handlerId });
  }
}

export function classifyStatus(status: number, providerCode?: string): GenerationFailureKind {
  if (status === 429 || providerCode === 'insufficient_quota' || providerCode === 'rate_limit_exceeded') {
    return 'rate_limited';
  }
  if (status >= 500) return 'network';
  return 'invalid_request';
}
