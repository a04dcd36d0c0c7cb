/**
 * Generation boundary - Type Definitions
 */

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * The message being answered
 */
export interface MessageContent {
  text: string;
  /** Only filled for vision-capable handlers */
  imageUrls: string[];
}

export interface SamplingSettings {
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationRequest {
  handlerId: string;
  model: string;
  systemPrompt: string;
  history: ChatTurn[];
  message: MessageContent;
  sampling: SamplingSettings;
  signal?: AbortSignal;
}

/**
 * Uniform text-generation capability. Yields text fragments of any
 * size; failures are thrown as GenerationFailedError. A caller abort
 * ends the sequence early without an error.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(request: GenerationRequest): AsyncIterable<string>;
}

export interface OpenAICompatibleConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxTokens: number;
  /** Injected for tests */
  fetch?: typeof fetch;
}
