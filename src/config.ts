/**
 * Crosstalk Configuration
 *
 * Defaults merged with values taken from environment variables.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

export interface ContextConfig {
  /** Window size for channels without an override */
  defaultWindowSize: number;
  /** Upper bound accepted by set_context_window */
  maxWindowSize: number;
}

export interface RouterConfig {
  /** Words in a message body that count as addressing the bot */
  mentionKeywords: string[];
  /** Human messages from the window scanned when the inbound text matches nothing */
  contextScanDepth: number;
}

export interface StreamingConfig {
  pacing: boolean;
  minChunkChars: number;
  maxSentencesPerChunk: number;
  baseDelayMs: number;
  perCharDelayMs: number;
  maxDelayMs: number;
}

export interface GenerationConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxTokens: number;
  defaultTemperature: number;
}

export interface RerollConfig {
  temperatureStep: number;
  maxTemperature: number;
}

export interface CrosstalkConfig {
  dataDir: string;
  timezone: string;
  adminIds: string[];
  context: ContextConfig;
  router: RouterConfig;
  streaming: StreamingConfig;
  generation: GenerationConfig;
  reroll: RerollConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: CrosstalkConfig = {
  dataDir: './data/state',
  timezone: 'UTC',
  adminIds: [],
  context: {
    defaultWindowSize: 10,
    maxWindowSize: 50,
  },
  router: {
    mentionKeywords: ['crosstalk'],
    contextScanDepth: 2,
  },
  streaming: {
    pacing: true,
    minChunkChars: 80,
    maxSentencesPerChunk: 3,
    baseDelayMs: 250,
    perCharDelayMs: 8,
    maxDelayMs: 1500,
  },
  generation: {
    baseUrl: 'http://localhost:11434/v1',
    timeoutMs: 60_000,
    maxTokens: 1024,
    defaultTemperature: 0.7,
  },
  reroll: {
    temperatureStep: 0.2,
    maxTemperature: 1.5,
  },
  logLevel: 'info',
};

const csv = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  CROSSTALK_DATA_DIR: z.string().min(1).optional(),
  CROSSTALK_TIMEZONE: z.string().min(1).optional(),
  CROSSTALK_ADMIN_IDS: csv.optional(),
  CROSSTALK_DEFAULT_WINDOW: positiveInt.optional(),
  CROSSTALK_MAX_WINDOW: positiveInt.optional(),
  CROSSTALK_MENTION_KEYWORDS: csv.optional(),
  CROSSTALK_PACING: z.enum(['on', 'off']).optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_TIMEOUT_MS: positiveInt.optional(),
  LLM_MAX_TOKENS: positiveInt.optional(),
  LOG_LEVEL: z
    .string()
    .transform(value => value.toLowerCase())
    .refine(isLogLevel, { message: 'expected debug, info, warn, error or silent' })
    .optional(),
});

type EnvSource = Record<string, string | undefined>;

/**
 * Build the runtime configuration from an environment map
 */
export function loadConfig(env: EnvSource = process.env): CrosstalkConfig {
  // Empty strings behave like unset variables
  const present: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'unknown problem'}`, {
      variable,
    });
  }
  const e = parsed.data;
  const logLevel = e.LOG_LEVEL !== undefined && isLogLevel(e.LOG_LEVEL) ? e.LOG_LEVEL : DEFAULT_CONFIG.logLevel;

  const config: CrosstalkConfig = {
    dataDir: e.CROSSTALK_DATA_DIR ?? DEFAULT_CONFIG.dataDir,
    timezone: e.CROSSTALK_TIMEZONE ?? DEFAULT_CONFIG.timezone,
    adminIds: e.CROSSTALK_ADMIN_IDS ?? DEFAULT_CONFIG.adminIds,
    context: {
      defaultWindowSize: e.CROSSTALK_DEFAULT_WINDOW ?? DEFAULT_CONFIG.context.defaultWindowSize,
      maxWindowSize: e.CROSSTALK_MAX_WINDOW ?? DEFAULT_CONFIG.context.maxWindowSize,
    },
    router: {
      ...DEFAULT_CONFIG.router,
      mentionKeywords: e.CROSSTALK_MENTION_KEYWORDS ?? DEFAULT_CONFIG.router.mentionKeywords,
    },
    streaming: {
      ...DEFAULT_CONFIG.streaming,
      pacing: e.CROSSTALK_PACING !== undefined ? e.CROSSTALK_PACING === 'on' : DEFAULT_CONFIG.streaming.pacing,
    },
    generation: {
      ...DEFAULT_CONFIG.generation,
      baseUrl: e.LLM_BASE_URL ?? DEFAULT_CONFIG.generation.baseUrl,
      apiKey: e.LLM_API_KEY,
      timeoutMs: e.LLM_TIMEOUT_MS ?? DEFAULT_CONFIG.generation.timeoutMs,
      maxTokens: e.LLM_MAX_TOKENS ?? DEFAULT_CONFIG.generation.maxTokens,
    },
    reroll: { ...DEFAULT_CONFIG.reroll },
    logLevel,
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: CrosstalkConfig): void {
  const { defaultWindowSize, maxWindowSize } = config.context;
  if (defaultWindowSize > maxWindowSize) {
    throw new ConfigurationError(
      `Default window size ${defaultWindowSize} exceeds maximum ${maxWindowSize}`,
      { variable: 'CROSSTALK_DEFAULT_WINDOW' }
    );
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: config.timezone });
  } catch {
    throw new ConfigurationError(`Unknown timezone: ${config.timezone}`, { variable: 'CROSSTALK_TIMEZONE' });
  }
}
