/**
 * Crosstalk - multi-handler chat router
 *
 * Main entry point.
 */

// Context Store
export * from './context-store';

// Handler Registry
export * from './handler-registry';

// Router
export * from './router';

// Generation backends
export * from './generation';

// Response Assembler
export * from './response-assembler';

// Conversation layer
export * from './conversation';

// Assembly and ambient stack
export { createCrosstalk, BOT_AUTHOR_ID } from './app';
export type { Crosstalk, CrosstalkOptions } from './app';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config';
export type {
  CrosstalkConfig,
  ContextConfig,
  GenerationConfig,
  RerollConfig,
  StreamingConfig,
  RouterConfig as RouterSettings,
} from './config';
export * from './errors';
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './logger';
export type { Logger, LogLevel, LogData } from './logger';

export const VERSION = '0.1.0';
