/**
 * Error types shared by every crosstalk module
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class for all crosstalk errors
 */
export class CrosstalkError extends Error {
  public code: string;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: string, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// Context Store Errors
// ============================================================================

/**
 * Expected idempotency outcome; the dispatcher drops the delivery silently.
 */
export class DuplicateMessageError extends CrosstalkError {
  constructor(channelId: string, messageId: string) {
    super(
      `Message ${messageId} already recorded in channel ${channelId}`,
      'DUPLICATE_MESSAGE',
      { channelId, messageId }
    );
  }
}

export class StoreUnavailableError extends CrosstalkError {
  constructor(operation: string, target: string, cause: unknown) {
    super(
      `Store unavailable during ${operation}: ${target}`,
      'STORE_UNAVAILABLE',
      { operation, target, cause: describeCause(cause) }
    );
  }
}

export class InvalidArgumentError extends CrosstalkError {
  constructor(argument: string, reason: string, context?: ErrorContext) {
    super(`Invalid ${argument}: ${reason}`, 'INVALID_ARGUMENT', { ...context, argument });
  }
}

// ============================================================================
// Handler Registry Errors
// ============================================================================

export class HandlerNotFoundError extends CrosstalkError {
  constructor(handlerId: string) {
    super(`Handler not found: ${handlerId}`, 'NOT_FOUND', { handlerId });
  }
}

export type CloneFailureReason = 'source_not_found' | 'duplicate_id';

export class CloneError extends CrosstalkError {
  public readonly reason: CloneFailureReason;

  constructor(reason: CloneFailureReason, sourceId: string, newId: string) {
    super(
      reason === 'source_not_found'
        ? `Cannot clone: source handler '${sourceId}' does not exist`
        : `Cannot clone: handler id '${newId}' is already taken`,
      reason === 'source_not_found' ? 'CLONE_SOURCE_NOT_FOUND' : 'CLONE_DUPLICATE_ID',
      { sourceId, newId }
    );
    this.reason = reason;
  }
}

export class RegistryConfigError extends CrosstalkError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'REGISTRY_CONFIG_ERROR', context);
  }
}

// ============================================================================
// Generation Errors
// ============================================================================

export type GenerationFailureKind = 'network' | 'rate_limited' | 'invalid_request';

export class GenerationFailedError extends CrosstalkError {
  public readonly kind: GenerationFailureKind;
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(
    kind: GenerationFailureKind,
    message: string,
    options: { statusCode?: number; providerCode?: string; handlerId?: string } = {}
  ) {
    super(message, 'GENERATION_FAILED', { kind, ...options });
    this.kind = kind;
    this.retryable = kind !== 'invalid_request';
    this.statusCode = options.statusCode;
  }

  /** Provider-specific error code, e.g. `insufficient_quota` */
  get providerCode(): string | undefined {
    const value = this.context?.providerCode;
    return typeof value === 'string' ? value : undefined;
  }
}

// ============================================================================
// Command / Configuration Errors
// ============================================================================

export class PermissionDeniedError extends CrosstalkError {
  constructor(command: string) {
    super(`Command '${command}' requires administrator permission`, 'PERMISSION_DENIED', { command });
  }
}

export class ConfigurationError extends CrosstalkError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isCrosstalkError(error: unknown): error is CrosstalkError {
  return error instanceof CrosstalkError;
}

/**
 * Check for Node-style "file not found" failures from either file system
 */
export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return code === 'ENOENT' || error.message.includes('ENOENT');
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

const USER_MESSAGES = {
  quota: 'The model provider reports that the usage quota is exhausted. Please try again later.',
  invalidKey: 'The model provider rejected the configured API key.',
  rateLimited: 'Too many requests right now. Please wait a moment and reroll.',
  network: 'Could not reach the model provider. Please try again.',
  invalidRequest: 'The model provider rejected this request.',
  permission: 'You need administrator permission for that command.',
  generic: 'Something went wrong while handling that message.',
} as const;

/**
 * Single user-visible sentence for an error surfaced to the transport
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof GenerationFailedError) {
    if (error.providerCode === 'insufficient_quota') return USER_MESSAGES.quota;
    if (error.providerCode === 'invalid_api_key' || error.statusCode === 401) {
      return USER_MESSAGES.invalidKey;
    }
    switch (error.kind) {
      case 'rate_limited':
        return USER_MESSAGES.rateLimited;
      case 'network':
        return USER_MESSAGES.network;
      case 'invalid_request':
        return USER_MESSAGES.invalidRequest;
    }
  }

  if (error instanceof PermissionDeniedError) return USER_MESSAGES.permission;

  if (error instanceof HandlerNotFoundError
    || error instanceof CloneError
    || error instanceof InvalidArgumentError) {
    return error.message;
  }

  return USER_MESSAGES.generic;
}
