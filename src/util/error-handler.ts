/**
 * Error Handler Utility
 *
 * Standardized error categorization and logging, plus the error taxonomy
 * surfaced by the synchronization engine.
 */

import { Logger } from './logger';

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  NETWORK = 'NETWORK',
  AUTHENTICATION = 'AUTHENTICATION',
  VALIDATION = 'VALIDATION',
  API = 'API',
  DATA = 'DATA',
  COMMAND = 'COMMAND',
  DEVICE = 'DEVICE',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: Error | unknown;
  context?: Record<string, unknown>;
  recoverable: boolean;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: Error | unknown,
    context?: Record<string, unknown>,
    recoverable: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;
    this.recoverable = recoverable;

    // Maintain proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Bad credential or a login the vendor refused. Needs user action.
 */
export class AuthError extends AppError {
  constructor(public readonly reason: string, originalError?: unknown) {
    super(`Authentication failed: ${reason}`, ErrorCategory.AUTHENTICATION, originalError, { reason }, false);
    this.name = 'AuthError';
  }
}

/**
 * The cloud rejected the session attached to a request (401/403).
 * Only the cloud client sees this; it re-authenticates and retries once.
 */
export class AuthRejectedError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, ErrorCategory.AUTHENTICATION, undefined, { status }, true);
    this.name = 'AuthRejectedError';
  }
}

export type TransportErrorKind = 'retryable' | 'fatal';

/**
 * Network or cloud failure. `retryable` covers timeouts, resets, 429 and 5xx;
 * `fatal` covers malformed or unexpected responses.
 */
export class TransportError extends AppError {
  readonly status?: number;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    options: { status?: number; retryAfterMs?: number | null; originalError?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(
      message,
      kind === 'retryable' ? ErrorCategory.NETWORK : ErrorCategory.API,
      options.originalError,
      { ...options.context, kind, status: options.status },
      kind === 'retryable'
    );
    this.name = 'TransportError';
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  get retryable(): boolean {
    return this.kind === 'retryable';
  }
}

export class UnsupportedOperationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, undefined, context, false);
    this.name = 'UnsupportedOperationError';
  }
}

export class CommandTimeoutError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.COMMAND, undefined, context, true);
    this.name = 'CommandTimeoutError';
  }
}

export class SupersededError extends AppError {
  constructor(public readonly supersededBy: string, context?: Record<string, unknown>) {
    super(`Command superseded by ${supersededBy}`, ErrorCategory.COMMAND, undefined, { ...context, supersededBy }, true);
    this.name = 'SupersededError';
  }
}

export class DeviceUnavailableError extends AppError {
  constructor(public readonly deviceId: string, reason: string, originalError?: unknown) {
    super(`Device ${deviceId} unavailable: ${reason}`, ErrorCategory.DEVICE, originalError, { deviceId }, true);
    this.name = 'DeviceUnavailableError';
  }
}

export class DeviceNotFoundError extends AppError {
  constructor(public readonly deviceId: string) {
    super(`Unknown device: ${deviceId}`, ErrorCategory.DEVICE, undefined, { deviceId }, false);
    this.name = 'DeviceNotFoundError';
  }
}

export class EngineStoppedError extends AppError {
  constructor(message: string = 'Engine has been shut down') {
    super(message, ErrorCategory.INTERNAL, undefined, undefined, false);
    this.name = 'EngineStoppedError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, undefined, context, false);
    this.name = 'ValidationError';
  }
}

/**
 * Type guard to check if a value is an Error
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Type guard to check if a value is an AppError
 */
export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function isRetryableTransportError(value: unknown): value is TransportError {
  return value instanceof TransportError && value.kind === 'retryable';
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Categorize an error based on its type or message
   * @param error The error to categorize
   * @returns The error category
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }

    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    const errorMessage = error.message.toLowerCase();

    if (
      errorMessage.includes('network') ||
      errorMessage.includes('timeout') ||
      errorMessage.includes('connection') ||
      errorMessage.includes('enotfound') ||
      errorMessage.includes('etimedout') ||
      errorMessage.includes('econnreset') ||
      errorMessage.includes('socket')
    ) {
      return ErrorCategory.NETWORK;
    }

    if (
      errorMessage.includes('unauthorized') ||
      errorMessage.includes('authentication') ||
      errorMessage.includes('credentials')
    ) {
      return ErrorCategory.AUTHENTICATION;
    }

    if (
      errorMessage.includes('invalid') ||
      errorMessage.includes('required') ||
      errorMessage.includes('missing')
    ) {
      return ErrorCategory.VALIDATION;
    }

    if (
      errorMessage.includes('parse') ||
      errorMessage.includes('json') ||
      errorMessage.includes('unexpected')
    ) {
      return ErrorCategory.DATA;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   * @param error Original error
   * @param context Additional context information
   * @param message Optional custom message
   */
  createAppError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const errorMessage = isError(error)
      ? message || error.message
      : message || String(error);

    return new AppError(
      errorMessage,
      category,
      error,
      context,
      category !== ErrorCategory.AUTHENTICATION // Auth errors are not recoverable by default
    );
  }

  /**
   * Log an error with a level chosen by its category
   * @returns The AppError that was logged
   */
  logError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    const appError = this.createAppError(error, context, message);

    const logContext = {
      category: appError.category,
      recoverable: appError.recoverable,
      ...(appError.context || {})
    };

    switch (appError.category) {
      case ErrorCategory.NETWORK:
        this.logger.warn(`Network Error: ${appError.message}`, logContext);
        break;
      case ErrorCategory.VALIDATION:
      case ErrorCategory.COMMAND:
        this.logger.warn(`${appError.category} Error: ${appError.message}`, logContext);
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError ?? appError, logContext);
    }

    return appError;
  }

  /**
   * Check if an error is recoverable
   */
  isRecoverable(error: unknown): boolean {
    if (isAppError(error)) {
      return error.recoverable;
    }

    // Default to true for unknown errors
    return true;
  }
}
