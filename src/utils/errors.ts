// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error types shared by the engine, the platform adapter and the stores
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data.
 *
 * `isOperational` marks failures the detection loop may survive (upstream
 * outages, storage hiccups). Anything else reaching the loop is fatal.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Remote call to the gift platform failed.
 *
 * `code` is the platform's error token (e.g. BALANCE_TOO_LOW) when the
 * response carried one, otherwise PLATFORM_ERROR.
 */
export class PlatformError extends AppError {
  public readonly method: string;
  public readonly status?: number;
  public readonly retryAfter?: number;

  constructor(
    method: string,
    message: string,
    options: {
      code?: string;
      status?: number;
      retryAfter?: number;
      cause?: unknown;
    } = {},
  ) {
    super(`${method} failed: ${message}`, {
      code: options.code || 'PLATFORM_ERROR',
      isOperational: true,
      context: { method, status: options.status },
      cause: options.cause,
    });
    this.method = method;
    this.status = options.status;
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Snapshot could not be read, parsed or written.
 */
export class SnapshotError extends AppError {
  constructor(operation: 'load' | 'save', message: string, cause?: unknown) {
    super(`Snapshot ${operation} failed: ${message}`, {
      code: 'SNAPSHOT_ERROR',
      isOperational: true,
      context: { operation },
      cause,
    });
  }
}

/**
 * Environment is missing or malformed. Never recoverable at runtime.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      isOperational: false,
      context: { issues },
    });
    this.issues = issues;
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      isOperational: error.isOperational,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}

export function isOperationalError(error: unknown): boolean {
  return error instanceof AppError && error.isOperational;
}
