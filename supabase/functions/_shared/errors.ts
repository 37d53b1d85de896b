/**
 * Unified Error Handling
 *
 * Typed error classes shared by every function. Each carries the HTTP status
 * and the machine-readable code surfaced by response-adapter.ts.
 */

export const ERROR_CODES = {
  VALIDATION: "VALIDATION_ERROR",
  AUTH: "AUTHENTICATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  METHOD_NOT_ALLOWED: "METHOD_NOT_ALLOWED",
  RATE_LIMIT: "RATE_LIMIT_EXCEEDED",
  UPSTREAM_UNAVAILABLE: "UPSTREAM_UNAVAILABLE",
  PERSISTENCE_UNAVAILABLE: "PERSISTENCE_UNAVAILABLE",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  TIMEOUT: "TIMEOUT",
  CONFIGURATION: "CONFIGURATION_ERROR",
  INTERNAL: "INTERNAL_ERROR",
} as const;

/**
 * Base application error with standard properties
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details?: unknown;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    options?: {
      retryable?: boolean;
      details?: unknown;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Invalid input. Also used when the translation provider rejects a request
 * outright (unsupported language, malformed text).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.VALIDATION, 400, { details });
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = "Caller identity required") {
    super(message, ERROR_CODES.AUTH, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(message, ERROR_CODES.NOT_FOUND, 404, { details: { resource, id } });
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, allowed: string[]) {
    super(`Method ${method} not allowed`, ERROR_CODES.METHOD_NOT_ALLOWED, 405, {
      details: { allowed },
    });
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxSize: number) {
    super(`Request body exceeds ${maxSize} bytes`, ERROR_CODES.PAYLOAD_TOO_LARGE, 413, {
      details: { maxSize },
    });
  }
}

/**
 * Admission rejected: the caller is still inside their cooldown window.
 */
export class RateLimitError extends AppError {
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number, message: string = "Please wait before translating again") {
    super(message, ERROR_CODES.RATE_LIMIT, 429, {
      retryable: true,
      details: { retryAfterMs },
    });
    this.retryAfterMs = retryAfterMs;
  }

  /** Whole seconds, rounded up, never below 1. */
  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

/**
 * The translation provider kept failing transiently until attempts ran out.
 */
export class UpstreamUnavailableError extends AppError {
  public readonly attempts: number;

  constructor(provider: string, attempts: number, lastFailure?: string) {
    super(
      `Translation service unavailable after ${attempts} attempts`,
      ERROR_CODES.UPSTREAM_UNAVAILABLE,
      503,
      { retryable: true, details: { provider, attempts, lastFailure } },
    );
    this.attempts = attempts;
  }
}

/**
 * The ledger could not be read or written.
 */
export class PersistenceUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Ledger unavailable during ${operation}`,
      ERROR_CODES.PERSISTENCE_UNAVAILABLE,
      503,
      { retryable: true, details: { operation }, cause },
    );
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, ERROR_CODES.TIMEOUT, 504, {
      retryable: true,
      details: { operation, timeoutMs },
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.CONFIGURATION, 500, { details });
  }
}

export class InternalError extends AppError {
  constructor(message: string = "Internal server error", cause?: unknown) {
    super(message, ERROR_CODES.INTERNAL, 500, { cause });
  }
}

/**
 * Normalize anything thrown into an AppError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new InternalError(error.message, error);
  return new InternalError(String(error));
}

/**
 * Run a ledger operation, converting unexpected failures into
 * PersistenceUnavailableError while letting AppErrors through.
 */
export async function withPersistence<T>(
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new PersistenceUnavailableError(operation, error);
  }
}
