/**
 * Response Adapter
 *
 * Unified response format for all functions:
 * `{ success, data, meta }` on success and
 * `{ success, error, code, details?, retry_after?, meta }` on failure.
 *
 * @module response-adapter
 */

import { randomUUID } from "node:crypto";
import { getContext, getElapsedMs } from "./context.ts";
import { logger } from "./logger.ts";
import { AppError, RateLimitError, toAppError } from "./errors.ts";

export interface ResponseMeta {
  requestId: string;
  timestamp: string;
  responseTime: number;
  version?: string;
}

export interface SuccessBody<T> {
  success: true;
  data: T;
  meta: ResponseMeta;
}

export interface ErrorBody {
  success: false;
  /** Human-readable message */
  error: string;
  code: string;
  details?: unknown;
  /** Seconds until a rate-limited caller may try again */
  retry_after?: number;
  meta: ResponseMeta;
}

function buildMeta(version?: string): ResponseMeta {
  const ctx = getContext();
  return {
    requestId: ctx?.requestId ?? randomUUID(),
    timestamp: new Date().toISOString(),
    responseTime: ctx ? getElapsedMs() : 0,
    version,
  };
}

function baseHeaders(version?: string): Record<string, string> {
  const ctx = getContext();
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (ctx?.requestId) {
    headers["X-Request-Id"] = ctx.requestId;
    headers["X-Correlation-Id"] = ctx.correlationId;
  }
  if (version) {
    headers["X-API-Version"] = version;
  }
  return headers;
}

/**
 * Build a unified success response
 */
export function buildSuccessResponse<T>(
  data: T,
  options?: { status?: number; version?: string },
): Response {
  const body: SuccessBody<T> = {
    success: true,
    data,
    meta: buildMeta(options?.version),
  };

  return new Response(JSON.stringify(body), {
    status: options?.status ?? 200,
    headers: baseHeaders(options?.version),
  });
}

/**
 * Build a unified error response.
 *
 * In production, `details` is kept only for validation errors and internal
 * error messages are replaced with a generic one.
 */
export function buildErrorResponse(
  error: unknown,
  options?: { version?: string; production?: boolean },
): Response {
  const appError = toAppError(error);
  const production = options?.production ?? false;
  const internal = !(error instanceof AppError);

  const body: ErrorBody = {
    success: false,
    error: production && internal ? "Internal server error" : appError.message,
    code: appError.code,
    details: production && appError.code !== "VALIDATION_ERROR" ? undefined : appError.details,
    meta: buildMeta(options?.version),
  };

  const headers = baseHeaders(options?.version);

  if (appError instanceof RateLimitError) {
    body.retry_after = appError.retryAfterSeconds;
    headers["Retry-After"] = String(appError.retryAfterSeconds);
  }

  if (appError.statusCode >= 500) {
    logger.error("Request failed", appError.cause ?? appError, {
      statusCode: appError.statusCode,
      errorCode: appError.code,
    });
  } else {
    logger.warn("Request rejected", {
      statusCode: appError.statusCode,
      errorCode: appError.code,
      reason: appError.message,
    });
  }

  return new Response(JSON.stringify(body), {
    status: appError.statusCode,
    headers,
  });
}
