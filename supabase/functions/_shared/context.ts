/**
 * Request Context
 *
 * Request-scoped context that flows through the whole request lifecycle
 * (request ID, correlation ID, timing, caller identity). Backed by
 * AsyncLocalStorage so concurrent requests on the same process never see
 * each other's context.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

/**
 * Context available throughout a request lifecycle
 */
export interface RequestContext {
  /** Unique identifier for this request */
  requestId: string;
  /** Correlation ID for tracing across services (from header or generated) */
  correlationId: string;
  /** Request start time (performance.now()) */
  startTime: number;
  startTimestamp: Date;
  /** Caller email, set once identity is resolved */
  userEmail?: string;
  /** Function/service name */
  service?: string;
  ipAddress?: string;
  userAgent?: string;
  metadata: Record<string, unknown>;
}

const storage = new AsyncLocalStorage<RequestContext>();

function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${randomUUID().slice(0, 8)}`;
}

/**
 * First address of x-forwarded-for, falling back to x-real-ip.
 */
export function extractClientIp(request: Request): string | undefined {
  const forwarded = request.headers.get("x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }
  return request.headers.get("x-real-ip") ?? undefined;
}

/**
 * Create a new request context from an incoming request.
 * The context is not active until passed to {@link runWithContext}.
 */
export function createContext(request: Request, service?: string): RequestContext {
  const correlationId =
    request.headers.get("x-correlation-id") ||
    request.headers.get("x-request-id") ||
    generateRequestId();

  return {
    requestId: generateRequestId(),
    correlationId,
    startTime: performance.now(),
    startTimestamp: new Date(),
    service,
    ipAddress: extractClientIp(request),
    userAgent: request.headers.get("user-agent") ?? undefined,
    metadata: {},
  };
}

/**
 * Run `fn` with `context` as the active request context.
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Get the current request context, or null outside a request.
 */
export function getContext(): RequestContext | null {
  return storage.getStore() ?? null;
}

export function setUserEmail(userEmail: string): void {
  const ctx = getContext();
  if (ctx) {
    ctx.userEmail = userEmail;
  }
}

export function addMetadata(key: string, value: unknown): void {
  const ctx = getContext();
  if (ctx) {
    ctx.metadata[key] = value;
  }
}

/**
 * Milliseconds since the active request started (0 outside a request).
 */
export function getElapsedMs(): number {
  const ctx = getContext();
  if (!ctx) return 0;
  return Math.round(performance.now() - ctx.startTime);
}
