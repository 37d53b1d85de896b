/**
 * Unified API Handler
 *
 * Wraps a function's routes with the plumbing every endpoint shares:
 * - Method routing
 * - Caller identity from the `x-user-email` header
 * - Query/body parsing and Zod validation
 * - Request context for logging
 * - Consistent error responses
 * - One system log entry per request
 *
 * @example
 * ```typescript
 * import { createAPIHandler, ok, parseBody } from "../_shared/api-handler.ts";
 *
 * export default createAPIHandler({
 *   service: "api-v1-translate",
 *   audit: () => getServices().systemLog,
 *   routes: {
 *     POST: { handler: (ctx) => translate(ctx) },
 *   },
 * });
 * ```
 */

import { z } from "zod";
import { createContext, type RequestContext, runWithContext, setUserEmail } from "./context.ts";
import {
  AppError,
  AuthenticationError,
  MethodNotAllowedError,
  PayloadTooLargeError,
  ValidationError,
} from "./errors.ts";
import { buildErrorResponse, buildSuccessResponse } from "./response-adapter.ts";
import { logger } from "./logger.ts";
import { type ParsedRoute, parseRoute, routeAction } from "./routing.ts";
import { emailSchema } from "./schemas/common.ts";
import type { SystemLogWriter } from "./system-log.ts";

/** Where a request came from, recorded alongside events and audit entries */
export interface RequestOrigin {
  ipAddress: string | null;
  userAgent: string | null;
}

/** Handler context with parsed data and identity */
export interface HandlerContext {
  request: Request;
  ctx: RequestContext;
  /** Caller email; always set when the route requires identity */
  userEmail: string | null;
  /** Parsed JSON body ({} for GET/DELETE) */
  body: unknown;
  query: Record<string, string>;
  route: ParsedRoute;
  origin: RequestOrigin;
  version: string;
}

export type RouteHandler = (ctx: HandlerContext) => Promise<Response>;

export interface RouteConfig {
  handler: RouteHandler;
  /** Override the handler-level identity requirement */
  requireIdentity?: boolean;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface APIHandlerConfig {
  /** Function name; also the URL prefix stripped before routing */
  service: string;
  /** Require `x-user-email` on every route (default: true) */
  requireIdentity?: boolean;
  version?: string;
  routes: Partial<Record<HttpMethod, RouteConfig>>;
  /** Maximum request body size in bytes (default: 256KB) */
  maxBodySize?: number;
  /** Audit sink; resolved per request so tests can swap services */
  audit?: () => SystemLogWriter;
}

export const IDENTITY_HEADER = "x-user-email";

const DEFAULT_MAX_BODY_SIZE = 256 * 1024;

const BODY_METHODS = new Set(["POST", "PUT"]);

function isHttpMethod(method: string): method is HttpMethod {
  return method === "GET" || method === "POST" || method === "PUT" || method === "DELETE";
}

function isProduction(): boolean {
  return process.env.ENVIRONMENT === "production";
}

async function parseRequestBody(request: Request, maxBodySize: number): Promise<unknown> {
  const contentLength = request.headers.get("content-length");
  if (contentLength && parseInt(contentLength, 10) > maxBodySize) {
    throw new PayloadTooLargeError(maxBodySize);
  }

  const text = await request.text();
  if (Buffer.byteLength(text, "utf8") > maxBodySize) {
    throw new PayloadTooLargeError(maxBodySize);
  }
  if (!text.trim()) {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Invalid JSON in request body");
  }
}

function parseQueryParams(url: URL): Record<string, string> {
  const params: Record<string, string> = {};
  url.searchParams.forEach((value, key) => {
    params[key] = value;
  });
  return params;
}

function zodIssues(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.errors.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Validate `data` against a Zod schema, throwing ValidationError with
 * field-level details.
 */
export function validateWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  location: string,
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Invalid ${location}`, zodIssues(result.error));
  }
  return result.data;
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, ctx: HandlerContext): z.output<S> {
  return validateWithSchema(schema, ctx.body, "request body");
}

export function parseQuery<S extends z.ZodTypeAny>(schema: S, ctx: HandlerContext): z.output<S> {
  return validateWithSchema(schema, ctx.query, "query parameters");
}

/**
 * Caller email for routes that require identity.
 */
export function requireUser(ctx: HandlerContext): string {
  if (!ctx.userEmail) {
    throw new AuthenticationError();
  }
  return ctx.userEmail;
}

function resolveIdentity(request: Request, required: boolean): string | null {
  const header = request.headers.get(IDENTITY_HEADER);
  if (!header || !header.trim()) {
    if (required) {
      throw new AuthenticationError(`Missing ${IDENTITY_HEADER} header`);
    }
    return null;
  }

  const parsed = emailSchema.safeParse(header);
  if (!parsed.success) {
    throw new AuthenticationError(`Invalid ${IDENTITY_HEADER} header`);
  }
  return parsed.data;
}

export function ok<T>(data: T, ctx: HandlerContext, status: number = 200): Response {
  return buildSuccessResponse(data, { status, version: ctx.version });
}

export function created<T>(data: T, ctx: HandlerContext): Response {
  return ok(data, ctx, 201);
}

/** Query parameters worth auditing; free-text search terms are left out */
function auditQuery(query: Record<string, string>): Record<string, string> {
  const { q: _q, ...rest } = query;
  return rest;
}

/**
 * Create an API handler for one function.
 */
export function createAPIHandler(config: APIHandlerConfig): (request: Request) => Promise<Response> {
  const {
    service,
    requireIdentity = true,
    version = "1",
    routes,
    maxBodySize = DEFAULT_MAX_BODY_SIZE,
    audit,
  } = config;

  return (request: Request): Promise<Response> => {
    const ctx = createContext(request, service);

    return runWithContext(ctx, async () => {
      const url = new URL(request.url);
      const route = parseRoute(url, request.method, service);
      const query = parseQueryParams(url);
      let userEmail: string | null = null;
      let failure: AppError | Error | null = null;
      let response: Response;

      try {
        const method = request.method.toUpperCase();
        const routeConfig = isHttpMethod(method) ? routes[method] : undefined;

        if (!routeConfig) {
          throw new MethodNotAllowedError(method, Object.keys(routes));
        }

        userEmail = resolveIdentity(request, routeConfig.requireIdentity ?? requireIdentity);
        if (userEmail) {
          setUserEmail(userEmail);
        }

        const body = BODY_METHODS.has(method) ? await parseRequestBody(request, maxBodySize) : {};

        response = await routeConfig.handler({
          request,
          ctx,
          userEmail,
          body,
          query,
          route,
          origin: {
            ipAddress: ctx.ipAddress ?? null,
            userAgent: ctx.userAgent ?? null,
          },
          version,
        });
      } catch (error) {
        const normalized = error instanceof z.ZodError
          ? new ValidationError("Invalid request", zodIssues(error))
          : error;
        failure = normalized instanceof Error ? normalized : new Error(String(normalized));
        response = buildErrorResponse(normalized, { version, production: isProduction() });
      }

      const responseTimeMs = Math.round(performance.now() - ctx.startTime);
      response.headers.set("X-Response-Time", `${responseTimeMs}ms`);

      if (response.status < 400) {
        logger.logResponse(response.status, { method: route.method, path: url.pathname });
      }

      if (audit) {
        try {
          await audit().write({
            userEmail,
            action: routeAction(service, route),
            endpoint: url.pathname,
            method: route.method,
            statusCode: response.status,
            responseTimeMs,
            ipAddress: ctx.ipAddress ?? null,
            userAgent: ctx.userAgent ?? null,
            errorMessage: failure ? failure.message : null,
            requestData: { query: auditQuery(query), ...ctx.metadata },
            createdAt: new Date(),
          });
        } catch (auditError) {
          logger.warn("System log write failed", {
            error: auditError instanceof Error ? auditError.message : String(auditError),
          });
        }
      }

      return response;
    });
  };
}
