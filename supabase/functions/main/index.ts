/**
 * Main router
 *
 * Mounts every function under its own path prefix, the way the functions
 * runtime does: `/api-v1-history/42` goes to the `api-v1-history` handler
 * with the full URL intact.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import analytics from "../api-v1-analytics/index.ts";
import dashboard from "../api-v1-dashboard/index.ts";
import history from "../api-v1-history/index.ts";
import profile from "../api-v1-profile/index.ts";
import translate from "../api-v1-translate/index.ts";
import health from "../health/index.ts";
import { NotFoundError } from "../_shared/errors.ts";
import { buildErrorResponse } from "../_shared/response-adapter.ts";

export type FunctionHandler = (request: Request) => Promise<Response>;

export const FUNCTIONS: Record<string, FunctionHandler> = {
  "api-v1-translate": translate,
  "api-v1-dashboard": dashboard,
  "api-v1-analytics": analytics,
  "api-v1-history": history,
  "api-v1-profile": profile,
  health,
};

export function createApp(functions: Record<string, FunctionHandler> = FUNCTIONS) {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "x-user-email", "x-request-id", "x-correlation-id"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      exposeHeaders: ["X-Request-Id", "X-Correlation-Id", "Retry-After", "X-Response-Time"],
    }),
  );

  const dispatch = (name: string, request: Request): Promise<Response> | Response => {
    const handler = functions[name];
    if (!handler) {
      return buildErrorResponse(new NotFoundError("Function", name), {
        production: process.env.ENVIRONMENT === "production",
      });
    }
    return handler(request);
  };

  app.all("/:fn", (c) => dispatch(c.req.param("fn"), c.req.raw));
  app.all("/:fn/*", (c) => dispatch(c.req.param("fn"), c.req.raw));

  return app;
}
