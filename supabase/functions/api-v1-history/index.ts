/**
 * History API v1
 *
 * Routes:
 * - GET    /api-v1-history?page=1&per_page=20&type=text - Newest first
 * - GET    /api-v1-history/search?q=hello&limit=50     - Ranked matches
 * - POST   /api-v1-history/clear?confirm=true          - Delete everything (or body `{ "confirm": true }`)
 * - GET    /api-v1-history/:id                         - One translation
 * - DELETE /api-v1-history/:id                         - Delete one translation
 *
 * @module api-v1-history
 */

import {
  createAPIHandler,
  type HandlerContext,
  ok,
  parseBody,
  parseQuery,
  requireUser,
  validateWithSchema,
} from "../_shared/api-handler.ts";
import { addMetadata } from "../_shared/context.ts";
import { NotFoundError } from "../_shared/errors.ts";
import { idParamSchema, queryBooleanSchema, translationTypeSchema, z } from "../_shared/schemas/common.ts";
import { limitQuerySchema, pageQuerySchema } from "../_shared/schemas/pagination.ts";
import { getServices } from "../_shared/services.ts";

const VERSION = "1.0.0";

// =============================================================================
// Schemas
// =============================================================================

const listQuerySchema = pageQuerySchema.extend({
  type: translationTypeSchema.optional(),
});

const searchQuerySchema = limitQuerySchema.extend({
  q: z.string().default(""),
});

const clearQuerySchema = z.object({
  confirm: queryBooleanSchema.optional(),
});

const clearBodySchema = z.object({
  confirm: z.boolean().optional(),
});

// =============================================================================
// Handlers
// =============================================================================

async function handleList(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const query = parseQuery(listQuerySchema, ctx);
  const page = await getServices().history.list(userEmail, {
    page: query.page,
    perPage: query.per_page,
    type: query.type,
  });
  return ok(page, ctx);
}

async function handleSearch(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const query = parseQuery(searchQuerySchema, ctx);
  const limit = query.limit === undefined ? undefined : parseInt(query.limit, 10);
  const result = await getServices().history.search(userEmail, query.q, limit);
  addMetadata("result_count", result.count);
  return ok(result, ctx);
}

function parseId(ctx: HandlerContext): number {
  return validateWithSchema(idParamSchema, ctx.route.resource, "translation id");
}

function handleGet(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);

  if (!ctx.route.resource) {
    return handleList(ctx, userEmail);
  }
  if (ctx.route.resource === "search") {
    return handleSearch(ctx, userEmail);
  }
  return getServices().history.get(userEmail, parseId(ctx)).then((entry) => ok(entry, ctx));
}

async function handlePost(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);
  if (ctx.route.resource !== "clear") {
    throw new NotFoundError("Route", ctx.route.resource || "/");
  }

  const fromQuery = parseQuery(clearQuerySchema, ctx).confirm;
  const fromBody = parseBody(clearBodySchema, ctx).confirm;
  const result = await getServices().history.clear(userEmail, fromQuery === true || fromBody === true);
  addMetadata("deleted_count", result.deleted_count);
  return ok(result, ctx);
}

async function handleDelete(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);
  const result = await getServices().history.delete(userEmail, parseId(ctx));
  return ok(result, ctx);
}

// =============================================================================
// Main Handler
// =============================================================================

export default createAPIHandler({
  service: "api-v1-history",
  version: VERSION,
  audit: () => getServices().systemLog,
  routes: {
    GET: { handler: handleGet },
    POST: { handler: handlePost },
    DELETE: { handler: handleDelete },
  },
});
