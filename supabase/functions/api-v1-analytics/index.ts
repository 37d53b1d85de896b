/**
 * Analytics API v1
 *
 * Time-bucketed statistics computed on demand from the translation ledger.
 *
 * Routes:
 * - GET /api-v1-analytics/statistics?period=7|30|90|all
 * - GET /api-v1-analytics/daily?days=30   - Per-day rows and trend (1..365 days)
 * - GET /api-v1-analytics/languages       - Usage by source, target and pair
 *
 * @module api-v1-analytics
 */

import { createAPIHandler, type HandlerContext, ok, parseQuery, requireUser } from "../_shared/api-handler.ts";
import { NotFoundError } from "../_shared/errors.ts";
import { z } from "../_shared/schemas/common.ts";
import { getServices } from "../_shared/services.ts";

const VERSION = "1.0.0";

// =============================================================================
// Schemas
// =============================================================================

const statisticsSchema = z.object({
  period: z.enum(["7", "30", "90", "all"]).default("30"),
});

// Out-of-range values are clamped rather than rejected
const dailySchema = z.object({
  days: z.coerce.number().int().optional(),
});

// =============================================================================
// Handlers
// =============================================================================

async function handleStatistics(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const { period } = parseQuery(statisticsSchema, ctx);
  return ok(await getServices().analytics.statistics(userEmail, period), ctx);
}

async function handleDaily(ctx: HandlerContext, userEmail: string): Promise<Response> {
  const { days } = parseQuery(dailySchema, ctx);
  return ok(await getServices().analytics.dailyAnalytics(userEmail, days), ctx);
}

async function handleLanguages(ctx: HandlerContext, userEmail: string): Promise<Response> {
  return ok(await getServices().analytics.languageAnalytics(userEmail), ctx);
}

function handleGet(ctx: HandlerContext): Promise<Response> {
  const userEmail = requireUser(ctx);

  switch (ctx.route.resource) {
    case "statistics":
      return handleStatistics(ctx, userEmail);
    case "daily":
      return handleDaily(ctx, userEmail);
    case "languages":
      return handleLanguages(ctx, userEmail);
    default:
      throw new NotFoundError("Route", ctx.route.resource || "/");
  }
}

// =============================================================================
// Main Handler
// =============================================================================

export default createAPIHandler({
  service: "api-v1-analytics",
  version: VERSION,
  audit: () => getServices().systemLog,
  routes: {
    GET: { handler: handleGet },
  },
});
