/**
 * Dashboard API v1
 *
 * Routes:
 * - GET /api-v1-dashboard?recent=5 - Profile, today/this-week counts, recent
 *   translations, top language pairs and grouped preferences
 *
 * @module api-v1-dashboard
 */

import { createAPIHandler, type HandlerContext, ok, parseQuery, requireUser } from "../_shared/api-handler.ts";
import { NotFoundError } from "../_shared/errors.ts";
import { z } from "../_shared/schemas/common.ts";
import { getServices } from "../_shared/services.ts";

const VERSION = "1.0.0";

const querySchema = z.object({
  recent: z.coerce.number().int().min(1).max(50).optional(),
});

async function handleDashboard(ctx: HandlerContext): Promise<Response> {
  if (ctx.route.resource) {
    throw new NotFoundError("Route", ctx.route.resource);
  }
  const userEmail = requireUser(ctx);
  const query = parseQuery(querySchema, ctx);

  const dashboard = await getServices().analytics.dashboard(userEmail, query.recent);
  return ok(dashboard, ctx);
}

export default createAPIHandler({
  service: "api-v1-dashboard",
  version: VERSION,
  audit: () => getServices().systemLog,
  routes: {
    GET: { handler: handleDashboard },
  },
});
