/**
 * Health Check Function
 *
 * Endpoints:
 * - GET /health            - Ledger connectivity, driver and provider info
 * - GET /health?quick=true - Liveness only, no ledger round trip
 *
 * Responds 503 when the ledger is unreachable.
 */

import { createAPIHandler, ok } from "../_shared/api-handler.ts";
import { getServices } from "../_shared/services.ts";
import { HEALTH_VERSION } from "../_shared/health/types.ts";

export default createAPIHandler({
  service: "health",
  version: HEALTH_VERSION,
  requireIdentity: false,
  routes: {
    GET: {
      handler: async (ctx) => {
        if (ctx.query.quick === "true") {
          return ok({ status: "ok", timestamp: new Date().toISOString(), version: HEALTH_VERSION }, ctx);
        }

        const report = await getServices().health.check();
        return ok(report, ctx, report.status === "unhealthy" ? 503 : 200);
      },
    },
  },
});
