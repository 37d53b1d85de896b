/**
 * Health Module - Ledger Health Checker
 *
 * Checks ledger connectivity and response time.
 */

import type { TranslationLedger } from "../../ledger/ledger.ts";
import { withTimeout } from "../../timeout.ts";
import { type HealthStatus, LEDGER_DEGRADED_THRESHOLD_MS, type ServiceHealth } from "../types.ts";

/**
 * Check ledger health with the cheapest read the driver offers
 */
export async function checkLedger(ledger: TranslationLedger, timeoutMs: number): Promise<ServiceHealth> {
  const start = performance.now();

  try {
    await withTimeout(ledger.ping(), timeoutMs, "ledger health check");

    const responseTimeMs = Math.round(performance.now() - start);
    const status: HealthStatus = responseTimeMs > LEDGER_DEGRADED_THRESHOLD_MS
      ? "degraded"
      : "healthy";
    return { service: "ledger", status, responseTimeMs };
  } catch (error) {
    return {
      service: "ledger",
      status: "unhealthy",
      responseTimeMs: Math.round(performance.now() - start),
      error: error instanceof Error ? error.message : "Connection failed",
    };
  }
}
