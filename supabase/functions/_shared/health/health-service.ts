/**
 * Health Module - Main Orchestration Service
 *
 * Runs the health checks and reports them with driver and provider info.
 */

import type { TranslationLedger } from "../ledger/ledger.ts";
import { logger } from "../logger.ts";
import { TIMEOUT_DEFAULTS } from "../timeout.ts";
import type { LanguageCatalog } from "../translation/languages.ts";
import type { TranslationProvider } from "../translation/providers/index.ts";
import { checkLedger } from "./checkers/ledger-checker.ts";
import { HEALTH_VERSION, type HealthReport, type HealthStatus } from "./types.ts";

// =============================================================================
// Service Configuration
// =============================================================================

export interface HealthServiceConfig {
  ledger: TranslationLedger;
  provider: TranslationProvider;
  languages: LanguageCatalog;
  /** Per-check timeout (default: 5s) */
  timeoutMs?: number;
}

// =============================================================================
// Health Service
// =============================================================================

export class HealthService {
  private readonly startTime = Date.now();
  private readonly timeoutMs: number;

  constructor(private readonly config: HealthServiceConfig) {
    this.timeoutMs = config.timeoutMs ?? TIMEOUT_DEFAULTS.health;
  }

  /**
   * Get system uptime in seconds
   */
  getUptime(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  async check(): Promise<HealthReport> {
    const services = [await checkLedger(this.config.ledger, this.timeoutMs)];

    const hasUnhealthy = services.some((s) => s.status === "unhealthy");
    const hasDegraded = services.some((s) => s.status === "degraded");
    const status: HealthStatus = hasUnhealthy
      ? "unhealthy"
      : hasDegraded
      ? "degraded"
      : "healthy";

    if (status !== "healthy") {
      logger.warn("Health check not healthy", { status, services });
    }

    return {
      status,
      version: HEALTH_VERSION,
      timestamp: new Date().toISOString(),
      uptimeSeconds: this.getUptime(),
      ledgerDriver: this.config.ledger.driver,
      provider: this.config.provider.name,
      supportedLanguages: this.config.languages.size,
      services,
    };
  }
}
