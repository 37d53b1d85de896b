/**
 * Health Module - Types
 */

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export const HEALTH_VERSION = "1.0.0";

/** Ledger round trips slower than this report "degraded" */
export const LEDGER_DEGRADED_THRESHOLD_MS = 1000;

export interface ServiceHealth {
  service: string;
  status: HealthStatus;
  responseTimeMs: number;
  error?: string;
}

export interface HealthReport {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptimeSeconds: number;
  ledgerDriver: string;
  provider: string;
  supportedLanguages: number;
  services: ServiceHealth[];
}
