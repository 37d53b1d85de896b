/**
 * Service container
 *
 * Builds the ledger, admission controller, provider and services once from
 * the validated configuration. Function handlers resolve everything through
 * `getServices()`; tests install their own set with `setServices()`.
 */

import { AnalyticsService } from "./analytics/analytics-service.ts";
import type { AppConfig } from "./config.ts";
import { getConfig } from "./config.ts";
import { HealthService } from "./health/health-service.ts";
import { HistoryService } from "./history/history-service.ts";
import type { TranslationLedger } from "./ledger/ledger.ts";
import { MemoryTranslationLedger } from "./ledger/memory-ledger.ts";
import { SupabaseTranslationLedger } from "./ledger/supabase-ledger.ts";
import { logger } from "./logger.ts";
import { ProfileService } from "./profile/profile-service.ts";
import { getSupabaseClient } from "./supabase.ts";
import { MemorySystemLog, SupabaseSystemLog, type SystemLogWriter } from "./system-log.ts";
import {
  type AdmissionController,
  MemoryAdmissionController,
  SupabaseAdmissionController,
} from "./translation/admission.ts";
import { TranslationGateway } from "./translation/gateway.ts";
import { getLanguageCatalog, type LanguageCatalog } from "./translation/languages.ts";
import { createProvider, type TranslationProvider } from "./translation/providers/index.ts";
import { type Clock, systemClock } from "./utils.ts";

export interface Services {
  ledger: TranslationLedger;
  admission: AdmissionController;
  provider: TranslationProvider;
  languages: LanguageCatalog;
  systemLog: SystemLogWriter;
  gateway: TranslationGateway;
  analytics: AnalyticsService;
  history: HistoryService;
  profile: ProfileService;
  health: HealthService;
}

/** Pieces a caller may supply instead of the configured ones */
export interface ServiceOverrides {
  ledger?: TranslationLedger;
  admission?: AdmissionController;
  provider?: TranslationProvider;
  languages?: LanguageCatalog;
  systemLog?: SystemLogWriter;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const languages = overrides.languages ?? getLanguageCatalog();

  let ledger: TranslationLedger;
  let admission: AdmissionController;
  let systemLog: SystemLogWriter;

  if (config.ledger.driver === "supabase") {
    const client = getSupabaseClient(config.ledger.url, config.ledger.serviceRoleKey);
    ledger = overrides.ledger ?? new SupabaseTranslationLedger(client);
    admission = overrides.admission ?? new SupabaseAdmissionController(client, config.cooldownMs);
    systemLog = overrides.systemLog ?? new SupabaseSystemLog(client);
  } else {
    ledger = overrides.ledger ?? new MemoryTranslationLedger({ clock });
    admission = overrides.admission ?? new MemoryAdmissionController({ cooldownMs: config.cooldownMs, clock });
    systemLog = overrides.systemLog ?? new MemorySystemLog();
  }

  const provider = overrides.provider ?? createProvider(config.provider);

  logger.info("Services initialized", {
    ledger: ledger.driver,
    provider: provider.name,
    cooldownMs: config.cooldownMs,
  });

  return {
    ledger,
    admission,
    provider,
    languages,
    systemLog,
    gateway: new TranslationGateway({
      provider,
      ledger,
      admission,
      languages,
      clock,
      sleep: overrides.sleep,
      maxTextLength: config.maxTextLength,
    }),
    analytics: new AnalyticsService({ ledger, languages, clock }),
    history: new HistoryService(ledger),
    profile: new ProfileService(ledger, languages),
    health: new HealthService({ ledger, provider, languages }),
  };
}

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    services = createServices(getConfig());
  }
  return services;
}

export function setServices(next: Services): void {
  services = next;
}

// Reset cached services (useful for testing)
export function resetServices(): void {
  services = null;
}
