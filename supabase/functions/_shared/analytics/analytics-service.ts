/**
 * Analytics Service
 *
 * Fetches a user's ledger data and hands it to the aggregation functions.
 * Reads only; a stale snapshot is acceptable.
 */

import { NotFoundError } from "../errors.ts";
import type { TranslationLedger } from "../ledger/ledger.ts";
import type { UserProfile } from "../ledger/types.ts";
import { logger } from "../logger.ts";
import type { LanguageCatalog } from "../translation/languages.ts";
import { type Clock, DAY_MS, systemClock } from "../utils.ts";
import {
  buildDailyAnalytics,
  buildDashboard,
  buildLanguageAnalytics,
  buildStatistics,
  clampDays,
  type DailyAnalyticsView,
  type DashboardView,
  DEFAULT_RECENT_LIMIT,
  type LanguageAnalyticsView,
  periodStart,
  type StatisticsPeriod,
  type StatisticsView,
} from "./aggregation.ts";

export interface AnalyticsServiceOptions {
  ledger: TranslationLedger;
  languages: LanguageCatalog;
  clock?: Clock;
}

export class AnalyticsService {
  private readonly ledger: TranslationLedger;
  private readonly languages: LanguageCatalog;
  private readonly clock: Clock;

  constructor(options: AnalyticsServiceOptions) {
    this.ledger = options.ledger;
    this.languages = options.languages;
    this.clock = options.clock ?? systemClock;
  }

  private readonly nameOf = (code: string): string => this.languages.nameOf(code);

  private async requireUser(userEmail: string): Promise<UserProfile> {
    const user = await this.ledger.getUser(userEmail);
    if (!user) {
      throw new NotFoundError("User", userEmail);
    }
    return user;
  }

  async dashboard(userEmail: string, recentLimit: number = DEFAULT_RECENT_LIMIT): Promise<DashboardView> {
    const user = await this.requireUser(userEmail);
    const now = this.clock.now();
    const done = logger.time("dashboard");

    const [weekFacts, recent, rollups, preferences] = await Promise.all([
      this.ledger.listFacts(userEmail, new Date(now.getTime() - 7 * DAY_MS)),
      this.ledger.listByUser(userEmail, {}, { page: 1, perPage: recentLimit }),
      this.ledger.listRollups(userEmail),
      this.ledger.listPreferences(userEmail),
    ]);
    done({ weekEvents: weekFacts.length, pairs: rollups.length });

    return buildDashboard({
      user,
      weekFacts,
      recent: recent.events,
      rollups,
      preferences,
      now,
      nameOf: this.nameOf,
    });
  }

  async statistics(userEmail: string, period: StatisticsPeriod): Promise<StatisticsView> {
    const user = await this.requireUser(userEmail);
    const now = this.clock.now();
    const facts = await this.ledger.listFacts(userEmail, periodStart(period, now));

    return buildStatistics({ user, facts, period, now });
  }

  async dailyAnalytics(userEmail: string, days?: number): Promise<DailyAnalyticsView> {
    const window = clampDays(days);
    const now = this.clock.now();
    const facts = await this.ledger.listFacts(userEmail, new Date(now.getTime() - window * DAY_MS));

    return buildDailyAnalytics({ facts, days: window, now });
  }

  async languageAnalytics(userEmail: string): Promise<LanguageAnalyticsView> {
    const [facts, rollups] = await Promise.all([
      this.ledger.listFacts(userEmail),
      this.ledger.listRollups(userEmail),
    ]);

    return buildLanguageAnalytics({ facts, rollups, nameOf: this.nameOf });
  }
}
