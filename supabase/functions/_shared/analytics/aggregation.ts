/**
 * Aggregation Engine
 *
 * Pure functions that turn a user's events, rollups and profile into the
 * dashboard and analytics views. Nothing here reads or writes storage; the
 * analytics service fetches the inputs and passes "now" in.
 *
 * Every day boundary is a UTC calendar day. Averages over an empty set are 0.
 */

import type {
  EventFacts,
  LanguagePairRollup,
  PreferenceCategory,
  TranslationEvent,
  TranslationType,
  UserPreference,
  UserProfile,
} from "../ledger/types.ts";
import { pairKey, TRANSLATION_TYPES } from "../ledger/types.ts";
import type { JsonValue } from "../schemas/common.ts";
import { average, DAY_MS, round, utcDayKey, utcTimeOfDay } from "../utils.ts";

// =============================================================================
// Inputs
// =============================================================================

export type StatisticsPeriod = "7" | "30" | "90" | "all";

export const DEFAULT_ANALYTICS_DAYS = 30;
export const MAX_ANALYTICS_DAYS = 365;
export const DEFAULT_RECENT_LIMIT = 5;
export const DEFAULT_TOP_PAIRS = 5;
export const MAX_STATISTICS_PAIRS = 20;

/** Display name for a language code */
export type LanguageNamer = (code: string) => string;

/** Start of the statistics window, or undefined for "all" */
export function periodStart(period: StatisticsPeriod, now: Date): Date | undefined {
  return period === "all" ? undefined : new Date(now.getTime() - Number(period) * DAY_MS);
}

/** Clamp the daily analytics window into 1..365, defaulting to 30 */
export function clampDays(days: number | undefined): number {
  if (days === undefined || !Number.isFinite(days)) return DEFAULT_ANALYTICS_DAYS;
  return Math.min(Math.max(Math.trunc(days), 1), MAX_ANALYTICS_DAYS);
}

// =============================================================================
// Views
// =============================================================================

export interface UserInfoView {
  email: string;
  full_name: string;
  preferred_source_lang: string;
  preferred_target_lang: string;
  total_translations: number;
  total_characters: number;
  member_since: string;
  last_login: string | null;
}

export interface RecentTranslationView {
  id: number;
  original_text: string;
  translated_text: string;
  source_language: string;
  target_language: string;
  translation_type: TranslationType;
  character_count: number;
  created_at: string;
}

export interface RollupPairView {
  pair: string;
  source_language: string;
  target_language: string;
  source_name: string;
  target_name: string;
  usage_count: number;
  total_characters: number;
  avg_characters: number;
  avg_time_ms: number;
  avg_confidence: number;
  first_used: string;
  last_used: string;
  days_used: number;
  is_favorite: boolean;
}

export interface DashboardView {
  user: UserInfoView;
  today: { translations: number; characters: number };
  this_week: { translations: number; characters: number; active_days: number };
  recent_translations: RecentTranslationView[];
  top_language_pairs: RollupPairView[];
  preferences: Partial<Record<PreferenceCategory, Record<string, JsonValue>>>;
}

export interface OverallStatsView {
  total_translations: number;
  total_characters: number;
  avg_characters: number;
  avg_time_ms: number;
  unique_source_languages: number;
  unique_target_languages: number;
  active_days: number;
  first_translation: string | null;
  last_translation: string | null;
}

export interface DailyActivityView {
  date: string;
  translations: number;
  characters: number;
  avg_time_ms: number;
  unique_pairs: number;
}

export interface HourlyPatternView {
  hour: number;
  translations: number;
  characters: number;
}

export interface PeriodPairView {
  pair: string;
  source_language: string;
  target_language: string;
  count: number;
  total_characters: number;
  avg_characters: number;
  avg_confidence: number;
  last_used: string;
}

export interface TypePerformanceView {
  translation_type: TranslationType;
  count: number;
  avg_characters: number;
  avg_time_ms: number;
}

export interface StatisticsView {
  period: StatisticsPeriod;
  since: string | null;
  user_info: UserInfoView;
  overall: OverallStatsView;
  daily_activity: DailyActivityView[];
  hourly_patterns: HourlyPatternView[];
  top_language_pairs: PeriodPairView[];
  performance_by_type: TypePerformanceView[];
}

export interface DailyAnalyticsRow {
  date: string;
  translations: number;
  characters: number;
  avg_characters: number;
  avg_time_ms: number;
  unique_source_languages: number;
  unique_target_languages: number;
  active_hours: number;
  first_translation: string;
  last_translation: string;
}

export interface DailyAnalyticsView {
  days: number;
  daily: DailyAnalyticsRow[];
  summary: {
    active_days: number;
    total_translations: number;
    total_characters: number;
    avg_translations_per_day: number;
    trend_percentage: number;
  };
}

export interface LanguageUsageView {
  language: string;
  name: string;
  usage_count: number;
  total_characters: number;
  avg_characters: number;
  avg_time_ms: number;
  last_used: string;
}

export interface LanguageAnalyticsView {
  source_languages: LanguageUsageView[];
  target_languages: LanguageUsageView[];
  language_pairs: RollupPairView[];
  summary: {
    unique_source_languages: number;
    unique_target_languages: number;
    unique_pairs: number;
    most_used_source: { language: string; name: string; usage_count: number } | null;
    most_used_target: { language: string; name: string; usage_count: number } | null;
    most_used_pair: { pair: string; usage_count: number } | null;
  };
}

// =============================================================================
// Helpers
// =============================================================================

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function sum<T>(items: readonly T[], valueOf: (item: T) => number): number {
  let total = 0;
  for (const item of items) total += valueOf(item);
  return total;
}

function distinct<T>(items: readonly T[], keyOf: (item: T) => string): number {
  return new Set(items.map(keyOf)).size;
}

function latest(facts: readonly EventFacts[]): Date {
  let newest = facts[0].createdAt;
  for (const fact of facts) {
    if (fact.createdAt.getTime() > newest.getTime()) newest = fact.createdAt;
  }
  return newest;
}

function earliest(facts: readonly EventFacts[]): Date {
  let oldest = facts[0].createdAt;
  for (const fact of facts) {
    if (fact.createdAt.getTime() < oldest.getTime()) oldest = fact.createdAt;
  }
  return oldest;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function averageConfidence(facts: readonly EventFacts[]): number {
  let total = 0;
  let samples = 0;
  for (const fact of facts) {
    if (fact.confidenceScore !== null) {
      total += fact.confidenceScore;
      samples++;
    }
  }
  return average(total, samples);
}

export function toUserInfo(user: UserProfile): UserInfoView {
  return {
    email: user.email,
    full_name: user.fullName,
    preferred_source_lang: user.preferredSourceLang,
    preferred_target_lang: user.preferredTargetLang,
    total_translations: user.totalTranslations,
    total_characters: user.totalCharacters,
    member_since: user.createdAt.toISOString(),
    last_login: user.lastLogin?.toISOString() ?? null,
  };
}

export function toRecentTranslation(event: TranslationEvent): RecentTranslationView {
  return {
    id: event.id,
    original_text: event.originalText,
    translated_text: event.translatedText,
    source_language: event.sourceLanguage,
    target_language: event.targetLanguage,
    translation_type: event.translationType,
    character_count: event.characterCount,
    created_at: event.createdAt.toISOString(),
  };
}

function toRollupPair(rollup: LanguagePairRollup, nameOf: LanguageNamer): RollupPairView {
  return {
    pair: pairKey(rollup.sourceLanguage, rollup.targetLanguage),
    source_language: rollup.sourceLanguage,
    target_language: rollup.targetLanguage,
    source_name: nameOf(rollup.sourceLanguage),
    target_name: nameOf(rollup.targetLanguage),
    usage_count: rollup.usageCount,
    total_characters: rollup.totalCharacters,
    avg_characters: average(rollup.totalCharacters, rollup.usageCount),
    avg_time_ms: average(rollup.totalTimeMs, rollup.usageCount),
    avg_confidence: average(rollup.confidenceSum, rollup.confidenceSamples),
    first_used: rollup.firstUsed.toISOString(),
    last_used: rollup.lastUsed.toISOString(),
    days_used: rollup.daysUsed,
    is_favorite: rollup.isFavorite,
  };
}

/** usage desc, then the more recent last_used, then pair string */
function compareRollupsByRecency(a: LanguagePairRollup, b: LanguagePairRollup): number {
  return b.usageCount - a.usageCount ||
    b.lastUsed.getTime() - a.lastUsed.getTime() ||
    compareStrings(pairKey(a.sourceLanguage, a.targetLanguage), pairKey(b.sourceLanguage, b.targetLanguage));
}

/** usage desc, then pair string */
function compareRollupsByPair(a: LanguagePairRollup, b: LanguagePairRollup): number {
  return b.usageCount - a.usageCount ||
    compareStrings(pairKey(a.sourceLanguage, a.targetLanguage), pairKey(b.sourceLanguage, b.targetLanguage));
}

function groupPreferences(preferences: readonly UserPreference[]): DashboardView["preferences"] {
  const grouped: DashboardView["preferences"] = {};
  for (const preference of preferences) {
    const bucket = grouped[preference.category] ?? {};
    bucket[preference.key] = preference.value;
    grouped[preference.category] = bucket;
  }
  return grouped;
}

// =============================================================================
// Dashboard
// =============================================================================

export interface DashboardInput {
  user: UserProfile;
  /** Facts from the last 7×24 h */
  weekFacts: readonly EventFacts[];
  /** Newest first, already limited */
  recent: readonly TranslationEvent[];
  rollups: readonly LanguagePairRollup[];
  preferences: readonly UserPreference[];
  now: Date;
  nameOf: LanguageNamer;
  topPairs?: number;
}

export function buildDashboard(input: DashboardInput): DashboardView {
  const { now } = input;
  const weekStart = now.getTime() - 7 * DAY_MS;
  const today = utcDayKey(now);

  const week = input.weekFacts.filter((fact) => {
    const at = fact.createdAt.getTime();
    return at >= weekStart && at <= now.getTime();
  });
  const todays = week.filter((fact) => utcDayKey(fact.createdAt) === today);

  const topPairs = [...input.rollups]
    .sort(compareRollupsByRecency)
    .slice(0, input.topPairs ?? DEFAULT_TOP_PAIRS)
    .map((rollup) => toRollupPair(rollup, input.nameOf));

  return {
    user: toUserInfo(input.user),
    today: {
      translations: todays.length,
      characters: sum(todays, (fact) => fact.characterCount),
    },
    this_week: {
      translations: week.length,
      characters: sum(week, (fact) => fact.characterCount),
      active_days: distinct(week, (fact) => utcDayKey(fact.createdAt)),
    },
    recent_translations: input.recent.map(toRecentTranslation),
    top_language_pairs: topPairs,
    preferences: groupPreferences(input.preferences),
  };
}

// =============================================================================
// Statistics
// =============================================================================

export interface StatisticsInput {
  user: UserProfile;
  /** Facts with created_at >= periodStart(period, now) */
  facts: readonly EventFacts[];
  period: StatisticsPeriod;
  now: Date;
}

function buildOverall(facts: readonly EventFacts[]): OverallStatsView {
  const totalCharacters = sum(facts, (fact) => fact.characterCount);
  const totalTime = sum(facts, (fact) => fact.translationTimeMs);

  return {
    total_translations: facts.length,
    total_characters: totalCharacters,
    avg_characters: average(totalCharacters, facts.length),
    avg_time_ms: average(totalTime, facts.length),
    unique_source_languages: distinct(facts, (fact) => fact.sourceLanguage),
    unique_target_languages: distinct(facts, (fact) => fact.targetLanguage),
    active_days: distinct(facts, (fact) => utcDayKey(fact.createdAt)),
    first_translation: facts.length ? earliest(facts).toISOString() : null,
    last_translation: facts.length ? latest(facts).toISOString() : null,
  };
}

function buildHourlyPatterns(facts: readonly EventFacts[]): HourlyPatternView[] {
  const buckets: HourlyPatternView[] = Array.from({ length: 24 }, (_, hour) => ({
    hour,
    translations: 0,
    characters: 0,
  }));
  for (const fact of facts) {
    const bucket = buckets[fact.createdAt.getUTCHours()];
    bucket.translations++;
    bucket.characters += fact.characterCount;
  }
  return buckets;
}

function buildPeriodPairs(facts: readonly EventFacts[]): PeriodPairView[] {
  const views = [...groupBy(facts, (fact) => pairKey(fact.sourceLanguage, fact.targetLanguage))]
    .map(([pair, group]): PeriodPairView => {
      const totalCharacters = sum(group, (fact) => fact.characterCount);
      return {
        pair,
        source_language: group[0].sourceLanguage,
        target_language: group[0].targetLanguage,
        count: group.length,
        total_characters: totalCharacters,
        avg_characters: average(totalCharacters, group.length),
        avg_confidence: averageConfidence(group),
        last_used: latest(group).toISOString(),
      };
    });

  // ISO strings of the same format compare chronologically
  return views
    .sort((a, b) =>
      b.count - a.count ||
      compareStrings(b.last_used, a.last_used) ||
      compareStrings(a.pair, b.pair)
    )
    .slice(0, MAX_STATISTICS_PAIRS);
}

export function buildStatistics(input: StatisticsInput): StatisticsView {
  const since = periodStart(input.period, input.now);
  const facts = since ? input.facts.filter((fact) => fact.createdAt.getTime() >= since.getTime()) : input.facts;

  const dailyActivity = [...groupBy(facts, (fact) => utcDayKey(fact.createdAt))]
    .map(([date, group]): DailyActivityView => ({
      date,
      translations: group.length,
      characters: sum(group, (fact) => fact.characterCount),
      avg_time_ms: average(sum(group, (fact) => fact.translationTimeMs), group.length),
      unique_pairs: distinct(group, (fact) => pairKey(fact.sourceLanguage, fact.targetLanguage)),
    }))
    .sort((a, b) => compareStrings(b.date, a.date));

  const byType = groupBy(facts, (fact) => fact.translationType);
  const performanceByType: TypePerformanceView[] = [];
  for (const type of TRANSLATION_TYPES) {
    const group = byType.get(type);
    if (!group) continue;
    performanceByType.push({
      translation_type: type,
      count: group.length,
      avg_characters: average(sum(group, (fact) => fact.characterCount), group.length),
      avg_time_ms: average(sum(group, (fact) => fact.translationTimeMs), group.length),
    });
  }

  return {
    period: input.period,
    since: since?.toISOString() ?? null,
    user_info: toUserInfo(input.user),
    overall: buildOverall(facts),
    daily_activity: dailyActivity,
    hourly_patterns: buildHourlyPatterns(facts),
    top_language_pairs: buildPeriodPairs(facts),
    performance_by_type: performanceByType,
  };
}

// =============================================================================
// Daily analytics
// =============================================================================

export interface DailyAnalyticsInput {
  /** Facts from the last `days` days */
  facts: readonly EventFacts[];
  days: number;
  now: Date;
}

/**
 * Percentage change of the recent half-window over the prior one.
 *
 * recent = [now - half, now], prior = [now - 2·half, now - half), with
 * half = floor(days / 2) days. 0 when the prior window is empty.
 */
export function trendPercentage(facts: readonly EventFacts[], days: number, now: Date): number {
  const half = Math.floor(days / 2) * DAY_MS;
  const end = now.getTime();
  const middle = end - half;
  const start = end - 2 * half;

  let recent = 0;
  let prior = 0;
  for (const fact of facts) {
    const at = fact.createdAt.getTime();
    if (at >= middle && at <= end) {
      recent++;
    } else if (at >= start && at < middle) {
      prior++;
    }
  }

  return prior === 0 ? 0 : round(((recent - prior) / prior) * 100);
}

export function buildDailyAnalytics(input: DailyAnalyticsInput): DailyAnalyticsView {
  const days = clampDays(input.days);
  const windowStart = input.now.getTime() - days * DAY_MS;
  const facts = input.facts.filter((fact) => fact.createdAt.getTime() >= windowStart);

  const daily = [...groupBy(facts, (fact) => utcDayKey(fact.createdAt))]
    .map(([date, group]): DailyAnalyticsRow => {
      const characters = sum(group, (fact) => fact.characterCount);
      return {
        date,
        translations: group.length,
        characters,
        avg_characters: average(characters, group.length),
        avg_time_ms: average(sum(group, (fact) => fact.translationTimeMs), group.length),
        unique_source_languages: distinct(group, (fact) => fact.sourceLanguage),
        unique_target_languages: distinct(group, (fact) => fact.targetLanguage),
        active_hours: distinct(group, (fact) => String(fact.createdAt.getUTCHours())),
        first_translation: utcTimeOfDay(earliest(group)),
        last_translation: utcTimeOfDay(latest(group)),
      };
    })
    .sort((a, b) => compareStrings(b.date, a.date));

  return {
    days,
    daily,
    summary: {
      active_days: daily.length,
      total_translations: facts.length,
      total_characters: sum(facts, (fact) => fact.characterCount),
      avg_translations_per_day: average(facts.length, daily.length),
      trend_percentage: trendPercentage(facts, days, input.now),
    },
  };
}

// =============================================================================
// Language analytics
// =============================================================================

export interface LanguageAnalyticsInput {
  facts: readonly EventFacts[];
  rollups: readonly LanguagePairRollup[];
  nameOf: LanguageNamer;
}

function buildLanguageUsage(
  facts: readonly EventFacts[],
  languageOf: (fact: EventFacts) => string,
  nameOf: LanguageNamer,
): LanguageUsageView[] {
  return [...groupBy(facts, languageOf)]
    .map(([language, group]): LanguageUsageView => {
      const characters = sum(group, (fact) => fact.characterCount);
      return {
        language,
        name: nameOf(language),
        usage_count: group.length,
        total_characters: characters,
        avg_characters: average(characters, group.length),
        avg_time_ms: average(sum(group, (fact) => fact.translationTimeMs), group.length),
        last_used: latest(group).toISOString(),
      };
    })
    .sort((a, b) => b.usage_count - a.usage_count || compareStrings(a.language, b.language));
}

function mostUsed(rows: readonly LanguageUsageView[]) {
  const [top] = rows;
  return top ? { language: top.language, name: top.name, usage_count: top.usage_count } : null;
}

export function buildLanguageAnalytics(input: LanguageAnalyticsInput): LanguageAnalyticsView {
  const sources = buildLanguageUsage(input.facts, (fact) => fact.sourceLanguage, input.nameOf);
  const targets = buildLanguageUsage(input.facts, (fact) => fact.targetLanguage, input.nameOf);
  const pairs = [...input.rollups]
    .sort(compareRollupsByPair)
    .map((rollup) => toRollupPair(rollup, input.nameOf));

  const [topPair] = pairs;

  return {
    source_languages: sources,
    target_languages: targets,
    language_pairs: pairs,
    summary: {
      unique_source_languages: sources.length,
      unique_target_languages: targets.length,
      unique_pairs: pairs.length,
      most_used_source: mostUsed(sources),
      most_used_target: mostUsed(targets),
      most_used_pair: topPair ? { pair: topPair.pair, usage_count: topPair.usage_count } : null,
    },
  };
}
