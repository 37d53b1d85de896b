/**
 * Language-pair rollup arithmetic.
 *
 * The memory driver applies these directly; the Postgres functions in
 * supabase/migrations perform the same updates inside
 * `record_translation_event` and `delete_translation_event`.
 */

import { utcDayKey } from "../utils.ts";
import type { LanguagePairRollup, TranslationEvent } from "./types.ts";

/**
 * Fold a newly appended event into its pair's rollup (creating it on
 * first use). `days_used` grows only when the event lands on a different
 * UTC day than the previous `last_used`.
 */
export function applyEventToRollup(
  existing: LanguagePairRollup | undefined,
  event: TranslationEvent,
): LanguagePairRollup {
  const hasConfidence = event.confidenceScore !== null;

  if (!existing) {
    return {
      userEmail: event.userEmail,
      sourceLanguage: event.sourceLanguage,
      targetLanguage: event.targetLanguage,
      usageCount: 1,
      totalCharacters: event.characterCount,
      totalTimeMs: event.translationTimeMs,
      confidenceSum: event.confidenceScore ?? 0,
      confidenceSamples: hasConfidence ? 1 : 0,
      firstUsed: event.createdAt,
      lastUsed: event.createdAt,
      daysUsed: 1,
      isFavorite: false,
    };
  }

  const newDay = utcDayKey(existing.lastUsed) !== utcDayKey(event.createdAt);

  return {
    ...existing,
    usageCount: existing.usageCount + 1,
    totalCharacters: existing.totalCharacters + event.characterCount,
    totalTimeMs: existing.totalTimeMs + event.translationTimeMs,
    confidenceSum: existing.confidenceSum + (event.confidenceScore ?? 0),
    confidenceSamples: existing.confidenceSamples + (hasConfidence ? 1 : 0),
    firstUsed: existing.firstUsed.getTime() <= event.createdAt.getTime()
      ? existing.firstUsed
      : event.createdAt,
    lastUsed: event.createdAt,
    daysUsed: existing.daysUsed + (newDay ? 1 : 0),
  };
}

/**
 * Back a deleted event out of its rollup. `remaining` holds the pair's
 * events left after the delete; the dates and `days_used` are recomputed
 * from them. Returns null when the pair has no uses left.
 */
export function removeEventFromRollup(
  existing: LanguagePairRollup,
  event: TranslationEvent,
  remaining: readonly TranslationEvent[],
): LanguagePairRollup | null {
  if (existing.usageCount <= 1 || remaining.length === 0) {
    return null;
  }

  const times = remaining.map((other) => other.createdAt.getTime());

  const hasConfidence = event.confidenceScore !== null;

  return {
    ...existing,
    usageCount: existing.usageCount - 1,
    totalCharacters: Math.max(0, existing.totalCharacters - event.characterCount),
    totalTimeMs: Math.max(0, existing.totalTimeMs - event.translationTimeMs),
    confidenceSum: hasConfidence
      ? Math.max(0, existing.confidenceSum - (event.confidenceScore ?? 0))
      : existing.confidenceSum,
    confidenceSamples: Math.max(0, existing.confidenceSamples - (hasConfidence ? 1 : 0)),
    firstUsed: new Date(Math.min(...times)),
    lastUsed: new Date(Math.max(...times)),
    daysUsed: new Set(remaining.map((other) => utcDayKey(other.createdAt))).size,
  };
}
