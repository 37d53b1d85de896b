/**
 * Translation ledger domain types.
 */

import type { JsonValue } from "../schemas/common.ts";
import { countOccurrences } from "../utils.ts";

export type TranslationType = "text" | "speech";

export const TRANSLATION_TYPES: readonly TranslationType[] = ["text", "speech"];

export type PreferenceCategory = "ui" | "translation" | "audio" | "general" | "privacy";

/**
 * One recorded translation. Immutable once appended.
 */
export interface TranslationEvent {
  id: number;
  userEmail: string;
  sourceLanguage: string;
  targetLanguage: string;
  originalText: string;
  translatedText: string;
  translationType: TranslationType;
  /** Code points of the original text */
  characterCount: number;
  /** Wall time from first attempt to success, backoff included */
  translationTimeMs: number;
  /** 0..1 when the provider reports one */
  confidenceScore: number | null;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
}

/** Everything the gateway supplies; the store assigns id and timestamp. */
export type NewTranslationEvent = Omit<TranslationEvent, "id" | "createdAt">;

/**
 * Text-free projection of an event, enough for every aggregate.
 */
export type EventFacts = Pick<
  TranslationEvent,
  | "id"
  | "sourceLanguage"
  | "targetLanguage"
  | "translationType"
  | "characterCount"
  | "translationTimeMs"
  | "confidenceScore"
  | "createdAt"
>;

/**
 * Running aggregate per (user, source, target), updated with each event.
 */
export interface LanguagePairRollup {
  userEmail: string;
  sourceLanguage: string;
  targetLanguage: string;
  usageCount: number;
  totalCharacters: number;
  totalTimeMs: number;
  confidenceSum: number;
  confidenceSamples: number;
  firstUsed: Date;
  lastUsed: Date;
  /** Distinct UTC days on which the pair was used */
  daysUsed: number;
  isFavorite: boolean;
}

export interface UserProfile {
  email: string;
  fullName: string;
  preferredSourceLang: string;
  preferredTargetLang: string;
  totalTranslations: number;
  totalCharacters: number;
  createdAt: Date;
  lastLogin: Date | null;
}

export interface UserPreference {
  key: string;
  value: JsonValue;
  category: PreferenceCategory;
  updatedAt: Date;
}

export interface HistoryFilter {
  type?: TranslationType;
}

export const DEFAULT_SOURCE_LANG = "en";
export const DEFAULT_TARGET_LANG = "es";

/** Display name given to a user row created implicitly */
export function defaultFullName(email: string): string {
  const local = email.split("@")[0];
  return local || email;
}

export function pairKey(sourceLanguage: string, targetLanguage: string): string {
  return `${sourceLanguage}-${targetLanguage}`;
}

/**
 * Search score: matches in the original text count double, matches in the
 * translation once. `search_translations` computes the same score in SQL.
 */
export function relevanceOf(event: TranslationEvent, query: string): number {
  return countOccurrences(event.originalText, query) * 2 + countOccurrences(event.translatedText, query);
}

export function toFacts(event: TranslationEvent): EventFacts {
  return {
    id: event.id,
    sourceLanguage: event.sourceLanguage,
    targetLanguage: event.targetLanguage,
    translationType: event.translationType,
    characterCount: event.characterCount,
    translationTimeMs: event.translationTimeMs,
    confidenceScore: event.confidenceScore,
    createdAt: event.createdAt,
  };
}
