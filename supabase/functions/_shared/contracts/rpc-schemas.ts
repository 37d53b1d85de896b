/**
 * RPC Contract Schemas
 *
 * Row shapes returned by the ledger tables and RPC functions, with mappers
 * to the domain types. Every row read from Postgres passes through one of
 * these before the rest of the code sees it.
 */

import { z } from "zod";
import { jsonValueSchema } from "../schemas/common.ts";
import type {
  EventFacts,
  LanguagePairRollup,
  TranslationEvent,
  UserPreference,
  UserProfile,
} from "../ledger/types.ts";

const timestampSchema = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

// PostgREST returns bigint/numeric columns as numbers or numeric strings
const countSchema = z.coerce.number().int().nonnegative();
const numberSchema = z.coerce.number();

// ================================
// Ledger tables
// ================================

export const TRANSLATION_COLUMNS =
  "id, user_email, source_language, target_language, original_text, translated_text, translation_type, character_count, translation_time_ms, confidence_score, ip_address, user_agent, created_at";

export const FACT_COLUMNS =
  "id, source_language, target_language, translation_type, character_count, translation_time_ms, confidence_score, created_at";

export const TranslationFactsRowSchema = z.object({
  id: countSchema,
  source_language: z.string(),
  target_language: z.string(),
  translation_type: z.enum(["text", "speech"]),
  character_count: countSchema,
  translation_time_ms: countSchema,
  confidence_score: numberSchema.nullable(),
  created_at: timestampSchema,
});

export const TranslationRowSchema = TranslationFactsRowSchema.extend({
  user_email: z.string(),
  original_text: z.string(),
  translated_text: z.string(),
  ip_address: z.string().nullable(),
  user_agent: z.string().nullable(),
});

export const USER_COLUMNS =
  "email, full_name, preferred_source_lang, preferred_target_lang, total_translations, total_characters, created_at, last_login";

export const UserRowSchema = z.object({
  email: z.string(),
  full_name: z.string(),
  preferred_source_lang: z.string(),
  preferred_target_lang: z.string(),
  total_translations: countSchema,
  total_characters: countSchema,
  created_at: timestampSchema,
  last_login: timestampSchema.nullable(),
});

export const ROLLUP_COLUMNS =
  "user_email, source_language, target_language, usage_count, total_characters, total_time_ms, confidence_sum, confidence_samples, first_used, last_used, days_used, is_favorite";

export const RollupRowSchema = z.object({
  user_email: z.string(),
  source_language: z.string(),
  target_language: z.string(),
  usage_count: countSchema,
  total_characters: countSchema,
  total_time_ms: countSchema,
  confidence_sum: numberSchema,
  confidence_samples: countSchema,
  first_used: timestampSchema,
  last_used: timestampSchema,
  days_used: countSchema,
  is_favorite: z.boolean(),
});

export const PREFERENCE_COLUMNS = "preference_key, preference_value, category, updated_at";

export const PreferenceRowSchema = z.object({
  preference_key: z.string(),
  preference_value: jsonValueSchema,
  category: z.enum(["ui", "translation", "audio", "general", "privacy"]),
  updated_at: timestampSchema,
});

// ================================
// RPC results
// ================================

export const AdmissionResultSchema = z.object({
  admitted: z.boolean(),
  retry_after_ms: countSchema,
});

export const DeletedCountSchema = countSchema;

export const DeletedFlagSchema = z.boolean();

export type TranslationRow = z.infer<typeof TranslationRowSchema>;
export type TranslationFactsRow = z.infer<typeof TranslationFactsRowSchema>;
export type UserRow = z.infer<typeof UserRowSchema>;
export type RollupRow = z.infer<typeof RollupRowSchema>;
export type PreferenceRow = z.infer<typeof PreferenceRowSchema>;

// ================================
// Mappers
// ================================

export function toTranslationEvent(row: TranslationRow): TranslationEvent {
  return {
    id: row.id,
    userEmail: row.user_email,
    sourceLanguage: row.source_language,
    targetLanguage: row.target_language,
    originalText: row.original_text,
    translatedText: row.translated_text,
    translationType: row.translation_type,
    characterCount: row.character_count,
    translationTimeMs: row.translation_time_ms,
    confidenceScore: row.confidence_score,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    createdAt: row.created_at,
  };
}

export function toEventFacts(row: TranslationFactsRow): EventFacts {
  return {
    id: row.id,
    sourceLanguage: row.source_language,
    targetLanguage: row.target_language,
    translationType: row.translation_type,
    characterCount: row.character_count,
    translationTimeMs: row.translation_time_ms,
    confidenceScore: row.confidence_score,
    createdAt: row.created_at,
  };
}

export function toUserProfile(row: UserRow): UserProfile {
  return {
    email: row.email,
    fullName: row.full_name,
    preferredSourceLang: row.preferred_source_lang,
    preferredTargetLang: row.preferred_target_lang,
    totalTranslations: row.total_translations,
    totalCharacters: row.total_characters,
    createdAt: row.created_at,
    lastLogin: row.last_login,
  };
}

export function toRollup(row: RollupRow): LanguagePairRollup {
  return {
    userEmail: row.user_email,
    sourceLanguage: row.source_language,
    targetLanguage: row.target_language,
    usageCount: row.usage_count,
    totalCharacters: row.total_characters,
    totalTimeMs: row.total_time_ms,
    confidenceSum: row.confidence_sum,
    confidenceSamples: row.confidence_samples,
    firstUsed: row.first_used,
    lastUsed: row.last_used,
    daysUsed: row.days_used,
    isFavorite: row.is_favorite,
  };
}

export function toPreference(row: PreferenceRow): UserPreference {
  return {
    key: row.preference_key,
    value: row.preference_value,
    category: row.category,
    updatedAt: row.updated_at,
  };
}
