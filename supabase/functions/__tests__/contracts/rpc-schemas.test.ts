/**
 * RPC Contract Tests
 *
 * Rows as PostgREST returns them, parsed and mapped to domain types.
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  AdmissionResultSchema,
  PreferenceRowSchema,
  RollupRowSchema,
  toPreference,
  toRollup,
  toTranslationEvent,
  toUserProfile,
  TranslationRowSchema,
  UserRowSchema,
} from "../../_shared/contracts/rpc-schemas.ts";

const translationRow = {
  id: "42",
  user_email: "reader@example.com",
  source_language: "en",
  target_language: "es",
  original_text: "good morning",
  translated_text: "buenos días",
  translation_type: "text",
  character_count: 12,
  translation_time_ms: "340",
  confidence_score: "0.87",
  ip_address: null,
  user_agent: "test-agent",
  created_at: "2026-03-10T12:00:00+00:00",
};

test("RPC Contract - translation row with numeric strings", () => {
  const event = toTranslationEvent(TranslationRowSchema.parse(translationRow));

  assert.equal(event.id, 42);
  assert.equal(event.translationTimeMs, 340);
  assert.equal(event.confidenceScore, 0.87);
  assert.equal(event.ipAddress, null);
  assert.equal(event.createdAt.toISOString(), "2026-03-10T12:00:00.000Z");
});

test("RPC Contract - missing confidence stays null", () => {
  const event = toTranslationEvent(TranslationRowSchema.parse({ ...translationRow, confidence_score: null }));

  assert.equal(event.confidenceScore, null);
});

test("RPC Contract - bad rows are rejected", () => {
  const badTimestamp = TranslationRowSchema.safeParse({ ...translationRow, created_at: "yesterday" });
  assert.equal(badTimestamp.success, false);
  if (!badTimestamp.success) {
    assert.equal(badTimestamp.error.errors[0].message, "Invalid timestamp: yesterday");
  }

  assert.equal(TranslationRowSchema.safeParse({ ...translationRow, translation_type: "video" }).success, false);
  assert.equal(TranslationRowSchema.safeParse({ ...translationRow, character_count: -1 }).success, false);
});

test("RPC Contract - user row", () => {
  const user = toUserProfile(
    UserRowSchema.parse({
      email: "reader@example.com",
      full_name: "Ada Reader",
      preferred_source_lang: "en",
      preferred_target_lang: "fr",
      total_translations: "3",
      total_characters: "120",
      created_at: "2026-01-01T00:00:00Z",
      last_login: null,
    }),
  );

  assert.equal(user.totalTranslations, 3);
  assert.equal(user.totalCharacters, 120);
  assert.equal(user.preferredTargetLang, "fr");
  assert.equal(user.lastLogin, null);
});

test("RPC Contract - rollup row", () => {
  const rollup = toRollup(
    RollupRowSchema.parse({
      user_email: "reader@example.com",
      source_language: "en",
      target_language: "es",
      usage_count: 4,
      total_characters: 50,
      total_time_ms: 1000,
      confidence_sum: "1.7",
      confidence_samples: 2,
      first_used: "2026-03-01T10:00:00Z",
      last_used: "2026-03-09T10:00:00Z",
      days_used: 3,
      is_favorite: true,
    }),
  );

  assert.equal(rollup.confidenceSum, 1.7);
  assert.equal(rollup.daysUsed, 3);
  assert.equal(rollup.isFavorite, true);
  assert.equal(rollup.lastUsed.toISOString(), "2026-03-09T10:00:00.000Z");
});

test("RPC Contract - preference row keeps JSON values", () => {
  const preference = toPreference(
    PreferenceRowSchema.parse({
      preference_key: "voice",
      preference_value: { gender: "female", rate: 1.2, tags: ["calm"] },
      category: "audio",
      updated_at: "2026-03-10T12:00:00Z",
    }),
  );

  assert.deepEqual(preference.value, { gender: "female", rate: 1.2, tags: ["calm"] });
  assert.equal(preference.category, "audio");
  assert.equal(
    PreferenceRowSchema.safeParse({
      preference_key: "voice",
      preference_value: "x",
      category: "billing",
      updated_at: "2026-03-10T12:00:00Z",
    }).success,
    false,
  );
});

test("RPC Contract - admission result", () => {
  assert.deepEqual(AdmissionResultSchema.parse({ admitted: false, retry_after_ms: "12500" }), {
    admitted: false,
    retry_after_ms: 12500,
  });
});
