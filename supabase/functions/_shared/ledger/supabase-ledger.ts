/**
 * Postgres ledger driver (Supabase).
 *
 * Reads go through PostgREST; every multi-row mutation is a plpgsql
 * function from supabase/migrations so it runs in one transaction.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  DeletedCountSchema,
  DeletedFlagSchema,
  FACT_COLUMNS,
  PREFERENCE_COLUMNS,
  PreferenceRowSchema,
  ROLLUP_COLUMNS,
  RollupRowSchema,
  toEventFacts,
  toPreference,
  toRollup,
  toTranslationEvent,
  toUserProfile,
  TRANSLATION_COLUMNS,
  TranslationFactsRowSchema,
  TranslationRowSchema,
  USER_COLUMNS,
  UserRowSchema,
} from "../contracts/rpc-schemas.ts";
import { PersistenceUnavailableError } from "../errors.ts";
import { logger } from "../logger.ts";
import { type PageRequest, pageRange, processPageResult } from "../pagination.ts";
import type { JsonValue } from "../schemas/common.ts";
import type { EventPage, LanguagePreferenceUpdate, LedgerDriver, TranslationLedger } from "./ledger.ts";
import type {
  EventFacts,
  HistoryFilter,
  LanguagePairRollup,
  NewTranslationEvent,
  PreferenceCategory,
  TranslationEvent,
  UserPreference,
  UserProfile,
} from "./types.ts";

interface QueryResponse {
  data: unknown;
  error: { message: string; code?: string } | null;
}

/** Rows fetched per round trip when reading a user's whole history */
const FACTS_BATCH_SIZE = 1000;

export class SupabaseTranslationLedger implements TranslationLedger {
  readonly driver: LedgerDriver = "supabase";

  constructor(private readonly client: SupabaseClient) {}

  /**
   * Await a PostgREST call, turning transport and query errors into
   * PersistenceUnavailableError and validating the payload.
   */
  private async run<S extends z.ZodTypeAny>(
    operation: string,
    query: () => PromiseLike<QueryResponse>,
    schema: S,
  ): Promise<z.output<S>> {
    let response: QueryResponse;
    try {
      response = await query();
    } catch (error) {
      logger.error("Ledger request failed", error, { operation });
      throw new PersistenceUnavailableError(operation, error);
    }

    if (response.error) {
      logger.error("Ledger query failed", {
        operation,
        dbError: response.error.message,
        dbCode: response.error.code,
      });
      throw new PersistenceUnavailableError(operation, response.error);
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      logger.error("Ledger returned unexpected data", {
        operation,
        issues: parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      throw new PersistenceUnavailableError(operation, parsed.error);
    }
    return parsed.data;
  }

  async append(event: NewTranslationEvent): Promise<TranslationEvent> {
    const row = await this.run(
      "append",
      () =>
        this.client.rpc("record_translation_event", {
          p_user_email: event.userEmail,
          p_source_language: event.sourceLanguage,
          p_target_language: event.targetLanguage,
          p_original_text: event.originalText,
          p_translated_text: event.translatedText,
          p_translation_type: event.translationType,
          p_character_count: event.characterCount,
          p_translation_time_ms: event.translationTimeMs,
          p_confidence_score: event.confidenceScore,
          p_ip_address: event.ipAddress,
          p_user_agent: event.userAgent,
        }),
      TranslationRowSchema,
    );
    return toTranslationEvent(row);
  }

  async getById(userEmail: string, id: number): Promise<TranslationEvent | null> {
    const row = await this.run(
      "getById",
      () =>
        this.client
          .from("translations")
          .select(TRANSLATION_COLUMNS)
          .eq("user_email", userEmail)
          .eq("id", id)
          .maybeSingle(),
      TranslationRowSchema.nullable(),
    );
    return row ? toTranslationEvent(row) : null;
  }

  async listByUser(userEmail: string, filter: HistoryFilter, page: PageRequest): Promise<EventPage> {
    const { from, to } = pageRange(page);
    const rows = await this.run(
      "listByUser",
      () => {
        let query = this.client
          .from("translations")
          .select(TRANSLATION_COLUMNS)
          .eq("user_email", userEmail);
        if (filter.type) {
          query = query.eq("translation_type", filter.type);
        }
        return query
          .order("created_at", { ascending: false })
          .order("id", { ascending: false })
          .range(from, to);
      },
      z.array(TranslationRowSchema),
    );

    const { items, hasMore } = processPageResult(rows, page.perPage);
    return { events: items.map(toTranslationEvent), hasMore };
  }

  async deleteAllForUser(userEmail: string): Promise<number> {
    return await this.run(
      "deleteAllForUser",
      () => this.client.rpc("clear_translation_history", { p_user_email: userEmail }),
      DeletedCountSchema,
    );
  }

  async deleteById(userEmail: string, id: number): Promise<boolean> {
    return await this.run(
      "deleteById",
      () => this.client.rpc("delete_translation_event", { p_user_email: userEmail, p_id: id }),
      DeletedFlagSchema,
    );
  }

  async listFacts(userEmail: string, since?: Date): Promise<EventFacts[]> {
    const facts: EventFacts[] = [];

    for (let offset = 0; ; offset += FACTS_BATCH_SIZE) {
      const rows = await this.run(
        "listFacts",
        () => {
          let query = this.client
            .from("translations")
            .select(FACT_COLUMNS)
            .eq("user_email", userEmail);
          if (since) {
            query = query.gte("created_at", since.toISOString());
          }
          return query
            .order("created_at", { ascending: true })
            .order("id", { ascending: true })
            .range(offset, offset + FACTS_BATCH_SIZE - 1);
        },
        z.array(TranslationFactsRowSchema),
      );

      facts.push(...rows.map(toEventFacts));
      if (rows.length < FACTS_BATCH_SIZE) {
        return facts;
      }
    }
  }

  async listRollups(userEmail: string): Promise<LanguagePairRollup[]> {
    const rows = await this.run(
      "listRollups",
      () =>
        this.client
          .from("user_language_stats")
          .select(ROLLUP_COLUMNS)
          .eq("user_email", userEmail),
      z.array(RollupRowSchema),
    );
    return rows.map(toRollup);
  }

  async search(userEmail: string, query: string, limit: number): Promise<TranslationEvent[]> {
    const rows = await this.run(
      "search",
      () =>
        this.client.rpc("search_translations", {
          p_user_email: userEmail,
          p_query: query,
          p_limit: limit,
        }),
      z.array(TranslationRowSchema),
    );
    return rows.map(toTranslationEvent);
  }

  async getUser(userEmail: string): Promise<UserProfile | null> {
    const row = await this.run(
      "getUser",
      () =>
        this.client
          .from("users")
          .select(USER_COLUMNS)
          .eq("email", userEmail)
          .maybeSingle(),
      UserRowSchema.nullable(),
    );
    return row ? toUserProfile(row) : null;
  }

  async touchLogin(userEmail: string, fullName?: string): Promise<UserProfile> {
    const row = await this.run(
      "touchLogin",
      () =>
        this.client.rpc("touch_user_login", {
          p_user_email: userEmail,
          p_full_name: fullName ?? null,
        }),
      UserRowSchema,
    );
    return toUserProfile(row);
  }

  async updateLanguagePreferences(
    userEmail: string,
    update: LanguagePreferenceUpdate,
  ): Promise<UserProfile | null> {
    const changes: Record<string, string> = {};
    if (update.sourceLanguage) changes.preferred_source_lang = update.sourceLanguage;
    if (update.targetLanguage) changes.preferred_target_lang = update.targetLanguage;

    if (Object.keys(changes).length === 0) {
      return this.getUser(userEmail);
    }

    const row = await this.run(
      "updateLanguagePreferences",
      () =>
        this.client
          .from("users")
          .update(changes)
          .eq("email", userEmail)
          .select(USER_COLUMNS)
          .maybeSingle(),
      UserRowSchema.nullable(),
    );
    return row ? toUserProfile(row) : null;
  }

  async setFavoritePair(
    userEmail: string,
    sourceLanguage: string,
    targetLanguage: string,
    favorite: boolean,
  ): Promise<boolean> {
    return await this.run(
      "setFavoritePair",
      () =>
        this.client.rpc("set_favorite_language_pair", {
          p_user_email: userEmail,
          p_source_language: sourceLanguage,
          p_target_language: targetLanguage,
          p_is_favorite: favorite,
        }),
      DeletedFlagSchema,
    );
  }

  async setPreference(
    userEmail: string,
    key: string,
    value: JsonValue,
    category: PreferenceCategory,
  ): Promise<UserPreference> {
    const row = await this.run(
      "setPreference",
      () =>
        this.client
          .from("user_preferences")
          .upsert(
            {
              user_email: userEmail,
              preference_key: key,
              preference_value: value,
              category,
              updated_at: new Date().toISOString(),
            },
            { onConflict: "user_email,preference_key" },
          )
          .select(PREFERENCE_COLUMNS)
          .single(),
      PreferenceRowSchema,
    );
    return toPreference(row);
  }

  async listPreferences(userEmail: string): Promise<UserPreference[]> {
    const rows = await this.run(
      "listPreferences",
      () =>
        this.client
          .from("user_preferences")
          .select(PREFERENCE_COLUMNS)
          .eq("user_email", userEmail)
          .order("category", { ascending: true })
          .order("preference_key", { ascending: true }),
      z.array(PreferenceRowSchema),
    );
    return rows.map(toPreference);
  }

  async ping(): Promise<void> {
    await this.run(
      "ping",
      () => this.client.from("users").select("email").limit(1),
      z.array(z.object({ email: z.string() })),
    );
  }
}
