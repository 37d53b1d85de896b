/**
 * Translation Ledger
 *
 * Append-only store of translation events plus the per-user counters and
 * per-pair rollups derived from them. Two drivers implement it:
 * {@link SupabaseTranslationLedger} (Postgres through PostgREST/RPC) and
 * {@link MemoryTranslationLedger} (in-process).
 *
 * Guarantees every driver keeps:
 * - `append` inserts the event, updates the pair rollup and the user's
 *   counters as one unit; nothing is visible if it fails.
 * - Event timestamps never decrease for a user; ids break ties.
 * - `deleteAllForUser` removes events and rollups and zeroes counters as
 *   one unit.
 */

import type { PageRequest } from "../pagination.ts";
import type { JsonValue } from "../schemas/common.ts";
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

export type LedgerDriver = "supabase" | "memory";

export interface EventPage {
  events: TranslationEvent[];
  hasMore: boolean;
}

export interface LanguagePreferenceUpdate {
  sourceLanguage?: string;
  targetLanguage?: string;
}

export interface TranslationLedger {
  readonly driver: LedgerDriver;

  append(event: NewTranslationEvent): Promise<TranslationEvent>;

  getById(userEmail: string, id: number): Promise<TranslationEvent | null>;

  /** Newest first (`created_at DESC, id DESC`) */
  listByUser(userEmail: string, filter: HistoryFilter, page: PageRequest): Promise<EventPage>;

  /** Returns the number of events removed; 0 when there were none */
  deleteAllForUser(userEmail: string): Promise<number>;

  /** Removes one event and backs its contribution out of counters and rollup */
  deleteById(userEmail: string, id: number): Promise<boolean>;

  /** Text-free projection of events at or after `since` (all when omitted), oldest first */
  listFacts(userEmail: string, since?: Date): Promise<EventFacts[]>;

  listRollups(userEmail: string): Promise<LanguagePairRollup[]>;

  /**
   * Events whose original or translated text contains `query`
   * (case-insensitive), ranked by `relevanceOf` then newest first,
   * at most `limit`. Ranking covers every match, not a recent window.
   */
  search(userEmail: string, query: string, limit: number): Promise<TranslationEvent[]>;

  getUser(userEmail: string): Promise<UserProfile | null>;

  /** Create-or-get the user and stamp `last_login` */
  touchLogin(userEmail: string, fullName?: string): Promise<UserProfile>;

  updateLanguagePreferences(
    userEmail: string,
    update: LanguagePreferenceUpdate,
  ): Promise<UserProfile | null>;

  /**
   * Flag (or unflag) one pair as favorite; flagging clears every other pair.
   * Returns false when the pair has no rollup.
   */
  setFavoritePair(
    userEmail: string,
    sourceLanguage: string,
    targetLanguage: string,
    favorite: boolean,
  ): Promise<boolean>;

  setPreference(
    userEmail: string,
    key: string,
    value: JsonValue,
    category: PreferenceCategory,
  ): Promise<UserPreference>;

  listPreferences(userEmail: string): Promise<UserPreference[]>;

  /** Cheap round trip used by the health endpoint */
  ping(): Promise<void>;
}
