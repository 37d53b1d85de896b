/**
 * In-process ledger driver.
 *
 * Used for local runs (`LEDGER_DRIVER=memory`) and tests. Every mutation
 * computes its new state first and commits it in one synchronous step, so
 * a failure leaves nothing half-written and concurrent requests for the
 * same user never interleave inside a write.
 */

import { type PageRequest, pageRange, processPageResult } from "../pagination.ts";
import type { JsonValue } from "../schemas/common.ts";
import { type Clock, systemClock } from "../utils.ts";
import type { EventPage, LanguagePreferenceUpdate, LedgerDriver, TranslationLedger } from "./ledger.ts";
import { applyEventToRollup, removeEventFromRollup } from "./rollup.ts";
import {
  DEFAULT_SOURCE_LANG,
  DEFAULT_TARGET_LANG,
  defaultFullName,
  type EventFacts,
  type HistoryFilter,
  type LanguagePairRollup,
  type NewTranslationEvent,
  pairKey,
  type PreferenceCategory,
  relevanceOf,
  toFacts,
  type TranslationEvent,
  type UserPreference,
  type UserProfile,
} from "./types.ts";

export interface MemoryLedgerOptions {
  clock?: Clock;
}

function byNewest(a: TranslationEvent, b: TranslationEvent): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export class MemoryTranslationLedger implements TranslationLedger {
  readonly driver: LedgerDriver = "memory";

  private readonly clock: Clock;
  private nextId = 1;
  /** Per user, oldest first */
  private readonly events = new Map<string, TranslationEvent[]>();
  private readonly rollups = new Map<string, Map<string, LanguagePairRollup>>();
  private readonly users = new Map<string, UserProfile>();
  private readonly preferences = new Map<string, Map<string, UserPreference>>();

  constructor(options: MemoryLedgerOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  private newUser(email: string, now: Date, fullName?: string): UserProfile {
    return {
      email,
      fullName: fullName?.trim() || defaultFullName(email),
      preferredSourceLang: DEFAULT_SOURCE_LANG,
      preferredTargetLang: DEFAULT_TARGET_LANG,
      totalTranslations: 0,
      totalCharacters: 0,
      createdAt: now,
      lastLogin: null,
    };
  }

  append(input: NewTranslationEvent): Promise<TranslationEvent> {
    const userEmail = input.userEmail;
    const history = this.events.get(userEmail) ?? [];
    const previous = history.at(-1);

    let createdAt = this.clock.now();
    if (previous && createdAt.getTime() < previous.createdAt.getTime()) {
      createdAt = new Date(previous.createdAt.getTime());
    }

    const event: TranslationEvent = { ...input, id: this.nextId, createdAt };
    const user = this.users.get(userEmail) ?? this.newUser(userEmail, createdAt);
    const pairs = this.rollups.get(userEmail) ?? new Map<string, LanguagePairRollup>();
    const key = pairKey(event.sourceLanguage, event.targetLanguage);
    const rollup = applyEventToRollup(pairs.get(key), event);

    this.nextId += 1;
    history.push(event);
    this.events.set(userEmail, history);
    pairs.set(key, rollup);
    this.rollups.set(userEmail, pairs);
    this.users.set(userEmail, {
      ...user,
      totalTranslations: user.totalTranslations + 1,
      totalCharacters: user.totalCharacters + event.characterCount,
    });

    return Promise.resolve({ ...event });
  }

  getById(userEmail: string, id: number): Promise<TranslationEvent | null> {
    const event = this.events.get(userEmail)?.find((candidate) => candidate.id === id);
    return Promise.resolve(event ? { ...event } : null);
  }

  listByUser(userEmail: string, filter: HistoryFilter, page: PageRequest): Promise<EventPage> {
    const matching = (this.events.get(userEmail) ?? [])
      .filter((event) => !filter.type || event.translationType === filter.type)
      .sort(byNewest);

    const { from, to } = pageRange(page);
    const { items, hasMore } = processPageResult(matching.slice(from, to + 1), page.perPage);
    return Promise.resolve({ events: items.map((event) => ({ ...event })), hasMore });
  }

  deleteAllForUser(userEmail: string): Promise<number> {
    const deleted = this.events.get(userEmail)?.length ?? 0;
    const user = this.users.get(userEmail);

    this.events.delete(userEmail);
    this.rollups.delete(userEmail);
    if (user) {
      this.users.set(userEmail, { ...user, totalTranslations: 0, totalCharacters: 0 });
    }

    return Promise.resolve(deleted);
  }

  deleteById(userEmail: string, id: number): Promise<boolean> {
    const history = this.events.get(userEmail);
    const index = history?.findIndex((event) => event.id === id) ?? -1;
    if (!history || index < 0) {
      return Promise.resolve(false);
    }

    const event = history[index];
    const pairs = this.rollups.get(userEmail);
    const key = pairKey(event.sourceLanguage, event.targetLanguage);
    const rollup = pairs?.get(key);
    const remaining = history.filter((other) =>
      other.id !== id && pairKey(other.sourceLanguage, other.targetLanguage) === key
    );
    const nextRollup = rollup ? removeEventFromRollup(rollup, event, remaining) : null;
    const user = this.users.get(userEmail);

    history.splice(index, 1);
    if (pairs) {
      if (nextRollup) {
        pairs.set(key, nextRollup);
      } else {
        pairs.delete(key);
      }
    }
    if (user) {
      this.users.set(userEmail, {
        ...user,
        totalTranslations: Math.max(0, user.totalTranslations - 1),
        totalCharacters: Math.max(0, user.totalCharacters - event.characterCount),
      });
    }

    return Promise.resolve(true);
  }

  listFacts(userEmail: string, since?: Date): Promise<EventFacts[]> {
    const threshold = since?.getTime() ?? Number.NEGATIVE_INFINITY;
    const facts = (this.events.get(userEmail) ?? [])
      .filter((event) => event.createdAt.getTime() >= threshold)
      .map(toFacts);
    return Promise.resolve(facts);
  }

  listRollups(userEmail: string): Promise<LanguagePairRollup[]> {
    const pairs = this.rollups.get(userEmail);
    return Promise.resolve(pairs ? [...pairs.values()].map((rollup) => ({ ...rollup })) : []);
  }

  search(userEmail: string, query: string, limit: number): Promise<TranslationEvent[]> {
    const matches = (this.events.get(userEmail) ?? [])
      .map((event) => ({ event, relevance: relevanceOf(event, query) }))
      .filter(({ relevance }) => relevance > 0)
      .sort((a, b) => b.relevance - a.relevance || byNewest(a.event, b.event))
      .slice(0, limit)
      .map(({ event }) => ({ ...event }));
    return Promise.resolve(matches);
  }

  getUser(userEmail: string): Promise<UserProfile | null> {
    const user = this.users.get(userEmail);
    return Promise.resolve(user ? { ...user } : null);
  }

  touchLogin(userEmail: string, fullName?: string): Promise<UserProfile> {
    const now = this.clock.now();
    const user = this.users.get(userEmail) ?? this.newUser(userEmail, now, fullName);
    const updated = { ...user, lastLogin: now };
    this.users.set(userEmail, updated);
    return Promise.resolve({ ...updated });
  }

  updateLanguagePreferences(
    userEmail: string,
    update: LanguagePreferenceUpdate,
  ): Promise<UserProfile | null> {
    const user = this.users.get(userEmail);
    if (!user) {
      return Promise.resolve(null);
    }

    const updated: UserProfile = {
      ...user,
      preferredSourceLang: update.sourceLanguage ?? user.preferredSourceLang,
      preferredTargetLang: update.targetLanguage ?? user.preferredTargetLang,
    };
    this.users.set(userEmail, updated);
    return Promise.resolve({ ...updated });
  }

  setFavoritePair(
    userEmail: string,
    sourceLanguage: string,
    targetLanguage: string,
    favorite: boolean,
  ): Promise<boolean> {
    const pairs = this.rollups.get(userEmail);
    const key = pairKey(sourceLanguage, targetLanguage);
    const target = pairs?.get(key);
    if (!pairs || !target) {
      return Promise.resolve(false);
    }

    for (const [otherKey, rollup] of pairs) {
      if (otherKey === key) {
        pairs.set(otherKey, { ...rollup, isFavorite: favorite });
      } else if (favorite && rollup.isFavorite) {
        pairs.set(otherKey, { ...rollup, isFavorite: false });
      }
    }
    return Promise.resolve(true);
  }

  setPreference(
    userEmail: string,
    key: string,
    value: JsonValue,
    category: PreferenceCategory,
  ): Promise<UserPreference> {
    const preferences = this.preferences.get(userEmail) ?? new Map<string, UserPreference>();
    const preference: UserPreference = { key, value, category, updatedAt: this.clock.now() };
    preferences.set(key, preference);
    this.preferences.set(userEmail, preferences);
    return Promise.resolve({ ...preference });
  }

  listPreferences(userEmail: string): Promise<UserPreference[]> {
    const preferences = this.preferences.get(userEmail);
    const list = preferences ? [...preferences.values()] : [];
    return Promise.resolve(
      list
        .sort((a, b) => a.category.localeCompare(b.category) || a.key.localeCompare(b.key))
        .map((preference) => ({ ...preference })),
    );
  }

  ping(): Promise<void> {
    return Promise.resolve();
  }
}
