/**
 * History Service
 *
 * Paginated listing, search, single lookups and deletes over a user's
 * translation events.
 */

import { NotFoundError, ValidationError } from "../errors.ts";
import type { TranslationLedger } from "../ledger/ledger.ts";
import { relevanceOf, type TranslationEvent, type TranslationType } from "../ledger/types.ts";
import { logger } from "../logger.ts";
import { normalizePageRequest } from "../pagination.ts";

export const DEFAULT_SEARCH_LIMIT = 50;
export const MAX_SEARCH_LIMIT = 100;

export interface HistoryEntryView {
  id: number;
  original_text: string;
  translated_text: string;
  source_language: string;
  target_language: string;
  translation_type: TranslationType;
  character_count: number;
  translation_time_ms: number;
  confidence_score: number | null;
  created_at: string;
}

export interface HistoryPageView {
  translations: HistoryEntryView[];
  pagination: {
    page: number;
    per_page: number;
    has_more: boolean;
  };
}

export interface SearchResultView extends HistoryEntryView {
  relevance: number;
}

export interface SearchView {
  query: string;
  results: SearchResultView[];
  count: number;
}

export interface HistoryListOptions {
  page?: number | string;
  perPage?: number | string;
  type?: TranslationType;
}

export function toHistoryEntry(event: TranslationEvent): HistoryEntryView {
  return {
    id: event.id,
    original_text: event.originalText,
    translated_text: event.translatedText,
    source_language: event.sourceLanguage,
    target_language: event.targetLanguage,
    translation_type: event.translationType,
    character_count: event.characterCount,
    translation_time_ms: event.translationTimeMs,
    confidence_score: event.confidenceScore,
    created_at: event.createdAt.toISOString(),
  };
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_SEARCH_LIMIT);
}

export class HistoryService {
  constructor(private readonly ledger: TranslationLedger) {}

  async list(userEmail: string, options: HistoryListOptions = {}): Promise<HistoryPageView> {
    const page = normalizePageRequest(options.page, options.perPage);
    const result = await this.ledger.listByUser(userEmail, { type: options.type }, page);

    return {
      translations: result.events.map(toHistoryEntry),
      pagination: {
        page: page.page,
        per_page: page.perPage,
        has_more: result.hasMore,
      },
    };
  }

  async search(userEmail: string, rawQuery: string, limit?: number): Promise<SearchView> {
    const query = rawQuery.trim();
    if (!query) {
      throw new ValidationError("Search query must not be empty");
    }

    // The ledger ranks; relevance is recomputed only for the view
    const ranked = await this.ledger.search(userEmail, query, clampLimit(limit));
    const results = ranked.map((event): SearchResultView => ({
      ...toHistoryEntry(event),
      relevance: relevanceOf(event, query),
    }));

    return { query, results, count: results.length };
  }

  async get(userEmail: string, id: number): Promise<HistoryEntryView> {
    const event = await this.ledger.getById(userEmail, id);
    if (!event) {
      throw new NotFoundError("Translation", String(id));
    }
    return toHistoryEntry(event);
  }

  async delete(userEmail: string, id: number): Promise<{ id: number; deleted: true }> {
    const deleted = await this.ledger.deleteById(userEmail, id);
    if (!deleted) {
      throw new NotFoundError("Translation", String(id));
    }
    logger.info("Translation deleted", { id });
    return { id, deleted: true };
  }

  /**
   * Remove every event of the user. Requires an explicit `confirm === true`.
   */
  async clear(userEmail: string, confirm: boolean): Promise<{ deleted_count: number }> {
    if (confirm !== true) {
      throw new ValidationError("Clearing history requires confirm=true");
    }
    const deletedCount = await this.ledger.deleteAllForUser(userEmail);
    logger.info("Translation history cleared", { deletedCount });
    return { deleted_count: deletedCount };
  }
}
