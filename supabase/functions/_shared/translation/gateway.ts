/**
 * Translation Gateway
 *
 * The only write path into the ledger. A call is validated, admitted
 * against the caller's cooldown, sent to the provider with exponential
 * backoff on transient failures, and on success recorded as exactly one
 * event.
 *
 * Failure map:
 * - bad input or a permanent provider rejection: ValidationError
 * - caller inside the cooldown: RateLimitError
 * - transient provider failures until attempts run out: UpstreamUnavailableError
 * - ledger write failed: PersistenceUnavailableError
 */

import {
  AppError,
  PersistenceUnavailableError,
  RateLimitError,
  TimeoutError,
  UpstreamUnavailableError,
  ValidationError,
} from "../errors.ts";
import type { TranslationLedger } from "../ledger/ledger.ts";
import type { TranslationType } from "../ledger/types.ts";
import { logger } from "../logger.ts";
import { isErr } from "../result.ts";
import { calculateDelay, DEFAULT_RETRY_CONFIG, retryResult, sleep as defaultSleep } from "../retry.ts";
import { type Clock, codePointLength, systemClock } from "../utils.ts";
import type { AdmissionController } from "./admission.ts";
import { AUTO_DETECT, type LanguageCatalog } from "./languages.ts";
import type { ProviderFailure, ProviderTranslation, TranslationProvider } from "./providers/index.ts";

export const MAX_BATCH_SIZE = 20;
/** Wall-clock budget for one batch; no provider attempt starts after it */
export const DEFAULT_BATCH_DEADLINE_MS = 60000;

export interface TranslateRequest {
  userEmail: string;
  text: string;
  /** Code or language name; "auto" allowed */
  sourceLanguage: string;
  targetLanguage: string;
  type?: TranslationType;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface TranslateResult {
  eventId: number;
  translatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
  characterCount: number;
  elapsedMs: number;
  confidence: number | null;
  attempts: number;
}

export interface BatchTranslateRequest extends Omit<TranslateRequest, "text"> {
  texts: string[];
}

export type BatchItemResult =
  | ({ index: number; originalText: string; ok: true } & TranslateResult)
  | { index: number; originalText: string; ok: false; error: string; code: string };

export interface BatchTranslateResult {
  results: BatchItemResult[];
  succeeded: number;
  failed: number;
}

export interface GatewayOptions {
  provider: TranslationProvider;
  ledger: TranslationLedger;
  admission: AdmissionController;
  languages: LanguageCatalog;
  /** Maximum code points per text (default 5000) */
  maxTextLength?: number;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
  initialDelayMs?: number;
  batchDeadlineMs?: number;
}

interface ValidatedInput {
  text: string;
  characterCount: number;
}

interface ResolvedLanguages {
  sourceLanguage: string;
  targetLanguage: string;
}

type ProviderOutcome =
  | { ok: true; translation: ProviderTranslation; attempts: number; elapsedMs: number }
  | { ok: false; error: AppError };

export class TranslationGateway {
  private readonly provider: TranslationProvider;
  private readonly ledger: TranslationLedger;
  private readonly admission: AdmissionController;
  private readonly languages: LanguageCatalog;
  private readonly maxTextLength: number;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly batchDeadlineMs: number;

  constructor(options: GatewayOptions) {
    this.provider = options.provider;
    this.ledger = options.ledger;
    this.admission = options.admission;
    this.languages = options.languages;
    this.maxTextLength = options.maxTextLength ?? 5000;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_RETRY_CONFIG.initialDelayMs;
    this.batchDeadlineMs = options.batchDeadlineMs ?? DEFAULT_BATCH_DEADLINE_MS;
  }

  /**
   * Translate one text and record it.
   */
  async translate(request: TranslateRequest): Promise<TranslateResult> {
    const input = this.validateText(request.text);
    const languages = this.resolveLanguages(request.sourceLanguage, request.targetLanguage);

    await this.admit(request.userEmail);

    const outcome = await this.callProvider(input.text, languages);
    if (!outcome.ok) {
      throw outcome.error;
    }

    return await this.record(request, input, languages, outcome);
  }

  /**
   * Translate up to {@link MAX_BATCH_SIZE} texts under a single admission.
   * Failures are reported per item. A ledger failure or the batch deadline
   * stops provider calls for the remaining items, which are reported with
   * the same error; items recorded before that stay in the result.
   */
  async translateBatch(request: BatchTranslateRequest): Promise<BatchTranslateResult> {
    if (request.texts.length === 0) {
      throw new ValidationError("At least one text is required");
    }
    if (request.texts.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`At most ${MAX_BATCH_SIZE} texts per batch`, {
        received: request.texts.length,
      });
    }

    const inputs = request.texts.map((text, index) => {
      try {
        return this.validateText(text);
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(`Text ${index + 1}: ${error.message}`, { index });
        }
        throw error;
      }
    });
    const languages = this.resolveLanguages(request.sourceLanguage, request.targetLanguage);

    await this.admit(request.userEmail);

    const deadline = this.clock.now().getTime() + this.batchDeadlineMs;
    const failedItem = (index: number, input: ValidatedInput, error: AppError): BatchItemResult => ({
      index,
      originalText: input.text,
      ok: false,
      error: error.message,
      code: error.code,
    });

    const results: BatchItemResult[] = [];
    let halted: AppError | null = null;
    for (const [index, input] of inputs.entries()) {
      if (!halted && this.clock.now().getTime() >= deadline) {
        logger.warn("Batch deadline reached", { remaining: inputs.length - index });
        halted = new TimeoutError("translateBatch", this.batchDeadlineMs);
      }
      if (halted) {
        results.push(failedItem(index, input, halted));
        continue;
      }

      const outcome = await this.callProvider(input.text, languages, deadline);
      if (!outcome.ok) {
        results.push(failedItem(index, input, outcome.error));
        continue;
      }

      try {
        const recorded = await this.record(request, input, languages, outcome);
        results.push({ index, originalText: input.text, ok: true, ...recorded });
      } catch (error) {
        if (!(error instanceof PersistenceUnavailableError)) throw error;
        halted = error;
        results.push(failedItem(index, input, error));
      }
    }

    const succeeded = results.filter((result) => result.ok).length;
    return { results, succeeded, failed: results.length - succeeded };
  }

  private validateText(raw: string): ValidatedInput {
    const text = raw.trim();
    if (!text) {
      throw new ValidationError("Text to translate must not be empty");
    }
    const characterCount = codePointLength(text);
    if (characterCount > this.maxTextLength) {
      throw new ValidationError(
        `Text is too long: ${characterCount} characters (maximum ${this.maxTextLength})`,
        { characterCount, maxTextLength: this.maxTextLength },
      );
    }
    return { text, characterCount };
  }

  private resolveLanguages(source: string, target: string): ResolvedLanguages {
    const sourceLanguage = this.languages.resolve(source, { allowAuto: true });
    if (!sourceLanguage) {
      throw new ValidationError(`Unsupported source language: ${source}`);
    }
    const targetLanguage = this.languages.resolve(target);
    if (!targetLanguage) {
      throw new ValidationError(`Unsupported target language: ${target}`);
    }
    return { sourceLanguage, targetLanguage };
  }

  private async admit(userEmail: string): Promise<void> {
    const decision = await this.admission.tryAdmit(userEmail);
    if (!decision.admitted) {
      const seconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
      logger.info("Translation throttled", { retryAfterMs: decision.retryAfterMs });
      throw new RateLimitError(
        decision.retryAfterMs,
        `Please wait ${seconds} seconds before translating again`,
      );
    }
  }

  /**
   * With a `deadline`, a transient failure is retried only when the backoff
   * wait ends before it.
   */
  private async callProvider(
    text: string,
    languages: ResolvedLanguages,
    deadline?: number,
  ): Promise<ProviderOutcome> {
    const startedAt = this.clock.now().getTime();
    const backoff = {
      initialDelayMs: this.initialDelayMs,
      maxDelayMs: DEFAULT_RETRY_CONFIG.maxDelayMs,
      backoffMultiplier: 2,
      jitterFactor: 0,
    };

    const outcome = await retryResult<ProviderTranslation, ProviderFailure>(
      (attempt) => {
        logger.debug("Provider attempt", { provider: this.provider.name, attempt });
        return this.provider.translate({ text, ...languages });
      },
      {
        maxAttempts: this.maxAttempts,
        ...backoff,
        sleep: this.sleep,
        shouldRetry: (failure, attempt) =>
          failure.kind === "transient" &&
          (deadline === undefined || this.clock.now().getTime() + calculateDelay(attempt, backoff) < deadline),
        onRetry: (failure, attempt, delayMs) => {
          logger.warn("Provider attempt failed, backing off", {
            provider: this.provider.name,
            attempt,
            delayMs,
            reason: failure.reason,
            status: failure.status,
          });
        },
      },
    );

    if (isErr(outcome)) {
      const { error: failure, attempts } = outcome.error;
      if (failure.kind === "permanent") {
        logger.warn("Provider rejected translation", {
          provider: this.provider.name,
          reason: failure.reason,
          status: failure.status,
        });
        return {
          ok: false,
          error: new ValidationError(`Translation rejected: ${failure.reason}`, {
            provider: this.provider.name,
            status: failure.status,
          }),
        };
      }
      logger.error("Provider unavailable, attempts exhausted", {
        provider: this.provider.name,
        attempts,
        reason: failure.reason,
      });
      return {
        ok: false,
        error: new UpstreamUnavailableError(this.provider.name, attempts, failure.reason),
      };
    }

    return {
      ok: true,
      translation: outcome.value.value,
      attempts: outcome.value.attempts,
      elapsedMs: Math.max(0, this.clock.now().getTime() - startedAt),
    };
  }

  private async record(
    request: Omit<TranslateRequest, "text">,
    input: ValidatedInput,
    languages: ResolvedLanguages,
    outcome: { translation: ProviderTranslation; attempts: number; elapsedMs: number },
  ): Promise<TranslateResult> {
    const { translation } = outcome;
    const sourceLanguage = languages.sourceLanguage === AUTO_DETECT && translation.detectedSourceLanguage
      ? this.languages.resolve(translation.detectedSourceLanguage) ?? AUTO_DETECT
      : languages.sourceLanguage;

    let eventId: number;
    try {
      const event = await this.ledger.append({
        userEmail: request.userEmail,
        sourceLanguage,
        targetLanguage: languages.targetLanguage,
        originalText: input.text,
        translatedText: translation.text,
        translationType: request.type ?? "text",
        characterCount: input.characterCount,
        translationTimeMs: outcome.elapsedMs,
        confidenceScore: translation.confidence,
        ipAddress: request.ipAddress ?? null,
        userAgent: request.userAgent ?? null,
      });
      eventId = event.id;
    } catch (error) {
      logger.error("Failed to record translation", error);
      throw error instanceof PersistenceUnavailableError
        ? error
        : new PersistenceUnavailableError("append", error);
    }

    logger.info("Translation recorded", {
      eventId,
      sourceLanguage,
      targetLanguage: languages.targetLanguage,
      characterCount: input.characterCount,
      attempts: outcome.attempts,
      elapsedMs: outcome.elapsedMs,
    });

    return {
      eventId,
      translatedText: translation.text,
      sourceLanguage,
      targetLanguage: languages.targetLanguage,
      characterCount: input.characterCount,
      elapsedMs: outcome.elapsedMs,
      confidence: translation.confidence,
      attempts: outcome.attempts,
    };
  }
}
