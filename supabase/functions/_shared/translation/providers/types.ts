/**
 * Translation provider contract.
 *
 * Providers never throw for upstream trouble: every outcome comes back as a
 * Result so the gateway's retry loop can branch on the failure kind.
 */

import type { AsyncResult } from "../../result.ts";

/**
 * `transient`: worth retrying (timeout, connection error, 408/429/5xx,
 * empty or unreadable response). `permanent`: retrying cannot help
 * (other 4xx, unsupported language).
 */
export type ProviderFailureKind = "transient" | "permanent";

export interface ProviderFailure {
  kind: ProviderFailureKind;
  reason: string;
  status?: number;
}

export interface ProviderTranslation {
  text: string;
  /** 0..1 when the provider reports one */
  confidence: number | null;
  detectedSourceLanguage: string | null;
}

export interface TranslateParams {
  text: string;
  /** Catalog code, or "auto" */
  sourceLanguage: string;
  targetLanguage: string;
}

export interface TranslationProvider {
  readonly name: string;
  translate(params: TranslateParams): AsyncResult<ProviderTranslation, ProviderFailure>;
}

export function transientFailure(reason: string, status?: number): ProviderFailure {
  return { kind: "transient", reason, status };
}

export function permanentFailure(reason: string, status?: number): ProviderFailure {
  return { kind: "permanent", reason, status };
}
