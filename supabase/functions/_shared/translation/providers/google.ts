/**
 * Google Cloud Translation v2 REST provider.
 */

import { z } from "zod";
import { logger } from "../../logger.ts";
import { err, isErr, ok, type AsyncResult } from "../../result.ts";
import { AUTO_DETECT } from "../languages.ts";
import { requestJson } from "./http.ts";
import {
  type ProviderFailure,
  type ProviderTranslation,
  type TranslateParams,
  type TranslationProvider,
  transientFailure,
} from "./types.ts";

export interface GoogleTranslateConfig {
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
}

const DEFAULT_BASE_URL = "https://translation.googleapis.com/language/translate/v2";

const responseSchema = z.object({
  data: z.object({
    translations: z.array(
      z.object({
        translatedText: z.string(),
        detectedSourceLanguage: z.string().optional(),
      }),
    ),
  }),
});

/** Google takes BCP-47 tags; region suffixes are upper case */
export function toGoogleLanguage(code: string): string {
  const [base, region] = code.split("-");
  return region ? `${base}-${region.toUpperCase()}` : base;
}

export class GoogleTranslateProvider implements TranslationProvider {
  readonly name = "google";

  constructor(private readonly config: GoogleTranslateConfig) {}

  async translate(params: TranslateParams): AsyncResult<ProviderTranslation, ProviderFailure> {
    const body: Record<string, unknown> = {
      q: params.text,
      target: toGoogleLanguage(params.targetLanguage),
      format: "text",
    };
    if (params.sourceLanguage !== AUTO_DETECT) {
      body.source = toGoogleLanguage(params.sourceLanguage);
    }

    const url = `${this.config.baseUrl ?? DEFAULT_BASE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await requestJson(
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
      this.config.timeoutMs,
      "Google translate",
    );
    if (isErr(response)) {
      return response;
    }

    const parsed = responseSchema.safeParse(response.value);
    const translation = parsed.success ? parsed.data.data.translations[0] : undefined;
    if (!translation || !translation.translatedText.trim()) {
      logger.warn("Google returned no translation", { targetLanguage: params.targetLanguage });
      return err(transientFailure("Google returned an empty translation"));
    }

    return ok({
      text: translation.translatedText,
      confidence: null,
      detectedSourceLanguage: translation.detectedSourceLanguage?.toLowerCase() ?? null,
    });
  }
}
