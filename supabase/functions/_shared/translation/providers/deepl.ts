/**
 * DeepL v2 REST provider.
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

export interface DeepLConfig {
  apiKey: string;
  /** e.g. https://api-free.deepl.com */
  baseUrl: string;
  timeoutMs: number;
}

const responseSchema = z.object({
  translations: z.array(
    z.object({
      text: z.string(),
      detected_source_language: z.string().optional(),
    }),
  ),
});

// DeepL wants regional variants for a few targets and plain codes for sources
const TARGET_OVERRIDES: Record<string, string> = {
  en: "EN-US",
  pt: "PT-BR",
  "zh-cn": "ZH-HANS",
  "zh-tw": "ZH-HANT",
  no: "NB",
};

const SOURCE_OVERRIDES: Record<string, string> = {
  "zh-cn": "ZH",
  "zh-tw": "ZH",
  no: "NB",
};

export function toDeepLTarget(code: string): string {
  return TARGET_OVERRIDES[code] ?? code.toUpperCase();
}

export function toDeepLSource(code: string): string {
  return SOURCE_OVERRIDES[code] ?? code.split("-")[0].toUpperCase();
}

export class DeepLProvider implements TranslationProvider {
  readonly name = "deepl";

  constructor(private readonly config: DeepLConfig) {}

  async translate(params: TranslateParams): AsyncResult<ProviderTranslation, ProviderFailure> {
    const body: Record<string, unknown> = {
      text: [params.text],
      target_lang: toDeepLTarget(params.targetLanguage),
    };
    if (params.sourceLanguage !== AUTO_DETECT) {
      body.source_lang = toDeepLSource(params.sourceLanguage);
    }

    const response = await requestJson(
      `${this.config.baseUrl}/v2/translate`,
      {
        method: "POST",
        headers: {
          "Authorization": `DeepL-Auth-Key ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
      },
      this.config.timeoutMs,
      "DeepL translate",
    );
    if (isErr(response)) {
      return response;
    }

    const parsed = responseSchema.safeParse(response.value);
    const translation = parsed.success ? parsed.data.translations[0] : undefined;
    if (!translation || !translation.text.trim()) {
      logger.warn("DeepL returned no translation", { targetLanguage: params.targetLanguage });
      return err(transientFailure("DeepL returned an empty translation"));
    }

    return ok({
      text: translation.text,
      confidence: null,
      detectedSourceLanguage: translation.detected_source_language?.toLowerCase() ?? null,
    });
  }
}
