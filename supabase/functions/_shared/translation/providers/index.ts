/**
 * Provider selection from configuration.
 */

import type { AppConfig } from "../../config.ts";
import { DeepLProvider } from "./deepl.ts";
import { GoogleTranslateProvider } from "./google.ts";
import type { TranslationProvider } from "./types.ts";

export function createProvider(config: AppConfig["provider"]): TranslationProvider {
  switch (config.name) {
    case "deepl":
      return new DeepLProvider({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
      });
    case "google":
      return new GoogleTranslateProvider({
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
      });
  }
}

export type {
  ProviderFailure,
  ProviderFailureKind,
  ProviderTranslation,
  TranslateParams,
  TranslationProvider,
} from "./types.ts";
export { permanentFailure, transientFailure } from "./types.ts";
