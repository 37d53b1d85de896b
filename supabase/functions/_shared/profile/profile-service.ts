/**
 * Profile Service
 *
 * Login bookkeeping, preferred languages, the favorite language pair and
 * free-form preferences.
 */

import { NotFoundError, ValidationError } from "../errors.ts";
import type { TranslationLedger } from "../ledger/ledger.ts";
import { pairKey, type PreferenceCategory, type UserPreference, type UserProfile } from "../ledger/types.ts";
import type { JsonValue } from "../schemas/common.ts";
import type { LanguageCatalog } from "../translation/languages.ts";
import { type UserInfoView, toUserInfo } from "../analytics/aggregation.ts";

export interface PreferenceView {
  key: string;
  value: JsonValue;
  category: PreferenceCategory;
  updated_at: string;
}

function toPreferenceView(preference: UserPreference): PreferenceView {
  return {
    key: preference.key,
    value: preference.value,
    category: preference.category,
    updated_at: preference.updatedAt.toISOString(),
  };
}

export class ProfileService {
  constructor(
    private readonly ledger: TranslationLedger,
    private readonly languages: LanguageCatalog,
  ) {}

  private resolve(input: string, role: "source" | "target"): string {
    const code = this.languages.resolve(input, { allowAuto: role === "source" });
    if (!code) {
      throw new ValidationError(`Unsupported ${role} language: ${input}`);
    }
    return code;
  }

  private async requireUser(userEmail: string): Promise<UserProfile> {
    const user = await this.ledger.getUser(userEmail);
    if (!user) {
      throw new NotFoundError("User", userEmail);
    }
    return user;
  }

  /** Create the user on first login; always stamps last_login */
  async login(userEmail: string, fullName?: string): Promise<UserInfoView> {
    return toUserInfo(await this.ledger.touchLogin(userEmail, fullName));
  }

  async updateLanguages(
    userEmail: string,
    update: { sourceLanguage?: string; targetLanguage?: string },
  ): Promise<UserInfoView> {
    const sourceLanguage = update.sourceLanguage === undefined ? undefined : this.resolve(update.sourceLanguage, "source");
    const targetLanguage = update.targetLanguage === undefined ? undefined : this.resolve(update.targetLanguage, "target");

    const user = await this.ledger.updateLanguagePreferences(userEmail, { sourceLanguage, targetLanguage });
    if (!user) {
      throw new NotFoundError("User", userEmail);
    }
    return toUserInfo(user);
  }

  /**
   * Marking a pair as favorite clears the flag on every other pair.
   */
  async setFavoritePair(
    userEmail: string,
    source: string,
    target: string,
    favorite: boolean,
  ): Promise<{ pair: string; is_favorite: boolean }> {
    const sourceLanguage = this.resolve(source, "source");
    const targetLanguage = this.resolve(target, "target");
    await this.requireUser(userEmail);

    const updated = await this.ledger.setFavoritePair(userEmail, sourceLanguage, targetLanguage, favorite);
    const pair = pairKey(sourceLanguage, targetLanguage);
    if (!updated) {
      throw new NotFoundError("Language pair", pair);
    }
    return { pair, is_favorite: favorite };
  }

  async setPreference(
    userEmail: string,
    key: string,
    value: JsonValue,
    category: PreferenceCategory,
  ): Promise<PreferenceView> {
    await this.requireUser(userEmail);
    return toPreferenceView(await this.ledger.setPreference(userEmail, key, value, category));
  }

  async getPreferences(userEmail: string): Promise<PreferenceView[]> {
    await this.requireUser(userEmail);
    const preferences = await this.ledger.listPreferences(userEmail);
    return preferences.map(toPreferenceView);
  }
}
