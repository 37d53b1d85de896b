/**
 * Supported language catalog, loaded from data/languages.json.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

export interface Language {
  code: string;
  name: string;
}

/** Source-only pseudo language asking the provider to detect the input */
export const AUTO_DETECT = "auto";

const languageFileSchema = z.array(
  z.object({
    code: z.string().min(2),
    name: z.string().min(1),
  }),
);

function titleCase(value: string): string {
  return value.replace(/(^|[\s-])(\p{L})/gu, (_match, lead: string, letter: string) => lead + letter.toUpperCase());
}

export class LanguageCatalog {
  private readonly byCode = new Map<string, Language>();
  private readonly byName = new Map<string, string>();
  private readonly sorted: Language[];

  constructor(languages: Language[]) {
    for (const language of languages) {
      const code = language.code.toLowerCase();
      this.byCode.set(code, { code, name: language.name });
      this.byName.set(language.name.toLowerCase(), code);
    }
    this.sorted = [...this.byCode.values()].sort((a, b) => a.name.localeCompare(b.name, "en"));
  }

  static fromFile(path: URL = new URL("../data/languages.json", import.meta.url)): LanguageCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
    return new LanguageCatalog(languageFileSchema.parse(raw));
  }

  /** Every language, sorted by display name */
  list(): Language[] {
    return this.sorted.map((language) => ({ ...language }));
  }

  has(code: string): boolean {
    return this.byCode.has(code.toLowerCase());
  }

  get size(): number {
    return this.byCode.size;
  }

  /**
   * Resolve a code or display name (case-insensitive) to a code.
   * "auto" is only accepted when `allowAuto` is set.
   */
  resolve(input: string, options: { allowAuto?: boolean } = {}): string | null {
    const normalized = input.trim().toLowerCase();
    if (!normalized) return null;
    if (normalized === AUTO_DETECT) {
      return options.allowAuto ? AUTO_DETECT : null;
    }
    if (this.byCode.has(normalized)) return normalized;
    return this.byName.get(normalized) ?? null;
  }

  /** Display name, or the title-cased code when unknown */
  nameOf(code: string): string {
    if (code === AUTO_DETECT) return "Auto-detect";
    return this.byCode.get(code.toLowerCase())?.name ?? titleCase(code);
  }
}

let defaultCatalog: LanguageCatalog | null = null;

export function getLanguageCatalog(): LanguageCatalog {
  if (!defaultCatalog) {
    defaultCatalog = LanguageCatalog.fromFile();
  }
  return defaultCatalog;
}
