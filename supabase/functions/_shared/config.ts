/**
 * Environment Configuration
 *
 * Reads and validates every environment variable once at startup so a
 * misconfigured deployment fails before serving traffic.
 *
 * @module config
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.ts";
import { isLogLevel, type LogLevel } from "./logger.ts";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const intWithDefault = (fallback: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const envSchema = z
  .object({
    PORT: intWithDefault(8787, 1, 65535),
    ENVIRONMENT: z
      .preprocess(emptyToUndefined, z.enum(["development", "test", "production"]).default("development")),
    LOG_LEVEL: z
      .preprocess(emptyToUndefined, z.string().default("info"))
      .refine(isLogLevel, { message: "LOG_LEVEL must be one of debug, info, warn, error" }),
    LEDGER_DRIVER: z.preprocess(emptyToUndefined, z.enum(["supabase", "memory"]).default("supabase")),
    SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    TRANSLATE_PROVIDER: z.preprocess(emptyToUndefined, z.enum(["deepl", "google"]).default("deepl")),
    DEEPL_API_KEY: optionalString,
    DEEPL_API_BASE: z.preprocess(
      emptyToUndefined,
      z.string().url().default("https://api-free.deepl.com"),
    ),
    GOOGLE_TRANSLATE_API_KEY: optionalString,
    MAX_TEXT_LENGTH: intWithDefault(5000, 1, 100000),
    COOLDOWN_MS: intWithDefault(20000, 0, 3600000),
    PROVIDER_TIMEOUT_MS: intWithDefault(30000, 100, 300000),
  })
  .superRefine((env, ctx) => {
    if (env.LEDGER_DRIVER === "supabase") {
      if (!env.SUPABASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["SUPABASE_URL"], message: "Required when LEDGER_DRIVER=supabase" });
      }
      if (!env.SUPABASE_SERVICE_ROLE_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["SUPABASE_SERVICE_ROLE_KEY"],
          message: "Required when LEDGER_DRIVER=supabase",
        });
      }
    }
    if (env.TRANSLATE_PROVIDER === "deepl" && !env.DEEPL_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["DEEPL_API_KEY"], message: "Required when TRANSLATE_PROVIDER=deepl" });
    }
    if (env.TRANSLATE_PROVIDER === "google" && !env.GOOGLE_TRANSLATE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GOOGLE_TRANSLATE_API_KEY"],
        message: "Required when TRANSLATE_PROVIDER=google",
      });
    }
  });

type ParsedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  environment: ParsedEnv["ENVIRONMENT"];
  logLevel: LogLevel;
  ledger:
    | { driver: "memory" }
    | { driver: "supabase"; url: string; serviceRoleKey: string };
  provider:
    | { name: "deepl"; apiKey: string; baseUrl: string; timeoutMs: number }
    | { name: "google"; apiKey: string; timeoutMs: number };
  maxTextLength: number;
  cooldownMs: number;
}

export type EnvSource = Record<string, string | undefined>;

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  config?: AppConfig;
}

function toAppConfig(env: ParsedEnv): AppConfig {
  const ledger: AppConfig["ledger"] =
    env.LEDGER_DRIVER === "supabase" && env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
      ? { driver: "supabase", url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
      : { driver: "memory" };

  const provider: AppConfig["provider"] = env.TRANSLATE_PROVIDER === "google"
    ? { name: "google", apiKey: env.GOOGLE_TRANSLATE_API_KEY ?? "", timeoutMs: env.PROVIDER_TIMEOUT_MS }
    : {
      name: "deepl",
      apiKey: env.DEEPL_API_KEY ?? "",
      baseUrl: env.DEEPL_API_BASE.replace(/\/+$/, ""),
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
    };

  return {
    port: env.PORT,
    environment: env.ENVIRONMENT,
    logLevel: env.LOG_LEVEL,
    ledger,
    provider,
    maxTextLength: env.MAX_TEXT_LENGTH,
    cooldownMs: env.COOLDOWN_MS,
  };
}

/**
 * Validate an environment without throwing.
 *
 * @example
 * ```typescript
 * const result = validateEnv(process.env);
 * if (!result.valid) console.error(result.errors.join("\n"));
 * ```
 */
export function validateEnv(env: EnvSource): ConfigValidationResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { valid: true, errors: [], config: toAppConfig(parsed.data) };
}

/**
 * Parse the environment, throwing ConfigurationError listing every problem.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const result = validateEnv(env);
  if (!result.valid || !result.config) {
    throw new ConfigurationError(
      `Environment validation failed: ${result.errors.join("; ")}`,
      { errors: result.errors },
    );
  }
  return result.config;
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
