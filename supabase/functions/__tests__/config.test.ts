/**
 * Configuration Tests
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { loadConfig, validateEnv } from "../_shared/config.ts";
import { TEST_ENV } from "./test-utils.ts";

test("Config - defaults", () => {
  const config = loadConfig(TEST_ENV);

  assert.deepEqual(config, {
    port: 8787,
    environment: "test",
    logLevel: "info",
    ledger: { driver: "memory" },
    provider: {
      name: "deepl",
      apiKey: "test-secret",
      baseUrl: "https://api-free.deepl.com",
      timeoutMs: 30000,
    },
    maxTextLength: 5000,
    cooldownMs: 20000,
  });
});

test("Config - Supabase driver and Google provider", () => {
  const config = loadConfig({
    LEDGER_DRIVER: "supabase",
    SUPABASE_URL: "http://localhost:54321",
    SUPABASE_SERVICE_ROLE_KEY: "test-secret",
    TRANSLATE_PROVIDER: "google",
    GOOGLE_TRANSLATE_API_KEY: "test-secret",
    COOLDOWN_MS: "5000",
    PORT: "3000",
  });

  assert.deepEqual(config.ledger, {
    driver: "supabase",
    url: "http://localhost:54321",
    serviceRoleKey: "test-secret",
  });
  assert.deepEqual(config.provider, { name: "google", apiKey: "test-secret", timeoutMs: 30000 });
  assert.equal(config.cooldownMs, 5000);
  assert.equal(config.port, 3000);
});

test("Config - empty values count as unset", () => {
  const config = loadConfig({ ...TEST_ENV, COOLDOWN_MS: "", LOG_LEVEL: " " });

  assert.equal(config.cooldownMs, 20000);
  assert.equal(config.logLevel, "info");
});

test("Config - trailing slash dropped from the DeepL base URL", () => {
  const config = loadConfig({ ...TEST_ENV, DEEPL_API_BASE: "https://api.deepl.com/" });

  assert.deepEqual(config.provider, {
    name: "deepl",
    apiKey: "test-secret",
    baseUrl: "https://api.deepl.com",
    timeoutMs: 30000,
  });
});

test("Config - every missing credential is reported", () => {
  const result = validateEnv({});

  assert.equal(result.valid, false);
  assert.deepEqual(result.errors, [
    "SUPABASE_URL: Required when LEDGER_DRIVER=supabase",
    "SUPABASE_SERVICE_ROLE_KEY: Required when LEDGER_DRIVER=supabase",
    "DEEPL_API_KEY: Required when TRANSLATE_PROVIDER=deepl",
  ]);
});

test("Config - invalid values", () => {
  const result = validateEnv({ ...TEST_ENV, LOG_LEVEL: "verbose", COOLDOWN_MS: "-1" });

  assert.equal(result.valid, false);
  assert.equal(result.errors.length, 2);
  assert.ok(result.errors.includes("LOG_LEVEL: LOG_LEVEL must be one of debug, info, warn, error"));
  assert.ok(result.errors.some((message) => message.startsWith("COOLDOWN_MS: ")));
});

test("Config - loadConfig throws a configuration error", () => {
  assert.throws(() => loadConfig({ ...TEST_ENV, TRANSLATE_PROVIDER: "google" }), {
    code: "CONFIGURATION_ERROR",
    message: "Environment validation failed: GOOGLE_TRANSLATE_API_KEY: Required when TRANSLATE_PROVIDER=google",
  });
});
