/**
 * Function Tests
 *
 * Requests through the main router against in-memory services.
 */

import assert from "node:assert/strict";
import { beforeEach, test } from "node:test";
import { createApp } from "../main/index.ts";
import { resetServices, setServices } from "../_shared/services.ts";
import { createTestServices, failing, request, silenceLogs, TEST_USER, type TestServices } from "./test-utils.ts";

silenceLogs();

const app = createApp();
let services: TestServices;

beforeEach(() => {
  resetServices();
  services = createTestServices();
  setServices(services);
});

async function send(req: Request): Promise<Response> {
  return await app.fetch(req);
}

async function translateOnce(text: string = "hello"): Promise<Response> {
  return await send(
    request("POST", "/api-v1-translate", { body: { text, source_lang: "en", target_lang: "es" } }),
  );
}

// =============================================================================
// Translate
// =============================================================================

test("Translate - requires identity", async () => {
  const response = await send(
    request("POST", "/api-v1-translate", { body: { text: "hello", target_lang: "es" }, user: null }),
  );

  assert.equal(response.status, 401);
  assert.equal((await response.json()).code, "AUTHENTICATION_ERROR");
  assert.equal(services.scripted.calls.length, 0);
});

test("Translate - records the translation", async () => {
  const response = await translateOnce();

  assert.equal(response.status, 200);
  const body = await response.json();
  assert.deepEqual(body.data, {
    event_id: 1,
    translated_text: "[es] hello",
    source_language: "en",
    target_language: "es",
    character_count: 5,
    elapsed_ms: 0,
    confidence: 0.9,
    attempts: 1,
  });
  assert.equal((await services.ledger.getUser(TEST_USER))?.totalTranslations, 1);
});

test("Translate - second call inside the cooldown gets 429", async () => {
  await translateOnce();
  services.clock.advance(7500);

  const response = await translateOnce("again");

  assert.equal(response.status, 429);
  assert.equal(response.headers.get("Retry-After"), "13");
  const body = await response.json();
  assert.equal(body.retry_after, 13);
  assert.equal(body.error, "Please wait 13 seconds before translating again");
  assert.equal(services.scripted.calls.length, 1);

  services.clock.advance(12500);
  assert.equal((await translateOnce("again")).status, 200);
});

test("Translate - provider outage surfaces as 503 after backoff", async () => {
  services.scripted.enqueue(failing(), failing(), failing(), failing(), failing());

  const response = await translateOnce();

  assert.equal(response.status, 503);
  const body = await response.json();
  assert.equal(body.code, "UPSTREAM_UNAVAILABLE");
  assert.equal(body.error, "Translation service unavailable after 5 attempts");
  assert.deepEqual(services.delays, [2000, 4000, 8000, 16000]);
  assert.equal(await services.ledger.getUser(TEST_USER), null);
});

test("Translate - validation errors are 400", async () => {
  const empty = await send(request("POST", "/api-v1-translate", { body: { text: "  ", target_lang: "es" } }));
  assert.equal(empty.status, 400);
  assert.equal((await empty.json()).error, "Text to translate must not be empty");

  const unknown = await send(request("POST", "/api-v1-translate", { body: { text: "hi", target_lang: "klingon" } }));
  assert.equal(unknown.status, 400);
  assert.equal((await unknown.json()).error, "Unsupported target language: klingon");

  const missing = await send(request("POST", "/api-v1-translate", { body: { text: "hi" } }));
  assert.equal(missing.status, 400);
  assert.equal((await missing.json()).details[0].field, "target_lang");
});

test("Translate - batch", async () => {
  const response = await send(
    request("POST", "/api-v1-translate/batch", {
      body: { texts: ["one", "two"], source_lang: "English", target_lang: "French" },
    }),
  );

  assert.equal(response.status, 200);
  const body = await response.json();
  assert.equal(body.data.succeeded, 2);
  assert.equal(body.data.failed, 0);
  assert.deepEqual(body.data.results.map((item: { translated_text: string }) => item.translated_text), [
    "[fr] one",
    "[fr] two",
  ]);
});

test("Translate - languages need no identity", async () => {
  const response = await send(request("GET", "/api-v1-translate/languages", { user: null }));

  assert.equal(response.status, 200);
  const body = await response.json();
  assert.equal(body.data.count, 106);
  assert.deepEqual(body.data.languages[0], { code: "af", name: "Afrikaans" });
});

test("Translate - audit entry leaves the text out", async () => {
  await translateOnce("private words");

  const [entry] = services.auditLog.entries;
  assert.equal(entry.action, "api-v1-translate");
  assert.equal(entry.statusCode, 200);
  assert.deepEqual(entry.requestData, {
    query: {},
    source_lang: "en",
    target_lang: "es",
    event_id: 1,
    attempts: 1,
  });
});

// =============================================================================
// Dashboard and analytics
// =============================================================================

test("Dashboard - reflects a recorded translation", async () => {
  await translateOnce();

  const response = await send(request("GET", "/api-v1-dashboard?recent=3"));

  assert.equal(response.status, 200);
  const { data } = await response.json();
  assert.equal(data.user.email, TEST_USER);
  assert.deepEqual(data.today, { translations: 1, characters: 5 });
  assert.equal(data.recent_translations[0].translated_text, "[es] hello");
  assert.equal(data.top_language_pairs[0].pair, "en-es");
  assert.equal(data.top_language_pairs[0].target_name, "Spanish");
});

test("Dashboard - unknown user is 404", async () => {
  const response = await send(request("GET", "/api-v1-dashboard"));

  assert.equal(response.status, 404);
  assert.equal((await response.json()).code, "NOT_FOUND");
});

test("Analytics - statistics, daily and languages", async () => {
  await translateOnce();

  const statistics = await send(request("GET", "/api-v1-analytics/statistics?period=7"));
  assert.equal(statistics.status, 200);
  assert.equal((await statistics.json()).data.overall.total_translations, 1);

  const daily = await send(request("GET", "/api-v1-analytics/daily?days=1000"));
  const dailyBody = await daily.json();
  assert.equal(dailyBody.data.days, 365);
  assert.deepEqual(dailyBody.data.daily.map((row: { date: string }) => row.date), ["2026-03-10"]);

  const languages = await send(request("GET", "/api-v1-analytics/languages"));
  const languagesBody = await languages.json();
  assert.deepEqual(languagesBody.data.summary.most_used_pair, { pair: "en-es", usage_count: 1 });
});

test("Analytics - unsupported period is 400", async () => {
  const response = await send(request("GET", "/api-v1-analytics/statistics?period=14"));

  assert.equal(response.status, 400);
});

// =============================================================================
// History
// =============================================================================

test("History - list, search, get and delete", async () => {
  await translateOnce();

  const list = await (await send(request("GET", "/api-v1-history"))).json();
  assert.equal(list.data.translations.length, 1);
  assert.equal(list.data.pagination.has_more, false);

  const search = await (await send(request("GET", "/api-v1-history/search?q=HELLO"))).json();
  assert.equal(search.data.count, 1);
  assert.equal(search.data.results[0].relevance, 3);

  const entry = await send(request("GET", "/api-v1-history/1"));
  assert.equal((await entry.json()).data.original_text, "hello");

  const deleted = await send(request("DELETE", "/api-v1-history/1"));
  assert.deepEqual((await deleted.json()).data, { id: 1, deleted: true });

  const gone = await send(request("GET", "/api-v1-history/1"));
  assert.equal(gone.status, 404);
});

test("History - invalid id is 400", async () => {
  const response = await send(request("GET", "/api-v1-history/abc"));

  assert.equal(response.status, 400);
  assert.equal((await response.json()).error, "Invalid translation id");
});

test("History - clear needs confirm", async () => {
  await translateOnce();

  const refused = await send(request("POST", "/api-v1-history/clear", { body: {} }));
  assert.equal(refused.status, 400);

  const cleared = await send(request("POST", "/api-v1-history/clear?confirm=true"));
  assert.deepEqual((await cleared.json()).data, { deleted_count: 1 });
});

// =============================================================================
// Profile
// =============================================================================

test("Profile - login, languages and preferences", async () => {
  const login = await send(request("POST", "/api-v1-profile/login", { body: { full_name: "Ada Reader" } }));
  assert.equal((await login.json()).data.full_name, "Ada Reader");

  const languages = await send(
    request("PUT", "/api-v1-profile/languages", { body: { source_lang: "German", target_lang: "he" } }),
  );
  const languagesBody = await languages.json();
  assert.equal(languagesBody.data.preferred_source_lang, "de");
  assert.equal(languagesBody.data.preferred_target_lang, "he");

  await send(request("PUT", "/api-v1-profile/preferences", { body: { key: "theme", value: "dark", category: "ui" } }));
  const preferences = await (await send(request("GET", "/api-v1-profile/preferences"))).json();
  assert.deepEqual(preferences.data.preferences, [
    { key: "theme", value: "dark", category: "ui", updated_at: "2026-03-10T12:00:00.000Z" },
  ]);
});

test("Profile - empty language update is 400", async () => {
  await send(request("POST", "/api-v1-profile/login", { body: {} }));

  const response = await send(request("PUT", "/api-v1-profile/languages", { body: {} }));

  assert.equal(response.status, 400);
  assert.equal((await response.json()).error, "Provide source_lang or target_lang");
});

// =============================================================================
// Health and routing
// =============================================================================

test("Health - full report", async () => {
  const response = await send(request("GET", "/health", { user: null }));

  assert.equal(response.status, 200);
  const { data } = await response.json();
  assert.equal(data.status, "healthy");
  assert.equal(data.ledgerDriver, "memory");
  assert.equal(data.provider, "scripted");
  assert.equal(data.supportedLanguages, 106);
  assert.equal(data.services[0].service, "ledger");
});

test("Health - quick check", async () => {
  const response = await send(request("GET", "/health?quick=true", { user: null }));

  const { data } = await response.json();
  assert.equal(data.status, "ok");
  assert.equal(data.version, "1.0.0");
});

test("Router - unknown function is 404", async () => {
  const response = await send(request("GET", "/api-v1-nothing"));

  assert.equal(response.status, 404);
  assert.equal((await response.json()).error, "Function with id 'api-v1-nothing' not found");
});

test("Router - CORS preflight", async () => {
  const response = await send(
    new Request("http://localhost/api-v1-translate", {
      method: "OPTIONS",
      headers: { origin: "http://localhost:3000", "access-control-request-method": "POST" },
    }),
  );

  assert.equal(response.status, 204);
  assert.equal(response.headers.get("access-control-allow-origin"), "*");
});
