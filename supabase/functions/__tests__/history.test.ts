/**
 * History Service Tests
 */

import assert from "node:assert/strict";
import { beforeEach, test } from "node:test";
import { relevanceOf } from "../_shared/ledger/types.ts";
import { appendAt, createTestServices, newEvent, silenceLogs, TEST_USER, type TestServices } from "./test-utils.ts";

silenceLogs();

let services: TestServices;

beforeEach(() => {
  services = createTestServices();
});

async function seedSearchable(): Promise<void> {
  const { memoryLedger, clock } = services;
  await appendAt(memoryLedger, clock, "2026-03-10T10:00:00Z", {
    originalText: "hello world",
    translatedText: "hola mundo",
  });
  await appendAt(memoryLedger, clock, "2026-03-10T11:00:00Z", {
    originalText: "hello hello",
    translatedText: "hola",
  });
  await appendAt(memoryLedger, clock, "2026-03-10T12:00:00Z", {
    originalText: "goodbye",
    translatedText: "adiós",
  });
}

test("History - list pages newest first", async () => {
  for (let i = 0; i < 25; i++) {
    services.clock.advance(1000);
    await services.memoryLedger.append(newEvent({ originalText: `text ${i + 1}` }));
  }

  const first = await services.history.list(TEST_USER, { page: 1, perPage: 20 });
  const second = await services.history.list(TEST_USER, { page: "2", perPage: "20" });

  assert.equal(first.translations.length, 20);
  assert.equal(first.translations[0].original_text, "text 25");
  assert.deepEqual(first.pagination, { page: 1, per_page: 20, has_more: true });
  assert.equal(second.translations.length, 5);
  assert.deepEqual(second.pagination, { page: 2, per_page: 20, has_more: false });
});

test("History - list filters by type", async () => {
  const { memoryLedger, clock } = services;
  await appendAt(memoryLedger, clock, "2026-03-10T10:00:00Z");
  await appendAt(memoryLedger, clock, "2026-03-10T11:00:00Z", { translationType: "speech" });

  const page = await services.history.list(TEST_USER, { type: "speech" });

  assert.equal(page.translations.length, 1);
  assert.equal(page.translations[0].translation_type, "speech");
  assert.equal(page.translations[0].created_at, "2026-03-10T11:00:00.000Z");
});

test("History - empty history", async () => {
  const page = await services.history.list(TEST_USER);

  assert.deepEqual(page, { translations: [], pagination: { page: 1, per_page: 20, has_more: false } });
});

test("History - search ranks by relevance", async () => {
  await seedSearchable();

  const view = await services.history.search(TEST_USER, "hello");

  assert.equal(view.query, "hello");
  assert.equal(view.count, 2);
  assert.deepEqual(view.results.map((result) => [result.original_text, result.relevance]), [
    ["hello hello", 4],
    ["hello world", 2],
  ]);
});

test("History - equal relevance goes to the newer event", async () => {
  await seedSearchable();

  const view = await services.history.search(TEST_USER, "HOLA");

  assert.deepEqual(view.results.map((result) => [result.original_text, result.relevance]), [
    ["hello hello", 1],
    ["hello world", 1],
  ]);
});

test("History - unique substring finds one event", async () => {
  await seedSearchable();

  const view = await services.history.search(TEST_USER, " goodbye ");

  assert.equal(view.query, "goodbye");
  assert.equal(view.count, 1);
  assert.equal(view.results[0].translated_text, "adiós");
  assert.equal(view.results[0].relevance, 2);
});

test("History - search limit", async () => {
  await seedSearchable();

  const view = await services.history.search(TEST_USER, "o", 1);

  assert.equal(view.count, 1);
});

test("History - search ranks an older strong match above hundreds of newer weak ones", async () => {
  await appendAt(services.ledger, services.clock, "2026-03-01T10:00:00Z", {
    originalText: "cat cat cat cat cat",
    translatedText: "gato",
  });
  for (let i = 0; i < 600; i++) {
    services.clock.advance(60_000);
    await services.ledger.append(newEvent({ originalText: `a cat ${i}`, translatedText: "un gato" }));
  }

  const view = await services.history.search(TEST_USER, "cat", 2);

  assert.deepEqual(view.results.map((result) => [result.original_text, result.relevance]), [
    ["cat cat cat cat cat", 10],
    ["a cat 599", 2],
  ]);
});

test("History - empty search query is rejected", async () => {
  await assert.rejects(services.history.search(TEST_USER, "   "), {
    code: "VALIDATION_ERROR",
    message: "Search query must not be empty",
  });
});

test("History - relevance counts original matches double", () => {
  const event = { ...newEvent({ originalText: "Tea, tea", translatedText: "Té" }), id: 1, createdAt: new Date() };

  assert.equal(relevanceOf(event, "tea"), 4);
  assert.equal(relevanceOf(event, "té"), 1);
});

test("History - get and delete one event", async () => {
  const { memoryLedger, clock } = services;
  const event = await appendAt(memoryLedger, clock, "2026-03-10T10:00:00Z");

  const entry = await services.history.get(TEST_USER, event.id);
  assert.equal(entry.original_text, "good morning");
  assert.equal(entry.confidence_score, 0.9);

  assert.deepEqual(await services.history.delete(TEST_USER, event.id), { id: event.id, deleted: true });
  await assert.rejects(services.history.get(TEST_USER, event.id), {
    code: "NOT_FOUND",
    message: `Translation with id '${event.id}' not found`,
  });
  await assert.rejects(services.history.delete(TEST_USER, event.id), { code: "NOT_FOUND" });
});

test("History - clear requires confirmation", async () => {
  const { memoryLedger, clock } = services;
  await appendAt(memoryLedger, clock, "2026-03-10T10:00:00Z");
  await appendAt(memoryLedger, clock, "2026-03-10T11:00:00Z");

  await assert.rejects(services.history.clear(TEST_USER, false), {
    code: "VALIDATION_ERROR",
    message: "Clearing history requires confirm=true",
  });
  assert.deepEqual(await services.history.clear(TEST_USER, true), { deleted_count: 2 });
  assert.deepEqual(await services.history.clear(TEST_USER, true), { deleted_count: 0 });
});
