/**
 * Translation Gateway Tests
 */

import assert from "node:assert/strict";
import { beforeEach, test } from "node:test";
import {
  PersistenceUnavailableError,
  RateLimitError,
  UpstreamUnavailableError,
  ValidationError,
} from "../_shared/errors.ts";
import { MemoryTranslationLedger } from "../_shared/ledger/memory-ledger.ts";
import type { NewTranslationEvent, TranslationEvent } from "../_shared/ledger/types.ts";
import { err, ok } from "../_shared/result.ts";
import { TranslationGateway } from "../_shared/translation/gateway.ts";
import { permanentFailure } from "../_shared/translation/providers/index.ts";
import {
  createTestServices,
  failing,
  FakeClock,
  recordingSleep,
  ScriptedProvider,
  silenceLogs,
  TEST_USER,
  translated,
} from "./test-utils.ts";

beforeEach(() => {
  silenceLogs();
});

function translateRequest(text: string = "hello", overrides: { sourceLanguage?: string; targetLanguage?: string } = {}) {
  return {
    userEmail: TEST_USER,
    text,
    sourceLanguage: overrides.sourceLanguage ?? "en",
    targetLanguage: overrides.targetLanguage ?? "es",
  };
}

class FailingLedger extends MemoryTranslationLedger {
  override append(_event: NewTranslationEvent): Promise<TranslationEvent> {
    return Promise.reject(new Error("connection reset"));
  }
}

/** Rejects only the second append */
class SecondAppendFailsLedger extends MemoryTranslationLedger {
  private appends = 0;

  override append(event: NewTranslationEvent): Promise<TranslationEvent> {
    this.appends += 1;
    if (this.appends === 2) {
      return Promise.reject(new Error("connection reset"));
    }
    return super.append(event);
  }
}

test("Gateway - translates, trims and records one event", async () => {
  const services = createTestServices();

  const result = await services.gateway.translate(translateRequest("  hello  ", { sourceLanguage: "English" }));

  assert.deepEqual(result, {
    eventId: 1,
    translatedText: "[es] hello",
    sourceLanguage: "en",
    targetLanguage: "es",
    characterCount: 5,
    elapsedMs: 0,
    confidence: 0.9,
    attempts: 1,
  });
  assert.deepEqual(services.scripted.calls, [{ text: "hello", sourceLanguage: "en", targetLanguage: "es" }]);

  const user = await services.ledger.getUser(TEST_USER);
  assert.equal(user?.totalTranslations, 1);
  assert.equal(user?.totalCharacters, 5);
});

test("Gateway - four transient failures then success waits 2/4/8/16 seconds", async () => {
  const provider = new ScriptedProvider([failing(), failing(), failing(), failing(), translated("hola")]);
  const services = createTestServices({ provider });

  const result = await services.gateway.translate(translateRequest());

  assert.equal(result.translatedText, "hola");
  assert.equal(result.attempts, 5);
  assert.equal(result.elapsedMs, 30000);
  assert.deepEqual(services.delays, [2000, 4000, 8000, 16000]);

  const stored = await services.ledger.getById(TEST_USER, result.eventId);
  assert.equal(stored?.translationTimeMs, 30000);
});

test("Gateway - five transient failures is UpstreamUnavailable and records nothing", async () => {
  const provider = new ScriptedProvider([failing(), failing(), failing(), failing(), failing()]);
  const services = createTestServices({ provider });

  await assert.rejects(services.gateway.translate(translateRequest()), (error: unknown) => {
    assert.ok(error instanceof UpstreamUnavailableError);
    assert.equal(error.attempts, 5);
    assert.equal(error.message, "Translation service unavailable after 5 attempts");
    return true;
  });

  assert.equal(provider.calls.length, 5);
  assert.equal(await services.ledger.getUser(TEST_USER), null);
  assert.deepEqual(await services.ledger.listFacts(TEST_USER), []);
});

test("Gateway - permanent provider failure fails fast as ValidationError", async () => {
  const provider = new ScriptedProvider([err(permanentFailure("Provider returned 400", 400))]);
  const services = createTestServices({ provider });

  await assert.rejects(services.gateway.translate(translateRequest()), ValidationError);
  assert.equal(provider.calls.length, 1);
  assert.deepEqual(services.delays, []);
});

test("Gateway - second request inside the cooldown is rate limited", async () => {
  const services = createTestServices();

  await services.gateway.translate(translateRequest());
  services.clock.advance(7500);

  await assert.rejects(services.gateway.translate(translateRequest()), (error: unknown) => {
    assert.ok(error instanceof RateLimitError);
    assert.equal(error.retryAfterSeconds, 13);
    assert.equal(error.message, "Please wait 13 seconds before translating again");
    return true;
  });
  assert.equal(services.scripted.calls.length, 1);
});

test("Gateway - a failed call still consumes the cooldown", async () => {
  const provider = new ScriptedProvider([err(permanentFailure("Provider returned 400", 400))]);
  const services = createTestServices({ provider });

  await assert.rejects(services.gateway.translate(translateRequest()), ValidationError);
  await assert.rejects(services.gateway.translate(translateRequest()), RateLimitError);
});

test("Gateway - invalid input is rejected before admission", async () => {
  const services = createTestServices();

  await assert.rejects(services.gateway.translate(translateRequest("   ")), ValidationError);
  await assert.rejects(services.gateway.translate(translateRequest("a".repeat(5001))), ValidationError);
  await assert.rejects(
    services.gateway.translate(translateRequest("hello", { targetLanguage: "xx" })),
    ValidationError,
  );
  await assert.rejects(
    services.gateway.translate(translateRequest("hello", { targetLanguage: "auto" })),
    ValidationError,
  );

  const result = await services.gateway.translate(translateRequest());
  assert.equal(result.attempts, 1);
  assert.equal(services.scripted.calls.length, 1);
});

test("Gateway - length limit counts code points", async () => {
  const services = createTestServices();

  const result = await services.gateway.translate(translateRequest("😀".repeat(5000)));

  assert.equal(result.characterCount, 5000);
});

test("Gateway - ledger write failure is PersistenceUnavailable", async () => {
  const clock = new FakeClock();
  const services = createTestServices({ clock, overrides: { ledger: new FailingLedger({ clock }) } });

  await assert.rejects(services.gateway.translate(translateRequest()), PersistenceUnavailableError);
  assert.equal(services.scripted.calls.length, 1);
});

test("Gateway - auto source records the detected language", async () => {
  const provider = new ScriptedProvider([ok({ text: "hello", confidence: null, detectedSourceLanguage: "FR" })]);
  const services = createTestServices({ provider });

  const result = await services.gateway.translate(translateRequest("bonjour", { sourceLanguage: "auto", targetLanguage: "en" }));

  assert.equal(result.sourceLanguage, "fr");
  assert.equal(result.confidence, null);
  assert.deepEqual(provider.calls[0], { text: "bonjour", sourceLanguage: "auto", targetLanguage: "en" });
});

test("Gateway - batch reports per-item failures and records successes", async () => {
  const provider = new ScriptedProvider([
    translated("uno"),
    err(permanentFailure("Provider returned 400", 400)),
    translated("tres"),
  ]);
  const services = createTestServices({ provider });

  const result = await services.gateway.translateBatch({
    userEmail: TEST_USER,
    texts: ["one", "two", "three"],
    sourceLanguage: "en",
    targetLanguage: "es",
  });

  assert.equal(result.succeeded, 2);
  assert.equal(result.failed, 1);
  assert.deepEqual(result.results.map((item) => item.ok), [true, false, true]);
  const failed = result.results[1];
  assert.ok(!failed.ok);
  assert.equal(failed.code, "VALIDATION_ERROR");
  assert.equal(failed.error, "Translation rejected: Provider returned 400");

  const user = await services.ledger.getUser(TEST_USER);
  assert.equal(user?.totalTranslations, 2);
  assert.equal(user?.totalCharacters, 8);
});

test("Gateway - batch takes one admission", async () => {
  const services = createTestServices();

  await services.gateway.translateBatch({ userEmail: TEST_USER, texts: ["a", "b"], sourceLanguage: "en", targetLanguage: "de" });

  await assert.rejects(services.gateway.translate(translateRequest()), RateLimitError);
});

test("Gateway - batch validates every text before calling the provider", async () => {
  const services = createTestServices();

  await assert.rejects(
    services.gateway.translateBatch({ userEmail: TEST_USER, texts: ["fine", " "], sourceLanguage: "en", targetLanguage: "es" }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.message, "Text 2: Text to translate must not be empty");
      return true;
    },
  );
  await assert.rejects(
    services.gateway.translateBatch({
      userEmail: TEST_USER,
      texts: Array.from({ length: 21 }, (_, index) => `text ${index}`),
      sourceLanguage: "en",
      targetLanguage: "es",
    }),
    ValidationError,
  );
  assert.equal(services.scripted.calls.length, 0);
});

test("Gateway - batch reports a ledger failure inline and keeps recorded items", async () => {
  const clock = new FakeClock();
  const ledger = new SecondAppendFailsLedger({ clock });
  const services = createTestServices({ clock, overrides: { ledger } });

  const result = await services.gateway.translateBatch({
    userEmail: TEST_USER,
    texts: ["one", "two", "three"],
    sourceLanguage: "en",
    targetLanguage: "es",
  });

  assert.equal(result.succeeded, 1);
  assert.equal(result.failed, 2);
  assert.deepEqual(
    result.results.map((item) => (item.ok ? [item.index, item.translatedText] : [item.index, item.code, item.error])),
    [
      [0, "[es] one"],
      [1, "PERSISTENCE_UNAVAILABLE", "Ledger unavailable during append"],
      [2, "PERSISTENCE_UNAVAILABLE", "Ledger unavailable during append"],
    ],
  );
  assert.equal(services.scripted.calls.length, 2);
  assert.equal((await ledger.getUser(TEST_USER))?.totalTranslations, 1);
});

test("Gateway - batch stops calling the provider after its deadline", async () => {
  const clock = new FakeClock();
  const provider = new ScriptedProvider([], () => clock.advance(3000));
  const services = createTestServices({ clock, provider });
  const gateway = new TranslationGateway({
    provider,
    ledger: services.ledger,
    admission: services.admission,
    languages: services.languages,
    clock,
    batchDeadlineMs: 10000,
  });

  const result = await gateway.translateBatch({
    userEmail: TEST_USER,
    texts: ["a", "b", "c", "d", "e"],
    sourceLanguage: "en",
    targetLanguage: "es",
  });

  assert.equal(provider.calls.length, 4);
  assert.deepEqual(result.results.map((item) => item.ok), [true, true, true, true, false]);
  const skipped = result.results[4];
  assert.ok(!skipped.ok);
  assert.equal(skipped.code, "TIMEOUT");
  assert.equal(skipped.error, "Operation 'translateBatch' timed out after 10000ms");
});

test("Gateway - batch retries only while backoff ends before the deadline", async () => {
  const clock = new FakeClock();
  const provider = new ScriptedProvider([failing(), failing(), failing(), failing(), failing()]);
  const services = createTestServices({ clock, provider });
  const { sleep, delays } = recordingSleep(clock);
  const gateway = new TranslationGateway({
    provider,
    ledger: services.ledger,
    admission: services.admission,
    languages: services.languages,
    clock,
    sleep,
    batchDeadlineMs: 10000,
  });

  const result = await gateway.translateBatch({
    userEmail: TEST_USER,
    texts: ["one"],
    sourceLanguage: "en",
    targetLanguage: "es",
  });

  assert.deepEqual(delays, [2000, 4000]);
  const [item] = result.results;
  assert.ok(!item.ok);
  assert.equal(item.code, "UPSTREAM_UNAVAILABLE");
  assert.equal(item.error, "Translation service unavailable after 3 attempts");
});
