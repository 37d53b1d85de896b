/**
 * Admission Control Tests
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { MemoryAdmissionController } from "../_shared/translation/admission.ts";
import { FakeClock, TEST_USER } from "./test-utils.ts";

test("Admission - first request is admitted", async () => {
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock: new FakeClock() });
  assert.deepEqual(await admission.tryAdmit(TEST_USER), { admitted: true });
});

test("Admission - second request inside the window is throttled", async () => {
  const clock = new FakeClock();
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock });

  await admission.tryAdmit(TEST_USER);
  clock.advance(7500);

  assert.deepEqual(await admission.tryAdmit(TEST_USER), { admitted: false, retryAfterMs: 12500 });
});

test("Admission - retry-after stays within (0, cooldown]", async () => {
  const clock = new FakeClock();
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock });
  await admission.tryAdmit(TEST_USER);

  for (const elapsed of [0, 1, 10000, 19999]) {
    clock.set("2026-03-10T12:00:00.000Z");
    clock.advance(elapsed);
    const decision = await admission.tryAdmit(TEST_USER);
    assert.equal(decision.admitted, false);
    if (!decision.admitted) {
      assert.ok(decision.retryAfterMs > 0 && decision.retryAfterMs <= 20000);
    }
  }
});

test("Admission - a throttled request does not extend the window", async () => {
  const clock = new FakeClock();
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock });

  await admission.tryAdmit(TEST_USER);
  clock.advance(15000);
  await admission.tryAdmit(TEST_USER);
  clock.advance(5000);

  assert.deepEqual(await admission.tryAdmit(TEST_USER), { admitted: true });
});

test("Admission - concurrent requests for one user admit exactly one", async () => {
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock: new FakeClock() });

  const decisions = await Promise.all(Array.from({ length: 10 }, () => admission.tryAdmit(TEST_USER)));

  assert.equal(decisions.filter((decision) => decision.admitted).length, 1);
});

test("Admission - users do not share a slot", async () => {
  const admission = new MemoryAdmissionController({ cooldownMs: 20000, clock: new FakeClock() });

  await admission.tryAdmit("first@example.com");
  assert.deepEqual(await admission.tryAdmit("second@example.com"), { admitted: true });
});

test("Admission - expired slots are swept past maxEntries", async () => {
  const clock = new FakeClock();
  const admission = new MemoryAdmissionController({ cooldownMs: 1000, clock, maxEntries: 2 });

  await admission.tryAdmit("a@example.com");
  await admission.tryAdmit("b@example.com");
  clock.advance(1000);
  await admission.tryAdmit("c@example.com");

  assert.equal(admission.size, 1);
});
