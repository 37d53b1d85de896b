/**
 * Per-user admission control for the translation gateway.
 *
 * Each user owns one cooldown slot. A request is admitted only when the
 * previous admission is at least `cooldownMs` old; the check and the
 * update of the slot happen as one atomic step, and an admitted slot is
 * never handed back, whatever happens to the request afterwards.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { AdmissionResultSchema } from "../contracts/rpc-schemas.ts";
import { PersistenceUnavailableError, withPersistence } from "../errors.ts";
import { logger } from "../logger.ts";
import { type Clock, systemClock } from "../utils.ts";

export type AdmissionDecision =
  | { admitted: true }
  | { admitted: false; retryAfterMs: number };

export interface AdmissionController {
  tryAdmit(userEmail: string): Promise<AdmissionDecision>;
}

export interface MemoryAdmissionOptions {
  cooldownMs: number;
  clock?: Clock;
  /** Sweep expired slots once the map grows past this size */
  maxEntries?: number;
}

/**
 * Slots kept in a Map. `tryAdmit` never awaits between reading and writing
 * the slot, so on a single event loop two calls for the same user cannot
 * both be admitted.
 */
export class MemoryAdmissionController implements AdmissionController {
  private readonly lastAdmitted = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly maxEntries: number;

  constructor(options: MemoryAdmissionOptions) {
    this.cooldownMs = options.cooldownMs;
    this.clock = options.clock ?? systemClock;
    this.maxEntries = options.maxEntries ?? 10000;
  }

  tryAdmit(userEmail: string): Promise<AdmissionDecision> {
    return Promise.resolve(this.decide(userEmail));
  }

  private decide(userEmail: string): AdmissionDecision {
    const now = this.clock.now().getTime();
    const last = this.lastAdmitted.get(userEmail);

    if (last !== undefined) {
      const elapsed = now - last;
      if (elapsed < this.cooldownMs) {
        return {
          admitted: false,
          retryAfterMs: Math.min(this.cooldownMs, this.cooldownMs - elapsed),
        };
      }
    }

    this.lastAdmitted.set(userEmail, now);
    if (this.lastAdmitted.size > this.maxEntries) {
      this.sweep(now);
    }
    return { admitted: true };
  }

  /** Drop slots whose cooldown has passed; they no longer block anyone */
  private sweep(now: number): void {
    for (const [key, admittedAt] of this.lastAdmitted) {
      if (now - admittedAt >= this.cooldownMs) {
        this.lastAdmitted.delete(key);
      }
    }
  }

  get size(): number {
    return this.lastAdmitted.size;
  }
}

/**
 * Slots kept in `translation_admissions`; `try_admit_translation` decides
 * and records with a single conditional upsert.
 */
export class SupabaseAdmissionController implements AdmissionController {
  constructor(
    private readonly client: SupabaseClient,
    private readonly cooldownMs: number,
  ) {}

  async tryAdmit(userEmail: string): Promise<AdmissionDecision> {
    const { data, error } = await withPersistence("admission", async () =>
      await this.client.rpc("try_admit_translation", {
        p_user_email: userEmail,
        p_cooldown_ms: this.cooldownMs,
      })
    );

    if (error) {
      logger.error("Admission check failed", { dbError: error.message });
      throw new PersistenceUnavailableError("admission", error);
    }

    const parsed = z.array(AdmissionResultSchema).min(1).safeParse(data);
    if (!parsed.success) {
      throw new PersistenceUnavailableError("admission", parsed.error);
    }

    const [decision] = parsed.data;
    return decision.admitted
      ? { admitted: true }
      : { admitted: false, retryAfterMs: Math.max(1, decision.retry_after_ms) };
  }
}
