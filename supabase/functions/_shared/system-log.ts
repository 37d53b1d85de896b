/**
 * System Log
 *
 * Write-only audit trail with one entry per API request.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { PersistenceUnavailableError } from "./errors.ts";

export interface SystemLogEntry {
  userEmail: string | null;
  /** e.g. "api-v1-translate:batch" */
  action: string;
  endpoint: string;
  method: string;
  statusCode: number;
  responseTimeMs: number;
  ipAddress: string | null;
  userAgent: string | null;
  errorMessage: string | null;
  /** Request metadata; never contains the texts being translated */
  requestData: Record<string, unknown>;
  createdAt: Date;
}

export interface SystemLogWriter {
  write(entry: SystemLogEntry): Promise<void>;
}

export class SupabaseSystemLog implements SystemLogWriter {
  constructor(private readonly client: SupabaseClient) {}

  async write(entry: SystemLogEntry): Promise<void> {
    const { error } = await this.client.from("system_logs").insert({
      user_email: entry.userEmail,
      action: entry.action,
      endpoint: entry.endpoint,
      method: entry.method,
      status_code: entry.statusCode,
      response_time_ms: entry.responseTimeMs,
      ip_address: entry.ipAddress,
      user_agent: entry.userAgent,
      error_message: entry.errorMessage,
      request_data: entry.requestData,
      created_at: entry.createdAt.toISOString(),
    });

    if (error) {
      throw new PersistenceUnavailableError("system log write", error);
    }
  }
}

/**
 * Bounded in-process log used with the memory ledger driver.
 */
export class MemorySystemLog implements SystemLogWriter {
  private readonly buffer: SystemLogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: SystemLogEntry): Promise<void> {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
    return Promise.resolve();
  }

  get entries(): readonly SystemLogEntry[] {
    return this.buffer;
  }
}
