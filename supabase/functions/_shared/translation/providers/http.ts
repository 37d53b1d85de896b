/**
 * HTTP plumbing shared by the REST providers.
 */

import { TimeoutError } from "../../errors.ts";
import { err, ok, type AsyncResult } from "../../result.ts";
import { withAbortableTimeout } from "../../timeout.ts";
import {
  permanentFailure,
  type ProviderFailure,
  type ProviderFailureKind,
  transientFailure,
} from "./types.ts";

const TRANSIENT_STATUSES = new Set([408, 429]);

export function classifyStatus(status: number): ProviderFailureKind {
  return TRANSIENT_STATUSES.has(status) || status >= 500 ? "transient" : "permanent";
}

async function readDetail(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 200);
  } catch (error) {
    return error instanceof Error ? error.message : "unreadable body";
  }
}

/**
 * POST and decode JSON, folding every failure into a ProviderFailure.
 */
export async function requestJson(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  operation: string,
): AsyncResult<unknown, ProviderFailure> {
  let response: Response;
  try {
    response = await withAbortableTimeout(
      (signal) => fetch(url, { ...init, signal }),
      timeoutMs,
      operation,
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      return err(transientFailure(`${operation} timed out after ${timeoutMs}ms`));
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(transientFailure(`${operation} connection failed: ${message}`));
  }

  if (!response.ok) {
    const detail = await readDetail(response);
    const reason = `${operation} returned ${response.status}${detail ? `: ${detail}` : ""}`;
    return err(
      classifyStatus(response.status) === "transient"
        ? transientFailure(reason, response.status)
        : permanentFailure(reason, response.status),
    );
  }

  try {
    const body: unknown = await response.json();
    return ok(body);
  } catch {
    return err(transientFailure(`${operation} returned invalid JSON`, response.status));
  }
}
