// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Retry Policy ───
// Retries throttled remote operations with server-supplied or exponential
// backoff. Any other failure is rethrown on the spot.

import { RemoteError, RetryExhaustedError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { RemoteOperation } from "./sharepoint/types.js";
import { sleep as defaultSleep, type Sleep } from "./utils.js";

/** Statuses SharePoint Online uses to signal throttling. */
export const THROTTLE_STATUSES: ReadonlySet<number> = new Set([429, 503]);

export type FailureClass =
  | { kind: "throttled"; status: number; retryAfterMs?: number }
  | { kind: "non-retryable" };

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Names the operation in log entries and errors. */
  description: string;
}

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof RemoteError && err.status !== undefined && THROTTLE_STATUSES.has(err.status)) {
    return err.retryAfterSeconds !== undefined
      ? { kind: "throttled", status: err.status, retryAfterMs: err.retryAfterSeconds * 1000 }
      : { kind: "throttled", status: err.status };
  }
  return { kind: "non-retryable" };
}

/**
 * Wait before retrying after failed attempt `attempt` (1-based).
 * A server-supplied Retry-After wins over the exponential schedule.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, retryAfterMs?: number): number {
  if (retryAfterMs !== undefined) return retryAfterMs;
  return baseDelayMs * 2 ** (attempt - 1);
}

export class RetryPolicy {
  constructor(
    private readonly logger: Logger,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async execute<T>(operation: RemoteOperation<T>, options: RetryOptions): Promise<T> {
    const { maxAttempts, baseDelayMs, description } = options;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (err) {
        const failure = classifyFailure(err);
        if (failure.kind === "non-retryable") throw err;

        if (attempt >= maxAttempts) {
          const exhausted = new RetryExhaustedError(description, attempt, failure.status, err);
          this.logger.error(exhausted.message);
          throw exhausted;
        }

        const delay = backoffDelay(attempt, baseDelayMs, failure.retryAfterMs);
        this.logger.warn(
          `${description}: throttled (HTTP ${failure.status}), attempt ${attempt}/${maxAttempts}, ` +
            `retrying in ${delay} ms`,
        );
        await this.sleep(delay);
      }
    }
  }
}
