// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { Logger } from "./logger.js";
import { sleep as defaultSleep, type Sleep } from "./utils.js";

export interface PacingDelays {
  itemDelayMs: number;
  listDelayMs: number;
  siteDelayMs: number;
}

/**
 * Fixed pauses between successive operations, so a run stays under the
 * tenant-wide request rate instead of waiting to be throttled.
 */
export class RateLimiter {
  constructor(
    private readonly logger: Logger,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async pace(durationMs: number, description: string): Promise<void> {
    if (durationMs <= 0) return;
    this.logger.verbose(`Pausing ${durationMs} ms ${description}`);
    await this.sleep(durationMs);
  }
}
