// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describeError } from "../errors.js";
import { classifyComplianceFlag } from "../qualify.js";
import type { ListInfo, ListItem, RecordCapability } from "../sharepoint/types.js";
import type { ListOutcome, ListWorker, WorkContext } from "./types.js";

export interface RecordUnlockOptions {
  mode: "report" | "apply";
}

/** Walks a list's items, finds those locked as records and, in apply mode, unlocks them. */
export class RecordUnlockWorker implements ListWorker {
  constructor(
    private readonly records: RecordCapability,
    private readonly options: RecordUnlockOptions,
  ) {}

  async processList(list: ListInfo, ctx: WorkContext): Promise<ListOutcome> {
    ctx.enter("fetching-state");
    const items: readonly ListItem[] = Object.freeze(
      await ctx.call(() => this.records.listItems(ctx.session, list), `Read items of '${list.title}'`),
    );

    for (let i = 0; i < items.length; i++) {
      if (ctx.signal?.aborted) return "cancelled";
      await this.processItem(list, items[i], ctx);
      if (i < items.length - 1 && !ctx.signal?.aborted) await ctx.paceItem("before next item");
    }
    return "completed";
  }

  private async processItem(list: ListInfo, item: ListItem, ctx: WorkContext): Promise<void> {
    const { logger, counters } = ctx;
    const label = `item ${item.id} '${item.displayName}' in '${list.title}'`;
    counters.increment("itemsInspected");

    const state = classifyComplianceFlag(item.complianceFlag);
    if (state === "unknown") {
      logger.warn(`${label}: unknown flag ${String(item.complianceFlag)} - skip`);
      return;
    }
    if (state === "unlocked") return;

    counters.increment("qualifying");
    if (this.options.mode === "report") {
      logger.info(`${label}: locked record (report only)`);
      return;
    }

    ctx.enter("acting");
    try {
      const unlocked = await ctx.call(
        () => this.records.unlockItem(ctx.session, list, item.id),
        `Unlock item ${item.id} in '${list.title}'`,
      );
      if (unlocked) {
        counters.increment("mutated");
        logger.info(`${label}: unlocked`);
      } else {
        counters.increment("itemsFailed");
        logger.warn(`${label}: unlock did not take effect`);
      }
    } catch (err) {
      counters.increment("itemsFailed");
      logger.error(`Skipping ${label}: ${describeError(err)}`);
    }
  }
}
