// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { PartialMutationError } from "../errors.js";
import { labelQualifies } from "../qualify.js";
import type { LabelCapability, ListInfo } from "../sharepoint/types.js";
import type { ListOutcome, ListWorker, WorkContext } from "./types.js";

export interface LabelResetOptions {
  /** Empty matches every label. */
  targetLabel: string;
  mode: "report" | "apply";
}

/** Finds lists carrying a (matching) retention label and, in apply mode, resets and reapplies it. */
export class LabelResetWorker implements ListWorker {
  constructor(
    private readonly labels: LabelCapability,
    private readonly options: LabelResetOptions,
  ) {}

  async processList(list: ListInfo, ctx: WorkContext): Promise<ListOutcome> {
    const { session, logger, counters } = ctx;
    const title = list.title;

    ctx.enter("fetching-state");
    const label = await ctx.call(() => this.labels.getLabel(session, title), `Read label of '${title}'`);
    if (!label) {
      logger.verbose(`'${title}': no label set - skip`);
      return "completed";
    }
    if (!labelQualifies(label.name, this.options.targetLabel)) {
      logger.verbose(`'${title}': label '${label.name}' does not match '${this.options.targetLabel}' - skip`);
      return "completed";
    }

    counters.increment("qualifying");
    if (this.options.mode === "report") {
      logger.info(`'${title}': label '${label.name}' found (report only)`);
      return "completed";
    }

    ctx.enter("acting");
    await ctx.call(() => this.labels.resetLabel(session, title), `Reset label on '${title}'`);
    try {
      await ctx.call(
        () => this.labels.applyLabel(session, title, label.name),
        `Reapply label '${label.name}' on '${title}'`,
      );
    } catch (err) {
      throw new PartialMutationError(title, label.name, err);
    }

    counters.increment("mutated");
    logger.info(`'${title}': label '${label.name}' reset and reapplied`);
    return "completed";
  }
}
