// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { JobOptions, RuntimeConfig } from "./config.js";
import { renderSummary, type SummaryLabels } from "./counters.js";
import type { Logger } from "./logger.js";
import { RateLimiter } from "./pacing.js";
import { RetryPolicy } from "./retry.js";
import type { LabelCapability, RecordCapability, SiteConnector } from "./sharepoint/types.js";
import { TraversalController } from "./traversal/controller.js";
import { LabelResetWorker } from "./traversal/label-reset.js";
import { RecordUnlockWorker } from "./traversal/record-unlock.js";
import type { ListWorker, RunSummary } from "./traversal/types.js";
import type { Sleep } from "./utils.js";

export type TenantClient = SiteConnector & LabelCapability & RecordCapability;

export interface MaintenanceDeps {
  client: TenantClient;
  logger: Logger;
  sleep?: Sleep;
}

export function createWorker(job: JobOptions, client: TenantClient): ListWorker {
  switch (job.action) {
    case "reset-labels":
      return new LabelResetWorker(client, { targetLabel: job.targetLabel, mode: job.mode });
    case "unlock-records":
      return new RecordUnlockWorker(client, { mode: job.mode });
  }
}

export function summaryLabels(job: JobOptions): SummaryLabels {
  return job.action === "reset-labels"
    ? { qualifying: "labelled lists", mutated: "relabelled", applied: job.mode === "apply" }
    : { qualifying: "locked records", mutated: "unlocked", applied: job.mode === "apply" };
}

/** Wire the retry policy, pacer, worker and controller for one job. */
export function createController(config: RuntimeConfig, job: JobOptions, deps: MaintenanceDeps): TraversalController {
  const { client, logger, sleep } = deps;
  return new TraversalController(
    {
      connector: client,
      worker: createWorker(job, client),
      retry: new RetryPolicy(logger, sleep),
      pacer: new RateLimiter(logger, sleep),
      logger,
    },
    {
      credentials: config.credentials,
      ignoredLists: new Set(config.ignoredLists),
      pacing: config.pacing,
      retry: config.retry,
    },
  );
}

export async function runMaintenance(
  config: RuntimeConfig,
  job: JobOptions,
  sites: readonly string[],
  deps: MaintenanceDeps,
  signal?: AbortSignal,
): Promise<RunSummary> {
  const { logger } = deps;
  const target = job.action === "reset-labels" && job.targetLabel !== "" ? `, target label '${job.targetLabel}'` : "";
  logger.info(`Starting ${job.action} in ${job.mode} mode over ${sites.length} site(s)${target}`);

  const summary = await createController(config, job, deps).run(sites, signal);
  for (const line of renderSummary(summary.counters, summaryLabels(job), summary.cancelled).split("\n")) {
    logger.info(line);
  }
  return summary;
}
