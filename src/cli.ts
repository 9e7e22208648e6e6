#!/usr/bin/env node
// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { parseCliArgs, USAGE, wantsHelp, type CliConfig } from "./config.js";
import { failureCount, renderSummary } from "./counters.js";
import { ConfigurationError } from "./errors.js";
import { RunLog } from "./logger.js";
import { PsExecutor } from "./powershell/executor.js";
import { runMaintenance, summaryLabels } from "./run.js";
import { PnpClient } from "./sharepoint/pnp-client.js";
import { readSiteList } from "./sites.js";

const EXIT_OK = 0;
const EXIT_CONFIG = 1;
const EXIT_FAILURES = 2;

async function runBatch(config: CliConfig): Promise<number> {
  // Read input first: a missing site list must fail before anything connects.
  const sites = await readSiteList(config.sitesFile);

  // Nothing reads entries back in batch mode, so none are kept in memory.
  const log = new RunLog({ echo: config.verbose ? "verbose" : "info", filePath: config.logFile, retain: false });
  const executor = new PsExecutor(log);
  const client = new PnpClient(executor, { allowMutations: config.job.mode === "apply" });

  const controller = new AbortController();
  const abort = (signal: string) => {
    log.warn(`${signal} received, stopping after the current operation`);
    controller.abort();
  };
  process.once("SIGINT", () => abort("SIGINT"));
  process.once("SIGTERM", () => abort("SIGTERM"));

  try {
    await executor.init();
    const summary = await runMaintenance(config, config.job, sites, { client, logger: log }, controller.signal);
    process.stdout.write(renderSummary(summary.counters, summaryLabels(config.job), summary.cancelled) + "\n");
    return config.failOnError && failureCount(summary.counters) > 0 ? EXIT_FAILURES : EXIT_OK;
  } finally {
    await executor.shutdown();
  }
}

async function main(argv: readonly string[]): Promise<number> {
  if (wantsHelp(argv)) {
    process.stdout.write(USAGE + "\n");
    return EXIT_OK;
  }
  try {
    return await runBatch(parseCliArgs(argv, process.env));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`[spo-maintenance] ${err.message}\n`);
      return EXIT_CONFIG;
    }
    throw err;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    process.stderr.write(`[spo-maintenance] Fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  },
);
