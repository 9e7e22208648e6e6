// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── MCP Server ───
// Exposes maintenance runs and the session log as MCP tools.

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { jobSchema, parseWith, type RuntimeConfig } from "./config.js";
import { failureCount, renderSummary } from "./counters.js";
import { describeError } from "./errors.js";
import type { RunLog } from "./logger.js";
import { runMaintenance, summaryLabels, type TenantClient } from "./run.js";
import type { Sleep } from "./utils.js";

export const SERVER_NAME = "spo-compliance-maintenance";
export const SERVER_VERSION = "1.0.0";

export interface ServerDeps {
  config: RuntimeConfig;
  log: RunLog;
  /** False until the remote-call session can take commands. */
  isReady: () => boolean;
  createClient: (allowMutations: boolean) => TenantClient;
  sleep?: Sleep;
}

export interface MaintenanceServer {
  server: McpServer;
  /** Ask the run in progress, if any, to stop at its next boundary. */
  cancelRun: () => void;
}

function textResult(text: string, isError = false) {
  return { content: [{ type: "text" as const, text }], isError };
}

export function createServer(deps: ServerDeps): MaintenanceServer {
  const { config, log } = deps;
  let running: AbortController | null = null;

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // ── Tool 1: run_maintenance ──
  server.tool(
    "run_maintenance",
    "Run a compliance maintenance pass over SharePoint Online sites through PnP PowerShell. " +
      "action 'reset-labels' finds lists carrying a retention label (optionally only labels starting with targetLabel); " +
      "action 'unlock-records' finds items locked as records. " +
      "mode 'report' (default) only reports; mode 'apply' resets+reapplies labels or unlocks records. " +
      "Throttled calls are retried with backoff; failing sites, lists and items are skipped and logged. " +
      "Only one run at a time. Returns JSON with { counters, cancelled, failures, summary, logIndex }.",
    {
      action: z.enum(["reset-labels", "unlock-records"]).describe("Maintenance action."),
      sites: z.array(z.string().url()).min(1).describe("Site URLs, processed in this order."),
      mode: z.enum(["report", "apply"]).optional().describe("report (default) or apply."),
      targetLabel: z.string().optional().describe("Label name prefix to match (reset-labels only)."),
    },
    async (input) => {
      if (!deps.isReady()) {
        return textResult("PowerShell session not initialized yet. Try again shortly.", true);
      }
      if (running) {
        return textResult("A maintenance run is already in progress.", true);
      }

      const current = new AbortController();
      running = current;
      try {
        const job = parseWith(jobSchema, input, "run_maintenance input");
        const client = deps.createClient(job.mode === "apply");
        const summary = await runMaintenance(
          config,
          job,
          input.sites,
          { client, logger: log, sleep: deps.sleep },
          current.signal,
        );
        const response = {
          counters: summary.counters,
          cancelled: summary.cancelled,
          failures: failureCount(summary.counters),
          summary: renderSummary(summary.counters, summaryLabels(job), summary.cancelled),
          logIndex: log.count(),
        };
        return textResult(JSON.stringify(response, null, 2));
      } catch (err) {
        log.error(`run_maintenance failed: ${describeError(err)}`);
        return textResult(`Run failed: ${describeError(err)}`, true);
      } finally {
        running = null;
      }
    },
  );

  // ── Tool 2: get_execution_log ──
  server.tool(
    "get_execution_log",
    "Retrieve the full log of this server session: every run, retry, skipped site/list/item and summary, " +
      "with timestamps and levels, formatted as Markdown.",
    {},
    async () => textResult(log.toMarkdown()),
  );

  return {
    server,
    cancelRun: () => running?.abort(),
  };
}
