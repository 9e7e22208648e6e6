// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadRuntimeConfig } from "./config.js";
import { describeError } from "./errors.js";
import { RunLog } from "./logger.js";
import { PsExecutor } from "./powershell/executor.js";
import { createServer } from "./server.js";
import { PnpClient } from "./sharepoint/pnp-client.js";

// ── Main ──
async function main(): Promise<void> {
  const config = loadRuntimeConfig(process.env);
  // get_execution_log serves the whole session, so entries are kept.
  const log = new RunLog({ echo: config.verbose ? "verbose" : "info", filePath: config.logFile, retain: true });
  const executor = new PsExecutor(log);

  const { server, cancelRun } = createServer({
    config,
    log,
    isReady: () => executor.isReady(),
    createClient: (allowMutations) => new PnpClient(executor, { allowMutations }),
  });

  // Connect MCP transport FIRST so the server can respond to `initialize`
  process.stderr.write("[SPO Maintenance MCP] Starting…\n");
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.stderr.write("[SPO Maintenance MCP] Server running ✓\n");

  // Start PowerShell in the background
  // (run_maintenance returns an error until it is ready)
  executor.init().catch((err) => {
    log.error(`Failed to initialize PowerShell session: ${describeError(err)}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    cancelRun();
    await executor.shutdown();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  process.stderr.write(`[SPO Maintenance MCP] Fatal: ${describeError(err)}\n`);
  process.exit(1);
});
