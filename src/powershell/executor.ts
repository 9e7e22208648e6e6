// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { tryParseJson, truncate } from "../utils.js";
import { validateCommand } from "./allowlist.js";

// ─── Types ───

export interface PsResult {
  success: boolean;
  output: string;
  error?: string;
  /** HTTP status of the failed remote call, when PowerShell could see one. */
  status?: number;
  retryAfterSeconds?: number;
}

export interface ExecuteOptions {
  /** Permit cmdlets that change tenant state. */
  allowMutations?: boolean;
  /** Logged instead of the command text (for commands carrying secrets). */
  describe?: string;
  timeoutMs?: number;
}

/** Anything that can run one PowerShell command and report the outcome. */
export interface CommandRunner {
  execute(command: string, options?: ExecuteOptions): Promise<PsResult>;
}

const ERROR_PREFIX = "PS_ERROR:";

const psErrorSchema = z.object({
  message: z.string().nullish(),
  status: z.number().int().nullish(),
  retryAfter: z.union([z.number(), z.string()]).nullish(),
});

// The catch block lifts the HTTP status and Retry-After off the exception so
// callers never have to read them out of the message text.
const CATCH_BLOCK = [
  "catch {",
  "$e = $_.Exception; $r = $e.Response;",
  "if (-not $r -and $e.InnerException) { $r = $e.InnerException.Response };",
  "$s = $null; $ra = $null;",
  "if ($r) { $s = [int]$r.StatusCode;",
  "if ($r.Headers -and $r.Headers.RetryAfter) { $ra = $r.Headers.RetryAfter.Delta.TotalSeconds }",
  "elseif ($r.Headers) { $ra = $r.Headers['Retry-After'] } };",
  `Write-Output ('${ERROR_PREFIX}' + (@{ message = $e.Message; status = $s; retryAfter = $ra } | ConvertTo-Json -Compress))`,
  "}",
].join(" ");

/**
 * Retry-After is either delta-seconds or an HTTP date.
 * Returns whole seconds, or undefined when the value is unusable.
 */
export function parseRetryAfter(value: number | string | null | undefined, now: Date = new Date()): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "number") return Number.isFinite(value) && value >= 0 ? value : undefined;

  const trimmed = value.trim();
  if (trimmed === "") return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now.getTime()) / 1000));
}

/**
 * Split raw pwsh output into a result. A `PS_ERROR:` line carries the
 * structured error written by the catch block.
 */
export function parseCommandOutput(raw: string, now: Date = new Date()): PsResult {
  const lines = raw.split(/\r?\n/);
  const errorLine = lines.find((l) => l.startsWith(ERROR_PREFIX));
  if (errorLine === undefined) return { success: true, output: raw };

  const output = lines.filter((l) => l !== errorLine).join("\n").trim();
  const parsed = psErrorSchema.safeParse(tryParseJson(errorLine.slice(ERROR_PREFIX.length).trim()));
  if (!parsed.success) {
    return { success: false, output, error: errorLine.slice(ERROR_PREFIX.length).trim() || "unknown error" };
  }

  const { message, status, retryAfter } = parsed.data;
  const result: PsResult = { success: false, output, error: message ?? "unknown error" };
  if (status !== null && status !== undefined) result.status = status;
  const seconds = parseRetryAfter(retryAfter, now);
  if (seconds !== undefined) result.retryAfterSeconds = seconds;
  return result;
}

// ─── Executor ───

/**
 * Manages a single long-lived PowerShell 7 (pwsh) process with the
 * PnP.PowerShell module loaded. Commands are written as single lines and
 * their output is read up to a unique end marker.
 */
export class PsExecutor implements CommandRunner {
  private proc: ChildProcessWithoutNullStreams | null = null;
  private buf = "";
  private ready = false;
  /** End markers of timed-out commands whose output has not arrived yet, oldest first. */
  private abandoned: string[] = [];

  constructor(private readonly logger: Logger) {}

  /* ───────── Lifecycle ───────── */

  async init(): Promise<void> {
    const proc = spawn("pwsh", ["-NoExit", "-NoProfile", "-Command", "-"], {
      shell: false,
      env: { ...process.env },
    });
    this.proc = proc;
    this.abandoned = [];

    // Accumulate stdout for marker-based I/O
    proc.stdout.on("data", (d: Buffer) => {
      this.buf += d.toString();
    });
    proc.stderr.on("data", (d: Buffer) => {
      this.logger.verbose(`[pwsh] ${d.toString().trim()}`);
    });
    proc.on("exit", (code) => {
      this.logger.warn(`[PsExecutor] pwsh exited (code ${code})`);
      this.ready = false;
      this.proc = null;
      this.abandoned = [];
    });

    await this.waitForMarker(); // ensure process is responsive

    // Progress bars do not render in piped mode and can block stdout
    await this.execRaw("$ProgressPreference = 'SilentlyContinue'", 5_000);

    // Import explicitly: auto-import from the first PnP cmdlet can hang in a piped process.
    this.logger.info("[PsExecutor] Importing PnP.PowerShell module…");
    const imported = parseCommandOutput(
      await this.execRaw(`try { Import-Module PnP.PowerShell -ErrorAction Stop } ${CATCH_BLOCK}`, 60_000),
    );
    if (!imported.success) {
      throw new Error(`PnP.PowerShell could not be imported: ${imported.error}`);
    }

    this.ready = true;
    this.logger.info("[PsExecutor] PowerShell session ready ✓");
  }

  isReady(): boolean {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    if (this.proc) {
      this.proc.stdin.end("exit\n");
      this.proc.kill();
      this.proc = null;
      this.ready = false;
    }
  }

  /* ───────── Public API ───────── */

  /**
   * Execute a **validated** PowerShell command.
   * Failures come back as `success: false` with the structured status, never as a rejection.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<PsResult> {
    if (!this.ready) {
      return { success: false, output: "", error: "PowerShell session not initialized" };
    }
    const v = validateCommand(command, { allowMutations: options.allowMutations });
    if (!v.valid) {
      return { success: false, output: "", error: v.violation };
    }

    this.logger.verbose(`pwsh> ${options.describe ?? truncate(command, 300)}`);
    try {
      const out = await this.execRaw(`try { ${command} } ${CATCH_BLOCK}`, options.timeoutMs);
      return parseCommandOutput(out);
    } catch (err) {
      return { success: false, output: "", error: String(err) };
    }
  }

  /* ───────── Internals ───────── */

  /** Send a command and read stdout until the end-marker appears. */
  private execRaw(command: string, timeoutMs = 180_000): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = this.proc;
      if (!proc) return reject(new Error("No pwsh process"));

      const marker = `__SPO_END_${randomUUID()}__`;
      if (this.abandoned.length === 0) this.buf = "";

      // Everything goes out as ONE line: the piped stdin parser can hang on
      // multi-line try/catch blocks.
      const script = `${command}; Write-Output '${marker}'\n`;

      const poll = setInterval(() => {
        // pwsh runs commands in order: late output of timed-out commands comes first.
        this.dropAbandonedOutput();
        if (this.abandoned.length > 0) return;
        const idx = this.buf.indexOf(marker);
        if (idx !== -1) {
          clearInterval(poll);
          clearTimeout(timeout);
          const output = this.buf.substring(0, idx).trim();
          this.buf = this.buf.substring(idx + marker.length);
          resolve(output);
        }
      }, 150);

      const timeout = setTimeout(() => {
        clearInterval(poll);
        // The command keeps running; whatever it prints up to its marker belongs to nobody.
        this.abandoned.push(marker);
        reject(new Error(`Command timed out after ${timeoutMs} ms`));
      }, timeoutMs);

      proc.stdin.write(script);
    });
  }

  private dropAbandonedOutput(): void {
    while (this.abandoned.length > 0) {
      const marker = this.abandoned[0];
      const idx = this.buf.indexOf(marker);
      if (idx === -1) return;
      this.buf = this.buf.substring(idx + marker.length);
      this.abandoned.shift();
    }
  }

  /** Wait for pwsh to be responsive after spawn. */
  private waitForMarker(): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = this.proc;
      if (!proc) return reject(new Error("No pwsh process"));
      const marker = `__READY_${randomUUID()}__`;
      this.buf = "";
      proc.stdin.write(`Write-Output '${marker}'\n`);

      const poll = setInterval(() => {
        if (this.buf.includes(marker)) {
          clearInterval(poll);
          clearTimeout(timeout);
          this.buf = "";
          resolve();
        }
      }, 100);
      const timeout = setTimeout(() => {
        clearInterval(poll);
        reject(new Error("pwsh startup timeout"));
      }, 30_000);
    });
  }
}
