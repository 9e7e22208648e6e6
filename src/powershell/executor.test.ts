// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { silentLog } from "../test-fakes.js";
import { parseCommandOutput, parseRetryAfter, PsExecutor } from "./executor.js";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: spawnMock }));

const NOW = new Date("2026-01-01T00:00:00Z");

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("30", NOW)).toBe(30);
    expect(parseRetryAfter(12, NOW)).toBe(12);
  });

  it("converts an HTTP date into seconds from now", () => {
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:01:30 GMT", NOW)).toBe(90);
  });

  it("never returns a negative wait for a date in the past", () => {
    expect(parseRetryAfter("Wed, 31 Dec 2025 23:59:00 GMT", NOW)).toBe(0);
  });

  it("ignores missing or unusable values", () => {
    expect(parseRetryAfter(null, NOW)).toBeUndefined();
    expect(parseRetryAfter(undefined, NOW)).toBeUndefined();
    expect(parseRetryAfter("", NOW)).toBeUndefined();
    expect(parseRetryAfter("soon", NOW)).toBeUndefined();
    expect(parseRetryAfter(-5, NOW)).toBeUndefined();
  });
});

describe("parseCommandOutput", () => {
  it("passes plain output through as a success", () => {
    expect(parseCommandOutput('[{"Title":"Documents"}]', NOW)).toEqual({
      success: true,
      output: '[{"Title":"Documents"}]',
    });
  });

  it("lifts status and Retry-After out of the structured error line", () => {
    const raw = 'PS_ERROR:{"message":"The remote server returned an error: (429).","status":429,"retryAfter":"120"}';
    expect(parseCommandOutput(raw, NOW)).toEqual({
      success: false,
      output: "",
      error: "The remote server returned an error: (429).",
      status: 429,
      retryAfterSeconds: 120,
    });
  });

  it("keeps output written before the error", () => {
    const raw = 'partial\nPS_ERROR:{"message":"Access denied","status":403,"retryAfter":null}';
    expect(parseCommandOutput(raw, NOW)).toEqual({
      success: false,
      output: "partial",
      error: "Access denied",
      status: 403,
    });
  });

  it("does not guess a status when the error carries none", () => {
    const result = parseCommandOutput('PS_ERROR:{"message":"(429) Too Many Requests","status":null}', NOW);
    expect(result.success).toBe(false);
    expect(result.status).toBeUndefined();
  });

  it("falls back to the raw text when the error line is not JSON", () => {
    expect(parseCommandOutput("PS_ERROR: boom", NOW)).toEqual({ success: false, output: "", error: "boom" });
  });
});

// ─── Scripted pwsh ───

type Reply = (command: string) => { output?: string; delayMs?: number } | undefined;

/** The command inside the executor's try/catch wrapper. */
function innerCommand(body: string): string {
  return /^try \{ (.*) \} catch \{/s.exec(body)?.[1] ?? body;
}

/**
 * Answers each script line the way pwsh does: one command at a time, output
 * followed by the end marker the script asked for.
 */
class FakePwsh extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly scripts: string[] = [];
  killed = false;
  private busyUntil = 0;

  readonly stdin = {
    write: (script: string): boolean => {
      this.scripts.push(script);
      this.answer(script);
      return true;
    },
    end: (script?: string): void => {
      if (script !== undefined) this.scripts.push(script);
    },
  };

  constructor(private readonly reply: Reply) {
    super();
  }

  kill(): boolean {
    this.killed = true;
    return true;
  }

  private answer(script: string): void {
    const ready = /^Write-Output '(__READY_[^']+__)'\n$/.exec(script);
    if (ready) {
      this.emitLater(`${ready[1]}\n`, 0);
      return;
    }
    const command = /^(.*); Write-Output '(__SPO_END_[^']+__)'\n$/s.exec(script);
    if (!command) return;
    const { output = "", delayMs = 0 } = this.reply(innerCommand(command[1])) ?? {};
    this.emitLater(output === "" ? `${command[2]}\n` : `${output}\n${command[2]}\n`, delayMs);
  }

  private emitLater(text: string, delayMs: number): void {
    const at = Math.max(Date.now(), this.busyUntil) + delayMs;
    this.busyUntil = at;
    setTimeout(() => this.stdout.emit("data", Buffer.from(text)), at - Date.now());
  }
}

const DOCS_JSON = '[{"Title":"Docs"}]';
const THROTTLED = 'PS_ERROR:{"message":"Too Many Requests","status":429,"retryAfter":"30"}';

const tenantReplies: Reply = (command) => {
  if (command === "Get-PnPList") return { output: DOCS_JSON };
  if (command === "Get-PnPListItem -List 'Slow'") return { output: THROTTLED, delayMs: 600 };
  if (command === "Get-PnPListItem -List 'Busy'") return { output: THROTTLED };
  return undefined;
};

async function started(reply: Reply = tenantReplies) {
  const pwsh = new FakePwsh(reply);
  spawnMock.mockReturnValue(pwsh);
  const log = silentLog();
  const executor = new PsExecutor(log);
  const init = executor.init();
  await vi.advanceTimersByTimeAsync(1_000);
  await init;
  pwsh.scripts.length = 0;
  return { executor, pwsh, log };
}

describe("PsExecutor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    spawnMock.mockReset();
  });

  it("refuses commands before the session is initialized", async () => {
    const executor = new PsExecutor(silentLog());
    expect(executor.isReady()).toBe(false);
    await expect(executor.execute("Get-PnPList")).resolves.toEqual({
      success: false,
      output: "",
      error: "PowerShell session not initialized",
    });
  });

  it("starts pwsh and imports PnP.PowerShell", async () => {
    const { executor } = await started();

    expect(spawnMock).toHaveBeenCalledWith(
      "pwsh",
      ["-NoExit", "-NoProfile", "-Command", "-"],
      expect.objectContaining({ shell: false }),
    );
    expect(executor.isReady()).toBe(true);
  });

  it("fails init when the module cannot be imported", async () => {
    const pwsh = new FakePwsh((command) =>
      command.startsWith("Import-Module")
        ? { output: 'PS_ERROR:{"message":"The specified module \'PnP.PowerShell\' was not loaded"}' }
        : undefined,
    );
    spawnMock.mockReturnValue(pwsh);
    const executor = new PsExecutor(silentLog());

    const outcome = executor.init().catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await outcome).toEqual(
      new Error("PnP.PowerShell could not be imported: The specified module 'PnP.PowerShell' was not loaded"),
    );
    expect(executor.isReady()).toBe(false);
  });

  it("wraps each command in try/catch and reads output up to its marker", async () => {
    const { executor, pwsh } = await started();

    const pending = executor.execute("Get-PnPList");
    await vi.advanceTimersByTimeAsync(200);

    await expect(pending).resolves.toEqual({ success: true, output: DOCS_JSON });
    expect(pwsh.scripts).toHaveLength(1);
    expect(pwsh.scripts[0]).toMatch(/^try \{ Get-PnPList \} catch \{ .*; Write-Output '__SPO_END_[^']+__'\n$/s);
  });

  it("brings the structured error of the catch block back to the caller", async () => {
    const { executor } = await started();

    const pending = executor.execute("Get-PnPListItem -List 'Busy'");
    await vi.advanceTimersByTimeAsync(200);

    await expect(pending).resolves.toEqual({
      success: false,
      output: "",
      error: "Too Many Requests",
      status: 429,
      retryAfterSeconds: 30,
    });
  });

  it("never sends a command the allow-list rejects", async () => {
    const { executor, pwsh } = await started();

    const result = await executor.execute("Remove-PnPList -Identity 'Docs'");

    expect(result).toEqual({
      success: false,
      output: "",
      error: "Blocked cmdlet: Remove-PnPList — Remove-* cmdlets are not allowed",
    });
    expect(pwsh.scripts).toEqual([]);
  });

  it("sends mutating cmdlets only when mutations are allowed", async () => {
    const { executor, pwsh } = await started();

    const refused = await executor.execute("Reset-PnPRetentionLabel -List 'Docs'");
    expect(refused.error).toBe("Mutating cmdlet Reset-PnPRetentionLabel is not allowed in report-only mode");
    expect(pwsh.scripts).toEqual([]);

    const pending = executor.execute("Reset-PnPRetentionLabel -List 'Docs'", { allowMutations: true });
    await vi.advanceTimersByTimeAsync(200);
    await expect(pending).resolves.toEqual({ success: true, output: "" });
    expect(pwsh.scripts).toHaveLength(1);
  });

  it("reports a command that runs past its timeout", async () => {
    const { executor } = await started();

    const pending = executor.execute("Get-PnPListItem -List 'Slow'", { timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(150);

    await expect(pending).resolves.toEqual({
      success: false,
      output: "",
      error: "Error: Command timed out after 100 ms",
    });
  });

  it("keeps late output of a timed-out command away from the next command", async () => {
    const { executor } = await started();

    const slow = executor.execute("Get-PnPListItem -List 'Slow'", { timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(150);
    await slow;

    const next = executor.execute("Get-PnPList");
    await vi.advanceTimersByTimeAsync(1_000);

    await expect(next).resolves.toEqual({ success: true, output: DOCS_JSON });
  });

  it("discards late output that arrived while no command was waiting", async () => {
    const { executor } = await started();

    const slow = executor.execute("Get-PnPListItem -List 'Slow'", { timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(1_000);
    await slow;

    const next = executor.execute("Get-PnPList");
    await vi.advanceTimersByTimeAsync(200);

    await expect(next).resolves.toEqual({ success: true, output: DOCS_JSON });
  });

  it("is no longer ready once pwsh exits", async () => {
    const { executor, pwsh, log } = await started();

    pwsh.emit("exit", 1);

    expect(executor.isReady()).toBe(false);
    expect(log.getAll().map((e) => e.message)).toContain("[PsExecutor] pwsh exited (code 1)");
  });

  it("ends and kills pwsh on shutdown", async () => {
    const { executor, pwsh } = await started();

    await executor.shutdown();

    expect(pwsh.scripts).toEqual(["exit\n"]);
    expect(pwsh.killed).toBe(true);
    expect(executor.isReady()).toBe(false);
  });
});
