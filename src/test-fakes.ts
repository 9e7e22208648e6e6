// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── In-process Test Doubles ───
// A scripted tenant for the traversal tests and a scripted command runner for
// the PnP client tests. Nothing here talks to SharePoint or PowerShell.

import type { RuntimeConfig } from "./config.js";
import { RemoteError } from "./errors.js";
import { RunLog } from "./logger.js";
import type { CommandRunner, ExecuteOptions, PsResult } from "./powershell/executor.js";
import type { TenantClient } from "./run.js";
import type { ListInfo, ListItem, RetentionLabel, Session, SiteCredentials } from "./sharepoint/types.js";
import type { Sleep } from "./utils.js";

export const TEST_CREDENTIALS: SiteCredentials = {
  kind: "certificate",
  clientId: "test-client",
  tenant: "contoso.onmicrosoft.com",
  thumbprint: "TEST-THUMBPRINT",
};

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    credentials: TEST_CREDENTIALS,
    ignoredLists: ["Style Library"],
    retry: { maxAttempts: 3, baseDelayMs: 100 },
    pacing: { itemDelayMs: 0, listDelayMs: 0, siteDelayMs: 0 },
    verbose: false,
    failOnError: false,
    ...overrides,
  };
}

export function throttled(status = 429, retryAfterSeconds?: number): RemoteError {
  return new RemoteError("The remote server returned an error: Too Many Requests", { status, retryAfterSeconds });
}

export function denied(): RemoteError {
  return new RemoteError("Access denied", { status: 403 });
}

/** A sleep that returns at once and remembers every requested wait. */
export function recordingSleep(): { sleep: Sleep; waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms) => {
      waits.push(ms);
    },
  };
}

export function silentLog(): RunLog {
  return new RunLog({ echo: false });
}

// ─── Fake tenant ───

export interface FakeListSpec {
  title: string;
  hidden?: boolean;
  itemCount?: number;
  label?: string | null;
  items?: ListItem[];
}

/**
 * Call keys: "connect <site>", "disconnect <site>", "listLists <site>",
 * "getLabel <site> <list>", "resetLabel <site> <list>",
 * "applyLabel <site> <list> <label>", "listItems <site> <list>",
 * "unlockItem <site> <list> <id>".
 */
export class FakeTenant implements TenantClient {
  readonly calls: string[] = [];
  private readonly sites = new Map<string, FakeListSpec[]>();
  private readonly queued = new Map<string, unknown[]>();
  private readonly permanent = new Map<string, unknown>();
  private readonly hooks = new Map<string, () => void>();
  private readonly unlockResults = new Map<string, boolean>();

  addSite(url: string, lists: FakeListSpec[] = []): this {
    this.sites.set(url, lists.map((l) => ({ ...l })));
    return this;
  }

  /** Fail the next calls to `key` with these errors, in order. */
  failOnce(key: string, ...errors: unknown[]): this {
    this.queued.set(key, [...(this.queued.get(key) ?? []), ...errors]);
    return this;
  }

  failAlways(key: string, error: unknown): this {
    this.permanent.set(key, error);
    return this;
  }

  /** Run `hook` whenever `key` is called, before it answers. */
  onCall(key: string, hook: () => void): this {
    this.hooks.set(key, hook);
    return this;
  }

  setUnlockResult(key: string, unlocked: boolean): this {
    this.unlockResults.set(key, unlocked);
    return this;
  }

  labelOf(siteUrl: string, title: string): string | null {
    return this.list(siteUrl, title).label ?? null;
  }

  /* ───────── TenantClient ───────── */

  async connect(siteUrl: string, _credentials: SiteCredentials): Promise<Session> {
    this.hit(`connect ${siteUrl}`);
    if (!this.sites.has(siteUrl)) throw new RemoteError(`Site ${siteUrl} not found`, { status: 404 });
    return { siteUrl };
  }

  async disconnect(session: Session): Promise<void> {
    this.hit(`disconnect ${session.siteUrl}`);
  }

  async listLists(session: Session): Promise<ListInfo[]> {
    this.hit(`listLists ${session.siteUrl}`);
    const path = new URL(session.siteUrl).pathname;
    return this.lists(session.siteUrl).map((l) => ({
      title: l.title,
      hidden: l.hidden ?? false,
      itemCount: l.itemCount ?? l.items?.length ?? 1,
      url: `${path}/${l.title}`,
    }));
  }

  async getLabel(session: Session, listTitle: string): Promise<RetentionLabel | null> {
    this.hit(`getLabel ${session.siteUrl} ${listTitle}`);
    const label = this.list(session.siteUrl, listTitle).label;
    return label ? { name: label } : null;
  }

  async resetLabel(session: Session, listTitle: string): Promise<void> {
    this.hit(`resetLabel ${session.siteUrl} ${listTitle}`);
    this.list(session.siteUrl, listTitle).label = null;
  }

  async applyLabel(session: Session, listTitle: string, labelName: string): Promise<void> {
    this.hit(`applyLabel ${session.siteUrl} ${listTitle} ${labelName}`);
    this.list(session.siteUrl, listTitle).label = labelName;
  }

  async listItems(session: Session, list: ListInfo): Promise<ListItem[]> {
    this.hit(`listItems ${session.siteUrl} ${list.title}`);
    return (this.list(session.siteUrl, list.title).items ?? []).map((i) => ({ ...i }));
  }

  async unlockItem(session: Session, list: ListInfo, itemId: number): Promise<boolean> {
    const key = `unlockItem ${session.siteUrl} ${list.title} ${itemId}`;
    this.hit(key);
    return this.unlockResults.get(key) ?? true;
  }

  /* ───────── Internals ───────── */

  private hit(key: string): void {
    this.calls.push(key);
    this.hooks.get(key)?.();
    const queue = this.queued.get(key);
    if (queue && queue.length > 0) throw queue.shift();
    if (this.permanent.has(key)) throw this.permanent.get(key);
  }

  private lists(siteUrl: string): FakeListSpec[] {
    return this.sites.get(siteUrl) ?? [];
  }

  private list(siteUrl: string, title: string): FakeListSpec {
    const found = this.lists(siteUrl).find((l) => l.title === title);
    if (!found) throw new RemoteError(`List '${title}' not found`, { status: 404 });
    return found;
  }
}

// ─── Fake command runner ───

export class FakeRunner implements CommandRunner {
  readonly commands: Array<{ command: string; options?: ExecuteOptions }> = [];
  private readonly replies: PsResult[] = [];

  /** Queue results; once the queue is empty every command succeeds with no output. */
  reply(...results: PsResult[]): this {
    this.replies.push(...results);
    return this;
  }

  replyOutput(...outputs: string[]): this {
    return this.reply(...outputs.map((output) => ({ success: true, output })));
  }

  async execute(command: string, options?: ExecuteOptions): Promise<PsResult> {
    this.commands.push({ command, options });
    return this.replies.shift() ?? { success: true, output: "" };
  }
}
