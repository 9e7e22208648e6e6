// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── PnP PowerShell Client ───
// Implements the remote capabilities with PnP.PowerShell cmdlets sent through
// a CommandRunner. Every failure becomes a RemoteError carrying the status.

import { z } from "zod";
import { RemoteError } from "../errors.js";
import type { CommandRunner, ExecuteOptions } from "../powershell/executor.js";
import { classifyComplianceFlag } from "../qualify.js";
import { escapeForPs, tryParseJson, truncate } from "../utils.js";
import type {
  LabelCapability,
  ListInfo,
  ListItem,
  RecordCapability,
  RetentionLabel,
  Session,
  SiteConnector,
  SiteCredentials,
} from "./types.js";

const UNLOCK_ENDPOINT = "/_api/SP.CompliancePolicy.SPPolicyStoreProxy.UnlockRecordItem()";
const ITEM_PAGE_SIZE = 500;

const flagSchema = z.union([z.number(), z.string()]).nullish();

const listSchema = z.object({
  Title: z.string(),
  Hidden: z.boolean(),
  ItemCount: z.number().int(),
  Url: z.string().nullish(),
});

const labelSchema = z.object({ TagName: z.string().nullish() });

const itemSchema = z.object({
  Id: z.number().int(),
  Name: z.string().nullish(),
  Flag: flagSchema,
});

export interface PnpClientOptions {
  /** Permit the mutating cmdlets (label reset/apply, record unlock). */
  allowMutations: boolean;
}

class PnpSession implements Session {
  open = true;
  constructor(readonly siteUrl: string) {}
}

/** Build the Connect-PnPOnline command for the given credentials. */
export function connectCommand(siteUrl: string, credentials: SiteCredentials): string {
  const parts = [`Connect-PnPOnline -Url '${escapeForPs(siteUrl)}' -ClientId '${escapeForPs(credentials.clientId)}'`];
  switch (credentials.kind) {
    case "certificate":
      parts.push(`-Tenant '${escapeForPs(credentials.tenant)}' -Thumbprint '${escapeForPs(credentials.thumbprint)}'`);
      break;
    case "certificate-file":
      parts.push(
        `-Tenant '${escapeForPs(credentials.tenant)}' -CertificatePath '${escapeForPs(credentials.certificatePath)}'`,
      );
      if (credentials.certificatePassword !== undefined) {
        parts.push(
          `-CertificatePassword (ConvertTo-SecureString -String '${escapeForPs(credentials.certificatePassword)}' -AsPlainText -Force)`,
        );
      }
      break;
    case "interactive":
      parts.push("-Interactive");
      if (credentials.tenant !== undefined) parts.push(`-Tenant '${escapeForPs(credentials.tenant)}'`);
      break;
  }
  parts.push("-ErrorAction Stop");
  return parts.join(" ");
}

/**
 * PnP keeps one current connection per PowerShell session, so this client
 * holds at most one open Session at a time.
 */
export class PnpClient implements SiteConnector, LabelCapability, RecordCapability {
  private active: PnpSession | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: PnpClientOptions,
  ) {}

  /* ───────── Connection ───────── */

  async connect(siteUrl: string, credentials: SiteCredentials): Promise<Session> {
    if (this.active) {
      throw new Error(`A session for ${this.active.siteUrl} is still open`);
    }
    await this.run(connectCommand(siteUrl, credentials), { describe: `Connect-PnPOnline -Url '${siteUrl}'` });
    this.active = new PnpSession(siteUrl);
    return this.active;
  }

  async disconnect(session: Session): Promise<void> {
    const s = this.own(session);
    try {
      await this.run("Disconnect-PnPOnline");
    } finally {
      // The next Connect-PnPOnline replaces the connection either way.
      s.open = false;
      this.active = null;
    }
  }

  async listLists(session: Session): Promise<ListInfo[]> {
    this.own(session);
    const out = await this.run(
      "Get-PnPList -Includes RootFolder | Select-Object Title, Hidden, ItemCount, " +
        "@{ n = 'Url'; e = { $_.RootFolder.ServerRelativeUrl } } | ConvertTo-Json -AsArray -Compress",
    );
    return this.parseArray(out, listSchema, "Get-PnPList").map((l) => ({
      title: l.Title,
      hidden: l.Hidden,
      itemCount: l.ItemCount,
      url: l.Url ?? "",
    }));
  }

  /* ───────── Labels ───────── */

  async getLabel(session: Session, listTitle: string): Promise<RetentionLabel | null> {
    this.own(session);
    const out = await this.run(
      `Get-PnPRetentionLabel -List '${escapeForPs(listTitle)}' | Select-Object TagName | ConvertTo-Json -Compress`,
    );
    if (out.trim() === "") return null;
    const parsed = labelSchema.safeParse(tryParseJson(out));
    if (!parsed.success) throw this.unexpected("Get-PnPRetentionLabel", out);
    const name = parsed.data.TagName;
    return name ? { name } : null;
  }

  async resetLabel(session: Session, listTitle: string): Promise<void> {
    this.own(session);
    await this.run(`Reset-PnPRetentionLabel -List '${escapeForPs(listTitle)}' -ErrorAction Stop`, {
      allowMutations: this.options.allowMutations,
    });
  }

  async applyLabel(session: Session, listTitle: string, labelName: string): Promise<void> {
    this.own(session);
    await this.run(
      `Set-PnPRetentionLabel -List '${escapeForPs(listTitle)}' -Label '${escapeForPs(labelName)}' -ErrorAction Stop`,
      { allowMutations: this.options.allowMutations },
    );
  }

  /* ───────── Records ───────── */

  async listItems(session: Session, list: ListInfo): Promise<ListItem[]> {
    this.own(session);
    const out = await this.run(
      `Get-PnPListItem -List '${escapeForPs(list.title)}' -PageSize ${ITEM_PAGE_SIZE} ` +
        `-Fields 'ID','Title','FileLeafRef','_ComplianceFlags' | ForEach-Object { [pscustomobject]@{ ` +
        `Id = $_.Id; Name = ($_.FieldValues['FileLeafRef'] ?? $_.FieldValues['Title']); ` +
        `Flag = $_.FieldValues['_ComplianceFlags'] } } | ConvertTo-Json -AsArray -Compress`,
      { timeoutMs: 600_000 },
    );
    return this.parseArray(out, itemSchema, "Get-PnPListItem").map((i) => ({
      id: i.Id,
      displayName: i.Name ?? `#${i.Id}`,
      complianceFlag: i.Flag ?? null,
    }));
  }

  async unlockItem(session: Session, list: ListInfo, itemId: number): Promise<boolean> {
    this.own(session);
    const listUrl = new URL(session.siteUrl).origin + list.url;
    await this.run(
      `Invoke-PnPSPRestMethod -Method Post -Url '${UNLOCK_ENDPOINT}' ` +
        `-Content @{ listUrl = '${escapeForPs(listUrl)}'; itemId = '${itemId}' } | Out-Null`,
      { allowMutations: this.options.allowMutations },
    );

    // Read the flag back: the endpoint answers 200 even when nothing changed.
    const out = await this.run(
      `Get-PnPListItem -List '${escapeForPs(list.title)}' -Id ${itemId} -Fields '_ComplianceFlags' | ` +
        `ForEach-Object { [pscustomobject]@{ Flag = $_.FieldValues['_ComplianceFlags'] } } | ConvertTo-Json -Compress`,
    );
    const parsed = z.object({ Flag: flagSchema }).safeParse(tryParseJson(out));
    if (!parsed.success) throw this.unexpected("Get-PnPListItem", out);
    return classifyComplianceFlag(parsed.data.Flag) !== "locked";
  }

  /* ───────── Internals ───────── */

  private async run(command: string, options: ExecuteOptions = {}): Promise<string> {
    const result = await this.runner.execute(command, options);
    if (!result.success) {
      throw new RemoteError(result.error ?? "PowerShell command failed", {
        status: result.status,
        retryAfterSeconds: result.retryAfterSeconds,
      });
    }
    return result.output;
  }

  private own(session: Session): PnpSession {
    if (session !== this.active || !(session instanceof PnpSession) || !session.open) {
      throw new Error(`Session for ${session.siteUrl} is not the open session`);
    }
    return session;
  }

  private parseArray<T>(out: string, schema: z.ZodType<T>, source: string): T[] {
    if (out.trim() === "") return [];
    const parsed = z.array(schema).safeParse(tryParseJson(out));
    if (!parsed.success) throw this.unexpected(source, out);
    return parsed.data;
  }

  private unexpected(source: string, out: string): RemoteError {
    return new RemoteError(`Unexpected ${source} output: ${truncate(out, 200)}`);
  }
}
