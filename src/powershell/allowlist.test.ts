// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect } from "vitest";
import { connectCommand } from "../sharepoint/pnp-client.js";
import { extractCmdlets, validateCommand } from "./allowlist.js";

describe("extractCmdlets", () => {
  it("finds mixed-case cmdlet names", () => {
    expect(extractCmdlets("Get-PnPList -Includes RootFolder | ConvertTo-Json -AsArray -Compress")).toEqual([
      "Get-PnPList",
      "ConvertTo-Json",
    ]);
  });

  it("ignores text inside single-quoted strings, including escaped quotes", () => {
    expect(
      extractCmdlets("Get-PnPListItem -List 'Bob''s Set-Up' -PageSize 500 | ForEach-Object { $_.Id }"),
    ).toEqual(["Get-PnPListItem", "ForEach-Object"]);
  });
});

describe("validateCommand", () => {
  it("allows read cmdlets and pipeline builtins", () => {
    expect(validateCommand("Get-PnPRetentionLabel -List 'Documents' | Select-Object TagName | ConvertTo-Json")).toEqual({
      valid: true,
    });
  });

  it("refuses mutating cmdlets in report-only mode", () => {
    expect(validateCommand("Reset-PnPRetentionLabel -List 'Documents'")).toEqual({
      valid: false,
      violation: "Mutating cmdlet Reset-PnPRetentionLabel is not allowed in report-only mode",
    });
  });

  it("allows mutating cmdlets when mutations are enabled", () => {
    expect(
      validateCommand("Set-PnPRetentionLabel -List 'Documents' -Label 'Record'", { allowMutations: true }),
    ).toEqual({ valid: true });
  });

  it("blocks other mutating verbs even with mutations enabled", () => {
    expect(validateCommand("Remove-PnPList -Identity 'Documents'", { allowMutations: true })).toEqual({
      valid: false,
      violation: "Blocked cmdlet: Remove-PnPList — Remove-* cmdlets are not allowed",
    });
  });

  it("rejects cmdlets that are not on the list", () => {
    expect(validateCommand("Get-PnPWeb")).toEqual({
      valid: false,
      violation: "Unknown cmdlet: Get-PnPWeb — not in the allowlist",
    });
  });

  it("does not mistake a list title for a cmdlet", () => {
    expect(validateCommand("Get-PnPRetentionLabel -List 'Remove-Me'")).toEqual({ valid: true });
  });

  it("accepts every connect command the client builds", () => {
    const site = "https://contoso.sharepoint.com/sites/hr";
    expect(
      validateCommand(
        connectCommand(site, {
          kind: "certificate-file",
          clientId: "test-client",
          tenant: "contoso.onmicrosoft.com",
          certificatePath: "/certs/test.pfx",
          certificatePassword: "test-secret",
        }),
      ),
    ).toEqual({ valid: true });
    expect(validateCommand(connectCommand(site, { kind: "interactive", clientId: "test-client" }))).toEqual({
      valid: true,
    });
  });
});
