// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Cmdlet Allow-list ───
// Only these cmdlets may be sent to the PnP PowerShell session.
// Mutating cmdlets are refused unless the caller runs in apply mode.

export const READ_CMDLETS: ReadonlySet<string> = new Set([
  "Connect-PnPOnline",
  "Disconnect-PnPOnline",
  "Get-PnPList",
  "Get-PnPListItem",
  "Get-PnPRetentionLabel",
]);

export const MUTATING_CMDLETS: ReadonlySet<string> = new Set([
  "Reset-PnPRetentionLabel",
  "Set-PnPRetentionLabel",
  "Invoke-PnPSPRestMethod",
]);

// Prefixes that are NEVER allowed unless listed above
const BLOCKED_PREFIXES = [
  "Set-",
  "New-",
  "Remove-",
  "Reset-",
  "Enable-",
  "Disable-",
  "Start-",
  "Stop-",
  "Invoke-",
  "Add-",
  "Clear-",
  "Move-",
  "Copy-",
  "Restore-",
  "Grant-",
  "Revoke-",
  "Register-",
  "Update-",
];

// PowerShell built-in / formatting cmdlets that are always safe
const SAFE_BUILTINS: ReadonlySet<string> = new Set([
  "Write-Output",
  "Select-Object",
  "Where-Object",
  "ForEach-Object",
  "ConvertTo-Json",
  "ConvertFrom-Json",
  "ConvertTo-SecureString",
  "Out-Null",
]);

// Verb-Noun cmdlet pattern; nouns may be mixed case (Get-PnPList, ConvertTo-Json)
const CMDLET_RE = /\b([A-Z][A-Za-z]*-[A-Z][A-Za-z]+)\b/g;

// Single-quoted literals, with '' as the escaped quote
const QUOTED_RE = /'(?:[^']|'')*'/g;

export interface ValidationResult {
  valid: boolean;
  violation?: string;
}

export interface ValidationOptions {
  allowMutations?: boolean;
}

/** Cmdlet names used by a command, ignoring anything inside single-quoted strings. */
export function extractCmdlets(command: string): string[] {
  const code = command.replace(QUOTED_RE, "''");
  return [...code.matchAll(CMDLET_RE)].map((m) => m[1]);
}

/**
 * Validate a PowerShell command string against the allowlist.
 * Returns `{ valid: true }` when safe, or `{ valid: false, violation }` when blocked.
 */
export function validateCommand(command: string, options: ValidationOptions = {}): ValidationResult {
  for (const cmdlet of extractCmdlets(command)) {
    if (MUTATING_CMDLETS.has(cmdlet)) {
      if (!options.allowMutations) {
        return {
          valid: false,
          violation: `Mutating cmdlet ${cmdlet} is not allowed in report-only mode`,
        };
      }
      continue;
    }
    if (READ_CMDLETS.has(cmdlet) || SAFE_BUILTINS.has(cmdlet)) continue;

    for (const prefix of BLOCKED_PREFIXES) {
      if (cmdlet.startsWith(prefix)) {
        return {
          valid: false,
          violation: `Blocked cmdlet: ${cmdlet} — ${prefix}* cmdlets are not allowed`,
        };
      }
    }

    return {
      valid: false,
      violation: `Unknown cmdlet: ${cmdlet} — not in the allowlist`,
    };
  }

  return { valid: true };
}
