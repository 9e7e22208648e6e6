// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Qualification Rules ───

/**
 * A label qualifies when one is present and either no target is configured
 * or it starts with the target. Label names often carry a suffix such as
 * "Record (Retain 1yr)", so the comparison is a prefix match.
 */
export function labelQualifies(labelName: string | null | undefined, targetLabel: string): boolean {
  if (labelName === null || labelName === undefined || labelName === "") return false;
  if (targetLabel === "") return true;
  return labelName.startsWith(targetLabel);
}

/** `_ComplianceFlags` values of an item locked as a record. */
export const LOCKED_FLAGS: ReadonlySet<number> = new Set([7, 519]);

/** Values seen on items that are not locked: no policy, or a record that has been unlocked. */
export const UNLOCKED_FLAGS: ReadonlySet<number> = new Set([0, 771]);

export type ComplianceFlag = number | string | null | undefined;

export type FlagState = "locked" | "unlocked" | "unknown";

export function classifyComplianceFlag(flag: ComplianceFlag): FlagState {
  if (flag === null || flag === undefined) return "unlocked";
  if (typeof flag === "string" && flag.trim() === "") return "unlocked";

  const value = typeof flag === "number" ? flag : Number(flag.trim());
  if (LOCKED_FLAGS.has(value)) return "locked";
  if (UNLOCKED_FLAGS.has(value)) return "unlocked";
  return "unknown";
}
