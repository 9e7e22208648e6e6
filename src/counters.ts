// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Run Counters ───

export interface CounterSnapshot {
  sitesTotal: number;
  sitesProcessed: number;
  sitesFailed: number;
  listsProcessed: number;
  listsFailed: number;
  itemsInspected: number;
  itemsFailed: number;
  qualifying: number;
  mutated: number;
  partialMutations: number;
}

export type CounterName = Exclude<keyof CounterSnapshot, "sitesTotal">;

/** Increment-only tallies for one run. */
export class Counters {
  private values: CounterSnapshot;

  constructor(sitesTotal: number) {
    this.values = {
      sitesTotal,
      sitesProcessed: 0,
      sitesFailed: 0,
      listsProcessed: 0,
      listsFailed: 0,
      itemsInspected: 0,
      itemsFailed: 0,
      qualifying: 0,
      mutated: 0,
      partialMutations: 0,
    };
  }

  increment(name: CounterName, by = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Counter '${name}' can only grow (got ${by})`);
    }
    this.values[name] += by;
  }

  snapshot(): Readonly<CounterSnapshot> {
    return Object.freeze({ ...this.values });
  }
}

export function failureCount(c: CounterSnapshot): number {
  return c.sitesFailed + c.listsFailed + c.itemsFailed + c.partialMutations;
}

export interface SummaryLabels {
  /** What qualifies, e.g. "labelled lists" or "locked records". */
  qualifying: string;
  /** What apply mode does, e.g. "relabelled" or "unlocked". */
  mutated: string;
  /** Whether mutations were attempted in this run. */
  applied: boolean;
}

/** Plain-text end-of-run summary. */
export function renderSummary(c: CounterSnapshot, labels: SummaryLabels, cancelled = false): string {
  const lines: string[] = [];
  lines.push(cancelled ? "Summary (run cancelled)" : "Summary");
  lines.push(`  Sites processed:   ${c.sitesProcessed}/${c.sitesTotal}`);
  lines.push(`  Lists processed:   ${c.listsProcessed}`);
  if (c.itemsInspected > 0) lines.push(`  Items inspected:   ${c.itemsInspected}`);
  lines.push(`  Found (${labels.qualifying}): ${c.qualifying}`);
  if (labels.applied) lines.push(`  ${capitalize(labels.mutated)}: ${c.mutated}`);
  const failures = failureCount(c);
  if (failures > 0) {
    lines.push(
      `  Failures:          ${c.sitesFailed} site(s), ${c.listsFailed} list(s), ${c.itemsFailed} item(s)` +
        (c.partialMutations > 0 ? `, ${c.partialMutations} partial` : ""),
    );
  }
  return lines.join("\n");
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
