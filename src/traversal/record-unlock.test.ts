// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { describe, it, expect } from "vitest";
import type { RuntimeConfig } from "../config.js";
import { createController } from "../run.js";
import type { ListItem } from "../sharepoint/types.js";
import { denied, FakeTenant, recordingSleep, silentLog, testConfig, throttled } from "../test-fakes.js";

const SITE = "https://contoso.sharepoint.com/sites/legal";

const ITEMS: ListItem[] = [
  { id: 1, displayName: "contract.docx", complianceFlag: 7 },
  { id: 2, displayName: "policy.pdf", complianceFlag: 519 },
  { id: 3, displayName: "released.docx", complianceFlag: 771 },
  { id: 4, displayName: "draft.docx", complianceFlag: null },
  { id: 5, displayName: "odd.xlsx", complianceFlag: 42 },
];

function run(
  tenant: FakeTenant,
  mode: "report" | "apply",
  options: { config?: RuntimeConfig; signal?: AbortSignal } = {},
) {
  const log = silentLog();
  const { sleep, waits } = recordingSleep();
  const controller = createController(
    options.config ?? testConfig(),
    { action: "unlock-records", mode, targetLabel: "" },
    { client: tenant, logger: log, sleep },
  );
  return { result: controller.run([SITE], options.signal), log, waits };
}

function unlocks(tenant: FakeTenant): string[] {
  return tenant.calls.filter((c) => c.startsWith("unlockItem"));
}

describe("RecordUnlockWorker — report mode", () => {
  it("finds locked records and never unlocks", async () => {
    const tenant = new FakeTenant().addSite(SITE, [{ title: "Documents", items: ITEMS }]);
    const { result, log } = run(tenant, "report");
    const summary = await result;

    expect(summary.counters.itemsInspected).toBe(5);
    expect(summary.counters.qualifying).toBe(2);
    expect(summary.counters.mutated).toBe(0);
    expect(unlocks(tenant)).toEqual([]);
    expect(log.getAll().filter((e) => e.level === "info").map((e) => e.message)).toEqual(
      expect.arrayContaining([
        "item 1 'contract.docx' in 'Documents': locked record (report only)",
        "item 2 'policy.pdf' in 'Documents': locked record (report only)",
      ]),
    );
  });

  it("warns about unknown flags without acting on them", async () => {
    const tenant = new FakeTenant().addSite(SITE, [{ title: "Documents", items: ITEMS }]);
    const { result, log } = run(tenant, "apply");
    await result;

    expect(log.getAll().filter((e) => e.level === "warn").map((e) => e.message)).toEqual([
      "item 5 'odd.xlsx' in 'Documents': unknown flag 42 - skip",
    ]);
    expect(unlocks(tenant)).not.toContain(`unlockItem ${SITE} Documents 5`);
  });
});

describe("RecordUnlockWorker — apply mode", () => {
  it("unlocks only the locked items, in page order", async () => {
    const tenant = new FakeTenant().addSite(SITE, [{ title: "Documents", items: ITEMS }]);
    const summary = await run(tenant, "apply").result;

    expect(unlocks(tenant)).toEqual([`unlockItem ${SITE} Documents 1`, `unlockItem ${SITE} Documents 2`]);
    expect(summary.counters.mutated).toBe(2);
    expect(summary.counters.itemsFailed).toBe(0);
    expect(summary.counters.listsProcessed).toBe(1);
  });

  it("skips an item that fails and moves on to the next one", async () => {
    const tenant = new FakeTenant()
      .addSite(SITE, [{ title: "Documents", items: ITEMS }])
      .failAlways(`unlockItem ${SITE} Documents 1`, denied());
    const { result, log } = run(tenant, "apply");
    const summary = await result;

    expect(summary.counters.itemsFailed).toBe(1);
    expect(summary.counters.mutated).toBe(1);
    expect(summary.counters.listsProcessed).toBe(1);
    expect(summary.counters.listsFailed).toBe(0);
    expect(log.getAll().filter((e) => e.level === "error").map((e) => e.message)).toEqual([
      "Skipping item 1 'contract.docx' in 'Documents': Access denied (HTTP 403)",
    ]);
  });

  it("counts an unlock that did not take effect as an item failure", async () => {
    const tenant = new FakeTenant()
      .addSite(SITE, [{ title: "Documents", items: ITEMS }])
      .setUnlockResult(`unlockItem ${SITE} Documents 2`, false);
    const { result, log } = run(tenant, "apply");
    const summary = await result;

    expect(summary.counters.mutated).toBe(1);
    expect(summary.counters.itemsFailed).toBe(1);
    expect(log.getAll().map((e) => e.message)).toContain("item 2 'policy.pdf' in 'Documents': unlock did not take effect");
  });

  it("retries a throttled unlock", async () => {
    const tenant = new FakeTenant()
      .addSite(SITE, [{ title: "Documents", items: [ITEMS[0]] }])
      .failOnce(`unlockItem ${SITE} Documents 1`, throttled(429, 7));
    const { result, waits } = run(tenant, "apply");
    const summary = await result;

    expect(waits).toEqual([7_000]);
    expect(summary.counters.mutated).toBe(1);
  });

  it("fails the whole list when its items cannot be read", async () => {
    const tenant = new FakeTenant()
      .addSite(SITE, [
        { title: "Documents", items: ITEMS },
        { title: "Archive", items: [ITEMS[0]] },
      ])
      .failAlways(`listItems ${SITE} Documents`, denied());
    const summary = await run(tenant, "apply").result;

    expect(summary.counters.listsFailed).toBe(1);
    expect(summary.counters.listsProcessed).toBe(1);
    expect(unlocks(tenant)).toEqual([`unlockItem ${SITE} Archive 1`]);
  });
});

describe("RecordUnlockWorker — pacing and cancellation", () => {
  it("paces between items but not after the last one", async () => {
    const tenant = new FakeTenant().addSite(SITE, [{ title: "Documents", items: ITEMS.slice(0, 3) }]);
    const config = testConfig({ pacing: { itemDelayMs: 50, listDelayMs: 0, siteDelayMs: 0 } });
    const { result, waits } = run(tenant, "report", { config });
    await result;

    expect(waits).toEqual([50, 50]);
  });

  it("stops at the next item boundary when cancelled", async () => {
    const abort = new AbortController();
    const tenant = new FakeTenant()
      .addSite(SITE, [{ title: "Documents", items: ITEMS }])
      .onCall(`unlockItem ${SITE} Documents 1`, () => abort.abort());
    const summary = await run(tenant, "apply", { signal: abort.signal }).result;

    expect(summary.cancelled).toBe(true);
    expect(unlocks(tenant)).toEqual([`unlockItem ${SITE} Documents 1`]);
    expect(summary.counters.mutated).toBe(1);
    expect(summary.counters.itemsInspected).toBe(1);
    expect(summary.counters.listsProcessed).toBe(0);
    expect(tenant.calls[tenant.calls.length - 1]).toBe(`disconnect ${SITE}`);
  });

  it("does not pause after the item during which it was cancelled", async () => {
    const abort = new AbortController();
    const tenant = new FakeTenant()
      .addSite(SITE, [{ title: "Documents", items: ITEMS }])
      .onCall(`unlockItem ${SITE} Documents 1`, () => abort.abort());
    const config = testConfig({ pacing: { itemDelayMs: 50, listDelayMs: 0, siteDelayMs: 0 } });
    const { result, waits } = run(tenant, "apply", { config, signal: abort.signal });
    await result;

    expect(waits).toEqual([]);
  });
});
