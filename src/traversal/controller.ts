// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Traversal Controller ───
// Drives sites → lists → (worker). Every remote call goes through the retry
// policy; every failure is logged and skipped at the lowest enclosing level.

import { Counters } from "../counters.js";
import { PartialMutationError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { PacingDelays, RateLimiter } from "../pacing.js";
import type { RetryPolicy } from "../retry.js";
import type { ListInfo, RemoteOperation, Session, SiteConnector, SiteCredentials } from "../sharepoint/types.js";
import type { ListOutcome, ListWorker, RunSummary, TraversalState, WorkContext } from "./types.js";

export interface TraversalOptions {
  credentials: SiteCredentials;
  ignoredLists: ReadonlySet<string>;
  pacing: PacingDelays;
  retry: { maxAttempts: number; baseDelayMs: number };
}

export interface TraversalDeps {
  connector: SiteConnector;
  worker: ListWorker;
  retry: RetryPolicy;
  pacer: RateLimiter;
  logger: Logger;
}

/**
 * Lists worth visiting: visible, non-empty, not ignored. The result is frozen;
 * nothing re-queries the site while it is traversed.
 */
export function selectLists(lists: readonly ListInfo[], ignored: ReadonlySet<string>): readonly ListInfo[] {
  return Object.freeze(lists.filter((l) => !l.hidden && l.itemCount > 0 && !ignored.has(l.title)));
}

export class TraversalController {
  private current: TraversalState = "idle";

  constructor(
    private readonly deps: TraversalDeps,
    private readonly options: TraversalOptions,
  ) {}

  get state(): TraversalState {
    return this.current;
  }

  async run(sites: readonly string[], signal?: AbortSignal): Promise<RunSummary> {
    const { logger, pacer } = this.deps;
    const counters = new Counters(sites.length);
    let cancelled = false;

    for (let i = 0; i < sites.length; i++) {
      if (signal?.aborted) {
        cancelled = true;
        logger.warn(`Run cancelled before site ${i + 1}/${sites.length}`);
        break;
      }

      const siteUrl = sites[i];
      logger.info(`[${i + 1}/${sites.length}] ${siteUrl}`);
      const outcome = await this.processSite(siteUrl, counters, signal);
      if (outcome === "cancelled") {
        cancelled = true;
        logger.warn(`Run cancelled while processing ${siteUrl}`);
        break;
      }

      if (i < sites.length - 1 && !signal?.aborted) {
        this.enter("pacing-between-sites");
        await pacer.pace(this.options.pacing.siteDelayMs, "before next site");
      }
    }

    this.enter("done");
    return { counters: counters.snapshot(), cancelled };
  }

  /* ───────── Site level ───────── */

  private async processSite(
    siteUrl: string,
    counters: Counters,
    signal?: AbortSignal,
  ): Promise<ListOutcome | "failed"> {
    const { connector, logger } = this.deps;

    this.enter("connecting-site");
    let session: Session;
    try {
      session = await this.call(() => connector.connect(siteUrl, this.options.credentials), `Connect to ${siteUrl}`);
    } catch (err) {
      counters.increment("sitesFailed");
      logger.error(`Skipping site ${siteUrl}: cannot connect: ${describeError(err)}`);
      return "failed";
    }

    try {
      this.enter("enumerating-lists");
      let lists: readonly ListInfo[];
      try {
        const all = await this.call(() => connector.listLists(session), `Enumerate lists of ${siteUrl}`);
        lists = selectLists(all, this.options.ignoredLists);
      } catch (err) {
        counters.increment("sitesFailed");
        logger.error(`Skipping site ${siteUrl}: cannot enumerate lists: ${describeError(err)}`);
        return "failed";
      }
      logger.info(`${lists.length} list(s) to process in ${siteUrl}`);

      const outcome = await this.processLists(siteUrl, session, lists, counters, signal);
      if (outcome === "completed") counters.increment("sitesProcessed");
      return outcome;
    } finally {
      this.enter("disconnecting-site");
      await this.release(session);
    }
  }

  private async release(session: Session): Promise<void> {
    try {
      await this.call(() => this.deps.connector.disconnect(session), `Disconnect from ${session.siteUrl}`);
    } catch (err) {
      this.deps.logger.warn(`Disconnect from ${session.siteUrl} failed: ${describeError(err)}`);
    }
  }

  /* ───────── List level ───────── */

  private async processLists(
    siteUrl: string,
    session: Session,
    lists: readonly ListInfo[],
    counters: Counters,
    signal?: AbortSignal,
  ): Promise<ListOutcome> {
    const { logger, pacer, worker } = this.deps;
    const ctx = this.context(siteUrl, session, counters, signal);

    for (let j = 0; j < lists.length; j++) {
      if (signal?.aborted) return "cancelled";

      const list = lists[j];
      logger.verbose(`List '${list.title}' (${list.itemCount} item(s))`);
      try {
        const outcome = await worker.processList(list, ctx);
        if (outcome === "cancelled") return "cancelled";
        counters.increment("listsProcessed");
      } catch (err) {
        counters.increment("listsFailed");
        if (err instanceof PartialMutationError) {
          counters.increment("partialMutations");
          logger.error(`PARTIAL MUTATION on '${list.title}' in ${siteUrl}: ${err.message}. List is left without a label.`);
        } else {
          logger.error(`Skipping list '${list.title}' in ${siteUrl}: ${describeError(err)}`);
        }
      }

      if (j < lists.length - 1 && !signal?.aborted) {
        this.enter("pacing");
        await pacer.pace(this.options.pacing.listDelayMs, "before next list");
      }
    }
    return "completed";
  }

  private context(siteUrl: string, session: Session, counters: Counters, signal?: AbortSignal): WorkContext {
    return {
      siteUrl,
      session,
      counters,
      logger: this.deps.logger,
      signal,
      call: (operation, description) => this.call(operation, description),
      paceItem: async (description) => {
        this.enter("pacing");
        await this.deps.pacer.pace(this.options.pacing.itemDelayMs, description);
      },
      enter: (state) => this.enter(state),
    };
  }

  /* ───────── Internals ───────── */

  private call<T>(operation: RemoteOperation<T>, description: string): Promise<T> {
    return this.deps.retry.execute(operation, { ...this.options.retry, description });
  }

  private enter(state: TraversalState): void {
    if (state === this.current) return;
    this.current = state;
    this.deps.logger.verbose(`state → ${state}`);
  }
}
