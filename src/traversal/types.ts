// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { CounterSnapshot, Counters } from "../counters.js";
import type { Logger } from "../logger.js";
import type { ListInfo, RemoteOperation, Session } from "../sharepoint/types.js";

export type TraversalState =
  | "idle"
  | "connecting-site"
  | "enumerating-lists"
  | "fetching-state"
  | "acting"
  | "pacing"
  | "disconnecting-site"
  | "pacing-between-sites"
  | "done";

export type ListOutcome = "completed" | "cancelled";

/** What a list worker gets from the controller for one list. */
export interface WorkContext {
  readonly siteUrl: string;
  readonly session: Session;
  readonly counters: Counters;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  /** Run a remote operation through the retry policy. */
  call<T>(operation: RemoteOperation<T>, description: string): Promise<T>;
  /** Pause between two items of the same list. */
  paceItem(description: string): Promise<void>;
  enter(state: TraversalState): void;
}

/**
 * Inspects one list and acts on it (or its items) when it qualifies.
 * Throwing marks the whole list as failed.
 */
export interface ListWorker {
  processList(list: ListInfo, ctx: WorkContext): Promise<ListOutcome>;
}

export interface RunSummary {
  counters: Readonly<CounterSnapshot>;
  cancelled: boolean;
}
