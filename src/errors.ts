// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Error Taxonomy ───
// Remote adapters throw RemoteError with structured status fields.
// Everything the traversal recovers from is one of the classes below.

export interface RemoteErrorDetails {
  /** HTTP status reported by the remote service, when it reported one. */
  status?: number;
  /** Server-supplied Retry-After, in seconds. */
  retryAfterSeconds?: number;
}

/** A failed remote call, as reported by the remote-call adapter. */
export class RemoteError extends Error {
  readonly status?: number;
  readonly retryAfterSeconds?: number;

  constructor(message: string, details: RemoteErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = "RemoteError";
    this.status = details.status;
    this.retryAfterSeconds = details.retryAfterSeconds;
  }
}

/** Input or settings are missing or invalid. Fatal before any processing starts. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** A throttled operation failed on every attempt it was given. */
export class RetryExhaustedError extends Error {
  readonly description: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(description: string, attempts: number, status: number | undefined, cause: unknown) {
    super(
      `${description}: max retries exceeded after ${attempts} attempt${attempts === 1 ? "" : "s"}` +
        (status !== undefined ? ` (last status ${status})` : ""),
      { cause },
    );
    this.name = "RetryExhaustedError";
    this.description = description;
    this.attempts = attempts;
    this.status = status;
  }
}

/**
 * The label was reset but reapplying it failed. The list is left without a
 * label, and a later run sees "no label set" and will not pick it up again.
 */
export class PartialMutationError extends Error {
  readonly listTitle: string;
  readonly labelName: string;

  constructor(listTitle: string, labelName: string, cause: unknown) {
    super(
      `Label '${labelName}' was reset on '${listTitle}' but could not be reapplied: ${describeError(cause)}`,
      { cause },
    );
    this.name = "PartialMutationError";
    this.listTitle = listTitle;
    this.labelName = labelName;
  }
}

/** Render any thrown value as a single log-friendly line. */
export function describeError(err: unknown): string {
  if (err instanceof RemoteError && err.status !== undefined) {
    return `${err.message} (HTTP ${err.status})`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
