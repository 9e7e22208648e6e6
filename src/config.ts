// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Configuration ───
// Resolved once at startup from environment variables and CLI flags,
// validated with zod, frozen, and passed down by constructor injection.

import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/** SharePoint system libraries and lists that never carry user content. */
export const DEFAULT_IGNORED_LISTS: readonly string[] = [
  "Access Requests",
  "appdata",
  "appfiles",
  "Composed Looks",
  "Converted Forms",
  "Form Templates",
  "List Template Gallery",
  "Master Page Gallery",
  "Preservation Hold Library",
  "Site Assets",
  "Site Pages",
  "Solution Gallery",
  "Style Library",
  "Theme Gallery",
  "TaxonomyHiddenList",
  "User Information List",
  "Web Part Gallery",
];

export type Action = "reset-labels" | "unlock-records";
export type Mode = "report" | "apply";

// ─── Schema ───

const nonEmpty = z.string().trim().min(1);
const delay = z.coerce.number().int().nonnegative();
const flag = z.union([z.boolean(), z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1")]);

const credentialsSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("certificate"), clientId: nonEmpty, tenant: nonEmpty, thumbprint: nonEmpty }),
  z.object({
    kind: z.literal("certificate-file"),
    clientId: nonEmpty,
    tenant: nonEmpty,
    certificatePath: nonEmpty,
    certificatePassword: z.string().optional(),
  }),
  z.object({ kind: z.literal("interactive"), clientId: nonEmpty, tenant: nonEmpty.optional() }),
]);

export const runtimeConfigSchema = z.object({
  credentials: credentialsSchema,
  ignoredLists: z.array(z.string()).default([...DEFAULT_IGNORED_LISTS]),
  retry: z
    .object({
      maxAttempts: z.coerce.number().int().min(1).default(5),
      baseDelayMs: delay.default(5_000),
    })
    .default({}),
  pacing: z
    .object({
      itemDelayMs: delay.default(0),
      listDelayMs: delay.default(1_000),
      siteDelayMs: delay.default(2_000),
    })
    .default({}),
  logFile: nonEmpty.optional(),
  verbose: flag.default(false),
  failOnError: flag.default(false),
});

export const jobSchema = z.object({
  action: z.enum(["reset-labels", "unlock-records"]),
  mode: z.enum(["report", "apply"]).default("report"),
  targetLabel: z.string().trim().default(""),
});

export const cliConfigSchema = runtimeConfigSchema.extend({
  job: jobSchema,
  sitesFile: nonEmpty,
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type JobOptions = z.infer<typeof jobSchema>;
export type CliConfig = z.infer<typeof cliConfigSchema>;

// ─── Environment ───

export type Env = Record<string, string | undefined>;

/** Read an env var, treating empty strings as unset. */
function env(source: Env, name: string): string | undefined {
  const value = source[name]?.trim();
  return value === "" ? undefined : value;
}

/** Settings as read from the environment or the command line, before validation. */
export interface RawRuntimeInput {
  credentials: Record<string, string | undefined>;
  ignoredLists?: string[];
  retry: { maxAttempts?: string; baseDelayMs?: string };
  pacing: { itemDelayMs?: string; listDelayMs?: string; siteDelayMs?: string };
  logFile?: string;
  verbose?: string | boolean;
  failOnError?: string | boolean;
}

function credentialsFromEnv(source: Env): Record<string, string | undefined> {
  const base = { clientId: env(source, "SPO_CLIENT_ID"), tenant: env(source, "SPO_TENANT") };
  const thumbprint = env(source, "SPO_CERT_THUMBPRINT");
  if (thumbprint) return { kind: "certificate", ...base, thumbprint };
  const certificatePath = env(source, "SPO_CERT_PATH");
  if (certificatePath) {
    return {
      kind: "certificate-file",
      ...base,
      certificatePath,
      certificatePassword: source.SPO_CERT_PASSWORD,
    };
  }
  return { kind: "interactive", ...base };
}

/** Raw runtime settings from SPO_* environment variables, before validation. */
export function runtimeInputFromEnv(source: Env): RawRuntimeInput {
  const ignored = env(source, "SPO_IGNORED_LISTS");
  return {
    credentials: credentialsFromEnv(source),
    ignoredLists: ignored
      ?.split(",")
      .map((t) => t.trim())
      .filter((t) => t !== ""),
    retry: {
      maxAttempts: env(source, "SPO_MAX_ATTEMPTS"),
      baseDelayMs: env(source, "SPO_BASE_DELAY_MS"),
    },
    pacing: {
      itemDelayMs: env(source, "SPO_ITEM_DELAY_MS"),
      listDelayMs: env(source, "SPO_LIST_DELAY_MS"),
      siteDelayMs: env(source, "SPO_SITE_DELAY_MS"),
    },
    logFile: env(source, "SPO_LOG_FILE"),
    verbose: env(source, "SPO_VERBOSE"),
    failOnError: env(source, "SPO_FAIL_ON_ERROR"),
  };
}

// ─── Validation ───

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("\n");
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${what}:\n${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return deepFreeze(parsed.data);
}

export function loadRuntimeConfig(source: Env): RuntimeConfig {
  return parseWith(runtimeConfigSchema, runtimeInputFromEnv(source), "configuration");
}

// ─── Command Line ───

const ACTION_ALIASES: Record<string, Action> = {
  labels: "reset-labels",
  "reset-labels": "reset-labels",
  unlock: "unlock-records",
  "unlock-records": "unlock-records",
};

export const USAGE = `Usage: spo-maintenance <labels|unlock> --sites <file> [options]

  labels              find lists with a retention label; with --mode apply, reset and reapply it
  unlock              find items locked as records; with --mode apply, unlock them

Options:
  -s, --sites <file>      site URLs, one per line (or SPO_SITES_FILE)
  -m, --mode <mode>       report (default) or apply
  -t, --target <label>    only labels starting with this name (labels only)
      --ignore <title>    skip a list with this exact title (repeatable)
      --max-attempts <n>  attempts per throttled call (default 5)
      --base-delay <ms>   first backoff delay (default 5000)
      --item-delay <ms>   pause between items (default 0)
      --list-delay <ms>   pause between lists (default 1000)
      --site-delay <ms>   pause between sites (default 2000)
      --log-file <path>   append every log entry to this file
      --fail-on-error     exit 2 when anything failed
  -v, --verbose           echo verbose entries
  -h, --help              show this help

Credentials: SPO_CLIENT_ID, SPO_TENANT and SPO_CERT_THUMBPRINT or SPO_CERT_PATH
(+ SPO_CERT_PASSWORD); interactive sign-in when no certificate is set.`;

export function wantsHelp(argv: readonly string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        sites: { type: "string", short: "s" },
        mode: { type: "string", short: "m" },
        target: { type: "string", short: "t" },
        ignore: { type: "string", multiple: true },
        "max-attempts": { type: "string" },
        "base-delay": { type: "string" },
        "item-delay": { type: "string" },
        "list-delay": { type: "string" },
        "site-delay": { type: "string" },
        "log-file": { type: "string" },
        "fail-on-error": { type: "boolean" },
        verbose: { type: "boolean", short: "v" },
      },
    });
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/** Resolve the CLI configuration: flags win over SPO_* environment variables. */
export function parseCliArgs(argv: readonly string[], source: Env): CliConfig {
  const { values, positionals } = readArgs(argv);
  if (positionals.length !== 1) {
    throw new ConfigurationError(`Expected exactly one action (labels or unlock), got ${positionals.length}\n\n${USAGE}`);
  }
  const action = ACTION_ALIASES[positionals[0]];
  if (!action) {
    throw new ConfigurationError(`Unknown action '${positionals[0]}' (expected labels or unlock)`);
  }

  const fromEnv = runtimeInputFromEnv(source);
  const extraIgnored = values.ignore ?? [];
  const input = {
    ...fromEnv,
    ignoredLists:
      extraIgnored.length > 0 ? [...(fromEnv.ignoredLists ?? DEFAULT_IGNORED_LISTS), ...extraIgnored] : fromEnv.ignoredLists,
    retry: {
      maxAttempts: values["max-attempts"] ?? fromEnv.retry.maxAttempts,
      baseDelayMs: values["base-delay"] ?? fromEnv.retry.baseDelayMs,
    },
    pacing: {
      itemDelayMs: values["item-delay"] ?? fromEnv.pacing.itemDelayMs,
      listDelayMs: values["list-delay"] ?? fromEnv.pacing.listDelayMs,
      siteDelayMs: values["site-delay"] ?? fromEnv.pacing.siteDelayMs,
    },
    logFile: values["log-file"] ?? fromEnv.logFile,
    verbose: values.verbose ?? fromEnv.verbose,
    failOnError: values["fail-on-error"] ?? fromEnv.failOnError,
    sitesFile: values.sites ?? env(source, "SPO_SITES_FILE"),
    job: {
      action,
      mode: values.mode,
      targetLabel: values.target ?? env(source, "SPO_TARGET_LABEL"),
    },
  };
  return parseWith(cliConfigSchema, input, "command line");
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
