// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Run Log ───
// Leveled log of one process: kept in memory (unless told otherwise), echoed
// to stderr, and optionally appended to a log file. Writing must never stop a run.

import { appendFileSync } from "node:fs";

export type LogLevel = "verbose" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  verbose: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_ICON: Record<LogLevel, string> = {
  verbose: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/** The sink every component writes to. */
export interface Logger {
  log(level: LogLevel, message: string): void;
  verbose(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunLogOptions {
  /** Echo entries at or above this level; `false` disables echoing. */
  echo?: LogLevel | false;
  /** Append every entry to this file. */
  filePath?: string;
  /** Keep entries in memory for `getAll` and `toMarkdown` (default true). Counts are kept either way. */
  retain?: boolean;
  stream?: { write(text: string): unknown };
  appendFile?: (path: string, text: string) => void;
  now?: () => Date;
}

let stderrGuarded = false;
let stderrBroken = false;

/** A closed stderr (EPIPE) arrives as an 'error' event; unhandled, it would end the process. */
function guardStderr(): void {
  if (stderrGuarded) return;
  stderrGuarded = true;
  process.stderr.on("error", () => {
    stderrBroken = true;
  });
}

export function formatLogLine(entry: LogEntry): string {
  return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}`;
}

export class RunLog implements Logger {
  private entries: LogEntry[] = [];
  private readonly counts: Record<LogLevel, number> = { verbose: 0, info: 0, warn: 0, error: 0 };
  private fileFailed = false;
  private echoFailed = false;
  private readonly toStderr: boolean;
  private readonly retain: boolean;
  private readonly echo: LogLevel | false;
  private readonly filePath?: string;
  private readonly stream: { write(text: string): unknown };
  private readonly appendFile: (path: string, text: string) => void;
  private readonly now: () => Date;

  constructor(options: RunLogOptions = {}) {
    this.echo = options.echo ?? "info";
    this.filePath = options.filePath;
    this.retain = options.retain ?? true;
    this.toStderr = options.stream === undefined;
    this.stream = options.stream ?? process.stderr;
    if (this.toStderr) guardStderr();
    this.appendFile = options.appendFile ?? ((path, text) => appendFileSync(path, text, "utf8"));
    this.now = options.now ?? (() => new Date());
  }

  log(level: LogLevel, message: string): void {
    const entry: LogEntry = { timestamp: this.now().toISOString(), level, message };
    this.record(entry);
    const line = formatLogLine(entry) + "\n";

    if (this.echo !== false && LEVEL_RANK[level] >= LEVEL_RANK[this.echo]) {
      this.write(line);
    }
    if (this.filePath && !this.fileFailed) {
      try {
        this.appendFile(this.filePath, line);
      } catch (err) {
        // Warn once and keep logging everywhere else.
        this.fileFailed = true;
        const warning: LogEntry = {
          timestamp: this.now().toISOString(),
          level: "warn",
          message: `Cannot write log file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`,
        };
        this.record(warning);
        this.write(formatLogLine(warning) + "\n");
      }
    }
  }

  verbose(message: string): void {
    this.log("verbose", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  getAll(): ReadonlyArray<LogEntry> {
    return this.entries;
  }

  count(level?: LogLevel): number {
    if (level) return this.counts[level];
    return this.counts.verbose + this.counts.info + this.counts.warn + this.counts.error;
  }

  private record(entry: LogEntry): void {
    this.counts[entry.level]++;
    if (this.retain) this.entries.push(entry);
  }

  private write(text: string): void {
    if (this.echoFailed || (this.toStderr && stderrBroken)) return;
    try {
      this.stream.write(text);
    } catch {
      this.echoFailed = true;
    }
  }

  /** Render the session log as Markdown. */
  toMarkdown(): string {
    if (this.entries.length === 0) {
      return "# Execution Log\n\nNothing has been logged yet.";
    }

    const lines: string[] = [];
    lines.push("# Execution Log\n");
    lines.push(`**Entries:** ${this.count()}`);
    lines.push(`**Warnings:** ${this.count("warn")}`);
    lines.push(`**Errors:** ${this.count("error")}\n`);

    for (const e of this.entries) {
      lines.push(`- ${LEVEL_ICON[e.level]} \`${e.timestamp}\` ${e.message}`);
    }

    return lines.join("\n");
  }
}
