/**
 * Diagnostics for threadlog itself: config warnings, sink and callback failures.
 * Each message goes to an optional JSONL file and as one text line to stderr.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LoggingConfig } from "../config/types.js";
import { formatFields } from "./fields.js";
import { stringifySafe } from "./json.js";
import type { DiagnosticEntry, LogContext } from "./log-types.js";

type Level = DiagnosticEntry["level"];

const LEVEL_RANK: Record<Level, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Shown in the line prefix, not as key=value pairs */
const PREFIX_FIELDS = new Set(["ts", "level", "msg", "component", "threadId"]);

/** What sinks, middleware and wiring need from a diagnostics logger */
export interface DiagnosticLog {
  debug(msg: string, fields?: LogContext): void;
  info(msg: string, fields?: LogContext): void;
  warn(msg: string, fields?: LogContext): void;
  error(msg: string, fields?: LogContext): void;
  child(ctx: LogContext): DiagnosticLog;
}

/**
 * Text form of a diagnostics entry:
 *
 *   [2024-05-01T10:00:00.000Z] WARN  [sink][01HX...] Failed to write record errorCode=EACCES
 */
export function renderLine(entry: DiagnosticEntry): string {
  const tags = `${entry.component ? `[${entry.component}]` : ""}${entry.threadId ? `[${entry.threadId}]` : ""}`;
  const extra = Object.entries(entry)
    .filter(([key, value]) => !PREFIX_FIELDS.has(key) && value !== undefined && value !== null)
    .map(([key, value]) => ({ key, value }));
  const head = `[${entry.ts}] ${entry.level.toUpperCase().padEnd(5)}`;
  return `${head} ${tags ? `${tags} ` : ""}${entry.msg}${formatFields(extra)}`;
}

export class Logger implements DiagnosticLog {
  private minRank: number;
  private filePath: string | undefined;
  private writeToStderr: boolean;
  // Set after the first failed append so a broken path is reported once
  private fileFailed = false;

  constructor(config: LoggingConfig, options: { logFilePath?: string; stderr?: boolean } = {}) {
    this.minRank = LEVEL_RANK[config.level];
    this.filePath = options.logFilePath ?? config.file;
    this.writeToStderr = options.stderr ?? true;
  }

  log(level: Level, msg: string, fields: LogContext = {}): void {
    if (LEVEL_RANK[level] < this.minRank) return;

    const entry: DiagnosticEntry = { ts: new Date().toISOString(), level, msg, ...fields };
    if (this.filePath && !this.fileFailed) {
      this.append(this.filePath, entry);
    }
    if (this.writeToStderr) {
      process.stderr.write(renderLine(entry) + "\n");
    }
  }

  debug(msg: string, fields?: LogContext): void {
    this.log("debug", msg, fields);
  }

  info(msg: string, fields?: LogContext): void {
    this.log("info", msg, fields);
  }

  warn(msg: string, fields?: LogContext): void {
    this.log("warn", msg, fields);
  }

  error(msg: string, fields?: LogContext): void {
    this.log("error", msg, fields);
  }

  child(ctx: LogContext): DiagnosticLog {
    return new ChildLogger(this, ctx);
  }

  private append(filePath: string, entry: DiagnosticEntry): void {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      appendFileSync(filePath, `${stringifySafe(entry) ?? "{}"}\n`);
    } catch (err) {
      // Logging the failure through this logger would recurse
      this.fileFailed = true;
      process.stderr.write(`threadlog: cannot write log file ${filePath}: ${err}\n`);
    }
  }
}

/** Logger with context bound to every message; nested children merge their context */
export class ChildLogger implements DiagnosticLog {
  private root: Logger;
  private ctx: LogContext;

  constructor(root: Logger, ctx: LogContext) {
    this.root = root;
    this.ctx = ctx;
  }

  debug(msg: string, fields?: LogContext): void {
    this.root.log("debug", msg, { ...this.ctx, ...fields });
  }

  info(msg: string, fields?: LogContext): void {
    this.root.log("info", msg, { ...this.ctx, ...fields });
  }

  warn(msg: string, fields?: LogContext): void {
    this.root.log("warn", msg, { ...this.ctx, ...fields });
  }

  error(msg: string, fields?: LogContext): void {
    this.root.log("error", msg, { ...this.ctx, ...fields });
  }

  child(ctx: LogContext): DiagnosticLog {
    return new ChildLogger(this.root, { ...this.ctx, ...ctx });
  }
}
