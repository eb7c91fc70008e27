/**
 * Log tail mode: reads the JSONL record file and displays records with chalk coloring
 */

import { createReadStream, existsSync, statSync, watchFile, unwatchFile } from "node:fs";
import { createInterface } from "node:readline";
import chalk from "chalk";
import type { Kind, Severity } from "../aggregator/types.js";
import { formatRecordText, type RecordStyle } from "../sink/record-format.js";
import type { SerializedRecord } from "../sink/record-types.js";

export interface TailOptions {
  /** Only show records of this kind */
  kind?: Kind;
  /** Only show records containing an error entry, reduced to those entries */
  errorsOnly?: boolean;
  follow?: boolean;
}

/** Color formatting per entry level */
function colorLevel(level: Severity, text: string): string {
  switch (level) {
    case "debug":
      return chalk.dim.white(text);
    case "info":
      return chalk.cyan(text);
    case "error":
      return chalk.red(text);
  }
}

/** Color an HTTP-style status by class */
function colorStatus(status: number, text: string): string {
  if (status >= 500) return chalk.red(text);
  if (status >= 400) return chalk.yellow(text);
  return chalk.green(text);
}

export const CHALK_STYLE: RecordStyle = {
  timestamp: (text) => chalk.dim.white(text),
  kind: (text) => chalk.blue(text),
  threadId: (text) => chalk.magenta(text),
  level: colorLevel,
  status: colorStatus,
  dim: (text) => chalk.dim(text),
};

function isSerializedRecord(value: unknown): value is SerializedRecord {
  if (!value || typeof value !== "object") return false;
  return (
    "ts" in value &&
    typeof value.ts === "string" &&
    "kind" in value &&
    (value.kind === "request" || value.kind === "session") &&
    "threadId" in value &&
    typeof value.threadId === "string" &&
    "entries" in value &&
    Array.isArray(value.entries)
  );
}

/**
 * Parse one JSONL line and apply the filters
 * @returns The record to display, or undefined to skip the line
 */
export function selectRecord(line: string, options: TailOptions): SerializedRecord | undefined {
  if (!line.trim()) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isSerializedRecord(parsed)) return undefined;

  if (options.kind && parsed.kind !== options.kind) return undefined;

  if (options.errorsOnly) {
    const errors = parsed.entries.filter((e) => e.level === "error");
    if (errors.length === 0) return undefined;
    return { ...parsed, entries: errors };
  }
  return parsed;
}

/** Tail records from a JSONL file */
export async function tailLogs(filePath: string, options: TailOptions = {}): Promise<void> {
  const follow = options.follow ?? true;

  if (!existsSync(filePath)) {
    if (follow) {
      process.stderr.write(`Waiting for record file: ${filePath}\n`);
      // Wait for the file to appear
      await new Promise<void>((resolve) => {
        const interval = setInterval(() => {
          if (existsSync(filePath)) {
            clearInterval(interval);
            resolve();
          }
        }, 500);
      });
    } else {
      process.stderr.write(`Record file not found: ${filePath}\n`);
      process.exit(1);
    }
  }

  // Read existing content
  await readAndPrint(filePath, 0, options);

  if (!follow) return;

  // Watch for changes
  let lastSize = statSync(filePath).size;

  watchFile(filePath, { interval: 300 }, (curr) => {
    const start = curr.size > lastSize ? lastSize : curr.size < lastSize ? 0 : -1;
    lastSize = curr.size;
    if (start === -1) return;
    // Truncated files are read again from the beginning
    readAndPrint(filePath, start, options).catch((err: unknown) => {
      process.stderr.write(`Failed to read ${filePath}: ${err}\n`);
    });
  });

  // Handle graceful shutdown
  const cleanup = () => {
    unwatchFile(filePath);
    process.exit(0);
  };
  process.on("SIGINT", cleanup);
  process.on("SIGTERM", cleanup);

  // Keep process alive
  await new Promise<void>(() => {
    // Never resolves - keeps the process running until interrupted
  });
}

/** Read the JSONL file from a byte offset and print formatted records */
async function readAndPrint(filePath: string, startByte: number, options: TailOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    const stream = createReadStream(filePath, { start: startByte, encoding: "utf-8" });
    const rl = createInterface({ input: stream, crlfDelay: Infinity });

    rl.on("line", (line) => {
      const record = selectRecord(line, options);
      if (record) {
        process.stdout.write(formatRecordText(record, CHALK_STYLE) + "\n");
      }
    });

    rl.on("close", resolve);
    stream.on("error", reject);
  });
}
