/**
 * Conversion of aggregate records to JSONL objects and readable text
 */

import type { LogEntry } from "../aggregator/entry.js";
import type { AggregateRecord, Severity } from "../aggregator/types.js";
import { formatFields } from "../utils/fields.js";
import { toJsonValue } from "../utils/json.js";
import type { SerializedEntry, SerializedRecord } from "./record-types.js";

function serializeEntry(entry: LogEntry): SerializedEntry {
  const out: SerializedEntry = { level: entry.level, msg: entry.message };
  if (entry.function) out.function = entry.function;
  if (entry.file) out.file = entry.file;
  if (entry.line) out.line = entry.line;
  if (entry.keyVals.length > 0) {
    out.data = entry.keyVals.map(({ key, value }) => ({ key, value: toJsonValue(value) }));
  }
  return out;
}

/** Convert a record to its JSONL object form; data values are reduced to plain JSON */
export function serializeRecord(record: AggregateRecord): SerializedRecord {
  return {
    ts: record.timestamp.toISOString(),
    kind: record.kind,
    threadId: record.threadId,
    route: record.route,
    status: record.status,
    durationMs: record.duration,
    entries: record.entries.map(serializeEntry),
  };
}

/** Colouring hooks for text output */
export interface RecordStyle {
  timestamp(text: string): string;
  kind(text: string): string;
  threadId(text: string): string;
  level(level: Severity, text: string): string;
  status(status: number, text: string): string;
  dim(text: string): string;
}

export const PLAIN_STYLE: RecordStyle = {
  timestamp: (text) => text,
  kind: (text) => text,
  threadId: (text) => text,
  level: (_level, text) => text,
  status: (_status, text) => text,
  dim: (text) => text,
};

/**
 * Render a record as a header line followed by one indented line per entry:
 *
 *   [2024-05-01T10:00:00.000Z] REQUEST [01HX...] GET /orders status=200 durationMs=12
 *     INFO  loaded 3 orders user=42 (orders.ts:18 listOrders)
 */
export function formatRecordText(record: SerializedRecord, style: RecordStyle = PLAIN_STYLE): string {
  const header = [
    style.timestamp(`[${record.ts}]`),
    style.kind(record.kind.toUpperCase()),
    style.threadId(`[${record.threadId}]`),
    record.route,
  ];
  if (record.kind === "request") {
    header.push(style.status(record.status, `status=${record.status}`), `durationMs=${record.durationMs}`);
  }

  const lines = [header.join(" ")];
  for (const entry of record.entries) {
    let line = `  ${style.level(entry.level, entry.level.toUpperCase().padEnd(5))} ${entry.msg}`;
    line += formatFields(entry.data ?? [], style.dim);
    if (entry.file) {
      const site = entry.function ? `${entry.file}:${entry.line ?? 0} ${entry.function}` : `${entry.file}:${entry.line ?? 0}`;
      line += ` ${style.dim(`(${site})`)}`;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
