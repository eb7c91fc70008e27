/**
 * Diagnostics log entry types for JSONL output
 */

/** Context fields that can be bound to a child logger */
export interface LogContext {
  component?: "aggregator" | "config" | "sink" | "http" | "cli";
  threadId?: string; // Aggregator thread the message concerns
  route?: string;
  status?: number;
  durationMs?: number;
  path?: string; // File the message concerns
  errorCode?: string; // e.g. "ENOENT", "EACCES"
  [key: string]: unknown;
}

export interface DiagnosticEntry extends LogContext {
  ts: string; // ISO 8601 timestamp
  level: "debug" | "info" | "warn" | "error";
  msg: string;
}
