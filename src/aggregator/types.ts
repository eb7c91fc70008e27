/**
 * Type definitions for the thread-scoped log aggregator
 */

import type { Entry, LogEntry } from "./entry.js";
import type { CallSiteProvider } from "./call-site.js";

/** Severity of a single entry */
export type Severity = "info" | "error" | "debug";

/** Unit-of-work kind, decides emission policy on finish */
export type Kind = "request" | "session";

/** Structured context attached to an entry */
export interface KeyVal {
  key: string;
  value: unknown;
}

/** Call-site metadata of a recording statement */
export interface CallSite {
  function: string;
  file: string;
  line: number;
}

/** The single record emitted when a unit of work ends */
export interface AggregateRecord {
  timestamp: Date;
  kind: Kind;
  threadId: string;
  route: string;
  /** HTTP-style status, 0 for sessions */
  status: number;
  /** Elapsed milliseconds, 0 for sessions */
  duration: number;
  entries: LogEntry[];
}

/** Callback receiving emitted aggregate records */
export type RecordCallback = (record: AggregateRecord) => void;

/** Source of thread identifiers */
export interface IdGenerator {
  generate(): string;
}

/** Aggregator construction options, fixed for the aggregator's lifetime */
export interface AggregatorOptions {
  /** Drop debug entries instead of buffering them */
  disableDebugEntries?: boolean;
  /** Skip stack inspection; call-site fields stay empty */
  disableCallSiteCapture?: boolean;
  onLogEvent?: RecordCallback;
  /** Receives a copy of the record holding only its error entries */
  onError?: RecordCallback;
  /**
   * When set, a throwing callback is caught and reported here.
   * Otherwise the error reaches the caller of finish.
   */
  onCallbackError?: (err: unknown, record: AggregateRecord) => void;
  idGenerator?: IdGenerator;
  callSiteProvider?: CallSiteProvider;
}

/** Record methods shared by request and session handles */
export interface ThreadLog {
  readonly id: string;
  info(msg: string): Entry;
  error(msg: string): Entry;
  debug(msg: string): Entry;
  infoF(format: string, ...args: unknown[]): Entry;
  errorF(format: string, ...args: unknown[]): Entry;
  debugF(format: string, ...args: unknown[]): Entry;
}
