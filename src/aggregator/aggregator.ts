/**
 * Aggregator: buffers entries per thread id and emits one record per unit of work
 */

import { StackCallSiteProvider } from "./call-site.js";
import { EntryFactory } from "./entry-factory.js";
import { EntryStore } from "./entry-store.js";
import type { Entry, LogEntry } from "./entry.js";
import { formatMessage } from "./format.js";
import { RequestHandle, SessionHandle } from "./handles.js";
import { UlidGenerator } from "./id.js";
import type {
  AggregateRecord,
  AggregatorOptions,
  IdGenerator,
  Kind,
  RecordCallback,
  Severity,
} from "./types.js";

/** Thread id that holds entries raised by the aggregator itself */
export const INTERNAL_THREAD_ID = "";

export class Aggregator {
  private store: EntryStore;
  private factory: EntryFactory;
  private idGenerator: IdGenerator;
  private onLogEvent: RecordCallback | undefined;
  private onError: RecordCallback | undefined;
  private onCallbackError: AggregatorOptions["onCallbackError"];

  constructor(options: AggregatorOptions = {}) {
    this.store = new EntryStore();
    this.factory = new EntryFactory({
      disableDebug: options.disableDebugEntries ?? false,
      callSites: options.disableCallSiteCapture
        ? undefined
        : (options.callSiteProvider ?? new StackCallSiteProvider()),
    });
    this.idGenerator = options.idGenerator ?? new UlidGenerator();
    this.onLogEvent = options.onLogEvent;
    this.onError = options.onError;
    this.onCallbackError = options.onCallbackError;
  }

  /**
   * Build an entry and buffer it under the thread id.
   * Suppressed entries come back as no-ops and are not stored.
   */
  recordEntry(level: Severity, threadId: string, message: string): Entry {
    const entry = this.factory.make(level, threadId, message);
    if (entry.recorded) {
      this.store.append(threadId, entry);
    }
    return entry;
  }

  info(threadId: string, msg: string): Entry {
    return this.recordEntry("info", threadId, msg);
  }

  error(threadId: string, msg: string): Entry {
    return this.recordEntry("error", threadId, msg);
  }

  debug(threadId: string, msg: string): Entry {
    return this.recordEntry("debug", threadId, msg);
  }

  infoF(threadId: string, format: string, ...args: unknown[]): Entry {
    return this.recordEntry("info", threadId, formatMessage(format, args));
  }

  errorF(threadId: string, format: string, ...args: unknown[]): Entry {
    return this.recordEntry("error", threadId, formatMessage(format, args));
  }

  debugF(threadId: string, format: string, ...args: unknown[]): Entry {
    return this.recordEntry("debug", threadId, formatMessage(format, args));
  }

  /** Finish a request-kind unit of work */
  end(threadId: string, route: string, status: number, duration: number): void {
    this.finish("request", threadId, route, status, duration);
  }

  /**
   * Drain the thread's entries and emit them as one record.
   * Empty sessions are dropped; requests are always emitted.
   */
  finish(kind: Kind, threadId: string, route: string, status: number, duration: number): void {
    const entries = this.store.takeAndClear(threadId);

    // A session has no status or duration of its own to report
    if (kind === "session" && entries.length === 0) {
      return;
    }

    const record: AggregateRecord = {
      timestamp: new Date(),
      kind,
      threadId,
      route,
      status,
      duration,
      entries,
    };

    if (this.onError) {
      const errors = entries.filter((e) => e.level === "error");
      if (errors.length > 0) {
        this.emit(this.onError, { ...record, entries: errors });
      }
    }

    if (this.onLogEvent) {
      this.emit(this.onLogEvent, record);
    }
  }

  /** True if any entry currently buffered for the thread is an error */
  seenError(threadId: string): boolean {
    return this.store.peek(threadId).some((e) => e.level === "error");
  }

  /**
   * Generate a thread id.
   * A generator failure is recorded as an internal error entry and yields "".
   */
  newId(): string {
    try {
      return this.idGenerator.generate();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.store.append(
        INTERNAL_THREAD_ID,
        this.factory.internal("error", INTERNAL_THREAD_ID, `couldn't generate id for logger thread: ${reason}`),
      );
      return "";
    }
  }

  /** Start a request; uses the given id (e.g. from an upstream header) or a fresh one */
  newRequest(id?: string): RequestHandle {
    return new RequestHandle(this, id || this.newId());
  }

  /** Start a named session under a fresh id */
  newSession(name: string): SessionHandle {
    return new SessionHandle(this, this.newId(), name);
  }

  /** Thread ids holding entries that were never finished */
  pendingThreads(): string[] {
    return this.store.pendingIds();
  }

  /** Entries currently buffered for a thread, oldest first */
  buffered(threadId: string): readonly LogEntry[] {
    return this.store.peek(threadId);
  }

  private emit(callback: RecordCallback, record: AggregateRecord): void {
    const onCallbackError = this.onCallbackError;
    if (!onCallbackError) {
      callback(record);
      return;
    }
    try {
      callback(record);
    } catch (err) {
      onCallbackError(err, record);
    }
  }
}
