/**
 * Log entries: a recorded entry and its suppressed counterpart.
 * Both expose data() so call sites can chain without checking which one they got.
 */

import type { CallSite, KeyVal, Severity } from "./types.js";

/** Entry buffered under a thread id */
export class LogEntry {
  readonly recorded = true as const;
  readonly threadId: string;
  readonly level: Severity;
  readonly function: string;
  readonly file: string;
  readonly line: number;
  readonly message: string;
  private readonly pairs: KeyVal[] = [];

  constructor(level: Severity, threadId: string, message: string, callSite?: CallSite) {
    this.level = level;
    this.threadId = threadId;
    this.message = message;
    this.function = callSite?.function ?? "";
    this.file = callSite?.file ?? "";
    this.line = callSite?.line ?? 0;
  }

  /** Key/value pairs in insertion order; duplicate keys are kept */
  get keyVals(): readonly KeyVal[] {
    return this.pairs;
  }

  /** Attach structured context */
  data(key: string, value: unknown): this {
    this.pairs.push({ key, value });
    return this;
  }
}

/** Returned when recording is suppressed; never stored */
export class NoOpEntry {
  readonly recorded = false as const;

  data(_key: string, _value: unknown): this {
    return this;
  }
}

export type Entry = LogEntry | NoOpEntry;
