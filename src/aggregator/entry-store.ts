/**
 * Entry store: thread id -> ordered entries buffered until the unit of work ends
 */

import type { LogEntry } from "./entry.js";

/**
 * Keyed append-only buffers.
 * Each operation is one synchronous read-modify-write on the event loop, so an
 * append either lands in the sequence a concurrent takeAndClear returns or
 * starts a new sequence for the next finish. Nothing is serialized across ids.
 */
export class EntryStore {
  private buffers: Map<string, LogEntry[]>;

  constructor() {
    this.buffers = new Map();
  }

  /**
   * Append an entry, creating the sequence for the id if needed
   * @param id - Thread identifier
   * @param entry - Entry to buffer
   */
  append(id: string, entry: LogEntry): void {
    const existing = this.buffers.get(id);
    if (existing) {
      existing.push(entry);
    } else {
      this.buffers.set(id, [entry]);
    }
  }

  /**
   * Remove and return the id's sequence
   * @param id - Thread identifier
   * @returns The buffered entries in append order, or an empty array
   */
  takeAndClear(id: string): LogEntry[] {
    const entries = this.buffers.get(id);
    if (!entries) {
      return [];
    }
    this.buffers.delete(id);
    return entries;
  }

  /**
   * Read the id's sequence without removing it
   * @param id - Thread identifier
   */
  peek(id: string): readonly LogEntry[] {
    return this.buffers.get(id) ?? [];
  }

  /** Number of ids with buffered entries */
  get size(): number {
    return this.buffers.size;
  }

  /** Ids that still hold entries (units of work never finished) */
  pendingIds(): string[] {
    return Array.from(this.buffers.keys());
  }
}
