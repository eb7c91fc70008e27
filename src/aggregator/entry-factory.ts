/**
 * Builds entries and applies the debug suppression and call-site policies
 */

import { LogEntry, NoOpEntry, type Entry } from "./entry.js";
import type { CallSiteProvider } from "./call-site.js";
import type { CallSite, Severity } from "./types.js";

/**
 * Frames between make() and the user's logging statement:
 * make -> Aggregator.recordEntry -> public record method -> caller
 */
export const CALL_SITE_DEPTH = 3;

/** Placeholder used when the stack cannot be read */
export const UNKNOWN_CALL_SITE = {
  function: "Unknown",
  file: "Unable to obtain call site.",
};

export interface EntryFactoryOptions {
  disableDebug: boolean;
  /** Undefined disables call-site capture */
  callSites?: CallSiteProvider;
}

export class EntryFactory {
  private disableDebug: boolean;
  private callSites: CallSiteProvider | undefined;

  constructor(options: EntryFactoryOptions) {
    this.disableDebug = options.disableDebug;
    this.callSites = options.callSites;
  }

  /** Build an entry for a public record call; does not store it */
  make(level: Severity, threadId: string, message: string): Entry {
    if (level === "debug" && this.disableDebug) {
      return new NoOpEntry();
    }
    return new LogEntry(level, threadId, message, this.callSite());
  }

  /** Build an entry raised by the aggregator itself, with no call site */
  internal(level: Severity, threadId: string, message: string): LogEntry {
    return new LogEntry(level, threadId, message);
  }

  private callSite(): CallSite | undefined {
    if (!this.callSites) {
      return undefined;
    }
    // callSite() adds one frame above make()
    const site = this.callSites.capture(CALL_SITE_DEPTH + 1);
    if (!site.ok) {
      return { ...UNKNOWN_CALL_SITE, line: site.line };
    }
    return { function: site.function, file: site.file, line: site.line };
  }
}
