/**
 * Unit-of-work handles bound to one thread id
 */

import type { Aggregator } from "./aggregator.js";
import type { Entry } from "./entry.js";
import { formatMessage } from "./format.js";
import type { ThreadLog } from "./types.js";

/** Handle for one in-flight request */
export class RequestHandle implements ThreadLog {
  readonly id: string;
  private aggregator: Aggregator;

  constructor(aggregator: Aggregator, id: string) {
    this.aggregator = aggregator;
    this.id = id;
  }

  info(msg: string): Entry {
    return this.aggregator.recordEntry("info", this.id, msg);
  }

  error(msg: string): Entry {
    return this.aggregator.recordEntry("error", this.id, msg);
  }

  debug(msg: string): Entry {
    return this.aggregator.recordEntry("debug", this.id, msg);
  }

  infoF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("info", this.id, formatMessage(format, args));
  }

  errorF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("error", this.id, formatMessage(format, args));
  }

  debugF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("debug", this.id, formatMessage(format, args));
  }

  /** Emit the request record; may be called again, later calls emit what was recorded since */
  end(route: string, status: number, duration: number): void {
    this.aggregator.finish("request", this.id, route, status, duration);
  }
}

/** Handle for a named background session */
export class SessionHandle implements ThreadLog {
  readonly id: string;
  readonly name: string;
  private aggregator: Aggregator;

  constructor(aggregator: Aggregator, id: string, name: string) {
    this.aggregator = aggregator;
    this.id = id;
    this.name = name;
  }

  info(msg: string): Entry {
    return this.aggregator.recordEntry("info", this.id, msg);
  }

  error(msg: string): Entry {
    return this.aggregator.recordEntry("error", this.id, msg);
  }

  debug(msg: string): Entry {
    return this.aggregator.recordEntry("debug", this.id, msg);
  }

  infoF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("info", this.id, formatMessage(format, args));
  }

  errorF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("error", this.id, formatMessage(format, args));
  }

  debugF(format: string, ...args: unknown[]): Entry {
    return this.aggregator.recordEntry("debug", this.id, formatMessage(format, args));
  }

  /** Peek at the buffered entries for an error without draining them */
  seenError(): boolean {
    return this.aggregator.seenError(this.id);
  }

  /** Emit the session record, unless nothing was recorded */
  end(): void {
    this.aggregator.finish("session", this.id, this.name, 0, 0);
  }
}
