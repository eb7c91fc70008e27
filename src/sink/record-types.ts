/**
 * JSONL shape of emitted aggregate records
 */

import type { KeyVal, Kind, Severity } from "../aggregator/types.js";

export interface SerializedEntry {
  level: Severity;
  msg: string;
  function?: string;
  file?: string;
  line?: number;
  data?: KeyVal[];
}

export interface SerializedRecord {
  ts: string; // ISO 8601, taken when the unit of work ended
  kind: Kind;
  threadId: string;
  route: string;
  status: number;
  durationMs: number;
  entries: SerializedEntry[];
}
