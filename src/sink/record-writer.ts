/**
 * Writes aggregate records as JSONL to a file and as plain text to stderr
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { AggregateRecord, RecordCallback } from "../aggregator/types.js";
import type { DiagnosticLog } from "../utils/logger.js";
import { formatRecordText, serializeRecord } from "./record-format.js";
import type { SerializedRecord } from "./record-types.js";

export interface RecordWriterOptions {
  /** JSONL destination */
  filePath?: string;
  /** Also print each record on stderr (default: false) */
  stderr?: boolean;
  /** Where write failures are reported */
  logger?: DiagnosticLog;
}

export class RecordWriter {
  private filePath: string | undefined;
  private writeToStderr: boolean;
  private logger: DiagnosticLog | undefined;

  constructor(options: RecordWriterOptions) {
    this.filePath = options.filePath;
    this.writeToStderr = options.stderr ?? false;
    this.logger = options.logger;

    if (this.filePath) {
      mkdirSync(dirname(this.filePath), { recursive: true });
    }
  }

  /** Callback form, for AggregatorOptions.onLogEvent / onError */
  readonly callback: RecordCallback = (record) => {
    this.write(record);
  };

  /** Write one record; failures are reported, never thrown */
  write(record: AggregateRecord): void {
    let serialized: SerializedRecord;
    try {
      serialized = serializeRecord(record);
    } catch (err) {
      this.reportFailure(record, err);
      return;
    }

    if (this.filePath) {
      try {
        appendFileSync(this.filePath, JSON.stringify(serialized) + "\n");
      } catch (err) {
        this.reportFailure(record, err);
      }
    }

    if (this.writeToStderr) {
      try {
        process.stderr.write(formatRecordText(serialized) + "\n");
      } catch (err) {
        this.reportFailure(record, err);
      }
    }
  }

  private reportFailure(record: AggregateRecord, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    const errorCode = err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
    if (this.logger) {
      this.logger.error(`Failed to write record: ${message}`, {
        threadId: record.threadId,
        path: this.filePath,
        errorCode,
      });
      return;
    }
    process.stderr.write(`threadlog: failed to write record ${record.threadId}: ${message}\n`);
  }
}
