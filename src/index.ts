/**
 * threadlog: per-request and per-session log aggregation
 */

export { Aggregator, INTERNAL_THREAD_ID } from "./aggregator/aggregator.js";
export { RequestHandle, SessionHandle } from "./aggregator/handles.js";
export { LogEntry, NoOpEntry } from "./aggregator/entry.js";
export type { Entry } from "./aggregator/entry.js";
export { EntryStore } from "./aggregator/entry-store.js";
export { EntryFactory, CALL_SITE_DEPTH, UNKNOWN_CALL_SITE } from "./aggregator/entry-factory.js";
export { StackCallSiteProvider, FixedCallSiteProvider, trimFunctionName } from "./aggregator/call-site.js";
export type { CallSiteProvider, CapturedCallSite } from "./aggregator/call-site.js";
export { UlidGenerator } from "./aggregator/id.js";
export { formatMessage } from "./aggregator/format.js";
export type {
  AggregateRecord,
  AggregatorOptions,
  CallSite,
  IdGenerator,
  KeyVal,
  Kind,
  RecordCallback,
  Severity,
  ThreadLog,
} from "./aggregator/types.js";
export { loadConfig, getDefaultConfigPath } from "./config/loader.js";
export type { Config, LoadedConfig } from "./config/types.js";
export { RecordWriter } from "./sink/record-writer.js";
export { serializeRecord, formatRecordText } from "./sink/record-format.js";
export type { SerializedRecord, SerializedEntry } from "./sink/record-types.js";
export { withRequestLog } from "./http/middleware.js";
export type { RequestLike, ResponseLike, RequestLogOptions } from "./http/middleware.js";
export { Logger, ChildLogger, renderLine } from "./utils/logger.js";
export type { DiagnosticLog } from "./utils/logger.js";
export { createAggregatorFromConfig } from "./setup.js";
