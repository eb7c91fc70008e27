/**
 * Builds an aggregator wired to the configured outputs
 */

import { Aggregator } from "./aggregator/aggregator.js";
import type { AggregatorOptions } from "./aggregator/types.js";
import type { Config } from "./config/types.js";
import { RecordWriter } from "./sink/record-writer.js";
import type { DiagnosticLog } from "./utils/logger.js";

/**
 * Create an aggregator from loaded configuration.
 * `overrides` replace the configured options, e.g. to inject an id generator.
 */
export function createAggregatorFromConfig(
  config: Config,
  logger: DiagnosticLog,
  overrides: Partial<AggregatorOptions> = {},
): Aggregator {
  const sinkLog = logger.child({ component: "sink" });
  const options: AggregatorOptions = {
    disableDebugEntries: config.aggregator.disableDebug,
    disableCallSiteCapture: config.aggregator.disableCallSite,
  };

  if (config.output.file || config.output.stderr) {
    const writer = new RecordWriter({ filePath: config.output.file, stderr: config.output.stderr, logger: sinkLog });
    options.onLogEvent = writer.callback;
  }

  if (config.output.errorsFile) {
    const errorWriter = new RecordWriter({ filePath: config.output.errorsFile, logger: sinkLog });
    options.onError = errorWriter.callback;
  }

  if (config.aggregator.catchCallbackErrors) {
    const aggregatorLog = logger.child({ component: "aggregator" });
    options.onCallbackError = (err, record) => {
      aggregatorLog.error(`Record callback failed: ${err instanceof Error ? err.message : String(err)}`, {
        threadId: record.threadId,
        route: record.route,
      });
    };
  }

  logger.debug("Aggregator created", {
    component: "aggregator",
    path: config.output.file,
    disableDebug: config.aggregator.disableDebug,
    disableCallSite: config.aggregator.disableCallSite,
  });

  return new Aggregator({ ...options, ...overrides });
}
