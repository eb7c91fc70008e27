/**
 * Configuration types for threadlog
 */

/** Aggregator behaviour, fixed at construction */
export interface AggregatorConfig {
  /** Drop debug entries instead of buffering them */
  disableDebug: boolean;
  /** Skip stack inspection for call-site metadata */
  disableCallSite: boolean;
  /** Report throwing callbacks to the diagnostics log instead of the caller */
  catchCallbackErrors: boolean;
}

/** Destinations for emitted aggregate records */
export interface OutputConfig {
  /** JSONL file receiving every record */
  file?: string;
  /** JSONL file receiving errors-only views of records with errors */
  errorsFile?: string;
  /** Print records as plain text on stderr */
  stderr: boolean;
}

/** Diagnostics logging of threadlog itself */
export interface LoggingConfig {
  level: "debug" | "info" | "warn" | "error";
  /** Optional JSONL log file path */
  file?: string;
}

/** Complete configuration structure */
export interface Config {
  aggregator: AggregatorConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** Raw parsed YAML structure (before environment variable expansion) */
export interface RawConfig {
  aggregator?: {
    disable_debug?: unknown;
    disable_call_site?: unknown;
    catch_callback_errors?: unknown;
  };
  output?: {
    file?: unknown;
    errors_file?: unknown;
    stderr?: unknown;
  };
  logging?: {
    level?: unknown;
    file?: unknown;
  };
}

/** Result of loading configuration */
export interface LoadedConfig {
  config: Config;
  warnings: string[];
}
