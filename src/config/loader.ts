/**
 * Configuration loader for threadlog
 * Handles YAML parsing, environment variable expansion, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { Config, AggregatorConfig, OutputConfig, LoggingConfig, RawConfig, LoadedConfig } from "./types.js";

// Valid log levels
const VALID_LOG_LEVELS = new Set<string>(["debug", "info", "warn", "error"]);

/** Default configuration values */
const DEFAULTS: Config = {
  aggregator: {
    disableDebug: false,
    disableCallSite: false,
    catchCallbackErrors: false,
  },
  output: {
    stderr: true,
  },
  logging: {
    level: "info",
  },
};

/**
 * Expand environment variables in a string
 * Supports ${VAR} and ${VAR:-default} syntax
 */
export function expandEnvVars(str: string): string {
  return str.replace(/\$\{([^}:]+)(:-([^}]*))?\}/g, (_match, name: string, _fallback, fallback?: string) => {
    return process.env[name] ?? fallback ?? "";
  });
}

/**
 * Get the default configuration file path
 */
export function getDefaultConfigPath(): string {
  const home = process.env.HOME ?? "";
  return join(home, ".config", "threadlog", "config.yml");
}

/**
 * Load configuration from a YAML file
 */
export async function loadConfig(filePath: string = getDefaultConfigPath()): Promise<LoadedConfig> {
  let raw: RawConfig = {};

  // Load from file if exists
  if (existsSync(filePath)) {
    let parsed: unknown;
    try {
      const content = await readFile(filePath, "utf-8");
      parsed = parseYaml(content);
    } catch (error) {
      throw new Error(`Failed to parse config file at ${filePath}: ${error}`);
    }
    if (parsed && typeof parsed === "object") {
      raw = parsed;
    }
  }

  // Merge with defaults and validate
  return mergeAndValidateConfig(raw);
}

/**
 * Merge raw config with defaults, validate, and apply environment variable expansion
 */
export function mergeAndValidateConfig(raw: RawConfig): LoadedConfig {
  const config: Config = {
    aggregator: mergeAggregatorConfig(raw.aggregator),
    output: mergeOutputConfig(raw.output),
    logging: mergeLoggingConfig(raw.logging),
  };

  return { config, warnings: collectWarnings(config) };
}

function readBoolean(value: unknown, key: string, fallback: boolean): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${key}: must be a boolean, got ${typeof value}`);
  }
  return value;
}

function readPath(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Invalid ${key}: must be a string, got ${typeof value}`);
  }
  // Only an explicit path counts; an expansion to "" means unset
  const expanded = expandEnvVars(value);
  return expanded.length > 0 ? expanded : undefined;
}

function mergeAggregatorConfig(raw?: RawConfig["aggregator"]): AggregatorConfig {
  return {
    disableDebug: readBoolean(raw?.disable_debug, "aggregator.disable_debug", DEFAULTS.aggregator.disableDebug),
    disableCallSite: readBoolean(
      raw?.disable_call_site,
      "aggregator.disable_call_site",
      DEFAULTS.aggregator.disableCallSite,
    ),
    catchCallbackErrors: readBoolean(
      raw?.catch_callback_errors,
      "aggregator.catch_callback_errors",
      DEFAULTS.aggregator.catchCallbackErrors,
    ),
  };
}

function mergeOutputConfig(raw?: RawConfig["output"]): OutputConfig {
  const file = readPath(raw?.file, "output.file");
  const errorsFile = readPath(raw?.errors_file, "output.errors_file");

  if (file !== undefined && file === errorsFile) {
    throw new Error(`Invalid output.errors_file: must differ from output.file (${file})`);
  }

  return {
    file,
    errorsFile,
    stderr: readBoolean(raw?.stderr, "output.stderr", DEFAULTS.output.stderr),
  };
}

function mergeLoggingConfig(raw?: RawConfig["logging"]): LoggingConfig {
  const level = raw?.level ?? DEFAULTS.logging.level;

  // Validate log level
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: ${String(level)}. Must be one of: ${Array.from(VALID_LOG_LEVELS).join(", ")}`,
    );
  }

  return {
    level,
    file: readPath(raw?.file, "logging.file"),
  };
}

function isLogLevel(value: unknown): value is LoggingConfig["level"] {
  return typeof value === "string" && VALID_LOG_LEVELS.has(value);
}

/**
 * Non-fatal configuration problems
 */
function collectWarnings(config: Config): string[] {
  const warnings: string[] = [];

  if (!config.output.file && !config.output.errorsFile && !config.output.stderr) {
    warnings.push("No output configured. Aggregated records will be discarded.");
  }

  return warnings;
}
