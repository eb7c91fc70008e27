#!/usr/bin/env node
/**
 * CLI entry point for threadlog
 * Tails aggregated record files and inspects the resolved configuration
 */

import { createRequire } from "node:module";
import { stringify as stringifyYaml } from "yaml";
import { getDefaultConfigPath, loadConfig } from "../config/loader.js";
import type { Kind } from "../aggregator/types.js";
import { Logger } from "../utils/logger.js";
import { tailLogs } from "./log-tail.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const HELP_TEXT = `threadlog - per-request and per-session log aggregation

Usage:
  threadlog logs [--file=PATH] [--kind=request|session] [--errors] [--no-follow]
  threadlog config [--config=PATH]

Options:
  --config=PATH    Configuration file (default: ${getDefaultConfigPath()})
  -h, --help       Show this help message
  -v, --version    Show version

Logs:
  Reads the JSONL record file (output.file unless --file is given).
  --errors shows only records with error entries, reduced to those entries.
`;

function printHelp(): void {
  process.stdout.write(HELP_TEXT);
}

function printVersion(): void {
  process.stdout.write(`${version}\n`);
}

/** Value of a --name=value flag */
function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg?.slice(prefix.length);
}

function parseKind(value: string | undefined): Kind | undefined {
  if (value === undefined) return undefined;
  if (value === "request" || value === "session") return value;
  throw new Error(`Invalid --kind: ${value}. Must be one of: request, session`);
}

/** Main CLI function */
async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (command === undefined || command === "--help" || command === "-h") {
    printHelp();
    process.exit(command === undefined ? 1 : 0);
  }
  if (command === "--version" || command === "-v") {
    printVersion();
    process.exit(0);
  }

  const { config, warnings } = await loadConfig(flagValue(args, "config"));
  const logger = new Logger(config.logging);
  const log = logger.child({ component: "cli" });

  // Log config warnings
  for (const warning of warnings) {
    logger.warn(warning, { component: "config" });
  }

  switch (command) {
    case "logs": {
      const filePath = flagValue(args, "file") ?? config.output.file;
      if (!filePath) {
        log.error("No record file: set output.file in the configuration or pass --file=PATH");
        process.exit(1);
        return;
      }
      log.debug(`Tailing ${filePath}`, { path: filePath });
      await tailLogs(filePath, {
        kind: parseKind(flagValue(args, "kind")),
        errorsOnly: args.includes("--errors"),
        follow: !args.includes("--no-follow"),
      });
      return;
    }
    case "config":
      process.stdout.write(stringifyYaml(config));
      return;
    default:
      process.stderr.write(`Unknown command: ${command}\n\n`);
      printHelp();
      process.exit(1);
  }
}

// Run main function
main().catch((err) => {
  process.stderr.write(`Fatal error: ${err}\n`);
  process.exit(1);
});
