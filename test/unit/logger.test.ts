/**
 * Unit tests for the diagnostics Logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync, existsSync, rmSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Logger, renderLine } from "../../src/utils/logger.js";
import type { DiagnosticEntry } from "../../src/utils/log-types.js";

function readEntries(path: string): DiagnosticEntry[] {
  return readFileSync(path, "utf-8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as DiagnosticEntry);
}

describe("Logger", () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = join(tmpdir(), "threadlog-test-" + Date.now() + "-" + Math.random().toString(36).slice(2));
    mkdirSync(dir, { recursive: true });
    logFile = join(dir, "diagnostics.jsonl");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("appends thread-scoped entries to the configured file", () => {
    const logger = new Logger({ level: "info", file: join(dir, "nested", "diag.jsonl") }, { stderr: false });

    logger.warn("Record callback slow", { component: "aggregator", threadId: "r1", durationMs: 250 });

    const [entry] = readEntries(join(dir, "nested", "diag.jsonl"));
    expect(entry?.level).toBe("warn");
    expect(entry?.msg).toBe("Record callback slow");
    expect(entry?.component).toBe("aggregator");
    expect(entry?.threadId).toBe("r1");
    expect(entry?.durationMs).toBe(250);
  });

  it("drops messages below the configured level without touching the file", () => {
    const logger = new Logger({ level: "warn" }, { logFilePath: logFile, stderr: false });

    logger.debug("Aggregator created");
    logger.info("Tailing records");
    expect(existsSync(logFile)).toBe(false);

    logger.error("Failed to write record");
    expect(readEntries(logFile).map((e) => e.level)).toEqual(["error"]);
  });

  it("writes entries whose fields hold cycles or bigints", () => {
    const logger = new Logger({ level: "debug" }, { logFilePath: logFile, stderr: false });
    const ctx: Record<string, unknown> = { name: "ctx" };
    ctx.self = ctx;

    expect(() => logger.error("Handler failed", { ctx, bytes: 18446744073709551616n })).not.toThrow();

    const [entry] = readEntries(logFile);
    expect(entry?.ctx).toEqual({ name: "ctx", self: "[Circular]" });
    expect(entry?.bytes).toBe("18446744073709551616");
  });

  it("prints one text line per message on stderr", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new Logger({ level: "info" });

    logger.info("Tailing records", { component: "cli", path: "/var/log/records.jsonl" });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /^\[\S+\] INFO  \[cli\] Tailing records path=\/var\/log\/records\.jsonl\n$/,
    );
  });

  it("reports an unwritable file once and keeps logging to stderr", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    // A directory cannot be appended to
    const logger = new Logger({ level: "info" }, { logFilePath: dir, stderr: false });

    logger.error("first");
    logger.error("second");

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toContain(`threadlog: cannot write log file ${dir}:`);
  });

  describe("child", () => {
    it("binds component and thread to every message", () => {
      const logger = new Logger({ level: "debug" }, { logFilePath: logFile, stderr: false });
      const sink = logger.child({ component: "sink", threadId: "r1" });

      sink.info("Record written");
      sink.error("Failed to write record", { errorCode: "EACCES" });

      const entries = readEntries(logFile);
      expect(entries.map((e) => [e.component, e.threadId, e.msg])).toEqual([
        ["sink", "r1", "Record written"],
        ["sink", "r1", "Failed to write record"],
      ]);
      expect(entries[1]?.errorCode).toBe("EACCES");
    });

    it("merges nested context, innermost and per-call fields winning", () => {
      const logger = new Logger({ level: "debug" }, { logFilePath: logFile, stderr: false });
      const http = logger.child({ component: "http", route: "GET /a" });
      const request = http.child({ threadId: "r7", route: "GET /b" });

      request.warn("Handler failed", { status: 500 });
      request.warn("Handler failed", { route: "GET /c" });

      const [first, second] = readEntries(logFile);
      expect(first?.component).toBe("http");
      expect(first?.threadId).toBe("r7");
      expect(first?.route).toBe("GET /b");
      expect(first?.status).toBe(500);
      expect(second?.route).toBe("GET /c");
    });
  });
});

describe("renderLine", () => {
  it("puts component and thread in the prefix and the rest as key=value", () => {
    const line = renderLine({
      ts: "2024-05-01T10:00:00.000Z",
      level: "warn",
      msg: "Record callback failed",
      component: "aggregator",
      threadId: "r1",
      route: "GET /orders",
      status: undefined,
      detail: { retry: false },
    });

    expect(line).toBe(
      '[2024-05-01T10:00:00.000Z] WARN  [aggregator][r1] Record callback failed route=GET /orders detail={"retry":false}',
    );
  });

  it("renders a bare message without tags", () => {
    expect(renderLine({ ts: "2024-05-01T10:00:00.000Z", level: "info", msg: "Aggregator created" })).toBe(
      "[2024-05-01T10:00:00.000Z] INFO  Aggregator created",
    );
  });
});
