/**
 * Unit tests for EntryFactory and entries
 */

import { describe, it, expect } from "vitest";
import { EntryFactory, CALL_SITE_DEPTH } from "../../src/aggregator/entry-factory.js";
import { FixedCallSiteProvider } from "../../src/aggregator/call-site.js";
import { LogEntry, NoOpEntry } from "../../src/aggregator/entry.js";

describe("EntryFactory", () => {
  describe("debug suppression", () => {
    it("returns a no-op for debug entries when debug is disabled", () => {
      const factory = new EntryFactory({ disableDebug: true });

      const entry = factory.make("debug", "t1", "verbose detail");
      expect(entry).toBeInstanceOf(NoOpEntry);
      expect(entry.recorded).toBe(false);
    });

    it("still builds info and error entries when debug is disabled", () => {
      const factory = new EntryFactory({ disableDebug: true });

      expect(factory.make("info", "t1", "a").recorded).toBe(true);
      expect(factory.make("error", "t1", "b").recorded).toBe(true);
    });

    it("builds debug entries when debug is enabled", () => {
      const factory = new EntryFactory({ disableDebug: false });

      const entry = factory.make("debug", "t1", "verbose detail");
      expect(entry).toBeInstanceOf(LogEntry);
    });
  });

  describe("call sites", () => {
    it("leaves call-site fields empty without a provider", () => {
      const factory = new EntryFactory({ disableDebug: false });

      const entry = factory.make("info", "t1", "hello");
      expect(entry).toBeInstanceOf(LogEntry);
      if (!entry.recorded) return;
      expect(entry.function).toBe("");
      expect(entry.file).toBe("");
      expect(entry.line).toBe(0);
    });

    it("copies the provider's call site onto the entry", () => {
      const callSites = new FixedCallSiteProvider({ function: "orders.List", file: "/srv/orders.ts", line: 18 });
      const factory = new EntryFactory({ disableDebug: false, callSites });

      const entry = factory.make("info", "t1", "listed");
      if (!entry.recorded) throw new Error("expected a recorded entry");
      expect(entry.function).toBe("orders.List");
      expect(entry.file).toBe("/srv/orders.ts");
      expect(entry.line).toBe(18);
    });

    it("asks for the frame above the public record method", () => {
      const callSites = new FixedCallSiteProvider();
      const factory = new EntryFactory({ disableDebug: false, callSites });

      factory.make("info", "t1", "x");
      expect(callSites.requests).toEqual([CALL_SITE_DEPTH + 1]);
    });

    it("substitutes a placeholder when the stack cannot be read", () => {
      const callSites = new FixedCallSiteProvider({ ok: false, function: "", file: "", line: 0 });
      const factory = new EntryFactory({ disableDebug: false, callSites });

      const entry = factory.make("error", "t1", "failed");
      if (!entry.recorded) throw new Error("expected a recorded entry");
      expect(entry.function).toBe("Unknown");
      expect(entry.file).toBe("Unable to obtain call site.");
      expect(entry.line).toBe(0);
      expect(entry.message).toBe("failed");
    });

    it("does not capture a call site for suppressed entries", () => {
      const callSites = new FixedCallSiteProvider();
      const factory = new EntryFactory({ disableDebug: true, callSites });

      factory.make("debug", "t1", "x");
      expect(callSites.requests).toEqual([]);
    });
  });

  it("builds internal entries without a call site", () => {
    const callSites = new FixedCallSiteProvider();
    const factory = new EntryFactory({ disableDebug: false, callSites });

    const entry = factory.internal("error", "", "generator failed");
    expect(entry.threadId).toBe("");
    expect(entry.level).toBe("error");
    expect(entry.file).toBe("");
    expect(callSites.requests).toEqual([]);
  });
});

describe("entries", () => {
  it("appends key/value pairs in order and keeps duplicates", () => {
    const entry = new LogEntry("info", "t1", "charged");

    const returned = entry.data("amount", 10).data("currency", "EUR").data("amount", 12);
    expect(returned).toBe(entry);
    expect(entry.keyVals).toEqual([
      { key: "amount", value: 10 },
      { key: "currency", value: "EUR" },
      { key: "amount", value: 12 },
    ]);
  });

  it("lets callers chain on a no-op entry", () => {
    const entry = new NoOpEntry();

    expect(entry.data("key", "value").data("other", 1)).toBe(entry);
  });
});
