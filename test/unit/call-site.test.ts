/**
 * Unit tests for call-site capture
 */

import { describe, it, expect } from "vitest";
import { StackCallSiteProvider, trimFunctionName } from "../../src/aggregator/call-site.js";
import { Aggregator } from "../../src/aggregator/aggregator.js";
import type { RequestHandle } from "../../src/aggregator/handles.js";

function captureHere(provider: StackCallSiteProvider) {
  return provider.capture(0);
}

function recordOrder(log: RequestHandle) {
  return log.info("order placed");
}

class OrderService {
  place(log: RequestHandle) {
    return log.info("order placed");
  }
}

describe("trimFunctionName", () => {
  it("strips a path-like prefix", () => {
    expect(trimFunctionName("github.com/acme/app/orders.List")).toBe("orders.List");
  });

  it("leaves plain names alone", () => {
    expect(trimFunctionName("OrderService.place")).toBe("OrderService.place");
  });
});

describe("StackCallSiteProvider", () => {
  it("reports the function that called capture at depth 0", () => {
    const site = captureHere(new StackCallSiteProvider());

    expect(site.ok).toBe(true);
    expect(site.function).toContain("captureHere");
    expect(site.file).toContain("call-site.test");
    expect(site.line).toBeGreaterThan(0);
  });

  it("reports failure when the stack is shallower than requested", () => {
    const site = new StackCallSiteProvider().capture(1000);

    expect(site).toEqual({ function: "", file: "", line: 0, ok: false });
  });
});

describe("call sites through the aggregator", () => {
  it("points at the statement that called the handle", () => {
    const aggregator = new Aggregator();
    const log = aggregator.newRequest("req-1");

    const entry = recordOrder(log);
    if (!entry.recorded) throw new Error("expected a recorded entry");
    expect(entry.function).toContain("recordOrder");
    expect(entry.file).toContain("call-site.test");
    expect(entry.line).toBeGreaterThan(0);
  });

  it("qualifies methods with their class name", () => {
    const aggregator = new Aggregator();

    const entry = new OrderService().place(aggregator.newRequest("req-2"));
    if (!entry.recorded) throw new Error("expected a recorded entry");
    expect(entry.function).toBe("OrderService.place");
  });

  it("records the same frame through the id-keyed surface", () => {
    const aggregator = new Aggregator();

    function recordById() {
      return aggregator.info("req-3", "by id");
    }

    const entry = recordById();
    if (!entry.recorded) throw new Error("expected a recorded entry");
    expect(entry.function).toContain("recordById");
  });

  it("leaves fields empty when capture is disabled", () => {
    const aggregator = new Aggregator({ disableCallSiteCapture: true });

    const entry = recordOrder(aggregator.newRequest("req-4"));
    if (!entry.recorded) throw new Error("expected a recorded entry");
    expect(entry.function).toBe("");
    expect(entry.file).toBe("");
    expect(entry.line).toBe(0);
  });
});
