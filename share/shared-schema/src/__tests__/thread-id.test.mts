import { describe, it, expect, vi } from "vitest";
import {
  createThreadIdResolver,
  runDerivedThreadId,
  normalizeThreadId,
  ThreadIdResolver,
  metadataStrategy,
  type ThreadIdContext,
} from "../thread-id.mjs";

const full: ThreadIdContext = {
  runId: "run-1",
  resolveThreadId: () => "from-resolver",
  configurable: { thread_id: "from-configurable" },
  metadata: { thread_id: "from-metadata" },
  staticThreadId: "from-static",
};

describe("ThreadIdResolver", () => {
  it("prefers levels in strict priority order", () => {
    const resolver = createThreadIdResolver();
    expect(resolver.resolve(full)).toEqual({ threadId: "from-resolver", source: "resolver" });
    expect(resolver.resolve({ ...full, resolveThreadId: undefined })).toEqual({
      threadId: "from-configurable",
      source: "configurable",
    });
    expect(resolver.resolve({ ...full, resolveThreadId: undefined, configurable: undefined })).toEqual({
      threadId: "from-metadata",
      source: "metadata",
    });
    expect(
      resolver.resolve({ runId: "run-1", staticThreadId: "from-static", metadata: {} })
    ).toEqual({ threadId: "from-static", source: "static" });
  });

  it("falls back to a run-derived id when every level is absent", () => {
    const resolver = createThreadIdResolver();
    const result = resolver.resolve({ runId: "run-1" });
    expect(result.source).toBe("run");
    expect(result.threadId).toBe(runDerivedThreadId("run-1"));
    expect(result.threadId).toMatch(/^auto-[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("derives the same fallback for the same run and distinct ones across runs", () => {
    expect(runDerivedThreadId("run-a")).toBe(runDerivedThreadId("run-a"));
    expect(runDerivedThreadId("run-a")).not.toBe(runDerivedThreadId("run-b"));
  });

  it("treats a throwing resolver as absent and reports it", () => {
    const onStrategyError = vi.fn();
    const resolver = createThreadIdResolver({ onStrategyError });
    const result = resolver.resolve({
      runId: "run-1",
      resolveThreadId: () => {
        throw new Error("boom");
      },
      metadata: { thread_id: "m-1" },
    });
    expect(result).toEqual({ threadId: "m-1", source: "metadata" });
    expect(onStrategyError).toHaveBeenCalledTimes(1);
    expect(onStrategyError.mock.calls[0][0]).toBe("resolver");
  });

  it("skips empty and whitespace values", () => {
    const resolver = createThreadIdResolver({ staticThreadId: "fixed" });
    const result = resolver.resolve({
      runId: "run-1",
      resolveThreadId: () => "   ",
      configurable: { thread_id: "" },
      metadata: { thread_id: null },
    });
    expect(result).toEqual({ threadId: "fixed", source: "static" });
  });

  it("reads configurable nested in metadata", () => {
    const resolver = createThreadIdResolver();
    expect(resolver.resolve({ runId: "r", metadata: { configurable: { thread_id: "nested" } } })).toEqual({
      threadId: "nested",
      source: "configurable",
    });
  });

  it("lets a per-call static id override the configured one", () => {
    const resolver = createThreadIdResolver({ staticThreadId: "configured" });
    expect(resolver.resolve({ runId: "r", staticThreadId: "per-call" }).threadId).toBe("per-call");
  });

  it("uses an inherited parent thread before the run-derived fallback", () => {
    const resolver = createThreadIdResolver();
    expect(resolver.resolve({ runId: "child", inheritedThreadId: "parent-thread" })).toEqual({
      threadId: "parent-thread",
      source: "inherited",
    });
  });

  it("always falls back even with a custom strategy list", () => {
    const resolver = new ThreadIdResolver([metadataStrategy]);
    expect(resolver.resolve({ runId: "x" })).toEqual({ threadId: runDerivedThreadId("x"), source: "run" });
  });
});

describe("normalizeThreadId", () => {
  it("accepts strings and finite numbers", () => {
    expect(normalizeThreadId(" t-1 ")).toBe("t-1");
    expect(normalizeThreadId(42)).toBe("42");
    expect(normalizeThreadId(Number.NaN)).toBeUndefined();
    expect(normalizeThreadId({})).toBeUndefined();
  });
});
