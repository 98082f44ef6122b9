import { describe, it, expect, vi, afterEach } from "vitest";
import { EventBufferManager, type NewRealtimeEvent } from "../buffer.mjs";

function event(threadId: string, runId: string, eventType = "chain_start"): NewRealtimeEvent {
  return {
    event_type: eventType,
    run_id: runId,
    parent_run_id: null,
    thread_id: threadId,
    timestamp: "2024-01-01T00:00:00.000Z",
    duration_ms: null,
    data: {},
  };
}

describe("EventBufferManager", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("assigns increasing sequence numbers per thread", () => {
    const buffers = new EventBufferManager({ capacity: 10 });
    expect(buffers.append("a", event("a", "r1")).seq).toBe(1);
    expect(buffers.append("a", event("a", "r2")).seq).toBe(2);
    expect(buffers.append("b", event("b", "r3")).seq).toBe(1);
    expect(buffers.count("a")).toBe(2);
    expect(buffers.count("missing")).toBe(0);
  });

  it("evicts the oldest events on overflow and counts them", () => {
    const buffers = new EventBufferManager({ capacity: 3 });
    for (let i = 1; i <= 5; i++) buffers.append("t", event("t", `r${i}`));
    expect(buffers.snapshot("t").map((e) => e.run_id)).toEqual(["r3", "r4", "r5"]);
    expect(buffers.snapshot("t").map((e) => e.seq)).toEqual([3, 4, 5]);
    expect(buffers.dropped("t")).toBe(2);
    expect(buffers.stats()).toEqual({ threads: 1, events: 3, dropped: 2, capacity: 3, idle_ttl_ms: 3_600_000 });
  });

  it("pages from the oldest event", () => {
    const buffers = new EventBufferManager({ capacity: 4 });
    for (let i = 1; i <= 6; i++) buffers.append("t", event("t", `r${i}`));
    expect(buffers.getEvents("t", 1, 2).map((e) => e.run_id)).toEqual(["r4", "r5"]);
    expect(buffers.getEvents("t", 3).map((e) => e.run_id)).toEqual(["r6"]);
    expect(buffers.getEvents("t", 10, 5)).toEqual([]);
    expect(buffers.getEvents("missing")).toEqual([]);
  });

  it("returns copies that later appends do not change", () => {
    const buffers = new EventBufferManager({ capacity: 2 });
    buffers.append("t", event("t", "r1"));
    const before = buffers.snapshot("t");
    buffers.append("t", event("t", "r2"));
    buffers.append("t", event("t", "r3"));
    expect(before.map((e) => e.run_id)).toEqual(["r1"]);
  });

  it("clears a thread and notifies listeners", () => {
    const buffers = new EventBufferManager();
    const removed: Array<[string, string]> = [];
    buffers.onRemove((threadId, reason) => removed.push([threadId, reason]));
    buffers.append("t", event("t", "r1"));
    expect(buffers.clear("t")).toBe(true);
    expect(buffers.clear("t")).toBe(false);
    expect(buffers.activeThreads()).toEqual([]);
    expect(removed).toEqual([["t", "cleared"]]);
    expect(buffers.append("t", event("t", "r2")).seq).toBe(1);
  });

  it("evicts idle threads", () => {
    let now = 1_000;
    const buffers = new EventBufferManager({ idleTtlMs: 500, clock: () => now });
    buffers.append("old", event("old", "r1"));
    now = 1_400;
    buffers.append("fresh", event("fresh", "r2"));
    now = 1_600;
    expect(buffers.sweepIdle()).toEqual(["old"]);
    expect(buffers.activeThreads().map((t) => t.thread_id)).toEqual(["fresh"]);
  });

  it("lists active threads by most recent activity", () => {
    let now = 1_700_000_000_000;
    const buffers = new EventBufferManager({ clock: () => now });
    buffers.append("a", event("a", "r1"));
    now += 1_000;
    buffers.append("b", event("b", "r2"));
    expect(buffers.activeThreads()).toEqual([
      { thread_id: "b", event_count: 1, dropped: 0, last_activity: "2023-11-14T22:13:21.000Z" },
      { thread_id: "a", event_count: 1, dropped: 0, last_activity: "2023-11-14T22:13:20.000Z" },
    ]);
  });

  it("sweeps on a timer once started", () => {
    vi.useFakeTimers();
    let now = 0;
    const buffers = new EventBufferManager({ idleTtlMs: 4_000, clock: () => now });
    buffers.append("t", event("t", "r1"));
    buffers.start();
    now = 4_000;
    vi.advanceTimersByTime(2_000);
    expect(buffers.activeThreads()).toEqual([]);
    buffers.stop();
  });
});
