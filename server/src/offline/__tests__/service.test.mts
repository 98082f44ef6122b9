import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { SqliteCheckpointAdapter } from "../../storage/sqlite.mjs";
import { NotFoundError } from "../../errors.mjs";
import { BlobDecoder } from "../decoder.mjs";
import { OfflineService } from "../service.mjs";
import { createCheckpointDatabase, insertBlob, insertCheckpoint, insertWrite } from "../../__tests__/fixtures.mjs";
import { testPricing } from "./helpers.mjs";

function seed(db: Database.Database): void {
  insertCheckpoint(db, {
    thread_id: "t1",
    checkpoint_id: "c1",
    metadata: { step: 0, source: "input" },
    checkpoint: { v: 1, id: "c1", ts: "2024-05-01T00:00:00+00:00", channel_values: { question: "hi" }, channel_versions: {} },
  });
  insertCheckpoint(db, {
    thread_id: "t1",
    checkpoint_id: "c2",
    parent_checkpoint_id: "c1",
    metadata: { step: 1, source: "loop" },
    checkpoint: { v: 1, id: "c2", channel_values: {}, channel_versions: { messages: "2" } },
  });
  insertBlob(db, { thread_id: "t1", channel: "messages", version: "2", value: [{ type: "human", content: "hi" }] });
  insertWrite(db, { thread_id: "t1", checkpoint_id: "c2", task_id: "n1", idx: 0, channel: "output", value: "hello", task_path: "~__pregel_pull, n1" });
  insertWrite(db, { thread_id: "t1", checkpoint_id: "c2", task_id: "n1", idx: 1, channel: "log", value: ["step"], task_path: "~__pregel_pull, n1" });
  insertCheckpoint(db, {
    thread_id: "t1",
    checkpoint_id: "c3",
    parent_checkpoint_id: "c2",
    metadata: { step: 2, source: "loop" },
  });
  insertWrite(db, {
    thread_id: "t1",
    checkpoint_id: "c3",
    task_id: "m",
    idx: 0,
    channel: "messages",
    value: [
      {
        type: "ai",
        content: "ok",
        usage_metadata: { input_tokens: 100, output_tokens: 20, total_tokens: 120 },
        response_metadata: { model_name: "local-model" },
      },
    ],
  });
}

describe("OfflineService", () => {
  let service: OfflineService;

  beforeEach(() => {
    const db = createCheckpointDatabase();
    seed(db);
    service = new OfflineService(new SqliteCheckpointAdapter({ database: db }), new BlobDecoder(), testPricing(), {
      concurrency: 2,
    });
  });

  it("reconstructs a checkpoint with merged task writes", async () => {
    const result = await service.getTrace("t1", "c2", { includeBlobs: true });
    expect(result.trace.nodes).toHaveLength(1);
    expect(result.trace.nodes[0].name).toBe("n1");
    expect(result.trace.nodes[0].output).toEqual({ output: "hello", log: ["step"] });
    expect(result.trace.edges).toEqual([]);
    expect(result.trace.state).toEqual({ messages: [{ type: "human", content: "hi" }] });
    expect(result.summary.total_nodes).toBe(1);
    expect(result.lineage).toEqual(["c2", "c1"]);
  });

  it("omits payloads but keeps metrics when blobs are not requested", async () => {
    const result = await service.getTrace("t1", "c3");
    expect(result.trace.nodes[0].output).toEqual({ $omitted: { channels: ["messages"], encodings: ["json"] } });
    expect(result.trace.nodes[0].kind).toBe("model-call");
    expect(result.trace.state).toBeUndefined();
    expect(result.summary.token_usage).toEqual({ prompt_tokens: 100, completion_tokens: 20, total_tokens: 120 });
    expect(result.summary.cost.total_cost).toBeCloseTo(0.0006, 10);
    expect(result.lineage).toEqual(["c3", "c2", "c1"]);
  });

  it("rejects unknown checkpoints", async () => {
    await expect(service.getTrace("t1", "missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.getTrace("nope", "c1")).rejects.toThrow("checkpoint not found: c1");
  });

  it("rolls up a thread", async () => {
    const analysis = await service.analyzeThread("t1");
    expect(analysis.total_checkpoints).toBe(3);
    expect(analysis.analyzed_checkpoints).toBe(3);
    expect(analysis.total_nodes).toBe(3);
    expect(analysis.status_counts).toEqual({ running: 0, success: 3, error: 0 });
    expect(analysis.token_usage.total_tokens).toBe(120);
    expect(analysis.average_tokens_per_checkpoint).toBe(40);
    expect(analysis.total_cost).toBeCloseTo(0.0006, 10);
    expect(analysis.checkpoints.map((c) => [c.checkpoint_id, c.step])).toEqual([
      ["c3", 2],
      ["c2", 1],
      ["c1", 0],
    ]);
    await expect(service.analyzeThread("nope")).rejects.toThrow("thread not found: nope");
  });

  it("builds a timeline from oldest to newest", async () => {
    const timeline = await service.getTimeline("t1");
    expect(timeline.map((entry) => [entry.checkpoint_id, entry.nodes, entry.write_count])).toEqual([
      ["c1", ["noop"], 0],
      ["c2", ["n1"], 2],
      ["c3", ["m"], 1],
    ]);
    expect(timeline[0]).toMatchObject({ source: "input", ts: "2024-05-01T00:00:00+00:00", channel_count: 1, has_messages: false });
    expect(timeline[1]).toMatchObject({ parent_checkpoint_id: "c1", has_messages: true });
  });

  it("returns an empty timeline for an unknown thread", async () => {
    expect(await service.getTimeline("nope")).toEqual([]);
  });

  it("compares the decoded state of two checkpoints", async () => {
    const comparison = await service.compareCheckpoints("t1", "c1", "c2");
    expect(comparison.diff.entries).toEqual([
      { channel: "messages", status: "added", target: [{ type: "human", content: "hi" }] },
      { channel: "question", status: "removed", source: "hi" },
    ]);
    expect(comparison.differences).toEqual({ node_count: 0, total_tokens: 0, total_cost: 0, total_duration_ms: 0 });
    await expect(service.compareCheckpoints("t1", "c1", "missing")).rejects.toThrow("checkpoint not found: missing");
  });
});
