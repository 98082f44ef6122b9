import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";
import type { TraceServer } from "../../server.mjs";
import { createCheckpointDatabase, insertCheckpoint, insertWrite } from "../../__tests__/fixtures.mjs";
import { createTestServer } from "./helpers.mjs";

describe("offline routes", () => {
  let db: Database.Database;
  let server: TraceServer;

  beforeEach(() => {
    db = createCheckpointDatabase();
    insertCheckpoint(db, {
      thread_id: "t1",
      checkpoint_id: "c1",
      metadata: { step: 0 },
      checkpoint: { v: 1, id: "c1", channel_values: { question: "hi" }, channel_versions: {} },
    });
    insertCheckpoint(db, {
      thread_id: "t1",
      checkpoint_id: "c2",
      parent_checkpoint_id: "c1",
      metadata: { step: 1 },
      checkpoint: { v: 1, id: "c2", channel_values: { question: "hi", answer: "hello" }, channel_versions: {} },
    });
    insertWrite(db, { thread_id: "t1", checkpoint_id: "c2", task_id: "n1", idx: 0, channel: "answer", value: "hello" });
    server = createTestServer(db);
  });

  it("lists threads with paging", async () => {
    const res = await server.app.request("/api/v1/offline/threads?limit=10");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      threads: [{ thread_id: "t1", checkpoint_count: 2, latest_checkpoint_id: "c2" }],
      total: 1,
      limit: 10,
      offset: 0,
    });
  });

  it("rejects invalid paging", async () => {
    const res = await server.app.request("/api/v1/offline/threads?limit=0");
    expect(res.status).toBe(400);
  });

  it("lists checkpoints newest first", async () => {
    const res = await server.app.request("/api/v1/offline/threads/t1/checkpoints");
    const body: unknown = await res.json();
    expect(body).toMatchObject({ thread_id: "t1", total: 2, limit: 100, offset: 0 });
    expect(body).toHaveProperty("checkpoints.0.checkpoint_id", "c2");
    expect(body).toHaveProperty("checkpoints.1.checkpoint_id", "c1");
  });

  it("returns a trace with placeholders unless blobs are requested", async () => {
    const plain = await server.app.request("/api/v1/offline/threads/t1/checkpoints/c2/trace");
    expect(plain.status).toBe(200);
    const body: unknown = await plain.json();
    expect(body).toHaveProperty("trace.nodes.0.output", { $omitted: { channels: ["answer"], encodings: ["json"] } });
    expect(body).toHaveProperty("summary.total_nodes", 1);
    expect(body).toHaveProperty("lineage", ["c2", "c1"]);

    const full: unknown = await (
      await server.app.request("/api/v1/offline/threads/t1/checkpoints/c2/trace?include_blobs=true")
    ).json();
    expect(full).toHaveProperty("trace.nodes.0.output", { answer: "hello" });
    expect(full).toHaveProperty("trace.state", { answer: "hello", question: "hi" });
  });

  it("maps unknown checkpoints to 404", async () => {
    const res = await server.app.request("/api/v1/offline/threads/t1/checkpoints/nope/trace");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", detail: "checkpoint not found: nope" });
  });

  it("returns 404 for the analysis of an empty thread", async () => {
    const res = await server.app.request("/api/v1/offline/threads/ghost/analysis");
    expect(res.status).toBe(404);
  });

  it("analyzes a thread", async () => {
    const body: unknown = await (await server.app.request("/api/v1/offline/threads/t1/analysis")).json();
    expect(body).toMatchObject({ thread_id: "t1", total_checkpoints: 2, total_nodes: 2 });
  });

  it("returns the timeline oldest first", async () => {
    const body: unknown = await (await server.app.request("/api/v1/offline/threads/t1/timeline")).json();
    expect(body).toMatchObject({ thread_id: "t1", count: 2 });
    expect(body).toHaveProperty("timeline.0.checkpoint_id", "c1");
    expect(body).toHaveProperty("timeline.1.nodes", ["n1"]);
  });

  it("compares two checkpoints", async () => {
    const res = await server.app.request("/api/v1/offline/threads/t1/compare?checkpoint_id_1=c1&checkpoint_id_2=c2");
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toHaveProperty("diff.entries", [
      { channel: "answer", status: "added", target: "hello" },
      { channel: "question", status: "unchanged" },
    ]);
    expect(body).toHaveProperty("differences.node_count", 0);
  });

  it("requires both checkpoint ids for a comparison", async () => {
    const res = await server.app.request("/api/v1/offline/threads/t1/compare?checkpoint_id_1=c1");
    expect(res.status).toBe(400);
  });

  it("reports database info", async () => {
    const body: unknown = await (await server.app.request("/api/v1/offline/database/info")).json();
    expect(body).toMatchObject({ type: "sqlite", tables: { checkpoints: 2, checkpoint_writes: 1, checkpoint_blobs: 0 } });
  });

  it("maps database failures to 503", async () => {
    db.close();
    const res = await server.app.request("/api/v1/offline/threads");
    expect(res.status).toBe(503);
    expect(await res.json()).toHaveProperty("error", "database_unavailable");
  });

  it("reports health", async () => {
    const res = await server.app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "healthy", database: { type: "sqlite", status: "connected" } });
  });

  it("answers unknown routes with 404 json", async () => {
    const res = await server.app.request("/api/v1/nothing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", detail: "no route for GET /api/v1/nothing" });
  });
});
