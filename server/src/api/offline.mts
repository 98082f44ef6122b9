// 离线分析路由：/api/v1/offline
// 线程与检查点列表、轨迹重建、线程汇总、时间线、检查点比较、数据库信息

import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { AppEnv } from "./context.mjs";

const PageQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const NamespaceQuery = z.object({
  checkpoint_ns: z.string().optional(),
});

// ?include_blobs=true|1
const Flag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const TraceQuery = NamespaceQuery.extend({ include_blobs: Flag });

const LimitQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const CompareQuery = NamespaceQuery.extend({
  checkpoint_id_1: z.string().min(1),
  checkpoint_id_2: z.string().min(1),
});

const offline = new Hono<AppEnv>();

offline.get("/threads", zValidator("query", PageQuery), async (c) => {
  const { limit, offset } = c.req.valid("query");
  const page = await c.get("offline").listThreads({ limit, offset });
  return c.json({ threads: page.items, total: page.total, limit, offset });
});

offline.get("/threads/:threadId/checkpoints", zValidator("query", PageQuery.merge(NamespaceQuery)), async (c) => {
  const threadId = c.req.param("threadId");
  const { limit, offset, checkpoint_ns } = c.req.valid("query");
  const page = await c.get("offline").listCheckpoints(threadId, { limit, offset, checkpointNs: checkpoint_ns });
  return c.json({ thread_id: threadId, checkpoints: page.items, total: page.total, limit, offset });
});

offline.get("/threads/:threadId/checkpoints/:checkpointId/trace", zValidator("query", TraceQuery), async (c) => {
  const { include_blobs, checkpoint_ns } = c.req.valid("query");
  const result = await c.get("offline").getTrace(c.req.param("threadId"), c.req.param("checkpointId"), {
    includeBlobs: include_blobs,
    checkpointNs: checkpoint_ns,
  });
  return c.json(result);
});

offline.get("/threads/:threadId/analysis", zValidator("query", LimitQuery), async (c) => {
  const { limit } = c.req.valid("query");
  return c.json(await c.get("offline").analyzeThread(c.req.param("threadId"), { limit }));
});

offline.get("/threads/:threadId/timeline", zValidator("query", LimitQuery), async (c) => {
  const threadId = c.req.param("threadId");
  const { limit } = c.req.valid("query");
  const timeline = await c.get("offline").getTimeline(threadId, { limit });
  return c.json({ thread_id: threadId, timeline, count: timeline.length });
});

offline.get("/threads/:threadId/compare", zValidator("query", CompareQuery), async (c) => {
  const { checkpoint_id_1, checkpoint_id_2, checkpoint_ns } = c.req.valid("query");
  const comparison = await c
    .get("offline")
    .compareCheckpoints(c.req.param("threadId"), checkpoint_id_1, checkpoint_id_2, { checkpointNs: checkpoint_ns });
  return c.json(comparison);
});

offline.get("/database/info", async (c) => {
  return c.json(await c.get("offline").getDatabaseInfo());
});

export default offline;
