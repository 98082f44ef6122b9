// 实时监控路由：/api/v1/realtime
// 事件查询、摘要、清空、导出、SSE 推送与事件摄取

import { Hono, type Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import { IngestEventSchema, type IngestContext } from "../../../share/shared-schema/src/events.mjs";
import { isJsonObject, toJsonValue } from "../../../share/shared-schema/src/json.mjs";
import { NotFoundError } from "../errors.mjs";
import { logger } from "../logging.mjs";
import { EXPORT_FORMATS, type RealtimeCollector } from "../realtime/collector.mjs";
import type { Subscription } from "../realtime/fanout.mjs";
import type { AppEnv } from "./context.mjs";

const EventsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const ExportQuery = z.object({
  format: z.enum(EXPORT_FORMATS).default("json"),
});

const collectorOf = (c: Context<AppEnv>): RealtimeCollector => {
  const collector = c.get("realtime");
  if (!collector) {
    throw new HTTPException(503, { message: "realtime collection is disabled" });
  }
  return collector;
};

const encoder = new TextEncoder();

// SSE 帧：event + 可选 id + data
function frame(event: string, data: unknown, id?: number): Uint8Array {
  const idLine = id === undefined ? "" : `id: ${id}\n`;
  return encoder.encode(`event: ${event}\n${idLine}data: ${JSON.stringify(data)}\n\n`);
}

// 按需拉取：每次 pull 写出一帧；超时写心跳，订阅关闭则结束流
function eventStream(threadId: string, subscription: Subscription, heartbeatMs: number): ReadableStream<Uint8Array> {
  let connected = false;
  let cancelled = false;
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (!connected) {
        connected = true;
        controller.enqueue(
          frame("connection", { thread_id: threadId, backlog: subscription.pending, timestamp: new Date().toISOString() })
        );
        return;
      }
      const item = await subscription.pull(heartbeatMs);
      // 已取消的流不能再写入
      if (cancelled) return;
      if (item === null) {
        controller.close();
        return;
      }
      if (item === "timeout") {
        controller.enqueue(frame("heartbeat", { timestamp: new Date().toISOString() }));
        return;
      }
      controller.enqueue(frame(item.kind === "backlog" ? "backlog" : "event", item.event, item.event.seq));
    },
    cancel() {
      cancelled = true;
      subscription.close();
      logger.debug(`stream subscriber for ${threadId} disconnected (dropped=${subscription.dropped})`);
    },
  });
}

const realtime = new Hono<AppEnv>();

realtime.get("/threads", (c) => {
  const threads = collectorOf(c).listActiveThreads();
  return c.json({ threads, count: threads.length });
});

realtime.get("/threads/:threadId/events", zValidator("query", EventsQuery), (c) => {
  const threadId = c.req.param("threadId");
  const { limit, offset } = c.req.valid("query");
  const collector = collectorOf(c);
  return c.json({
    thread_id: threadId,
    events: collector.getEvents(threadId, offset, limit),
    total: collector.count(threadId),
    limit,
    offset,
  });
});

realtime.get("/threads/:threadId/summary", (c) => {
  const threadId = c.req.param("threadId");
  const summary = collectorOf(c).getSummary(threadId);
  if (summary.event_count === 0) throw new NotFoundError("thread events", threadId);
  return c.json(summary);
});

realtime.delete("/threads/:threadId/events", (c) => {
  const threadId = c.req.param("threadId");
  const cleared = collectorOf(c).clear(threadId);
  return c.json({ message: `Events cleared for thread ${threadId}`, thread_id: threadId, cleared });
});

realtime.get("/threads/:threadId/export", zValidator("query", ExportQuery), (c) => {
  const threadId = c.req.param("threadId");
  const { format } = c.req.valid("query");
  return c.json({ thread_id: threadId, format, data: collectorOf(c).export(threadId, format) });
});

realtime.get("/threads/:threadId/stream", (c) => {
  const threadId = c.req.param("threadId");
  const subscription = collectorOf(c).subscribe(threadId);
  // 客户端断开时释放订阅
  c.req.raw.signal.addEventListener("abort", () => subscription.close(), { once: true });

  return new Response(eventStream(threadId, subscription, c.get("config").realtime.heartbeatIntervalMs), {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});

// 事件摄取：thread_id 作为调用方显式解析的结果
realtime.post("/events", zValidator("json", IngestEventSchema), (c) => {
  const body = c.req.valid("json");
  const explicitThreadId = body.thread_id;
  const context: IngestContext = {
    resolveThreadId: explicitThreadId ? () => explicitThreadId : undefined,
    configurable: body.configurable,
    metadata: body.metadata,
    staticThreadId: body.static_thread_id,
  };
  const data = toJsonValue(body.data);
  const event = collectorOf(c).ingest(
    {
      event_type: body.event_type,
      run_id: body.run_id,
      parent_run_id: body.parent_run_id ?? null,
      data: isJsonObject(data) ? data : {},
    },
    context
  );
  return c.json({ accepted: true, event }, 202);
});

export default realtime;
