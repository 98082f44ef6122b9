// 系统路由：健康检查与服务信息
// 说明：server.mts 只负责装配，这里读取注入的依赖
import type { Hono } from "hono";
import { errorMessage } from "../../errors.mjs";
import { logger } from "../../logging.mjs";
import type { AppEnv } from "../context.mjs";

export const SERVICE_NAME = "flowlens";

export function registerHealthRoutes(app: Hono<AppEnv>): void {
  app.get("/health", async (c) => {
    const offline = c.get("offline");
    const realtime = c.get("realtime");
    try {
      await offline.adapter.ping();
      return c.json({
        status: "healthy",
        timestamp: new Date().toISOString(),
        database: { type: offline.adapter.dialect, status: "connected" },
        realtime: realtime ? { enabled: true, ...realtime.stats() } : { enabled: false },
      });
    } catch (error) {
      logger.error("Health check failed:", error);
      return c.json(
        {
          status: "unhealthy",
          timestamp: new Date().toISOString(),
          database: { type: offline.adapter.dialect, status: "disconnected" },
          error: errorMessage(error),
        },
        503
      );
    }
  });

  app.get("/api/v1/info", async (c) => {
    const config = c.get("config");
    return c.json({
      name: SERVICE_NAME,
      version: process.env.npm_package_version ?? "0.1.0",
      database: await c.get("offline").getDatabaseInfo(),
      realtime: {
        enabled: config.realtime.enabled,
        buffer_size: config.realtime.bufferSize,
        idle_ttl_ms: config.realtime.idleTtlMs,
        subscriber_queue_size: config.realtime.subscriberQueueSize,
        heartbeat_interval_ms: config.realtime.heartbeatIntervalMs,
      },
    });
  });
}
