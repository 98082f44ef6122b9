// Server 主服务
// 装配存储适配器、离线分析与实时采集，挂载 /api/v1 路由

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import path from "node:path";
import { getEnv, buildServerConfigFromEnv, type ServerConfig } from "./config/env.mjs";
import { AdapterError, NotFoundError, errorMessage } from "./errors.mjs";
import { logger, requestLogger } from "./logging.mjs";
import { cors } from "./middleware/cors.mjs";
import { ensureContentType } from "./middleware/content-type.mjs";
import { createCheckpointAdapter, type CheckpointAdapter } from "./storage/index.mjs";
import { BlobDecoder } from "./offline/decoder.mjs";
import { loadModelPricing, type ModelPricing } from "./offline/pricing.mjs";
import { OfflineService } from "./offline/service.mjs";
import { RealtimeCollector } from "./realtime/collector.mjs";
import type { AppEnv } from "./api/context.mjs";
import { registerHealthRoutes } from "./api/system/health.mjs";
import offline from "./api/offline.mjs";
import realtime from "./api/realtime.mjs";

// 可注入的依赖（测试用内存 SQLite 或自定义计价表）
export interface TraceServerDeps {
  store?: CheckpointAdapter;
  pricing?: ModelPricing;
  collector?: RealtimeCollector;
}

// 主服务类
export class TraceServer {
  readonly app: Hono<AppEnv>;
  readonly store: CheckpointAdapter;
  readonly offline: OfflineService;
  readonly collector: RealtimeCollector | null;
  private httpServer: ReturnType<typeof serve> | null = null;

  constructor(
    private readonly config: ServerConfig,
    deps: TraceServerDeps = {}
  ) {
    this.app = new Hono<AppEnv>();
    this.store = deps.store ?? createCheckpointAdapter(config.database);
    this.offline = new OfflineService(this.store, new BlobDecoder(), deps.pricing ?? loadModelPricing(config.pricingPath));
    this.collector = config.realtime.enabled
      ? deps.collector ??
        new RealtimeCollector({
          bufferSize: config.realtime.bufferSize,
          idleTtlMs: config.realtime.idleTtlMs,
          subscriberQueueSize: config.realtime.subscriberQueueSize,
          defaultThreadId: config.realtime.defaultThreadId,
        })
      : null;

    this.setupMiddleware();
    this.setupRoutes();
  }

  // 通用中间件（日志、CORS、内容类型、依赖注入）
  private setupMiddleware(): void {
    this.app.use("*", requestLogger());
    this.app.use("*", cors(this.config.corsOrigins));
    this.app.use("*", ensureContentType());

    this.app.use("*", async (c, next) => {
      c.set("config", this.config);
      c.set("offline", this.offline);
      c.set("realtime", this.collector);
      await next();
    });

    // NotFound -> 404；数据库不可用 -> 503；其余 500 并记录
    this.app.onError((error, c) => {
      if (error instanceof NotFoundError) {
        return c.json({ error: "not_found", detail: error.message }, 404);
      }
      if (error instanceof AdapterError) {
        logger.error(`Database error (${error.dialect}): ${error.message}`);
        return c.json({ error: "database_unavailable", detail: error.message }, 503);
      }
      if (error instanceof HTTPException) {
        return c.json({ error: "http_error", detail: error.message }, error.status);
      }
      logger.error("Unhandled error:", error);
      return c.json({ error: "internal_error", detail: errorMessage(error) }, 500);
    });

    this.app.notFound((c) => c.json({ error: "not_found", detail: `no route for ${c.req.method} ${c.req.path}` }, 404));
  }

  private setupRoutes(): void {
    registerHealthRoutes(this.app);
    this.app.route("/api/v1/offline", offline);
    if (this.collector) {
      this.app.route("/api/v1/realtime", realtime);
    }
  }

  // 启动前先探测数据库，连接失败立即退出
  async start(): Promise<void> {
    await this.store.ping();
    this.collector?.start();
    this.httpServer = serve({
      fetch: this.app.fetch,
      port: this.config.port,
      hostname: this.config.host,
    });
    logger.info(`Server started at ${this.config.host}:${this.config.port}`);
    logger.info(`Database: ${this.store.dialect} ${describeDatabase(this.config)}`);
    logger.info(`Realtime: ${this.collector ? "enabled" : "disabled"}`);
  }

  async stop(): Promise<void> {
    this.collector?.stop();
    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.store.close();
    logger.info("Server stopped");
  }
}

// 日志中隐藏连接串里的凭据
function describeDatabase(config: ServerConfig): string {
  if (config.database.type === "sqlite") return config.database.sqlitePath;
  return (config.database.url ?? "").replace(/\/\/.*@/, "//***@");
}

// 从环境变量构建配置
export function startServerFromEnv(): TraceServer {
  const env = getEnv();
  return new TraceServer(buildServerConfigFromEnv(env));
}

export async function main(): Promise<void> {
  const server = startServerFromEnv();
  await server.start();
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed:", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// 直接运行此文件时启动（兼容 Windows 路径与 tsx）
const argvPath = process.argv[1] ? path.resolve(process.argv[1]) : "";
const argvFileUrl = argvPath ? new URL(`file://${argvPath.replace(/\\/g, "/")}`).href : "";
if (import.meta.url === argvFileUrl) {
  main().catch((error: unknown) => {
    logger.error("Failed to start server:", error);
    process.exit(1);
  });
}
