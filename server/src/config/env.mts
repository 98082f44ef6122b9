// 环境变量加载与校验模块
// 目标：优先使用系统环境变量；若缺失关键项，则回退读取仓库根目录的 .env
// 使用 zod 提供类型与默认值校验

import dotenv from "dotenv";
import path from "node:path";
import fs from "node:fs";
import { z } from "zod";

export const DB_TYPES = ["postgresql", "mysql", "sqlite"] as const;
export type DbType = (typeof DB_TYPES)[number];

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default("0.0.0.0"),
  DB_TYPE: z.enum(DB_TYPES).default("postgresql"),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default("./data/checkpoints.db"),
  MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  CORS_ORIGINS: z.string().default(""),
  ENABLE_REALTIME: z.string().default("true"),
  REALTIME_BUFFER_SIZE: z.coerce.number().int().positive().default(1000),
  REALTIME_IDLE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
  REALTIME_SUBSCRIBER_QUEUE: z.coerce.number().int().positive().default(100),
  REALTIME_DEFAULT_THREAD_ID: z.string().optional(),
  STREAM_HEARTBEAT_INTERVAL: z.coerce.number().int().positive().default(30_000),
  MODEL_PRICING_PATH: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export interface DatabaseConfig {
  type: DbType;
  url?: string;
  sqlitePath: string;
  maxConnections: number;
}

export interface RealtimeConfig {
  enabled: boolean;
  bufferSize: number;
  idleTtlMs: number;
  subscriberQueueSize: number;
  heartbeatIntervalMs: number;
  defaultThreadId?: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  database: DatabaseConfig;
  corsOrigins: string[];
  realtime: RealtimeConfig;
  pricingPath?: string;
}

// 服务端数据库需要连接串；SQLite 只需文件路径
function missingCriticalEnv(env: NodeJS.ProcessEnv): boolean {
  return env.DB_TYPE !== "sqlite" && !env.DATABASE_URL;
}

// 加载并返回校验后的环境变量对象
// 1) 直接解析 process.env
// 2) 缺失关键项时读取当前目录（或上一级）的 .env
// 3) 再次解析，返回带默认值的对象
export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (parsed.success && !missingCriticalEnv(source)) {
    return parsed.data;
  }

  const candidates = [path.resolve(process.cwd(), ".env"), path.resolve(process.cwd(), "..", ".env")];
  const envFile = candidates.find((file) => fs.existsSync(file));
  dotenv.config(envFile ? { path: envFile } : {});

  return EnvSchema.parse(source);
}

export function buildServerConfigFromEnv(env: Env): ServerConfig {
  return {
    port: env.PORT,
    host: env.HOST,
    database: {
      type: env.DB_TYPE,
      url: env.DATABASE_URL,
      sqlitePath: env.SQLITE_PATH,
      maxConnections: env.MAX_CONNECTIONS,
    },
    corsOrigins: env.CORS_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    realtime: {
      enabled: env.ENABLE_REALTIME === "true",
      bufferSize: env.REALTIME_BUFFER_SIZE,
      idleTtlMs: env.REALTIME_IDLE_TTL_MS,
      subscriberQueueSize: env.REALTIME_SUBSCRIBER_QUEUE,
      heartbeatIntervalMs: env.STREAM_HEARTBEAT_INTERVAL,
      defaultThreadId: env.REALTIME_DEFAULT_THREAD_ID,
    },
    pricingPath: env.MODEL_PRICING_PATH,
  };
}
