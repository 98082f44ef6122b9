// 共享数据库表定义（Drizzle ORM）
// 说明：描述 LangGraph 检查点存储的三张表；本服务只读，不负责建表与迁移
// PostgreSQL 版本在此文件，MySQL 与 SQLite 版本见 mysql.mts / sqlite.mts

import {
  pgTable,
  text,
  jsonb,
  integer,
  primaryKey,
  customType,
} from "drizzle-orm/pg-core";

// bytea 列：node-postgres 直接返回 Buffer
const bytea = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
});

// Checkpoints：每个超步一行，parent_checkpoint_id 串成链
export const checkpoints = pgTable(
  "checkpoints",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    checkpoint_id: text("checkpoint_id").notNull(),
    parent_checkpoint_id: text("parent_checkpoint_id"),
    type: text("type"),
    checkpoint: jsonb("checkpoint").$type<unknown>().notNull(),
    metadata: jsonb("metadata").$type<unknown>().notNull().default({}),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id] }),
  })
);

// Checkpoint writes：任务写入的通道值（负载内联存储）
export const checkpointWrites = pgTable(
  "checkpoint_writes",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    checkpoint_id: text("checkpoint_id").notNull(),
    task_id: text("task_id").notNull(),
    idx: integer("idx").notNull(),
    channel: text("channel").notNull(),
    type: text("type"),
    blob: bytea("blob").notNull(),
    task_path: text("task_path").notNull().default(""),
  },
  (table) => ({
    pk: primaryKey({
      columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id, table.task_id, table.idx],
    }),
  })
);

// Checkpoint blobs：按 (channel, version) 寻址的通道状态
export const checkpointBlobs = pgTable(
  "checkpoint_blobs",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    channel: text("channel").notNull(),
    version: text("version").notNull(),
    type: text("type").notNull(),
    blob: bytea("blob"),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.channel, table.version] }),
  })
);

export * from "./json.mjs";
export * from "./events.mjs";
export * from "./thread-id.mjs";
