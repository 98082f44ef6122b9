// SQLite 版检查点表定义
// SQLite 没有原生 JSON 类型：文档列可能是 TEXT 也可能是 BLOB，原样取出交给读取层解析
import {
  sqliteTable,
  text,
  integer,
  blob,
  primaryKey,
  customType,
} from "drizzle-orm/sqlite-core";

const jsonDocument = customType<{ data: unknown; driverData: unknown }>({
  dataType() {
    return "text";
  },
});

export const checkpoints = sqliteTable(
  "checkpoints",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    checkpoint_id: text("checkpoint_id").notNull(),
    parent_checkpoint_id: text("parent_checkpoint_id"),
    type: text("type"),
    checkpoint: jsonDocument("checkpoint").notNull(),
    metadata: jsonDocument("metadata").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id] }),
  })
);

export const checkpointWrites = sqliteTable(
  "checkpoint_writes",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    checkpoint_id: text("checkpoint_id").notNull(),
    task_id: text("task_id").notNull(),
    idx: integer("idx").notNull(),
    channel: text("channel").notNull(),
    type: text("type"),
    blob: blob("blob", { mode: "buffer" }).notNull(),
    task_path: text("task_path").notNull().default(""),
  },
  (table) => ({
    pk: primaryKey({
      columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id, table.task_id, table.idx],
    }),
  })
);

export const checkpointBlobs = sqliteTable(
  "checkpoint_blobs",
  {
    thread_id: text("thread_id").notNull(),
    checkpoint_ns: text("checkpoint_ns").notNull().default(""),
    channel: text("channel").notNull(),
    version: text("version").notNull(),
    type: text("type").notNull(),
    blob: blob("blob", { mode: "buffer" }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.channel, table.version] }),
  })
);
