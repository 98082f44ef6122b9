// MySQL 版检查点表定义
// JSON 列在 MySQL 下由驱动解析为对象，MariaDB 下可能是字符串，读取层统一归一化
import {
  mysqlTable,
  varchar,
  json,
  int,
  primaryKey,
  customType,
} from "drizzle-orm/mysql-core";

const longblob = customType<{ data: Buffer; driverData: Buffer }>({
  dataType() {
    return "longblob";
  },
});

export const checkpoints = mysqlTable(
  "checkpoints",
  {
    thread_id: varchar("thread_id", { length: 150 }).notNull(),
    checkpoint_ns: varchar("checkpoint_ns", { length: 2000 }).notNull().default(""),
    checkpoint_id: varchar("checkpoint_id", { length: 150 }).notNull(),
    parent_checkpoint_id: varchar("parent_checkpoint_id", { length: 150 }),
    type: varchar("type", { length: 150 }),
    checkpoint: json("checkpoint").$type<unknown>().notNull(),
    metadata: json("metadata").$type<unknown>().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id] }),
  })
);

export const checkpointWrites = mysqlTable(
  "checkpoint_writes",
  {
    thread_id: varchar("thread_id", { length: 150 }).notNull(),
    checkpoint_ns: varchar("checkpoint_ns", { length: 2000 }).notNull().default(""),
    checkpoint_id: varchar("checkpoint_id", { length: 150 }).notNull(),
    task_id: varchar("task_id", { length: 150 }).notNull(),
    idx: int("idx").notNull(),
    channel: varchar("channel", { length: 150 }).notNull(),
    type: varchar("type", { length: 150 }),
    blob: longblob("blob").notNull(),
    task_path: varchar("task_path", { length: 2000 }).notNull().default(""),
  },
  (table) => ({
    pk: primaryKey({
      columns: [table.thread_id, table.checkpoint_ns, table.checkpoint_id, table.task_id, table.idx],
    }),
  })
);

export const checkpointBlobs = mysqlTable(
  "checkpoint_blobs",
  {
    thread_id: varchar("thread_id", { length: 150 }).notNull(),
    checkpoint_ns: varchar("checkpoint_ns", { length: 2000 }).notNull().default(""),
    channel: varchar("channel", { length: 150 }).notNull(),
    version: varchar("version", { length: 150 }).notNull(),
    type: varchar("type", { length: 150 }).notNull(),
    blob: longblob("blob"),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.thread_id, table.checkpoint_ns, table.channel, table.version] }),
  })
);
