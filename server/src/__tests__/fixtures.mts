// 测试夹具：内存 SQLite 检查点库
import Database from "better-sqlite3";

const DDL = `
CREATE TABLE checkpoints (
  thread_id TEXT NOT NULL,
  checkpoint_ns TEXT NOT NULL DEFAULT '',
  checkpoint_id TEXT NOT NULL,
  parent_checkpoint_id TEXT,
  type TEXT,
  checkpoint TEXT NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id)
);
CREATE TABLE checkpoint_writes (
  thread_id TEXT NOT NULL,
  checkpoint_ns TEXT NOT NULL DEFAULT '',
  checkpoint_id TEXT NOT NULL,
  task_id TEXT NOT NULL,
  idx INTEGER NOT NULL,
  channel TEXT NOT NULL,
  type TEXT,
  blob BLOB NOT NULL,
  task_path TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (thread_id, checkpoint_ns, checkpoint_id, task_id, idx)
);
CREATE TABLE checkpoint_blobs (
  thread_id TEXT NOT NULL,
  checkpoint_ns TEXT NOT NULL DEFAULT '',
  channel TEXT NOT NULL,
  version TEXT NOT NULL,
  type TEXT NOT NULL,
  blob BLOB,
  PRIMARY KEY (thread_id, checkpoint_ns, channel, version)
);
`;

export interface CheckpointSeed {
  thread_id: string;
  checkpoint_id: string;
  parent_checkpoint_id?: string | null;
  checkpoint_ns?: string;
  checkpoint?: unknown;
  metadata?: unknown;
  // 直接写入的原始列值（用于模拟 BLOB 或损坏的 JSON）
  rawCheckpoint?: string | Buffer;
  rawMetadata?: string | Buffer;
}

export interface WriteSeed {
  thread_id: string;
  checkpoint_id: string;
  task_id: string;
  idx: number;
  channel: string;
  type?: string | null;
  value?: unknown;
  blob?: Buffer;
  task_path?: string;
  checkpoint_ns?: string;
}

export interface BlobSeed {
  thread_id: string;
  channel: string;
  version: string;
  type?: string;
  value?: unknown;
  blob?: Buffer | null;
  checkpoint_ns?: string;
}

export function jsonBytes(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), "utf8");
}

export function createCheckpointDatabase(): Database.Database {
  const db = new Database(":memory:");
  db.exec(DDL);
  return db;
}

export function insertCheckpoint(db: Database.Database, seed: CheckpointSeed): void {
  db.prepare(
    `INSERT INTO checkpoints (thread_id, checkpoint_ns, checkpoint_id, parent_checkpoint_id, type, checkpoint, metadata)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(
    seed.thread_id,
    seed.checkpoint_ns ?? "",
    seed.checkpoint_id,
    seed.parent_checkpoint_id ?? null,
    "json",
    seed.rawCheckpoint ?? JSON.stringify(seed.checkpoint ?? { v: 1, id: seed.checkpoint_id, channel_values: {}, channel_versions: {} }),
    seed.rawMetadata ?? JSON.stringify(seed.metadata ?? {})
  );
}

export function insertWrite(db: Database.Database, seed: WriteSeed): void {
  db.prepare(
    `INSERT INTO checkpoint_writes (thread_id, checkpoint_ns, checkpoint_id, task_id, idx, channel, type, blob, task_path)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    seed.thread_id,
    seed.checkpoint_ns ?? "",
    seed.checkpoint_id,
    seed.task_id,
    seed.idx,
    seed.channel,
    seed.type === undefined ? "json" : seed.type,
    seed.blob ?? jsonBytes(seed.value ?? null),
    seed.task_path ?? ""
  );
}

export function insertBlob(db: Database.Database, seed: BlobSeed): void {
  db.prepare(
    `INSERT INTO checkpoint_blobs (thread_id, checkpoint_ns, channel, version, type, blob)
     VALUES (?, ?, ?, ?, ?, ?)`
  ).run(
    seed.thread_id,
    seed.checkpoint_ns ?? "",
    seed.channel,
    seed.version,
    seed.type ?? "json",
    seed.blob === undefined ? jsonBytes(seed.value ?? null) : seed.blob
  );
}
