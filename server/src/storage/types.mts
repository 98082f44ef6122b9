// 检查点存储的记录类型与分页结构
import type { JsonObject } from "../../../share/shared-schema/src/json.mjs";
import type { DbType } from "../config/env.mjs";

export interface CheckpointRecord {
  thread_id: string;
  checkpoint_ns: string;
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  type: string | null;
  checkpoint: JsonObject;
  metadata: JsonObject;
}

export interface CheckpointWriteRecord {
  thread_id: string;
  checkpoint_ns: string;
  checkpoint_id: string;
  task_id: string;
  task_path: string;
  idx: number;
  channel: string;
  type: string | null;
  blob: Uint8Array;
}

export interface CheckpointBlobRecord {
  thread_id: string;
  checkpoint_ns: string;
  channel: string;
  version: string;
  type: string;
  blob: Uint8Array | null;
}

export interface ThreadInfo {
  thread_id: string;
  checkpoint_count: number;
  latest_checkpoint_id: string | null;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export interface CheckpointQuery extends PageOptions {
  checkpointNs?: string;
}

export interface GetCheckpointOptions {
  checkpointNs?: string;
  includeBlobs?: boolean;
}

// 一次检查点读取的完整结果：检查点本身、它的写入与（可选）通道 blob
export interface CheckpointBundle {
  checkpoint: CheckpointRecord;
  writes: CheckpointWriteRecord[];
  blobs: CheckpointBlobRecord[];
}

export interface TableCounts {
  checkpoints: number;
  checkpoint_writes: number;
  checkpoint_blobs: number;
}

export interface DatabaseInfo {
  type: DbType;
  version: string;
  features: Record<string, boolean>;
  tables: TableCounts;
  details: JsonObject;
}

// 方言层返回的原始行（JSON 列尚未归一化）
export interface RawCheckpointRow {
  thread_id: string;
  checkpoint_ns: string | null;
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  type: string | null;
  checkpoint: unknown;
  metadata: unknown;
}

export interface RawWriteRow {
  thread_id: string;
  checkpoint_ns: string | null;
  checkpoint_id: string;
  task_id: string;
  task_path: string | null;
  idx: number;
  channel: string;
  type: string | null;
  blob: Uint8Array | null;
}

export interface RawBlobRow {
  thread_id: string;
  checkpoint_ns: string | null;
  channel: string;
  version: string;
  type: string;
  blob: Uint8Array | null;
}

export interface BlobRef {
  channel: string;
  version: string;
}

export interface ServerProbe {
  version: string;
  features: Record<string, boolean>;
  details: JsonObject;
}
