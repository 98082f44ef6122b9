// 检查点存储适配器基类
// 方言子类只负责 SQL；分页、JSON 列归一化、父链回溯与错误包装在这里统一处理

import { isJsonObject, toJsonValue, type JsonObject } from "../../../share/shared-schema/src/json.mjs";
import type { DbType } from "../config/env.mjs";
import { AdapterError, errorMessage } from "../errors.mjs";
import { logger } from "../logging.mjs";
import { CheckpointIndex, type CheckpointLink } from "./checkpoint-index.mjs";
import type {
  BlobRef,
  CheckpointBlobRecord,
  CheckpointBundle,
  CheckpointQuery,
  CheckpointRecord,
  CheckpointWriteRecord,
  DatabaseInfo,
  GetCheckpointOptions,
  Page,
  PageOptions,
  RawBlobRow,
  RawCheckpointRow,
  RawWriteRow,
  ServerProbe,
  TableCounts,
  ThreadInfo,
} from "./types.mjs";

// IN 查询的分批大小
const ID_BATCH_SIZE = 500;

export abstract class CheckpointAdapter {
  abstract readonly dialect: DbType;

  protected abstract selectThreads(page: PageOptions): Promise<ThreadInfo[]>;
  protected abstract countThreads(): Promise<number>;
  protected abstract selectCheckpoints(threadId: string, ns: string | undefined, page: PageOptions): Promise<RawCheckpointRow[]>;
  protected abstract countCheckpoints(threadId: string, ns: string | undefined): Promise<number>;
  protected abstract selectCheckpoint(threadId: string, ns: string | undefined, checkpointId: string): Promise<RawCheckpointRow | undefined>;
  protected abstract selectCheckpointsByIds(threadId: string, ns: string, ids: string[]): Promise<RawCheckpointRow[]>;
  protected abstract selectCheckpointLinks(threadId: string, ns: string): Promise<CheckpointLink[]>;
  protected abstract selectWrites(threadId: string, ns: string, checkpointId: string): Promise<RawWriteRow[]>;
  protected abstract selectBlobs(threadId: string, ns: string, refs: BlobRef[]): Promise<RawBlobRow[]>;
  protected abstract probeServer(): Promise<ServerProbe>;
  protected abstract countTableRows(): Promise<TableCounts>;

  abstract ping(): Promise<void>;
  abstract close(): Promise<void>;

  // 线程列表：按最新检查点 ID 倒序
  async listThreads(page: PageOptions): Promise<Page<ThreadInfo>> {
    return this.run("listThreads", async () => {
      const [items, total] = await Promise.all([this.selectThreads(page), this.countThreads()]);
      return { items, total };
    });
  }

  // 检查点列表：新的在前（子检查点排在父检查点之前）
  async listCheckpoints(threadId: string, query: CheckpointQuery): Promise<Page<CheckpointRecord>> {
    return this.run("listCheckpoints", async () => {
      const [rows, total] = await Promise.all([
        this.selectCheckpoints(threadId, query.checkpointNs, query),
        this.countCheckpoints(threadId, query.checkpointNs),
      ]);
      return { items: rows.map((row) => this.toCheckpointRecord(row)), total };
    });
  }

  async getCheckpoint(
    threadId: string,
    checkpointId: string,
    options: GetCheckpointOptions = {}
  ): Promise<CheckpointBundle | null> {
    return this.run("getCheckpoint", async () => {
      const row = await this.selectCheckpoint(threadId, options.checkpointNs, checkpointId);
      if (!row) return null;
      const checkpoint = this.toCheckpointRecord(row);
      const writes = (await this.selectWrites(threadId, checkpoint.checkpoint_ns, checkpointId)).map((w) =>
        this.toWriteRecord(w)
      );
      const blobs = options.includeBlobs ? await this.loadBlobs(checkpoint) : [];
      return { checkpoint, writes, blobs };
    });
  }

  // 检查点及其祖先链（自身在前）
  async getCheckpointChain(threadId: string, checkpointId: string, checkpointNs = ""): Promise<CheckpointRecord[]> {
    return this.run("getCheckpointChain", async () => {
      const index = new CheckpointIndex(await this.selectCheckpointLinks(threadId, checkpointNs));
      const ids = index.ancestry(checkpointId);
      if (ids.length === 0) return [];

      const byId = new Map<string, CheckpointRecord>();
      for (let i = 0; i < ids.length; i += ID_BATCH_SIZE) {
        const rows = await this.selectCheckpointsByIds(threadId, checkpointNs, ids.slice(i, i + ID_BATCH_SIZE));
        for (const row of rows) byId.set(row.checkpoint_id, this.toCheckpointRecord(row));
      }
      return ids.flatMap((id) => {
        const record = byId.get(id);
        return record ? [record] : [];
      });
    });
  }

  async getDatabaseInfo(): Promise<DatabaseInfo> {
    return this.run("getDatabaseInfo", async () => {
      const [probe, tables] = await Promise.all([this.probeServer(), this.countTableRows()]);
      return { type: this.dialect, ...probe, tables };
    });
  }

  private async loadBlobs(checkpoint: CheckpointRecord): Promise<CheckpointBlobRecord[]> {
    const refs = channelVersionRefs(checkpoint.checkpoint);
    if (refs.length === 0) return [];
    const rows = await this.selectBlobs(checkpoint.thread_id, checkpoint.checkpoint_ns, refs);
    return rows.map((row) => ({
      thread_id: row.thread_id,
      checkpoint_ns: row.checkpoint_ns ?? "",
      channel: row.channel,
      version: row.version,
      type: row.type,
      blob: row.blob ? toBytes(row.blob) : null,
    }));
  }

  // 统一错误包装：驱动错误一律转为 AdapterError 向上传播
  protected async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AdapterError) throw error;
      logger.error(`[${this.dialect}] ${operation} failed: ${errorMessage(error)}`);
      throw new AdapterError(`${operation} failed: ${errorMessage(error)}`, this.dialect, { cause: error });
    }
  }

  protected toCheckpointRecord(row: RawCheckpointRow): CheckpointRecord {
    return {
      thread_id: row.thread_id,
      checkpoint_ns: row.checkpoint_ns ?? "",
      checkpoint_id: row.checkpoint_id,
      parent_checkpoint_id: row.parent_checkpoint_id ?? null,
      type: row.type ?? null,
      checkpoint: this.parseJsonColumn(row.checkpoint, "checkpoint", row.checkpoint_id),
      metadata: this.parseJsonColumn(row.metadata, "metadata", row.checkpoint_id),
    };
  }

  protected toWriteRecord(row: RawWriteRow): CheckpointWriteRecord {
    return {
      thread_id: row.thread_id,
      checkpoint_ns: row.checkpoint_ns ?? "",
      checkpoint_id: row.checkpoint_id,
      task_id: row.task_id,
      task_path: row.task_path ?? "",
      idx: Number(row.idx),
      channel: row.channel,
      type: row.type ?? null,
      blob: row.blob ? toBytes(row.blob) : new Uint8Array(0),
    };
  }

  // JSON 列归一化：对象直接用；字符串/字节按 UTF-8 JSON 解析；其余情况记日志并返回空对象
  protected parseJsonColumn(value: unknown, column: string, checkpointId: string): JsonObject {
    let parsed: unknown = value;
    if (parsed instanceof Uint8Array) parsed = Buffer.from(parsed).toString("utf8");
    if (typeof parsed === "string") {
      try {
        parsed = JSON.parse(parsed);
      } catch (error) {
        logger.warn(`[${this.dialect}] ${column} of checkpoint ${checkpointId} is not valid JSON: ${errorMessage(error)}`);
        return {};
      }
    }
    if (parsed === null || parsed === undefined) return {};
    const normalized = toJsonValue(parsed);
    if (isJsonObject(normalized)) return normalized;
    logger.warn(`[${this.dialect}] ${column} of checkpoint ${checkpointId} is not a JSON object`);
    return {};
  }
}

// 检查点文档中 channel_versions 指向的 blob 坐标
export function channelVersionRefs(checkpoint: JsonObject): BlobRef[] {
  const versions = checkpoint.channel_versions;
  if (!isJsonObject(versions)) return [];
  const refs: BlobRef[] = [];
  for (const [channel, version] of Object.entries(versions)) {
    if (typeof version === "string" || typeof version === "number") {
      refs.push({ channel, version: String(version) });
    }
  }
  return refs;
}

export function toBytes(value: Uint8Array | string): Uint8Array {
  if (typeof value === "string") return Buffer.from(value, "utf8");
  return value;
}

// 连接串校验：格式错误或协议与方言不符时立即失败
export function assertConnectionUrl(dialect: DbType, url: string | undefined, protocols: string[]): string {
  if (!url) {
    throw new AdapterError("connection URL is required", dialect);
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new AdapterError("malformed connection URL", dialect, { cause: error });
  }
  if (!protocols.includes(parsed.protocol)) {
    throw new AdapterError(
      `connection URL protocol ${parsed.protocol} does not match ${dialect} (expected ${protocols.join(" or ")})`,
      dialect
    );
  }
  return url;
}
