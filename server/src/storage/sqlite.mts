// SQLite 检查点适配器
// better-sqlite3 + Drizzle；默认只读打开，文件不存在时立即失败

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, asc, count, countDistinct, desc, eq, inArray, max, or } from "drizzle-orm";
import { z } from "zod";
import {
  checkpoints as tblCheckpoints,
  checkpointWrites as tblWrites,
  checkpointBlobs as tblBlobs,
} from "../../../share/shared-schema/src/sqlite.mjs";
import { AdapterError, errorMessage } from "../errors.mjs";
import { logger } from "../logging.mjs";
import { CheckpointAdapter } from "./base.mjs";
import type { CheckpointLink } from "./checkpoint-index.mjs";
import type {
  BlobRef,
  PageOptions,
  RawBlobRow,
  RawCheckpointRow,
  RawWriteRow,
  ServerProbe,
  TableCounts,
  ThreadInfo,
} from "./types.mjs";

export type SqliteConfig =
  | { path: string; readonly?: boolean }
  // 测试或嵌入场景：直接传入已打开的连接
  | { database: Database.Database };

const checkpointColumns = {
  thread_id: tblCheckpoints.thread_id,
  checkpoint_ns: tblCheckpoints.checkpoint_ns,
  checkpoint_id: tblCheckpoints.checkpoint_id,
  parent_checkpoint_id: tblCheckpoints.parent_checkpoint_id,
  type: tblCheckpoints.type,
  checkpoint: tblCheckpoints.checkpoint,
  metadata: tblCheckpoints.metadata,
};

const VersionRow = z.object({ version: z.string() });
const JsonProbeRow = z.object({ ok: z.number() });

function openDatabase(path: string, readonly: boolean): Database.Database {
  if (path.trim().length === 0) {
    throw new AdapterError("SQLITE_PATH is empty", "sqlite");
  }
  const inMemory = path === ":memory:";
  try {
    return new Database(path, {
      readonly: readonly && !inMemory,
      fileMustExist: !inMemory,
    });
  } catch (error) {
    throw new AdapterError(`cannot open sqlite database ${path}: ${errorMessage(error)}`, "sqlite", { cause: error });
  }
}

export class SqliteCheckpointAdapter extends CheckpointAdapter {
  readonly dialect = "sqlite" as const;
  public readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;

  constructor(config: SqliteConfig) {
    super();
    this.sqlite = "database" in config ? config.database : openDatabase(config.path, config.readonly ?? true);
    this.db = drizzle(this.sqlite);
  }

  async ping(): Promise<void> {
    await this.run("ping", async () => {
      this.sqlite.prepare("SELECT 1").get();
    });
  }

  async close(): Promise<void> {
    this.sqlite.close();
  }

  protected async selectThreads(page: PageOptions): Promise<ThreadInfo[]> {
    const latest = max(tblCheckpoints.checkpoint_id);
    return this.db
      .select({
        thread_id: tblCheckpoints.thread_id,
        checkpoint_count: count(),
        latest_checkpoint_id: latest,
      })
      .from(tblCheckpoints)
      .groupBy(tblCheckpoints.thread_id)
      .orderBy(desc(latest), asc(tblCheckpoints.thread_id))
      .limit(page.limit)
      .offset(page.offset)
      .all();
  }

  protected async countThreads(): Promise<number> {
    const row = this.db.select({ total: countDistinct(tblCheckpoints.thread_id) }).from(tblCheckpoints).get();
    return row?.total ?? 0;
  }

  protected async selectCheckpoints(threadId: string, ns: string | undefined, page: PageOptions): Promise<RawCheckpointRow[]> {
    return this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(this.scope(threadId, ns))
      .orderBy(desc(tblCheckpoints.checkpoint_id))
      .limit(page.limit)
      .offset(page.offset)
      .all();
  }

  protected async countCheckpoints(threadId: string, ns: string | undefined): Promise<number> {
    const row = this.db.select({ total: count() }).from(tblCheckpoints).where(this.scope(threadId, ns)).get();
    return row?.total ?? 0;
  }

  protected async selectCheckpoint(threadId: string, ns: string | undefined, checkpointId: string): Promise<RawCheckpointRow | undefined> {
    return this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(and(this.scope(threadId, ns), eq(tblCheckpoints.checkpoint_id, checkpointId)))
      .orderBy(asc(tblCheckpoints.checkpoint_ns))
      .limit(1)
      .get();
  }

  protected async selectCheckpointsByIds(threadId: string, ns: string, ids: string[]): Promise<RawCheckpointRow[]> {
    return this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(and(this.scope(threadId, ns), inArray(tblCheckpoints.checkpoint_id, ids)))
      .all();
  }

  protected async selectCheckpointLinks(threadId: string, ns: string): Promise<CheckpointLink[]> {
    return this.db
      .select({
        checkpoint_id: tblCheckpoints.checkpoint_id,
        parent_checkpoint_id: tblCheckpoints.parent_checkpoint_id,
      })
      .from(tblCheckpoints)
      .where(this.scope(threadId, ns))
      .all();
  }

  protected async selectWrites(threadId: string, ns: string, checkpointId: string): Promise<RawWriteRow[]> {
    return this.db
      .select({
        thread_id: tblWrites.thread_id,
        checkpoint_ns: tblWrites.checkpoint_ns,
        checkpoint_id: tblWrites.checkpoint_id,
        task_id: tblWrites.task_id,
        task_path: tblWrites.task_path,
        idx: tblWrites.idx,
        channel: tblWrites.channel,
        type: tblWrites.type,
        blob: tblWrites.blob,
      })
      .from(tblWrites)
      .where(
        and(
          eq(tblWrites.thread_id, threadId),
          eq(tblWrites.checkpoint_ns, ns),
          eq(tblWrites.checkpoint_id, checkpointId)
        )
      )
      .orderBy(asc(tblWrites.task_id), asc(tblWrites.idx))
      .all();
  }

  protected async selectBlobs(threadId: string, ns: string, refs: BlobRef[]): Promise<RawBlobRow[]> {
    return this.db
      .select({
        thread_id: tblBlobs.thread_id,
        checkpoint_ns: tblBlobs.checkpoint_ns,
        channel: tblBlobs.channel,
        version: tblBlobs.version,
        type: tblBlobs.type,
        blob: tblBlobs.blob,
      })
      .from(tblBlobs)
      .where(
        and(
          eq(tblBlobs.thread_id, threadId),
          eq(tblBlobs.checkpoint_ns, ns),
          or(...refs.map((ref) => and(eq(tblBlobs.channel, ref.channel), eq(tblBlobs.version, ref.version))))
        )
      )
      .all();
  }

  protected async probeServer(): Promise<ServerProbe> {
    const { version } = VersionRow.parse(this.sqlite.prepare("SELECT sqlite_version() AS version").get());
    return {
      version,
      features: { json_support: this.hasJson1(), native_json: false, jsonb_support: false },
      details: {
        file: this.sqlite.name,
        readonly: this.sqlite.readonly,
        in_memory: this.sqlite.memory,
      },
    };
  }

  protected async countTableRows(): Promise<TableCounts> {
    const checkpoints = this.db.select({ value: count() }).from(tblCheckpoints).get();
    const writes = this.db.select({ value: count() }).from(tblWrites).get();
    const blobs = this.db.select({ value: count() }).from(tblBlobs).get();
    return {
      checkpoints: checkpoints?.value ?? 0,
      checkpoint_writes: writes?.value ?? 0,
      checkpoint_blobs: blobs?.value ?? 0,
    };
  }

  // JSON1 扩展在部分构建中缺失
  private hasJson1(): boolean {
    try {
      return JsonProbeRow.parse(this.sqlite.prepare("SELECT json_valid('{}') AS ok").get()).ok === 1;
    } catch (error) {
      logger.debug(`sqlite JSON1 probe failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private scope(threadId: string, ns: string | undefined) {
    return and(
      eq(tblCheckpoints.thread_id, threadId),
      ns === undefined ? undefined : eq(tblCheckpoints.checkpoint_ns, ns)
    );
  }
}
