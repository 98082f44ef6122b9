// MySQL 检查点适配器
// mysql2 连接池 + Drizzle（mysql2 驱动）；JSON 列，blob 为 LONGBLOB

import { createPool, type Pool as MySqlPool, type RowDataPacket } from "mysql2/promise";
import { drizzle, type MySql2Database } from "drizzle-orm/mysql2";
import { and, asc, count, countDistinct, desc, eq, inArray, max, or } from "drizzle-orm";
import {
  checkpoints as tblCheckpoints,
  checkpointWrites as tblWrites,
  checkpointBlobs as tblBlobs,
} from "../../../share/shared-schema/src/mysql.mjs";
import { assertConnectionUrl, CheckpointAdapter } from "./base.mjs";
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

export interface MySqlConfig {
  connectionString: string;
  maxConnections?: number;
  connectTimeoutMillis?: number;
}

const checkpointColumns = {
  thread_id: tblCheckpoints.thread_id,
  checkpoint_ns: tblCheckpoints.checkpoint_ns,
  checkpoint_id: tblCheckpoints.checkpoint_id,
  parent_checkpoint_id: tblCheckpoints.parent_checkpoint_id,
  type: tblCheckpoints.type,
  checkpoint: tblCheckpoints.checkpoint,
  metadata: tblCheckpoints.metadata,
};

// JSON 类型自 MySQL 5.7 / MariaDB 10.2 起可用
export function mysqlSupportsJson(version: string): boolean {
  const match = /^(\d+)\.(\d+)/.exec(version);
  if (!match) return false;
  const major = Number(match[1]);
  const minor = Number(match[2]);
  if (/mariadb/i.test(version)) return major > 10 || (major === 10 && minor >= 2);
  return major > 5 || (major === 5 && minor >= 7);
}

export class MySqlCheckpointAdapter extends CheckpointAdapter {
  readonly dialect = "mysql" as const;
  public readonly pool: MySqlPool;
  private readonly db: MySql2Database;

  constructor(config: MySqlConfig) {
    super();
    const uri = assertConnectionUrl("mysql", config.connectionString, ["mysql:"]);
    this.pool = createPool({
      uri,
      connectionLimit: config.maxConnections ?? 10,
      connectTimeout: config.connectTimeoutMillis ?? 5000,
      waitForConnections: true,
    });
    this.db = drizzle(this.pool);
  }

  async ping(): Promise<void> {
    await this.run("ping", async () => {
      await this.pool.query("SELECT 1");
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
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
      .offset(page.offset);
  }

  protected async countThreads(): Promise<number> {
    const [row] = await this.db.select({ total: countDistinct(tblCheckpoints.thread_id) }).from(tblCheckpoints);
    return row?.total ?? 0;
  }

  protected async selectCheckpoints(threadId: string, ns: string | undefined, page: PageOptions): Promise<RawCheckpointRow[]> {
    return this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(this.scope(threadId, ns))
      .orderBy(desc(tblCheckpoints.checkpoint_id))
      .limit(page.limit)
      .offset(page.offset);
  }

  protected async countCheckpoints(threadId: string, ns: string | undefined): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(tblCheckpoints).where(this.scope(threadId, ns));
    return row?.total ?? 0;
  }

  protected async selectCheckpoint(threadId: string, ns: string | undefined, checkpointId: string): Promise<RawCheckpointRow | undefined> {
    const [row] = await this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(and(this.scope(threadId, ns), eq(tblCheckpoints.checkpoint_id, checkpointId)))
      .orderBy(asc(tblCheckpoints.checkpoint_ns))
      .limit(1);
    return row;
  }

  protected async selectCheckpointsByIds(threadId: string, ns: string, ids: string[]): Promise<RawCheckpointRow[]> {
    return this.db
      .select(checkpointColumns)
      .from(tblCheckpoints)
      .where(and(this.scope(threadId, ns), inArray(tblCheckpoints.checkpoint_id, ids)));
  }

  protected async selectCheckpointLinks(threadId: string, ns: string): Promise<CheckpointLink[]> {
    return this.db
      .select({
        checkpoint_id: tblCheckpoints.checkpoint_id,
        parent_checkpoint_id: tblCheckpoints.parent_checkpoint_id,
      })
      .from(tblCheckpoints)
      .where(this.scope(threadId, ns));
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
      .orderBy(asc(tblWrites.task_id), asc(tblWrites.idx));
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
      );
  }

  protected async probeServer(): Promise<ServerProbe> {
    const [rows] = await this.pool.query<RowDataPacket[]>("SELECT VERSION() AS version, DATABASE() AS db");
    const version = rows[0] ? String(rows[0].version) : "unknown";
    const database = rows[0]?.db;
    const json = mysqlSupportsJson(version);
    return {
      version,
      features: { json_support: json, native_json: json, jsonb_support: false },
      details: {
        database: typeof database === "string" ? database : null,
        flavor: /mariadb/i.test(version) ? "mariadb" : "mysql",
      },
    };
  }

  protected async countTableRows(): Promise<TableCounts> {
    const [[checkpoints], [writes], [blobs]] = await Promise.all([
      this.db.select({ value: count() }).from(tblCheckpoints),
      this.db.select({ value: count() }).from(tblWrites),
      this.db.select({ value: count() }).from(tblBlobs),
    ]);
    return {
      checkpoints: checkpoints?.value ?? 0,
      checkpoint_writes: writes?.value ?? 0,
      checkpoint_blobs: blobs?.value ?? 0,
    };
  }

  private scope(threadId: string, ns: string | undefined) {
    return and(
      eq(tblCheckpoints.thread_id, threadId),
      ns === undefined ? undefined : eq(tblCheckpoints.checkpoint_ns, ns)
    );
  }
}
