// PostgreSQL 检查点适配器
// pg 连接池 + Drizzle（node-postgres 驱动）；checkpoint/metadata 为 jsonb，blob 为 bytea

import pg from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { and, asc, count, countDistinct, desc, eq, inArray, max, or } from "drizzle-orm";
import {
  checkpoints as tblCheckpoints,
  checkpointWrites as tblWrites,
  checkpointBlobs as tblBlobs,
} from "../../../share/shared-schema/src/index.mjs";
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

export interface PostgresConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
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

export class PostgresCheckpointAdapter extends CheckpointAdapter {
  readonly dialect = "postgresql" as const;
  public readonly pool: pg.Pool;
  private readonly db: NodePgDatabase;

  constructor(config: PostgresConfig) {
    super();
    const connectionString = assertConnectionUrl("postgresql", config.connectionString, ["postgres:", "postgresql:"]);
    this.pool = new pg.Pool({
      connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5000,
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
    const result = await this.pool.query<{ version: string; database: string; size_bytes: string }>(
      "SELECT version() AS version, current_database() AS database, pg_database_size(current_database())::text AS size_bytes"
    );
    const row = result.rows[0];
    return {
      version: row?.version ?? "unknown",
      features: { json_support: true, native_json: true, jsonb_support: true },
      details: {
        database: row?.database ?? null,
        size_bytes: row ? Number(row.size_bytes) : null,
        pool_total: this.pool.totalCount,
        pool_idle: this.pool.idleCount,
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
