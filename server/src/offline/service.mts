// 离线分析服务
// 把存储适配器、解码器、重建器与比较器组合成 API 需要的操作

import { isJsonObject, type JsonObject, type JsonValue } from "../../../share/shared-schema/src/json.mjs";
import { NotFoundError } from "../errors.mjs";
import type { CheckpointAdapter } from "../storage/base.mjs";
import type {
  CheckpointQuery,
  CheckpointRecord,
  DatabaseInfo,
  Page,
  PageOptions,
  ThreadInfo,
} from "../storage/types.mjs";
import type { BlobDecoder } from "./decoder.mjs";
import { decodeCheckpointState, diffCheckpointStates, stateToJson, type CheckpointDiff } from "./differ.mjs";
import { summarizeTrace } from "./metrics.mjs";
import type { ModelPricing } from "./pricing.mjs";
import { TraceReconstructor, withoutPayloads } from "./reconstructor.mjs";
import { emptyUsage, type ExecutionSummary, type NodeStatus, type TokenUsage, type TraceGraph } from "./types.mjs";

export interface TraceResult {
  trace: TraceGraph;
  summary: ExecutionSummary;
  lineage: string[];
}

export interface CheckpointAnalysis {
  checkpoint_id: string;
  step: JsonValue;
  total_nodes: number;
  error_count: number;
  token_usage: TokenUsage;
  total_cost: number;
  total_duration_ms: number;
}

export interface ThreadAnalysis {
  thread_id: string;
  total_checkpoints: number;
  analyzed_checkpoints: number;
  total_nodes: number;
  status_counts: Record<NodeStatus, number>;
  token_usage: TokenUsage;
  currency: string;
  total_cost: number;
  total_duration_ms: number;
  average_tokens_per_checkpoint: number;
  average_cost_per_checkpoint: number;
  checkpoints: CheckpointAnalysis[];
}

export interface TimelineEntry {
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  step: JsonValue;
  source: JsonValue;
  ts: JsonValue;
  channel_count: number;
  has_messages: boolean;
  node_count: number;
  nodes: string[];
  write_count: number;
}

export interface CheckpointComparison {
  thread_id: string;
  checkpoint_1: { checkpoint_id: string; summary: ExecutionSummary };
  checkpoint_2: { checkpoint_id: string; summary: ExecutionSummary };
  diff: CheckpointDiff;
  differences: {
    node_count: number;
    total_tokens: number;
    total_cost: number;
    total_duration_ms: number;
  };
}

export interface OfflineServiceOptions {
  // 线程汇总时同时重建的检查点数
  concurrency?: number;
}

async function mapWithConcurrency<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += limit) {
    results.push(...(await Promise.all(items.slice(i, i + limit).map(fn))));
  }
  return results;
}

function channelNames(checkpoint: JsonObject): Set<string> {
  const names = new Set<string>();
  for (const key of ["channel_values", "channel_versions"]) {
    const value = checkpoint[key];
    if (isJsonObject(value)) Object.keys(value).forEach((name) => names.add(name));
  }
  return names;
}

export class OfflineService {
  private readonly reconstructor: TraceReconstructor;
  private readonly concurrency: number;

  constructor(
    private readonly store: CheckpointAdapter,
    private readonly decoder: BlobDecoder,
    private readonly pricing: ModelPricing,
    options: OfflineServiceOptions = {}
  ) {
    this.reconstructor = new TraceReconstructor(decoder, pricing);
    this.concurrency = Math.max(1, options.concurrency ?? 8);
  }

  get adapter(): CheckpointAdapter {
    return this.store;
  }

  async listThreads(page: PageOptions): Promise<Page<ThreadInfo>> {
    return this.store.listThreads(page);
  }

  async listCheckpoints(threadId: string, query: CheckpointQuery): Promise<Page<CheckpointRecord>> {
    return this.store.listCheckpoints(threadId, query);
  }

  // 摘要总是基于解码后的写入计算；includeBlobs 为 false 时只返回占位负载且不加载通道状态
  async getTrace(
    threadId: string,
    checkpointId: string,
    options: { includeBlobs?: boolean; checkpointNs?: string } = {}
  ): Promise<TraceResult> {
    const includeBlobs = options.includeBlobs ?? false;
    const bundle = await this.store.getCheckpoint(threadId, checkpointId, {
      checkpointNs: options.checkpointNs,
      includeBlobs,
    });
    if (!bundle) throw new NotFoundError("checkpoint", checkpointId);

    const full = this.reconstructor.reconstruct(bundle, { includePayloads: true });
    const summary = summarizeTrace(full, this.pricing.currency);
    const trace = includeBlobs
      ? { ...full, state: stateToJson(decodeCheckpointState(bundle.checkpoint, bundle.blobs, this.decoder)) }
      : withoutPayloads(full);
    const chain = await this.store.getCheckpointChain(threadId, checkpointId, bundle.checkpoint.checkpoint_ns);
    return { trace, summary, lineage: chain.map((record) => record.checkpoint_id) };
  }

  async analyzeThread(threadId: string, options: { limit?: number } = {}): Promise<ThreadAnalysis> {
    const page = await this.store.listCheckpoints(threadId, { limit: options.limit ?? 100, offset: 0 });
    if (page.total === 0) throw new NotFoundError("thread", threadId);

    const summaries = await mapWithConcurrency(page.items, this.concurrency, async (record) => {
      const bundle = await this.store.getCheckpoint(threadId, record.checkpoint_id, {
        checkpointNs: record.checkpoint_ns,
      });
      const graph = this.reconstructor.reconstruct(bundle ?? { checkpoint: record, writes: [] });
      return { record, summary: summarizeTrace(graph, this.pricing.currency) };
    });

    const tokens = emptyUsage();
    const status_counts = { running: 0, success: 0, error: 0 };
    let total_cost = 0;
    let total_duration_ms = 0;
    let total_nodes = 0;
    const checkpoints: CheckpointAnalysis[] = summaries.map(({ record, summary }) => {
      tokens.prompt_tokens += summary.token_usage.prompt_tokens;
      tokens.completion_tokens += summary.token_usage.completion_tokens;
      tokens.total_tokens += summary.token_usage.total_tokens;
      status_counts.running += summary.status_counts.running;
      status_counts.success += summary.status_counts.success;
      status_counts.error += summary.status_counts.error;
      total_cost += summary.cost.total_cost;
      total_duration_ms += summary.duration.total_duration_ms;
      total_nodes += summary.total_nodes;
      return {
        checkpoint_id: record.checkpoint_id,
        step: record.metadata.step ?? null,
        total_nodes: summary.total_nodes,
        error_count: summary.error_count,
        token_usage: summary.token_usage,
        total_cost: summary.cost.total_cost,
        total_duration_ms: summary.duration.total_duration_ms,
      };
    });

    const analyzed = checkpoints.length;
    return {
      thread_id: threadId,
      total_checkpoints: page.total,
      analyzed_checkpoints: analyzed,
      total_nodes,
      status_counts,
      token_usage: tokens,
      currency: this.pricing.currency,
      total_cost,
      total_duration_ms,
      average_tokens_per_checkpoint: analyzed > 0 ? tokens.total_tokens / analyzed : 0,
      average_cost_per_checkpoint: analyzed > 0 ? total_cost / analyzed : 0,
      checkpoints,
    };
  }

  // 时间线：从旧到新，只看拓扑不解码负载
  async getTimeline(threadId: string, options: { limit?: number } = {}): Promise<TimelineEntry[]> {
    const page = await this.store.listCheckpoints(threadId, { limit: options.limit ?? 100, offset: 0 });
    const entries = await mapWithConcurrency(page.items, this.concurrency, async (record) => {
      const bundle = await this.store.getCheckpoint(threadId, record.checkpoint_id, {
        checkpointNs: record.checkpoint_ns,
      });
      const writes = bundle?.writes ?? [];
      const graph = this.reconstructor.reconstruct({ checkpoint: record, writes }, { includePayloads: false });
      const channels = channelNames(record.checkpoint);
      return {
        checkpoint_id: record.checkpoint_id,
        parent_checkpoint_id: record.parent_checkpoint_id,
        step: record.metadata.step ?? null,
        source: record.metadata.source ?? null,
        ts: record.checkpoint.ts ?? null,
        channel_count: channels.size,
        has_messages: channels.has("messages"),
        node_count: graph.nodes.length,
        nodes: graph.nodes.map((node) => node.name),
        write_count: writes.length,
      };
    });
    return entries.reverse();
  }

  async compareCheckpoints(
    threadId: string,
    checkpointId1: string,
    checkpointId2: string,
    options: { checkpointNs?: string } = {}
  ): Promise<CheckpointComparison> {
    const [first, second] = await Promise.all([
      this.store.getCheckpoint(threadId, checkpointId1, { checkpointNs: options.checkpointNs, includeBlobs: true }),
      this.store.getCheckpoint(threadId, checkpointId2, { checkpointNs: options.checkpointNs, includeBlobs: true }),
    ]);
    if (!first) throw new NotFoundError("checkpoint", checkpointId1);
    if (!second) throw new NotFoundError("checkpoint", checkpointId2);

    const summary1 = summarizeTrace(this.reconstructor.reconstruct(first), this.pricing.currency);
    const summary2 = summarizeTrace(this.reconstructor.reconstruct(second), this.pricing.currency);
    const diff = diffCheckpointStates(
      decodeCheckpointState(first.checkpoint, first.blobs, this.decoder),
      decodeCheckpointState(second.checkpoint, second.blobs, this.decoder)
    );
    return {
      thread_id: threadId,
      checkpoint_1: { checkpoint_id: checkpointId1, summary: summary1 },
      checkpoint_2: { checkpoint_id: checkpointId2, summary: summary2 },
      diff,
      differences: {
        node_count: summary2.total_nodes - summary1.total_nodes,
        total_tokens: summary2.token_usage.total_tokens - summary1.token_usage.total_tokens,
        total_cost: summary2.cost.total_cost - summary1.cost.total_cost,
        total_duration_ms: summary2.duration.total_duration_ms - summary1.duration.total_duration_ms,
      },
    };
  }

  async getDatabaseInfo(): Promise<DatabaseInfo> {
    return this.store.getDatabaseInfo();
  }
}
