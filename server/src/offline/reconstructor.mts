// 轨迹重建
// 输入一个检查点及其写入，输出执行图（节点、边）；同样的输入总是得到同样的输出
// 1) 按 task_id 分组写入，每组一个节点
// 2) 节点输出 = 各通道写入值合并；节点输入 = 前驱节点输出合并（根节点为 null）
// 3) 节点按最早写入 idx 排序，task_id 打破平局
// 4) 边来自 metadata.task_graph 声明的前驱；全部缺失时按写入顺序线性串联（保真度降低）

import { z } from "zod";
import { setEntry, toJsonValue, type JsonObject, type JsonValue } from "../../../share/shared-schema/src/json.mjs";
import { DecodeError } from "../errors.mjs";
import type { CheckpointRecord, CheckpointWriteRecord } from "../storage/types.mjs";
import { DEFAULT_ENCODING, isDecodedObject, type BlobDecoder, type DecodedObject, type DecodedValue } from "./decoder.mjs";
import { costOf, detectMessageKinds, extractDurationMs, extractUsage, sumUsage } from "./metrics.mjs";
import type { ModelPricing } from "./pricing.mjs";
import {
  emptyUsage,
  NODE_KINDS,
  NODE_STATUSES,
  type NodeKind,
  type NodeStatus,
  type TraceEdge,
  type TraceGraph,
  type TraceNode,
} from "./types.mjs";

export const ERROR_CHANNEL = "__error__";
export const INTERRUPT_CHANNEL = "__interrupt__";
const SPECIAL_CHANNELS = new Set([ERROR_CHANNEL, INTERRUPT_CHANNEL, "__resume__", "__scheduled__", "__no_writes__"]);

// metadata.task_graph 中单个任务的声明
const TimeValue = z.union([z.string(), z.number()]);
const TaskDeclarationSchema = z.object({
  name: z.string().optional(),
  kind: z.enum(NODE_KINDS).optional(),
  status: z.enum(NODE_STATUSES).optional(),
  predecessors: z.array(z.string()).optional(),
  start_time: TimeValue.optional(),
  end_time: TimeValue.optional(),
});
type TaskDeclaration = z.infer<typeof TaskDeclarationSchema>;

export interface ReconstructInput {
  checkpoint: CheckpointRecord;
  writes: CheckpointWriteRecord[];
}

export interface ReconstructOptions {
  // false 时完全跳过解码，负载以占位符代替
  includePayloads?: boolean;
}

interface NodeDraft {
  taskId: string;
  writes: CheckpointWriteRecord[];
  firstIdx: number;
  declaration: TaskDeclaration | undefined;
  output: DecodedObject;
  errors: string[];
  interrupt: DecodedValue | undefined;
}

function toIsoTime(value: string | number | undefined): string | null {
  if (value === undefined) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

// task_path 形如 "~__pregel_pull, agent"，取最后一段
export function nameFromTaskPath(taskPath: string): string | undefined {
  const segments = taskPath
    .split(/[,|/]/)
    .map((segment) => segment.trim().replace(/^[('"~]+|[)'"]+$/g, ""))
    .filter((segment) => segment.length > 0 && !segment.startsWith("__pregel"));
  return segments[segments.length - 1];
}

export function payloadPlaceholder(channels: string[], encodings: string[]): JsonValue {
  return { $omitted: { channels, encodings } };
}

// 保留指标，去掉节点的输入输出负载
export function withoutPayloads(graph: TraceGraph): TraceGraph {
  return {
    ...graph,
    nodes: graph.nodes.map((node) => ({
      ...node,
      input: null,
      output: node.kind === "noop" ? null : payloadPlaceholder(node.channels, node.encodings),
    })),
  };
}

function describeError(value: DecodedValue | undefined): string {
  if (typeof value === "string") return value;
  if (isDecodedObject(value)) {
    const message = value.message ?? value.error ?? value.value;
    if (typeof message === "string") return message;
  }
  return JSON.stringify(toJsonValue(value));
}

export class TraceReconstructor {
  constructor(
    private readonly decoder: BlobDecoder,
    private readonly pricing: ModelPricing
  ) {}

  reconstruct(input: ReconstructInput, options: ReconstructOptions = {}): TraceGraph {
    const includePayloads = options.includePayloads ?? true;
    const { checkpoint } = input;
    const warnings: string[] = [];
    const declarations = this.readDeclarations(checkpoint.metadata, warnings);

    const base = {
      thread_id: checkpoint.thread_id,
      checkpoint_ns: checkpoint.checkpoint_ns,
      checkpoint_id: checkpoint.checkpoint_id,
      parent_checkpoint_id: checkpoint.parent_checkpoint_id,
      metadata: checkpoint.metadata,
    };

    if (input.writes.length === 0) {
      return { ...base, nodes: [this.noopNode(checkpoint)], edges: [], topology: "linear-fallback", warnings };
    }

    const drafts = this.groupWrites(input.writes, declarations);
    if (includePayloads) {
      for (const draft of drafts) this.decodeDraft(draft);
    }

    const declared = drafts.some((draft) => draft.declaration?.predecessors !== undefined);
    const predecessors = declared ? this.declaredPredecessors(drafts, warnings) : this.linearPredecessors(drafts);
    const edges: TraceEdge[] = [];
    drafts.forEach((draft, index) => {
      for (const pred of predecessors[index]) {
        edges.push({ source: drafts[pred].taskId, target: draft.taskId, label: declared ? null : "next" });
      }
    });

    const nodes = drafts.map((draft, index) => this.buildNode(draft, index, drafts, predecessors, includePayloads));
    return { ...base, nodes, edges, topology: declared ? "declared" : "linear-fallback", warnings };
  }

  private readDeclarations(metadata: JsonObject, warnings: string[]): Map<string, TaskDeclaration> {
    const declarations = new Map<string, TaskDeclaration>();
    const graph = metadata.task_graph;
    if (graph === undefined) return declarations;
    if (graph === null || typeof graph !== "object" || Array.isArray(graph)) {
      warnings.push("metadata.task_graph is not an object; ignored");
      return declarations;
    }
    for (const [taskId, entry] of Object.entries(graph)) {
      const parsed = TaskDeclarationSchema.safeParse(entry);
      if (parsed.success) {
        declarations.set(taskId, parsed.data);
      } else {
        warnings.push(`task_graph entry for ${taskId} is malformed; ignored`);
      }
    }
    return declarations;
  }

  private groupWrites(writes: CheckpointWriteRecord[], declarations: Map<string, TaskDeclaration>): NodeDraft[] {
    const groups = new Map<string, CheckpointWriteRecord[]>();
    for (const write of writes) {
      const group = groups.get(write.task_id);
      if (group) group.push(write);
      else groups.set(write.task_id, [write]);
    }
    const drafts: NodeDraft[] = [];
    for (const [taskId, group] of groups) {
      group.sort((a, b) => a.idx - b.idx);
      drafts.push({
        taskId,
        writes: group,
        firstIdx: group[0].idx,
        declaration: declarations.get(taskId),
        output: {},
        errors: [],
        interrupt: undefined,
      });
    }
    // 确定性的拓扑顺序
    return drafts.sort((a, b) => a.firstIdx - b.firstIdx || (a.taskId < b.taskId ? -1 : a.taskId > b.taskId ? 1 : 0));
  }

  // 解码失败只影响当前通道：写入标记并记录错误
  private decodeDraft(draft: NodeDraft): void {
    for (const write of draft.writes) {
      let value: DecodedValue;
      try {
        value = this.decoder.decode(write.type, write.blob);
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        draft.errors.push(`${write.channel}: ${error.message}`);
        value = { $undecodable: { encoding: error.encoding, reason: error.reason } };
      }
      if (write.channel === ERROR_CHANNEL) {
        draft.errors.unshift(describeError(value));
      } else if (write.channel === INTERRUPT_CHANNEL) {
        draft.interrupt = value;
      } else if (!SPECIAL_CHANNELS.has(write.channel)) {
        setEntry(draft.output, write.channel, value);
      }
    }
  }

  // 声明的前驱：先按 task_id 匹配，再按节点名匹配（取当前节点之前最近的同名节点）
  private declaredPredecessors(drafts: NodeDraft[], warnings: string[]): number[][] {
    const indexById = new Map(drafts.map((draft, index) => [draft.taskId, index]));
    const names = drafts.map((draft) => this.nodeName(draft));
    return drafts.map((draft, index) => {
      const resolved: number[] = [];
      for (const ref of draft.declaration?.predecessors ?? []) {
        let pred = indexById.get(ref);
        if (pred === undefined) {
          for (let i = index - 1; i >= 0; i--) {
            if (names[i] === ref) {
              pred = i;
              break;
            }
          }
        }
        if (pred === undefined) {
          warnings.push(`task ${draft.taskId} declares unknown predecessor ${ref}`);
        } else if (pred >= index) {
          // 只接受排在前面的前驱，保证无环
          warnings.push(`task ${draft.taskId} declares predecessor ${ref} that does not precede it; edge dropped`);
        } else if (!resolved.includes(pred)) {
          resolved.push(pred);
        }
      }
      return resolved.sort((a, b) => a - b);
    });
  }

  private linearPredecessors(drafts: NodeDraft[]): number[][] {
    return drafts.map((_, index) => (index === 0 ? [] : [index - 1]));
  }

  private nodeName(draft: NodeDraft): string {
    return draft.declaration?.name ?? nameFromTaskPath(draft.writes[0]?.task_path ?? "") ?? draft.taskId;
  }

  private buildNode(
    draft: NodeDraft,
    index: number,
    drafts: NodeDraft[],
    predecessors: number[][],
    includePayloads: boolean
  ): TraceNode {
    const channels = draft.writes.map((write) => write.channel);
    const encodings = draft.writes.map((write) => (write.type ?? DEFAULT_ENCODING).toLowerCase());
    const payloadChannels = channels.filter((channel) => !SPECIAL_CHANNELS.has(channel));
    const samples = includePayloads ? extractUsage(draft.output) : [];
    const messages = includePayloads ? detectMessageKinds(draft.output) : { ai: false, tool: false };
    const preds = predecessors[index];
    const children: string[] = [];
    predecessors.forEach((list, childIndex) => {
      if (list.includes(index)) children.push(drafts[childIndex].taskId);
    });

    const start_time = toIsoTime(draft.declaration?.start_time);
    const end_time = toIsoTime(draft.declaration?.end_time);
    const measured = start_time && end_time ? Date.parse(end_time) - Date.parse(start_time) : null;
    const duration_ms = measured !== null && measured >= 0 ? measured : includePayloads ? extractDurationMs(draft.output) : null;

    const metadata: JsonObject = {
      task_path: draft.writes[0]?.task_path ?? "",
      write_count: draft.writes.length,
    };
    if (draft.interrupt !== undefined) metadata.interrupt = toJsonValue(draft.interrupt);

    return {
      id: draft.taskId,
      task_id: draft.taskId,
      name: this.nodeName(draft),
      kind: this.nodeKind(draft, payloadChannels, samples.length > 0, messages),
      status: this.nodeStatus(draft, channels),
      start_time,
      end_time,
      duration_ms,
      input: includePayloads ? this.mergeInputs(preds.map((pred) => drafts[pred])) : null,
      output: includePayloads ? toJsonValue(draft.output) : payloadPlaceholder(channels, encodings),
      channels,
      encodings,
      error: draft.errors.length > 0 ? draft.errors.join("; ") : null,
      parent_id: preds.length > 0 ? drafts[preds[0]].taskId : null,
      children,
      first_write_idx: draft.firstIdx,
      token_usage: sumUsage(samples),
      cost: costOf(samples, this.pricing),
      model: samples.find((sample) => sample.model !== null)?.model ?? null,
      metadata,
    };
  }

  private nodeKind(
    draft: NodeDraft,
    payloadChannels: string[],
    hasUsage: boolean,
    messages: { ai: boolean; tool: boolean }
  ): NodeKind {
    if (draft.declaration?.kind) return draft.declaration.kind;
    if (payloadChannels.length > 0 && payloadChannels.every((channel) => channel.startsWith("branch:"))) return "branch";
    if (hasUsage || messages.ai) return "model-call";
    if (messages.tool) return "tool-call";
    return "task";
  }

  private nodeStatus(draft: NodeDraft, channels: string[]): NodeStatus {
    if (draft.declaration?.status) return draft.declaration.status;
    if (channels.includes(ERROR_CHANNEL)) return "error";
    if (channels.includes(INTERRUPT_CHANNEL)) return "running";
    return "success";
  }

  private mergeInputs(preds: NodeDraft[]): JsonValue {
    if (preds.length === 0) return null;
    const merged: DecodedObject = {};
    for (const pred of preds) {
      for (const [channel, value] of Object.entries(pred.output)) setEntry(merged, channel, value);
    }
    return toJsonValue(merged);
  }


  private noopNode(checkpoint: CheckpointRecord): TraceNode {
    return {
      id: `${checkpoint.checkpoint_id}:noop`,
      task_id: null,
      name: "noop",
      kind: "noop",
      status: "success",
      start_time: null,
      end_time: null,
      duration_ms: null,
      input: null,
      output: null,
      channels: [],
      encodings: [],
      error: null,
      parent_id: null,
      children: [],
      first_write_idx: null,
      token_usage: emptyUsage(),
      cost: this.pricing.zeroCost(),
      model: null,
      metadata: { source: checkpoint.metadata.source ?? null },
    };
  }
}
