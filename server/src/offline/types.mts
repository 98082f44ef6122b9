// 离线轨迹重建的派生类型
import type { JsonObject, JsonValue } from "../../../share/shared-schema/src/json.mjs";

export const NODE_KINDS = ["model-call", "tool-call", "branch", "task", "noop"] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

export const NODE_STATUSES = ["running", "success", "error"] as const;
export type NodeStatus = (typeof NODE_STATUSES)[number];

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface NodeCost {
  currency: string;
  prompt_cost: number;
  completion_cost: number;
  total_cost: number;
}

export interface TraceNode {
  id: string;
  task_id: string | null;
  name: string;
  kind: NodeKind;
  status: NodeStatus;
  start_time: string | null;
  end_time: string | null;
  duration_ms: number | null;
  input: JsonValue;
  output: JsonValue;
  channels: string[];
  // 与 channels 一一对应的写入编码
  encodings: string[];
  error: string | null;
  parent_id: string | null;
  children: string[];
  first_write_idx: number | null;
  token_usage: TokenUsage;
  cost: NodeCost;
  model: string | null;
  metadata: JsonObject;
}

export interface TraceEdge {
  source: string;
  target: string;
  label: string | null;
}

// declared：边来自检查点元数据；linear-fallback：元数据缺失时按写入顺序串联（保真度降低）
export type TraceTopology = "declared" | "linear-fallback";

export interface TraceGraph {
  thread_id: string;
  checkpoint_ns: string;
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  nodes: TraceNode[];
  edges: TraceEdge[];
  topology: TraceTopology;
  warnings: string[];
  metadata: JsonObject;
  state?: JsonObject;
}

export interface ExecutionSummary {
  thread_id: string;
  checkpoint_id: string;
  total_nodes: number;
  status_counts: Record<NodeStatus, number>;
  success_count: number;
  error_count: number;
  token_usage: TokenUsage;
  cost: {
    currency: string;
    prompt_cost: number;
    completion_cost: number;
    total_cost: number;
    by_currency: Record<string, number>;
  };
  duration: {
    total_duration_ms: number;
    by_category: Record<NodeKind, number>;
    avg_model_latency_ms: number | null;
    avg_tool_latency_ms: number | null;
  };
}

export function emptyUsage(): TokenUsage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}
