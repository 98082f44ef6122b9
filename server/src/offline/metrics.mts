// 负载指标提取与执行摘要
// 在解码后的负载里查找 token 用量、模型名与耗时字段；缺失字段按 0 计

import type { DecodedObject, DecodedValue } from "./decoder.mjs";
import { isDecodedObject } from "./decoder.mjs";
import type { ModelPricing } from "./pricing.mjs";
import {
  emptyUsage,
  type ExecutionSummary,
  type NodeCost,
  type NodeKind,
  type TokenUsage,
  type TraceGraph,
} from "./types.mjs";

export interface UsageSample extends TokenUsage {
  model: string | null;
}

// 消息对象上承载用量的字段（按优先级）
const CARRIER_KEYS = ["usage_metadata", "token_usage", "tokenUsage", "usage"] as const;
const RESPONSE_CARRIER_KEYS = ["tokenUsage", "token_usage", "usage"] as const;
const TIMING_KEYS = new Set<string>(["duration_ms", "latency_ms", "elapsed_ms"]);
const SKIPPED_KEYS = new Set<string>([...CARRIER_KEYS, "response_metadata"]);

const PROMPT_KEYS = ["prompt_tokens", "input_tokens", "promptTokens", "inputTokens"];
const COMPLETION_KEYS = ["completion_tokens", "output_tokens", "completionTokens", "outputTokens"];
const TOTAL_KEYS = ["total_tokens", "totalTokens"];

function firstNumber(obj: DecodedObject, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return undefined;
}

function firstString(obj: DecodedObject | undefined, keys: readonly string[]): string | undefined {
  if (!obj) return undefined;
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

export function usageFromCarrier(value: DecodedValue | undefined): TokenUsage | null {
  if (!isDecodedObject(value)) return null;
  const prompt = firstNumber(value, PROMPT_KEYS);
  const completion = firstNumber(value, COMPLETION_KEYS);
  const total = firstNumber(value, TOTAL_KEYS);
  if (prompt === undefined && completion === undefined && total === undefined) return null;
  const prompt_tokens = prompt ?? 0;
  const completion_tokens = completion ?? 0;
  return { prompt_tokens, completion_tokens, total_tokens: total ?? prompt_tokens + completion_tokens };
}

function modelName(obj: DecodedObject): string | undefined {
  const response = obj.response_metadata;
  return (
    firstString(isDecodedObject(response) ? response : undefined, ["model_name", "model", "modelName"]) ??
    firstString(obj, ["model_name", "ls_model_name", "modelName", "model"])
  );
}

// 每个承载对象只计一次，不再深入其内部
export function extractUsage(value: DecodedValue, inheritedModel: string | null = null): UsageSample[] {
  const samples: UsageSample[] = [];
  const visit = (node: DecodedValue, model: string | null): void => {
    if (Array.isArray(node)) {
      for (const item of node) visit(item, model);
      return;
    }
    if (!isDecodedObject(node)) return;

    const ownModel = modelName(node) ?? model;
    let usage: TokenUsage | null = null;
    for (const key of CARRIER_KEYS) {
      usage = usageFromCarrier(node[key]);
      if (usage) break;
    }
    const response = node.response_metadata;
    if (!usage && isDecodedObject(response)) {
      for (const key of RESPONSE_CARRIER_KEYS) {
        usage = usageFromCarrier(response[key]);
        if (usage) break;
      }
    }
    if (usage) {
      samples.push({ ...usage, model: ownModel });
    }

    for (const [key, child] of Object.entries(node)) {
      if (SKIPPED_KEYS.has(key)) continue;
      visit(child, ownModel);
    }
  };
  visit(value, inheritedModel);
  return samples;
}

export function sumUsage(samples: readonly TokenUsage[]): TokenUsage {
  const total = emptyUsage();
  for (const sample of samples) {
    total.prompt_tokens += sample.prompt_tokens;
    total.completion_tokens += sample.completion_tokens;
    total.total_tokens += sample.total_tokens;
  }
  return total;
}

export function costOf(samples: readonly UsageSample[], pricing: ModelPricing): NodeCost {
  const cost = pricing.zeroCost();
  for (const sample of samples) {
    const part = pricing.cost(sample, sample.model);
    cost.prompt_cost += part.prompt_cost;
    cost.completion_cost += part.completion_cost;
    cost.total_cost += part.total_cost;
  }
  return cost;
}

// 负载中的耗时字段求和（毫秒）
export function extractDurationMs(value: DecodedValue): number | null {
  let total = 0;
  let found = false;
  const visit = (node: DecodedValue): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isDecodedObject(node)) return;
    for (const [key, child] of Object.entries(node)) {
      if (TIMING_KEYS.has(key)) {
        if (typeof child === "number" && Number.isFinite(child) && child >= 0) {
          total += child;
          found = true;
        }
        continue;
      }
      visit(child);
    }
  };
  visit(value);
  return found ? total : null;
}

export interface MessageKinds {
  ai: boolean;
  tool: boolean;
}

function messageKindOf(obj: DecodedObject): "ai" | "tool" | null {
  const typeTag = obj.__type__;
  if (typeof typeTag === "string") {
    if (/AIMessage(Chunk)?$/.test(typeTag)) return "ai";
    if (/ToolMessage(Chunk)?$/.test(typeTag)) return "tool";
  }
  // LangChain JS 序列化格式：{ lc, type: "constructor", id: [..., "AIMessage"] }
  const id = obj.id;
  if (obj.lc !== undefined && Array.isArray(id)) {
    const last = id[id.length - 1];
    if (last === "AIMessage" || last === "AIMessageChunk") return "ai";
    if (last === "ToolMessage") return "tool";
  }
  if (obj.type === "ai" && "content" in obj) return "ai";
  if (obj.type === "tool" && "tool_call_id" in obj) return "tool";
  return null;
}

export function detectMessageKinds(value: DecodedValue): MessageKinds {
  const kinds: MessageKinds = { ai: false, tool: false };
  const visit = (node: DecodedValue): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isDecodedObject(node)) return;
    const kind = messageKindOf(node);
    if (kind) kinds[kind] = true;
    Object.values(node).forEach(visit);
  };
  visit(value);
  return kinds;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// 汇总：token 总数恒等于各节点之和；费用为各节点费用之和
export function summarizeTrace(graph: TraceGraph, currency: string): ExecutionSummary {
  const status_counts = { running: 0, success: 0, error: 0 };
  const by_category: Record<NodeKind, number> = { "model-call": 0, "tool-call": 0, branch: 0, task: 0, noop: 0 };
  const modelLatencies: number[] = [];
  const toolLatencies: number[] = [];
  let prompt_cost = 0;
  let completion_cost = 0;
  let total_duration_ms = 0;

  for (const node of graph.nodes) {
    status_counts[node.status] += 1;
    prompt_cost += node.cost.prompt_cost;
    completion_cost += node.cost.completion_cost;
    if (node.duration_ms !== null) {
      total_duration_ms += node.duration_ms;
      by_category[node.kind] += node.duration_ms;
      if (node.kind === "model-call") modelLatencies.push(node.duration_ms);
      if (node.kind === "tool-call") toolLatencies.push(node.duration_ms);
    }
  }

  const total_cost = prompt_cost + completion_cost;
  return {
    thread_id: graph.thread_id,
    checkpoint_id: graph.checkpoint_id,
    total_nodes: graph.nodes.length,
    status_counts,
    success_count: status_counts.success,
    error_count: status_counts.error,
    token_usage: sumUsage(graph.nodes.map((node) => node.token_usage)),
    cost: { currency, prompt_cost, completion_cost, total_cost, by_currency: { [currency]: total_cost } },
    duration: {
      total_duration_ms,
      by_category,
      avg_model_latency_ms: average(modelLatencies),
      avg_tool_latency_ms: average(toolLatencies),
    },
  };
}
