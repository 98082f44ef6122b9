// 实时事件类型与摄取请求 schema
// server 的摄取器与 collector-js 的回调处理器共用

import { z } from "zod";
import type { JsonObject } from "./json.mjs";
import type { ThreadIdFn } from "./thread-id.mjs";

export const CALLBACK_EVENT_TYPES = [
  "llm_start",
  "llm_end",
  "llm_error",
  "chain_start",
  "chain_end",
  "chain_error",
  "tool_start",
  "tool_end",
  "tool_error",
] as const;

export type CallbackEventType = (typeof CALLBACK_EVENT_TYPES)[number];

// 回调处理器产生的原始事件（尚未确定线程与时间戳）
export interface RawCallbackEvent {
  event_type: string;
  run_id: string;
  parent_run_id: string | null;
  data: JsonObject;
}

// 缓冲区与订阅者看到的事件
export interface RealtimeEvent {
  seq: number;
  event_type: string;
  run_id: string;
  parent_run_id: string | null;
  thread_id: string;
  timestamp: string;
  duration_ms: number | null;
  data: JsonObject;
}

// 解析线程所需的调用上下文
export interface IngestContext {
  resolveThreadId?: ThreadIdFn;
  configurable?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  staticThreadId?: string;
}

export interface CallbackEnvelope {
  event: RawCallbackEvent;
  context: IngestContext;
}

export interface EventSink {
  send(envelope: CallbackEnvelope): void | Promise<void>;
}

export function isStartEvent(eventType: string): boolean {
  return eventType.endsWith("_start");
}

export function isTerminalEvent(eventType: string): boolean {
  return eventType.endsWith("_end") || eventType.endsWith("_error");
}

// POST /api/v1/realtime/events 的请求体
export const IngestEventSchema = z.object({
  event_type: z.string().min(1).max(100),
  run_id: z.string().min(1),
  parent_run_id: z.string().min(1).nullish(),
  // 调用方已解析好的线程 ID，等同于显式解析函数这一级
  thread_id: z.string().optional(),
  static_thread_id: z.string().optional(),
  configurable: z.record(z.unknown()).optional(),
  metadata: z.record(z.unknown()).optional(),
  data: z.record(z.unknown()).default({}),
});

export type IngestEventBody = z.infer<typeof IngestEventSchema>;
