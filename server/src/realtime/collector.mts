// 实时采集器
// 组合缓冲、摄取与分发，供路由和进程内回调处理器使用

import type {
  CallbackEnvelope,
  EventSink,
  IngestContext,
  RawCallbackEvent,
  RealtimeEvent,
} from "../../../share/shared-schema/src/events.mjs";
import { isJsonObject } from "../../../share/shared-schema/src/json.mjs";
import { EventBufferManager, type ActiveThread, type BufferStats } from "./buffer.mjs";
import { StreamFanout, type SubscribeOptions, type Subscription } from "./fanout.mjs";
import { RealtimeIngestor } from "./ingestor.mjs";

export const EXPORT_FORMATS = ["json", "jsonl"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface RealtimeCollectorOptions {
  bufferSize?: number;
  idleTtlMs?: number;
  subscriberQueueSize?: number;
  defaultThreadId?: string;
  maxOpenRuns?: number;
  clock?: () => number;
}

export interface ThreadSummary {
  thread_id: string;
  event_count: number;
  event_types: Record<string, number>;
  duration_ms: number | null;
  total_tokens: number;
  start_time: string | null;
  end_time: string | null;
  dropped: number;
}

function llmTotalTokens(event: RealtimeEvent): number {
  if (event.event_type !== "llm_end") return 0;
  const usage = event.data.token_usage;
  if (!isJsonObject(usage)) return 0;
  return typeof usage.total_tokens === "number" ? usage.total_tokens : 0;
}

export class RealtimeCollector {
  readonly buffers: EventBufferManager;
  readonly fanout: StreamFanout;
  readonly ingestor: RealtimeIngestor;

  constructor(options: RealtimeCollectorOptions = {}) {
    this.buffers = new EventBufferManager({
      capacity: options.bufferSize,
      idleTtlMs: options.idleTtlMs,
      clock: options.clock,
    });
    this.fanout = new StreamFanout(options.subscriberQueueSize);
    this.ingestor = new RealtimeIngestor(this.buffers, this.fanout, {
      clock: options.clock,
      defaultThreadId: options.defaultThreadId,
      maxOpenRuns: options.maxOpenRuns,
    });
  }

  start(): void {
    this.buffers.start();
  }

  stop(): void {
    this.buffers.stop();
    this.fanout.closeAll();
  }

  ingest(raw: RawCallbackEvent, context: IngestContext = {}): RealtimeEvent {
    return this.ingestor.ingest(raw, context);
  }

  listActiveThreads(): ActiveThread[] {
    return this.buffers.activeThreads();
  }

  getEvents(threadId: string, offset = 0, limit?: number): RealtimeEvent[] {
    return this.buffers.getEvents(threadId, offset, limit);
  }

  count(threadId: string): number {
    return this.buffers.count(threadId);
  }

  getSummary(threadId: string): ThreadSummary {
    const events = this.buffers.snapshot(threadId);
    const event_types: Record<string, number> = {};
    let start: number | null = null;
    let end: number | null = null;
    let total_tokens = 0;
    for (const event of events) {
      event_types[event.event_type] = (event_types[event.event_type] ?? 0) + 1;
      const at = Date.parse(event.timestamp);
      if (start === null || at < start) start = at;
      if (end === null || at > end) end = at;
      total_tokens += llmTotalTokens(event);
    }
    return {
      thread_id: threadId,
      event_count: events.length,
      event_types,
      duration_ms: start !== null && end !== null ? end - start : null,
      total_tokens,
      start_time: start !== null ? new Date(start).toISOString() : null,
      end_time: end !== null ? new Date(end).toISOString() : null,
      dropped: this.buffers.dropped(threadId),
    };
  }

  clear(threadId: string): boolean {
    return this.buffers.clear(threadId);
  }

  export(threadId: string, format: ExportFormat = "json"): string {
    const events = this.buffers.snapshot(threadId);
    return format === "json"
      ? JSON.stringify(events, null, 2)
      : events.map((event) => JSON.stringify(event)).join("\n");
  }

  // 快照与订阅在同一同步段内完成，backlog 与 live 之间不会漏事件也不会重复
  subscribe(threadId: string, options: SubscribeOptions = {}): Subscription {
    return this.fanout.subscribe(threadId, this.buffers.snapshot(threadId), options);
  }

  stats(): BufferStats & { subscribers: number; open_runs: number } {
    return {
      ...this.buffers.stats(),
      subscribers: this.fanout.subscriberCount(),
      open_runs: this.ingestor.openRunCount,
    };
  }

  // 进程内回调处理器的事件出口
  asSink(): EventSink {
    return {
      send: (envelope: CallbackEnvelope) => {
        this.ingest(envelope.event, envelope.context);
      },
    };
  }
}
