// 实时事件摄取
// 解析线程 -> 打时间戳 -> 计算耗时 -> 写入缓冲 -> 推送订阅者
// *_end / *_error 沿用对应 *_start 的线程；找不到 start 时耗时为 null

import {
  isStartEvent,
  isTerminalEvent,
  type IngestContext,
  type RawCallbackEvent,
  type RealtimeEvent,
} from "../../../share/shared-schema/src/events.mjs";
import {
  createThreadIdResolver,
  type ThreadIdResolution,
  type ThreadIdResolver,
} from "../../../share/shared-schema/src/thread-id.mjs";
import { errorMessage } from "../errors.mjs";
import { logger } from "../logging.mjs";
import type { EventBufferManager } from "./buffer.mjs";
import type { StreamFanout } from "./fanout.mjs";

export interface IngestorOptions {
  clock?: () => number;
  // 未结束运行的记录上限，超出时丢弃最早的
  maxOpenRuns?: number;
  defaultThreadId?: string;
  resolver?: ThreadIdResolver;
}

interface OpenRun {
  threadId: string;
  startedAt: number;
}

export class RealtimeIngestor {
  private readonly openRuns = new Map<string, OpenRun>();
  private readonly clock: () => number;
  private readonly maxOpenRuns: number;
  private readonly resolver: ThreadIdResolver;

  constructor(
    private readonly buffers: EventBufferManager,
    private readonly fanout: StreamFanout,
    options: IngestorOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.maxOpenRuns = Math.max(1, options.maxOpenRuns ?? 10_000);
    this.resolver =
      options.resolver ??
      createThreadIdResolver({
        staticThreadId: options.defaultThreadId,
        onStrategyError: (source, error) => {
          logger.warn(`thread id ${source} strategy failed: ${errorMessage(error)}`);
        },
      });
    buffers.onRemove((threadId) => this.forgetThread(threadId));
  }

  get openRunCount(): number {
    return this.openRuns.size;
  }

  ingest(raw: RawCallbackEvent, context: IngestContext = {}): RealtimeEvent {
    const now = this.clock();
    const open = this.openRuns.get(raw.run_id);
    const terminal = isTerminalEvent(raw.event_type);
    const threadId = terminal && open ? open.threadId : this.resolveThread(raw, context).threadId;

    let duration_ms: number | null = null;
    if (terminal) {
      if (open) {
        duration_ms = Math.max(0, now - open.startedAt);
        this.openRuns.delete(raw.run_id);
      }
    } else if (isStartEvent(raw.event_type)) {
      this.trackRun(raw.run_id, { threadId, startedAt: now });
    }

    const event = this.buffers.append(threadId, {
      event_type: raw.event_type,
      run_id: raw.run_id,
      parent_run_id: raw.parent_run_id,
      thread_id: threadId,
      timestamp: new Date(now).toISOString(),
      duration_ms,
      data: raw.data,
    });
    this.fanout.publish(event);
    return event;
  }

  resolveThread(raw: RawCallbackEvent, context: IngestContext): ThreadIdResolution {
    const parent = raw.parent_run_id ? this.openRuns.get(raw.parent_run_id) : undefined;
    return this.resolver.resolve({
      runId: raw.run_id,
      parentRunId: raw.parent_run_id,
      configurable: context.configurable,
      metadata: context.metadata,
      resolveThreadId: context.resolveThreadId,
      staticThreadId: context.staticThreadId,
      inheritedThreadId: parent?.threadId,
    });
  }

  private trackRun(runId: string, run: OpenRun): void {
    this.openRuns.delete(runId);
    this.openRuns.set(runId, run);
    // Map 保持插入顺序，第一个即最早
    while (this.openRuns.size > this.maxOpenRuns) {
      const oldest = this.openRuns.keys().next();
      if (oldest.done) break;
      this.openRuns.delete(oldest.value);
    }
  }

  private forgetThread(threadId: string): void {
    for (const [runId, run] of this.openRuns) {
      if (run.threadId === threadId) this.openRuns.delete(runId);
    }
  }
}
