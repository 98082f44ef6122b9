// 实时事件缓冲
// 每个线程一个有界环形缓冲；满了淘汰最旧事件（只记 debug 日志和计数，不报错）
// 追加是同步的，在事件循环上天然线性化；读取返回副本

import type { RealtimeEvent } from "../../../share/shared-schema/src/events.mjs";
import { logger } from "../logging.mjs";

export type NewRealtimeEvent = Omit<RealtimeEvent, "seq">;

export class ThreadEventBuffer {
  private readonly slots: Array<RealtimeEvent | undefined>;
  // 最旧事件所在槽位
  private head = 0;
  private size = 0;
  private nextSeq = 1;
  dropped = 0;

  constructor(
    readonly threadId: string,
    readonly capacity: number,
    public lastActivity: number
  ) {
    this.slots = new Array<RealtimeEvent | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  // 返回被淘汰的事件（未满时为 undefined）
  append(event: NewRealtimeEvent, now: number): { stored: RealtimeEvent; evicted: RealtimeEvent | undefined } {
    const stored: RealtimeEvent = { seq: this.nextSeq++, ...event };
    let evicted: RealtimeEvent | undefined;
    if (this.size < this.capacity) {
      this.slots[(this.head + this.size) % this.capacity] = stored;
      this.size += 1;
    } else {
      evicted = this.slots[this.head];
      this.slots[this.head] = stored;
      this.head = (this.head + 1) % this.capacity;
      this.dropped += 1;
    }
    this.lastActivity = now;
    return { stored, evicted };
  }

  // offset 从最旧事件算起
  slice(offset = 0, limit?: number): RealtimeEvent[] {
    const start = Math.max(0, offset);
    const end = limit === undefined ? this.size : Math.min(this.size, start + Math.max(0, limit));
    const out: RealtimeEvent[] = [];
    for (let i = start; i < end; i++) {
      const event = this.slots[(this.head + i) % this.capacity];
      if (event) out.push(event);
    }
    return out;
  }
}

export interface EventBufferOptions {
  capacity?: number;
  idleTtlMs?: number;
  clock?: () => number;
}

export type BufferRemovalReason = "cleared" | "idle";
export type BufferRemovalListener = (threadId: string, reason: BufferRemovalReason) => void;

export interface ActiveThread {
  thread_id: string;
  event_count: number;
  dropped: number;
  last_activity: string;
}

export interface BufferStats {
  threads: number;
  events: number;
  dropped: number;
  capacity: number;
  idle_ttl_ms: number;
}

export class EventBufferManager {
  private readonly buffers = new Map<string, ThreadEventBuffer>();
  private readonly listeners = new Set<BufferRemovalListener>();
  private sweepTimer: NodeJS.Timeout | null = null;
  readonly capacity: number;
  readonly idleTtlMs: number;
  private readonly clock: () => number;

  constructor(options: EventBufferOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 1000);
    this.idleTtlMs = Math.max(1, options.idleTtlMs ?? 3_600_000);
    this.clock = options.clock ?? Date.now;
  }

  append(threadId: string, event: NewRealtimeEvent): RealtimeEvent {
    const now = this.clock();
    let buffer = this.buffers.get(threadId);
    if (!buffer) {
      buffer = new ThreadEventBuffer(threadId, this.capacity, now);
      this.buffers.set(threadId, buffer);
    }
    const { stored, evicted } = buffer.append(event, now);
    if (evicted) {
      logger.debug(`realtime buffer full for ${threadId}; evicted seq ${evicted.seq} (dropped=${buffer.dropped})`);
    }
    return stored;
  }

  getEvents(threadId: string, offset = 0, limit?: number): RealtimeEvent[] {
    return this.buffers.get(threadId)?.slice(offset, limit) ?? [];
  }

  count(threadId: string): number {
    return this.buffers.get(threadId)?.length ?? 0;
  }

  dropped(threadId: string): number {
    return this.buffers.get(threadId)?.dropped ?? 0;
  }

  // 从旧到新的完整副本
  snapshot(threadId: string): RealtimeEvent[] {
    return this.getEvents(threadId);
  }

  clear(threadId: string): boolean {
    return this.remove(threadId, "cleared");
  }

  activeThreads(): ActiveThread[] {
    return [...this.buffers.values()]
      .sort((a, b) => b.lastActivity - a.lastActivity)
      .map((buffer) => ({
        thread_id: buffer.threadId,
        event_count: buffer.length,
        dropped: buffer.dropped,
        last_activity: new Date(buffer.lastActivity).toISOString(),
      }));
  }

  stats(): BufferStats {
    let events = 0;
    let dropped = 0;
    for (const buffer of this.buffers.values()) {
      events += buffer.length;
      dropped += buffer.dropped;
    }
    return {
      threads: this.buffers.size,
      events,
      dropped,
      capacity: this.capacity,
      idle_ttl_ms: this.idleTtlMs,
    };
  }

  // 移除空闲超过 idleTtlMs 的线程缓冲，返回被移除的线程
  sweepIdle(now: number = this.clock()): string[] {
    const expired = [...this.buffers.values()]
      .filter((buffer) => now - buffer.lastActivity >= this.idleTtlMs)
      .map((buffer) => buffer.threadId);
    for (const threadId of expired) this.remove(threadId, "idle");
    if (expired.length > 0) {
      logger.debug(`realtime buffers evicted after idle: ${expired.join(", ")}`);
    }
    return expired;
  }

  onRemove(listener: BufferRemovalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // 定期清理；定时器不阻止进程退出
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweepIdle(), Math.max(1000, Math.floor(this.idleTtlMs / 2)));
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private remove(threadId: string, reason: BufferRemovalReason): boolean {
    if (!this.buffers.delete(threadId)) return false;
    for (const listener of this.listeners) listener(threadId, reason);
    return true;
  }
}
