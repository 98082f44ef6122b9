// 实时事件分发
// 订阅先回放 backlog（从旧到新），再按到达顺序推送 live 事件
// 每个订阅者一条有界队列；满了丢弃该订阅者最旧的 live 事件，不影响其他订阅者
// publish 从不等待订阅者

import type { RealtimeEvent } from "../../../share/shared-schema/src/events.mjs";
import { logger } from "../logging.mjs";

export interface StreamItem {
  kind: "backlog" | "live";
  event: RealtimeEvent;
}

// pull 的结果：事件、超时，或 null（订阅已关闭）
export type PullResult = StreamItem | "timeout" | null;

export interface SubscribeOptions {
  queueSize?: number;
}

export class Subscription implements AsyncIterable<StreamItem> {
  private readonly backlog: RealtimeEvent[];
  private readonly live: RealtimeEvent[] = [];
  private waiter: ((item: StreamItem | null) => void) | null = null;
  private closed = false;
  dropped = 0;

  constructor(
    readonly threadId: string,
    backlog: readonly RealtimeEvent[],
    private readonly queueSize: number,
    private readonly onClose: (subscription: Subscription) => void
  ) {
    this.backlog = [...backlog];
  }

  get pending(): number {
    return this.backlog.length + this.live.length;
  }

  push(event: RealtimeEvent): void {
    if (this.closed) return;
    if (this.waiter && this.backlog.length === 0 && this.live.length === 0) {
      this.waiter({ kind: "live", event });
      return;
    }
    this.live.push(event);
    if (this.live.length > this.queueSize) {
      const lost = this.live.shift();
      this.dropped += 1;
      logger.debug(`stream subscriber on ${this.threadId} lagging; dropped seq ${lost?.seq} (dropped=${this.dropped})`);
    }
  }

  // 同一时刻只允许一个等待中的 pull
  pull(timeoutMs?: number): Promise<PullResult> {
    const ready = this.take();
    if (ready) return Promise.resolve(ready);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error("subscription already has a pending pull"));

    return new Promise<PullResult>((resolve) => {
      const timer = timeoutMs === undefined ? undefined : setTimeout(() => {
        this.waiter = null;
        resolve("timeout");
      }, timeoutMs);
      this.waiter = (item) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(item);
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.backlog.length = 0;
    this.live.length = 0;
    this.waiter?.(null);
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<StreamItem> {
    while (true) {
      const item = await this.pull();
      if (item === null) return;
      if (item === "timeout") continue;
      yield item;
    }
  }

  private take(): StreamItem | undefined {
    const backlog = this.backlog.shift();
    if (backlog) return { kind: "backlog", event: backlog };
    const live = this.live.shift();
    if (live) return { kind: "live", event: live };
    return undefined;
  }
}

export class StreamFanout {
  private readonly subscribers = new Map<string, Set<Subscription>>();

  constructor(private readonly defaultQueueSize = 100) {}

  subscribe(threadId: string, backlog: readonly RealtimeEvent[], options: SubscribeOptions = {}): Subscription {
    const subscription = new Subscription(
      threadId,
      backlog,
      Math.max(1, options.queueSize ?? this.defaultQueueSize),
      (closed) => this.unsubscribe(closed)
    );
    let set = this.subscribers.get(threadId);
    if (!set) {
      set = new Set();
      this.subscribers.set(threadId, set);
    }
    set.add(subscription);
    return subscription;
  }

  // 返回投递到的订阅者数
  publish(event: RealtimeEvent): number {
    const set = this.subscribers.get(event.thread_id);
    if (!set) return 0;
    for (const subscription of set) subscription.push(event);
    return set.size;
  }

  subscriberCount(threadId?: string): number {
    if (threadId !== undefined) return this.subscribers.get(threadId)?.size ?? 0;
    let total = 0;
    for (const set of this.subscribers.values()) total += set.size;
    return total;
  }

  closeAll(): void {
    for (const set of [...this.subscribers.values()]) {
      for (const subscription of [...set]) subscription.close();
    }
  }

  private unsubscribe(subscription: Subscription): void {
    const set = this.subscribers.get(subscription.threadId);
    if (!set) return;
    set.delete(subscription);
    if (set.size === 0) this.subscribers.delete(subscription.threadId);
  }
}
