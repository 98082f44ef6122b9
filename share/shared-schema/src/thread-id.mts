// 线程 ID 解析
// 说明：按优先级依次尝试各策略，第一个非空结果胜出；整个解析过程不会抛错
// 顺序：显式解析函数 > configurable.thread_id > metadata.thread_id > 静态配置 > 父运行继承 > 按 run_id 派生

import { v5 as uuidv5 } from "uuid";

export type ThreadIdSource =
  | "resolver"
  | "configurable"
  | "metadata"
  | "static"
  | "inherited"
  | "run";

// 传给调用方解析函数的只读上下文
export interface ThreadIdInput {
  runId: string;
  parentRunId?: string | null;
  configurable?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export type ThreadIdFn = (input: ThreadIdInput) => string | null | undefined;

export interface ThreadIdContext extends ThreadIdInput {
  resolveThreadId?: ThreadIdFn;
  staticThreadId?: string;
  // 父运行仍在进行时由摄取器填入
  inheritedThreadId?: string;
}

export interface ThreadIdResolution {
  threadId: string;
  source: ThreadIdSource;
}

export interface ThreadIdStrategy {
  readonly source: ThreadIdSource;
  resolve(context: ThreadIdContext): string | undefined;
}

// 派生 ID 使用的固定命名空间（改动会让已有的派生线程 ID 全部变化）
const RUN_THREAD_NAMESPACE = "5b0d3b9e-8c1f-4f4e-9a53-2f6c1d7e9a40";

export function normalizeThreadId(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

export function runDerivedThreadId(runId: string): string {
  return `auto-${uuidv5(runId, RUN_THREAD_NAMESPACE)}`;
}

function readThreadId(record: Record<string, unknown> | undefined): string | undefined {
  return record ? normalizeThreadId(record.thread_id) : undefined;
}

function nestedConfigurable(metadata: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  const value = metadata?.configurable;
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

export const explicitResolverStrategy: ThreadIdStrategy = {
  source: "resolver",
  resolve(context) {
    if (!context.resolveThreadId) return undefined;
    return normalizeThreadId(
      context.resolveThreadId({
        runId: context.runId,
        parentRunId: context.parentRunId ?? null,
        configurable: context.configurable,
        metadata: context.metadata,
      })
    );
  },
};

export const configurableStrategy: ThreadIdStrategy = {
  source: "configurable",
  resolve(context) {
    return readThreadId(context.configurable) ?? readThreadId(nestedConfigurable(context.metadata));
  },
};

export const metadataStrategy: ThreadIdStrategy = {
  source: "metadata",
  resolve(context) {
    return readThreadId(context.metadata);
  },
};

export function staticStrategy(defaultThreadId?: string): ThreadIdStrategy {
  return {
    source: "static",
    resolve(context) {
      return normalizeThreadId(context.staticThreadId) ?? normalizeThreadId(defaultThreadId);
    },
  };
}

export const inheritedStrategy: ThreadIdStrategy = {
  source: "inherited",
  resolve(context) {
    return normalizeThreadId(context.inheritedThreadId);
  },
};

export const runDerivedStrategy: ThreadIdStrategy = {
  source: "run",
  resolve(context) {
    return runDerivedThreadId(context.runId);
  },
};

export interface ThreadIdResolverOptions {
  staticThreadId?: string;
  // 某个策略抛错时回调；该策略视为无结果
  onStrategyError?: (source: ThreadIdSource, error: unknown) => void;
}

export class ThreadIdResolver {
  constructor(
    private readonly strategies: readonly ThreadIdStrategy[],
    private readonly options: ThreadIdResolverOptions = {}
  ) {}

  resolve(context: ThreadIdContext): ThreadIdResolution {
    for (const strategy of this.strategies) {
      let threadId: string | undefined;
      try {
        threadId = strategy.resolve(context);
      } catch (error) {
        this.options.onStrategyError?.(strategy.source, error);
        continue;
      }
      if (threadId !== undefined) return { threadId, source: strategy.source };
    }
    return { threadId: runDerivedThreadId(context.runId), source: "run" };
  }
}

export function createThreadIdResolver(options: ThreadIdResolverOptions = {}): ThreadIdResolver {
  return new ThreadIdResolver(
    [
      explicitResolverStrategy,
      configurableStrategy,
      metadataStrategy,
      staticStrategy(options.staticThreadId),
      inheritedStrategy,
      runDerivedStrategy,
    ],
    options
  );
}
