// 回调处理器
// 把 LangChain / LangGraph 的运行回调转成摄取信封交给 sink
// 结束与错误事件沿用对应 start 时的上下文；投递失败只记日志，不影响图的执行

import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import type { Serialized } from "@langchain/core/load/serializable";
import type { BaseMessage } from "@langchain/core/messages";
import type { LLMResult } from "@langchain/core/outputs";
import type { ChainValues } from "@langchain/core/utils/types";
import type {
  CallbackEnvelope,
  CallbackEventType,
  EventSink,
  IngestContext,
} from "../../share/shared-schema/src/events.mjs";
import { asRecord, setEntry, toJsonValue, type JsonObject } from "../../share/shared-schema/src/json.mjs";
import type { ThreadIdFn } from "../../share/shared-schema/src/thread-id.mjs";
import { errorMessage, logger } from "./logging.mjs";

export interface TraceCallbackHandlerOptions {
  sink: EventSink;
  // 静态线程 ID
  threadId?: string;
  resolveThreadId?: ThreadIdFn;
  // 关闭后不从 metadata / configurable 中识别线程
  autoDetectThreadId?: boolean;
}

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

function numberField(record: Record<string, unknown>, ...keys: string[]): number {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return 0;
}

// configurable 里只保留原始类型的值
function primitiveEntries(value: unknown): Record<string, unknown> | undefined {
  const record = asRecord(value);
  if (!record) return undefined;
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    if (typeof entry === "string" || typeof entry === "number" || typeof entry === "boolean") setEntry(out, key, entry);
  }
  return out;
}

// 先看 llmOutput.tokenUsage / token_usage，否则累加各条 AI 消息的 usage_metadata
export function extractTokenUsage(output: LLMResult): TokenUsage | null {
  const llmOutput = asRecord(output.llmOutput);
  const reported = asRecord(llmOutput?.tokenUsage) ?? asRecord(llmOutput?.token_usage);
  if (reported) {
    const prompt = numberField(reported, "promptTokens", "prompt_tokens", "input_tokens");
    const completion = numberField(reported, "completionTokens", "completion_tokens", "output_tokens");
    const total = numberField(reported, "totalTokens", "total_tokens") || prompt + completion;
    return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: total };
  }

  let found = false;
  const usage: TokenUsage = { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
  for (const batch of output.generations) {
    for (const generation of batch) {
      const message = asRecord(asRecord(generation)?.message);
      const metadata = asRecord(message?.usage_metadata);
      if (!metadata) continue;
      found = true;
      const prompt = numberField(metadata, "input_tokens");
      const completion = numberField(metadata, "output_tokens");
      usage.prompt_tokens += prompt;
      usage.completion_tokens += completion;
      usage.total_tokens += numberField(metadata, "total_tokens") || prompt + completion;
    }
  }
  return found ? usage : null;
}

function messageLine(message: BaseMessage): string {
  const content = typeof message.content === "string" ? message.content : JSON.stringify(toJsonValue(message.content));
  return `${message._getType()}: ${content}`;
}

function errorData(error: unknown): JsonObject {
  return {
    error: errorMessage(error),
    error_type: error instanceof Error ? error.constructor.name : typeof error,
  };
}

export class TraceCallbackHandler extends BaseCallbackHandler {
  name = "trace_callback_handler";

  private readonly sink: EventSink;
  private readonly staticThreadId?: string;
  private readonly resolveThreadId?: ThreadIdFn;
  private readonly autoDetectThreadId: boolean;
  // run_id -> start 时的上下文
  private readonly runContexts = new Map<string, IngestContext>();

  constructor(options: TraceCallbackHandlerOptions) {
    super();
    this.sink = options.sink;
    this.staticThreadId = options.threadId;
    this.resolveThreadId = options.resolveThreadId;
    this.autoDetectThreadId = options.autoDetectThreadId ?? true;
  }

  get openRunCount(): number {
    return this.runContexts.size;
  }

  // LLM

  async handleLLMStart(
    llm: Serialized,
    prompts: string[],
    runId: string,
    parentRunId?: string,
    _extraParams?: Record<string, unknown>,
    tags?: string[],
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.start("llm_start", runId, parentRunId, metadata, {
      prompts,
      serialized: toJsonValue(llm),
      tags: toJsonValue(tags ?? []),
      metadata: toJsonValue(metadata ?? {}),
    });
  }

  async handleChatModelStart(
    llm: Serialized,
    messages: BaseMessage[][],
    runId: string,
    parentRunId?: string,
    _extraParams?: Record<string, unknown>,
    tags?: string[],
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.start("llm_start", runId, parentRunId, metadata, {
      prompts: messages.map((batch) => batch.map(messageLine).join("\n")),
      messages: toJsonValue(messages),
      serialized: toJsonValue(llm),
      tags: toJsonValue(tags ?? []),
      metadata: toJsonValue(metadata ?? {}),
    });
  }

  async handleLLMEnd(output: LLMResult, runId: string, parentRunId?: string): Promise<void> {
    const usage = extractTokenUsage(output);
    await this.finish("llm_end", runId, parentRunId, {
      generations: output.generations.map((batch) => batch.map((generation) => generation.text)),
      llm_output: toJsonValue(output.llmOutput ?? null),
      token_usage: usage ?? {},
    });
  }

  async handleLLMError(error: unknown, runId: string, parentRunId?: string): Promise<void> {
    await this.finish("llm_error", runId, parentRunId, errorData(error));
  }

  // Chain

  async handleChainStart(
    chain: Serialized,
    inputs: ChainValues,
    runId: string,
    parentRunId?: string,
    tags?: string[],
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.start("chain_start", runId, parentRunId, metadata, {
      inputs: toJsonValue(inputs),
      serialized: toJsonValue(chain),
      tags: toJsonValue(tags ?? []),
      metadata: toJsonValue(metadata ?? {}),
    });
  }

  async handleChainEnd(outputs: ChainValues, runId: string, parentRunId?: string): Promise<void> {
    await this.finish("chain_end", runId, parentRunId, { outputs: toJsonValue(outputs) });
  }

  async handleChainError(error: unknown, runId: string, parentRunId?: string): Promise<void> {
    await this.finish("chain_error", runId, parentRunId, errorData(error));
  }

  // Tool

  async handleToolStart(
    tool: Serialized,
    input: string,
    runId: string,
    parentRunId?: string,
    tags?: string[],
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.start("tool_start", runId, parentRunId, metadata, {
      input,
      serialized: toJsonValue(tool),
      tags: toJsonValue(tags ?? []),
      metadata: toJsonValue(metadata ?? {}),
    });
  }

  async handleToolEnd(output: unknown, runId: string, parentRunId?: string): Promise<void> {
    await this.finish("tool_end", runId, parentRunId, { output: toJsonValue(output) });
  }

  async handleToolError(error: unknown, runId: string, parentRunId?: string): Promise<void> {
    await this.finish("tool_error", runId, parentRunId, errorData(error));
  }

  private contextFor(metadata: Record<string, unknown> | undefined): IngestContext {
    const context: IngestContext = {
      resolveThreadId: this.resolveThreadId,
      staticThreadId: this.staticThreadId,
    };
    if (this.autoDetectThreadId && metadata) {
      context.metadata = metadata;
      context.configurable = primitiveEntries(metadata.configurable);
    }
    return context;
  }

  private async start(
    eventType: CallbackEventType,
    runId: string,
    parentRunId: string | undefined,
    metadata: Record<string, unknown> | undefined,
    data: JsonObject
  ): Promise<void> {
    const context = this.contextFor(metadata);
    this.runContexts.set(runId, context);
    await this.deliver({
      event: { event_type: eventType, run_id: runId, parent_run_id: parentRunId ?? null, data },
      context,
    });
  }

  private async finish(
    eventType: CallbackEventType,
    runId: string,
    parentRunId: string | undefined,
    data: JsonObject
  ): Promise<void> {
    const context = this.runContexts.get(runId) ?? this.contextFor(undefined);
    this.runContexts.delete(runId);
    await this.deliver({
      event: { event_type: eventType, run_id: runId, parent_run_id: parentRunId ?? null, data },
      context,
    });
  }

  private async deliver(envelope: CallbackEnvelope): Promise<void> {
    try {
      await this.sink.send(envelope);
    } catch (error) {
      logger.warn(`failed to deliver ${envelope.event.event_type} for run ${envelope.event.run_id}: ${errorMessage(error)}`);
    }
  }
}
