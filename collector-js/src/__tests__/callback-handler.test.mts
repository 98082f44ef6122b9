import { describe, it, expect } from "vitest";
import type { Serialized } from "@langchain/core/load/serializable";
import { AIMessage } from "@langchain/core/messages";
import type { ChatGeneration, LLMResult } from "@langchain/core/outputs";
import type { CallbackEnvelope, EventSink } from "../../../share/shared-schema/src/events.mjs";
import { runDerivedThreadId } from "../../../share/shared-schema/src/thread-id.mjs";
import { RealtimeCollector } from "../../../server/src/realtime/collector.mjs";
import { TraceCallbackHandler, extractTokenUsage } from "../callback-handler.mjs";

class RecordingSink implements EventSink {
  readonly envelopes: CallbackEnvelope[] = [];
  send(envelope: CallbackEnvelope): void {
    this.envelopes.push(envelope);
  }
}

const graph: Serialized = { lc: 1, type: "not_implemented", id: ["langgraph", "CompiledStateGraph"] };
const model: Serialized = { lc: 1, type: "not_implemented", id: ["langchain", "chat_models", "FakeChat"] };

function chatResult(): LLMResult {
  const generation: ChatGeneration = {
    text: "hello",
    message: new AIMessage({
      content: "hello",
      usage_metadata: { input_tokens: 10, output_tokens: 5, total_tokens: 15 },
    }),
  };
  return { generations: [[generation]] };
}

describe("extractTokenUsage", () => {
  it("prefers usage reported in llmOutput", () => {
    const result: LLMResult = {
      generations: [[{ text: "x" }]],
      llmOutput: { tokenUsage: { promptTokens: 3, completionTokens: 4 } },
    };
    expect(extractTokenUsage(result)).toEqual({ prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 });
  });

  it("reads snake_case token_usage", () => {
    const result: LLMResult = {
      generations: [],
      llmOutput: { token_usage: { prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 } },
    };
    expect(extractTokenUsage(result)).toEqual({ prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 });
  });

  it("sums message usage metadata", () => {
    expect(extractTokenUsage(chatResult())).toEqual({ prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 });
  });

  it("returns null without usage", () => {
    expect(extractTokenUsage({ generations: [[{ text: "x" }]] })).toBeNull();
  });
});

describe("TraceCallbackHandler", () => {
  it("builds start envelopes with data and context", async () => {
    const sink = new RecordingSink();
    const handler = new TraceCallbackHandler({ sink, threadId: "static-1" });
    await handler.handleChainStart(graph, { question: "hi" }, "run-1", undefined, ["graph"], {
      configurable: { thread_id: "c-1", callbacks: { nested: true } },
    });

    expect(sink.envelopes).toHaveLength(1);
    const [envelope] = sink.envelopes;
    expect(envelope.event).toEqual({
      event_type: "chain_start",
      run_id: "run-1",
      parent_run_id: null,
      data: {
        inputs: { question: "hi" },
        serialized: { lc: 1, type: "not_implemented", id: ["langgraph", "CompiledStateGraph"] },
        tags: ["graph"],
        metadata: { configurable: { thread_id: "c-1", callbacks: { nested: true } } },
      },
    });
    expect(envelope.context.configurable).toEqual({ thread_id: "c-1" });
    expect(envelope.context.staticThreadId).toBe("static-1");
    expect(handler.openRunCount).toBe(1);
  });

  it("reuses the start context for end events", async () => {
    const sink = new RecordingSink();
    const handler = new TraceCallbackHandler({ sink });
    await handler.handleToolStart(model, "2+2", "run-1", "parent", [], { thread_id: "m-1" });
    await handler.handleToolEnd("4", "run-1", "parent");

    expect(sink.envelopes[1].event).toEqual({
      event_type: "tool_end",
      run_id: "run-1",
      parent_run_id: "parent",
      data: { output: "4" },
    });
    expect(sink.envelopes[1].context.metadata).toEqual({ thread_id: "m-1" });
    expect(handler.openRunCount).toBe(0);
  });

  it("omits detected context when auto detection is off", async () => {
    const sink = new RecordingSink();
    const handler = new TraceCallbackHandler({ sink, threadId: "static-1", autoDetectThreadId: false });
    await handler.handleChainStart(graph, {}, "run-1", undefined, [], { thread_id: "m-1" });

    expect(sink.envelopes[0].context.metadata).toBeUndefined();
    expect(sink.envelopes[0].context.configurable).toBeUndefined();
  });

  it("records error type and message", async () => {
    const sink = new RecordingSink();
    const handler = new TraceCallbackHandler({ sink });
    await handler.handleLLMError(new TypeError("bad input"), "run-9");

    expect(sink.envelopes[0].event.data).toEqual({ error: "bad input", error_type: "TypeError" });
  });

  it("formats chat model prompts", async () => {
    const sink = new RecordingSink();
    const handler = new TraceCallbackHandler({ sink });
    await handler.handleChatModelStart(model, [[new AIMessage("earlier answer")]], "run-1");

    expect(sink.envelopes[0].event.data.prompts).toEqual(["ai: earlier answer"]);
  });

  it("keeps running when the sink fails", async () => {
    const handler = new TraceCallbackHandler({
      sink: {
        send: () => {
          throw new Error("sink down");
        },
      },
    });
    await expect(handler.handleChainStart(graph, {}, "run-1")).resolves.toBeUndefined();
    await expect(handler.handleChainEnd({}, "run-1")).resolves.toBeUndefined();
  });
});

describe("TraceCallbackHandler with an in-process collector", () => {
  it("groups a run tree under one thread", async () => {
    let now = 1_000;
    const collector = new RealtimeCollector({ clock: () => now });
    const handler = new TraceCallbackHandler({ sink: collector.asSink() });

    await handler.handleChainStart(graph, { question: "hi" }, "run-1", undefined, [], { thread_id: "thread-a" });
    now = 1_100;
    await handler.handleLLMStart(model, ["hi"], "run-2", "run-1", undefined, [], {});
    now = 1_400;
    await handler.handleLLMEnd(chatResult(), "run-2", "run-1");
    now = 1_500;
    await handler.handleChainEnd({ answer: "hello" }, "run-1");

    const events = collector.getEvents("thread-a");
    expect(events.map((event) => event.event_type)).toEqual(["chain_start", "llm_start", "llm_end", "chain_end"]);
    expect(events.map((event) => event.duration_ms)).toEqual([null, null, 300, 500]);

    const summary = collector.getSummary("thread-a");
    expect(summary.total_tokens).toBe(15);
    expect(summary.duration_ms).toBe(500);
  });

  it("derives a thread from the run id when nothing else applies", async () => {
    const collector = new RealtimeCollector({ clock: () => 0 });
    const handler = new TraceCallbackHandler({ sink: collector.asSink() });
    await handler.handleToolError(new Error("boom"), "run-3");

    expect(collector.count(runDerivedThreadId("run-3"))).toBe(1);
  });
});
