// 事件出口
// HttpEventSink：POST 到服务端摄取接口；解析函数在本地求值，结果作为 thread_id 发送
// 失败只记日志，从不抛出

import type { CallbackEnvelope, EventSink, IngestEventBody } from "../../share/shared-schema/src/events.mjs";
import { normalizeThreadId } from "../../share/shared-schema/src/thread-id.mjs";
import { errorMessage, logger } from "./logging.mjs";

export interface HttpEventSinkOptions {
  baseUrl?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export const INGEST_PATH = "/api/v1/realtime/events";

export class HttpEventSink implements EventSink {
  readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpEventSinkOptions = {}) {
    const baseUrl = (options.baseUrl ?? "http://localhost:8000").replace(/\/+$/, "");
    this.endpoint = `${baseUrl}${INGEST_PATH}`;
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.headers = { "Content-Type": "application/json", ...options.headers };
  }

  toRequestBody(envelope: CallbackEnvelope): IngestEventBody {
    const { event, context } = envelope;
    return {
      event_type: event.event_type,
      run_id: event.run_id,
      parent_run_id: event.parent_run_id,
      thread_id: this.resolveLocally(envelope),
      static_thread_id: context.staticThreadId,
      configurable: context.configurable,
      metadata: context.metadata,
      data: event.data,
    };
  }

  async send(envelope: CallbackEnvelope): Promise<void> {
    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(this.toRequestBody(envelope)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        logger.warn(`event ingest rejected: ${response.status} ${envelope.event.event_type} run=${envelope.event.run_id}`);
      }
    } catch (error) {
      logger.warn(`event ingest failed: ${errorMessage(error)}`);
    }
  }

  private resolveLocally(envelope: CallbackEnvelope): string | undefined {
    const { event, context } = envelope;
    if (!context.resolveThreadId) return undefined;
    try {
      return normalizeThreadId(
        context.resolveThreadId({
          runId: event.run_id,
          parentRunId: event.parent_run_id,
          configurable: context.configurable,
          metadata: context.metadata,
        })
      );
    } catch (error) {
      logger.warn(`thread id resolver failed: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
