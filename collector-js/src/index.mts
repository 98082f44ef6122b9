export { TraceCallbackHandler, extractTokenUsage, type TraceCallbackHandlerOptions, type TokenUsage } from "./callback-handler.mjs";
export { HttpEventSink, INGEST_PATH, type HttpEventSinkOptions } from "./sinks.mjs";
export type { CallbackEnvelope, EventSink } from "../../share/shared-schema/src/events.mjs";
