// 离线模块测试的构造器
import type { CheckpointRecord, CheckpointWriteRecord } from "../../storage/types.mjs";
import { ModelPricing } from "../pricing.mjs";
import type { JsonObject } from "../../../../share/shared-schema/src/json.mjs";

export const testPricing = () =>
  new ModelPricing({
    currency: "USD",
    unit_tokens: 1_000_000,
    default: { prompt: 3, completion: 15 },
    models: { "gpt-4o": { prompt: 2.5, completion: 10 }, "gpt-4o-mini": { prompt: 0.15, completion: 0.6 } },
  });

export function checkpointRecord(overrides: Partial<CheckpointRecord> = {}): CheckpointRecord {
  return {
    thread_id: "t1",
    checkpoint_ns: "",
    checkpoint_id: "c2",
    parent_checkpoint_id: "c1",
    type: "json",
    checkpoint: { v: 1, id: "c2", channel_values: {}, channel_versions: {} },
    metadata: {},
    ...overrides,
  };
}

export function write(
  taskId: string,
  idx: number,
  channel: string,
  value: unknown,
  overrides: Partial<CheckpointWriteRecord> = {}
): CheckpointWriteRecord {
  return {
    thread_id: "t1",
    checkpoint_ns: "",
    checkpoint_id: "c2",
    task_id: taskId,
    task_path: "",
    idx,
    channel,
    type: "json",
    blob: Buffer.from(JSON.stringify(value), "utf8"),
    ...overrides,
  };
}

export function taskGraph(entries: JsonObject): JsonObject {
  return { task_graph: entries };
}
