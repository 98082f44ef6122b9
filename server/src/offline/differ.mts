// 检查点状态比较
// 先把检查点解码成 channel -> value（内联 channel_values 叠加 channel_versions 指向的 blob），再逐通道做结构比较

import { isJsonObject, setEntry, toJsonValue, type JsonObject, type JsonValue } from "../../../share/shared-schema/src/json.mjs";
import { DecodeError } from "../errors.mjs";
import type { CheckpointBlobRecord, CheckpointRecord } from "../storage/types.mjs";
import { contentHash, isDecodedObject, toDecodedValue, type BlobDecoder, type DecodedValue } from "./decoder.mjs";

export interface DecodedState {
  checkpoint_id: string;
  channels: Map<string, DecodedValue>;
}

export type ChannelDiffStatus = "added" | "removed" | "changed" | "unchanged";

export interface ChannelDiff {
  channel: string;
  status: ChannelDiffStatus;
  source?: JsonValue;
  target?: JsonValue;
}

export interface CheckpointDiff {
  source_checkpoint_id: string;
  target_checkpoint_id: string;
  entries: ChannelDiff[];
  counts: Record<ChannelDiffStatus, number>;
}

export function decodeCheckpointState(
  record: CheckpointRecord,
  blobs: readonly CheckpointBlobRecord[],
  decoder: BlobDecoder
): DecodedState {
  const channels = new Map<string, DecodedValue>();
  const inline = record.checkpoint.channel_values;
  if (isJsonObject(inline)) {
    for (const [channel, value] of Object.entries(inline)) channels.set(channel, toDecodedValue(value));
  }

  const versions = record.checkpoint.channel_versions;
  if (isJsonObject(versions)) {
    const byKey = new Map(blobs.map((blob) => [`${blob.channel}\u0000${blob.version}`, blob]));
    for (const [channel, version] of Object.entries(versions)) {
      if (typeof version !== "string" && typeof version !== "number") continue;
      const blob = byKey.get(`${channel}\u0000${String(version)}`);
      if (!blob) continue;
      if (blob.type === "empty") {
        channels.delete(channel);
        continue;
      }
      try {
        channels.set(channel, decoder.decodeCached({ channel, version: blob.version }, blob.type, blob.blob));
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        // 版本与内容摘要进入标记，内容不同的不可解码值不会被判为相等
        channels.set(channel, {
          $undecodable: {
            encoding: error.encoding,
            reason: error.reason,
            version: blob.version,
            sha256: blob.blob ? contentHash(blob.blob) : null,
          },
        });
      }
    }
  }
  return { checkpoint_id: record.checkpoint_id, channels };
}

export function stateToJson(state: DecodedState): JsonObject {
  const out: JsonObject = {};
  for (const channel of sortedChannels(state.channels.keys())) {
    setEntry(out, channel, toJsonValue(state.channels.get(channel)));
  }
  return out;
}

// 结构相等：字节数组按内容比较，对象不看键顺序
export function deepEqual(a: DecodedValue, b: DecodedValue): boolean {
  if (a === b) return true;
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array) || a.length !== b.length) return false;
    return a.every((byte, i) => byte === b[i]);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!(Array.isArray(a) && Array.isArray(b)) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isDecodedObject(a) && isDecodedObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => key in b && deepEqual(a[key], b[key]));
  }
  return false;
}

// 按 UTF-16 码元排序，与区域设置无关
function sortedChannels(channels: Iterable<string>): string[] {
  return [...channels].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function diffCheckpointStates(source: DecodedState, target: DecodedState): CheckpointDiff {
  const counts: Record<ChannelDiffStatus, number> = { added: 0, removed: 0, changed: 0, unchanged: 0 };
  const entries: ChannelDiff[] = [];
  for (const channel of sortedChannels(new Set([...source.channels.keys(), ...target.channels.keys()]))) {
    const before = source.channels.get(channel);
    const after = target.channels.get(channel);
    let entry: ChannelDiff;
    if (before === undefined && after !== undefined) {
      entry = { channel, status: "added", target: toJsonValue(after) };
    } else if (before !== undefined && after === undefined) {
      entry = { channel, status: "removed", source: toJsonValue(before) };
    } else if (before !== undefined && after !== undefined && !deepEqual(before, after)) {
      entry = { channel, status: "changed", source: toJsonValue(before), target: toJsonValue(after) };
    } else {
      entry = { channel, status: "unchanged" };
    }
    counts[entry.status] += 1;
    entries.push(entry);
  }
  return {
    source_checkpoint_id: source.checkpoint_id,
    target_checkpoint_id: target.checkpoint_id,
    entries,
    counts,
  };
}
