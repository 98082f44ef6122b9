// Blob 解码器
// 支持 json、bytes/bytearray（原样透传）、msgpack（含 LangGraph 扩展类型）、null/empty
// pickle 及未知编码抛 DecodeError；解码是纯函数，可按 (channel, version, 内容哈希) 缓存

import { createHash } from "node:crypto";
import { decode as decodeMsgpack, ExtensionCodec } from "@msgpack/msgpack";
import { setEntry, type JsonPrimitive } from "../../../share/shared-schema/src/json.mjs";
import { DecodeError, errorMessage } from "../errors.mjs";

export type DecodedValue = JsonPrimitive | Uint8Array | DecodedValue[] | DecodedObject;
export interface DecodedObject {
  [key: string]: DecodedValue;
}

export const DEFAULT_ENCODING = "msgpack";

// LangGraph 序列化器使用的 msgpack 扩展类型编号
const EXT_CONSTRUCTOR_SINGLE_ARG = 0;
const EXT_CONSTRUCTOR_POS_ARGS = 1;
const EXT_CONSTRUCTOR_KW_ARGS = 2;
const EXT_METHOD_SINGLE_ARG = 3;
const EXT_PYDANTIC_V1 = 4;
const EXT_PYDANTIC_V2 = 5;
const EXT_NUMPY_ARRAY = 6;

const extensionCodec = new ExtensionCodec();

function decodeExtensionPayload(data: Uint8Array): DecodedValue[] {
  const payload = toDecodedValue(decodeMsgpack(data, { extensionCodec }));
  return Array.isArray(payload) ? payload : [payload];
}

function typeName(module: DecodedValue | undefined, name: DecodedValue | undefined): string {
  return [module, name].filter((part) => typeof part === "string" && part.length > 0).join(".");
}

function withFields(type: string, fields: DecodedValue | undefined): DecodedObject {
  const out: DecodedObject = { __type__: type };
  if (isDecodedObject(fields)) {
    for (const [key, value] of Object.entries(fields)) setEntry(out, key, value);
  } else if (fields !== undefined) {
    out.value = fields;
  }
  return out;
}

for (const type of [EXT_CONSTRUCTOR_KW_ARGS, EXT_PYDANTIC_V1, EXT_PYDANTIC_V2]) {
  extensionCodec.register({
    type,
    encode: () => null,
    decode: (data) => {
      const [module, name, kwargs] = decodeExtensionPayload(data);
      return withFields(typeName(module, name), kwargs);
    },
  });
}

for (const type of [EXT_CONSTRUCTOR_SINGLE_ARG, EXT_METHOD_SINGLE_ARG]) {
  extensionCodec.register({
    type,
    encode: () => null,
    decode: (data) => {
      const [module, name, arg] = decodeExtensionPayload(data);
      return { __type__: typeName(module, name), value: arg ?? null };
    },
  });
}

extensionCodec.register({
  type: EXT_CONSTRUCTOR_POS_ARGS,
  encode: () => null,
  decode: (data) => {
    const [module, name, args] = decodeExtensionPayload(data);
    return { __type__: typeName(module, name), args: args ?? [] };
  },
});

extensionCodec.register({
  type: EXT_NUMPY_ARRAY,
  encode: () => null,
  decode: (data) => {
    const [dtype, shape] = decodeExtensionPayload(data);
    return { __type__: "numpy.ndarray", dtype: dtype ?? null, shape: shape ?? null };
  },
});

export function isDecodedObject(value: DecodedValue | undefined): value is DecodedObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

// 把解码库产出的值收敛为 DecodedValue（Date 转 ISO，Map 转对象，bigint 转数字/字符串）
export function toDecodedValue(value: unknown): DecodedValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    case "object":
      break;
    default:
      return null;
  }
  if (value instanceof Uint8Array) return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => toDecodedValue(item));
  if (value instanceof Map) {
    const out: DecodedObject = {};
    for (const [key, entry] of value) setEntry(out, String(key), toDecodedValue(entry));
    return out;
  }
  const out: DecodedObject = {};
  for (const [key, entry] of Object.entries(value)) setEntry(out, key, toDecodedValue(entry));
  return out;
}

export function contentHash(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export interface BlobAddress {
  channel: string;
  version: string;
}

export class BlobDecoder {
  private readonly cache = new Map<string, DecodedValue>();

  constructor(private readonly maxCacheEntries = 1000) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  decode(encoding: string | null, bytes: Uint8Array | null): DecodedValue {
    const kind = (encoding ?? DEFAULT_ENCODING).toLowerCase();
    switch (kind) {
      case "null":
      case "empty":
        return null;
      case "bytes":
      case "bytearray":
        return bytes ?? new Uint8Array(0);
      case "json":
        return this.decodeJson(bytes);
      case "msgpack":
        return this.decodeMsgpack(bytes);
      case "pickle":
        throw new DecodeError(kind, "pickle payloads are not supported");
      default:
        throw new DecodeError(kind, "unsupported encoding");
    }
  }

  // 同一 (channel, version, 内容) 只解码一次
  decodeCached(address: BlobAddress, encoding: string | null, bytes: Uint8Array | null): DecodedValue {
    const hash = bytes ? contentHash(bytes) : "-";
    const key = `${address.channel}\u0000${address.version}\u0000${encoding ?? ""}\u0000${hash}`;
    const hit = this.cache.get(key);
    if (hit !== undefined) {
      // 刷新为最近使用
      this.cache.delete(key);
      this.cache.set(key, hit);
      return hit;
    }
    const value = this.decode(encoding, bytes);
    this.cache.set(key, value);
    if (this.cache.size > this.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return value;
  }

  private decodeJson(bytes: Uint8Array | null): DecodedValue {
    if (!bytes || bytes.length === 0) return null;
    try {
      return toDecodedValue(JSON.parse(Buffer.from(bytes).toString("utf8")));
    } catch (error) {
      throw new DecodeError("json", errorMessage(error));
    }
  }

  private decodeMsgpack(bytes: Uint8Array | null): DecodedValue {
    if (!bytes || bytes.length === 0) return null;
    try {
      return toDecodedValue(decodeMsgpack(bytes, { extensionCodec }));
    } catch (error) {
      throw new DecodeError("msgpack", errorMessage(error));
    }
  }
}
