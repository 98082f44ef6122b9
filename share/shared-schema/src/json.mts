// JSON 值类型
// 说明：检查点 JSON 列、解码后的负载与 API 输出共用这一组类型

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

// 按自有属性写入：来自负载的 "__proto__" 等键保留为普通字段，不改动原型
export function setEntry<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

// 从未知值中取出普通对象（非对象返回 undefined）
export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value) || value instanceof Uint8Array) {
    return undefined;
  }
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) setEntry(record, key, entry);
  return record;
}

// 将任意值收敛为 JsonValue：丢弃 undefined/函数，Date 转 ISO，bigint 转数字或字符串
// 带 toJSON() 的对象（如 LangChain 消息）按其序列化结果处理；循环引用记为 "[Circular]"
export function toJsonValue(value: unknown): JsonValue {
  return convert(value, new Set<object>());
}

function convert(value: unknown, ancestors: Set<object>): JsonValue {
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
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return { $bytes: Buffer.from(value).toString("base64") };
  if (ancestors.has(value)) return "[Circular]";
  ancestors.add(value);
  try {
    if (Array.isArray(value)) return value.map((item) => convert(item, ancestors));
    if (value instanceof Map) {
      const out: JsonObject = {};
      for (const [key, entry] of value) setEntry(out, String(key), convert(entry, ancestors));
      return out;
    }
    if ("toJSON" in value && typeof value.toJSON === "function") {
      const serialized: unknown = value.toJSON();
      if (serialized !== value) return convert(serialized, ancestors);
    }
    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined || typeof entry === "function") continue;
      setEntry(out, key, convert(entry, ancestors));
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}
