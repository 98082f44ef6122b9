import { describe, it, expect } from "vitest";
import { asRecord, isJsonObject, toJsonValue } from "../json.mjs";

describe("toJsonValue", () => {
  it("normalizes non-JSON values", () => {
    expect(
      toJsonValue({
        when: new Date("2024-01-01T00:00:00.000Z"),
        bytes: new Uint8Array([1, 2, 3]),
        big: 10n,
        map: new Map([["k", 1]]),
        skip: undefined,
        fn: () => 1,
        nan: Number.NaN,
      })
    ).toEqual({
      when: "2024-01-01T00:00:00.000Z",
      bytes: { $bytes: "AQID" },
      big: 10,
      map: { k: 1 },
      nan: null,
    });
  });

  it("uses toJSON when present", () => {
    const message = { toJSON: () => ({ lc: 1, type: "constructor", id: ["AIMessage"] }) };
    expect(toJsonValue([message])).toEqual([{ lc: 1, type: "constructor", id: ["AIMessage"] }]);
  });

  it("marks circular references", () => {
    const node: { name: string; self?: unknown } = { name: "loop" };
    node.self = node;
    expect(toJsonValue(node)).toEqual({ name: "loop", self: "[Circular]" });
  });

  it("copies a parsed __proto__ key as data", () => {
    const converted = toJsonValue(JSON.parse('{"__proto__":{"a":1},"x":1}'));
    expect(Object.getPrototypeOf(converted)).toBe(Object.prototype);
    expect(JSON.stringify(converted)).toBe('{"__proto__":{"a":1},"x":1}');
  });

  it("keeps repeated but acyclic references", () => {
    const shared = { v: 1 };
    expect(toJsonValue({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
  });
});

describe("object guards", () => {
  it("distinguish plain objects from arrays and bytes", () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(new Uint8Array())).toBe(false);
    expect(asRecord({ a: 1 })).toEqual({ a: 1 });
    expect(asRecord("x")).toBeUndefined();
    const record = asRecord(JSON.parse('{"__proto__":{"a":1}}'));
    expect(record ? Object.keys(record) : []).toEqual(["__proto__"]);
    expect(record?.a).toBeUndefined();
  });
});
