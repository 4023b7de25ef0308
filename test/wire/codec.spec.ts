// test/wire/codec.spec.ts
// Payload framing and ordinary data through the encoder and decoder

import { describe, it, expect } from "vitest";
import { FerryError } from "../../src/core/errors";
import { decodePayload, encodePayload, isWireNode } from "../../src/core/wire/codec";
import { mergeConfigs } from "../../src/core/config/config";
import { Runtime } from "../../src/runtime";
import { attr } from "../helpers/runtime";

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof FerryError ? err.reason : "other";
  }
  return undefined;
}

const runtime = new Runtime();
const ship = (value: unknown): unknown => new Runtime().loads(runtime.dumps(value));

describe("ordinary values", () => {
  it("keeps primitives the JSON form cannot hold", () => {
    expect(ship(undefined)).toBeUndefined();
    expect(ship(NaN)).toBeNaN();
    expect(Object.is(ship(-0), -0)).toBe(true);
    expect(ship(-Infinity)).toBe(-Infinity);
    expect(ship(12345678901234567890n)).toBe(12345678901234567890n);
    expect(ship(null)).toBeNull();
    expect(ship("text")).toBe("text");
  });

  it("keeps registered, well-known and repeated unique symbols", () => {
    expect(ship(Symbol.for("ferry.key"))).toBe(Symbol.for("ferry.key"));
    expect(ship(Symbol.iterator)).toBe(Symbol.iterator);

    const token = Symbol("token");
    const out = ship([token, token]);
    if (!Array.isArray(out)) throw new TypeError("expected an array");
    expect(out[0]).toBe(out[1]);
    expect(typeof out[0]).toBe("symbol");
    expect(out[0]).not.toBe(token);
  });

  it("preserves shared and cyclic references", () => {
    const child = { n: 1 };
    const list: unknown[] = [child, child];
    list.push(list);
    const out = ship(list);
    if (!Array.isArray(out)) throw new TypeError("expected an array");
    expect(out[0]).toBe(out[1]);
    expect(out[2]).toBe(out);
    expect(out[0]).toEqual({ n: 1 });
  });

  it("keeps null-prototype objects and a __proto__ key", () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.a = 1;
    const out = ship(bare);
    expect(Object.getPrototypeOf(out)).toBeNull();
    expect(attr(out, "a")).toBe(1);

    const tricky: unknown = JSON.parse('{"__proto__": {"polluted": true}}');
    const copy = ship(tricky);
    if (copy === null || typeof copy !== "object") throw new TypeError("expected an object");
    expect(Object.getPrototypeOf(copy)).toBe(Object.prototype);
    expect(Object.keys(copy)).toEqual(["__proto__"]);
    expect(attr(copy, "polluted")).toBeUndefined();
  });

  it("rebuilds collections, dates and patterns", () => {
    const out = ship({
      map: new Map<unknown, unknown>([["a", 1], [2, "b"]]),
      set: new Set([1, 2]),
      when: new Date(86400000),
      never: new Date(NaN),
      pattern: /ab+c/gi,
    });
    expect(attr(out, "map")).toEqual(new Map<unknown, unknown>([["a", 1], [2, "b"]]));
    expect(attr(out, "set")).toEqual(new Set([1, 2]));
    expect(attr(out, "when")).toEqual(new Date(86400000));
    const never = attr(out, "never");
    expect(never instanceof Date && Number.isNaN(never.getTime())).toBe(true);
    expect(String(attr(out, "pattern"))).toBe("/ab+c/gi");
  });

  it("rebuilds binary data with its kind", () => {
    const out = ship([Buffer.from("hi"), new Uint16Array([1, 65535]), new Uint8Array([7, 8]).buffer]);
    if (!Array.isArray(out)) throw new TypeError("expected an array");
    expect(Buffer.isBuffer(out[0]) && out[0].toString()).toBe("hi");
    expect(out[1]).toEqual(new Uint16Array([1, 65535]));
    expect(out[2] instanceof ArrayBuffer && [...new Uint8Array(out[2])]).toEqual([7, 8]);
  });

  it("enforces the nesting limit", () => {
    const shallow = new Runtime({ config: mergeConfigs({ limits: { maxDepth: 3 } }) });
    expect(shallow.encode([[[1]]])).toBeDefined();
    expect(reasonOf(() => shallow.encode([[[[1]]]]))).toBe("unsupported-object");
  });
});

describe("payload framing", () => {
  it("round-trips a tree", () => {
    const bytes = encodePayload({ tag: "Array", id: 0, items: [{ tag: "Json", value: 1 }] });
    expect(JSON.parse(bytes.toString("utf8"))).toEqual({
      format: "ferry",
      version: 1,
      root: { tag: "Array", id: 0, items: [{ tag: "Json", value: 1 }] },
    });
    expect(decodePayload(bytes)).toEqual({ tag: "Array", id: 0, items: [{ tag: "Json", value: 1 }] });
  });

  it("rejects foreign or damaged payloads", () => {
    expect(reasonOf(() => decodePayload(Buffer.from("nope")))).toBe("corrupt-payload");
    expect(reasonOf(() => decodePayload(Buffer.from('{"format":"other","version":1}')))).toBe("corrupt-payload");
    expect(() => decodePayload(Buffer.from('{"format":"ferry","version":2,"root":{"tag":"Undefined"}}'))).toThrow(
      "unsupported payload version 2"
    );
    expect(() => decodePayload(Buffer.from('{"format":"ferry","version":1,"root":{"tag":"Nope"}}'))).toThrow(
      "malformed payload tree"
    );
  });

  it("rejects references to objects not yet decoded", () => {
    const bytes = Buffer.from('{"format":"ferry","version":1,"root":{"tag":"Ref","id":4}}');
    expect(() => runtime.loads(bytes)).toThrow("reference to unknown object 4");
  });

  it("checks node structure", () => {
    expect(isWireNode({ tag: "Number", value: "NaN" })).toBe(true);
    expect(isWireNode({ tag: "Number", value: "1" })).toBe(false);
    expect(isWireNode({ tag: "Array", id: -1, items: [] })).toBe(false);
    expect(isWireNode({ tag: "Reduce", id: 0, fn: { tag: "Global", module: "m", qualname: "f" }, args: [] })).toBe(true);
  });
});
