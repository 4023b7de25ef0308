// src/core/wire/encoder.ts
// Depth-first encoder: values to wire nodes, routed through the dispatch layer

import { FerryError, unsupportedObject } from "../errors";
import { describeObject } from "../objects/describe";
import type { DispatchLayer } from "../reduce/dispatch";
import { ImportPath, NamespaceShell, type Reduced, type ReduceSession } from "../reduce/types";
import type { TraceSink } from "../../ports/trace";
import { TYPED_ARRAYS, WELL_KNOWN_SYMBOLS, type WireNode } from "./types";

export type EncoderOptions = {
  maxDepth: number;
};

type SessionBase = Omit<ReduceSession, "namespaceShell">;

function isTypedArray(x: object): x is ArrayBufferView {
  if (!ArrayBuffer.isView(x) || x instanceof DataView) return false;
  const proto: unknown = Object.getPrototypeOf(x);
  return Object.values(TYPED_ARRAYS).some(ctor => ctor.prototype === proto);
}

function bytesOf(view: ArrayBufferView): string {
  return Buffer.from(view.buffer, view.byteOffset, view.byteLength).toString("base64");
}

/**
 * One encoder per payload. Object identity is preserved through `Ref`
 * nodes; reductions are memoized after their arguments and before their
 * state, so state may refer back to the object being rebuilt.
 */
export class Encoder {
  private memo: Map<object, number> = new Map();
  private pending: Set<object> = new Set();
  private symbols: Map<symbol, number> = new Map();
  private shells: Map<object, NamespaceShell> = new Map();
  private nextId = 0;
  private readonly session: ReduceSession;

  constructor(
    private readonly layer: DispatchLayer,
    base: SessionBase,
    private readonly trace: TraceSink,
    private readonly options: EncoderOptions
  ) {
    this.session = {
      ...base,
      namespaceShell: (namespace: object) => this.namespaceShell(namespace),
    };
  }

  private namespaceShell(namespace: object): NamespaceShell {
    let shell = this.shells.get(namespace);
    if (!shell) {
      shell = new NamespaceShell();
      this.shells.set(namespace, shell);
    }
    return shell;
  }

  encode(value: unknown, depth = 0): WireNode {
    if (depth > this.options.maxDepth) {
      throw unsupportedObject(describeObject(value), `nesting exceeds the depth limit of ${this.options.maxDepth}`);
    }

    switch (typeof value) {
      case "undefined":
        return { tag: "Undefined" };
      case "boolean":
      case "string":
        return { tag: "Json", value };
      case "number":
        return this.encodeNumber(value);
      case "bigint":
        return { tag: "BigInt", value: value.toString() };
      case "symbol":
        return this.encodeSymbol(value);
      case "object":
      case "function":
        if (value === null) return { tag: "Json", value: null };
        return this.encodeObject(value, depth);
    }
    throw unsupportedObject(typeof value, "unknown value type");
  }

  private encodeNumber(value: number): WireNode {
    if (Number.isNaN(value)) return { tag: "Number", value: "NaN" };
    if (value === Infinity) return { tag: "Number", value: "Infinity" };
    if (value === -Infinity) return { tag: "Number", value: "-Infinity" };
    if (Object.is(value, -0)) return { tag: "Number", value: "-0" };
    return { tag: "Json", value };
  }

  private encodeSymbol(value: symbol): WireNode {
    const key = Symbol.keyFor(value);
    if (key !== undefined) return { tag: "Symbol", kind: "registered", key };
    const known = WELL_KNOWN_SYMBOLS.find(([, s]) => s === value);
    if (known) return { tag: "Symbol", kind: "wellKnown", name: known[0] };

    let id = this.symbols.get(value);
    if (id === undefined) {
      id = this.symbols.size;
      this.symbols.set(value, id);
    }
    return { tag: "Symbol", kind: "unique", id, description: value.description };
  }

  private remember(obj: object): number {
    const id = this.nextId++;
    this.memo.set(obj, id);
    return id;
  }

  private encodeObject(obj: object, depth: number): WireNode {
    const seen = this.memo.get(obj);
    if (seen !== undefined) return { tag: "Ref", id: seen };
    if (this.pending.has(obj)) {
      throw unsupportedObject(describeObject(obj), "it is needed to construct itself");
    }
    if (obj instanceof ImportPath) return { tag: "Global", module: obj.module, qualname: obj.qualname };

    const reduced = this.strategyFor(obj);
    if (reduced) return this.encodeReduced(obj, reduced, depth);

    const plain = this.encodeOrdinary(obj, depth);
    if (plain) return plain;

    return this.encodeReduced(obj, this.layer.defaultInstance(obj), depth);
  }

  private strategyFor(obj: object): Reduced | undefined {
    try {
      return this.layer.override(obj, this.session) ?? this.layer.dispatch(obj, this.session);
    } catch (err) {
      if (err instanceof FerryError && err.reason === "refused-by-policy") {
        this.trace.emit({ tag: "E_Refused", target: describeObject(obj), reason: err.message });
      }
      throw err;
    }
  }

  private encodeReduced(obj: object, reduced: Reduced, depth: number): WireNode {
    if (reduced instanceof ImportPath) {
      return { tag: "Global", module: reduced.module, qualname: reduced.qualname };
    }

    this.trace.emit({ tag: "E_Reduce", target: describeObject(obj), strategy: reduced.fn.qualname });
    this.pending.add(obj);
    let fn: WireNode;
    let args: WireNode[];
    try {
      fn = this.encode(reduced.fn, depth + 1);
      args = reduced.args.map(arg => this.encode(arg, depth + 1));
    } finally {
      this.pending.delete(obj);
    }

    const id = this.remember(obj);
    const node: WireNode = { tag: "Reduce", id, fn, args };
    if (reduced.restore !== undefined) {
      node.state = this.encode(reduced.state, depth + 1);
      node.restore = this.encode(reduced.restore, depth + 1);
    }
    return node;
  }

  /**
   * The backend's built-in handling: arrays, plain objects, collections,
   * dates, patterns and binary data. Undefined when `obj` is none of these.
   */
  private encodeOrdinary(obj: object, depth: number): WireNode | undefined {
    const proto: unknown = Object.getPrototypeOf(obj);
    const next = depth + 1;

    if (Array.isArray(obj) && proto === Array.prototype) {
      const id = this.remember(obj);
      const items: WireNode[] = [];
      for (let i = 0; i < obj.length; i++) items.push(this.encode(obj[i], next));
      return { tag: "Array", id, items };
    }
    if (proto === Object.prototype || proto === null) {
      if (typeof obj === "function") return undefined;
      const id = this.remember(obj);
      const entries: Array<[string, WireNode]> = [];
      for (const key of Object.keys(obj)) entries.push([key, this.encode(Reflect.get(obj, key), next)]);
      return { tag: "Object", id, proto: proto === null ? "null" : "object", entries };
    }
    if (obj instanceof Map && proto === Map.prototype) {
      const id = this.remember(obj);
      const entries: Array<[WireNode, WireNode]> = [];
      for (const [k, v] of obj) entries.push([this.encode(k, next), this.encode(v, next)]);
      return { tag: "Map", id, entries };
    }
    if (obj instanceof Set && proto === Set.prototype) {
      const id = this.remember(obj);
      const items: WireNode[] = [];
      for (const v of obj) items.push(this.encode(v, next));
      return { tag: "Set", id, items };
    }
    if (obj instanceof Date && proto === Date.prototype) {
      const time = obj.getTime();
      return { tag: "Date", id: this.remember(obj), time: Number.isNaN(time) ? null : time };
    }
    if (obj instanceof RegExp && proto === RegExp.prototype) {
      return { tag: "RegExp", id: this.remember(obj), source: obj.source, flags: obj.flags };
    }
    if (obj instanceof ArrayBuffer && proto === ArrayBuffer.prototype) {
      return { tag: "Bytes", id: this.remember(obj), kind: "ArrayBuffer", data: Buffer.from(obj).toString("base64") };
    }
    if (Buffer.isBuffer(obj)) {
      return { tag: "Bytes", id: this.remember(obj), kind: "Buffer", data: obj.toString("base64") };
    }
    if (isTypedArray(obj)) {
      return { tag: "Bytes", id: this.remember(obj), kind: obj.constructor.name, data: bytesOf(obj) };
    }
    return undefined;
  }
}
