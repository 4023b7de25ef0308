// src/core/wire/decoder.ts
// Rebuilds values from wire nodes

import { corruptPayload, lookupFailed, FerryError } from "../errors";
import type { ModuleRegistry } from "../modules/registry";
import { getAttributePath } from "../objects/origin";
import { TYPED_ARRAYS, WELL_KNOWN_SYMBOLS, isTypedArrayName, type WireNode } from "./types";

/**
 * One decoder per payload. Ids are bound as soon as the object exists:
 * containers before their children, reductions after their constructor
 * call and before their state.
 */
export class Decoder {
  private objects: Map<number, unknown> = new Map();
  private symbols: Map<number, symbol> = new Map();

  constructor(private readonly modules: ModuleRegistry) {}

  decode(node: WireNode): unknown {
    switch (node.tag) {
      case "Json":
        return node.value;
      case "Undefined":
        return undefined;
      case "Number":
        return node.value === "-0" ? -0 : Number(node.value);
      case "BigInt":
        return BigInt(node.value);
      case "Symbol":
        return this.decodeSymbol(node);
      case "Ref":
        if (!this.objects.has(node.id)) throw corruptPayload(`reference to unknown object ${node.id}`);
        return this.objects.get(node.id);
      case "Array": {
        const items: unknown[] = [];
        this.bind(node.id, items);
        for (const item of node.items) items.push(this.decode(item));
        return items;
      }
      case "Object": {
        const obj: Record<string, unknown> = node.proto === "null" ? Object.create(null) : {};
        this.bind(node.id, obj);
        for (const [key, value] of node.entries) {
          Object.defineProperty(obj, key, { value: this.decode(value), writable: true, enumerable: true, configurable: true });
        }
        return obj;
      }
      case "Map": {
        const map = new Map<unknown, unknown>();
        this.bind(node.id, map);
        for (const [k, v] of node.entries) map.set(this.decode(k), this.decode(v));
        return map;
      }
      case "Set": {
        const set = new Set<unknown>();
        this.bind(node.id, set);
        for (const item of node.items) set.add(this.decode(item));
        return set;
      }
      case "Date":
        return this.bind(node.id, new Date(node.time ?? NaN));
      case "RegExp":
        return this.bind(node.id, new RegExp(node.source, node.flags));
      case "Bytes":
        return this.bind(node.id, this.decodeBytes(node.kind, node.data));
      case "Global":
        return this.resolveGlobal(node.module, node.qualname);
      case "Reduce":
        return this.decodeReduce(node);
    }
  }

  private bind<T>(id: number, value: T): T {
    this.objects.set(id, value);
    return value;
  }

  private decodeSymbol(node: Extract<WireNode, { tag: "Symbol" }>): symbol {
    if (node.kind === "registered") return Symbol.for(node.key);
    if (node.kind === "wellKnown") {
      const known = WELL_KNOWN_SYMBOLS.find(([name]) => name === node.name);
      if (!known) throw corruptPayload(`unknown well-known symbol ${node.name}`);
      return known[1];
    }
    let sym = this.symbols.get(node.id);
    if (!sym) {
      sym = Symbol(node.description);
      this.symbols.set(node.id, sym);
    }
    return sym;
  }

  private decodeBytes(kind: string, data: string): object {
    const bytes = Buffer.from(data, "base64");
    if (kind === "Buffer") return bytes;
    const copy = bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
    if (kind === "ArrayBuffer") return copy;
    if (isTypedArrayName(kind) && copy instanceof ArrayBuffer) {
      const ctor: new (buffer: ArrayBuffer) => ArrayBufferView = TYPED_ARRAYS[kind];
      return new ctor(copy);
    }
    throw corruptPayload(`unsupported binary kind ${kind}`);
  }

  private resolveGlobal(module: string, qualname: string): unknown {
    const namespace = this.modules.import(module);
    try {
      return getAttributePath(namespace, qualname);
    } catch (err) {
      throw lookupFailed(`${module}:${qualname}`, "not found", err);
    }
  }

  private decodeReduce(node: Extract<WireNode, { tag: "Reduce" }>): unknown {
    const fn = this.decode(node.fn);
    if (typeof fn !== "function") throw corruptPayload(`reconstructor of object ${node.id} is not callable`);
    const args = node.args.map(arg => this.decode(arg));

    const obj = this.call(fn, args, node.id);
    this.bind(node.id, obj);

    if (node.restore !== undefined) {
      const state = node.state === undefined ? undefined : this.decode(node.state);
      const restore = this.decode(node.restore);
      if (typeof restore !== "function") throw corruptPayload(`restore of object ${node.id} is not callable`);
      this.call(restore, [obj, state], node.id);
    }
    return obj;
  }

  private call(fn: Function, args: unknown[], id: number): unknown {
    try {
      return Reflect.apply(fn, undefined, args);
    } catch (err) {
      if (err instanceof FerryError) throw err;
      throw corruptPayload(`cannot rebuild object ${id} with ${fn.name || "reconstructor"}`, err);
    }
  }
}
