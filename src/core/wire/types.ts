// src/core/wire/types.ts
// JSON wire nodes produced by the encoder

export type NumberSpecial = "NaN" | "Infinity" | "-Infinity" | "-0";

export type SymbolNode =
  | { tag: "Symbol"; kind: "registered"; key: string }
  | { tag: "Symbol"; kind: "wellKnown"; name: string }
  | { tag: "Symbol"; kind: "unique"; id: number; description?: string };

export type WireNode =
  | { tag: "Json"; value: string | number | boolean | null }
  | { tag: "Undefined" }
  | { tag: "Number"; value: NumberSpecial }
  | { tag: "BigInt"; value: string }
  | SymbolNode
  | { tag: "Ref"; id: number }
  | { tag: "Array"; id: number; items: WireNode[] }
  | { tag: "Object"; id: number; proto: "object" | "null"; entries: Array<[string, WireNode]> }
  | { tag: "Map"; id: number; entries: Array<[WireNode, WireNode]> }
  | { tag: "Set"; id: number; items: WireNode[] }
  | { tag: "Date"; id: number; time: number | null }
  | { tag: "RegExp"; id: number; source: string; flags: string }
  | { tag: "Bytes"; id: number; kind: string; data: string }
  | { tag: "Global"; module: string; qualname: string }
  | { tag: "Reduce"; id: number; fn: WireNode; args: WireNode[]; state?: WireNode; restore?: WireNode };

export type WireTag = WireNode["tag"];

export const PAYLOAD_FORMAT = "ferry";
export const PAYLOAD_VERSION = 1;

export type Payload = {
  format: typeof PAYLOAD_FORMAT;
  version: typeof PAYLOAD_VERSION;
  root: WireNode;
};

export const WELL_KNOWN_SYMBOLS: ReadonlyArray<[string, symbol]> = [
  ["asyncIterator", Symbol.asyncIterator],
  ["hasInstance", Symbol.hasInstance],
  ["isConcatSpreadable", Symbol.isConcatSpreadable],
  ["iterator", Symbol.iterator],
  ["match", Symbol.match],
  ["matchAll", Symbol.matchAll],
  ["replace", Symbol.replace],
  ["search", Symbol.search],
  ["species", Symbol.species],
  ["split", Symbol.split],
  ["toPrimitive", Symbol.toPrimitive],
  ["toStringTag", Symbol.toStringTag],
  ["unscopables", Symbol.unscopables],
];

export const TYPED_ARRAYS = {
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
  BigInt64Array,
  BigUint64Array,
} satisfies Record<string, new (buffer: ArrayBuffer) => ArrayBufferView>;

export type TypedArrayName = keyof typeof TYPED_ARRAYS;

export function isTypedArrayName(name: string): name is TypedArrayName {
  return Object.prototype.hasOwnProperty.call(TYPED_ARRAYS, name);
}
