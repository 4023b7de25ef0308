// src/core/reduce/types.ts
// Reconstruction descriptors shared by every reduction strategy

import type { GlobalsExtractor } from "../analysis/globals";
import type { ModuleRegistry } from "../modules/registry";
import type { TraceSink } from "../../ports/trace";
import { corruptPayload } from "../errors";
import type { ByValuePolicy, ReferenceResolver } from "./resolver";
import type { ClassTracker } from "./tracker";

/**
 * A lookup path: attribute `qualname` of module `module`.
 * Encoded as a global reference, resolved by import on load.
 */
export class ImportPath {
  constructor(
    public readonly module: string,
    public readonly qualname: string
  ) {}

  toString(): string {
    return `${this.module}:${this.qualname}`;
  }
}

/** Module holding the reconstruction functions of a runtime. */
export const RECONSTRUCTORS_MODULE = "ferry";

export function reconstructor(name: string): ImportPath {
  return new ImportPath(RECONSTRUCTORS_MODULE, name);
}

/**
 * On load: `obj = fn(...args)`, then `restore(obj, state)` when both are present.
 */
export type Reduction = {
  fn: ImportPath;
  args: unknown[];
  state?: unknown;
  restore?: ImportPath;
};

/** What a strategy produces: a reference, or a reconstruction descriptor. */
export type Reduced = ImportPath | Reduction;

export type PropertyEntry =
  | { key: string; kind: "data"; value: unknown; enumerable: boolean; writable: boolean; configurable: boolean }
  | { key: string; kind: "accessor"; get?: Function; set?: Function; enumerable: boolean; configurable: boolean };

/**
 * Stand-in for a source namespace. Every function captured from the same
 * namespace in one payload refers to the same shell.
 */
export class NamespaceShell {}

/**
 * Everything a strategy can consult while reducing one object.
 */
export interface ReduceSession {
  readonly modules: ModuleRegistry;
  readonly resolver: ReferenceResolver;
  readonly policy: ByValuePolicy;
  readonly tracker: ClassTracker;
  readonly extractor: GlobalsExtractor;
  readonly trace: TraceSink;
  namespaceShell(namespace: object): NamespaceShell;
}

// ─────────────────────────────────────────────────────────────────
// Property descriptors
// ─────────────────────────────────────────────────────────────────

/**
 * Own string-keyed properties of `target` as entries, skipping `exclude`.
 */
export function propertyEntries(target: object, exclude: ReadonlySet<string> = new Set()): PropertyEntry[] {
  const entries: PropertyEntry[] = [];
  for (const key of Object.getOwnPropertyNames(target)) {
    if (exclude.has(key)) continue;
    const desc = Object.getOwnPropertyDescriptor(target, key);
    if (!desc) continue;
    if ("value" in desc) {
      entries.push({
        key,
        kind: "data",
        value: desc.value,
        enumerable: desc.enumerable ?? false,
        writable: desc.writable ?? false,
        configurable: desc.configurable ?? false,
      });
    } else {
      entries.push({
        key,
        kind: "accessor",
        get: desc.get,
        set: desc.set,
        enumerable: desc.enumerable ?? false,
        configurable: desc.configurable ?? false,
      });
    }
  }
  return entries;
}

export function applyPropertyEntries(target: object, entries: readonly PropertyEntry[]): void {
  for (const entry of entries) {
    if (entry.kind === "data") {
      Object.defineProperty(target, entry.key, {
        value: entry.value,
        enumerable: entry.enumerable,
        writable: entry.writable,
        configurable: entry.configurable,
      });
    } else {
      const desc: PropertyDescriptor = { enumerable: entry.enumerable, configurable: entry.configurable };
      if (entry.get) Reflect.set(desc, "get", entry.get);
      if (entry.set) Reflect.set(desc, "set", entry.set);
      Object.defineProperty(target, entry.key, desc);
    }
  }
}

function readEntry(x: unknown): PropertyEntry | undefined {
  if (x === null || typeof x !== "object") return undefined;
  const key: unknown = Reflect.get(x, "key");
  const kind: unknown = Reflect.get(x, "kind");
  const enumerable = Reflect.get(x, "enumerable") === true;
  const configurable = Reflect.get(x, "configurable") === true;
  if (typeof key !== "string") return undefined;
  if (kind === "data") {
    const writable = Reflect.get(x, "writable") === true;
    return { key, kind, value: Reflect.get(x, "value"), enumerable, writable, configurable };
  }
  if (kind === "accessor") {
    const get: unknown = Reflect.get(x, "get");
    const set: unknown = Reflect.get(x, "set");
    return {
      key,
      kind,
      get: typeof get === "function" ? get : undefined,
      set: typeof set === "function" ? set : undefined,
      enumerable,
      configurable,
    };
  }
  return undefined;
}

/**
 * Validate decoded property entries.
 */
export function readPropertyEntries(x: unknown, what: string): PropertyEntry[] {
  if (!Array.isArray(x)) throw corruptPayload(`${what}: expected a property list`);
  return x.map(item => {
    const entry = readEntry(item);
    if (!entry) throw corruptPayload(`${what}: malformed property entry`);
    return entry;
  });
}
