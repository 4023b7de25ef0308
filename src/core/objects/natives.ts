// src/core/objects/natives.ts
// Built-in natives, intrinsic type objects and singletons reachable from globalThis

/** Accessor globals that are safe to read while indexing. */
const SAFE_ACCESSORS = new Set(["process", "Buffer", "console", "crypto", "performance"]);

/** Namespaces whose function members are indexed one level deep. */
const NAMESPACE_GLOBALS = ["Math", "JSON", "Reflect", "Atomics", "Intl", "console", "process", "Buffer"];

const SINGLETON_PATHS = [
  "globalThis",
  "Math",
  "JSON",
  "Reflect",
  "Atomics",
  "Intl",
  "console",
  "process",
  "process.stdout",
  "process.stderr",
];

let nativeIndex: Map<object, string> | undefined;

function readGlobal(name: string): unknown {
  const desc = Object.getOwnPropertyDescriptor(globalThis, name);
  if (!desc) return undefined;
  if ("value" in desc) return desc.value;
  return SAFE_ACCESSORS.has(name) ? Reflect.get(globalThis, name) : undefined;
}

function indexMethods(index: Map<object, string>, owner: object, prefix: string): void {
  for (const key of Object.getOwnPropertyNames(owner)) {
    const desc = Object.getOwnPropertyDescriptor(owner, key);
    if (!desc || !("value" in desc) || typeof desc.value !== "function") continue;
    if (!index.has(desc.value)) index.set(desc.value, `${prefix}.${key}`);
  }
}

function buildIndex(): Map<object, string> {
  const index = new Map<object, string>();
  const globals = Object.getOwnPropertyNames(globalThis).filter(n => n !== "globalThis");

  for (const name of globals) {
    const value = readGlobal(name);
    if (typeof value === "function" && !index.has(value)) index.set(value, name);
  }
  for (const name of globals) {
    const value = readGlobal(name);
    if (typeof value !== "function") continue;
    indexMethods(index, value, name);
    const proto: unknown = Reflect.get(value, "prototype");
    if (proto !== null && typeof proto === "object") indexMethods(index, proto, `${name}.prototype`);
  }
  for (const name of NAMESPACE_GLOBALS) {
    const value = readGlobal(name);
    if (value !== null && typeof value === "object") indexMethods(index, value, name);
  }
  return index;
}

/**
 * Dotted path of a built-in native under globalThis (`Math.max`,
 * `Array.prototype.push`), or undefined.
 */
export function builtinPathOf(fn: Function): string | undefined {
  nativeIndex ??= buildIndex();
  return nativeIndex.get(fn);
}

// ─────────────────────────────────────────────────────────────────
// Intrinsic type objects without a global name
// ─────────────────────────────────────────────────────────────────

export type IntrinsicName = "AsyncFunction" | "GeneratorFunction" | "AsyncGeneratorFunction" | "TypedArray";

function intrinsicTable(): Map<IntrinsicName, object> {
  const ctorOf = (proto: object): object => {
    const ctor: unknown = Reflect.get(proto, "constructor");
    if (typeof ctor !== "function") throw new TypeError("intrinsic prototype has no constructor");
    return ctor;
  };
  return new Map<IntrinsicName, object>([
    ["AsyncFunction", ctorOf(Object.getPrototypeOf(async function () {}))],
    ["GeneratorFunction", ctorOf(Object.getPrototypeOf(function* () {}))],
    ["AsyncGeneratorFunction", ctorOf(Object.getPrototypeOf(async function* () {}))],
    ["TypedArray", Object.getPrototypeOf(Uint8Array)],
  ]);
}

let intrinsics: Map<IntrinsicName, object> | undefined;

export function intrinsicNameOf(x: object): IntrinsicName | undefined {
  intrinsics ??= intrinsicTable();
  for (const [name, value] of intrinsics) {
    if (value === x) return name;
  }
  return undefined;
}

export function intrinsicByName(name: string): object | undefined {
  intrinsics ??= intrinsicTable();
  for (const [key, value] of intrinsics) {
    if (key === name) return value;
  }
  return undefined;
}

// ─────────────────────────────────────────────────────────────────
// Singletons
// ─────────────────────────────────────────────────────────────────

function resolvePath(path: string): unknown {
  let current: unknown = globalThis;
  for (const segment of path.split(".")) {
    if (current === null || (typeof current !== "object" && typeof current !== "function")) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Path of a process-wide singleton object under globalThis, or undefined.
 */
export function singletonPathOf(x: object): string | undefined {
  return SINGLETON_PATHS.find(path => resolvePath(path) === x);
}
