// src/core/objects/functions.ts
// Function records and instantiation of compiled units

import vm from "node:vm";
import { Cell, cell, isCell } from "./cell";
import { BASE_BINDING, CodeUnit, codeOf } from "./code";
import { defineEnum, type EnumValue } from "./enums";
import { declareOrigin } from "./origin";
import { corruptPayload } from "../errors";

/** A module's global scope: a null-prototype object. */
export type Namespace = Record<string, unknown>;

/** Closure variable name -> cell, consulted at access time. */
export type CellScope = Record<string, Cell>;

/**
 * The execution context a live function carries: its compiled unit, the
 * namespace its free names resolve in, and its closure cells.
 */
export type FunctionRecord = {
  code: CodeUnit;
  /** Undefined when the function only reads process globals. */
  globals: object | undefined;
  cells: CellScope;
  module?: string;
  qualname: string;
};

export type BoundMethod = {
  target: object;
  key: string;
};

const records = new WeakMap<Function, FunctionRecord>();
const boundMethods = new WeakMap<Function, BoundMethod>();

export function createNamespace(): Namespace {
  return Object.create(null);
}

export function createCellScope(cells: Record<string, Cell> = {}): CellScope {
  const scope: CellScope = Object.create(null);
  for (const [name, c] of Object.entries(cells)) {
    if (!isCell(c)) throw new TypeError(`closure variable '${name}' must be a Cell`);
    scope[name] = c;
  }
  return scope;
}

export function emptyCellScope(freevars: readonly string[]): CellScope {
  const scope: CellScope = Object.create(null);
  for (const name of freevars) scope[name] = new Cell();
  return scope;
}

export function recordOf(fn: Function): FunctionRecord | undefined {
  return records.get(fn);
}

export function attachRecord(fn: Function, record: FunctionRecord): void {
  records.set(fn, record);
}

export function boundMethodOf(fn: Function): BoundMethod | undefined {
  return boundMethods.get(fn);
}

/** Own property marking a function whose calls belong to a scheduler's running coroutine. */
export const COROUTINE_FLAG: unique symbol = Symbol.for("ferry.coroutine");

export function markCoroutine<F extends Function>(fn: F): F {
  Object.defineProperty(fn, COROUTINE_FLAG, { value: true, configurable: true });
  return fn;
}

export function isMarkedCoroutine(fn: Function): boolean {
  return Object.getOwnPropertyDescriptor(fn, COROUTINE_FLAG)?.value === true;
}

// ─────────────────────────────────────────────────────────────────
// Intrinsics
// ─────────────────────────────────────────────────────────────────

/**
 * Names available to every instantiated unit and executed module, bound to
 * the namespace the code runs in.
 */
export function createIntrinsics(globals: object, module?: string): Namespace {
  const intrinsics = createNamespace();
  intrinsics.cell = cell;
  intrinsics.closure = (cells: Record<string, Cell>, fn: Function) => closure(cells, fn, { globals, module });
  intrinsics.markCoroutine = markCoroutine;
  intrinsics.defineEnum = (name: string, members: Record<string, EnumValue>) =>
    defineEnum(name, members, { module, qualname: name });
  return intrinsics;
}

const WRAPPER_PARAMS = ["__ferry_intrinsics__", "__ferry_globals__", "__ferry_cells__", BASE_BINDING];

function wrapperSource(expression: string): string {
  return [
    `(function (${WRAPPER_PARAMS.join(", ")}) {`,
    "with (__ferry_intrinsics__) { with (__ferry_globals__) { with (__ferry_cells__) {",
    `return (${expression}\n);`,
    "} } }",
    "})",
  ].join("\n");
}

function memberFunction(made: unknown, kind: CodeUnit["kind"]): unknown {
  if (made === null || typeof made !== "object") return undefined;
  const key = Reflect.ownKeys(made)[0];
  if (key === undefined) return undefined;
  const desc = Object.getOwnPropertyDescriptor(made, key);
  if (!desc) return undefined;
  if (kind === "getter") return desc.get;
  if (kind === "setter") return desc.set;
  return desc.value;
}

export type InstantiateOptions = {
  globals: object;
  cells: CellScope;
  base?: unknown;
  module?: string;
  filename?: string;
};

/**
 * Evaluate a unit so that free names resolve through `globals` and closure
 * variables through `cells`, both looked up at access time. Repopulating
 * either object later is visible to the returned function.
 */
export function instantiate(code: CodeUnit, options: InstantiateOptions): Function {
  const factory: unknown = vm.runInThisContext(wrapperSource(code.expression), {
    filename: options.filename ?? `ferry:${options.module ?? "anonymous"}/${code.name || code.kind}`,
  });
  if (typeof factory !== "function") {
    throw corruptPayload(`unit ${code.name || code.kind} did not evaluate to a factory`);
  }

  const intrinsics = createIntrinsics(options.globals, options.module);
  const made: unknown = Reflect.apply(factory, undefined, [intrinsics, options.globals, options.cells, options.base]);
  const fn = code.kind === "method" || code.kind === "getter" || code.kind === "setter"
    ? memberFunction(made, code.kind)
    : made;

  if (typeof fn !== "function") {
    throw corruptPayload(`unit ${code.name || code.kind} did not evaluate to a ${code.kind}`);
  }
  return fn;
}

// ─────────────────────────────────────────────────────────────────
// Declaring closures
// ─────────────────────────────────────────────────────────────────

export type ClosureOptions = {
  globals?: object;
  module?: string;
  qualname?: string;
};

/**
 * Declare the closure cells of a function or class. The source must read
 * each variable through the cell (`counter.value`), so the live function and
 * a rebuilt one behave the same.
 */
export function closure<F extends Function>(cells: Record<string, Cell>, fn: F, options: ClosureOptions = {}): F {
  const scope = createCellScope(cells);
  const qualname = options.qualname ?? fn.name;
  attachRecord(fn, {
    code: codeOf(fn, Object.keys(scope)),
    globals: options.globals,
    cells: scope,
    module: options.module,
    qualname,
  });
  if (options.module) declareOrigin(fn, { module: options.module, qualname });
  return fn;
}

/**
 * `target[key].bind(target)`, remembered as an attribute lookup so the
 * pair can be serialized.
 */
export function boundMethod(target: object, key: string): Function {
  const method: unknown = Reflect.get(target, key);
  if (typeof method !== "function") {
    throw new TypeError(`'${key}' is not a method`);
  }
  const bound: Function = method.bind(target);
  boundMethods.set(bound, { target, key });
  return bound;
}
