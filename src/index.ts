// src/index.ts
// ferry - Public API
//
// Serialization of functions, classes and enums defined at run time, for
// sending work to other processes.

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { Runtime, type RuntimeOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// OBJECT MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export { Cell, cell, isCell } from "./core/objects/cell";
export { CodeUnit, compileUnit, codeOf, type UnitKind } from "./core/objects/code";
export {
  closure,
  boundMethod,
  markCoroutine,
  isMarkedCoroutine,
  COROUTINE_FLAG,
  recordOf,
  instantiate,
  createNamespace,
  type FunctionRecord,
  type Namespace,
  type CellScope,
} from "./core/objects/functions";
export {
  EnumMember,
  defineEnum,
  createEnumShell,
  addEnumMember,
  isEnumClass,
  enumClassOf,
  type EnumType,
  type EnumValue,
} from "./core/objects/enums";
export { declareOrigin, originOf, type Origin } from "./core/objects/origin";
export { describeObject } from "./core/objects/describe";

// ═══════════════════════════════════════════════════════════════════════════════
// REDUCTION
// ═══════════════════════════════════════════════════════════════════════════════

export { ImportPath, type Reduction, type Reduced, type ReduceSession, type PropertyEntry } from "./core/reduce/types";
export { ReferenceResolver, ByValuePolicy, type Decision, type ValueReason } from "./core/reduce/resolver";
export { ClassTracker } from "./core/reduce/tracker";
export { SkeletonBuilder, type SkeletonShape, type SkeletonHandle } from "./core/reduce/skeleton";
export { FunctionCapsule, type FunctionShape, type FunctionState } from "./core/reduce/capsule";
export { DispatchLayer, DispatchTable, type Reducer } from "./core/reduce/dispatch";
export { createDispatchTable } from "./core/reduce/strategies";
export { GlobalsExtractor, topLevelBindings, type UnitBindings } from "./core/analysis/globals";
export { ModuleRegistry, type ModuleRecord, type ModuleOrigin, type ModuleLoader } from "./core/modules/registry";

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE FORMAT & SERIALIZERS
// ═══════════════════════════════════════════════════════════════════════════════

export { encodePayload, decodePayload, isWireNode } from "./core/wire/codec";
export type { WireNode, Payload } from "./core/wire/types";
export { createSerializer, selectSerializer, type Serializer } from "./core/pool/serializer";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION, ERRORS & TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export {
  FerryError,
  isFailureReason,
  unsupportedObject,
  refusedByPolicy,
  corruptPayload,
  lookupFailed,
  type FailureReason,
} from "./core/errors";
export type { TraceEvent, TraceSink } from "./ports/trace";
export { nullSink, consoleSink, collectingSink, loggingSerializer, type CollectingSink } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

import { Runtime } from "./runtime";

let defaultRuntime: Runtime | undefined;

/**
 * Process-wide runtime, configured from the environment on first use.
 */
export function getDefaultRuntime(): Runtime {
  defaultRuntime ??= Runtime.fromEnvironment();
  return defaultRuntime;
}

export function dumps(value: unknown): Buffer {
  return getDefaultRuntime().dumps(value);
}

export function loads(bytes: Uint8Array): unknown {
  return getDefaultRuntime().loads(bytes);
}

export function registerByValue(module: string): void {
  getDefaultRuntime().registerByValue(module);
}

export function unregisterByValue(module: string): void {
  getDefaultRuntime().unregisterByValue(module);
}
