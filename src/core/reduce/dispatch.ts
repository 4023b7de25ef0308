// src/core/reduce/dispatch.ts
// Override hook and per-type strategy table consulted for every outgoing object

import { refusedByPolicy, unsupportedObject } from "../errors";
import { codeOf, isNativeSource, sourceOf } from "../objects/code";
import { describeObject } from "../objects/describe";
import { isEnumClass } from "../objects/enums";
import { boundMethodOf, isMarkedCoroutine, recordOf } from "../objects/functions";
import { intrinsicNameOf } from "../objects/natives";
import type { TraceSink } from "../../ports/trace";
import type { FunctionCapsule } from "./capsule";
import {
  ImportPath,
  propertyEntries,
  reconstructor,
  type PropertyEntry,
  type Reduced,
  type Reduction,
  type ReduceSession,
} from "./types";

export type Reducer<T> = (obj: T, session: ReduceSession) => Reduced;

type Matcher = (obj: object, session: ReduceSession) => Reduced | undefined;

/** Bases whose instances are rebuilt correctly without their constructor running. */
const PLAIN_NATIVE_BASES: ReadonlySet<Function> = new Set([Object, Error]);

function ownConstructor(proto: object): unknown {
  const desc = Object.getOwnPropertyDescriptor(proto, "constructor");
  return desc && "value" in desc ? desc.value : undefined;
}

/** Own properties of an error, with an accessor `stack` read out as text. */
function errorEntries(err: Error): PropertyEntry[] {
  return propertyEntries(err).map((entry): PropertyEntry =>
    entry.key === "stack" && entry.kind === "accessor"
      ? { key: "stack", kind: "data", value: err.stack, enumerable: false, writable: true, configurable: true }
      : entry
  );
}

/**
 * Hand-written strategies for runtime-internal types. Identity matchers run
 * first, then constructor entries along the prototype chain, then predicates.
 */
export class DispatchTable {
  private byConstructor: Map<Function, Matcher> = new Map();
  private identities: Matcher[] = [];
  private predicates: Matcher[] = [];

  register<T extends object>(ctor: new (...args: never) => T, reducer: Reducer<T>): void {
    this.byConstructor.set(ctor, (obj, session) => (obj instanceof ctor ? reducer(obj, session) : undefined));
  }

  registerIdentity(matcher: Matcher): void {
    this.identities.push(matcher);
  }

  registerPredicate<T extends object>(guard: (obj: object) => obj is T, reducer: Reducer<T>): void {
    this.predicates.push((obj, session) => (guard(obj) ? reducer(obj, session) : undefined));
  }

  has(ctor: Function): boolean {
    return this.byConstructor.has(ctor);
  }

  lookup(obj: object, session: ReduceSession): Reduced | undefined {
    for (const matcher of this.identities) {
      const reduced = matcher(obj, session);
      if (reduced) return reduced;
    }

    for (let proto: unknown = Object.getPrototypeOf(obj); proto !== null && typeof proto === "object"; proto = Object.getPrototypeOf(proto)) {
      if (proto === Object.prototype) break;
      const ctor = ownConstructor(proto);
      const matcher = typeof ctor === "function" ? this.byConstructor.get(ctor) : undefined;
      const reduced = matcher?.(obj, session);
      if (reduced) return reduced;
    }

    for (const matcher of this.predicates) {
      const reduced = matcher(obj, session);
      if (reduced) return reduced;
    }
    return undefined;
  }
}

/**
 * Routes functions and classes to the resolver, tracker and capsule, and
 * everything else to the dispatch table. Ordinary data is left to the
 * encoder when both decline.
 */
export class DispatchLayer {
  constructor(
    private readonly capsule: FunctionCapsule,
    private readonly table: DispatchTable,
    private readonly trace: TraceSink
  ) {}

  override(obj: object, session: ReduceSession): Reduced | undefined {
    if (typeof obj !== "function") return undefined;
    if (isMarkedCoroutine(obj)) {
      throw refusedByPolicy(describeObject(obj), "coroutine functions cannot be transferred");
    }

    const bound = boundMethodOf(obj);
    if (bound) {
      return { fn: reconstructor("bindMethod"), args: [bound.target, bound.key] };
    }

    const intrinsic = intrinsicNameOf(obj);
    if (intrinsic) return { fn: reconstructor("intrinsic"), args: [intrinsic] };

    const decision = session.resolver.decide(obj);
    this.trace.emit({
      tag: "E_Resolve",
      target: describeObject(obj),
      decision: decision.kind,
      module: decision.module,
      reason: decision.kind === "value" ? decision.reason : undefined,
    });
    if (decision.kind === "reference") return new ImportPath(decision.module, decision.qualname);

    if (isNativeSource(sourceOf(obj))) {
      throw unsupportedObject(describeObject(obj), "native function with no importable path");
    }
    if (isEnumClass(obj)) return this.capsule.captureEnum(obj, session);

    const code = recordOf(obj)?.code ?? codeOf(obj);
    if (code.kind === "class") return this.capsule.captureClass(obj, session);
    return this.capsule.capture(obj, session);
  }

  dispatch(obj: object, session: ReduceSession): Reduced | undefined {
    return this.table.lookup(obj, session);
  }

  /**
   * Rebuild an instance as `Object.create(prototype)` plus its own properties.
   */
  defaultInstance(obj: object): Reduction {
    const proto: unknown = Object.getPrototypeOf(obj);
    const ctor = proto !== null && typeof proto === "object" ? ownConstructor(proto) : undefined;
    if (typeof ctor !== "function" || Reflect.get(ctor, "prototype") !== proto) {
      throw unsupportedObject(describeObject(obj), "its prototype has no constructor");
    }

    for (let p: unknown = proto; p !== null && typeof p === "object" && p !== Object.prototype; p = Object.getPrototypeOf(p)) {
      const base = ownConstructor(p);
      if (typeof base === "function" && !PLAIN_NATIVE_BASES.has(base) && isNativeSource(sourceOf(base))) {
        throw unsupportedObject(describeObject(obj), `instances of ${base.name} carry internal state`);
      }
    }

    return {
      fn: reconstructor("createInstance"),
      args: [ctor],
      state: obj instanceof Error ? errorEntries(obj) : propertyEntries(obj),
      restore: reconstructor("assignProperties"),
    };
  }
}
