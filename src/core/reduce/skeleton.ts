// src/core/reduce/skeleton.ts
// Two-phase reconstruction of dynamic classes and enums: shell first, body later

import { corruptPayload } from "../errors";
import { isCell, type Cell } from "../objects/cell";
import { CodeUnit } from "../objects/code";
import { addEnumMember, createEnumShell, isEnumClass, type EnumValue } from "../objects/enums";
import { attachRecord, emptyCellScope, instantiate, recordOf } from "../objects/functions";
import { declareOrigin } from "../objects/origin";
import type { TraceSink } from "../../ports/trace";
import { applyPropertyEntries, readPropertyEntries, type PropertyEntry } from "./types";
import type { ClassTracker } from "./tracker";

export type ClassShape = {
  kind: "class";
  trackingId: string;
  name: string;
  code: CodeUnit;
  /** The superclass, when the class has an `extends` clause. */
  base?: unknown;
  namespace: object;
  module?: string;
  qualname: string;
};

export type EnumShape = {
  kind: "enum";
  trackingId: string;
  name: string;
  module?: string;
  qualname: string;
};

export type SkeletonShape = ClassShape | EnumShape;

export type ClassBody = {
  globals: Record<string, unknown>;
  /** Closure cells in the unit's freevars order. */
  cells: Cell[];
  statics: PropertyEntry[];
  members: PropertyEntry[];
};

export type EnumBody = {
  members: Array<[string, EnumValue]>;
  statics: PropertyEntry[];
};

export type SkeletonHandle = { target: Function; fresh: boolean };

// ─────────────────────────────────────────────────────────────────
// Decoded value checks
// ─────────────────────────────────────────────────────────────────

function optionalString(x: unknown, what: string): string | undefined {
  if (x === undefined || x === null) return undefined;
  if (typeof x !== "string") throw corruptPayload(`${what} must be a string`);
  return x;
}

function requiredString(x: unknown, what: string): string {
  if (typeof x !== "string") throw corruptPayload(`${what} must be a string`);
  return x;
}

export function readSkeletonShape(x: unknown): SkeletonShape {
  if (x === null || typeof x !== "object") throw corruptPayload("skeleton shape must be an object");
  const kind: unknown = Reflect.get(x, "kind");
  const trackingId = requiredString(Reflect.get(x, "trackingId"), "tracking id");
  const name = requiredString(Reflect.get(x, "name"), "class name");
  const module = optionalString(Reflect.get(x, "module"), "module name");
  const qualname = requiredString(Reflect.get(x, "qualname"), "qualified name");

  if (kind === "enum") return { kind, trackingId, name, module, qualname };
  if (kind !== "class") throw corruptPayload(`unknown skeleton kind ${String(kind)}`);

  const code: unknown = Reflect.get(x, "code");
  const namespace: unknown = Reflect.get(x, "namespace");
  if (!(code instanceof CodeUnit) || code.kind !== "class") throw corruptPayload(`class ${name} has no class unit`);
  if (namespace === null || typeof namespace !== "object") throw corruptPayload(`class ${name} has no namespace`);
  return { kind, trackingId, name, code, base: Reflect.get(x, "base"), namespace, module, qualname };
}

function readCells(x: unknown, count: number, what: string): Cell[] {
  if (!Array.isArray(x) || x.length !== count) throw corruptPayload(`${what}: expected ${count} closure cells`);
  return x.map(c => {
    if (!isCell(c)) throw corruptPayload(`${what}: closure cell expected`);
    return c;
  });
}

function readGlobals(x: unknown, what: string): Array<[string, unknown]> {
  if (x === null || typeof x !== "object") throw corruptPayload(`${what}: globals must be an object`);
  return Object.keys(x).map(key => [key, Reflect.get(x, key)]);
}

// ─────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────

/**
 * begin() returns either a fresh shell, registered under the carried
 * tracking id, or the class already registered under that id. commit()
 * fills a fresh shell once; for an existing class it does nothing.
 */
export class SkeletonBuilder {
  private pending: WeakSet<Function> = new WeakSet();

  constructor(
    private readonly tracker: ClassTracker,
    private readonly trace: TraceSink
  ) {}

  begin(shape: SkeletonShape): SkeletonHandle {
    const existing = this.tracker.lookup(shape.trackingId);
    if (existing) {
      const compatible = (shape.kind === "enum") === isEnumClass(existing) && existing.name === shape.name;
      if (!compatible) {
        throw corruptPayload(
          `tracking id ${shape.trackingId} is bound to ${existing.name}, incompatible with ${shape.kind} ${shape.name}`
        );
      }
      this.trace.emit({ tag: "E_Skeleton", target: shape.name, trackingId: shape.trackingId, fresh: false });
      return { target: existing, fresh: false };
    }

    const shell = shape.kind === "enum" ? createEnumShell(shape.name) : this.classShell(shape);
    this.tracker.lookupOrTrack(shape.trackingId, shell);
    this.pending.add(shell);
    if (shape.module) declareOrigin(shell, { module: shape.module, qualname: shape.qualname });
    this.trace.emit({ tag: "E_Skeleton", target: shape.name, trackingId: shape.trackingId, fresh: true });
    return { target: shell, fresh: true };
  }

  isPending(target: Function): boolean {
    return this.pending.has(target);
  }

  commit(target: Function, body: unknown): void {
    if (!this.pending.has(target)) return;
    this.pending.delete(target);
    if (isEnumClass(target)) {
      this.fillEnum(target, body);
    } else {
      this.fillClass(target, body);
    }
  }

  private classShell(shape: ClassShape): Function {
    const { code } = shape;
    if (code.extendsBase && typeof shape.base !== "function" && shape.base !== null) {
      throw corruptPayload(`class ${shape.name} extends a value that is not a class`);
    }
    const cells = emptyCellScope(code.freevars);
    const cls = instantiate(code, { globals: shape.namespace, cells, base: shape.base, module: shape.module });
    attachRecord(cls, { code, globals: shape.namespace, cells, module: shape.module, qualname: shape.qualname });
    return cls;
  }

  private fillClass(cls: Function, body: unknown): void {
    const record = recordOf(cls);
    if (!record || body === null || typeof body !== "object") {
      throw corruptPayload(`class ${cls.name} cannot be filled`);
    }
    const what = `class ${cls.name}`;
    const cells = readCells(Reflect.get(body, "cells"), record.code.freevars.length, what);
    record.code.freevars.forEach((name, i) => {
      record.cells[name] = cells[i];
    });
    if (record.globals) {
      for (const [key, value] of readGlobals(Reflect.get(body, "globals"), what)) {
        Reflect.set(record.globals, key, value);
      }
    }
    applyPropertyEntries(cls, readPropertyEntries(Reflect.get(body, "statics"), what));
    const proto: unknown = Reflect.get(cls, "prototype");
    if (proto !== null && typeof proto === "object") {
      applyPropertyEntries(proto, readPropertyEntries(Reflect.get(body, "members"), what));
    }
  }

  private fillEnum(cls: Function, body: unknown): void {
    if (!isEnumClass(cls) || body === null || typeof body !== "object") {
      throw corruptPayload(`enum ${cls.name} cannot be filled`);
    }
    const members: unknown = Reflect.get(body, "members");
    if (!Array.isArray(members)) throw corruptPayload(`enum ${cls.name}: member list expected`);
    for (const pair of members) {
      const [name, value]: unknown[] = Array.isArray(pair) ? pair : [];
      if (typeof name !== "string" || (typeof value !== "string" && typeof value !== "number")) {
        throw corruptPayload(`enum ${cls.name}: malformed member`);
      }
      addEnumMember(cls, name, value);
    }
    applyPropertyEntries(cls, readPropertyEntries(Reflect.get(body, "statics"), `enum ${cls.name}`));
  }
}
