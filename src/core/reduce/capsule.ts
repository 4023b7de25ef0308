// src/core/reduce/capsule.ts
// Capture and restore of the execution context of functions and classes

import type { GlobalsExtractor } from "../analysis/globals";
import { corruptPayload, unsupportedObject } from "../errors";
import { isCell, type Cell } from "../objects/cell";
import { CodeUnit, codeOf, declaredMembers } from "../objects/code";
import { describeObject } from "../objects/describe";
import type { EnumType } from "../objects/enums";
import {
  attachRecord,
  createNamespace,
  emptyCellScope,
  instantiate,
  recordOf,
  type FunctionRecord,
  type Namespace,
} from "../objects/functions";
import { declareOrigin, originOf } from "../objects/origin";
import type { ModuleRegistry } from "../modules/registry";
import type { TraceSink } from "../../ports/trace";
import type { ClassBody, ClassShape, EnumBody, EnumShape } from "./skeleton";
import {
  NamespaceShell,
  applyPropertyEntries,
  propertyEntries,
  readPropertyEntries,
  reconstructor,
  type PropertyEntry,
  type Reduction,
  type ReduceSession,
} from "./types";

export type FunctionShape = {
  code: CodeUnit;
  name: string;
  /** Shared shell of the source namespace; absent for functions that only read process globals. */
  namespace?: object;
  module?: string;
  qualname: string;
};

export type FunctionState = {
  attributes: PropertyEntry[];
  globals: Namespace;
  cells: Cell[];
  /** Namespaces of submodules reached only through attribute access. */
  submodules: object[];
};

const FUNCTION_BUILTINS = new Set(["length", "name", "prototype", "arguments", "caller"]);
const CLASS_BUILTINS = new Set(["length", "name", "prototype"]);

type CapturedContext = { globals: Namespace; submodules: object[] };

export class FunctionCapsule {
  constructor(
    private readonly extractor: GlobalsExtractor,
    private readonly modules: ModuleRegistry,
    private readonly trace: TraceSink
  ) {}

  // ─────────────────────────────────────────────────────────────────
  // Capture
  // ─────────────────────────────────────────────────────────────────

  /**
   * Globals the unit uses that are own entries of its namespace, and the
   * submodules it reaches through attributes. A function without a record
   * resolves every free name against the process globals.
   */
  captureContext(target: Function, code: CodeUnit, record: FunctionRecord | undefined): CapturedContext {
    const { globals: names } = this.extractor.analyze(code);
    const captured: CapturedContext = { globals: createNamespace(), submodules: [] };
    const namespace = record?.globals;

    if (!namespace) {
      const missing = names.filter(name => !(name in globalThis));
      if (missing.length > 0) {
        throw unsupportedObject(
          describeObject(target),
          `free names ${missing.join(", ")} have no known namespace; define it with exec() or declare it with closure()`
        );
      }
      return captured;
    }

    for (const name of names) {
      if (Object.prototype.hasOwnProperty.call(namespace, name)) {
        captured.globals[name] = Reflect.get(namespace, name);
      }
    }
    const deps = this.modules.entries().filter(m => this.isPackageGlobal(captured.globals, m.name));
    captured.submodules = this.extractor.findImportedSubmodules(code, deps).map(m => m.namespace);
    return captured;
  }

  /**
   * Whether `name` is a submodule of a package the unit holds as a global:
   * the global named after the head segment is that package's namespace.
   */
  private isPackageGlobal(globals: Namespace, name: string): boolean {
    const [head] = name.split("/");
    if (!name.startsWith(`${head}/`)) return false;
    const pkg = globals[head];
    if (pkg === null || (typeof pkg !== "object" && typeof pkg !== "function")) return false;
    return this.modules.nameOf(pkg) === head;
  }

  private cellsOf(code: CodeUnit, record: FunctionRecord | undefined): Cell[] {
    return code.freevars.map(name => {
      const c = record?.cells[name];
      if (!c) throw unsupportedObject(`closure variable ${name}`, "has no cell");
      return c;
    });
  }

  capture(fn: Function, session: ReduceSession): Reduction {
    const record = recordOf(fn);
    const code = record?.code ?? codeOf(fn);
    const context = this.captureContext(fn, code, record);
    const state: FunctionState = {
      attributes: propertyEntries(fn, FUNCTION_BUILTINS),
      globals: context.globals,
      cells: this.cellsOf(code, record),
      submodules: context.submodules,
    };
    const shape: FunctionShape = {
      code,
      name: fn.name,
      namespace: record?.globals ? session.namespaceShell(record.globals) : undefined,
      module: record?.module ?? originOf(fn)?.module,
      qualname: record?.qualname ?? fn.name,
    };
    this.trace.emit({
      tag: "E_Capture",
      target: describeObject(fn),
      globals: Object.keys(state.globals).length,
      cells: state.cells.length,
      submodules: state.submodules.length,
    });
    return { fn: reconstructor("makeFunction"), args: [shape], state, restore: reconstructor("restoreFunction") };
  }

  captureClass(cls: Function, session: ReduceSession): Reduction {
    const record = recordOf(cls);
    const code = record?.code ?? codeOf(cls);
    const trackingId = session.tracker.trackingId(cls);
    this.trace.emit({ tag: "E_TrackClass", target: describeObject(cls), trackingId });

    const declared = declaredMembers(code);
    const proto: unknown = Reflect.get(cls, "prototype");
    const context = this.captureContext(cls, code, record);
    const shape: ClassShape = {
      kind: "class",
      trackingId,
      name: cls.name,
      code,
      base: code.extendsBase ? Object.getPrototypeOf(cls) : undefined,
      namespace: record?.globals ? session.namespaceShell(record.globals) : new NamespaceShell(),
      module: record?.module ?? originOf(cls)?.module,
      qualname: record?.qualname ?? originOf(cls)?.qualname ?? cls.name,
    };
    const body: ClassBody = {
      globals: context.globals,
      cells: this.cellsOf(code, record),
      statics: propertyEntries(cls, new Set([...CLASS_BUILTINS, ...declared.statics])),
      members:
        proto !== null && typeof proto === "object"
          ? propertyEntries(proto, new Set(["constructor", ...declared.instance]))
          : [],
    };
    return { fn: reconstructor("makeSkeleton"), args: [shape], state: body, restore: reconstructor("fillSkeleton") };
  }

  captureEnum(cls: EnumType, session: ReduceSession): Reduction {
    const trackingId = session.tracker.trackingId(cls);
    this.trace.emit({ tag: "E_TrackClass", target: describeObject(cls), trackingId });

    const memberNames = new Set<string>();
    const members: Array<[string, string | number]> = [];
    for (const member of cls.members.values()) {
      memberNames.add(member.name);
      members.push([member.name, member.value]);
    }
    const origin = originOf(cls);
    const shape: EnumShape = {
      kind: "enum",
      trackingId,
      name: cls.name,
      module: origin?.module,
      qualname: origin?.qualname ?? cls.name,
    };
    const body: EnumBody = {
      members,
      statics: propertyEntries(cls, new Set([...CLASS_BUILTINS, ...memberNames])),
    };
    return { fn: reconstructor("makeSkeleton"), args: [shape], state: body, restore: reconstructor("fillSkeleton") };
  }

  // ─────────────────────────────────────────────────────────────────
  // Restore
  // ─────────────────────────────────────────────────────────────────

  /**
   * A function with the right unit and an empty namespace and cells. The
   * decoder memoizes it before its state is decoded, so self-references
   * in the state resolve to this shell.
   */
  makeShell(shape: FunctionShape): Function {
    const globals = shape.namespace ?? createNamespace();
    const cells = emptyCellScope(shape.code.freevars);
    const fn = instantiate(shape.code, { globals, cells, module: shape.module });
    if (fn.name !== shape.name) {
      Object.defineProperty(fn, "name", { value: shape.name, configurable: true });
    }
    attachRecord(fn, {
      code: shape.code,
      globals: shape.namespace,
      cells,
      module: shape.module,
      qualname: shape.qualname,
    });
    if (shape.module) declareOrigin(fn, { module: shape.module, qualname: shape.qualname });
    return fn;
  }

  /**
   * Attributes go through ordinary property definition; the namespace and
   * cell scope are repopulated in place.
   */
  restore(fn: Function, state: FunctionState): void {
    const record = recordOf(fn);
    if (!record) throw corruptPayload(`${describeObject(fn)} is not a rebuilt function`);
    if (state.cells.length !== record.code.freevars.length) {
      throw corruptPayload(`${describeObject(fn)}: expected ${record.code.freevars.length} closure cells`);
    }

    applyPropertyEntries(fn, state.attributes);
    if (record.globals) {
      for (const [key, value] of Object.entries(state.globals)) {
        Reflect.set(record.globals, key, value);
      }
    }
    record.code.freevars.forEach((name, i) => {
      record.cells[name] = state.cells[i];
    });
  }
}

// ─────────────────────────────────────────────────────────────────
// Decoded value checks
// ─────────────────────────────────────────────────────────────────

export function readFunctionShape(x: unknown): FunctionShape {
  if (x === null || typeof x !== "object") throw corruptPayload("function shape must be an object");
  const code: unknown = Reflect.get(x, "code");
  const name: unknown = Reflect.get(x, "name");
  const namespace: unknown = Reflect.get(x, "namespace");
  const module: unknown = Reflect.get(x, "module");
  const qualname: unknown = Reflect.get(x, "qualname");
  if (!(code instanceof CodeUnit)) throw corruptPayload("function shape has no compiled unit");
  if (typeof name !== "string" || typeof qualname !== "string") throw corruptPayload("function shape has no name");
  if (namespace !== undefined && (namespace === null || typeof namespace !== "object")) {
    throw corruptPayload("function namespace must be an object");
  }
  if (module !== undefined && typeof module !== "string") throw corruptPayload("function module must be a string");
  return { code, name, namespace, module, qualname };
}

export function readFunctionState(x: unknown): FunctionState {
  if (x === null || typeof x !== "object") throw corruptPayload("function state must be an object");
  const globalsIn: unknown = Reflect.get(x, "globals");
  const cellsIn: unknown = Reflect.get(x, "cells");
  const submodules: unknown = Reflect.get(x, "submodules");
  if (globalsIn === null || typeof globalsIn !== "object") throw corruptPayload("function globals must be an object");
  if (!Array.isArray(cellsIn) || !Array.isArray(submodules)) throw corruptPayload("function state is incomplete");

  const globals = createNamespace();
  for (const key of Object.keys(globalsIn)) globals[key] = Reflect.get(globalsIn, key);
  const cells = cellsIn.map(c => {
    if (!isCell(c)) throw corruptPayload("closure cell expected");
    return c;
  });
  return {
    attributes: readPropertyEntries(Reflect.get(x, "attributes"), "function attributes"),
    globals,
    cells,
    submodules: submodules.filter((m): m is object => m !== null && typeof m === "object"),
  };
}
