// src/core/reduce/reconstructors.ts
// The load-side functions reconstruction descriptors name

import { Readable } from "node:stream";
import { corruptPayload } from "../errors";
import { Cell, isCell } from "../objects/cell";
import { compileUnit } from "../objects/code";
import { boundMethod, createNamespace, type Namespace } from "../objects/functions";
import { intrinsicByName } from "../objects/natives";
import type { ModuleRegistry } from "../modules/registry";
import { readFunctionShape, readFunctionState, type FunctionCapsule } from "./capsule";
import { readSkeletonShape, type SkeletonBuilder } from "./skeleton";
import { applyPropertyEntries, readPropertyEntries } from "./types";

/** Stands for "no value" in the state of an empty cell. */
export const EMPTY_CELL: object = Object.freeze(Object.create(null));

export type ReconstructorDeps = {
  modules: ModuleRegistry;
  skeletons: SkeletonBuilder;
  capsule: FunctionCapsule;
};

const BUFFER_ENCODINGS = new Set<string>(["utf8", "utf-8", "ascii", "latin1", "binary", "base64", "base64url", "hex", "ucs2", "utf16le"]);

function isEncoding(x: unknown): x is BufferEncoding {
  return typeof x === "string" && BUFFER_ENCODINGS.has(x);
}

function expectObject(x: unknown, what: string): object {
  if (x === null || (typeof x !== "object" && typeof x !== "function")) throw corruptPayload(`${what} must be an object`);
  return x;
}

function expectFunction(x: unknown, what: string): Function {
  if (typeof x !== "function") throw corruptPayload(`${what} must be a function`);
  return x;
}

function expectString(x: unknown, what: string): string {
  if (typeof x !== "string") throw corruptPayload(`${what} must be a string`);
  return x;
}

/**
 * The namespace of the reconstruction module of one runtime. Functions
 * that create or look up modules, classes and functions act on `deps`.
 */
export function createReconstructors(deps: ReconstructorDeps): Namespace {
  const { modules, skeletons, capsule } = deps;
  const ns = createNamespace();

  ns.EMPTY_CELL = EMPTY_CELL;

  ns.makeCell = () => new Cell();
  ns.setCell = (target: unknown, value: unknown) => {
    if (!isCell(target)) throw corruptPayload("cell state applied to a non-cell");
    if (value === EMPTY_CELL) {
      target.clear();
    } else {
      target.value = value;
    }
  };

  ns.compileUnit = (source: unknown, freevars: unknown) => {
    if (!Array.isArray(freevars) || !freevars.every(v => typeof v === "string")) {
      throw corruptPayload("unit freevars must be a list of names");
    }
    return compileUnit(expectString(source, "unit source"), freevars);
  };

  ns.createNamespace = () => createNamespace();

  ns.makeFunction = (shape: unknown) => capsule.makeShell(readFunctionShape(shape));
  ns.restoreFunction = (fn: unknown, state: unknown) => {
    capsule.restore(expectFunction(fn, "function"), readFunctionState(state));
  };

  ns.makeSkeleton = (shape: unknown) => skeletons.begin(readSkeletonShape(shape)).target;
  ns.fillSkeleton = (target: unknown, body: unknown) => {
    skeletons.commit(expectFunction(target, "class"), body);
  };

  ns.createInstance = (ctor: unknown) => {
    const proto: unknown = Reflect.get(expectFunction(ctor, "constructor"), "prototype");
    return Object.create(proto === null || typeof proto === "object" ? proto : null);
  };
  ns.assignProperties = (target: unknown, entries: unknown) => {
    applyPropertyEntries(expectObject(target, "instance"), readPropertyEntries(entries, "instance properties"));
  };

  ns.getAttribute = (owner: unknown, name: unknown) => {
    const key = expectString(name, "attribute name");
    const target = expectObject(owner, "attribute owner");
    if (!(key in target)) throw corruptPayload(`no attribute '${key}'`);
    return Reflect.get(target, key);
  };

  ns.bindMethod = (target: unknown, key: unknown) =>
    boundMethod(expectObject(target, "bound method target"), expectString(key, "method name"));

  ns.importModule = (name: unknown) => modules.import(expectString(name, "module name"));
  ns.makeDynamicModule = (name: unknown) => {
    const moduleName = expectString(name, "module name");
    const namespace = createNamespace();
    if (!modules.has(moduleName)) modules.register(moduleName, namespace, "dynamic");
    return namespace;
  };
  ns.fillModule = (namespace: unknown, vars: unknown) => {
    const target = expectObject(namespace, "module");
    const source = expectObject(vars, "module variables");
    for (const key of Object.keys(source)) Reflect.set(target, key, Reflect.get(source, key));
  };

  ns.makeWeakRef = (target: unknown) => new WeakRef(expectObject(target, "weak reference target"));

  ns.readableFrom = (content: unknown, encoding: unknown) => {
    if (!Buffer.isBuffer(content)) throw corruptPayload("stream content must be bytes");
    const stream = new Readable({ read() {}, encoding: isEncoding(encoding) ? encoding : undefined });
    if (content.length > 0) stream.push(content);
    stream.push(null);
    return stream;
  };

  ns.makeURL = (href: unknown) => new URL(expectString(href, "URL"));
  ns.makeURLSearchParams = (text: unknown) => new URLSearchParams(expectString(text, "search parameters"));
  ns.makeDataView = (buffer: unknown, offset: unknown, length: unknown) => {
    if (!(buffer instanceof ArrayBuffer) || typeof offset !== "number" || typeof length !== "number") {
      throw corruptPayload("malformed DataView");
    }
    return new DataView(buffer, offset, length);
  };
  ns.makeAbortController = (aborted: unknown, reason: unknown) => {
    const controller = new AbortController();
    if (aborted === true) controller.abort(reason);
    return controller;
  };

  ns.makeError = (ctor: unknown, message: unknown) => {
    const made: unknown = Reflect.construct(expectFunction(ctor, "error constructor"), [expectString(message, "error message")]);
    return expectObject(made, "error");
  };
  ns.restoreError = (err: unknown, state: unknown) => {
    const target = expectObject(err, "error");
    const stack: unknown = Reflect.get(expectObject(state, "error state"), "stack");
    const cause: unknown = Reflect.get(expectObject(state, "error state"), "cause");
    if (typeof stack === "string") {
      Object.defineProperty(target, "stack", { value: stack, writable: true, configurable: true });
    }
    if (cause !== undefined) {
      Object.defineProperty(target, "cause", { value: cause, writable: true, configurable: true });
    }
  };

  ns.intrinsic = (name: unknown) => {
    const found = intrinsicByName(expectString(name, "intrinsic name"));
    if (!found) throw corruptPayload(`unknown intrinsic ${String(name)}`);
    return found;
  };

  return ns;
}
