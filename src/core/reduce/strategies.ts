// src/core/reduce/strategies.ts
// Strategies for runtime-internal types

import fs from "node:fs";
import { StringDecoder } from "node:string_decoder";
import { refusedByPolicy, unsupportedObject } from "../errors";
import { Cell } from "../objects/cell";
import { CodeUnit } from "../objects/code";
import { describeObject } from "../objects/describe";
import { EnumMember, enumClassOf } from "../objects/enums";
import { singletonPathOf } from "../objects/natives";
import { DispatchTable } from "./dispatch";
import { ImportPath, NamespaceShell, reconstructor, type Reduced, type ReduceSession } from "./types";

const BUILTIN_ERRORS: readonly Function[] = [
  Error,
  TypeError,
  RangeError,
  SyntaxError,
  ReferenceError,
  EvalError,
  URIError,
];

function isBuiltinError(obj: object): obj is Error {
  const proto: unknown = Object.getPrototypeOf(obj);
  return obj instanceof Error && BUILTIN_ERRORS.some(ctor => Reflect.get(ctor, "prototype") === proto);
}

function tagOf(obj: object): string {
  return Object.prototype.toString.call(obj);
}

function isGeneratorObject(obj: object): obj is Generator | AsyncGenerator {
  const tag = tagOf(obj);
  return tag === "[object Generator]" || tag === "[object AsyncGenerator]";
}

// ─────────────────────────────────────────────────────────────────
// Modules and singletons
// ─────────────────────────────────────────────────────────────────

function moduleVariables(namespace: object): Record<string, unknown> {
  const vars: Record<string, unknown> = Object.create(null);
  for (const key of Object.keys(namespace)) vars[key] = Reflect.get(namespace, key);
  return vars;
}

/**
 * Importable modules travel by name; entry, dynamic and by-value modules
 * are rebuilt with their variables.
 */
function reduceModule(obj: object, session: ReduceSession): Reduced | undefined {
  const name = session.modules.nameOf(obj);
  const record = name === undefined ? undefined : session.modules.get(name);
  if (!name || !record) return undefined;

  const importable = record.origin === "builtin" || (record.origin === "file" && !session.policy.has(name));
  if (importable) return { fn: reconstructor("importModule"), args: [name] };
  return {
    fn: reconstructor("makeDynamicModule"),
    args: [name],
    state: moduleVariables(obj),
    restore: reconstructor("fillModule"),
  };
}

function reduceSingleton(obj: object): Reduced | undefined {
  const path = singletonPathOf(obj);
  return path ? new ImportPath("builtins", path) : undefined;
}

// ─────────────────────────────────────────────────────────────────
// Streams
// ─────────────────────────────────────────────────────────────────

function numberField(obj: object, key: string): number | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" ? value : undefined;
}

function filePathOf(stream: fs.ReadStream): string | undefined {
  const raw: unknown = stream.path;
  const file = typeof raw === "string" ? raw : Buffer.isBuffer(raw) ? raw.toString() : "";
  return file === "" ? undefined : file;
}

/**
 * Bytes the reader has not received yet, counted back from `bytesRead`:
 * data buffered by the stream, and for a decoding stream also the bytes
 * its decoder holds back as an incomplete character.
 */
function undeliveredBytes(stream: fs.ReadStream, read: Buffer): number {
  const encoding = stream.readableEncoding;
  if (encoding === null) return stream.readableLength;

  const decoded = new StringDecoder(encoding).write(read);
  const held = read.length - Buffer.byteLength(decoded, encoding);
  const buffered = decoded.slice(decoded.length - stream.readableLength);
  return held + Buffer.byteLength(buffered, encoding);
}

/**
 * The content not yet delivered to the reader, read from the stream's file.
 */
function reduceReadStream(stream: fs.ReadStream): Reduced {
  if (stream.destroyed) {
    throw unsupportedObject(describeObject(stream), "the stream is closed");
  }
  const file = filePathOf(stream);
  if (file === undefined) {
    throw unsupportedObject(describeObject(stream), "the stream was opened from a descriptor and has no file path");
  }
  const start = numberField(stream, "start") ?? 0;
  const end = numberField(stream, "end") ?? Infinity;

  let content: Buffer;
  try {
    content = fs.readFileSync(file);
  } catch (err) {
    throw unsupportedObject(describeObject(stream), `cannot read ${file}`, err);
  }
  const read = content.subarray(start, start + stream.bytesRead);
  const from = start + Math.max(stream.bytesRead - undeliveredBytes(stream, read), 0);
  const to = end === Infinity ? content.length : Math.min(end + 1, content.length);
  return {
    fn: reconstructor("readableFrom"),
    args: [Buffer.from(content.subarray(from, Math.max(from, to))), stream.readableEncoding],
  };
}

// ─────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────

export function createDispatchTable(): DispatchTable {
  const table = new DispatchTable();

  table.registerIdentity(reduceModule);
  table.registerIdentity(reduceSingleton);

  table.register(Cell, c => ({
    fn: reconstructor("makeCell"),
    args: [],
    state: c.isEmpty ? reconstructor("EMPTY_CELL") : c.value,
    restore: reconstructor("setCell"),
  }));

  table.register(CodeUnit, unit => ({ fn: reconstructor("compileUnit"), args: [unit.source, [...unit.freevars]] }));

  table.register(NamespaceShell, () => ({ fn: reconstructor("createNamespace"), args: [] }));

  table.register(WeakRef, ref => {
    const target = ref.deref();
    if (target === undefined) throw unsupportedObject("WeakRef", "its target was collected");
    return { fn: reconstructor("makeWeakRef"), args: [target] };
  });

  table.register(WeakMap, () => {
    throw unsupportedObject("WeakMap", "its entries cannot be enumerated");
  });

  table.register(WeakSet, () => {
    throw unsupportedObject("WeakSet", "its entries cannot be enumerated");
  });

  table.register(fs.ReadStream, reduceReadStream);

  table.register(fs.WriteStream, stream => {
    throw refusedByPolicy(describeObject(stream), `write stream to ${String(stream.path)}`);
  });

  table.register(Promise, () => {
    throw refusedByPolicy("Promise", "pending computations cannot be transferred");
  });

  table.registerPredicate(isGeneratorObject, gen => {
    throw refusedByPolicy(describeObject(gen), "suspended generators cannot be transferred");
  });

  table.register(URL, url => ({ fn: reconstructor("makeURL"), args: [url.href] }));

  table.register(URLSearchParams, params => ({ fn: reconstructor("makeURLSearchParams"), args: [params.toString()] }));

  table.register(DataView, view => ({
    fn: reconstructor("makeDataView"),
    args: [view.buffer, view.byteOffset, view.byteLength],
  }));

  table.register(AbortController, controller => ({
    fn: reconstructor("makeAbortController"),
    args: [controller.signal.aborted, controller.signal.aborted ? controller.signal.reason : undefined],
  }));

  table.registerPredicate(isBuiltinError, err => ({
    fn: reconstructor("makeError"),
    args: [err.constructor, err.message],
    state: { stack: err.stack, cause: err.cause },
    restore: reconstructor("restoreError"),
  }));

  table.registerPredicate(
    (obj: object): obj is EnumMember => obj instanceof EnumMember,
    member => {
      const cls = enumClassOf(member);
      if (!cls) throw unsupportedObject(describeObject(member), "its enum class is not registered");
      return { fn: reconstructor("getAttribute"), args: [cls, member.name] };
    }
  );

  return table;
}
