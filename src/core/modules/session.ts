// src/core/modules/session.ts
// Interactive evaluation of source text into a module namespace

import vm from "node:vm";
import ts from "typescript";
import { topLevelBindings } from "../analysis/globals";
import { codeOf, isNativeSource, sourceOf } from "../objects/code";
import { attachRecord, createCellScope, createIntrinsics, createNamespace, recordOf } from "../objects/functions";
import { declareOrigin, originOf } from "../objects/origin";
import type { ModuleOrigin, ModuleRegistry } from "./registry";

export type ExecOptions = {
  /** Origin used when the module does not exist yet. */
  origin?: ModuleOrigin;
  /** Values assigned into the namespace before the source runs. */
  globals?: Record<string, unknown>;
};

type Edit = { start: number; end: number; text: string };

/**
 * Rewrite top-level declarations into assignments so they land in the
 * namespace. Function declarations stay hoisted.
 */
function rewriteTopLevel(source: string): string {
  const file = ts.createSourceFile("module.js", source, ts.ScriptTarget.Latest, true, ts.ScriptKind.JS);
  const hoisted: string[] = [];
  const edits: Edit[] = [];
  const textOf = (node: ts.Node) => source.slice(node.getStart(file), node.end);

  for (const stmt of file.statements) {
    const start = stmt.getStart(file);
    if (ts.isFunctionDeclaration(stmt) && stmt.name) {
      hoisted.push(`${stmt.name.text} = ${textOf(stmt)};`);
      edits.push({ start, end: stmt.end, text: "" });
    } else if (ts.isClassDeclaration(stmt) && stmt.name) {
      edits.push({ start, end: stmt.end, text: `${stmt.name.text} = ${textOf(stmt)};` });
    } else if (ts.isVariableStatement(stmt)) {
      const parts: string[] = [];
      for (const decl of stmt.declarationList.declarations) {
        if (!decl.initializer) continue;
        const target = textOf(decl.name);
        const value = textOf(decl.initializer);
        parts.push(ts.isIdentifier(decl.name) ? `${target} = ${value};` : `(${target} = ${value});`);
      }
      edits.push({ start, end: stmt.end, text: parts.join(" ") });
    }
  }

  let out = source;
  for (const edit of edits.reverse()) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return `${hoisted.join("\n")}\n${out}`;
}

function recordDefinition(value: unknown, namespace: object, module: string, qualname: string): void {
  if (typeof value !== "function" || recordOf(value)) return;
  if (isNativeSource(sourceOf(value))) return;
  attachRecord(value, { code: codeOf(value), globals: namespace, cells: createCellScope(), module, qualname });
  if (!originOf(value)) declareOrigin(value, { module, qualname });
}

/**
 * Evaluate source in a module's namespace, creating the module if needed.
 * Top-level declarations become namespace entries, read and written through
 * the namespace by every function defined here; each top-level function or
 * class is recorded under its module and name. Returns the namespace.
 */
export function execModule(
  modules: ModuleRegistry,
  source: string,
  module: string,
  options: ExecOptions = {}
): object {
  const namespace = modules.get(module)?.namespace ?? modules.register(module, createNamespace(), options.origin ?? "dynamic").namespace;
  for (const [key, value] of Object.entries(options.globals ?? {})) {
    Reflect.set(namespace, key, value);
  }

  const names = topLevelBindings(source);
  for (const name of names) {
    if (!(name in namespace)) Reflect.set(namespace, name, undefined);
  }

  const wrapper = [
    "(function (__ferry_intrinsics__, __ferry_globals__) {",
    "with (__ferry_intrinsics__) { with (__ferry_globals__) {",
    rewriteTopLevel(source),
    "} }",
    "})",
  ].join("\n");
  const factory: unknown = vm.runInThisContext(wrapper, { filename: `ferry:${module}` });
  if (typeof factory !== "function") throw new TypeError(`module ${module} did not compile`);
  Reflect.apply(factory, undefined, [createIntrinsics(namespace, module), namespace]);

  for (const name of names) {
    recordDefinition(Reflect.get(namespace, name), namespace, module, name);
  }
  return namespace;
}
