// src/core/analysis/globals.ts
// Global-binding analysis: the external names a compiled unit depends on

import ts from "typescript";
import type { CodeUnit } from "../objects/code";

export type UnitBindings = {
  /** Free names read, written or deleted, in order of first use. Closure variables excluded. */
  globals: readonly string[];
  /** Names used after a `.` in property accesses. */
  attributes: ReadonlySet<string>;
};

/** A module an analysed function was defined against. */
export type ModuleDependency = { name: string };

class Scope {
  readonly names: Set<string> = new Set();
  constructor(readonly parent?: Scope) {}

  has(name: string): boolean {
    for (let s: Scope | undefined = this; s; s = s.parent) {
      if (s.names.has(name)) return true;
    }
    return false;
  }
}

export function bindingNames(name: ts.BindingName, out: Set<string>): void {
  if (ts.isIdentifier(name)) {
    out.add(name.text);
    return;
  }
  for (const element of name.elements) {
    if (!ts.isOmittedExpression(element)) bindingNames(element.name, out);
  }
}

function isBlockScoped(list: ts.VariableDeclarationList): boolean {
  return (list.flags & ts.NodeFlags.BlockScoped) !== 0;
}

/** `var` declarations in a function body, not crossing nested functions or classes. */
function collectVars(node: ts.Node, out: Set<string>): void {
  ts.forEachChild(node, child => {
    if (ts.isFunctionLike(child) || ts.isClassLike(child)) return;
    if (ts.isVariableDeclarationList(child) && !isBlockScoped(child)) {
      for (const decl of child.declarations) bindingNames(decl.name, out);
    }
    collectVars(child, out);
  });
}

function lexicalNames(statements: readonly ts.Statement[], out: Set<string>): void {
  for (const stmt of statements) {
    if (ts.isVariableStatement(stmt) && isBlockScoped(stmt.declarationList)) {
      for (const decl of stmt.declarationList.declarations) bindingNames(decl.name, out);
    } else if ((ts.isClassDeclaration(stmt) || ts.isFunctionDeclaration(stmt)) && stmt.name) {
      out.add(stmt.name.text);
    }
  }
}

type Collected = { globals: string[]; seen: Set<string>; attributes: Set<string> };

/**
 * Whether an identifier is a variable reference, as opposed to a
 * declaration name, property name or label.
 */
function isReference(node: ts.Identifier, collected: Collected): boolean {
  const parent = node.parent;
  if (ts.isShorthandPropertyAssignment(parent)) return parent.name === node;
  if (ts.isPropertyAccessExpression(parent) && parent.name === node) {
    collected.attributes.add(node.text);
    return false;
  }
  if (ts.isBindingElement(parent) && parent.propertyName === node) return false;
  if (ts.isLabeledStatement(parent) || ts.isBreakOrContinueStatement(parent)) return false;
  if (ts.isMetaProperty(parent)) return false;
  return Reflect.get(parent, "name") !== node;
}

function visitFunction(fn: ts.SignatureDeclaration, outer: Scope, collected: Collected): void {
  if (fn.name && ts.isComputedPropertyName(fn.name)) visit(fn.name.expression, outer, collected);

  const scope = new Scope(outer);
  if (ts.isFunctionExpression(fn) && fn.name) scope.names.add(fn.name.text);
  if (!ts.isArrowFunction(fn)) scope.names.add("arguments");
  for (const param of fn.parameters) bindingNames(param.name, scope.names);

  const body: ts.Node | undefined = "body" in fn ? fn.body : undefined;
  if (body && ts.isBlock(body)) {
    collectVars(body, scope.names);
    lexicalNames(body.statements, scope.names);
  }

  for (const param of fn.parameters) visit(param, scope, collected);
  if (!body) return;
  if (ts.isBlock(body)) {
    for (const stmt of body.statements) visit(stmt, scope, collected);
  } else {
    visit(body, scope, collected);
  }
}

function visitClass(cls: ts.ClassLikeDeclaration, outer: Scope, collected: Collected): void {
  for (const clause of cls.heritageClauses ?? []) visit(clause, outer, collected);
  const scope = new Scope(outer);
  if (cls.name) scope.names.add(cls.name.text);
  for (const member of cls.members) visit(member, scope, collected);
}

function visit(node: ts.Node, scope: Scope, collected: Collected): void {
  if (ts.isFunctionLike(node)) {
    visitFunction(node, scope, collected);
    return;
  }
  if (ts.isClassLike(node)) {
    visitClass(node, scope, collected);
    return;
  }

  let inner = scope;
  if (ts.isBlock(node)) {
    inner = new Scope(scope);
    lexicalNames(node.statements, inner.names);
  } else if (ts.isCaseBlock(node)) {
    inner = new Scope(scope);
    for (const clause of node.clauses) lexicalNames(clause.statements, inner.names);
  } else if (ts.isForStatement(node) || ts.isForInStatement(node) || ts.isForOfStatement(node)) {
    const init = node.initializer;
    if (init && ts.isVariableDeclarationList(init) && isBlockScoped(init)) {
      inner = new Scope(scope);
      for (const decl of init.declarations) bindingNames(decl.name, inner.names);
    }
  } else if (ts.isCatchClause(node) && node.variableDeclaration) {
    inner = new Scope(scope);
    bindingNames(node.variableDeclaration.name, inner.names);
  } else if (ts.isIdentifier(node)) {
    if (isReference(node, collected) && !scope.has(node.text) && !collected.seen.has(node.text)) {
      collected.seen.add(node.text);
      collected.globals.push(node.text);
    }
    return;
  }

  ts.forEachChild(node, child => visit(child, inner, collected));
}

/**
 * Free-name analysis of one syntax tree. Nested functions and classes are
 * walked with their own scopes, so names they depend on are included.
 */
export function analyzeNode(node: ts.Node, freevars: readonly string[] = []): UnitBindings {
  const collected: Collected = { globals: [], seen: new Set(freevars), attributes: new Set() };
  visit(node, new Scope(), collected);
  return { globals: collected.globals, attributes: collected.attributes };
}

/**
 * Memoizing extractor. Units are immutable, so results are cached per unit
 * for the unit's lifetime.
 */
export class GlobalsExtractor {
  private cache: WeakMap<CodeUnit, UnitBindings> = new WeakMap();

  analyze(unit: CodeUnit): UnitBindings {
    const cached = this.cache.get(unit);
    if (cached) return cached;
    const result = analyzeNode(unit.syntax, unit.freevars);
    this.cache.set(unit, result);
    return result;
  }

  extract(unit: CodeUnit): ReadonlySet<string> {
    return new Set(this.analyze(unit).globals);
  }

  /**
   * Submodules of the unit's dependencies reached only through attribute
   * access (`pkg.sub.fn()` binds only `pkg`). A dependency `pkg/sub/leaf`
   * qualifies when `pkg` is a global and every later segment appears as an
   * attribute name.
   */
  findImportedSubmodules<D extends ModuleDependency>(unit: CodeUnit, deps: Iterable<D>): D[] {
    const { globals, attributes } = this.analyze(unit);
    const found: D[] = [];
    for (const dep of deps) {
      const [head, ...rest] = dep.name.split("/");
      if (rest.length === 0 || !globals.includes(head)) continue;
      if (rest.every(segment => attributes.has(segment))) found.push(dep);
    }
    return found;
  }
}

/**
 * Names declared at the top level of a script, in source order.
 */
export function topLevelBindings(source: string): string[] {
  const file = ts.createSourceFile("module.js", source, ts.ScriptTarget.Latest, true, ts.ScriptKind.JS);
  const names = new Set<string>();
  for (const stmt of file.statements) {
    if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) bindingNames(decl.name, names);
    } else if ((ts.isClassDeclaration(stmt) || ts.isFunctionDeclaration(stmt)) && stmt.name) {
      names.add(stmt.name.text);
    }
  }
  return Array.from(names);
}
