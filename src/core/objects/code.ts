// src/core/objects/code.ts
// Compiled units: the source text behind a function, method or class

import ts from "typescript";
import { unsupportedObject } from "../errors";

export type UnitKind = "function" | "arrow" | "method" | "getter" | "setter" | "class";

/** Identifier the rewritten `extends` clause of a class unit refers to. */
export const BASE_BINDING = "__ferry_base__";

const NATIVE_SOURCE = /\{\s*\[native code\]\s*\}\s*$/;

/**
 * An immutable compiled unit.
 *
 * `expression` is the text instantiate() evaluates; for methods it is an
 * object literal holding the single member, for classes with an `extends`
 * clause the heritage expression is replaced by {@link BASE_BINDING} so the
 * base can be supplied before the module globals exist.
 */
export class CodeUnit {
  constructor(
    public readonly source: string,
    public readonly freevars: readonly string[],
    public readonly kind: UnitKind,
    public readonly name: string,
    public readonly expression: string,
    public readonly extendsBase: boolean,
    /** Parsed node of the unit; the global-binding analysis walks it. */
    public readonly syntax: ts.Node
  ) {}
}

type Parsed = { file: ts.SourceFile; node: ts.Expression };

function parseParenthesized(text: string): Parsed | undefined {
  const file = ts.createSourceFile("unit.js", text, ts.ScriptTarget.Latest, true, ts.ScriptKind.JS);
  if (file.statements.length !== 1) return undefined;
  const stmt = file.statements[0];
  if (!ts.isExpressionStatement(stmt) || !ts.isParenthesizedExpression(stmt.expression)) return undefined;
  if (stmt.expression.end !== text.length) return undefined;
  return { file, node: stmt.expression.expression };
}

function memberName(name: ts.PropertyName): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return "";
}

export function isNativeSource(source: string): boolean {
  return NATIVE_SOURCE.test(source);
}

export function sourceOf(fn: Function): string {
  return Function.prototype.toString.call(fn);
}

/**
 * Compile source text into a unit. `freevars` names the closure variables
 * the unit reads through cells, in cell order.
 */
export function compileUnit(source: string, freevars: readonly string[] = []): CodeUnit {
  if (isNativeSource(source)) {
    throw unsupportedObject("native code", "native functions have no source to compile");
  }

  const asExpression = parseParenthesized(`(${source}\n)`);
  if (asExpression) {
    const { file, node } = asExpression;
    if (ts.isFunctionExpression(node)) {
      return new CodeUnit(source, freevars, "function", node.name?.text ?? "", source, false, node);
    }
    if (ts.isArrowFunction(node)) {
      return new CodeUnit(source, freevars, "arrow", "", source, false, node);
    }
    if (ts.isClassExpression(node)) {
      const heritage = node.heritageClauses?.find(c => c.token === ts.SyntaxKind.ExtendsKeyword);
      const superExpr = heritage?.types[0]?.expression;
      let expression = source;
      if (superExpr) {
        // offsets are shifted by the opening parenthesis
        const start = superExpr.getStart(file) - 1;
        const end = superExpr.end - 1;
        expression = source.slice(0, start) + BASE_BINDING + source.slice(end);
      }
      return new CodeUnit(source, freevars, "class", node.name?.text ?? "", expression, superExpr !== undefined, node);
    }
  }

  const member = source.replace(/^static\s+/, "");
  const asMember = parseParenthesized(`({${member}\n})`);
  if (asMember && ts.isObjectLiteralExpression(asMember.node) && asMember.node.properties.length === 1) {
    const prop = asMember.node.properties[0];
    const expression = `{${member}\n}`;
    if (ts.isMethodDeclaration(prop)) {
      return new CodeUnit(source, freevars, "method", memberName(prop.name), expression, false, prop);
    }
    if (ts.isGetAccessorDeclaration(prop)) {
      return new CodeUnit(source, freevars, "getter", memberName(prop.name), expression, false, prop);
    }
    if (ts.isSetAccessorDeclaration(prop)) {
      return new CodeUnit(source, freevars, "setter", memberName(prop.name), expression, false, prop);
    }
  }

  throw unsupportedObject("source unit", `not a function, method or class: ${source.slice(0, 60)}`);
}

const unitCache = new WeakMap<Function, CodeUnit>();

/**
 * The compiled unit of a live function, compiled once per function.
 */
export function codeOf(fn: Function, freevars: readonly string[] = []): CodeUnit {
  const cached = unitCache.get(fn);
  if (cached && cached.freevars.join(",") === freevars.join(",")) return cached;
  const unit = compileUnit(sourceOf(fn), freevars);
  unitCache.set(fn, unit);
  return unit;
}

export type DeclaredMembers = { statics: Set<string>; instance: Set<string> };

/**
 * Methods and accessors written in a class unit's body. Instantiating the
 * unit recreates these, so they are not part of the captured class body.
 */
export function declaredMembers(unit: CodeUnit): DeclaredMembers {
  const declared: DeclaredMembers = { statics: new Set(), instance: new Set() };
  const node = unit.syntax;
  if (!ts.isClassLike(node)) return declared;
  for (const member of node.members) {
    if (!(ts.isMethodDeclaration(member) || ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member))) {
      continue;
    }
    const name = memberName(member.name);
    if (!name) continue;
    const isStatic = ts.getModifiers(member)?.some(m => m.kind === ts.SyntaxKind.StaticKeyword) ?? false;
    (isStatic ? declared.statics : declared.instance).add(name);
  }
  return declared;
}
