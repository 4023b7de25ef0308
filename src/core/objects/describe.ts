// src/core/objects/describe.ts
// Human-readable names for objects in errors and trace events

import { isEnumClass } from "./enums";

function isClassSource(fn: Function): boolean {
  return /^class\b/.test(Function.prototype.toString.call(fn));
}

export function describeObject(x: unknown): string {
  if (x === null) return "null";
  if (typeof x === "function") {
    const name = x.name || "<anonymous>";
    if (isEnumClass(x)) return `enum ${name}`;
    if (isClassSource(x)) return `class ${name}`;
    return `function ${name}`;
  }
  if (typeof x !== "object") return typeof x;

  const proto: unknown = Object.getPrototypeOf(x);
  if (proto === null) return "null-prototype object";
  const ctor: unknown = Reflect.get(x, "constructor");
  if (typeof ctor === "function" && ctor.name) {
    return ctor === Object ? "object" : `instance of ${ctor.name}`;
  }
  return "object";
}
