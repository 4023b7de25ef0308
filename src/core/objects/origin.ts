// src/core/objects/origin.ts
// Declared module and qualified name of named entities

export type Origin = {
  /** Owning module name, when declared */
  module?: string;
  /** Dotted attribute path inside the module */
  qualname: string;
};

const origins = new WeakMap<object, Origin>();

export function declareOrigin(target: object, origin: Origin): void {
  origins.set(target, origin);
}

export function originOf(target: object): Origin | undefined {
  return origins.get(target);
}

/**
 * Walk a dotted attribute path. Throws when a segment is missing.
 */
export function getAttributePath(root: unknown, qualname: string): unknown {
  let current = root;
  for (const segment of qualname.split(".")) {
    if (current === null || (typeof current !== "object" && typeof current !== "function")) {
      throw new TypeError(`cannot read '${segment}' of ${current === null ? "null" : typeof current}`);
    }
    if (!(segment in current)) {
      throw new TypeError(`no attribute '${segment}' in path '${qualname}'`);
    }
    current = Reflect.get(current, segment);
  }
  return current;
}
