// src/core/reduce/resolver.ts
// Reference-versus-value decision for named objects

import { lookupFailed } from "../errors";
import type { ModuleRegistry } from "../modules/registry";
import { builtinPathOf } from "../objects/natives";
import { getAttributePath, originOf } from "../objects/origin";

export type ValueReason =
  | "anonymous"
  | "no-owner"
  | "entry-point"
  | "not-locatable"
  | "by-value-policy"
  | "identity-mismatch";

export type Decision =
  | { kind: "reference"; module: string; qualname: string }
  | { kind: "value"; reason: ValueReason; module?: string };

/**
 * Modules whose definitions are sent by value even though they are importable.
 * A registered module covers its submodules (`pkg` covers `pkg/sub`).
 */
export class ByValuePolicy {
  private modules: Set<string> = new Set();

  constructor(private readonly registry: ModuleRegistry) {}

  /**
   * Idempotent. The module must be registered.
   */
  register(name: string): void {
    if (!this.registry.has(name)) {
      throw lookupFailed(`module ${name}`, "is not registered, import it before sending it by value");
    }
    this.modules.add(name);
  }

  unregister(name: string): void {
    if (!this.modules.has(name)) {
      throw lookupFailed(`module ${name}`, "is not registered for by-value serialization");
    }
    this.modules.delete(name);
  }

  /**
   * Whether the module or one of its parent packages is registered.
   */
  has(name: string): boolean {
    const segments = name.split("/");
    for (let i = segments.length; i > 0; i--) {
      if (this.modules.has(segments.slice(0, i).join("/"))) return true;
    }
    return false;
  }

  list(): string[] {
    return Array.from(this.modules);
  }
}

function nameFor(obj: object): string | undefined {
  const declared = originOf(obj)?.qualname;
  if (declared) return declared;
  if (typeof obj !== "function") return undefined;
  return builtinPathOf(obj) ?? (obj.name || undefined);
}

export class ReferenceResolver {
  constructor(
    private readonly modules: ModuleRegistry,
    private readonly policy: ByValuePolicy
  ) {}

  /**
   * The module owning `obj` under `name`: the declared module, or the first
   * registered non-entry module whose lookup of `name` is `obj` itself.
   */
  whichModule(obj: object, name: string): string | undefined {
    const declared = originOf(obj)?.module;
    if (declared) return declared;

    for (const record of this.modules.entries()) {
      if (record.origin === "entry") continue;
      try {
        if (getAttributePath(record.namespace, name) === obj) return record.name;
      } catch {
        // a module whose lookup throws is not the owner
        continue;
      }
    }
    return undefined;
  }

  decide(obj: object, name: string | undefined = nameFor(obj)): Decision {
    if (!name) return { kind: "value", reason: "anonymous" };

    const module = this.whichModule(obj, name);
    const record = module === undefined ? undefined : this.modules.get(module);
    if (!module || !record) return { kind: "value", reason: "no-owner", module };
    if (record.origin === "entry") return { kind: "value", reason: "entry-point", module };
    if (record.origin === "dynamic") return { kind: "value", reason: "not-locatable", module };
    if (this.policy.has(module)) return { kind: "value", reason: "by-value-policy", module };

    let found: unknown;
    try {
      found = getAttributePath(record.namespace, name);
    } catch {
      return { kind: "value", reason: "identity-mismatch", module };
    }
    if (found !== obj) return { kind: "value", reason: "identity-mismatch", module };
    return { kind: "reference", module, qualname: name };
  }
}
