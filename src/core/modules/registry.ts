// src/core/modules/registry.ts
// Loaded-module table: names, namespaces and where each module came from

import { createRequire } from "node:module";
import { lookupFailed } from "../errors";
import { createNamespace, type Namespace } from "../objects/functions";

/**
 * builtin: the global object. file: loaded through the module loader.
 * entry: the transient interactive module. dynamic: created ad hoc, not locatable.
 */
export type ModuleOrigin = "builtin" | "file" | "entry" | "dynamic";

export type ModuleRecord = {
  name: string;
  namespace: object;
  origin: ModuleOrigin;
  file?: string;
};

export type ModuleLoader = (name: string) => unknown;

const nodeRequire = createRequire(import.meta.url);

function defaultLoader(name: string): unknown {
  return nodeRequire(name);
}

/**
 * Registry of loaded modules. Scans iterate in registration order.
 */
export class ModuleRegistry {
  private records: Map<string, ModuleRecord> = new Map();
  private names: WeakMap<object, string> = new WeakMap();

  constructor(private readonly loader: ModuleLoader = defaultLoader) {}

  /**
   * Register a namespace under a name, replacing any earlier module of that name.
   */
  register(name: string, namespace: object, origin: ModuleOrigin, file?: string): ModuleRecord {
    const previous = this.records.get(name);
    if (previous) this.names.delete(previous.namespace);
    const record: ModuleRecord = { name, namespace, origin, file };
    this.records.set(name, record);
    this.names.set(namespace, name);
    return record;
  }

  unregister(name: string): boolean {
    const record = this.records.get(name);
    if (!record) return false;
    this.records.delete(name);
    this.names.delete(record.namespace);
    return true;
  }

  get(name: string): ModuleRecord | undefined {
    return this.records.get(name);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  /**
   * Name a namespace was registered under, if it is a module namespace.
   */
  nameOf(namespace: object): string | undefined {
    return this.names.get(namespace);
  }

  entries(): ModuleRecord[] {
    return Array.from(this.records.values());
  }

  /**
   * A registered module's namespace, loading it through the loader on first use.
   */
  import(name: string): object {
    const existing = this.records.get(name);
    if (existing) return existing.namespace;

    let loaded: unknown;
    try {
      loaded = this.loader(name);
    } catch (err) {
      throw lookupFailed(`module ${name}`, "cannot be imported", err);
    }
    if (loaded === null || (typeof loaded !== "object" && typeof loaded !== "function")) {
      throw lookupFailed(`module ${name}`, "loader returned no namespace");
    }
    return this.register(name, loaded, "file").namespace;
  }

  /**
   * A fresh, empty namespace registered as a module.
   */
  createModule(name: string, origin: ModuleOrigin = "dynamic"): Namespace {
    const namespace = createNamespace();
    this.register(name, namespace, origin);
    return namespace;
  }
}
