// src/runtime.ts
// Runtime - one process's registries and the dumps/loads entry points
//
// Usage:
//   import { Runtime } from "ferry";
//
//   const source = new Runtime();
//   source.exec("function makeCounter() { const n = cell(0); return closure({ n }, () => ++n.value); }");
//   const bytes = source.dumps(source.main.makeCounter());
//   const counter = new Runtime().loads(bytes);

import { GlobalsExtractor } from "./core/analysis/globals";
import { loadConfig, mergeConfigs, validateConfig, type FerryConfig } from "./core/config/config";
import { invalidConfig } from "./core/errors";
import { ModuleRegistry, type ModuleLoader } from "./core/modules/registry";
import { execModule, type ExecOptions } from "./core/modules/session";
import { FunctionCapsule } from "./core/reduce/capsule";
import { DispatchLayer, DispatchTable } from "./core/reduce/dispatch";
import { createReconstructors } from "./core/reduce/reconstructors";
import { ByValuePolicy, ReferenceResolver } from "./core/reduce/resolver";
import { SkeletonBuilder } from "./core/reduce/skeleton";
import { createDispatchTable } from "./core/reduce/strategies";
import { ClassTracker } from "./core/reduce/tracker";
import { RECONSTRUCTORS_MODULE } from "./core/reduce/types";
import { decodePayload, encodePayload } from "./core/wire/codec";
import { Decoder } from "./core/wire/decoder";
import { Encoder } from "./core/wire/encoder";
import type { WireNode } from "./core/wire/types";
import { consoleSink, nullSink } from "./adapters/logging";
import type { TraceSink } from "./ports/trace";

/**
 * Configuration for Runtime
 */
export type RuntimeOptions = {
  /** Full configuration (default: DEFAULT_CONFIG) */
  config?: FerryConfig;

  /** Trace sink (default: console when trace.enabled, otherwise none) */
  trace?: TraceSink;

  /** Module loader used by import (default: Node's require) */
  loader?: ModuleLoader;

  /** Replaces the built-in strategy table */
  table?: DispatchTable;
};

/**
 * The registries of one process: modules, by-value policy, tracked classes
 * and the analysis cache. A destination process loads payloads into its own
 * Runtime.
 */
export class Runtime {
  readonly config: FerryConfig;
  readonly trace: TraceSink;
  readonly modules: ModuleRegistry;
  readonly policy: ByValuePolicy;
  readonly resolver: ReferenceResolver;
  readonly extractor: GlobalsExtractor;
  readonly tracker: ClassTracker;
  readonly skeletons: SkeletonBuilder;
  readonly capsule: FunctionCapsule;
  readonly table: DispatchTable;
  readonly layer: DispatchLayer;
  private readonly entry: Record<string, unknown>;

  constructor(options: RuntimeOptions = {}) {
    this.config = options.config ?? mergeConfigs();
    const validation = validateConfig(this.config);
    if (!validation.valid) throw invalidConfig(validation.errors.join("; "));

    this.trace = options.trace ?? (this.config.trace.enabled ? consoleSink() : nullSink);
    this.modules = new ModuleRegistry(options.loader);
    this.policy = new ByValuePolicy(this.modules);
    this.resolver = new ReferenceResolver(this.modules, this.policy);
    this.extractor = new GlobalsExtractor();
    this.tracker = new ClassTracker();
    this.skeletons = new SkeletonBuilder(this.tracker, this.trace);
    this.capsule = new FunctionCapsule(this.extractor, this.modules, this.trace);
    this.table = options.table ?? createDispatchTable();
    this.layer = new DispatchLayer(this.capsule, this.table, this.trace);

    this.modules.register("builtins", globalThis, "builtin");
    this.modules.register(
      RECONSTRUCTORS_MODULE,
      createReconstructors({ modules: this.modules, skeletons: this.skeletons, capsule: this.capsule }),
      "builtin"
    );
    this.entry = this.modules.createModule(this.config.modules.entryModule, "entry");

    for (const name of this.config.modules.byValue) {
      this.modules.import(name);
      this.policy.register(name);
    }
  }

  /**
   * Runtime configured from FERRY_* variables and ferry.config.* files.
   */
  static fromEnvironment(options: Omit<RuntimeOptions, "config"> = {}): Runtime {
    return new Runtime({ ...options, config: loadConfig() });
  }

  /**
   * Namespace of the entry module.
   */
  get main(): Record<string, unknown> {
    return this.entry;
  }

  /**
   * Evaluate source in a module (default: the entry module).
   */
  exec(source: string, module: string = this.config.modules.entryModule, options?: ExecOptions): object {
    return execModule(this.modules, source, module, options);
  }

  registerByValue(module: string): void {
    this.policy.register(module);
  }

  unregisterByValue(module: string): void {
    this.policy.unregister(module);
  }

  encode(value: unknown): WireNode {
    const encoder = new Encoder(
      this.layer,
      {
        modules: this.modules,
        resolver: this.resolver,
        policy: this.policy,
        tracker: this.tracker,
        extractor: this.extractor,
        trace: this.trace,
      },
      this.trace,
      { maxDepth: this.config.limits.maxDepth }
    );
    return encoder.encode(value);
  }

  decode(node: WireNode): unknown {
    return new Decoder(this.modules).decode(node);
  }

  dumps(value: unknown): Buffer {
    return encodePayload(this.encode(value));
  }

  loads(bytes: Uint8Array): unknown {
    return this.decode(decodePayload(bytes));
  }
}
