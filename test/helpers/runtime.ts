// test/helpers/runtime.ts
// Runtimes, traced sinks and call helpers shared by the ferry tests

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { collectingSink, type CollectingSink } from "../../src/adapters/logging";
import { mergeConfigs, type FerryConfigInput } from "../../src/core/config/config";
import { Runtime, type RuntimeOptions } from "../../src/runtime";

export type Traced = { runtime: Runtime; sink: CollectingSink };

export function tracedRuntime(config: FerryConfigInput = {}, options: Omit<RuntimeOptions, "config" | "trace"> = {}): Traced {
  const sink = collectingSink();
  const runtime = new Runtime({ ...options, config: mergeConfigs(config), trace: sink });
  return { runtime, sink };
}

/**
 * Dump with `source`, load into `dest` (a fresh runtime by default).
 */
export function ship(value: unknown, source: Runtime, dest: Runtime = new Runtime()): unknown {
  return dest.loads(source.dumps(value));
}

export function attr(target: unknown, name: string): unknown {
  if (target === null || (typeof target !== "object" && typeof target !== "function")) {
    throw new TypeError(`cannot read '${name}' of ${String(target)}`);
  }
  return Reflect.get(target, name);
}

export function fnOf(x: unknown): (...args: unknown[]) => unknown {
  if (typeof x !== "function") throw new TypeError(`expected a function, got ${typeof x}`);
  return (...args: unknown[]) => Reflect.apply(x, undefined, args);
}

export function construct(ctor: unknown, ...args: unknown[]): object {
  if (typeof ctor !== "function") throw new TypeError(`expected a class, got ${typeof ctor}`);
  const made: unknown = Reflect.construct(ctor, args);
  if (made === null || typeof made !== "object") throw new TypeError("constructor returned no object");
  return made;
}

export function callMethod(target: unknown, name: string, ...args: unknown[]): unknown {
  const method = attr(target, name);
  if (typeof method !== "function") throw new TypeError(`'${name}' is not a method`);
  return Reflect.apply(method, target, args);
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "ferry-test-"));
}
