// src/core/config/config.ts
// Configuration for ferry runtimes: environment, file and overrides

import * as fs from "fs";
import * as path from "path";
import { invalidConfig } from "../errors";

// =========================================================================
// Configuration Types
// =========================================================================

export type SerializerName = "ferry" | "v8";

export const SERIALIZER_NAMES: readonly SerializerName[] = ["ferry", "v8"];

export type SerializerConfig = {
  /** Backend used by selectSerializer() */
  backend: SerializerName;
};

export type TraceConfig = {
  /** Emit trace events to the console */
  enabled: boolean;
};

export type ModulesConfig = {
  /** Name of the transient interactive module */
  entryModule: string;
  /** Modules registered for by-value serialization at startup */
  byValue: string[];
};

export type LimitsConfig = {
  /** Maximum nesting depth the encoder follows */
  maxDepth: number;
};

export type FerryConfig = {
  serializer: SerializerConfig;
  trace: TraceConfig;
  modules: ModulesConfig;
  limits: LimitsConfig;
};

/** Sections with any subset of their fields. */
export type FerryConfigInput = {
  [K in keyof FerryConfig]?: Partial<FerryConfig[K]>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: FerryConfig = {
  serializer: { backend: "ferry" },
  trace: { enabled: false },
  modules: { entryModule: "__main__", byValue: [] },
  limits: { maxDepth: 1000 },
};

export const CONFIG_FILES = ["ferry.config.json", "ferry.config.yaml", "ferry.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

export function isSerializerName(x: unknown): x is SerializerName {
  return x === "ferry" || x === "v8";
}

function parseSerializer(value: unknown, source: string): SerializerName {
  if (!isSerializerName(value)) {
    throw invalidConfig(`${source}: unknown serializer '${String(value)}', expected one of ${SERIALIZER_NAMES.join(", ")}`);
  }
  return value;
}

function parseFlag(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseList(value: unknown): string[] | undefined {
  if (Array.isArray(value)) return value.map(v => String(v).trim()).filter(Boolean);
  if (typeof value === "string") return value.split(",").map(v => v.trim()).filter(Boolean);
  return undefined;
}

function parseDepth(value: unknown, source: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const depth = typeof value === "number" ? value : parseInt(String(value), 10);
  if (!Number.isInteger(depth)) throw invalidConfig(`${source}: maxDepth must be an integer`);
  return depth;
}

/**
 * Settings present in the environment. Unset variables are left out.
 */
export function configFromEnv(prefix = "FERRY", env: NodeJS.ProcessEnv = process.env): FerryConfigInput {
  const config: FerryConfigInput = {};

  const serializer = env[`${prefix}_SERIALIZER`];
  if (serializer) config.serializer = { backend: parseSerializer(serializer, `${prefix}_SERIALIZER`) };

  const trace = env[`${prefix}_TRACE`];
  if (trace !== undefined && trace !== "") config.trace = { enabled: parseFlag(trace) };

  const modules: Partial<ModulesConfig> = {};
  const entryModule = env[`${prefix}_ENTRY_MODULE`];
  if (entryModule) modules.entryModule = entryModule;
  const byValue = parseList(env[`${prefix}_BY_VALUE`]);
  if (byValue) modules.byValue = byValue;
  if (Object.keys(modules).length > 0) config.modules = modules;

  const maxDepth = parseDepth(env[`${prefix}_MAX_DEPTH`], `${prefix}_MAX_DEPTH`);
  if (maxDepth !== undefined) config.limits = { maxDepth };

  return config;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): FerryConfigInput {
  if (!fs.existsSync(filePath)) {
    throw invalidConfig(`config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw invalidConfig(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw invalidConfig(`unsupported config file format: ${ext}`);
  }

  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw invalidConfig(`${filePath}: expected an object`);
  }
  return configFromObject(data);
}

function section(data: object, ...keys: string[]): object | undefined {
  for (const key of keys) {
    const value: unknown = Reflect.get(data, key);
    if (value !== null && typeof value === "object" && !Array.isArray(value)) return value;
  }
  return undefined;
}

function field(data: object | undefined, ...keys: string[]): unknown {
  if (!data) return undefined;
  for (const key of keys) {
    const value: unknown = Reflect.get(data, key);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * camelCase and snake_case keys are both accepted.
 */
export function configFromObject(data: object): FerryConfigInput {
  const config: FerryConfigInput = {};

  const backend = field(section(data, "serializer"), "backend");
  if (backend !== undefined) config.serializer = { backend: parseSerializer(backend, "serializer.backend") };

  const enabled = field(section(data, "trace"), "enabled");
  if (typeof enabled === "boolean") config.trace = { enabled };

  const modulesData = section(data, "modules");
  const modules: Partial<ModulesConfig> = {};
  const entryModule = field(modulesData, "entryModule", "entry_module");
  if (typeof entryModule === "string") modules.entryModule = entryModule;
  const byValue = parseList(field(modulesData, "byValue", "by_value"));
  if (byValue) modules.byValue = byValue;
  if (Object.keys(modules).length > 0) config.modules = modules;

  const maxDepth = parseDepth(field(section(data, "limits"), "maxDepth", "max_depth"), "limits.maxDepth");
  if (maxDepth !== undefined) config.limits = { maxDepth };

  return config;
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: FerryConfigInput[]): FerryConfig {
  const result: FerryConfig = {
    serializer: { ...DEFAULT_CONFIG.serializer },
    trace: { ...DEFAULT_CONFIG.trace },
    modules: { ...DEFAULT_CONFIG.modules, byValue: [...DEFAULT_CONFIG.modules.byValue] },
    limits: { ...DEFAULT_CONFIG.limits },
  };

  for (const cfg of configs) {
    if (cfg.serializer) result.serializer = { ...result.serializer, ...cfg.serializer };
    if (cfg.trace) result.trace = { ...result.trace, ...cfg.trace };
    if (cfg.modules) result.modules = { ...result.modules, ...cfg.modules };
    if (cfg.limits) result.limits = { ...result.limits, ...cfg.limits };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: FerryConfigInput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): FerryConfig {
  const layers: FerryConfigInput[] = [configFromEnv("FERRY", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = CONFIG_FILES.map(name => path.join(cwd, name)).find(p => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) layers.push(options.overrides);

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlScalar = string | number | boolean | null | string[];

function parseYamlScalar(value: string): YamlScalar {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    return value
      .slice(1, -1)
      .split(",")
      .map(item => item.trim().replace(/^["']|["']$/g, ""))
      .filter(Boolean);
  }
  return value;
}

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: FerryConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isSerializerName(config.serializer.backend)) {
    errors.push(`unknown serializer backend: ${String(config.serializer.backend)}`);
  }
  if (!config.modules.entryModule) {
    errors.push("modules.entryModule must not be empty");
  }
  if (config.modules.byValue.includes(config.modules.entryModule)) {
    warnings.push(`entry module ${config.modules.entryModule} is always sent by value; listing it in byValue has no effect`);
  }
  if (config.limits.maxDepth < 1) {
    errors.push("limits.maxDepth must be at least 1");
  } else if (config.limits.maxDepth < 32) {
    warnings.push("limits.maxDepth is very low, nested values may be rejected");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
