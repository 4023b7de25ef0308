// src/core/config/index.ts
// Configuration system exports

export {
  type SerializerName,
  type SerializerConfig,
  type TraceConfig,
  type ModulesConfig,
  type LimitsConfig,
  type FerryConfig,
  type FerryConfigInput,
  type ConfigValidation,
  SERIALIZER_NAMES,
  DEFAULT_CONFIG,
  CONFIG_FILES,
  isSerializerName,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
