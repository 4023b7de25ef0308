// src/core/pool/serializer.ts
// Serializer selection for worker pools: this engine, or V8 structured serialization

import v8 from "node:v8";
import { corruptPayload, invalidConfig, unsupportedObject } from "../errors";
import { isSerializerName, SERIALIZER_NAMES, type FerryConfig, type SerializerName } from "../config/config";
import type { Runtime } from "../../runtime";

export interface Serializer {
  readonly name: SerializerName;
  dumps(value: unknown): Buffer;
  loads(bytes: Uint8Array): unknown;
}

function v8Serializer(): Serializer {
  return {
    name: "v8",
    dumps(value: unknown): Buffer {
      try {
        return v8.serialize(value);
      } catch (err) {
        throw unsupportedObject(typeof value, err instanceof Error ? err.message : String(err), err);
      }
    },
    loads(bytes: Uint8Array): unknown {
      try {
        return v8.deserialize(bytes);
      } catch (err) {
        throw corruptPayload("not a V8 serialization payload", err);
      }
    },
  };
}

function ferrySerializer(runtime: Runtime): Serializer {
  return {
    name: "ferry",
    dumps: value => runtime.dumps(value),
    loads: bytes => runtime.loads(bytes),
  };
}

/**
 * `ferry` needs the runtime whose registries it uses.
 */
export function createSerializer(name: string, runtime?: Runtime): Serializer {
  if (!isSerializerName(name)) {
    throw invalidConfig(`unknown serializer '${name}', expected one of ${SERIALIZER_NAMES.join(", ")}`);
  }
  if (name === "v8") return v8Serializer();
  if (!runtime) throw invalidConfig("the ferry serializer needs a runtime");
  return ferrySerializer(runtime);
}

export function selectSerializer(config: FerryConfig, runtime?: Runtime): Serializer {
  return createSerializer(config.serializer.backend, runtime);
}
