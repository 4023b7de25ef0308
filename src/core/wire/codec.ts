// src/core/wire/codec.ts
// Payload framing: header plus root node, as UTF-8 JSON

import { corruptPayload } from "../errors";
import { PAYLOAD_FORMAT, PAYLOAD_VERSION, type Payload, type WireNode } from "./types";

function isRecord(x: unknown): x is Record<string, unknown> {
  return x !== null && typeof x === "object" && !Array.isArray(x);
}

const isId = (x: unknown): x is number => typeof x === "number" && Number.isInteger(x) && x >= 0;
const isNodeList = (x: unknown): boolean => Array.isArray(x) && x.every(isWireNode);
const isNodePair = (x: unknown): boolean => Array.isArray(x) && x.length === 2 && isWireNode(x[0]) && isWireNode(x[1]);

/**
 * Structural check of a decoded JSON tree.
 */
export function isWireNode(x: unknown): x is WireNode {
  if (!isRecord(x)) return false;
  switch (x.tag) {
    case "Json":
      return x.value === null || ["string", "number", "boolean"].includes(typeof x.value);
    case "Undefined":
      return true;
    case "Number":
      return x.value === "NaN" || x.value === "Infinity" || x.value === "-Infinity" || x.value === "-0";
    case "BigInt":
      return typeof x.value === "string" && /^-?\d+$/.test(x.value);
    case "Symbol":
      if (x.kind === "registered") return typeof x.key === "string";
      if (x.kind === "wellKnown") return typeof x.name === "string";
      return x.kind === "unique" && isId(x.id) && (x.description === undefined || typeof x.description === "string");
    case "Ref":
      return isId(x.id);
    case "Array":
    case "Set":
      return isId(x.id) && isNodeList(x.items);
    case "Object":
      return (
        isId(x.id) &&
        (x.proto === "object" || x.proto === "null") &&
        Array.isArray(x.entries) &&
        x.entries.every(e => Array.isArray(e) && e.length === 2 && typeof e[0] === "string" && isWireNode(e[1]))
      );
    case "Map":
      return isId(x.id) && Array.isArray(x.entries) && x.entries.every(isNodePair);
    case "Date":
      return isId(x.id) && (x.time === null || typeof x.time === "number");
    case "RegExp":
      return isId(x.id) && typeof x.source === "string" && typeof x.flags === "string";
    case "Bytes":
      return isId(x.id) && typeof x.kind === "string" && typeof x.data === "string";
    case "Global":
      return typeof x.module === "string" && typeof x.qualname === "string";
    case "Reduce":
      return (
        isId(x.id) &&
        isWireNode(x.fn) &&
        isNodeList(x.args) &&
        (x.state === undefined || isWireNode(x.state)) &&
        (x.restore === undefined || isWireNode(x.restore))
      );
    default:
      return false;
  }
}

export function encodePayload(root: WireNode): Buffer {
  const payload: Payload = { format: PAYLOAD_FORMAT, version: PAYLOAD_VERSION, root };
  return Buffer.from(JSON.stringify(payload), "utf8");
}

export function decodePayload(bytes: Uint8Array): WireNode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch (err) {
    throw corruptPayload("payload is not valid JSON", err);
  }
  if (!isRecord(parsed) || parsed.format !== PAYLOAD_FORMAT) {
    throw corruptPayload("not a ferry payload");
  }
  if (parsed.version !== PAYLOAD_VERSION) {
    throw corruptPayload(`unsupported payload version ${String(parsed.version)}`);
  }
  if (!isWireNode(parsed.root)) {
    throw corruptPayload("malformed payload tree");
  }
  return parsed.root;
}
