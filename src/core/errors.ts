// src/core/errors.ts
// Failure taxonomy for reduction and reconstruction

export type FailureReason =
  | "unsupported-object"
  | "refused-by-policy"
  | "corrupt-payload"
  | "lookup-failed"
  | "invalid-config";

export class FerryError extends Error {
  constructor(
    public readonly reason: FailureReason,
    message: string,
    public readonly target?: string,
    options?: { cause?: unknown }
  ) {
    super(`${reason}: ${message}`, options);
    this.name = "FerryError";
  }
}

/**
 * No reference path, no value strategy and no recognized function or class shape.
 */
export function unsupportedObject(target: string, detail: string, cause?: unknown): FerryError {
  return new FerryError("unsupported-object", `cannot serialize ${target}: ${detail}`, target, { cause });
}

export function refusedByPolicy(target: string, detail: string): FerryError {
  return new FerryError("refused-by-policy", `refusing to serialize ${target}: ${detail}`, target);
}

export function corruptPayload(detail: string, cause?: unknown): FerryError {
  return new FerryError("corrupt-payload", detail, undefined, { cause });
}

export function lookupFailed(target: string, detail: string, cause?: unknown): FerryError {
  return new FerryError("lookup-failed", `${target}: ${detail}`, target, { cause });
}

export function invalidConfig(detail: string): FerryError {
  return new FerryError("invalid-config", detail);
}

export function isFailureReason(err: unknown, reason: FailureReason): boolean {
  return err instanceof FerryError && err.reason === reason;
}
