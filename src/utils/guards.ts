/**
 * Runtime guards for values read from JSON config and other untyped input.
 * A failed guard throws a StructuralError, which aborts the run.
 */
import { StructuralError, type StructuralErrorCode } from "../types/errors";

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function invariant(
  condition: unknown,
  message: string,
  context?: PlainObject,
  code: StructuralErrorCode = "INVALID_CONFIG",
): asserts condition {
  if (condition) return;
  throw new StructuralError(code, message, context ?? {});
}

export function assertPlainObject(value: unknown, message: string): asserts value is PlainObject {
  invariant(isPlainObject(value), message, { received: typeof value });
}

export function assertString(value: unknown, message: string): asserts value is string {
  invariant(typeof value === "string", message, { received: typeof value });
}

export function assertNumber(value: unknown, message: string): asserts value is number {
  invariant(typeof value === "number" && Number.isFinite(value), message, { received: value });
}

export function assertStringArray(value: unknown, message: string): asserts value is string[] {
  invariant(Array.isArray(value) && value.every((v) => typeof v === "string"), message);
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  if (!isPlainObject(value)) return false;
  for (const val of Object.values(value)) {
    if (typeof val !== "string") return false;
  }
  return true;
}

export function assertStringRecord(value: unknown, message: string): asserts value is Record<string, string> {
  invariant(isStringRecord(value), message);
}
