/**
 * Input checks for configuration and other caller-supplied values. A failed
 * check throws RdfMapperException with code "invariant-violation".
 */
import { RdfMapperException } from "../lib/errors";

export type PlainObject = Record<string, unknown>;

interface PrimitiveTypes {
  string: string;
  boolean: boolean;
}

export function invariant(condition: unknown, message: string, context?: PlainObject): asserts condition {
  if (!condition) throw new RdfMapperException(message, "invariant-violation", context);
}

// JSON-shaped object: no arrays, no class instances
function isJsonObject(value: unknown): value is PlainObject {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function expectJsonObject(value: unknown, field: string): asserts value is PlainObject {
  invariant(isJsonObject(value), `${field} must be a JSON object`, { received: value });
}

export function expectType<K extends keyof PrimitiveTypes>(
  value: unknown,
  type: K,
  field: string,
): asserts value is PrimitiveTypes[K] {
  invariant(typeof value === type, `${field} must be a ${type}`, { received: value });
}

/** Prefix name to namespace IRI. */
export function isPrefixTable(value: unknown): value is Record<string, string> {
  return isJsonObject(value) && Object.values(value).every((namespace) => typeof namespace === "string");
}
