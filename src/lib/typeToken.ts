/**
 * Runtime keys for the mapper registry.
 *
 * Classes key themselves through their constructor; primitives and structural
 * types use a named TypeToken whose guard recognises matching values.
 */

import type { RdfObject } from "./terms";

export type Constructor<T> = abstract new (...args: never[]) => T;

export type TypeGuard<T> = (value: unknown) => value is T;

export class TypeToken<T> {
  /** Phantom slot tying the token to its value type; never set at runtime. */
  declare readonly valueType?: T;

  constructor(
    readonly name: string,
    private readonly guard?: TypeGuard<T>,
  ) {}

  matches(value: unknown): value is T {
    return this.guard !== undefined && this.guard(value);
  }

  get hasGuard(): boolean {
    return this.guard !== undefined;
  }

  toString(): string {
    return this.name;
  }
}

export type MapperKey<T> = Constructor<T> | TypeToken<T>;

export function typeToken<T>(name: string, guard?: TypeGuard<T>): TypeToken<T> {
  return new TypeToken<T>(name, guard);
}

/** Objects of a subject grouped by predicate IRI. */
export type PredicatesMap = Map<string, RdfObject[]>;

/** Language-tagged string value. */
export interface LangString {
  value: string;
  language: string;
}

export const Types = {
  string: typeToken<string>("string", (v): v is string => typeof v === "string"),
  number: typeToken<number>("number", (v): v is number => typeof v === "number"),
  integer: typeToken<number>("integer", (v): v is number => typeof v === "number" && Number.isInteger(v)),
  decimal: typeToken<number>("decimal", (v): v is number => typeof v === "number" && Number.isFinite(v)),
  boolean: typeToken<boolean>("boolean", (v): v is boolean => typeof v === "boolean"),
  bigint: typeToken<bigint>("bigint", (v): v is bigint => typeof v === "bigint"),
  date: typeToken<Date>("date", (v): v is Date => v instanceof Date),
  langString: typeToken<LangString>(
    "langString",
    (v): v is LangString =>
      typeof v === "object" && v !== null && "value" in v && "language" in v &&
      typeof v.value === "string" && typeof v.language === "string",
  ),
  predicatesMap: typeToken<PredicatesMap>(
    "predicatesMap",
    (v): v is PredicatesMap =>
      v instanceof Map && Array.from(v.entries()).every(([k, objects]) => typeof k === "string" && Array.isArray(objects)),
  ),
} as const;

/** Token that values of this runtime `typeof` resolve to first. */
export function primitiveTokenFor(value: unknown): TypeToken<unknown> | undefined {
  switch (typeof value) {
    case "string":
      return Types.string;
    case "number":
      return Types.number;
    case "boolean":
      return Types.boolean;
    case "bigint":
      return Types.bigint;
    default:
      return undefined;
  }
}

/**
 * Constructors along the prototype chain, most specific first. Returned as
 * plain objects: they are only compared by identity against registry keys.
 */
export function constructorChain(value: unknown): object[] {
  const chain: object[] = [];
  if (typeof value !== "object" || value === null) return chain;
  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null && proto !== Object.prototype && typeof proto === "object") {
    const ctor: unknown = Object.getOwnPropertyDescriptor(proto, "constructor")?.value;
    if (typeof ctor === "function") chain.push(ctor);
    proto = Object.getPrototypeOf(proto);
  }
  return chain;
}

export function isMapperKey(value: unknown): value is MapperKey<unknown> {
  return typeof value === "function" || value instanceof TypeToken;
}

export function keyName(key: MapperKey<unknown>): string {
  return key instanceof TypeToken ? key.name : key.name || "<anonymous class>";
}

/** Whether `value` belongs to the type `key` stands for. */
export function isInstanceOfKey<T>(value: unknown, key: MapperKey<T>): value is T {
  if (key instanceof TypeToken) return key.matches(value);
  return value instanceof key;
}
