import type { ZodType } from "zod";

/**
 * Expected type of a cached value. `matches` performs the runtime check, `fallback` is what
 * `get` returns when no live entry exists (the zero value for primitives, `null` otherwise).
 */
export interface ValueType<TValue, TFallback = TValue> {
  readonly name: string;
  matches(value: unknown): value is TValue;
  readonly fallback: TFallback;
}

type Constructor<TInstance> = abstract new (...args: never[]) => TInstance;

const primitive = <TValue>(
  name: string,
  fallback: TValue,
  matches: (value: unknown) => value is TValue
): ValueType<TValue> => ({ name, matches, fallback });

const unknownType: ValueType<unknown, undefined> = {
  name: "unknown",
  matches: (_value: unknown): _value is unknown => true,
  fallback: undefined
};

export const valueTypes = {
  unknown: unknownType,
  string: primitive("string", "", (value): value is string => typeof value === "string"),
  number: primitive("number", 0, (value): value is number => typeof value === "number"),
  boolean: primitive("boolean", false, (value): value is boolean => typeof value === "boolean"),
  bigint: primitive("bigint", BigInt(0), (value): value is bigint => typeof value === "bigint"),
  date: instanceOf(Date, "Date"),
  array: {
    name: "array",
    matches: (value: unknown): value is unknown[] => Array.isArray(value),
    fallback: null
  } satisfies ValueType<unknown[], null>,
  record: {
    name: "record",
    matches: (value: unknown): value is Record<string, unknown> =>
      typeof value === "object" && value !== null && !Array.isArray(value),
    fallback: null
  } satisfies ValueType<Record<string, unknown>, null>,
  instanceOf,
  schema
};

export function instanceOf<TInstance>(ctor: Constructor<TInstance>, name = ctor.name): ValueType<TInstance, null> {
  return {
    name,
    matches: (value: unknown): value is TInstance => value instanceof ctor,
    fallback: null
  };
}

/**
 * Value type backed by a zod schema. The stored value is returned as-is; the schema only checks it.
 */
export function schema<TValue>(zodSchema: ZodType<TValue>, name: string): ValueType<TValue, null> {
  return {
    name,
    matches: (value: unknown): value is TValue => zodSchema.safeParse(value).success,
    fallback: null
  };
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const ctorName = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof ctorName === "string" && ctorName !== "Object" ? ctorName : "object";
  }
  return typeof value;
}
