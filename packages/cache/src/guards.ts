import { z } from "zod";
import { InvalidArgumentError } from "./errors";

const nonEmptyString = z.string().min(1);
const ttlMinutesSchema = z.number().int().nonnegative();

export function requireNonEmpty(value: unknown, name: string): string {
  const result = nonEmptyString.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(name, "must be a non-empty string");
  }
  return result.data;
}

export function requireValue<TValue>(value: TValue, name: string): NonNullable<TValue> {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(name, "must not be null or undefined");
  }
  return value;
}

export function requireTtlMinutes(value: unknown, name: string): number {
  const result = ttlMinutesSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(name, "must be a non-negative integer number of minutes");
  }
  return result.data;
}

export function compilePattern(pattern: unknown, name: string): RegExp {
  const source = requireNonEmpty(pattern, name);
  try {
    return new RegExp(source);
  } catch (error) {
    throw new InvalidArgumentError(name, `is not a valid regular expression: ${source}`, { cause: error });
  }
}

/**
 * Null, undefined and empty collections carry nothing worth caching.
 */
export function hasMeaningfulData(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string" || Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) return value.byteLength > 0;
  return true;
}
