import { describe, expect, it } from "vitest";
import { z } from "zod";

import { MemoryCacheProvider, TypeMismatchError, describeValue, instanceOf, schema, valueTypes } from "../src";
import { FakeWatcher, silentLogger } from "./helpers/fakes";

class Invoice {
  constructor(readonly total: number) {}
}

const userSchema = z.object({ id: z.number(), name: z.string() });

describe("valueTypes", () => {
  it("checks primitives", () => {
    expect(valueTypes.string.matches("x")).toBe(true);
    expect(valueTypes.string.matches(1)).toBe(false);
    expect(valueTypes.number.matches(1.5)).toBe(true);
    expect(valueTypes.boolean.matches(0)).toBe(false);
    expect(valueTypes.bigint.matches(BigInt(10))).toBe(true);
    expect(valueTypes.bigint.fallback).toBe(BigInt(0));
  });

  it("tells arrays and records apart", () => {
    expect(valueTypes.array.matches([1])).toBe(true);
    expect(valueTypes.array.matches({})).toBe(false);
    expect(valueTypes.record.matches({ a: 1 })).toBe(true);
    expect(valueTypes.record.matches([1])).toBe(false);
    expect(valueTypes.record.matches(null)).toBe(false);
  });

  it("matches class instances", () => {
    const invoiceType = instanceOf(Invoice);

    expect(invoiceType.name).toBe("Invoice");
    expect(invoiceType.matches(new Invoice(10))).toBe(true);
    expect(invoiceType.matches({ total: 10 })).toBe(false);
    expect(valueTypes.date.matches(new Date(0))).toBe(true);
  });

  it("checks values against a zod schema", () => {
    const userType = schema(userSchema, "User");

    expect(userType.matches({ id: 1, name: "Ada" })).toBe(true);
    expect(userType.matches({ id: "1", name: "Ada" })).toBe(false);
    expect(userType.fallback).toBeNull();
  });

  it("drives typed reads on the provider", () => {
    const provider = new MemoryCacheProvider({ watcher: new FakeWatcher(), logger: silentLogger() });
    provider.set("invoice", new Invoice(25), 5);
    provider.set("user", { id: 7, name: "Grace" }, 5);

    expect(provider.get("invoice", instanceOf(Invoice))?.total).toBe(25);
    expect(provider.get("user", schema(userSchema, "User"))).toEqual({ id: 7, name: "Grace" });
    expect(() => provider.get("invoice", valueTypes.date)).toThrow(
      'Cached value for "invoice" is Invoice, expected Date'
    );
    expect(() => provider.get("user", instanceOf(Invoice))).toThrow(TypeMismatchError);
  });
});

describe("describeValue", () => {
  it.each([
    [null, "null"],
    [undefined, "undefined"],
    [[1, 2], "array"],
    [{ a: 1 }, "object"],
    [Object.create(null), "object"],
    [new Map(), "Map"],
    ["text", "string"],
    [3, "number"]
  ])("describes %o as %s", (value, expected) => {
    expect(describeValue(value)).toBe(expected);
  });
});
