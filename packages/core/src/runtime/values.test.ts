/**
 * Value and record arena tests
 */

import { describe, expect, test } from "vitest";
import {
  NIL,
  RecordArena,
  boolValue,
  compareCodePoints,
  doubleValue,
  intValue,
  isTruthy,
  strValue,
  toPlain,
  typeName,
  valuesEqual,
} from "./values.js";

describe("RecordArena", () => {
  test("allocates sequential ids", () => {
    const records = new RecordArena();
    expect(records.allocate()).toBe(0);
    expect(records.allocate()).toBe(1);
    expect(records.count).toBe(2);
  });

  test("stores fields in insertion order", () => {
    const records = new RecordArena();
    const id = records.allocate();
    records.set(id, "b", intValue(2));
    records.set(id, "a", intValue(1));
    expect(records.has(id, "a")).toBe(true);
    expect(records.get(id, "c")).toBeUndefined();
    expect(records.entries(id).map(([name]) => name)).toEqual(["b", "a"]);
    expect(records.size(id)).toBe(2);
  });

  test("rejects unknown ids", () => {
    expect(() => new RecordArena().get(5, "a")).toThrow("Unknown record id 5");
  });
});

describe("values", () => {
  test("names types", () => {
    const records = new RecordArena();
    expect(typeName(NIL)).toBe("nil");
    expect(typeName(doubleValue(1))).toBe("double");
    expect(typeName({ kind: "record", id: records.allocate() })).toBe("rec");
  });

  test("applies truthiness", () => {
    const records = new RecordArena();
    const empty = records.allocate();
    const full = records.allocate();
    records.set(full, "a", NIL);

    expect(isTruthy(NIL, records)).toBe(false);
    expect(isTruthy(boolValue(true), records)).toBe(true);
    expect(isTruthy(intValue(0), records)).toBe(false);
    expect(isTruthy(intValue(-3), records)).toBe(true);
    expect(isTruthy(doubleValue(0), records)).toBe(false);
    expect(isTruthy(doubleValue(0.5), records)).toBe(true);
    expect(isTruthy(strValue(""), records)).toBe(false);
    expect(isTruthy({ kind: "record", id: empty }, records)).toBe(false);
    expect(isTruthy({ kind: "record", id: full }, records)).toBe(true);
  });

  test("compares records structurally across arenas", () => {
    const left = new RecordArena();
    const a = left.allocate();
    left.set(a, "x", intValue(1));
    left.set(a, "y", strValue("s"));

    const right = new RecordArena();
    right.allocate();
    const b = right.allocate();
    right.set(b, "y", strValue("s"));
    right.set(b, "x", intValue(1));

    expect(valuesEqual({ kind: "record", id: a }, { kind: "record", id: b }, left, right)).toBe(true);

    right.set(b, "x", intValue(2));
    expect(valuesEqual({ kind: "record", id: a }, { kind: "record", id: b }, left, right)).toBe(false);
  });

  test("does not equate ints with doubles", () => {
    const records = new RecordArena();
    expect(valuesEqual(intValue(1), doubleValue(1), records)).toBe(false);
    expect(valuesEqual(doubleValue(Number.NaN), doubleValue(Number.NaN), records)).toBe(true);
  });

  test("orders strings by code point", () => {
    expect(compareCodePoints("a", "b")).toBe(-1);
    expect(compareCodePoints("ab", "a")).toBe(1);
    expect(compareCodePoints("\u{FF61}", "\u{1F600}")).toBe(-1);
    expect(compareCodePoints("same", "same")).toBe(0);
  });

  test("converts to plain values", () => {
    const records = new RecordArena();
    const outer = records.allocate();
    const inner = records.allocate();
    records.set(inner, "flag", boolValue(false));
    records.set(outer, "n", intValue(7));
    records.set(outer, "inner", { kind: "record", id: inner });
    records.set(outer, "none", NIL);

    expect(toPlain({ kind: "record", id: outer }, records)).toEqual({
      n: 7n,
      inner: { flag: false },
      none: null,
    });
  });
});
