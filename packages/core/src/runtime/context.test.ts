/**
 * Evaluation context tests
 */

import { describe, expect, test } from "vitest";
import { field, intLit, record } from "../builders/index.js";
import { EvalContext } from "./context.js";
import { RecordArena, intValue } from "./values.js";

describe("EvalContext", () => {
  test("starts from an empty global context", () => {
    const records = new RecordArena();
    const global = EvalContext.global(records);
    expect(global.parent).toBeNull();
    expect(global.literal.fields).toEqual([]);
    expect(records.isEmpty(global.recordId)).toBe(true);
  });

  test("walks from the innermost context outwards", () => {
    const records = new RecordArena();
    const global = EvalContext.global(records);
    const outer = global.child(records.allocate(), record({}));
    const inner = outer.child(records.allocate(), record({}));
    expect([...inner.chain()]).toEqual([inner, outer, global]);
  });

  test("finds evaluated values up the chain", () => {
    const records = new RecordArena();
    const outer = EvalContext.global(records).child(records.allocate(), record({}));
    const inner = outer.child(records.allocate(), record({}));
    outer.assign("x", intValue(1));

    expect(inner.lookupValue("x")).toEqual(intValue(1));
    expect(inner.hasValue("x")).toBe(false);
    expect(inner.lookupValue("y")).toBeUndefined();
  });

  test("finds the nearest definition", () => {
    const records = new RecordArena();
    const outerLiteral = record([field("x", intLit(1)), field("y", intLit(2))]);
    const innerLiteral = record([field("x", intLit(3))]);
    const outer = EvalContext.global(records).child(records.allocate(), outerLiteral);
    const inner = outer.child(records.allocate(), innerLiteral);

    expect(inner.findDefinition("x")).toEqual({ context: inner, field: innerLiteral.fields[0] });
    expect(inner.findDefinition("y")?.context).toBe(outer);
    expect(inner.findDefinition("z")).toBeUndefined();
  });
});
