import { evaluateSource, parse, parseSource } from "@knotlang/core";
import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { astToJson, errorMessage, formatDiagnostic, parseIndent, renderErrors } from "./output.js";

describe("command output helpers", () => {
  it("parses indent values", () => {
    expect(parseIndent("4")).toBe(4);
    expect(parseIndent("0")).toBe(0);
    expect(() => parseIndent("-1")).toThrow(InvalidArgumentError);
    expect(() => parseIndent("two")).toThrow("Expected a non-negative integer.");
    expect(() => parseIndent("")).toThrow(InvalidArgumentError);
  });

  it("formats diagnostics with and without positions", () => {
    expect(formatDiagnostic({ code: "PARSE_ERROR", message: "Bad", line: 2, column: 3 })).toBe(
      "[PARSE_ERROR] Bad (line 2, column 3)"
    );
    expect(formatDiagnostic({ code: "FILE_READ_ERROR", message: "Missing" })).toBe("[FILE_READ_ERROR] Missing");
  });

  it("renders evaluation errors under the offending line", () => {
    const result = evaluateSource("{a: b}");
    expect(renderErrors(result.errors, result.source)).toBe(
      [
        "Error [UNBOUND_VARIABLE] at line 1, column 5:",
        "  Unbound variable 'b'",
        "",
        "  1 | {a: b}",
        "          ^",
      ].join("\n")
    );
  });

  it("renders parse errors from the text they were raised on", () => {
    const result = parseSource("{\n  a: }");
    expect(renderErrors(result.errors)).toBe(
      [
        "Error [PARSE_ERROR] at line 2, column 6:",
        "  Expected expression but got '}'",
        "",
        "  2 |   a: }",
        "           ^",
      ].join("\n")
    );
  });

  it("renders errors without a position as a header and message", () => {
    expect(
      renderErrors([
        { code: "FILE_READ_ERROR", message: "Failed to read file: missing" },
        { code: "EVAL_ERROR", message: "boom" },
      ])
    ).toBe("Error [FILE_READ_ERROR]:\n  Failed to read file: missing\n\nError [EVAL_ERROR]:\n  boom");
  });

  it("renders the AST without spans by default", () => {
    expect(JSON.parse(astToJson(parse("{a: 1}")))).toEqual({
      kind: "module",
      letBindings: [],
      expr: {
        kind: "record",
        letBindings: [],
        fields: [{ kind: "field", name: "a", value: { kind: "literal", literal: { type: "int", value: "1" } } }],
      },
    });
  });

  it("keeps spans when asked", () => {
    const tree = JSON.parse(astToJson(parse("x"), { spans: true, indent: 0 }));
    expect(tree.expr.span.start).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it("describes thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
