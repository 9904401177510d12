/**
 * Printer tests
 */

import { describe, expect, test } from "vitest";
import { binary, call, doubleLit, intLit, letBinding, nilLit, record, unary, varRef } from "../../builders/index.js";
import { evaluateModule } from "../../runtime/evaluator.js";
import { toPlain, valuesEqual } from "../../runtime/values.js";
import { PrintError } from "./errors.js";
import { parse, parseExpression } from "./parser.js";
import { printExpression, printModule, quoteString } from "./printer.js";

const reprint = (source: string) => printExpression(parseExpression(source));

describe("Printer", () => {
  describe("operators", () => {
    test("omits parentheses implied by precedence", () => {
      expect(reprint("1 + 2 * 3")).toBe("1 + 2 * 3");
      expect(reprint("(a || b) && c")).toBe("(a || b) && c");
    });

    test("keeps right-grouped chains bare", () => {
      expect(reprint("3 - 8 - 1")).toBe("3 - 8 - 1");
    });

    test("parenthesizes a left operand of the same level", () => {
      expect(reprint("(3 - 8) - 1")).toBe("(3 - 8) - 1");
    });

    test("keeps a detached sign apart from its literal", () => {
      expect(reprint("- 5")).toBe("-(5)");
      expect(reprint("-5")).toBe("-5");
      expect(printExpression(unary("-", intLit(-5)))).toBe("--5");
    });

    test("parenthesizes binary operands of unary operators and field access", () => {
      expect(reprint("!(a && b)")).toBe("!(a && b)");
      expect(reprint("(a + b).c")).toBe("(a + b).c");
    });

    test("prints a unary operand of a unary bare", () => {
      expect(reprint("!-x")).toBe("!-x");
      expect(reprint("- -x")).toBe("--x");
      expect(printExpression(unary("-", unary("-", intLit(5))))).toBe("--(5)");
    });
  });

  describe("records", () => {
    test("prints one field per line", () => {
      expect(reprint('{a: 1\nb: {c: "x"}}')).toBe('{\n  a: 1\n  b: {\n    c: "x"\n  }\n}');
    });

    test("prints empty records inline", () => {
      expect(reprint("{}")).toBe("{}");
    });
  });

  describe("strings", () => {
    test("escapes quotes, backslashes and control characters", () => {
      expect(quoteString('a"b\\\n\u0001')).toBe('"a\\"b\\\\\\n\\u{1}"');
    });

    test("re-reads to the same string", () => {
      const value = 'tab\there "quoted" \u{1F600}';
      expect(parseExpression(quoteString(value))).toMatchObject({ literal: { type: "str", value } });
    });
  });

  describe("modules", () => {
    test("prints let bindings above the expression", () => {
      expect(printModule(parse("let x = 1\n{a: x}"))).toBe("let x = 1\n\n{\n  a: x\n}\n");
    });

    test("prints a module without bindings", () => {
      expect(printModule(parse("1 + 2"))).toBe("1 + 2\n");
    });

    test("re-parses to the same tree", () => {
      const source = "{\n  a: b * (c - 1)\n  b: -2\n  c: !d.e\n}";
      const printed = printModule(parse(source));
      expect(printModule(parse(printed))).toBe(printed);
      expect(printed).toBe(`${source}\n`);
    });

    test("re-parses to a program with the same value", () => {
      const source = `{
  a: 10 - 4 - 3
  b: -2 * - c.d
  c: {d: 5 - -1}
  e: !{}
  s: "tab\\there \\"q\\""
  f: (10 - 4) - 3
}`;
      const printed = printModule(parse(source));
      expect(printed).toContain("b: -2 * -c.d\n");
      expect(printed).toContain("    d: 5 - -1\n");

      const first = evaluateModule(parse(source));
      const second = evaluateModule(parse(printed));
      expect(valuesEqual(first.value, second.value, first.records, second.records)).toBe(true);
      expect(toPlain(second.value, second.records)).toMatchObject({
        a: 9n,
        b: 12n,
        c: { d: 6n },
        s: 'tab\there "q"',
        f: 3n,
      });
    });
  });

  describe("errors", () => {
    test("rejects nodes without source syntax", () => {
      expect(() => printExpression(doubleLit(1.5))).toThrow(PrintError);
      expect(() => printExpression(doubleLit(1.5))).toThrow("Cannot print double literal: it has no source syntax");
      expect(() => printExpression(nilLit())).toThrow("Cannot print nil literal: it has no source syntax");
      expect(() => printExpression(call(varRef("f"), []))).toThrow(
        "Cannot print call expression: it has no source syntax"
      );
    });

    test("rejects records with let bindings", () => {
      const expr = record({ a: intLit(1) }, [letBinding("x", intLit(2))]);
      expect(() => printExpression(expr)).toThrow(PrintError);
    });

    test("prints built trees", () => {
      expect(printExpression(binary(varRef("a"), "<<", intLit(2)))).toBe("a << 2");
    });
  });
});
