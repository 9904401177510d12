/**
 * Tokenizer tests
 */

import { describe, expect, test } from "vitest";
import { TokenizeError } from "./errors.js";
import { findComments, tokenize } from "./tokenizer.js";

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

describe("Tokenizer", () => {
  describe("basic tokens", () => {
    test("tokenizes a binary expression", () => {
      const tokens = tokenize("a + 1");
      expect(tokens.map((t) => [t.type, t.value])).toEqual([
        ["IDENTIFIER", "a"],
        ["OPERATOR", "+"],
        ["NUMBER", "1"],
        ["EOF", ""],
      ]);
    });

    test("prefers two-character operators", () => {
      const ops = tokenize("a<=b>>c!=d&&e").filter((t) => t.type === "OPERATOR");
      expect(ops.map((t) => t.value)).toEqual(["<=", ">>", "!=", "&&"]);
    });

    test("tokenizes punctuation", () => {
      expect(types("{a: (b).c}")).toEqual([
        "LBRACE",
        "IDENTIFIER",
        "COLON",
        "LPAREN",
        "IDENTIFIER",
        "RPAREN",
        "DOT",
        "IDENTIFIER",
        "RBRACE",
        "EOF",
      ]);
    });

    test("emits newlines as tokens", () => {
      expect(types("a\nb")).toEqual(["IDENTIFIER", "NEWLINE", "IDENTIFIER", "EOF"]);
    });

    test("skips comments up to the line break", () => {
      expect(types("a # note\nb")).toEqual(["IDENTIFIER", "NEWLINE", "IDENTIFIER", "EOF"]);
    });

    test("handles empty input", () => {
      expect(types("")).toEqual(["EOF"]);
    });
  });

  describe("comments", () => {
    test("collects comment text and position", () => {
      expect(findComments('a # note\nb "#x" # end')).toEqual([
        { text: "# note", location: { line: 1, column: 3, offset: 2 } },
        { text: "# end", location: { line: 2, column: 8, offset: 16 } },
      ]);
    });

    test("finds none in comment-free source", () => {
      expect(findComments('{s: "#"}')).toEqual([]);
    });
  });

  describe("numbers", () => {
    test("strips digit separators", () => {
      expect(tokenize("1_000_000")[0]?.value).toBe("1000000");
    });

    test("allows a trailing separator", () => {
      expect(tokenize("12_")[0]?.value).toBe("12");
    });

    test("splits digits from a following identifier", () => {
      expect(types("1a")).toEqual(["NUMBER", "IDENTIFIER", "EOF"]);
    });
  });

  describe("identifiers", () => {
    test("accepts unicode letters", () => {
      expect(tokenize("größe")[0]).toMatchObject({ type: "IDENTIFIER", value: "größe" });
    });

    test("accepts digits and underscores after the first character", () => {
      expect(tokenize("_max_2")[0]?.value).toBe("_max_2");
    });
  });

  describe("string escapes", () => {
    test("decodes simple escapes", () => {
      expect(tokenize('"a\\nb\\tc\\"d\\\\e\\/f"')[0]?.value).toBe('a\nb\tc"d\\e/f');
    });

    test("decodes unicode escapes", () => {
      expect(tokenize('"\\u{48}\\u{1F600}"')[0]?.value).toBe("H😀");
    });

    test("drops escaped whitespace", () => {
      expect(tokenize('"one \\\n    two"')[0]?.value).toBe("one two");
    });

    test("keeps raw line breaks", () => {
      const tokens = tokenize('"a\nb" c');
      expect(tokens[0]?.value).toBe("a\nb");
      expect(tokens[1]?.location).toEqual({ line: 2, column: 4, offset: 6 });
    });
  });

  describe("locations", () => {
    test("tracks line and column", () => {
      const tokens = tokenize("a\n  b");
      expect(tokens[2]).toMatchObject({ type: "IDENTIFIER", value: "b" });
      expect(tokens[2]?.location).toEqual({ line: 2, column: 3, offset: 4 });
    });
  });

  describe("error handling", () => {
    test("throws on unterminated string", () => {
      expect(() => tokenize('"hello')).toThrow("Unterminated string literal");
    });

    test("throws on invalid escape", () => {
      expect(() => tokenize('"\\q"')).toThrow("Invalid escape sequence '\\q'");
    });

    test("rejects surrogate code points", () => {
      expect(() => tokenize('"\\u{D800}"')).toThrow("Invalid unicode scalar value U+D800");
    });

    test("rejects unicode escapes longer than six digits", () => {
      expect(() => tokenize('"\\u{1234567}"')).toThrow(
        "Unicode escape must be '\\u{' followed by 1 to 6 hex digits and '}'"
      );
    });

    test("throws on unexpected character with its location", () => {
      try {
        tokenize("a & b");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TokenizeError);
        if (error instanceof TokenizeError) {
          expect(error.message).toBe("Unexpected character '&'");
          expect(error.code).toBe("TOKENIZE_ERROR");
          expect(error.location).toEqual({ line: 1, column: 3, offset: 2 });
        }
      }
    });
  });
});
