/**
 * Line-aware tokenizer for Knot source
 */

import { type SourceLocation, TokenizeError, loc } from "./errors.js";

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type TokenType =
  // Structural
  | "NEWLINE"
  | "EOF"
  // Literals
  | "NUMBER"
  | "STRING"
  // Names
  | "IDENTIFIER"
  // Operators
  | "OPERATOR"
  | "ASSIGN" // =
  | "COLON" // :
  | "DOT" // .
  // Brackets
  | "LPAREN" // (
  | "RPAREN" // )
  | "LBRACE" // {
  | "RBRACE"; // }

/** Token with location info */
export interface Token {
  type: TokenType;
  value: string;
  location: SourceLocation;
}

/** A `#` comment; comments never reach the token stream */
export interface Comment {
  text: string;
  location: SourceLocation;
}

/** Multi-character operators, matched before single characters */
const MULTI_CHAR_OPS = ["<=", ">=", "==", "!=", "<<", ">>", "&&", "||"];

/** Single-character operators */
const SINGLE_CHAR_OPS = new Set(["+", "-", "*", "/", "!", "<", ">"]);

/** Escapes that stand for a single character */
const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  "\\": "\\",
  "'": "'",
  "/": "/",
  '"': '"',
};

const IDENT_START = /[\p{Alphabetic}_]/u;
const IDENT_PART = /[\p{Alphabetic}\p{N}_]/u;
const HEX_DIGIT = /[0-9a-fA-F]/;
const WHITESPACE = /[ \t\r\n]/;

// =============================================================================
// TOKENIZER CLASS
// =============================================================================

export class Tokenizer {
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 1;
  private tokens: Token[] = [];
  private comments: Comment[] = [];

  constructor(source: string) {
    this.source = source;
  }

  /** Tokenize the entire source */
  tokenize(): Token[] {
    while (this.pos < this.source.length) {
      this.scanToken();
    }

    this.emit("EOF", "");
    return this.tokens;
  }

  /** Get current character (a full code point) */
  private current(): string {
    const cp = this.source.codePointAt(this.pos);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  /** Advance position and update line/column tracking */
  private advance(): string {
    const char = this.current();
    this.pos += char.length;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  /** Get current location */
  private location(): SourceLocation {
    return loc(this.line, this.column, this.pos);
  }

  /** Emit a token */
  private emit(type: TokenType, value: string, location?: SourceLocation): void {
    this.tokens.push({
      type,
      value,
      location: location ?? this.location(),
    });
  }

  private error(message: string, location: SourceLocation): TokenizeError {
    return new TokenizeError(message, { location, source: this.source });
  }

  /** Comments seen while tokenizing */
  getComments(): Comment[] {
    return this.comments;
  }

  /** Skip a comment (# to end of line), remembering its text */
  private skipComment(): void {
    const location = this.location();
    let text = "";
    while (this.current() !== "\n" && this.pos < this.source.length) {
      text += this.advance();
    }
    this.comments.push({ text, location });
  }

  /** Scan a single token */
  private scanToken(): void {
    // Skip whitespace (except newlines)
    while (this.current() === " " || this.current() === "\t" || this.current() === "\r") {
      this.advance();
    }

    if (this.pos >= this.source.length) {
      return;
    }

    const startLocation = this.location();
    const char = this.current();

    if (char === "#") {
      this.skipComment();
      return;
    }

    if (char === "\n") {
      this.advance();
      this.emit("NEWLINE", "\n", startLocation);
      return;
    }

    if (char === '"') {
      this.scanString(startLocation);
      return;
    }

    if (/[0-9]/.test(char)) {
      this.scanNumber(startLocation);
      return;
    }

    for (const op of MULTI_CHAR_OPS) {
      if (this.source.startsWith(op, this.pos)) {
        for (let i = 0; i < op.length; i++) this.advance();
        this.emit("OPERATOR", op, startLocation);
        return;
      }
    }

    if (SINGLE_CHAR_OPS.has(char)) {
      this.advance();
      this.emit("OPERATOR", char, startLocation);
      return;
    }

    switch (char) {
      case "(":
        this.advance();
        this.emit("LPAREN", "(", startLocation);
        return;
      case ")":
        this.advance();
        this.emit("RPAREN", ")", startLocation);
        return;
      case "{":
        this.advance();
        this.emit("LBRACE", "{", startLocation);
        return;
      case "}":
        this.advance();
        this.emit("RBRACE", "}", startLocation);
        return;
      case ":":
        this.advance();
        this.emit("COLON", ":", startLocation);
        return;
      case ".":
        this.advance();
        this.emit("DOT", ".", startLocation);
        return;
      case "=":
        this.advance();
        this.emit("ASSIGN", "=", startLocation);
        return;
    }

    if (IDENT_START.test(char)) {
      this.scanIdentifier(startLocation);
      return;
    }

    throw this.error(`Unexpected character '${char}'`, startLocation);
  }

  /**
   * Scan a double-quoted string literal, decoding escapes.
   * Raw line breaks are kept; a backslash followed by whitespace drops the whole run.
   */
  private scanString(startLocation: SourceLocation): void {
    this.advance(); // opening quote
    let value = "";

    while (this.current() !== '"') {
      if (this.pos >= this.source.length) {
        throw this.error("Unterminated string literal", startLocation);
      }

      if (this.current() !== "\\") {
        value += this.advance();
        continue;
      }

      const escapeLocation = this.location();
      this.advance(); // backslash
      const escaped = this.current();

      if (escaped === "u") {
        value += this.scanUnicodeEscape(escapeLocation);
        continue;
      }

      const simple = SIMPLE_ESCAPES[escaped];
      if (simple !== undefined) {
        this.advance();
        value += simple;
        continue;
      }

      if (escaped !== "" && WHITESPACE.test(escaped)) {
        while (this.pos < this.source.length && WHITESPACE.test(this.current())) {
          this.advance();
        }
        continue;
      }

      if (escaped === "") {
        throw this.error("Unterminated string literal", startLocation);
      }
      throw this.error(`Invalid escape sequence '\\${escaped}'`, escapeLocation);
    }

    this.advance(); // closing quote
    this.emit("STRING", value, startLocation);
  }

  /** Scan the `u{XXXX}` part of a unicode escape (1 to 6 hex digits) */
  private scanUnicodeEscape(escapeLocation: SourceLocation): string {
    this.advance(); // u
    if (this.current() !== "{") {
      throw this.error("Expected '{' after '\\u'", escapeLocation);
    }
    this.advance();

    let hex = "";
    while (HEX_DIGIT.test(this.current()) && hex.length < 6) {
      hex += this.advance();
    }
    if (hex.length === 0 || this.current() !== "}") {
      throw this.error("Unicode escape must be '\\u{' followed by 1 to 6 hex digits and '}'", escapeLocation);
    }
    this.advance();

    const codePoint = Number.parseInt(hex, 16);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw this.error(`Invalid unicode scalar value U+${hex.toUpperCase()}`, escapeLocation);
    }
    return String.fromCodePoint(codePoint);
  }

  /** Scan an integer literal; `_` may follow any digit */
  private scanNumber(startLocation: SourceLocation): void {
    let value = "";

    while (/[0-9_]/.test(this.current())) {
      const char = this.advance();
      if (char !== "_") value += char;
    }

    this.emit("NUMBER", value, startLocation);
  }

  /** Scan an identifier */
  private scanIdentifier(startLocation: SourceLocation): void {
    let value = "";

    while (this.pos < this.source.length && IDENT_PART.test(this.current())) {
      value += this.advance();
    }

    this.emit("IDENTIFIER", value, startLocation);
  }
}

/**
 * Tokenize source code
 */
export function tokenize(source: string): Token[] {
  const tokenizer = new Tokenizer(source);
  return tokenizer.tokenize();
}

/**
 * Collect the comments in source code
 */
export function findComments(source: string): Comment[] {
  const tokenizer = new Tokenizer(source);
  tokenizer.tokenize();
  return tokenizer.getComments();
}
