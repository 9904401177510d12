/**
 * Recursive descent parser for Knot source
 */

import type {
  BinaryExprNode,
  BinaryOperator,
  ExpressionNode,
  FieldAccessNode,
  FieldNode,
  LetBinding,
  LiteralNode,
  ModuleNode,
  RecordLiteralNode,
  UnaryExprNode,
  UnaryOperator,
  VarRefNode,
} from "./ast.js";
import { ParseError, type SourceSpan, span } from "./errors.js";
import { type Token, type TokenType, tokenize } from "./tokenizer.js";

/**
 * Binary operators by precedence, loosest first.
 * `parseBinary(level)` handles `BINARY_LEVELS[level]`.
 */
const BINARY_LEVELS: ReadonlyArray<ReadonlyArray<BinaryOperator>> = [
  ["||"],
  ["&&"],
  ["==", "!="],
  ["<", ">", "<=", ">="],
  ["<<", ">>"],
  ["+", "-"],
  ["*", "/"],
];

const UNARY_OPERATORS: ReadonlyArray<UnaryOperator> = ["+", "-", "!"];

const INT_MIN = -(2n ** 63n);
const INT_MAX = 2n ** 63n - 1n;

const TOKEN_NAMES: Record<TokenType, string> = {
  NEWLINE: "line break",
  EOF: "end of input",
  NUMBER: "integer",
  STRING: "string",
  IDENTIFIER: "identifier",
  OPERATOR: "operator",
  ASSIGN: "'='",
  COLON: "':'",
  DOT: "'.'",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
};

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case "NUMBER":
    case "IDENTIFIER":
    case "OPERATOR":
      return `${TOKEN_NAMES[token.type]} '${token.value}'`;
    case "STRING":
      return `string ${JSON.stringify(token.value)}`;
    default:
      return TOKEN_NAMES[token.type];
  }
}

function isBinaryOperator(value: string, ops: ReadonlyArray<BinaryOperator>): value is BinaryOperator {
  return ops.some((op) => op === value);
}

function isUnaryOperator(value: string): value is UnaryOperator {
  return UNARY_OPERATORS.some((op) => op === value);
}

// =============================================================================
// PARSER CLASS
// =============================================================================

export class Parser {
  private readonly tokens: Token[];
  private readonly source: string;
  private pos = 0;

  constructor(tokens: Token[], source: string) {
    this.tokens = tokens;
    this.source = source;
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /** Token at an absolute index, EOF past the end */
  private tokenAt(index: number): Token {
    return (
      this.tokens[index] ??
      this.tokens[this.tokens.length - 1] ?? {
        type: "EOF",
        value: "",
        location: { line: 1, column: 1, offset: 0 },
      }
    );
  }

  /** Get current token */
  private current(): Token {
    return this.tokenAt(this.pos);
  }

  /** Peek at the token after the current one */
  private peek(): Token {
    return this.tokenAt(this.pos + 1);
  }

  /** Index of the first non-newline token at or after the current one */
  private nextSignificant(): number {
    let i = this.pos;
    while (this.tokenAt(i).type === "NEWLINE") i++;
    return i;
  }

  /** Check if current token matches */
  private check(type: TokenType, value?: string): boolean {
    const token = this.current();
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  /** Advance and return previous token */
  private advance(): Token {
    const token = this.current();
    if (token.type !== "EOF") {
      this.pos++;
    }
    return token;
  }

  private error(message: string, token: Token = this.current()): ParseError {
    return new ParseError(message, { location: token.location, source: this.source });
  }

  /** Expect and consume a specific token */
  private expect(type: TokenType, what: string = TOKEN_NAMES[type]): Token {
    const token = this.current();
    if (token.type !== type) {
      throw this.error(`Expected ${what} but got ${describeToken(token)}`);
    }
    return this.advance();
  }

  /** Skip newlines */
  private skipNewlines(): void {
    while (this.check("NEWLINE")) {
      this.advance();
    }
  }

  /** Create a source span from a start token to the current token's location */
  private makeSpan(startToken: Token): SourceSpan {
    return span(startToken.location, this.current().location);
  }

  // ===========================================================================
  // TOP-LEVEL PARSING
  // ===========================================================================

  /** Parse a complete module: `let` lines, then exactly one expression */
  parseModule(): ModuleNode {
    const startToken = this.current();
    this.skipNewlines();

    const letBindings: LetBinding[] = [];
    while (this.atLetBinding()) {
      letBindings.push(this.parseLetBinding());
      if (!this.check("NEWLINE")) {
        throw this.error(`Expected line break after let binding but got ${describeToken(this.current())}`);
      }
      this.skipNewlines();
    }

    const expr = this.parseExpression();
    this.expectEnd();

    return { kind: "module", letBindings, expr, span: this.makeSpan(startToken) };
  }

  /** Parse a single expression that must make up the whole input */
  parseStandaloneExpression(): ExpressionNode {
    this.skipNewlines();
    const expr = this.parseExpression();
    this.expectEnd();
    return expr;
  }

  private expectEnd(): void {
    this.skipNewlines();
    if (!this.check("EOF")) {
      throw this.error(`Expected end of input but got ${describeToken(this.current())}`);
    }
  }

  /** `let` followed by a name and `=` */
  private atLetBinding(): boolean {
    if (!this.check("IDENTIFIER", "let")) return false;
    let i = this.pos + 1;
    while (this.tokenAt(i).type === "NEWLINE") i++;
    if (this.tokenAt(i).type !== "IDENTIFIER") return false;
    i++;
    while (this.tokenAt(i).type === "NEWLINE") i++;
    return this.tokenAt(i).type === "ASSIGN";
  }

  /** Parse `let name = expr` */
  private parseLetBinding(): LetBinding {
    const startToken = this.expect("IDENTIFIER", "'let'");
    this.skipNewlines();
    const name = this.expect("IDENTIFIER", "binding name").value;
    this.skipNewlines();
    this.expect("ASSIGN");
    this.skipNewlines();
    const value = this.parseExpression();
    return { kind: "let", name, value, span: this.makeSpan(startToken) };
  }

  // ===========================================================================
  // EXPRESSION PARSING
  // ===========================================================================

  /** Parse an expression */
  parseExpression(): ExpressionNode {
    return this.parseBinary(0);
  }

  /**
   * Precedence climbing over BINARY_LEVELS. The right operand is parsed at
   * the same level, so operators within one level associate to the right:
   * `a - b - c` is `a - (b - c)`.
   */
  private parseBinary(level: number): ExpressionNode {
    const ops = BINARY_LEVELS[level];
    if (ops === undefined) {
      return this.parseAtom();
    }

    const startToken = this.current();
    const left = this.parseBinary(level + 1);

    const op = this.matchBinaryOperator(ops);
    if (op === undefined) {
      return left;
    }

    const right = this.parseBinary(level);
    const node: BinaryExprNode = { kind: "binary", op, left, right };
    node.span = this.makeSpan(startToken);
    return node;
  }

  /** Consume one of `ops`, allowing line breaks on either side of it */
  private matchBinaryOperator(ops: ReadonlyArray<BinaryOperator>): BinaryOperator | undefined {
    const index = this.nextSignificant();
    const token = this.tokenAt(index);
    const value = token.value;
    if (token.type !== "OPERATOR" || !isBinaryOperator(value, ops)) {
      return undefined;
    }
    this.pos = index + 1;
    this.skipNewlines();
    return value;
  }

  /** Parse a primary expression followed by any `.field` suffixes */
  private parseAtom(): ExpressionNode {
    const startToken = this.current();
    let expr = this.parsePrimary();

    while (this.tokenAt(this.nextSignificant()).type === "DOT") {
      this.pos = this.nextSignificant() + 1;
      this.skipNewlines();
      const field = this.expect("IDENTIFIER", "field name after '.'").value;
      const node: FieldAccessNode = { kind: "field_access", base: expr, field };
      node.span = this.makeSpan(startToken);
      expr = node;
    }

    return expr;
  }

  /** Parse primary expression */
  private parsePrimary(): ExpressionNode {
    const token = this.current();

    switch (token.type) {
      case "LBRACE":
        return this.parseRecord();

      case "LPAREN": {
        this.advance();
        this.skipNewlines();
        const expr = this.parseExpression();
        this.skipNewlines();
        this.expect("RPAREN");
        return expr;
      }

      case "STRING": {
        this.advance();
        const node: LiteralNode = { kind: "literal", literal: { type: "str", value: token.value } };
        node.span = this.makeSpan(token);
        return node;
      }

      case "NUMBER":
        this.advance();
        return this.intLiteral(token, "", token);

      case "OPERATOR": {
        const op = token.value;
        if (!isUnaryOperator(op)) break;

        // A sign directly followed by digits is part of the literal
        const next = this.peek();
        if (
          (op === "+" || op === "-") &&
          next.type === "NUMBER" &&
          next.location.offset === token.location.offset + 1
        ) {
          this.advance();
          this.advance();
          return this.intLiteral(next, op, token);
        }

        this.advance();
        this.skipNewlines();
        const operand = this.parseAtom();
        const node: UnaryExprNode = { kind: "unary", op, operand };
        node.span = this.makeSpan(token);
        return node;
      }

      case "IDENTIFIER": {
        this.advance();
        const node: VarRefNode = { kind: "var_ref", name: token.value };
        node.span = this.makeSpan(token);
        return node;
      }
    }

    throw this.error(`Expected expression but got ${describeToken(token)}`, token);
  }

  /** Build an integer literal, rejecting values outside the signed 64-bit range */
  private intLiteral(digits: Token, sign: "" | "+" | "-", startToken: Token): LiteralNode {
    const value = BigInt(`${sign === "-" ? "-" : ""}${digits.value}`);
    if (value < INT_MIN || value > INT_MAX) {
      throw this.error(`Integer literal ${sign}${digits.value} is out of the 64-bit range`, startToken);
    }
    const node: LiteralNode = { kind: "literal", literal: { type: "int", value } };
    node.span = this.makeSpan(startToken);
    return node;
  }

  /** Parse a record literal: fields separated by line breaks */
  private parseRecord(): RecordLiteralNode {
    const startToken = this.expect("LBRACE");
    this.skipNewlines();

    const fields: FieldNode[] = [];
    while (!this.check("RBRACE")) {
      const field = this.parseField();
      fields.push(field);

      if (this.check("NEWLINE")) {
        this.skipNewlines();
      } else if (!this.check("RBRACE")) {
        throw this.error(
          `Expected line break or '}' after field '${field.name}' but got ${describeToken(this.current())}`
        );
      }
    }
    this.expect("RBRACE");

    const node: RecordLiteralNode = { kind: "record", letBindings: [], fields };
    node.span = this.makeSpan(startToken);
    return node;
  }

  /** Parse `name: expr` */
  private parseField(): FieldNode {
    const nameToken = this.expect("IDENTIFIER", "field name");
    this.skipNewlines();
    this.expect("COLON", `':' after field name '${nameToken.value}'`);
    this.skipNewlines();
    const value = this.parseExpression();

    const node: FieldNode = { kind: "field", name: nameToken.value, value };
    node.span = this.makeSpan(nameToken);
    return node;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Parse Knot source code into a module AST
 */
export function parse(source: string): ModuleNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, source);
  return parser.parseModule();
}

/**
 * Parse a single Knot expression; the whole input must be consumed
 */
export function parseExpression(source: string): ExpressionNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, source);
  return parser.parseStandaloneExpression();
}
