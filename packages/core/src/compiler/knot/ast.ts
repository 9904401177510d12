/**
 * AST node types for Knot source
 */

import type { SourceSpan } from "./errors.js";

// =============================================================================
// BASE TYPES
// =============================================================================

/** Base AST node with location info */
export interface ASTNode {
  span?: SourceSpan;
}

/** Unary operators: + - ! */
export type UnaryOperator = "+" | "-" | "!";

/** Binary operators */
export type BinaryOperator =
  | "*"
  | "/"
  | "+"
  | "-"
  | "<<"
  | ">>"
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "!="
  | "&&"
  | "||";

// =============================================================================
// MODULE
// =============================================================================

/** A parsed source file: `let` lines followed by one expression */
export interface ModuleNode extends ASTNode {
  kind: "module";
  letBindings: LetBinding[];
  expr: ExpressionNode;
}

/** `let name = expr`; parsed but never evaluated */
export interface LetBinding extends ASTNode {
  kind: "let";
  name: string;
  value: ExpressionNode;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type ExpressionNode =
  | LiteralNode
  | VarRefNode
  | FieldAccessNode
  | UnaryExprNode
  | BinaryExprNode
  | RecordLiteralNode
  | CallExprNode
  | FunctionLiteralNode;

/** Literal payloads; `double` never comes from source text */
export type Literal =
  | { type: "nil" }
  | { type: "int"; value: bigint }
  | { type: "double"; value: number }
  | { type: "str"; value: string };

export interface LiteralNode extends ASTNode {
  kind: "literal";
  literal: Literal;
}

export interface VarRefNode extends ASTNode {
  kind: "var_ref";
  name: string;
}

/** `base.field` */
export interface FieldAccessNode extends ASTNode {
  kind: "field_access";
  base: ExpressionNode;
  field: string;
}

export interface UnaryExprNode extends ASTNode {
  kind: "unary";
  op: UnaryOperator;
  operand: ExpressionNode;
}

export interface BinaryExprNode extends ASTNode {
  kind: "binary";
  op: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

/** A named entry inside a record literal */
export interface FieldNode extends ASTNode {
  kind: "field";
  name: string;
  value: ExpressionNode;
}

/** `{ name: expr ... }`, fields in declaration order */
export interface RecordLiteralNode extends ASTNode {
  kind: "record";
  letBindings: LetBinding[];
  fields: FieldNode[];
}

/** Function call; part of the data model only, the parser never produces it */
export interface CallExprNode extends ASTNode {
  kind: "call";
  callee: ExpressionNode;
  args: ExpressionNode[];
}

/** Function literal; part of the data model only, the parser never produces it */
export interface FunctionLiteralNode extends ASTNode {
  kind: "function";
  params: string[];
  body: ExpressionNode;
}

// =============================================================================
// HELPERS
// =============================================================================

/** Check if an expression is a binary or unary operation */
export function isOperation(expr: ExpressionNode): expr is BinaryExprNode | UnaryExprNode {
  return expr.kind === "binary" || expr.kind === "unary";
}

/** Find a field definition by name; the first definition wins */
export function findField(record: RecordLiteralNode, name: string): FieldNode | undefined {
  return record.fields.find((f) => f.name === name);
}
