/**
 * Expression builders - helpers for constructing Knot ASTs in code
 */

import type {
  BinaryExprNode,
  BinaryOperator,
  CallExprNode,
  ExpressionNode,
  FieldAccessNode,
  FieldNode,
  FunctionLiteralNode,
  LetBinding,
  LiteralNode,
  ModuleNode,
  RecordLiteralNode,
  UnaryExprNode,
  UnaryOperator,
  VarRefNode,
} from "../compiler/knot/ast.js";

/**
 * Create an integer literal
 */
export function intLit(value: bigint | number): LiteralNode {
  return { kind: "literal", literal: { type: "int", value: BigInt(value) } };
}

/**
 * Create a string literal
 */
export function strLit(value: string): LiteralNode {
  return { kind: "literal", literal: { type: "str", value } };
}

export function nilLit(): LiteralNode {
  return { kind: "literal", literal: { type: "nil" } };
}

/** Double literals exist only in built ASTs; source text has no syntax for them */
export function doubleLit(value: number): LiteralNode {
  return { kind: "literal", literal: { type: "double", value } };
}

/**
 * Create a variable reference
 */
export function varRef(name: string): VarRefNode {
  return { kind: "var_ref", name };
}

/**
 * Create a field access expression: `base.field`
 */
export function fieldAccess(base: ExpressionNode, field: string): FieldAccessNode {
  return { kind: "field_access", base, field };
}

export function unary(op: UnaryOperator, operand: ExpressionNode): UnaryExprNode {
  return { kind: "unary", op, operand };
}

/**
 * Create a binary expression
 */
export function binary(left: ExpressionNode, op: BinaryOperator, right: ExpressionNode): BinaryExprNode {
  return { kind: "binary", op, left, right };
}

/**
 * Create a record field
 */
export function field(name: string, value: ExpressionNode): FieldNode {
  return { kind: "field", name, value };
}

/**
 * Create a record literal. Fields may be given as `field(...)` nodes or as an
 * object whose key order becomes the declaration order.
 */
export function record(
  fields: FieldNode[] | Record<string, ExpressionNode>,
  letBindings: LetBinding[] = []
): RecordLiteralNode {
  const list = Array.isArray(fields)
    ? fields
    : Object.entries(fields).map(([name, value]) => field(name, value));
  return { kind: "record", letBindings, fields: list };
}

export function letBinding(name: string, value: ExpressionNode): LetBinding {
  return { kind: "let", name, value };
}

/**
 * Create a module from its expression and optional `let` bindings
 */
export function module(expr: ExpressionNode, letBindings: LetBinding[] = []): ModuleNode {
  return { kind: "module", letBindings, expr };
}

/**
 * Create a function call expression
 */
export function call(callee: ExpressionNode, args: ExpressionNode[]): CallExprNode {
  return { kind: "call", callee, args };
}

/**
 * Create a function literal
 */
export function fn(params: string[], body: ExpressionNode): FunctionLiteralNode {
  return { kind: "function", params, body };
}
