/**
 * Expression Evaluator
 * Walks the AST against a chain of contexts, resolving record fields lazily
 */

import type {
  BinaryExprNode,
  BinaryOperator,
  ExpressionNode,
  FieldNode,
  Literal,
  ModuleNode,
  RecordLiteralNode,
  UnaryExprNode,
} from "../compiler/knot/ast.js";
import type { SourceSpan } from "../compiler/knot/errors.js";
import { EvalContext } from "./context.js";
import {
  CyclicReferenceError,
  DivisionByZeroError,
  FieldNotFoundError,
  IntegerOverflowError,
  InvalidFieldAccessTargetError,
  OperandTypeError,
  ShiftRangeError,
  UnboundVariableError,
  UnsupportedExpressionError,
} from "./errors.js";
import { NIL, RecordArena, type Value, boolValue, compareCodePoints, isTruthy, typeName } from "./values.js";

const INT_MIN = -(2n ** 63n);
const INT_MAX = 2n ** 63n - 1n;

type ArithmeticOp = "*" | "/" | "+" | "-";
type ComparisonOp = "<" | ">" | "<=" | ">=" | "==" | "!=";

/** Operand pair after int→double promotion */
type NumericPair =
  | { kind: "int"; left: bigint; right: bigint }
  | { kind: "double"; left: number; right: number };

export interface EvaluateOptions {
  /** Called each time a field's defining expression has been evaluated and stored */
  onFieldEvaluated?: (field: string, value: Value) => void;
}

/** Result of evaluating a module */
export interface ModuleEvaluation {
  value: Value;
  records: RecordArena;
}

/**
 * Promote a pair of numeric values: int⊗int stays int, any double makes both double.
 */
function numericPair(left: Value, right: Value): NumericPair | undefined {
  if (left.kind === "int" && right.kind === "int") {
    return { kind: "int", left: left.value, right: right.value };
  }
  const l = left.kind === "int" ? Number(left.value) : left.kind === "double" ? left.value : undefined;
  const r = right.kind === "int" ? Number(right.value) : right.kind === "double" ? right.value : undefined;
  if (l === undefined || r === undefined) {
    return undefined;
  }
  return { kind: "double", left: l, right: r };
}

function compareWith<T extends number | bigint>(op: ComparisonOp, a: T, b: T): boolean {
  switch (op) {
    case "<":
      return a < b;
    case ">":
      return a > b;
    case "<=":
      return a <= b;
    case ">=":
      return a >= b;
    case "==":
      return a === b;
    case "!=":
      return a !== b;
  }
}

function checkedInt(value: bigint, op: string, span?: SourceSpan): Value {
  if (value < INT_MIN || value > INT_MAX) {
    throw new IntegerOverflowError(op, span);
  }
  return { kind: "int", value };
}

function literalValue(literal: Literal): Value {
  switch (literal.type) {
    case "nil":
      return NIL;
    case "int":
      return { kind: "int", value: literal.value };
    case "double":
      return { kind: "double", value: literal.value };
    case "str":
      return { kind: "str", value: literal.value };
  }
}

// =============================================================================
// EVALUATOR
// =============================================================================

export class Evaluator {
  readonly records: RecordArena;
  private readonly options: EvaluateOptions;
  /** Fields whose defining expression is currently being evaluated, outermost first */
  private readonly inProgress: Array<{ recordId: number; name: string }> = [];

  constructor(records: RecordArena, options: EvaluateOptions = {}) {
    this.records = records;
    this.options = options;
  }

  /** Evaluate an expression in a context */
  evaluate(expr: ExpressionNode, ctx: EvalContext): Value {
    switch (expr.kind) {
      case "literal":
        return literalValue(expr.literal);

      case "var_ref":
        return this.lookup(expr.name, ctx, expr.span);

      case "field_access": {
        const base = this.evaluate(expr.base, ctx);
        if (base.kind !== "record") {
          throw new InvalidFieldAccessTargetError(typeName(base), expr.span);
        }
        const value = this.records.get(base.id, expr.field);
        if (value === undefined) {
          throw new FieldNotFoundError(expr.field, expr.span);
        }
        return value;
      }

      case "unary":
        return this.evaluateUnary(expr, this.evaluate(expr.operand, ctx));

      case "binary": {
        // Both operands are always evaluated; && and || do not short-circuit
        const left = this.evaluate(expr.left, ctx);
        const right = this.evaluate(expr.right, ctx);
        return this.evaluateBinary(expr, left, right);
      }

      case "record":
        return this.evaluateRecord(expr, ctx);

      case "call":
      case "function":
        throw new UnsupportedExpressionError(expr.kind, expr.span);

      default: {
        const unknown: never = expr;
        throw new UnsupportedExpressionError(String(unknown), undefined);
      }
    }
  }

  /**
   * Resolve a variable: an already-evaluated field anywhere up the chain wins;
   * otherwise the nearest defining literal's field is evaluated in its own
   * context and memoized there.
   */
  private lookup(name: string, ctx: EvalContext, span?: SourceSpan): Value {
    const existing = ctx.lookupValue(name);
    if (existing !== undefined) {
      return existing;
    }

    const definition = ctx.findDefinition(name);
    if (definition === undefined) {
      throw new UnboundVariableError(name, span);
    }
    return this.evaluateField(definition.field, definition.context);
  }

  /** Evaluate a field in the context that defines it and store the result there */
  private evaluateField(field: FieldNode, ctx: EvalContext): Value {
    const start = this.inProgress.findIndex((f) => f.recordId === ctx.recordId && f.name === field.name);
    if (start !== -1) {
      const cycle = [...this.inProgress.slice(start).map((f) => f.name), field.name];
      throw new CyclicReferenceError(cycle, field.span);
    }

    this.inProgress.push({ recordId: ctx.recordId, name: field.name });
    let value: Value;
    try {
      value = this.evaluate(field.value, ctx);
    } finally {
      this.inProgress.pop();
    }

    ctx.assign(field.name, value);
    this.options.onFieldEvaluated?.(field.name, value);
    return value;
  }

  /** Fill a fresh record, skipping fields that lookups already filled in */
  private evaluateRecord(literal: RecordLiteralNode, ctx: EvalContext): Value {
    const recordId = this.records.allocate();
    const recordCtx = ctx.child(recordId, literal);

    for (const field of literal.fields) {
      if (recordCtx.hasValue(field.name)) {
        continue;
      }
      this.evaluateField(field, recordCtx);
    }

    return { kind: "record", id: recordId };
  }

  private evaluateUnary(expr: UnaryExprNode, operand: Value): Value {
    switch (expr.op) {
      case "+":
        return operand;
      case "-":
        if (operand.kind === "int") {
          return checkedInt(-operand.value, "-", expr.span);
        }
        if (operand.kind === "double") {
          return { kind: "double", value: -operand.value };
        }
        throw new OperandTypeError("-", typeName(operand), undefined, expr.span);
      case "!":
        return boolValue(!isTruthy(operand, this.records));
    }
  }

  private evaluateBinary(expr: BinaryExprNode, left: Value, right: Value): Value {
    const op: BinaryOperator = expr.op;
    switch (op) {
      case "*":
      case "/":
      case "+":
      case "-":
        return this.arithmetic(op, left, right, expr.span);
      case "<<":
      case ">>":
        return this.shift(op, left, right, expr.span);
      case "<":
      case ">":
      case "<=":
      case ">=":
      case "==":
      case "!=":
        return this.compare(op, left, right, expr.span);
      case "&&":
        return boolValue(isTruthy(left, this.records) && isTruthy(right, this.records));
      case "||":
        return boolValue(isTruthy(left, this.records) || isTruthy(right, this.records));
    }
  }

  private arithmetic(op: ArithmeticOp, left: Value, right: Value, span?: SourceSpan): Value {
    const pair = numericPair(left, right);
    if (pair === undefined) {
      throw new OperandTypeError(op, typeName(left), typeName(right), span);
    }

    if (pair.kind === "double") {
      const { left: a, right: b } = pair;
      switch (op) {
        case "*":
          return { kind: "double", value: a * b };
        case "/":
          return { kind: "double", value: a / b };
        case "+":
          return { kind: "double", value: a + b };
        case "-":
          return { kind: "double", value: a - b };
      }
    }

    const { left: a, right: b } = pair;
    switch (op) {
      case "*":
        return checkedInt(a * b, op, span);
      case "/":
        if (b === 0n) {
          throw new DivisionByZeroError(span);
        }
        return checkedInt(a / b, op, span);
      case "+":
        return checkedInt(a + b, op, span);
      case "-":
        return checkedInt(a - b, op, span);
    }
  }

  private shift(op: "<<" | ">>", left: Value, right: Value, span?: SourceSpan): Value {
    if (left.kind !== "int" || right.kind !== "int") {
      throw new OperandTypeError(op, typeName(left), typeName(right), span);
    }
    const amount = right.value;
    if (amount < 0n || amount > 63n) {
      throw new ShiftRangeError(op, amount, span);
    }
    const value = op === "<<" ? BigInt.asIntN(64, left.value << amount) : left.value >> amount;
    return { kind: "int", value };
  }

  private compare(op: ComparisonOp, left: Value, right: Value, span?: SourceSpan): Value {
    const pair = numericPair(left, right);
    if (pair !== undefined) {
      return boolValue(
        pair.kind === "int" ? compareWith(op, pair.left, pair.right) : compareWith(op, pair.left, pair.right)
      );
    }
    if (left.kind === "str" && right.kind === "str") {
      return boolValue(compareWith(op, compareCodePoints(left.value, right.value), 0));
    }
    if (left.kind === "bool" && right.kind === "bool") {
      return boolValue(compareWith(op, Number(left.value), Number(right.value)));
    }
    throw new OperandTypeError(op, typeName(left), typeName(right), span);
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Evaluate an expression against an existing context
 */
export function evaluate(expr: ExpressionNode, ctx: EvalContext, options?: EvaluateOptions): Value {
  return new Evaluator(ctx.records, options).evaluate(expr, ctx);
}

/**
 * Evaluate a module's expression in a fresh global context.
 * `let` bindings are not evaluated.
 */
export function evaluateModule(module: ModuleNode, options?: EvaluateOptions): ModuleEvaluation {
  const records = new RecordArena();
  const global = EvalContext.global(records);
  const value = new Evaluator(records, options).evaluate(module.expr, global);
  return { value, records };
}
