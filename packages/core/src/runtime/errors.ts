/**
 * Evaluation errors
 */

import { KnotError, type SourceSpan } from "../compiler/knot/errors.js";

/** Base class for every error raised while evaluating */
export class EvalError extends KnotError {
  constructor(code: string, message: string, span?: SourceSpan) {
    super(code, message, { span });
    this.name = "EvalError";
  }
}

export class UnboundVariableError extends EvalError {
  readonly variable: string;

  constructor(variable: string, span?: SourceSpan) {
    super("UNBOUND_VARIABLE", `Unbound variable '${variable}'`, span);
    this.name = "UnboundVariableError";
    this.variable = variable;
  }
}

export class FieldNotFoundError extends EvalError {
  readonly field: string;

  constructor(field: string, span?: SourceSpan) {
    super("FIELD_NOT_FOUND", `Field does not exist '${field}'`, span);
    this.name = "FieldNotFoundError";
    this.field = field;
  }
}

export class InvalidFieldAccessTargetError extends EvalError {
  readonly actualType: string;

  constructor(actualType: string, span?: SourceSpan) {
    super("INVALID_FIELD_ACCESS_TARGET", `Invalid field access on value type '${actualType}'`, span);
    this.name = "InvalidFieldAccessTargetError";
    this.actualType = actualType;
  }
}

/** Operator applied to operands of the wrong type; `rightType` is absent for unary operators */
export class OperandTypeError extends EvalError {
  readonly operator: string;
  readonly leftType: string;
  readonly rightType?: string;

  constructor(operator: string, leftType: string, rightType?: string, span?: SourceSpan) {
    const message =
      rightType === undefined
        ? `Cannot apply unary '${operator}' to type '${leftType}'`
        : `Invalid types for operation '${operator}': ${leftType} and ${rightType}`;
    super("TYPE_ERROR", message, span);
    this.name = "OperandTypeError";
    this.operator = operator;
    this.leftType = leftType;
    this.rightType = rightType;
  }
}

export class UnsupportedExpressionError extends EvalError {
  readonly expressionKind: string;

  constructor(expressionKind: string, span?: SourceSpan) {
    super("UNSUPPORTED_EXPRESSION", `Evaluating ${expressionKind} expressions is not supported`, span);
    this.name = "UnsupportedExpressionError";
    this.expressionKind = expressionKind;
  }
}

export class IntegerOverflowError extends EvalError {
  constructor(operator: string, span?: SourceSpan) {
    super("INTEGER_OVERFLOW", `Integer overflow in '${operator}'`, span);
    this.name = "IntegerOverflowError";
  }
}

export class DivisionByZeroError extends EvalError {
  constructor(span?: SourceSpan) {
    super("DIVISION_BY_ZERO", "Integer division by zero", span);
    this.name = "DivisionByZeroError";
  }
}

export class ShiftRangeError extends EvalError {
  constructor(operator: string, amount: bigint, span?: SourceSpan) {
    super("SHIFT_OUT_OF_RANGE", `Shift amount ${amount} for '${operator}' must be between 0 and 63`, span);
    this.name = "ShiftRangeError";
  }
}

/** A field's value depends on itself */
export class CyclicReferenceError extends EvalError {
  readonly cycle: string[];

  constructor(cycle: string[], span?: SourceSpan) {
    super("CYCLIC_REFERENCE", `Cyclic reference: ${cycle.join(" -> ")}`, span);
    this.name = "CyclicReferenceError";
    this.cycle = cycle;
  }
}
