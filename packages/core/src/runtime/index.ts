/**
 * Runtime exports
 */

export {
  NIL,
  RecordArena,
  boolValue,
  intValue,
  doubleValue,
  strValue,
  typeName,
  isTruthy,
  valuesEqual,
  toPlain,
  compareCodePoints,
  type RecordId,
  type Value,
  type ValueKind,
  type PlainValue,
} from "./values.js";
export { EvalContext, type FieldDefinition } from "./context.js";
export {
  Evaluator,
  evaluate,
  evaluateModule,
  type EvaluateOptions,
  type ModuleEvaluation,
} from "./evaluator.js";
export {
  EvalError,
  UnboundVariableError,
  FieldNotFoundError,
  InvalidFieldAccessTargetError,
  OperandTypeError,
  UnsupportedExpressionError,
  IntegerOverflowError,
  DivisionByZeroError,
  ShiftRangeError,
  CyclicReferenceError,
} from "./errors.js";
