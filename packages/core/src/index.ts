/**
 * @knotlang/core
 * Parser and lazy record evaluator for the Knot configuration language
 */

// Compiler
export {
  parse,
  parseExpression,
  parseSource,
  parseFile,
  evaluateSource,
  evaluateFile,
  formatSource,
  formatFile,
  tokenize,
  findComments,
  Tokenizer,
  Parser,
  describeToken,
  printExpression,
  printModule,
  quoteString,
  findField,
  isOperation,
  KnotError,
  TokenizeError,
  ParseError,
  PrintError,
  formatErrors,
} from "./compiler/index.js";
export type {
  Diagnostic,
  ParseResult,
  EvaluationResult,
  FormatResult,
  Comment,
  Token,
  TokenType,
  SourceLocation,
  SourceSpan,
  KnotErrorOptions,
  ModuleNode,
  LetBinding,
  ExpressionNode,
  Literal,
  LiteralNode,
  VarRefNode,
  FieldAccessNode,
  UnaryExprNode,
  BinaryExprNode,
  RecordLiteralNode,
  FieldNode,
  CallExprNode,
  FunctionLiteralNode,
  UnaryOperator,
  BinaryOperator,
} from "./compiler/index.js";

// Runtime
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
  EvalContext,
  Evaluator,
  evaluate,
  evaluateModule,
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
} from "./runtime/index.js";
export type {
  RecordId,
  Value,
  ValueKind,
  PlainValue,
  FieldDefinition,
  EvaluateOptions,
  ModuleEvaluation,
} from "./runtime/index.js";

// Output
export { serialize, toJsonValue, SerializationError } from "./output/index.js";
export type { JsonValue, SerializeOptions } from "./output/index.js";

// Builders
export {
  intLit,
  strLit,
  nilLit,
  doubleLit,
  varRef,
  fieldAccess,
  unary,
  binary,
  field,
  record,
  letBinding,
  module,
  call,
  fn,
} from "./builders/index.js";
