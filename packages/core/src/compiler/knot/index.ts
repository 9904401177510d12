/**
 * Knot syntax compiler
 *
 * Tokenizer, recursive descent parser, AST and printer for Knot source.
 */

export * from "./errors.js";
export * from "./tokenizer.js";
export * from "./ast.js";
export { Parser, parse, parseExpression, describeToken } from "./parser.js";
export { printExpression, printModule, quoteString } from "./printer.js";
