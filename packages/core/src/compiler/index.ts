/**
 * Compiler exports
 */

export * from "./knot/index.js";

import { readFile } from "node:fs/promises";
import { type EvaluateOptions, evaluateModule } from "../runtime/evaluator.js";
import type { RecordArena, Value } from "../runtime/values.js";
import type { ModuleNode } from "./knot/ast.js";
import { KnotError } from "./knot/errors.js";
import { parse } from "./knot/parser.js";
import { printModule } from "./knot/printer.js";
import { findComments } from "./knot/tokenizer.js";

/** A reported problem, positioned in the source when known */
export interface Diagnostic {
  code: string;
  message: string;
  line?: number;
  column?: number;
  /** The error behind the diagnostic, for rendering against the source */
  error?: KnotError;
}

/** Parse result */
export interface ParseResult {
  success: boolean;
  module?: ModuleNode;
  errors: Diagnostic[];
  warnings: Diagnostic[];
  /** Text that was parsed, when it could be read */
  source?: string;
}

/** Evaluation result; `records` owns every record reachable from `value` */
export interface EvaluationResult {
  success: boolean;
  value?: Value;
  records?: RecordArena;
  errors: Diagnostic[];
  warnings: Diagnostic[];
  source?: string;
}

/** Format result; `formatted` is the canonical text of the module */
export interface FormatResult {
  success: boolean;
  formatted?: string;
  errors: Diagnostic[];
  warnings: Diagnostic[];
  source?: string;
}

function toDiagnostic(error: unknown, fallbackCode: string): Diagnostic {
  if (error instanceof KnotError) {
    return {
      code: error.code,
      message: error.message,
      line: error.location?.line,
      column: error.location?.column,
      error,
    };
  }
  return {
    code: fallbackCode,
    message: error instanceof Error ? error.message : String(error),
  };
}

/** `let` bindings are parsed but never evaluated */
function unusedLetWarnings(module: ModuleNode): Diagnostic[] {
  return module.letBindings.map((binding) => ({
    code: "UNUSED_LET",
    message: `let binding '${binding.name}' is never evaluated`,
    line: binding.span?.start.line,
    column: binding.span?.start.column,
  }));
}

async function readSource(filePath: string): Promise<{ content: string } | { error: Diagnostic }> {
  try {
    return { content: await readFile(filePath, "utf8") };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { error: { code: "FILE_READ_ERROR", message: `Failed to read file: ${message}` } };
  }
}

/**
 * Parse Knot source text into a module
 */
export function parseSource(content: string): ParseResult {
  try {
    const module = parse(content);
    return {
      success: true,
      module,
      errors: [],
      warnings: unusedLetWarnings(module),
      source: content,
    };
  } catch (error) {
    return {
      success: false,
      errors: [toDiagnostic(error, "PARSE_ERROR")],
      warnings: [],
      source: content,
    };
  }
}

/**
 * Parse a .knot file from a file path
 */
export async function parseFile(filePath: string): Promise<ParseResult> {
  const read = await readSource(filePath);
  if ("error" in read) {
    return { success: false, errors: [read.error], warnings: [] };
  }
  return parseSource(read.content);
}

/**
 * Parse and evaluate Knot source text
 * This is the main entry point for evaluation
 */
export function evaluateSource(content: string, options?: EvaluateOptions): EvaluationResult {
  const parsed = parseSource(content);
  if (!parsed.success || parsed.module === undefined) {
    return { success: false, errors: parsed.errors, warnings: parsed.warnings, source: content };
  }

  try {
    const { value, records } = evaluateModule(parsed.module, options);
    return { success: true, value, records, errors: [], warnings: parsed.warnings, source: content };
  } catch (error) {
    return {
      success: false,
      errors: [toDiagnostic(error, "EVAL_ERROR")],
      warnings: parsed.warnings,
      source: content,
    };
  }
}

/**
 * Evaluate a .knot file from file path
 */
export async function evaluateFile(filePath: string, options?: EvaluateOptions): Promise<EvaluationResult> {
  const read = await readSource(filePath);
  if ("error" in read) {
    return { success: false, errors: [read.error], warnings: [] };
  }
  return evaluateSource(read.content, options);
}

/**
 * Print Knot source text in canonical form.
 * Comments have no place in the AST, so source that contains any is refused
 * rather than silently stripped.
 */
export function formatSource(content: string): FormatResult {
  const parsed = parseSource(content);
  if (!parsed.success || parsed.module === undefined) {
    return { success: false, errors: parsed.errors, warnings: parsed.warnings, source: content };
  }

  const comments = findComments(content);
  const first = comments[0];
  if (first !== undefined) {
    const noun = comments.length === 1 ? "comment" : "comments";
    const error = new KnotError(
      "COMMENTS_NOT_PRESERVED",
      `Source contains ${comments.length} ${noun}, which formatting would remove`,
      { location: first.location, source: content }
    );
    return {
      success: false,
      errors: [toDiagnostic(error, "FORMAT_ERROR")],
      warnings: parsed.warnings,
      source: content,
    };
  }

  try {
    return {
      success: true,
      formatted: printModule(parsed.module),
      errors: [],
      warnings: parsed.warnings,
      source: content,
    };
  } catch (error) {
    return {
      success: false,
      errors: [toDiagnostic(error, "FORMAT_ERROR")],
      warnings: parsed.warnings,
      source: content,
    };
  }
}

/**
 * Format a .knot file from file path
 */
export async function formatFile(filePath: string): Promise<FormatResult> {
  const read = await readSource(filePath);
  if ("error" in read) {
    return { success: false, errors: [read.error], warnings: [] };
  }
  return formatSource(read.content);
}
