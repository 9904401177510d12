/**
 * Output helpers shared by the commands
 */

import { type Diagnostic, KnotError, type ModuleNode, formatErrors } from "@knotlang/core";
import chalk from "chalk";
import { InvalidArgumentError } from "commander";

/**
 * Parse the --indent option
 */
export function parseIndent(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Render a diagnostic as a single line, with its position when known
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const position =
    diagnostic.line !== undefined ? ` (line ${diagnostic.line}, column ${diagnostic.column ?? 1})` : "";
  return `[${diagnostic.code}] ${diagnostic.message}${position}`;
}

/**
 * Render errors with the offending source line and a caret under the position
 */
export function renderErrors(errors: Diagnostic[], source?: string): string {
  return formatErrors(
    errors.map((diagnostic) => diagnostic.error ?? new KnotError(diagnostic.code, diagnostic.message)),
    source
  );
}

/**
 * Print warnings and errors to stderr
 */
export function reportDiagnostics(errors: Diagnostic[], warnings: Diagnostic[], source?: string): void {
  for (const warning of warnings) {
    console.error(chalk.yellow(`  Warning ${formatDiagnostic(warning)}`));
  }
  if (errors.length > 0) {
    console.error(chalk.red(renderErrors(errors, source)));
  }
}

/**
 * Render a module AST as JSON. Bigints become strings; spans are dropped unless asked for.
 */
export function astToJson(module: ModuleNode, options: { spans?: boolean; indent?: number } = {}): string {
  return JSON.stringify(
    module,
    (key: string, value: unknown) => {
      if (key === "span" && !options.spans) {
        return undefined;
      }
      if (typeof value === "bigint") {
        return value.toString();
      }
      return value;
    },
    options.indent ?? 2
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
