/**
 * Parse Command
 * Prints the AST of a .knot file as JSON
 */

import { parseFile } from "@knotlang/core";
import chalk from "chalk";
import { astToJson, errorMessage, reportDiagnostics } from "./output.js";

interface ParseOptions {
  spans?: boolean;
}

export async function parseCommand(file: string, options: ParseOptions): Promise<void> {
  try {
    const result = await parseFile(file);
    if (!result.success || result.module === undefined) {
      console.error(chalk.red("✗ Parse failed"));
      reportDiagnostics(result.errors, [], result.source);
      process.exit(1);
    }

    process.stdout.write(`${astToJson(result.module, { spans: options.spans })}\n`);
  } catch (error) {
    console.error(chalk.red(`Failed to parse: ${errorMessage(error)}`));
    process.exit(1);
  }
}
