/**
 * Check Command
 * Parses and evaluates a .knot file without printing its value
 */

import { evaluateFile, typeName } from "@knotlang/core";
import chalk from "chalk";
import ora from "ora";
import { errorMessage, reportDiagnostics } from "./output.js";

export async function checkCommand(file: string): Promise<void> {
  const spinner = ora(`Checking ${file}...`).start();

  try {
    const result = await evaluateFile(file);

    if (!result.success || result.value === undefined) {
      spinner.fail(chalk.red(`${result.errors.length} error(s)`));
      reportDiagnostics(result.errors, result.warnings, result.source);
      console.error();
      console.error(chalk.red("✗ Check failed"));
      process.exit(1);
    }

    if (result.warnings.length === 0) {
      spinner.succeed(chalk.green(`✓ ${file} is valid`));
    } else {
      spinner.succeed(chalk.green(`✓ ${file} is valid (with warnings)`));
      reportDiagnostics([], result.warnings);
    }

    console.error(chalk.dim(`  Result type: ${typeName(result.value)}`));
  } catch (error) {
    spinner.fail(chalk.red(`Failed to check: ${errorMessage(error)}`));
    process.exit(1);
  }
}
