/**
 * Eval Command
 * Evaluates a .knot file and prints the result as JSON
 */

import { writeFile } from "node:fs/promises";
import { evaluateFile, serialize } from "@knotlang/core";
import chalk from "chalk";
import ora from "ora";
import { errorMessage, reportDiagnostics } from "./output.js";

interface EvalOptions {
  output?: string;
  compact?: boolean;
  indent: number;
  verbose?: boolean;
}

export async function evalCommand(file: string, options: EvalOptions): Promise<void> {
  const spinner = ora(`Evaluating ${file}...`).start();

  try {
    let fieldCount = 0;
    const started = performance.now();
    const result = await evaluateFile(file, {
      onFieldEvaluated: () => {
        fieldCount++;
      },
    });
    const elapsed = performance.now() - started;

    if (!result.success || result.value === undefined || result.records === undefined) {
      spinner.fail(chalk.red("Evaluation failed"));
      reportDiagnostics(result.errors, result.warnings, result.source);
      process.exit(1);
    }

    const json = serialize(result.value, result.records, { indent: options.compact ? 0 : options.indent });
    spinner.succeed(chalk.green("Evaluation successful"));
    reportDiagnostics([], result.warnings);

    if (options.output) {
      await writeFile(options.output, `${json}\n`, "utf8");
      console.error(chalk.dim(`JSON written to ${options.output}`));
    } else {
      process.stdout.write(`${json}\n`);
    }

    if (options.verbose) {
      console.error();
      console.error(chalk.dim("Summary:"));
      console.error(chalk.dim(`  Fields evaluated: ${fieldCount}`));
      console.error(chalk.dim(`  Records: ${result.records.count}`));
      console.error(chalk.dim(`  Time: ${elapsed.toFixed(1)}ms`));
    }
  } catch (error) {
    spinner.fail(chalk.red(`Failed to evaluate: ${errorMessage(error)}`));
    process.exit(1);
  }
}
