/**
 * Fmt Command
 * Prints a .knot file in canonical form
 */

import { writeFile } from "node:fs/promises";
import { formatFile } from "@knotlang/core";
import chalk from "chalk";
import { errorMessage, reportDiagnostics } from "./output.js";

interface FmtOptions {
  write?: boolean;
}

export async function fmtCommand(file: string, options: FmtOptions): Promise<void> {
  try {
    const result = await formatFile(file);
    if (!result.success || result.formatted === undefined) {
      console.error(chalk.red(`✗ Cannot format ${file}`));
      reportDiagnostics(result.errors, [], result.source);
      process.exit(1);
    }

    if (options.write) {
      await writeFile(file, result.formatted, "utf8");
      console.error(chalk.green(`✓ Formatted ${file}`));
    } else {
      process.stdout.write(result.formatted);
    }
  } catch (error) {
    console.error(chalk.red(`Failed to format: ${errorMessage(error)}`));
    process.exit(1);
  }
}
