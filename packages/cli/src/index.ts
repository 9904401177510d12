#!/usr/bin/env tsx
/**
 * Knot CLI
 * Command-line interface for evaluating and formatting Knot files
 */

import { Command } from "commander";
import { checkCommand } from "./commands/check.js";
import { evalCommand } from "./commands/eval.js";
import { fmtCommand } from "./commands/fmt.js";
import { parseIndent } from "./commands/output.js";
import { parseCommand } from "./commands/parse.js";

const program = new Command();

program.name("knot").description("Evaluate Knot configuration files to JSON").version("0.1.0");

// Eval command (default)
program
  .command("eval <file>", { isDefault: true })
  .description("Evaluate a .knot file and print the result as JSON")
  .option("-o, --output <file>", "Output file for the JSON result")
  .option("--compact", "Print JSON on a single line")
  .option("--indent <n>", "Spaces per indentation level", parseIndent, 2)
  .option("-v, --verbose", "Show an evaluation summary")
  .action(evalCommand);

// Check command
program
  .command("check <file>")
  .description("Parse and evaluate a .knot file, reporting errors only")
  .action(checkCommand);

// Fmt command
program
  .command("fmt <file>")
  .description("Print a .knot file in canonical form")
  .option("-w, --write", "Rewrite the file in place")
  .action(fmtCommand);

// Parse command
program
  .command("parse <file>")
  .description("Print the AST of a .knot file as JSON")
  .option("--spans", "Include source spans")
  .action(parseCommand);

// Parse and run
await program.parseAsync();
