/**
 * Error types and formatting for the Knot compiler and runtime
 */

/** Source location for error reporting */
export interface SourceLocation {
  line: number;
  column: number;
  offset: number;
}

/** Source span (start to end) */
export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export interface KnotErrorOptions {
  location?: SourceLocation;
  span?: SourceSpan;
  source?: string;
}

/** Base error class for everything Knot throws */
export class KnotError extends Error {
  readonly code: string;
  readonly location?: SourceLocation;
  readonly span?: SourceSpan;
  readonly source?: string;

  constructor(code: string, message: string, options?: KnotErrorOptions) {
    super(message);
    this.name = "KnotError";
    this.code = code;
    this.location = options?.location ?? options?.span?.start;
    this.span = options?.span;
    this.source = options?.source;
  }

  /** Format error with source context; `source` overrides the text the error was raised with */
  format(source: string | undefined = this.source): string {
    const lines: string[] = [];

    const loc = this.location;
    if (loc) {
      lines.push(`Error [${this.code}] at line ${loc.line}, column ${loc.column}:`);
    } else {
      lines.push(`Error [${this.code}]:`);
    }

    lines.push(`  ${this.message}`);

    if (source && loc) {
      const sourceLines = source.split("\n");
      const lineIdx = loc.line - 1;

      if (lineIdx >= 0 && lineIdx < sourceLines.length) {
        lines.push("");
        lines.push(`  ${loc.line} | ${sourceLines[lineIdx]}`);

        const padding = " ".repeat(String(loc.line).length + 3);
        const pointer = `${" ".repeat(Math.max(0, loc.column - 1))}^`;
        lines.push(`  ${padding}${pointer}`);
      }
    }

    return lines.join("\n");
  }
}

/** Tokenization error */
export class TokenizeError extends KnotError {
  constructor(message: string, options?: { location?: SourceLocation; source?: string }) {
    super("TOKENIZE_ERROR", message, options);
    this.name = "TokenizeError";
  }
}

/** Parse error */
export class ParseError extends KnotError {
  constructor(message: string, options?: KnotErrorOptions) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

/** Raised when an AST node has no source representation */
export class PrintError extends KnotError {
  constructor(message: string, options?: KnotErrorOptions) {
    super("PRINT_ERROR", message, options);
    this.name = "PrintError";
  }
}

/** Create a source location from line, column, offset */
export function loc(line: number, column: number, offset: number): SourceLocation {
  return { line, column, offset };
}

/** Create a source span from start and end locations */
export function span(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/** Format multiple errors; `source` fills in for errors raised without one */
export function formatErrors(errors: KnotError[], source?: string): string {
  return errors.map((e) => e.format(source ?? e.source)).join("\n\n");
}
