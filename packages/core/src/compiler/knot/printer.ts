/**
 * Renders a Knot AST back to canonical source text
 */

import { type BinaryOperator, type ExpressionNode, type Literal, type ModuleNode, isOperation } from "./ast.js";
import { PrintError } from "./errors.js";

const INDENT = "  ";

/** Binding strength of each binary operator; higher binds tighter */
const PRECEDENCE: Record<BinaryOperator, number> = {
  "||": 0,
  "&&": 1,
  "==": 2,
  "!=": 2,
  "<": 3,
  ">": 3,
  "<=": 3,
  ">=": 3,
  "<<": 4,
  ">>": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
};

const STRING_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\b": "\\b",
  "\f": "\\f",
};

/** Quote a string so that the tokenizer decodes it back to `value` */
export function quoteString(value: string): string {
  let out = '"';
  for (const char of value) {
    const escaped = STRING_ESCAPES[char];
    if (escaped !== undefined) {
      out += escaped;
    } else if (char < " " || char === "\u007f") {
      out += `\\u{${(char.codePointAt(0) ?? 0).toString(16)}}`;
    } else {
      out += char;
    }
  }
  return `${out}"`;
}

function printLiteral(literal: Literal, expr: ExpressionNode): string {
  switch (literal.type) {
    case "int":
      return literal.value.toString();
    case "str":
      return quoteString(literal.value);
    case "nil":
    case "double":
      throw new PrintError(`Cannot print ${literal.type} literal: it has no source syntax`, {
        span: expr.span,
      });
  }
}

/**
 * Print an expression. Nested records are indented relative to `depth`.
 */
export function printExpression(expr: ExpressionNode, depth = 0): string {
  switch (expr.kind) {
    case "literal":
      return printLiteral(expr.literal, expr);

    case "var_ref":
      return expr.name;

    case "field_access": {
      const base = printExpression(expr.base, depth);
      const wrapped = isOperation(expr.base) ? `(${base})` : base;
      return `${wrapped}.${expr.field}`;
    }

    case "unary": {
      const operand = printExpression(expr.operand, depth);
      // `-5` would read back as a signed literal, so keep the operator separate
      const needsParens =
        expr.operand.kind === "binary" ||
        (expr.op !== "!" && expr.operand.kind === "literal" && expr.operand.literal.type === "int" && expr.operand.literal.value >= 0n);
      return needsParens ? `${expr.op}(${operand})` : `${expr.op}${operand}`;
    }

    case "binary": {
      const prec = PRECEDENCE[expr.op];
      let left = printExpression(expr.left, depth);
      let right = printExpression(expr.right, depth);
      // Operators of one level group to the right, so only a left operand of equal level needs parentheses
      if (expr.left.kind === "binary" && PRECEDENCE[expr.left.op] <= prec) {
        left = `(${left})`;
      }
      if (expr.right.kind === "binary" && PRECEDENCE[expr.right.op] < prec) {
        right = `(${right})`;
      }
      return `${left} ${expr.op} ${right}`;
    }

    case "record": {
      if (expr.letBindings.length > 0) {
        throw new PrintError("Cannot print record-level let bindings: they have no source syntax", {
          span: expr.span,
        });
      }
      if (expr.fields.length === 0) {
        return "{}";
      }
      const inner = INDENT.repeat(depth + 1);
      const lines = expr.fields.map((f) => `${inner}${f.name}: ${printExpression(f.value, depth + 1)}`);
      return `{\n${lines.join("\n")}\n${INDENT.repeat(depth)}}`;
    }

    case "call":
    case "function":
      throw new PrintError(`Cannot print ${expr.kind} expression: it has no source syntax`, {
        span: expr.span,
      });
  }
}

/**
 * Print a module: `let` lines, a blank line, then the expression
 */
export function printModule(module: ModuleNode): string {
  const lets = module.letBindings.map((b) => `let ${b.name} = ${printExpression(b.value)}\n`);
  const header = lets.length > 0 ? `${lets.join("")}\n` : "";
  return `${header}${printExpression(module.expr)}\n`;
}
