/**
 * Helpers for building Knot ASTs programmatically
 *
 * @example
 * ```ts
 * import { binary, intLit, module, record, varRef } from "@knotlang/core";
 *
 * const ast = module(
 *   record({
 *     width: intLit(4),
 *     area: binary(varRef("width"), "*", varRef("width")),
 *   })
 * );
 * ```
 */

export {
  intLit,
  strLit,
  nilLit,
  doubleLit,
  varRef,
  fieldAccess,
  unary,
  binary,
  field,
  record,
  letBinding,
  module,
  call,
  fn,
} from "./expressions.js";
