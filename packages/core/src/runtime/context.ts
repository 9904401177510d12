/**
 * Evaluation Context
 * Links a record under construction to the literal that defines it
 */

import { type FieldNode, type RecordLiteralNode, findField } from "../compiler/knot/ast.js";
import type { RecordArena, RecordId, Value } from "./values.js";

/** Synthetic literal backing the global context */
const EMPTY_RECORD_LITERAL: RecordLiteralNode = { kind: "record", letBindings: [], fields: [] };

/** Where a not-yet-evaluated field is defined */
export interface FieldDefinition {
  context: EvalContext;
  field: FieldNode;
}

export class EvalContext {
  readonly records: RecordArena;
  readonly recordId: RecordId;
  readonly literal: RecordLiteralNode;
  readonly parent: EvalContext | null;

  private constructor(
    records: RecordArena,
    recordId: RecordId,
    literal: RecordLiteralNode,
    parent: EvalContext | null
  ) {
    this.records = records;
    this.recordId = recordId;
    this.literal = literal;
    this.parent = parent;
  }

  /** Root of a chain: an empty record, no fields, no parent */
  static global(records: RecordArena): EvalContext {
    return new EvalContext(records, records.allocate(), EMPTY_RECORD_LITERAL, null);
  }

  /** Context for a record literal being evaluated inside this one */
  child(recordId: RecordId, literal: RecordLiteralNode): EvalContext {
    return new EvalContext(this.records, recordId, literal, this);
  }

  /** Contexts from this one up to the global context */
  *chain(): Generator<EvalContext> {
    let ctx: EvalContext | null = this;
    while (ctx !== null) {
      yield ctx;
      ctx = ctx.parent;
    }
  }

  /** First already-evaluated value for `name` along the chain */
  lookupValue(name: string): Value | undefined {
    for (const ctx of this.chain()) {
      const value = this.records.get(ctx.recordId, name);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  /** Nearest context whose defining literal has a field `name` */
  findDefinition(name: string): FieldDefinition | undefined {
    for (const ctx of this.chain()) {
      const field = findField(ctx.literal, name);
      if (field !== undefined) {
        return { context: ctx, field };
      }
    }
    return undefined;
  }

  /** Store a field's value in this context's record */
  assign(name: string, value: Value): void {
    this.records.set(this.recordId, name, value);
  }

  hasValue(name: string): boolean {
    return this.records.has(this.recordId, name);
  }
}
