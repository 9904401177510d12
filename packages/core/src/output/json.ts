/**
 * JSON output for evaluated values
 *
 * Writes JSON text directly instead of going through JSON.stringify so that
 * 64-bit integers keep every digit and integral doubles stay distinguishable
 * from ints (`1.0` vs `1`).
 */

import { KnotError } from "../compiler/knot/errors.js";
import { type RecordArena, type Value, compareCodePoints } from "../runtime/values.js";

/** Plain JSON tree */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface SerializeOptions {
  /** Spaces per nesting level; 0 writes everything on one line */
  indent?: number;
}

/** A value has no JSON representation */
export class SerializationError extends KnotError {
  constructor(message: string) {
    super("SERIALIZATION_ERROR", message);
    this.name = "SerializationError";
  }
}

function formatDouble(value: number): string {
  if (!Number.isFinite(value)) {
    throw new SerializationError(`Cannot serialize non-finite double ${value}`);
  }
  if (Object.is(value, -0)) {
    return "-0.0";
  }
  const text = String(value);
  // Integral doubles print as "1.0"; exponent forms are already unambiguous
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/** Record fields sorted by key */
function sortedFields(records: RecordArena, id: number): Array<[string, Value]> {
  return records.entries(id).sort(([a], [b]) => compareCodePoints(a, b));
}

/**
 * Serialize a value to JSON text. Record keys come out sorted.
 */
export function serialize(value: Value, records: RecordArena, options: SerializeOptions = {}): string {
  const indent = options.indent ?? 2;

  const write = (current: Value, depth: number): string => {
    switch (current.kind) {
      case "nil":
        return "null";
      case "bool":
        return current.value ? "true" : "false";
      case "int":
        return current.value.toString();
      case "double":
        return formatDouble(current.value);
      case "str":
        return JSON.stringify(current.value);
      case "record": {
        const fields = sortedFields(records, current.id);
        if (fields.length === 0) {
          return "{}";
        }
        if (indent <= 0) {
          return `{${fields.map(([name, field]) => `${JSON.stringify(name)}:${write(field, depth + 1)}`).join(",")}}`;
        }
        const pad = " ".repeat(indent * (depth + 1));
        const body = fields
          .map(([name, field]) => `${pad}${JSON.stringify(name)}: ${write(field, depth + 1)}`)
          .join(",\n");
        return `{\n${body}\n${" ".repeat(indent * depth)}}`;
      }
    }
  };

  return write(value, 0);
}

/**
 * Convert a value to a plain JSON tree. Ints must fit a JS number exactly.
 */
export function toJsonValue(value: Value, records: RecordArena): JsonValue {
  switch (value.kind) {
    case "nil":
      return null;
    case "bool":
      return value.value;
    case "int": {
      const n = Number(value.value);
      if (!Number.isSafeInteger(n)) {
        throw new SerializationError(`Integer ${value.value} is outside the safe JSON number range`);
      }
      return n;
    }
    case "double":
      if (!Number.isFinite(value.value)) {
        throw new SerializationError(`Cannot serialize non-finite double ${value.value}`);
      }
      return value.value;
    case "str":
      return value.value;
    case "record":
      return Object.fromEntries(
        sortedFields(records, value.id).map(([name, field]) => [name, toJsonValue(field, records)])
      );
  }
}
