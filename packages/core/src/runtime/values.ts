/**
 * Runtime values and the record arena
 */

/** Index of a record inside a RecordArena */
export type RecordId = number;

/** Value produced by evaluation */
export type Value =
  | { kind: "nil" }
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: bigint }
  | { kind: "double"; value: number }
  | { kind: "str"; value: string }
  | { kind: "record"; id: RecordId };

export type ValueKind = Value["kind"];

/** Plain JS rendering of a value, for inspection and tests */
export type PlainValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | { [field: string]: PlainValue };

export const NIL: Value = { kind: "nil" };

export function boolValue(value: boolean): Value {
  return { kind: "bool", value };
}

export function intValue(value: bigint | number): Value {
  return { kind: "int", value: BigInt(value) };
}

export function doubleValue(value: number): Value {
  return { kind: "double", value };
}

export function strValue(value: string): Value {
  return { kind: "str", value };
}

/**
 * Owns every record created during one evaluation. Records only grow;
 * contexts and record values refer to them by index.
 */
export class RecordArena {
  private readonly records: Array<Map<string, Value>> = [];

  /** Create an empty record and return its id */
  allocate(): RecordId {
    this.records.push(new Map());
    return this.records.length - 1;
  }

  private record(id: RecordId): Map<string, Value> {
    const record = this.records[id];
    if (record === undefined) {
      throw new RangeError(`Unknown record id ${id}`);
    }
    return record;
  }

  get(id: RecordId, name: string): Value | undefined {
    return this.record(id).get(name);
  }

  has(id: RecordId, name: string): boolean {
    return this.record(id).has(name);
  }

  /** Insert or overwrite a field */
  set(id: RecordId, name: string, value: Value): void {
    this.record(id).set(name, value);
  }

  isEmpty(id: RecordId): boolean {
    return this.record(id).size === 0;
  }

  size(id: RecordId): number {
    return this.record(id).size;
  }

  /** Fields in the order they were evaluated */
  entries(id: RecordId): Array<[string, Value]> {
    return [...this.record(id).entries()];
  }

  /** Number of records allocated so far */
  get count(): number {
    return this.records.length;
  }
}

/** Type name used in error messages */
export function typeName(value: Value): string {
  switch (value.kind) {
    case "nil":
      return "nil";
    case "bool":
      return "bool";
    case "int":
      return "int";
    case "double":
      return "double";
    case "str":
      return "str";
    case "record":
      return "rec";
  }
}

/** Order strings by Unicode code point rather than UTF-16 code unit */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const x = left[i]?.codePointAt(0) ?? 0;
    const y = right[i]?.codePointAt(0) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return left.length - right.length;
}

/** Truthiness used by `!`, `&&` and `||` */
export function isTruthy(value: Value, records: RecordArena): boolean {
  switch (value.kind) {
    case "nil":
      return false;
    case "bool":
      return value.value;
    case "int":
      return value.value !== 0n;
    case "double":
      return value.value !== 0;
    case "str":
      return value.value.length > 0;
    case "record":
      return !records.isEmpty(value.id);
  }
}

/**
 * Structural equality. Records compare field by field, regardless of
 * evaluation order; `recordsB` defaults to `recordsA`.
 */
export function valuesEqual(a: Value, b: Value, recordsA: RecordArena, recordsB: RecordArena = recordsA): boolean {
  switch (a.kind) {
    case "nil":
      return b.kind === "nil";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "str":
      return b.kind === "str" && b.value === a.value;
    case "double":
      return b.kind === "double" && Object.is(a.value, b.value);
    case "record": {
      if (b.kind !== "record") return false;
      if (recordsA.size(a.id) !== recordsB.size(b.id)) return false;
      for (const [name, value] of recordsA.entries(a.id)) {
        const other = recordsB.get(b.id, name);
        if (other === undefined || !valuesEqual(value, other, recordsA, recordsB)) {
          return false;
        }
      }
      return true;
    }
  }
}

/** Convert a value to a plain JS tree: ints stay bigint, records become objects */
export function toPlain(value: Value, records: RecordArena): PlainValue {
  switch (value.kind) {
    case "nil":
      return null;
    case "bool":
    case "int":
    case "double":
    case "str":
      return value.value;
    case "record":
      return Object.fromEntries(
        records.entries(value.id).map(([name, field]) => [name, toPlain(field, records)])
      );
  }
}
