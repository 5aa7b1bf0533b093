/**
 * Typed field model: Identifier, Variable, Category and MultiArray fields
 */

import { type } from "arktype";
import { DataModelError, UnknownKeyError } from "../../errors.js";
import type { FieldDescriptor, FieldDocument, FieldType, Tuple } from "../../types/index.js";

interface FieldBase {
  readonly fieldId: string;
  readonly meta: FieldDescriptor;
}

export interface IdentifierField extends FieldBase {
  readonly kind: "identifier";
  readonly values: readonly string[];
}

export interface VariableField extends FieldBase {
  readonly kind: "variable";
  readonly values: readonly number[];
  readonly range: [number, number];
}

export interface CategoryField extends FieldBase {
  readonly kind: "category";
  readonly values: readonly number[];
  readonly keys: readonly string[];
}

export interface MultiArrayField extends FieldBase {
  readonly kind: "multiarray";
  readonly values: readonly (readonly Tuple[])[];
  readonly keys: readonly string[];
  readonly categorySlot: number;
  readonly headers?: readonly string[];
}

export type Field = IdentifierField | VariableField | CategoryField | MultiArrayField;

export type RawValue = Field["values"][number];

export type DisplayValue = string | number | readonly Tuple[];

const StringValues = type("string[]");
const NumberValues = type("number[]");
const TupleValues = type("(string | number)[][][]");

/**
 * Build a field from its stored values document
 */
export function createField(
  descriptor: FieldDescriptor,
  document: FieldDocument,
  expectedLength: number
): Field {
  const fieldId = descriptor.id;
  const kind = descriptor.type;
  if (kind === undefined) {
    throw new DataModelError("Field has no type", fieldId);
  }

  if (document.values.length !== expectedLength) {
    throw new DataModelError(
      `Expected ${expectedLength} values, found ${document.values.length}`,
      fieldId
    );
  }

  const keys = document.keys ?? [];

  switch (kind) {
    case "identifier": {
      const values = StringValues(document.values);
      if (values instanceof type.errors) {
        throw new DataModelError("Identifier values must be strings", fieldId, values.summary);
      }
      if (new Set(values).size !== values.length) {
        throw new DataModelError("Identifier values must be unique", fieldId);
      }
      return { kind, fieldId, meta: descriptor, values };
    }
    case "variable": {
      const values = NumberValues(document.values);
      if (values instanceof type.errors) {
        throw new DataModelError("Variable values must be numbers", fieldId, values.summary);
      }
      const range = descriptor.range ?? computeRange(values, fieldId);
      return { kind, fieldId, meta: descriptor, values, range };
    }
    case "category": {
      const values = NumberValues(document.values);
      if (values instanceof type.errors) {
        throw new DataModelError("Category values must be key indices", fieldId, values.summary);
      }
      for (const value of values) {
        assertKeyIndex(value, keys, fieldId);
      }
      return { kind, fieldId, meta: descriptor, values, keys };
    }
    case "multiarray": {
      const values = TupleValues(document.values);
      if (values instanceof type.errors) {
        throw new DataModelError("MultiArray values must be arrays of tuples", fieldId, values.summary);
      }
      const categorySlot = document.category_slot ?? descriptor.category_slot ?? 0;
      for (const tuples of values) {
        for (const tuple of tuples) {
          const slotValue = tuple[categorySlot];
          if (typeof slotValue !== "number") {
            throw new DataModelError(`Tuple slot ${categorySlot} must hold a key index`, fieldId);
          }
          assertKeyIndex(slotValue, keys, fieldId);
        }
      }
      const headers = document.headers ?? descriptor.headers;
      return { kind, fieldId, meta: descriptor, values, keys, categorySlot, headers };
    }
    default:
      return assertNever(kind);
  }
}

function assertKeyIndex(value: number, keys: readonly string[], fieldId: string): void {
  if (!Number.isInteger(value) || value < 0 || value >= keys.length) {
    throw new DataModelError(`Key index ${value} out of range (${keys.length} keys)`, fieldId);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected field type: ${String(value)}`);
}

/**
 * Number of records held by a field
 */
export function fieldLength(field: Field): number {
  return field.values.length;
}

export function valueAt(field: Field, index: number): RawValue {
  return field.values[index];
}

/**
 * Display value of one record: key strings in place of key indices
 */
export function expand(field: Field, index: number): DisplayValue {
  switch (field.kind) {
    case "identifier":
    case "variable":
      return field.values[index];
    case "category":
      return field.keys[field.values[index]];
    case "multiarray":
      return field.values[index].map((tuple) => expandTuple(tuple, field.keys, field.categorySlot));
    default:
      return assertNever(field);
  }
}

function expandTuple(tuple: Tuple, keys: readonly string[], slot: number): Tuple {
  return tuple.map((value, position) =>
    position === slot && typeof value === "number" ? keys[value] : value
  );
}

export function expandValues(field: Field): DisplayValue[] {
  return field.values.map((_, index) => expand(field, index));
}

/**
 * Resolve a key name to its index. Digit-only names are taken as indices.
 */
export function keyIndexOf(field: CategoryField | MultiArrayField, name: string): number {
  if (/^\d+$/.test(name)) {
    return parseInt(name, 10);
  }
  const index = field.keys.indexOf(name);
  if (index === -1) {
    throw new UnknownKeyError(name, field.fieldId);
  }
  return index;
}

/**
 * Calculate [min, max] of a set of numeric values
 */
export function computeRange(values: readonly number[], fieldId?: string): [number, number] {
  if (values.length === 0) {
    throw new DataModelError("Cannot compute range of an empty value list", fieldId);
  }
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return [min, max];
}

export interface DisplayFieldOptions {
  fixedKeys?: readonly string[];
  categorySlot?: number;
  headers?: readonly string[];
}

/**
 * Collect display values back into a key table and key indices.
 * Keys start from `fixedKeys` (if any); unseen keys are appended in order of appearance.
 */
export function fieldFromDisplayValues(
  kind: Extract<FieldType, "category" | "multiarray">,
  descriptor: FieldDescriptor,
  displayValues: readonly DisplayValue[],
  options: DisplayFieldOptions = {}
): CategoryField | MultiArrayField {
  const keys = [...(options.fixedKeys ?? [])];
  const lookup = new Map(keys.map((key, index) => [key, index]));

  const indexOfKey = (key: string): number => {
    let index = lookup.get(key);
    if (index === undefined) {
      index = keys.length;
      keys.push(key);
      lookup.set(key, index);
    }
    return index;
  };

  if (kind === "category") {
    const values = displayValues.map((value) => {
      if (typeof value !== "string") {
        throw new DataModelError("Category display values must be key strings", descriptor.id);
      }
      return indexOfKey(value);
    });
    return { kind, fieldId: descriptor.id, meta: descriptor, values, keys };
  }

  const categorySlot = options.categorySlot ?? 0;
  const values = displayValues.map((value) => {
    if (typeof value === "string" || typeof value === "number") {
      throw new DataModelError("MultiArray display values must be tuple lists", descriptor.id);
    }
    return value.map((tuple) =>
      tuple.map((entry, position) =>
        position === categorySlot ? indexOfKey(String(entry)) : entry
      )
    );
  });
  return {
    kind,
    fieldId: descriptor.id,
    meta: descriptor,
    values,
    keys,
    categorySlot,
    headers: options.headers,
  };
}

/**
 * Serialize a field to its values document
 */
export function fieldToDocument(field: Field): FieldDocument {
  switch (field.kind) {
    case "identifier":
    case "variable":
      return { values: [...field.values], keys: [] };
    case "category":
      return { values: [...field.values], keys: [...field.keys] };
    case "multiarray": {
      const document: FieldDocument = {
        values: field.values.map((tuples) => tuples.map((tuple) => [...tuple])),
        keys: [...field.keys],
        category_slot: field.categorySlot,
      };
      if (field.headers) {
        document.headers = [...field.headers];
      }
      return document;
    }
    default:
      return assertNever(field);
  }
}
