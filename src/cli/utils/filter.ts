/**
 * Index-set narrowing over typed fields
 *
 * Every step takes an ascending list of record positions and returns a new
 * list that is a subset of it, so steps can be folded in any sequence.
 */

import * as fs from "node:fs";
import { type } from "arktype";
import { DatasetError, InvalidParameterValue } from "../../errors.js";
import type { FieldFilters, FilterParams, IndexList } from "../../types/index.js";
import type { Diagnostics } from "./diagnostics.js";
import {
  assertNever,
  keyIndexOf,
  type CategoryField,
  type Field,
  type MultiArrayField,
  type VariableField,
} from "./fields.js";
import type { DatasetMeta } from "./metadata.js";
import { isSet } from "./params.js";

/**
 * Anything that can hand out a dataset's registry and fields
 */
export interface FieldSource {
  readonly meta: DatasetMeta;
  field(fieldId: string): Field;
}

export function allIndices(count: number): number[] {
  return Array.from({ length: count }, (_, index) => index);
}

/**
 * Positions of `all` not present in `retained`, in the order of `all`
 */
export function invertIndices(all: IndexList, retained: IndexList): number[] {
  const kept = new Set(retained);
  return all.filter((index) => !kept.has(index));
}

// Plain decimal or exponent notation; no hex, octal or binary prefixes
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseBound(
  field: Field,
  filters: FieldFilters,
  param: "Min" | "Max" | "MinLength" | "MaxLength",
  fallback: number
): number {
  if (!isSet(filters, param)) {
    return fallback;
  }
  const raw = filters[param] ?? "";
  const trimmed = raw.trim();

  if (param === "MinLength" || param === "MaxLength") {
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new InvalidParameterValue(field.fieldId, param, raw, "an integer");
    }
    return parseInt(trimmed, 10);
  }

  const infinite = /^([+-]?)inf(inity)?$/i.exec(trimmed);
  if (infinite) {
    return infinite[1] === "-" ? -Infinity : Infinity;
  }
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidParameterValue(field.fieldId, param, raw, "a number");
  }
  return Number(trimmed);
}

function withinBounds(value: number, low: number, high: number, invert: boolean): boolean {
  return invert ? value < low || value > high : low <= value && value <= high;
}

export function filterVariable(field: VariableField, indices: IndexList, filters: FieldFilters): number[] {
  const low = parseBound(field, filters, "Min", -Infinity);
  const high = parseBound(field, filters, "Max", Infinity);
  const invert = isSet(filters, "Inv");
  return indices.filter((index) => withinBounds(field.values[index], low, high, invert));
}

/**
 * Key indices a Keys filter retains. Listed keys are excluded unless Inv is
 * set, in which case only the listed keys are kept.
 */
export function retainedKeys(
  field: CategoryField | MultiArrayField,
  filters: FieldFilters
): Set<number> {
  const listed = new Set(
    (filters.Keys ?? "").split(",").map((name) => keyIndexOf(field, name))
  );
  if (isSet(filters, "Inv")) {
    return listed;
  }
  const retained = new Set<number>();
  field.keys.forEach((_, index) => {
    if (!listed.has(index)) {
      retained.add(index);
    }
  });
  return retained;
}

export function filterCategory(field: CategoryField, indices: IndexList, filters: FieldFilters): number[] {
  if (!isSet(filters, "Keys")) {
    return [...indices];
  }
  const keys = retainedKeys(field, filters);
  return indices.filter((index) => keys.has(field.values[index]));
}

export function filterMultiArray(field: MultiArrayField, indices: IndexList, filters: FieldFilters): number[] {
  const invert = isSet(filters, "Inv");
  let retained = [...indices];

  if (isSet(filters, "MinLength") || isSet(filters, "MaxLength")) {
    const low = parseBound(field, filters, "MinLength", -Infinity);
    const high = parseBound(field, filters, "MaxLength", Infinity);
    retained = retained.filter((index) => withinBounds(field.values[index].length, low, high, invert));
  }

  if (isSet(filters, "Keys")) {
    const keys = retainedKeys(field, filters);
    const slot = field.categorySlot;
    retained = retained.filter((index) =>
      field.values[index].some((tuple) => {
        const key = tuple[slot];
        return typeof key === "number" && keys.has(key);
      })
    );
  }

  return retained;
}

/**
 * Apply one field's filters to an index list
 */
export function applyFieldFilter(field: Field, indices: IndexList, filters: FieldFilters): number[] {
  switch (field.kind) {
    case "variable":
      return filterVariable(field, indices, filters);
    case "category":
      return filterCategory(field, indices, filters);
    case "multiarray":
      return filterMultiArray(field, indices, filters);
    case "identifier":
      return [...indices];
    default:
      return assertNever(field);
  }
}

/**
 * Narrow `indices` by every field's filters, in registry order. With
 * `invertAll` the result is the complement relative to `indices`.
 */
export function filterByParams(
  source: FieldSource,
  indices: IndexList,
  params: FilterParams,
  invertAll: boolean,
  diagnostics?: Diagnostics
): number[] {
  const registered = source.meta.listFields();
  for (const fieldId of Object.keys(params)) {
    if (!registered.includes(fieldId)) {
      diagnostics?.warn(`Skipping field '${fieldId}', not present in dataset`);
    }
  }

  const retained = registered
    .filter((fieldId) => params[fieldId] !== undefined)
    .reduce<number[]>(
      (current, fieldId) => applyFieldFilter(source.field(fieldId), current, params[fieldId]),
      [...indices]
    );

  return invertAll ? invertIndices(indices, retained) : retained;
}

/**
 * Keep records whose identifier is (or with `invert`, is not) in `idSet`
 */
export function filterByIdentifiers(
  identifiers: readonly string[],
  indices: IndexList,
  idSet: ReadonlySet<string>,
  invert: boolean
): number[] {
  return indices.filter((index) => idSet.has(identifiers[index]) !== invert);
}

const SelectionSchema = type({
  identifiers: "string[]",
});

function readListFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DatasetError(`Identifier list not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Read a whitespace or newline separated identifier list
 */
export function loadIdentifierList(filePath: string): Set<string> {
  return new Set(
    readListFile(filePath)
      .split(/\s+/)
      .filter((id) => id !== "")
  );
}

/**
 * Read a JSON selection of the form `{ "identifiers": [...] }`
 */
export function loadIdentifierSelection(filePath: string): Set<string> {
  const content = readListFile(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw DatasetError.fromSystemError("Unable to parse identifier selection", filePath, error);
  }
  const selection = SelectionSchema(parsed);
  if (selection instanceof type.errors) {
    throw new DatasetError(`Invalid identifier selection: ${filePath}`, undefined, selection.summary);
  }
  return new Set(selection.identifiers);
}
