/**
 * Filter parameter parsing: `fieldId--Param=value` strings and URL query strings
 */

import type { FieldFilters, FieldType, FilterParams, ParamName } from "../../types/index.js";
import type { Diagnostics } from "./diagnostics.js";
import type { DatasetMeta } from "./metadata.js";

export const VALID_PARAMS: Record<FieldType, readonly ParamName[]> = {
  identifier: [],
  variable: ["Min", "Max", "Inv"],
  category: ["Keys", "Inv"],
  multiarray: ["Keys", "MinLength", "MaxLength", "Inv"],
};

function isParamName(value: string, valid: readonly ParamName[]): value is ParamName {
  return valid.some((name) => name === value);
}

/**
 * Extract `key=value` strings from a URL or bare query string
 */
export function splitQueryString(queryString: string, diagnostics?: Diagnostics): string[] {
  const query = queryString.replace(/^.*\?/, "").replace(/#.*$/, "");

  let decoded = query;
  try {
    decoded = decodeURIComponent(query);
  } catch (error) {
    if (!(error instanceof URIError)) {
      throw error;
    }
    diagnostics?.warn(`Unable to decode query string '${query}', using it as given`);
  }

  return decoded.split("&").filter((segment) => segment !== "");
}

/**
 * Parse raw parameter strings into per-field filters, dropping anything
 * that does not match a field and parameter valid for this dataset
 */
export function parseParams(
  strings: readonly string[],
  meta: DatasetMeta,
  diagnostics: Diagnostics
): FilterParams {
  const params: FilterParams = {};

  for (const string of strings) {
    const parts = string.split("=");
    if (parts.length !== 2) {
      diagnostics.warn(`Skipping string '${string}', not a valid parameter`);
      continue;
    }
    const [key, value] = parts;

    const keyParts = key.split("--");
    if (keyParts.length !== 2) {
      diagnostics.warn(`Skipping string '${string}', not a valid parameter`);
      continue;
    }
    const [fieldId, param] = keyParts;

    const descriptor = meta.fieldMeta(fieldId);
    if (descriptor === undefined) {
      diagnostics.warn(`Skipping field '${fieldId}', not present in dataset`);
      continue;
    }
    if (descriptor.type === undefined) {
      diagnostics.warn(`Skipping field '${fieldId}', not a filterable field`);
      continue;
    }

    if (!isParamName(param, VALID_PARAMS[descriptor.type])) {
      diagnostics.warn(`'${param}' is not a valid parameter for field '${fieldId}'`);
      continue;
    }

    const filters: FieldFilters = params[fieldId] ?? {};
    filters[param] = value;
    params[fieldId] = filters;
  }

  return params;
}

/**
 * A parameter counts as set when it carries a non-empty value
 */
export function isSet(filters: FieldFilters, param: ParamName): boolean {
  const value = filters[param];
  return value !== undefined && value !== "";
}
