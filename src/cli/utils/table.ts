/**
 * Tabular output of retained records
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Papa from "papaparse";
import type { IndexList, PlotAxis, TableCell, TableRow } from "../../types/index.js";
import type { BlobDir } from "./blobdir.js";
import { expand } from "./fields.js";
import type { FieldSource } from "./filter.js";

// Axis order used when expanding the `plot` shorthand
const PLOT_AXES: readonly PlotAxis[] = ["x", "z", "y", "cat"];

export interface TableFieldSelection {
  fieldIds: string[];
  aliases: Record<string, string>;
}

/**
 * Split a `--table-fields` value such as "gc=GC,length,plot" into field ids
 * and their column headers
 */
export function parseTableFields(tableFields: string): TableFieldSelection {
  const fieldIds: string[] = [];
  const aliases: Record<string, string> = {};

  for (const entry of tableFields.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const parts = trimmed.split("=");
    if (parts.length === 2) {
      fieldIds.push(parts[0]);
      aliases[parts[0]] = parts[1];
    } else {
      fieldIds.push(trimmed);
      aliases[trimmed] = trimmed;
    }
  }

  return { fieldIds, aliases };
}

/**
 * Build table rows: a header row, then one row per retained record
 */
export function buildTable(
  source: BlobDir,
  indices: IndexList,
  tableFields: string
): TableRow[] {
  const { fieldIds, aliases } = parseTableFields(tableFields);
  const identifierId = source.identifiers().fieldId;

  const columns = ["index", identifierId];
  const headers: Record<string, string> = {
    index: "index",
    [identifierId]: "identifiers",
  };

  for (const fieldId of fieldIds) {
    if (fieldId === "plot") {
      for (const axis of PLOT_AXES) {
        const axisField = source.meta.plot[axis];
        if (axisField !== undefined) {
          columns.push(axisField);
          headers[axisField] = axisField;
        }
      }
    } else {
      columns.push(fieldId);
      headers[fieldId] = aliases[fieldId] ?? fieldId;
    }
  }

  const rows: TableRow[] = [columns.map((column) => headers[column])];
  for (const index of indices) {
    rows.push(columns.map((column) => cellValue(source, column, index)));
  }
  return rows;
}

function cellValue(source: FieldSource, column: string, index: number): TableCell {
  if (column === "index") {
    return index;
  }
  const value = expand(source.field(column), index);
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Serialize rows, comma separated for .csv files and tab separated otherwise
 */
export function formatTable(rows: TableRow[], filePath: string): string {
  const delimiter = path.extname(filePath).toLowerCase() === ".csv" ? "," : "\t";
  return Papa.unparse(rows, { delimiter, newline: "\n" });
}

export function writeTable(rows: TableRow[], filePath: string): void {
  fs.writeFileSync(filePath, `${formatTable(rows, filePath)}\n`);
}
