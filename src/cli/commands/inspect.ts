/**
 * Inspect command - describe a BlobDir's metadata and field registry
 */

import type { FieldType, InspectOptions } from "../../types/index.js";
import { BlobDir } from "../utils/blobdir.js";

export interface FieldSummary {
  id: string;
  type: FieldType | "group";
  depth: number;
  parent?: string;
  range?: [number, number];
  keyCount?: number;
}

export interface InspectResult {
  id: string;
  records: number;
  origin?: string;
  fields: FieldSummary[];
}

export function inspect(directory: string, options: InspectOptions = {}): InspectResult {
  const dataset = BlobDir.open(directory);
  const { meta } = dataset;

  console.log(`\nDataset: ${meta.id}${meta.name && meta.name !== meta.id ? ` (${meta.name})` : ""}`);
  console.log(`Records: ${meta.records.toLocaleString()}`);
  if (meta.origin) {
    console.log(`Origin: ${meta.origin}`);
  }

  const axes = Object.entries(meta.plot)
    .map(([axis, fieldId]) => `${axis}=${fieldId}`)
    .join(", ");
  console.log(`Plot axes: ${axes || "(none)"}`);

  const assembly = Object.entries(meta.assembly);
  if (assembly.length > 0) {
    console.log(`Assembly: ${assembly.map(([key, value]) => `${key}=${formatValue(value)}`).join(", ")}`);
  }

  const fields: FieldSummary[] = [];
  for (const fieldId of meta.listFields()) {
    const descriptor = meta.fieldMeta(fieldId);
    if (descriptor === undefined) continue;

    const summary: FieldSummary = {
      id: fieldId,
      type: meta.isGroup(fieldId) || descriptor.type === undefined ? "group" : descriptor.type,
      depth: meta.fieldParentList(fieldId).length,
    };
    if (descriptor.parent !== undefined) summary.parent = descriptor.parent;
    if (descriptor.range !== undefined) summary.range = descriptor.range;

    // Key tables live in the values file, so only load them when asked
    if (options.fields && (summary.type === "category" || summary.type === "multiarray")) {
      const field = dataset.field(fieldId);
      if (field.kind === "category" || field.kind === "multiarray") {
        summary.keyCount = field.keys.length;
      }
    }
    fields.push(summary);
  }

  console.log("\n" + "=".repeat(60));
  console.log("FIELDS");
  console.log("=".repeat(60));
  console.log(`\nFields (${fields.length}):\n`);

  for (const field of fields) {
    const indent = "  ".repeat(field.depth + 1);
    const parts = [`${indent}${field.id}: ${field.type}`];
    if (field.parent !== undefined) parts.push(`[parent: ${field.parent}]`);
    if (field.range !== undefined) parts.push(`range: ${formatValue(field.range[0])} - ${formatValue(field.range[1])}`);
    if (field.keyCount !== undefined) parts.push(`keys: ${field.keyCount}`);
    console.log(parts.join(" "));
  }

  return {
    id: meta.id,
    records: meta.records,
    origin: meta.origin,
    fields,
  };
}

function formatValue(value: string | number): string {
  if (typeof value === "string") {
    if (value.length > 30) {
      return `"${value.slice(0, 27)}..."`;
    }
    return `"${value}"`;
  }
  return Number.isInteger(value) ? value.toLocaleString() : String(value);
}
