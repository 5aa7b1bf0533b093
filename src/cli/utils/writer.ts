/**
 * Write a retained subset of records as a new, independent BlobDir
 */

import * as fs from "node:fs";
import * as path from "node:path";
import cliProgress from "cli-progress";
import { DatasetError } from "../../errors.js";
import type { FieldDescriptor, IndexList } from "../../types/index.js";
import { writeFieldDocument, writeMetaDocument, type BlobDir } from "./blobdir.js";
import {
  assertNever,
  computeRange,
  expandValues,
  fieldFromDisplayValues,
  type Field,
} from "./fields.js";
import type { DatasetMeta } from "./metadata.js";

export interface WriteOptions {
  /** Show progress bar */
  showProgress?: boolean;
}

export interface WriteResult {
  meta: DatasetMeta;
  outputDir: string;
  fieldsWritten: string[];
}

/**
 * Subset one field to the retained indices, recomputing everything derived
 * from its values. Category keys are re-collected, seeded from `parentKeys`.
 */
export function subsetField(
  field: Field,
  descriptor: FieldDescriptor,
  indices: IndexList,
  parentKeys?: readonly string[]
): Field {
  switch (field.kind) {
    case "identifier": {
      const values = indices.map((index) => field.values[index]);
      return { ...field, meta: descriptor, values };
    }
    case "variable": {
      const values = indices.map((index) => field.values[index]);
      const range = computeRange(values, field.fieldId);
      return { ...field, meta: { ...descriptor, range }, values, range };
    }
    case "category": {
      const display = expandValues(field);
      return fieldFromDisplayValues(
        "category",
        descriptor,
        indices.map((index) => display[index]),
        { fixedKeys: parentKeys }
      );
    }
    case "multiarray": {
      const display = expandValues(field);
      return fieldFromDisplayValues(
        "multiarray",
        descriptor,
        indices.map((index) => display[index]),
        {
          fixedKeys: parentKeys,
          categorySlot: field.categorySlot,
          headers: field.headers,
        }
      );
    }
    default:
      return assertNever(field);
  }
}

export function createFilteredDataset(
  source: BlobDir,
  outputDir: string,
  indices: IndexList,
  options: WriteOptions = {}
): WriteResult {
  if (indices.length === 0) {
    throw new DatasetError("No records retained, refusing to write an empty dataset", outputDir);
  }

  const resolved = path.resolve(outputDir);
  fs.mkdirSync(resolved, { recursive: true });

  const datasetId = path.basename(resolved);
  const meta = source.meta.cloneAttributes({
    id: datasetId,
    name: datasetId,
    records: indices.length,
    origin: source.meta.id,
  });

  const fieldIds = source.meta.listFields();
  const written = new Map<string, Field>();

  let progressBar: cliProgress.SingleBar | null = null;
  if (options.showProgress) {
    progressBar = new cliProgress.SingleBar({
      format: "  Writing |{bar}| {percentage}% | {value}/{total} fields | {field}",
      barCompleteChar: "█",
      barIncompleteChar: "░",
      hideCursor: true,
    }, cliProgress.Presets.shades_classic);
    progressBar.start(fieldIds.length, 0, { field: "" });
  }

  for (const fieldId of fieldIds) {
    const descriptor = source.meta.fieldMeta(fieldId);
    if (descriptor === undefined) {
      continue;
    }
    const ancestors = source.meta.fieldParentList(fieldId);

    if (!source.meta.isGroup(fieldId)) {
      const parentKeys = descriptor.parent !== undefined ? keysOf(written.get(descriptor.parent)) : undefined;
      const field = subsetField(source.field(fieldId), descriptor, indices, parentKeys);

      if (field.kind === "variable" && fieldId === "length") {
        meta.assembly.span = field.values.reduce((sum, value) => sum + value, 0);
        meta.assembly["scaffold-count"] = field.values.length;
      }

      writeFieldDocument(resolved, field);
      written.set(fieldId, field);
      meta.addField(ancestors, field.meta);
    } else {
      meta.addField(ancestors, descriptor);
    }

    progressBar?.increment(1, { field: fieldId });
  }

  progressBar?.stop();

  writeMetaDocument(resolved, meta);

  return {
    meta,
    outputDir: resolved,
    fieldsWritten: [...written.keys()],
  };
}

function keysOf(field: Field | undefined): readonly string[] | undefined {
  if (field?.kind === "category" || field?.kind === "multiarray") {
    return field.keys;
  }
  return undefined;
}
