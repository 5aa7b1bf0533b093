/**
 * BlobDir access: meta.json plus one values document per field
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type } from "arktype";
import { DatasetError } from "../../errors.js";
import type { DatasetMetaDocument, FieldDocument, FieldNode } from "../../types/index.js";
import { createField, fieldToDocument, type Field, type IdentifierField } from "./fields.js";
import { DatasetMeta } from "./metadata.js";

export const META_FILE = "meta.json";

const FieldNodeSchema = type({
  id: "string",
  "type?": "'identifier' | 'variable' | 'category' | 'multiarray'",
  "name?": "string",
  "parent?": "string",
  "range?": ["number", "number"],
  "scale?": "string",
  "clamp?": "number",
  "preload?": "boolean",
  "active?": "boolean",
  "datatype?": "string",
  "category_slot?": "number",
  "headers?": "string[]",
  "count?": "number",
  "children?": "object[]",
  "data?": "object[]",
});

const DatasetMetaSchema = type({
  id: "string",
  "name?": "string",
  records: "number.integer",
  "record_type?": "string",
  "origin?": "string",
  "plot?": {
    "x?": "string",
    "y?": "string",
    "z?": "string",
    "cat?": "string",
  },
  "assembly?": { "[string]": "string | number" },
  "taxon?": { "[string]": "string | number" },
  fields: "object[]",
});

const FieldDocumentSchema = type({
  values: "unknown[]",
  "keys?": "string[]",
  "category_slot?": "number",
  "headers?": "string[]",
});

function readJson(filePath: string, directory: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw DatasetError.fromSystemError(`Unable to read ${path.basename(filePath)}`, directory, error);
  }
}

function parseFieldNode(raw: unknown, directory: string): FieldNode {
  const node = FieldNodeSchema(raw);
  if (node instanceof type.errors) {
    throw new DatasetError(`Invalid field descriptor in ${META_FILE}`, directory, node.summary);
  }
  const { children, data, ...rest } = node;
  const parsed: FieldNode = { ...rest };
  if (children) {
    parsed.children = children.map((child) => parseFieldNode(child, directory));
  }
  if (data) {
    parsed.data = data.map((child) => parseFieldNode(child, directory));
  }
  return parsed;
}

/**
 * Read and validate a BlobDir's meta.json
 */
export function readMetaDocument(directory: string): DatasetMetaDocument {
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new DatasetError(`Dataset directory not found: ${directory}`, directory);
  }
  const metaPath = path.join(directory, META_FILE);
  if (!fs.existsSync(metaPath)) {
    throw new DatasetError(`No ${META_FILE} in dataset directory: ${directory}`, directory);
  }

  const document = DatasetMetaSchema(readJson(metaPath, directory));
  if (document instanceof type.errors) {
    throw new DatasetError(`Invalid ${META_FILE}`, directory, document.summary);
  }
  if (document.records < 0) {
    throw new DatasetError(`Invalid record count ${document.records}`, directory);
  }

  const { fields, ...attributes } = document;
  return {
    ...attributes,
    fields: fields.map((node) => parseFieldNode(node, directory)),
  };
}

export class BlobDir {
  private readonly cache = new Map<string, Field>();

  private constructor(
    readonly directory: string,
    readonly meta: DatasetMeta
  ) {}

  static open(directory: string): BlobDir {
    const resolved = path.resolve(directory);
    return new BlobDir(resolved, DatasetMeta.fromDocument(readMetaDocument(resolved)));
  }

  get recordCount(): number {
    return this.meta.records;
  }

  /**
   * Load a field's values, validated against the dataset record count
   */
  field(fieldId: string): Field {
    const cached = this.cache.get(fieldId);
    if (cached) {
      return cached;
    }

    const descriptor = this.meta.fieldMeta(fieldId);
    if (descriptor === undefined) {
      throw new DatasetError(`Field "${fieldId}" is not present in dataset`, this.directory);
    }
    if (this.meta.isGroup(fieldId)) {
      throw new DatasetError(`Field "${fieldId}" is a group with no values`, this.directory);
    }

    const fieldPath = path.join(this.directory, `${fieldId}.json`);
    if (!fs.existsSync(fieldPath)) {
      throw new DatasetError(`Missing values file for field "${fieldId}"`, this.directory);
    }
    const document = FieldDocumentSchema(readJson(fieldPath, this.directory));
    if (document instanceof type.errors) {
      throw new DatasetError(`Invalid values file for field "${fieldId}"`, this.directory, document.summary);
    }

    const field = createField(descriptor, document, this.recordCount);
    this.cache.set(fieldId, field);
    return field;
  }

  identifiers(): IdentifierField {
    const fieldId = this.meta.identifierFieldId();
    if (fieldId === undefined) {
      throw new DatasetError("Dataset has no identifier field", this.directory);
    }
    const field = this.field(fieldId);
    if (field.kind !== "identifier") {
      throw new DatasetError(`Field "${fieldId}" is not an identifier field`, this.directory);
    }
    return field;
  }
}

export function writeFieldDocument(directory: string, field: Field): void {
  const document: FieldDocument = fieldToDocument(field);
  fs.writeFileSync(path.join(directory, `${field.fieldId}.json`), JSON.stringify(document));
}

export function writeMetaDocument(directory: string, meta: DatasetMeta): void {
  fs.writeFileSync(path.join(directory, META_FILE), JSON.stringify(meta.toJSON()));
}
