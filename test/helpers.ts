import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { DatasetMetaDocument, FieldDocument } from "../src/types/index.js";
import { createField, type Field } from "../src/cli/utils/fields.js";
import type { FieldSource } from "../src/cli/utils/filter.js";
import { DatasetMeta } from "../src/cli/utils/metadata.js";

/**
 * Five-record assembly with one field of every type, grouped the way
 * assembly datasets usually are
 */
export function datasetDocument(): DatasetMetaDocument {
  return {
    id: "source",
    name: "source",
    records: 5,
    record_type: "contig",
    plot: { x: "gc", y: "reads_cov", z: "length", cat: "bestsumorder_phylum" },
    assembly: { span: 15000, "scaffold-count": 5, level: "contig" },
    taxon: { taxid: "1", phylum: "Nematoda" },
    fields: [
      { id: "identifiers", type: "identifier" },
      { id: "length", type: "variable", range: [1000, 5000], scale: "scaleLog", clamp: 1 },
      { id: "gc", type: "variable", range: [0.3, 0.7], scale: "scaleLinear" },
      { id: "ncount", type: "variable", range: [0, 500] },
      {
        id: "taxonomy",
        children: [
          {
            id: "bestsumorder",
            children: [
              {
                id: "bestsumorder_phylum",
                type: "category",
                data: [
                  {
                    id: "bestsumorder_positions",
                    type: "multiarray",
                    parent: "bestsumorder_phylum",
                    category_slot: 0,
                    headers: ["taxon", "score"],
                  },
                ],
              },
            ],
          },
        ],
      },
      {
        id: "coverage",
        children: [
          { id: "reads_cov", type: "variable", range: [0, 50] },
          { id: "reads_read_cov", type: "variable", range: [0, 2500] },
        ],
      },
      {
        id: "busco",
        children: [{ id: "eukaryota_odb10_busco", type: "multiarray", category_slot: 1, count: 4 }],
      },
    ],
  };
}

export function fieldDocuments(): Record<string, FieldDocument> {
  return {
    identifiers: { values: ["ctg1", "ctg2", "ctg3", "ctg4", "ctg5"], keys: [] },
    length: { values: [1000, 2000, 3000, 4000, 5000], keys: [] },
    gc: { values: [0.3, 0.4, 0.5, 0.6, 0.7], keys: [] },
    ncount: { values: [0, 100, 0, 0, 500], keys: [] },
    bestsumorder_phylum: { values: [0, 1, 0, 2, 0], keys: ["Nematoda", "Chordata", "no-hit"] },
    bestsumorder_positions: {
      values: [
        [[0, 100], [1, 50]],
        [[1, 200]],
        [[0, 80], [0, 70], [1, 10]],
        [],
        [[0, 300]],
      ],
      keys: ["Nematoda", "Chordata", "no-hit"],
      category_slot: 0,
      headers: ["taxon", "score"],
    },
    reads_cov: { values: [10, 20, 30, 0, 50], keys: [] },
    reads_read_cov: { values: [100, 400, 900, 0, 2500], keys: [] },
    eukaryota_odb10_busco: {
      values: [[["b1", 0]], [["b2", 1]], [["b2", 1], ["b3", 2]], [], [["b4", 0]]],
      keys: ["Complete", "Duplicated", "Fragmented"],
      category_slot: 1,
    },
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `blobdir-${prefix}-`));
}

/**
 * Write the fixture dataset into `directory`
 */
export function writeBlobDir(
  directory: string,
  document: DatasetMetaDocument = datasetDocument(),
  documents: Record<string, FieldDocument> = fieldDocuments()
): string {
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(path.join(directory, "meta.json"), JSON.stringify(document));
  for (const [fieldId, fieldDocument] of Object.entries(documents)) {
    fs.writeFileSync(path.join(directory, `${fieldId}.json`), JSON.stringify(fieldDocument));
  }
  return directory;
}

/**
 * In-memory field source over the fixture, for tests that never touch disk
 */
export class MemorySource implements FieldSource {
  readonly meta: DatasetMeta;
  private readonly fields = new Map<string, Field>();

  constructor(
    document: DatasetMetaDocument = datasetDocument(),
    private readonly documents: Record<string, FieldDocument> = fieldDocuments()
  ) {
    this.meta = DatasetMeta.fromDocument(document);
  }

  field(fieldId: string): Field {
    let field = this.fields.get(fieldId);
    if (field === undefined) {
      const descriptor = this.meta.fieldMeta(fieldId);
      const document = this.documents[fieldId];
      if (descriptor === undefined || document === undefined) {
        throw new Error(`No fixture for field ${fieldId}`);
      }
      field = createField(descriptor, document, this.meta.records);
      this.fields.set(fieldId, field);
    }
    return field;
  }
}
