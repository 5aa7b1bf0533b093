import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { Diagnostics } from "../src/cli/utils/diagnostics.js";
import { createField, type CategoryField, type MultiArrayField, type VariableField } from "../src/cli/utils/fields.js";
import {
  allIndices,
  filterByIdentifiers,
  filterByParams,
  filterCategory,
  filterMultiArray,
  filterVariable,
  invertIndices,
  loadIdentifierList,
  loadIdentifierSelection,
} from "../src/cli/utils/filter.js";
import { DatasetError, InvalidParameterValue, UnknownKeyError } from "../src/errors.js";
import { makeTempDir, MemorySource } from "./helpers.js";

const source = new MemorySource();
const all = allIndices(5);

function variable(fieldId: string): VariableField {
  const field = source.field(fieldId);
  if (field.kind !== "variable") throw new Error(`${fieldId} is not a variable field`);
  return field;
}

function category(fieldId: string): CategoryField {
  const field = source.field(fieldId);
  if (field.kind !== "category") throw new Error(`${fieldId} is not a category field`);
  return field;
}

function multiArray(fieldId: string): MultiArrayField {
  const field = source.field(fieldId);
  if (field.kind !== "multiarray") throw new Error(`${fieldId} is not a multiarray field`);
  return field;
}

describe("index helpers", () => {
  it("lists every record position", () => {
    expect(allIndices(3)).toEqual([0, 1, 2]);
    expect(allIndices(0)).toEqual([]);
  });

  it("inverts relative to the given positions", () => {
    expect(invertIndices([0, 1, 2, 3, 4], [1, 3])).toEqual([0, 2, 4]);
    expect(invertIndices([1, 2, 3], [2])).toEqual([1, 3]);
  });
});

describe("filterVariable", () => {
  const length = variable("length");

  it("keeps everything without bounds", () => {
    expect(filterVariable(length, all, {})).toEqual(all);
  });

  it("keeps nothing when only inverted", () => {
    expect(filterVariable(length, all, { Inv: "1" })).toEqual([]);
  });

  it("keeps values within inclusive bounds", () => {
    expect(filterVariable(length, all, { Min: "2000", Max: "4000" })).toEqual([1, 2, 3]);
  });

  it("keeps values outside the bounds when inverted", () => {
    expect(filterVariable(length, all, { Min: "2000", Max: "4000", Inv: "true" })).toEqual([0, 4]);
  });

  it("treats an empty Inv as unset", () => {
    expect(filterVariable(length, all, { Min: "4000", Inv: "" })).toEqual([3, 4]);
  });

  it("accepts infinite bounds", () => {
    expect(filterVariable(length, all, { Min: "-inf", Max: "Infinity" })).toEqual(all);
  });

  it("narrows only the positions it is given", () => {
    expect(filterVariable(length, [0, 4], { Max: "4500" })).toEqual([0]);
  });

  it("rejects unparseable bounds", () => {
    expect(() => filterVariable(length, all, { Min: "abc" })).toThrow(InvalidParameterValue);
  });

  it("rejects prefixed integer notations", () => {
    expect(() => filterVariable(length, all, { Min: "0x1000" })).toThrow(InvalidParameterValue);
    expect(() => filterVariable(length, all, { Max: "0b11" })).toThrow(InvalidParameterValue);
    expect(() => filterVariable(length, all, { Max: "0o7" })).toThrow(InvalidParameterValue);
  });

  it("accepts decimal and exponent notation", () => {
    expect(filterVariable(length, all, { Min: "2.5e3", Max: ".5e4" })).toEqual([2, 3, 4]);
    expect(filterVariable(length, all, { Max: "+2000." })).toEqual([0, 1]);
  });
});

describe("filterCategory", () => {
  const letters = createField(
    { id: "letters", type: "category" },
    { values: [0, 1, 2, 0, 1], keys: ["A", "B", "C"] },
    5
  );
  if (letters.kind !== "category") throw new Error("letters is not a category field");

  it("excludes listed keys", () => {
    expect(filterCategory(letters, all, { Keys: "0" })).toEqual([1, 2, 4]);
  });

  it("keeps only listed keys when inverted", () => {
    expect(filterCategory(letters, all, { Keys: "0", Inv: "1" })).toEqual([0, 3]);
  });

  it("is a no-op without Keys", () => {
    expect(filterCategory(letters, all, { Inv: "1" })).toEqual(all);
  });

  it("resolves key names", () => {
    const phylum = category("bestsumorder_phylum");
    expect(filterCategory(phylum, all, { Keys: "no-hit" })).toEqual([0, 1, 2, 4]);
    expect(filterCategory(phylum, all, { Keys: "Nematoda", Inv: "1" })).toEqual([0, 2, 4]);
    expect(filterCategory(phylum, all, { Keys: "Nematoda,Chordata" })).toEqual([3]);
  });

  it("rejects unknown key names", () => {
    expect(() => filterCategory(category("bestsumorder_phylum"), all, { Keys: "Arthropoda" })).toThrow(
      UnknownKeyError
    );
  });
});

describe("filterMultiArray", () => {
  const positions = multiArray("bestsumorder_positions");

  it("bounds the number of tuples per record", () => {
    expect(filterMultiArray(positions, all, { MinLength: "3" })).toEqual([2]);
    expect(filterMultiArray(positions, all, { MaxLength: "2" })).toEqual([0, 1, 3, 4]);
    expect(filterMultiArray(positions, all, { MinLength: "1", MaxLength: "1" })).toEqual([1, 4]);
  });

  it("inverts the length bounds", () => {
    expect(filterMultiArray(positions, all, { MaxLength: "1", Inv: "1" })).toEqual([0, 2]);
  });

  it("keeps records with any tuple holding a retained key", () => {
    expect(filterMultiArray(positions, all, { Keys: "Chordata" })).toEqual([0, 2, 4]);
    expect(filterMultiArray(positions, all, { Keys: "Chordata", Inv: "1" })).toEqual([0, 1, 2]);
  });

  it("rejects non-integer lengths", () => {
    expect(() => filterMultiArray(positions, all, { MinLength: "2.5" })).toThrow(InvalidParameterValue);
  });
});

describe("filterByParams", () => {
  it("folds field filters together", () => {
    expect(filterByParams(source, all, { length: { Min: "2000" }, gc: { Max: "0.6" } }, false)).toEqual([
      1, 2, 3,
    ]);
  });

  it("narrows monotonically", () => {
    const lengthOnly = filterByParams(source, all, { length: { Min: "2000" } }, false);
    const both = filterByParams(
      source,
      all,
      { length: { Min: "2000" }, bestsumorder_phylum: { Keys: "no-hit" } },
      false
    );
    expect(lengthOnly).toEqual([1, 2, 3, 4]);
    expect(both).toEqual([1, 2, 4]);
    expect(both.every((index) => lengthOnly.includes(index))).toBe(true);
  });

  it("returns the input for empty params", () => {
    expect(filterByParams(source, [1, 3], {}, false)).toEqual([1, 3]);
  });

  it("complements the result when inverting everything", () => {
    const params = { bestsumorder_phylum: { Keys: "Nematoda" } };
    expect(filterByParams(source, all, params, false)).toEqual([1, 3]);
    expect(filterByParams(source, all, params, true)).toEqual([0, 2, 4]);
  });

  it("warns about fields not in the registry", () => {
    const diagnostics = new Diagnostics();
    expect(filterByParams(source, all, { bogus: { Min: "1" } }, false, diagnostics)).toEqual(all);
    expect(diagnostics.warnings).toEqual(["Skipping field 'bogus', not present in dataset"]);
  });
});

describe("identifier selections", () => {
  const ids = ["ctg1", "ctg2", "ctg3", "ctg4", "ctg5"];
  let root: string;

  beforeAll(() => {
    root = makeTempDir("filter");
  });

  afterAll(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it("keeps listed identifiers", () => {
    expect(filterByIdentifiers(ids, all, new Set(["ctg2", "ctg5"]), false)).toEqual([1, 4]);
  });

  it("drops listed identifiers when inverted", () => {
    expect(filterByIdentifiers(ids, all, new Set(["ctg2", "ctg5"]), true)).toEqual([0, 2, 3]);
  });

  it("reads whitespace separated lists", () => {
    const listPath = path.join(root, "ids.txt");
    fs.writeFileSync(listPath, "ctg1 ctg2\nctg3\n\n");
    expect([...loadIdentifierList(listPath)]).toEqual(["ctg1", "ctg2", "ctg3"]);
  });

  it("reads JSON selections", () => {
    const selectionPath = path.join(root, "selection.json");
    fs.writeFileSync(selectionPath, JSON.stringify({ identifiers: ["ctg4"] }));
    expect([...loadIdentifierSelection(selectionPath)]).toEqual(["ctg4"]);
  });

  it("rejects malformed JSON selections", () => {
    const selectionPath = path.join(root, "bad-selection.json");
    fs.writeFileSync(selectionPath, JSON.stringify({ ids: ["ctg4"] }));
    expect(() => loadIdentifierSelection(selectionPath)).toThrow(DatasetError);
  });

  it("rejects missing list files", () => {
    expect(() => loadIdentifierList(path.join(root, "absent.txt"))).toThrow(DatasetError);
  });
});
