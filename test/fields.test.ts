import { describe, it, expect } from "vitest";
import {
  computeRange,
  createField,
  expand,
  fieldFromDisplayValues,
  fieldToDocument,
  keyIndexOf,
  type CategoryField,
} from "../src/cli/utils/fields.js";
import { DataModelError, UnknownKeyError } from "../src/errors.js";

function categoryField(keys: string[], values: number[]): CategoryField {
  const field = createField({ id: "cat", type: "category" }, { values, keys }, values.length);
  if (field.kind !== "category") {
    throw new Error("expected a category field");
  }
  return field;
}

describe("createField", () => {
  it("rejects values whose length differs from the record count", () => {
    expect(() =>
      createField({ id: "length", type: "variable" }, { values: [1, 2, 3] }, 4)
    ).toThrow(DataModelError);
  });

  it("rejects category indices outside the key table", () => {
    expect(() =>
      createField({ id: "cat", type: "category" }, { values: [0, 3], keys: ["a", "b"] }, 2)
    ).toThrow(DataModelError);
  });

  it("rejects duplicate identifiers", () => {
    expect(() =>
      createField({ id: "identifiers", type: "identifier" }, { values: ["a", "a"] }, 2)
    ).toThrow(/unique/);
  });

  it("rejects non-numeric variable values", () => {
    expect(() =>
      createField({ id: "gc", type: "variable" }, { values: [0.1, "x"] }, 2)
    ).toThrow(DataModelError);
  });

  it("rejects descriptors without a type", () => {
    expect(() => createField({ id: "taxonomy" }, { values: [] }, 0)).toThrow(/no type/);
  });

  it("uses the declared range when present", () => {
    const field = createField(
      { id: "gc", type: "variable", range: [0, 1] },
      { values: [0.2, 0.4] },
      2
    );
    expect(field.kind === "variable" && field.range).toEqual([0, 1]);
  });

  it("computes the range when none is declared", () => {
    const field = createField({ id: "gc", type: "variable" }, { values: [0.4, 0.2, 0.9] }, 3);
    expect(field.kind === "variable" && field.range).toEqual([0.2, 0.9]);
  });

  it("reads the category slot from the values document", () => {
    const field = createField(
      { id: "busco", type: "multiarray" },
      { values: [[["b1", 0]], []], keys: ["Complete"], category_slot: 1 },
      2
    );
    expect(field.kind === "multiarray" && field.categorySlot).toBe(1);
  });
});

describe("expand", () => {
  it("replaces category indices with key strings", () => {
    const field = categoryField(["A", "B", "C"], [2, 0]);
    expect(expand(field, 0)).toBe("C");
    expect(expand(field, 1)).toBe("A");
  });

  it("replaces the category slot of every tuple", () => {
    const field = createField(
      { id: "positions", type: "multiarray" },
      { values: [[[0, 10], [1, 20]]], keys: ["A", "B"], category_slot: 0 },
      1
    );
    expect(expand(field, 0)).toEqual([["A", 10], ["B", 20]]);
  });
});

describe("keyIndexOf", () => {
  const field = categoryField(["A", "B", "C"], [0, 1, 2]);

  it("resolves key names", () => {
    expect(keyIndexOf(field, "B")).toBe(1);
  });

  it("takes digit-only names as indices without a lookup", () => {
    expect(keyIndexOf(field, "2")).toBe(2);
    expect(keyIndexOf(field, "7")).toBe(7);
  });

  it("throws for unknown keys", () => {
    expect(() => keyIndexOf(field, "D")).toThrow(UnknownKeyError);
  });
});

describe("computeRange", () => {
  it("returns min and max", () => {
    expect(computeRange([3, -1, 8, 2])).toEqual([-1, 8]);
  });

  it("throws on an empty list", () => {
    expect(() => computeRange([], "gc")).toThrow(DataModelError);
  });
});

describe("fieldFromDisplayValues", () => {
  it("collects keys in order of first appearance", () => {
    const field = fieldFromDisplayValues("category", { id: "cat", type: "category" }, ["B", "A", "B"]);
    expect(field.keys).toEqual(["B", "A"]);
    expect(field.values).toEqual([0, 1, 0]);
  });

  it("keeps fixed keys first and appends new ones", () => {
    const field = fieldFromDisplayValues(
      "multiarray",
      { id: "positions", type: "multiarray" },
      [[["C", 5]], [["A", 6]]],
      { fixedKeys: ["A", "B"], categorySlot: 0 }
    );
    expect(field.keys).toEqual(["A", "B", "C"]);
    expect(field.values).toEqual([[[2, 5]], [[0, 6]]]);
  });

  it("serializes back to a values document", () => {
    const field = fieldFromDisplayValues(
      "multiarray",
      { id: "positions", type: "multiarray" },
      [[["A", 1]]],
      { categorySlot: 0, headers: ["taxon", "score"] }
    );
    expect(fieldToDocument(field)).toEqual({
      values: [[[0, 1]]],
      keys: ["A"],
      category_slot: 0,
      headers: ["taxon", "score"],
    });
  });
});
