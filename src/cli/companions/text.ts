/**
 * Delimited text filtering by an identifier column
 */

import { CompanionFileError } from "../../errors.js";
import { filteredPath, readLines, streamLines } from "./lines.js";
import type { CompanionFilter, CompanionOptions } from "./types.js";

async function* keptRows(
  ids: ReadonlySet<string>,
  filePath: string,
  options: CompanionOptions
): AsyncGenerator<string> {
  const column = options.textIdColumn - 1;
  const delimiter = options.textDelimiter ? options.textDelimiter : /\s+/;
  let first = true;

  for await (const line of readLines(filePath)) {
    if (first && options.textHeader) {
      first = false;
      yield line;
      continue;
    }
    first = false;
    const trimmed = delimiter instanceof RegExp ? line.trim() : line;
    if (trimmed === "") continue;
    const id = trimmed.split(delimiter)[column];
    if (id !== undefined && ids.has(id)) {
      yield line;
    }
  }
}

export const textFilter: CompanionFilter = {
  flag: "text",
  requires: [],

  async applyFilter(ids, filePath, options) {
    if (!Number.isInteger(options.textIdColumn) || options.textIdColumn < 1) {
      throw new CompanionFileError(`Invalid id column ${options.textIdColumn}`, filePath);
    }
    const outPath = filteredPath(filePath, options.suffix);
    await streamLines(outPath, keptRows(ids, filePath, options));
    return outPath;
  },
};
