/**
 * FASTA filtering by sequence identifier
 */

import { filteredPath, readLines, streamLines } from "./lines.js";
import type { CompanionFilter } from "./types.js";

async function* keptRecords(ids: ReadonlySet<string>, filePath: string): AsyncGenerator<string> {
  let keep = false;
  for await (const line of readLines(filePath)) {
    if (line.startsWith(">")) {
      const id = line.slice(1).trim().split(/\s+/)[0];
      keep = ids.has(id);
    }
    if (keep && line !== "") {
      yield line;
    }
  }
}

export const fastaFilter: CompanionFilter = {
  flag: "fasta",
  requires: [],

  async applyFilter(ids, filePath, options) {
    const outPath = filteredPath(filePath, options.suffix);
    await streamLines(outPath, keptRecords(ids, filePath));
    return outPath;
  },
};
