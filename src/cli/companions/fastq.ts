/**
 * FASTQ filtering by the sequences reads are aligned to
 */

import { CompanionFileError } from "../../errors.js";
import { filteredPath, readLines, streamLines } from "./lines.js";
import type { CompanionFilter } from "./types.js";

/**
 * Names of reads aligned to any of `ids`, read from a SAM text file
 */
export async function readsMappedTo(ids: ReadonlySet<string>, samPath: string): Promise<Set<string>> {
  if (/\.(bam|cram)$/i.test(samPath)) {
    throw new CompanionFileError("Binary alignments are not supported, convert to SAM first", samPath);
  }
  const reads = new Set<string>();
  for await (const line of readLines(samPath)) {
    if (line === "" || line.startsWith("@")) continue;
    const fields = line.split("\t");
    if (fields.length < 3) {
      throw new CompanionFileError(`Malformed SAM line '${line.slice(0, 50)}'`, samPath);
    }
    if (ids.has(fields[2])) {
      reads.add(fields[0]);
    }
  }
  return reads;
}

function readName(header: string): string {
  return header.slice(1).trim().split(/\s+/)[0].replace(/\/[12]$/, "");
}

async function* keptReads(reads: ReadonlySet<string>, filePath: string): AsyncGenerator<string> {
  let record: string[] = [];
  for await (const line of readLines(filePath)) {
    if (record.length === 0 && line === "") continue;
    record.push(line);
    if (record.length === 4) {
      if (!record[0].startsWith("@")) {
        throw new CompanionFileError(`Malformed FASTQ record '${record[0].slice(0, 50)}'`, filePath);
      }
      if (reads.has(readName(record[0]))) {
        yield* record;
      }
      record = [];
    }
  }
  if (record.length > 0) {
    throw new CompanionFileError("Truncated FASTQ record at end of file", filePath);
  }
}

export const fastqFilter: CompanionFilter = {
  flag: "fastq",
  requires: ["cov"],

  async applyFilter(ids, filePath, options) {
    if (options.cov === undefined) {
      throw new CompanionFileError("An alignment file is required to filter reads", filePath);
    }
    const reads = await readsMappedTo(ids, options.cov);

    const outPath = filteredPath(filePath, options.suffix);
    await streamLines(outPath, keptReads(reads, filePath));
    return outPath;
  },
};
