/**
 * Line-oriented reading and writing of companion files
 */

import { once } from "node:events";
import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import * as zlib from "node:zlib";
import { CompanionFileError } from "../../errors.js";

/**
 * Stream a text file line by line, decompressing `.gz` input
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  if (!fs.existsSync(filePath)) {
    throw new CompanionFileError("File not found", filePath);
  }
  const fileStream = fs.createReadStream(filePath);
  let input: NodeJS.ReadableStream = fileStream;
  if (filePath.endsWith(".gz")) {
    const gunzip = zlib.createGunzip();
    fileStream.on("error", (error) => gunzip.destroy(error));
    input = fileStream.pipe(gunzip);
  }
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });

  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CompanionFileError(`Unable to read file (${detail})`, filePath);
  } finally {
    rl.close();
    fileStream.destroy();
  }
}

/**
 * Output path for a filtered copy: `asm.fa.gz` -> `asm.filtered.fa`
 */
export function filteredPath(filePath: string, suffix: string): string {
  const uncompressed = filePath.replace(/\.gz$/, "");
  const ext = path.extname(uncompressed);
  const base = uncompressed.slice(0, uncompressed.length - ext.length);
  return `${base}.${suffix}${ext}`;
}

/**
 * Write lines to `filePath` as they arrive, waiting for the stream to drain.
 * A failed write leaves no partial file behind.
 */
export async function streamLines(filePath: string, lines: AsyncIterable<string>): Promise<void> {
  const output = fs.createWriteStream(filePath);
  const state: { failure?: Error } = {};
  output.on("error", (error) => {
    state.failure = error;
  });

  try {
    for await (const line of lines) {
      if (state.failure) throw state.failure;
      if (!output.write(`${line}\n`)) {
        await once(output, "drain");
      }
    }
    if (state.failure) throw state.failure;
    output.end();
    await once(output, "finish");
  } catch (error) {
    if (!output.closed) {
      output.destroy();
      await once(output, "close");
    }
    await fs.promises.rm(filePath, { force: true });
    throw error;
  }
}
