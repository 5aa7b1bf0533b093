/**
 * Registry of companion file filters
 */

import { fastaFilter } from "./fasta.js";
import { fastqFilter } from "./fastq.js";
import { textFilter } from "./text.js";
import type { CompanionFilter } from "./types.js";

export type { CompanionFilter, CompanionOptions } from "./types.js";
export { filteredPath } from "./lines.js";

export const COMPANION_FILTERS: readonly CompanionFilter[] = [fastaFilter, fastqFilter, textFilter];
