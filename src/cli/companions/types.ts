/**
 * Companion file filter strategy interface
 */

import type { FilterOptions } from "../../types/index.js";

export interface CompanionOptions {
  suffix: string;
  cov?: string;
  textDelimiter?: string;
  textHeader: boolean;
  textIdColumn: number;
}

export interface CompanionFilter {
  /** Option naming the file(s) to filter */
  flag: "fasta" | "fastq" | "text";
  /** Options that must also be set */
  requires: readonly (keyof FilterOptions)[];
  /** Write a filtered copy of `filePath` keeping `ids`, returning the output path */
  applyFilter(ids: ReadonlySet<string>, filePath: string, options: CompanionOptions): Promise<string>;
}
