/**
 * Filter command - select records from a BlobDir and write the selection
 * as a new BlobDir, a table, a summary and filtered companion files
 */

import { COMPANION_FILTERS, type CompanionOptions } from "../companions/index.js";
import { summarise, writeSummary } from "../summary/index.js";
import type { FilterOptions, FilterParams, SummaryResult } from "../../types/index.js";
import { BlobDir } from "../utils/blobdir.js";
import { Diagnostics } from "../utils/diagnostics.js";
import {
  allIndices,
  filterByIdentifiers,
  filterByParams,
  loadIdentifierList,
  loadIdentifierSelection,
} from "../utils/filter.js";
import { parseParams, splitQueryString } from "../utils/params.js";
import { buildTable, writeTable } from "../utils/table.js";
import { createFilteredDataset } from "../utils/writer.js";

export const DEFAULT_FILTER_OPTIONS = {
  suffix: "filtered",
  summaryRank: "phylum",
  tableFields: "plot",
  textIdColumn: 1,
  textHeader: false,
} as const;

export interface FilterResult {
  indices: number[];
  identifiers: string[];
  params: FilterParams;
  outputDir?: string;
  tablePath?: string;
  summary?: SummaryResult;
  companionFiles: string[];
  warnings: readonly string[];
}

export async function filter(
  directory: string,
  options: FilterOptions,
  diagnostics: Diagnostics = new Diagnostics()
): Promise<FilterResult> {
  const dataset = BlobDir.open(directory);
  const identifiers = dataset.identifiers();
  console.log(`Dataset: ${dataset.meta.id} (${dataset.recordCount.toLocaleString()} records)`);

  const strings = [...(options.param ?? [])];
  if (options.queryString) {
    strings.push(...splitQueryString(options.queryString, diagnostics));
  }
  const params = parseParams(strings, dataset.meta, diagnostics);
  const invert = options.invert ?? false;

  let indices = allIndices(dataset.recordCount);
  if (Object.keys(params).length > 0) {
    indices = filterByParams(dataset, indices, params, invert, diagnostics);
  }
  if (options.json) {
    indices = filterByIdentifiers(identifiers.values, indices, loadIdentifierSelection(options.json), invert);
  }
  if (options.list) {
    indices = filterByIdentifiers(identifiers.values, indices, loadIdentifierList(options.list), invert);
  }
  console.log(`Retained ${indices.length.toLocaleString()} of ${dataset.recordCount.toLocaleString()} records`);

  const result: FilterResult = {
    indices,
    identifiers: indices.map((index) => identifiers.values[index]),
    params,
    companionFiles: [],
    warnings: diagnostics.warnings,
  };

  if (options.output) {
    const written = createFilteredDataset(dataset, options.output, indices, {
      showProgress: options.showProgress,
    });
    result.outputDir = written.outputDir;
    console.log(`Wrote ${written.fieldsWritten.length} fields to ${written.outputDir}`);
  }

  const ids = new Set(result.identifiers);
  const companionOptions: CompanionOptions = {
    suffix: options.suffix ?? DEFAULT_FILTER_OPTIONS.suffix,
    cov: options.cov,
    textDelimiter: options.textDelimiter,
    textHeader: options.textHeader ?? DEFAULT_FILTER_OPTIONS.textHeader,
    textIdColumn: options.textIdColumn ?? DEFAULT_FILTER_OPTIONS.textIdColumn,
  };
  for (const companion of COMPANION_FILTERS) {
    const files = companionFiles(options, companion.flag);
    if (files.length === 0) continue;

    const unset = companion.requires.filter((flag) => options[flag] === undefined);
    if (unset.length > 0) {
      for (const flag of unset) {
        diagnostics.warn(`'--${kebabCase(flag)}' must be set to use option '--${companion.flag}'`);
      }
      continue;
    }

    for (const file of files) {
      const outPath = await companion.applyFilter(ids, file, companionOptions);
      result.companionFiles.push(outPath);
      console.log(`Wrote filtered ${companion.flag} to ${outPath}`);
    }
  }

  if (options.table) {
    const rows = buildTable(dataset, indices, options.tableFields ?? DEFAULT_FILTER_OPTIONS.tableFields);
    writeTable(rows, options.table);
    result.tablePath = options.table;
    console.log(`Wrote table to ${options.table}`);
  }

  if (options.summary) {
    const summary = summarise(
      dataset,
      indices,
      {
        summaryRank: options.summaryRank ?? DEFAULT_FILTER_OPTIONS.summaryRank,
        taxrule: options.taxrule,
      },
      diagnostics
    );
    writeSummary(summary, options.summary);
    result.summary = summary;
    console.log(`Wrote summary to ${options.summary}`);
  }

  return result;
}

function companionFiles(options: FilterOptions, flag: "fasta" | "fastq" | "text"): string[] {
  const value = options[flag];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function kebabCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
