#!/usr/bin/env node

/**
 * blobdir CLI
 */

import { Command, InvalidArgumentError } from "commander";
import { filter } from "./commands/filter.js";
import { inspect } from "./commands/inspect.js";
import { Diagnostics } from "./utils/diagnostics.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseColumn(value: string): number {
  const column = parseInt(value, 10);
  if (!/^\d+$/.test(value) || column < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return column;
}

const program = new Command();

program
  .name("blobdir")
  .description("Filter and summarize BlobDir datasets of assembled sequences")
  .version("0.1.0");

program
  .command("filter")
  .description("Filter a BlobDir")
  .argument("<directory>", "Existing BlobDir dataset directory")
  .option("--param <string>", "Filter parameter of the form field--Param=value (repeatable)", collect, [])
  .option("--query-string <string>", "List of param=value pairs from a URL query string")
  .option("--json <file>", "JSON selection file with an identifiers list")
  .option("--list <file>", "Space or newline separated list of identifiers")
  .option("--invert", "Invert filter (exclude matching records)", false)
  .option("--output <dir>", "Path to directory to generate a new, filtered BlobDir")
  .option("--fasta <file>", "FASTA format assembly file to be filtered")
  .option("--fastq <file>", "FASTQ format read file to be filtered, requires --cov (repeatable)", collect, [])
  .option("--cov <file>", "SAM read alignment file")
  .option("--text <file>", "Generic text file to be filtered")
  .option("--text-delimiter <string>", "Text file delimiter (default: whitespace)")
  .option("--text-id-column <int>", "1-based index of the column containing identifiers", parseColumn, 1)
  .option("--text-header", "First row of the text file contains field names", false)
  .option("--suffix <string>", "String added to filtered filenames", "filtered")
  .option("--summary <file>", "Generate a JSON-format summary of the filtered dataset")
  .option("--summary-rank <rank>", "Taxonomic level for summary", "phylum")
  .option("--taxrule <string>", "Taxrule used when processing hits")
  .option("--table <file>", "Tabular output of filtered dataset")
  .option("--table-fields <string>", "Comma separated field IDs for the table, 'plot' for all plot axes", "plot")
  .action(async (directory: string, options) => {
    const diagnostics = new Diagnostics((message) => console.warn(`WARN: ${message}`));
    try {
      await filter(
        directory,
        {
          param: options.param,
          queryString: options.queryString,
          json: options.json,
          list: options.list,
          invert: options.invert,
          output: options.output,
          fasta: options.fasta,
          fastq: options.fastq.length > 0 ? options.fastq : undefined,
          cov: options.cov,
          text: options.text,
          textDelimiter: options.textDelimiter,
          textIdColumn: options.textIdColumn,
          textHeader: options.textHeader,
          suffix: options.suffix,
          summary: options.summary,
          summaryRank: options.summaryRank,
          taxrule: options.taxrule,
          table: options.table,
          tableFields: options.tableFields,
          showProgress: process.stdout.isTTY,
        },
        diagnostics
      );
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command("inspect")
  .description("Describe a BlobDir's metadata and fields")
  .argument("<directory>", "Existing BlobDir dataset directory")
  .option("--fields", "Load category fields to report key counts")
  .action((directory: string, options) => {
    try {
      inspect(directory, { fields: options.fields });
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

await program.parseAsync();
