/**
 * Summary aggregation over pluggable sections
 */

import * as fs from "node:fs";
import type { DerivedStats, IndexList, SectionStats, SummaryOptions, SummaryResult } from "../../types/index.js";
import type { Diagnostics } from "../utils/diagnostics.js";
import type { Field } from "../utils/fields.js";
import type { FieldSource } from "../utils/filter.js";
import { buscoSection } from "./busco.js";
import { baseCompositionSection } from "./composition.js";
import { hitsSection } from "./hits.js";
import { readMappingSection } from "./readMapping.js";
import { round, roundSignificant } from "./stats.js";
import { taxonomySection } from "./taxonomy.js";
import type { SummarySection } from "./types.js";

export type { SectionContext, SummarySection } from "./types.js";

export const SUMMARY_SECTIONS: readonly SummarySection[] = [
  taxonomySection,
  baseCompositionSection,
  hitsSection,
  buscoSection,
  readMappingSection,
];

/**
 * Run every section whose prerequisites are met, then derive overall stats
 */
export function summarise(
  source: FieldSource,
  indices: IndexList,
  options: SummaryOptions,
  diagnostics: Diagnostics,
  sections: readonly SummarySection[] = SUMMARY_SECTIONS
): SummaryResult {
  const results: Record<string, SectionStats> = {};

  for (const section of sections) {
    const unset = (section.requires ?? []).filter((option) => options[option] === undefined);
    if (unset.length > 0) {
      diagnostics.warn(`'${unset.join("', '")}' must be set to generate '${section.title}' summary`);
      continue;
    }

    const wanted: Record<string, string> = {};
    for (const fieldId of section.depends) {
      wanted[fieldId] = fieldId;
    }
    if (section.resolve) {
      const discovered = section.resolve(source.meta, options, diagnostics);
      if (discovered === null) {
        continue;
      }
      Object.assign(wanted, discovered);
    }

    const missing = Object.values(wanted).filter(
      (fieldId) => !source.meta.hasField(fieldId) || source.meta.isGroup(fieldId)
    );
    if (missing.length > 0) {
      diagnostics.warn(`Skipping '${section.title}' summary, missing fields: ${missing.join(", ")}`);
      continue;
    }

    const fields: Record<string, Field> = {};
    for (const [name, fieldId] of Object.entries(wanted)) {
      fields[name] = source.field(fieldId);
    }

    results[section.title] = section.summarise({
      indices,
      fields,
      options,
      meta: source.meta,
      stats: results,
    });
  }

  return { sections: results, stats: deriveStats(results) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bucketValue(section: SectionStats, bucket: string, key: string): number | undefined {
  const entry = section[bucket];
  if (!isRecord(entry)) {
    return undefined;
  }
  const value = entry[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Dataset-level fractions from the hits section. A literal "target" bucket
 * is consumed when it supplies the target span.
 */
export function deriveStats(sections: Record<string, SectionStats>): DerivedStats {
  const stats: DerivedStats = {};
  const hits = sections.hits;
  if (hits === undefined) {
    return stats;
  }

  const span = bucketValue(hits, "total", "span") ?? 0;
  const totalN50 = bucketValue(hits, "total", "n50") ?? 0;

  const nohitSpan = bucketValue(hits, "no-hit", "span");
  stats.noHit = nohitSpan !== undefined && span > 0 ? round(nohitSpan / span, 3) : 0;

  const hitSpan = span - (nohitSpan ?? 0);
  const fraction = (targetSpan: number): number => (hitSpan > 0 ? round(targetSpan / hitSpan, 3) : 0);

  const taxonomyTarget = sections.taxonomy?.target;
  const target = typeof taxonomyTarget === "string" ? taxonomyTarget : undefined;
  const targetSpan = target !== undefined ? bucketValue(hits, target, "span") : undefined;
  const literalSpan = bucketValue(hits, "target", "span");

  if (targetSpan !== undefined) {
    stats.target = fraction(targetSpan);
  } else if (literalSpan !== undefined) {
    stats.target = fraction(literalSpan);
    delete hits.target;
  } else if (target !== undefined) {
    stats.target = 0;
  }

  if (totalN50 > 0) {
    const ratio = roundSignificant(span / totalN50, 3);
    stats.spanOverN50 = ratio >= 100 ? Math.trunc(ratio) : ratio;
  }

  return stats;
}

/**
 * Write a summary as `{ summaryStats: { <section>: ..., stats } }`
 */
export function writeSummary(summary: SummaryResult, filePath: string): void {
  const document = { summaryStats: { ...summary.sections, stats: summary.stats } };
  fs.writeFileSync(filePath, JSON.stringify(document, null, 2));
}
