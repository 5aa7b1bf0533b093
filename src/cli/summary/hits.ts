/**
 * Span statistics per taxon of the summary rank
 */

import type { SectionStats } from "../../types/index.js";
import { categoryField, SpanStatsCollector, variableField } from "./stats.js";
import type { SummarySection } from "./types.js";

export const hitsSection: SummarySection = {
  title: "hits",
  depends: ["length", "gc"],

  resolve(meta, options, diagnostics) {
    let taxrule = options.taxrule;
    if (taxrule === undefined) {
      const catAxis = meta.plot.cat;
      if (catAxis === undefined) {
        diagnostics.warn("No taxrule set and no category plot axis, skipping 'hits' summary");
        return null;
      }
      // bestsumorder_phylum -> bestsumorder
      taxrule = catAxis.replace(/_[^_]+$/, "");
    }

    const fields: Record<string, string> = { hits: `${taxrule}_${options.summaryRank}` };
    if (meta.plot.y !== undefined) {
      fields.cov = meta.plot.y;
    }
    return fields;
  },

  summarise({ indices, fields }): SectionStats {
    const length = variableField(fields, "length");
    const gc = variableField(fields, "gc");
    const hits = categoryField(fields, "hits");
    const cov = fields.cov !== undefined ? variableField(fields, "cov") : undefined;

    const buckets = new Map<string, SpanStatsCollector>();
    const total = new SpanStatsCollector();

    for (const index of indices) {
      const taxon = hits.keys[hits.values[index]];
      let bucket = buckets.get(taxon);
      if (!bucket) {
        bucket = new SpanStatsCollector();
        buckets.set(taxon, bucket);
      }
      const covValue = cov?.values[index];
      bucket.add(length.values[index], gc.values[index], covValue);
      total.add(length.values[index], gc.values[index], covValue);
    }

    const summary: SectionStats = {};
    const ordered = [...buckets.entries()].sort((a, b) => b[1].totalSpan - a[1].totalSpan);
    for (const [taxon, bucket] of ordered) {
      summary[taxon] = bucket.getStats();
    }
    summary.total = total.getStats();
    return summary;
  },
};
