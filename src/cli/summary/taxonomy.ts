/**
 * Taxonomy section: the dataset's declared taxon and the target at the summary rank
 */

import type { SectionStats } from "../../types/index.js";
import type { SummarySection } from "./types.js";

export const taxonomySection: SummarySection = {
  title: "taxonomy",
  depends: [],
  summarise({ meta, options }): SectionStats {
    const summary: SectionStats = { ...meta.taxon };
    const target = meta.taxon[options.summaryRank];
    if (target !== undefined) {
      summary.target = String(target);
    }
    return summary;
  },
};
