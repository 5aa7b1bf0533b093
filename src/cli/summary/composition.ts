/**
 * Base composition across retained records
 */

import type { SectionStats } from "../../types/index.js";
import { round, variableField } from "./stats.js";
import type { SummarySection } from "./types.js";

export const baseCompositionSection: SummarySection = {
  title: "baseComposition",
  depends: ["gc", "ncount", "length"],
  summarise({ indices, fields }): SectionStats {
    const gc = variableField(fields, "gc");
    const ncount = variableField(fields, "ncount");
    const length = variableField(fields, "length");

    let span = 0;
    let nTotal = 0;
    let acgt = 0;
    let gcCount = 0;

    for (const index of indices) {
      const bases = length.values[index] - ncount.values[index];
      span += length.values[index];
      nTotal += ncount.values[index];
      acgt += bases;
      gcCount += gc.values[index] * bases;
    }

    // gc is a proportion of called (non-N) bases
    const gcFraction = acgt > 0 ? gcCount / acgt : 0;
    return {
      gc: round(gcFraction, 4),
      at: acgt > 0 ? round(1 - gcFraction, 4) : 0,
      n: span > 0 ? round(nTotal / span, 4) : 0,
    };
  },
};
