/**
 * Read coverage per sequencing library
 */

import type { SectionStats } from "../../types/index.js";
import { round, variableField } from "./stats.js";
import type { SummarySection } from "./types.js";

export const COV_SUFFIX = "_cov";
export const READ_COV_SUFFIX = "_read_cov";

export interface LibraryStats {
  meanCoverage: number;
  coveredSpan: number;
  mappedReads?: number;
}

export const readMappingSection: SummarySection = {
  title: "readMapping",
  depends: ["length"],

  resolve(meta) {
    const fields: Record<string, string> = {};
    for (const fieldId of meta.listFields()) {
      if (fieldId.endsWith(COV_SUFFIX) && !fieldId.endsWith(READ_COV_SUFFIX)) {
        fields[fieldId] = fieldId;
        const readCovId = fieldId.slice(0, -COV_SUFFIX.length) + READ_COV_SUFFIX;
        if (meta.hasField(readCovId)) {
          fields[readCovId] = readCovId;
        }
      }
    }
    return fields;
  },

  summarise({ indices, fields }): SectionStats {
    const length = variableField(fields, "length");
    const summary: SectionStats = {};

    const libraries = Object.keys(fields)
      .filter((name) => name.endsWith(COV_SUFFIX) && !name.endsWith(READ_COV_SUFFIX))
      .map((name) => name.slice(0, -COV_SUFFIX.length));

    for (const library of libraries) {
      const cov = variableField(fields, `${library}${COV_SUFFIX}`);
      const readCov =
        fields[`${library}${READ_COV_SUFFIX}`] !== undefined
          ? variableField(fields, `${library}${READ_COV_SUFFIX}`)
          : undefined;

      let span = 0;
      let weighted = 0;
      let coveredSpan = 0;
      let mappedReads = 0;
      for (const index of indices) {
        const recordLength = length.values[index];
        span += recordLength;
        weighted += cov.values[index] * recordLength;
        if (cov.values[index] > 0) {
          coveredSpan += recordLength;
        }
        if (readCov) {
          mappedReads += readCov.values[index];
        }
      }

      const stats: LibraryStats = {
        meanCoverage: span > 0 ? round(weighted / span, 4) : 0,
        coveredSpan,
      };
      if (readCov) {
        stats.mappedReads = mappedReads;
      }
      summary[library] = stats;
    }

    return summary;
  },
};
