/**
 * Summary section strategy interface
 */

import type { IndexList, SectionStats, SummaryOptions } from "../../types/index.js";
import type { Diagnostics } from "../utils/diagnostics.js";
import type { Field } from "../utils/fields.js";
import type { DatasetMeta } from "../utils/metadata.js";

export interface SectionContext {
  indices: IndexList;
  fields: Record<string, Field>;
  options: SummaryOptions;
  meta: DatasetMeta;
  /** Sections already summarised in this run */
  stats: Readonly<Record<string, SectionStats>>;
}

export interface SummarySection {
  title: string;
  /** Field ids loaded under their own name */
  depends: readonly string[];
  /** Options that must be set for the section to run */
  requires?: readonly (keyof SummaryOptions)[];
  /**
   * Further fields discovered from the registry, keyed by the name the
   * section reads them under. Returning null skips the section.
   */
  resolve?(meta: DatasetMeta, options: SummaryOptions, diagnostics: Diagnostics): Record<string, string> | null;
  summarise(context: SectionContext): SectionStats;
}
