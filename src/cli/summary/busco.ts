/**
 * Assembly completeness per BUSCO lineage field
 */

import type { SectionStats } from "../../types/index.js";
import { multiArrayField, round } from "./stats.js";
import type { SummarySection } from "./types.js";

export const BUSCO_SUFFIX = "_busco";

export interface BuscoStats {
  total: number;
  complete: number;
  single: number;
  duplicated: number;
  fragmented: number;
  missing: number;
  string: string;
}

const COMPLETE_STATUSES = new Set(["Complete", "Duplicated"]);

function percent(count: number, total: number): string {
  return total > 0 ? round((count / total) * 100, 1).toFixed(1) : "0.0";
}

export const buscoSection: SummarySection = {
  title: "busco",
  depends: [],

  resolve(meta) {
    const fields: Record<string, string> = {};
    for (const fieldId of meta.listFields()) {
      if (fieldId.endsWith(BUSCO_SUFFIX)) {
        fields[fieldId] = fieldId;
      }
    }
    return fields;
  },

  summarise({ indices, fields }): SectionStats {
    const summary: SectionStats = {};

    for (const lineage of Object.keys(fields).filter((name) => name.endsWith(BUSCO_SUFFIX))) {
      const field = multiArrayField(fields, lineage);
      const statusSlot = field.categorySlot;
      const idSlot = statusSlot === 0 ? 1 : 0;

      const completeCopies = new Map<string, number>();
      const fragmented = new Set<string>();
      const seen = new Set<string>();

      for (const index of indices) {
        for (const tuple of field.values[index]) {
          const buscoId = String(tuple[idSlot]);
          const status = field.keys[Number(tuple[statusSlot])];
          seen.add(buscoId);
          if (COMPLETE_STATUSES.has(status)) {
            completeCopies.set(buscoId, (completeCopies.get(buscoId) ?? 0) + 1);
          } else if (status === "Fragmented") {
            fragmented.add(buscoId);
          }
        }
      }

      let single = 0;
      let duplicated = 0;
      for (const copies of completeCopies.values()) {
        if (copies > 1) duplicated++;
        else single++;
      }
      const fragmentedOnly = [...fragmented].filter((id) => !completeCopies.has(id)).length;
      const total = field.meta.count ?? seen.size;
      const complete = single + duplicated;
      const missing = Math.max(0, total - complete - fragmentedOnly);

      const stats: BuscoStats = {
        total,
        complete,
        single,
        duplicated,
        fragmented: fragmentedOnly,
        missing,
        string:
          `C:${percent(complete, total)}%[S:${percent(single, total)}%,D:${percent(duplicated, total)}%],` +
          `F:${percent(fragmentedOnly, total)}%,M:${percent(missing, total)}%,n:${total}`,
      };
      summary[lineage.slice(0, -BUSCO_SUFFIX.length)] = stats;
    }

    return summary;
  },
};
