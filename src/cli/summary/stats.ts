/**
 * Span, N50 and weighted-mean statistics shared by summary sections
 */

import { DataModelError } from "../../errors.js";
import type { CategoryField, Field, MultiArrayField, VariableField } from "../utils/fields.js";

export interface SpanStats {
  span: number;
  count: number;
  n50: number;
  gc?: number;
  cov?: number;
}

/**
 * Length at which the cumulative span of the longest records reaches half the total
 */
export function n50(lengths: readonly number[]): number {
  const sorted = [...lengths].sort((a, b) => b - a);
  const total = sorted.reduce((sum, length) => sum + length, 0);
  let cumulative = 0;
  for (const length of sorted) {
    cumulative += length;
    if (cumulative >= total / 2) {
      return length;
    }
  }
  return 0;
}

/**
 * Round to `places` decimals. Exact ties go to the even neighbour, so
 * 0.0625 rounds to 0.062 at three places.
 */
export function round(value: number, places: number): number {
  const rounded = Number(value.toFixed(places));
  const extended = value.toFixed(places + 1);
  // toFixed(100) spells out the exact binary value
  if (!extended.endsWith("5") || value.toFixed(100).replace(/0+$/, "") !== extended) {
    return rounded;
  }
  const truncated = extended.slice(0, -1);
  const lastDigit = Number(truncated.replace(/\.$/, "").slice(-1));
  // toFixed moved away from zero; keep the truncation when it is already even
  return lastDigit % 2 === 0 ? Number(truncated) : rounded;
}

export function roundSignificant(value: number, figures: number): number {
  return Number(value.toPrecision(figures));
}

/**
 * Collect span statistics for one bucket of records
 */
export class SpanStatsCollector {
  private lengths: number[] = [];
  private span = 0;
  private gcWeighted = 0;
  private gcSpan = 0;
  private covWeighted = 0;
  private covSpan = 0;

  add(length: number, gc?: number, cov?: number): void {
    this.lengths.push(length);
    this.span += length;

    if (gc !== undefined) {
      this.gcWeighted += gc * length;
      this.gcSpan += length;
    }
    if (cov !== undefined) {
      this.covWeighted += cov * length;
      this.covSpan += length;
    }
  }

  get totalSpan(): number {
    return this.span;
  }

  getStats(): SpanStats {
    const stats: SpanStats = {
      span: this.span,
      count: this.lengths.length,
      n50: n50(this.lengths),
    };
    if (this.gcSpan > 0) {
      stats.gc = round(this.gcWeighted / this.gcSpan, 4);
    }
    if (this.covSpan > 0) {
      stats.cov = round(this.covWeighted / this.covSpan, 4);
    }
    return stats;
  }
}

export function variableField(fields: Record<string, Field>, name: string): VariableField {
  const field = fields[name];
  if (field?.kind !== "variable") {
    throw new DataModelError(`Summary requires a variable field for '${name}'`, field?.fieldId);
  }
  return field;
}

export function categoryField(fields: Record<string, Field>, name: string): CategoryField {
  const field = fields[name];
  if (field?.kind !== "category") {
    throw new DataModelError(`Summary requires a category field for '${name}'`, field?.fieldId);
  }
  return field;
}

export function multiArrayField(fields: Record<string, Field>, name: string): MultiArrayField {
  const field = fields[name];
  if (field?.kind !== "multiarray") {
    throw new DataModelError(`Summary requires a multiarray field for '${name}'`, field?.fieldId);
  }
  return field;
}
