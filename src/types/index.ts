/**
 * Core type definitions for blobdir-filter
 */

// Field types
export type FieldType = "identifier" | "variable" | "category" | "multiarray";

export type Scale = "scaleLinear" | "scaleLog" | "scaleSqrt";

/**
 * Flattened descriptor for one entry of the field registry.
 * Entries with `children` set are metadata-only groups with no values file.
 */
export interface FieldDescriptor {
  id: string;
  type?: FieldType;
  name?: string;
  parent?: string;
  range?: [number, number];
  scale?: string;
  clamp?: number;
  preload?: boolean;
  active?: boolean;
  datatype?: string;
  category_slot?: number;
  headers?: string[];
  count?: number;
  children?: boolean;
}

/**
 * Field descriptor as nested in meta.json
 */
export interface FieldNode extends Omit<FieldDescriptor, "children"> {
  children?: FieldNode[];
  data?: FieldNode[];
}

export type PlotAxis = "x" | "y" | "z" | "cat";

export type PlotAxes = Partial<Record<PlotAxis, string>>;

export type MetaValue = string | number;

// Dataset metadata as persisted in meta.json
export interface DatasetMetaDocument {
  id: string;
  name?: string;
  records: number;
  record_type?: string;
  origin?: string;
  plot?: PlotAxes;
  assembly?: Record<string, MetaValue>;
  taxon?: Record<string, MetaValue>;
  fields: FieldNode[];
}

// Values document persisted as <fieldId>.json
export type Tuple = (string | number)[];

export interface FieldDocument {
  values: unknown[];
  keys?: string[];
  category_slot?: number;
  headers?: string[];
}

// Filter parameters
export type ParamName = "Min" | "Max" | "Inv" | "Keys" | "MinLength" | "MaxLength";

export type FieldFilters = Partial<Record<ParamName, string>>;

export type FilterParams = Record<string, FieldFilters>;

export type IndexList = readonly number[];

// Table rows
export type TableCell = string | number;

export type TableRow = TableCell[];

// Summary output
export type SectionStats = Record<string, unknown>;

export interface SummaryOptions {
  summaryRank: string;
  taxrule?: string;
}

export interface DerivedStats {
  noHit?: number;
  target?: number;
  spanOverN50?: number;
}

export interface SummaryResult {
  sections: Record<string, SectionStats>;
  stats: DerivedStats;
}

// CLI options
export interface FilterOptions {
  param?: string[];
  queryString?: string;
  json?: string;
  list?: string;
  invert?: boolean;
  output?: string;
  fasta?: string;
  fastq?: string[];
  cov?: string;
  text?: string;
  textDelimiter?: string;
  textHeader?: boolean;
  textIdColumn?: number;
  suffix?: string;
  summary?: string;
  summaryRank?: string;
  taxrule?: string;
  table?: string;
  tableFields?: string;
  showProgress?: boolean;
}

export interface InspectOptions {
  fields?: boolean;
}
