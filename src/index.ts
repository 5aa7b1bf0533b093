/**
 * blobdir-filter - filter and summarize BlobDir datasets
 *
 * This module exports the field model, filter engine, dataset writer and
 * summary aggregator used by the CLI.
 */

// Core types
export type {
  FieldType,
  FieldDescriptor,
  FieldNode,
  FieldDocument,
  DatasetMetaDocument,
  PlotAxes,
  PlotAxis,
  Tuple,
  ParamName,
  FieldFilters,
  FilterParams,
  IndexList,
  TableRow,
  SectionStats,
  SummaryOptions,
  SummaryResult,
  DerivedStats,
  FilterOptions,
  InspectOptions,
} from "./types/index.js";

export {
  BlobDirError,
  DataModelError,
  UnknownKeyError,
  InvalidParameterValue,
  DatasetError,
  CompanionFileError,
} from "./errors.js";

// Field model and registry
export {
  createField,
  valueAt,
  expand,
  expandValues,
  keyIndexOf,
  computeRange,
  fieldFromDisplayValues,
  type Field,
  type IdentifierField,
  type VariableField,
  type CategoryField,
  type MultiArrayField,
  type DisplayValue,
} from "./cli/utils/fields.js";
export { DatasetMeta } from "./cli/utils/metadata.js";
export { BlobDir, readMetaDocument } from "./cli/utils/blobdir.js";
export { Diagnostics } from "./cli/utils/diagnostics.js";

// Filtering
export { parseParams, splitQueryString, VALID_PARAMS } from "./cli/utils/params.js";
export {
  allIndices,
  invertIndices,
  applyFieldFilter,
  filterByParams,
  filterByIdentifiers,
  loadIdentifierList,
  loadIdentifierSelection,
  type FieldSource,
} from "./cli/utils/filter.js";

// Outputs
export { createFilteredDataset, type WriteOptions, type WriteResult } from "./cli/utils/writer.js";
export { buildTable, formatTable, parseTableFields } from "./cli/utils/table.js";
export {
  summarise,
  deriveStats,
  writeSummary,
  SUMMARY_SECTIONS,
  type SummarySection,
  type SectionContext,
} from "./cli/summary/index.js";
export { COMPANION_FILTERS, filteredPath, type CompanionFilter } from "./cli/companions/index.js";

// Commands
export { filter, DEFAULT_FILTER_OPTIONS, type FilterResult } from "./cli/commands/filter.js";
export { inspect, type InspectResult } from "./cli/commands/inspect.js";
