// ============================================================================
// Tool Contracts
// ============================================================================
// Allow-list, field shapes and descriptor layout of each query tool.
// ============================================================================

import { z } from 'zod';
import {
  Aggregations,
  Fill,
  FilterTriple,
  Limit,
  Temporality,
  normalizeLimit,
  shapes,
  toList,
} from './fields.js';
import type { ToolContract } from './normalize.js';

/** Default look-back of get-data when no start time is given */
export const DEFAULT_WINDOW_MS = 15 * 60 * 1000;

export const META_KEYS = ['rc', 'dap', 'api', 'agg', 'assembly', 'schema'] as const;
export type MetaKey = (typeof META_KEYS)[number];

// ============================================================================
// Descriptors
// ============================================================================

export interface GetDataDescriptor {
  tool: 'insights_get_data';
  table: string;
  startTime: string;
  endTime: string;
  inputTimezone?: string;
  outputTimezone?: string;
  filter?: FilterTriple[];
  groupBy?: string[];
  aggregations?: Aggregations;
  fill?: Fill;
  temporality?: Temporality;
  slice?: string[];
  sortColumns?: string[];
  labels?: Record<string, string>;
  limit: Limit;
}

export interface CountByDescriptor {
  tool: 'insights_get_countby';
  table: string;
  byCols: string[];
  startTS: string;
  endTS: string;
  limit: Limit;
}

export interface GetMetaDescriptor {
  tool: 'insights_get_meta';
  key: MetaKey;
  /** Restrict the section to rows describing this table */
  table?: string;
}

export type CallDescriptor = GetDataDescriptor | CountByDescriptor | GetMetaDescriptor;

// ============================================================================
// insights_get_data
// ============================================================================

const getDataFields = {
  table: shapes.table,
  start_time: shapes.timestamp.optional(),
  end_time: shapes.timestamp.optional(),
  input_timezone: shapes.timezone.optional(),
  output_timezone: shapes.timezone.optional(),
  filter: shapes.filter.optional(),
  group_by: shapes.columns.optional(),
  aggregations: shapes.aggregations.optional(),
  fill: shapes.fill.optional(),
  temporality: shapes.temporality.optional(),
  slice: shapes.slice,
  sort_columns: shapes.columns.optional(),
  labels: shapes.labels.optional(),
  limit: shapes.limit.optional(),
};

export const getDataContract: ToolContract<typeof getDataFields, GetDataDescriptor> = {
  tool: 'insights_get_data',
  fields: getDataFields,
  conditions: [
    {
      field: 'slice',
      when: params => params.temporality === 'slice',
      message: "slice must be provided as a non-empty list of strings when temporality is 'slice'",
    },
  ],
  build: (params, { now }) => ({
    tool: 'insights_get_data',
    table: params.table,
    startTime: params.start_time ?? new Date(now.getTime() - DEFAULT_WINDOW_MS).toISOString(),
    endTime: params.end_time ?? now.toISOString(),
    inputTimezone: params.input_timezone,
    outputTimezone: params.output_timezone,
    filter: params.filter,
    groupBy: params.group_by && toList(params.group_by),
    aggregations: params.aggregations,
    fill: params.fill,
    temporality: params.temporality,
    slice: params.temporality === 'slice' ? params.slice : undefined,
    sortColumns: params.sort_columns && toList(params.sort_columns),
    labels: params.labels,
    limit: normalizeLimit(params.limit),
  }),
};

// ============================================================================
// insights_get_countby
// ============================================================================

const countByFields = {
  table: shapes.table,
  byCols: shapes.columns,
  startTS: shapes.timestamp,
  endTS: shapes.timestamp,
  limit: shapes.limit.optional(),
};

export const countByContract: ToolContract<typeof countByFields, CountByDescriptor> = {
  tool: 'insights_get_countby',
  fields: countByFields,
  conditions: [],
  build: params => ({
    tool: 'insights_get_countby',
    table: params.table,
    byCols: toList(params.byCols),
    startTS: params.startTS,
    endTS: params.endTS,
    limit: normalizeLimit(params.limit),
  }),
};

// ============================================================================
// insights_get_meta
// ============================================================================

const getMetaFields = {
  key: z
    .enum(META_KEYS)
    .describe(`one of ${META_KEYS.join(', ')}`)
    .optional(),
  tbl: shapes.table.optional(),
};

export const getMetaContract: ToolContract<typeof getMetaFields, GetMetaDescriptor> = {
  tool: 'insights_get_meta',
  fields: getMetaFields,
  conditions: [],
  build: params => ({
    tool: 'insights_get_meta',
    key: params.key ?? 'assembly',
    table: params.tbl,
  }),
};
