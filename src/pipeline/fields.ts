// ============================================================================
// Field Shapes
// ============================================================================
// Reusable zod shapes for tool parameters. Each shape carries a description of
// what it accepts; the normalizer quotes it back in validation errors.
// ============================================================================

import { z } from 'zod';

/** Hard ceiling on rows surfaced to a caller, and the bound for `limit` */
export const MAX_ROWS_RETURNED = 1000;

// ============================================================================
// Scalar-or-List
// ============================================================================

export type OneOrMany<T> = { kind: 'one'; value: T } | { kind: 'many'; values: T[] };

/**
 * Accept either a single item or a list of items, tagging which one arrived.
 */
export function oneOrMany<T>(item: z.ZodType<T>) {
  return z.union([
    item.transform((value): OneOrMany<T> => ({ kind: 'one', value })),
    z.array(item).transform((values): OneOrMany<T> => ({ kind: 'many', values })),
  ]);
}

/** Collapse a scalar-or-list value into the canonical list form. */
export function toList<T>(input: OneOrMany<T>): T[] {
  return input.kind === 'one' ? [input.value] : [...input.values];
}

// ============================================================================
// Limit Clamping
// ============================================================================

export type Limit = number | number[];

export function clampLimit(n: number, max: number = MAX_ROWS_RETURNED): number {
  return Math.max(-max, Math.min(n, max));
}

/**
 * Clamp every requested limit into [-max, max]. An absent limit becomes max.
 */
export function normalizeLimit(limit: OneOrMany<number> | undefined, max: number = MAX_ROWS_RETURNED): Limit {
  if (limit === undefined) return max;
  return limit.kind === 'one' ? clampLimit(limit.value, max) : limit.values.map(n => clampLimit(n, max));
}

// ============================================================================
// Aggregations
// ============================================================================

export type AggregationTriplet = [assignName: string, aggFn: string, column: string];

export type Aggregations =
  | { kind: 'columns'; columns: string[] }
  | { kind: 'triplets'; triplets: AggregationTriplet[] };

const aggregationTriplet = z.tuple([z.string(), z.string(), z.string()]);

// ============================================================================
// Shapes
// ============================================================================

export const FILL_MODES = ['forward', 'zero'] as const;
export const TEMPORALITIES = ['slice', 'snapshot'] as const;

export type Fill = (typeof FILL_MODES)[number];
export type Temporality = (typeof TEMPORALITIES)[number];

export type FilterTriple = [fn: string, column: string, parameter: unknown];

export const shapes = {
  table: z.string().min(1).describe('a non-empty string'),

  timestamp: z.string().min(1).describe('a non-empty timestamp string'),

  timezone: z.string().min(1).describe('a non-empty timezone name'),

  columns: oneOrMany(z.string()).describe('a string or a list of strings'),

  filter: z
    .array(z.tuple([z.string(), z.string(), z.unknown()]))
    .describe('a list of 3-item conditions: [function, column, parameter]'),

  aggregations: z
    .union([
      z.string().transform((column): Aggregations => ({ kind: 'columns', columns: [column] })),
      z.array(z.string()).transform((columns): Aggregations => ({ kind: 'columns', columns })),
      z.array(aggregationTriplet).transform((triplets): Aggregations => ({ kind: 'triplets', triplets })),
    ])
    .describe('a string, a list of strings, or a list of [assignName, aggFn, column] string triplets'),

  fill: z.enum(FILL_MODES).describe("'forward' or 'zero'"),

  temporality: z.enum(TEMPORALITIES).describe("'slice' or 'snapshot'"),

  // Only meaningful when temporality is 'slice'; that requirement is checked
  // after all fields are known, so a bad slice here just reads as absent.
  slice: z.array(z.string()).min(1).optional().catch(undefined),

  labels: z.record(z.string(), z.string()).describe('a mapping of string to string'),

  limit: oneOrMany(z.number().int()).describe('an integer or a list of integers'),
};
