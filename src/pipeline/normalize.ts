// ============================================================================
// Typed Normalizer
// ============================================================================
// One generic normalizer driven by declarative per-tool contracts. A contract
// lists each allowed field with the zod shape it accepts, the cross-field
// requirements checked once every field is known, and how the validated
// fields become the tool's call descriptor.
// ============================================================================

import { z } from 'zod';
import { Outcome, ValidationError, fail, ok } from '../errors.js';
import type { SanitizedRequest } from './sanitize.js';

export type ToolName = 'insights_get_data' | 'insights_get_countby' | 'insights_get_meta';

/** Validated field values of a contract, as `z.object(fields)` outputs them */
export type FieldsOf<S extends z.ZodRawShape> = z.output<ReturnType<typeof z.object<S>>>;

export interface NormalizeContext {
  /** Call time; anchors default time windows */
  now: Date;
}

/**
 * A field that becomes mandatory once another field takes a given value.
 */
export interface ConditionalRequirement<F> {
  field: Extract<keyof F, string>;
  when: (params: F) => boolean;
  message: string;
}

export interface ToolContract<S extends z.ZodRawShape, D> {
  tool: ToolName;
  fields: S;
  conditions: ReadonlyArray<ConditionalRequirement<FieldsOf<S>>>;
  build: (params: FieldsOf<S>, ctx: NormalizeContext) => D;
}

/** The allow-list of a contract is exactly the fields it declares. */
export function allowListOf<S extends z.ZodRawShape, D>(contract: ToolContract<S, D>): string[] {
  return Object.keys(contract.fields);
}

/**
 * Validate a sanitized request against a contract and build its descriptor.
 * JSON nulls count as absent.
 */
export function normalizeParams<S extends z.ZodRawShape, D>(
  contract: ToolContract<S, D>,
  request: SanitizedRequest,
  ctx: NormalizeContext
): Outcome<D> {
  const present: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(request.params)) {
    if (value !== null && value !== undefined) present[key] = value;
  }

  const parsed = z.object(contract.fields).safeParse(present);
  if (!parsed.success) {
    return fail(toValidationError(contract.fields, parsed.error, present));
  }

  for (const rule of contract.conditions) {
    if (rule.when(parsed.data) && parsed.data[rule.field] === undefined) {
      return fail(new ValidationError(rule.field, rule.message));
    }
  }

  return ok(contract.build(parsed.data, ctx));
}

// ============================================================================
// Error Reporting
// ============================================================================

function toValidationError(
  fields: z.ZodRawShape,
  error: z.ZodError,
  present: Record<string, unknown>
): ValidationError {
  const [issue] = error.issues;
  const field = String(issue.path[0] ?? '');

  if (present[field] === undefined) {
    return new ValidationError(field, `Missing required param: ${field}`);
  }

  const schema = fields[field];
  const expected = schema ? expectedShape(schema) : undefined;
  return new ValidationError(field, expected ? `${field} must be ${expected}` : `${field}: ${issue.message}`);
}

function expectedShape(schema: z.ZodTypeAny): string | undefined {
  if (schema.description) return schema.description;
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return expectedShape(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return expectedShape(schema.removeDefault());
  }
  return undefined;
}
