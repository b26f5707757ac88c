// ============================================================================
// Allow-List Sanitizer
// ============================================================================

import { InvalidInputError, Outcome, errorMessage, fail, ok } from '../errors.js';

export interface SanitizedRequest {
  /** Input entries whose keys are on the allow-list, in input order */
  params: Record<string, unknown>;
  /** Keys removed from the input, in input order */
  droppedKeys: string[];
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the JSON text a query tool receives.
 */
export function parseQuery(query: unknown): Outcome<unknown> {
  if (typeof query !== 'string') {
    return fail(new InvalidInputError('query must be a JSON string'));
  }
  try {
    return ok(JSON.parse(query));
  } catch (err) {
    return fail(new InvalidInputError(`query must be valid JSON: ${errorMessage(err)}`, { cause: err }));
  }
}

/**
 * Drop every key that is not on the tool's allow-list.
 */
export function sanitizeParams(raw: unknown, allowList: readonly string[]): Outcome<SanitizedRequest> {
  if (!isPlainObject(raw)) {
    return fail(new InvalidInputError('query JSON must be an object (dictionary)'));
  }

  const allowed = new Set(allowList);
  const params: Record<string, unknown> = {};
  const droppedKeys: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (allowed.has(key)) {
      params[key] = value;
    } else {
      droppedKeys.push(key);
    }
  }

  return ok({ params, droppedKeys });
}
