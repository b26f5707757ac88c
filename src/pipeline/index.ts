// ============================================================================
// Query Pipeline
// ============================================================================
// Sanitize → normalize → execute → govern. Each stage hands the next one an
// Outcome; the first fault short-circuits straight to the governor.
// ============================================================================

import type { z } from 'zod';
import type { InsightsClient } from '../insights/client.js';
import type { CallDescriptor } from './contracts.js';
import { executeCall } from './executor.js';
import { GovernedResponse, errorResponse, governResult } from './governor.js';
import { ToolContract, allowListOf, normalizeParams } from './normalize.js';
import { parseQuery, sanitizeParams } from './sanitize.js';

export interface PipelineDeps {
  client: InsightsClient;
  /** Clock used for default time windows */
  now?: () => Date;
}

export interface PipelineRun {
  response: GovernedResponse;
  /** What the call was asked to do: the descriptor once built, the raw input before that */
  input: unknown;
}

export async function runQueryTool<S extends z.ZodRawShape, D extends CallDescriptor>(
  contract: ToolContract<S, D>,
  raw: unknown,
  deps: PipelineDeps
): Promise<PipelineRun> {
  let input: unknown = raw;
  try {
    const sanitized = sanitizeParams(raw, allowListOf(contract));
    if (!sanitized.ok) return { response: errorResponse(sanitized.fault), input };

    const now = deps.now ? deps.now() : new Date();
    const descriptor = normalizeParams(contract, sanitized.value, { now });
    if (!descriptor.ok) return { response: errorResponse(descriptor.fault), input };
    input = descriptor.value;

    const result = await executeCall(deps.client, descriptor.value);
    if (!result.ok) return { response: errorResponse(result.fault), input };

    return { response: governResult(result.value, sanitized.value.droppedKeys), input };
  } catch (err) {
    return { response: errorResponse(err), input };
  }
}

/**
 * Run a tool whose parameters arrive as a JSON-encoded object.
 */
export async function runJsonQueryTool<S extends z.ZodRawShape, D extends CallDescriptor>(
  contract: ToolContract<S, D>,
  query: unknown,
  deps: PipelineDeps
): Promise<PipelineRun> {
  const parsed = parseQuery(query);
  if (!parsed.ok) return { response: errorResponse(parsed.fault), input: query };
  return runQueryTool(contract, parsed.value, deps);
}
