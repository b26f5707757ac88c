// ============================================================================
// Response Governor
// ============================================================================
// Caps what a caller sees and turns every fault into the uniform error shape.
// ============================================================================

import { log } from '../config.js';
import { errorMessage } from '../errors.js';
import type { Row } from '../insights/client.js';
import type { QueryResult } from './executor.js';
import { MAX_ROWS_RETURNED } from './fields.js';

export type GovernedResponse =
  | {
      status: 'success';
      data: Row[];
      message?: string;
      droppedParams?: string[];
    }
  | {
      status: 'error';
      message: string;
    };

/**
 * Report the shape of a result against the row cap.
 *
 * An oversized result is reported as truncated but passed through as-is: the
 * forwarded `limit` is what bounds the upstream payload.
 */
export function governResult(
  result: QueryResult,
  droppedKeys: string[],
  maxRows: number = MAX_ROWS_RETURNED
): GovernedResponse {
  const total = result.rowCount;

  if (total === 0) {
    return { status: 'success', data: [], message: 'No rows returned' };
  }

  if (total > maxRows) {
    log(`Table has ${total} rows. Query returned truncated data to ${maxRows} rows.`);
    return {
      status: 'success',
      data: result.rows,
      message: `Showing first ${maxRows} of ${total} rows`,
    };
  }

  log(`Query returned ${total} rows.`);
  return { status: 'success', data: result.rows, droppedParams: droppedKeys };
}

export function errorResponse(err: unknown): GovernedResponse {
  const message = errorMessage(err);
  log(`Query failed: ${message}`);
  return { status: 'error', message };
}
