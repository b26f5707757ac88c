// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers.
// ============================================================================

import type { GovernedResponse } from '../../pipeline/governor.js';
import { ToolResult } from '../types.js';

/**
 * Wrap a governed response as MCP text content; error responses set isError.
 */
export function toolResponse(response: GovernedResponse): ToolResult {
  const result: ToolResult = {
    content: [{
      type: 'text',
      text: JSON.stringify(response, null, 2),
    }],
  };
  if (response.status === 'error') {
    result.isError = true;
  }
  return result;
}

/**
 * Create an error tool response
 */
export function toolError(error: string): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ error }),
    }],
    isError: true,
  };
}
