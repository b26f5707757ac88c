// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the modular tool architecture.
// ============================================================================

/**
 * Standard MCP tool result format
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * Tool specification combining definition and handler.
 * Each domain exports an array of these.
 */
export interface ToolSpec {
  definition: {
    name: string;
    description: string;
    annotations?: {
      title?: string;
      readOnlyHint?: boolean;
      destructiveHint?: boolean;
      idempotentHint?: boolean;
      openWorldHint?: boolean;
    };
    inputSchema: {
      type: 'object';
      properties: Record<string, unknown>;
      required?: string[];
    };
  };
  handler: (args: Record<string, unknown>) => Promise<ToolResult>;
}
