// ============================================================================
// Tools Aggregator
// ============================================================================
// Central registry of all modular tools.
// ============================================================================

import { ToolSpec } from './types.js';
import { InsightsToolDeps, insightsTools } from './insights/index.js';

export interface ToolRegistry {
  tools: ToolSpec[];
  toolMap: Map<string, ToolSpec>;
}

// ============================================================================
// Aggregate All Tools
// ============================================================================

export function createToolRegistry(deps: InsightsToolDeps): ToolRegistry {
  const tools: ToolSpec[] = [
    ...insightsTools(deps),
  ];

  return {
    tools,
    toolMap: new Map(tools.map(t => [t.definition.name, t])),
  };
}
