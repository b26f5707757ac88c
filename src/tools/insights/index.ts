// ============================================================================
// Insights Query Tools
// ============================================================================
// get-data, get-countby and get-meta. Each handler runs the query pipeline
// inside the size tracker and returns the governed response as JSON text.
// ============================================================================

import type { ToolSpec } from '../types.js';
import { toolResponse } from '../shared/index.js';
import { PipelineDeps, runJsonQueryTool, runQueryTool } from '../../pipeline/index.js';
import { countByContract, getDataContract, getMetaContract, META_KEYS } from '../../pipeline/contracts.js';
import { MAX_ROWS_RETURNED } from '../../pipeline/fields.js';
import { SizeTracker, withSizeTracking } from '../../telemetry/sizeTracker.js';

export interface InsightsToolDeps extends PipelineDeps {
  tracker: SizeTracker;
}

// ============================================================================
// insights_get_data
// ============================================================================

const GET_DATA_DESCRIPTION = `Run a get_data query against the analytical data service and return structured rows.

Managing result size:
  Always give start_time/end_time, and a limit (e.g. -10 for the last 10 records). Use filter,
  group_by and aggregations to reduce what comes back. Results are capped at ${MAX_ROWS_RETURNED} rows.

Input:
  query (str): JSON object of get_data parameters. Unknown keys are dropped and reported.
    - table (str) [required]
    - start_time (str) [optional; defaults to 15 minutes before the call]
    - end_time (str) [optional; defaults to the call time]
    - input_timezone / output_timezone (str) [optional]
    - filter (list) e.g. [["within","qual",[0,2]]]
    - group_by (str | list[str])
    - aggregations (str | list[str] | list of ["assignName","aggFn","column"])
    - fill ('forward' | 'zero')
    - temporality ('slice' | 'snapshot')
    - slice (list[str]) [required when temporality is 'slice']
    - sort_columns (str | list[str])
    - labels (dict[str, str])
    - limit (int | list[int]) [clamped to ±${MAX_ROWS_RETURNED}; default ${MAX_ROWS_RETURNED}]

Examples:
  {"table":"trades","start_time":"2026.02.08","end_time":"2026.02.09","limit":-5}
  {"table":"trades","start_time":"2026.02.08","end_time":"2026.02.09","aggregations":[["cnt","count","time"]]}

See file://guidance/insights-get-data for syntax details.`;

function getDataTool(deps: InsightsToolDeps): ToolSpec {
  const run = withSizeTracking(deps.tracker, 'insights_get_data', (query: unknown) =>
    runJsonQueryTool(getDataContract, query, deps)
  );

  return {
    definition: {
      name: 'insights_get_data',
      description: GET_DATA_DESCRIPTION,
      annotations: {
        title: 'Get Data',
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'JSON object of get_data parameters',
          },
        },
        required: ['query'],
      },
    },
    handler: async (args) => toolResponse(await run(args.query)),
  };
}

// ============================================================================
// insights_get_countby
// ============================================================================

function countByTool(deps: InsightsToolDeps): ToolSpec {
  const run = withSizeTracking(deps.tracker, 'insights_get_countby', (query: unknown) =>
    runJsonQueryTool(countByContract, query, deps)
  );

  return {
    definition: {
      name: 'insights_get_countby',
      description: `Count rows of a table grouped by one or more columns over a time range.

Input:
  query (str): JSON object with
    - table (str) [required]
    - byCols (str | list[str]) [required]
    - startTS / endTS (str) [required]
    - limit (int | list[int]) [clamped to ±${MAX_ROWS_RETURNED}]

Example:
  {"table":"orders","byCols":"sym","startTS":"2026-02-11T00:00:00","endTS":"2026-02-11T23:00:00"}`,
      annotations: {
        title: 'Count By',
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'JSON object of countBy parameters',
          },
        },
        required: ['query'],
      },
    },
    handler: async (args) => toolResponse(await run(args.query)),
  };
}

// ============================================================================
// insights_get_meta
// ============================================================================

function getMetaTool(deps: InsightsToolDeps): ToolSpec {
  const run = withSizeTracking(deps.tracker, 'insights_get_meta', (args: Record<string, unknown>) =>
    runQueryTool(getMetaContract, args, deps)
  );

  return {
    definition: {
      name: 'insights_get_meta',
      description: 'Return one section of the data service metadata, optionally narrowed to a single table.',
      annotations: {
        title: 'Get Meta',
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
      inputSchema: {
        type: 'object',
        properties: {
          key: {
            type: 'string',
            enum: [...META_KEYS],
            description: 'Metadata section (default: assembly)',
          },
          tbl: {
            type: 'string',
            description: 'Only return rows describing this table',
          },
        },
      },
    },
    handler: async (args) => toolResponse(await run(args)),
  };
}

export function insightsTools(deps: InsightsToolDeps): ToolSpec[] {
  return [getDataTool(deps), countByTool(deps), getMetaTool(deps)];
}
