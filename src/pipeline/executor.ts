// ============================================================================
// Call Executor
// ============================================================================
// The only stage that crosses into the data engine. No retries, no timeout:
// reconnection policy belongs to whoever owns the connection.
// ============================================================================

import { Outcome, ToolFault, UpstreamError, errorMessage, fail, ok } from '../errors.js';
import { InsightsClient, Row, parseRows } from '../insights/client.js';
import type { CallDescriptor, CountByDescriptor, GetMetaDescriptor } from './contracts.js';

export const COUNT_BY_AGGREGATION = '.example.countBy';

export interface QueryResult {
  rowCount: number;
  rows: Row[];
}

export async function executeCall(client: InsightsClient, descriptor: CallDescriptor): Promise<Outcome<QueryResult>> {
  try {
    const rows = await fetchRows(client, descriptor);
    return ok({ rowCount: rows.length, rows });
  } catch (err) {
    if (err instanceof ToolFault) return fail(err);
    return fail(new UpstreamError(errorMessage(err), { cause: err }));
  }
}

async function fetchRows(client: InsightsClient, descriptor: CallDescriptor): Promise<Row[]> {
  switch (descriptor.tool) {
    case 'insights_get_data': {
      const { tool: _tool, table, ...options } = descriptor;
      return client.getData(table, options);
    }
    case 'insights_get_countby':
      return countBy(client, descriptor);
    case 'insights_get_meta':
      return metaSection(client, descriptor);
  }
}

async function countBy(client: InsightsClient, descriptor: CountByDescriptor): Promise<Row[]> {
  const { payload } = await client.invokeCustomAggregation(COUNT_BY_AGGREGATION, {
    table: descriptor.table,
    byCols: descriptor.byCols,
    startTS: descriptor.startTS,
    endTS: descriptor.endTS,
    limit: descriptor.limit,
  });
  return parseRows(payload, 'countBy');
}

async function metaSection(client: InsightsClient, descriptor: GetMetaDescriptor): Promise<Row[]> {
  const meta = await client.getMeta();
  const section = meta[descriptor.key];
  const { table } = descriptor;
  if (table === undefined) return section;
  return section.filter(row => describesTable(row, table));
}

function describesTable(row: Row, table: string): boolean {
  if (row.table === table) return true;
  return Array.isArray(row.tbls) && row.tbls.includes(table);
}
