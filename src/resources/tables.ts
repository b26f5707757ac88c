// ============================================================================
// Table Schema Resource
// ============================================================================
// insights://tables: a text overview of every user table the data engine
// describes in its metadata, with column names and types.
// ============================================================================

import { z } from 'zod';
import { log } from '../config.js';
import { errorMessage } from '../errors.js';
import type { InsightsClient, Row } from '../insights/client.js';
import type { ResourceSpec } from './index.js';

export const TABLES_URI = 'insights://tables';

// Index tables kept by the engine's AI libraries
const INTERNAL_TABLE_SUFFIXES = ['document', 'stats', 'token'];

const RULE_WIDTH = 60;

const schemaRowSchema = z.object({
  table: z.string().min(1),
  columns: z
    .array(
      z.object({
        column: z.string(),
        typ: z.union([z.string(), z.number()]).optional(),
      })
    )
    .default([]),
});

export interface TableSchema {
  table: string;
  columns: Array<{ name: string; type: string }>;
}

/**
 * User tables from the schema section of getMeta, in engine order.
 * Rows that do not describe a table are skipped.
 */
export function describeTables(schemaRows: Row[]): TableSchema[] {
  const tables: TableSchema[] = [];
  for (const row of schemaRows) {
    const parsed = schemaRowSchema.safeParse(row);
    if (!parsed.success) continue;

    const { table, columns } = parsed.data;
    if (INTERNAL_TABLE_SUFFIXES.some(suffix => table.endsWith(suffix))) continue;

    tables.push({
      table,
      columns: columns.map(c => ({ name: c.column, type: c.typ === undefined ? '' : String(c.typ) })),
    });
  }
  return tables;
}

export function renderTablesOverview(tables: TableSchema[]): string {
  if (tables.length === 0) {
    return 'Database is empty - no tables found';
  }

  const lines = ['DATABASE SCHEMA OVERVIEW', '═'.repeat(RULE_WIDTH), `Found ${tables.length} table(s)`];

  for (const { table, columns } of tables) {
    lines.push('', `TABLE: ${table}`, '='.repeat(RULE_WIDTH));
    if (columns.length === 0) {
      lines.push('  (no columns)');
      continue;
    }
    const width = Math.max('column'.length, ...columns.map(c => c.name.length)) + 2;
    lines.push(`  ${'column'.padEnd(width)}type`);
    for (const column of columns) {
      lines.push(`  ${column.name.padEnd(width)}${column.type}`);
    }
  }

  return lines.join('\n');
}

export function tablesResource(client: InsightsClient): ResourceSpec {
  return {
    uri: TABLES_URI,
    name: 'insights-tables',
    description: 'Tables of the analytical data service with their columns and types',
    mimeType: 'text/plain',
    read: async () => {
      try {
        const meta = await client.getMeta();
        return renderTablesOverview(describeTables(meta.schema));
      } catch (err) {
        const message = errorMessage(err);
        log(`Database schema analysis failed: ${message}`);
        return `DATABASE ANALYSIS ERROR\n${'═'.repeat(RULE_WIDTH)}\nFailed to analyze database schema: ${message}`;
      }
    },
  };
}
