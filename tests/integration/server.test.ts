import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import {
  createTestContext,
  cleanupTestContext,
  TestContext,
} from '../utils/test-context.js';
import { createTestMcpClient, parseToolText, TestMcpClient } from '../utils/mcp-test-client.js';
import { FakeInsightsClient, tradeRows } from '../fixtures/fake-insights-client.js';
import { FIXED_NOW, countByQueries, getDataQueries } from '../fixtures/payloads.js';
import '../utils/matchers.js';

describe('MCP Server Integration', () => {
  let ctx: TestContext;
  let insights: FakeInsightsClient;
  let client: TestMcpClient;

  beforeEach(async () => {
    ctx = await createTestContext();
    insights = new FakeInsightsClient({
      rows: tradeRows(3),
      aggregationPayload: [{ sym: 'AAA', cnt: 2 }],
      meta: {
        schema: [
          {
            table: 'trades',
            columns: [
              { column: 'price', typ: 'float' },
              { column: 'sym', typ: 'symbol' },
            ],
          },
          { table: 'quotes', columns: [{ column: 'bid', typ: 'float' }] },
          { table: 'newsdocument', columns: [] },
        ],
      },
    });
    client = await createTestMcpClient({ client: insights, logFile: ctx.logFile, now: () => FIXED_NOW });
  });

  afterEach(async () => {
    await client.close();
    await cleanupTestContext(ctx);
  });

  describe('ListTools', () => {
    it('should list the three query tools', async () => {
      const tools = await client.listTools();

      expect(tools.map((t) => t.name)).toEqual(['insights_get_data', 'insights_get_countby', 'insights_get_meta']);
    });

    it('should include descriptions for all tools', async () => {
      const tools = await client.listTools();

      for (const tool of tools) {
        expect(tool.description).toBeTruthy();
      }
    });
  });

  describe('insights_get_data', () => {
    it('should return governed rows as JSON text', async () => {
      const result = await client.callTool('insights_get_data', {
        query: JSON.stringify({ ...getDataQueries.lastFive, foo: 1 }),
      });

      expect(result.isError).toBeFalsy();
      expect(result.content).toHaveLength(1);
      expect(result.content[0].type).toBe('text');
      expect(parseToolText(result)).toEqual({ status: 'success', data: tradeRows(3), droppedParams: ['foo'] });
    });

    it('should flag validation failures as errors', async () => {
      const result = await client.callTool('insights_get_data', {
        query: JSON.stringify({ table: 'trades', temporality: 'slice' }),
      });

      expect(result.isError).toBe(true);
      expect(parseToolText(result)).toEqual({
        status: 'error',
        message: "slice must be provided as a non-empty list of strings when temporality is 'slice'",
      });
      expect(insights.calls).toEqual([]);
    });

    it('should log the call size', async () => {
      await client.callTool('insights_get_data', { query: JSON.stringify(getDataQueries.lastFive) });

      await expect(ctx.logFile).toBeJsonLogWithEntries(1);
      const [entry] = JSON.parse(await fs.readFile(ctx.logFile, 'utf-8'));
      expect(entry.tool).toBe('insights_get_data');
      expect(entry.timestamp).toBeValidTimestamp();
      expect(entry.querySummary).toEqual({
        tool: 'insights_get_data',
        table: 'trades',
        startTime: '2026.02.08',
        endTime: '2026.02.09',
        limit: -5,
      });
    });

    it('should log failed calls too', async () => {
      await client.callTool('insights_get_data', { query: 'not json' });

      const [entry] = JSON.parse(await fs.readFile(ctx.logFile, 'utf-8'));
      expect(entry.querySummary).toBe('not json');
    });
  });

  describe('insights_get_countby', () => {
    it('should return counts', async () => {
      const result = await client.callTool('insights_get_countby', { query: JSON.stringify(countByQueries.single) });

      expect(parseToolText(result)).toEqual({ status: 'success', data: [{ sym: 'AAA', cnt: 2 }], droppedParams: [] });
    });
  });

  describe('insights_get_meta', () => {
    it('should return a filtered metadata section', async () => {
      const result = await client.callTool('insights_get_meta', { key: 'schema', tbl: 'quotes' });

      expect(parseToolText(result)).toEqual({
        status: 'success',
        data: [{ table: 'quotes', columns: [{ column: 'bid', typ: 'float' }] }],
        droppedParams: [],
      });
    });
  });

  describe('Error Handling', () => {
    it('should report an unknown tool', async () => {
      const result = await client.callTool('insights_drop_table', {});

      expect(result.isError).toBe(true);
      expect(parseToolText(result)).toEqual({ error: 'Unknown tool: insights_drop_table' });
    });
  });

  describe('Resources', () => {
    it('should list the guidance documents', async () => {
      const resources = await client.listResources();

      expect(resources).toEqual([
        { uri: 'file://guidance/insights-get-data', name: 'insights-get-data', mimeType: 'text/markdown' },
        { uri: 'file://guidance/insights-get-countby', name: 'insights-get-countby', mimeType: 'text/markdown' },
        { uri: 'insights://tables', name: 'insights-tables', mimeType: 'text/plain' },
      ]);
    });

    it('should read a guidance document', async () => {
      const result = await client.readResource('file://guidance/insights-get-countby');

      expect(result.contents).toHaveLength(1);
      expect(result.contents[0].uri).toBe('file://guidance/insights-get-countby');
      expect(result.contents[0].mimeType).toBe('text/markdown');
      expect(result.contents[0].text).toContain('byCols');
    });

    it('should describe the tables from engine metadata', async () => {
      const result = await client.readResource('insights://tables');

      expect(result.contents[0].mimeType).toBe('text/plain');
      expect(result.contents[0].text.split('\n')).toEqual([
        'DATABASE SCHEMA OVERVIEW',
        '═'.repeat(60),
        'Found 2 table(s)',
        '',
        'TABLE: trades',
        '='.repeat(60),
        '  column  type',
        '  price   float',
        '  sym     symbol',
        '',
        'TABLE: quotes',
        '='.repeat(60),
        '  column  type',
        '  bid     float',
      ]);
      expect(insights.calls).toEqual([{ method: 'getMeta' }]);
    });

    it('should reject an unknown resource', async () => {
      await expect(client.readResource('file://guidance/missing')).rejects.toThrow('Unknown resource: file://guidance/missing');
    });
  });
});
