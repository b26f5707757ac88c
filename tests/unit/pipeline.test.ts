import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { countByContract, getDataContract, getMetaContract } from '../../src/pipeline/contracts.js';
import { runJsonQueryTool, runQueryTool } from '../../src/pipeline/index.js';
import { FakeInsightsClient, tradeRows } from '../fixtures/fake-insights-client.js';
import { FIXED_NOW, countByQueries, getDataQueries } from '../fixtures/payloads.js';

describe('query pipeline', () => {
  const now = () => FIXED_NOW;

  beforeAll(() => {
    process.env.INSIGHTS_ENV = 'test';
  });

  afterAll(() => {
    delete process.env.INSIGHTS_ENV;
  });

  it('runs a get_data query end to end', async () => {
    const client = new FakeInsightsClient({ rows: tradeRows(5) });
    const query = JSON.stringify({ ...getDataQueries.lastFive, foo: 1 });

    const run = await runJsonQueryTool(getDataContract, query, { client, now });

    expect(run.response).toEqual({ status: 'success', data: tradeRows(5), droppedParams: ['foo'] });
    expect(run.input).toEqual({
      tool: 'insights_get_data',
      table: 'trades',
      startTime: '2026.02.08',
      endTime: '2026.02.09',
      limit: -5,
    });
  });

  it('forwards the clamped limit and reports dropped keys', async () => {
    const client = new FakeInsightsClient({ rows: tradeRows(2) });

    const run = await runJsonQueryTool(getDataContract, JSON.stringify(getDataQueries.withExtras), { client, now });

    expect(run.response).toEqual({ status: 'success', data: tradeRows(2), droppedParams: ['foo', 'bar'] });
    expect(client.calls).toEqual([
      {
        method: 'getData',
        table: 'trades',
        options: {
          startTime: '2026-02-10T11:45:00.000Z',
          endTime: '2026-02-10T12:00:00.000Z',
          limit: 1000,
        },
      },
    ]);
  });

  it('runs a countBy query', async () => {
    const client = new FakeInsightsClient({ aggregationPayload: [{ sym: 'AAA', cnt: 3 }] });

    const run = await runJsonQueryTool(countByContract, JSON.stringify(countByQueries.single), { client, now });

    expect(run.response).toEqual({ status: 'success', data: [{ sym: 'AAA', cnt: 3 }], droppedParams: [] });
  });

  it('runs a get_meta call from structured arguments', async () => {
    const client = new FakeInsightsClient({ meta: { rc: [{ name: 'rc-1' }] } });

    const run = await runQueryTool(getMetaContract, { key: 'rc', verbose: true }, { client, now });

    expect(run.response).toEqual({ status: 'success', data: [{ name: 'rc-1' }], droppedParams: ['verbose'] });
  });

  it.each([
    [42, 'query must be a JSON string'],
    ['{"table":', expect.stringMatching(/^query must be valid JSON: /)],
    ['["table"]', 'query JSON must be an object (dictionary)'],
  ])('rejects query %j without calling the engine', async (query, message) => {
    const client = new FakeInsightsClient();

    const run = await runJsonQueryTool(getDataContract, query, { client, now });

    expect(run.response).toEqual({ status: 'error', message });
    expect(run.input).toBe(query);
    expect(client.calls).toEqual([]);
  });

  it('reports a validation error with the raw input', async () => {
    const client = new FakeInsightsClient();

    const run = await runJsonQueryTool(getDataContract, '{"limit":5}', { client, now });

    expect(run.response).toEqual({ status: 'error', message: 'Missing required param: table' });
    expect(run.input).toEqual({ limit: 5 });
    expect(client.calls).toEqual([]);
  });

  it('reports an upstream failure with the descriptor as input', async () => {
    const client = new FakeInsightsClient({ error: new Error('connection reset') });

    const run = await runJsonQueryTool(getDataContract, JSON.stringify(getDataQueries.lastFive), { client, now });

    expect(run.response).toEqual({ status: 'error', message: 'connection reset' });
    expect(run.input).toMatchObject({ tool: 'insights_get_data', table: 'trades' });
  });

  it('flags a result above the row cap', async () => {
    const client = new FakeInsightsClient({ rows: tradeRows(1500) });

    const run = await runJsonQueryTool(getDataContract, '{"table":"trades"}', { client, now });

    expect(run.response.status).toBe('success');
    expect(run.response.message).toBe('Showing first 1000 of 1500 rows');
  });

  it('reports an empty result', async () => {
    const run = await runJsonQueryTool(getDataContract, '{"table":"trades"}', { client: new FakeInsightsClient(), now });

    expect(run.response).toEqual({ status: 'success', data: [], message: 'No rows returned' });
  });
});
