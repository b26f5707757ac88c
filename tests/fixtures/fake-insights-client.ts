/**
 * In-process stand-in for the data engine.
 * Records every call and answers from canned rows.
 */

import type {
  AggregationResponse,
  GetDataOptions,
  InsightsClient,
  InsightsMeta,
  Row,
} from '../../src/insights/client.js';

export type FakeCall =
  | { method: 'getData'; table: string; options: GetDataOptions }
  | { method: 'getMeta' }
  | { method: 'invokeCustomAggregation'; name: string; params: Record<string, unknown> };

export interface FakeInsightsClientOptions {
  rows?: Row[];
  meta?: Partial<InsightsMeta>;
  aggregationPayload?: unknown;
  /** Thrown from every method when set */
  error?: unknown;
}

export class FakeInsightsClient implements InsightsClient {
  readonly calls: FakeCall[] = [];

  constructor(private readonly options: FakeInsightsClientOptions = {}) {}

  async getData(table: string, options: GetDataOptions): Promise<Row[]> {
    this.calls.push({ method: 'getData', table, options });
    this.maybeThrow();
    return this.options.rows ?? [];
  }

  async getMeta(): Promise<InsightsMeta> {
    this.calls.push({ method: 'getMeta' });
    this.maybeThrow();
    return {
      rc: [],
      dap: [],
      api: [],
      agg: [],
      assembly: [],
      schema: [],
      ...this.options.meta,
    };
  }

  async invokeCustomAggregation(name: string, params: Record<string, unknown>): Promise<AggregationResponse> {
    this.calls.push({ method: 'invokeCustomAggregation', name, params });
    this.maybeThrow();
    return { header: { rc: 0 }, payload: this.options.aggregationPayload ?? [] };
  }

  private maybeThrow(): void {
    if (this.options.error !== undefined) {
      throw this.options.error;
    }
  }
}

/** `count` rows shaped like trade records */
export function tradeRows(count: number): Row[] {
  return Array.from({ length: count }, (_, i) => ({
    sym: i % 2 === 0 ? 'AAA' : 'BBB',
    price: 100 + i,
    size: i + 1,
  }));
}
