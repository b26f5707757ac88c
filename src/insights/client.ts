// ============================================================================
// Insights Client
// ============================================================================
// Boundary to the analytical data engine. The pipeline only sees the
// InsightsClient interface; HttpInsightsClient speaks the service gateway's
// REST API, where every endpoint answers with a { header, payload } envelope.
// ============================================================================

import { z } from 'zod';
import { UpstreamError, errorMessage } from '../errors.js';
import type { GetDataDescriptor, MetaKey } from '../pipeline/contracts.js';
import type { Aggregations } from '../pipeline/fields.js';

export type Row = Record<string, unknown>;

export type GetDataOptions = Omit<GetDataDescriptor, 'tool' | 'table'>;

export type InsightsMeta = Record<MetaKey, Row[]>;

export interface AggregationResponse {
  header: Record<string, unknown>;
  payload: unknown;
}

export interface InsightsClient {
  getData(table: string, options: GetDataOptions): Promise<Row[]>;
  getMeta(): Promise<InsightsMeta>;
  invokeCustomAggregation(name: string, params: Record<string, unknown>): Promise<AggregationResponse>;
}

// ============================================================================
// Response Schemas
// ============================================================================

const envelopeSchema = z.object({
  header: z
    .object({
      rc: z.number().optional(),
      ai: z.string().optional(),
    })
    .passthrough(),
  payload: z.unknown(),
});

const rowsSchema = z.array(z.record(z.string(), z.unknown()));

const metaSchema = z.object({
  rc: rowsSchema.default([]),
  dap: rowsSchema.default([]),
  api: rowsSchema.default([]),
  agg: rowsSchema.default([]),
  assembly: rowsSchema.default([]),
  schema: rowsSchema.default([]),
});

// ============================================================================
// HTTP Client
// ============================================================================

export interface HttpInsightsClientOptions {
  baseUrl: string;
  /** Bearer token issued by whoever owns the connection */
  token?: string;
  fetchImpl?: typeof fetch;
}

export class HttpInsightsClient implements InsightsClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpInsightsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getData(table: string, options: GetDataOptions): Promise<Row[]> {
    const { payload } = await this.post('/servicegateway/kxi/getData', toGetDataBody(table, options));
    return parseRows(payload, 'getData');
  }

  async getMeta(): Promise<InsightsMeta> {
    const { payload } = await this.post('/servicegateway/kxi/getMeta', {});
    const parsed = metaSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError('getMeta returned an unexpected payload shape');
    }
    return parsed.data;
  }

  async invokeCustomAggregation(name: string, params: Record<string, unknown>): Promise<AggregationResponse> {
    return this.post(`/servicegateway/${aggregationPath(name)}`, params);
  }

  private async post(endpoint: string, body: Record<string, unknown>): Promise<AggregationResponse> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new UpstreamError(`Request to ${endpoint} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new UpstreamError(`${endpoint} responded ${res.status} ${res.statusText}`.trim());
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new UpstreamError(`${endpoint} returned a body that is not JSON`, { cause: err });
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new UpstreamError(`${endpoint} returned a malformed response envelope`);
    }

    const { rc, ai } = envelope.data.header;
    if (rc !== undefined && rc !== 0) {
      throw new UpstreamError(`${endpoint} failed with rc=${rc}${ai ? `: ${ai}` : ''}`);
    }

    return { header: envelope.data.header, payload: envelope.data.payload };
  }
}

// ============================================================================
// Wire Mapping
// ============================================================================

/** '.example.countBy' → 'example/countBy' */
export function aggregationPath(name: string): string {
  return name.replace(/^\.+/, '').split('.').join('/');
}

function aggregationsToWire(aggregations: Aggregations | undefined): unknown {
  if (!aggregations) return undefined;
  return aggregations.kind === 'columns' ? aggregations.columns : aggregations.triplets;
}

export function toGetDataBody(table: string, options: GetDataOptions): Record<string, unknown> {
  return {
    table,
    startTS: options.startTime,
    endTS: options.endTime,
    inputTZ: options.inputTimezone,
    outputTZ: options.outputTimezone,
    filter: options.filter,
    groupBy: options.groupBy,
    agg: aggregationsToWire(options.aggregations),
    fill: options.fill,
    temporality: options.temporality,
    slice: options.slice,
    sortCols: options.sortColumns,
    labels: options.labels,
    limit: options.limit,
  };
}

export function parseRows(payload: unknown, source: string): Row[] {
  const parsed = rowsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamError(`${source} returned a payload that is not a list of records`);
  }
  return parsed.data;
}
