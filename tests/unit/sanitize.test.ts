import { describe, it, expect } from 'vitest';
import { parseQuery, sanitizeParams } from '../../src/pipeline/sanitize.js';

describe('parseQuery', () => {
  it('parses a JSON object', () => {
    const result = parseQuery('{"table":"trades"}');

    expect(result).toEqual({ ok: true, value: { table: 'trades' } });
  });

  it('rejects a non-string query', () => {
    const result = parseQuery({ table: 'trades' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fault.kind).toBe('InvalidInput');
      expect(result.fault.message).toBe('query must be a JSON string');
    }
  });

  it('rejects malformed JSON', () => {
    const result = parseQuery('{"table":');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fault.kind).toBe('InvalidInput');
      expect(result.fault.message).toMatch(/^query must be valid JSON: /);
    }
  });
});

describe('sanitizeParams', () => {
  const allowList = ['table', 'limit'];

  it('keeps allowed keys and reports the rest in input order', () => {
    const result = sanitizeParams({ foo: 1, table: 'trades', bar: 'x', limit: 5 }, allowList);

    expect(result).toEqual({
      ok: true,
      value: { params: { table: 'trades', limit: 5 }, droppedKeys: ['foo', 'bar'] },
    });
  });

  it('returns an already-clean request unchanged', () => {
    const raw = { table: 'trades', limit: [10, -10] };

    const result = sanitizeParams(raw, allowList);

    expect(result).toEqual({ ok: true, value: { params: raw, droppedKeys: [] } });
  });

  it('keeps null values of allowed keys', () => {
    const result = sanitizeParams({ table: 'trades', limit: null }, allowList);

    expect(result.ok && result.value.params).toEqual({ table: 'trades', limit: null });
  });

  it('returns empty params for an empty object', () => {
    const result = sanitizeParams({}, allowList);

    expect(result).toEqual({ ok: true, value: { params: {}, droppedKeys: [] } });
  });

  it.each([[['table']], ['trades'], [42], [null]])('rejects a non-object top level: %j', (raw) => {
    const result = sanitizeParams(raw, allowList);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.fault.kind).toBe('InvalidInput');
      expect(result.fault.message).toBe('query JSON must be an object (dictionary)');
    }
  });

  it('does not modify the input', () => {
    const raw = { table: 'trades', foo: 1 };

    sanitizeParams(raw, allowList);

    expect(raw).toEqual({ table: 'trades', foo: 1 });
  });
});
