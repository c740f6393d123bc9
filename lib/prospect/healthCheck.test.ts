import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from './config';
import { describeFetchError, evaluateHealth, healthCheck } from './healthCheck';
import { makeContext, makeFailure, makeResponse } from './testHelpers';

describe('healthCheck', () => {
  it('passes a fast 200 with full marks', () => {
    const result = evaluateHealth(makeResponse({ elapsedMs: 120 }), DEFAULT_CONFIG);

    expect(result).toEqual({
      passed: true,
      score: 100,
      issues: [],
      data: {
        status_code: 200,
        response_time_ms: 120,
        final_url: 'https://acme-widgets.io',
        error_kind: null,
        method: 'GET',
      },
    });
  });

  it.each([
    [499, 100],
    [500, 90],
    [999, 90],
    [1500, 75],
    [2500, 50],
  ])('scores %ims as %i', (elapsedMs, score) => {
    const result = evaluateHealth(makeResponse({ elapsedMs }), DEFAULT_CONFIG);
    expect(result.score).toBe(score);
    expect(result.issues).toEqual([]);
  });

  it('flags slow responses but still passes', () => {
    const result = evaluateHealth(makeResponse({ elapsedMs: 3500 }), DEFAULT_CONFIG);

    expect(result.passed).toBe(true);
    expect(result.score).toBe(25);
    expect(result.issues).toEqual(['Slow response: 3500ms']);
  });

  it('fails HTTP error statuses with a zero score', () => {
    const result = evaluateHealth(makeResponse({ statusCode: 500 }), DEFAULT_CONFIG);

    expect(result.passed).toBe(false);
    expect(result.score).toBe(0);
    expect(result.issues).toEqual(['HTTP 500']);
    expect(result.data.status_code).toBe(500);
  });

  it('treats 3xx without a location as reachable', () => {
    expect(evaluateHealth(makeResponse({ statusCode: 304 }), DEFAULT_CONFIG).passed).toBe(true);
  });

  it('reports transport failures without a status code', () => {
    const result = evaluateHealth(makeFailure(), DEFAULT_CONFIG);

    expect(result).toEqual({
      passed: false,
      score: 0,
      issues: ['Request timeout'],
      data: {
        status_code: null,
        response_time_ms: 15000,
        final_url: 'https://acme-widgets.io',
        error_kind: 'timeout',
        method: 'GET',
      },
    });
  });

  it('describes every failure kind', () => {
    expect(describeFetchError('timeout', 'x')).toBe('Request timeout');
    expect(describeFetchError('tls-error', 'x')).toBe('SSL error');
    expect(describeFetchError('connection-failed', 'x')).toBe('Connection failed');
    expect(describeFetchError('too-many-redirects', 'x')).toBe('Too many redirects');
    expect(describeFetchError('other', 'socket hang up')).toBe('Error: socket hang up');
  });

  it('runs against the shared fetch outcome', async () => {
    const result = await healthCheck.run(makeContext(makeResponse({ statusCode: 404 })));
    expect(result.issues).toEqual(['HTTP 404']);
  });
});
