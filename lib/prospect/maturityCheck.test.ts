import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { emptyMaturityResult, evaluateMaturity, maturityCheck } from './maturityCheck';
import { FIXED_NOW, fakeDeps, makeCertificate, makeContext, makeFailure, makeResponse, RICH_PAGE } from './testHelpers';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('maturityCheck', () => {
  it('scores certificate, mail and technology signals', async () => {
    const deps = fakeDeps();
    const context = makeContext(makeResponse({ body: RICH_PAGE }), {
      deps,
      technologies: ['nginx', 'google_tag_manager'],
    });

    const result = await maturityCheck.run(context);

    expect(deps.probeTls).toHaveBeenCalledWith('acme-widgets.io', 5000);
    expect(deps.lookupMx).toHaveBeenCalledWith('acme-widgets.io', 5000);
    expect(deps.lookupRegistration).toHaveBeenCalledWith('acme-widgets.io', 10000);
    expect(result).toEqual({
      passed: true,
      score: 85,
      issues: [],
      data: {
        has_ssl: true,
        ssl_issuer: "Let's Encrypt",
        ssl_expiry_days: 59,
        has_mx_records: true,
        mx_records: ['mx1.acme-widgets.io'],
        tech_stack: ['nginx', 'google_tag_manager'],
        business_tools: ['google_tag_manager'],
        domain_age_days: 2557,
      },
    });
  });

  it('gates on SSL even when the score clears the threshold', async () => {
    const deps = fakeDeps({
      probeTls: vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      }),
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps });

    const result = await maturityCheck.run(context);

    expect(result.data.has_ssl).toBe(false);
    expect(result.data.ssl_issuer).toBeNull();
    expect(result.data.has_mx_records).toBe(true);
    expect(result.data.tech_stack).toEqual(['google_tag_manager']);
    expect(result.score).toBe(50);
    expect(result.passed).toBe(false);
    expect(result.issues).toEqual(['No SSL certificate']);
    expect(console.warn).toHaveBeenCalledWith('[Maturity] TLS probe failed for acme-widgets.io: connect ECONNREFUSED');
  });

  it('treats a failed MX lookup as no records', async () => {
    const deps = fakeDeps({
      lookupMx: vi.fn(async () => {
        throw new Error('queryMx ENODATA acme-widgets.io');
      }),
    });
    const context = makeContext(makeResponse(), { deps, technologies: [] });

    const result = await maturityCheck.run(context);

    expect(result.data.mx_records).toEqual([]);
    expect(result.issues).toEqual(['No MX records', 'No technology detected']);
    expect(result.score).toBe(30);
    expect(result.passed).toBe(false);
  });

  it('reports an unknown domain age when the registration lookup fails', async () => {
    const deps = fakeDeps({
      lookupRegistration: vi.fn(async () => {
        throw new Error('RDAP https://rdap.org/domain/acme-widgets.io answered HTTP 404');
      }),
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps });

    const result = await maturityCheck.run(context);

    expect(result.data.domain_age_days).toBeNull();
    expect(result.score).toBe(80);
    expect(result.passed).toBe(true);
    expect(console.warn).toHaveBeenCalledWith(
      '[Maturity] Registration lookup failed for acme-widgets.io: RDAP https://rdap.org/domain/acme-widgets.io answered HTTP 404'
    );
  });

  it('leaves the score unchanged by domain age', () => {
    const young = evaluateMaturity(makeCertificate(), [], ['nginx'], 40, FIXED_NOW, '2025-12-01T00:00:00Z');
    const old = evaluateMaturity(makeCertificate(), [], ['nginx'], 40, FIXED_NOW, '2001-01-01T00:00:00Z');

    expect(young.data.domain_age_days).toBe(31);
    expect(old.data.domain_age_days).toBe(9131);
    expect(young.score).toBe(old.score);
  });

  it('does not count an untrusted certificate as SSL', () => {
    const certificate = makeCertificate({
      authorized: false,
      authorizationError: 'DEPTH_ZERO_SELF_SIGNED_CERT',
      issuer: 'Acme Internal CA',
    });

    const result = evaluateMaturity(certificate, ['mx1.acme-widgets.io'], ['nginx'], 40, FIXED_NOW);

    expect(result.data.has_ssl).toBe(false);
    expect(result.data.ssl_issuer).toBe('Acme Internal CA');
    expect(result.score).toBe(30);
  });

  it('leaves expiry empty for an unreadable date', () => {
    const result = evaluateMaturity(makeCertificate({ validTo: 'not a date' }), [], [], 40, FIXED_NOW);
    expect(result.data.ssl_expiry_days).toBeNull();
  });

  it('caps the technology credit', () => {
    const technologies = ['nginx', 'php', 'wordpress', 'react', 'jquery', 'bootstrap', 'stripe'];
    const result = evaluateMaturity(null, [], technologies, 40, FIXED_NOW);

    expect(result.score).toBe(45);
    expect(result.data.business_tools).toEqual(['stripe']);
  });

  it('stays in its zero state without a response', async () => {
    await expect(maturityCheck.run(makeContext(makeFailure()))).resolves.toEqual(emptyMaturityResult());
  });
});
