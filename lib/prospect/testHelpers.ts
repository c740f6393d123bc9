import { vi } from 'vitest';
import type { FetchPageOptions } from '../fetchLayer';
import { normalizeTarget, type NormalizedTarget } from '../utils';
import { DEFAULT_CONFIG } from './config';
import type { CheckContext, ValidatorDeps } from './context';
import type { FetchFailure, FetchOutcome, FetchResponse } from './schemas';
import type { TlsCertificateInfo } from './tlsProbe';

export const FIXED_NOW = new Date('2026-01-01T00:00:00Z');

export function makeResponse(overrides: Partial<FetchResponse> = {}): FetchResponse {
  const body = overrides.body ?? '';
  return {
    kind: 'response',
    url: 'https://acme-widgets.io',
    finalUrl: 'https://acme-widgets.io',
    method: 'GET',
    statusCode: 200,
    elapsedMs: 120,
    headers: {},
    bodyBytes: Buffer.byteLength(body),
    ...overrides,
    body,
  };
}

export function makeFailure(overrides: Partial<FetchFailure> = {}): FetchFailure {
  return {
    kind: 'error',
    url: 'https://acme-widgets.io',
    finalUrl: 'https://acme-widgets.io',
    method: 'GET',
    elapsedMs: 15000,
    errorKind: 'timeout',
    errorMessage: 'Request timed out',
    ...overrides,
  };
}

export function makeCertificate(overrides: Partial<TlsCertificateInfo> = {}): TlsCertificateInfo {
  return {
    authorized: true,
    authorizationError: null,
    issuer: "Let's Encrypt",
    validFrom: 'Dec  1 00:00:00 2025 GMT',
    validTo: 'Mar  1 00:00:00 2026 GMT',
    ...overrides,
  };
}

export function target(raw: string): NormalizedTarget {
  const normalized = normalizeTarget(raw);
  if (!normalized.valid) {
    throw new Error(`Test target ${raw} does not normalize`);
  }
  return normalized;
}

/**
 * Fake network: each URL maps to an outcome; anything else is a 404.
 */
export function fakeFetch(routes: Record<string, FetchOutcome> = {}) {
  return vi.fn(async (url: string, options?: FetchPageOptions): Promise<FetchOutcome> => {
    const routed = routes[url];
    if (routed) return routed;
    return makeResponse({ url, finalUrl: url, method: options?.method ?? 'GET', statusCode: 404 });
  });
}

export function fakeDeps(overrides: Partial<ValidatorDeps> = {}): ValidatorDeps {
  return {
    fetchPage: fakeFetch(),
    probeTls: vi.fn(async () => makeCertificate()),
    lookupMx: vi.fn(async () => ['mx1.acme-widgets.io']),
    lookupRegistration: vi.fn(async () => ({
      registrationDate: '2019-01-01T00:00:00Z',
      rdapServer: 'https://rdap.org/',
    })),
    now: () => FIXED_NOW,
    ...overrides,
  };
}

export function makeContext(outcome: FetchOutcome, overrides: Partial<CheckContext> = {}): CheckContext {
  return {
    outcome,
    target: target('acme-widgets.io'),
    config: DEFAULT_CONFIG,
    deps: fakeDeps(),
    ...overrides,
  };
}

// Healthy company homepage: every SEO signal, one email, one phone, a LinkedIn profile
export const RICH_PAGE = [
  '<html><head>',
  '<title>Acme Widgets | Precision Industrial Widgets</title>',
  '<meta name="description" content="Acme Widgets designs and manufactures precision industrial widgets for factories, warehouses and workshops, with same-week shipping across the region.">',
  '<meta name="viewport" content="width=device-width, initial-scale=1">',
  '<meta property="og:title" content="Acme Widgets">',
  '<link rel="canonical" href="https://acme-widgets.io/">',
  '<script type="application/ld+json">{"@type":"Organization"}</script>',
  '</head>',
  '<body><h1>Precision <em>Widgets</em></h1>',
  '<p>Acme Widgets has built precision industrial widgets since 1998. Our team of engineers designs every part in house, '
    + 'tests it against strict tolerances, and ships it from our own warehouse. Factories, repair shops and research labs '
    + 'rely on our catalogue of gears, brackets, fasteners and custom assemblies. Every order includes documentation, '
    + 'a quality report and direct access to the engineer who built it.</p>',
  '<p>Email sales@acme-widgets.io or call (555) 123-4567.</p>',
  '<a href="https://www.linkedin.com/company/acme-widgets">LinkedIn</a>',
  '<a href="/contact">Contact us</a>',
  '<img src="/img/a.png" alt="Widget"><img src="/img/b.png">',
  '<script src="https://www.googletagmanager.com/gtm.js"></script>',
  '</body></html>',
].join('');
