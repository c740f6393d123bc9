import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FetchPageOptions } from '../fetchLayer';
import { contactabilityCheck, emptyContactabilityResult, evaluateContactability } from './contactabilityCheck';
import type { FetchOutcome } from './schemas';
import { fakeDeps, fakeFetch, makeContext, makeFailure, makeResponse, RICH_PAGE } from './testHelpers';

const CONTACT_PAGE = '<p>Write to info@acme-widgets.io or sales@acme-widgets.io. Phone 555-123-4567 or +1 555 987 6543.</p>'
  + '<a href="https://x.com/acmewidgets">X</a>'
  + '<a href="https://www.linkedin.com/company/acme-other">in</a>';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('contactabilityCheck', () => {
  it('merges the linked contact page into the main page signals', async () => {
    const fetchPage = fakeFetch({
      'https://acme-widgets.io/contact': makeResponse({ url: 'https://acme-widgets.io/contact', body: CONTACT_PAGE }),
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps: fakeDeps({ fetchPage }) });

    const result = await contactabilityCheck.run(context);

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage).toHaveBeenCalledWith('https://acme-widgets.io/contact', expect.objectContaining({
      method: 'GET',
      timeoutMs: 10000,
    }));
    expect(result).toEqual({
      passed: true,
      score: 84,
      issues: [],
      data: {
        emails: ['sales@acme-widgets.io', 'info@acme-widgets.io'],
        phones: ['(555) 123-4567', '+1 555 987 6543'],
        social_links: {
          linkedin: 'https://www.linkedin.com/company/acme-widgets',
          twitter: 'https://x.com/acmewidgets',
        },
        contact_page_url: 'https://acme-widgets.io/contact',
        has_contact_page: true,
      },
    });
  });

  it('falls back to probing common contact paths', async () => {
    const fetchPage = fakeFetch({
      'https://acme-widgets.io/contact-us': makeResponse({ method: 'HEAD', statusCode: 200 }),
    });
    const context = makeContext(
      makeResponse({ body: '<p>Reach us at hello@acme-widgets.io</p>' }),
      { deps: fakeDeps({ fetchPage }) }
    );

    const result = await contactabilityCheck.run(context);

    expect(fetchPage.mock.calls.map(([url]) => url)).toEqual([
      'https://acme-widgets.io/contact',
      'https://acme-widgets.io/contact-us',
      'https://acme-widgets.io/contact-us',
    ]);
    expect(result.data.contact_page_url).toBe('https://acme-widgets.io/contact-us');
    expect(result.data.emails).toEqual(['hello@acme-widgets.io']);
    expect(result.issues).toEqual(['No phone found', 'No social profiles']);
    expect(result.score).toBe(35);
    expect(result.passed).toBe(true);
  });

  it('fails when no contact channel exists', async () => {
    const fetchPage = fakeFetch();
    const context = makeContext(makeResponse({ body: '<p>Nothing here</p>' }), { deps: fakeDeps({ fetchPage }) });

    const result = await contactabilityCheck.run(context);

    expect(fetchPage).toHaveBeenCalledTimes(5);
    expect(result).toEqual({
      passed: false,
      score: 0,
      issues: ['No email found', 'No phone found', 'No social profiles'],
      data: {
        emails: [],
        phones: [],
        social_links: {},
        contact_page_url: null,
        has_contact_page: false,
      },
    });
  });

  it('keeps main page signals when the contact page fetch throws', async () => {
    const fetchPage = vi.fn(async (url: string, options?: FetchPageOptions): Promise<FetchOutcome> => {
      if (options?.method === 'GET') throw new Error('socket hang up');
      return makeResponse({ url, finalUrl: url, statusCode: 404 });
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps: fakeDeps({ fetchPage }) });

    const result = await contactabilityCheck.run(context);

    expect(result.score).toBe(77);
    expect(result.data.emails).toEqual(['sales@acme-widgets.io']);
    expect(console.warn).toHaveBeenCalledWith(
      '[Contactability] Contact page https://acme-widgets.io/contact failed: socket hang up'
    );
  });

  it('caps emails at ten and phones at five', async () => {
    const emails = Array.from({ length: 20 }, (_, i) => `person${i}@acme-widgets.io`).join(' ');
    const phones = Array.from({ length: 7 }, (_, i) => `555-010-000${i}`).join(' ');
    const context = makeContext(makeResponse({ body: `<p>${emails}</p><p>${phones}</p>` }));

    const result = await contactabilityCheck.run(context);

    expect(result.data.emails).toHaveLength(10);
    expect(result.data.emails[0]).toBe('person0@acme-widgets.io');
    expect(result.data.phones).toEqual(['555-010-0000', '555-010-0001', '555-010-0002', '555-010-0003', '555-010-0004']);
  });

  it('caps the social score and adds the LinkedIn bonus', () => {
    const result = evaluateContactability(
      {
        emails: [],
        phones: [],
        socialLinks: {
          linkedin: 'https://linkedin.com/company/acme',
          twitter: 'https://twitter.com/acme',
          facebook: 'https://facebook.com/acme',
          github: 'https://github.com/acme',
        },
      },
      null,
      { maxEmails: 10, maxPhones: 5 }
    );

    expect(result.score).toBe(30);
    expect(result.passed).toBe(false);
    expect(result.issues).toEqual(['No email found', 'No phone found']);
  });

  it('stays in its zero state without a response', async () => {
    await expect(contactabilityCheck.run(makeContext(makeFailure()))).resolves.toEqual(emptyContactabilityResult());
  });
});
