import { describe, it, expect } from 'vitest';
import { emptySeoResult, evaluateSeo, seoCheck } from './seoCheck';
import { fakeDeps, fakeFetch, makeContext, makeFailure, makeResponse, RICH_PAGE } from './testHelpers';

const ALL_PROBES = { hasRobotsTxt: true, hasSitemap: true };
const NO_PROBES = { hasRobotsTxt: false, hasSitemap: false };

describe('seoCheck', () => {
  it('gives full marks to a complete page', () => {
    const response = makeResponse({ body: RICH_PAGE, headers: { 'content-encoding': 'gzip' } });
    const result = evaluateSeo(response, ALL_PROBES, 50);

    expect(result.passed).toBe(true);
    expect(result.score).toBe(100);
    expect(result.issues).toEqual([]);
    expect(result.data).toMatchObject({
      title: 'Acme Widgets | Precision Industrial Widgets',
      title_length: 43,
      description_length: 150,
      h1_count: 1,
      h1_text: 'Precision Widgets',
      has_og_tags: true,
      has_canonical: true,
      has_structured_data: true,
      has_compression: true,
      images_with_alt: 1,
      images_without_alt: 1,
      response_time_ms: 120,
      page_size_kb: 1.2,
    });
  });

  it('lists every missing basic on a bare http page', () => {
    const response = makeResponse({
      body: '<html><body><p>hi</p></body></html>',
      finalUrl: 'http://acme-widgets.io',
    });
    const result = evaluateSeo(response, NO_PROBES, 50);

    expect(result.score).toBe(0);
    expect(result.passed).toBe(false);
    expect(result.issues).toEqual([
      'Missing title tag',
      'Missing meta description',
      'Missing H1 tag',
      'Not using HTTPS',
      'Missing viewport meta',
    ]);
    expect(result.data.page_size_kb).toBe(0);
  });

  it('checks title and description lengths', () => {
    const short = evaluateSeo(
      makeResponse({ body: '<title>Acme</title><meta content="Short blurb" name="description">' }),
      NO_PROBES,
      50
    );
    expect(short.issues.slice(0, 2)).toEqual(['Title too short', 'Meta description too short']);
    expect(short.data.description).toBe('Short blurb');

    const long = evaluateSeo(
      makeResponse({
        body: `<title>${'t'.repeat(61)}</title><meta name="description" content="${'d'.repeat(161)}">`,
      }),
      NO_PROBES,
      50
    );
    expect(long.issues.slice(0, 2)).toEqual(['Title too long', 'Meta description too long']);
  });

  it('only credits a single H1', () => {
    const result = evaluateSeo(makeResponse({ body: '<h1>One</h1><h1>Two</h1><h1> </h1>' }), NO_PROBES, 50);

    expect(result.data.h1_count).toBe(2);
    expect(result.data.h1_text).toBe('One');
    expect(result.issues).toContain('Multiple H1 tags (2)');
    // https only
    expect(result.score).toBe(15);
  });

  it('reports images without alt text past the allowance', () => {
    const body = '<img src="a.png"><img src="b.png" alt=""><img src="c.png"><img src="d.png"><img src="e.png" alt="ok">';
    const result = evaluateSeo(makeResponse({ body }), NO_PROBES, 50);

    expect(result.data.images_without_alt).toBe(4);
    expect(result.data.images_with_alt).toBe(1);
    expect(result.issues).toContain('4 images missing alt text');
  });

  it('requires https to pass regardless of score', () => {
    const response = makeResponse({
      body: RICH_PAGE,
      finalUrl: 'http://acme-widgets.io',
      headers: { 'content-encoding': 'br' },
    });
    const result = evaluateSeo(response, ALL_PROBES, 50);

    expect(result.score).toBe(85);
    expect(result.passed).toBe(false);
  });

  it('probes robots.txt and sitemap.xml on the origin', async () => {
    const fetchPage = fakeFetch({
      'https://acme-widgets.io/robots.txt': makeResponse({ method: 'HEAD', statusCode: 200 }),
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps: fakeDeps({ fetchPage }) });

    const result = await seoCheck.run(context);

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(fetchPage).toHaveBeenNthCalledWith(1, 'https://acme-widgets.io/robots.txt', expect.objectContaining({
      method: 'HEAD',
      timeoutMs: 3000,
    }));
    expect(fetchPage).toHaveBeenNthCalledWith(2, 'https://acme-widgets.io/sitemap.xml', expect.objectContaining({
      method: 'HEAD',
    }));
    expect(result.data.has_robots_txt).toBe(true);
    expect(result.data.has_sitemap).toBe(false);
    // Everything but sitemap and compression
    expect(result.score).toBe(85);
  });

  it('treats failed probes as absent', async () => {
    const fetchPage = fakeFetch({
      'https://acme-widgets.io/robots.txt': makeFailure({ method: 'HEAD' }),
      'https://acme-widgets.io/sitemap.xml': makeFailure({ method: 'HEAD', errorKind: 'connection-failed' }),
    });
    const context = makeContext(makeResponse({ body: RICH_PAGE }), { deps: fakeDeps({ fetchPage }) });

    const result = await seoCheck.run(context);

    expect(result.data.has_robots_txt).toBe(false);
    expect(result.data.has_sitemap).toBe(false);
  });

  it('stays in its zero state without a response', async () => {
    await expect(seoCheck.run(makeContext(makeFailure()))).resolves.toEqual(emptySeoResult());
  });
});
