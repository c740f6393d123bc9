import { probeStatus } from '../fetchLayer';
import { getOrigin } from '../utils';
import type { CheckContext, ProspectCheck } from './context';
import type { FetchResponse, SeoData, SeoResult } from './schemas';
import {
  IDEAL_DESCRIPTION_LENGTH,
  IDEAL_TITLE_LENGTH,
  MAX_IMAGES_WITHOUT_ALT,
  SEO_WEIGHTS,
} from './scoreWeightsV1';

// =============================================================================
// Extraction Helpers
// =============================================================================

const TITLE_REGEX = /<title[^>]*>([^<]+)<\/title>/i;
const DESCRIPTION_REGEXES = [
  /<meta[^>]+name=["']description["'][^>]+content=["']([^"']+)["']/i,
  /<meta[^>]+content=["']([^"']+)["'][^>]+name=["']description["']/i,
];
const H1_REGEX = /<h1[^>]*>([\s\S]*?)<\/h1>/gi;
const VIEWPORT_REGEX = /<meta[^>]+name=["']viewport["']/i;
const OG_REGEX = /<meta[^>]+property=["']og:/i;
const CANONICAL_REGEX = /<link[^>]+rel=["']canonical["']/i;
const JSON_LD_REGEX = /<script[^>]+type=["']application\/ld\+json["']/i;
const IMG_REGEX = /<img[^>]*>/gi;
const IMG_ALT_REGEX = /alt=["'][^"']+["']/i;
const COMPRESSION_REGEX = /gzip|br|deflate/i;

const MAX_H1_TEXT_LENGTH = 100;

function extractTitle(html: string): string | null {
  const title = html.match(TITLE_REGEX)?.[1].trim();
  return title ? title : null;
}

function extractDescription(html: string): string | null {
  for (const regex of DESCRIPTION_REGEXES) {
    const description = html.match(regex)?.[1].trim();
    if (description) return description;
  }
  return null;
}

function extractH1s(html: string): string[] {
  return Array.from(html.matchAll(H1_REGEX))
    .map((match) => match[1].replace(/<[^>]+>/g, '').trim()) // Strip inner tags
    .filter((text) => text.length > 0);
}

function countImages(html: string): { withAlt: number; withoutAlt: number } {
  const images = html.match(IMG_REGEX) ?? [];
  const withAlt = images.filter((img) => IMG_ALT_REGEX.test(img)).length;
  return { withAlt, withoutAlt: images.length - withAlt };
}

// =============================================================================
// Scoring
// =============================================================================

export function scoreSeo(data: SeoData): number {
  let score = 0;

  if (data.has_title) score += SEO_WEIGHTS.has_title;
  if (data.has_meta_description) score += SEO_WEIGHTS.has_meta_description;
  if (data.h1_count === 1) score += SEO_WEIGHTS.single_h1;
  if (data.has_https) score += SEO_WEIGHTS.has_https;
  if (data.has_viewport) score += SEO_WEIGHTS.has_viewport;
  if (data.has_og_tags) score += SEO_WEIGHTS.has_og_tags;
  if (data.has_canonical) score += SEO_WEIGHTS.has_canonical;
  if (data.has_structured_data) score += SEO_WEIGHTS.has_structured_data;
  if (data.has_robots_txt) score += SEO_WEIGHTS.has_robots_txt;
  if (data.has_sitemap) score += SEO_WEIGHTS.has_sitemap;
  if (data.has_compression) score += SEO_WEIGHTS.has_compression;

  return Math.min(100, score);
}

export function emptySeoData(): SeoData {
  return {
    title: null,
    title_length: 0,
    description: null,
    description_length: 0,
    h1_count: 0,
    h1_text: null,
    has_title: false,
    has_meta_description: false,
    has_h1: false,
    has_https: false,
    has_viewport: false,
    has_og_tags: false,
    has_canonical: false,
    has_structured_data: false,
    has_robots_txt: false,
    has_sitemap: false,
    has_compression: false,
    images_with_alt: 0,
    images_without_alt: 0,
    response_time_ms: null,
    page_size_kb: null,
  };
}

export function emptySeoResult(): SeoResult {
  return { passed: false, score: 0, issues: [], data: emptySeoData() };
}

/**
 * On-page SEO from the fetched HTML plus the two crawlability probes.
 */
export function evaluateSeo(
  response: FetchResponse,
  crawlability: { hasRobotsTxt: boolean; hasSitemap: boolean },
  passScore: number
): SeoResult {
  const html = response.body;
  const title = extractTitle(html);
  const description = extractDescription(html);
  const h1s = extractH1s(html);
  const images = countImages(html);

  const data: SeoData = {
    title,
    title_length: title?.length ?? 0,
    description,
    description_length: description?.length ?? 0,
    h1_count: h1s.length,
    h1_text: h1s.length > 0 ? h1s[0].slice(0, MAX_H1_TEXT_LENGTH) : null,
    has_title: title !== null,
    has_meta_description: description !== null,
    has_h1: h1s.length > 0,
    has_https: response.finalUrl.toLowerCase().startsWith('https://'),
    has_viewport: VIEWPORT_REGEX.test(html),
    has_og_tags: OG_REGEX.test(html),
    has_canonical: CANONICAL_REGEX.test(html),
    has_structured_data: JSON_LD_REGEX.test(html),
    has_robots_txt: crawlability.hasRobotsTxt,
    has_sitemap: crawlability.hasSitemap,
    has_compression: COMPRESSION_REGEX.test(response.headers['content-encoding'] ?? ''),
    images_with_alt: images.withAlt,
    images_without_alt: images.withoutAlt,
    response_time_ms: response.elapsedMs,
    page_size_kb: Math.round((response.bodyBytes / 1024) * 10) / 10,
  };

  const issues: string[] = [];

  if (title === null) {
    issues.push('Missing title tag');
  } else if (title.length < IDEAL_TITLE_LENGTH.min) {
    issues.push('Title too short');
  } else if (title.length > IDEAL_TITLE_LENGTH.max) {
    issues.push('Title too long');
  }

  if (description === null) {
    issues.push('Missing meta description');
  } else if (description.length < IDEAL_DESCRIPTION_LENGTH.min) {
    issues.push('Meta description too short');
  } else if (description.length > IDEAL_DESCRIPTION_LENGTH.max) {
    issues.push('Meta description too long');
  }

  if (h1s.length === 0) {
    issues.push('Missing H1 tag');
  } else if (h1s.length > 1) {
    issues.push(`Multiple H1 tags (${h1s.length})`);
  }

  if (!data.has_https) issues.push('Not using HTTPS');
  if (!data.has_viewport) issues.push('Missing viewport meta');
  if (images.withoutAlt > MAX_IMAGES_WITHOUT_ALT) {
    issues.push(`${images.withoutAlt} images missing alt text`);
  }

  const score = scoreSeo(data);

  return {
    passed: score >= passScore && data.has_title && data.has_https,
    score,
    issues,
    data,
  };
}

async function probeCrawlability(context: CheckContext): Promise<{ hasRobotsTxt: boolean; hasSitemap: boolean }> {
  const origin = getOrigin(context.target.url);
  if (!origin) return { hasRobotsTxt: false, hasSitemap: false };

  const probeOptions = {
    timeoutMs: context.config.probeTimeoutMs,
    userAgent: context.config.userAgent,
    acceptEncoding: context.config.acceptEncoding,
    maxRedirects: context.config.maxRedirects,
  };

  const robotsStatus = await probeStatus(`${origin}/robots.txt`, probeOptions, context.deps.fetchPage);
  const sitemapStatus = await probeStatus(`${origin}/sitemap.xml`, probeOptions, context.deps.fetchPage);

  return { hasRobotsTxt: robotsStatus === 200, hasSitemap: sitemapStatus === 200 };
}

export const seoCheck: ProspectCheck<SeoData> = {
  id: 'seo',
  label: 'Site SEO',
  run: async (context) => {
    if (context.outcome.kind !== 'response') return emptySeoResult();

    const crawlability = await probeCrawlability(context);
    return evaluateSeo(context.outcome, crawlability, context.config.seoPassScore);
  },
};
