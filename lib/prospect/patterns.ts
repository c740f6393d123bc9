/**
 * Pattern Library - fixed classification and extraction rules.
 *
 * Checks never run their own regular expressions against page content; they
 * go through the functions below so the matching engine stays swappable.
 * Order inside each family is significant: classify() reports the first hit.
 */

import type { SocialLinks, SocialPlatform } from './schemas';

// =============================================================================
// Content-Quality Families
// =============================================================================

export type ContentFamily = 'parked' | 'construction' | 'placeholder';

export const FAMILY_LABELS: Record<ContentFamily, string> = {
  parked: 'Parked domain',
  construction: 'Under construction',
  placeholder: 'Placeholder content',
};

export const PARKED_PATTERNS: readonly RegExp[] = [
  /buy\s+this\s+domain/i,
  /domain\s+(is\s+)?for\s+sale/i,
  /parked\s+(by|domain|free)/i,
  /godaddy\.com\/domain/i,
  /sedo\.com/i,
  /afternic\.com/i,
  /hugedomains\.com/i,
  /\bdan\.com/i,
  /namecheap\.com.*parking/i,
  /this\s+domain\s+(may\s+be|is)\s+for\s+sale/i,
];

export const CONSTRUCTION_PATTERNS: readonly RegExp[] = [
  /under\s+construction/i,
  /coming\s+soon/i,
  /launching\s+soon/i,
  /website\s+(is\s+)?(under|being)\s+(construction|built|developed)/i,
  /check\s+back\s+(soon|later)/i,
  /we'?re\s+working\s+on\s+(it|something)/i,
  /site\s+under\s+development/i,
  /opening\s+soon/i,
];

export const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /lorem\s+ipsum/i,
  /your\s+company\s+(name|slogan)/i,
  /sample\s+text\s+here/i,
  /insert\s+.*\s+here/i,
  /example\.com/i,
  /email@example/i,
  /\[your\s+/i,
  /welcome\s+to\s+wordpress/i,
  /just\s+another\s+wordpress\s+site/i,
];

const FAMILIES: Record<ContentFamily, readonly RegExp[]> = {
  parked: PARKED_PATTERNS,
  construction: CONSTRUCTION_PATTERNS,
  placeholder: PLACEHOLDER_PATTERNS,
};

/**
 * Label of the family when any of its rules matches, otherwise null.
 */
export function classify(text: string, family: ContentFamily): string | null {
  for (const pattern of FAMILIES[family]) {
    if (pattern.test(text)) {
      return FAMILY_LABELS[family];
    }
  }
  return null;
}

// =============================================================================
// Technology Fingerprints
// =============================================================================

type FingerprintSource = 'server' | 'x-powered-by' | 'body';

interface Fingerprint {
  name: string;
  source: FingerprintSource;
  pattern: RegExp;
}

export const TECH_FINGERPRINTS: readonly Fingerprint[] = [
  // Server header
  { name: 'nginx', source: 'server', pattern: /nginx/i },
  { name: 'apache', source: 'server', pattern: /apache/i },
  { name: 'cloudflare', source: 'server', pattern: /cloudflare/i },
  { name: 'iis', source: 'server', pattern: /microsoft-iis/i },

  // X-Powered-By header
  { name: 'php', source: 'x-powered-by', pattern: /php/i },
  { name: 'asp.net', source: 'x-powered-by', pattern: /asp\.net/i },
  { name: 'express', source: 'x-powered-by', pattern: /express/i },

  // Page content
  { name: 'wordpress', source: 'body', pattern: /wp-content|wordpress/i },
  { name: 'shopify', source: 'body', pattern: /shopify|myshopify/i },
  { name: 'wix', source: 'body', pattern: /wix\.com|wixsite/i },
  { name: 'squarespace', source: 'body', pattern: /squarespace/i },
  { name: 'webflow', source: 'body', pattern: /webflow/i },
  { name: 'drupal', source: 'body', pattern: /drupal|sites\/default\/files/i },
  { name: 'magento', source: 'body', pattern: /magento|mage\//i },
  { name: 'react', source: 'body', pattern: /react|_next\/static|__next/i },
  { name: 'vue', source: 'body', pattern: /vue\.js|vue\.min\.js/i },
  { name: 'angular', source: 'body', pattern: /angular|ng-version/i },
  { name: 'bootstrap', source: 'body', pattern: /bootstrap\.min\.(css|js)/i },
  { name: 'jquery', source: 'body', pattern: /jquery\.min\.js|jquery-\d/i },
  { name: 'google_analytics', source: 'body', pattern: /google-analytics|gtag|ga\.js/i },
  { name: 'google_tag_manager', source: 'body', pattern: /googletagmanager/i },
  { name: 'hubspot', source: 'body', pattern: /hubspot|hs-scripts/i },
  { name: 'intercom', source: 'body', pattern: /intercom|intercomcdn/i },
  { name: 'zendesk', source: 'body', pattern: /zendesk|zdassets/i },
  { name: 'stripe', source: 'body', pattern: /stripe\.com|js\.stripe/i },
];

// Analytics, CRM, support and payment tooling
export const BUSINESS_TOOLS: ReadonlySet<string> = new Set([
  'google_analytics',
  'google_tag_manager',
  'hubspot',
  'intercom',
  'zendesk',
  'stripe',
]);

/**
 * Every technology whose fingerprint matches, in table order.
 * Header names are expected lower-cased.
 */
export function detectTechnologies(headers: Record<string, string>, body: string): string[] {
  const detected: string[] = [];

  for (const { name, source, pattern } of TECH_FINGERPRINTS) {
    const haystack = source === 'body' ? body : headers[source] ?? '';
    if (haystack && pattern.test(haystack) && !detected.includes(name)) {
      detected.push(name);
    }
  }

  return detected;
}

// =============================================================================
// Visible Text
// =============================================================================

export function stripHtml(html: string): string {
  // Remove script and style tags with content
  let text = html.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, ' ');
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, ' ');
  // Remove all HTML tags
  text = text.replace(/<[^>]+>/g, ' ');
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

// =============================================================================
// Contact Extraction
// =============================================================================

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

// Placeholder, test and vendor domains that show up in page source
export const INVALID_EMAIL_DOMAINS: readonly string[] = [
  'example.com',
  'example.org',
  'example.net',
  'email.com',
  'domain.com',
  'yourcompany.com',
  'yourdomain.com',
  'sentry.io',
  'wixpress.com',
  'squarespace.com',
  'wordpress.com',
  'schema.org',
];

// user@2x.png and similar asset names
const ASSET_TLD_REGEX = /\.(png|jpe?g|gif|svg|webp|ico|css|js)$/i;

const PHONE_PATTERNS: readonly RegExp[] = [
  /\+?1?[-.\s]?\(?[0-9]{3}\)?[-.\s]?[0-9]{3}[-.\s]?[0-9]{4}/g, // US
  /\+[0-9]{1,3}[-.\s]?[0-9]{1,4}[-.\s]?[0-9]{1,4}[-.\s]?[0-9]{1,9}/g, // International
];

const MIN_PHONE_DIGITS = 10;

const SOCIAL_PATTERNS: ReadonlyArray<{ platform: SocialPlatform; pattern: RegExp }> = [
  { platform: 'linkedin', pattern: /https?:\/\/(?:www\.)?linkedin\.com\/(?:company|in)\/[a-zA-Z0-9_-]+/i },
  { platform: 'twitter', pattern: /https?:\/\/(?:www\.)?(?:twitter\.com|x\.com)\/[a-zA-Z0-9_]+/i },
  { platform: 'facebook', pattern: /https?:\/\/(?:www\.)?facebook\.com\/[a-zA-Z0-9.]+/i },
  { platform: 'instagram', pattern: /https?:\/\/(?:www\.)?instagram\.com\/[a-zA-Z0-9_.]+/i },
  { platform: 'youtube', pattern: /https?:\/\/(?:www\.)?youtube\.com\/(?:channel\/|c\/|user\/|@)[a-zA-Z0-9_-]+/i },
  { platform: 'github', pattern: /https?:\/\/(?:www\.)?github\.com\/[a-zA-Z0-9_-]+/i },
];

export function isValidEmail(email: string): boolean {
  const domain = email.slice(email.lastIndexOf('@') + 1).toLowerCase();

  if (ASSET_TLD_REGEX.test(domain)) return false;

  return !INVALID_EMAIL_DOMAINS.some((invalid) => domain === invalid || domain.endsWith(`.${invalid}`));
}

/**
 * Valid addresses, lower-cased, in order of first appearance.
 */
export function extractEmails(text: string): string[] {
  const emails: string[] = [];

  for (const match of text.matchAll(EMAIL_REGEX)) {
    const email = match[0].toLowerCase();
    if (!emails.includes(email) && isValidEmail(email)) {
      emails.push(email);
    }
  }

  return emails;
}

export function phoneDigits(phone: string): string {
  return phone.replace(/\D/g, '');
}

/**
 * Phone candidates with at least ten digits, deduplicated by digit string.
 */
export function extractPhones(text: string): string[] {
  const phones: string[] = [];
  const seen = new Set<string>();

  for (const pattern of PHONE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const phone = match[0].trim();
      const digits = phoneDigits(phone);
      if (digits.length >= MIN_PHONE_DIGITS && !seen.has(digits)) {
        seen.add(digits);
        phones.push(phone);
      }
    }
  }

  return phones;
}

/**
 * First full profile URL per platform.
 */
export function extractSocialLinks(text: string): SocialLinks {
  const links: SocialLinks = {};

  for (const { platform, pattern } of SOCIAL_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      links[platform] = match[0];
    }
  }

  return links;
}

// =============================================================================
// Contact Page Discovery
// =============================================================================

export const CONTACT_PATHS: readonly string[] = [
  '/contact',
  '/contact-us',
  '/about',
  '/about-us',
  '/get-in-touch',
];

const CONTACT_LINK_REGEX = /href\s*=\s*["']([^"']*(?:contact|about|get-in-touch)[^"']*)["']/gi;

function withoutFragment(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    return parsed.href;
  } catch {
    return url;
  }
}

/**
 * First in-page link that looks like a contact or about page, made absolute.
 */
export function findContactLink(html: string, baseUrl: string): string | null {
  for (const match of html.matchAll(CONTACT_LINK_REGEX)) {
    const href = match[1].trim();

    // mailto:, tel:, javascript: and friends
    if (/^[a-z][a-z\d+.-]*:/i.test(href) && !/^https?:/i.test(href)) continue;
    // In-page anchors point back at the page already fetched
    if (href.startsWith('#')) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      continue;
    }

    resolved.hash = '';
    if (resolved.href !== withoutFragment(baseUrl)) return resolved.href;
  }

  return null;
}
