import { probeStatus } from '../fetchLayer';
import { getOrigin } from '../utils';
import type { CheckContext, ProspectCheck } from './context';
import {
  CONTACT_PATHS,
  extractEmails,
  extractPhones,
  extractSocialLinks,
  findContactLink,
  phoneDigits,
  stripHtml,
} from './patterns';
import type { ContactabilityData, ContactabilityResult, SocialLinks } from './schemas';
import { CONTACT_WEIGHTS } from './scoreWeightsV1';

export function emptyContactabilityData(): ContactabilityData {
  return {
    emails: [],
    phones: [],
    social_links: {},
    contact_page_url: null,
    has_contact_page: false,
  };
}

export function emptyContactabilityResult(): ContactabilityResult {
  return { passed: false, score: 0, issues: [], data: emptyContactabilityData() };
}

export interface ContactSignals {
  emails: string[];
  phones: string[];
  socialLinks: SocialLinks;
}

function extractContactSignals(html: string): ContactSignals {
  return {
    emails: extractEmails(html),
    phones: extractPhones(stripHtml(html)),
    socialLinks: extractSocialLinks(html),
  };
}

/**
 * Union of two signal sets. The first set keeps its order and wins on
 * duplicates; phones compare by digits.
 */
export function mergeContactSignals(primary: ContactSignals, secondary: ContactSignals): ContactSignals {
  const emails = [...primary.emails];
  for (const email of secondary.emails) {
    if (!emails.includes(email)) emails.push(email);
  }

  const phones = [...primary.phones];
  const seenDigits = new Set(phones.map(phoneDigits));
  for (const phone of secondary.phones) {
    const digits = phoneDigits(phone);
    if (!seenDigits.has(digits)) {
      seenDigits.add(digits);
      phones.push(phone);
    }
  }

  return {
    emails,
    phones,
    socialLinks: { ...secondary.socialLinks, ...primary.socialLinks },
  };
}

export function scoreContactability(data: ContactabilityData): number {
  const socialCount = Object.keys(data.social_links).length;
  let score = 0;

  if (data.emails.length > 0) score += CONTACT_WEIGHTS.has_email;
  if (data.phones.length > 0) score += CONTACT_WEIGHTS.has_phone;
  score += Math.min(CONTACT_WEIGHTS.max_social, socialCount * CONTACT_WEIGHTS.per_social_profile);
  if (data.social_links.linkedin) score += CONTACT_WEIGHTS.linkedin_bonus;

  return Math.min(100, score);
}

export function evaluateContactability(
  signals: ContactSignals,
  contactPageUrl: string | null,
  limits: { maxEmails: number; maxPhones: number }
): ContactabilityResult {
  const data: ContactabilityData = {
    emails: signals.emails.slice(0, limits.maxEmails),
    phones: signals.phones.slice(0, limits.maxPhones),
    social_links: signals.socialLinks,
    contact_page_url: contactPageUrl,
    has_contact_page: contactPageUrl !== null,
  };

  const issues: string[] = [];
  if (data.emails.length === 0) issues.push('No email found');
  if (data.phones.length === 0) issues.push('No phone found');
  if (Object.keys(data.social_links).length === 0) issues.push('No social profiles');

  return {
    passed: data.emails.length > 0 || data.phones.length > 0,
    score: scoreContactability(data),
    issues,
    data,
  };
}

// =============================================================================
// Contact Page Discovery
// =============================================================================

async function discoverContactPage(context: CheckContext, html: string, baseUrl: string): Promise<string | null> {
  const linked = findContactLink(html, baseUrl);
  if (linked) return linked;

  const origin = getOrigin(baseUrl);
  if (!origin) return null;

  for (const path of CONTACT_PATHS) {
    const candidate = `${origin}${path}`;
    const status = await probeStatus(
      candidate,
      {
        timeoutMs: context.config.probeTimeoutMs,
        userAgent: context.config.userAgent,
        acceptEncoding: context.config.acceptEncoding,
        maxRedirects: context.config.maxRedirects,
      },
      context.deps.fetchPage
    );
    if (status === 200) return candidate;
  }

  return null;
}

async function fetchContactPageSignals(context: CheckContext, url: string): Promise<ContactSignals | null> {
  try {
    const outcome = await context.deps.fetchPage(url, {
      method: 'GET',
      timeoutMs: context.config.contactPageTimeoutMs,
      userAgent: context.config.userAgent,
      acceptEncoding: context.config.acceptEncoding,
      maxRedirects: context.config.maxRedirects,
      maxBodyBytes: context.config.maxBodyBytes,
    });

    if (outcome.kind === 'error') {
      console.warn(`[Contactability] Contact page ${url} unavailable: ${outcome.errorKind}`);
      return null;
    }
    if (outcome.statusCode >= 400) {
      console.warn(`[Contactability] Contact page ${url} returned HTTP ${outcome.statusCode}`);
      return null;
    }

    return extractContactSignals(outcome.body);
  } catch (error) {
    console.warn(`[Contactability] Contact page ${url} failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return null;
  }
}

export const contactabilityCheck: ProspectCheck<ContactabilityData> = {
  id: 'contactability',
  label: 'Contactability',
  run: async (context) => {
    const { outcome, config } = context;
    if (outcome.kind !== 'response') return emptyContactabilityResult();

    let signals = extractContactSignals(outcome.body);
    const contactPageUrl = await discoverContactPage(context, outcome.body, outcome.finalUrl);

    if (contactPageUrl) {
      const contactSignals = await fetchContactPageSignals(context, contactPageUrl);
      if (contactSignals) {
        signals = mergeContactSignals(signals, contactSignals);
      }
    }

    return evaluateContactability(signals, contactPageUrl, config);
  },
};
