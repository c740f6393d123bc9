export type NormalizedTarget = {
  valid: true;
  url: string;
  domain: string;
};

export type InvalidTarget = {
  valid: false;
  reason: 'empty' | 'unparsable';
  url: string | null;
};

const HTTP_SCHEME_REGEX = /^https?:\/\//i;

/**
 * Normalize a URL by adding https:// if no http(s) scheme is present.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();

  if (!HTTP_SCHEME_REGEX.test(trimmed)) {
    return `https://${trimmed}`;
  }

  return trimmed;
}

/**
 * Strip one leading "www." label for domain comparisons.
 */
export function normalizeForComparison(domain: string): string {
  return domain.replace(/^www\./i, '');
}

/**
 * Raw authority of an absolute http(s) URL: no userinfo, no port.
 * Read from the string itself so the caller's casing survives.
 */
function extractHost(url: string): string {
  const authority = url.replace(HTTP_SCHEME_REGEX, '').split(/[/?#]/)[0];
  const hostAndPort = authority.slice(authority.lastIndexOf('@') + 1);

  if (hostAndPort.startsWith('[')) {
    // IPv6 literal
    return hostAndPort.slice(0, hostAndPort.indexOf(']') + 1);
  }

  return hostAndPort.split(':')[0];
}

/**
 * Turn whatever the caller supplied (bare domain, partial URL, full URL)
 * into a fetchable absolute URL plus its registrable domain.
 *
 * Pure string work: nothing here touches the network.
 */
export function normalizeTarget(raw: string | null | undefined): NormalizedTarget | InvalidTarget {
  if (raw == null || raw.trim() === '') {
    return { valid: false, reason: 'empty', url: null };
  }

  const url = normalizeUrl(raw);

  try {
    const parsed = new URL(url);
    const host = extractHost(url);
    if (!parsed.hostname || !host) {
      return { valid: false, reason: 'unparsable', url };
    }

    return { valid: true, url, domain: normalizeForComparison(host) };
  } catch {
    return { valid: false, reason: 'unparsable', url };
  }
}

/**
 * Hostname of a URL (lower-cased), or '' when it does not parse.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * scheme://host[:port] of a URL, used to build probe URLs such as /robots.txt.
 */
export function getOrigin(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}
