/**
 * RDAP (Registration Data Access Protocol) lookup for a domain's registration date.
 * Known TLDs go straight to their registry; everything else goes through the
 * rdap.org bootstrap redirector. No API key required.
 */

import { z } from 'zod';

// Registry RDAP servers for common TLDs
const RDAP_SERVERS: Record<string, string> = {
  com: 'https://rdap.verisign.com/com/v1/',
  net: 'https://rdap.verisign.com/net/v1/',
  org: 'https://rdap.publicinterestregistry.org/rdap/',
  info: 'https://rdap.afilias.net/rdap/info/',
  biz: 'https://rdap.nic.biz/',
  xyz: 'https://rdap.centralnic.com/xyz/',
  app: 'https://rdap.nic.google/',
  dev: 'https://rdap.nic.google/',
  uk: 'https://rdap.nominet.uk/uk/',
  de: 'https://rdap.denic.de/',
  nl: 'https://rdap.sidn.nl/',
  eu: 'https://rdap.eurid.eu/',
};

const BOOTSTRAP_SERVER = 'https://rdap.org/';

const RdapDomainSchema = z.object({
  events: z.array(z.object({
    eventAction: z.string(),
    eventDate: z.string(),
  })).default([]),
});

export interface RegistrationInfo {
  registrationDate: string | null; // ISO 8601
  rdapServer: string;
}

export type RegistrationLookupFn = (domain: string, timeoutMs: number) => Promise<RegistrationInfo>;

function getTld(domain: string): string {
  const parts = domain.toLowerCase().split('.');
  return parts[parts.length - 1];
}

/**
 * Look up when a domain was registered. Rejects on HTTP errors, timeouts and
 * malformed responses; callers treat that as an unknown age.
 */
export async function lookupRegistration(domain: string, timeoutMs: number): Promise<RegistrationInfo> {
  const rdapServer = RDAP_SERVERS[getTld(domain)] ?? BOOTSTRAP_SERVER;
  const url = `${rdapServer}domain/${domain.toLowerCase()}`;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        'Accept': 'application/rdap+json',
        'User-Agent': 'Mozilla/5.0 (compatible; ProspectValidator/1.0)',
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`RDAP ${url} answered HTTP ${response.status}`);
    }

    const data = RdapDomainSchema.parse(await response.json());
    const registration = data.events.find((e) => e.eventAction === 'registration');

    return {
      registrationDate: registration?.eventDate ?? null,
      rdapServer,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
