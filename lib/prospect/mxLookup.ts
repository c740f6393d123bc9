import { Resolver } from 'dns/promises';

export type MxLookupFn = (domain: string, timeoutMs: number) => Promise<string[]>;

/**
 * Mail exchangers for a domain, ordered by priority.
 * Rejects when the domain has no MX records (ENODATA / ENOTFOUND) or the query times out.
 */
export async function lookupMx(domain: string, timeoutMs: number): Promise<string[]> {
  const resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
  const records = await resolver.resolveMx(domain);

  return records
    .slice()
    .sort((a, b) => a.priority - b.priority)
    .map((record) => record.exchange);
}
