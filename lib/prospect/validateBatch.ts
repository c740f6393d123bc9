import type { CompositeResult, ProspectItem } from './schemas';
import { validateProspect } from './validateProspect';

// Fields probed for a URL, most specific first
export const URL_FIELDS = ['url_checked', 'url', 'website', 'company_url', 'domain'] as const;

export type ValidatedItem = ProspectItem & CompositeResult;

type ValidateFn = (raw: string | null | undefined) => Promise<Readonly<CompositeResult>>;

/**
 * First non-empty string among the URL fields, or null.
 */
export function getUrlFromItem(item: ProspectItem): string | null {
  for (const field of URL_FIELDS) {
    const value = item[field];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return null;
}

/**
 * Validate items one at a time and overlay each composite on its item.
 * Composite keys replace item keys of the same name.
 */
export async function validateItems(
  items: readonly ProspectItem[],
  validate: ValidateFn = validateProspect
): Promise<ValidatedItem[]> {
  const results: ValidatedItem[] = [];

  for (const [index, item] of items.entries()) {
    const url = getUrlFromItem(item);
    console.error(`[Batch] ${index + 1}/${items.length}: ${url ?? '(no url)'}`);

    const composite = await validate(url);
    results.push({ ...item, ...composite });
  }

  return results;
}
