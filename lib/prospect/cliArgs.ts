import { readFile } from 'fs/promises';
import { ProspectItemListSchema, type ProspectItem } from './schemas';

export const USAGE = 'Usage: npx tsx scripts/validate-prospects.ts [--file items.json] [url ...]';

export interface CliArgs {
  file: string | null;
  urls: string[];
}

/**
 * Split argv (without node and script) into an optional --file path and bare URLs.
 * Returns null when the arguments cannot be used.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs | null {
  let file: string | null = null;
  const urls: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--file') {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) return null;
      file = next;
      i++;
    } else if (arg.startsWith('--file=')) {
      file = arg.slice('--file='.length);
      if (!file) return null;
    } else {
      urls.push(arg);
    }
  }

  if (!file && urls.length === 0) return null;
  return { file, urls };
}

/**
 * Read a JSON array of prospect items. Throws a ZodError on a malformed list.
 */
export async function loadItemsFile(path: string): Promise<ProspectItem[]> {
  const text = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(text);
  return ProspectItemListSchema.parse(parsed);
}
