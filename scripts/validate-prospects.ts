import 'dotenv/config';
import { loadConfigFromEnv } from '../lib/prospect/config';
import { USAGE, loadItemsFile, parseCliArgs } from '../lib/prospect/cliArgs';
import type { ProspectItem } from '../lib/prospect/schemas';
import { validateItems } from '../lib/prospect/validateBatch';
import { createProspectValidator } from '../lib/prospect/validateProspect';

const args = parseCliArgs(process.argv.slice(2));

if (!args) {
  console.error(USAGE);
  process.exit(1);
}

async function main(file: string | null, urls: string[]) {
  const validator = createProspectValidator(loadConfigFromEnv());

  const items: ProspectItem[] = file ? await loadItemsFile(file) : [];
  for (const url of urls) {
    items.push({ url });
  }

  const results = await validateItems(items, validator.validate);

  process.stdout.write(`${JSON.stringify(results, null, 2)}\n`);

  const passed = results.filter((r) => r.overall_passed).length;
  console.error(`Validated ${results.length} prospects, ${passed} passed`);
}

main(args.file, args.urls)
  .then(() => process.exit(0))
  .catch(e => {
    console.error(e);
    process.exit(1);
  });
