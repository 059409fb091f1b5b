/**
 * Fetch raw SerpApi Google Maps listings for normalizer calibration.
 * Run with: npx tsx scripts/fetch-samples.ts [category] [location]
 *
 * Saves the raw records to scripts/samples/ and prints how the
 * normalizer and scorer read each one.
 */

import 'dotenv/config';
import { writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { SerpApiSource } from '../src/services/sources/SerpApiSource.js';
import { BusinessNormalizer } from '../src/services/normalizer/BusinessNormalizer.js';
import { LeadScorer } from '../src/services/scoring/LeadScorer.js';
import { toErrorMessage } from '../src/utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const SAMPLES_DIR = join(__dirname, 'samples');

function slug(value: string): string {
  return value.toLowerCase().replaceAll(/[^a-z0-9]+/g, '-').replaceAll(/^-|-$/g, '');
}

async function main(): Promise<void> {
  const apiKey = process.env.SERPAPI_KEY;
  if (!apiKey) {
    console.error('SERPAPI_KEY is not set');
    process.exit(1);
  }

  const category = process.argv[2] ?? 'barber';
  const location = process.argv[3] ?? 'Manchester UK';

  mkdirSync(SAMPLES_DIR, { recursive: true });

  const source = new SerpApiSource(apiKey, { baseUrl: process.env.SERPAPI_BASE_URL });
  const normalizer = new BusinessNormalizer();
  const scorer = new LeadScorer();

  console.log(`Fetching "${category}" in "${location}"...`);
  const records = await source.search(category, location, 20);

  const filename = `${slug(category)}--${slug(location)}.json`;
  writeFileSync(join(SAMPLES_DIR, filename), JSON.stringify(records, null, 2), 'utf-8');
  console.log(`Saved ${records.length} records to scripts/samples/${filename}\n`);

  const context = { id: 'sample', category, location };
  for (const raw of records) {
    try {
      const business = normalizer.normalize(raw, context);
      const result = scorer.score(business);
      console.log(
        `  ${result.qualifies ? 'QUALIFIES' : '         '} ${String(result.score).padStart(3)}  ${business.name}` +
          ` (rating ${business.rating ?? '?'}, reviews ${business.reviewCount ?? '?'}, ${business.webPresence})`,
      );
    } catch (error: unknown) {
      console.log(`  DROPPED        ${toErrorMessage(error)}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exit(1);
});
