#!/usr/bin/env tsx
/**
 * DealScout — Weekly Deals Script
 *
 * Usage:
 *   npm run deals
 *   npm run deals -- --since 14 --out out/deals.csv --out-json out/deals.json
 *   npm run deals -- --edgar --feed https://example.com/feed.xml
 */

import 'dotenv/config';
import { createProgram } from '../src/cli/program';
import { ConfigError } from '../src/config/env';
import { logger } from '../src/lib/logger';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error('\nConfiguration error:');
    error.issues.forEach(issue => console.error(`  - ${issue}`));
  } else {
    logger.error('Weekly deals run failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    console.error('\nRun failed:', error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
