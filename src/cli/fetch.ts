#!/usr/bin/env node
/**
 * CLI for printing the latest report listing without fetching report pages
 *
 * Usage:
 *   npm run fetch                 # Latest 10 reports
 *   npm run fetch -- --limit 3    # Latest 3 reports
 */

import 'dotenv/config';
import { DEFAULT_REPORT_LIMIT } from '../config.js';
import { fetchListing } from '../fetch.js';
import { parseArgs, parseLimit } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

async function main() {
  const limit = parseLimit(args.limit, DEFAULT_REPORT_LIMIT);
  console.log(`\n=== Fetching report listing ===\n`);

  const listing = await fetchListing(limit);
  for (const item of listing) {
    console.log(`  ${item.report_no}  ${item.occurrence_date_text || '-'}  ${item.investigation_status || '-'}`);
    console.log(`    ${item.title}`);
  }

  console.log(`\nDone!`);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
