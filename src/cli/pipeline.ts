#!/usr/bin/env node
/**
 * CLI for running the full pipeline
 *
 * Usage:
 *   npm run pipeline                 # Latest 10 reports
 *   npm run pipeline -- --limit 25   # Latest 25 reports
 */

import 'dotenv/config';
import { DEFAULT_REPORT_LIMIT } from '../config.js';
import { runPipeline } from '../pipeline.js';
import { parseArgs, parseLimit } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

async function main() {
  const limit = parseLimit(args.limit, DEFAULT_REPORT_LIMIT);

  console.log(`\n========================================`);
  console.log(`Running pipeline (latest ${limit} reports)`);
  console.log(`========================================\n`);

  await runPipeline({ limit });

  console.log(`\n========================================`);
  console.log(`Pipeline complete`);
  console.log(`========================================\n`);
}

main().catch((err) => {
  console.error('Pipeline error:', err);
  process.exit(1);
});
