/**
 * Full run: listing, report pages, classification and exports
 */

import { join } from 'node:path';
import { DATA_DIR_NAME, DEFAULT_REPORT_LIMIT, OUTPUT_DIR_NAME, OUTPUT_ROOT } from './config.js';
import { fetchListing } from './fetch.js';
import { enrichReports } from './enrich.js';
import { summarize } from './aggregate.js';
import { toCsv, toRecords } from './export.js';
import { renderInsights } from './insights.js';
import { renderDashboard } from './dashboard.js';
import { ensureDir, writeJson, writeText } from './utils.js';
import type { InsightsSummary, ReportDetail } from './types.js';

export interface PipelineOptions {
  limit?: number;
  rootDir?: string;
}

export interface OutputPaths {
  csv: string;
  json: string;
  insights: string;
  dashboard: string;
}

export interface PipelineResult {
  reports: ReportDetail[];
  summary: InsightsSummary;
  files: OutputPaths;
}

export function outputPaths(rootDir: string): OutputPaths {
  const dataDir = join(rootDir, DATA_DIR_NAME);
  const outDir = join(rootDir, OUTPUT_DIR_NAME);
  return {
    csv: join(dataDir, 'reports.csv'),
    json: join(dataDir, 'reports.json'),
    insights: join(outDir, 'insights.md'),
    dashboard: join(outDir, 'dashboard.html')
  };
}

/**
 * Create the data and outputs directories (no-op when they exist)
 */
export async function setupOutputDirs(rootDir: string): Promise<void> {
  await ensureDir(join(rootDir, DATA_DIR_NAME));
  await ensureDir(join(rootDir, OUTPUT_DIR_NAME));
}

/**
 * Write every export. Runs only after all reports are in hand, so a failed
 * fetch leaves earlier files untouched.
 */
export async function writeOutputs(
  reports: ReportDetail[],
  summary: InsightsSummary,
  files: OutputPaths
): Promise<void> {
  await writeText(files.csv, toCsv(reports));
  await writeJson(files.json, toRecords(reports));
  await writeText(files.insights, renderInsights(summary));
  await writeText(files.dashboard, renderDashboard(summary, reports));
}

/**
 * Main pipeline function
 */
export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineResult> {
  const limit = options.limit ?? DEFAULT_REPORT_LIMIT;
  const rootDir = options.rootDir ?? OUTPUT_ROOT;
  const files = outputPaths(rootDir);

  await setupOutputDirs(rootDir);

  console.log(`[1/3] Fetching latest ${limit} reports...`);
  console.log('----------------------------------------');
  const listing = await fetchListing(limit);
  console.log('');

  console.log(`[2/3] Fetching report pages...`);
  console.log('----------------------------------------');
  const reports = await enrichReports(listing);
  console.log('');

  console.log(`[3/3] Writing outputs...`);
  console.log('----------------------------------------');
  const summary = summarize(reports);
  await writeOutputs(reports, summary, files);

  console.log('Created:');
  for (const path of Object.values(files)) {
    console.log(`- ${path}`);
  }
  console.log(`Top cause category: ${summary.causes[0]?.value ?? 'n/a'}`);

  return { reports, summary, files };
}
