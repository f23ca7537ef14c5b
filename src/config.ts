/**
 * Configuration for the pipeline
 */

import { resolve } from 'node:path';

// ATSB website
export const SITE_BASE_URL = 'https://www.atsb.gov.au';
export const LIST_URL = process.env.REPORTS_LIST_URL || `${SITE_BASE_URL}/aviation-investigation-reports`;
export const REPORT_LINK_PATH = '/publications/investigation_reports/';
export const SITE_NAME_SUFFIX = ' | ATSB';

/**
 * Positive integer from an environment value, or the fallback when unset or invalid
 */
export function positiveIntOr(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Requests
export const REQUEST_TIMEOUT_MS = positiveIntOr(process.env.REQUEST_TIMEOUT_MS, 30000);
export const USER_AGENT = 'Mozilla/5.0 (compatible; aviation-investigation-insights/1.0)';

// Listing and excerpt limits
export const DEFAULT_REPORT_LIMIT = 10;
export const MIN_PARAGRAPH_LENGTH = 40; // Shorter paragraphs are captions/boilerplate
export const MAX_EXCERPT_PARAGRAPHS = 4;

// Output locations, relative to the working directory unless OUTPUT_ROOT is set
export const OUTPUT_ROOT = resolve(process.env.OUTPUT_ROOT || process.cwd());
export const DATA_DIR_NAME = 'data';
export const OUTPUT_DIR_NAME = 'outputs';

// Dashboard
export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js';
