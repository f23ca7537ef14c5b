/**
 * Utility functions for the pipeline
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { REQUEST_TIMEOUT_MS, USER_AGENT } from './config.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  if (!existsSync(dirPath)) {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Write a UTF-8 text file, overwriting any previous contents
 */
export async function writeText(filePath: string, content: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf-8');
}

/**
 * Write JSON file with pretty printing
 */
export async function writeJson<T>(filePath: string, data: T): Promise<void> {
  await writeText(filePath, JSON.stringify(data, null, 2));
}

/**
 * Collapse whitespace runs to a single space and trim
 */
export function clean(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

const TEXT_NODE = 3;

/**
 * Text of a selection with a space between each descendant text node,
 * so `<br>` and adjacent inline elements do not run words together
 */
export function spacedText<T extends AnyNode>($: CheerioAPI, selection: Cheerio<T>): string {
  const parts: string[] = [];

  const collect = (nodes: Cheerio<AnyNode>): void => {
    nodes.each((_, node) => {
      if (node.nodeType === TEXT_NODE) {
        const text = $(node).text().trim();
        if (text) parts.push(text);
      } else {
        collect($(node).contents());
      }
    });
  };

  collect(selection.contents());
  return clean(parts.join(' '));
}

/**
 * Resolve a possibly relative link against the site it came from
 */
export function absolutize(url: string, base: string): string {
  try {
    return new URL(url, base).toString();
  } catch {
    return url;
  }
}

/**
 * GET a page and return its body, throwing on a non-2xx status
 */
export async function fetchHtml(url: string): Promise<string> {
  const response = await fetch(url, {
    headers: {
      'User-Agent': USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml'
    },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS)
  });

  if (!response.ok) {
    throw new Error(`HTTP error for ${url}: ${response.status} ${response.statusText}`);
  }

  return response.text();
}

/**
 * Parse command line arguments
 * Supports both --key=value and --key value formats
 */
export function parseArgs(args: string[]): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIndex = arg.indexOf('=');
      if (eqIndex !== -1) {
        // --key=value format
        const key = arg.slice(2, eqIndex);
        const value = arg.slice(eqIndex + 1);
        result[key] = value;
      } else {
        // --key value or --flag format
        const key = arg.slice(2);
        const nextArg = args[i + 1];
        if (nextArg && !nextArg.startsWith('--')) {
          result[key] = nextArg;
          i++; // Skip the next arg since we consumed it as a value
        } else {
          result[key] = true;
        }
      }
    }
  }

  return result;
}

/**
 * Read the --limit argument, falling back to the default when absent
 */
export function parseLimit(value: string | boolean | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const limit = Number(value);
  if (typeof value !== 'string' || !Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer (got ${String(value)})`);
  }

  return limit;
}
