/**
 * Derive structured fields from a report title
 *
 * Titles follow the ATSB pattern, e.g.
 * "Collision with terrain involving Cessna 172, VH-ABC, near Mildura, Victoria, on 3 March 2024"
 */

import { clean } from './utils.js';
import { matchFirstRule, type KeywordRule } from './taxonomy.js';
import type { OperationType } from './types.js';

export const UNKNOWN = 'Unknown';

const AIRCRAFT_PATTERN = /involving\s+([^,]+),/i;
const LOCATION_PATTERN = /\b(?:near|at|about|off|west of|east of|south of|north of)\s+(.+?),\s+on\s+\d/i;

// Checked in order; the first rule with a matching keyword wins
const OPERATION_RULES: KeywordRule<OperationType>[] = [
  { label: 'Helicopter', keywords: ['helicopter', 'r44', 'aw139', 'bell', 's-92'] },
  { label: 'Air transport', keywords: ['airbus', 'saab', 'boeing', 'a380'] },
  { label: 'International assistance', keywords: ['accredited representative'] }
];

const DEFAULT_OPERATION: OperationType = 'General aviation';

/**
 * Aircraft named after "involving", up to the next comma
 */
export function parseAircraft(title: string): string {
  const match = title.match(AIRCRAFT_PATTERN);
  return match ? clean(match[1]) : UNKNOWN;
}

/**
 * Place named after a locative preposition, up to the ", on <date>" clause
 */
export function parseLocation(title: string): string {
  const match = title.match(LOCATION_PATTERN);
  return match ? clean(match[1]) : UNKNOWN;
}

export function parseOperationType(title: string): OperationType {
  return matchFirstRule(title, OPERATION_RULES, DEFAULT_OPERATION);
}
