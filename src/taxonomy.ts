/**
 * Keyword taxonomy for cause and severity classification
 *
 * Each table is evaluated top to bottom and the first rule with a keyword
 * found in the text wins, so a report mentioning both "runway" and "engine"
 * is a mechanical issue. Matching is a plain substring test on lower-cased
 * title + excerpt text.
 */

import type { CauseCategory, Severity } from './types.js';

// =============================================================================
// TAXONOMY TYPES
// =============================================================================

export interface KeywordRule<T extends string> {
  label: T;
  keywords: string[];
}

// =============================================================================
// RULE TABLES
// =============================================================================

export const CAUSE_RULES: KeywordRule<CauseCategory>[] = [
  {
    label: 'Collision with terrain',
    keywords: ['collision with terrain', 'controlled flight into terrain', 'cfit']
  },
  {
    label: 'Near collision / airprox',
    keywords: ['near collision', 'proximity event', 'airprox', 'midair']
  },
  {
    label: 'Ditching / water impact',
    keywords: ['ditching', 'water']
  },
  {
    label: 'Mechanical / system issue',
    keywords: ['engine', 'landing gear', 'rotor', 'foreign object', 'f.o.d', 'indication', 'failure']
  },
  {
    label: 'Operational event',
    keywords: ['fuel', 'runway', 'navigation', 'weather', 'vfr', 'imc']
  }
];

export const DEFAULT_CAUSE: CauseCategory = 'Other / undetermined';

// "injur" also covers "no injuries", so the No injury rule only fires on
// text that carries neither stem
export const SEVERITY_RULES: KeywordRule<Severity>[] = [
  { label: 'Fatal', keywords: ['fatal', 'sustained fatal injuries'] },
  { label: 'Serious injury', keywords: ['serious injury'] },
  { label: 'Injury', keywords: ['minor injury', 'injur'] },
  { label: 'No injury', keywords: ['no injuries', 'no injury'] }
];

export const DEFAULT_SEVERITY: Severity = 'Unknown';

// =============================================================================
// CLASSIFIERS
// =============================================================================

/**
 * Label of the first rule whose keywords occur in the text
 */
export function matchFirstRule<T extends string>(
  text: string,
  rules: KeywordRule<T>[],
  fallback: T
): T {
  const lower = text.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some(keyword => lower.includes(keyword))) {
      return rule.label;
    }
  }
  return fallback;
}

export function classifyCause(text: string): CauseCategory {
  return matchFirstRule(text, CAUSE_RULES, DEFAULT_CAUSE);
}

export function classifySeverity(text: string): Severity {
  return matchFirstRule(text, SEVERITY_RULES, DEFAULT_SEVERITY);
}
