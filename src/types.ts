/**
 * Type definitions for the aviation investigation pipeline
 */

// =============================================================================
// LISTING TYPES
// =============================================================================

export interface ReportSummary {
  report_no: string;
  title: string;
  report_url: string;
  occurrence_date: Date | null;
  occurrence_date_text: string;
  investigation_status: string;
}

// =============================================================================
// DETAIL TYPES
// =============================================================================

export interface DetailPage {
  title: string;
  excerpt: string;
}

export const OPERATION_TYPES = [
  'Helicopter',
  'Air transport',
  'International assistance',
  'General aviation'
] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];

export const CAUSE_CATEGORIES = [
  'Collision with terrain',
  'Near collision / airprox',
  'Ditching / water impact',
  'Mechanical / system issue',
  'Operational event',
  'Other / undetermined'
] as const;

export type CauseCategory = (typeof CAUSE_CATEGORIES)[number];

export const SEVERITIES = ['Fatal', 'Serious injury', 'Injury', 'No injury', 'Unknown'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface ReportDetail extends ReportSummary {
  aircraft: string;
  location: string;
  operation_type: OperationType;
  key_text: string;
  cause_category: CauseCategory;
  severity: Severity;
}

// =============================================================================
// EXPORT TYPES
// =============================================================================

// Same fields as ReportDetail with the date rendered for JSON output
export interface ReportRecord extends Omit<ReportDetail, 'occurrence_date'> {
  occurrence_date: string | null;
}

// =============================================================================
// AGGREGATED DATA TYPES
// =============================================================================

export interface ValueCount<T extends string = string> {
  value: T;
  count: number;
}

export interface DateWindow {
  start: Date | null;
  end: Date | null;
}

export interface InsightsSummary {
  total: number;
  window: DateWindow;
  causes: ValueCount<CauseCategory>[];
  operations: ValueCount<OperationType>[];
  severities: ValueCount<Severity>[];
  locations: ValueCount[];
}
