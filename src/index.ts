/**
 * Aviation Investigation Insights
 *
 * Fetches the latest ATSB aviation investigation reports, classifies them
 * with keyword rules, and writes a dataset, a markdown digest and a dashboard.
 */

export { fetchListing, parseListing, parseOccurrenceDate } from './fetch.js';
export { fetchReportDetail, parseDetail } from './detail.js';
export { parseAircraft, parseLocation, parseOperationType } from './extract.js';
export { classifyCause, classifySeverity, CAUSE_RULES, SEVERITY_RULES } from './taxonomy.js';
export { assembleReport, enrichReports } from './enrich.js';
export { summarize, countBy } from './aggregate.js';
export { toCsv, toRecords } from './export.js';
export { renderInsights } from './insights.js';
export { renderDashboard } from './dashboard.js';
export { runPipeline } from './pipeline.js';
export * from './types.js';
