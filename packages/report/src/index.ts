/**
 * @transcode-mirror/report
 *
 * Read-only comparison of source and destination trees.
 */

export {
  compareTrees,
  buildReport,
  reportExitCode,
  type CompareOptions,
  type ComparisonReport,
  type ReportBuckets,
  type ReportEntry,
  type FailedEntry,
  type ReportSummary,
} from './comparator.js';

export { planActions, type ActionPlan } from './planner.js';

export {
  formatReport,
  formatText,
  formatJson,
  formatCsv,
  csvField,
  REPORT_FORMATS,
  type ReportFormat,
  type FormatOptions,
} from './formatters.js';
