/**
 * Report Module - Public API
 */

export {
  formatReport,
  formatFinding,
  formatJson,
  remediationGuidance,
  NO_STAGED_FILES_MESSAGE,
  NO_ELIGIBLE_FILES_MESSAGE,
  DEFAULT_PLACEHOLDER,
} from './report-formatter.js';
export type { ReportOptions } from './report-formatter.js';
