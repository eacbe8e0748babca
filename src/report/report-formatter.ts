/**
 * Report rendering for scan results.
 */

import type { ScanResult } from '../scanner/scan-coordinator.js';
import type { Finding } from '../scanner/line-evaluator.js';
import { ScanVerdict } from '../shared/types.js';

export interface ReportOptions {
  /** Config file named in the remediation guidance. Default: .leakguard.json */
  configFileName?: string;
  /** Placeholder suggested in the remediation guidance. */
  placeholder?: string;
}

export const NO_STAGED_FILES_MESSAGE = '✓ No staged files to check';
export const NO_ELIGIBLE_FILES_MESSAGE = '✓ No eligible files to check';
export const DEFAULT_PLACEHOLDER = 'YOUR_API_KEY_HERE';

export function formatFinding(finding: Finding): string {
  return [
    `✗ Potential secret found in ${finding.file}:${finding.line}`,
    `  Pattern: ${finding.category}`,
    `  Context: ${finding.snippet}`,
  ].join('\n');
}

/** Remediation lines printed after a failing report. */
export function remediationGuidance(options: ReportOptions = {}): string[] {
  const configFileName = options.configFileName ?? '.leakguard.json';
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
  return [
    `If these are false positives, add an "allowlist" entry to ${configFileName}`,
    `Or use example placeholders like: ${placeholder}`,
  ];
}

/** Human-readable report: one block per finding, then a summary. */
export function formatReport(result: ScanResult, options: ReportOptions = {}): string {
  if (result.verdict === ScanVerdict.PASS) {
    return result.filesScanned > 0
      ? `✓ Checked ${result.filesScanned} file(s) - no secrets detected`
      : NO_ELIGIBLE_FILES_MESSAGE;
  }

  const blocks = result.findings.map(formatFinding);
  const summary = [
    `❌ Found ${result.findings.length} potential secret(s) in staged files`,
    ...remediationGuidance(options),
  ];

  return [...blocks, summary.join('\n')].join('\n\n');
}

export function formatJson(result: ScanResult): string {
  return JSON.stringify(result, null, 2);
}
