/**
 * Result Formatter
 *
 * Renders findings for the CLI, the HTTP API and legacy callers.
 */

import type { Finding } from '../analysis/findings-summarizer.js';
import type { AnalysisRun } from './analysis-orchestrator.js';

/**
 * Wire shape of a finding (snake_case, as exposed by the API).
 */
export interface FindingRecord {
  file_name: string;
  description: string;
}

export function toFindingRecords(findings: Finding[]): FindingRecord[] {
  return findings.map((f) => ({ file_name: f.fileName, description: f.description }));
}

/**
 * Legacy single-string form: `"file: description"` entries joined by commas.
 */
export function formatAsLegacyString(findings: Finding[]): string {
  return findings.map((f) => `${f.fileName}: ${f.description}`).join(',');
}

/**
 * Group findings per file, keeping first-seen file order.
 */
export function groupByFile(findings: Finding[]): Map<string, Finding[]> {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    const group = groups.get(finding.fileName);
    if (group) {
      group.push(finding);
    } else {
      groups.set(finding.fileName, [finding]);
    }
  }
  return groups;
}

/**
 * Format a run as GitHub-flavored markdown.
 */
export function formatAsMarkdown(run: AnalysisRun): string {
  const sections: string[] = [];

  sections.push('## Static Analysis');

  if (run.status === 'aborted') {
    sections.push(`⚠️ Analysis aborted: ${run.abortReason ?? 'unknown reason'}`);
    return sections.join('\n\n');
  }

  if (run.findings.length === 0) {
    sections.push('✅ No errors reported by the validator or the linter.');
    return sections.join('\n\n');
  }

  sections.push(formatAsCompactSummary(run));

  for (const [file, findings] of groupByFile(run.findings)) {
    const lines = findings.map((f) => `- 🔴 ${f.description}`);
    sections.push(`### \`${file}\`\n\n${lines.join('\n')}`);
  }

  return sections.join('\n\n');
}

/**
 * Format as compact summary (for logging or brief display).
 */
export function formatAsCompactSummary(run: AnalysisRun): string {
  if (run.status === 'aborted') {
    return '⚠️ Analysis aborted';
  }
  if (run.findings.length === 0) {
    return '✅ No issues found';
  }

  const files = groupByFile(run.findings).size;
  return `🔴 ${run.findings.length} error(s) in ${files} file(s)`;
}
