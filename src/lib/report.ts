import type { Issue, Report } from './types';

export type ReportFormat = 'text' | 'json';

function formatIssue(issue: Issue): string {
  return [
    `Issue type: ${issue.type}`,
    `Severity: ${issue.severity}`,
    `Annotations: ${issue.annotations.join(', ')}`,
    `Task: ${issue.task}`,
    `Explanation: ${issue.explanation}`,
  ].join('\n');
}

export function formatReportText(report: Report): string {
  const header = `Found ${report.count} potential issues of types: ${report.types.join(', ')}`;
  if (report.flagged.length === 0) return header + '\n';
  return [header, ...report.flagged.map(formatIssue)].join('\n\n') + '\n';
}

export function formatReportJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}

export function formatReport(report: Report, format: ReportFormat): string {
  return format === 'json' ? formatReportJson(report) : formatReportText(report);
}
