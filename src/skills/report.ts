/**
 * Report aggregation and formatting.
 */

import type { PackageResult, ReportSummary, ValidationIssue, ValidationReport } from './types.js';
import { compareNames } from './scanner.js';

/**
 * Combine per-package results into one report.
 * Packages are ordered by directory name; issues keep their emission order
 * within a package, so the report does not depend on completion order.
 */
export function buildReport(results: readonly PackageResult[]): ValidationReport {
  const ordered = [...results].sort((a, b) => compareNames(a.name, b.name));
  const issues: ValidationIssue[] = ordered.flatMap((result) => result.issues);

  const summary: ReportSummary = {
    errors: issues.filter((issue) => issue.severity === 'error').length,
    warnings: issues.filter((issue) => issue.severity === 'warning').length,
    packagesWithErrors: ordered.filter((result) =>
      result.issues.some((issue) => issue.severity === 'error')
    ).length,
    packages: ordered.length,
  };

  return Object.freeze({
    issues: Object.freeze(issues),
    summary: Object.freeze(summary),
    passed: summary.errors === 0,
  });
}

/**
 * Whether a report passes. Under strict mode warnings fail as well.
 */
export function isPassing(report: ValidationReport, strict = false): boolean {
  return report.passed && (!strict || report.summary.warnings === 0);
}

function plural(count: number, noun: string): string {
  return `${String(count)} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Format one issue as a text line:
 * `<SEVERITY>: [<skill>] <code>: <message> (<location>)`
 */
export function formatIssueLine(issue: ValidationIssue): string {
  const base = `${issue.severity.toUpperCase()}: [${issue.skillName}] ${issue.code}: ${issue.message}`;
  return issue.location !== null ? `${base} (${issue.location})` : base;
}

/**
 * Format the summary line of a text report.
 */
export function formatSummaryLine(report: ValidationReport): string {
  const { errors, warnings, packages } = report.summary;
  return `Summary: ${plural(errors, 'error')}, ${plural(warnings, 'warning')} across ${plural(packages, 'skill')}`;
}

/**
 * Format a report as text lines: one per issue, then the summary.
 */
export function formatText(report: ValidationReport): string[] {
  return [...report.issues.map(formatIssueLine), formatSummaryLine(report)];
}

/**
 * JSON shape of a report.
 */
export interface JsonReport {
  issues: Array<{
    skill: string;
    severity: 'error' | 'warning';
    code: string;
    message: string;
    location: string | null;
  }>;
  summary: { errors: number; warnings: number };
}

/**
 * Convert a report to its JSON shape.
 */
export function toJsonReport(report: ValidationReport): JsonReport {
  return {
    issues: report.issues.map((issue) => ({
      skill: issue.skillName,
      severity: issue.severity,
      code: issue.code,
      message: issue.message,
      location: issue.location,
    })),
    summary: { errors: report.summary.errors, warnings: report.summary.warnings },
  };
}

/**
 * Serialize a report as a single JSON object.
 */
export function formatJson(report: ValidationReport): string {
  return JSON.stringify(toJsonReport(report), null, 2);
}
