/**
 * Tests for report aggregation and formatting.
 */

import { describe, expect, it } from '@jest/globals';
import { createIssue } from '../issue.js';
import {
  buildReport,
  formatIssueLine,
  formatJson,
  formatSummaryLine,
  formatText,
  isPassing,
} from '../report.js';

const missingDoc = createIssue('zeta', 'error', 'MissingSkillDoc', 'No SKILL.md found', 'zeta');
const noVersion = createIssue(
  'alpha',
  'warning',
  'MissingVersion',
  'Frontmatter has no metadata.version',
  'alpha/SKILL.md'
);
const mismatch = createIssue(
  'alpha',
  'error',
  'NameMismatch',
  'Skill name "a" does not match directory name "alpha"',
  'alpha/SKILL.md:2'
);

describe('buildReport', () => {
  it('orders packages by name and keeps issue order within a package', () => {
    const report = buildReport([
      { name: 'zeta', issues: [missingDoc] },
      { name: 'alpha', issues: [mismatch, noVersion] },
      { name: 'beta', issues: [] },
    ]);

    expect(report.issues).toEqual([mismatch, noVersion, missingDoc]);
    expect(report.summary).toEqual({ errors: 2, warnings: 1, packagesWithErrors: 2, packages: 3 });
    expect(report.passed).toBe(false);
  });

  it('does not depend on input order', () => {
    const a = buildReport([
      { name: 'alpha', issues: [mismatch] },
      { name: 'zeta', issues: [missingDoc] },
    ]);
    const b = buildReport([
      { name: 'zeta', issues: [missingDoc] },
      { name: 'alpha', issues: [mismatch] },
    ]);
    expect(a).toEqual(b);
  });

  it('orders names by code unit, not locale', () => {
    const upper = createIssue('Zed', 'warning', 'MissingVersion', 'x');
    const lower = createIssue('apple', 'warning', 'MissingVersion', 'x');
    const report = buildReport([
      { name: 'apple', issues: [lower] },
      { name: 'Zed', issues: [upper] },
    ]);
    expect(report.issues.map((i) => i.skillName)).toEqual(['Zed', 'apple']);
  });

  it('passes an empty run', () => {
    const report = buildReport([]);
    expect(report.passed).toBe(true);
    expect(report.summary).toEqual({ errors: 0, warnings: 0, packagesWithErrors: 0, packages: 0 });
  });

  it('freezes the report', () => {
    const report = buildReport([{ name: 'alpha', issues: [noVersion] }]);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.issues)).toBe(true);
    expect(Object.isFrozen(report.issues[0])).toBe(true);
  });
});

describe('isPassing', () => {
  const warningsOnly = buildReport([{ name: 'alpha', issues: [noVersion] }]);

  it('passes warnings by default', () => {
    expect(isPassing(warningsOnly)).toBe(true);
  });

  it('fails warnings under strict mode', () => {
    expect(isPassing(warningsOnly, true)).toBe(false);
  });

  it('fails errors either way', () => {
    const report = buildReport([{ name: 'zeta', issues: [missingDoc] }]);
    expect(isPassing(report)).toBe(false);
    expect(isPassing(report, true)).toBe(false);
  });
});

describe('text format', () => {
  it('formats an issue with its location', () => {
    expect(formatIssueLine(mismatch)).toBe(
      'ERROR: [alpha] NameMismatch: Skill name "a" does not match directory name "alpha" (alpha/SKILL.md:2)'
    );
  });

  it('omits a missing location', () => {
    const issue = createIssue('alpha', 'warning', 'MissingVersion', 'No version');
    expect(formatIssueLine(issue)).toBe('WARNING: [alpha] MissingVersion: No version');
  });

  it('pluralizes the summary line', () => {
    expect(formatSummaryLine(buildReport([{ name: 'alpha', issues: [noVersion] }]))).toBe(
      'Summary: 0 errors, 1 warning across 1 skill'
    );
    expect(
      formatSummaryLine(
        buildReport([
          { name: 'alpha', issues: [mismatch, noVersion] },
          { name: 'zeta', issues: [missingDoc] },
        ])
      )
    ).toBe('Summary: 2 errors, 1 warning across 2 skills');
  });

  it('ends with the summary line', () => {
    const report = buildReport([{ name: 'zeta', issues: [missingDoc] }]);
    expect(formatText(report)).toEqual([
      'ERROR: [zeta] MissingSkillDoc: No SKILL.md found (zeta)',
      'Summary: 1 error, 0 warnings across 1 skill',
    ]);
  });
});

describe('formatJson', () => {
  it('serializes issues and summary counts', () => {
    const report = buildReport([{ name: 'zeta', issues: [missingDoc] }]);
    expect(JSON.parse(formatJson(report))).toEqual({
      issues: [
        {
          skill: 'zeta',
          severity: 'error',
          code: 'MissingSkillDoc',
          message: 'No SKILL.md found',
          location: 'zeta',
        },
      ],
      summary: { errors: 1, warnings: 0 },
    });
  });

  it('keeps a null location', () => {
    const issue = createIssue('alpha', 'warning', 'MissingVersion', 'No version');
    const report = buildReport([{ name: 'alpha', issues: [issue] }]);
    const parsed: unknown = JSON.parse(formatJson(report));
    expect(parsed).toMatchObject({ issues: [{ location: null }] });
  });

  it('indents with two spaces', () => {
    const lines = formatJson(buildReport([])).split('\n');
    expect(lines).toEqual([
      '{',
      '  "issues": [],',
      '  "summary": {',
      '    "errors": 0,',
      '    "warnings": 0',
      '  }',
      '}',
    ]);
  });
});
