/**
 * Structural rules for skill packages.
 *
 * Rules are independent: each one inspects the package and reports its own
 * findings, and no rule's outcome gates another. Rules that read frontmatter
 * fields are skipped when the frontmatter could not be parsed.
 */

import { extname } from 'node:path';
import type { RulesConfig } from '../config/schema.js';
import type { Frontmatter, RuleCode, Severity, SkillPackage, ValidationIssue } from './types.js';
import { createIssue, formatLocation } from './issue.js';
import { isVersionLike, validateNameFormat, validateNameMatchesDirectory } from './manifest.js';
import { splitLines } from './parser.js';
import { extractReferences, resolvesTo } from './references.js';
import { SKILL_DOC_NAME } from './scanner.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Thresholds and settings the rules read.
 */
export interface RuleOptions {
  maxDocumentLines: number;
  maxReferenceLines: number;
  /** Lower-case extensions, with the leading dot */
  scriptExtensions: readonly string[];
}

/**
 * Everything a rule may inspect for one package.
 */
export interface RuleContext {
  pkg: SkillPackage;
  /** Parsed frontmatter, or null when parsing failed */
  frontmatter: Frontmatter | null;
  /** Full SKILL.md text */
  document: string;
  /** Markdown after the frontmatter (the whole document when parsing failed) */
  body: string;
  /** Document line number of the first body line */
  bodyStartLine: number;
  /** Readable text files under scripts/ and references/ */
  auxiliaryContents: ReadonlyMap<string, string>;
  options: RuleOptions;
}

/**
 * A single rule finding, before severity is applied.
 */
export interface RuleFinding {
  message: string;
  location: string | null;
}

/**
 * A rule and its default severity.
 */
export interface RuleDefinition {
  code: RuleCode;
  defaultSeverity: Severity;
  /** Skip the rule when the frontmatter failed to parse */
  needsFrontmatter: boolean;
  check(context: RuleContext): RuleFinding[];
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/** Frontmatter fields every skill must set */
export const REQUIRED_FIELDS = ['name', 'description', 'license'] as const;

const DOUBLE_QUOTED = /"[^"\n]+"|“[^”\n]+”/;
const SINGLE_QUOTED = /(?:^|[\s(\[:])'[^'\n]+'(?=$|[\s.,;:!?)\]])|‘[^’\n]+’/;
const COMMA_LIST = /[^\s,][^,]*,\s*[^\s,]/;

/**
 * Count lines containing anything other than whitespace.
 */
export function countNonBlankLines(text: string): number {
  return splitLines(text).filter((line) => line.trim() !== '').length;
}

/**
 * Whether a description names trigger phrases: a quoted substring or a
 * comma-separated list.
 */
export function hasTriggerPhrase(description: string): boolean {
  return (
    DOUBLE_QUOTED.test(description) ||
    SINGLE_QUOTED.test(description) ||
    COMMA_LIST.test(description)
  );
}

/**
 * Find the document line declaring a frontmatter key.
 * With `parent`, only indented keys inside that top-level mapping match.
 */
export function findFrontmatterLine(
  document: string,
  key: string,
  parent?: string
): number | undefined {
  const lines = splitLines(document);
  const topLevel = new RegExp(`^${key}\\s*:`);
  const nestedKey = new RegExp(`^\\s+${key}\\s*:`);
  const parentKey = parent !== undefined ? new RegExp(`^${parent}\\s*:`) : undefined;
  let inParent = false;

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line === '---') return undefined;
    if (parentKey === undefined) {
      if (topLevel.test(line)) return i + 1;
      continue;
    }
    if (/^\S/.test(line)) {
      inParent = parentKey.test(line);
    } else if (inParent && nestedKey.test(line)) {
      return i + 1;
    }
  }
  return undefined;
}

function presentString(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

function docLocation(context: RuleContext, line?: number): string {
  return formatLocation(context.pkg.name, SKILL_DOC_NAME, line);
}

// -----------------------------------------------------------------------------
// Rules
// -----------------------------------------------------------------------------

const missingRequiredField: RuleDefinition = {
  code: 'MissingRequiredField',
  defaultSeverity: 'error',
  needsFrontmatter: true,
  check(context) {
    const frontmatter: Frontmatter = context.frontmatter ?? {};
    return REQUIRED_FIELDS.filter((field) => !presentString(frontmatter[field])).map((field) => ({
      message: `Required frontmatter field "${field}" is missing or empty`,
      location: docLocation(context),
    }));
  },
};

const nameMismatch: RuleDefinition = {
  code: 'NameMismatch',
  defaultSeverity: 'error',
  needsFrontmatter: true,
  check(context) {
    const name = context.frontmatter?.name;
    if (!presentString(name)) return [];
    const message = validateNameMatchesDirectory(name, context.pkg.name);
    if (message === undefined) return [];
    const line = findFrontmatterLine(context.document, 'name');
    return [{ message, location: docLocation(context, line) }];
  },
};

const noTriggerPhrase: RuleDefinition = {
  code: 'NoTriggerPhrase',
  defaultSeverity: 'warning',
  needsFrontmatter: true,
  check(context) {
    const description = context.frontmatter?.description;
    if (!presentString(description) || hasTriggerPhrase(description)) return [];
    return [
      {
        message:
          'Description has no trigger phrase; quote the phrases that should activate the skill or list them separated by commas',
        location: docLocation(context, findFrontmatterLine(context.document, 'description')),
      },
    ];
  },
};

const documentTooLong: RuleDefinition = {
  code: 'DocumentTooLong',
  defaultSeverity: 'warning',
  needsFrontmatter: false,
  check(context) {
    const count = countNonBlankLines(context.document);
    const limit = context.options.maxDocumentLines;
    if (count <= limit) return [];
    return [
      {
        message: `${SKILL_DOC_NAME} has ${String(count)} non-blank lines (limit ${String(limit)}); move detail into references/`,
        location: docLocation(context),
      },
    ];
  },
};

const referenceTooLong: RuleDefinition = {
  code: 'ReferenceTooLong',
  defaultSeverity: 'warning',
  needsFrontmatter: false,
  check(context) {
    const limit = context.options.maxReferenceLines;
    const findings: RuleFinding[] = [];
    for (const file of context.pkg.auxiliaryFiles) {
      if (!file.startsWith('references/')) continue;
      const content = context.auxiliaryContents.get(file);
      if (content === undefined) continue;
      const count = countNonBlankLines(content);
      if (count > limit) {
        findings.push({
          message: `${file} has ${String(count)} non-blank lines (limit ${String(limit)})`,
          location: formatLocation(context.pkg.name, file),
        });
      }
    }
    return findings;
  },
};

const brokenReference: RuleDefinition = {
  code: 'BrokenReference',
  defaultSeverity: 'error',
  needsFrontmatter: false,
  check(context) {
    return extractReferences(context.body, context.bodyStartLine)
      .filter((reference) => !resolvesTo(reference.target, context.pkg.auxiliaryFiles))
      .map((reference) => ({
        message: `Reference "${reference.raw}" does not resolve to a file in references/ or scripts/`,
        location: docLocation(context, reference.line),
      }));
  },
};

const missingVersion: RuleDefinition = {
  code: 'MissingVersion',
  defaultSeverity: 'warning',
  needsFrontmatter: true,
  check(context) {
    if (presentString(context.frontmatter?.metadata?.version)) return [];
    return [{ message: 'Frontmatter has no metadata.version', location: docLocation(context) }];
  },
};

const scriptMissingShebang: RuleDefinition = {
  code: 'ScriptMissingShebang',
  defaultSeverity: 'warning',
  needsFrontmatter: false,
  check(context) {
    const findings: RuleFinding[] = [];
    for (const file of context.pkg.auxiliaryFiles) {
      if (!file.startsWith('scripts/')) continue;
      if (!context.options.scriptExtensions.includes(extname(file).toLowerCase())) continue;
      const content = context.auxiliaryContents.get(file);
      if (content === undefined || content.startsWith('#!')) continue;
      findings.push({
        message: `${file} does not start with an interpreter line (#!)`,
        location: formatLocation(context.pkg.name, file, 1),
      });
    }
    return findings;
  },
};

const invalidNameFormat: RuleDefinition = {
  code: 'InvalidNameFormat',
  defaultSeverity: 'error',
  needsFrontmatter: true,
  check(context) {
    const name = context.frontmatter?.name;
    if (!presentString(name)) return [];
    const message = validateNameFormat(name);
    if (message === undefined) return [];
    const line = findFrontmatterLine(context.document, 'name');
    return [{ message, location: docLocation(context, line) }];
  },
};

const invalidVersion: RuleDefinition = {
  code: 'InvalidVersion',
  defaultSeverity: 'warning',
  needsFrontmatter: true,
  check(context) {
    const version = context.frontmatter?.metadata?.version;
    if (!presentString(version) || isVersionLike(version)) return [];
    return [
      {
        message: `metadata.version "${version}" is not a semantic version (e.g. "1.2.0")`,
        location: docLocation(context, findFrontmatterLine(context.document, 'version', 'metadata')),
      },
    ];
  },
};

/**
 * All rules, in evaluation and emission order.
 */
export const RULES: readonly RuleDefinition[] = [
  missingRequiredField,
  nameMismatch,
  noTriggerPhrase,
  documentTooLong,
  referenceTooLong,
  brokenReference,
  missingVersion,
  scriptMissingShebang,
  invalidNameFormat,
  invalidVersion,
];

/**
 * Resolve the severity a rule runs with, or null when it is turned off.
 */
export function resolveSeverity(
  rule: RuleDefinition,
  overrides: RulesConfig = {}
): Severity | null {
  const setting = overrides[rule.code] ?? rule.defaultSeverity;
  return setting === 'off' ? null : setting;
}

/**
 * Run every applicable rule against one package.
 *
 * @param context - Package contents and rule options
 * @param overrides - Per-rule severity overrides from config
 * @returns Issues in rule order
 */
export function runRules(context: RuleContext, overrides: RulesConfig = {}): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const rule of RULES) {
    if (rule.needsFrontmatter && context.frontmatter === null) continue;
    const severity = resolveSeverity(rule, overrides);
    if (severity === null) continue;
    for (const finding of rule.check(context)) {
      issues.push(
        createIssue(context.pkg.name, severity, rule.code, finding.message, finding.location)
      );
    }
  }
  return issues;
}
