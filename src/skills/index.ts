/**
 * Skill package validation public API.
 */

export type {
  Severity,
  IssueCode,
  RuleCode,
  StructuralIssueCode,
  ValidationIssue,
  SkillPackage,
  Frontmatter,
  FrontmatterMetadata,
  FrontmatterParseResult,
  Reference,
  LoadedPackage,
  PackageResult,
  ReportSummary,
  ValidationReport,
} from './types.js';
export { RULE_CODES, STRUCTURAL_ISSUE_CODES, CONFIGURABLE_RULE_CODES } from './types.js';

export { parseFrontmatter, splitLines } from './parser.js';
export {
  FrontmatterSchema,
  SKILL_NAME_PATTERN,
  VERSION_PATTERN,
  validateFrontmatter,
  validateNameFormat,
  validateNameMatchesDirectory,
  isVersionLike,
} from './manifest.js';
export { SkillScanner, SKILL_DOC_NAME, AUXILIARY_DIRS } from './scanner.js';
export type { ScanResult, ScannedPackage, SkillScannerOptions } from './scanner.js';
export { extractReferences, normalizeTarget, resolvesTo } from './references.js';
export { RULES, runRules, countNonBlankLines, hasTriggerPhrase } from './rules.js';
export type { RuleContext, RuleDefinition, RuleFinding, RuleOptions } from './rules.js';
export {
  buildReport,
  isPassing,
  formatText,
  formatJson,
  formatIssueLine,
  formatSummaryLine,
  toJsonReport,
} from './report.js';
export type { JsonReport } from './report.js';
export { SkillValidator } from './validator.js';
export type { SkillValidatorOptions } from './validator.js';
