/**
 * Type definitions for skill package validation.
 */

/**
 * Severity of a validation issue. Errors fail the run; warnings fail it only
 * under --strict.
 */
export type Severity = 'error' | 'warning';

/**
 * Issue codes raised by the scanner and the frontmatter parser.
 * These always run and cannot be reconfigured.
 */
export const STRUCTURAL_ISSUE_CODES = [
  'MissingSkillDoc',
  'UnreadableFile',
  'MissingFrontmatter',
  'UnterminatedFrontmatter',
  'MalformedFrontmatter',
] as const;

/**
 * Rule codes in evaluation order. Issues within a package are emitted in this order.
 */
export const RULE_CODES = [
  'MissingRequiredField',
  'NameMismatch',
  'NoTriggerPhrase',
  'DocumentTooLong',
  'ReferenceTooLong',
  'BrokenReference',
  'MissingVersion',
  'ScriptMissingShebang',
  'InvalidNameFormat',
  'InvalidVersion',
] as const;

/** Rules whose severity can be overridden (or turned off) in config */
export const CONFIGURABLE_RULE_CODES = RULE_CODES;

export type StructuralIssueCode = (typeof STRUCTURAL_ISSUE_CODES)[number];
export type RuleCode = (typeof RULE_CODES)[number];
export type IssueCode = StructuralIssueCode | RuleCode;

/**
 * Frontmatter parse failures.
 */
export type FrontmatterErrorCode = Extract<
  StructuralIssueCode,
  'MissingFrontmatter' | 'UnterminatedFrontmatter' | 'MalformedFrontmatter'
>;

/**
 * One detected violation. Never mutated after creation.
 */
export interface ValidationIssue {
  readonly skillName: string;
  readonly severity: Severity;
  readonly code: IssueCode;
  readonly message: string;
  /** `<skill>/<file>[:<line>]` relative to the skills root, or null */
  readonly location: string | null;
}

/**
 * One skill directory discovered by the scanner.
 */
export interface SkillPackage {
  /** Directory name */
  readonly name: string;
  /** Absolute path of the skill directory */
  readonly directory: string;
  /** Absolute path to SKILL.md */
  readonly documentPath: string;
  /** Files under scripts/ and references/, relative and `/`-separated, sorted */
  readonly auxiliaryFiles: readonly string[];
}

/**
 * Parsed metadata block of the frontmatter.
 */
export interface FrontmatterMetadata {
  author?: string;
  version?: string;
  [key: string]: unknown;
}

/**
 * Parsed SKILL.md header block. Unknown keys are preserved.
 */
export interface Frontmatter {
  name?: string;
  description?: string;
  license?: string;
  metadata?: FrontmatterMetadata;
  [key: string]: unknown;
}

/**
 * Result of parsing a SKILL.md document.
 */
export type FrontmatterParseResult =
  | {
      success: true;
      frontmatter: Frontmatter;
      /** Markdown after the closing delimiter */
      body: string;
      /** 1-based document line on which the body starts */
      bodyStartLine: number;
    }
  | {
      success: false;
      code: FrontmatterErrorCode;
      error: string;
      /** 1-based line the failure refers to, when known */
      line?: number;
    };

/**
 * How a reference was found in the document.
 */
export type ReferenceKind = 'link' | 'mention';

/**
 * A link target found in the primary document.
 */
export interface Reference {
  /** Target as written */
  raw: string;
  /** Normalized path relative to the skill directory */
  target: string;
  /** 1-based line in SKILL.md */
  line: number;
  kind: ReferenceKind;
  /** Whether the reference sits under a "References" heading */
  inReferencesSection: boolean;
}

/**
 * Contents of a package as read from disk.
 */
export interface LoadedPackage {
  pkg: SkillPackage;
  /** SKILL.md text, or null when it could not be read */
  document: string | null;
  /** Text of readable, non-binary auxiliary files keyed by relative path */
  auxiliaryContents: ReadonlyMap<string, string>;
  /** Read failures found while loading */
  issues: ValidationIssue[];
}

/**
 * Summary counts for a report.
 */
export interface ReportSummary {
  errors: number;
  warnings: number;
  packagesWithErrors: number;
  packages: number;
}

/**
 * Ordered result of one validation run.
 */
export interface ValidationReport {
  readonly issues: readonly ValidationIssue[];
  readonly summary: ReportSummary;
  /** True when no error-severity issues were found */
  readonly passed: boolean;
}

/**
 * Issues collected for one skill directory.
 */
export interface PackageResult {
  /** Directory name used for ordering */
  name: string;
  issues: ValidationIssue[];
}
