/**
 * Validation run orchestration.
 * Scans a skills root, checks every package and aggregates the report.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { AppConfig, RulesConfig } from '../config/schema.js';
import {
  DEFAULT_MAX_DOCUMENT_LINES,
  DEFAULT_MAX_REFERENCE_LINES,
  DEFAULT_SCRIPT_EXTENSIONS,
} from '../config/constants.js';
import { errorResponse, successResponse, type SkillCheckResponse } from '../errors/index.js';
import type { PackageResult, ValidationIssue, ValidationReport } from './types.js';
import { createIssue, describeReadError, errnoCode, formatLocation } from './issue.js';
import { parseFrontmatter } from './parser.js';
import { buildReport } from './report.js';
import { runRules, type RuleOptions } from './rules.js';
import { SKILL_DOC_NAME, SkillScanner, type ScanResult, type ScannedPackage } from './scanner.js';

/**
 * Options for SkillValidator.
 */
export interface SkillValidatorOptions {
  maxDocumentLines?: number;
  maxReferenceLines?: number;
  scriptExtensions?: readonly string[];
  /** Per-rule severity overrides */
  rules?: RulesConfig;
  /** Debug callback */
  onDebug?: (msg: string, data?: unknown) => void;
}

/**
 * Validates every skill package under a root directory.
 */
export class SkillValidator {
  private readonly scanner: SkillScanner;
  private readonly ruleOptions: RuleOptions;
  private readonly rules: RulesConfig;
  private readonly onDebug?: (msg: string, data?: unknown) => void;

  constructor(options: SkillValidatorOptions = {}) {
    this.onDebug = options.onDebug;
    this.scanner = new SkillScanner({ onDebug: options.onDebug });
    this.rules = options.rules ?? {};
    this.ruleOptions = {
      maxDocumentLines: options.maxDocumentLines ?? DEFAULT_MAX_DOCUMENT_LINES,
      maxReferenceLines: options.maxReferenceLines ?? DEFAULT_MAX_REFERENCE_LINES,
      scriptExtensions: (options.scriptExtensions ?? DEFAULT_SCRIPT_EXTENSIONS).map((ext) =>
        ext.toLowerCase()
      ),
    };
  }

  /**
   * Create a validator from loaded configuration.
   */
  static fromConfig(
    config: AppConfig,
    onDebug?: (msg: string, data?: unknown) => void
  ): SkillValidator {
    return new SkillValidator({
      maxDocumentLines: config.limits.maxDocumentLines,
      maxReferenceLines: config.limits.maxReferenceLines,
      scriptExtensions: config.scripts.extensions,
      rules: config.rules,
      onDebug,
    });
  }

  private debug(msg: string, data?: unknown): void {
    this.onDebug?.(msg, data);
  }

  /**
   * Validate all skill packages under a root directory.
   *
   * @param root - Skills root (relative paths resolve against cwd)
   * @returns The report, or USAGE_ERROR / IO_ERROR when the root cannot be scanned
   */
  async validate(root: string): Promise<SkillCheckResponse<ValidationReport>> {
    const absoluteRoot = resolve(root);

    try {
      const info = await stat(absoluteRoot);
      if (!info.isDirectory()) {
        return errorResponse('USAGE_ERROR', `Skills root is not a directory: ${root}`, root);
      }
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return errorResponse('USAGE_ERROR', `Skills root does not exist: ${root}`, root);
      }
      return errorResponse(
        'IO_ERROR',
        `Cannot access skills root: ${describeReadError(error)}`,
        root
      );
    }

    let scan: ScanResult;
    try {
      scan = await this.scanner.scan(absoluteRoot);
    } catch (error) {
      return errorResponse(
        'IO_ERROR',
        `Cannot list skills root: ${describeReadError(error)}`,
        root
      );
    }

    // Packages are independent; order is restored by buildReport
    const checked = await Promise.all(
      scan.packages.map((scanned) => this.validatePackage(scanned))
    );
    const report = buildReport([...checked, ...scan.rejected]);

    this.debug('Validation complete', { root: absoluteRoot, ...report.summary });
    return successResponse(
      report,
      `Validated ${String(report.summary.packages)} skill directories in ${root}`
    );
  }

  /**
   * Validate one scanned package.
   */
  async validatePackage(scanned: ScannedPackage): Promise<PackageResult> {
    const { pkg } = scanned;
    const loaded = await this.scanner.load(pkg);
    const issues: ValidationIssue[] = [...scanned.issues, ...loaded.issues];

    if (loaded.document === null) {
      return { name: pkg.name, issues };
    }

    const parsed = parseFrontmatter(loaded.document);
    if (!parsed.success) {
      this.debug('Frontmatter parse failed', { skill: pkg.name, code: parsed.code });
      issues.push(
        createIssue(
          pkg.name,
          'error',
          parsed.code,
          parsed.error,
          formatLocation(pkg.name, SKILL_DOC_NAME, parsed.line)
        )
      );
    }

    issues.push(
      ...runRules(
        {
          pkg,
          frontmatter: parsed.success ? parsed.frontmatter : null,
          document: loaded.document,
          body: parsed.success ? parsed.body : loaded.document,
          bodyStartLine: parsed.success ? parsed.bodyStartLine : 1,
          auxiliaryContents: loaded.auxiliaryContents,
          options: this.ruleOptions,
        },
        this.rules
      )
    );

    return { name: pkg.name, issues };
  }
}
