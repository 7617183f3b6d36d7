/**
 * Skill package discovery and loading.
 * Walks a skills root and reads each package's files. Never writes.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import type { LoadedPackage, PackageResult, SkillPackage, ValidationIssue } from './types.js';
import { createIssue, describeReadError, errnoCode, formatLocation } from './issue.js';

/** File name of the primary skill document (case-sensitive) */
export const SKILL_DOC_NAME = 'SKILL.md';

/** Subdirectories whose files are recorded as auxiliary files */
export const AUXILIARY_DIRS = ['references', 'scripts'] as const;

/**
 * Options for SkillScanner.
 */
export interface SkillScannerOptions {
  /** Debug callback */
  onDebug?: (msg: string, data?: unknown) => void;
}

/**
 * A discovered package plus any problems found while listing it.
 */
export interface ScannedPackage {
  pkg: SkillPackage;
  issues: ValidationIssue[];
}

/**
 * Result of scanning a skills root.
 */
export interface ScanResult {
  /** Directories containing SKILL.md, sorted by name */
  packages: ScannedPackage[];
  /** Directories excluded from rule checks, with the issues explaining why */
  rejected: PackageResult[];
}

/**
 * Discovers skill packages under a root directory and reads their contents.
 */
export class SkillScanner {
  private readonly onDebug?: (msg: string, data?: unknown) => void;

  constructor(options: SkillScannerOptions = {}) {
    this.onDebug = options.onDebug;
  }

  private debug(msg: string, data?: unknown): void {
    this.onDebug?.(msg, data);
  }

  /**
   * Scan the immediate subdirectories of a skills root.
   * Dot-directories and plain files at the root are ignored.
   *
   * @param root - Absolute path of the skills root
   * @throws Error if the root itself cannot be listed
   */
  async scan(root: string): Promise<ScanResult> {
    const entries = await readdir(root, { withFileTypes: true });
    const packages: ScannedPackage[] = [];
    const rejected: PackageResult[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const directory = join(root, entry.name);
      if (!(await this.isDirectory(entry, directory))) continue;

      this.debug('Scanning skill directory', { directory });
      const result = await this.scanSkillDirectory(directory, entry.name);
      if ('pkg' in result) {
        packages.push(result);
      } else {
        rejected.push({ name: entry.name, issues: result.issues });
      }
    }

    packages.sort((a, b) => compareNames(a.pkg.name, b.pkg.name));
    rejected.sort((a, b) => compareNames(a.name, b.name));

    this.debug('Scan complete', { packages: packages.length, rejected: rejected.length });
    return { packages, rejected };
  }

  /**
   * Inspect one skill directory.
   */
  private async scanSkillDirectory(
    directory: string,
    name: string
  ): Promise<ScannedPackage | { issues: ValidationIssue[] }> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      return {
        issues: [
          createIssue(
            name,
            'error',
            'UnreadableFile',
            `Cannot list skill directory: ${describeReadError(error)}`,
            formatLocation(name)
          ),
        ],
      };
    }

    const docEntry = entries.find((entry) => entry.name === SKILL_DOC_NAME);
    const documentPath = join(directory, SKILL_DOC_NAME);
    if (docEntry === undefined || !(await this.isFile(docEntry, documentPath))) {
      const caseVariant = entries.find(
        (entry) =>
          entry.name !== SKILL_DOC_NAME && entry.name.toUpperCase() === SKILL_DOC_NAME.toUpperCase()
      );
      const hint =
        caseVariant !== undefined
          ? ` (found ${caseVariant.name}; the file name is case-sensitive)`
          : '';
      this.debug('No SKILL.md found', { directory });
      return {
        issues: [
          createIssue(
            name,
            'error',
            'MissingSkillDoc',
            `No ${SKILL_DOC_NAME} found in skill directory${hint}`,
            formatLocation(name)
          ),
        ],
      };
    }

    const auxiliaryFiles: string[] = [];
    const issues: ValidationIssue[] = [];
    for (const sub of AUXILIARY_DIRS) {
      const listed = await this.listAuxiliaryDir(directory, name, sub);
      auxiliaryFiles.push(...listed.files);
      issues.push(...listed.issues);
    }

    return {
      pkg: {
        name,
        directory,
        documentPath,
        auxiliaryFiles: auxiliaryFiles.sort(),
      },
      issues,
    };
  }

  /**
   * List the files directly under scripts/ or references/.
   */
  private async listAuxiliaryDir(
    directory: string,
    name: string,
    sub: string
  ): Promise<{ files: string[]; issues: ValidationIssue[] }> {
    const subDir = join(directory, sub);
    let entries: Dirent[];
    try {
      entries = await readdir(subDir, { withFileTypes: true });
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return { files: [], issues: [] };
      }
      return {
        files: [],
        issues: [
          createIssue(
            name,
            'error',
            'UnreadableFile',
            `Cannot list ${sub}/: ${describeReadError(error)}`,
            formatLocation(name, sub)
          ),
        ],
      };
    }

    const files: string[] = [];
    for (const entry of entries) {
      if (await this.isFile(entry, join(subDir, entry.name))) {
        files.push(`${sub}/${entry.name}`);
      }
    }
    return { files, issues: [] };
  }

  /**
   * Read SKILL.md and every auxiliary file of a package.
   * Read failures become UnreadableFile issues; binary files are listed but
   * their contents are not kept.
   */
  async load(pkg: SkillPackage): Promise<LoadedPackage> {
    const issues: ValidationIssue[] = [];

    let document: string | null = null;
    try {
      document = await readFile(pkg.documentPath, 'utf-8');
    } catch (error) {
      issues.push(
        createIssue(
          pkg.name,
          'error',
          'UnreadableFile',
          `Cannot read ${SKILL_DOC_NAME}: ${describeReadError(error)}`,
          formatLocation(pkg.name, SKILL_DOC_NAME)
        )
      );
    }

    const auxiliaryContents = new Map<string, string>();
    for (const file of pkg.auxiliaryFiles) {
      try {
        const content = await readFile(join(pkg.directory, file), 'utf-8');
        if (isBinary(content)) {
          this.debug('Skipping binary auxiliary file', { skill: pkg.name, file });
          continue;
        }
        auxiliaryContents.set(file, content);
      } catch (error) {
        issues.push(
          createIssue(
            pkg.name,
            'error',
            'UnreadableFile',
            `Cannot read ${file}: ${describeReadError(error)}`,
            formatLocation(pkg.name, file)
          )
        );
      }
    }

    return { pkg, document, auxiliaryContents, issues };
  }

  private async isDirectory(entry: Dirent, fullPath: string): Promise<boolean> {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
      return (await stat(fullPath)).isDirectory();
    } catch {
      // Dangling symlink
      return false;
    }
  }

  private async isFile(entry: Dirent, fullPath: string): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
      return (await stat(fullPath)).isFile();
    } catch {
      // Dangling symlink
      return false;
    }
  }
}

/**
 * Order names by UTF-16 code units so the result does not depend on locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Text containing a NUL byte is treated as binary.
 */
export function isBinary(content: string): boolean {
  return content.includes('\u0000');
}
