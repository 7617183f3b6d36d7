/**
 * Constructors for validation issues.
 */

import type { IssueCode, Severity, ValidationIssue } from './types.js';

/**
 * Format an issue location relative to the skills root.
 *
 * @param skillName - Skill directory name
 * @param file - Path inside the skill directory, `/`-separated
 * @param line - Optional 1-based line number
 */
export function formatLocation(skillName: string, file?: string, line?: number): string {
  const path = file !== undefined && file !== '' ? `${skillName}/${file}` : skillName;
  return line !== undefined ? `${path}:${String(line)}` : path;
}

/**
 * Create a frozen validation issue.
 */
export function createIssue(
  skillName: string,
  severity: Severity,
  code: IssueCode,
  message: string,
  location: string | null = null
): ValidationIssue {
  return Object.freeze({ skillName, severity, code, message, location });
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a thrown value.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Human-readable reason for a failed read.
 */
export function describeReadError(error: unknown): string {
  const code = errnoCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return code !== undefined && !message.startsWith(code) ? `${code}: ${message}` : message;
}
