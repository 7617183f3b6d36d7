/**
 * Zod schemas for SKILL.md frontmatter.
 *
 * The schema only checks that known fields hold scalar values; whether a field
 * is present, and what it must contain, is decided by the rule engine.
 */

import { z } from 'zod';
import type { Frontmatter } from './types.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** Maximum length for skill name */
export const MAX_SKILL_NAME_LENGTH = 64;

/**
 * Regex pattern for skill names.
 * - Lowercase alphanumeric and hyphens only
 * - Cannot start or end with hyphen
 * - Cannot have consecutive hyphens
 */
export const SKILL_NAME_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

/**
 * Semantic-version-like strings: 1.2, 1.2.3, v1.2.3, 1.2.3-beta.1, 1.2.3+build.5
 */
export const VERSION_PATTERN = /^v?\d+\.\d+(\.\d+)?(-[0-9A-Za-z.-]+)?(\+[0-9A-Za-z.-]+)?$/;

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

/**
 * A YAML scalar read as a string. The parser already keeps number and boolean
 * source text; values passed in directly are stringified. An empty value
 * (`license:`) reads as absent.
 */
export const ScalarStringSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? undefined : String(value)));

/**
 * Schema for the metadata mapping. Unknown keys are kept.
 */
export const MetadataSchema = z
  .union([
    z.looseObject({
      author: ScalarStringSchema.optional(),
      version: ScalarStringSchema.optional(),
    }),
    z.null(),
  ])
  .transform((value) => value ?? undefined)
  .describe('Arbitrary key-value mapping for extensions');

/**
 * Complete frontmatter schema. Unknown keys are preserved, not rejected.
 */
export const FrontmatterSchema = z.looseObject({
  name: ScalarStringSchema.optional().describe('Skill identifier, must match the directory'),
  description: ScalarStringSchema.optional().describe('What the skill does and when to use it'),
  license: ScalarStringSchema.optional().describe('License name or file reference'),
  metadata: MetadataSchema.optional(),
});

// -----------------------------------------------------------------------------
// Validation Functions
// -----------------------------------------------------------------------------

/**
 * Check the shape of a parsed YAML mapping.
 *
 * @param data - Raw mapping (parsed YAML)
 */
export function validateFrontmatter(
  data: unknown
): { success: true; data: Frontmatter } | { success: false; errors: string[] } {
  const result = FrontmatterSchema.safeParse(data);
  if (!result.success) {
    return { success: false, errors: formatValidationErrors(result.error) };
  }
  return { success: true, data: result.data };
}

/**
 * Validate that skill name matches directory name.
 *
 * @returns Error message if mismatch, undefined if valid
 */
export function validateNameMatchesDirectory(
  skillName: string,
  directoryName: string
): string | undefined {
  if (skillName !== directoryName) {
    return `Skill name "${skillName}" does not match directory name "${directoryName}"`;
  }
  return undefined;
}

/**
 * Validate the format of a skill name.
 *
 * @returns Error message if invalid, undefined if valid
 */
export function validateNameFormat(skillName: string): string | undefined {
  if (skillName.length > MAX_SKILL_NAME_LENGTH) {
    return `Skill name cannot exceed ${String(MAX_SKILL_NAME_LENGTH)} characters (got ${String(skillName.length)})`;
  }
  if (!SKILL_NAME_PATTERN.test(skillName)) {
    return `Skill name "${skillName}" must be lowercase alphanumeric with single hyphens (e.g., "my-skill-name")`;
  }
  return undefined;
}

/**
 * Check whether a version string looks like a semantic version.
 */
export function isVersionLike(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

/**
 * Format Zod validation errors into readable messages.
 *
 * @param error - Zod error object
 * @returns Array of formatted error messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}
