/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  CONFIG_VERSION,
  DEFAULT_FORMAT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_DOCUMENT_LINES,
  DEFAULT_MAX_REFERENCE_LINES,
  DEFAULT_SCRIPT_EXTENSIONS,
  DEFAULT_SKILLS_DIR,
  DEFAULT_STRICT,
  LOG_LEVELS,
  OUTPUT_FORMATS,
  RULE_SETTINGS,
} from './constants.js';
import { CONFIGURABLE_RULE_CODES } from '../skills/types.js';

/**
 * Line-count thresholds used by the length rules.
 */
export const LimitsConfigSchema = z.object({
  maxDocumentLines: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_DOCUMENT_LINES)
    .describe('Non-blank line limit for SKILL.md'),
  maxReferenceLines: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_REFERENCE_LINES)
    .describe('Non-blank line limit for each file under references/'),
});

export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;

/**
 * Script detection settings.
 */
export const ScriptsConfigSchema = z.object({
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'Extension must look like ".sh"'))
    .default(() => [...DEFAULT_SCRIPT_EXTENSIONS])
    .describe('File extensions under scripts/ that must start with a shebang'),
});

export type ScriptsConfig = z.infer<typeof ScriptsConfigSchema>;

/**
 * Per-rule severity overrides. Only rules listed in CONFIGURABLE_RULE_CODES
 * may be overridden.
 */
export const RulesConfigSchema = z
  .partialRecord(z.enum(CONFIGURABLE_RULE_CODES), z.enum(RULE_SETTINGS))
  .default({})
  .describe('Severity override per rule code');

export type RulesConfig = z.infer<typeof RulesConfigSchema>;

/**
 * Root configuration schema.
 */
export const AppConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION).describe('Configuration schema version'),
  skillsDir: z.string().min(1).default(DEFAULT_SKILLS_DIR).describe('Skills root directory'),
  format: z.enum(OUTPUT_FORMATS).default(DEFAULT_FORMAT).describe('Report output format'),
  strict: z.boolean().default(DEFAULT_STRICT).describe('Treat warnings as failures'),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Diagnostic log level'),
  limits: LimitsConfigSchema.default(() => LimitsConfigSchema.parse({})).describe(
    'Line-count thresholds'
  ),
  scripts: ScriptsConfigSchema.default(() => ScriptsConfigSchema.parse({})).describe(
    'Script detection'
  ),
  rules: RulesConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Get a fully-populated default configuration.
 */
export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Parse and validate a configuration object.
 * Applies schema defaults and returns the parsed config.
 * Unknown fields are stripped by Zod.
 */
export function parseConfig(input: unknown): z.ZodSafeParseResult<AppConfig> {
  return AppConfigSchema.safeParse(input);
}
