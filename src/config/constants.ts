/**
 * Default configuration values for skillcheck.
 */

// Config file and directory names
export const CONFIG_DIR_NAME = '.skillcheck' as const;
export const CONFIG_FILE_NAME = 'settings.json' as const;
export const CONFIG_VERSION = '1.0' as const;

// Run defaults
export const DEFAULT_SKILLS_DIR = './skills';
export const DEFAULT_STRICT = false;

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export const DEFAULT_FORMAT: OutputFormat = 'text';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// Rule thresholds
export const DEFAULT_MAX_DOCUMENT_LINES = 500;
export const DEFAULT_MAX_REFERENCE_LINES = 200;

/** Extensions treated as executable scripts under scripts/ */
export const DEFAULT_SCRIPT_EXTENSIONS = [
  '.sh',
  '.bash',
  '.zsh',
  '.py',
  '.rb',
  '.pl',
  '.js',
  '.mjs',
  '.cjs',
  '.ts',
] as const;

// Rule severity overrides
export const RULE_SETTINGS = ['error', 'warning', 'off'] as const;
export type RuleSetting = (typeof RULE_SETTINGS)[number];
