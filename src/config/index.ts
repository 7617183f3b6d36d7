/**
 * Configuration module public API.
 *
 * @module config
 *
 * @example
 * import { loadConfig } from './config/index.js';
 *
 * const result = await loadConfig({ configPath: './ci/skillcheck.json' });
 * if (result.success) {
 *   console.log('Skills root:', result.result.skillsDir);
 * }
 */

export {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  CONFIG_VERSION,
  DEFAULT_SKILLS_DIR,
  DEFAULT_FORMAT,
  DEFAULT_MAX_DOCUMENT_LINES,
  DEFAULT_MAX_REFERENCE_LINES,
  DEFAULT_SCRIPT_EXTENSIONS,
  OUTPUT_FORMATS,
  LOG_LEVELS,
  RULE_SETTINGS,
} from './constants.js';
export type { OutputFormat, LogLevel, RuleSetting } from './constants.js';

export {
  AppConfigSchema,
  LimitsConfigSchema,
  ScriptsConfigSchema,
  RulesConfigSchema,
  getDefaultConfig,
  parseConfig,
} from './schema.js';
export type { AppConfig, LimitsConfig, ScriptsConfig, RulesConfig } from './schema.js';

export { ProcessEnvReader, readEnvConfig, getEnvVariableNames } from './env.js';
export type { IEnvReader } from './env.js';

export { ConfigManager, NodeFileSystem, deepMerge, isPlainObject, loadConfig } from './manager.js';

export { ConfigError, successResponse, errorResponse } from './types.js';
export type {
  IFileSystem,
  ConfigCallbacks,
  ConfigSource,
  ConfigValidationError,
  ConfigErrorCode,
  ConfigResponse,
  ConfigManagerOptions,
  ConfigLoadOptions,
} from './types.js';
