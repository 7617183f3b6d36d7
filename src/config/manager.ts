/**
 * Configuration manager for loading and validating config.
 * Implements hierarchical config merging: defaults < user < project < explicit < env
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { z } from 'zod';

import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './constants.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import { AppConfigSchema, getDefaultConfig, type AppConfig } from './schema.js';
import type {
  ConfigCallbacks,
  ConfigLoadOptions,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigValidationError,
  IFileSystem,
} from './types.js';
import { ConfigError, errorResponse, successResponse } from './types.js';

// -----------------------------------------------------------------------------
// Deep Merge Utility
// -----------------------------------------------------------------------------

/**
 * Check if a value is a plain object (not null, array, or other special types).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Deep merge two objects, with source values overriding target values.
 * Arrays are replaced (not concatenated).
 *
 * @param target - Base object
 * @param source - Object to merge in (overrides target)
 * @returns Merged object
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      // Replace value (including arrays)
      result[key] = sourceValue;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Node.js File System Implementation
// -----------------------------------------------------------------------------

/**
 * Default file system implementation using Node.js fs module.
 */
export class NodeFileSystem implements IFileSystem {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  resolvePath(inputPath: string): string {
    if (inputPath.startsWith('~')) {
      return path.join(os.homedir(), inputPath.slice(1));
    }
    return path.resolve(inputPath);
  }

  joinPath(...segments: string[]): string {
    return path.join(...segments);
  }

  getHomeDir(): string {
    return os.homedir();
  }

  getCwd(): string {
    return process.cwd();
  }
}

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------

/**
 * ConfigManager handles loading and validating configuration.
 *
 * Config hierarchy (highest to lowest priority):
 * 1. Environment variables
 * 2. Explicit config file (--config)
 * 3. Project config (./.skillcheck/settings.json)
 * 4. User config (~/.skillcheck/settings.json)
 * 5. Schema defaults
 *
 * CLI flags are applied by the caller on top of the loaded result.
 */
export class ConfigManager {
  private readonly fileSystem: IFileSystem;
  private readonly envReader: IEnvReader;
  private readonly callbacks?: ConfigCallbacks;
  private readonly userConfigDir: string;
  private readonly projectConfigDirName: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks;
    this.userConfigDir = options.userConfigDir ?? `~/${CONFIG_DIR_NAME}`;
    this.projectConfigDirName = options.projectConfigDirName ?? CONFIG_DIR_NAME;
  }

  /**
   * Get the default configuration with all schema defaults applied.
   */
  getDefaults(): AppConfig {
    return getDefaultConfig();
  }

  /**
   * Get the user config file path.
   */
  getUserConfigPath(): string {
    return this.fileSystem.resolvePath(
      this.fileSystem.joinPath(this.userConfigDir, CONFIG_FILE_NAME)
    );
  }

  /**
   * Get the project config file path.
   * @param projectPath - Optional project root path (defaults to cwd)
   */
  getProjectConfigPath(projectPath?: string): string {
    const root = projectPath ?? this.fileSystem.getCwd();
    return this.fileSystem.joinPath(root, this.projectConfigDirName, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration from a JSON file.
   * @param filePath - Path to the config file
   * @param required - Throw FILE_NOT_FOUND instead of skipping a missing file
   * @returns Parsed object or undefined if the file doesn't exist
   */
  private async loadConfigFile(
    filePath: string,
    required = false
  ): Promise<Record<string, unknown> | undefined> {
    if (!(await this.fileSystem.exists(filePath))) {
      if (required) {
        throw new ConfigError(`Config file not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      }
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.fileSystem.readFile(filePath));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigError(`Invalid JSON in config file: ${filePath}`, 'PARSE_ERROR', filePath);
      }
      throw error;
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigError(
        `Config file must contain a JSON object: ${filePath}`,
        'PARSE_ERROR',
        filePath
      );
    }
    return parsed;
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @returns ConfigResponse with the merged configuration
   */
  async load(options: ConfigLoadOptions = {}): Promise<ConfigResponse<AppConfig>> {
    try {
      let config: Record<string, unknown> = { ...this.getDefaults() };
      this.callbacks?.onConfigLoad?.('defaults');

      const layers: Array<{ source: 'user' | 'project' | 'explicit'; path: string }> = [
        { source: 'user', path: this.getUserConfigPath() },
        { source: 'project', path: this.getProjectConfigPath(options.projectPath) },
      ];
      if (options.configPath !== undefined) {
        layers.push({ source: 'explicit', path: this.fileSystem.resolvePath(options.configPath) });
      }

      for (const layer of layers) {
        const fileConfig = await this.loadConfigFile(layer.path, layer.source === 'explicit');
        if (fileConfig) {
          config = deepMerge(config, fileConfig);
          this.callbacks?.onConfigLoad?.(layer.source, layer.path);
        }
      }

      const envConfig = readEnvConfig(this.envReader);
      if (Object.keys(envConfig).length > 0) {
        config = deepMerge(config, envConfig);
        this.callbacks?.onConfigLoad?.('environment');
      }

      const validated = this.validate(config);
      if (validated.success) {
        this.callbacks?.onConfigLoad?.('merged');
        return successResponse(validated.result, 'Configuration loaded successfully');
      }
      return validated;
    } catch (error) {
      if (error instanceof ConfigError) {
        return errorResponse(error.code, error.message);
      }
      const message = error instanceof Error ? error.message : 'Unknown error loading config';
      return errorResponse('FILE_READ_ERROR', message);
    }
  }

  /**
   * Validate a configuration object.
   * @param config - Configuration to validate
   * @returns ConfigResponse with validation result
   */
  validate(config: unknown): ConfigResponse<AppConfig> {
    const validation = AppConfigSchema.safeParse(config);

    if (!validation.success) {
      const errors = this.formatZodErrors(validation.error);
      this.callbacks?.onValidationError?.(errors);
      const first = errors[0];
      const detail = first !== undefined ? `${first.path}: ${first.message}` : 'Unknown error';
      return errorResponse('VALIDATION_FAILED', `Config validation failed: ${detail}`);
    }

    return successResponse(validation.data, 'Configuration is valid');
  }

  /**
   * Format Zod errors into ConfigValidationError array.
   */
  private formatZodErrors(error: z.ZodError): ConfigValidationError[] {
    return error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
      code: issue.code,
    }));
  }
}

/**
 * Convenience function to load config with default options.
 */
export async function loadConfig(
  options: ConfigLoadOptions = {},
  managerOptions: ConfigManagerOptions = {}
): Promise<ConfigResponse<AppConfig>> {
  const manager = new ConfigManager(managerOptions);
  return manager.load(options);
}
