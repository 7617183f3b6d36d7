/**
 * TypeScript interfaces and types for configuration management.
 * Provides abstractions for file system, environment, and callbacks.
 */

import type { AppConfig } from './schema.js';
import type { IEnvReader } from './env.js';

export type { IEnvReader } from './env.js';

// -----------------------------------------------------------------------------
// File System Abstraction
// -----------------------------------------------------------------------------

/**
 * Interface for file system operations needed to locate and read config files.
 * Enables dependency injection for testing.
 */
export interface IFileSystem {
  /**
   * Read file contents as string.
   * @throws Error if file doesn't exist or can't be read
   */
  readFile(path: string): Promise<string>;

  /**
   * Check if a file or directory exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Resolve a path, expanding ~ to home directory.
   */
  resolvePath(path: string): string;

  /**
   * Join path segments.
   */
  joinPath(...segments: string[]): string;

  /**
   * Get the user's home directory.
   */
  getHomeDir(): string;

  /**
   * Get the current working directory.
   */
  getCwd(): string;
}

// -----------------------------------------------------------------------------
// Callback Interfaces
// -----------------------------------------------------------------------------

/**
 * Callbacks for configuration events.
 */
export interface ConfigCallbacks {
  /**
   * Called after each configuration layer is merged.
   */
  onConfigLoad?: (source: ConfigSource, path?: string) => void;

  /**
   * Called when a validation error occurs.
   */
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

/**
 * Source of configuration data.
 */
export type ConfigSource = 'defaults' | 'user' | 'project' | 'explicit' | 'environment' | 'merged';

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Validation error details for a specific field.
 */
export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Error codes for configuration errors.
 */
export type ConfigErrorCode =
  | 'VALIDATION_FAILED'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'PARSE_ERROR';

/**
 * Custom error class for configuration failures.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly path?: string;
  public readonly details?: ConfigValidationError[];

  constructor(
    message: string,
    code: ConfigErrorCode,
    path?: string,
    details?: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.path = path;
    this.details = details;

    // Maintain proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// -----------------------------------------------------------------------------
// Response Pattern
// -----------------------------------------------------------------------------

/**
 * Structured response for configuration operations.
 */
export type ConfigResponse<T> =
  | { success: true; result: T; message: string }
  | { success: false; error: ConfigErrorCode; message: string };

/**
 * Create a successful config response.
 */
export function successResponse<T>(result: T, message: string): ConfigResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error config response.
 */
export function errorResponse<T>(error: ConfigErrorCode, message: string): ConfigResponse<T> {
  return { success: false, error, message };
}

// -----------------------------------------------------------------------------
// Config Manager Options
// -----------------------------------------------------------------------------

/**
 * Options for ConfigManager constructor.
 */
export interface ConfigManagerOptions {
  /**
   * File system implementation (defaults to NodeFileSystem).
   */
  fileSystem?: IFileSystem;

  /**
   * Environment reader implementation (defaults to ProcessEnvReader).
   */
  envReader?: IEnvReader;

  /**
   * Event callbacks.
   */
  callbacks?: ConfigCallbacks;

  /**
   * User config directory (defaults to ~/.skillcheck).
   */
  userConfigDir?: string;

  /**
   * Project config directory name (defaults to .skillcheck).
   */
  projectConfigDirName?: string;
}

/**
 * Options for a single ConfigManager.load call.
 */
export interface ConfigLoadOptions {
  /** Project root used to find the project config (defaults to cwd) */
  projectPath?: string;
  /** Explicit config file, merged after the project config */
  configPath?: string;
}

/**
 * Re-exported for consumers that only import from types.
 */
export type { AppConfig };
