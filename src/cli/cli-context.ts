/**
 * CLI context adapter for running command handlers from the terminal.
 * Provides console output with colors and config loading.
 */

import {
  loadConfig,
  type AppConfig,
  type ConfigManagerOptions,
  type LogLevel,
} from '../config/index.js';
import {
  errorResponse,
  mapConfigErrorCode,
  successResponse,
  type SkillCheckResponse,
} from '../errors/index.js';
import type { CommandContext, OutputType } from './commands/types.js';
import type { CLIFlags } from './types.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
};

const typeColors: Record<OutputType, string> = {
  success: colors.green,
  warning: colors.yellow,
  error: colors.red,
  info: colors.cyan,
};

/**
 * Output types written at each log level. Untyped output is report content
 * and is always written, as are errors.
 */
const visibleTypes: Record<LogLevel, readonly OutputType[]> = {
  debug: ['success', 'warning', 'error', 'info'],
  info: ['success', 'warning', 'error', 'info'],
  warn: ['warning', 'error'],
  error: ['error'],
};

/**
 * Minimal writable stream surface used for output.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * Wrap content in a color when writing to a terminal.
 */
export function colorize(content: string, color: string | undefined, stream: OutputStream): string {
  if (color === undefined || stream.isTTY !== true) {
    return content;
  }
  return `${color}${content}${colors.reset}`;
}

/**
 * Create the output callback.
 * Errors go to stderr; everything else, including report lines, to stdout.
 * Untyped output is written without color so JSON stays parseable.
 * Typed output below the log level is dropped.
 */
export function createOutput(
  stdout: OutputStream = process.stdout,
  stderr: OutputStream = process.stderr,
  logLevel: LogLevel = 'info'
): CommandContext['onOutput'] {
  const visible = visibleTypes[logLevel];
  return (content, type) => {
    if (type !== undefined && !visible.includes(type)) {
      return;
    }
    const stream = type === 'error' ? stderr : stdout;
    const color = type !== undefined ? typeColors[type] : undefined;
    stream.write(`${colorize(content, color, stream)}\n`);
  };
}

/**
 * Create the debug callback, writing dimmed lines to stderr.
 */
export function createDebugLogger(
  stderr: OutputStream = process.stderr
): (msg: string, data?: unknown) => void {
  return (msg, data) => {
    const suffix = data !== undefined ? ` ${JSON.stringify(data)}` : '';
    stderr.write(`${colorize(`[debug] ${msg}${suffix}`, colors.dim, stderr)}\n`);
  };
}

/**
 * Options for createCliContext.
 */
export interface CliContextOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Passed to ConfigManager (file system, env reader, config dirs) */
  configManager?: ConfigManagerOptions;
}

/**
 * Load configuration and create a CommandContext for CLI usage.
 * Debug logging is enabled by --verbose or logLevel "debug".
 */
export async function createCliContext(
  flags: CLIFlags,
  options: CliContextOptions = {}
): Promise<SkillCheckResponse<CommandContext>> {
  const stderr = options.stderr ?? process.stderr;
  const earlyDebug = flags.verbose === true ? createDebugLogger(stderr) : undefined;

  const configResult = await loadConfig(
    { configPath: flags.config },
    {
      ...options.configManager,
      callbacks: {
        onConfigLoad: (source, path) => earlyDebug?.('Config layer loaded', { source, path }),
      },
    }
  );
  if (!configResult.success) {
    return errorResponse(mapConfigErrorCode(configResult.error), configResult.message);
  }

  return successResponse(
    createCliContextWithConfig(configResult.result, flags, options),
    configResult.message
  );
}

/**
 * Create a CLI context with a preloaded config.
 */
export function createCliContextWithConfig(
  config: AppConfig,
  flags: CLIFlags = {},
  options: CliContextOptions = {}
): CommandContext {
  const verbose = flags.verbose === true || config.logLevel === 'debug';
  return {
    config,
    onOutput: createOutput(options.stdout, options.stderr, config.logLevel),
    onDebug: verbose ? createDebugLogger(options.stderr) : undefined,
  };
}
