/**
 * Command handler interfaces and types.
 */

import type { AppConfig } from '../../config/schema.js';
import type { ExitCode } from '../constants.js';

/** Output styles understood by the CLI context */
export type OutputType = 'info' | 'success' | 'warning' | 'error';

/** Result of a command execution */
export interface CommandResult {
  /** Whether command executed successfully */
  success: boolean;
  /** Process exit code for this result */
  exitCode: ExitCode;
  /** Message to display to user */
  message?: string;
  /** Additional data from command */
  data?: unknown;
}

/** Context passed to command handlers */
export interface CommandContext {
  /** Loaded configuration */
  config: AppConfig;
  /**
   * Callback to display output. Untyped output is report content and is
   * written verbatim.
   */
  onOutput: (content: string, type?: OutputType) => void;
  /** Debug callback, set when verbose logging is enabled */
  onDebug?: (msg: string, data?: unknown) => void;
}

/** Command handler function signature */
export type CommandHandler<TOptions> = (
  options: TOptions,
  context: CommandContext
) => Promise<CommandResult>;
