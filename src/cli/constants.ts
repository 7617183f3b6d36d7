/**
 * CLI exit codes and help text.
 */

import type { SkillCheckErrorCode } from '../errors/index.js';

/** Standard exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  VALIDATION_FAILED: 1,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for a run-level failure (no report was produced).
 */
export function exitCodeForError(error: SkillCheckErrorCode): ExitCode {
  const mapping: Record<SkillCheckErrorCode, ExitCode> = {
    USAGE_ERROR: EXIT_CODES.USAGE_ERROR,
    CONFIG_ERROR: EXIT_CODES.USAGE_ERROR,
    IO_ERROR: EXIT_CODES.USAGE_ERROR,
    UNKNOWN: EXIT_CODES.GENERAL_ERROR,
  };
  return mapping[error];
}

export const HELP_TEXT = `
  Usage
    $ skillcheck [root] [options]

  Arguments
    root                   Skills directory (default: ./skills or config skillsDir)

  Options
    --strict               Treat warnings as failures
    --format <text|json>   Report format (default: text)
    --config <path>        Load an additional config file
    --verbose              Print debug logging to stderr
    --version              Show version
    --help                 Show this help

  Exit codes
    0  no errors (and no warnings under --strict)
    1  errors found (or warnings under --strict)
    2  usage or configuration error

  Examples
    $ skillcheck
    $ skillcheck ./skills --strict
    $ skillcheck --format=json > report.json
`;
