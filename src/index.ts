#!/usr/bin/env node
/**
 * CLI entry point for skillcheck.
 * Parses command-line arguments with meow and runs the validate command.
 */

import meow from 'meow';
import { createCliContext, createOutput } from './cli/cli-context.js';
import { EXIT_CODES, HELP_TEXT, exitCodeForError } from './cli/constants.js';
import { validateHandler } from './cli/commands/validate.js';
import type { CLIFlags } from './cli/types.js';
import { getUserFriendlyMessage } from './errors/index.js';

const cli = meow(HELP_TEXT, {
  flags: {
    strict: { type: 'boolean', default: false },
    format: { type: 'string', alias: 'f' },
    config: { type: 'string', alias: 'c' },
    verbose: { type: 'boolean', default: false },
  },
});

async function main(): Promise<number> {
  const output = createOutput();

  if (cli.input.length > 1) {
    output(`Expected at most one skills root, got ${String(cli.input.length)}`, 'error');
    output(getUserFriendlyMessage('USAGE_ERROR'), 'info');
    return EXIT_CODES.USAGE_ERROR;
  }

  const flags: CLIFlags = {
    root: cli.input[0],
    strict: cli.flags.strict,
    format: cli.flags.format,
    config: cli.flags.config,
    verbose: cli.flags.verbose,
  };

  const contextResult = await createCliContext(flags);
  if (!contextResult.success) {
    output(contextResult.message, 'error');
    output(getUserFriendlyMessage(contextResult.error), 'info');
    return exitCodeForError(contextResult.error);
  }

  const result = await validateHandler(flags, contextResult.result);
  return result.exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
    createOutput()(`Unexpected failure: ${message}`, 'error');
    process.exitCode = EXIT_CODES.GENERAL_ERROR;
  }
);
