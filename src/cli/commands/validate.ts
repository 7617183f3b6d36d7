/**
 * Validate command handler.
 * Runs the validator over a skills root and prints the report.
 */

import { OUTPUT_FORMATS, type OutputFormat } from '../../config/index.js';
import { getUserFriendlyMessage } from '../../errors/index.js';
import {
  SkillValidator,
  formatIssueLine,
  formatJson,
  formatSummaryLine,
  isPassing,
} from '../../skills/index.js';
import { EXIT_CODES, exitCodeForError } from '../constants.js';
import type { CLIFlags } from '../types.js';
import type { CommandHandler, CommandResult } from './types.js';

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Handler for the validate command (the CLI's only command).
 * Flags override configuration: root > config.skillsDir, --strict, --format.
 */
export const validateHandler: CommandHandler<CLIFlags> = async (
  flags,
  context
): Promise<CommandResult> => {
  const { config } = context;
  const format = flags.format ?? config.format;
  const strict = flags.strict === true || config.strict;
  const root = flags.root ?? config.skillsDir;

  if (!isOutputFormat(format)) {
    const message = `Unknown format "${format}" (expected ${OUTPUT_FORMATS.join(' or ')})`;
    context.onOutput(message, 'error');
    return { success: false, exitCode: EXIT_CODES.USAGE_ERROR, message };
  }

  context.onDebug?.('Validating skills', { root, format, strict });

  const validator = SkillValidator.fromConfig(config, context.onDebug);
  const response = await validator.validate(root);

  if (!response.success) {
    context.onOutput(response.message, 'error');
    context.onOutput(getUserFriendlyMessage(response.error), 'info');
    return {
      success: false,
      exitCode: exitCodeForError(response.error),
      message: response.message,
    };
  }

  const report = response.result;
  const passed = isPassing(report, strict);

  if (format === 'json') {
    context.onOutput(formatJson(report));
  } else {
    for (const issue of report.issues) {
      context.onOutput(formatIssueLine(issue));
    }
    context.onOutput(formatSummaryLine(report));
  }

  return {
    success: passed,
    exitCode: passed ? EXIT_CODES.SUCCESS : EXIT_CODES.VALIDATION_FAILED,
    data: report,
  };
};
