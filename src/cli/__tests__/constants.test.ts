/**
 * Tests for CLI constants and utility functions.
 */

import { describe, expect, it } from '@jest/globals';
import { EXIT_CODES, HELP_TEXT, exitCodeForError } from '../constants.js';

describe('CLI Constants', () => {
  describe('EXIT_CODES', () => {
    it('should define the documented exit codes', () => {
      expect(EXIT_CODES.SUCCESS).toBe(0);
      expect(EXIT_CODES.VALIDATION_FAILED).toBe(1);
      expect(EXIT_CODES.USAGE_ERROR).toBe(2);
    });
  });

  describe('exitCodeForError', () => {
    it('should exit with 2 when no report could be produced', () => {
      expect(exitCodeForError('USAGE_ERROR')).toBe(2);
      expect(exitCodeForError('CONFIG_ERROR')).toBe(2);
      expect(exitCodeForError('IO_ERROR')).toBe(2);
    });

    it('should exit with 1 for unexpected errors', () => {
      expect(exitCodeForError('UNKNOWN')).toBe(1);
    });
  });

  describe('HELP_TEXT', () => {
    it('should document every flag', () => {
      for (const flag of ['--strict', '--format', '--config', '--verbose', '--help']) {
        expect(HELP_TEXT).toContain(flag);
      }
    });
  });
});
