/**
 * Unit tests for error types, helpers, and type guards.
 */

import { describe, it, expect } from '@jest/globals';
import {
  successResponse,
  errorResponse,
  isSuccess,
  isError,
  mapConfigErrorCode,
  getUserFriendlyMessage,
} from '../index.js';
import type { SkillCheckErrorCode, SkillCheckResponse } from '../index.js';

describe('SkillCheck Error Types', () => {
  describe('successResponse', () => {
    it('creates a success response with result and message', () => {
      expect(successResponse({ count: 2 }, 'Validated')).toEqual({
        success: true,
        result: { count: 2 },
        message: 'Validated',
      });
    });
  });

  describe('errorResponse', () => {
    it('creates an error response with code and message', () => {
      expect(errorResponse('IO_ERROR', 'Cannot list')).toEqual({
        success: false,
        error: 'IO_ERROR',
        message: 'Cannot list',
      });
    });

    it('includes the path when given', () => {
      const response = errorResponse('USAGE_ERROR', 'Missing root', './skills');
      expect(response.path).toBe('./skills');
    });

    it('omits the path key when not given', () => {
      expect('path' in errorResponse('UNKNOWN', 'Oops')).toBe(false);
    });
  });

  describe('type guards', () => {
    const ok: SkillCheckResponse<number> = successResponse(1, 'ok');
    const failed: SkillCheckResponse<number> = errorResponse('UNKNOWN', 'failed');

    it('isSuccess narrows success responses', () => {
      expect(isSuccess(ok)).toBe(true);
      expect(isSuccess(failed)).toBe(false);
      if (isSuccess(ok)) {
        expect(ok.result).toBe(1);
      }
    });

    it('isError narrows error responses', () => {
      expect(isError(failed)).toBe(true);
      expect(isError(ok)).toBe(false);
      if (isError(failed)) {
        expect(failed.error).toBe('UNKNOWN');
      }
    });
  });

  describe('mapConfigErrorCode', () => {
    it('maps a missing explicit config file to a usage error', () => {
      expect(mapConfigErrorCode('FILE_NOT_FOUND')).toBe('USAGE_ERROR');
    });

    it.each(['VALIDATION_FAILED', 'FILE_READ_ERROR', 'PARSE_ERROR'] as const)(
      'maps %s to CONFIG_ERROR',
      (code) => {
        expect(mapConfigErrorCode(code)).toBe('CONFIG_ERROR');
      }
    );
  });

  describe('getUserFriendlyMessage', () => {
    it.each<[SkillCheckErrorCode, string]>([
      ['USAGE_ERROR', 'Run with --help to see usage.'],
      ['CONFIG_ERROR', 'Check .skillcheck/settings.json and SKILLCHECK_* environment variables.'],
      ['IO_ERROR', 'Check that the skills directory is readable.'],
      ['UNKNOWN', 'An unexpected error occurred.'],
    ])('returns a hint for %s', (code, hint) => {
      expect(getUserFriendlyMessage(code)).toBe(hint);
    });
  });
});
