/**
 * Structured error types for skillcheck operations.
 * Provides typed responses for programmatic handling at public boundaries.
 *
 * Problems found in skill content are not errors in this sense: they are
 * reported as ValidationIssues. These codes cover failures that stop a run.
 */

import type { ConfigErrorCode } from '../config/types.js';

// -----------------------------------------------------------------------------
// Error Codes
// -----------------------------------------------------------------------------

/**
 * Error codes for run-level failures.
 */
export type SkillCheckErrorCode =
  | 'USAGE_ERROR' // Bad invocation: root missing, not a directory, unknown flag value
  | 'CONFIG_ERROR' // Configuration could not be loaded or validated
  | 'IO_ERROR' // Skills root could not be listed
  | 'UNKNOWN'; // Unexpected errors

// -----------------------------------------------------------------------------
// Response Types
// -----------------------------------------------------------------------------

/**
 * Success response from an operation.
 */
export interface SkillCheckSuccessResponse<T = unknown> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response from an operation.
 */
export interface SkillCheckErrorResponse {
  success: false;
  error: SkillCheckErrorCode;
  message: string;
  /** Path the failure refers to, when there is one */
  path?: string;
}

/**
 * Discriminated union returned at public boundaries.
 */
export type SkillCheckResponse<T = unknown> =
  | SkillCheckSuccessResponse<T>
  | SkillCheckErrorResponse;

// -----------------------------------------------------------------------------
// Helper Functions
// -----------------------------------------------------------------------------

/**
 * Create a success response.
 *
 * @param result - The result data
 * @param message - Human-readable success message
 */
export function successResponse<T>(result: T, message: string): SkillCheckSuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error response.
 *
 * @param error - Error code
 * @param message - Human-readable error message
 * @param path - Optional path the failure refers to
 */
export function errorResponse(
  error: SkillCheckErrorCode,
  message: string,
  path?: string
): SkillCheckErrorResponse {
  const response: SkillCheckErrorResponse = { success: false, error, message };
  if (path !== undefined) {
    response.path = path;
  }
  return response;
}

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

/**
 * Type guard for success responses.
 */
export function isSuccess<T>(
  response: SkillCheckResponse<T>
): response is SkillCheckSuccessResponse<T> {
  return response.success;
}

/**
 * Type guard for error responses.
 */
export function isError(response: SkillCheckResponse): response is SkillCheckErrorResponse {
  return !response.success;
}

// -----------------------------------------------------------------------------
// Error Mapping Functions
// -----------------------------------------------------------------------------

/**
 * Map a ConfigErrorCode to a SkillCheckErrorCode.
 * Every config failure stops the run before validation starts.
 */
export function mapConfigErrorCode(code: ConfigErrorCode): SkillCheckErrorCode {
  const mapping: Record<ConfigErrorCode, SkillCheckErrorCode> = {
    VALIDATION_FAILED: 'CONFIG_ERROR',
    FILE_NOT_FOUND: 'USAGE_ERROR',
    FILE_READ_ERROR: 'CONFIG_ERROR',
    PARSE_ERROR: 'CONFIG_ERROR',
  };
  return mapping[code];
}

/**
 * Generate a user-facing hint for an error code.
 */
export function getUserFriendlyMessage(error: SkillCheckErrorCode): string {
  switch (error) {
    case 'USAGE_ERROR':
      return 'Run with --help to see usage.';
    case 'CONFIG_ERROR':
      return 'Check .skillcheck/settings.json and SKILLCHECK_* environment variables.';
    case 'IO_ERROR':
      return 'Check that the skills directory is readable.';
    default:
      return 'An unexpected error occurred.';
  }
}
