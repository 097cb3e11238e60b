/**
 * API error codes.
 * Used in error responses for client handling.
 */
export const ErrorCodes = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  RESOURCE_EXHAUSTED: 'RESOURCE_EXHAUSTED',
  NO_PORT_AVAILABLE: 'NO_PORT_AVAILABLE',
  BUILD_FAILED: 'BUILD_FAILED',
  LAUNCH_FAILED: 'LAUNCH_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  GONE: 'GONE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
