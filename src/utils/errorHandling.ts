/**
 * Error Handling Utilities
 *
 * Type-safe error handling utilities to replace `catch (error)` patterns
 * throughout the codebase. These utilities provide better type safety while
 * maintaining compatibility with unknown error sources.
 */

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard to check if error has a code property
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 * Handles Error objects, objects with message, strings, and unknown values
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error code from unknown error
 * Node.js system errors carry codes such as ENOENT or EXDEV
 */
export function getErrorCode(error: unknown): string | undefined {
  if (hasCode(error)) {
    return error.code;
  }

  return undefined;
}

/**
 * Convert unknown error to Error object
 * Useful when you need to throw or wrap a proper Error
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  if (hasMessage(error)) {
    return new Error(error.message);
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  return new Error('An unknown error occurred');
}

