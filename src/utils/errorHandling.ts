/**
 * Helpers for `catch (error)` sites, where the caught value is `unknown`.
 * Child-process failures, axios errors and fs errors all pass through here.
 */

import { ApplicationError } from '../errors/index.js';

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function hasMessage(value: unknown): value is { message: string } {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

export function getErrorMessage(error: unknown): string {
  if (hasMessage(error)) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'An unknown error occurred';
}

/**
 * String code of a Node.js system error (ENOENT, EACCES, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}

/**
 * Metadata for a logger call describing `error`.
 * winston appends a meta `message` to the log line, so the text travels as `error`.
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext: Record<string, unknown> = {}
): Record<string, unknown> {
  if (error instanceof ApplicationError) {
    const { message, ...details } = error.toJSON();
    return { error: message, ...details, ...additionalContext };
  }

  const code = getErrorCode(error);
  return {
    error: getErrorMessage(error),
    ...(isError(error) && error.stack && { stack: error.stack }),
    ...(code && { code }),
    ...additionalContext,
  };
}
