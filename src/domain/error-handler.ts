/**
 * Error handling and mapping for the weather proxy
 */

import type { AppError, ErrorCode, ErrorResponse } from './types.js';
import { logger } from './logger.js';

export const VALIDATION_MESSAGE = 'Query parameter "location" is required and must not be empty.';
export const NOT_FOUND_MESSAGE = 'Location not found';
export const UPSTREAM_MESSAGE = 'Upstream weather service unavailable';
export const UNEXPECTED_MESSAGE = 'An unexpected error occurred.';

/**
 * Weatherstack error codes that mean the location could not be resolved
 * (601 missing query, 615 request failed for the given query)
 */
const LOCATION_NOT_FOUND_CODES = new Set([601, 615]);

/**
 * Map an error code to the HTTP status the proxy answers with
 */
export function statusForCode(code: ErrorCode): number {
  switch (code) {
    case 'VALIDATION_ERROR':
    case 'TOOL_CALL_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'UPSTREAM_ERROR':
      return 502;
    case 'UNEXPECTED_ERROR':
      return 500;
  }
}

/**
 * Create a structured error
 */
export function createAppError(
  code: ErrorCode,
  message: string,
  details?: AppError['details']
): AppError {
  return {
    code,
    message,
    status: statusForCode(code),
    details,
  };
}

/**
 * Narrow an unknown thrown value to an AppError
 */
export function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'status' in value &&
    typeof value.code === 'string' &&
    typeof value.message === 'string' &&
    typeof value.status === 'number'
  );
}

/**
 * Handle a non-2xx HTTP status from the provider.
 * Every provider status is an upstream failure, a provider 4xx included:
 * the caller of the proxy did nothing wrong.
 */
export function handleHttpError(
  status: number,
  statusText: string,
  requestId?: string
): AppError {
  logger.warn('HTTP error from weather provider', {
    status,
    statusText,
    requestId,
  });

  return createAppError('UPSTREAM_ERROR', UPSTREAM_MESSAGE, {
    upstreamStatus: status,
    requestId,
  });
}

/**
 * Handle network errors (connection refused, timeout, unreadable body)
 */
export function handleNetworkError(error: Error, requestId?: string): AppError {
  logger.error('Network error calling weather provider', {
    error: error.message,
    requestId,
  });

  return createAppError('UPSTREAM_ERROR', UPSTREAM_MESSAGE, {
    requestId,
    networkError: error.message,
  });
}

/**
 * Weatherstack answers HTTP 200 even for failures and signals them in the body
 * as `{ success: false, error: { code, type, info } }`
 */
export function handleProviderError(
  providerCode: number,
  providerType: string | undefined,
  requestId?: string
): AppError {
  if (LOCATION_NOT_FOUND_CODES.has(providerCode)) {
    logger.warn('Location not found by weather provider', {
      providerCode,
      requestId,
    });
    return createAppError('NOT_FOUND', NOT_FOUND_MESSAGE, {
      providerCode,
      requestId,
    });
  }

  logger.error('Weather provider rejected the request', {
    providerCode,
    providerType,
    requestId,
  });
  return createAppError('UPSTREAM_ERROR', UPSTREAM_MESSAGE, {
    providerCode,
    requestId,
  });
}

/**
 * Turn any thrown value into the status and body the proxy sends back
 */
export function toErrorResponse(error: unknown): {
  status: number;
  body: ErrorResponse;
} {
  if (isAppError(error)) {
    return { status: error.status, body: { error: error.message } };
  }
  return { status: 500, body: { error: UNEXPECTED_MESSAGE } };
}

/**
 * express.json() (body-parser) marks malformed JSON bodies with this `type`
 */
export function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}
