/**
 * Error transformation utilities
 * Converts various error types to the standardized response format
 */
import type { Request } from 'express';
import {
  BadRequestError,
  PayloadTooLargeError,
  isAppError,
  toAppError,
  type AppError,
  type ErrorResponse,
} from '../types/errors.js';

/**
 * Errors raised by express.json() (body-parser) carry an HTTP status and a type tag
 */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

/**
 * Map framework errors onto the AppError hierarchy
 */
export function normalizeError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.too.large') {
      return new PayloadTooLargeError('Request body too large');
    }
    if (error.type === 'entity.parse.failed') {
      return new BadRequestError('Malformed JSON body');
    }
  }

  return toAppError(error);
}

/**
 * Transform error to standardized error response
 */
export function transformErrorToResponse(
  error: unknown,
  req: Request,
  includeStack = false
): ErrorResponse {
  const appError = normalizeError(error);

  // Internal failures never leak their message to clients
  const message = appError.isOperational ? appError.message : 'An unexpected error occurred';

  // For validation errors, surface the first detailed message
  let finalMessage = message;
  const details = appError.context?.details;
  if (appError instanceof BadRequestError && Array.isArray(details) && details.length > 0) {
    const firstDetail: unknown = details[0];
    if (
      typeof firstDetail === 'object' &&
      firstDetail !== null &&
      'message' in firstDetail &&
      typeof firstDetail.message === 'string'
    ) {
      finalMessage = firstDetail.message;
    }
  }

  return {
    error: finalMessage,
    code: appError.code,
    message: finalMessage,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path: req.path,
    ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
