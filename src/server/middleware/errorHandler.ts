import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { normalizeError, transformErrorToResponse } from '../utils/errorTransformation.js';
import { NotFoundError } from '../types/errors.js';

/**
 * 404 handler for unmatched routes
 * Register after all routers, before errorHandler
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * This middleware:
 * - Logs errors with appropriate context
 * - Transforms all errors to standardized ErrorResponse format
 * - Returns consistent error responses to clients
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const appError = normalizeError(err);

    if (appError.statusCode < 500) {
        logger.info({
            code: appError.code,
            message: appError.message,
            path: req.path,
            method: req.method,
        }, 'Request rejected');
    } else {
        logger.error({
            error: err,
            message: err instanceof Error ? err.message : String(err),
            stack: err instanceof Error ? err.stack : undefined,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    }

    // Let Express close the connection if the response is already underway
    if (res.headersSent) {
        next(err);
        return;
    }

    const includeStack = process.env.NODE_ENV === 'development';
    const errorResponse = transformErrorToResponse(appError, req, includeStack);
    res.status(errorResponse.statusCode).json(errorResponse);
}
