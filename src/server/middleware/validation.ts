import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Validation middleware factory
 * Validates request body or query against a Zod schema
 * Passes BadRequestError to next() if validation fails, so errors go through centralized error handling
 */
type ValidationSchema =
    | { body: ZodSchema; query?: ZodSchema }
    | { body?: ZodSchema; query: ZodSchema };

export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        try {
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            if (schema.query) {
                req.query = schema.query.parse(req.query);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                }));
                // Log validation failure with context
                logger.warn(
                    {
                        path: req.path,
                        method: req.method,
                        issues: details,
                    },
                    'Request validation failed'
                );
                next(new BadRequestError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}

/**
 * Common validation schemas
 */
export const commonSchemas = {
    optionalBoolean: z.boolean().optional(),
};
