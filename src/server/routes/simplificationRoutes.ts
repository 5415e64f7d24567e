import { Router, Request, Response } from 'express';
import { validate } from '../middleware/validation.js';
import {
    createSimplificationSchemas,
    type SimplificationLimits,
    type SimplifyRequestBody,
} from '../validation/simplificationSchemas.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { logger } from '../utils/logger.js';
import type { NumberSimplifier, SimplificationResult } from '../services/simplification/index.js';

function toResponse(result: SimplificationResult, includeReplacements: boolean | undefined) {
    return includeReplacements === false
        ? { text: result.text }
        : { text: result.text, replacements: result.replacements };
}

export function createSimplificationRouter(simplifier: NumberSimplifier, limits: SimplificationLimits): Router {
    const router = Router();
    const schemas = createSimplificationSchemas(limits);

    /**
     * POST /api/simplify
     * Simplify numbers in a single text
     */
    router.post('/', validate(schemas.simplify), asyncHandler((req: Request, res: Response) => {
        const body: SimplifyRequestBody = req.body;
        const result = simplifier.simplifyWithDetails(body.text);

        logger.debug({ length: body.text.length, replacements: result.replacements.length }, 'Simplified text');
        res.status(200).json(toResponse(result, body.includeReplacements));
    }));

    return router;
}
