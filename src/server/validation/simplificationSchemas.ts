import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';

export interface SimplificationLimits {
    maxTextLength: number;
}

export function createSimplificationSchemas(limits: SimplificationLimits) {
    const text = z.string({ required_error: 'Text is required', invalid_type_error: 'Text must be a string' })
        .max(limits.maxTextLength, `Text must be at most ${limits.maxTextLength} characters`);

    return {
        simplify: {
            body: z.object({
                text,
                includeReplacements: commonSchemas.optionalBoolean,
            }),
        },
    };
}

export type SimplificationSchemas = ReturnType<typeof createSimplificationSchemas>;
export type SimplifyRequestBody = z.infer<SimplificationSchemas['simplify']['body']>;
