import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { createSimplificationRouter } from './routes/simplificationRoutes.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { NumberSimplifier } from './services/simplification/index.js';
import type { Env } from './config/env.js';

export interface AppDependencies {
    env: Pick<Env, 'SIMPLIFY_MAX_TEXT_LENGTH'>;
    simplifier?: NumberSimplifier;
}

/**
 * Build the Express application without binding a port
 */
export function createApp({ env, simplifier = new NumberSimplifier() }: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(helmet());
    app.use(cors());
    app.use(requestIdMiddleware);

    // Room for a maximum-length text in UTF-8 after JSON escaping
    const bodyLimitBytes = env.SIMPLIFY_MAX_TEXT_LENGTH * 4 + 1024;
    app.use(express.json({ limit: bodyLimitBytes }));

    app.get('/health', (_req, res) => {
        res.status(200).json({ status: 'ok' });
    });

    app.use('/api/simplify', createSimplificationRouter(simplifier, {
        maxTextLength: env.SIMPLIFY_MAX_TEXT_LENGTH,
    }));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
