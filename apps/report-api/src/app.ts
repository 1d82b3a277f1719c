/**
 * Report API application
 */

import express from 'express';
import type { Express } from 'express';
import { createResultsHandlers } from './handlers/results-handler.js';
import { createResultsRouter } from './routes/results.js';
import { requestLogger } from './middleware/logging.js';

export function createApp(outputDir: string): Express {
    const app: Express = express();

    app.use(requestLogger());
    app.use('/api', createResultsRouter(createResultsHandlers(outputDir)));

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    return app;
}
