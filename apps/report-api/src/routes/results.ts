/**
 * Results Routes
 *
 * GET /api/results - Pipeline results, filterable by status and verdict
 * GET /api/summary - Run metadata and breakdowns
 * GET /api/report  - final_report.md
 */

import { Router } from 'express';
import type { NextFunction, Request, Response, Router as RouterType } from 'express';
import type { ResultsHandlers } from '../handlers/results-handler.js';
import { validateResultsQuery } from '../middleware/validation.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
const wrap = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
};

export function createResultsRouter(handlers: ResultsHandlers): RouterType {
    const router: RouterType = Router();

    router.get('/results', validateResultsQuery, wrap(handlers.results));
    router.get('/summary', wrap(handlers.summary));
    router.get('/report', wrap(handlers.report));

    return router;
}
