/**
 * Validation Middleware
 *
 * Validates result-listing query strings using Zod schemas.
 */

import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { VERDICTS } from '@newsdesk/types';

const StatusSchema = z.enum(['pending', 'analyzed', 'validated', 'analysis_failed', 'validation_failed']);

export const ResultsQuerySchema = z.object({
    status: StatusSchema.optional(),
    verdict: z.enum(VERDICTS).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional(),
}).strict();

export type ResultsQuery = z.infer<typeof ResultsQuerySchema>;

/**
 * Validate the query string and store the parsed value on res.locals.query
 */
export function validateResultsQuery(
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const result = ResultsQuerySchema.safeParse(req.query);
    if (!result.success) {
        res.status(400).json({
            error: 'Validation failed',
            details: result.error.errors.map(e => ({
                path: e.path.join('.'),
                message: e.message,
            })),
        });
        return;
    }

    res.locals.query = result.data;
    next();
}
