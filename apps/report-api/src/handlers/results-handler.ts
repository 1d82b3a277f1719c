/**
 * Results Handlers
 *
 * Serve the artifacts of the most recent pipeline run from the output
 * directory. Nothing here triggers a run.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Request, Response } from 'express';
import type { PipelineResult } from '@newsdesk/types';
import { FINAL_REPORT_FILE, loadAnalysisDocument, type AnalysisDocument } from '@newsdesk/reports';
import { ResultsQuerySchema, type ResultsQuery } from '../middleware/validation.js';

export function filterResults(results: PipelineResult[], query: ResultsQuery): PipelineResult[] {
    const filtered = results.filter(r =>
        (!query.status || r.status === query.status) &&
        (!query.verdict || r.validation?.verdict === query.verdict)
    );
    return query.limit ? filtered.slice(0, query.limit) : filtered;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface ResultsHandlers {
    results(req: Request, res: Response): Promise<void>;
    summary(req: Request, res: Response): Promise<void>;
    report(req: Request, res: Response): Promise<void>;
}

export function createResultsHandlers(outputDir: string): ResultsHandlers {
    async function load(res: Response): Promise<AnalysisDocument | null> {
        try {
            return await loadAnalysisDocument(outputDir);
        } catch (error) {
            if (isMissingFile(error)) {
                res.status(404).json({ error: 'No pipeline results yet' });
                return null;
            }
            console.error('[ReportAPI] Failed to load analysis results:', error);
            res.status(500).json({ error: 'Could not read analysis results' });
            return null;
        }
    }

    return {
        async results(_req, res) {
            const doc = await load(res);
            if (!doc) return;

            const query = ResultsQuerySchema.parse(res.locals.query ?? {});
            const results = filterResults(doc.results, query);
            res.json({ count: results.length, results });
        },

        async summary(_req, res) {
            const doc = await load(res);
            if (!doc) return;
            res.json(doc.metadata);
        },

        async report(_req, res) {
            try {
                const md = await readFile(path.join(outputDir, FINAL_REPORT_FILE), 'utf-8');
                res.type('text/markdown').send(md);
            } catch (error) {
                if (isMissingFile(error)) {
                    res.status(404).json({ error: 'No report yet' });
                    return;
                }
                console.error('[ReportAPI] Failed to read report:', error);
                res.status(500).json({ error: 'Could not read report' });
            }
        },
    };
}
