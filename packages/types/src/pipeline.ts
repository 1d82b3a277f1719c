/**
 * Pipeline Types
 */

import type { Article } from './article.js';
import type { ValidationRecord, Verdict } from './validation.js';

export type PipelineStatus =
    | 'pending'
    | 'analyzed'
    | 'validated'
    | 'analysis_failed'
    | 'validation_failed';

/**
 * One per surviving article. Mutated only by the orchestrator that owns the batch.
 */
export interface PipelineResult {
    article: Article;
    analysis: string | null;
    validation: ValidationRecord | null;
    /** ISO timestamp of result creation */
    timestamp: string;
    status: PipelineStatus;
    error?: string;
}

export type VerdictCounts = Record<Verdict, number>;

export interface PipelineSummary {
    /** Articles handed to the orchestrator, usable or not */
    total_fetched: number;
    /** PipelineResults created (usable articles only) */
    total_results: number;
    /** Results that reached `analyzed` or beyond */
    analyzed: number;
    validated: number;
    verdicts: VerdictCounts;
}
