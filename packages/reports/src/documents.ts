/**
 * JSON artifacts
 *
 * Field names here are read by downstream consumers; `metadata.total_articles`,
 * `results[].status` and `results[].validation.verdict` in particular must
 * not change.
 */

import type { Article, PipelineResult } from '@newsdesk/types';
import { sentimentBreakdown, statusBreakdown, verdictBreakdown, type VerdictBreakdown } from './breakdown.js';

export interface RawArticlesDocument {
    metadata: {
        fetched_at: string;
        total_articles: number;
        source: string;
    };
    articles: Article[];
}

export interface AnalysisDocument {
    metadata: {
        analyzed_at: string;
        total_articles: number;
        validated_articles: number;
        status_breakdown: Record<string, number>;
        sentiment_breakdown: Record<string, number>;
        verdict_breakdown: VerdictBreakdown;
    };
    results: PipelineResult[];
}

export function buildRawArticlesDocument(articles: Article[], source = 'NewsAPI', now = new Date()): RawArticlesDocument {
    return {
        metadata: {
            fetched_at: now.toISOString(),
            total_articles: articles.length,
            source,
        },
        articles,
    };
}

export function buildAnalysisDocument(results: PipelineResult[], now = new Date()): AnalysisDocument {
    const verdicts = verdictBreakdown(results);
    return {
        metadata: {
            analyzed_at: now.toISOString(),
            total_articles: results.length,
            validated_articles: verdicts.correct + verdicts.partially_correct + verdicts.incorrect + verdicts.unknown,
            status_breakdown: statusBreakdown(results),
            sentiment_breakdown: sentimentBreakdown(results),
            verdict_breakdown: verdicts,
        },
        results,
    };
}
