/**
 * Schema for reading analysis_results.json back from disk.
 */

import { z } from 'zod';
import { VERDICTS } from '@newsdesk/types';

const ArticleSchema = z.object({
    id: z.string(),
    title: z.string(),
    content: z.string(),
    source: z.string(),
    url: z.string().nullable(),
    published_at: z.string().nullable(),
});

const ValidationRecordSchema = z.object({
    verdict: z.enum(VERDICTS),
    confidence: z.number(),
    issues: z.array(z.string()),
    strengths: z.array(z.string()),
    overall_assessment: z.string(),
    article_title: z.string(),
    validated_at: z.string().nullable(),
});

const PipelineResultSchema = z.object({
    article: ArticleSchema,
    analysis: z.string().nullable(),
    validation: ValidationRecordSchema.nullable(),
    timestamp: z.string(),
    status: z.enum(['pending', 'analyzed', 'validated', 'analysis_failed', 'validation_failed']),
    error: z.string().optional(),
});

export const AnalysisDocumentSchema = z.object({
    metadata: z.object({
        analyzed_at: z.string(),
        total_articles: z.number(),
        validated_articles: z.number(),
        status_breakdown: z.record(z.number()),
        sentiment_breakdown: z.record(z.number()),
        verdict_breakdown: z.object({
            correct: z.number(),
            partially_correct: z.number(),
            incorrect: z.number(),
            unknown: z.number(),
        }),
    }),
    results: z.array(PipelineResultSchema),
});
