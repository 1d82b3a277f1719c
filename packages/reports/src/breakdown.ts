/**
 * Report breakdowns
 *
 * Two independent sentiment statistics: the parsed SENTIMENT section of each
 * analysis, and a keyword scan of the whole text. They can disagree (an
 * analysis that mentions "Negative" in its reasoning but labels itself
 * Positive), so neither is derived from the other.
 */

import type { PipelineResult } from '@newsdesk/types';
import { parseAnalysisOutput } from '@newsdesk/analyzer';

export const SENTIMENT_KEYWORDS = ['Positive', 'Negative', 'Neutral'] as const;

export type SentimentKeyword = typeof SENTIMENT_KEYWORDS[number];

export interface VerdictBreakdown {
    correct: number;
    partially_correct: number;
    incorrect: number;
    /** Validated results whose verdict is missing or unrecognized */
    unknown: number;
}

export function validatedResults(results: PipelineResult[]): PipelineResult[] {
    return results.filter(r => r.status === 'validated');
}

/**
 * Validated results keyed by the value of their SENTIMENT section.
 * Results without one are not counted.
 */
export function sentimentBreakdown(results: PipelineResult[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const result of validatedResults(results)) {
        const { sentiment } = parseAnalysisOutput(result.analysis ?? '');
        if (sentiment) {
            counts[sentiment] = (counts[sentiment] ?? 0) + 1;
        }
    }
    return counts;
}

/**
 * Validated results by the first of Positive / Negative / Neutral that
 * appears anywhere in the analysis text (case-sensitive).
 */
export function countSentimentKeywords(results: PipelineResult[]): Record<SentimentKeyword, number> {
    const counts: Record<SentimentKeyword, number> = { Positive: 0, Negative: 0, Neutral: 0 };
    for (const result of validatedResults(results)) {
        const analysis = result.analysis ?? '';
        const keyword = SENTIMENT_KEYWORDS.find(k => analysis.includes(k));
        if (keyword) {
            counts[keyword]++;
        }
    }
    return counts;
}

/**
 * Structured verdicts of validated results; always sums to the validated count.
 */
export function verdictBreakdown(results: PipelineResult[]): VerdictBreakdown {
    const counts: VerdictBreakdown = { correct: 0, partially_correct: 0, incorrect: 0, unknown: 0 };
    for (const result of validatedResults(results)) {
        const verdict = result.validation?.verdict;
        if (verdict === 'correct' || verdict === 'partially_correct' || verdict === 'incorrect') {
            counts[verdict]++;
        } else {
            counts.unknown++;
        }
    }
    return counts;
}

export function statusBreakdown(results: PipelineResult[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const result of results) {
        counts[result.status] = (counts[result.status] ?? 0) + 1;
    }
    return counts;
}
