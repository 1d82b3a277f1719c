/**
 * Validation Types
 *
 * Structured verdict produced by the second model pass.
 */

export const VERDICTS = ['correct', 'partially_correct', 'incorrect'] as const;

export type Verdict = typeof VERDICTS[number];

export interface ValidationRecord {
    verdict: Verdict;
    /** 0.0 - 1.0 */
    confidence: number;
    issues: string[];
    strengths: string[];
    overall_assessment: string;
    article_title: string;
    /** Stamped by the orchestrator when validation completes */
    validated_at: string | null;
}
