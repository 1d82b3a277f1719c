/**
 * Batch summary statistics
 */

import type { PipelineResult, PipelineSummary, VerdictCounts } from '@newsdesk/types';

// validation_failed results had a successful analysis but are reported as
// failures, not as analyzed
const ANALYZED_OR_BETTER = new Set(['analyzed', 'validated']);

/**
 * Single pass over the final result list.
 */
export function summarizeResults(results: PipelineResult[], totalFetched = results.length): PipelineSummary {
    const verdicts: VerdictCounts = { correct: 0, partially_correct: 0, incorrect: 0 };
    let analyzed = 0;
    let validated = 0;

    for (const result of results) {
        if (ANALYZED_OR_BETTER.has(result.status)) {
            analyzed++;
        }
        if (result.status === 'validated' && result.validation) {
            validated++;
            verdicts[result.validation.verdict]++;
        }
    }

    return {
        total_fetched: totalFetched,
        total_results: results.length,
        analyzed,
        validated,
        verdicts,
    };
}
