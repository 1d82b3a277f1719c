/**
 * Detailed report (analysis_report_<stamp>.md)
 *
 * Every result, validated or not, with the full analysis text and the
 * validator's strengths and issues.
 */

import type { PipelineResult } from '@newsdesk/types';
import { verdictBreakdown } from './breakdown.js';

const VERDICT_BADGES: Record<string, string> = {
    correct: '✅',
    partially_correct: '⚠️',
    incorrect: '❌',
};

function percent(count: number, total: number): string {
    return `${((count / Math.max(total, 1)) * 100).toFixed(1)}%`;
}

/**
 * `2026-03-04 09:05:01`
 */
export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * `20260304_090501`, used in the detailed report's file name
 */
export function fileStamp(date: Date): string {
    return formatTimestamp(date).replace(/-|:/g, '').replace(' ', '_');
}

export function buildDetailedReport(results: PipelineResult[], now = new Date()): string {
    const total = results.length;
    const verdicts = verdictBreakdown(results);

    let md = `# News Analysis Report

**Generated:** ${formatTimestamp(now)}

---

## Summary Statistics

- **Total Articles Analyzed:** ${total}
- **Correct Analyses:** ${verdicts.correct} (${percent(verdicts.correct, total)})
- **Partially Correct:** ${verdicts.partially_correct} (${percent(verdicts.partially_correct, total)})
- **Incorrect Analyses:** ${verdicts.incorrect} (${percent(verdicts.incorrect, total)})

---

## Detailed Results

`;

    results.forEach((result, i) => {
        const { article, validation } = result;
        const verdict = validation?.verdict ?? 'unknown';
        const confidence = validation?.confidence ?? 0;

        md += `### ${i + 1}. ${article.title || 'Untitled'}

**Status:** ${result.status}${result.error ? ` (${result.error})` : ''}

**Validation:** ${VERDICT_BADGES[verdict] ?? '❓'} ${verdict.toUpperCase()} (Confidence: ${confidence.toFixed(2)})

**Source:** [${article.source || 'Unknown'}](${article.url || '#'})

**Published:** ${article.published_at || 'Unknown'}

#### Analysis
${result.analysis ?? 'No analysis available'}

#### Validation Results

`;

        if (validation?.strengths.length) {
            md += '**Strengths:**\n' + validation.strengths.map(s => `- ${s}\n`).join('') + '\n';
        }
        if (validation?.issues.length) {
            md += '**Issues Found:**\n' + validation.issues.map(s => `- ${s}\n`).join('') + '\n';
        }
        if (validation?.overall_assessment) {
            md += `**Overall Assessment:** ${validation.overall_assessment}\n`;
        }

        md += '\n---\n\n';
    });

    return md;
}
