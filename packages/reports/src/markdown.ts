/**
 * Markdown report (final_report.md)
 *
 * One section per validated article; everything else is left to the JSON
 * artifact.
 */

import type { PipelineResult } from '@newsdesk/types';
import { parseAnalysisOutput } from '@newsdesk/analyzer';
import { countSentimentKeywords, validatedResults } from './breakdown.js';

const VERDICT_SYMBOLS: Record<string, string> = {
    correct: '✓',
    partially_correct: '~',
    incorrect: '✗',
};

export function verdictSymbol(verdict: string): string {
    return VERDICT_SYMBOLS[verdict] ?? '?';
}

/**
 * `partially_correct` → `Partially Correct`
 */
export function formatVerdict(verdict: string): string {
    return verdict
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

export interface MarkdownReportOptions {
    now?: Date;
    source?: string;
}

export function buildMarkdownReport(results: PipelineResult[], options: MarkdownReportOptions = {}): string {
    const now = options.now ?? new Date();
    const validated = validatedResults(results);
    const sentiments = countSentimentKeywords(results);

    const sections = validated.map((result, i) => renderArticleSection(result, i + 1));

    return `# News Analysis Report

**Date:** ${now.toISOString().slice(0, 10)}
**Articles Analyzed:** ${validated.length}
**Source:** ${options.source ?? 'NewsAPI'}

---

## Summary

- **Positive:** ${sentiments.Positive} articles
- **Negative:** ${sentiments.Negative} articles
- **Neutral:** ${sentiments.Neutral} articles

---

## Detailed Analysis

${sections.join('')}`;
}

function renderArticleSection(result: PipelineResult, n: number): string {
    const { article, validation } = result;
    const { gist, sentiment, tone } = parseAnalysisOutput(result.analysis ?? '');
    const verdict = validation?.verdict ?? 'unknown';
    const assessment = validation?.overall_assessment || 'No validation details';

    return `### Article ${n}: "${article.title || 'Untitled'}"

- **Source:** [${article.source || 'Unknown'}](${article.url || '#'})
- **Gist:** ${gist}
- **LLM#1 Sentiment:** ${sentiment}
- **LLM#2 Validation:** ${verdictSymbol(verdict)} ${formatVerdict(verdict)}. ${assessment}
- **Tone:** ${tone}

---

`;
}
