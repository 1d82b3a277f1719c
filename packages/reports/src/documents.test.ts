import { describe, expect, it } from 'vitest';
import { buildAnalysisDocument, buildRawArticlesDocument } from './documents.js';
import { buildDetailedReport, fileStamp, formatTimestamp } from './detailed-report.js';
import { makeResult } from './test-fixtures.js';

const now = new Date('2026-03-04T09:05:01.000Z');

describe('buildAnalysisDocument', () => {
    it('summarizes the results and keeps them verbatim', () => {
        const results = [
            makeResult(1, 'validated', { verdict: 'correct' }),
            makeResult(2, 'analysis_failed', { error: 'quota' }),
            makeResult(3, 'validated', { verdict: 'incorrect', analysis: 'SENTIMENT: Negative' }),
        ];

        const doc = buildAnalysisDocument(results, now);

        expect(doc.metadata).toEqual({
            analyzed_at: '2026-03-04T09:05:01.000Z',
            total_articles: 3,
            validated_articles: 2,
            status_breakdown: { validated: 2, analysis_failed: 1 },
            sentiment_breakdown: { Neutral: 1, Negative: 1 },
            verdict_breakdown: { correct: 1, partially_correct: 0, incorrect: 1, unknown: 0 },
        });
        expect(doc.results).toBe(results);
        expect(doc.results[1].status).toBe('analysis_failed');
        expect(doc.results[2].validation?.verdict).toBe('incorrect');
    });
});

describe('buildRawArticlesDocument', () => {
    it('wraps the articles with fetch metadata', () => {
        const articles = [makeResult(1, 'pending').article];
        expect(buildRawArticlesDocument(articles, 'NewsAPI', now)).toEqual({
            metadata: { fetched_at: '2026-03-04T09:05:01.000Z', total_articles: 1, source: 'NewsAPI' },
            articles,
        });
    });
});

describe('buildDetailedReport', () => {
    it('includes every result with percentages over the total', () => {
        const results = [
            makeResult(1, 'validated', { verdict: 'correct' }),
            makeResult(2, 'analysis_failed', { error: 'quota exceeded' }),
            makeResult(3, 'validated', { verdict: 'partially_correct' }),
            makeResult(4, 'validation_failed'),
        ];

        const md = buildDetailedReport(results, now);

        expect(md).toContain('**Generated:** 2026-03-04 09:05:01');
        expect(md).toContain('- **Total Articles Analyzed:** 4');
        expect(md).toContain('- **Correct Analyses:** 1 (25.0%)');
        expect(md).toContain('- **Partially Correct:** 1 (25.0%)');
        expect(md).toContain('- **Incorrect Analyses:** 0 (0.0%)');
        expect(md).toContain('### 2. Story 2\n\n**Status:** analysis_failed (quota exceeded)');
        expect(md).toContain('**Validation:** ✅ CORRECT (Confidence: 0.90)');
        expect(md).toContain('**Validation:** ❓ UNKNOWN (Confidence: 0.00)');
        expect(md).toContain('**Strengths:**\n- Accurate\n');
        expect(md).toContain('#### Analysis\nNo analysis available');
    });

    it('avoids dividing by zero', () => {
        expect(buildDetailedReport([], now)).toContain('- **Correct Analyses:** 0 (0.0%)');
    });
});

describe('timestamps', () => {
    it('formats report and file name stamps', () => {
        expect(formatTimestamp(now)).toBe('2026-03-04 09:05:01');
        expect(fileStamp(now)).toBe('20260304_090501');
    });
});
