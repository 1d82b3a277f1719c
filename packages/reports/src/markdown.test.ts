import { describe, expect, it } from 'vitest';
import { buildMarkdownReport, formatVerdict, verdictSymbol } from './markdown.js';
import { makeResult } from './test-fixtures.js';

const now = new Date('2026-03-04T09:05:01.000Z');

describe('buildMarkdownReport', () => {
    it('renders one section per validated article', () => {
        const results = [
            makeResult(1, 'validated', { analysis: 'GIST: Markets rally\nSENTIMENT: Positive\nTONE: optimistic' }),
            makeResult(2, 'analysis_failed'),
            makeResult(3, 'validated', { verdict: 'partially_correct', assessment: 'Mostly right.' }),
        ];

        const md = buildMarkdownReport(results, { now });

        expect(md.match(/^### Article /gm)).toHaveLength(2);
        expect(md).toContain('**Date:** 2026-03-04\n**Articles Analyzed:** 2\n**Source:** NewsAPI');
        expect(md).toContain('- **Positive:** 1 articles\n- **Negative:** 0 articles\n- **Neutral:** 1 articles');
        expect(md).toContain(`### Article 1: "Story 1"

- **Source:** [Test Wire](https://example.com/1)
- **Gist:** Markets rally
- **LLM#1 Sentiment:** Positive
- **LLM#2 Validation:** ✓ Correct. Solid summary.
- **Tone:** optimistic

---
`);
        expect(md).toContain('### Article 2: "Story 3"');
        expect(md).toContain('- **LLM#2 Validation:** ~ Partially Correct. Mostly right.');
        expect(md).not.toContain('Story 2');
    });

    it('falls back for missing verdicts, assessments and links', () => {
        const base = makeResult(1, 'validated', { analysis: 'plain text without labels' });
        const result = { ...base, article: { ...base.article, url: null }, validation: null };

        const md = buildMarkdownReport([result], { now, source: 'Test Feed' });

        expect(md).toContain('**Source:** Test Feed');
        expect(md).toContain('- **Source:** [Test Wire](#)');
        expect(md).toContain('- **Gist:** plain text without labels');
        expect(md).toContain('- **LLM#2 Validation:** ? Unknown. No validation details');
    });

    it('still renders a header when nothing validated', () => {
        const md = buildMarkdownReport([makeResult(1, 'analysis_failed')], { now });
        expect(md).toContain('**Articles Analyzed:** 0');
        expect(md.endsWith('## Detailed Analysis\n\n')).toBe(true);
    });
});

describe('verdict formatting', () => {
    it('maps verdicts to glyphs', () => {
        expect(verdictSymbol('correct')).toBe('✓');
        expect(verdictSymbol('partially_correct')).toBe('~');
        expect(verdictSymbol('incorrect')).toBe('✗');
        expect(verdictSymbol('unknown')).toBe('?');
    });

    it('title-cases verdict names', () => {
        expect(formatVerdict('partially_correct')).toBe('Partially Correct');
        expect(formatVerdict('incorrect')).toBe('Incorrect');
    });
});
