/**
 * Test Fixtures
 *
 * Pipeline results in each terminal state for the report tests.
 */

import type { PipelineResult, PipelineStatus, Verdict } from '@newsdesk/types';

export function makeResult(
    n: number,
    status: PipelineStatus,
    options: { analysis?: string | null; verdict?: Verdict; assessment?: string; error?: string } = {}
): PipelineResult {
    const analysis = options.analysis !== undefined
        ? options.analysis
        : status === 'analysis_failed' ? null : `GIST: Story ${n}\nSENTIMENT: Neutral\nTONE: balanced`;

    return {
        article: {
            id: `id-${n}`,
            title: `Story ${n}`,
            content: `Body text for story ${n} that is comfortably longer than fifty characters.`,
            source: 'Test Wire',
            url: `https://example.com/${n}`,
            published_at: '2026-01-17T10:00:00Z',
        },
        analysis,
        validation: status === 'validated'
            ? {
                verdict: options.verdict ?? 'correct',
                confidence: 0.9,
                issues: [],
                strengths: ['Accurate'],
                overall_assessment: options.assessment ?? 'Solid summary.',
                article_title: `Story ${n}`,
                validated_at: '2026-01-17T11:00:00.000Z',
            }
            : null,
        timestamp: '2026-01-17T10:30:00.000Z',
        status,
        ...(options.error ? { error: options.error } : {}),
    };
}
