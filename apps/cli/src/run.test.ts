import { mkdtemp, readFile, rm, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PipelineAbortedError, SourceError, type Article, type ArticleSource } from '@newsdesk/types';
import { AnalysisClient, ValidationClient, CannedTextModel } from '@newsdesk/analyzer';
import { PipelineOrchestrator, IntervalThrottle } from '@newsdesk/pipeline';
import { ArtifactWriter } from '@newsdesk/reports';
import { formatSummary, runPipeline } from './run.js';

function article(n: number): Article {
    return {
        id: `id-${n}`,
        title: `Story ${n}`,
        content: `Body text for story ${n} that is comfortably longer than fifty characters.`,
        source: 'Test Wire',
        url: `https://example.com/${n}`,
        published_at: '2026-01-17T10:00:00Z',
    };
}

function staticSource(articles: Article[]): ArticleSource {
    return { name: 'Test Source', fetch: async () => articles };
}

const verdict = (v: string) =>
    `\`\`\`json\n{"verdict":"${v}","confidence":0.9,"issues":[],"strengths":["ok"],"overall_assessment":"fine"}\n\`\`\``;

function orchestrator(analysis: Array<string | Error>, validation: Array<string | Error>, signalAbort?: AbortController) {
    return new PipelineOrchestrator({
        analyzer: new AnalysisClient(new CannedTextModel(analysis)),
        validator: new ValidationClient(new CannedTextModel(validation)),
        analysisThrottle: signalAbort
            ? { wait: async (signal?: AbortSignal) => { signalAbort.abort(); signal?.throwIfAborted(); } }
            : new IntervalThrottle(0),
        validationThrottle: new IntervalThrottle(0),
    });
}

describe('runPipeline', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'newsdesk-cli-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('runs three articles with one analysis failure end to end', async () => {
        const outcome = await runPipeline({
            source: staticSource([article(1), article(2), article(3)]),
            orchestrator: orchestrator(
                ['GIST: Markets rally\nSENTIMENT: Positive\nTONE: optimistic', new Error('quota exceeded'), 'GIST: Port reopens\nSENTIMENT: Neutral\nTONE: balanced'],
                [verdict('correct'), verdict('incorrect')]
            ),
            writer: new ArtifactWriter({ outputDir: dir }),
        });

        expect(outcome.summary).toMatchObject({ analyzed: 2, validated: 2 });
        expect(outcome.files.map(f => path.basename(f))).toEqual([
            'raw_articles.json',
            'analysis_results.json',
            'final_report.md',
        ]);

        const doc = JSON.parse(await readFile(path.join(dir, 'analysis_results.json'), 'utf-8'));
        expect(doc.metadata.total_articles).toBe(3);
        expect(doc.results.map((r: { status: string }) => r.status)).toEqual(['validated', 'analysis_failed', 'validated']);
        expect(doc.results[0].validation.verdict).toBe('correct');
        expect(doc.results[2].validation.verdict).toBe('incorrect');

        const md = await readFile(path.join(dir, 'final_report.md'), 'utf-8');
        expect(md.match(/^### Article /gm)).toHaveLength(2);
        expect(md).toContain('- **Gist:** Markets rally');
        expect(md).toContain('- **LLM#2 Validation:** ✗ Incorrect. fine');
    });

    it('writes the detailed report and honours the limit', async () => {
        const outcome = await runPipeline({
            source: staticSource([article(1), article(2)]),
            orchestrator: orchestrator(['GIST: one'], [verdict('correct')]),
            writer: new ArtifactWriter({ outputDir: dir }),
            limit: 1,
            detailedReport: true,
        });

        expect(outcome.summary.total_fetched).toBe(1);
        expect(outcome.files).toHaveLength(4);
        expect(path.basename(outcome.files[3])).toMatch(/^analysis_report_\d{8}_\d{6}\.md$/);
    });

    it('propagates source failures before writing anything', async () => {
        const source: ArticleSource = {
            name: 'Broken',
            fetch: async () => {
                throw new SourceError('Missing NEWSAPI_API_KEY in environment variables.');
            },
        };

        await expect(runPipeline({
            source,
            orchestrator: orchestrator([], []),
            writer: new ArtifactWriter({ outputDir: dir }),
        })).rejects.toBeInstanceOf(SourceError);
        expect(await readdir(dir)).toEqual([]);
    });

    it('does not persist results from an interrupted run', async () => {
        const controller = new AbortController();

        await expect(runPipeline({
            source: staticSource([article(1), article(2)]),
            orchestrator: orchestrator(['GIST: one', 'GIST: two'], [], controller),
            writer: new ArtifactWriter({ outputDir: dir }),
            signal: controller.signal,
        })).rejects.toThrow('Pipeline interrupted');

        expect(await readdir(dir)).toEqual(['raw_articles.json']);
    });

    it('writes nothing when interrupted while fetching', async () => {
        const controller = new AbortController();
        const source: ArticleSource = {
            name: 'Slow Source',
            fetch: async () => {
                controller.abort();
                return [article(1)];
            },
        };

        await expect(runPipeline({
            source,
            orchestrator: orchestrator(['GIST: one'], [verdict('correct')]),
            writer: new ArtifactWriter({ outputDir: dir }),
            signal: controller.signal,
        })).rejects.toBeInstanceOf(PipelineAbortedError);

        expect(await readdir(dir)).toEqual([]);
    });

    it('hands the signal to the source', async () => {
        const controller = new AbortController();
        const fetch = vi.fn(async (_signal?: AbortSignal) => [article(1)]);

        await runPipeline({
            source: { name: 'Test Source', fetch },
            orchestrator: orchestrator(['GIST: one'], [verdict('correct')]),
            writer: new ArtifactWriter({ outputDir: dir }),
            signal: controller.signal,
        });

        expect(fetch).toHaveBeenCalledWith(controller.signal);
    });

    it('records the source name in the artifacts', async () => {
        await runPipeline({
            source: staticSource([article(1)]),
            orchestrator: orchestrator(['GIST: one'], [verdict('correct')]),
            writer: new ArtifactWriter({ outputDir: dir }),
        });

        const raw = JSON.parse(await readFile(path.join(dir, 'raw_articles.json'), 'utf-8'));
        expect(raw.metadata.source).toBe('Test Source');
        expect(await readFile(path.join(dir, 'final_report.md'), 'utf-8')).toContain('**Source:** Test Source\n');
    });
});

describe('formatSummary', () => {
    it('prints totals even when everything failed', () => {
        const text = formatSummary({
            summary: {
                total_fetched: 2,
                total_results: 2,
                analyzed: 0,
                validated: 0,
                verdicts: { correct: 0, partially_correct: 0, incorrect: 0 },
            },
            files: ['output/analysis_results.json'],
        });

        expect(text).toContain('📊 Total Articles Fetched: 2');
        expect(text).toContain('✅ Successfully Analyzed (LLM#1): 0');
        expect(text).toContain('✅ Successfully Validated (LLM#2): 0');
        expect(text).toContain('  ✓ Correct: 0\n  ~ Partially Correct: 0\n  ✗ Incorrect: 0');
        expect(text).toContain('  - output/analysis_results.json');
    });
});
