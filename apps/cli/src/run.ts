/**
 * Pipeline run
 *
 * Fetch → analyze → validate → persist. Collaborators are passed in so the
 * same flow backs both `run` and `demo`.
 */

import type { Article, ArticleSource, PipelineSummary } from '@newsdesk/types';
import { PipelineAbortedError, ReportWriteError } from '@newsdesk/types';
import type { PipelineOrchestrator } from '@newsdesk/pipeline';
import type { ArtifactWriter } from '@newsdesk/reports';

export interface RunDependencies {
    source: ArticleSource;
    orchestrator: PipelineOrchestrator;
    writer: ArtifactWriter;
    /** Also write the timestamped detailed report */
    detailedReport?: boolean;
    /** Keep at most this many fetched articles */
    limit?: number;
    signal?: AbortSignal;
}

export interface RunOutcome {
    summary: PipelineSummary;
    files: string[];
}

async function fetchArticles(source: ArticleSource, signal?: AbortSignal): Promise<Article[]> {
    let articles: Article[];
    try {
        articles = await source.fetch(signal);
    } catch (error) {
        if (signal?.aborted) {
            throw new PipelineAbortedError([], { cause: error });
        }
        throw error;
    }
    // The source may not watch the signal
    if (signal?.aborted) {
        throw new PipelineAbortedError([]);
    }
    return articles;
}

export async function runPipeline(deps: RunDependencies): Promise<RunOutcome> {
    const { source, orchestrator, writer, signal } = deps;
    const files: string[] = [];

    console.log('📰 Step 1: Fetching news articles...');
    const fetched = await fetchArticles(source, signal);
    const articles = deps.limit !== undefined ? fetched.slice(0, deps.limit) : fetched;
    console.log(`✅ Successfully fetched ${articles.length} articles\n`);

    try {
        const rawPath = await writer.writeRawArticles(articles, source.name);
        files.push(rawPath);
        console.log(`💾 Raw articles saved: ${rawPath}\n`);
    } catch (error) {
        if (!(error instanceof ReportWriteError)) throw error;
        console.warn(`⚠️  Warning: Could not save raw articles: ${error.message}\n`);
    }

    console.log('🤖 Step 2-3: Analyzing and validating articles...\n');
    const { results, summary } = await orchestrator.run(articles, { signal });

    console.log('\n💾 Step 4: Saving results...');
    const analysisPath = await writer.writeAnalysisResults(results);
    files.push(analysisPath);
    console.log(`✅ Analysis results saved: ${analysisPath}`);

    const reportPath = await writer.writeFinalReport(results, source.name);
    files.push(reportPath);
    console.log(`✅ Final report saved: ${reportPath}`);

    if (deps.detailedReport) {
        const detailedPath = await writer.writeDetailedReport(results);
        files.push(detailedPath);
        console.log(`✅ Detailed report saved: ${detailedPath}`);
    }

    return { summary, files };
}

export function formatSummary({ summary, files }: RunOutcome): string {
    const rule = '='.repeat(70);
    return [
        rule,
        'PIPELINE SUMMARY',
        rule,
        `📊 Total Articles Fetched: ${summary.total_fetched}`,
        `✅ Successfully Analyzed (LLM#1): ${summary.analyzed}`,
        `✅ Successfully Validated (LLM#2): ${summary.validated}`,
        '',
        'Validation Results:',
        `  ✓ Correct: ${summary.verdicts.correct}`,
        `  ~ Partially Correct: ${summary.verdicts.partially_correct}`,
        `  ✗ Incorrect: ${summary.verdicts.incorrect}`,
        '',
        '📁 Output Files:',
        ...files.map(f => `  - ${f}`),
        rule,
    ].join('\n');
}
