#!/usr/bin/env node
/**
 * Newsdesk CLI
 *
 *   newsdesk run [--detailed]              fetch, analyze, validate, report
 *   newsdesk demo [--articles <file>]      same flow with canned model output
 */

import 'dotenv/config';
import { SourceError, PipelineAbortedError, ReportWriteError, errorMessage } from '@newsdesk/types';
import { NewsAPISource } from '@newsdesk/news-source';
import { AnalysisClient, ValidationClient, GeminiTextModel } from '@newsdesk/analyzer';
import { PipelineOrchestrator, IntervalThrottle, ConsoleProgressReporter } from '@newsdesk/pipeline';
import { ArtifactWriter } from '@newsdesk/reports';
import { loadConfig, ConfigError, type NewsdeskConfig } from './config.js';
import { parseArgs, type CliArgs } from './args.js';
import { runPipeline, formatSummary, type RunDependencies } from './run.js';
import { loadDemoResponses, createDemoModels, FileArticleSource } from './demo.js';

function newsSource(config: NewsdeskConfig, articlesFile?: string) {
    if (articlesFile) {
        return new FileArticleSource(articlesFile);
    }
    return new NewsAPISource({
        apiKey: config.newsApiKey,
        query: config.query,
        maxArticles: config.maxArticles,
        timeoutMs: config.requestTimeoutMs,
    });
}

async function buildDependencies(args: CliArgs, config: NewsdeskConfig, signal: AbortSignal): Promise<RunDependencies> {
    const writer = new ArtifactWriter({ outputDir: config.outputDir });
    const progress = new ConsoleProgressReporter();

    if (args.command === 'demo') {
        const { analysisModel, validationModel, size } = createDemoModels(await loadDemoResponses());
        return {
            source: newsSource(config, args.articlesFile),
            orchestrator: new PipelineOrchestrator({
                analyzer: new AnalysisClient(analysisModel),
                validator: new ValidationClient(validationModel),
                analysisThrottle: new IntervalThrottle(0),
                validationThrottle: new IntervalThrottle(0),
                progress,
            }),
            writer,
            limit: size,
            detailedReport: args.detailed,
            signal,
        };
    }

    if (!config.geminiApiKey) {
        throw new ConfigError('GEMINI_API_KEY is required');
    }

    // Separate clients per pass; each endpoint has its own quota and throttle
    const analysisModel = new GeminiTextModel({
        apiKey: config.geminiApiKey,
        model: config.analysisModel,
        temperature: 0.3,
        maxOutputTokens: 512,
    });
    const validationModel = new GeminiTextModel({
        apiKey: config.geminiApiKey,
        model: config.validationModel,
        temperature: 0.2,
        maxOutputTokens: 1024,
        json: true,
    });

    return {
        source: newsSource(config, args.articlesFile),
        orchestrator: new PipelineOrchestrator({
            analyzer: new AnalysisClient(analysisModel),
            validator: new ValidationClient(validationModel),
            analysisThrottle: new IntervalThrottle(config.throttleMs),
            validationThrottle: new IntervalThrottle(config.throttleMs),
            progress,
        }),
        writer,
        detailedReport: args.detailed,
        signal,
    };
}

async function main(): Promise<number> {
    const rule = '='.repeat(70);
    console.log(rule);
    console.log('NEWSDESK - Dual LLM Analysis & Validation Pipeline');
    console.log(rule + '\n');

    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
        const args = parseArgs(process.argv.slice(2));
        const config = loadConfig();
        const deps = await buildDependencies(args, config, controller.signal);
        const outcome = await runPipeline(deps);

        console.log('\n' + formatSummary(outcome));
        console.log('✅ Pipeline completed successfully!');
        return 0;
    } catch (error) {
        if (error instanceof PipelineAbortedError) {
            console.error(`\n\n⚠️  Pipeline interrupted by user (${error.partialResults.length} results discarded)`);
        } else if (error instanceof SourceError) {
            console.error(`❌ Failed to fetch news: ${error.message}`);
        } else if (error instanceof ReportWriteError) {
            console.error(`❌ Failed to save results: ${error.message}`);
        } else if (error instanceof ConfigError) {
            console.error(`❌ ${error.message}`);
        } else {
            console.error(`\n❌ Unexpected error: ${errorMessage(error)}`);
            console.error(error);
        }
        return 1;
    } finally {
        process.off('SIGINT', onInterrupt);
    }
}

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exit(1);
    }
);
