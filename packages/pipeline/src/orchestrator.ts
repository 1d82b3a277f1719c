/**
 * Pipeline Orchestrator
 *
 * Drives each article through the two model passes:
 *
 *   pending ──analyze──▶ analyzed ──validate──▶ validated
 *      │                    │
 *      ▼                    ▼
 *   analysis_failed      validation_failed
 *
 * Strictly sequential. Every successful model call is followed by the
 * endpoint's throttle; failures are recorded on the result and the batch
 * moves on.
 */

import type { Article, PipelineResult, PipelineSummary, ValidationRecord, AnalysisRecord } from '@newsdesk/types';
import { PipelineAbortedError, errorMessage, isUsableArticle } from '@newsdesk/types';
import { IntervalThrottle, type Throttle } from './throttle.js';
import { silentProgress, type ProgressReporter } from './progress.js';
import { summarizeResults } from './summary.js';

export interface Analyzer {
    analyze(article: Article, signal?: AbortSignal): Promise<AnalysisRecord>;
}

export interface Validator {
    validate(article: Article, analysisText: string, signal?: AbortSignal): Promise<ValidationRecord>;
}

export interface PipelineOrchestratorOptions {
    analyzer: Analyzer;
    validator: Validator;
    /** Pause after each successful analysis call */
    analysisThrottle?: Throttle;
    /** Pause after each successful validation call */
    validationThrottle?: Throttle;
    progress?: ProgressReporter;
    /** Clock for result and validation timestamps */
    now?: () => Date;
}

export interface RunOptions {
    /** Cancels the model call in flight, or stops at the next article or throttle boundary */
    signal?: AbortSignal;
}

export interface PipelineRun {
    results: PipelineResult[];
    summary: PipelineSummary;
}

export class PipelineOrchestrator {
    private analyzer: Analyzer;
    private validator: Validator;
    private analysisThrottle: Throttle;
    private validationThrottle: Throttle;
    private progress: ProgressReporter;
    private now: () => Date;

    constructor(options: PipelineOrchestratorOptions) {
        this.analyzer = options.analyzer;
        this.validator = options.validator;
        this.analysisThrottle = options.analysisThrottle ?? new IntervalThrottle();
        this.validationThrottle = options.validationThrottle ?? new IntervalThrottle();
        this.progress = options.progress ?? silentProgress;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Run both passes over the batch. Throws PipelineAbortedError if the
     * signal fires; stage failures never throw.
     */
    async run(articles: Article[], options: RunOptions = {}): Promise<PipelineRun> {
        const results = await this.analyzeAll(articles, options.signal);
        await this.validateAll(results, options.signal);

        return {
            results,
            summary: summarizeResults(results, articles.length),
        };
    }

    /**
     * Analysis phase: one attempt per usable article, in input order.
     */
    async analyzeAll(articles: Article[], signal?: AbortSignal): Promise<PipelineResult[]> {
        const results: PipelineResult[] = [];
        const total = articles.length;

        for (const [i, article] of articles.entries()) {
            const index = i + 1;
            this.checkAborted(signal, results);
            this.progress.progress({ phase: 'analysis', current: i, total, message: `Analyzing ${index}/${total}` });

            if (!isUsableArticle(article)) {
                this.progress.skipped(index, 'Missing required fields');
                continue;
            }

            const result: PipelineResult = {
                article,
                analysis: null,
                validation: null,
                timestamp: this.now().toISOString(),
                status: 'pending',
            };

            let analyzed = false;
            try {
                const record = await this.analyzer.analyze(article, signal);
                result.analysis = record.analysis;
                result.status = 'analyzed';
                analyzed = true;
            } catch (error) {
                this.rethrowIfAborted(error, signal, results);
                result.status = 'analysis_failed';
                result.error = errorMessage(error);
                this.progress.failure('analysis', index, result.error);
            }
            results.push(result);

            if (analyzed) {
                await this.pause(this.analysisThrottle, signal, results);
            }
        }

        this.progress.progress({ phase: 'analysis', current: total, total, message: 'Analysis complete!' });
        return results;
    }

    /**
     * Validation phase: every result still in `analyzed`, in result order.
     * Mutates the results in place.
     */
    async validateAll(results: PipelineResult[], signal?: AbortSignal): Promise<void> {
        const total = results.length;

        for (const [i, result] of results.entries()) {
            if (result.status !== 'analyzed' || result.analysis === null) {
                continue;
            }

            const index = i + 1;
            this.checkAborted(signal, results);
            this.progress.progress({ phase: 'validation', current: i, total, message: `Validating ${index}/${total}` });

            let validated = false;
            try {
                const validation = await this.validator.validate(result.article, result.analysis, signal);
                result.validation = {
                    ...validation,
                    article_title: result.article.title,
                    validated_at: this.now().toISOString(),
                };
                result.status = 'validated';
                validated = true;
            } catch (error) {
                this.rethrowIfAborted(error, signal, results);
                result.status = 'validation_failed';
                result.error = errorMessage(error);
                this.progress.failure('validation', index, result.error);
            }

            if (validated) {
                await this.pause(this.validationThrottle, signal, results);
            }
        }

        this.progress.progress({ phase: 'validation', current: total, total, message: 'Validation complete!' });
    }

    private checkAborted(signal: AbortSignal | undefined, results: PipelineResult[]): void {
        if (signal?.aborted) {
            throw new PipelineAbortedError(results);
        }
    }

    // A call cut short by the signal is an interrupt, not a stage failure
    private rethrowIfAborted(error: unknown, signal: AbortSignal | undefined, results: PipelineResult[]): void {
        if (signal?.aborted) {
            throw new PipelineAbortedError(results, { cause: error });
        }
    }

    private async pause(throttle: Throttle, signal: AbortSignal | undefined, results: PipelineResult[]): Promise<void> {
        try {
            await throttle.wait(signal);
        } catch (error) {
            this.rethrowIfAborted(error, signal, results);
            throw error;
        }
    }
}
