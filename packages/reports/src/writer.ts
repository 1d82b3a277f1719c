/**
 * Artifact Writer
 *
 * Persists the run's artifacts into one output directory. Each file is
 * written to a temporary name and renamed into place, so an interrupted run
 * never leaves a half-written artifact behind.
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { Article, PipelineResult } from '@newsdesk/types';
import { ReportWriteError, errorMessage } from '@newsdesk/types';
import { buildAnalysisDocument, buildRawArticlesDocument, type AnalysisDocument } from './documents.js';
import { buildMarkdownReport } from './markdown.js';
import { buildDetailedReport, fileStamp } from './detailed-report.js';
import { AnalysisDocumentSchema } from './schema.js';

export const RAW_ARTICLES_FILE = 'raw_articles.json';
export const ANALYSIS_RESULTS_FILE = 'analysis_results.json';
export const FINAL_REPORT_FILE = 'final_report.md';

export interface ArtifactWriterOptions {
    outputDir?: string;
    now?: () => Date;
}

const DEFAULT_SOURCE = 'NewsAPI';

export class ArtifactWriter {
    readonly outputDir: string;
    private now: () => Date;

    constructor(options: ArtifactWriterOptions = {}) {
        this.outputDir = options.outputDir ?? 'output';
        this.now = options.now ?? (() => new Date());
    }

    /**
     * @param sourceName - provider recorded in the document's metadata
     */
    async writeRawArticles(articles: Article[], sourceName = DEFAULT_SOURCE): Promise<string> {
        const doc = buildRawArticlesDocument(articles, sourceName, this.now());
        return this.write(RAW_ARTICLES_FILE, toJson(doc), 'raw articles');
    }

    async writeAnalysisResults(results: PipelineResult[]): Promise<string> {
        return this.write(ANALYSIS_RESULTS_FILE, toJson(buildAnalysisDocument(results, this.now())), 'analysis results');
    }

    async writeFinalReport(results: PipelineResult[], sourceName = DEFAULT_SOURCE): Promise<string> {
        const md = buildMarkdownReport(results, { now: this.now(), source: sourceName });
        return this.write(FINAL_REPORT_FILE, md, 'final report');
    }

    async writeDetailedReport(results: PipelineResult[]): Promise<string> {
        const now = this.now();
        return this.write(`analysis_report_${fileStamp(now)}.md`, buildDetailedReport(results, now), 'detailed report');
    }

    private async write(fileName: string, contents: string, label: string): Promise<string> {
        const filePath = path.join(this.outputDir, fileName);
        const tmpPath = `${filePath}.tmp`;
        try {
            await mkdir(this.outputDir, { recursive: true });
            await writeFile(tmpPath, contents, 'utf-8');
            await rename(tmpPath, filePath);
        } catch (error) {
            await removeTemporary(tmpPath);
            throw new ReportWriteError(`Failed to save ${label}: ${errorMessage(error)}`, { cause: error });
        }
        return filePath;
    }
}

async function removeTemporary(tmpPath: string): Promise<void> {
    try {
        await unlink(tmpPath);
    } catch (error) {
        const code = error instanceof Error && 'code' in error ? error.code : undefined;
        // Nothing was written, or the directory itself is missing
        if (code === 'ENOENT' || code === 'ENOTDIR') return;
        console.warn(`[ArtifactWriter] Could not remove ${tmpPath}: ${errorMessage(error)}`);
    }
}

function toJson(value: unknown): string {
    return JSON.stringify(value, null, 2) + '\n';
}

/**
 * Read and validate a previously written analysis_results.json.
 */
export async function loadAnalysisDocument(outputDir: string): Promise<AnalysisDocument> {
    const filePath = path.join(outputDir, ANALYSIS_RESULTS_FILE);
    const text = await readFile(filePath, 'utf-8');
    return AnalysisDocumentSchema.parse(JSON.parse(text));
}
