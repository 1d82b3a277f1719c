/**
 * Demo mode
 *
 * Runs real (or file-provided) articles through the pipeline against canned
 * model responses, so the artifacts can be produced without model quota.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Article, ArticleSource } from '@newsdesk/types';
import { SourceError, errorMessage } from '@newsdesk/types';
import { CannedTextModel, ValidationResponseSchema } from '@newsdesk/analyzer';
import { normalizeStoredArticles } from '@newsdesk/news-source';

const DemoResponsesSchema = z.object({
    analyses: z.array(z.string()).min(1),
    validations: z.array(ValidationResponseSchema).min(1),
});

export type DemoResponses = z.infer<typeof DemoResponsesSchema>;

const DEMO_RESPONSES_URL = new URL('../data/demo-responses.json', import.meta.url);

export async function loadDemoResponses(location: URL | string = DEMO_RESPONSES_URL): Promise<DemoResponses> {
    const text = await readFile(location, 'utf-8');
    return DemoResponsesSchema.parse(JSON.parse(text));
}

/**
 * Canned analysis and validation models; `size` is how many articles they can serve.
 */
export function createDemoModels(responses: DemoResponses): {
    analysisModel: CannedTextModel;
    validationModel: CannedTextModel;
    size: number;
} {
    const size = Math.min(responses.analyses.length, responses.validations.length);
    return {
        analysisModel: new CannedTextModel(responses.analyses.slice(0, size), 'demo-analysis'),
        validationModel: new CannedTextModel(
            responses.validations.slice(0, size).map(v => JSON.stringify(v, null, 2)),
            'demo-validation'
        ),
        size,
    };
}

const RawArticlesFileSchema = z.object({
    articles: z.array(z.object({
        id: z.string(),
        title: z.string(),
        content: z.string(),
        source: z.string(),
        url: z.string().nullable(),
        published_at: z.string().nullable(),
    })),
});

/**
 * Reads articles from a previously written raw_articles.json and applies the
 * same article rules as the live source.
 */
export class FileArticleSource implements ArticleSource {
    readonly name: string;
    private filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
        this.name = `file:${filePath}`;
    }

    async fetch(signal?: AbortSignal): Promise<Article[]> {
        let data: unknown;
        try {
            data = JSON.parse(await readFile(this.filePath, { encoding: 'utf-8', signal }));
        } catch (error) {
            throw new SourceError(`Could not read articles from ${this.filePath}: ${errorMessage(error)}`, { cause: error });
        }

        const parsed = RawArticlesFileSchema.safeParse(data);
        if (!parsed.success) {
            throw new SourceError(`${this.filePath} is not a raw_articles.json file`);
        }
        if (parsed.data.articles.length === 0) {
            throw new SourceError(`No articles in ${this.filePath}`);
        }

        const articles = normalizeStoredArticles(parsed.data.articles);
        if (articles.length === 0) {
            throw new SourceError(`No valid articles in ${this.filePath} after normalization.`);
        }
        return articles;
    }
}
