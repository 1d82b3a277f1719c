/**
 * NewsAPI Source
 *
 * Fetches the most recent articles matching a query from NewsAPI's
 * /v2/everything endpoint and normalizes them.
 */

import type { Article, ArticleSource } from '@newsdesk/types';
import { SourceError, errorMessage } from '@newsdesk/types';
import { NewsAPIResponseSchema } from './schema.js';
import { normalizeArticles } from './normalize.js';
import { fetchWithRetry, type FetchFn } from './fetch-with-retry.js';

export interface NewsAPISourceOptions {
    apiKey?: string;
    query?: string;
    maxArticles?: number;
    /** Per-request timeout in ms (default 10000) */
    timeoutMs?: number;
    language?: string;
    retries?: number;
    backoffMs?: number;
    fetchFn?: FetchFn;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    generateId?: () => string;
}

export class NewsAPISource implements ArticleSource {
    readonly name = 'NewsAPI';

    private apiKey: string;
    private baseUrl = 'https://newsapi.org/v2';
    private options: NewsAPISourceOptions;

    constructor(options: NewsAPISourceOptions = {}) {
        this.apiKey = options.apiKey || process.env.NEWSAPI_API_KEY || '';
        this.options = options;
    }

    /**
     * Fetch and normalize one page of articles. An abort through `signal`
     * rejects with the abort reason rather than a SourceError.
     */
    async fetch(signal?: AbortSignal): Promise<Article[]> {
        if (!this.apiKey) {
            throw new SourceError('Missing NEWSAPI_API_KEY in environment variables.');
        }

        const query = this.options.query || 'India politics';
        const params = new URLSearchParams({
            q: query,
            language: this.options.language || 'en',
            sortBy: 'publishedAt',
            pageSize: String(this.options.maxArticles ?? 12),
            apiKey: this.apiKey,
        });

        console.log(`[NewsAPISource] Searching "${query}" (pageSize ${params.get('pageSize')})`);

        let response: Response;
        try {
            response = await fetchWithRetry(`${this.baseUrl}/everything?${params.toString()}`, {
                retries: this.options.retries,
                backoffMs: this.options.backoffMs,
                timeoutMs: this.options.timeoutMs ?? 10_000,
                fetchFn: this.options.fetchFn,
                sleep: this.options.sleep,
                signal,
            });
        } catch (error) {
            if (signal?.aborted) {
                throw error;
            }
            throw new SourceError(`Failed to fetch news: ${errorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
            throw new SourceError(`Failed to fetch news: HTTP ${response.status}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new SourceError('NewsAPI returned a non-JSON body', { cause: error });
        }

        const parsed = NewsAPIResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new SourceError(`Unexpected NewsAPI payload: ${parsed.error.message}`);
        }
        if (parsed.data.status !== 'ok') {
            throw new SourceError(`NewsAPI error: ${parsed.data.message || parsed.data.code || parsed.data.status}`);
        }

        const articles = normalizeArticles(parsed.data.articles, this.options.generateId);
        console.log(`[NewsAPISource] ${articles.length}/${parsed.data.articles.length} articles survived normalization`);

        if (articles.length === 0) {
            throw new SourceError('No valid articles found after normalization.');
        }

        return articles;
    }
}
