import { describe, expect, it, vi } from 'vitest';
import { SourceError } from '@newsdesk/types';
import { NewsAPISource } from './newsapi.js';
import type { FetchFn } from './fetch-with-retry.js';

const BODY = 'Officials confirmed the new transit line will open to passengers next spring.';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

const noSleep = async () => {};

describe('NewsAPISource', () => {
    it('fails fast without an API key', async () => {
        const fetchFn = vi.fn<FetchFn>();
        const previous = process.env.NEWSAPI_API_KEY;
        delete process.env.NEWSAPI_API_KEY;
        try {
            await expect(new NewsAPISource({ fetchFn }).fetch()).rejects.toThrow(SourceError);
            await expect(new NewsAPISource({ apiKey: '', fetchFn }).fetch()).rejects.toThrow('Missing NEWSAPI_API_KEY');
        } finally {
            if (previous !== undefined) process.env.NEWSAPI_API_KEY = previous;
        }
        expect(fetchFn).not.toHaveBeenCalled();
    });

    it('builds the search request and normalizes the payload', async () => {
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({
            status: 'ok',
            totalResults: 2,
            articles: [
                { title: 'Transit line opens', content: BODY, source: { name: 'City Desk' }, url: 'https://example.com/t', publishedAt: '2026-02-01T08:00:00Z' },
                { title: 'Too short', content: 'brief' },
            ],
        }));

        const source = new NewsAPISource({
            apiKey: 'test-key',
            query: 'transit',
            maxArticles: 5,
            fetchFn,
            generateId: () => 'fixed-id',
        });
        const articles = await source.fetch();

        const url = new URL(fetchFn.mock.calls[0][0]);
        expect(url.pathname).toBe('/v2/everything');
        expect(url.searchParams.get('q')).toBe('transit');
        expect(url.searchParams.get('pageSize')).toBe('5');
        expect(url.searchParams.get('sortBy')).toBe('publishedAt');
        expect(url.searchParams.get('language')).toBe('en');
        expect(url.searchParams.get('apiKey')).toBe('test-key');

        expect(articles).toEqual([{
            id: 'fixed-id',
            title: 'Transit line opens',
            content: BODY,
            source: 'City Desk',
            url: 'https://example.com/t',
            published_at: '2026-02-01T08:00:00Z',
        }]);
    });

    it('retries transient failures before succeeding', async () => {
        const fetchFn = vi.fn<FetchFn>()
            .mockResolvedValueOnce(jsonResponse({}, 503))
            .mockRejectedValueOnce(new Error('socket hang up'))
            .mockResolvedValueOnce(jsonResponse({ status: 'ok', articles: [{ title: 'Ok', content: BODY }] }));

        const articles = await new NewsAPISource({ apiKey: 'test-key', fetchFn, sleep: noSleep }).fetch();

        expect(fetchFn).toHaveBeenCalledTimes(3);
        expect(articles).toHaveLength(1);
    });

    it('raises SourceError once the retry budget is spent', async () => {
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({}, 429));
        const source = new NewsAPISource({ apiKey: 'test-key', fetchFn, sleep: noSleep, retries: 2 });

        await expect(source.fetch()).rejects.toThrow('Failed to fetch news: HTTP 429');
        expect(fetchFn).toHaveBeenCalledTimes(3);
    });

    it('releases the body of a response it retries', async () => {
        const busy = jsonResponse({ status: 'error', code: 'rateLimited' }, 429);
        const fetchFn = vi.fn<FetchFn>()
            .mockResolvedValueOnce(busy)
            .mockResolvedValueOnce(jsonResponse({ status: 'ok', articles: [{ title: 'Ok', content: BODY }] }));

        await new NewsAPISource({ apiKey: 'test-key', fetchFn, sleep: noSleep }).fetch();

        expect(busy.bodyUsed).toBe(true);
    });

    it('stops retrying once the caller aborts', async () => {
        const controller = new AbortController();
        const fetchFn = vi.fn<FetchFn>(async () => {
            controller.abort();
            return jsonResponse({}, 503);
        });
        const source = new NewsAPISource({ apiKey: 'test-key', fetchFn, sleep: noSleep });

        const error = await source.fetch(controller.signal).catch((e: unknown) => e);

        expect(fetchFn).toHaveBeenCalledTimes(1);
        expect(error).not.toBeInstanceOf(SourceError);
        expect(error instanceof Error && error.name).toBe('AbortError');
    });

    it('passes the caller signal to each request', async () => {
        const controller = new AbortController();
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ status: 'ok', articles: [{ title: 'Ok', content: BODY }] }));

        await new NewsAPISource({ apiKey: 'test-key', fetchFn }).fetch(controller.signal);
        const signal = fetchFn.mock.calls[0][1]?.signal;
        expect(signal?.aborted).toBe(false);

        controller.abort();
        expect(signal?.aborted).toBe(true);
    });

    it('does not retry client errors', async () => {
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ status: 'error', code: 'apiKeyInvalid' }, 401));
        const source = new NewsAPISource({ apiKey: 'test-key', fetchFn, sleep: noSleep });

        await expect(source.fetch()).rejects.toThrow('Failed to fetch news: HTTP 401');
        expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('raises SourceError when nothing survives normalization', async () => {
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ status: 'ok', articles: [{ title: 'x', content: null }] }));
        const source = new NewsAPISource({ apiKey: 'test-key', fetchFn });

        await expect(source.fetch()).rejects.toThrow('No valid articles found after normalization.');
    });

    it('rejects payloads of the wrong shape', async () => {
        const fetchFn = vi.fn<FetchFn>(async () => jsonResponse({ status: 'ok', articles: 'nope' }));
        const source = new NewsAPISource({ apiKey: 'test-key', fetchFn });

        await expect(source.fetch()).rejects.toThrow(SourceError);
    });
});
