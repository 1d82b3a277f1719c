/**
 * Newsdesk News Source Package
 *
 * Article sources that produce normalized, filtered article batches.
 */

export { NewsAPISource, type NewsAPISourceOptions } from './newsapi.js';
export { normalizeArticles, normalizeStoredArticles, MIN_CONTENT_LENGTH } from './normalize.js';
export { fetchWithRetry, type RetryOptions, type FetchFn } from './fetch-with-retry.js';
export { NewsAPIResponseSchema, type NewsAPIArticle } from './schema.js';
