/**
 * Article normalization
 *
 * Turns provider articles into Newsdesk articles and drops the unusable ones.
 * Every ArticleSource runs its output through one of these before returning.
 */

import { randomUUID } from 'node:crypto';
import { isUsableArticle, type Article } from '@newsdesk/types';
import type { NewsAPIArticle } from './schema.js';

export const MIN_CONTENT_LENGTH = 50;

function hasUsableBody(fields: { title: string; content: string }): boolean {
    return isUsableArticle(fields) && fields.content.length >= MIN_CONTENT_LENGTH;
}

export function normalizeArticles(
    raw: NewsAPIArticle[],
    generateId: () => string = randomUUID
): Article[] {
    const articles: Article[] = [];

    for (const item of raw) {
        const title = item.title?.trim() ?? '';
        // NewsAPI leaves `content` null for some publishers; the description is the next best body
        const content = (item.content || item.description)?.trim() ?? '';

        if (!hasUsableBody({ title, content })) {
            continue;
        }

        articles.push({
            id: generateId(),
            title,
            content,
            source: item.source?.name || 'Unknown',
            url: item.url ?? null,
            published_at: item.publishedAt ?? null,
        });
    }

    return articles;
}

/**
 * Re-apply the same rules to articles read back from storage. Ids and the
 * other fields are kept; title and content are trimmed.
 */
export function normalizeStoredArticles(stored: Article[]): Article[] {
    return stored
        .map(article => ({ ...article, title: article.title.trim(), content: article.content.trim() }))
        .filter(hasUsableBody);
}
