/**
 * Article Types
 *
 * Normalized news items as produced by an article source.
 */

export interface Article {
    /** Freshly generated UUID, unique per fetch */
    id: string;
    title: string;
    /** Article body, or the provider's description when the body is missing */
    content: string;
    /** Publisher display name, "Unknown" when the provider omits it */
    source: string;
    url: string | null;
    published_at: string | null;
}

/**
 * Anything that can produce a finite batch of normalized articles.
 */
export interface ArticleSource {
    /** Human readable provider name, written into raw_articles.json */
    readonly name: string;
    fetch(signal?: AbortSignal): Promise<Article[]>;
}

/**
 * Required-fields check, applied by sources when they normalize and again
 * at pipeline intake.
 */
export function isUsableArticle(article: Partial<Pick<Article, 'title' | 'content'>> | null | undefined): boolean {
    return Boolean(article?.title) && Boolean(article?.content);
}

/**
 * Output of the first model pass.
 */
export interface AnalysisRecord {
    title: string;
    analysis: string;
}

/**
 * Fields pulled out of free-form analysis text for rendering.
 */
export interface AnalysisFields {
    gist: string;
    sentiment: string;
    tone: string;
}
