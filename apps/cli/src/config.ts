/**
 * Configuration
 *
 * Read from the environment (and .env via dotenv at the entry point).
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
    NEWSAPI_API_KEY: z.string().default(''),
    GEMINI_API_KEY: z.string().default(''),
    NEWS_QUERY: z.string().min(1).default('India politics'),
    MAX_ARTICLES: positiveInt(12).pipe(z.number().max(100, 'NewsAPI pages hold at most 100 articles')),
    REQUEST_TIMEOUT: positiveInt(10),
    THROTTLE_MS: z.coerce.number().int().nonnegative().default(13_000),
    ANALYSIS_MODEL: z.string().min(1).default('gemini-2.0-flash'),
    VALIDATION_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    OUTPUT_DIR: z.string().min(1).default('output'),
});

export interface NewsdeskConfig {
    newsApiKey: string;
    geminiApiKey: string;
    query: string;
    maxArticles: number;
    requestTimeoutMs: number;
    throttleMs: number;
    analysisModel: string;
    validationModel: string;
    outputDir: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Validate the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NewsdeskConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = ConfigSchema.safeParse(present);
    if (!parsed.success) {
        const details = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const c = parsed.data;
    return {
        newsApiKey: c.NEWSAPI_API_KEY,
        geminiApiKey: c.GEMINI_API_KEY,
        query: c.NEWS_QUERY,
        maxArticles: c.MAX_ARTICLES,
        requestTimeoutMs: c.REQUEST_TIMEOUT * 1000,
        throttleMs: c.THROTTLE_MS,
        analysisModel: c.ANALYSIS_MODEL,
        validationModel: c.VALIDATION_MODEL,
        outputDir: c.OUTPUT_DIR,
    };
}
