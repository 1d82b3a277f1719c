/**
 * NewsAPI payload schema
 *
 * Only the fields we normalize are declared; everything else passes through.
 */

import { z } from 'zod';

const NewsAPIArticleSchema = z.object({
    source: z.object({
        id: z.string().nullish(),
        name: z.string().nullish(),
    }).nullish(),
    author: z.string().nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    url: z.string().nullish(),
    urlToImage: z.string().nullish(),
    publishedAt: z.string().nullish(),
    content: z.string().nullish(),
});

export const NewsAPIResponseSchema = z.object({
    status: z.string(),
    totalResults: z.number().optional(),
    articles: z.array(NewsAPIArticleSchema).default([]),
    code: z.string().optional(),
    message: z.string().optional(),
});

export type NewsAPIArticle = z.infer<typeof NewsAPIArticleSchema>;
