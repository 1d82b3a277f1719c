/**
 * Analysis Client
 *
 * First model pass: gist, sentiment, tone, entities and significance as
 * free-form labelled text.
 */

import type { AnalysisRecord, Article } from '@newsdesk/types';
import { AnalysisError, errorMessage } from '@newsdesk/types';
import type { TextModel } from './text-model.js';
import { buildAnalysisPrompt } from './prompts.js';

export class AnalysisClient {
    private model: TextModel;

    constructor(model: TextModel) {
        this.model = model;
    }

    async analyze(article: Article, signal?: AbortSignal): Promise<AnalysisRecord> {
        try {
            const analysis = await this.model.generate(buildAnalysisPrompt(article), { signal });
            return { title: article.title, analysis };
        } catch (error) {
            throw new AnalysisError(errorMessage(error), { cause: error });
        }
    }
}
