/**
 * Validation Client
 *
 * Second model pass: asks a model to grade the first pass's analysis against
 * the article and parses the JSON verdict.
 */

import type { Article, ValidationRecord } from '@newsdesk/types';
import { ValidationError, errorMessage } from '@newsdesk/types';
import type { TextModel } from './text-model.js';
import { buildValidationPrompt } from './prompts.js';
import { parseValidationResponse } from './validation-parser.js';

export class ValidationClient {
    private model: TextModel;

    constructor(model: TextModel) {
        this.model = model;
    }

    /**
     * Raw model output for the article/analysis pair.
     */
    async request(article: Article, analysisText: string, signal?: AbortSignal): Promise<string> {
        try {
            return await this.model.generate(buildValidationPrompt(article, analysisText), { signal });
        } catch (error) {
            throw new ValidationError(`Validation failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Request and parse a verdict. Throws ValidationError on transport
     * failure and ParseError when the output is not a verdict object.
     */
    async validate(article: Article, analysisText: string, signal?: AbortSignal): Promise<ValidationRecord> {
        const raw = await this.request(article, analysisText, signal);
        return parseValidationResponse(raw, article.title);
    }
}
