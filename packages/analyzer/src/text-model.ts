/**
 * Text Model
 *
 * The one seam between the pipeline and a generative text endpoint. The
 * analysis and validation clients receive a TextModel through their
 * constructors so tests can hand them canned responses.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';

export interface GenerateOptions {
    /** Cancels the request in flight */
    signal?: AbortSignal;
}

export interface TextModel {
    /** Model identifier, for logs */
    readonly id: string;
    generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface GeminiTextModelOptions {
    apiKey?: string;
    model?: string;
    temperature?: number;
    maxOutputTokens?: number;
    /** Ask Gemini for a JSON response body */
    json?: boolean;
}

export class GeminiTextModel implements TextModel {
    readonly id: string;

    private genAI: GoogleGenerativeAI;
    private temperature: number;
    private maxOutputTokens: number;
    private json: boolean;

    constructor(options: GeminiTextModelOptions = {}) {
        const apiKey = options.apiKey || process.env.GEMINI_API_KEY || '';
        if (!apiKey) {
            throw new Error('GEMINI_API_KEY is required');
        }

        this.genAI = new GoogleGenerativeAI(apiKey);
        this.id = options.model || 'gemini-2.0-flash';
        this.temperature = options.temperature ?? 0.3;
        this.maxOutputTokens = options.maxOutputTokens ?? 512;
        this.json = options.json ?? false;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        const model = this.genAI.getGenerativeModel({
            model: this.id,
            generationConfig: {
                temperature: this.temperature,
                maxOutputTokens: this.maxOutputTokens,
                ...(this.json ? { responseMimeType: 'application/json' } : {}),
            },
        });

        const result = await model.generateContent(prompt, { signal: options.signal });
        return result.response.text();
    }
}
