/**
 * Canned Text Model
 *
 * Replays a fixed list of responses in order. Backs the demo command and the
 * pipeline tests; an Error in the list is thrown instead of returned.
 */

import type { GenerateOptions, TextModel } from './text-model.js';

export class CannedTextModel implements TextModel {
    readonly id: string;
    readonly prompts: string[] = [];

    private responses: Array<string | Error>;
    private cursor = 0;

    constructor(responses: Array<string | Error>, id = 'canned') {
        this.responses = responses;
        this.id = id;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
        options.signal?.throwIfAborted();
        this.prompts.push(prompt);
        const next = this.responses[this.cursor++];
        if (next === undefined) {
            throw new Error(`CannedTextModel "${this.id}" ran out of responses`);
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }
}
