/**
 * Validation Parser
 *
 * Parses the validation pass's JSON verdict. Unlike the analysis output this
 * is strict: anything that is not exactly the requested object is a
 * ParseError, never a default.
 */

import { z } from 'zod';
import { ParseError, VERDICTS, type ValidationRecord } from '@newsdesk/types';

export const ValidationResponseSchema = z.object({
    verdict: z.enum(VERDICTS),
    confidence: z.number().min(0).max(1),
    issues: z.array(z.string()),
    strengths: z.array(z.string()),
    overall_assessment: z.string(),
}).strict();

export type ValidationResponse = z.infer<typeof ValidationResponseSchema>;

// One opening fence with an optional language tag, one closing fence
const OPENING_FENCE = /^```[\w-]*[ \t]*\r?\n?/;
const CLOSING_FENCE = /\r?\n?```$/;

/**
 * Remove a single markdown code fence pair around the text, if present.
 */
export function stripCodeFence(text: string): string {
    let body = text.trim();
    if (OPENING_FENCE.test(body)) {
        body = body.replace(OPENING_FENCE, '');
    }
    if (CLOSING_FENCE.test(body)) {
        body = body.replace(CLOSING_FENCE, '');
    }
    return body.trim();
}

/**
 * Parse raw validation output into a ValidationRecord for the given article.
 * `validated_at` is left null for the caller to stamp on completion.
 */
export function parseValidationResponse(raw: string, articleTitle: string): ValidationRecord {
    const body = stripCodeFence(raw);

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (error) {
        console.error('[ValidationParser] Failed to parse JSON from text:', raw.substring(0, 200));
        throw new ParseError(
            `Failed to parse validation response as JSON: ${error instanceof Error ? error.message : String(error)}\nResponse: ${raw}`,
            raw,
            { cause: error }
        );
    }

    const result = ValidationResponseSchema.safeParse(parsed);
    if (!result.success) {
        const details = result.error.errors
            .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
            .join('; ');
        throw new ParseError(`Validation response has the wrong shape: ${details}\nResponse: ${raw}`, raw);
    }

    return {
        ...result.data,
        article_title: articleTitle,
        validated_at: null,
    };
}
