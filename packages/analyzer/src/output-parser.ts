/**
 * Analysis Output Parser
 *
 * Best-effort extraction of the GIST / SENTIMENT / TONE sections from the
 * analysis pass. Models put labels in bold, on their own line, in mixed case
 * or leave them out entirely, so this is a set of line rules rather than a
 * grammar and it never throws.
 */

import type { AnalysisFields } from '@newsdesk/types';

const FALLBACK_GIST_LENGTH = 200;
const SEPARATOR = ':';

// Checked in order; the first label found before a line's separator claims it
const LABELS: Array<{ pattern: RegExp; field: keyof AnalysisFields }> = [
    { pattern: /\bGIST\b/i, field: 'gist' },
    { pattern: /\bSENTIMENT\b/i, field: 'sentiment' },
    { pattern: /\bTONE\b/i, field: 'tone' },
];

export function parseAnalysisOutput(text: string): AnalysisFields {
    const fields: AnalysisFields = { gist: '', sentiment: '', tone: '' };
    const lines = text.split('\n');

    lines.forEach((line, i) => {
        const separatorAt = line.indexOf(SEPARATOR);
        if (separatorAt === -1) return;

        const label = line.slice(0, separatorAt);
        const rule = LABELS.find(({ pattern }) => pattern.test(label));
        if (!rule) return;

        // "**GIST:** text" leaves the closing bold marker after the separator
        let value = line.slice(separatorAt + 1).replace(/^\s*\*+/, '').trim();
        // "GIST:" alone on a line, value underneath
        if (!value && i + 1 < lines.length) {
            value = lines[i + 1].trim();
        }
        fields[rule.field] = value;
    });

    // Also covers text with no labels at all, where sentiment and tone stay empty
    if (!fields.gist) {
        fields.gist = truncateText(text, FALLBACK_GIST_LENGTH);
    }

    return fields;
}

/**
 * Cut text to maxLength characters, appending "..." when something was cut.
 */
export function truncateText(text: string | null | undefined, maxLength = 500): string {
    if (!text) {
        return '';
    }
    if (text.length <= maxLength) {
        return text;
    }
    return text.slice(0, maxLength) + '...';
}
