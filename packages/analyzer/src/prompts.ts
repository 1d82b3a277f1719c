/**
 * Prompts for the analysis and validation passes.
 *
 * The analysis prompt asks for labelled sections that parseAnalysisOutput
 * reads back; the validation prompt asks for the exact JSON object that
 * parseValidationResponse accepts.
 */

import type { Article } from '@newsdesk/types';

export const TONES = ['urgent', 'analytical', 'satirical', 'balanced', 'alarming', 'optimistic', 'critical', 'neutral'] as const;

export function buildAnalysisPrompt(article: Article): string {
    return `You are a news intelligence analyst.
Analyze the following news article and provide:

1. **Gist**: A concise 1-2 sentence summary of the main news
2. **Sentiment**: Classify as Positive, Negative, or Neutral
3. **Tone**: Identify the tone (choose one: ${TONES.join(', ')})
4. **Key Entities**: List important people, organizations, or locations mentioned
5. **Why This Matters**: Brief explanation of significance

Article:
Title: ${article.title}
Source: ${article.source}
Content: ${article.content}

Format your response clearly with these exact headings:
GIST:
SENTIMENT:
TONE:
KEY ENTITIES:
WHY THIS MATTERS:`;
}

export function buildValidationPrompt(article: Article, analysisText: string): string {
    return `You are a validation expert. Your job is to validate whether an AI-generated analysis is accurate and high-quality.

ORIGINAL ARTICLE:
Title: ${article.title}
Source: ${article.source}
Content: ${article.content}

AI ANALYSIS TO VALIDATE:
${analysisText}

VALIDATION TASK:
1. Check if the summary accurately reflects the article content
2. Verify the sentiment classification is appropriate
3. Confirm key entities are correctly identified
4. Assess if "why this matters" is reasonable and insightful

Respond ONLY with a JSON object in this exact format:
{
  "verdict": "correct|partially_correct|incorrect",
  "confidence": 0.0-1.0,
  "issues": ["list of specific issues found, or empty array if none"],
  "strengths": ["list of what the analysis did well"],
  "overall_assessment": "brief overall evaluation"
}

Do not include any text before or after the JSON.`;
}
