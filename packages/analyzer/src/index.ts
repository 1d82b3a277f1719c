/**
 * Newsdesk Analyzer Package
 *
 * Gemini-backed analysis and validation passes and the parsers that read
 * their output back.
 */

export { GeminiTextModel, type TextModel, type GeminiTextModelOptions, type GenerateOptions } from './text-model.js';
export { AnalysisClient } from './analysis-client.js';
export { ValidationClient } from './validation-client.js';
export { buildAnalysisPrompt, buildValidationPrompt, TONES } from './prompts.js';
export { parseAnalysisOutput, truncateText } from './output-parser.js';
export {
    parseValidationResponse, stripCodeFence,
    ValidationResponseSchema, type ValidationResponse,
} from './validation-parser.js';
export { CannedTextModel } from './canned-model.js';
