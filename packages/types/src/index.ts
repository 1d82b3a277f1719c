/**
 * Newsdesk Types - Shared TypeScript interfaces
 */

export * from './article.js';
export * from './validation.js';
export * from './pipeline.js';
export * from './errors.js';
