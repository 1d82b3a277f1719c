/**
 * Newsdesk Reports Package
 *
 * Turns pipeline results into the JSON and markdown artifacts.
 */

export {
    sentimentBreakdown, countSentimentKeywords, verdictBreakdown, statusBreakdown, validatedResults,
    SENTIMENT_KEYWORDS, type SentimentKeyword, type VerdictBreakdown,
} from './breakdown.js';
export {
    buildAnalysisDocument, buildRawArticlesDocument,
    type AnalysisDocument, type RawArticlesDocument,
} from './documents.js';
export { buildMarkdownReport, verdictSymbol, formatVerdict, type MarkdownReportOptions } from './markdown.js';
export { buildDetailedReport, formatTimestamp, fileStamp } from './detailed-report.js';
export {
    ArtifactWriter, loadAnalysisDocument,
    RAW_ARTICLES_FILE, ANALYSIS_RESULTS_FILE, FINAL_REPORT_FILE,
    type ArtifactWriterOptions,
} from './writer.js';
