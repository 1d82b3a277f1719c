/**
 * Error taxonomy
 *
 * SourceError aborts a batch before processing starts. AnalysisError and
 * ValidationError are recorded on the affected PipelineResult and the batch
 * continues.
 */

export class NewsdeskError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The article source could not produce a usable batch. */
export class SourceError extends NewsdeskError {}

/** The analysis pass failed for one article. */
export class AnalysisError extends NewsdeskError {}

/** The validation pass failed for one article. */
export class ValidationError extends NewsdeskError {}

/**
 * The validation pass answered, but not with a well-formed verdict object.
 */
export class ParseError extends ValidationError {
    readonly raw: string;

    constructor(message: string, raw: string, options?: { cause?: unknown }) {
        super(message, options);
        this.raw = raw;
    }
}

/** An artifact could not be written to disk. */
export class ReportWriteError extends NewsdeskError {}

/**
 * The batch was interrupted. Carries whatever results were complete at the
 * time so a caller can decide whether to keep them.
 */
export class PipelineAbortedError<T = unknown> extends NewsdeskError {
    readonly partialResults: T[];

    constructor(partialResults: T[], options?: { cause?: unknown }) {
        super('Pipeline interrupted', options);
        this.partialResults = partialResults;
    }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
