/**
 * Pipeline error taxonomy
 *
 * Every failure the match pipeline surfaces to its caller is one of these
 * classes. `code` is stable and safe to return over HTTP.
 */

export type PipelineErrorCode =
    | 'EXTRACTION_FAILED'
    | 'UNSUPPORTED_FORMAT'
    | 'STRUCTURING_FAILED'
    | 'GRADING_FAILED'
    | 'INVALID_SCORE'
    | 'AMBIGUOUS_DATE'
    | 'INVALID_PIPELINE_STATE';

export abstract class PipelineError extends Error {
    abstract readonly code: PipelineErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Resume could not be turned into text
export class ExtractionError extends PipelineError {
    readonly code: PipelineErrorCode = 'EXTRACTION_FAILED';
}

export class UnsupportedFormatError extends ExtractionError {
    readonly code: PipelineErrorCode = 'UNSUPPORTED_FORMAT';
}

// LLM output was unusable after the retry
export class StructuringError extends PipelineError {
    readonly code: PipelineErrorCode = 'STRUCTURING_FAILED';
}

export class GradingError extends PipelineError {
    readonly code: PipelineErrorCode = 'GRADING_FAILED';
}

export class InvalidScoreError extends PipelineError {
    readonly code: PipelineErrorCode = 'INVALID_SCORE';
}

/**
 * Raised while reading a work-experience entry whose dates make no sense.
 * The experience evaluator recovers from it locally: the entry is excluded
 * and flagged, the run continues.
 */
export class AmbiguousDateError extends PipelineError {
    readonly code: PipelineErrorCode = 'AMBIGUOUS_DATE';

    constructor(
        message: string,
        readonly entryIndex: number,
        readonly rawValue: string
    ) {
        super(message);
    }
}

export class PipelineStateError extends PipelineError {
    readonly code: PipelineErrorCode = 'INVALID_PIPELINE_STATE';
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}
