/**
 * Error taxonomy
 *
 * Per-item errors (acquisition, transcription, summarization, timeout) are
 * recovered into skip entries by the pipeline. InputError, AggregateFailure
 * and EmbeddingError (scoring runs once for the whole batch) reach the caller
 * as request-level failures.
 */

export type ErrorTag =
    | 'InputError'
    | 'AcquisitionError'
    | 'TranscriptionError'
    | 'SummarizationError'
    | 'TimeoutError'
    | 'EmbeddingError'
    | 'AggregateFailure';

export abstract class VidscoreError extends Error {
    abstract readonly tag: ErrorTag;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InputError extends VidscoreError {
    readonly tag = 'InputError' as const;
}

export class AcquisitionError extends VidscoreError {
    readonly tag = 'AcquisitionError' as const;
}

export class TranscriptionError extends VidscoreError {
    readonly tag = 'TranscriptionError' as const;
}

export class SummarizationError extends VidscoreError {
    readonly tag = 'SummarizationError' as const;
}

export class TimeoutError extends VidscoreError {
    readonly tag = 'TimeoutError' as const;
}

export class EmbeddingError extends VidscoreError {
    readonly tag = 'EmbeddingError' as const;
}

export type FailureStage = 'acquisition' | 'processing';

export interface SkipEntry {
    index: number;
    name?: string;
    url?: string;
    error: string;
}

export class AggregateFailure extends VidscoreError {
    readonly tag = 'AggregateFailure' as const;

    constructor(
        message: string,
        readonly stage: FailureStage,
        readonly skipped: SkipEntry[],
    ) {
        super(message);
    }
}

export const isVidscoreError = (error: unknown): error is VidscoreError => error instanceof VidscoreError;

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * Human-readable reason for a skip entry, e.g. "TranscriptionError: No audio track found in a.mp4"
 */
export const describeError = (error: unknown): string => {
    if (isVidscoreError(error)) {
        return `${error.tag}: ${error.message}`;
    }
    return errorMessage(error);
};
