/**
 * Chunked Summarizer
 *
 * Keeps every model call inside the input token budget. Transcripts within
 * the budget are summarized in one call. Longer ones are cut into
 * non-overlapping token windows, each window is summarized on its own
 * (map), and the joined partial summaries are summarized once more with the
 * caller's bounds (reduce), so the final length never depends on the
 * transcript length.
 */

import * as Logging from '@/logging';
import {
    DEFAULT_SUMMARY_MIN_LENGTH,
    EMPTY_TRANSCRIPT_SUMMARY,
    MAP_MAX_LENGTH,
    MAP_MIN_LENGTH,
    SHORT_INPUT_MAX_LENGTH,
    SHORT_INPUT_MIN_LENGTH,
    SHORT_INPUT_TOKENS,
} from '@/constants';
import { SummarizationError, errorMessage } from '@/errors';
import { HALVE_BOUNDS_ONCE, withRetry, type RetryPolicy } from './retry';
import type { LengthBounds, SummarizationService, Tokenizer, Transcript } from './types';

export interface ChunkedSummarizerOptions {
    inputTokenBudget: number;
    retryPolicy?: RetryPolicy<LengthBounds>;
}

export interface ChunkedSummarizer {
    summarize(transcript: Transcript, maxLength: number, signal?: AbortSignal): Promise<string>;
}

export const MAP_BOUNDS: LengthBounds = {
    maxLength: MAP_MAX_LENGTH,
    minLength: MAP_MIN_LENGTH,
};

export const requestedBounds = (maxLength: number): LengthBounds => ({
    maxLength,
    minLength: Math.min(DEFAULT_SUMMARY_MIN_LENGTH, Math.floor(maxLength / 2)),
});

/**
 * Shrinks the bounds for inputs too short to yield the requested length.
 */
export const fitBounds = (inputTokens: number, requested: LengthBounds): LengthBounds => {
    let { maxLength, minLength } = requested;
    if (inputTokens < SHORT_INPUT_TOKENS) {
        maxLength = Math.min(maxLength, SHORT_INPUT_MAX_LENGTH);
        minLength = Math.min(minLength, SHORT_INPUT_MIN_LENGTH);
    } else if (inputTokens < maxLength) {
        maxLength = Math.min(maxLength, Math.max(SHORT_INPUT_MAX_LENGTH, inputTokens));
        minLength = Math.min(minLength, Math.floor(maxLength / 2));
    }
    return { maxLength, minLength: Math.min(minLength, maxLength) };
};

export const splitWindows = (tokens: number[], windowSize: number): number[][] => {
    const windows: number[][] = [];
    for (let start = 0; start < tokens.length; start += windowSize) {
        windows.push(tokens.slice(start, start + windowSize));
    }
    return windows;
};

export const create = (
    service: SummarizationService,
    tokenizer: Tokenizer,
    options: ChunkedSummarizerOptions,
): ChunkedSummarizer => {
    const logger = Logging.getLogger();
    const budget = options.inputTokenBudget;
    const policy = options.retryPolicy ?? HALVE_BOUNDS_ONCE;

    const call = async (text: string, bounds: LengthBounds, signal?: AbortSignal): Promise<string> => {
        try {
            return await withRetry(
                (next) => service.summarize(text, next, signal),
                bounds,
                policy,
                (error, next) => logger.warn(
                    'Summarization failed (%s), retrying with max %d / min %d',
                    errorMessage(error), next.maxLength, next.minLength,
                ),
            );
        } catch (error) {
            if (error instanceof SummarizationError) {
                throw error;
            }
            throw new SummarizationError(errorMessage(error), { cause: error });
        }
    };

    const summarize = async (transcript: Transcript, maxLength: number, signal?: AbortSignal): Promise<string> => {
        if (!transcript.text.trim()) {
            return EMPTY_TRANSCRIPT_SUMMARY;
        }

        const requested = requestedBounds(maxLength);
        if (transcript.tokenCount <= budget) {
            return call(transcript.text, fitBounds(transcript.tokenCount, requested), signal);
        }

        const windows = splitWindows(tokenizer.encode(transcript.text), budget);
        logger.debug('Transcript of %d tokens split into %d windows of up to %d tokens', transcript.tokenCount, windows.length, budget);

        const partials = await Promise.all(windows.map(window =>
            call(tokenizer.decode(window), fitBounds(window.length, MAP_BOUNDS), signal),
        ));

        let combined = partials.map(partial => partial.trim()).join(' ');
        let combinedTokens = tokenizer.encode(combined).length;
        if (combinedTokens > budget) {
            logger.debug('Partial summaries total %d tokens, truncating to %d', combinedTokens, budget);
            combined = tokenizer.decode(tokenizer.encode(combined).slice(0, budget));
            combinedTokens = budget;
        }

        return call(combined, fitBounds(combinedTokens, requested), signal);
    };

    return { summarize };
};
