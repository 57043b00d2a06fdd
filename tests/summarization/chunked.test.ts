import { describe, expect, test, vi } from 'vitest';
import * as Chunked from '@/summarization/chunked';
import type { RetryPolicy } from '@/summarization/retry';
import { SummarizationError } from '@/errors';
import type { LengthBounds, SummarizationService, Tokenizer, Transcript } from '@/summarization';

// One token per whitespace-separated word
const createTokenizer = (): Tokenizer => {
    const ids = new Map<string, number>();
    const words: string[] = [];
    return {
        encode: (text) => text.split(/\s+/).filter(word => word.length > 0).map(word => {
            let id = ids.get(word);
            if (id === undefined) {
                id = words.length;
                ids.set(word, id);
                words.push(word);
            }
            return id;
        }),
        decode: (tokens) => tokens.map(token => words[token]).join(' '),
    };
};

const transcriptOf = (count: number): Transcript => ({
    text: Array.from({ length: count }, (_, i) => `w${i}`).join(' '),
    tokenCount: count,
});

// Windows come back as "part <first word>", the reduce pass as "final summary"
const createService = () => {
    const summarize = vi.fn(async (text: string, _bounds: LengthBounds, _signal?: AbortSignal) =>
        text.startsWith('w') ? `part ${text.split(' ')[0]}` : 'final summary');
    const service: SummarizationService = { summarize };
    return { summarize, service };
};

describe('Chunked summarizer', () => {
    describe('fitBounds', () => {
        test('leaves long inputs at the requested bounds', () => {
            expect(Chunked.fitBounds(500, { maxLength: 180, minLength: 60 })).toEqual({ maxLength: 180, minLength: 60 });
        });

        test('caps very short inputs', () => {
            expect(Chunked.fitBounds(10, { maxLength: 180, minLength: 60 })).toEqual({ maxLength: 60, minLength: 10 });
        });

        test('shrinks the bounds for inputs shorter than the requested max', () => {
            expect(Chunked.fitBounds(100, { maxLength: 180, minLength: 60 })).toEqual({ maxLength: 100, minLength: 50 });
            expect(Chunked.fitBounds(40, { maxLength: 180, minLength: 60 })).toEqual({ maxLength: 60, minLength: 30 });
        });

        test('never lets min exceed max', () => {
            expect(Chunked.fitBounds(500, { maxLength: 20, minLength: 60 })).toEqual({ maxLength: 20, minLength: 20 });
        });
    });

    test('requestedBounds derives the minimum from the maximum', () => {
        expect(Chunked.requestedBounds(180)).toEqual({ maxLength: 180, minLength: 60 });
        expect(Chunked.requestedBounds(80)).toEqual({ maxLength: 80, minLength: 40 });
    });

    test('splitWindows cuts non-overlapping windows in order', () => {
        expect(Chunked.splitWindows([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(Chunked.splitWindows([], 2)).toEqual([]);
    });

    test('an empty transcript is not sent to the model', async () => {
        const { summarize, service } = createService();
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 900 });

        await expect(summarizer.summarize({ text: '  \n ', tokenCount: 0 }, 180)).resolves.toBe('No content to summarize.');
        expect(summarize).not.toHaveBeenCalled();
    });

    test('a transcript within the budget is summarized in one call', async () => {
        const { summarize, service } = createService();
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 900 });
        const transcript = transcriptOf(100);

        await expect(summarizer.summarize(transcript, 180)).resolves.toBe('part w0');
        expect(summarize).toHaveBeenCalledTimes(1);
        expect(summarize).toHaveBeenCalledWith(transcript.text, { maxLength: 100, minLength: 50 }, undefined);
    });

    test('a transcript over the budget is mapped per window and reduced once', async () => {
        const { summarize, service } = createService();
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 10 });

        const summary = await summarizer.summarize(transcriptOf(25), 180);

        expect(summary).toBe('final summary');
        expect(summarize.mock.calls.map(([text, bounds]) => [text, bounds])).toEqual([
            ['w0 w1 w2 w3 w4 w5 w6 w7 w8 w9', { maxLength: 60, minLength: 10 }],
            ['w10 w11 w12 w13 w14 w15 w16 w17 w18 w19', { maxLength: 60, minLength: 10 }],
            ['w20 w21 w22 w23 w24', { maxLength: 60, minLength: 10 }],
            ['part w0 part w10 part w20', { maxLength: 60, minLength: 10 }],
        ]);
    });

    test('joined partial summaries over the budget are truncated before the reduce pass', async () => {
        const { summarize, service } = createService();
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 4 });

        await summarizer.summarize(transcriptOf(10), 180);

        expect(summarize).toHaveBeenCalledTimes(4);
        expect(summarize.mock.calls[3][0]).toBe('part w0 part w4');
    });

    test('the reduce pass uses the caller\'s bounds, not the map bounds', async () => {
        const summarize = vi.fn(async (text: string, _bounds: LengthBounds) =>
            text.startsWith('w') ? Array.from({ length: 200 }, () => 'long').join(' ') : 'final summary');
        const summarizer = Chunked.create({ summarize }, createTokenizer(), { inputTokenBudget: 300 });

        await summarizer.summarize(transcriptOf(600), 120);

        // Both windows come back as 200 words; joined they are cut to 300 tokens
        expect(summarize).toHaveBeenCalledTimes(3);
        expect(summarize.mock.calls[0][1]).toEqual({ maxLength: 150, minLength: 40 });
        expect(summarize.mock.calls[2][1]).toEqual({ maxLength: 120, minLength: 60 });
    });

    test('a failing call is retried once with halved bounds', async () => {
        const { summarize, service } = createService();
        summarize.mockRejectedValueOnce(new SummarizationError('overloaded'));
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 900 });

        await expect(summarizer.summarize(transcriptOf(100), 180)).resolves.toBe('part w0');
        expect(summarize.mock.calls.map(([, bounds]) => bounds)).toEqual([
            { maxLength: 100, minLength: 50 },
            { maxLength: 50, minLength: 25 },
        ]);
    });

    test('a second failure surfaces as a SummarizationError', async () => {
        const summarize = vi.fn(async (_text: string, _bounds: LengthBounds): Promise<string> => {
            throw new Error('socket hang up');
        });
        const summarizer = Chunked.create({ summarize }, createTokenizer(), { inputTokenBudget: 900 });

        const result = summarizer.summarize(transcriptOf(100), 180);

        await expect(result).rejects.toBeInstanceOf(SummarizationError);
        await expect(result).rejects.toThrow('socket hang up');
        expect(summarize).toHaveBeenCalledTimes(2);
    });

    test('the retry policy can be replaced', async () => {
        const summarize = vi.fn(async (_text: string, _bounds: LengthBounds): Promise<string> => {
            throw new SummarizationError('down');
        });
        const noRetry: RetryPolicy<LengthBounds> = { retries: 0, transform: bounds => bounds };
        const summarizer = Chunked.create({ summarize }, createTokenizer(), { inputTokenBudget: 900, retryPolicy: noRetry });

        await expect(summarizer.summarize(transcriptOf(100), 180)).rejects.toThrow('down');
        expect(summarize).toHaveBeenCalledTimes(1);
    });

    test('the abort signal reaches every call', async () => {
        const { summarize, service } = createService();
        const summarizer = Chunked.create(service, createTokenizer(), { inputTokenBudget: 10 });
        const controller = new AbortController();

        await summarizer.summarize(transcriptOf(15), 180, controller.signal);

        expect(summarize).toHaveBeenCalledTimes(3);
        summarize.mock.calls.forEach(call => expect(call[2]).toBe(controller.signal));
    });
});
