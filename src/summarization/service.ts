/**
 * Summarization Service
 *
 * One model call per summary. Bounds are given to the model twice: as
 * guidance in the prompt and as a hard completion-token cap.
 */

import * as Logging from '@/logging';
import { SummarizationError, errorMessage } from '@/errors';
import type { LengthBounds, SummarizationClient, SummarizationService } from './types';

export interface ServiceOptions {
    model: string;
    getClient: () => SummarizationClient;
}

export const buildSystemPrompt = (bounds: LengthBounds): string => [
    'You summarize spoken video transcripts.',
    `Write one plain-text paragraph between ${bounds.minLength} and ${bounds.maxLength} tokens long.`,
    'Keep the concrete subjects, claims and comparisons the speaker makes.',
    'Do not add facts that are not in the transcript and do not mention the transcript itself.',
].join(' ');

export const create = (options: ServiceOptions): SummarizationService => {
    const logger = Logging.getLogger();

    const summarize = async (text: string, bounds: LengthBounds, signal?: AbortSignal): Promise<string> => {
        const startTime = Date.now();
        logger.debug('Summarizing %d chars with %s', text.length, options.model, { bounds });

        let content: string | null | undefined;
        try {
            const completion = await options.getClient().chat.completions.create({
                model: options.model,
                messages: [
                    { role: 'system', content: buildSystemPrompt(bounds) },
                    { role: 'user', content: text },
                ],
                max_completion_tokens: bounds.maxLength,
                temperature: 0,
            }, { signal });
            content = completion.choices[0]?.message.content;
        } catch (error) {
            logger.error('Summarization request failed: %s', errorMessage(error));
            throw new SummarizationError(`Summarization request failed: ${errorMessage(error)}`, { cause: error });
        }

        const summary = content?.trim();
        if (!summary) {
            throw new SummarizationError('No summary received from the model');
        }

        logger.debug('Summary of %d chars received in %dms', summary.length, Date.now() - startTime);
        return summary;
    };

    return { summarize };
};
