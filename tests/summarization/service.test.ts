import { describe, expect, test, vi } from 'vitest';
import * as Service from '@/summarization/service';
import { SummarizationError } from '@/errors';
import type { SummarizationClient } from '@/summarization';

const createClient = (content: string | null) => {
    const create = vi.fn(async () => ({ choices: [{ message: { content }, finish_reason: 'stop' }] }));
    const client: SummarizationClient = { chat: { completions: { create } } };
    return { create, client };
};

describe('Summarization service', () => {
    test('buildSystemPrompt states the bounds', () => {
        expect(Service.buildSystemPrompt({ maxLength: 100, minLength: 40 }))
            .toContain('Write one plain-text paragraph between 40 and 100 tokens long.');
    });

    test('sends the transcript with the bounds as a completion cap and trims the answer', async () => {
        const { create, client } = createClient('  A short summary.  ');
        const service = Service.create({ model: 'gpt-4o-mini', getClient: () => client });
        const bounds = { maxLength: 100, minLength: 40 };

        const summary = await service.summarize('the transcript', bounds);

        expect(summary).toBe('A short summary.');
        expect(create).toHaveBeenCalledWith({
            model: 'gpt-4o-mini',
            messages: [
                { role: 'system', content: Service.buildSystemPrompt(bounds) },
                { role: 'user', content: 'the transcript' },
            ],
            max_completion_tokens: 100,
            temperature: 0,
        }, { signal: undefined });
    });

    test('forwards the abort signal', async () => {
        const { create, client } = createClient('summary');
        const service = Service.create({ model: 'gpt-4o-mini', getClient: () => client });
        const controller = new AbortController();

        await service.summarize('text', { maxLength: 60, minLength: 10 }, controller.signal);

        expect(create.mock.calls[0]).toEqual([expect.anything(), { signal: controller.signal }]);
    });

    test('an empty answer is a SummarizationError', async () => {
        const { client } = createClient(null);
        const service = Service.create({ model: 'gpt-4o-mini', getClient: () => client });

        await expect(service.summarize('text', { maxLength: 60, minLength: 10 }))
            .rejects.toThrow(new SummarizationError('No summary received from the model'));
    });

    test('request failures are wrapped in a SummarizationError', async () => {
        const client: SummarizationClient = {
            chat: { completions: { create: vi.fn(async () => { throw new Error('rate limited'); }) } },
        };
        const service = Service.create({ model: 'gpt-4o-mini', getClient: () => client });

        const result = service.summarize('text', { maxLength: 60, minLength: 10 });

        await expect(result).rejects.toBeInstanceOf(SummarizationError);
        await expect(result).rejects.toThrow('Summarization request failed: rate limited');
    });
});
