/**
 * Summarization Types
 */

/** Output length bounds, in model tokens */
export interface LengthBounds {
    maxLength: number;
    minLength: number;
}

export interface Transcript {
    text: string;
    tokenCount: number;
}

export interface SummarizationService {
    summarize(text: string, bounds: LengthBounds, signal?: AbortSignal): Promise<string>;
}

export interface Tokenizer {
    encode(text: string): number[];
    decode(tokens: number[]): string;
}

/**
 * The slice of the OpenAI client the summarization service calls.
 */
export interface SummarizationClient {
    chat: {
        completions: {
            create(
                body: {
                    model: string;
                    messages: Array<{ role: 'system' | 'user'; content: string }>;
                    max_completion_tokens: number;
                    temperature: number;
                },
                options?: { signal?: AbortSignal },
            ): Promise<{ choices: Array<{ message: { content: string | null }; finish_reason: string }> }>;
        };
    };
}
