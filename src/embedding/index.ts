/**
 * Embedding Service
 *
 * One request per batch; the response is reordered by index so vector i
 * always belongs to input i.
 */

import * as Logging from '@/logging';
import { EmbeddingError, errorMessage } from '@/errors';

export interface EmbeddingService {
    embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * The slice of the OpenAI client the embedding service calls.
 */
export interface EmbeddingClient {
    embeddings: {
        create(
            body: { model: string; input: string[] },
            options?: { signal?: AbortSignal },
        ): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
    };
}

export interface CreateOptions {
    model: string;
    getClient: () => EmbeddingClient;
}

export const create = (options: CreateOptions): EmbeddingService => {
    const logger = Logging.getLogger();

    const embed = async (texts: string[], signal?: AbortSignal): Promise<number[][]> => {
        if (texts.length === 0) {
            return [];
        }

        const startTime = Date.now();
        let data: Array<{ embedding: number[]; index: number }>;
        try {
            const response = await options.getClient().embeddings.create({
                model: options.model,
                input: texts,
            }, { signal });
            data = response.data;
        } catch (error) {
            logger.error('Embedding request failed: %s', errorMessage(error));
            throw new EmbeddingError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
        }

        if (data.length !== texts.length) {
            throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${data.length}`);
        }

        const vectors = [...data].sort((a, b) => a.index - b.index).map(item => item.embedding);
        const dimension = vectors[0].length;
        if (vectors.some(vector => vector.length !== dimension)) {
            throw new EmbeddingError('Embeddings in one batch have different dimensions');
        }

        logger.debug('Embedded %d texts (%d dimensions) in %dms', texts.length, dimension, Date.now() - startTime);
        return vectors;
    };

    return { embed };
};
