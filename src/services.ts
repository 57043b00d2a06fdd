/**
 * Service container
 *
 * Built once at startup and handed to the pipeline by reference. The OpenAI
 * client behind the model-backed services is created on first use and then
 * shared, read-only, by every concurrent item.
 */

import OpenAI from 'openai';
import * as Logging from '@/logging';
import * as Transcription from '@/transcription';
import * as Summarization from '@/summarization';
import * as Chunked from '@/summarization/chunked';
import * as Tokenizer from '@/summarization/tokenizer';
import * as Embedding from '@/embedding';
import * as Comparison from '@/comparison';
import * as Acquisition from '@/acquisition';
import * as Remote from '@/acquisition/remote';
import * as Scratch from '@/util/scratch';
import type { Config, SecureConfig } from '@/config';

export type ModelClient = Transcription.TranscriptionClient & Summarization.SummarizationClient & Embedding.EmbeddingClient;

export interface Services {
    scratch: Scratch.ScratchInstance;
    acquisition: Acquisition.AcquisitionInstance;
    transcription: Transcription.TranscriptionService;
    tokenizer: Summarization.Tokenizer;
    summarizer: Chunked.ChunkedSummarizer;
    comparator: Comparison.ComparatorInstance;
}

export interface CreateOptions {
    /** Replaces the OpenAI client, e.g. with an in-process fake */
    client?: ModelClient;
    downloader?: Acquisition.Downloader;
}

export const create = (config: Config, secureConfig: SecureConfig, options: CreateOptions = {}): Services => {
    const logger = Logging.getLogger();

    let client: ModelClient | null = options.client ?? null;
    const getClient = (): ModelClient => {
        if (!client) {
            logger.debug('Creating OpenAI client');
            client = new OpenAI({ apiKey: secureConfig.openaiApiKey });
        }
        return client;
    };

    const scratch = Scratch.create(config.scratchDirectory);
    const downloader = options.downloader ?? Remote.create({
        ...config.download,
        scratchDirectory: config.scratchDirectory,
    });
    const acquisition = Acquisition.create({
        upload: { chunkSize: config.uploadChunkSize, maxSize: config.maxUploadSize },
        downloader,
    });

    const transcription = Transcription.create({ model: config.transcriptionModel, getClient });
    const summarization = Summarization.create({ model: config.summarizationModel, getClient });
    const tokenizer = Tokenizer.create();
    const summarizer = Chunked.create(summarization, tokenizer, { inputTokenBudget: config.inputTokenBudget });
    const comparator = Comparison.create(Embedding.create({ model: config.embeddingModel, getClient }));

    logger.debug('Services ready (transcription: %s, summarization: %s, embedding: %s)',
        config.transcriptionModel, config.summarizationModel, config.embeddingModel);

    return {
        scratch,
        acquisition,
        transcription,
        tokenizer,
        summarizer,
        comparator,
    };
};
