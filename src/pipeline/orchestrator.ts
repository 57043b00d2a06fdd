/**
 * Pipeline Orchestrator
 *
 * Drives every submitted source through acquire -> transcribe -> summarize.
 * All sources are acquired concurrently and joined; the acquired ones are
 * then transcribed and summarized concurrently and joined again before the
 * survivors are scored. A failing item becomes a skip entry and never
 * cancels its siblings. Each item's temporary files are released as soon as
 * the item reaches its terminal state.
 */

import * as Logging from '@/logging';
import * as Deadline from '@/util/deadline';
import {
    AggregateFailure,
    InputError,
    SummarizationError,
    TranscriptionError,
    describeError,
    errorMessage,
    isVidscoreError,
    type SkipEntry,
    type VidscoreError,
} from '@/errors';
import { failure, success, type Outcome } from '@/util/outcome';
import { describeSource, uploadFilename, type AcquisitionInstance, type AcquiredMedia } from '@/acquisition';
import type { TranscriptionService } from '@/transcription';
import type { Tokenizer } from '@/summarization';
import type { ChunkedSummarizer } from '@/summarization/chunked';
import type { ComparatorInstance } from '@/comparison';
import type { ScratchInstance, TempScope } from '@/util/scratch';
import type { ComparisonReport, ComparisonRequest, PipelineConfig, ScoredVideo, WorkItem } from './types';

export interface PipelineDependencies {
    scratch: Pick<ScratchInstance, 'scope'>;
    acquisition: AcquisitionInstance;
    transcription: TranscriptionService;
    tokenizer: Tokenizer;
    summarizer: ChunkedSummarizer;
    comparator: ComparatorInstance;
}

export interface OrchestratorInstance {
    compare(request: ComparisonRequest): Promise<ComparisonReport>;
}

interface ItemRun {
    item: WorkItem;
    scope: TempScope;
    deadline: Deadline.Deadline;
}

interface Summarized {
    item: WorkItem;
    summary: string;
}

const validate = (request: ComparisonRequest): void => {
    if (!request.topic.trim()) {
        throw new InputError('Topic must not be empty');
    }
    if (request.sources.length === 0) {
        throw new InputError('At least one video source is required');
    }
    request.sources.forEach(source => {
        if (source.kind === 'upload') {
            uploadFilename(source);
        }
    });
};

// Anything a stage throws without a tag is attributed to the stage it was in
const tagFailure = (item: WorkItem, error: unknown): VidscoreError => {
    if (isVidscoreError(error)) {
        return error;
    }
    const message = `Failed to ${item.state === 'transcribing' ? 'transcribe' : 'summarize'} ${item.displayName}: ${errorMessage(error)}`;
    return item.state === 'transcribing'
        ? new TranscriptionError(message, { cause: error })
        : new SummarizationError(message, { cause: error });
};

export const skipEntry = (item: WorkItem): SkipEntry => {
    const error = describeError(item.error);
    // Sources that never resolved to a title are reported by their URL
    if (item.source.kind === 'url' && item.failedAt === 'pending') {
        return { index: item.index, url: item.source.url, error };
    }
    return { index: item.index, name: item.displayName, error };
};

export const create = (config: PipelineConfig, dependencies: PipelineDependencies): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const { acquisition, transcription, tokenizer, summarizer, comparator } = dependencies;

    const finish = async (run: ItemRun): Promise<void> => {
        run.deadline.clear();
        await run.scope.release();
    };

    const fail = async (run: ItemRun, error: VidscoreError): Promise<Outcome<never>> => {
        run.item.error = error;
        run.item.failedAt = run.item.state;
        run.item.state = 'failed';
        await finish(run);
        logger.warn('Skipping %s: %s', run.item.displayName, describeError(error));
        return failure(error);
    };

    const processItem = async (run: ItemRun, media: AcquiredMedia): Promise<Outcome<Summarized>> => {
        const { item, scope, deadline } = run;
        try {
            item.state = 'transcribing';
            const result = await deadline.race(transcription.transcribe({
                mediaFile: media.localPath,
                displayName: item.displayName,
                scope,
                signal: deadline.signal,
            }));
            const transcript = { text: result.text, tokenCount: tokenizer.encode(result.text).length };
            item.transcript = transcript;
            item.state = 'transcribed';
            logger.debug('Transcribed %s: %d tokens', item.displayName, transcript.tokenCount);

            item.state = 'summarizing';
            const summary = await deadline.race(summarizer.summarize(transcript, config.summaryMaxLength, deadline.signal));
            item.summary = summary;
            item.state = 'summarized';
            await finish(run);
            logger.info('Summarized %s', item.displayName);
            return success({ item, summary });
        } catch (error) {
            return fail(run, tagFailure(item, error));
        }
    };

    const compare = async (request: ComparisonRequest): Promise<ComparisonReport> => {
        validate(request);
        const startTime = Date.now();
        logger.info('Comparing %d video(s) for topic "%s"', request.sources.length, request.topic);

        const runs: ItemRun[] = request.sources.map((source, index) => {
            const item: WorkItem = { index, source, displayName: describeSource(source), state: 'pending' };
            return {
                item,
                scope: dependencies.scratch.scope(`item ${index}`),
                deadline: Deadline.start(config.itemTimeoutMs, item.displayName),
            };
        });

        const acquired = await acquisition.acquireAll(runs.map(run => ({
            source: run.item.source,
            scope: run.scope,
            signal: run.deadline.signal,
        })));

        const processing: Promise<Outcome<Summarized>>[] = [];
        for (const [i, outcome] of acquired.entries()) {
            const run = runs[i];
            if (outcome.ok) {
                run.item.displayName = outcome.value.displayName;
                run.item.state = 'acquired';
                processing.push(processItem(run, outcome.value));
            } else {
                processing.push(fail(run, outcome.error));
            }
        }

        // processItem() and fail() never reject, so this waits for every item
        const processed = await Promise.all(processing);
        const acquiredCount = acquired.filter(outcome => outcome.ok).length;

        const survivors: Summarized[] = [];
        processed.forEach(outcome => {
            if (outcome.ok) {
                survivors.push(outcome.value);
            }
        });
        const skipped: SkipEntry[] = runs
            .map(run => run.item)
            .filter(item => item.state === 'failed')
            .map(item => skipEntry(item));

        if (survivors.length === 0) {
            const stage = acquiredCount === 0 ? 'acquisition' : 'processing';
            const message = stage === 'acquisition'
                ? `All ${runs.length} video(s) failed to be acquired`
                : `All ${runs.length} video(s) failed processing`;
            logger.error('%s', message);
            throw new AggregateFailure(message, stage, skipped);
        }

        const comparison = await comparator.score(survivors.map(survivor => survivor.summary), request.topic);
        const videos: ScoredVideo[] = survivors.map((survivor, i) => ({
            index: survivor.item.index,
            name: survivor.item.displayName,
            summary: survivor.summary,
            score: comparison.scores[i],
            details: comparison.details[i],
        }));
        const bestVideo = videos[comparison.bestIndex].name;

        logger.info('Compared %d video(s) (%d skipped) in %ss; best: %s',
            videos.length, skipped.length, ((Date.now() - startTime) / 1000).toFixed(1), bestVideo);

        return { topic: request.topic, videos, skipped, bestVideo };
    };

    return { compare };
};
