/**
 * Transcription Service
 *
 * Turns a video file into plain text: probe for an audio stream, extract it
 * to mp3, split it when it exceeds the API upload limit, then transcribe
 * each part with OpenAI. Every intermediate file is allocated in the
 * caller's temp scope.
 */

import * as Logging from '@/logging';
import * as Media from '@/util/media';
import * as Storage from '@/util/storage';
import { TranscriptionError, errorMessage } from '@/errors';
import {
    MODEL_CAPABILITIES,
    type TranscriptionClient,
    type TranscriptionModel,
    type TranscriptionRequest,
    type TranscriptionResult,
    type TranscriptionService,
} from './types';

export interface ServiceOptions {
    model: TranscriptionModel | string;
    getClient: () => TranscriptionClient;
    media?: Media.Media;
}

const isKnownModel = (model: string): model is TranscriptionModel => model in MODEL_CAPABILITIES;

export const create = (options: ServiceOptions): TranscriptionService => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const media = options.media ?? Media.create(logger);
    const maxAudioSize = isKnownModel(options.model)
        ? MODEL_CAPABILITIES[options.model].maxFileSize
        : MODEL_CAPABILITIES['whisper-1'].maxFileSize;

    const transcribeFile = async (audioFile: string, signal?: AbortSignal): Promise<string> => {
        const audioStream = await storage.readStream(audioFile);
        // A request that fails before reading the stream leaves its errors with nobody else listening
        audioStream.on('error', (error) => {
            logger.debug('Reading %s failed: %s', audioFile, error.message);
        });
        try {
            const response = await options.getClient().audio.transcriptions.create({
                model: options.model,
                file: audioStream,
                response_format: 'json',
            }, { signal });
            return response.text;
        } finally {
            audioStream.destroy();
        }
    };

    const run = async ({ mediaFile, displayName, scope, signal }: TranscriptionRequest): Promise<TranscriptionResult> => {
        logger.debug('Starting transcription of %s', displayName, { model: options.model, file: mediaFile });

        if (!(await media.hasAudioTrack(mediaFile))) {
            throw new TranscriptionError(`No audio track found in ${displayName}`);
        }

        const audioFile = await media.extractAudio(mediaFile, scope.allocate('.mp3'), signal);
        const fileSize = await media.getFileSize(audioFile);
        const fileSizeMB = (fileSize / (1024 * 1024)).toFixed(1);
        logger.debug(`Audio extract for ${displayName}: ${fileSize} bytes (${fileSizeMB} MB), max size: ${maxAudioSize} bytes`);

        const startTime = Date.now();
        let parts = [audioFile];
        if (fileSize > maxAudioSize) {
            logger.info(`Audio for ${displayName} exceeds maximum size (${fileSize} > ${maxAudioSize} bytes), splitting into chunks`);
            parts = await media.splitAudioFile(audioFile, () => scope.allocate('.mp3'), maxAudioSize, signal);
            logger.info(`Split audio for ${displayName} into ${parts.length} chunks`);
        }

        // Parts stay sequential so their text joins in playback order
        const texts: string[] = [];
        for (let i = 0; i < parts.length; i++) {
            if (parts.length > 1) {
                logger.debug(`Transcribing chunk ${i + 1}/${parts.length} of ${displayName}`);
            }
            texts.push(await transcribeFile(parts[i], signal));
        }

        const duration = Date.now() - startTime;
        const text = texts.join(' ').trim();
        logger.info('Transcribed %s: %d chars in %ss', displayName, text.length, (duration / 1000).toFixed(1));

        return {
            text,
            model: options.model,
            duration,
            parts: parts.length,
        };
    };

    const transcribe = async (request: TranscriptionRequest): Promise<TranscriptionResult> => {
        try {
            return await run(request);
        } catch (error) {
            if (error instanceof TranscriptionError) {
                throw error;
            }
            logger.error('Error transcribing %s: %s', request.displayName, errorMessage(error));
            throw new TranscriptionError(`Failed to transcribe ${request.displayName}: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { transcribe };
};
