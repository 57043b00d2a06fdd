import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData, FfmpegCommand } from 'fluent-ffmpeg';
import type { Logger } from 'winston';
import * as Storage from '@/util/storage';

export interface Media {
    hasAudioTrack: (filePath: string) => Promise<boolean>;
    extractAudio: (videoPath: string, outputPath: string, signal?: AbortSignal) => Promise<string>;
    getFileSize: (filePath: string) => Promise<number>;
    splitAudioFile: (filePath: string, allocate: (part: number) => string, maxSizeBytes: number, signal?: AbortSignal) => Promise<string[]>;
}

const ffprobeAsync = (filePath: string): Promise<FfprobeData> => {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err: unknown, metadata: FfprobeData) => {
            if (err) return reject(err);
            resolve(metadata);
        });
    });
};

// Resolves when ffmpeg finishes; killing the process on abort surfaces as an error
const runCommand = (command: FfmpegCommand, signal?: AbortSignal): Promise<void> => {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('ffmpeg run aborted before start'));
            return;
        }
        const onAbort = () => command.kill('SIGKILL');
        signal?.addEventListener('abort', onAbort, { once: true });
        command
            .on('end', () => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            })
            .on('error', (err: Error) => {
                signal?.removeEventListener('abort', onAbort);
                reject(err);
            })
            .run();
    });
};

export const create = (logger: Logger): Media => {
    const storage = Storage.create({ log: logger.debug });

    const probe = async (filePath: string): Promise<FfprobeData> => {
        try {
            return await ffprobeAsync(filePath);
        } catch (error) {
            logger.error('Error probing media file: %s', error);
            throw new Error(`Failed to read media file ${filePath}: ${error}`, { cause: error });
        }
    };

    const hasAudioTrack = async (filePath: string): Promise<boolean> => {
        const metadata = await probe(filePath);
        const audioStreams = metadata.streams.filter(stream => stream.codec_type === 'audio');
        logger.debug('Found %d audio stream(s) in %s', audioStreams.length, filePath);
        return audioStreams.length > 0;
    };

    // Drop the video stream and encode mp3, a format the transcription API accepts
    const extractAudio = async (videoPath: string, outputPath: string, signal?: AbortSignal): Promise<string> => {
        logger.debug('Extracting audio from %s to %s', videoPath, outputPath);
        const command = ffmpeg(videoPath)
            .noVideo()
            .audioCodec('libmp3lame')
            .audioBitrate('128k')
            .format('mp3')
            .output(outputPath);
        try {
            await runCommand(command, signal);
        } catch (error) {
            logger.error('Error extracting audio: %s', error);
            throw new Error(`Failed to extract audio from ${videoPath}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }
        return outputPath;
    };

    const getFileSize = async (filePath: string): Promise<number> => {
        try {
            return await storage.getFileSize(filePath);
        } catch (error) {
            logger.error('Error getting file size: %s', error);
            throw new Error(`Failed to get file size for ${filePath}: ${error}`, { cause: error });
        }
    };

    // Split into time segments sized so each part stays under maxSizeBytes
    const splitAudioFile = async (filePath: string, allocate: (part: number) => string, maxSizeBytes: number, signal?: AbortSignal): Promise<string[]> => {
        try {
            const metadata = await probe(filePath);
            const duration = Number(metadata.format.duration ?? 0);
            if (!duration) {
                throw new Error('media duration is unknown');
            }

            const fileSize = await getFileSize(filePath);
            const segmentCount = Math.ceil(fileSize / maxSizeBytes);
            const segmentDuration = duration / segmentCount;
            logger.debug(`Splitting ${filePath} (${fileSize} bytes) into ${segmentCount} segments of ~${segmentDuration} seconds each`);

            const outputFiles: string[] = [];
            const promises: Promise<void>[] = [];

            for (let i = 0; i < segmentCount; i++) {
                const outputPath = allocate(i + 1);
                outputFiles.push(outputPath);

                const command = ffmpeg(filePath)
                    .setStartTime(i * segmentDuration)
                    .setDuration(segmentDuration)
                    .output(outputPath);
                promises.push(runCommand(command, signal).then(() => {
                    logger.debug(`Created segment ${i + 1}/${segmentCount}: ${outputPath}`);
                }));
            }

            await Promise.all(promises);
            return outputFiles;
        } catch (error) {
            logger.error('Error splitting audio file: %s', error);
            throw new Error(`Failed to split audio file ${filePath}: ${error}`, { cause: error });
        }
    };

    return {
        hasAudioTrack,
        extractAudio,
        getFileSize,
        splitAudioFile,
    };
};
