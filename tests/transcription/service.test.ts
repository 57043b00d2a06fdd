import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { once } from 'node:events';
import * as Service from '@/transcription/service';
import * as Scratch from '@/util/scratch';
import { TranscriptionError } from '@/errors';
import type { Media } from '@/util/media';
import type { TranscriptionClient } from '@/transcription';

const MB = 1024 * 1024;

const createMedia = (options: { audio?: boolean; size?: number } = {}) => {
    const media: Media = {
        hasAudioTrack: vi.fn(async () => options.audio ?? true),
        extractAudio: vi.fn(async (_video: string, output: string) => {
            await fs.promises.writeFile(output, 'mp3');
            return output;
        }),
        getFileSize: vi.fn(async () => options.size ?? 1000),
        splitAudioFile: vi.fn(async (_file: string, allocate: (part: number) => string) => {
            const parts = [allocate(1), allocate(2)];
            await Promise.all(parts.map(part => fs.promises.writeFile(part, 'part')));
            return parts;
        }),
    };
    return media;
};

// Reads the whole upload the way the API client does before answering
const createClient = (...texts: string[]) => {
    const uploads: string[] = [];
    const create = vi.fn(async (body: { file: fs.ReadStream }) => {
        const chunks: Buffer[] = await body.file.toArray();
        uploads.push(Buffer.concat(chunks).toString('utf8'));
        return { text: texts.shift() ?? '' };
    });
    const client: TranscriptionClient = { audio: { transcriptions: { create } } };
    return { create, client, uploads };
};

const closed = async (stream: fs.ReadStream): Promise<void> => {
    if (!stream.closed) {
        await once(stream, 'close');
    }
};

describe('Transcription service', () => {
    let directory: string;
    let scope: Scratch.TempScope;

    beforeEach(async () => {
        directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'transcription-test-'));
        scope = Scratch.create(directory).scope('test');
    });

    afterEach(async () => {
        await scope.release();
        await fs.promises.rm(directory, { recursive: true, force: true });
    });

    test('a file without an audio track is rejected before any extraction', async () => {
        const media = createMedia({ audio: false });
        const { create, client } = createClient();
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });

        const result = service.transcribe({ mediaFile: '/videos/clip.mp4', displayName: 'clip.mp4', scope });

        await expect(result).rejects.toBeInstanceOf(TranscriptionError);
        await expect(result).rejects.toThrow('No audio track found in clip.mp4');
        expect(media.extractAudio).not.toHaveBeenCalled();
        expect(create).not.toHaveBeenCalled();
    });

    test('a small extract is transcribed in one request', async () => {
        const media = createMedia();
        const { create, client, uploads } = createClient('  hello world  ');
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });
        const controller = new AbortController();

        const result = await service.transcribe({
            mediaFile: '/videos/clip.mp4',
            displayName: 'clip.mp4',
            scope,
            signal: controller.signal,
        });

        expect(result.text).toBe('hello world');
        expect(uploads).toEqual(['mp3']);
        expect(result.parts).toBe(1);
        expect(result.model).toBe('whisper-1');
        const [extract] = scope.tracked();
        expect(path.extname(extract)).toBe('.mp3');
        expect(media.extractAudio).toHaveBeenCalledWith('/videos/clip.mp4', extract, controller.signal);
        expect(create).toHaveBeenCalledWith(
            { model: 'whisper-1', file: expect.any(fs.ReadStream), response_format: 'json' },
            { signal: controller.signal },
        );
        expect(media.splitAudioFile).not.toHaveBeenCalled();
    });

    test('an extract above the upload limit is split and the parts joined in order', async () => {
        const media = createMedia({ size: 30 * MB });
        const { create, client, uploads } = createClient('first part', 'second part');
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });

        const result = await service.transcribe({ mediaFile: '/videos/long.mp4', displayName: 'long.mp4', scope });

        expect(result.text).toBe('first part second part');
        expect(result.parts).toBe(2);
        expect(media.splitAudioFile).toHaveBeenCalledWith(expect.stringMatching(/\.mp3$/), expect.any(Function), 25 * MB, undefined);
        expect(create).toHaveBeenCalledTimes(2);
        expect(uploads).toEqual(['part', 'part']);
        // extract plus two parts, all released with the scope
        expect(scope.tracked()).toHaveLength(3);
    });

    test('request failures are wrapped in a TranscriptionError', async () => {
        const media = createMedia();
        const client: TranscriptionClient = {
            audio: { transcriptions: { create: vi.fn(async () => { throw new Error('quota exceeded'); }) } },
        };
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });

        await expect(service.transcribe({ mediaFile: '/videos/clip.mp4', displayName: 'clip.mp4', scope }))
            .rejects.toThrow(new TranscriptionError('Failed to transcribe clip.mp4: quota exceeded'));
    });

    test('the audio stream is closed when the request fails without reading it', async () => {
        const media = createMedia();
        const streams: fs.ReadStream[] = [];
        const client: TranscriptionClient = {
            audio: {
                transcriptions: {
                    create: vi.fn(async (body: { file: fs.ReadStream }) => {
                        streams.push(body.file);
                        throw new Error('connection reset');
                    }),
                },
            },
        };
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });

        await expect(service.transcribe({ mediaFile: '/videos/clip.mp4', displayName: 'clip.mp4', scope }))
            .rejects.toThrow(new TranscriptionError('Failed to transcribe clip.mp4: connection reset'));
        expect(streams).toHaveLength(1);
        expect(streams[0].destroyed).toBe(true);
        await closed(streams[0]);
    });

    test('an extract that disappears before it is read does not escape as an uncaught error', async () => {
        const media = createMedia();
        // Nothing is written, so opening the stream fails with ENOENT
        media.extractAudio = vi.fn(async (_video: string, output: string) => output);
        const streams: fs.ReadStream[] = [];
        const client: TranscriptionClient = {
            audio: {
                transcriptions: {
                    create: vi.fn(async (body: { file: fs.ReadStream }) => {
                        streams.push(body.file);
                        throw new Error('connection reset');
                    }),
                },
            },
        };
        const service = Service.create({ model: 'whisper-1', getClient: () => client, media });

        await expect(service.transcribe({ mediaFile: '/videos/clip.mp4', displayName: 'clip.mp4', scope }))
            .rejects.toThrow('Failed to transcribe clip.mp4: connection reset');
        await closed(streams[0]);
        expect(streams[0].destroyed).toBe(true);
    });

    test('the client is only requested once a transcription runs', async () => {
        const { client } = createClient('text');
        const getClient = vi.fn(() => client);
        const service = Service.create({ model: 'whisper-1', getClient, media: createMedia() });

        expect(getClient).not.toHaveBeenCalled();
        await service.transcribe({ mediaFile: '/videos/clip.mp4', displayName: 'clip.mp4', scope });
        expect(getClient).toHaveBeenCalledTimes(1);
    });
});
