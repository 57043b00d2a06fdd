/**
 * HTTP API
 *
 * POST /compare_videos/      multipart form: topic + one or more files
 * POST /compare_videos_urls  JSON: { topic, urls }
 * GET  /health
 *
 * Request-level failures answer { error, skipped? }: 400 for malformed
 * input, 413 for an oversized body, 502 when every URL failed to download or
 * the embedding backend failed, 500 when nothing survived processing.
 */

import * as fs from 'node:fs';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import * as Logging from '@/logging';
import { AggregateFailure, EmbeddingError, InputError, describeError, type SkipEntry } from '@/errors';
import { MAX_UPLOAD_FILES, URL_REQUEST_BODY_LIMIT } from '@/constants';
import type { MediaSource, UploadSource } from '@/acquisition';
import type { ComparisonReport, PipelineInstance } from '@/pipeline';
import type { ScratchInstance } from '@/util/scratch';
import * as Multipart from './multipart';

export interface AppOptions {
    /** Spooled upload files live in a per-request scope */
    scratch: Pick<ScratchInstance, 'scope'>;
    maxUploadSize: number;
}

export const UrlRequestSchema = z.object({
    topic: z.string().trim().min(1, 'topic must not be empty'),
    urls: z.array(z.string().url('every entry in urls must be a URL')).min(1, 'urls must not be empty'),
});

export interface WireScoreDetails {
    semantic: number;
    coverage: number;
    conciseness: number;
    final: number;
    word_count: number;
}

export interface WireReport {
    topic: string;
    videos: { name: string; summary: string; score: number; details: WireScoreDetails }[];
    skipped: ({ name: string; error: string } | { url: string; error: string })[];
    best_video: string;
}

export const toWireSkip = (entry: SkipEntry): WireReport['skipped'][number] =>
    entry.url !== undefined
        ? { url: entry.url, error: entry.error }
        : { name: entry.name ?? '', error: entry.error };

export const toWire = (report: ComparisonReport): WireReport => ({
    topic: report.topic,
    videos: report.videos.map(video => ({
        name: video.name,
        summary: video.summary,
        score: video.score,
        details: {
            semantic: video.details.semantic,
            coverage: video.details.coverage,
            conciseness: video.details.conciseness,
            final: video.details.final,
            word_count: video.details.wordCount,
        },
    })),
    skipped: report.skipped.map(toWireSkip),
    best_video: report.bestVideo,
});

const textField = (value: unknown): string | undefined =>
    typeof value === 'string' && value.trim() ? value : undefined;

const tooLarge = (c: Context) => c.json({ error: 'Request body too large' }, 413);

export const createApp = (pipeline: PipelineInstance, options: AppOptions): Hono => {
    const logger = Logging.getLogger();
    const app = new Hono();

    // A file is kept up to one byte past the limit so acquisition can still tell it was too large
    const maxSpooledFileSize = options.maxUploadSize + 1;
    const uploadRequestLimit = MAX_UPLOAD_FILES * maxSpooledFileSize + URL_REQUEST_BODY_LIMIT;

    const uploadSource = async (file: Multipart.SpooledFile): Promise<UploadSource> => {
        if (file.truncated) {
            logger.warn('Upload %s exceeds %d bytes and was cut short', file.filename, options.maxUploadSize);
        }
        return { kind: 'upload', filename: file.filename, blob: await fs.openAsBlob(file.localPath) };
    };

    const respond = async (c: Context, topic: string, sources: MediaSource[]) => {
        const report = await pipeline.compare({ topic, sources });
        return c.json(toWire(report), 200);
    };

    app.use('*', async (c, next) => {
        const startTime = Date.now();
        await next();
        logger.info('%s %s -> %d (%dms)', c.req.method, c.req.path, c.res.status, Date.now() - startTime);
    });

    app.get('/health', (c) => c.json({ status: 'ok' }));

    app.post('/compare_videos/', bodyLimit({ maxSize: uploadRequestLimit, onError: tooLarge }), async (c) => {
        const scope = options.scratch.scope('upload request');
        try {
            const form = await Multipart.spool(c.req.raw, scope, {
                fileField: 'files',
                maxFileSize: maxSpooledFileSize,
                maxFiles: MAX_UPLOAD_FILES,
            });
            const topic = textField(form.fields['topic']) ?? textField(c.req.query('topic'));
            if (!topic) {
                throw new InputError('topic is required');
            }
            if ('files' in form.fields) {
                throw new InputError('Every entry in files must be a file with a filename');
            }
            if (form.files.length === 0) {
                throw new InputError('At least one file is required');
            }

            const sources = await Promise.all(form.files.map(uploadSource));
            return await respond(c, topic, sources);
        } finally {
            await scope.release();
        }
    });

    app.post('/compare_videos_urls', bodyLimit({ maxSize: URL_REQUEST_BODY_LIMIT, onError: tooLarge }), async (c) => {
        let raw: unknown;
        try {
            raw = await c.req.json();
        } catch {
            throw new InputError('Request body must be JSON');
        }

        const parsed = UrlRequestSchema.safeParse(raw);
        if (!parsed.success) {
            throw new InputError(parsed.error.issues.map(issue => issue.message).join('; '));
        }

        const sources: MediaSource[] = parsed.data.urls.map(url => ({ kind: 'url', url }));
        return respond(c, parsed.data.topic, sources);
    });

    app.onError((error, c) => {
        if (error instanceof HTTPException) {
            return error.getResponse();
        }
        // Raised by bodyLimit when a body without Content-Length runs past the limit
        if (error.name === 'BodyLimitError') {
            return tooLarge(c);
        }
        if (error instanceof InputError) {
            return c.json({ error: error.message }, 400);
        }
        if (error instanceof AggregateFailure) {
            const skipped = error.skipped.map(toWireSkip);
            // Only remote sources are downloaded; failed uploads stay a server error
            const downloadsFailed = error.stage === 'acquisition' && error.skipped.every(entry => entry.url !== undefined);
            return c.json({ error: error.message, skipped }, downloadsFailed ? 502 : 500);
        }
        if (error instanceof EmbeddingError) {
            logger.warn('Scoring failed on %s %s: %s', c.req.method, c.req.path, error.message);
            return c.json({ error: describeError(error) }, 502);
        }
        logger.error('Unhandled error on %s %s: %s', c.req.method, c.req.path, error.message, { stack: error.stack });
        return c.json({ error: 'Internal server error' }, 500);
    });

    return app;
};
