/**
 * Remote Downloader
 *
 * Fetches remote videos with yt-dlp. The downloader is asked for a combined
 * audio+video stream (best single file as fallback) merged or remuxed into mp4, with
 * bounded retries, a socket timeout and a fixed set of player clients.
 * It prints the resolved title and the final file path, which are parsed
 * from stdout.
 */

import path from 'node:path';
import { glob } from 'glob';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { runFile } from '@/util/child';
import { randomToken, type TempScope } from '@/util/scratch';
import { AcquisitionError, errorMessage } from '@/errors';
import { DEFAULT_DOWNLOAD_FORMAT, DEFAULT_MERGE_FORMAT, DOWNLOADS_SUBDIRECTORY } from '@/constants';
import type { DownloadConfig } from '@/config';
import { settleFile } from './settle';
import type { AcquiredMedia, Downloader } from './types';

export interface DownloaderOptions extends DownloadConfig {
    scratchDirectory: string;
}

export const buildArguments = (url: string, outputTemplate: string, options: DownloadConfig): string[] => [
    '--no-playlist',
    '--no-progress',
    '--no-simulate',
    '--format', DEFAULT_DOWNLOAD_FORMAT,
    '--merge-output-format', DEFAULT_MERGE_FORMAT,
    '--remux-video', DEFAULT_MERGE_FORMAT,
    '--retries', String(options.retries),
    '--fragment-retries', String(options.retries),
    '--socket-timeout', String(options.socketTimeoutSeconds),
    '--extractor-args', `youtube:player_client=${options.playerClients.join(',')}`,
    '--output', outputTemplate,
    '--print', 'title',
    '--print', 'after_move:filepath',
    '--',
    url,
];

/**
 * First printed line is the title, last is the final file path.
 */
export const parseOutput = (stdout: string): { title: string; filePath: string } => {
    const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
    if (lines.length < 2) {
        throw new AcquisitionError(`Downloader did not report a title and file path (got ${lines.length} line(s))`);
    }
    return { title: lines[0], filePath: lines[lines.length - 1] };
};

// execFile failures carry the child's stderr; its last line is yt-dlp's ERROR message
const downloaderMessage = (error: unknown): string => {
    if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
        const lines = error.stderr.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
        if (lines.length > 0) {
            return lines[lines.length - 1];
        }
    }
    return errorMessage(error);
};

export const create = (options: DownloaderOptions): Downloader => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const downloadsDirectory = path.join(options.scratchDirectory, DOWNLOADS_SUBDIRECTORY);

    const download = async (url: string, scope: TempScope, signal?: AbortSignal): Promise<AcquiredMedia> => {
        const token = randomToken();
        const outputTemplate = path.join(downloadsDirectory, `${token}.%(ext)s`);

        // Whatever the downloader leaves under this token (parts, merges) belongs to the scope
        const trackLeftovers = async () => {
            const leftovers = await glob(`${token}*`, { cwd: downloadsDirectory, absolute: true, nodir: true });
            leftovers.forEach(file => scope.track(file));
        };

        logger.info('Downloading %s', url);
        const startTime = Date.now();
        let stdout: string;
        try {
            ({ stdout } = await runFile(options.binary, buildArguments(url, outputTemplate, options), { signal }));
        } catch (error) {
            await trackLeftovers();
            logger.warn('Download failed for %s: %s', url, downloaderMessage(error));
            throw new AcquisitionError(`Download failed for ${url}: ${downloaderMessage(error)}`, { cause: error });
        }

        await trackLeftovers();
        const { title, filePath } = parseOutput(stdout);
        scope.track(filePath);
        const extension = path.extname(filePath);

        const settledPath = scope.allocate(extension, DOWNLOADS_SUBDIRECTORY);
        await settleFile(filePath, settledPath, {
            attempts: options.settleAttempts,
            intervalMs: options.settleIntervalMs,
        });

        // A private copy outlives whatever the downloader does with its own files
        const localPath = scope.allocate(extension);
        try {
            await storage.copyFile(settledPath, localPath);
            await storage.deleteFile(settledPath);
        } catch (error) {
            throw new AcquisitionError(`Failed to copy download of ${url}: ${errorMessage(error)}`, { cause: error });
        }
        scope.forget(settledPath);

        logger.info('Downloaded "%s" from %s in %ss', title, url, ((Date.now() - startTime) / 1000).toFixed(1));
        return { localPath, displayName: title || url };
    };

    return { download };
};
