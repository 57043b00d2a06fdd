/**
 * Acquisition
 *
 * Normalizes every source into a uniquely named local media file. Failures
 * come back as outcomes, never as rejections, so one bad source cannot take
 * its siblings down.
 */

import * as Logging from '@/logging';
import { AcquisitionError, describeError, errorMessage, isVidscoreError } from '@/errors';
import { failure, success, type Outcome } from '@/util/outcome';
import type { TempScope } from '@/util/scratch';
import { saveUpload, type UploadOptions } from './upload';
import { describeSource, type AcquiredMedia, type Downloader, type MediaSource } from './types';

export interface AcquisitionOptions {
    upload: UploadOptions;
    downloader: Downloader;
}

export interface AcquisitionRequest {
    source: MediaSource;
    scope: TempScope;
    signal?: AbortSignal;
}

export interface AcquisitionInstance {
    acquire(source: MediaSource, scope: TempScope, signal?: AbortSignal): Promise<Outcome<AcquiredMedia>>;
    /** Resolves once every source has succeeded or failed, in request order */
    acquireAll(requests: AcquisitionRequest[]): Promise<Outcome<AcquiredMedia>[]>;
}

export const create = (options: AcquisitionOptions): AcquisitionInstance => {
    const logger = Logging.getLogger();

    const acquire = async (source: MediaSource, scope: TempScope, signal?: AbortSignal): Promise<Outcome<AcquiredMedia>> => {
        try {
            const media = source.kind === 'upload'
                ? await saveUpload(source, scope, options.upload)
                : await options.downloader.download(source.url, scope, signal);
            return success(media);
        } catch (error) {
            // An aborted download reports the deadline, not the killed process
            const reason: unknown = signal?.aborted && isVidscoreError(signal.reason) ? signal.reason : error;
            const tagged = isVidscoreError(reason)
                ? reason
                : new AcquisitionError(`Failed to acquire ${describeSource(source)}: ${errorMessage(reason)}`, { cause: reason });
            logger.warn('Acquisition failed for %s: %s', describeSource(source), describeError(tagged));
            return failure(tagged);
        }
    };

    // acquire() never rejects, so Promise.all waits for every source
    const acquireAll = (requests: AcquisitionRequest[]): Promise<Outcome<AcquiredMedia>[]> =>
        Promise.all(requests.map(request => acquire(request.source, request.scope, request.signal)));

    return { acquire, acquireAll };
};

export * from './types';
export { readChunks, uploadFilename } from './upload';
