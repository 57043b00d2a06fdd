import path from 'node:path';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { AcquisitionError, InputError, errorMessage } from '@/errors';
import type { TempScope } from '@/util/scratch';
import type { AcquiredMedia, BlobLike, UploadSource } from './types';

export interface UploadOptions {
    chunkSize: number;
    maxSize: number;
}

/**
 * Yields the blob in slices of chunkSize bytes (the last one may be shorter).
 */
export async function* readChunks(blob: BlobLike, chunkSize: number): AsyncGenerator<Uint8Array> {
    for (let offset = 0; offset < blob.size; offset += chunkSize) {
        const end = Math.min(offset + chunkSize, blob.size);
        yield new Uint8Array(await blob.slice(offset, end).arrayBuffer());
    }
}

export const uploadFilename = (source: UploadSource): string => {
    const filename = source.filename?.trim();
    if (!filename) {
        throw new InputError('Uploaded file has no filename');
    }
    return filename;
};

export const saveUpload = async (source: UploadSource, scope: TempScope, options: UploadOptions): Promise<AcquiredMedia> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    const filename = uploadFilename(source);
    if (source.blob.size > options.maxSize) {
        throw new AcquisitionError(`${filename} is larger than the ${options.maxSize} byte upload limit`);
    }

    const localPath = scope.allocate(path.extname(path.basename(filename)));
    try {
        const written = await storage.writeChunks(localPath, readChunks(source.blob, options.chunkSize));
        logger.debug('Saved upload %s to %s (%d bytes)', filename, localPath, written);
    } catch (error) {
        throw new AcquisitionError(`Failed to save ${filename}: ${errorMessage(error)}`, { cause: error });
    }

    return { localPath, displayName: filename };
};
