/**
 * Multipart spooling
 *
 * Streams each uploaded file of a multipart request straight into the
 * request's temp scope. File parts are never held in memory as a whole; the
 * route hands the spooled files to the pipeline as disk-backed blobs.
 */

import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import busboy from 'busboy';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { InputError, errorMessage } from '@/errors';
import type { TempScope } from '@/util/scratch';

export interface SpoolOptions {
    /** Field name that carries the files */
    fileField: string;
    /** Bytes kept per file; a longer file is cut at this size */
    maxFileSize: number;
    maxFiles: number;
}

export interface SpooledFile {
    filename: string;
    localPath: string;
    size: number;
    truncated: boolean;
}

export interface SpooledForm {
    fields: Record<string, string>;
    files: SpooledFile[];
}

type Settled = { ok: true; file: SpooledFile } | { ok: false; error: unknown };

export const spool = async (request: Request, scope: TempScope, options: SpoolOptions): Promise<SpooledForm> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    const body = request.body;
    const contentType = request.headers.get('content-type');
    if (!body || !contentType) {
        throw new InputError('Request body must be multipart/form-data');
    }

    let parser: busboy.Busboy;
    try {
        parser = busboy({
            headers: { 'content-type': contentType },
            limits: { fileSize: options.maxFileSize, files: options.maxFiles },
        });
    } catch (error) {
        throw new InputError(`Request body must be multipart/form-data: ${errorMessage(error)}`, { cause: error });
    }

    const fields: Record<string, string> = {};
    const writes: Promise<Settled>[] = [];
    let tooManyFiles = false;

    parser.on('field', (name, value) => {
        fields[name] = value;
    });

    parser.on('file', (name, stream, info) => {
        if (name !== options.fileField) {
            stream.resume();
            return;
        }
        const localPath = scope.allocate(path.extname(path.basename(info.filename)));
        // Settled right away so a failed write is never an unhandled rejection while parsing continues
        writes.push(storage.writeChunks(localPath, stream).then(
            (size): Settled => ({
                ok: true,
                file: { filename: info.filename, localPath, size, truncated: stream.truncated === true },
            }),
            (error: unknown): Settled => {
                stream.resume();
                return { ok: false, error };
            },
        ));
    });

    parser.on('filesLimit', () => {
        tooManyFiles = true;
    });

    const source = Readable.fromWeb(body);
    let sourceError: unknown;
    source.once('error', (error) => {
        sourceError = error;
    });
    try {
        await pipeline(source, parser);
    } catch (error) {
        // Failures reading the request (such as the body limit) pass through untouched
        if (sourceError !== undefined) {
            throw sourceError;
        }
        throw new InputError(`Could not read the multipart body: ${errorMessage(error)}`, { cause: error });
    }

    const settled = await Promise.all(writes);
    const files: SpooledFile[] = [];
    for (const result of settled) {
        if (!result.ok) {
            throw new Error(`Failed to spool upload: ${errorMessage(result.error)}`, { cause: result.error });
        }
        files.push(result.file);
    }

    if (tooManyFiles) {
        throw new InputError(`At most ${options.maxFiles} files can be compared at once`);
    }

    logger.debug('Spooled %d upload(s) to disk', files.length);
    return { fields, files };
};
