/**
 * Acquisition Types
 */

import type { TempScope } from '@/util/scratch';

/**
 * Anything sliceable like a Blob, such as a local file opened with fs.openAsBlob.
 */
export interface BlobLike {
    readonly size: number;
    slice(start?: number, end?: number): { arrayBuffer(): Promise<ArrayBuffer> };
}

export interface UploadSource {
    kind: 'upload';
    filename?: string;
    blob: BlobLike;
}

export interface UrlSource {
    kind: 'url';
    url: string;
}

export type MediaSource = UploadSource | UrlSource;

export interface AcquiredMedia {
    localPath: string;
    /** Upload filename, or the resolved title of a remote video */
    displayName: string;
}

export interface Downloader {
    download(url: string, scope: TempScope, signal?: AbortSignal): Promise<AcquiredMedia>;
}

export const describeSource = (source: MediaSource): string =>
    source.kind === 'url' ? source.url : (source.filename ?? '(unnamed upload)');
