/**
 * Scratch directory
 *
 * One directory per process holds every transient upload, download and audio
 * extract. Names are random tokens plus the original extension, so concurrent
 * items never collide and nothing needs locking. Each work item gets its own
 * TempScope; releasing the scope removes every file it allocated or tracked.
 */

import { randomBytes } from 'node:crypto';
import path from 'node:path';
import { glob } from 'glob';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';

export interface TempScope {
    /** New unique path in the scratch directory, tracked for release */
    allocate(extension: string, subdirectory?: string): string;
    /** Track a file created elsewhere (e.g. named by an external tool) */
    track(filePath: string): void;
    /** Stop tracking a file, e.g. after moving it away */
    forget(filePath: string): void;
    tracked(): string[];
    /** Delete every tracked file. Safe to call more than once. */
    release(): Promise<void>;
}

export interface ScratchInstance {
    directory: string;
    ensure(): Promise<void>;
    scope(label: string): TempScope;
    sweep(): Promise<number>;
}

export const randomToken = (): string => randomBytes(12).toString('hex');

export const normalizeExtension = (extension: string): string => {
    if (!extension) return '';
    return extension.startsWith('.') ? extension.toLowerCase() : `.${extension.toLowerCase()}`;
};

export const create = (directory: string): ScratchInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    const ensure = async (): Promise<void> => {
        await storage.createDirectory(directory);
    };

    const scope = (label: string): TempScope => {
        const files = new Set<string>();

        const allocate = (extension: string, subdirectory?: string): string => {
            const base = subdirectory ? path.join(directory, subdirectory) : directory;
            const filePath = path.join(base, `${randomToken()}${normalizeExtension(extension)}`);
            files.add(filePath);
            return filePath;
        };

        const release = async (): Promise<void> => {
            const pending = [...files];
            files.clear();
            const results = await Promise.allSettled(pending.map(file => storage.deleteFile(file)));
            results.forEach((result, i) => {
                if (result.status === 'rejected') {
                    logger.warn('Failed to delete temporary file %s for %s: %s', pending[i], label, result.reason);
                } else if (result.value) {
                    logger.debug('Removed temporary file %s for %s', pending[i], label);
                }
            });
        };

        return {
            allocate,
            track: (filePath) => { files.add(filePath); },
            forget: (filePath) => { files.delete(filePath); },
            tracked: () => [...files],
            release,
        };
    };

    // Files left behind by a process that died mid-request
    const sweep = async (): Promise<number> => {
        const leftovers = await glob('**/*', { cwd: directory, nodir: true, absolute: true });
        let removed = 0;
        for (const file of leftovers) {
            if (await storage.deleteFile(file)) {
                removed++;
            }
        }
        if (removed > 0) {
            logger.info('Removed %d stale file(s) from %s', removed, directory);
        }
        return removed;
    };

    return { directory, ensure, scope, sweep };
};
