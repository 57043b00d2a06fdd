import { setTimeout as sleep } from 'node:timers/promises';
import path from 'node:path';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { AcquisitionError, errorMessage } from '@/errors';

export interface SettleOptions {
    attempts: number;
    intervalMs: number;
}

/**
 * Moves a freshly downloaded file out of the downloader's hands. The file can
 * lag behind the downloader's exit or still be held open by it, so the rename
 * is retried at short intervals before giving up.
 */
export const settleFile = async (source: string, destination: string, options: SettleOptions): Promise<void> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    let lastError: unknown;
    for (let attempt = 1; attempt <= options.attempts; attempt++) {
        try {
            await storage.rename(source, destination);
            if (attempt > 1) {
                logger.debug('Settled %s after %d attempts', path.basename(source), attempt);
            }
            return;
        } catch (error) {
            lastError = error;
            if (attempt < options.attempts) {
                await sleep(options.intervalMs);
            }
        }
    }

    throw new AcquisitionError(
        `Downloaded file ${path.basename(source)} was not available after ${options.attempts} attempts: ${errorMessage(lastError)}`,
        { cause: lastError },
    );
};
