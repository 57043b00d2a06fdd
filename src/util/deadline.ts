import { TimeoutError } from '@/errors';

/**
 * Time limit for one work item. The signal is handed to child processes and
 * model calls so they stop when the limit passes; race() settles with the
 * TimeoutError at that moment even if the work itself ignores the signal.
 */
export interface Deadline {
    readonly signal?: AbortSignal;
    race<T>(work: Promise<T>): Promise<T>;
    clear(): void;
}

const UNBOUNDED: Deadline = {
    signal: undefined,
    race: (work) => work,
    clear: () => undefined,
};

export const start = (timeoutMs: number, label: string): Deadline => {
    if (timeoutMs <= 0) {
        return UNBOUNDED;
    }

    const controller = new AbortController();
    const reason = new TimeoutError(`${label} did not finish within ${timeoutMs / 1000}s`);
    const timer = setTimeout(() => controller.abort(reason), timeoutMs);
    timer.unref();

    const race = <T>(work: Promise<T>): Promise<T> => new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(reason);
        if (controller.signal.aborted) {
            onAbort();
        } else {
            controller.signal.addEventListener('abort', onAbort, { once: true });
        }
        void work.then(
            (value) => {
                controller.signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                controller.signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });

    return {
        signal: controller.signal,
        race,
        clear: () => clearTimeout(timer),
    };
};
