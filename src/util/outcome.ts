import type { VidscoreError } from '@/errors';

/**
 * Result of one pipeline stage for one item. Stages return failures as
 * values so nothing has to be thrown across the fan-in.
 */
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: VidscoreError };

export const success = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const failure = <T = never>(error: VidscoreError): Outcome<T> => ({ ok: false, error });
