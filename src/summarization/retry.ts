import { RETRY_MAX_LENGTH_FLOOR, RETRY_MIN_LENGTH_FLOOR } from '@/constants';
import type { LengthBounds } from './types';

/**
 * A bounded retry: at most one attempt beyond the first, with the call's
 * parameters rewritten by `transform` before the second attempt.
 */
export interface RetryPolicy<P> {
    retries: 0 | 1;
    transform: (params: P) => P;
}

export const halveBounds = (bounds: LengthBounds): LengthBounds => {
    const maxLength = Math.max(RETRY_MAX_LENGTH_FLOOR, Math.floor(bounds.maxLength / 2));
    const minLength = Math.min(maxLength, Math.max(RETRY_MIN_LENGTH_FLOOR, Math.floor(bounds.minLength / 2)));
    return { maxLength, minLength };
};

export const HALVE_BOUNDS_ONCE: RetryPolicy<LengthBounds> = {
    retries: 1,
    transform: halveBounds,
};

/**
 * Runs `call(params)`; on failure and when the policy allows, runs it once
 * more with transformed params. The error of the last attempt propagates.
 */
export const withRetry = async <P, T>(
    call: (params: P) => Promise<T>,
    params: P,
    policy: RetryPolicy<P>,
    onRetry?: (error: unknown, next: P) => void,
): Promise<T> => {
    try {
        return await call(params);
    } catch (error) {
        if (policy.retries === 0) {
            throw error;
        }
        const next = policy.transform(params);
        onRetry?.(error, next);
        return call(next);
    }
};
