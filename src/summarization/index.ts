/**
 * Summarization System
 *
 * Entry point for the summarization capability. The service is built on
 * first use and reused for every later call.
 */

import * as Service from './service';
import type { LengthBounds, SummarizationService } from './types';

export type CreateOptions = Service.ServiceOptions;

export const create = (options: CreateOptions): SummarizationService => {
    let service: SummarizationService | null = null;
    const getService = (): SummarizationService => {
        if (!service) {
            service = Service.create(options);
        }
        return service;
    };

    return {
        summarize: (text: string, bounds: LengthBounds, signal?: AbortSignal) => getService().summarize(text, bounds, signal),
    };
};

export * from './types';
