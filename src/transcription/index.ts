/**
 * Transcription System
 *
 * Entry point for the transcription capability. The service is built on
 * first use and reused for every later call.
 */

import * as Service from './service';
import type { TranscriptionRequest, TranscriptionResult, TranscriptionService } from './types';

export type CreateOptions = Service.ServiceOptions;

export const create = (options: CreateOptions): TranscriptionService => {
    let service: TranscriptionService | null = null;
    const getService = (): TranscriptionService => {
        if (!service) {
            service = Service.create(options);
        }
        return service;
    };

    return {
        transcribe: (request: TranscriptionRequest): Promise<TranscriptionResult> => getService().transcribe(request),
    };
};

export * from './types';
