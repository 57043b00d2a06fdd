/**
 * Transcription Types
 */

import type { ReadStream } from 'node:fs';
import type { TempScope } from '@/util/scratch';

export type TranscriptionModel =
    | 'whisper-1'
    | 'gpt-4o-mini-transcribe'
    | 'gpt-4o-transcribe';

export interface ModelCapabilities {
    maxFileSize: number;
}

export const MODEL_CAPABILITIES: Record<TranscriptionModel, ModelCapabilities> = {
    'whisper-1': { maxFileSize: 25 * 1024 * 1024 },
    'gpt-4o-mini-transcribe': { maxFileSize: 25 * 1024 * 1024 },
    'gpt-4o-transcribe': { maxFileSize: 25 * 1024 * 1024 },
};

export interface TranscriptionRequest {
    mediaFile: string;
    displayName: string;
    /** Audio extracts and split parts are allocated here so the caller owns their lifetime */
    scope: TempScope;
    signal?: AbortSignal;
}

export interface TranscriptionResult {
    text: string;
    model: string;
    duration: number;
    parts: number;
}

export interface TranscriptionService {
    transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

/**
 * The slice of the OpenAI client the transcription service calls.
 */
export interface TranscriptionClient {
    audio: {
        transcriptions: {
            create(
                body: { model: string; file: ReadStream; response_format: 'json' },
                options?: { signal?: AbortSignal },
            ): Promise<{ text: string }>;
        };
    };
}
