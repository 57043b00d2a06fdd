/**
 * Pipeline Types
 */

import type { SkipEntry, VidscoreError } from '@/errors';
import type { MediaSource } from '@/acquisition';
import type { ScoreDetails } from '@/comparison';
import type { Transcript } from '@/summarization';

export type WorkItemState =
    | 'pending'
    | 'acquired'
    | 'transcribing'
    | 'transcribed'
    | 'summarizing'
    | 'summarized'
    | 'failed';

/**
 * One source on its way through a single request. Ends in exactly one of
 * 'summarized' (transcript and summary set) or 'failed' (error set).
 */
export interface WorkItem {
    /** Position in the submitted source list */
    index: number;
    source: MediaSource;
    displayName: string;
    state: WorkItemState;
    /** State the item was in when it failed */
    failedAt?: WorkItemState;
    transcript?: Transcript;
    summary?: string;
    error?: VidscoreError;
}

export interface PipelineConfig {
    summaryMaxLength: number;
    /** Per-item limit covering acquisition through summarization; 0 disables */
    itemTimeoutMs: number;
}

export interface ComparisonRequest {
    topic: string;
    sources: MediaSource[];
}

export interface ScoredVideo {
    index: number;
    name: string;
    summary: string;
    score: number;
    details: ScoreDetails;
}

export interface ComparisonReport {
    topic: string;
    /** Survivors in submission order */
    videos: ScoredVideo[];
    /** Failed sources in submission order */
    skipped: SkipEntry[];
    bestVideo: string;
}
