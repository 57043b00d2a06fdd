/**
 * Comparator
 *
 * Ranks summaries against a topic. The topic and every summary are embedded
 * in one batch request; the remaining signals are computed locally.
 */

import * as Logging from '@/logging';
import type { EmbeddingService } from '@/embedding';
import { argmax, scoreSummary, type ScoreDetails } from './scoring';

export interface ComparisonResult {
    /** First index holding the highest composite score */
    bestIndex: number;
    scores: number[];
    details: ScoreDetails[];
}

export interface ComparatorInstance {
    score(summaries: string[], topic: string, signal?: AbortSignal): Promise<ComparisonResult>;
}

export const create = (embedding: EmbeddingService): ComparatorInstance => {
    const logger = Logging.getLogger();

    const score = async (summaries: string[], topic: string, signal?: AbortSignal): Promise<ComparisonResult> => {
        if (summaries.length === 0) {
            throw new Error('At least one summary is required for comparison');
        }

        const [topicVector, ...summaryVectors] = await embedding.embed([topic, ...summaries], signal);
        const details = summaries.map((summary, i) => scoreSummary(summary, topic, summaryVectors[i], topicVector));
        const scores = details.map(detail => detail.final);
        const bestIndex = argmax(scores);

        logger.debug('Scored %d summaries against "%s"; best index %d', summaries.length, topic, bestIndex, { scores });
        return { bestIndex, scores, details };
    };

    return { score };
};

export * from './scoring';
