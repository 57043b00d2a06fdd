/**
 * Scoring signals
 *
 * Pure functions: each summary's score depends only on its own text, its
 * embedding and the shared topic.
 */

import {
    CONCISENESS_LOWER_BOUND,
    CONCISENESS_TARGET_WORDS,
    CONCISENESS_WEIGHT,
    COVERAGE_WEIGHT,
    SEMANTIC_WEIGHT,
} from '@/constants';

export const WEIGHTS = {
    semantic: SEMANTIC_WEIGHT,
    coverage: COVERAGE_WEIGHT,
    conciseness: CONCISENESS_WEIGHT,
} as const;

export interface ScoreDetails {
    semantic: number;
    coverage: number;
    conciseness: number;
    final: number;
    wordCount: number;
}

const words = (text: string): string[] => text.split(/\s+/).filter(word => word.length > 0);

export const wordCount = (text: string): number => words(text).length;

export const distinctTokens = (text: string): Set<string> => new Set(words(text.toLowerCase()));

/**
 * Cosine similarity; 0 when either vector has no magnitude.
 */
export const cosineSimilarity = (a: number[], b: number[]): number => {
    if (a.length !== b.length) {
        throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Share of the topic's distinct words that appear in the summary, in [0, 1].
 */
export const keywordCoverage = (topic: string, summary: string): number => {
    const topicTokens = distinctTokens(topic);
    const summaryTokens = distinctTokens(summary);
    let shared = 0;
    for (const token of topicTokens) {
        if (summaryTokens.has(token)) shared++;
    }
    return shared / Math.max(1, topicTokens.size);
};

/**
 * 1 up to the target length, then falling off as target / words; in (0, 1].
 */
export const conciseness = (summary: string): number =>
    Math.min(1, CONCISENESS_TARGET_WORDS / Math.max(CONCISENESS_LOWER_BOUND, wordCount(summary)));

export const compositeScore = (semantic: number, coverage: number, concise: number): number =>
    WEIGHTS.semantic * semantic + WEIGHTS.coverage * coverage + WEIGHTS.conciseness * concise;

/**
 * Index of the largest value; the first one wins on ties. -1 for an empty list.
 */
export const argmax = (values: number[]): number => {
    let best = -1;
    for (let i = 0; i < values.length; i++) {
        if (best === -1 || values[i] > values[best]) {
            best = i;
        }
    }
    return best;
};

export const scoreSummary = (summary: string, topic: string, summaryVector: number[], topicVector: number[]): ScoreDetails => {
    const semantic = cosineSimilarity(summaryVector, topicVector);
    const coverage = keywordCoverage(topic, summary);
    const concise = conciseness(summary);
    return {
        semantic,
        coverage,
        conciseness: concise,
        final: compositeScore(semantic, coverage, concise),
        wordCount: wordCount(summary),
    };
};
