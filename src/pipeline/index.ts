/**
 * Comparison Pipeline
 *
 * Entry point used by the HTTP app and the CLI.
 */

import * as Orchestrator from './orchestrator';
import type { ComparisonReport, ComparisonRequest, PipelineConfig } from './types';

export interface PipelineInstance {
    compare(request: ComparisonRequest): Promise<ComparisonReport>;
}

export type { PipelineDependencies } from './orchestrator';

export const create = (config: PipelineConfig, dependencies: Orchestrator.PipelineDependencies): PipelineInstance =>
    Orchestrator.create(config, dependencies);

export * from './types';
