/**
 * Pipeline Module
 */

export { PipelineOrchestrator, CLEAR_ALL } from './orchestrator';
export type { PipelineOrchestratorOptions } from './orchestrator';
export type {
    StageStatus,
    StageDescriptor,
    ItemErrorReport,
    StageState,
    PipelineTotals,
    PipelineSummary,
} from './types';
