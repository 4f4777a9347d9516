/**
 * Pipeline state types
 *
 * PipelineState lives in memory for one run and is never persisted.
 */

import type { OrganizerError } from '../errors';

/**
 * pending → running → cached | computed | failed.
 * Stages past a skip point stay pending.
 */
export type StageStatus = 'pending' | 'running' | 'cached' | 'computed' | 'failed';

export interface StageDescriptor {
    /** Cache stage id, e.g. `stage3` */
    id: string;
    /** Human-readable name for reports */
    name: string;
    /** Per-item granular stage */
    granular?: boolean;
}

export interface ItemErrorReport {
    stageId: string;
    identity: string;
    message: string;
}

export interface StageState {
    id: string;
    name: string;
    granular: boolean;
    status: StageStatus;
    /** Whole-stage cache hit (granular stages: fast path served every item) */
    cacheHit: boolean;
    itemHits: number;
    itemMisses: number;
    itemErrors: ItemErrorReport[];
    /** Entries removed by --clear-cache before this stage ran */
    clearedEntries: number;
    elapsedMs: number;
    error?: OrganizerError;
}

export interface PipelineTotals {
    computed: number;
    cached: number;
    failed: number;
    pending: number;
    itemHits: number;
    itemMisses: number;
    itemErrors: number;
    elapsedMs: number;
}

export interface PipelineSummary {
    stages: StageState[];
    totals: PipelineTotals;
    /** Entries removed by `--clear-cache all` before stage 1 */
    clearedAll: number;
}
