/**
 * PipelineOrchestrator
 *
 * Drives an ordered list of stages through a StageRunner and tracks their
 * state. The orchestrator knows stage ids and order, not stage types: the
 * caller chains results, passing each stage's output as the next stage's
 * input, and asks isEnabled() before running a stage.
 *
 * Controls:
 * - stopAfter: the chain ends after this stage; later stages stay pending
 * - clearTarget: a stage id, whose entries are deleted right before it runs,
 *   or `all`, which empties the store before the first stage
 */

import {
    ConfigError,
    OrganizerError,
    StageFailedError,
    ErrorCode,
} from '../errors';
import { getLogger, LogCategory, Logger } from '../logger';
import { isCancellationError } from '../runtime/cancellation';
import type { CacheStore } from '../cache/cache-store';
import type {
    ItemStageDefinition,
    ItemStageHooks,
    ItemStageRunResult,
    StageRunner,
    WholeStageDefinition,
} from '../stage/stage-runner';
import type { PipelineSummary, PipelineTotals, StageDescriptor, StageState } from './types';

export const CLEAR_ALL = 'all';

export interface PipelineOrchestratorOptions {
    /** Stages in execution order */
    stages: StageDescriptor[];
    runner: StageRunner;
    store: CacheStore;
    /** Stage id, or `all` */
    clearTarget?: string;
    /** Last stage id to run */
    stopAfter?: string;
    logger?: Logger;
    onStageStart?(state: StageState): void;
    onStageComplete?(state: StageState): void;
}

export class PipelineOrchestrator {
    private readonly stages: StageDescriptor[];
    private readonly states = new Map<string, StageState>();
    private readonly runner: StageRunner;
    private readonly store: CacheStore;
    private readonly clearTarget?: string;
    private readonly lastIndex: number;
    private readonly logger: Logger;
    private readonly options: PipelineOrchestratorOptions;
    private clearedAll = 0;
    private allCleared = false;

    /**
     * @throws ConfigError for duplicate stage ids or an unknown clear/stop target
     */
    constructor(options: PipelineOrchestratorOptions) {
        this.options = options;
        this.stages = options.stages;
        this.runner = options.runner;
        this.store = options.store;
        this.logger = options.logger ?? getLogger();

        for (const stage of this.stages) {
            if (this.states.has(stage.id)) {
                throw new ConfigError(`Duplicate stage id "${stage.id}"`);
            }
            this.states.set(stage.id, {
                id: stage.id,
                name: stage.name,
                granular: stage.granular ?? false,
                status: 'pending',
                cacheHit: false,
                itemHits: 0,
                itemMisses: 0,
                itemErrors: [],
                clearedEntries: 0,
                elapsedMs: 0,
            });
        }

        if (options.clearTarget !== undefined && options.clearTarget !== CLEAR_ALL && !this.states.has(options.clearTarget)) {
            throw new ConfigError(
                `Unknown cache clear target "${options.clearTarget}" (expected ${this.clearTargets().join(', ')})`
            );
        }
        this.clearTarget = options.clearTarget;

        if (options.stopAfter !== undefined) {
            const index = this.stages.findIndex(stage => stage.id === options.stopAfter);
            if (index === -1) {
                throw new ConfigError(`Unknown stage "${options.stopAfter}"`);
            }
            this.lastIndex = index;
        } else {
            this.lastIndex = this.stages.length - 1;
        }
    }

    /**
     * Valid values for clearTarget.
     */
    clearTargets(): string[] {
        return [...this.stages.map(stage => stage.id), CLEAR_ALL];
    }

    /**
     * Whether a stage is inside the configured chain.
     */
    isEnabled(stageId: string): boolean {
        const index = this.stages.findIndex(stage => stage.id === stageId);
        return index !== -1 && index <= this.lastIndex;
    }

    getState(stageId: string): StageState {
        return this.requireState(stageId);
    }

    /**
     * Run a whole-stage unit and record its outcome.
     *
     * @throws StageFailedError naming the stage, with the original error as cause
     * @throws CancellationError when cancelled
     */
    async runWholeStage<TInput, TResult>(
        def: WholeStageDefinition<TInput, TResult>,
        input: TInput
    ): Promise<TResult> {
        const state = this.beginStage(def.id);
        try {
            const outcome = await this.runner.runWholeStage(def, input);
            state.cacheHit = outcome.cacheHit;
            state.elapsedMs = outcome.elapsedMs;
            this.completeStage(state, outcome.cacheHit ? 'cached' : 'computed');
            return outcome.result;
        } catch (error) {
            throw this.failStage(state, error);
        }
    }

    /**
     * Run a granular stage. Item failures are recorded, not thrown.
     *
     * @throws StageFailedError when the stage as a whole cannot continue
     *         (e.g. a cache write failure)
     */
    async runItemStage<TItem, TItemResult>(
        def: ItemStageDefinition<TItem, TItemResult>,
        items: readonly TItem[],
        hooks?: ItemStageHooks
    ): Promise<ItemStageRunResult<TItem, TItemResult>> {
        const state = this.beginStage(def.id);
        try {
            const outcome = await this.runner.runItemStage(def, items, hooks);
            state.cacheHit = outcome.wholeStageHit;
            state.itemHits = outcome.itemHits;
            state.itemMisses = outcome.itemMisses;
            state.itemErrors = outcome.errors.map(failure => ({
                stageId: def.id,
                identity: failure.identity,
                message: failure.error.message,
            }));
            state.elapsedMs = outcome.elapsedMs;
            this.completeStage(state, outcome.itemMisses === 0 ? 'cached' : 'computed');
            return outcome;
        } catch (error) {
            throw this.failStage(state, error);
        }
    }

    /**
     * Per-stage report plus totals. Safe to call at any point.
     */
    summary(): PipelineSummary {
        const stages = this.stages.map(stage => ({ ...this.requireState(stage.id) }));
        const totals: PipelineTotals = {
            computed: 0,
            cached: 0,
            failed: 0,
            pending: 0,
            itemHits: 0,
            itemMisses: 0,
            itemErrors: 0,
            elapsedMs: 0,
        };

        for (const state of stages) {
            switch (state.status) {
                case 'computed':
                    totals.computed++;
                    break;
                case 'cached':
                    totals.cached++;
                    break;
                case 'failed':
                    totals.failed++;
                    break;
                case 'pending':
                    totals.pending++;
                    break;
                case 'running':
                    break;
            }
            totals.itemHits += state.itemHits;
            totals.itemMisses += state.itemMisses;
            totals.itemErrors += state.itemErrors.length;
            totals.elapsedMs += state.elapsedMs;
        }

        return { stages, totals, clearedAll: this.clearedAll };
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private requireState(stageId: string): StageState {
        const state = this.states.get(stageId);
        if (!state) {
            throw new OrganizerError(`Unknown stage "${stageId}"`, { code: ErrorCode.STAGE_FAILED });
        }
        return state;
    }

    private beginStage(stageId: string): StageState {
        const state = this.requireState(stageId);
        if (!this.isEnabled(stageId)) {
            throw new OrganizerError(`Stage ${stageId} is disabled for this run`, {
                code: ErrorCode.STAGE_FAILED,
                meta: { stageId },
            });
        }

        if (this.clearTarget === CLEAR_ALL && !this.allCleared) {
            this.clearedAll = this.store.clear();
            this.allCleared = true;
            this.logger.info(LogCategory.PIPELINE, `Cleared ${this.clearedAll} cache entries`);
        } else if (this.clearTarget === stageId) {
            state.clearedEntries = this.store.delete(stageId);
            this.logger.info(LogCategory.PIPELINE, `Cleared ${state.clearedEntries} cache entries for ${stageId}`);
        }

        state.status = 'running';
        this.logger.debug(LogCategory.PIPELINE, `${state.name} (${stageId}) running`);
        this.options.onStageStart?.({ ...state });
        return state;
    }

    private completeStage(state: StageState, status: 'cached' | 'computed'): void {
        state.status = status;
        this.logger.debug(LogCategory.PIPELINE, `${state.name} (${state.id}) ${status} in ${state.elapsedMs}ms`);
        this.options.onStageComplete?.({ ...state });
    }

    private failStage(state: StageState, error: unknown): OrganizerError {
        state.status = 'failed';
        const failure = isCancellationError(error)
            ? error
            : new StageFailedError(state.id, error);
        state.error = failure;
        this.options.onStageComplete?.({ ...state });
        return failure;
    }
}
