/**
 * Organize Pipeline
 *
 * Chains the five stages through the PipelineOrchestrator:
 *
 *   stage1 Scan     source dir     → ScanResult
 *   stage2 Discover ScanResult     → DiscoveryResult
 *   stage3 Analyze  FileRecord[]   → AnalysisResult (per item)
 *   stage4 Taxonomy AnalysisResult → TaxonomyResult
 *   stage5 Move     TaxonomyResult → MoveResult
 *
 * Each stage's result is the next stage's input; the chain ends early when
 * the orchestrator reports the next stage as disabled.
 */

import * as path from 'path';
import {
    CacheStore,
    PipelineOrchestrator,
    StageRunner,
    getLogger,
} from '@tidyfold/organizer-core';
import type {
    IsCancelledFn,
    ItemProgress,
    Logger,
    PipelineSummary,
    StageDescriptor,
    StageState,
} from '@tidyfold/organizer-core';
import type { AIClient } from '../ai/ai-client';
import {
    ANALYZE_STAGE_ID,
    DISCOVER_STAGE_ID,
    MOVE_STAGE_ID,
    SCAN_STAGE_ID,
    TAXONOMY_STAGE_ID,
    createAnalyzeStage,
    createDiscoverStage,
    createMoveStage,
    createScanStage,
    createTaxonomyStage,
} from '../stages';
import type { ScanOptions } from '../stages';
import type {
    AIProvider,
    AnalysisResult,
    DiscoveryResult,
    ModelCapability,
    ModelInfo,
    MoveResult,
    RunCommandOptions,
    ScanResult,
    TaxonomyResult,
} from '../types';

// ============================================================================
// Stages
// ============================================================================

export const PIPELINE_STAGES: StageDescriptor[] = [
    { id: SCAN_STAGE_ID, name: 'Scan' },
    { id: DISCOVER_STAGE_ID, name: 'Model discovery' },
    { id: ANALYZE_STAGE_ID, name: 'Analysis', granular: true },
    { id: TAXONOMY_STAGE_ID, name: 'Taxonomy' },
    { id: MOVE_STAGE_ID, name: 'Move' },
];

/**
 * Stage id that ends the chain when `--skip-stageN` is given.
 *
 * @param skipFrom - Lowest skipped stage number, 2-5
 */
export function stopAfterFor(skipFrom: number | undefined): string | undefined {
    if (skipFrom === undefined) {
        return undefined;
    }
    return PIPELINE_STAGES[skipFrom - 2]?.id;
}

// ============================================================================
// Models
// ============================================================================

export const DEFAULT_PROVIDER: AIProvider = 'ollama';

export const DEFAULT_MODELS: Record<AIProvider, string> = {
    openai: 'gpt-4o-mini',
    anthropic: 'claude-3-5-haiku-latest',
    ollama: 'llama3.1',
};

const ALL_CAPABILITIES: ModelCapability[] = ['text', 'image', 'audio', 'video', 'application'];

/**
 * Models to route files to: `ai.models` when configured, otherwise one
 * default model that takes every category.
 */
export function resolveModels(options: Pick<RunCommandOptions, 'ai' | 'provider' | 'model'>): ModelInfo[] {
    const configured = options.ai?.models;
    if (configured && configured.length > 0) {
        return configured.map(model => ({ ...model, capabilities: [...model.capabilities] }));
    }
    const provider = options.provider ?? DEFAULT_PROVIDER;
    const model = options.model ?? DEFAULT_MODELS[provider];
    return [{ name: model, provider, model, capabilities: [...ALL_CAPABILITIES] }];
}

/**
 * First connected model that can read text; used for the taxonomy.
 */
export function selectTaxonomyModel(discovery: DiscoveryResult): ModelInfo | undefined {
    return discovery.models.find(m => m.capabilities.includes('text') && discovery.connectivity[m.name])
        ?? discovery.models.find(m => discovery.connectivity[m.name]);
}

// ============================================================================
// Pipeline
// ============================================================================

export interface OrganizePipelineOptions {
    source: string;
    destination: string;
    store: CacheStore;
    client: AIClient;
    models: ModelInfo[];
    scan: ScanOptions;
    readCache?: boolean;
    writeCache?: boolean;
    /** Stage id or `all` */
    clearTarget?: string;
    /** Last stage id to run */
    stopAfter?: string;
    verifyConnectivity?: boolean;
    unsortedFolder: string;
    dryRun: boolean;
    overwrite: boolean;
    /** Analyze at most this many files (first in path order) */
    maxFiles?: number;
    /** AI request timeout in ms */
    timeoutMs?: number;
    isCancelled?: IsCancelledFn;
    logger?: Logger;
    onStageStart?(state: StageState): void;
    onStageComplete?(state: StageState): void;
    onItemComplete?(progress: ItemProgress): void;
}

export interface OrganizePipelineResult {
    summary: PipelineSummary;
    scan?: ScanResult;
    discovery?: DiscoveryResult;
    analysis?: AnalysisResult;
    taxonomy?: TaxonomyResult;
    move?: MoveResult;
}

/**
 * Run the organize chain.
 *
 * @throws StageFailedError when a whole stage fails (cause attached)
 * @throws CancellationError when cancelled between items
 * @throws ConfigError for an unknown clear or stop target
 */
export async function runOrganizePipeline(options: OrganizePipelineOptions): Promise<OrganizePipelineResult> {
    const logger = options.logger ?? getLogger();
    const source = path.resolve(options.source);
    const destination = path.resolve(options.destination);

    const runner = new StageRunner({
        store: options.store,
        readCache: options.readCache,
        writeCache: options.writeCache,
        logger,
        isCancelled: options.isCancelled,
    });

    const orchestrator = new PipelineOrchestrator({
        stages: PIPELINE_STAGES,
        runner,
        store: options.store,
        clearTarget: options.clearTarget,
        stopAfter: options.stopAfter,
        logger,
        onStageStart: options.onStageStart,
        onStageComplete: options.onStageComplete,
    });

    const result: OrganizePipelineResult = { summary: orchestrator.summary() };
    const finish = (): OrganizePipelineResult => {
        result.summary = orchestrator.summary();
        return result;
    };

    const scanOptions: ScanOptions = {
        ...options.scan,
        skipPaths: [
            ...(options.scan.skipPaths ?? []),
            ...internalPaths(source, [options.store.rootDir, destination]),
        ],
    };

    // Stage 1
    const scan = await orchestrator.runWholeStage(createScanStage(scanOptions), source);
    result.scan = scan;
    if (!orchestrator.isEnabled(DISCOVER_STAGE_ID)) {
        return finish();
    }

    // Stage 2
    const discovery = await orchestrator.runWholeStage(createDiscoverStage({
        models: options.models,
        verifyConnectivity: options.verifyConnectivity ?? true,
        client: options.client,
        logger,
    }), scan);
    result.discovery = discovery;
    if (!orchestrator.isEnabled(ANALYZE_STAGE_ID)) {
        return finish();
    }

    // Stage 3
    const files = options.maxFiles !== undefined ? scan.files.slice(0, options.maxFiles) : scan.files;
    const items = await orchestrator.runItemStage(
        createAnalyzeStage({ discovery, client: options.client, timeoutMs: options.timeoutMs }),
        files,
        { onItemComplete: options.onItemComplete }
    );
    const analysis: AnalysisResult = {
        analyses: items.results.map(outcome => outcome.result),
        errors: items.errors.map(failure => ({ path: failure.identity, message: failure.error.message })),
    };
    result.analysis = analysis;
    if (!orchestrator.isEnabled(TAXONOMY_STAGE_ID)) {
        return finish();
    }

    // Stage 4
    const taxonomy = await orchestrator.runWholeStage(createTaxonomyStage({
        model: selectTaxonomyModel(discovery),
        client: options.client,
        unsortedFolder: options.unsortedFolder,
        timeoutMs: options.timeoutMs,
    }), analysis);
    result.taxonomy = taxonomy;
    if (!orchestrator.isEnabled(MOVE_STAGE_ID)) {
        return finish();
    }

    // Stage 5
    result.move = await orchestrator.runWholeStage(createMoveStage({
        destination,
        dryRun: options.dryRun,
        overwrite: options.overwrite,
        logger,
    }), taxonomy);

    return finish();
}

/**
 * Relative paths of directories inside the source that the scan must not
 * enter (the cache directory, the destination).
 */
export function internalPaths(source: string, directories: readonly string[]): string[] {
    const paths: string[] = [];
    for (const directory of directories) {
        const relative = path.relative(source, path.resolve(directory));
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
            continue;
        }
        paths.push(relative.split(path.sep).join('/'));
    }
    return paths;
}
