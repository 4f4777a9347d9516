/**
 * Run Command
 *
 * Implements `tidyfold run [source]`: the five-stage organize pipeline with
 * the cache controls.
 *   --cache-stats   print per-stage entry counts and sizes, then exit
 *   --clear-cache   delete a stage's entries (or all) before it runs; without
 *                   a source, clear and exit
 *   --no-cache      ignore existing entries (results are still stored)
 *   --cache-dir     cache root (default: ./.tidyfold-cache)
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    CacheStore,
    CacheUnavailableError,
    CacheWriteError,
    CLEAR_ALL,
    ConfigError,
    getErrorCauseMessage,
    isCancellationError,
    isOrganizerError,
    setLogger,
} from '@tidyfold/organizer-core';
import type { CacheStats, ItemProgress, StageState } from '@tidyfold/organizer-core';
import { createAIClient } from '../ai/ai-client';
import type { AIClientSettings } from '../ai/ai-client';
import {
    PIPELINE_STAGES,
    resolveModels,
    runOrganizePipeline,
    stopAfterFor,
} from '../pipeline/organize-pipeline';
import type { OrganizePipelineResult } from '../pipeline/organize-pipeline';
import {
    StageProgress,
    bold,
    createCLILogger,
    formatBytes,
    formatDuration,
    gray,
    printError,
    printHeader,
    printInfo,
    printKeyValue,
    printSuccess,
    printWarning,
} from '../logger';
import { EXIT_CODES } from '../cli';
import type { AIProvider, ModelInfo, RunCommandOptions } from '../types';

/** Cache directory used when neither --cache-dir nor cacheDir is given */
export const DEFAULT_CACHE_DIR = '.tidyfold-cache';

/** Destination folder (inside the source) used when none is given */
export const DEFAULT_DESTINATION = 'organized';

// ============================================================================
// Execute Run Command
// ============================================================================

/**
 * Execute the run command.
 *
 * @returns Exit code
 */
export async function executeRun(options: RunCommandOptions): Promise<number> {
    try {
        return await run(options);
    } catch (error) {
        return reportFailure(error, options.verbose);
    }
}

async function run(options: RunCommandOptions): Promise<number> {
    validateFlags(options);
    const logger = createCLILogger();
    setLogger(logger);

    const cacheDir = resolveCacheDir(options.cacheDir);
    const store = new CacheStore(cacheDir, { logger });

    // --cache-stats never runs the pipeline
    if (options.cacheStats) {
        printCacheStats(store.stats());
        return EXIT_CODES.SUCCESS;
    }

    // --clear-cache without a source: clear and exit
    if (!options.source) {
        if (options.clearCache === undefined) {
            throw new ConfigError('No source directory provided. Pass [source] or set "source" in tidyfold.config.yaml');
        }
        const removed = options.clearCache === CLEAR_ALL
            ? store.clear()
            : store.delete(options.clearCache);
        printSuccess(`Cleared ${removed} cache ${removed === 1 ? 'entry' : 'entries'} (${options.clearCache}) from ${cacheDir}`);
        return EXIT_CODES.SUCCESS;
    }

    const source = path.resolve(options.source);
    if (!fs.existsSync(source) || !fs.statSync(source).isDirectory()) {
        throw new ConfigError(`Source directory does not exist: ${source}`);
    }
    const destination = path.resolve(options.destination ?? path.join(source, DEFAULT_DESTINATION));
    const models = resolveModels(options);

    printHeader('tidyfold: Organize');
    printKeyValue('Source', source);
    printKeyValue('Destination', destination);
    printKeyValue('Cache', cacheDir);
    printKeyValue('Models', models.map(m => `${m.name} (${m.provider})`).join(', '));
    if (!options.cacheRead) { printKeyValue('Cache Reads', 'disabled (--no-cache)'); }
    if (!options.cacheWrite) { printKeyValue('Cache Writes', 'disabled'); }
    if (options.clearCache) { printKeyValue('Clear Cache', options.clearCache); }
    if (options.dryRun) { printKeyValue('Dry Run', 'yes (no files are moved)'); }
    if (options.maxFiles !== undefined) { printKeyValue('Max Files', String(options.maxFiles)); }
    process.stderr.write('\n');

    // Set up cancellation
    let cancelled = false;
    const isCancelled = () => cancelled;
    const sigintHandler = () => {
        if (cancelled) {
            process.exit(EXIT_CODES.CANCELLED);
        }
        cancelled = true;
        printWarning('Cancellation requested. Finishing the current item...');
    };
    process.on('SIGINT', sigintHandler);

    const progress = new StageProgress();
    const states = new Map<string, StageState>();

    try {
        const result = await runOrganizePipeline({
            source,
            destination,
            store,
            client: createAIClient(clientSettings(options, models)),
            models,
            scan: {
                include: options.include,
                exclude: options.exclude,
                includeHidden: options.includeHidden,
                maxFileSize: options.maxFileSize,
            },
            readCache: options.cacheRead,
            writeCache: options.cacheWrite,
            clearTarget: options.clearCache,
            stopAfter: stopAfterFor(options.skipFrom),
            verifyConnectivity: options.ai?.verifyConnectivity,
            unsortedFolder: options.unsortedFolder,
            dryRun: options.dryRun,
            overwrite: options.overwrite,
            maxFiles: options.maxFiles,
            timeoutMs: options.ai?.timeout !== undefined ? options.ai.timeout * 1000 : undefined,
            isCancelled,
            logger,
            onStageStart: state => {
                states.set(state.id, state);
                progress.begin(`${state.name}...`);
            },
            onStageComplete: state => {
                states.set(state.id, state);
                progress.end(state);
            },
            onItemComplete: (item: ItemProgress) => {
                progress.update(`Analysis (${item.index}/${item.total}) ${path.basename(item.identity)}`);
            },
        });

        printRunSummary(result);
        return EXIT_CODES.SUCCESS;
    } catch (error) {
        if (progress.isActive) {
            progress.abort();
        }
        printStageTable([...states.values()]);
        throw error;
    } finally {
        process.removeListener('SIGINT', sigintHandler);
    }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Reject conflicting or malformed cache flags before anything runs.
 *
 * @throws ConfigError
 */
export function validateFlags(options: RunCommandOptions): void {
    if (options.clearCache !== undefined) {
        if (!options.cacheRead) {
            throw new ConfigError('--no-cache cannot be combined with --clear-cache');
        }
        const targets = [...PIPELINE_STAGES.map(stage => stage.id), CLEAR_ALL];
        if (!targets.includes(options.clearCache)) {
            throw new ConfigError(
                `Unknown cache clear target "${options.clearCache}" (expected ${targets.join(', ')})`
            );
        }
    }
    if (options.skipFrom !== undefined && (options.skipFrom < 2 || options.skipFrom > 5)) {
        throw new ConfigError(`Invalid stage to skip: ${options.skipFrom} (expected 2-5)`);
    }
    if (options.maxFiles !== undefined && (!Number.isInteger(options.maxFiles) || options.maxFiles < 1)) {
        throw new ConfigError('--max-files must be a positive integer');
    }
}

/**
 * Absolute cache root; the path must not be an existing file.
 *
 * @throws ConfigError
 */
export function resolveCacheDir(cacheDir: string | undefined): string {
    if (cacheDir !== undefined && cacheDir.trim() === '') {
        throw new ConfigError('--cache-dir must not be empty');
    }
    const resolved = path.resolve(cacheDir ?? DEFAULT_CACHE_DIR);
    if (fs.existsSync(resolved) && !fs.statSync(resolved).isDirectory()) {
        throw new ConfigError(`Cache directory path is a file: ${resolved}`);
    }
    return resolved;
}

/**
 * Client settings from the `ai` config section. The base URL and key variable
 * apply to `--provider` when given, otherwise to every provider in use.
 */
export function clientSettings(options: RunCommandOptions, models: readonly ModelInfo[]): AIClientSettings {
    const providers: AIProvider[] = options.provider
        ? [options.provider]
        : [...new Set(models.map(model => model.provider))];
    const settings: AIClientSettings = {};
    const { baseUrl, apiKeyEnv, timeout } = options.ai ?? {};
    for (const provider of providers) {
        if (baseUrl) {
            settings.baseUrls = { ...settings.baseUrls, [provider]: baseUrl };
        }
        if (apiKeyEnv) {
            settings.apiKeyEnvs = { ...settings.apiKeyEnvs, [provider]: apiKeyEnv };
        }
    }
    if (timeout !== undefined) {
        settings.timeoutMs = timeout * 1000;
    }
    return settings;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Map an error to an exit code by walking its cause chain.
 */
export function exitCodeFor(error: unknown): number {
    let current: unknown = error;
    for (let depth = 0; depth < 10 && current !== undefined; depth++) {
        if (isCancellationError(current)) {
            return EXIT_CODES.CANCELLED;
        }
        if (current instanceof ConfigError) {
            return EXIT_CODES.CONFIG_ERROR;
        }
        if (current instanceof CacheWriteError || current instanceof CacheUnavailableError) {
            return EXIT_CODES.CACHE_ERROR;
        }
        current = isOrganizerError(current) ? current.cause : undefined;
    }
    return EXIT_CODES.EXECUTION_ERROR;
}

function reportFailure(error: unknown, verbose: boolean): number {
    const exitCode = exitCodeFor(error);
    if (exitCode === EXIT_CODES.CANCELLED) {
        printWarning('Cancelled. Completed items are cached; run again to resume.');
        return exitCode;
    }
    printError(getErrorCauseMessage(error));
    if (verbose && error instanceof Error && error.stack) {
        process.stderr.write(`${gray(error.stack)}\n`);
    }
    return exitCode;
}

// ============================================================================
// Reporting
// ============================================================================

/**
 * One line per stage: status, cache use, item counts, elapsed time.
 */
export function formatStageLine(state: StageState): string {
    const parts: string[] = [state.status];
    if (state.status === 'cached' || state.status === 'computed') {
        if (state.granular) {
            parts.push(`${state.itemHits} cached, ${state.itemMisses} computed, ${state.itemErrors.length} failed`);
            if (state.cacheHit) { parts.push('whole-stage hit'); }
        } else {
            parts.push(state.cacheHit ? 'cache hit' : 'cache miss');
        }
        parts.push(formatDuration(state.elapsedMs));
    }
    if (state.clearedEntries > 0) {
        parts.push(`${state.clearedEntries} entries cleared`);
    }
    return parts.join(', ');
}

function printStageTable(states: StageState[]): void {
    if (states.length === 0) {
        return;
    }
    printHeader('Stages');
    for (const state of states) {
        printKeyValue(`${state.id} ${state.name}`, formatStageLine(state));
    }
}

function printRunSummary(result: OrganizePipelineResult): void {
    const { summary } = result;
    printStageTable(summary.stages);

    const itemErrors = summary.stages.flatMap(stage => stage.itemErrors);
    if (itemErrors.length > 0) {
        printHeader('Item Errors');
        for (const itemError of itemErrors) {
            printWarning(`${itemError.identity}: ${itemError.message}`);
        }
    }

    printHeader('Summary');
    if (summary.clearedAll > 0) { printKeyValue('Cleared Entries', String(summary.clearedAll)); }
    printKeyValue('Stages Computed', String(summary.totals.computed));
    printKeyValue('Stages Cached', String(summary.totals.cached));
    if (summary.totals.pending > 0) { printKeyValue('Stages Skipped', String(summary.totals.pending)); }
    if (result.scan) {
        printKeyValue('Files Found', String(result.scan.files.length));
        if (result.scan.excluded.length > 0) { printKeyValue('Files Over Size Limit', String(result.scan.excluded.length)); }
    }
    if (result.analysis) {
        printKeyValue('Files Analyzed', String(result.analysis.analyses.length));
    }
    if (result.taxonomy) {
        printKeyValue('Categories', String(result.taxonomy.nodes.length));
    }
    if (result.move) {
        if (result.move.dryRun) {
            printKeyValue('Planned Moves', String(result.move.operations.filter(op => op.status === 'planned').length));
        } else {
            printKeyValue('Moved', String(result.move.moved));
        }
        if (result.move.skipped > 0) { printKeyValue('Skipped', String(result.move.skipped)); }
        if (result.move.failed > 0) { printKeyValue('Failed', String(result.move.failed)); }
    }
    printKeyValue('Total Duration', formatDuration(summary.totals.elapsedMs));
    process.stderr.write('\n');

    if (result.move && !result.move.dryRun) {
        printSuccess(`Files organized into ${bold(result.move.destinationRoot)}`);
    } else if (result.move) {
        printInfo('Dry run complete; no files were moved.');
    } else {
        printSuccess('Pipeline finished');
    }
}

/**
 * Per-stage entry counts and the total size, from the cache directory.
 */
export function formatCacheStats(stats: CacheStats): string[] {
    if (!stats.exists) {
        return [`No cache at ${stats.rootDir}`];
    }
    const lines: string[] = [];
    for (const stage of PIPELINE_STAGES) {
        const entry = stats.stages[stage.id];
        if (!entry) {
            lines.push(`${stage.id} ${stage.name}: empty`);
            continue;
        }
        const items = stage.granular ? `, ${entry.itemEntries} item ${entry.itemEntries === 1 ? 'entry' : 'entries'}` : '';
        lines.push(`${stage.id} ${stage.name}: ${entry.entries} stage ${entry.entries === 1 ? 'entry' : 'entries'}${items}, ${formatBytes(entry.bytes)}`);
    }
    lines.push(`Total: ${stats.totalEntries} entries, ${formatBytes(stats.totalBytes)}`);
    return lines;
}

function printCacheStats(stats: CacheStats): void {
    printHeader(`Cache: ${stats.rootDir}`);
    for (const line of formatCacheStats(stats)) {
        process.stdout.write(`${line}\n`);
    }
}
