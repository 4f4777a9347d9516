/**
 * Run Command Tests
 *
 * Flag validation, exit code mapping, cache reports, and runs that stop
 * before any model is contacted.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    CacheStore,
    CacheWriteError,
    CancellationError,
    ConfigError,
    StageFailedError,
    nullLogger,
} from '@tidyfold/organizer-core';
import type { CacheStats, StageState } from '@tidyfold/organizer-core';
import {
    clientSettings,
    executeRun,
    exitCodeFor,
    formatCacheStats,
    formatStageLine,
    resolveCacheDir,
    validateFlags,
} from '../../src/commands/run';
import { setColorEnabled } from '../../src/logger';
import type { ModelInfo, RunCommandOptions } from '../../src/types';

let tmpDir: string;
let sourceDir: string;
let cacheDir: string;
let stderrSpy: MockInstance<Parameters<typeof process.stderr.write>, ReturnType<typeof process.stderr.write>>;
let stdoutSpy: MockInstance<Parameters<typeof process.stderr.write>, ReturnType<typeof process.stderr.write>>;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tidyfold-run-test-'));
    sourceDir = path.join(tmpDir, 'inbox');
    cacheDir = path.join(tmpDir, 'cache');
    fs.mkdirSync(sourceDir);
    fs.writeFileSync(path.join(sourceDir, 'notes.txt'), 'hello', 'utf-8');
    setColorEnabled(false);
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

afterEach(() => {
    stderrSpy.mockRestore();
    stdoutSpy.mockRestore();
    setColorEnabled(true);
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

function options(overrides?: Partial<RunCommandOptions>): RunCommandOptions {
    return {
        cacheDir,
        cacheRead: true,
        cacheWrite: true,
        cacheStats: false,
        include: [],
        exclude: [],
        includeHidden: false,
        dryRun: true,
        overwrite: false,
        unsortedFolder: '_unsorted',
        verbose: false,
        ...overrides,
    };
}

function written(spy: MockInstance<Parameters<typeof process.stderr.write>, ReturnType<typeof process.stderr.write>>): string {
    return spy.mock.calls.map(call => String(call[0])).join('');
}

function stageState(overrides?: Partial<StageState>): StageState {
    return {
        id: 'stage1',
        name: 'Scan',
        granular: false,
        status: 'computed',
        cacheHit: false,
        itemHits: 0,
        itemMisses: 0,
        itemErrors: [],
        clearedEntries: 0,
        elapsedMs: 850,
        ...overrides,
    };
}

// ============================================================================
// validateFlags
// ============================================================================

describe('validateFlags', () => {
    it('should accept the defaults', () => {
        expect(() => validateFlags(options())).not.toThrow();
    });

    it('should reject --no-cache with --clear-cache', () => {
        expect(() => validateFlags(options({ cacheRead: false, clearCache: 'all' })))
            .toThrow('--no-cache cannot be combined with --clear-cache');
    });

    it('should reject an unknown clear target', () => {
        expect(() => validateFlags(options({ clearCache: 'stage9' }))).toThrow(
            'Unknown cache clear target "stage9" (expected stage1, stage2, stage3, stage4, stage5, all)'
        );
    });

    it('should accept every stage id and all', () => {
        for (const target of ['stage1', 'stage3', 'stage5', 'all']) {
            expect(() => validateFlags(options({ clearCache: target }))).not.toThrow();
        }
    });

    it('should reject a skip stage outside 2-5', () => {
        expect(() => validateFlags(options({ skipFrom: 1 }))).toThrow(ConfigError);
        expect(() => validateFlags(options({ skipFrom: 6 }))).toThrow(ConfigError);
    });

    it('should reject a non-positive file limit', () => {
        expect(() => validateFlags(options({ maxFiles: 0 }))).toThrow('--max-files must be a positive integer');
    });
});

// ============================================================================
// resolveCacheDir
// ============================================================================

describe('resolveCacheDir', () => {
    it('should resolve relative to the working directory', () => {
        expect(resolveCacheDir(undefined)).toBe(path.resolve('.tidyfold-cache'));
        expect(resolveCacheDir(cacheDir)).toBe(cacheDir);
    });

    it('should reject an empty path', () => {
        expect(() => resolveCacheDir('  ')).toThrow('--cache-dir must not be empty');
    });

    it('should reject a path that is a file', () => {
        const file = path.join(tmpDir, 'not-a-dir');
        fs.writeFileSync(file, 'x', 'utf-8');
        expect(() => resolveCacheDir(file)).toThrow(`Cache directory path is a file: ${file}`);
    });
});

// ============================================================================
// clientSettings
// ============================================================================

describe('clientSettings', () => {
    const models: ModelInfo[] = [
        { name: 'a', provider: 'openai', model: 'gpt-4o-mini', capabilities: ['image'] },
        { name: 'b', provider: 'ollama', model: 'llama3.1', capabilities: ['text'] },
    ];

    it('should apply the base URL to the chosen provider only', () => {
        const settings = clientSettings(
            options({ provider: 'ollama', ai: { baseUrl: 'http://127.0.0.1:9999', timeout: 30 } }),
            models
        );
        expect(settings).toEqual({ baseUrls: { ollama: 'http://127.0.0.1:9999' }, timeoutMs: 30000 });
    });

    it('should apply the key variable to every provider in use', () => {
        const settings = clientSettings(options({ ai: { apiKeyEnv: 'MY_KEY' } }), models);
        expect(settings).toEqual({ apiKeyEnvs: { openai: 'MY_KEY', ollama: 'MY_KEY' } });
    });

    it('should be empty without an ai section', () => {
        expect(clientSettings(options(), models)).toEqual({});
    });
});

// ============================================================================
// exitCodeFor
// ============================================================================

describe('exitCodeFor', () => {
    it('should map errors to exit codes', () => {
        expect(exitCodeFor(new CancellationError())).toBe(130);
        expect(exitCodeFor(new ConfigError('bad'))).toBe(2);
        expect(exitCodeFor(new CacheWriteError('disk full'))).toBe(3);
        expect(exitCodeFor(new Error('boom'))).toBe(1);
        expect(exitCodeFor('boom')).toBe(1);
    });

    it('should follow the cause chain', () => {
        expect(exitCodeFor(new StageFailedError('stage2', new CacheWriteError('disk full')))).toBe(3);
        expect(exitCodeFor(new StageFailedError('stage4', new Error('quota exceeded')))).toBe(1);
    });
});

// ============================================================================
// Reports
// ============================================================================

describe('formatStageLine', () => {
    it('should describe a whole-stage result', () => {
        expect(formatStageLine(stageState({ status: 'cached', cacheHit: true, elapsedMs: 12 })))
            .toBe('cached, cache hit, 12ms');
    });

    it('should describe item counts for a granular stage', () => {
        expect(formatStageLine(stageState({
            id: 'stage3',
            name: 'Analysis',
            granular: true,
            itemHits: 2,
            itemMisses: 1,
            itemErrors: [{ stageId: 'stage3', identity: '/in/b.md', message: 'boom' }],
            clearedEntries: 4,
            elapsedMs: 2000,
        }))).toBe('computed, 2 cached, 1 computed, 1 failed, 2s, 4 entries cleared');
    });

    it('should show only the status of a pending stage', () => {
        expect(formatStageLine(stageState({ status: 'pending' }))).toBe('pending');
    });
});

describe('formatCacheStats', () => {
    it('should report a missing cache', () => {
        const stats: CacheStats = { rootDir: '/c', exists: false, stages: {}, totalEntries: 0, totalBytes: 0 };
        expect(formatCacheStats(stats)).toEqual(['No cache at /c']);
    });

    it('should list every stage', () => {
        const stats: CacheStats = {
            rootDir: '/c',
            exists: true,
            stages: {
                stage1: { entries: 1, itemEntries: 0, bytes: 512 },
                stage3: { entries: 1, itemEntries: 2, bytes: 2048 },
            },
            totalEntries: 4,
            totalBytes: 2560,
        };
        expect(formatCacheStats(stats)).toEqual([
            'stage1 Scan: 1 stage entry, 512 B',
            'stage2 Model discovery: empty',
            'stage3 Analysis: 1 stage entry, 2 item entries, 2.0 KB',
            'stage4 Taxonomy: empty',
            'stage5 Move: empty',
            'Total: 4 entries, 2.5 KB',
        ]);
    });
});

// ============================================================================
// executeRun
// ============================================================================

describe('executeRun', () => {
    it('should fail with a config error when no source is given', async () => {
        expect(await executeRun(options())).toBe(2);
        expect(written(stderrSpy)).toContain('No source directory provided');
    });

    it('should fail with a config error for a missing source', async () => {
        const missing = path.join(tmpDir, 'missing');
        expect(await executeRun(options({ source: missing }))).toBe(2);
        expect(written(stderrSpy)).toContain(`Source directory does not exist: ${missing}`);
    });

    it('should fail with a config error for conflicting flags', async () => {
        expect(await executeRun(options({ source: sourceDir, cacheRead: false, clearCache: 'stage1' }))).toBe(2);
    });

    it('should run the scan alone and cache it', async () => {
        expect(await executeRun(options({ source: sourceDir, skipFrom: 2 }))).toBe(0);

        const stats = new CacheStore(cacheDir, { logger: nullLogger }).stats();
        expect(stats.stages.stage1).toEqual({ entries: 1, itemEntries: 0, bytes: stats.totalBytes });
        expect(Object.keys(stats.stages)).toEqual(['stage1']);
    });

    it('should print cache statistics without running', async () => {
        expect(await executeRun(options({ source: sourceDir, skipFrom: 2 }))).toBe(0);
        stdoutSpy.mockClear();

        expect(await executeRun(options({ cacheStats: true }))).toBe(0);

        const lines = written(stdoutSpy).split('\n');
        expect(lines[0]).toMatch(/^stage1 Scan: 1 stage entry, [\d.]+ (B|KB)$/);
        expect(lines[1]).toBe('stage2 Model discovery: empty');
    });

    it('should clear a stage and exit when no source is given', async () => {
        expect(await executeRun(options({ source: sourceDir, skipFrom: 2 }))).toBe(0);

        expect(await executeRun(options({ clearCache: 'stage1' }))).toBe(0);

        expect(written(stderrSpy)).toContain(`Cleared 1 cache entry (stage1) from ${cacheDir}`);
        expect(new CacheStore(cacheDir, { logger: nullLogger }).stats().totalEntries).toBe(0);
    });
});
