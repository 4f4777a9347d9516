/**
 * Tests for StageRunner: whole-stage and per-item granular modes.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { StageRunner, ItemStageDefinition, WholeStageDefinition } from '../../src/stage/stage-runner';
import { check, createJsonCodec } from '../../src/stage/codec';
import { CacheStore } from '../../src/cache/cache-store';
import { globalKey, itemKey } from '../../src/cache/cache-key';
import { fingerprintBytes, fingerprintFile } from '../../src/cache/fingerprint';
import { CancellationError } from '../../src/runtime/cancellation';
import { CacheWriteError, ComputeError } from '../../src/errors';
import { nullLogger, Logger } from '../../src/logger';

let tmpDir: string;
let sourceDir: string;
let cacheDir: string;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stage-runner-test-'));
    sourceDir = path.join(tmpDir, 'source');
    cacheDir = path.join(tmpDir, 'cache');
    fs.mkdirSync(sourceDir);
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeSource(name: string, content: string, mtimeSeconds = 1700000000): string {
    const filePath = path.join(sourceDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    fs.utimesSync(filePath, mtimeSeconds, mtimeSeconds);
    return filePath;
}

const stringCodec = createJsonCodec(1, data => check.string(data, 'result'));

// ============================================================================
// Whole-stage mode
// ============================================================================

describe('runWholeStage', () => {
    let store: CacheStore;
    let subject: string;
    const createCompute = () => vi.fn(async (input: string) => `${input}:${subject}`);
    let compute: ReturnType<typeof createCompute>;
    let def: WholeStageDefinition<string, string>;

    beforeEach(() => {
        store = new CacheStore(cacheDir, { logger: nullLogger });
        subject = 'v1';
        compute = createCompute();
        def = {
            id: 'stage2',
            codec: stringCodec,
            fingerprint: () => fingerprintBytes(subject),
            compute,
        };
    });

    it('should compute on a miss and serve the stored result on the next run', async () => {
        const runner = new StageRunner({ store, logger: nullLogger });

        const first = await runner.runWholeStage(def, 'in');
        const second = await runner.runWholeStage(def, 'in');

        expect(first).toMatchObject({ result: 'in:v1', cacheHit: false });
        expect(second).toMatchObject({ result: 'in:v1', cacheHit: true });
        expect(compute).toHaveBeenCalledTimes(1);
    });

    it('should recompute when the subject fingerprint changes', async () => {
        const runner = new StageRunner({ store, logger: nullLogger });
        await runner.runWholeStage(def, 'in');

        subject = 'v2';
        const rerun = await runner.runWholeStage(def, 'in');

        expect(rerun).toMatchObject({ result: 'in:v2', cacheHit: false });
        expect(compute).toHaveBeenCalledTimes(2);
    });

    it('should treat an undecodable payload as a miss', async () => {
        const warn = vi.fn();
        const logger: Logger = { ...nullLogger, warn };
        store.put(globalKey('stage2'), '{"schemaVersion":0,"data":"old"}', fingerprintBytes('v1'));

        const outcome = await new StageRunner({ store, logger }).runWholeStage(def, 'in');

        expect(outcome).toMatchObject({ result: 'in:v1', cacheHit: false });
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should wrap compute failures in ComputeError and write nothing', async () => {
        compute.mockRejectedValueOnce(new Error('model offline'));
        const runner = new StageRunner({ store, logger: nullLogger });

        await expect(runner.runWholeStage(def, 'in')).rejects.toThrow('Stage stage2 failed: model offline');
        await expect(runner.runWholeStage({ ...def, compute: () => { throw new Error('again'); } }, 'in'))
            .rejects.toBeInstanceOf(ComputeError);
        expect(store.get(globalKey('stage2'))).toBeNull();
    });

    it('should bypass reads but still write when readCache is false', async () => {
        await new StageRunner({ store, logger: nullLogger }).runWholeStage(def, 'in');
        const outcome = await new StageRunner({ store, readCache: false, logger: nullLogger }).runWholeStage(def, 'in');

        expect(outcome.cacheHit).toBe(false);
        expect(compute).toHaveBeenCalledTimes(2);
        expect(store.get(globalKey('stage2'))).not.toBeNull();
    });

    it('should write nothing when writeCache is false', async () => {
        await new StageRunner({ store, writeCache: false, logger: nullLogger }).runWholeStage(def, 'in');
        expect(store.get(globalKey('stage2'))).toBeNull();
    });

    it('should not cache when the subject cannot be fingerprinted', async () => {
        const runner = new StageRunner({ store, logger: nullLogger });
        const unfingerprintable = { ...def, fingerprint: () => null };

        await runner.runWholeStage(unfingerprintable, 'in');
        await runner.runWholeStage(unfingerprintable, 'in');

        expect(compute).toHaveBeenCalledTimes(2);
        expect(store.get(globalKey('stage2'))).toBeNull();
    });

    it('should not store a result the stage declines to cache', async () => {
        const runner = new StageRunner({ store, logger: nullLogger });
        const declining: WholeStageDefinition<string, string> = { ...def, shouldStore: result => !result.startsWith('down') };

        const first = await runner.runWholeStage(declining, 'down');
        const second = await runner.runWholeStage(declining, 'down');
        const third = await runner.runWholeStage(declining, 'up');
        const fourth = await runner.runWholeStage(declining, 'up');

        expect(first.cacheHit).toBe(false);
        expect(second.cacheHit).toBe(false);
        expect(third.cacheHit).toBe(false);
        expect(fourth).toMatchObject({ result: 'up:v1', cacheHit: true });
        expect(compute).toHaveBeenCalledTimes(3);
    });

    it('should propagate cache write failures', async () => {
        fs.writeFileSync(cacheDir, 'not a directory');
        const runner = new StageRunner({ store, logger: nullLogger });
        await expect(runner.runWholeStage(def, 'in')).rejects.toBeInstanceOf(CacheWriteError);
    });

    it('should write nothing when cancelled during compute', async () => {
        let cancelled = false;
        const runner = new StageRunner({ store, logger: nullLogger, isCancelled: () => cancelled });
        const cancelling = {
            ...def,
            compute: async (input: string) => {
                cancelled = true;
                return input;
            },
        };

        await expect(runner.runWholeStage(cancelling, 'in')).rejects.toBeInstanceOf(CancellationError);
        expect(store.get(globalKey('stage2'))).toBeNull();
    });
});

// ============================================================================
// Per-item mode
// ============================================================================

describe('runItemStage', () => {
    const NAMES = ['e.txt', 'c.txt', 'a.txt', 'd.txt', 'b.txt'];
    let store: CacheStore;
    let files: string[];
    let failOn: Set<string>;
    const createComputeItem = () => vi.fn(async (filePath: string) => {
        if (failOn.has(path.basename(filePath))) {
            throw new Error(`cannot analyze ${path.basename(filePath)}`);
        }
        return fs.readFileSync(filePath, 'utf-8').toUpperCase();
    });
    let computeItem: ReturnType<typeof createComputeItem>;
    let def: ItemStageDefinition<string, string>;

    beforeEach(() => {
        store = new CacheStore(cacheDir, { logger: nullLogger });
        files = NAMES.map(name => writeSource(name, `content of ${name}`));
        failOn = new Set();
        computeItem = createComputeItem();
        def = {
            id: 'stage3',
            itemCodec: stringCodec,
            identity: filePath => filePath,
            fingerprint: filePath => fingerprintFile(filePath),
            computeItem,
        };
    });

    function runner(options: Partial<ConstructorParameters<typeof StageRunner>[0]> = {}): StageRunner {
        return new StageRunner({ store, logger: nullLogger, ...options });
    }

    function sortedNames(): string[] {
        return [...NAMES].sort();
    }

    it('should process items in sorted identity order', async () => {
        const outcome = await runner().runItemStage(def, files);

        expect(outcome.results.map(r => path.basename(r.identity))).toEqual(sortedNames());
        expect(computeItem.mock.calls.map(([p]) => path.basename(p))).toEqual(sortedNames());
        expect(outcome.results[0].result).toBe('CONTENT OF A.TXT');
    });

    it('should be idempotent: a second run computes nothing', async () => {
        const first = await runner().runItemStage(def, files);
        const second = await runner().runItemStage(def, files);

        expect(first).toMatchObject({ itemHits: 0, itemMisses: 5, wholeStageHit: false });
        expect(second).toMatchObject({ itemHits: 5, itemMisses: 0, wholeStageHit: true });
        expect(second.results.map(r => r.result)).toEqual(first.results.map(r => r.result));
        expect(computeItem).toHaveBeenCalledTimes(5);
    });

    it('should recompute only the modified item and leave other entries untouched', async () => {
        const three = files.slice(0, 3);
        await runner().runItemStage(def, three);

        const untouched = three.slice(1).map(f => store.pathFor(itemKey('stage3', f)));
        const before = untouched.map(p => fs.readFileSync(p));

        writeSource('e.txt', 'changed content', 1700000100);
        computeItem.mockClear();
        const outcome = await runner().runItemStage(def, three);

        expect(outcome).toMatchObject({ itemHits: 2, itemMisses: 1, wholeStageHit: false });
        expect(computeItem).toHaveBeenCalledTimes(1);
        expect(computeItem).toHaveBeenCalledWith(files[0]);
        expect(untouched.map(p => fs.readFileSync(p))).toEqual(before);
    });

    it('should resume after an interruption without redoing finished items', async () => {
        const interrupted = runner({ isCancelled: () => computeItem.mock.calls.length >= 2 });
        await expect(interrupted.runItemStage(def, files)).rejects.toBeInstanceOf(CancellationError);
        expect(computeItem).toHaveBeenCalledTimes(2);

        computeItem.mockClear();
        const outcome = await runner().runItemStage(def, files);

        expect(outcome).toMatchObject({ itemHits: 2, itemMisses: 3, wholeStageHit: false });
        expect(computeItem.mock.calls.map(([p]) => path.basename(p))).toEqual(['c.txt', 'd.txt', 'e.txt']);
        expect(outcome.results.map(r => path.basename(r.identity))).toEqual(sortedNames());
        expect(outcome.results.map(r => r.cached)).toEqual([true, true, false, false, false]);
    });

    it('should recompute a truncated item entry and serve the rest from cache', async () => {
        await runner().runItemStage(def, files);

        const corrupted = store.pathFor(itemKey('stage3', path.join(sourceDir, 'c.txt')));
        fs.writeFileSync(corrupted, fs.readFileSync(corrupted, 'utf-8').substring(0, 20));
        computeItem.mockClear();

        const outcome = await runner().runItemStage(def, files);

        expect(outcome).toMatchObject({ itemHits: 4, itemMisses: 1 });
        expect(computeItem).toHaveBeenCalledTimes(1);
        expect(computeItem).toHaveBeenCalledWith(path.join(sourceDir, 'c.txt'));
        expect(outcome.results).toHaveLength(5);
    });

    it('should record an item failure and keep going', async () => {
        failOn.add('c.txt');
        const outcome = await runner().runItemStage(def, files);

        expect(outcome.results.map(r => path.basename(r.identity))).toEqual(['a.txt', 'b.txt', 'd.txt', 'e.txt']);
        expect(outcome.errors).toHaveLength(1);
        expect(path.basename(outcome.errors[0].identity)).toBe('c.txt');
        expect(outcome.errors[0].error).toBeInstanceOf(ComputeError);
        expect(outcome.errors[0].error.message).toContain('cannot analyze c.txt');
        expect(store.get(globalKey('stage3'))).toBeNull();
    });

    it('should write the whole-stage entry once every item succeeds', async () => {
        failOn.add('c.txt');
        await runner().runItemStage(def, files);

        failOn.clear();
        computeItem.mockClear();
        const outcome = await runner().runItemStage(def, files);

        expect(computeItem).toHaveBeenCalledTimes(1);
        expect(outcome.errors).toEqual([]);
        expect(store.get(globalKey('stage3'))).not.toBeNull();
    });

    it('should ignore a whole-stage entry whose aggregate no longer matches', async () => {
        await runner().runItemStage(def, files);
        const subset = files.filter(f => path.basename(f) !== 'b.txt');

        const outcome = await runner().runItemStage(def, subset);

        expect(outcome).toMatchObject({ itemHits: 4, itemMisses: 0, wholeStageHit: false });
        expect(computeItem).toHaveBeenCalledTimes(5);
    });

    it('should recompute items whose source vanished', async () => {
        await runner().runItemStage(def, files);
        fs.rmSync(files[0]);
        failOn.add('e.txt');

        const outcome = await runner().runItemStage(def, files);

        expect(outcome.itemMisses).toBe(1);
        expect(outcome.errors).toHaveLength(1);
    });

    it('should report progress for every item', async () => {
        failOn.add('b.txt');
        const onItemComplete = vi.fn();
        await runner().runItemStage(def, files, { onItemComplete });

        expect(onItemComplete).toHaveBeenCalledTimes(5);
        expect(onItemComplete.mock.calls[1][0]).toMatchObject({ stageId: 'stage3', index: 2, total: 5, cached: false });
        expect(onItemComplete.mock.calls[1][0].error).toBeInstanceOf(ComputeError);
    });

    it('should compute everything without reading when readCache is false', async () => {
        await runner().runItemStage(def, files);
        const outcome = await runner({ readCache: false }).runItemStage(def, files);

        expect(outcome).toMatchObject({ itemHits: 0, itemMisses: 5 });
        expect(computeItem).toHaveBeenCalledTimes(10);
    });

    it('should handle an empty item list', async () => {
        const outcome = await runner().runItemStage(def, []);
        expect(outcome).toMatchObject({ results: [], errors: [], itemHits: 0, itemMisses: 0 });
    });
});
