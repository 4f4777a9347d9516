/**
 * Tests for PipelineOrchestrator: state tracking, skip and clear controls.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineOrchestrator, PipelineOrchestratorOptions } from '../../src/pipeline/orchestrator';
import { StageRunner, ItemStageDefinition, WholeStageDefinition } from '../../src/stage/stage-runner';
import { check, createJsonCodec } from '../../src/stage/codec';
import { CacheStore } from '../../src/cache/cache-store';
import { globalKey, itemKey } from '../../src/cache/cache-key';
import { fingerprintBytes } from '../../src/cache/fingerprint';
import { CacheWriteError, ConfigError, StageFailedError } from '../../src/errors';
import { CancellationError } from '../../src/runtime/cancellation';
import { nullLogger } from '../../src/logger';
import type { StageDescriptor } from '../../src/pipeline/types';

let tmpDir: string;
let store: CacheStore;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-test-'));
    store = new CacheStore(path.join(tmpDir, 'cache'), { logger: nullLogger });
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

const STAGES: StageDescriptor[] = [
    { id: 'stage1', name: 'List' },
    { id: 'stage2', name: 'Split' },
    { id: 'stage3', name: 'Transform', granular: true },
    { id: 'stage4', name: 'Join' },
];

const numberCodec = createJsonCodec(1, data => check.number(data, 'n'));
const stringCodec = createJsonCodec(1, data => check.string(data, 's'));
const listCodec = createJsonCodec(1, data => check.stringArray(data, 'list'));

/**
 * A small four-stage chain: count → words → upper-cased words (per item) → joined.
 */
function createChain(failOn: Set<string> = new Set()) {
    const calls = { stage1: 0, stage2: 0, stage3: 0, stage4: 0 };

    const stage1: WholeStageDefinition<string, number> = {
        id: 'stage1',
        codec: numberCodec,
        fingerprint: input => fingerprintBytes(input),
        compute: input => {
            calls.stage1++;
            return input.split(' ').length;
        },
    };
    const stage2: WholeStageDefinition<{ text: string; count: number }, string[]> = {
        id: 'stage2',
        codec: listCodec,
        fingerprint: input => fingerprintBytes(JSON.stringify(input)),
        compute: input => {
            calls.stage2++;
            return input.text.split(' ').slice(0, input.count);
        },
    };
    const stage3: ItemStageDefinition<string, string> = {
        id: 'stage3',
        itemCodec: stringCodec,
        identity: word => word,
        fingerprint: word => fingerprintBytes(word),
        computeItem: async word => {
            calls.stage3++;
            if (failOn.has(word)) {
                throw new Error(`bad word ${word}`);
            }
            return word.toUpperCase();
        },
    };
    const stage4: WholeStageDefinition<string[], string> = {
        id: 'stage4',
        codec: stringCodec,
        fingerprint: input => fingerprintBytes(JSON.stringify(input)),
        compute: input => {
            calls.stage4++;
            return input.join('-');
        },
    };

    async function run(orchestrator: PipelineOrchestrator, text: string): Promise<string | undefined> {
        const count = await orchestrator.runWholeStage(stage1, text);
        if (!orchestrator.isEnabled('stage2')) return undefined;
        const words = await orchestrator.runWholeStage(stage2, { text, count });
        if (!orchestrator.isEnabled('stage3')) return undefined;
        const transformed = await orchestrator.runItemStage(stage3, words);
        if (!orchestrator.isEnabled('stage4')) return undefined;
        return orchestrator.runWholeStage(stage4, transformed.results.map(r => r.result));
    }

    return { calls, run, stage1 };
}

function createOrchestrator(options: Partial<PipelineOrchestratorOptions> = {}): PipelineOrchestrator {
    return new PipelineOrchestrator({
        stages: STAGES,
        store,
        runner: new StageRunner({ store, logger: nullLogger }),
        logger: nullLogger,
        ...options,
    });
}

describe('PipelineOrchestrator', () => {
    it('should run every stage and report computed, then cached', async () => {
        const chain = createChain();

        const first = createOrchestrator();
        expect(await chain.run(first, 'pear fig apple')).toBe('APPLE-FIG-PEAR');
        expect(first.summary().stages.map(s => s.status)).toEqual(['computed', 'computed', 'computed', 'computed']);

        const second = createOrchestrator();
        expect(await chain.run(second, 'pear fig apple')).toBe('APPLE-FIG-PEAR');
        const summary = second.summary();
        expect(summary.stages.map(s => s.status)).toEqual(['cached', 'cached', 'cached', 'cached']);
        expect(summary.totals).toMatchObject({ cached: 4, computed: 0, itemHits: 3, itemMisses: 0 });
        expect(chain.calls).toEqual({ stage1: 1, stage2: 1, stage3: 3, stage4: 1 });
    });

    it('should start every stage as pending', () => {
        const summary = createOrchestrator().summary();
        expect(summary.stages.map(s => s.status)).toEqual(['pending', 'pending', 'pending', 'pending']);
        expect(summary.totals.pending).toBe(4);
    });

    it('should stop after the configured stage', async () => {
        const chain = createChain();
        const orchestrator = createOrchestrator({ stopAfter: 'stage2' });

        expect(await chain.run(orchestrator, 'a b')).toBeUndefined();
        expect(orchestrator.isEnabled('stage3')).toBe(false);
        expect(orchestrator.summary().stages.map(s => s.status)).toEqual(['computed', 'computed', 'pending', 'pending']);
    });

    it('should clear only the targeted stage before it runs', async () => {
        const chain = createChain();
        await chain.run(createOrchestrator(), 'b a');

        const stage1Record = fs.readFileSync(store.pathFor(globalKey('stage1')));
        const orchestrator = createOrchestrator({ clearTarget: 'stage3' });
        await chain.run(orchestrator, 'b a');

        const summary = orchestrator.summary();
        expect(summary.stages.map(s => s.status)).toEqual(['cached', 'cached', 'computed', 'cached']);
        expect(orchestrator.getState('stage3').clearedEntries).toBe(3);
        expect(chain.calls.stage3).toBe(4);
        expect(fs.readFileSync(store.pathFor(globalKey('stage1')))).toEqual(stage1Record);
    });

    it('should clear everything before stage 1 for `all`', async () => {
        const chain = createChain();
        await chain.run(createOrchestrator(), 'x y');

        const orchestrator = createOrchestrator({ clearTarget: 'all' });
        await chain.run(orchestrator, 'x y');

        expect(orchestrator.summary().clearedAll).toBe(6);
        expect(orchestrator.summary().totals.computed).toBe(4);
    });

    it('should continue past item failures and report them', async () => {
        const chain = createChain(new Set(['c']));
        const orchestrator = createOrchestrator();

        expect(await chain.run(orchestrator, 'a b c d e')).toBe('A-B-D-E');

        const stage3 = orchestrator.getState('stage3');
        expect(stage3.status).toBe('computed');
        expect(stage3.itemErrors).toEqual([
            { stageId: 'stage3', identity: 'c', message: 'stage3 item c failed: bad word c' },
        ]);
        expect(orchestrator.summary().totals.itemErrors).toBe(1);
        expect(store.get(itemKey('stage3', 'c'))).toBeNull();
    });

    it('should fail the pipeline on a whole-stage compute failure', async () => {
        const chain = createChain();
        const orchestrator = createOrchestrator();
        const failing = { ...chain.stage1, compute: () => { throw new Error('disk gone'); } };

        const error = await orchestrator.runWholeStage(failing, 'x').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StageFailedError);
        expect(error).toMatchObject({ stageId: 'stage1', message: 'Stage stage1 failed: disk gone' });
        expect(orchestrator.getState('stage1').status).toBe('failed');
    });

    it('should keep a cache write failure as the cause', async () => {
        fs.writeFileSync(path.join(tmpDir, 'cache'), 'not a directory');
        const chain = createChain();

        const error = await createOrchestrator().runWholeStage(chain.stage1, 'x').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StageFailedError);
        expect(error instanceof StageFailedError && error.cause).toBeInstanceOf(CacheWriteError);
    });

    it('should pass cancellation through unwrapped', async () => {
        const chain = createChain();
        const orchestrator = createOrchestrator({
            runner: new StageRunner({ store, logger: nullLogger, isCancelled: () => true }),
        });

        await expect(chain.run(orchestrator, 'x')).rejects.toBeInstanceOf(CancellationError);
        expect(orchestrator.getState('stage1').status).toBe('failed');
    });

    it('should notify stage start and completion', async () => {
        const onStageStart = vi.fn();
        const onStageComplete = vi.fn();
        const chain = createChain();

        await chain.run(createOrchestrator({ onStageStart, onStageComplete }), 'a');

        expect(onStageStart).toHaveBeenCalledTimes(4);
        expect(onStageComplete.mock.calls.map(([state]) => state.status)).toEqual([
            'computed', 'computed', 'computed', 'computed',
        ]);
    });

    it('should reject unknown clear and stop targets', () => {
        expect(() => createOrchestrator({ clearTarget: 'stage9' })).toThrow(ConfigError);
        expect(() => createOrchestrator({ clearTarget: 'stage9' })).toThrow(
            'Unknown cache clear target "stage9" (expected stage1, stage2, stage3, stage4, all)'
        );
        expect(() => createOrchestrator({ stopAfter: 'stage9' })).toThrow(ConfigError);
    });

    it('should refuse to run a disabled stage', async () => {
        const chain = createChain();
        const orchestrator = createOrchestrator({ stopAfter: 'stage1' });
        await expect(orchestrator.runWholeStage({ ...chain.stage1, id: 'stage2' }, 'x')).rejects.toThrow(
            'Stage stage2 is disabled for this run'
        );
    });
});
