/**
 * StageRunner
 *
 * Cache-aware execution wrapper. Stage implementations are plain
 * `input → result` functions; only the runner talks to the CacheStore.
 *
 * Whole-stage mode: fingerprint the stage's subject, return the decoded
 * entry when it is present and valid, otherwise compute and store.
 *
 * Per-item mode: one entry per item, each stored as soon as it is computed,
 * so an interrupted run resumes where it stopped. When every item succeeds a
 * whole-stage entry is also written; it is only consulted when all item
 * entries are valid, and only trusted when its fingerprint equals the
 * aggregate of the live item fingerprints.
 */

import {
    ComputeError,
    OrganizerError,
    getErrorMessage,
    isOrganizerError,
} from '../errors';
import { getLogger, LogCategory, Logger } from '../logger';
import { IsCancelledFn, isCancellationError, throwIfCancelled } from '../runtime/cancellation';
import { CacheStore } from '../cache/cache-store';
import { globalKey, itemKey } from '../cache/cache-key';
import { fingerprintAggregate } from '../cache/fingerprint';
import { fingerprintPolicy, InvalidationPolicy } from '../cache/invalidation';
import type { CacheEntry, Fingerprint } from '../cache/types';
import { check, Codec, createJsonCodec } from './codec';

// ============================================================================
// Types
// ============================================================================

export interface StageRunnerOptions {
    store: CacheStore;
    /** Consult existing entries (false under --no-cache). Default: true */
    readCache?: boolean;
    /** Store fresh results (false under --no-cache-write). Default: true */
    writeCache?: boolean;
    /** Default: fingerprintPolicy */
    policy?: InvalidationPolicy;
    logger?: Logger;
    /** Polled between items */
    isCancelled?: IsCancelledFn;
}

export interface WholeStageDefinition<TInput, TResult> {
    /** Stage id, also the cache key prefix */
    id: string;
    codec: Codec<TResult>;
    /**
     * Live fingerprint of the stage's subject. Returning null, or throwing,
     * forces a recompute.
     */
    fingerprint(input: TInput): Fingerprint | null;
    compute(input: TInput): Promise<TResult> | TResult;
    /**
     * False keeps a computed result out of the cache so the next run computes
     * it again (a result that records a transient failure). Default: store.
     */
    shouldStore?(result: TResult): boolean;
}

export interface StageRunResult<TResult> {
    result: TResult;
    cacheHit: boolean;
    elapsedMs: number;
}

export interface ItemStageDefinition<TItem, TItemResult> {
    id: string;
    itemCodec: Codec<TItemResult>;
    /** Stable identity, also the sort key (usually the item's path) */
    identity(item: TItem): string;
    /** Live fingerprint of one item; null or throwing forces a recompute */
    fingerprint(item: TItem): Fingerprint | null;
    computeItem(item: TItem): Promise<TItemResult> | TItemResult;
}

export interface ItemOutcome<TItem, TItemResult> {
    item: TItem;
    identity: string;
    result: TItemResult;
    cached: boolean;
}

export interface ItemFailure<TItem> {
    item: TItem;
    identity: string;
    error: OrganizerError;
}

export interface ItemProgress {
    stageId: string;
    identity: string;
    /** 1-based position in sorted order */
    index: number;
    total: number;
    cached: boolean;
    error?: OrganizerError;
}

export interface ItemStageHooks {
    onItemComplete?(progress: ItemProgress): void;
}

export interface ItemStageRunResult<TItem, TItemResult> {
    /** Successful items in sorted identity order */
    results: Array<ItemOutcome<TItem, TItemResult>>;
    /** Failed items in sorted identity order */
    errors: Array<ItemFailure<TItem>>;
    itemHits: number;
    itemMisses: number;
    /** True when the whole-stage fast path served every item */
    wholeStageHit: boolean;
    elapsedMs: number;
}

/**
 * Body of the whole-stage entry written after a fully successful granular run.
 */
interface AggregatePayload {
    identities: string[];
    payloads: string[];
}

const aggregateCodec: Codec<AggregatePayload> = createJsonCodec(1, data => {
    const obj = check.object(data, 'aggregate');
    const identities = check.stringArray(obj.identities, 'identities');
    const payloads = check.stringArray(obj.payloads, 'payloads');
    if (identities.length !== payloads.length) {
        throw new Error('"identities" and "payloads" differ in length');
    }
    return { identities, payloads };
});

interface ItemSlot<TItem> {
    item: TItem;
    identity: string;
    fingerprint: Fingerprint | null;
    entry: CacheEntry | null;
}

// ============================================================================
// Runner
// ============================================================================

export class StageRunner {
    private readonly store: CacheStore;
    private readonly readCache: boolean;
    private readonly writeCache: boolean;
    private readonly policy: InvalidationPolicy;
    private readonly logger: Logger;
    private readonly isCancelled?: IsCancelledFn;

    constructor(options: StageRunnerOptions) {
        this.store = options.store;
        this.readCache = options.readCache ?? true;
        this.writeCache = options.writeCache ?? true;
        this.policy = options.policy ?? fingerprintPolicy;
        this.logger = options.logger ?? getLogger();
        this.isCancelled = options.isCancelled;
    }

    /**
     * Run a stage as one cached unit.
     *
     * @throws ComputeError when compute fails (nothing is written)
     * @throws CacheWriteError when the result cannot be stored
     * @throws CancellationError when cancelled before the result is stored
     */
    async runWholeStage<TInput, TResult>(
        def: WholeStageDefinition<TInput, TResult>,
        input: TInput
    ): Promise<StageRunResult<TResult>> {
        const startTime = Date.now();
        const key = globalKey(def.id);
        let fingerprint = this.liveFingerprint(def.id, () => def.fingerprint(input));

        if (this.readCache) {
            const entry = this.store.get(key);
            if (entry && this.policy.isValid(entry, fingerprint)) {
                const decoded = this.tryDecode(def.id, def.codec, entry);
                if (decoded.ok) {
                    this.logger.debug(LogCategory.STAGE, `${def.id}: cache hit`);
                    return { result: decoded.value, cacheHit: true, elapsedMs: Date.now() - startTime };
                }
            } else if (entry) {
                this.logger.debug(LogCategory.STAGE, `${def.id}: cached entry is stale`);
            }
        }

        throwIfCancelled(this.isCancelled, { stageId: def.id });
        this.logger.debug(LogCategory.STAGE, `${def.id}: computing`);

        let result: TResult;
        try {
            result = await def.compute(input);
        } catch (error) {
            throw toComputeError(def.id, error);
        }

        throwIfCancelled(this.isCancelled, { stageId: def.id });

        if (this.writeCache) {
            if (fingerprint === null) {
                fingerprint = this.liveFingerprint(def.id, () => def.fingerprint(input));
            }
            if (fingerprint === null) {
                this.logger.warn(LogCategory.STAGE, `${def.id}: subject cannot be fingerprinted; result not cached`);
            } else if (def.shouldStore && !def.shouldStore(result)) {
                this.logger.debug(LogCategory.STAGE, `${def.id}: result not cached; it will be recomputed next run`);
            } else {
                this.store.put(key, def.codec.encode(result), fingerprint);
            }
        }

        return { result, cacheHit: false, elapsedMs: Date.now() - startTime };
    }

    /**
     * Run a stage item by item.
     *
     * Item compute failures are recorded and processing continues; cache write
     * failures and cancellation abort the stage (items already stored stay).
     */
    async runItemStage<TItem, TItemResult>(
        def: ItemStageDefinition<TItem, TItemResult>,
        items: readonly TItem[],
        hooks: ItemStageHooks = {}
    ): Promise<ItemStageRunResult<TItem, TItemResult>> {
        const startTime = Date.now();

        const slots: Array<ItemSlot<TItem>> = items
            .map(item => ({
                item,
                identity: def.identity(item),
                fingerprint: null,
                entry: null,
            }))
            .sort((a, b) => compareIdentity(a.identity, b.identity));

        for (const slot of slots) {
            slot.fingerprint = this.liveFingerprint(def.id, () => def.fingerprint(slot.item), slot.identity);
            if (this.readCache) {
                const entry = this.store.get(itemKey(def.id, slot.identity));
                slot.entry = entry && this.policy.isValid(entry, slot.fingerprint) ? entry : null;
            }
        }

        const fastPath = this.readCache ? this.tryAggregate(def, slots) : null;
        if (fastPath) {
            this.logger.debug(LogCategory.STAGE, `${def.id}: whole-stage hit (${slots.length} items)`);
            fastPath.forEach((outcome, i) => {
                hooks.onItemComplete?.({
                    stageId: def.id,
                    identity: outcome.identity,
                    index: i + 1,
                    total: slots.length,
                    cached: true,
                });
            });
            return {
                results: fastPath,
                errors: [],
                itemHits: slots.length,
                itemMisses: 0,
                wholeStageHit: true,
                elapsedMs: Date.now() - startTime,
            };
        }

        const results: Array<ItemOutcome<TItem, TItemResult>> = [];
        const errors: Array<ItemFailure<TItem>> = [];
        const payloads: string[] = [];
        let itemHits = 0;
        let itemMisses = 0;
        let allFingerprinted = true;

        for (let i = 0; i < slots.length; i++) {
            const slot = slots[i];
            const progress = { stageId: def.id, identity: slot.identity, index: i + 1, total: slots.length };

            if (slot.entry) {
                const decoded = this.tryDecode(def.id, def.itemCodec, slot.entry, slot.identity);
                if (decoded.ok) {
                    itemHits++;
                    results.push({ item: slot.item, identity: slot.identity, result: decoded.value, cached: true });
                    payloads.push(slot.entry.payload);
                    hooks.onItemComplete?.({ ...progress, cached: true });
                    continue;
                }
            }

            throwIfCancelled(this.isCancelled, { stageId: def.id, itemId: slot.identity });
            itemMisses++;

            let result: TItemResult;
            try {
                result = await def.computeItem(slot.item);
            } catch (error) {
                if (isCancellationError(error)) {
                    throw error;
                }
                const failure = toComputeError(def.id, error, slot.identity);
                this.logger.warn(LogCategory.STAGE, failure.message);
                errors.push({ item: slot.item, identity: slot.identity, error: failure });
                hooks.onItemComplete?.({ ...progress, cached: false, error: failure });
                continue;
            }

            const payload = def.itemCodec.encode(result);
            if (this.writeCache) {
                const fingerprint = slot.fingerprint
                    ?? this.liveFingerprint(def.id, () => def.fingerprint(slot.item), slot.identity);
                slot.fingerprint = fingerprint;
                if (fingerprint === null) {
                    allFingerprinted = false;
                    this.logger.warn(
                        LogCategory.STAGE,
                        `${def.id}: ${slot.identity} cannot be fingerprinted; result not cached`
                    );
                } else {
                    this.store.put(itemKey(def.id, slot.identity), payload, fingerprint);
                }
            }

            results.push({ item: slot.item, identity: slot.identity, result, cached: false });
            payloads.push(payload);
            hooks.onItemComplete?.({ ...progress, cached: false });
        }

        if (this.writeCache && errors.length === 0 && allFingerprinted) {
            const fingerprints = slots
                .map(slot => slot.fingerprint)
                .filter((fp): fp is Fingerprint => fp !== null);
            if (fingerprints.length === slots.length) {
                const aggregate: AggregatePayload = {
                    identities: slots.map(slot => slot.identity),
                    payloads,
                };
                this.store.put(globalKey(def.id), aggregateCodec.encode(aggregate), fingerprintAggregate(fingerprints));
            }
        }

        this.logger.debug(
            LogCategory.STAGE,
            `${def.id}: ${itemHits} cached, ${itemMisses} computed, ${errors.length} failed`
        );

        return {
            results,
            errors,
            itemHits,
            itemMisses,
            wholeStageHit: false,
            elapsedMs: Date.now() - startTime,
        };
    }

    // ========================================================================
    // Internals
    // ========================================================================

    /**
     * The whole-stage fast path: every item entry valid, and the aggregate's
     * fingerprint derived from those same live fingerprints.
     */
    private tryAggregate<TItem, TItemResult>(
        def: ItemStageDefinition<TItem, TItemResult>,
        slots: Array<ItemSlot<TItem>>
    ): Array<ItemOutcome<TItem, TItemResult>> | null {
        const fingerprints: Fingerprint[] = [];
        for (const slot of slots) {
            if (!slot.entry || slot.fingerprint === null) {
                return null;
            }
            fingerprints.push(slot.fingerprint);
        }

        const entry = this.store.get(globalKey(def.id));
        if (!entry || !this.policy.isValid(entry, fingerprintAggregate(fingerprints))) {
            return null;
        }

        const aggregate = this.tryDecode(def.id, aggregateCodec, entry);
        if (!aggregate.ok) {
            return null;
        }

        const { identities, payloads } = aggregate.value;
        if (identities.length !== slots.length || identities.some((id, i) => id !== slots[i].identity)) {
            return null;
        }

        const outcomes: Array<ItemOutcome<TItem, TItemResult>> = [];
        for (let i = 0; i < slots.length; i++) {
            const decoded = this.tryDecode(def.id, def.itemCodec, { ...entry, payload: payloads[i] }, identities[i]);
            if (!decoded.ok) {
                return null;
            }
            outcomes.push({ item: slots[i].item, identity: identities[i], result: decoded.value, cached: true });
        }
        return outcomes;
    }

    private liveFingerprint(stageId: string, compute: () => Fingerprint | null, identity?: string): Fingerprint | null {
        try {
            return compute();
        } catch (error) {
            const subject = identity ? `${stageId}[${identity}]` : stageId;
            this.logger.debug(LogCategory.STAGE, `${subject}: cannot fingerprint subject: ${getErrorMessage(error)}`);
            return null;
        }
    }

    private tryDecode<T>(
        stageId: string,
        codec: Codec<T>,
        entry: CacheEntry,
        identity?: string
    ): { ok: true; value: T } | { ok: false } {
        try {
            return { ok: true, value: codec.decode(entry.payload) };
        } catch (error) {
            const subject = identity ? `${stageId}[${identity}]` : stageId;
            this.logger.warn(
                LogCategory.STAGE,
                `${subject}: cached payload unusable (${getErrorMessage(error)}); recomputing`
            );
            return { ok: false };
        }
    }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Code-unit ordering, independent of locale.
 */
export function compareIdentity(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function toComputeError(stageId: string, error: unknown, itemId?: string): OrganizerError {
    if (isCancellationError(error)) {
        return error;
    }
    if (error instanceof ComputeError) {
        return error;
    }
    const subject = itemId ? `${stageId} item ${itemId}` : `Stage ${stageId}`;
    return new ComputeError(`${subject} failed: ${getErrorMessage(error)}`, {
        cause: error,
        meta: {
            ...(isOrganizerError(error) ? error.meta : undefined),
            stageId,
            ...(itemId !== undefined ? { itemId } : {}),
        },
    });
}
