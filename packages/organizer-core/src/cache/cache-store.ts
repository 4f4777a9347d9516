/**
 * CacheStore
 *
 * Persistent key → entry store backed by one JSON file per key in a single
 * directory.
 *
 * - Writes are atomic (temp file in the same directory, then rename), so a
 *   crash leaves either the old record or the new one.
 * - Reads never throw: a missing record is a miss, an unreadable or
 *   malformed one is a miss plus a warning.
 * - Deletes are scoped by key or by stage id and work from file names alone.
 * - Stats come from directory metadata; no payload is decoded.
 *
 * One instance is constructed per run and injected; no module-level state.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import {
    CacheCorruptionError,
    CacheUnavailableError,
    CacheWriteError,
    getErrorMessage,
    isErrnoException,
} from '../errors';
import { getLogger, LogCategory, Logger } from '../logger';
import { describeKey, keysEqual, keyToFileName, parseKeyFileName, assertValidStageId } from './cache-key';
import { isFingerprint } from './fingerprint';
import {
    CACHE_FORMAT_VERSION,
    CacheEntry,
    CacheKey,
    CacheRecord,
    CacheStats,
    Fingerprint,
    StageCacheStats,
} from './types';

const TEMP_SUFFIX = '.tmp';

export interface CacheStoreOptions {
    /** Defaults to the process-wide logger */
    logger?: Logger;
}

export class CacheStore {
    readonly rootDir: string;
    private readonly logger: Logger;

    constructor(rootDir: string, options: CacheStoreOptions = {}) {
        this.rootDir = path.resolve(rootDir);
        this.logger = options.logger ?? getLogger();
    }

    /**
     * Absolute path of the record file for a key.
     */
    pathFor(key: CacheKey): string {
        return path.join(this.rootDir, keyToFileName(key));
    }

    // ========================================================================
    // Read
    // ========================================================================

    /**
     * Fetch an entry. Returns null when absent or corrupt.
     */
    get(key: CacheKey): CacheEntry | null {
        const recordPath = this.pathFor(key);

        let content: string;
        try {
            content = fs.readFileSync(recordPath, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            this.logger.warn(
                LogCategory.CACHE,
                `Cannot read cache entry ${describeKey(key)} (${recordPath}): ${getErrorMessage(error)}; treating as miss`
            );
            return null;
        }

        try {
            return this.decodeRecord(key, recordPath, content);
        } catch (error) {
            if (error instanceof CacheCorruptionError) {
                this.logger.warn(LogCategory.CACHE, `${error.message}; treating as miss`);
                return null;
            }
            throw error;
        }
    }

    private decodeRecord(key: CacheKey, recordPath: string, content: string): CacheEntry {
        const corrupt = (reason: string, cause?: unknown) =>
            new CacheCorruptionError(`Corrupt cache entry ${describeKey(key)} (${recordPath}): ${reason}`, {
                cause,
                meta: { stageId: key.stageId, cachePath: recordPath },
            });

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw corrupt('malformed JSON', error);
        }

        if (!isCacheRecord(parsed)) {
            throw corrupt('unexpected record shape');
        }
        if (parsed.formatVersion !== CACHE_FORMAT_VERSION) {
            throw corrupt(`format version ${parsed.formatVersion} (expected ${CACHE_FORMAT_VERSION})`);
        }
        if (!keysEqual(parsed.key, key)) {
            throw corrupt('record belongs to a different key');
        }
        if (digestOf(parsed.payload) !== parsed.payloadDigest) {
            throw corrupt('payload digest mismatch');
        }

        return {
            key: parsed.key,
            payload: parsed.payload,
            fingerprint: parsed.fingerprint,
            writtenAt: parsed.writtenAt,
        };
    }

    // ========================================================================
    // Write
    // ========================================================================

    /**
     * Store an entry, replacing any existing one for the key.
     * @throws CacheWriteError on any I/O failure
     */
    put(key: CacheKey, payload: string, fingerprint: Fingerprint): CacheEntry {
        const recordPath = this.pathFor(key);
        const tempPath = `${recordPath}.${process.pid}${TEMP_SUFFIX}`;
        const writtenAt = new Date().toISOString();

        const record: CacheRecord = {
            formatVersion: CACHE_FORMAT_VERSION,
            key,
            fingerprint,
            writtenAt,
            payloadDigest: digestOf(payload),
            payload,
        };

        try {
            fs.mkdirSync(this.rootDir, { recursive: true });
            fs.writeFileSync(tempPath, JSON.stringify(record, null, 2), 'utf-8');
            fs.renameSync(tempPath, recordPath);
        } catch (error) {
            this.removeTempFile(tempPath);
            throw new CacheWriteError(
                `Failed to write cache entry ${describeKey(key)} to ${recordPath}: ${getErrorMessage(error)}`,
                { cause: error, meta: { stageId: key.stageId, cachePath: recordPath } }
            );
        }

        this.logger.debug(LogCategory.CACHE, `Stored ${describeKey(key)}`);
        return { key, payload, fingerprint, writtenAt };
    }

    private removeTempFile(tempPath: string): void {
        try {
            fs.rmSync(tempPath, { force: true });
        } catch (error) {
            this.logger.debug(LogCategory.CACHE, `Could not remove temp file ${tempPath}: ${getErrorMessage(error)}`);
        }
    }

    // ========================================================================
    // Delete
    // ========================================================================

    /**
     * Delete one entry (by key) or every entry of a stage (by stage id),
     * both whole-stage and per-item.
     *
     * @returns Number of entries removed; 0 when the directory does not exist
     * @throws CacheUnavailableError when the directory cannot be listed or modified
     */
    delete(target: CacheKey | string): number {
        if (typeof target !== 'string') {
            const recordPath = this.pathFor(target);
            const removed = this.unlink(recordPath) ? 1 : 0;
            if (removed) {
                this.logger.debug(LogCategory.CACHE, `Deleted ${describeKey(target)}`);
            }
            return removed;
        }

        assertValidStageId(target);
        let removed = 0;
        for (const fileName of this.listFiles()) {
            const parsed = parseKeyFileName(fileName);
            if (parsed?.stageId === target && this.unlink(path.join(this.rootDir, fileName))) {
                removed++;
            }
        }
        this.logger.debug(LogCategory.CACHE, `Deleted ${removed} entries of ${target}`);
        return removed;
    }

    /**
     * Remove every entry (and leftover temp files) from the cache directory.
     * @returns Number of entries removed
     */
    clear(): number {
        let removed = 0;
        for (const fileName of this.listFiles()) {
            const filePath = path.join(this.rootDir, fileName);
            if (parseKeyFileName(fileName)) {
                if (this.unlink(filePath)) {
                    removed++;
                }
            } else if (fileName.endsWith(TEMP_SUFFIX)) {
                this.unlink(filePath);
            }
        }
        this.logger.debug(LogCategory.CACHE, `Cleared ${removed} entries`);
        return removed;
    }

    private unlink(filePath: string): boolean {
        try {
            fs.unlinkSync(filePath);
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return false;
            }
            throw new CacheUnavailableError(`Cannot delete ${filePath}: ${getErrorMessage(error)}`, {
                cause: error,
                meta: { cachePath: filePath },
            });
        }
    }

    /**
     * File names in the cache directory; empty when it does not exist.
     */
    private listFiles(): string[] {
        try {
            return fs.readdirSync(this.rootDir);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return [];
            }
            throw new CacheUnavailableError(
                `Cache directory ${this.rootDir} is not accessible: ${getErrorMessage(error)}`,
                { cause: error, meta: { cachePath: this.rootDir } }
            );
        }
    }

    // ========================================================================
    // Stats
    // ========================================================================

    /**
     * Per-stage entry counts and sizes, from file names and sizes only.
     * @throws CacheUnavailableError when the directory cannot be listed
     */
    stats(): CacheStats {
        const exists = fs.existsSync(this.rootDir);
        const stats: CacheStats = {
            rootDir: this.rootDir,
            exists,
            stages: {},
            totalEntries: 0,
            totalBytes: 0,
        };

        for (const fileName of this.listFiles()) {
            const parsed = parseKeyFileName(fileName);
            if (!parsed) {
                continue;
            }

            let size: number;
            try {
                size = fs.statSync(path.join(this.rootDir, fileName)).size;
            } catch (error) {
                if (isErrnoException(error) && error.code === 'ENOENT') {
                    continue;
                }
                throw new CacheUnavailableError(`Cannot stat cache entry ${fileName}: ${getErrorMessage(error)}`, {
                    cause: error,
                });
            }

            const stage: StageCacheStats = stats.stages[parsed.stageId] ?? { entries: 0, itemEntries: 0, bytes: 0 };
            if (parsed.scope === 'global') {
                stage.entries++;
            } else {
                stage.itemEntries++;
            }
            stage.bytes += size;
            stats.stages[parsed.stageId] = stage;

            stats.totalEntries++;
            stats.totalBytes += size;
        }

        return stats;
    }
}

// ============================================================================
// Helpers
// ============================================================================

function digestOf(payload: string): string {
    return crypto.createHash('sha256').update(payload, 'utf-8').digest('hex');
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCacheKey(value: unknown): value is CacheKey {
    return isRecordObject(value)
        && typeof value.stageId === 'string'
        && (value.scope === 'global' || value.scope === 'item')
        && typeof value.identity === 'string';
}

function isCacheRecord(value: unknown): value is CacheRecord {
    return isRecordObject(value)
        && typeof value.formatVersion === 'number'
        && isCacheKey(value.key)
        && isFingerprint(value.fingerprint)
        && typeof value.writtenAt === 'string'
        && typeof value.payloadDigest === 'string'
        && typeof value.payload === 'string';
}
