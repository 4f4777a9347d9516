/**
 * Cache Module
 */

export {
    fingerprintFile,
    fingerprintDirectory,
    fingerprintBytes,
    fingerprintAggregate,
    fingerprintsEqual,
    canonicalFingerprint,
    isFingerprint,
} from './fingerprint';
export {
    globalKey,
    itemKey,
    keyToFileName,
    parseKeyFileName,
    keysEqual,
    describeKey,
    isValidStageId,
    assertValidStageId,
} from './cache-key';
export { CacheStore } from './cache-store';
export type { CacheStoreOptions } from './cache-store';
export { fingerprintPolicy } from './invalidation';
export type { InvalidationPolicy } from './invalidation';
export { CACHE_FORMAT_VERSION } from './types';
export type {
    CacheScope,
    CacheKey,
    FileFingerprint,
    DirectoryFingerprint,
    BytesFingerprint,
    AggregateFingerprint,
    Fingerprint,
    CacheEntry,
    CacheRecord,
    StageCacheStats,
    CacheStats,
} from './types';
