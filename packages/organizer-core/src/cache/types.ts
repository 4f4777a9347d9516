/**
 * Cache Types
 *
 * Shapes of the cache engine: keys, fingerprints, entries and the on-disk
 * record. Everything here is plain JSON so records can be written with
 * JSON.stringify and validated on read.
 */

// ============================================================================
// Keys
// ============================================================================

/**
 * `global` keys hold a whole-stage result; `item` keys hold one item of a
 * granular stage.
 */
export type CacheScope = 'global' | 'item';

export interface CacheKey {
    /** Stage id, `[A-Za-z0-9-]+` */
    stageId: string;
    scope: CacheScope;
    /** Subject identity within the stage, e.g. an item's path */
    identity: string;
}

// ============================================================================
// Fingerprints
// ============================================================================

export interface FileFingerprint {
    kind: 'file';
    path: string;
    size: number;
    mtimeMs: number;
}

export interface DirectoryFingerprint {
    kind: 'directory';
    path: string;
    fileCount: number;
    /** sha256 over sorted (relativePath, size, mtimeMs) triples */
    digest: string;
}

export interface BytesFingerprint {
    kind: 'bytes';
    size: number;
    /** sha256 of the content */
    digest: string;
}

export interface AggregateFingerprint {
    kind: 'aggregate';
    count: number;
    /** sha256 over the canonical forms of the member fingerprints, in order */
    digest: string;
}

/**
 * A compact, comparable summary of a subject's state.
 * Two fingerprints are equal iff they have the same kind and equal fields.
 */
export type Fingerprint =
    | FileFingerprint
    | DirectoryFingerprint
    | BytesFingerprint
    | AggregateFingerprint;

// ============================================================================
// Entries
// ============================================================================

/**
 * A stored result: encoded payload text plus the fingerprint of the subject
 * it was computed from.
 */
export interface CacheEntry {
    key: CacheKey;
    payload: string;
    fingerprint: Fingerprint;
    /** ISO-8601 write time (informational only, never used for expiry) */
    writtenAt: string;
}

/**
 * On-disk record format. One JSON file per key.
 */
export interface CacheRecord {
    formatVersion: number;
    key: CacheKey;
    fingerprint: Fingerprint;
    writtenAt: string;
    /** sha256 of `payload`, checked on read */
    payloadDigest: string;
    payload: string;
}

/** Current on-disk record format */
export const CACHE_FORMAT_VERSION = 1;

// ============================================================================
// Stats
// ============================================================================

export interface StageCacheStats {
    /** Whole-stage entries */
    entries: number;
    /** Per-item entries */
    itemEntries: number;
    /** Total size on disk */
    bytes: number;
}

export interface CacheStats {
    rootDir: string;
    /** False when the cache directory has not been created yet */
    exists: boolean;
    stages: Record<string, StageCacheStats>;
    totalEntries: number;
    totalBytes: number;
}
