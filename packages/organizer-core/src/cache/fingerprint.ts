/**
 * Fingerprint computation
 *
 * Files are fingerprinted by metadata only (size + mtime); content hashing is
 * reserved for in-memory subjects such as serialized upstream results.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { IOUnavailableError, getErrorMessage } from '../errors';
import type {
    AggregateFingerprint,
    BytesFingerprint,
    DirectoryFingerprint,
    FileFingerprint,
    Fingerprint,
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sha256(data: string | Uint8Array): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

function statFile(filePath: string): fs.Stats {
    try {
        return fs.statSync(filePath);
    } catch (error) {
        throw new IOUnavailableError(`Cannot stat ${filePath}: ${getErrorMessage(error)}`, {
            cause: error,
            meta: { filePath },
        });
    }
}

/**
 * Fingerprint a single file from its size and modification time.
 * @throws IOUnavailableError when the path cannot be stat'd
 */
export function fingerprintFile(filePath: string): FileFingerprint {
    const stat = statFile(filePath);
    return {
        kind: 'file',
        path: filePath,
        size: stat.size,
        mtimeMs: Math.trunc(stat.mtimeMs),
    };
}

/**
 * Fingerprint a directory snapshot from an enumerated file list.
 *
 * `files` may be absolute or relative to `dirPath`; the result does not
 * depend on their order.
 * @throws IOUnavailableError if a listed file cannot be stat'd
 */
export function fingerprintDirectory(dirPath: string, files: readonly string[]): DirectoryFingerprint {
    const root = path.resolve(dirPath);
    const triples = files.map(file => {
        const absolute = path.resolve(root, file);
        const stat = statFile(absolute);
        const relative = path.relative(root, absolute).split(path.sep).join('/');
        return { relative, line: `${relative}\t${stat.size}\t${Math.trunc(stat.mtimeMs)}` };
    });

    triples.sort((a, b) => (a.relative < b.relative ? -1 : a.relative > b.relative ? 1 : 0));

    return {
        kind: 'directory',
        path: root,
        fileCount: triples.length,
        digest: sha256(triples.map(t => t.line).join('\n')),
    };
}

/**
 * Fingerprint an in-memory blob by content.
 */
export function fingerprintBytes(blob: string | Uint8Array): BytesFingerprint {
    const size = typeof blob === 'string' ? Buffer.byteLength(blob, 'utf-8') : blob.byteLength;
    return {
        kind: 'bytes',
        size,
        digest: sha256(blob),
    };
}

/**
 * Fingerprint an ordered list of fingerprints. Callers pass members in a
 * deterministic order (sorted item identity).
 */
export function fingerprintAggregate(fingerprints: readonly Fingerprint[]): AggregateFingerprint {
    return {
        kind: 'aggregate',
        count: fingerprints.length,
        digest: sha256(fingerprints.map(canonicalFingerprint).join('\n')),
    };
}

/**
 * Stable string form of a fingerprint, with fields in a fixed order.
 */
export function canonicalFingerprint(fp: Fingerprint): string {
    switch (fp.kind) {
        case 'file':
            return `file:${JSON.stringify([fp.path, fp.size, fp.mtimeMs])}`;
        case 'directory':
            return `directory:${JSON.stringify([fp.path, fp.fileCount, fp.digest])}`;
        case 'bytes':
            return `bytes:${JSON.stringify([fp.size, fp.digest])}`;
        case 'aggregate':
            return `aggregate:${JSON.stringify([fp.count, fp.digest])}`;
    }
}

export function fingerprintsEqual(a: Fingerprint, b: Fingerprint): boolean {
    return canonicalFingerprint(a) === canonicalFingerprint(b);
}

/**
 * Runtime check used when reading fingerprints back from disk.
 */
export function isFingerprint(v: unknown): v is Fingerprint {
    if (!isRecord(v)) {
        return false;
    }
    const isNum = (x: unknown) => typeof x === 'number' && Number.isFinite(x);
    const isStr = (x: unknown) => typeof x === 'string';
    switch (v.kind) {
        case 'file':
            return isStr(v.path) && isNum(v.size) && isNum(v.mtimeMs);
        case 'directory':
            return isStr(v.path) && isNum(v.fileCount) && isStr(v.digest);
        case 'bytes':
            return isNum(v.size) && isStr(v.digest);
        case 'aggregate':
            return isNum(v.count) && isStr(v.digest);
        default:
            return false;
    }
}
