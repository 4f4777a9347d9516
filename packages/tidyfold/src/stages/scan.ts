/**
 * Stage 1: Scan
 *
 * Walks the source directory and records every file the pipeline should
 * organize, with its size, mtime and MIME type.
 *
 * The cached result is keyed on a snapshot of the listing (each file's
 * relative path, size and mtime) combined with the scan options, so adding,
 * removing or touching any file, or changing a pattern, forces a rescan.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    fingerprintAggregate,
    fingerprintBytes,
    fingerprintDirectory,
    getErrorMessage,
} from '@tidyfold/organizer-core';
import type { Fingerprint, WholeStageDefinition } from '@tidyfold/organizer-core';
import mimeTable from '../data/mime-types.json';
import { matchesAnyGlob } from '../utils/glob-utils';
import { scanResultCodec } from './codecs';
import type { ExcludedFile, FileRecord, ScanError, ScanResult } from '../types';

export const SCAN_STAGE_ID = 'stage1';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const MIME_CATEGORIES = new Set(['text', 'image', 'audio', 'video', 'application']);

const MIME_BY_EXTENSION = new Map<string, string>(Object.entries(mimeTable));

export interface ScanOptions {
    /** When non-empty, only files matching one of these are kept */
    include: string[];
    /** Matching files are skipped; matching directories are not entered */
    exclude: string[];
    includeHidden: boolean;
    /** Bytes; larger files are recorded as excluded */
    maxFileSize?: number;
    /** Directories (relative, `/`-separated) never entered, e.g. the cache directory */
    skipPaths?: string[];
}

export interface SourceListing {
    /** `/`-separated paths relative to the source directory, sorted */
    files: string[];
    errors: ScanError[];
}

// ============================================================================
// MIME Types
// ============================================================================

/**
 * MIME type for a file name, by extension.
 */
export function lookupMimeType(fileName: string): string {
    return MIME_BY_EXTENSION.get(path.extname(fileName).toLowerCase()) ?? DEFAULT_MIME_TYPE;
}

/**
 * Top-level MIME type, folded to `application` when unrecognised.
 */
export function mimeCategory(mimeType: string): string {
    const top = mimeType.split('/')[0].toLowerCase();
    return MIME_CATEGORIES.has(top) ? top : 'application';
}

// ============================================================================
// Listing
// ============================================================================

/**
 * Enumerate the files under a source directory that pass the include,
 * exclude and hidden-file rules. Symbolic links are not followed.
 *
 * @throws Error when the source directory itself cannot be read
 */
export function listSourceFiles(sourceDir: string, options: ScanOptions): SourceListing {
    const root = path.resolve(sourceDir);
    const files: string[] = [];
    const errors: ScanError[] = [];

    // Iterative walk; relative paths use `/` on every platform
    const stack: string[] = [''];
    while (stack.length > 0) {
        const relativeDir = stack.pop() ?? '';
        const absoluteDir = relativeDir ? path.join(root, ...relativeDir.split('/')) : root;

        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(absoluteDir, { withFileTypes: true });
        } catch (error) {
            if (relativeDir === '') {
                throw new Error(`Cannot read source directory ${root}: ${getErrorMessage(error)}`);
            }
            errors.push({ path: absoluteDir, message: getErrorMessage(error) });
            continue;
        }

        for (const entry of entries) {
            if (!options.includeHidden && entry.name.startsWith('.')) {
                continue;
            }
            const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
            if (matchesAnyGlob(relativePath, options.exclude)) {
                continue;
            }

            if (entry.isDirectory()) {
                if (options.skipPaths?.includes(relativePath)) {
                    continue;
                }
                stack.push(relativePath);
            } else if (entry.isFile()) {
                if (options.include.length > 0 && !matchesAnyGlob(relativePath, options.include)) {
                    continue;
                }
                files.push(relativePath);
            }
        }
    }

    files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    return { files, errors };
}

// ============================================================================
// Scan
// ============================================================================

/**
 * Build the stage-1 result for a source directory.
 *
 * @throws Error when the source is missing or not a directory
 */
export function scanSource(sourceDir: string, options: ScanOptions): ScanResult {
    const root = path.resolve(sourceDir);
    assertDirectory(root);

    const listing = listSourceFiles(root, options);
    const files: FileRecord[] = [];
    const excluded: ExcludedFile[] = [];
    const errors: ScanError[] = [...listing.errors];

    for (const relativePath of listing.files) {
        const absolutePath = path.join(root, ...relativePath.split('/'));

        let stat: fs.Stats;
        try {
            stat = fs.statSync(absolutePath);
        } catch (error) {
            errors.push({ path: absolutePath, message: getErrorMessage(error) });
            continue;
        }

        if (options.maxFileSize !== undefined && stat.size > options.maxFileSize) {
            excluded.push({ path: absolutePath, relativePath, size: stat.size, rule: 'size-limit' });
            continue;
        }

        const name = path.basename(absolutePath);
        const mimeType = lookupMimeType(name);
        files.push({
            path: absolutePath,
            relativePath,
            name,
            extension: path.extname(name).toLowerCase(),
            size: stat.size,
            mtimeMs: Math.trunc(stat.mtimeMs),
            mimeType,
            category: mimeCategory(mimeType),
        });
    }

    const uniqueMimeTypes = [...new Set(files.map(file => file.mimeType))].sort();
    return { sourceDirectory: root, files, excluded, errors, uniqueMimeTypes };
}

/**
 * Live fingerprint of the scan subject: the listing snapshot plus the options.
 */
export function scanFingerprint(sourceDir: string, options: ScanOptions): Fingerprint {
    const root = path.resolve(sourceDir);
    const listing = listSourceFiles(root, options);
    return fingerprintAggregate([
        fingerprintDirectory(root, listing.files),
        fingerprintBytes(JSON.stringify({
            include: options.include,
            exclude: options.exclude,
            includeHidden: options.includeHidden,
            maxFileSize: options.maxFileSize ?? null,
            skipPaths: options.skipPaths ?? [],
        })),
    ]);
}

/**
 * Whole-stage definition; the input is the source directory.
 */
export function createScanStage(options: ScanOptions): WholeStageDefinition<string, ScanResult> {
    return {
        id: SCAN_STAGE_ID,
        codec: scanResultCodec,
        fingerprint: sourceDir => scanFingerprint(sourceDir, options),
        compute: sourceDir => scanSource(sourceDir, options),
    };
}

function assertDirectory(dir: string): void {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(dir);
    } catch (error) {
        throw new Error(`Source directory does not exist: ${dir} (${getErrorMessage(error)})`);
    }
    if (!stat.isDirectory()) {
        throw new Error(`Source path is not a directory: ${dir}`);
    }
}
