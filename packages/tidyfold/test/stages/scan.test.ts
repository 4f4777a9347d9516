/**
 * Scan Stage Tests
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { fingerprintsEqual } from '@tidyfold/organizer-core';
import {
    DEFAULT_MIME_TYPE,
    SCAN_STAGE_ID,
    createScanStage,
    listSourceFiles,
    lookupMimeType,
    mimeCategory,
    scanFingerprint,
    scanSource,
} from '../../src/stages/scan';
import type { ScanOptions } from '../../src/stages/scan';

// ============================================================================
// Helpers
// ============================================================================

let tmpDir: string;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tidyfold-scan-test-'));
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeFile(relativePath: string, content: string): string {
    const filePath = path.join(tmpDir, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
}

function options(overrides?: Partial<ScanOptions>): ScanOptions {
    return { include: [], exclude: [], includeHidden: false, ...overrides };
}

// ============================================================================
// MIME Types
// ============================================================================

describe('lookupMimeType', () => {
    it('should map known extensions case-insensitively', () => {
        expect(lookupMimeType('notes.txt')).toBe('text/plain');
        expect(lookupMimeType('PHOTO.JPG')).toBe('image/jpeg');
        expect(lookupMimeType('data.json')).toBe('application/json');
    });

    it('should fall back to application/octet-stream', () => {
        expect(lookupMimeType('archive.xyz123')).toBe(DEFAULT_MIME_TYPE);
        expect(lookupMimeType('Makefile')).toBe(DEFAULT_MIME_TYPE);
    });
});

describe('mimeCategory', () => {
    it('should return the top-level type', () => {
        expect(mimeCategory('text/plain')).toBe('text');
        expect(mimeCategory('image/png')).toBe('image');
        expect(mimeCategory('audio/mpeg')).toBe('audio');
    });

    it('should fold unknown top-level types into application', () => {
        expect(mimeCategory('font/woff2')).toBe('application');
        expect(mimeCategory('chemical/x-pdb')).toBe('application');
    });
});

// ============================================================================
// listSourceFiles
// ============================================================================

describe('listSourceFiles', () => {
    it('should list files recursively in sorted order', () => {
        writeFile('b.txt', 'b');
        writeFile('a/z.md', 'z');
        writeFile('a/c.md', 'c');

        expect(listSourceFiles(tmpDir, options()).files).toEqual(['a/c.md', 'a/z.md', 'b.txt']);
    });

    it('should skip hidden entries unless includeHidden', () => {
        writeFile('.env', 'SECRET=placeholder');
        writeFile('.git/config', 'x');
        writeFile('visible.txt', 'v');

        expect(listSourceFiles(tmpDir, options()).files).toEqual(['visible.txt']);
        expect(listSourceFiles(tmpDir, options({ includeHidden: true })).files)
            .toEqual(['.env', '.git/config', 'visible.txt']);
    });

    it('should prune excluded directories and skip excluded files', () => {
        writeFile('node_modules/pkg/index.js', 'x');
        writeFile('keep.txt', 'k');
        writeFile('drop.tmp', 'd');

        const listing = listSourceFiles(tmpDir, options({ exclude: ['node_modules', '*.tmp'] }));
        expect(listing.files).toEqual(['keep.txt']);
    });

    it('should apply include patterns to files only', () => {
        writeFile('docs/guide.md', 'g');
        writeFile('docs/image.png', 'i');
        writeFile('top.md', 't');

        const listing = listSourceFiles(tmpDir, options({ include: ['*.md'] }));
        expect(listing.files).toEqual(['docs/guide.md', 'top.md']);
    });

    it('should not enter skipped paths', () => {
        writeFile('organized/old.txt', 'o');
        writeFile('inbox/new.txt', 'n');

        const listing = listSourceFiles(tmpDir, options({ skipPaths: ['organized'] }));
        expect(listing.files).toEqual(['inbox/new.txt']);
    });

    it('should throw when the root cannot be read', () => {
        const missing = path.join(tmpDir, 'missing');
        expect(() => listSourceFiles(missing, options())).toThrow(`Cannot read source directory ${missing}`);
    });
});

// ============================================================================
// scanSource
// ============================================================================

describe('scanSource', () => {
    it('should build file records', () => {
        const filePath = writeFile('notes/Todo.TXT', 'hello');

        const result = scanSource(tmpDir, options());

        expect(result.sourceDirectory).toBe(path.resolve(tmpDir));
        expect(result.files).toHaveLength(1);
        const record = result.files[0];
        expect(record.path).toBe(filePath);
        expect(record.relativePath).toBe('notes/Todo.TXT');
        expect(record.name).toBe('Todo.TXT');
        expect(record.extension).toBe('.txt');
        expect(record.size).toBe(5);
        expect(record.mimeType).toBe('text/plain');
        expect(record.category).toBe('text');
        expect(Number.isInteger(record.mtimeMs)).toBe(true);
    });

    it('should collect sorted unique MIME types', () => {
        writeFile('a.txt', 'a');
        writeFile('b.png', 'b');
        writeFile('c.txt', 'c');

        expect(scanSource(tmpDir, options()).uniqueMimeTypes).toEqual(['image/png', 'text/plain']);
    });

    it('should record files over the size limit as excluded', () => {
        writeFile('small.txt', '12');
        const big = writeFile('big.txt', '1234567890');

        const result = scanSource(tmpDir, options({ maxFileSize: 5 }));

        expect(result.files.map(f => f.relativePath)).toEqual(['small.txt']);
        expect(result.excluded).toEqual([{ path: big, relativePath: 'big.txt', size: 10, rule: 'size-limit' }]);
    });

    it('should return an empty result for an empty directory', () => {
        const result = scanSource(tmpDir, options());
        expect(result.files).toEqual([]);
        expect(result.uniqueMimeTypes).toEqual([]);
        expect(result.errors).toEqual([]);
    });

    it('should reject a missing source', () => {
        const missing = path.join(tmpDir, 'nope');
        expect(() => scanSource(missing, options())).toThrow(`Source directory does not exist: ${missing}`);
    });

    it('should reject a file as source', () => {
        const file = writeFile('file.txt', 'x');
        expect(() => scanSource(file, options())).toThrow(`Source path is not a directory: ${file}`);
    });
});

// ============================================================================
// Fingerprint
// ============================================================================

describe('scanFingerprint', () => {
    it('should be stable while nothing changes', () => {
        writeFile('a.txt', 'a');
        expect(fingerprintsEqual(scanFingerprint(tmpDir, options()), scanFingerprint(tmpDir, options()))).toBe(true);
    });

    it('should change when a file is added', () => {
        writeFile('a.txt', 'a');
        const before = scanFingerprint(tmpDir, options());
        writeFile('b.txt', 'b');
        expect(fingerprintsEqual(before, scanFingerprint(tmpDir, options()))).toBe(false);
    });

    it('should change when the options change', () => {
        writeFile('a.txt', 'a');
        const before = scanFingerprint(tmpDir, options());
        expect(fingerprintsEqual(before, scanFingerprint(tmpDir, options({ maxFileSize: 100 })))).toBe(false);
    });
});

describe('createScanStage', () => {
    it('should define stage1 over the source directory', async () => {
        writeFile('a.txt', 'a');
        const stage = createScanStage(options());
        expect(stage.id).toBe(SCAN_STAGE_ID);
        const result = await stage.compute(tmpDir);
        expect(result.files.map(f => f.name)).toEqual(['a.txt']);
    });
});
