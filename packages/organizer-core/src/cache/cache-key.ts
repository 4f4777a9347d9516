/**
 * Cache key helpers
 *
 * A key's file name is `<stageId>__<scope>__<hash>.json`. The stage id stays
 * readable so stage-scoped deletes and stats work from directory listings
 * alone; the rest is a one-way hash of the full key.
 */

import * as crypto from 'crypto';
import { ConfigError } from '../errors';
import type { CacheKey, CacheScope } from './types';

const STAGE_ID_PATTERN = /^[A-Za-z0-9-]+$/;
const KEY_FILE_PATTERN = /^([A-Za-z0-9-]+)__(global|item)__([0-9a-f]{32})\.json$/;
const SEPARATOR = '__';
const HASH_LENGTH = 32;

export const CACHE_FILE_EXTENSION = '.json';

export function isValidStageId(stageId: string): boolean {
    return STAGE_ID_PATTERN.test(stageId);
}

/**
 * @throws ConfigError when the stage id contains characters outside `[A-Za-z0-9-]`
 */
export function assertValidStageId(stageId: string): void {
    if (!isValidStageId(stageId)) {
        throw new ConfigError(`Invalid stage id "${stageId}": only letters, digits and "-" are allowed`);
    }
}

export function globalKey(stageId: string, identity = 'stage'): CacheKey {
    assertValidStageId(stageId);
    return { stageId, scope: 'global', identity };
}

export function itemKey(stageId: string, identity: string): CacheKey {
    assertValidStageId(stageId);
    return { stageId, scope: 'item', identity };
}

/**
 * File name for a key within the cache directory.
 */
export function keyToFileName(key: CacheKey): string {
    assertValidStageId(key.stageId);
    const hash = crypto
        .createHash('sha256')
        .update(JSON.stringify([key.stageId, key.scope, key.identity]))
        .digest('hex')
        .substring(0, HASH_LENGTH);
    return `${key.stageId}${SEPARATOR}${key.scope}${SEPARATOR}${hash}${CACHE_FILE_EXTENSION}`;
}

/**
 * Recover stage id and scope from a cache file name.
 * Returns null for anything that is not a cache record (temp files, strays).
 */
export function parseKeyFileName(fileName: string): { stageId: string; scope: CacheScope } | null {
    const match = KEY_FILE_PATTERN.exec(fileName);
    if (!match) {
        return null;
    }
    const scope: CacheScope = match[2] === 'global' ? 'global' : 'item';
    return { stageId: match[1], scope };
}

export function keysEqual(a: CacheKey, b: CacheKey): boolean {
    return a.stageId === b.stageId && a.scope === b.scope && a.identity === b.identity;
}

export function describeKey(key: CacheKey): string {
    return key.scope === 'global' ? key.stageId : `${key.stageId}[${key.identity}]`;
}
