/**
 * Invalidation policy
 *
 * An entry is valid iff its stored fingerprint equals the live fingerprint
 * of its subject. There is no time-based expiry.
 */

import { fingerprintsEqual } from './fingerprint';
import type { CacheEntry, Fingerprint } from './types';

export interface InvalidationPolicy {
    /**
     * @param currentFingerprint null when the subject vanished or could not be
     *        fingerprinted; such entries are never valid
     */
    isValid(entry: CacheEntry, currentFingerprint: Fingerprint | null): boolean;
}

export const fingerprintPolicy: InvalidationPolicy = {
    isValid(entry, currentFingerprint) {
        if (currentFingerprint === null) {
            return false;
        }
        return fingerprintsEqual(entry.fingerprint, currentFingerprint);
    },
};
