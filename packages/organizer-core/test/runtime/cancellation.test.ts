/**
 * Tests for cancellation utilities.
 */

import { describe, it, expect } from 'vitest';
import {
    CancellationError,
    createCancellationSource,
    isCancellationError,
    throwIfCancelled,
} from '../../src/runtime/cancellation';
import { ErrorCode, OrganizerError } from '../../src/errors';

describe('cancellation', () => {
    it('should throw only once cancelled', () => {
        const source = createCancellationSource();
        expect(() => throwIfCancelled(source.isCancelled)).not.toThrow();

        source.cancel();
        expect(() => throwIfCancelled(source.isCancelled, { stageId: 'stage3' })).toThrow(CancellationError);
    });

    it('should ignore a missing check', () => {
        expect(() => throwIfCancelled(undefined)).not.toThrow();
    });

    it('should recognise cancellation by class or code', () => {
        expect(isCancellationError(new CancellationError())).toBe(true);
        expect(isCancellationError(new OrganizerError('stop', { code: ErrorCode.CANCELLED }))).toBe(true);
        expect(isCancellationError(new Error('Operation cancelled'))).toBe(false);
    });
});
