/**
 * Cancellation Utilities
 *
 * The pipeline is sequential, so cancellation is cooperative: long-running
 * loops poll an IsCancelledFn between items and abort with CancellationError.
 */

import { OrganizerError, ErrorCode, ErrorMetadata } from '../errors';

/**
 * Error thrown when an operation is cancelled.
 */
export class CancellationError extends OrganizerError {
    constructor(message = 'Operation cancelled', meta?: ErrorMetadata) {
        super(message, {
            code: ErrorCode.CANCELLED,
            meta,
        });
        this.name = 'CancellationError';
    }
}

/**
 * Returns true if the operation should be cancelled.
 */
export type IsCancelledFn = () => boolean;

export function isCancellationError(error: unknown): error is CancellationError {
    if (error instanceof CancellationError) {
        return true;
    }
    return error instanceof OrganizerError && error.code === ErrorCode.CANCELLED;
}

/**
 * Throws CancellationError if the operation has been cancelled.
 *
 * @param meta Included in the error, e.g. the stage and item reached
 */
export function throwIfCancelled(
    isCancelled?: IsCancelledFn,
    meta?: ErrorMetadata
): void {
    if (isCancelled?.()) {
        throw new CancellationError('Operation cancelled', meta);
    }
}

/**
 * A mutable cancellation source, e.g. flipped by a SIGINT handler.
 */
export interface CancellationSource {
    readonly isCancelled: IsCancelledFn;
    cancel(): void;
}

export function createCancellationSource(): CancellationSource {
    let cancelled = false;
    return {
        isCancelled: () => cancelled,
        cancel: () => {
            cancelled = true;
        },
    };
}
