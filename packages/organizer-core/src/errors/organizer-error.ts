/**
 * OrganizerError
 *
 * Base error class for all organizer-core errors.
 * Provides structured error information with:
 * - code: Well-known error code for programmatic handling
 * - cause: Original error that caused this error (error chaining)
 * - meta: Additional context metadata
 *
 * The subclasses mirror the cache engine's failure taxonomy: corruption is
 * recovered as a miss, write failures and whole-stage compute failures are
 * fatal, item compute failures are recorded and processing continues.
 */

import { ErrorCode, ErrorCodeType, mapSystemErrorCode } from './error-codes';
import { getLogger, LogCategory } from '../logger';

/**
 * Metadata that can be attached to errors for debugging and reporting
 */
export interface ErrorMetadata {
    /** Stage id where the error occurred */
    stageId?: string;
    /** Item identity for per-item failures */
    itemId?: string;
    /** Cache record path */
    cachePath?: string;
    /** File path related to the error */
    filePath?: string;
    /** Item index in a batch operation */
    itemIndex?: number;
    /** Total items in a batch operation */
    totalItems?: number;
    /** Additional custom metadata */
    [key: string]: unknown;
}

export interface OrganizerErrorOptions {
    code?: ErrorCodeType;
    cause?: unknown;
    meta?: ErrorMetadata;
}

/**
 * Base error class for the organizer packages.
 *
 * @example
 * ```typescript
 * throw new OrganizerError('Failed to read config', {
 *     code: ErrorCode.CONFIG_INVALID,
 *     cause: originalError,
 *     meta: { filePath: 'tidyfold.config.yaml' }
 * });
 * ```
 */
export class OrganizerError extends Error {
    /** Well-known error code for programmatic handling */
    readonly code: ErrorCodeType;

    /** Original error that caused this error */
    readonly cause?: unknown;

    /** Additional context metadata */
    readonly meta?: ErrorMetadata;

    constructor(message: string, options?: OrganizerErrorOptions) {
        super(message);

        this.name = 'OrganizerError';
        this.code = options?.code ?? ErrorCode.UNKNOWN;
        this.cause = options?.cause;
        this.meta = options?.meta;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Get a formatted string representation including code and metadata
     */
    toDetailedString(): string {
        const parts = [`[${this.code}] ${this.message}`];

        if (this.meta && Object.keys(this.meta).length > 0) {
            parts.push(`Meta: ${JSON.stringify(this.meta)}`);
        }

        if (this.cause instanceof Error) {
            parts.push(`Caused by: ${this.cause.message}`);
        } else if (this.cause !== undefined) {
            parts.push(`Caused by: ${String(this.cause)}`);
        }

        return parts.join('\n');
    }

    /**
     * Convert to a plain object for serialization
     */
    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            meta: this.meta,
            cause: this.cause instanceof Error
                ? { name: this.cause.name, message: this.cause.message }
                : this.cause,
            stack: this.stack,
        };
    }
}

// ============================================================================
// Cache Errors
// ============================================================================

/**
 * A cache record exists but cannot be trusted (malformed, truncated, or
 * written by an incompatible schema). Always recovered as a cache miss.
 */
export class CacheCorruptionError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.CACHE_CORRUPTION });
        this.name = 'CacheCorruptionError';
    }
}

/**
 * A cache record could not be written. Fatal: the pipeline aborts.
 */
export class CacheWriteError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.CACHE_WRITE_FAILED });
        this.name = 'CacheWriteError';
    }
}

/**
 * The cache directory cannot be listed or modified.
 */
export class CacheUnavailableError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.CACHE_UNAVAILABLE });
        this.name = 'CacheUnavailableError';
    }
}

/**
 * A fingerprint subject could not be stat'd. Callers treat this as
 * "must recompute".
 */
export class IOUnavailableError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.IO_UNAVAILABLE });
        this.name = 'IOUnavailableError';
    }
}

// ============================================================================
// Pipeline Errors
// ============================================================================

/**
 * A stage or item compute function failed.
 */
export class ComputeError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.COMPUTE_FAILED });
        this.name = 'ComputeError';
    }
}

/**
 * A whole stage failed; no downstream stage can run.
 */
export class StageFailedError extends OrganizerError {
    readonly stageId: string;

    constructor(stageId: string, cause: unknown) {
        // Causes raised for this stage already name it
        const message = isOrganizerError(cause) && cause.meta?.stageId === stageId
            ? cause.message
            : `Stage ${stageId} failed: ${getErrorMessage(cause)}`;
        super(message, {
            code: ErrorCode.STAGE_FAILED,
            cause,
            meta: { stageId },
        });
        this.name = 'StageFailedError';
        this.stageId = stageId;
    }
}

/**
 * Invalid configuration or conflicting flags. Raised before any stage runs.
 */
export class ConfigError extends OrganizerError {
    constructor(message: string, options?: Omit<OrganizerErrorOptions, 'code'>) {
        super(message, { ...options, code: ErrorCode.CONFIG_INVALID });
        this.name = 'ConfigError';
    }
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Type guard to check if an error is an OrganizerError
 */
export function isOrganizerError(error: unknown): error is OrganizerError {
    return error instanceof OrganizerError;
}

/**
 * Type guard for Node.js system errors carrying an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Convert any error to an OrganizerError.
 * If already an OrganizerError, returns as-is (merging extra meta).
 * Otherwise wraps the error with appropriate code detection.
 */
export function toOrganizerError(
    error: unknown,
    defaultCode: ErrorCodeType = ErrorCode.UNKNOWN,
    meta?: ErrorMetadata
): OrganizerError {
    if (isOrganizerError(error)) {
        if (meta) {
            return new OrganizerError(error.message, {
                code: error.code,
                cause: error.cause,
                meta: { ...error.meta, ...meta },
            });
        }
        return error;
    }

    if (error instanceof Error) {
        const nodeCode = isErrnoException(error) ? error.code : undefined;
        const detectedCode = nodeCode ? mapSystemErrorCode(nodeCode) : defaultCode;

        return new OrganizerError(error.message, {
            code: detectedCode !== ErrorCode.UNKNOWN ? detectedCode : defaultCode,
            cause: error,
            meta,
        });
    }

    const message = typeof error === 'string' ? error : String(error);
    return new OrganizerError(message, {
        code: defaultCode,
        cause: error,
        meta,
    });
}

/**
 * Wrap an error with a new message while preserving the original as cause.
 */
export function wrapError(
    message: string,
    cause: unknown,
    code?: ErrorCodeType,
    meta?: ErrorMetadata
): OrganizerError {
    const causeError = isOrganizerError(cause) ? cause : undefined;
    const effectiveCode = code ?? causeError?.code ?? ErrorCode.UNKNOWN;
    const effectiveMeta = meta ?? causeError?.meta;

    return new OrganizerError(message, {
        code: effectiveCode,
        cause,
        meta: effectiveMeta,
    });
}

/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Extract a human-readable message from an error's cause chain
 */
export function getErrorCauseMessage(error: unknown, maxDepth = 5): string {
    const messages: string[] = [];
    let current: unknown = error;
    let depth = 0;

    while (current !== undefined && current !== null && depth < maxDepth) {
        if (current instanceof Error) {
            if (!messages.includes(current.message)) {
                messages.push(current.message);
            }
            current = isOrganizerError(current) ? current.cause : undefined;
        } else {
            messages.push(String(current));
            break;
        }
        depth++;
    }

    return messages.join(' -> ');
}

/**
 * Log an error with structured information using the default logger.
 */
export function logError(
    category: LogCategory | string,
    message: string,
    error: unknown
): void {
    const logger = getLogger();

    if (isOrganizerError(error)) {
        const details = [
            `[${error.code}]`,
            error.message,
        ];

        if (error.meta && Object.keys(error.meta).length > 0) {
            details.push(`(${JSON.stringify(error.meta)})`);
        }

        logger.error(category, `${message}: ${details.join(' ')}`, error);
    } else if (error instanceof Error) {
        logger.error(category, `${message}: ${error.message}`, error);
    } else {
        logger.error(category, `${message}: ${String(error)}`);
    }
}
