/**
 * Errors Module
 *
 * Structured error types for the cache engine and the organizer pipeline.
 */

export { ErrorCode, mapSystemErrorCode } from './error-codes';
export type { ErrorCodeType } from './error-codes';

export {
    OrganizerError,
    CacheCorruptionError,
    CacheWriteError,
    CacheUnavailableError,
    IOUnavailableError,
    ComputeError,
    StageFailedError,
    ConfigError,
    isOrganizerError,
    isErrnoException,
    toOrganizerError,
    wrapError,
    getErrorMessage,
    getErrorCauseMessage,
    logError,
} from './organizer-error';
export type { ErrorMetadata, OrganizerErrorOptions } from './organizer-error';
