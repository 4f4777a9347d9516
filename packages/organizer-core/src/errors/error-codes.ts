/**
 * Error Codes for Organizer Core
 *
 * Well-known error codes used across the cache engine and the pipeline.
 * These codes provide structured error identification without relying on message parsing.
 *
 * Categories:
 * - Control flow: CANCELLED
 * - Cache: CACHE_*, IO_UNAVAILABLE
 * - Pipeline: COMPUTE_FAILED, STAGE_FAILED, CONFIG_INVALID
 * - AI operations: AI_*
 * - File system: FILE_NOT_FOUND, PERMISSION_DENIED, FILE_SYSTEM_ERROR
 */

export const ErrorCode = {
    // =========================================================================
    // Control Flow
    // =========================================================================
    /** Operation was cancelled by user or system */
    CANCELLED: 'CANCELLED',

    // =========================================================================
    // Cache
    // =========================================================================
    /** A cache record on disk is unreadable or malformed */
    CACHE_CORRUPTION: 'CACHE_CORRUPTION',
    /** A cache record could not be written */
    CACHE_WRITE_FAILED: 'CACHE_WRITE_FAILED',
    /** The cache directory cannot be listed or modified */
    CACHE_UNAVAILABLE: 'CACHE_UNAVAILABLE',
    /** A fingerprint subject could not be stat'd */
    IO_UNAVAILABLE: 'IO_UNAVAILABLE',

    // =========================================================================
    // Pipeline
    // =========================================================================
    /** A stage or item compute function failed */
    COMPUTE_FAILED: 'COMPUTE_FAILED',
    /** A whole stage failed and the pipeline was aborted */
    STAGE_FAILED: 'STAGE_FAILED',
    /** Invalid configuration or conflicting flags */
    CONFIG_INVALID: 'CONFIG_INVALID',

    // =========================================================================
    // AI Operations
    // =========================================================================
    /** AI request failed (transport or provider error) */
    AI_INVOCATION_FAILED: 'AI_INVOCATION_FAILED',
    /** AI response could not be parsed */
    AI_RESPONSE_PARSE_FAILED: 'AI_RESPONSE_PARSE_FAILED',

    // =========================================================================
    // File System
    // =========================================================================
    /** File not found (wrapper for ENOENT) */
    FILE_NOT_FOUND: 'FILE_NOT_FOUND',
    /** Permission denied (wrapper for EACCES) */
    PERMISSION_DENIED: 'PERMISSION_DENIED',
    /** Generic file system error */
    FILE_SYSTEM_ERROR: 'FILE_SYSTEM_ERROR',

    // =========================================================================
    // Unknown / Fallback
    // =========================================================================
    /** Error code could not be determined */
    UNKNOWN: 'UNKNOWN',
} as const;

/**
 * Type representing valid error codes
 */
export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Map Node.js system error codes to our error codes
 */
export function mapSystemErrorCode(nodeCode: string): ErrorCodeType {
    switch (nodeCode) {
        case 'ENOENT':
        case 'ENOTDIR':
            return ErrorCode.FILE_NOT_FOUND;
        case 'EACCES':
        case 'EPERM':
            return ErrorCode.PERMISSION_DENIED;
        case 'ECONNREFUSED':
        case 'ENOTFOUND':
        case 'EAI_AGAIN':
        case 'ETIMEDOUT':
            return ErrorCode.AI_INVOCATION_FAILED;
        default:
            if (nodeCode.startsWith('E')) {
                return ErrorCode.FILE_SYSTEM_ERROR;
            }
            return ErrorCode.UNKNOWN;
    }
}
