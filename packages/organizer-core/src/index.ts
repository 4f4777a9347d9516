/**
 * organizer-core
 *
 * Resumable caching engine for multi-stage file pipelines: fingerprints,
 * a persistent cache store, the cache-aware stage runner and the
 * orchestrator, plus the logging, error and HTTP utilities shared with the CLI.
 */

// ============================================================================
// Logger
// ============================================================================

export {
    LogCategory,
    consoleLogger,
    nullLogger,
    setLogger,
    getLogger,
    resetLogger,
} from './logger';
export type { Logger } from './logger';

// ============================================================================
// Errors
// ============================================================================

export * from './errors';

// ============================================================================
// Runtime
// ============================================================================

export {
    CancellationError,
    isCancellationError,
    throwIfCancelled,
    createCancellationSource,
} from './runtime/cancellation';
export type { IsCancelledFn, CancellationSource } from './runtime/cancellation';

// ============================================================================
// Utils
// ============================================================================

export { httpRequest, httpGet, httpPostJson } from './utils/http-utils';
export type { HttpResponse, HttpRequestOptions } from './utils/http-utils';
export { extractJSON, parseJSONObject } from './utils/ai-response-parser';

// ============================================================================
// AI
// ============================================================================

export type { AIInvoker, AIInvokerOptions, AIInvokerResult, AIAvailabilityResult } from './ai/types';

// ============================================================================
// Cache Engine
// ============================================================================

export * from './cache';
export * from './stage';
export * from './pipeline';
