/**
 * Logger abstraction for organizer-core.
 *
 * Components accept an injected Logger and fall back to the process-wide
 * default returned by getLogger(). The CLI installs its own implementation
 * with setLogger(); tests usually pass nullLogger.
 *
 * Usage:
 *   import { getLogger, LogCategory } from '@tidyfold/organizer-core';
 *
 *   getLogger().info(LogCategory.CACHE, 'Cleared 3 entries');
 */

/**
 * Log categories for the different subsystems
 */
export enum LogCategory {
    /** Cache store reads, writes and deletes */
    CACHE = 'Cache',
    /** Stage runner hit/miss decisions */
    STAGE = 'Stage',
    /** Orchestrator progress */
    PIPELINE = 'Pipeline',
    /** AI client requests */
    AI = 'AI',
    /** Configuration loading */
    CONFIG = 'Config',
    /** Anything else */
    GENERAL = 'General',
}

/**
 * Logger interface that can be implemented by different environments.
 */
export interface Logger {
    /**
     * Log a debug message (verbose, for development)
     */
    debug(category: string, message: string): void;

    /**
     * Log an informational message
     */
    info(category: string, message: string): void;

    /**
     * Log a warning message
     */
    warn(category: string, message: string): void;

    /**
     * Log an error message with optional Error object
     */
    error(category: string, message: string, error?: Error): void;
}

/**
 * Console-based logger implementation.
 */
export const consoleLogger: Logger = {
    debug: (cat, msg) => console.debug(`[DEBUG] [${cat}] ${msg}`),
    info: (cat, msg) => console.log(`[INFO] [${cat}] ${msg}`),
    warn: (cat, msg) => console.warn(`[WARN] [${cat}] ${msg}`),
    error: (cat, msg, err) => console.error(`[ERROR] [${cat}] ${msg}`, err || ''),
};

/**
 * Logger that discards all messages.
 */
export const nullLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

let globalLogger: Logger = consoleLogger;

/**
 * Set the process-wide default logger.
 */
export function setLogger(logger: Logger): void {
    globalLogger = logger;
}

/**
 * Get the process-wide default logger.
 */
export function getLogger(): Logger {
    return globalLogger;
}

/**
 * Reset the default logger to consoleLogger. Primarily useful for testing.
 */
export function resetLogger(): void {
    globalLogger = consoleLogger;
}
