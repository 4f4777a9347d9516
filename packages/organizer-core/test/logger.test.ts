/**
 * Tests for the process-wide logger registry.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, getLogger, nullLogger, resetLogger, setLogger, LogCategory } from '../src/logger';

afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
});

describe('logger registry', () => {
    it('should default to the console logger', () => {
        expect(getLogger()).toBe(consoleLogger);
    });

    it('should swap and reset the default', () => {
        setLogger(nullLogger);
        expect(getLogger()).toBe(nullLogger);
        resetLogger();
        expect(getLogger()).toBe(consoleLogger);
    });

    it('should prefix console output with level and category', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        consoleLogger.warn(LogCategory.CACHE, 'corrupt entry');
        expect(warn).toHaveBeenCalledWith('[WARN] [Cache] corrupt entry');
    });
});
