/**
 * CLI Logger
 *
 * Terminal output for the tidyfold CLI. Everything user-facing goes to stderr
 * so stdout stays free for `--cache-stats` lines.
 *
 *   print*          one-line status messages
 *   StageProgress   per-stage line, animated on a TTY, with the final
 *                   cached / computed / failed outcome
 *   createCLILogger the organizer-core Logger the cache engine writes through
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import type { Logger, StageState, StageStatus } from '@tidyfold/organizer-core';

// ============================================================================
// Styles
// ============================================================================

const ANSI = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
} as const;

type Style = Exclude<keyof typeof ANSI, 'reset'>;

let colorEnabled = true;

/**
 * Turn ANSI styling on or off (`--no-color`, `NO_COLOR`).
 */
export function setColorEnabled(enabled: boolean): void {
    colorEnabled = enabled;
}

function paint(style: Style, text: string): string {
    return colorEnabled ? `${ANSI[style]}${text}${ANSI.reset}` : text;
}

export function bold(text: string): string { return paint('bold', text); }
export function gray(text: string): string { return paint('gray', text); }

// ============================================================================
// Symbols
// ============================================================================

const plainConsole = process.platform === 'win32';

const MARKS = {
    success: plainConsole ? '√' : '✓',
    error: plainConsole ? '×' : '✗',
    warning: plainConsole ? '!' : '⚠',
    info: plainConsole ? 'i' : 'ℹ',
    cached: plainConsole ? '=' : '↺',
    pending: plainConsole ? '-' : '·',
} as const;

const FRAMES: readonly string[] = plainConsole
    ? ['|', '/', '-', '\\']
    : ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/** Colour of each stage status word */
const STATUS_STYLES: Record<StageStatus, Style> = {
    pending: 'gray',
    running: 'yellow',
    cached: 'cyan',
    computed: 'green',
    failed: 'red',
};

/**
 * The status word, coloured: cached cyan, computed green, failed red.
 */
export function styleStatus(status: StageStatus): string {
    return paint(STATUS_STYLES[status], status);
}

/**
 * Final line for a finished stage, e.g. `↺ Scan cached (12ms)` or
 * `⚠ Analysis 2 item(s) failed (3s)`.
 */
export function stageOutcomeLine(state: StageState): string {
    const timing = paint('gray', `(${formatDuration(state.elapsedMs)})`);
    switch (state.status) {
        case 'cached':
            return `${paint('cyan', MARKS.cached)} ${state.name} ${styleStatus('cached')} ${timing}`;
        case 'computed':
            if (state.itemErrors.length > 0) {
                const failures = paint('yellow', `${state.itemErrors.length} item(s) failed`);
                return `${paint('yellow', MARKS.warning)} ${state.name} ${failures} ${timing}`;
            }
            return `${paint('green', MARKS.success)} ${state.name} ${styleStatus('computed')} ${timing}`;
        case 'failed':
            return `${paint('red', MARKS.error)} ${state.name} ${styleStatus('failed')}`;
        default:
            return `${paint('gray', MARKS.pending)} ${state.name} ${styleStatus(state.status)}`;
    }
}

// ============================================================================
// Stage Progress
// ============================================================================

/**
 * Progress line for the stage that is running. On a TTY the line animates
 * and is rewritten in place; otherwise every label is printed once.
 */
export class StageProgress {
    private timer: ReturnType<typeof setInterval> | null = null;
    private label = '';
    private frame = 0;

    get isActive(): boolean {
        return this.label !== '';
    }

    begin(label: string): void {
        this.clear();
        this.label = label;
        if (!process.stderr.isTTY) {
            process.stderr.write(`${label}\n`);
            return;
        }
        this.timer = setInterval(() => {
            const frame = FRAMES[this.frame++ % FRAMES.length];
            process.stderr.write(`\r${paint('cyan', frame)} ${this.label}`);
        }, 80);
    }

    /**
     * Replace the label; per-item progress in the granular stage.
     */
    update(label: string): void {
        if (!this.isActive) { return; }
        this.label = label;
        if (!process.stderr.isTTY) {
            process.stderr.write(`${label}\n`);
        }
    }

    /**
     * Stop and print the stage outcome.
     */
    end(state: StageState): void {
        this.clear();
        process.stderr.write(`${stageOutcomeLine(state)}\n`);
    }

    /**
     * Stop without printing an outcome.
     */
    abort(): void {
        this.clear();
    }

    private clear(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            process.stderr.write('\r\x1b[K');
        }
        this.label = '';
        this.frame = 0;
    }
}

// ============================================================================
// CLI Logger (implements the organizer-core Logger interface)
// ============================================================================

export type VerbosityLevel = 'quiet' | 'normal' | 'verbose';

let verbosity: VerbosityLevel = 'normal';

export function setVerbosity(level: VerbosityLevel): void {
    verbosity = level;
}

/**
 * Engine logger for CLI runs: debug lines only when verbose, info lines
 * hidden when quiet, warnings and errors always.
 */
export function createCLILogger(): Logger {
    const line = (style: Style, tag: string, message: string): void => {
        process.stderr.write(`${paint(style, tag)} ${message}\n`);
    };
    return {
        debug(category, message) {
            if (verbosity === 'verbose') { line('gray', `[DEBUG] [${category}]`, message); }
        },
        info(category, message) {
            if (verbosity !== 'quiet') { line('blue', `[${category}]`, message); }
        },
        warn(category, message) {
            line('yellow', `[WARN] [${category}]`, message);
        },
        error(category, message, error) {
            line('red', `[ERROR] [${category}]`, message);
            if (error && verbosity === 'verbose') {
                process.stderr.write(`${paint('gray', error.stack || error.message)}\n`);
            }
        },
    };
}

// ============================================================================
// Print Helpers
// ============================================================================

function emit(style: Style, mark: string, message: string): void {
    process.stderr.write(`${paint(style, mark)} ${message}\n`);
}

export function printSuccess(message: string): void { emit('green', MARKS.success, message); }
export function printError(message: string): void { emit('red', MARKS.error, message); }
export function printWarning(message: string): void { emit('yellow', MARKS.warning, message); }
export function printInfo(message: string): void { emit('blue', MARKS.info, message); }

/**
 * Section title, preceded by a blank line.
 */
export function printHeader(title: string): void {
    process.stderr.write(`\n${bold(title)}\n`);
}

/**
 * Indented `Key: value` row under a header.
 */
export function printKeyValue(key: string, value: string): void {
    process.stderr.write(`  ${gray(`${key}:`)} ${value}\n`);
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Human-readable duration: `850ms`, `12s`, `3m 5s`.
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) { return `${ms}ms`; }
    const seconds = Math.round(ms / 1000);
    if (seconds < 60) { return `${seconds}s`; }
    const minutes = Math.floor(seconds / 60);
    return `${minutes}m ${seconds % 60}s`;
}

/**
 * Human-readable byte count: `512 B`, `1.5 KB`, `2.0 MB`.
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) { return `${bytes} B`; }
    const units = ['KB', 'MB', 'GB', 'TB'];
    let value = bytes / 1024;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${value.toFixed(1)} ${units[unit]}`;
}
