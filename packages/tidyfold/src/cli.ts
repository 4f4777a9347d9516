/**
 * CLI Argument Parser
 *
 * Defines the CLI commands and options using Commander.
 * Routes parsed arguments to the appropriate command handlers.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { getErrorMessage } from '@tidyfold/organizer-core';
import { setColorEnabled, setVerbosity, printError, printInfo } from './logger';
import {
    VALID_PROVIDERS,
    discoverConfigFile,
    isProvider,
    loadConfig,
    mergeConfigWithCLI,
} from './config-loader';
import { DEFAULT_UNSORTED_FOLDER } from './stages/taxonomy';
import type { RunCommandOptions } from './types';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
    SUCCESS: 0,
    EXECUTION_ERROR: 1,
    CONFIG_ERROR: 2,
    CACHE_ERROR: 3,
    CANCELLED: 130,
} as const;

/** Stage numbers accepted by `--skip-stageN` */
const SKIPPABLE_STAGES = [2, 3, 4, 5] as const;

/**
 * Commander attribute names that differ from RunCommandOptions field names.
 */
const OPTION_FIELD_NAMES: Record<string, string> = {
    dest: 'destination',
    cache: 'cacheRead',
};

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('tidyfold')
        .description('Organize a folder of files into an AI-derived taxonomy, resuming from a local stage cache')
        .version('1.0.0');

    // ========================================================================
    // tidyfold init
    // ========================================================================

    program
        .command('init')
        .description('Generate a template tidyfold.config.yaml configuration file')
        .option('-o, --output <path>', 'Output file path', 'tidyfold.config.yaml')
        .option('--force', 'Overwrite existing file', false)
        .option('-v, --verbose', 'Verbose logging', false)
        .option('--no-color', 'Disable colored output')
        .action(async (opts: Record<string, unknown>) => {
            applyGlobalOptions(opts);
            const { executeInit } = await import('./commands/init');
            const exitCode = await executeInit({
                output: stringOption(opts.output),
                force: Boolean(opts.force),
                verbose: Boolean(opts.verbose),
            });
            process.exit(exitCode);
        });

    // ========================================================================
    // tidyfold run [source]
    // ========================================================================

    const run = program
        .command('run')
        .description('Scan, analyze, classify and move the files of a folder')
        .argument('[source]', 'Folder to organize')
        .option('-d, --dest <dir>', 'Destination root (default: <source>/organized)')
        .option('--config <path>', 'Path to a tidyfold.config.yaml file')
        .option('--cache-dir <dir>', 'Cache directory (default: ./.tidyfold-cache)')
        .option('--no-cache', 'Ignore existing cache entries (results are still stored)')
        .option('--no-cache-write', 'Do not store results in the cache')
        .option('--clear-cache <target>', 'Delete cache entries before the run: stage1..stage5 or all')
        .option('--cache-stats', 'Print cache statistics and exit', false)
        .option('--include <glob>', 'Only scan files matching the glob (repeatable)', collect, [])
        .option('--exclude <glob>', 'Skip files and folders matching the glob (repeatable)', collect, [])
        .option('--include-hidden', 'Include hidden files and folders', false)
        .option('--max-file-size <bytes>', 'Skip files larger than this', parsePositiveInt)
        .option('--max-files <n>', 'Analyze at most this many files', parsePositiveInt)
        .option('--dry-run', 'Plan moves without touching any file', false)
        .option('--overwrite', 'Replace existing files at the destination', false)
        .option('--unsorted-folder <name>', 'Folder for files the taxonomy did not place', DEFAULT_UNSORTED_FOLDER)
        .addOption(new Option('--provider <name>', 'AI provider').choices(VALID_PROVIDERS))
        .option('-m, --model <model>', 'AI model to use')
        .option('-v, --verbose', 'Verbose logging', false)
        .option('--no-color', 'Disable colored output');

    for (const stage of SKIPPABLE_STAGES) {
        run.option(`--skip-stage${stage}`, `Stop before stage ${stage} (stages ${stage}-5 do not run)`, false);
    }

    run.action(async (source: string | undefined, opts: Record<string, unknown>, cmd: Command) => {
        applyGlobalOptions(opts);

        let options = buildRunOptions(source, opts);

        // Load config file if --config is specified, or auto-discover
        const configPath = options.config || discoverConfigFile(process.cwd());
        if (configPath) {
            try {
                const config = loadConfig(configPath);
                options = mergeConfigWithCLI(config, options, getExplicitFields(cmd));
                if (options.verbose) {
                    printInfo(`Loaded config from ${configPath}`);
                }
            } catch (e) {
                printError(getErrorMessage(e));
                process.exit(EXIT_CODES.CONFIG_ERROR);
            }
        }

        const { executeRun } = await import('./commands/run');
        const exitCode = await executeRun(options);
        process.exit(exitCode);
    });

    return program;
}

// ============================================================================
// Option Helpers
// ============================================================================

/**
 * Build run options from Commander's parsed values (defaults included).
 */
export function buildRunOptions(source: string | undefined, opts: Record<string, unknown>): RunCommandOptions {
    return {
        source,
        destination: stringOption(opts.dest),
        config: stringOption(opts.config),
        cacheDir: stringOption(opts.cacheDir),
        cacheRead: opts.cache !== false,
        cacheWrite: opts.cacheWrite !== false,
        clearCache: stringOption(opts.clearCache),
        cacheStats: Boolean(opts.cacheStats),
        skipFrom: SKIPPABLE_STAGES.find(stage => opts[`skipStage${stage}`] === true),
        include: stringListOption(opts.include),
        exclude: stringListOption(opts.exclude),
        includeHidden: Boolean(opts.includeHidden),
        maxFileSize: numberOption(opts.maxFileSize),
        dryRun: Boolean(opts.dryRun),
        overwrite: Boolean(opts.overwrite),
        unsortedFolder: stringOption(opts.unsortedFolder) ?? DEFAULT_UNSORTED_FOLDER,
        maxFiles: numberOption(opts.maxFiles),
        provider: isProvider(opts.provider) ? opts.provider : undefined,
        model: stringOption(opts.model),
        verbose: Boolean(opts.verbose),
    };
}

/**
 * Apply global options (color, verbosity)
 */
function applyGlobalOptions(opts: Record<string, unknown>): void {
    // Handle --no-color: commander sets color: false when --no-color is used
    if (opts.color === false) {
        setColorEnabled(false);
    }

    // Also respect NO_COLOR env variable
    if (process.env.NO_COLOR !== undefined) {
        setColorEnabled(false);
    }

    if (opts.verbose) {
        setVerbosity('verbose');
    }
}

/**
 * Determine which RunCommandOptions fields were explicitly set by the user (not defaults).
 * Commander records 'cli' as the value source of every flag the user typed.
 */
export function getExplicitFields(cmd: Command): Set<string> {
    const explicit = new Set<string>();
    for (const option of cmd.options) {
        const key = option.attributeName();
        if (cmd.getOptionValueSource(key) === 'cli') {
            explicit.add(OPTION_FIELD_NAMES[key] ?? key);
        }
    }
    return explicit;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function stringOption(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
    return typeof value === 'number' ? value : undefined;
}

function stringListOption(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}
