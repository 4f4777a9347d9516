/**
 * Config Loader
 *
 * Loads and validates a YAML configuration file for `tidyfold run`.
 * Merges config-file values with CLI flags.
 *
 * Resolution order (highest priority first):
 *   1. CLI flags explicitly passed (--dest, --model, etc.)
 *   2. Config file values
 *   3. Defaults (the CLI option defaults)
 *
 * Relative paths in the file (source, destination, cacheDir) are resolved
 * against the directory containing the file.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, getErrorMessage } from '@tidyfold/organizer-core';
import type {
    AIConfig,
    AIProvider,
    CacheConfig,
    ModelCapability,
    ModelConfig,
    RunCommandOptions,
    TidyfoldConfigFile,
} from './types';

/** Config file names looked for by auto-discovery, in order */
export const CONFIG_FILE_NAMES = ['tidyfold.config.yaml', 'tidyfold.config.yml'];

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load and parse a YAML configuration file.
 *
 * @param configPath - Absolute or relative path to the YAML config file
 * @returns Validated config with path fields made absolute
 * @throws ConfigError if the file does not exist, cannot be read, or contains invalid values
 */
export function loadConfig(configPath: string): TidyfoldConfigFile {
    const absolutePath = path.resolve(configPath);

    if (!fs.existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`, { meta: { filePath: absolutePath } });
    }

    let content: string;
    try {
        content = fs.readFileSync(absolutePath, 'utf-8');
    } catch (e) {
        throw new ConfigError(`Cannot read config file ${absolutePath}: ${getErrorMessage(e)}`, {
            cause: e,
            meta: { filePath: absolutePath },
        });
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(content);
    } catch (e) {
        throw new ConfigError(`Invalid YAML in config file: ${getErrorMessage(e)}`, {
            cause: e,
            meta: { filePath: absolutePath },
        });
    }

    if (!isRecord(parsed)) {
        throw new ConfigError('Config file is empty or not a valid YAML object', { meta: { filePath: absolutePath } });
    }

    const config = validateConfig(parsed);
    const baseDir = path.dirname(absolutePath);
    if (config.source !== undefined) { config.source = path.resolve(baseDir, config.source); }
    if (config.destination !== undefined) { config.destination = path.resolve(baseDir, config.destination); }
    if (config.cacheDir !== undefined) { config.cacheDir = path.resolve(baseDir, config.cacheDir); }
    return config;
}

/**
 * Try to auto-discover a config file in the given directory.
 * Looks for `tidyfold.config.yaml` or `tidyfold.config.yml`.
 *
 * @returns Absolute path to config file, or undefined if not found
 */
export function discoverConfigFile(dir: string): string | undefined {
    for (const filename of CONFIG_FILE_NAMES) {
        const candidate = path.resolve(dir, filename);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
    }
    return undefined;
}

// ============================================================================
// Config Merging
// ============================================================================

/**
 * Merge a config file with CLI options.
 * CLI flags override config file values. Config file fills in unset fields.
 *
 * @param config - Parsed config file
 * @param cliOptions - Options from CLI flags (defaults included)
 * @param cliExplicit - Field names explicitly provided on the command line
 */
export function mergeConfigWithCLI(
    config: TidyfoldConfigFile,
    cliOptions: RunCommandOptions,
    cliExplicit?: Set<string>
): RunCommandOptions {
    const explicit = cliExplicit || new Set<string>();

    // Helper: use CLI value if explicitly set, otherwise config value, otherwise existing CLI default
    function resolve<T>(field: string, cliVal: T, configVal: T | undefined): T {
        if (explicit.has(field)) {
            return cliVal;
        }
        return configVal !== undefined ? configVal : cliVal;
    }

    return {
        source: cliOptions.source ?? config.source,
        destination: resolve('destination', cliOptions.destination, config.destination),
        config: cliOptions.config,
        cacheDir: resolve('cacheDir', cliOptions.cacheDir, config.cacheDir),
        cacheRead: resolve('cacheRead', cliOptions.cacheRead, config.cache?.read),
        cacheWrite: resolve('cacheWrite', cliOptions.cacheWrite, config.cache?.write),
        clearCache: cliOptions.clearCache,
        cacheStats: cliOptions.cacheStats,
        skipFrom: cliOptions.skipFrom,
        include: resolve('include', cliOptions.include, config.include),
        exclude: resolve('exclude', cliOptions.exclude, config.exclude),
        includeHidden: resolve('includeHidden', cliOptions.includeHidden, config.includeHidden),
        maxFileSize: resolve('maxFileSize', cliOptions.maxFileSize, config.maxFileSize),
        dryRun: resolve('dryRun', cliOptions.dryRun, config.dryRun),
        overwrite: resolve('overwrite', cliOptions.overwrite, config.overwrite),
        unsortedFolder: resolve('unsortedFolder', cliOptions.unsortedFolder, config.unsortedFolder),
        maxFiles: resolve('maxFiles', cliOptions.maxFiles, config.maxFiles),
        provider: resolve('provider', cliOptions.provider, config.ai?.provider),
        model: resolve('model', cliOptions.model, config.ai?.model),
        ai: config.ai,
        verbose: cliOptions.verbose, // always from CLI
    };
}

// ============================================================================
// Validation
// ============================================================================

export const VALID_PROVIDERS: readonly AIProvider[] = ['openai', 'anthropic', 'ollama'];
export const VALID_CAPABILITIES: readonly ModelCapability[] = ['text', 'image', 'audio', 'video', 'application'];

const TOP_LEVEL_KEYS = new Set([
    'source', 'destination', 'cacheDir', 'include', 'exclude', 'includeHidden', 'maxFileSize',
    'dryRun', 'overwrite', 'unsortedFolder', 'maxFiles', 'cache', 'ai',
]);

/**
 * Validate a raw parsed config object and return a typed TidyfoldConfigFile.
 *
 * @throws ConfigError naming the first invalid field
 */
export function validateConfig(raw: Record<string, unknown>): TidyfoldConfigFile {
    const config: TidyfoldConfigFile = {};

    for (const key of Object.keys(raw)) {
        if (!TOP_LEVEL_KEYS.has(key)) {
            throw new ConfigError(`Config error: unknown option "${key}"`);
        }
    }

    // String fields
    config.source = optionalString(raw.source, 'source');
    config.destination = optionalString(raw.destination, 'destination');
    config.cacheDir = optionalString(raw.cacheDir, 'cacheDir');
    config.unsortedFolder = optionalString(raw.unsortedFolder, 'unsortedFolder');

    // Pattern lists
    config.include = optionalStringArray(raw.include, 'include');
    config.exclude = optionalStringArray(raw.exclude, 'exclude');

    // Number fields
    config.maxFileSize = optionalPositiveInteger(raw.maxFileSize, 'maxFileSize');
    config.maxFiles = optionalPositiveInteger(raw.maxFiles, 'maxFiles');

    // Boolean fields
    config.includeHidden = optionalBoolean(raw.includeHidden, 'includeHidden');
    config.dryRun = optionalBoolean(raw.dryRun, 'dryRun');
    config.overwrite = optionalBoolean(raw.overwrite, 'overwrite');

    if (config.unsortedFolder !== undefined && config.unsortedFolder.trim() === '') {
        throw new ConfigError('Config error: "unsortedFolder" must not be empty');
    }

    // Nested sections
    if (raw.cache !== undefined) {
        config.cache = validateCacheConfig(raw.cache);
    }
    if (raw.ai !== undefined) {
        config.ai = validateAIConfig(raw.ai);
    }

    return dropUndefined(config);
}

function validateCacheConfig(raw: unknown): CacheConfig {
    if (!isRecord(raw)) {
        throw new ConfigError('Config error: "cache" must be an object');
    }
    return dropUndefined({
        read: optionalBoolean(raw.read, 'cache.read'),
        write: optionalBoolean(raw.write, 'cache.write'),
    });
}

function validateAIConfig(raw: unknown): AIConfig {
    if (!isRecord(raw)) {
        throw new ConfigError('Config error: "ai" must be an object');
    }

    const ai: AIConfig = {
        provider: optionalProvider(raw.provider, 'ai.provider'),
        model: optionalString(raw.model, 'ai.model'),
        baseUrl: optionalString(raw.baseUrl, 'ai.baseUrl'),
        apiKeyEnv: optionalString(raw.apiKeyEnv, 'ai.apiKeyEnv'),
        verifyConnectivity: optionalBoolean(raw.verifyConnectivity, 'ai.verifyConnectivity'),
    };

    if (raw.timeout !== undefined) {
        if (typeof raw.timeout !== 'number' || !Number.isFinite(raw.timeout) || raw.timeout <= 0) {
            throw new ConfigError('Config error: "ai.timeout" must be a positive number');
        }
        ai.timeout = raw.timeout;
    }

    if (raw.models !== undefined) {
        if (!Array.isArray(raw.models)) {
            throw new ConfigError('Config error: "ai.models" must be an array');
        }
        const names = new Set<string>();
        ai.models = raw.models.map((entry: unknown, i: number) => {
            const model = validateModelConfig(entry, `ai.models[${i}]`);
            if (names.has(model.name)) {
                throw new ConfigError(`Config error: duplicate model name "${model.name}" in "ai.models"`);
            }
            names.add(model.name);
            return model;
        });
    }

    return dropUndefined(ai);
}

function validateModelConfig(raw: unknown, field: string): ModelConfig {
    if (!isRecord(raw)) {
        throw new ConfigError(`Config error: "${field}" must be an object`);
    }

    const model = optionalString(raw.model, `${field}.model`);
    if (model === undefined) {
        throw new ConfigError(`Config error: "${field}.model" is required`);
    }
    const provider = optionalProvider(raw.provider, `${field}.provider`);
    if (provider === undefined) {
        throw new ConfigError(`Config error: "${field}.provider" is required`);
    }

    const capabilities = optionalStringArray(raw.capabilities, `${field}.capabilities`) ?? ['text'];
    const validCapabilities = capabilities.filter(isCapability);
    if (validCapabilities.length !== capabilities.length || validCapabilities.length === 0) {
        throw new ConfigError(
            `Config error: "${field}.capabilities" must list one or more of: ${VALID_CAPABILITIES.join(', ')}`
        );
    }

    return {
        name: optionalString(raw.name, `${field}.name`) ?? model,
        provider,
        model,
        capabilities: validCapabilities,
    };
}

// ============================================================================
// Field Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isProvider(value: unknown): value is AIProvider {
    return VALID_PROVIDERS.some(provider => provider === value);
}

function isCapability(value: unknown): value is ModelCapability {
    return VALID_CAPABILITIES.some(capability => capability === value);
}

function optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined) { return undefined; }
    if (typeof value !== 'string') {
        throw new ConfigError(`Config error: "${field}" must be a string`);
    }
    return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
    if (value === undefined) { return undefined; }
    if (typeof value !== 'boolean') {
        throw new ConfigError(`Config error: "${field}" must be a boolean`);
    }
    return value;
}

function optionalPositiveInteger(value: unknown, field: string): number | undefined {
    if (value === undefined) { return undefined; }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ConfigError(`Config error: "${field}" must be a positive integer`);
    }
    return value;
}

function optionalStringArray(value: unknown, field: string): string[] | undefined {
    if (value === undefined) { return undefined; }
    if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === 'string')) {
        throw new ConfigError(`Config error: "${field}" must be a list of strings`);
    }
    return value.map(item => String(item));
}

function optionalProvider(value: unknown, field: string): AIProvider | undefined {
    if (value === undefined) { return undefined; }
    if (!isProvider(value)) {
        throw new ConfigError(`Config error: "${field}" must be one of: ${VALID_PROVIDERS.join(', ')}`);
    }
    return value;
}

/**
 * Remove keys whose value is undefined.
 */
function dropUndefined<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        if (Reflect.get(value, key) === undefined) {
            Reflect.deleteProperty(value, key);
        }
    }
    return value;
}
