/**
 * Init Command
 *
 * Generates a template `tidyfold.config.yaml` configuration file.
 * Writes to the current directory or a specified output path.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage } from '@tidyfold/organizer-core';
import { printSuccess, printError, printInfo } from '../logger';
import { EXIT_CODES } from '../cli';

// ============================================================================
// Template
// ============================================================================

/**
 * The template content for `tidyfold.config.yaml`.
 * All options are commented out so users can uncomment only what they need.
 */
export const CONFIG_TEMPLATE = `# tidyfold Configuration
# Place this file in the directory you run tidyfold from as tidyfold.config.yaml
# CLI flags override these values. Relative paths are resolved against this file.
#
# Resolution order (highest priority first):
#   1. CLI flags (--dest, --model, --cache-dir, etc.)
#   2. Config file values
#   3. Built-in defaults

# ── Paths ────────────────────────────────────────────────────────

# source: ./Downloads            # Folder to organize
# destination: ./Organized       # Root of the new layout (default: <source>/organized)
# cacheDir: ./.tidyfold-cache    # Stage cache directory

# ── Scan ─────────────────────────────────────────────────────────

# include:                       # Only files matching these globs
#   - "**/*.pdf"
# exclude:                       # Skip files and folders matching these globs
#   - "node_modules"
#   - "*.tmp"
# includeHidden: false           # Include dot-files and dot-folders
# maxFileSize: 104857600         # Skip files larger than this many bytes
# maxFiles: 100                  # Analyze at most this many files

# ── Move ─────────────────────────────────────────────────────────

# dryRun: false                  # Plan moves without touching files
# overwrite: false               # Replace existing files instead of adding " (2)"
# unsortedFolder: _unsorted      # Folder for files the taxonomy did not place

# ── Cache ────────────────────────────────────────────────────────

# cache:
#   read: true                   # false ignores existing entries (like --no-cache)
#   write: true                  # false never stores results

# ── AI ───────────────────────────────────────────────────────────

# ai:
#   provider: ollama             # openai | anthropic | ollama
#   model: llama3.1              # Model used for every file type
#   baseUrl: http://localhost:11434
#   apiKeyEnv: OPENAI_API_KEY    # Environment variable holding the API key
#   timeout: 120                 # Request timeout in seconds
#   verifyConnectivity: true     # Probe each provider before analysis
#
#   # Route file types to different models (replaces provider/model above)
#   models:
#     - name: vision
#       provider: openai
#       model: gpt-4o-mini
#       capabilities: [image, text]
#     - name: local
#       provider: ollama
#       model: llama3.1
#       capabilities: [text, application]
`;

/** Default configuration file name */
export const DEFAULT_CONFIG_FILENAME = 'tidyfold.config.yaml';

// ============================================================================
// Command Execution
// ============================================================================

/**
 * Options for the `tidyfold init` command.
 */
export interface InitCommandOptions {
    /** Output file path (default: tidyfold.config.yaml in cwd) */
    output?: string;
    /** Overwrite existing file without prompting */
    force: boolean;
    verbose: boolean;
}

/**
 * Execute the `tidyfold init` command.
 *
 * @returns Exit code (0 = success, 1 = error)
 */
export async function executeInit(options: InitCommandOptions): Promise<number> {
    let outputPath = path.resolve(options.output || DEFAULT_CONFIG_FILENAME);

    // An existing directory or a trailing separator gets the default file name
    const endsWithSep = options.output?.endsWith('/') || options.output?.endsWith(path.sep);
    if (endsWithSep || (fs.existsSync(outputPath) && fs.statSync(outputPath).isDirectory())) {
        outputPath = path.join(outputPath, DEFAULT_CONFIG_FILENAME);
    }

    if (options.verbose) {
        printInfo(`Writing config template to ${outputPath}`);
    }

    if (fs.existsSync(outputPath) && !options.force) {
        printError(`File already exists: ${outputPath}`);
        printInfo('Use --force to overwrite the existing file.');
        return EXIT_CODES.EXECUTION_ERROR;
    }

    try {
        fs.mkdirSync(path.dirname(outputPath), { recursive: true });
        fs.writeFileSync(outputPath, CONFIG_TEMPLATE, 'utf-8');
        printSuccess(`Created config template: ${outputPath}`);
        return EXIT_CODES.SUCCESS;
    } catch (e) {
        printError(`Failed to write config file: ${getErrorMessage(e)}`);
        return EXIT_CODES.EXECUTION_ERROR;
    }
}
