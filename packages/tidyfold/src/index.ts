#!/usr/bin/env node

/**
 * tidyfold CLI Entry Point
 *
 * Organizes a folder of files into an AI-derived taxonomy. Every stage's
 * result is cached under the cache directory, so an interrupted or repeated
 * run picks up where the last one stopped.
 *
 * Usage:
 *   tidyfold run [source]   Scan, analyze, classify and move files
 *   tidyfold init           Write a tidyfold.config.yaml template
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { createProgram, EXIT_CODES } from './cli';
import { printError } from './logger';

async function main(): Promise<void> {
    try {
        const program = createProgram();
        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof Error) {
            printError(error.message);
        } else {
            printError(String(error));
        }
        process.exit(EXIT_CODES.EXECUTION_ERROR);
    }
}

void main();
