/**
 * Stage 5: Move
 *
 * Moves every assigned file to `<destination>/<targetPath>/<proposedName><ext>`.
 * Name collisions get ` (2)`, ` (3)`, ... suffixes unless overwriting is
 * enabled. A dry run plans the same operations without touching the disk.
 * Per-file failures are recorded on the operation; the stage itself only
 * fails on bad input.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    fingerprintBytes,
    getErrorMessage,
    getLogger,
    isErrnoException,
    LogCategory,
} from '@tidyfold/organizer-core';
import type { Fingerprint, Logger, WholeStageDefinition } from '@tidyfold/organizer-core';
import { moveResultCodec } from './codecs';
import type { FileAssignment, MoveOperation, MoveResult, TaxonomyResult } from '../types';

export const MOVE_STAGE_ID = 'stage5';

export interface MoveOptions {
    destination: string;
    dryRun: boolean;
    overwrite: boolean;
    logger?: Logger;
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Choose the destination path for one assignment.
 *
 * @param reserved - Destinations already claimed by earlier operations; updated
 */
export function planDestination(
    assignment: FileAssignment,
    destinationRoot: string,
    reserved: Set<string>,
    overwrite: boolean
): string {
    const directory = path.join(destinationRoot, ...assignment.targetPath.split('/'));
    const extension = path.extname(assignment.path);

    let candidate = path.join(directory, `${assignment.proposedName}${extension}`);
    if (!overwrite) {
        let counter = 2;
        while (reserved.has(candidate) || (candidate !== assignment.path && fs.existsSync(candidate))) {
            candidate = path.join(directory, `${assignment.proposedName} (${counter})${extension}`);
            counter++;
        }
    }

    reserved.add(candidate);
    return candidate;
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Move a file, falling back to copy + unlink across devices.
 */
export function moveFile(source: string, destination: string): void {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    try {
        fs.renameSync(source, destination);
    } catch (error) {
        if (isErrnoException(error) && error.code === 'EXDEV') {
            fs.copyFileSync(source, destination);
            fs.unlinkSync(source);
            return;
        }
        throw error;
    }
}

/**
 * Build the stage-5 result, moving files unless `dryRun` is set.
 */
export function executeMoves(taxonomy: TaxonomyResult, options: MoveOptions): MoveResult {
    const logger = options.logger ?? getLogger();
    const destinationRoot = path.resolve(options.destination);
    const reserved = new Set<string>();
    const operations: MoveOperation[] = [];

    for (const assignment of taxonomy.assignments) {
        const destination = planDestination(assignment, destinationRoot, reserved, options.overwrite);
        const operation: MoveOperation = { source: assignment.path, destination, status: 'planned' };
        operations.push(operation);

        if (destination === assignment.path) {
            operation.status = 'skipped';
            operation.message = 'Already in place';
            continue;
        }
        if (!fs.existsSync(assignment.path)) {
            operation.status = 'skipped';
            operation.message = 'Source no longer exists';
            continue;
        }
        if (options.dryRun) {
            continue;
        }

        try {
            moveFile(assignment.path, destination);
            operation.status = 'moved';
            logger.debug(LogCategory.PIPELINE, `Moved ${assignment.path} -> ${destination}`);
        } catch (error) {
            operation.status = 'failed';
            operation.message = getErrorMessage(error);
            logger.warn(LogCategory.PIPELINE, `Failed to move ${assignment.path}: ${operation.message}`);
        }
    }

    return {
        destinationRoot,
        dryRun: options.dryRun,
        operations,
        moved: operations.filter(op => op.status === 'moved').length,
        skipped: operations.filter(op => op.status === 'skipped').length,
        failed: operations.filter(op => op.status === 'failed').length,
    };
}

/**
 * Live fingerprint: the taxonomy plus the options that shape the moves.
 */
export function moveFingerprint(taxonomy: TaxonomyResult, options: MoveOptions): Fingerprint {
    return fingerprintBytes(JSON.stringify({
        taxonomy,
        destination: path.resolve(options.destination),
        dryRun: options.dryRun,
        overwrite: options.overwrite,
    }));
}

export function createMoveStage(options: MoveOptions): WholeStageDefinition<TaxonomyResult, MoveResult> {
    return {
        id: MOVE_STAGE_ID,
        codec: moveResultCodec,
        fingerprint: taxonomy => moveFingerprint(taxonomy, options),
        compute: taxonomy => executeMoves(taxonomy, options),
    };
}
