/**
 * Stage 4: Taxonomy
 *
 * One AI call over every analysed file: the model proposes a hierarchy of
 * category paths and assigns each file (by 1-based index) to one of them.
 * The reply is normalised into a closed tree: every node's ancestors exist,
 * every file has exactly one assignment, and files the model left out go to
 * the unsorted folder.
 */

import * as path from 'path';
import { fingerprintBytes, parseJSONObject } from '@tidyfold/organizer-core';
import type { Fingerprint, WholeStageDefinition } from '@tidyfold/organizer-core';
import type { AIClient } from '../ai/ai-client';
import { taxonomyResultCodec } from './codecs';
import type {
    AnalysisResult,
    FileAnalysis,
    FileAssignment,
    ModelInfo,
    TaxonomyNode,
    TaxonomyResult,
} from '../types';

export const TAXONOMY_STAGE_ID = 'stage4';

export const DEFAULT_UNSORTED_FOLDER = '_unsorted';

export interface TaxonomyOptions {
    /** Model used for the taxonomy call; undefined when none is available */
    model?: ModelInfo;
    client: AIClient;
    unsortedFolder: string;
    /** Request timeout in ms */
    timeoutMs?: number;
}

// ============================================================================
// Prompt
// ============================================================================

/**
 * Build the taxonomy prompt. Files are numbered from 1 in the order given.
 */
export function buildTaxonomyPrompt(analyses: readonly FileAnalysis[]): string {
    let prompt = `You are an expert at creating taxonomic organizational systems for files.

Your task is to analyze the provided files and create a hierarchical directory structure that logically organizes them.

Guidelines:
1. Create a multi-level hierarchy where it helps (not just category/subcategory)
2. Use clear, descriptive category names
3. Group related items together
4. Broader categories contain narrower ones

Files to Organize (${analyses.length} files):

`;

    analyses.forEach((analysis, i) => {
        prompt += `${i + 1}. File: ${path.basename(analysis.path)}
   Description: ${analysis.description || 'N/A'}
   Tags: ${analysis.tags.join(', ')}

`;
    });

    prompt += `Please respond with a JSON object containing:
1. "taxonomy": Array of category objects with:
   - "path": Full path using "/" (e.g., "Documents/Work/Reports")
   - "description": What files belong here

2. "assignments": Array of file assignments with:
   - "file_index": Index of the file (1-based from the list above)
   - "target_path": The category path where it belongs
   - "reasoning": Brief explanation why it goes there

Example response:
{
  "taxonomy": [
    { "path": "Photos", "description": "All photographic images" },
    { "path": "Photos/Nature", "description": "Landscapes, wildlife, and outdoor scenes" }
  ],
  "assignments": [
    { "file_index": 1, "target_path": "Photos/Nature", "reasoning": "Image of a mountain lake" }
  ]
}

Important:
- Each file must be assigned to exactly one category
- Categories should form a proper tree
- Use descriptive, professional category names
`;

    return prompt;
}

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Normalise a category path: `/`-separated, segments trimmed, empty and `.`
 * segments dropped, characters invalid in file names replaced.
 *
 * @returns The normalised path, or undefined when it is empty or contains `..`
 */
export function normalizeCategoryPath(raw: string): string | undefined {
    const segments: string[] = [];
    for (const part of raw.replace(/\\/g, '/').split('/')) {
        const segment = part.trim().replace(/[<>:"|?*\u0000-\u001f]/g, '-');
        if (segment === '' || segment === '.') {
            continue;
        }
        if (segment === '..') {
            return undefined;
        }
        segments.push(segment);
    }
    return segments.length > 0 ? segments.join('/') : undefined;
}

/**
 * Build a closed taxonomy from the model's raw reply.
 *
 * @param raw - Parsed reply object
 * @param analyses - Files in prompt order (index 0 is file_index 1)
 */
export function buildTaxonomy(
    raw: Record<string, unknown>,
    analyses: readonly FileAnalysis[],
    unsortedFolder: string
): TaxonomyResult {
    const nodes = new Map<string, TaxonomyNode>();
    const unsorted = normalizeCategoryPath(unsortedFolder) ?? DEFAULT_UNSORTED_FOLDER;

    function addNode(nodePath: string, description: string): void {
        const segments = nodePath.split('/');
        for (let depth = 1; depth <= segments.length; depth++) {
            const current = segments.slice(0, depth).join('/');
            const existing = nodes.get(current);
            const text = depth === segments.length ? description : '';
            if (!existing) {
                nodes.set(current, { path: current, name: segments[depth - 1], description: text });
            } else if (existing.description === '' && text !== '') {
                existing.description = text;
            }
        }
    }

    if (Array.isArray(raw.taxonomy)) {
        for (const entry of raw.taxonomy) {
            if (!isRecord(entry) || typeof entry.path !== 'string') {
                continue;
            }
            const nodePath = normalizeCategoryPath(entry.path);
            if (nodePath !== undefined) {
                addNode(nodePath, typeof entry.description === 'string' ? entry.description.trim() : '');
            }
        }
    }

    const assigned = new Map<number, FileAssignment>();
    if (Array.isArray(raw.assignments)) {
        for (const entry of raw.assignments) {
            if (!isRecord(entry)) {
                continue;
            }
            const index = toFileIndex(entry.file_index);
            if (index === undefined || index < 1 || index > analyses.length || assigned.has(index)) {
                continue;
            }
            const target = typeof entry.target_path === 'string' ? normalizeCategoryPath(entry.target_path) : undefined;
            if (target === undefined) {
                continue;
            }
            const analysis = analyses[index - 1];
            addNode(target, '');
            assigned.set(index, {
                path: analysis.path,
                targetPath: target,
                proposedName: analysis.proposedName,
                reasoning: typeof entry.reasoning === 'string' ? entry.reasoning.trim() : '',
            });
        }
    }

    const assignments: FileAssignment[] = [];
    analyses.forEach((analysis, i) => {
        const assignment = assigned.get(i + 1);
        if (assignment) {
            assignments.push(assignment);
            return;
        }
        addNode(unsorted, 'Files the taxonomy did not place');
        assignments.push({
            path: analysis.path,
            targetPath: unsorted,
            proposedName: analysis.proposedName,
            reasoning: 'No category assigned',
        });
    });

    return {
        nodes: [...nodes.values()].sort((a, b) => compareStrings(a.path, b.path)),
        assignments: assignments.sort((a, b) => compareStrings(a.path, b.path)),
    };
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Build the stage-4 result from the stage-3 aggregate.
 *
 * @throws Error when no model is available or the reply is unusable
 */
export async function buildFileTaxonomy(analysis: AnalysisResult, options: TaxonomyOptions): Promise<TaxonomyResult> {
    if (analysis.analyses.length === 0) {
        return { nodes: [], assignments: [] };
    }
    if (!options.model) {
        throw new Error('No reachable text model is configured for the taxonomy');
    }

    const invoke = options.client.invoker(options.model.provider);
    const result = await invoke(buildTaxonomyPrompt(analysis.analyses), {
        model: options.model.model,
        timeoutMs: options.timeoutMs,
    });
    if (!result.success || result.response === undefined) {
        throw new Error(result.error || 'AI request failed');
    }

    return buildTaxonomy(parseJSONObject(result.response), analysis.analyses, options.unsortedFolder);
}

/**
 * Live fingerprint: the content of the stage-3 analyses plus the settings
 * that shape the tree. `analyzedAt` is left out, so re-analysing a file with
 * the same outcome keeps the taxonomy cached.
 */
export function taxonomyFingerprint(analysis: AnalysisResult, options: TaxonomyOptions): Fingerprint {
    return fingerprintBytes(JSON.stringify({
        analyses: analysis.analyses.map(a => ({
            path: a.path,
            model: a.model,
            proposedName: a.proposedName,
            description: a.description,
            tags: a.tags,
        })),
        unsortedFolder: options.unsortedFolder,
        model: options.model?.name ?? null,
    }));
}

export function createTaxonomyStage(options: TaxonomyOptions): WholeStageDefinition<AnalysisResult, TaxonomyResult> {
    return {
        id: TAXONOMY_STAGE_ID,
        codec: taxonomyResultCodec,
        fingerprint: analysis => taxonomyFingerprint(analysis, options),
        compute: analysis => buildFileTaxonomy(analysis, options),
    };
}

// ============================================================================
// Helpers
// ============================================================================

function toFileIndex(value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isInteger(value)) {
        return value;
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
        return parseInt(value.trim(), 10);
    }
    return undefined;
}

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
