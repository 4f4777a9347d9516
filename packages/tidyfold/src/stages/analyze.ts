/**
 * Stage 3: Analysis
 *
 * Asks the model mapped to each file's MIME type for a proposed name, a
 * description and tags. Runs per item: every file is its own cache entry,
 * keyed by path and invalidated by the file's size and mtime.
 *
 * The item fingerprint is the file's alone: changing `ai.models` does not
 * invalidate earlier analyses, which keep the model name they were made with.
 * Run with `--clear-cache stage3` to re-analyse under a new model setup.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fingerprintFile, parseJSONObject } from '@tidyfold/organizer-core';
import type { ItemStageDefinition } from '@tidyfold/organizer-core';
import type { AIClient } from '../ai/ai-client';
import { fileAnalysisCodec } from './codecs';
import type { DiscoveryResult, FileAnalysis, FileRecord } from '../types';

export const ANALYZE_STAGE_ID = 'stage3';

/** Bytes of a text file included in the prompt */
export const TEXT_EXCERPT_BYTES = 2000;

export const MAX_NAME_LENGTH = 50;

const MAX_TAGS = 10;

export interface AnalyzeOptions {
    discovery: DiscoveryResult;
    client: AIClient;
    /** Per-request timeout in ms */
    timeoutMs?: number;
    /** Clock for `analyzedAt` */
    now?: () => Date;
}

// ============================================================================
// Prompt
// ============================================================================

/**
 * Build the analysis prompt for one file.
 *
 * @param excerpt - Leading text of the file, for text files
 */
export function buildAnalysisPrompt(file: FileRecord, excerpt?: string): string {
    let prompt = `You are analyzing a file for organization purposes. Please analyze this file and provide:

1. A proposed new filename (descriptive, concise, keep extension)
2. A detailed description of the file's contents
3. Relevant tags/keywords for categorization

File Information:
- Current filename: ${file.name}
- MIME type: ${file.mimeType}
- File size: ${file.size} bytes
`;

    if (excerpt !== undefined && excerpt.trim() !== '') {
        prompt += `
Beginning of the file:
\`\`\`
${excerpt}
\`\`\`
`;
    }

    prompt += `
Please respond in JSON format with the following structure:
{
  "proposed_filename": "descriptive-name-with-extension",
  "description": "Detailed description of what's in this file",
  "tags": ["tag1", "tag2", "tag3"]
}

Important:
- Keep the original file extension
- Make the filename descriptive but concise (max ${MAX_NAME_LENGTH} chars)
- Description should be 2-3 sentences
- Provide 3-7 relevant tags
- Tags should be lowercase, single words or hyphenated phrases
`;

    return prompt;
}

/**
 * Leading text of a text file, or undefined for other categories.
 */
export function readTextExcerpt(file: FileRecord, maxBytes: number = TEXT_EXCERPT_BYTES): string | undefined {
    if (file.category !== 'text') {
        return undefined;
    }
    const fd = fs.openSync(file.path, 'r');
    try {
        const buffer = Buffer.alloc(Math.min(maxBytes, file.size));
        const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
        return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
        fs.closeSync(fd);
    }
}

// ============================================================================
// Response Parsing
// ============================================================================

export interface ParsedAnalysis {
    proposedName: string;
    description: string;
    tags: string[];
}

/**
 * Parse the model's reply for one file.
 *
 * @throws Error when the reply has no JSON object or misses required fields
 */
export function parseAnalysisResponse(response: string, file: FileRecord): ParsedAnalysis {
    const obj = parseJSONObject(response);

    const proposed = obj.proposed_filename;
    if (typeof proposed !== 'string') {
        throw new Error('Response is missing "proposed_filename"');
    }
    if (typeof obj.description !== 'string') {
        throw new Error('Response is missing "description"');
    }

    return {
        proposedName: sanitizeName(proposed, file),
        description: obj.description.trim(),
        tags: normalizeTags(obj.tags),
    };
}

/**
 * Turn a proposed file name into a safe base name without extension.
 * Falls back to the current base name when nothing usable remains.
 */
export function sanitizeName(proposed: string, file: FileRecord): string {
    let name = path.basename(proposed.replace(/\\/g, '/'));
    const extension = path.extname(name);
    if (extension !== '' && extension.toLowerCase() === file.extension) {
        name = name.slice(0, -extension.length);
    }

    name = name
        .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '-')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/^\.+/, '');

    if (name.length > MAX_NAME_LENGTH) {
        name = name.slice(0, MAX_NAME_LENGTH).trim();
    }

    if (name === '') {
        return path.basename(file.name, path.extname(file.name));
    }
    return name;
}

/**
 * Tags as lower-case, de-duplicated strings. Accepts an array or a
 * comma-separated string.
 */
export function normalizeTags(raw: unknown): string[] {
    let candidates: unknown[] = [];
    if (typeof raw === 'string') {
        candidates = raw.split(',');
    } else if (Array.isArray(raw)) {
        candidates = raw;
    }

    const tags: string[] = [];
    for (const candidate of candidates) {
        if (typeof candidate !== 'string') {
            continue;
        }
        const tag = candidate.trim().toLowerCase();
        if (tag !== '' && !tags.includes(tag)) {
            tags.push(tag);
        }
    }
    return tags.slice(0, MAX_TAGS);
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Analyze one file with the model mapped to its MIME type.
 *
 * @throws Error when no connected model handles the file, the request fails,
 *         or the reply cannot be parsed
 */
export async function analyzeFile(file: FileRecord, options: AnalyzeOptions): Promise<FileAnalysis> {
    const { discovery } = options;
    const modelName = discovery.mimeToModel[file.mimeType];
    const model = modelName !== undefined ? discovery.models.find(m => m.name === modelName) : undefined;
    if (!model) {
        throw new Error(`No model handles ${file.mimeType}`);
    }
    if (!discovery.connectivity[model.name]) {
        throw new Error(`Model ${model.name} is not reachable`);
    }

    const prompt = buildAnalysisPrompt(file, readTextExcerpt(file));
    const invoke = options.client.invoker(model.provider);
    const result = await invoke(prompt, { model: model.model, timeoutMs: options.timeoutMs });
    if (!result.success || result.response === undefined) {
        throw new Error(result.error || 'AI request failed');
    }

    const parsed = parseAnalysisResponse(result.response, file);
    return {
        path: file.path,
        model: model.name,
        proposedName: parsed.proposedName,
        description: parsed.description,
        tags: parsed.tags,
        analyzedAt: (options.now ?? (() => new Date()))().toISOString(),
    };
}

/**
 * Per-item stage definition; the identity is the file's absolute path.
 */
export function createAnalyzeStage(options: AnalyzeOptions): ItemStageDefinition<FileRecord, FileAnalysis> {
    return {
        id: ANALYZE_STAGE_ID,
        itemCodec: fileAnalysisCodec,
        identity: file => file.path,
        fingerprint: file => fingerprintFile(file.path),
        computeItem: file => analyzeFile(file, options),
    };
}
