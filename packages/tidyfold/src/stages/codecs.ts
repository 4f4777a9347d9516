/**
 * Stage Result Codecs
 *
 * One schema-versioned codec per stage result. Bump a codec's version when
 * its result type changes shape; older cache entries then decode as corrupt
 * and are recomputed.
 */

import { check, createJsonCodec } from '@tidyfold/organizer-core';
import type { Codec } from '@tidyfold/organizer-core';
import type {
    AIProvider,
    DiscoveryResult,
    ExcludedFile,
    FileAnalysis,
    FileAssignment,
    FileRecord,
    ModelCapability,
    ModelInfo,
    MoveOperation,
    MoveResult,
    MoveStatus,
    ScanError,
    ScanResult,
    TaxonomyNode,
    TaxonomyResult,
} from '../types';

// ============================================================================
// Stage 1
// ============================================================================

function decodeFileRecord(value: unknown, field: string): FileRecord {
    const obj = check.object(value, field);
    return {
        path: check.string(obj.path, `${field}.path`),
        relativePath: check.string(obj.relativePath, `${field}.relativePath`),
        name: check.string(obj.name, `${field}.name`),
        extension: check.string(obj.extension, `${field}.extension`),
        size: check.number(obj.size, `${field}.size`),
        mtimeMs: check.number(obj.mtimeMs, `${field}.mtimeMs`),
        mimeType: check.string(obj.mimeType, `${field}.mimeType`),
        category: check.string(obj.category, `${field}.category`),
    };
}

function decodeExcludedFile(value: unknown, field: string): ExcludedFile {
    const obj = check.object(value, field);
    if (obj.rule !== 'size-limit') {
        throw new Error(`"${field}.rule" must be "size-limit"`);
    }
    return {
        path: check.string(obj.path, `${field}.path`),
        relativePath: check.string(obj.relativePath, `${field}.relativePath`),
        size: check.number(obj.size, `${field}.size`),
        rule: obj.rule,
    };
}

function decodePathMessage(value: unknown, field: string): ScanError {
    const obj = check.object(value, field);
    return {
        path: check.string(obj.path, `${field}.path`),
        message: check.string(obj.message, `${field}.message`),
    };
}

export const scanResultCodec: Codec<ScanResult> = createJsonCodec(1, data => {
    const obj = check.object(data, 'scan');
    return {
        sourceDirectory: check.string(obj.sourceDirectory, 'sourceDirectory'),
        files: check.array(obj.files, 'files').map((f, i) => decodeFileRecord(f, `files[${i}]`)),
        excluded: check.array(obj.excluded, 'excluded').map((f, i) => decodeExcludedFile(f, `excluded[${i}]`)),
        errors: check.array(obj.errors, 'errors').map((e, i) => decodePathMessage(e, `errors[${i}]`)),
        uniqueMimeTypes: check.stringArray(obj.uniqueMimeTypes, 'uniqueMimeTypes'),
    };
});

// ============================================================================
// Stage 2
// ============================================================================

const PROVIDERS: readonly AIProvider[] = ['openai', 'anthropic', 'ollama'];
const CAPABILITIES: readonly ModelCapability[] = ['text', 'image', 'audio', 'video', 'application'];

function decodeProvider(value: unknown, field: string): AIProvider {
    const provider = PROVIDERS.find(p => p === value);
    if (provider === undefined) {
        throw new Error(`"${field}" must be one of: ${PROVIDERS.join(', ')}`);
    }
    return provider;
}

function decodeCapability(value: unknown, field: string): ModelCapability {
    const capability = CAPABILITIES.find(c => c === value);
    if (capability === undefined) {
        throw new Error(`"${field}" must be one of: ${CAPABILITIES.join(', ')}`);
    }
    return capability;
}

function decodeModelInfo(value: unknown, field: string): ModelInfo {
    const obj = check.object(value, field);
    return {
        name: check.string(obj.name, `${field}.name`),
        provider: decodeProvider(obj.provider, `${field}.provider`),
        model: check.string(obj.model, `${field}.model`),
        capabilities: check.array(obj.capabilities, `${field}.capabilities`)
            .map((c, i) => decodeCapability(c, `${field}.capabilities[${i}]`)),
    };
}

export const discoveryResultCodec: Codec<DiscoveryResult> = createJsonCodec(1, data => {
    const obj = check.object(data, 'discovery');
    return {
        models: check.array(obj.models, 'models').map((m, i) => decodeModelInfo(m, `models[${i}]`)),
        mimeToModel: check.stringRecord(obj.mimeToModel, 'mimeToModel', check.string),
        connectivity: check.stringRecord(obj.connectivity, 'connectivity', check.boolean),
    };
});

// ============================================================================
// Stage 3
// ============================================================================

/**
 * Per-item codec: one cache entry per analysed file.
 */
export const fileAnalysisCodec: Codec<FileAnalysis> = createJsonCodec(1, data => {
    const obj = check.object(data, 'analysis');
    return {
        path: check.string(obj.path, 'path'),
        model: check.string(obj.model, 'model'),
        proposedName: check.string(obj.proposedName, 'proposedName'),
        description: check.string(obj.description, 'description'),
        tags: check.stringArray(obj.tags, 'tags'),
        analyzedAt: check.string(obj.analyzedAt, 'analyzedAt'),
    };
});

// ============================================================================
// Stage 4
// ============================================================================

function decodeTaxonomyNode(value: unknown, field: string): TaxonomyNode {
    const obj = check.object(value, field);
    return {
        path: check.string(obj.path, `${field}.path`),
        name: check.string(obj.name, `${field}.name`),
        description: check.string(obj.description, `${field}.description`),
    };
}

function decodeAssignment(value: unknown, field: string): FileAssignment {
    const obj = check.object(value, field);
    return {
        path: check.string(obj.path, `${field}.path`),
        targetPath: check.string(obj.targetPath, `${field}.targetPath`),
        proposedName: check.string(obj.proposedName, `${field}.proposedName`),
        reasoning: check.string(obj.reasoning, `${field}.reasoning`),
    };
}

export const taxonomyResultCodec: Codec<TaxonomyResult> = createJsonCodec(1, data => {
    const obj = check.object(data, 'taxonomy');
    return {
        nodes: check.array(obj.nodes, 'nodes').map((n, i) => decodeTaxonomyNode(n, `nodes[${i}]`)),
        assignments: check.array(obj.assignments, 'assignments')
            .map((a, i) => decodeAssignment(a, `assignments[${i}]`)),
    };
});

// ============================================================================
// Stage 5
// ============================================================================

const MOVE_STATUSES: readonly MoveStatus[] = ['moved', 'planned', 'skipped', 'failed'];

function decodeMoveOperation(value: unknown, field: string): MoveOperation {
    const obj = check.object(value, field);
    const status = MOVE_STATUSES.find(s => s === obj.status);
    if (status === undefined) {
        throw new Error(`"${field}.status" must be one of: ${MOVE_STATUSES.join(', ')}`);
    }
    const operation: MoveOperation = {
        source: check.string(obj.source, `${field}.source`),
        destination: check.string(obj.destination, `${field}.destination`),
        status,
    };
    const message = check.optionalString(obj.message, `${field}.message`);
    if (message !== undefined) {
        operation.message = message;
    }
    return operation;
}

export const moveResultCodec: Codec<MoveResult> = createJsonCodec(1, data => {
    const obj = check.object(data, 'move');
    return {
        destinationRoot: check.string(obj.destinationRoot, 'destinationRoot'),
        dryRun: check.boolean(obj.dryRun, 'dryRun'),
        operations: check.array(obj.operations, 'operations').map((o, i) => decodeMoveOperation(o, `operations[${i}]`)),
        moved: check.number(obj.moved, 'moved'),
        skipped: check.number(obj.skipped, 'skipped'),
        failed: check.number(obj.failed, 'failed'),
    };
});
