/**
 * tidyfold Types
 *
 * Stage result types for the five-stage organize pipeline, plus the
 * configuration file schema and command option types.
 *
 * Every stage result is plain JSON so it can be cached as-is; the codecs in
 * `stages/codecs.ts` validate the shape when a cached result is read back.
 */

// ============================================================================
// Stage 1: Scan
// ============================================================================

/**
 * One file found under the source directory.
 */
export interface FileRecord {
    /** Absolute path */
    path: string;
    /** Path relative to the source directory, always `/`-separated */
    relativePath: string;
    /** Base name including extension */
    name: string;
    /** Lower-cased extension including the dot, or '' */
    extension: string;
    size: number;
    mtimeMs: number;
    mimeType: string;
    /** Top-level MIME type: text, image, audio, video, application */
    category: string;
}

/**
 * A file left out of the scan by a rule that the user may want to see.
 */
export interface ExcludedFile {
    path: string;
    relativePath: string;
    size: number;
    rule: 'size-limit';
}

export interface ScanError {
    path: string;
    message: string;
}

export interface ScanResult {
    sourceDirectory: string;
    /** Sorted by relativePath */
    files: FileRecord[];
    excluded: ExcludedFile[];
    errors: ScanError[];
    /** Sorted, de-duplicated */
    uniqueMimeTypes: string[];
}

// ============================================================================
// Stage 2: Model Discovery
// ============================================================================

export type AIProvider = 'openai' | 'anthropic' | 'ollama';

export type ModelCapability = 'text' | 'image' | 'audio' | 'video' | 'application';

/**
 * A model the pipeline may route files to.
 */
export interface ModelInfo {
    /** Unique name used in mappings and reports */
    name: string;
    provider: AIProvider;
    /** Provider-side model id */
    model: string;
    capabilities: ModelCapability[];
}

export interface DiscoveryResult {
    models: ModelInfo[];
    /** MIME type → model name */
    mimeToModel: Record<string, string>;
    /** Model name → answered the connectivity probe */
    connectivity: Record<string, boolean>;
}

// ============================================================================
// Stage 3: Analysis
// ============================================================================

export interface FileAnalysis {
    /** Absolute path of the analysed file (the item identity) */
    path: string;
    /** Model name that produced the analysis */
    model: string;
    /** Proposed base name without extension */
    proposedName: string;
    description: string;
    tags: string[];
    analyzedAt: string;
}

export interface ItemError {
    path: string;
    message: string;
}

export interface AnalysisResult {
    /** Sorted by path */
    analyses: FileAnalysis[];
    /** Sorted by path */
    errors: ItemError[];
}

// ============================================================================
// Stage 4: Taxonomy
// ============================================================================

export interface TaxonomyNode {
    /** `/`-separated category path, e.g. `Documents/Invoices` */
    path: string;
    /** Last path segment */
    name: string;
    description: string;
}

export interface FileAssignment {
    /** Absolute source path */
    path: string;
    /** Category path the file belongs to */
    targetPath: string;
    /** Proposed base name without extension */
    proposedName: string;
    reasoning: string;
}

export interface TaxonomyResult {
    /** Sorted by path; every node's ancestors are present */
    nodes: TaxonomyNode[];
    /** One per analysed file, sorted by path */
    assignments: FileAssignment[];
}

// ============================================================================
// Stage 5: Move
// ============================================================================

export type MoveStatus = 'moved' | 'planned' | 'skipped' | 'failed';

export interface MoveOperation {
    source: string;
    destination: string;
    status: MoveStatus;
    /** Why the operation was skipped or failed */
    message?: string;
}

export interface MoveResult {
    destinationRoot: string;
    dryRun: boolean;
    operations: MoveOperation[];
    moved: number;
    skipped: number;
    failed: number;
}

// ============================================================================
// Configuration File
// ============================================================================

export interface ModelConfig {
    name: string;
    provider: AIProvider;
    model: string;
    capabilities: ModelCapability[];
}

export interface AIConfig {
    /** Provider for the default model */
    provider?: AIProvider;
    /** Default model id */
    model?: string;
    /** Provider endpoint override */
    baseUrl?: string;
    /** Environment variable holding the API key */
    apiKeyEnv?: string;
    /** Request timeout in seconds */
    timeout?: number;
    /** Probe each model during stage 2. Default: true */
    verifyConnectivity?: boolean;
    /** Models to route files to; defaults to the default model for every category */
    models?: ModelConfig[];
}

export interface CacheConfig {
    /** Consult existing entries. Default: true */
    read?: boolean;
    /** Store fresh results. Default: true */
    write?: boolean;
}

/**
 * Shape of `tidyfold.config.yaml`.
 */
export interface TidyfoldConfigFile {
    source?: string;
    destination?: string;
    cacheDir?: string;
    include?: string[];
    exclude?: string[];
    includeHidden?: boolean;
    /** Bytes; larger files are excluded from the scan */
    maxFileSize?: number;
    dryRun?: boolean;
    overwrite?: boolean;
    /** Category for files the taxonomy leaves unassigned */
    unsortedFolder?: string;
    maxFiles?: number;
    cache?: CacheConfig;
    ai?: AIConfig;
}

// ============================================================================
// Command Options
// ============================================================================

/**
 * Options for `tidyfold run`, after CLI flags and the config file are merged.
 */
export interface RunCommandOptions {
    source?: string;
    destination?: string;
    /** Explicit config file path */
    config?: string;
    cacheDir?: string;
    /** False under --no-cache */
    cacheRead: boolean;
    /** False under --no-cache-write */
    cacheWrite: boolean;
    /** Stage id or `all` */
    clearCache?: string;
    cacheStats: boolean;
    /** Lowest skipped stage number (2-5); the chain stops before it */
    skipFrom?: number;
    include: string[];
    exclude: string[];
    includeHidden: boolean;
    maxFileSize?: number;
    dryRun: boolean;
    overwrite: boolean;
    unsortedFolder: string;
    maxFiles?: number;
    provider?: AIProvider;
    model?: string;
    ai?: AIConfig;
    verbose: boolean;
}
