/**
 * Stage Module
 */

export { createJsonCodec, check, isPlainRecord } from './codec';
export type { Codec, Validator } from './codec';
export { StageRunner, compareIdentity } from './stage-runner';
export type {
    StageRunnerOptions,
    WholeStageDefinition,
    StageRunResult,
    ItemStageDefinition,
    ItemOutcome,
    ItemFailure,
    ItemProgress,
    ItemStageHooks,
    ItemStageRunResult,
} from './stage-runner';
