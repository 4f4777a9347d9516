/**
 * Stages Module
 *
 * The five organize stages. Each is a plain function of its input, wrapped
 * in a stage definition the StageRunner caches.
 */

export * from './scan';
export * from './discover';
export * from './analyze';
export * from './taxonomy';
export * from './move';
export * from './codecs';
