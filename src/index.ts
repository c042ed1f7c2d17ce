/*
 * Main entry point for the mcts-engine package
 * Re-exports all public APIs
 */

export * from './errors.js';
export * from './mcts-node.js';
export * from './modular/index.js';
export * from './strategies/index.js';
export * from './adapters/selection/index.js';
export * from './utils/random.js';
export * from './utils/mcts-node-utils.js';
export * from './utils/tree-debug.js';
