/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './problem.js';
export * from './path.js';
export * from './heuristics.js';
export * from './move-generator.js';
export * from './dfs.js';
export * from './astar.js';
export * from './solver.js';
