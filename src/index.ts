/**
 * Hua Rong Dao Solver
 *
 * State-space search for the 4x5 Hua Rong Dao sliding-block puzzle:
 * depth-first search and A* over an immutable board model.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/board.js';
export * from './state/board-hash.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/board-parser.js';
export * from './io/solution-formatter.js';
