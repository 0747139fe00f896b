/**
 * Constants for the Hua Rong Dao solver
 */

import { Coord, PieceKind, SolverOptions } from './types.js';

// Grid dimensions
export const ROWS = 5;
export const COLS = 4;

// Anchor of the 2x2 piece in a solved board (bottom center)
export const GOAL_ANCHOR: Coord = { row: 3, col: 1 };

export const PIECE_COUNT = 10;
export const EMPTY_CELL_COUNT = 2;

// Footprint size per kind
export const PIECE_SIZE: Record<PieceKind, { height: number; width: number }> = {
  SQUARE: { height: 2, width: 2 },
  HORIZONTAL: { height: 1, width: 2 },
  VERTICAL: { height: 2, width: 1 },
  SINGLE: { height: 1, width: 1 },
};

// Fixed piece multiset; dominoes may be horizontal or vertical in any mix
export const PIECE_MULTISET = {
  SQUARE: 1,
  DOMINO: 5,
  SINGLE: 4,
};

// Labels of the grid text format
export const GRID_LABELS = {
  EMPTY: '0',
  SQUARE: '1',
  DOMINOES: ['2', '3', '4', '5', '6'] as const,
  SINGLE: '7',
};

// Default solver options
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  maxExpansions: 1_000_000,
  maxTime: 60_000, // 60 seconds
  pruneSymmetric: false,
  optimalDfs: false,
};
