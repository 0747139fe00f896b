/**
 * Core type definitions for the Hua Rong Dao solver
 */

// Piece kinds and their footprints
export type PieceKind =
  | 'SQUARE'      // 2x2
  | 'HORIZONTAL'  // 1 row x 2 cols
  | 'VERTICAL'    // 2 rows x 1 col
  | 'SINGLE';     // 1x1

export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

// Direction priority used by move generation
export const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

export type Algorithm = 'DFS' | 'ASTAR';

// Coordinate on the grid, 0-indexed with row 0 at the top
export interface Coord {
  row: number;
  col: number;
}

// A placed piece; the anchor is its top-left cell
export interface Piece {
  readonly id: number;
  readonly kind: PieceKind;
  readonly anchor: Coord;
}

// Piece description before ids are assigned
export interface PieceInput {
  kind: PieceKind;
  anchor: Coord;
}

export interface Move {
  pieceId: number;
  direction: Direction;
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Search statistics
export interface SearchStats {
  nodesExpanded: number;
  nodesGenerated: number;
  maxFrontierSize: number;
  timeTaken: number;
}

// Hard limits on a single search
export interface SearchLimits {
  maxExpansions: number;
  maxTime: number;
}

// Solver options
export interface SolverOptions extends SearchLimits {
  pruneSymmetric: boolean;
  // DFS keeps searching until its path is a shortest one
  optimalDfs: boolean;
}

export function coordKey(c: Coord): string {
  return `${c.row},${c.col}`;
}

export function coordsEqual(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattanDistance(a: Coord, b: Coord): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function offsetCoord(c: Coord, direction: Direction): Coord {
  switch (direction) {
    case 'UP':
      return { row: c.row - 1, col: c.col };
    case 'DOWN':
      return { row: c.row + 1, col: c.col };
    case 'LEFT':
      return { row: c.row, col: c.col - 1 };
    case 'RIGHT':
      return { row: c.row, col: c.col + 1 };
  }
}

export function getAdjacentCoords(c: Coord): Coord[] {
  return DIRECTIONS.map(direction => offsetCoord(c, direction));
}

export function oppositeDirection(direction: Direction): Direction {
  switch (direction) {
    case 'UP':
      return 'DOWN';
    case 'DOWN':
      return 'UP';
    case 'LEFT':
      return 'RIGHT';
    case 'RIGHT':
      return 'LEFT';
  }
}
