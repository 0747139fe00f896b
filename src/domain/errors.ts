/**
 * Error types raised by the board model and the search engines
 */

import { Direction } from './types.js';

export class HuaRongDaoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The board violates the occupancy or piece-multiset invariants
 */
export class InvalidBoardError extends HuaRongDaoError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid board: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * A move would leave the grid, overlap another piece, or names no piece
 */
export class IllegalMoveError extends HuaRongDaoError {
  readonly pieceId: number;
  readonly direction: Direction;
  readonly reason: string;

  constructor(pieceId: number, direction: Direction, reason: string) {
    super(`Illegal move: piece ${pieceId} ${direction}: ${reason}`);
    this.pieceId = pieceId;
    this.direction = direction;
    this.reason = reason;
  }
}

export class NoSolutionError extends HuaRongDaoError {
  readonly nodesExpanded: number;

  constructor(nodesExpanded: number) {
    super(`No solution: search space exhausted after ${nodesExpanded} expansions`);
    this.nodesExpanded = nodesExpanded;
  }
}

export type AbortReason = 'EXPANSION_LIMIT' | 'TIME_LIMIT';

export class SearchAbortedError extends HuaRongDaoError {
  readonly reason: AbortReason;
  readonly nodesExpanded: number;

  constructor(reason: AbortReason, nodesExpanded: number) {
    const detail = reason === 'EXPANSION_LIMIT' ? 'expansion limit reached' : 'time limit reached';
    super(`Search aborted: ${detail} after ${nodesExpanded} expansions`);
    this.reason = reason;
    this.nodesExpanded = nodesExpanded;
  }
}
