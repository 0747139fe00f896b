/**
 * Heuristic functions for A* search
 */

import { manhattanDistance } from '../domain/types.js';
import { GOAL_ANCHOR } from '../domain/constants.js';
import { Board, getSquare, isGoal } from '../state/board.js';

export type Heuristic<S> = (state: S) => number;

/**
 * Manhattan distance from the 2x2 piece's anchor to the goal anchor
 * Every move slides one piece by one cell, so the 2x2 piece needs at least
 * this many moves; the estimate is admissible and consistent
 */
export function manhattanHeuristic(board: Board): number {
  return manhattanDistance(getSquare(board).anchor, GOAL_ANCHOR);
}

// Turns A* into uniform-cost search
export function zeroHeuristic(): number {
  return 0;
}

export function isGoalState(board: Board): boolean {
  return isGoal(board);
}
