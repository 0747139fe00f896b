/**
 * Generate legal moves and successor boards
 */

import { DIRECTIONS, Move, getAdjacentCoords } from '../domain/types.js';
import { Board, applyMove, canMove, getEmptyCells, pieceAt } from '../state/board.js';

export interface Successor {
  move: Move;
  state: Board;
}

/**
 * Ids of pieces orthogonally adjacent to an empty cell, ascending
 * Only these pieces can have a legal move
 */
function findCandidatePieces(board: Board): number[] {
  const candidates = new Set<number>();

  for (const empty of getEmptyCells(board)) {
    for (const adjacent of getAdjacentCoords(empty)) {
      const id = pieceAt(board, adjacent);
      if (id !== null) {
        candidates.add(id);
      }
    }
  }

  return Array.from(candidates).sort((a, b) => a - b);
}

/**
 * Legal moves in a fixed order: piece id ascending, then UP, DOWN, LEFT, RIGHT
 */
export function* generateMoves(board: Board): Generator<Move> {
  for (const pieceId of findCandidatePieces(board)) {
    for (const direction of DIRECTIONS) {
      if (canMove(board, pieceId, direction)) {
        yield { pieceId, direction };
      }
    }
  }
}

export function* generateSuccessors(board: Board): Generator<Successor> {
  for (const move of generateMoves(board)) {
    yield { move, state: applyMove(board, move.pieceId, move.direction) };
  }
}

export function listMoves(board: Board): Move[] {
  return Array.from(generateMoves(board));
}
