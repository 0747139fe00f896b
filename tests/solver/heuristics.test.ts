/**
 * Tests for heuristics
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { manhattanHeuristic, zeroHeuristic, isGoalState } from '../../src/solver/heuristics.js';
import { createBoard, applyMove } from '../../src/state/board.js';
import { listMoves } from '../../src/solver/move-generator.js';
import { parseBoardText } from '../../src/io/board-parser.js';
import { CLASSIC, ONE_MOVE, SOLVED } from '../fixtures/boards.js';

describe('Manhattan Heuristic', () => {
  it('should count rows to the goal for the classic layout', () => {
    assert.strictEqual(manhattanHeuristic(parseBoardText(CLASSIC)), 3);
  });

  it('should be 1 one move from the goal', () => {
    assert.strictEqual(manhattanHeuristic(parseBoardText(ONE_MOVE)), 1);
  });

  it('should be 0 exactly at the goal', () => {
    const solved = parseBoardText(SOLVED);

    assert.strictEqual(manhattanHeuristic(solved), 0);
    assert.strictEqual(isGoalState(solved), true);
  });

  it('should add row and column distance', () => {
    const board = createBoard([
      { kind: 'SQUARE', anchor: { row: 0, col: 2 } },
      { kind: 'VERTICAL', anchor: { row: 0, col: 0 } },
      { kind: 'VERTICAL', anchor: { row: 0, col: 1 } },
      { kind: 'VERTICAL', anchor: { row: 2, col: 0 } },
      { kind: 'VERTICAL', anchor: { row: 2, col: 1 } },
      { kind: 'HORIZONTAL', anchor: { row: 2, col: 2 } },
      { kind: 'SINGLE', anchor: { row: 3, col: 2 } },
      { kind: 'SINGLE', anchor: { row: 3, col: 3 } },
      { kind: 'SINGLE', anchor: { row: 4, col: 0 } },
      { kind: 'SINGLE', anchor: { row: 4, col: 1 } },
    ]);

    assert.strictEqual(manhattanHeuristic(board), 4);
  });

  it('should change by at most one per move', () => {
    const board = parseBoardText(ONE_MOVE);
    const h = manhattanHeuristic(board);

    for (const move of listMoves(board)) {
      const next = applyMove(board, move.pieceId, move.direction);
      assert.ok(Math.abs(manhattanHeuristic(next) - h) <= 1);
    }
  });
});

describe('Zero Heuristic', () => {
  it('should always be 0', () => {
    assert.strictEqual(zeroHeuristic(), 0);
  });
});
