/**
 * Tests for the solver entry points
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { HuaRongDaoSolver, solveAStar, solveDFS, analyzeBoard, Solution } from '../../src/solver/solver.js';
import { createHuaRongDaoProblem } from '../../src/solver/problem.js';
import { Board, applyMove, isGoal } from '../../src/state/board.js';
import { boardKey } from '../../src/state/board-hash.js';
import { parseBoardText } from '../../src/io/board-parser.js';
import { InvalidBoardError, SearchAbortedError } from '../../src/domain/errors.js';
import { CLASSIC, ONE_MOVE, SOLVED } from '../fixtures/boards.js';

function assertValidPath(start: Board, solution: Solution): void {
  assert.strictEqual(solution.path.length, solution.moves.length + 1);
  assert.strictEqual(boardKey(solution.path[0]), boardKey(start));

  solution.moves.forEach((move, i) => {
    const next = applyMove(solution.path[i], move.pieceId, move.direction);
    assert.strictEqual(boardKey(next), boardKey(solution.path[i + 1]));
  });

  assert.ok(isGoal(solution.path[solution.path.length - 1]));
}

describe('Solved Boards', () => {
  it('should return the start board alone', () => {
    const board = parseBoardText(SOLVED);

    for (const solution of [solveDFS(board), solveAStar(board)]) {
      assert.strictEqual(solution.path.length, 1);
      assert.deepStrictEqual(solution.moves, []);
      assert.strictEqual(solution.stats.nodesExpanded, 0);
    }
  });
});

describe('A* Solver', () => {
  it('should slide the 2x2 piece out in one move', () => {
    const board = parseBoardText(ONE_MOVE);
    const solution = solveAStar(board);

    assert.strictEqual(solution.algorithm, 'ASTAR');
    assert.deepStrictEqual(solution.moves, [{ pieceId: 0, direction: 'DOWN' }]);
    assert.strictEqual(solution.stats.nodesExpanded, 1);
    assert.strictEqual(solution.stats.nodesGenerated, 4);
    assert.strictEqual(solution.stats.maxFrontierSize, 3);
    assertValidPath(board, solution);
  });

  it('should undo a blocking move first', () => {
    const board = applyMove(parseBoardText(ONE_MOVE), 8, 'RIGHT');
    const solution = solveAStar(board);

    assert.strictEqual(solution.moves.length, 2);
    assertValidPath(board, solution);
  });

  it('should find the same length with symmetry pruning', () => {
    const board = applyMove(parseBoardText(ONE_MOVE), 8, 'RIGHT');

    assert.strictEqual(solveAStar(board, { pruneSymmetric: true }).moves.length, 2);
  });

  it('should stop at the expansion limit', () => {
    assert.throws(
      () => solveAStar(parseBoardText(CLASSIC), { maxExpansions: 10 }),
      (err: unknown) =>
        err instanceof SearchAbortedError && err.reason === 'EXPANSION_LIMIT' && err.nodesExpanded === 10
    );
  });
});

describe('DFS Solver', () => {
  it('should follow the first legal move when it wins', () => {
    const board = parseBoardText(ONE_MOVE);
    const solution = solveDFS(board);

    assert.strictEqual(solution.algorithm, 'DFS');
    assert.deepStrictEqual(solution.moves, [{ pieceId: 0, direction: 'DOWN' }]);
    assert.strictEqual(solution.stats.nodesExpanded, 1);
  });

  it('should return a valid path, not necessarily a short one', () => {
    const board = applyMove(parseBoardText(ONE_MOVE), 8, 'RIGHT');
    const solution = solveDFS(board);

    assert.ok(solution.moves.length >= 2);
    assertValidPath(board, solution);
  });

  it('should find a shortest path in optimal mode', () => {
    const board = applyMove(parseBoardText(ONE_MOVE), 8, 'RIGHT');
    const solution = solveDFS(board, { optimalDfs: true });

    assert.strictEqual(solution.moves.length, 2);
    assertValidPath(board, solution);
  });
});

describe('Search Problem', () => {
  it('should test for the goal through the board model', () => {
    const problem = createHuaRongDaoProblem(parseBoardText(ONE_MOVE));

    assert.strictEqual(problem.isGoal(problem.initial), false);
    assert.strictEqual(problem.isGoal(parseBoardText(SOLVED)), true);
  });
});

describe('Board Validation', () => {
  it('should reject a malformed board before searching', () => {
    const board: Board = { pieces: [], cells: [] };

    assert.throws(() => solveAStar(board), InvalidBoardError);
    assert.throws(() => solveDFS(board), InvalidBoardError);
  });
});

describe('HuaRongDaoSolver', () => {
  it('should merge per-call options over constructor options', () => {
    const solver = new HuaRongDaoSolver({ maxExpansions: 10 });
    const board = parseBoardText(CLASSIC);

    assert.throws(() => solver.solve(board, 'ASTAR'), SearchAbortedError);
    assert.throws(
      () => solver.solve(board, 'ASTAR', { maxExpansions: 5 }),
      (err: unknown) => err instanceof SearchAbortedError && err.nodesExpanded === 5
    );
  });

  it('should run both algorithms in compare', () => {
    const solver = new HuaRongDaoSolver();
    const results = solver.compare(parseBoardText(ONE_MOVE));

    assert.strictEqual(results.DFS.algorithm, 'DFS');
    assert.strictEqual(results.ASTAR.algorithm, 'ASTAR');
    assert.strictEqual(results.DFS.moves.length, 1);
    assert.strictEqual(results.ASTAR.moves.length, 1);
  });
});

describe('Board Analysis', () => {
  it('should describe a board without solving it', () => {
    const analysis = analyzeBoard(parseBoardText(ONE_MOVE));

    assert.deepStrictEqual(analysis.pieceCounts, { SQUARE: 1, HORIZONTAL: 1, VERTICAL: 4, SINGLE: 4 });
    assert.deepStrictEqual(analysis.squareAnchor, { row: 2, col: 1 });
    assert.deepStrictEqual(analysis.emptyCells, [{ row: 4, col: 1 }, { row: 4, col: 2 }]);
    assert.strictEqual(analysis.solved, false);
    assert.strictEqual(analysis.heuristic, 1);
    assert.strictEqual(analysis.legalMoves.length, 3);
  });

  it('should mark the goal layout as solved', () => {
    const analysis = analyzeBoard(parseBoardText(SOLVED));

    assert.strictEqual(analysis.solved, true);
    assert.strictEqual(analysis.heuristic, 0);
  });
});
