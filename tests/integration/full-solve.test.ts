/**
 * End-to-end tests on the classic opening layout
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseBoard, exportBoardToJSON } from '../../src/io/board-parser.js';
import { formatBoard, formatPath } from '../../src/io/solution-formatter.js';
import { solveAStar, solveDFS, Solution } from '../../src/solver/solver.js';
import { astarSearch } from '../../src/solver/astar.js';
import { createHuaRongDaoProblem } from '../../src/solver/problem.js';
import { manhattanHeuristic, zeroHeuristic } from '../../src/solver/heuristics.js';
import { Board, applyMove, assertValidBoard, isGoal } from '../../src/state/board.js';
import { boardKey } from '../../src/state/board-hash.js';
import { DEFAULT_SOLVER_OPTIONS } from '../../src/domain/constants.js';
import { CLASSIC } from '../fixtures/boards.js';

function assertValidPath(start: Board, solution: Solution): void {
  assert.strictEqual(boardKey(solution.path[0]), boardKey(start));
  assert.strictEqual(solution.path.length, solution.moves.length + 1);

  solution.moves.forEach((move, i) => {
    const next = applyMove(solution.path[i], move.pieceId, move.direction);
    assertValidBoard(next);
    assert.strictEqual(boardKey(next), boardKey(solution.path[i + 1]));
  });

  assert.ok(isGoal(solution.path[solution.path.length - 1]));
}

describe('Classic Layout', () => {
  const board = parseBoard(CLASSIC);
  const astar = solveAStar(board);

  it('should read the same board from text and JSON', () => {
    const fromJson = parseBoard(exportBoardToJSON(board));

    assert.strictEqual(formatBoard(fromJson), CLASSIC);
  });

  it('should solve with A*', () => {
    assertValidPath(board, astar);
  });

  it('should match the length found by uniform-cost search with fewer expansions', () => {
    const ucs = astarSearch(createHuaRongDaoProblem(board), zeroHeuristic, DEFAULT_SOLVER_OPTIONS);

    assert.strictEqual(astar.moves.length, ucs.moves.length);
    assert.ok(astar.stats.nodesExpanded <= ucs.stats.nodesExpanded);
  });

  it('should never overestimate along the A* path', () => {
    const last = astar.path.length - 1;

    astar.path.forEach((state, i) => {
      assert.ok(manhattanHeuristic(state) <= last - i);
    });
  });

  it('should solve with DFS in no fewer moves than A*', () => {
    const dfs = solveDFS(board);

    assertValidPath(board, dfs);
    assert.ok(astar.moves.length <= dfs.moves.length);
  });

  it('should expand fewer nodes than DFS searching for a shortest path', () => {
    const dfs = solveDFS(board, { optimalDfs: true });

    assertValidPath(board, dfs);
    assert.strictEqual(dfs.moves.length, astar.moves.length);
    assert.ok(astar.stats.nodesExpanded < dfs.stats.nodesExpanded);
  });

  it('should find the same length with symmetry pruning', () => {
    const pruned = solveAStar(board, { pruneSymmetric: true });

    assertValidPath(board, pruned);
    assert.strictEqual(pruned.moves.length, astar.moves.length);
  });

  it('should write one grid block per path board', () => {
    const blocks = formatPath(astar.path).split('\n\n');

    assert.strictEqual(blocks.length, astar.path.length);
    assert.strictEqual(blocks[0], CLASSIC);
  });
});
