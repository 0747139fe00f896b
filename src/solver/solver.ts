/**
 * Main Solver Interface
 */

import { Algorithm, Coord, Move, PieceKind, SearchStats, SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import {
  Board,
  assertValidBoard,
  countPieceKind,
  getEmptyCells,
  getSquare,
  isGoal,
} from '../state/board.js';
import { createHuaRongDaoProblem, SearchResult } from './problem.js';
import { dfsSearch } from './dfs.js';
import { astarSearch } from './astar.js';
import { manhattanHeuristic } from './heuristics.js';
import { listMoves } from './move-generator.js';

// Complete solution: boards from start to goal, inclusive
export interface Solution {
  algorithm: Algorithm;
  path: Board[];
  moves: Move[];
  stats: SearchStats;
}

function toSolution(algorithm: Algorithm, result: SearchResult<Board, Move>): Solution {
  return {
    algorithm,
    path: result.states,
    moves: result.moves,
    stats: result.stats,
  };
}

export function solveDFS(board: Board, options: Partial<SolverOptions> = {}): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  assertValidBoard(board);

  const problem = createHuaRongDaoProblem(board, { pruneSymmetric: opts.pruneSymmetric });
  return toSolution('DFS', dfsSearch(problem, opts, { optimal: opts.optimalDfs }));
}

export function solveAStar(board: Board, options: Partial<SolverOptions> = {}): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  assertValidBoard(board);

  const problem = createHuaRongDaoProblem(board, { pruneSymmetric: opts.pruneSymmetric });
  return toSolution('ASTAR', astarSearch(problem, manhattanHeuristic, opts));
}

/**
 * Main Hua Rong Dao Solver class
 */
export class HuaRongDaoSolver {
  constructor(private readonly options: Partial<SolverOptions> = {}) {}

  /**
   * Solve a board with the chosen algorithm
   */
  solve(board: Board, algorithm: Algorithm, options: Partial<SolverOptions> = {}): Solution {
    const opts = { ...this.options, ...options };
    return algorithm === 'DFS' ? solveDFS(board, opts) : solveAStar(board, opts);
  }

  /**
   * Run both algorithms on the same board
   */
  compare(board: Board, options: Partial<SolverOptions> = {}): Record<Algorithm, Solution> {
    return {
      DFS: this.solve(board, 'DFS', options),
      ASTAR: this.solve(board, 'ASTAR', options),
    };
  }
}

export interface BoardAnalysis {
  pieceCounts: Record<PieceKind, number>;
  emptyCells: Coord[];
  squareAnchor: Coord;
  solved: boolean;
  heuristic: number;
  legalMoves: Move[];
}

/**
 * Analyze a board without solving
 */
export function analyzeBoard(board: Board): BoardAnalysis {
  assertValidBoard(board);

  return {
    pieceCounts: {
      SQUARE: countPieceKind(board, 'SQUARE'),
      HORIZONTAL: countPieceKind(board, 'HORIZONTAL'),
      VERTICAL: countPieceKind(board, 'VERTICAL'),
      SINGLE: countPieceKind(board, 'SINGLE'),
    },
    emptyCells: getEmptyCells(board),
    squareAnchor: getSquare(board).anchor,
    solved: isGoal(board),
    heuristic: manhattanHeuristic(board),
    legalMoves: listMoves(board),
  };
}
