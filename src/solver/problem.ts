/**
 * Search problem definition consumed by the search engines
 */

import { Move, SearchLimits, SearchStats } from '../domain/types.js';
import { SearchAbortedError } from '../domain/errors.js';
import { Board } from '../state/board.js';
import { boardKey, symmetricBoardKey } from '../state/board-hash.js';
import { generateSuccessors } from './move-generator.js';
import { isGoalState } from './heuristics.js';
import { SearchPath } from './path.js';

export interface Transition<S, M> {
  move: M;
  state: S;
}

export interface SearchProblem<S, M> {
  initial: S;
  isGoal(state: S): boolean;
  // Equal keys mean the same search state
  key(state: S): string;
  successors(state: S): Iterable<Transition<S, M>>;
}

export interface SearchResult<S, M> extends SearchPath<S, M> {
  stats: SearchStats;
}

/**
 * Bind the board model and the move generator into a search problem
 */
export function createHuaRongDaoProblem(
  initial: Board,
  options: { pruneSymmetric?: boolean } = {}
): SearchProblem<Board, Move> {
  return {
    initial,
    isGoal: isGoalState,
    key: options.pruneSymmetric ? symmetricBoardKey : boardKey,
    successors: generateSuccessors,
  };
}

/**
 * Tracks expansion count and elapsed time against the search limits
 */
export class SearchBudget {
  private readonly startTime = Date.now();
  expanded = 0;

  constructor(private readonly limits: SearchLimits) {}

  /**
   * Count one expansion; throws once a limit is exceeded
   */
  charge(): void {
    if (this.expanded >= this.limits.maxExpansions) {
      throw new SearchAbortedError('EXPANSION_LIMIT', this.expanded);
    }
    if (this.elapsed() > this.limits.maxTime) {
      throw new SearchAbortedError('TIME_LIMIT', this.expanded);
    }
    this.expanded++;
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }
}
