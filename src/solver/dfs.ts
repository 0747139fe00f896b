/**
 * Depth-first search
 */

import { SearchLimits } from '../domain/types.js';
import { NoSolutionError } from '../domain/errors.js';
import { SearchNode, SearchTree } from './search-node.js';
import { SearchBudget, SearchProblem, SearchResult } from './problem.js';
import { reconstructPath } from './path.js';

export interface DfsOptions {
  // Keep searching after the first goal until no shorter path can exist
  optimal?: boolean;
  // Depth limit increment between deepening rounds (optimal mode)
  depthStep?: number;
}

export const DEFAULT_DEPTH_STEP = 8;

/**
 * Depth-first search with a LIFO frontier
 * In the default mode states are marked visited when popped and the first
 * goal reached is returned; the first successor generated is the first one
 * explored. With `optimal` the search deepens instead and returns a
 * shortest path.
 */
export function dfsSearch<S, M>(
  problem: SearchProblem<S, M>,
  limits: SearchLimits,
  options: DfsOptions = {}
): SearchResult<S, M> {
  if (options.optimal) {
    return deepeningSearch(problem, limits, options.depthStep ?? DEFAULT_DEPTH_STEP);
  }

  const budget = new SearchBudget(limits);
  const tree = new SearchTree<S, M>();
  const visited = new Set<string>();

  const stack: SearchNode<S, M>[] = [tree.add(problem.initial, null, null, 0, 0)];
  let maxFrontierSize = stack.length;

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (problem.isGoal(current.state)) {
      return {
        ...reconstructPath(tree, current),
        stats: {
          nodesExpanded: budget.expanded,
          nodesGenerated: tree.size(),
          maxFrontierSize,
          timeTaken: budget.elapsed(),
        },
      };
    }

    const key = problem.key(current.state);
    if (visited.has(key)) continue;
    visited.add(key);

    budget.charge();

    const children: SearchNode<S, M>[] = [];
    for (const { move, state } of problem.successors(current.state)) {
      if (visited.has(problem.key(state))) continue;
      children.push(tree.add(state, current, move, current.cost + 1, 0));
    }

    // Reverse so the first generated child ends on top of the stack
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }

    maxFrontierSize = Math.max(maxFrontierSize, stack.length);
  }

  throw new NoSolutionError(budget.expanded);
}

/**
 * Depth-limited rounds with branch and bound inside each round
 *
 * A round reaches every state within `limit` moves. `reached` holds the
 * cheapest cost seen this round; a state found again more cheaply is pushed
 * again. Once a goal is found, paths at least as long are cut. A round that
 * ends without a goal leaves exact distances in `reached`, which the next
 * round uses to drop costlier arrivals at those states.
 */
function deepeningSearch<S, M>(
  problem: SearchProblem<S, M>,
  limits: SearchLimits,
  depthStep: number
): SearchResult<S, M> {
  const budget = new SearchBudget(limits);
  const step = Math.max(1, Math.floor(depthStep));
  let distance = new Map<string, number>();
  let nodesGenerated = 0;
  let maxFrontierSize = 0;

  for (let limit = step; ; limit += step) {
    const tree = new SearchTree<S, M>();
    const reached = new Map<string, number>([[problem.key(problem.initial), 0]]);
    const stack: SearchNode<S, M>[] = [tree.add(problem.initial, null, null, 0, 0)];
    let best: SearchNode<S, M> | null = null;
    let cutoff = false;

    maxFrontierSize = Math.max(maxFrontierSize, stack.length);

    for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
      const seen = reached.get(problem.key(current.state));
      if (seen !== undefined && seen < current.cost) continue;

      if (problem.isGoal(current.state)) {
        if (best === null || current.cost < best.cost) best = current;
        continue;
      }

      budget.charge();

      const cost = current.cost + 1;
      const children: SearchNode<S, M>[] = [];
      for (const { move, state } of problem.successors(current.state)) {
        if (best !== null && cost >= best.cost) continue;

        const key = problem.key(state);
        const exact = distance.get(key);
        if (exact !== undefined && cost > exact) continue;
        const cheapest = reached.get(key);
        if (cheapest !== undefined && cheapest <= cost) continue;

        if (cost > limit) {
          cutoff = true;
          continue;
        }

        reached.set(key, cost);
        children.push(tree.add(state, current, move, cost, 0));
      }

      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }

      maxFrontierSize = Math.max(maxFrontierSize, stack.length);
    }

    nodesGenerated += tree.size();

    if (best !== null) {
      return {
        ...reconstructPath(tree, best),
        stats: {
          nodesExpanded: budget.expanded,
          nodesGenerated,
          maxFrontierSize,
          timeTaken: budget.elapsed(),
        },
      };
    }

    if (!cutoff) {
      throw new NoSolutionError(budget.expanded);
    }

    distance = reached;
  }
}
