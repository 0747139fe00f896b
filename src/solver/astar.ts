/**
 * A* Search Algorithm
 */

import { SearchLimits } from '../domain/types.js';
import { NoSolutionError } from '../domain/errors.js';
import { SearchNode, SearchTree, PriorityQueue, compareByPriority } from './search-node.js';
import { SearchBudget, SearchProblem, SearchResult } from './problem.js';
import { Heuristic } from './heuristics.js';
import { reconstructPath } from './path.js';

/**
 * A* search with lazy invalidation instead of decrease-key
 *
 * A state may sit in the open set several times at different costs.
 * `bestCost` holds the cheapest cost pushed so far and `closed` the cost a
 * state was expanded at; entries that lost to a cheaper one are skipped when
 * popped. With an admissible heuristic the first goal popped is optimal.
 */
export function astarSearch<S, M>(
  problem: SearchProblem<S, M>,
  heuristic: Heuristic<S>,
  limits: SearchLimits
): SearchResult<S, M> {
  const budget = new SearchBudget(limits);
  const tree = new SearchTree<S, M>();
  const openSet = new PriorityQueue<SearchNode<S, M>>(compareByPriority);
  const closed = new Map<string, number>();
  const bestCost = new Map<string, number>();

  const startNode = tree.add(problem.initial, null, null, 0, heuristic(problem.initial));
  openSet.push(startNode);
  bestCost.set(problem.key(problem.initial), 0);

  let maxFrontierSize = openSet.size();

  for (let current = openSet.pop(); current !== undefined; current = openSet.pop()) {
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

    const closedCost = closed.get(key);
    if (closedCost !== undefined && closedCost <= current.cost) continue;

    const best = bestCost.get(key);
    if (best !== undefined && best < current.cost) continue;

    closed.set(key, current.cost);
    budget.charge();

    for (const { move, state } of problem.successors(current.state)) {
      const cost = current.cost + 1;
      const childKey = problem.key(state);

      const childClosed = closed.get(childKey);
      if (childClosed !== undefined && childClosed <= cost) continue;

      const childBest = bestCost.get(childKey);
      if (childBest !== undefined && childBest <= cost) continue;

      bestCost.set(childKey, cost);
      openSet.push(tree.add(state, current, move, cost, heuristic(state)));
    }

    maxFrontierSize = Math.max(maxFrontierSize, openSet.size());
  }

  throw new NoSolutionError(budget.expanded);
}
