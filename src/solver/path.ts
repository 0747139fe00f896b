/**
 * Rebuild the start-to-goal path from parent links
 */

import { SearchNode, SearchTree } from './search-node.js';

export interface SearchPath<S, M> {
  states: S[];
  moves: M[];
}

/**
 * Walk parent indices from `goal` back to the root, then reverse
 */
export function reconstructPath<S, M>(tree: SearchTree<S, M>, goal: SearchNode<S, M>): SearchPath<S, M> {
  const states: S[] = [];
  const moves: M[] = [];
  let current: SearchNode<S, M> | null = goal;

  while (current !== null) {
    states.push(current.state);
    if (current.move !== null) {
      moves.push(current.move);
    }
    current = current.parent === null ? null : tree.get(current.parent);
  }

  states.reverse();
  moves.reverse();

  return { states, moves };
}
