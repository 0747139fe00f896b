/**
 * Search tree nodes and frontier structures shared by the search engines
 */

export interface SearchNode<S, M> {
  id: number;
  state: S;
  parent: number | null; // index into the owning SearchTree
  move: M | null;
  cost: number;      // g(n) - cost from start
  heuristic: number; // h(n) - estimated cost to goal
  priority: number;  // f(n) = g(n) + h(n)
}

/**
 * Arena of search nodes; parents are referenced by index
 */
export class SearchTree<S, M> {
  private nodes: SearchNode<S, M>[] = [];

  /**
   * Create a node and append it to the arena
   */
  add(
    state: S,
    parent: SearchNode<S, M> | null,
    move: M | null,
    cost: number,
    heuristic: number
  ): SearchNode<S, M> {
    const node: SearchNode<S, M> = {
      id: this.nodes.length,
      state,
      parent: parent ? parent.id : null,
      move,
      cost,
      heuristic,
      priority: cost + heuristic,
    };

    this.nodes.push(node);
    return node;
  }

  get(id: number): SearchNode<S, M> {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`No search node with id ${id}`);
    }
    return node;
  }

  size(): number {
    return this.nodes.length;
  }
}

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Binary heap; the item ordered first by the comparator pops first
 */
export class PriorityQueue<T> {
  private items: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  push(item: T): void {
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result;
  }

  size(): number {
    return this.items.length;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (this.compare(this.items[parentIndex], this.items[index]) <= 0) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.compare(this.items[leftChild], this.items[smallest]) < 0) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.compare(this.items[rightChild], this.items[smallest]) < 0) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}

/**
 * A* frontier order: lower f first, then deeper nodes, then earlier nodes
 * Node ids grow with insertion, so the order is total
 */
export function compareByPriority<S, M>(a: SearchNode<S, M>, b: SearchNode<S, M>): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.cost !== b.cost) return b.cost - a.cost;
  return a.id - b.id;
}
