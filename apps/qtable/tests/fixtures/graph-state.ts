/**
 * Test fixtures: a State over a hand-written directed graph, and a
 * RandomSource that replays a fixed sequence.
 */

import { ActionValue, RandomSource, State } from '../../src/rl/types';
import { selectBestAction } from '../../src/rl/selection';

export interface GraphNode {
  reward: number;
  edges: Record<string, string>;
}

export type Graph = Record<string, GraphNode>;

export class GraphState implements State<string> {
  constructor(
    private readonly graph: Graph,
    readonly key: string
  ) {
    if (!graph[key]) {
      throw new Error(`No node '${key}' in graph`);
    }
  }

  get rewardForLastMove(): number {
    return this.graph[this.key].reward;
  }

  getLegalTransitions(): string[] {
    return Object.keys(this.graph[this.key].edges);
  }

  makeTransition(action: string): GraphState {
    return new GraphState(this.graph, this.graph[this.key].edges[action]);
  }

  selectBestAction(actions: ActionValue<string>[], rnd: RandomSource): ActionValue<string> {
    return selectBestAction(actions, rnd);
  }
}

/**
 * A: left -> B, right -> A. B is terminal and pays 10 on arrival.
 */
export const TWO_STATE_GRAPH: Graph = {
  A: { reward: 0, edges: { left: 'B', right: 'A' } },
  B: { reward: 10, edges: {} },
};

/**
 * A: left -> B (terminal, 10), right -> C (pays 1), C: x -> B.
 */
export const THREE_STATE_GRAPH: Graph = {
  A: { reward: 0, edges: { left: 'B', right: 'C' } },
  B: { reward: 10, edges: {} },
  C: { reward: 1, edges: { x: 'B' } },
};

/**
 * Linear chain 0 -> 1 -> ... -> length, each step pays 0
 */
export function chainGraph(length: number): Graph {
  const graph: Graph = {};
  for (let i = 0; i < length; i++) {
    graph[String(i)] = { reward: 0, edges: { next: String(i + 1) } };
  }
  graph[String(length)] = { reward: 1, edges: {} };
  return graph;
}

/**
 * Replays `values` from `next()`, repeating the last one once exhausted
 */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[Math.min(this.index, this.values.length - 1)];
    this.index++;
    return value;
  }

  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}
