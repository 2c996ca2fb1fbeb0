/**
 * Grid World
 *
 * A small deterministic navigation problem. The agent starts in one cell and
 * must reach the goal while avoiding pits. Every move costs 1; the goal pays
 * +10 and a pit costs 10. Goal and pits end the episode.
 */

import { ActionValue, RandomSource, State } from '../rl/types';
import { selectBestAction } from '../rl/selection';

export type Move = 'up' | 'down' | 'left' | 'right';

export const MOVES: readonly Move[] = ['up', 'down', 'left', 'right'];

export interface Cell {
  row: number;
  col: number;
}

export interface GridLayout {
  rows: number;
  cols: number;
  start: Cell;
  goal: Cell;
  pits: Cell[];
}

export const GOAL_REWARD = 10;
export const PIT_REWARD = -10;
export const STEP_REWARD = -1;

const OFFSETS: Record<Move, Cell> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

/**
 * Four-by-four layout used by the CLI demo
 */
export const DEFAULT_LAYOUT: GridLayout = {
  rows: 4,
  cols: 4,
  start: { row: 3, col: 0 },
  goal: { row: 0, col: 3 },
  pits: [{ row: 1, col: 1 }, { row: 2, col: 3 }],
};

const cellKey = (cell: Cell): string => `${cell.row},${cell.col}`;

export class GridWorldState implements State<Move> {
  readonly key: string;
  readonly rewardForLastMove: number;

  private constructor(
    readonly layout: GridLayout,
    readonly position: Cell,
    rewardForLastMove: number
  ) {
    this.key = cellKey(position);
    this.rewardForLastMove = rewardForLastMove;
  }

  static initial(layout: GridLayout = DEFAULT_LAYOUT): GridWorldState {
    return new GridWorldState(layout, layout.start, 0);
  }

  isGoal(): boolean {
    return this.key === cellKey(this.layout.goal);
  }

  isPit(): boolean {
    return this.layout.pits.some((pit) => cellKey(pit) === this.key);
  }

  isTerminal(): boolean {
    return this.isGoal() || this.isPit();
  }

  getLegalTransitions(): Move[] {
    if (this.isTerminal()) {
      return [];
    }
    return MOVES.filter((move) => this.inBounds(this.target(move)));
  }

  makeTransition(action: Move): GridWorldState {
    const target = this.target(action);
    const key = cellKey(target);
    const reward = key === cellKey(this.layout.goal)
      ? GOAL_REWARD
      : this.layout.pits.some((pit) => cellKey(pit) === key) ? PIT_REWARD : STEP_REWARD;
    return new GridWorldState(this.layout, target, reward);
  }

  selectBestAction(actions: ActionValue<Move>[], rnd: RandomSource): ActionValue<Move> {
    return selectBestAction(actions, rnd);
  }

  toString(): string {
    return `(${this.key})`;
  }

  private target(move: Move): Cell {
    const offset = OFFSETS[move];
    return { row: this.position.row + offset.row, col: this.position.col + offset.col };
  }

  private inBounds(cell: Cell): boolean {
    return cell.row >= 0 && cell.row < this.layout.rows && cell.col >= 0 && cell.col < this.layout.cols;
  }
}
