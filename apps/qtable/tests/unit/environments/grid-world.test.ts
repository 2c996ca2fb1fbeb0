/**
 * Grid World Tests
 */

import {
  DEFAULT_LAYOUT,
  GOAL_REWARD,
  GridLayout,
  GridWorldState,
  PIT_REWARD,
  STEP_REWARD,
} from '../../../src/environments/grid-world';
import { QTable } from '../../../src/rl/q-table';

describe('GridWorldState', () => {
  const start = GridWorldState.initial();

  it('should start at the layout start cell', () => {
    expect(start.key).toBe('3,0');
    expect(start.rewardForLastMove).toBe(0);
  });

  it('should only offer moves that stay on the grid', () => {
    expect(start.getLegalTransitions()).toEqual(['up', 'right']);
  });

  it('should charge a step for an ordinary move', () => {
    const next = start.makeTransition('up');

    expect(next.key).toBe('2,0');
    expect(next.rewardForLastMove).toBe(STEP_REWARD);
    expect(next.isTerminal()).toBe(false);
  });

  it('should pay the goal reward and end the episode at the goal', () => {
    const beforeGoal = start
      .makeTransition('up')
      .makeTransition('up')
      .makeTransition('up')
      .makeTransition('right')
      .makeTransition('right');
    const goal = beforeGoal.makeTransition('right');

    expect(beforeGoal.key).toBe('0,2');
    expect(goal.key).toBe('0,3');
    expect(goal.rewardForLastMove).toBe(GOAL_REWARD);
    expect(goal.isGoal()).toBe(true);
    expect(goal.getLegalTransitions()).toEqual([]);
  });

  it('should charge the pit penalty and end the episode in a pit', () => {
    const pit = start.makeTransition('right').makeTransition('up').makeTransition('up');

    expect(pit.key).toBe('1,1');
    expect(pit.rewardForLastMove).toBe(PIT_REWARD);
    expect(pit.isPit()).toBe(true);
    expect(pit.getLegalTransitions()).toEqual([]);
  });

  it('should let a Q-table enumerate every cell of the default layout', () => {
    const qTable = new QTable(start);

    expect(qTable.size).toBe(DEFAULT_LAYOUT.rows * DEFAULT_LAYOUT.cols);
  });

  it('should not reach cells walled off by terminal states', () => {
    const layout: GridLayout = {
      rows: 1,
      cols: 4,
      start: { row: 0, col: 0 },
      goal: { row: 0, col: 1 },
      pits: [],
    };
    const qTable = new QTable(GridWorldState.initial(layout));

    expect([...qTable.entries()].map(([state]) => state.key)).toEqual(['0,0', '0,1']);
  });
});
