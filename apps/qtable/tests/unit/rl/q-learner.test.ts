/**
 * QLearner Tests
 */

import { QTable } from '../../../src/rl/q-table';
import { QLearner } from '../../../src/rl/q-learner';
import { SeededRandom } from '../../../src/rl/random';
import { EpisodeSummary } from '../../../src/rl/types';
import { GridWorldState } from '../../../src/environments/grid-world';
import { ValidationError } from '../../../src/utils/errors';
import { GraphState, ScriptedRandom, TWO_STATE_GRAPH } from '../../fixtures/graph-state';

describe('QLearner', () => {
  const a = new GraphState(TWO_STATE_GRAPH, 'A');

  describe('learn', () => {
    it('should move the chosen action toward the terminal reward each episode', () => {
      // next() = 0 always explores and always picks the first action (left)
      const qTable = new QTable(a, { rnd: new ScriptedRandom([0]) });
      const learner = new QLearner(qTable, { learningRate: 0.5, futureRewardDiscount: 1.0 });

      const summaries = learner.learn(a, 3);

      expect(summaries).toEqual([
        { episode: 1, steps: 1, totalReward: 10, terminated: true },
        { episode: 2, steps: 1, totalReward: 10, terminated: true },
        { episode: 3, steps: 1, totalReward: 10, terminated: true },
      ]);
      // 5, then 7.5, then 8.75
      expect(qTable.getActions(a).get('left')).toBe(8.75);
      expect(qTable.getActions(a).get('right')).toBe(0);
    });

    it('should end an episode at the step cap when it cycles', () => {
      // 0.99 exploits; the 0/0 tie resolves to index 1 (right), which loops on A
      const qTable = new QTable(a, { rnd: new ScriptedRandom([0.99]) });
      const learner = new QLearner(qTable, { learningRate: 0.5, maxStepsPerEpisode: 5 });

      const [summary] = learner.learn(a, 1);

      expect(summary).toEqual({ episode: 1, steps: 5, totalReward: 0, terminated: false });
    });

    it('should report each episode to the listener', () => {
      const qTable = new QTable(a, { rnd: new ScriptedRandom([0]) });
      const learner = new QLearner(qTable);
      const seen: EpisodeSummary[] = [];

      learner.learn(a, 4, (summary) => seen.push(summary));

      expect(seen.map((s) => s.episode)).toEqual([1, 2, 3, 4]);
    });

    it('should reject a negative episode count', () => {
      const learner = new QLearner(new QTable(a));

      expect(() => learner.learn(a, -1)).toThrow(ValidationError);
    });

    it('should learn a shortest safe path across the grid world', () => {
      const start = GridWorldState.initial();
      const qTable = new QTable(start, { rnd: new SeededRandom(42) });
      const learner = new QLearner(qTable, { learningRate: 0.5, futureRewardDiscount: 1.0 });

      learner.learn(start, 2000);
      const rollout = learner.playGreedy(start);

      expect(rollout.terminated).toBe(true);
      expect(rollout.states[rollout.states.length - 1]).toBe('0,3');
      expect(rollout.actions).toHaveLength(6);
      expect(rollout.totalReward).toBe(5);
    });
  });

  describe('playGreedy', () => {
    it('should follow the best moves to a terminal state', () => {
      const qTable = new QTable(a);
      qTable.getActions(a).set('left', 5);
      const learner = new QLearner(qTable);

      expect(learner.playGreedy(a)).toEqual({
        actions: ['left'],
        states: ['A', 'B'],
        totalReward: 10,
        terminated: true,
      });
    });

    it('should stop at the step cap', () => {
      const qTable = new QTable(a);
      qTable.getActions(a).set('right', 5);
      const learner = new QLearner(qTable, { maxStepsPerEpisode: 3 });

      expect(learner.playGreedy(a)).toEqual({
        actions: ['right', 'right', 'right'],
        states: ['A', 'A', 'A', 'A'],
        totalReward: 0,
        terminated: false,
      });
    });

    it('should not change any values', () => {
      const qTable = new QTable(a);
      qTable.getActions(a).set('left', 5);
      const learner = new QLearner(qTable);

      learner.playGreedy(a);

      expect(qTable.getPossibleActions(a)).toEqual([
        { action: 'left', value: 5 },
        { action: 'right', value: 0 },
      ]);
    });
  });

  describe('options', () => {
    it('should reject a learning rate above 1', () => {
      expect(() => new QLearner(new QTable(a), { learningRate: 2 })).toThrow(ValidationError);
    });

    it('should reject a non-integer step cap', () => {
      expect(() => new QLearner(new QTable(a), { maxStepsPerEpisode: 2.5 })).toThrow(ValidationError);
    });
  });
});
