import { QTable } from './q-table';
import { EpisodeSummary, GreedyRollout, QLearnerOptions, State } from './types';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';
import { episodeCountSchema, learnerOptionsSchema, validate } from '../utils/validation';

const log = createLogger('QLearner');

export type EpisodeListener = (summary: EpisodeSummary) => void;

/**
 * Episode-driven training loop over a QTable.
 */
export class QLearner<A> {
  private readonly options: QLearnerOptions;

  constructor(
    private readonly qTable: QTable<A>,
    options: Partial<QLearnerOptions> = {}
  ) {
    this.options = validate(
      learnerOptionsSchema,
      {
        learningRate: options.learningRate ?? CONFIG.rl.learningRate,
        futureRewardDiscount: options.futureRewardDiscount ?? CONFIG.rl.futureRewardDiscount,
        maxStepsPerEpisode: options.maxStepsPerEpisode ?? CONFIG.rl.maxStepsPerEpisode,
      },
      'Invalid learner options'
    );
  }

  get table(): QTable<A> {
    return this.qTable;
  }

  /**
   * Run `numEpisodes` episodes from `initialState`, numbered from 1.
   */
  learn(
    initialState: State<A>,
    numEpisodes: number,
    onEpisode?: EpisodeListener
  ): EpisodeSummary[] {
    validate(episodeCountSchema, numEpisodes, 'Episode count must be a non-negative integer');

    const summaries: EpisodeSummary[] = [];
    for (let episode = 1; episode <= numEpisodes; episode++) {
      const summary = this.runEpisode(initialState, episode);
      summaries.push(summary);
      onEpisode?.(summary);

      if (episode % CONFIG.training.progressInterval === 0) {
        log.debug(`Episode ${episode}/${numEpisodes}`, summary);
      }
    }

    if (summaries.length > 0) {
      const avgReward = summaries.reduce((sum, s) => sum + s.totalReward, 0) / summaries.length;
      log.info('Training complete', {
        episodes: numEpisodes,
        avgReward: Number(avgReward.toFixed(3)),
        states: this.qTable.size,
      });
    }

    return summaries;
  }

  /**
   * Follow the current best moves without exploring or updating
   */
  playGreedy(initialState: State<A>): GreedyRollout<A> {
    const actions: A[] = [];
    const states: string[] = [initialState.key];
    let totalReward = 0;
    let state = initialState;

    while (actions.length < this.options.maxStepsPerEpisode) {
      if (this.qTable.getActions(state).size === 0) {
        return { actions, states, totalReward, terminated: true };
      }
      const move = this.qTable.getBestMove(state);
      state = state.makeTransition(move.action);
      actions.push(move.action);
      states.push(state.key);
      totalReward += state.rewardForLastMove;
    }

    return {
      actions,
      states,
      totalReward,
      terminated: this.qTable.getActions(state).size === 0,
    };
  }

  private runEpisode(initialState: State<A>, episode: number): EpisodeSummary {
    const { learningRate, futureRewardDiscount, maxStepsPerEpisode } = this.options;
    let state = initialState;
    let steps = 0;
    let totalReward = 0;

    while (steps < maxStepsPerEpisode && this.qTable.getActions(state).size > 0) {
      const action = this.qTable.getNextAction(state, episode);
      const nextState = state.makeTransition(action.action);
      this.qTable.update(state, action, nextState, learningRate, futureRewardDiscount);

      totalReward += nextState.rewardForLastMove;
      state = nextState;
      steps++;
    }

    return {
      episode,
      steps,
      totalReward,
      terminated: this.qTable.getActions(state).size === 0,
    };
  }
}
