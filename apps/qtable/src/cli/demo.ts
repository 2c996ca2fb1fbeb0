/**
 * Q-Table CLI Demo - Main Flow Orchestration
 *
 * Trains a Q-table on the grid world and shows what it learned.
 */

import chalk from 'chalk';
import ora from 'ora';
import { QTable } from '../rl/q-table';
import { QLearner } from '../rl/q-learner';
import { SeededRandom } from '../rl/random';
import { EpisodeSummary } from '../rl/types';
import { GridWorldState, Move } from '../environments/grid-world';
import { AppConfig } from '../utils/config';
import { createLogger } from '../utils/logger';
import { displayWelcome } from './display/welcome';
import { displayGreedyPath, displayQValues, displayTrainingProgress } from './display/learning';
import { displayPolicy } from './display/policy';
import { promptContinue, promptTrainingOptions, TrainingAnswers } from './prompts';

const log = createLogger('Demo');

export class TrainingDemo {
  constructor(private readonly config: AppConfig) {}

  async run(): Promise<void> {
    console.clear();
    displayWelcome();

    let round = 1;
    for (;;) {
      console.log(chalk.cyan.bold(`🎯 Training run ${round}\n`));
      const answers = await promptTrainingOptions(this.config);
      this.train(answers);

      if (!(await promptContinue())) {
        console.log(chalk.yellow('\n👋 Done. Goodbye!'));
        return;
      }
      console.log(chalk.gray('\n' + '━'.repeat(70) + '\n'));
      round++;
    }
  }

  /**
   * Build a fresh table, train it and display the outcome
   */
  train(answers: TrainingAnswers): QTable<Move> {
    const start = GridWorldState.initial();
    const qTable = new QTable<Move>(start, {
      epsilon: this.config.rl.epsilon,
      rnd: new SeededRandom(answers.seed),
    });
    const learner = new QLearner(qTable, {
      learningRate: answers.learningRate,
      futureRewardDiscount: answers.futureRewardDiscount,
      maxStepsPerEpisode: this.config.rl.maxStepsPerEpisode,
    });

    log.debug('Starting training run', answers);
    const spinner = ora(`Training for ${answers.episodes} episodes...`).start();
    let summaries: EpisodeSummary[];
    try {
      summaries = learner.learn(start, answers.episodes);
    } catch (error) {
      spinner.fail(chalk.red('Training failed'));
      throw error;
    }
    spinner.succeed(chalk.green(`✓ Trained on ${summaries.length} episodes (${qTable.toString()})`));

    displayTrainingProgress(summaries, Math.max(1, Math.ceil(summaries.length / 10)));
    displayQValues(qTable);
    displayPolicy(qTable, start);
    displayGreedyPath(learner.playGreedy(start));

    return qTable;
  }
}
