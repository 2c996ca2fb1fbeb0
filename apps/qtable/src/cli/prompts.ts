/**
 * Q-Table CLI - Inquirer Prompts
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { AppConfig } from '../utils/config';

export type TrainingAnswers = {
  episodes: number;
  learningRate: number;
  futureRewardDiscount: number;
  seed: number;
};

export function validateEpisodes(input: number): true | string {
  if (!Number.isInteger(input) || input < 1) {
    return 'Please enter a whole number of episodes (at least 1)';
  }
  return true;
}

export function validateUnitInterval(input: number): true | string {
  if (!Number.isFinite(input) || input < 0 || input > 1) {
    return 'Please enter a number between 0 and 1';
  }
  return true;
}

/**
 * Prompt for training hyperparameters, defaulting to the configuration
 */
export async function promptTrainingOptions(config: AppConfig): Promise<TrainingAnswers> {
  console.log(chalk.gray('Choose the training hyperparameters (ENTER keeps the default).\n'));

  return inquirer.prompt<TrainingAnswers>([
    {
      type: 'number',
      name: 'episodes',
      message: 'Number of episodes:',
      default: config.training.episodes,
      validate: validateEpisodes,
    },
    {
      type: 'number',
      name: 'learningRate',
      message: 'Learning rate (α):',
      default: config.rl.learningRate,
      validate: validateUnitInterval,
    },
    {
      type: 'number',
      name: 'futureRewardDiscount',
      message: 'Future reward discount (γ):',
      default: config.rl.futureRewardDiscount,
      validate: validateUnitInterval,
    },
    {
      type: 'number',
      name: 'seed',
      message: 'Random seed:',
      default: 42,
      validate: (input: number) => Number.isInteger(input) || 'Please enter a whole number',
    },
  ]);
}

export async function promptContinue(): Promise<boolean> {
  const { shouldContinue } = await inquirer.prompt<{ shouldContinue: boolean }>([
    {
      type: 'confirm',
      name: 'shouldContinue',
      message: chalk.cyan('Train again with different settings?'),
      default: false,
    },
  ]);

  return shouldContinue;
}
