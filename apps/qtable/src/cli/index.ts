#!/usr/bin/env node

/**
 * Q-Table CLI Demo - Entry Point
 */

// Must load before configuration reads the environment
import 'dotenv/config';
import chalk from 'chalk';
import { getConfig, validateConfig } from '../utils/config';
import { handleError } from '../utils/errors';
import { TrainingDemo } from './demo';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    validateConfig(config);

    const demo = new TrainingDemo(config);
    await demo.run();
    process.exit(0);
  } catch (error) {
    const appError = handleError(error);
    console.error(chalk.red(`\n❌ Demo error [${appError.code}]:`), appError.message);
    console.error(chalk.gray('\nStack trace:'), appError.stack ?? '');
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\n👋 Training interrupted.'));
  process.exit(0);
});

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n❌ Unhandled Rejection:'), reason);
  process.exit(1);
});

void main();
