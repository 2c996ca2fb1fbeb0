/**
 * Q-Table CLI - Learning Progress Display
 *
 * Reward curve over training and the learned action values.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { EpisodeSummary, GreedyRollout } from '../../rl/types';
import { QTable } from '../../rl/q-table';

export interface ProgressBucket {
  fromEpisode: number;
  toEpisode: number;
  avgReward: number;
  avgSteps: number;
  /** Share of episodes that reached a terminal state */
  terminationRate: number;
}

/**
 * Group episode summaries into consecutive windows of `interval` episodes.
 * Intervals below 1 are treated as 1.
 */
export function summarizeProgress(summaries: EpisodeSummary[], interval: number): ProgressBucket[] {
  const buckets: ProgressBucket[] = [];
  const size = Number.isFinite(interval) ? Math.max(1, Math.floor(interval)) : 1;

  for (let start = 0; start < summaries.length; start += size) {
    const batch = summaries.slice(start, start + size);
    const count = batch.length;
    buckets.push({
      fromEpisode: batch[0].episode,
      toEpisode: batch[count - 1].episode,
      avgReward: batch.reduce((sum, s) => sum + s.totalReward, 0) / count,
      avgSteps: batch.reduce((sum, s) => sum + s.steps, 0) / count,
      terminationRate: batch.filter((s) => s.terminated).length / count,
    });
  }

  return buckets;
}

export function displayTrainingProgress(summaries: EpisodeSummary[], interval: number): void {
  console.log(chalk.gray('┌' + '─'.repeat(68) + '┐'));
  console.log(chalk.bold('  📚 Learning Progress:\n'));

  if (summaries.length === 0) {
    console.log(chalk.gray('   No episodes were run.'));
    console.log(chalk.gray('\n└' + '─'.repeat(68) + '┘'));
    return;
  }

  for (const bucket of summarizeProgress(summaries, interval)) {
    const range = `${bucket.fromEpisode}-${bucket.toEpisode}`.padEnd(10);
    console.log(
      chalk.white(`   Episodes ${range}`) +
      `  reward ${formatReward(bucket.avgReward)}` +
      chalk.gray(`  steps ${bucket.avgSteps.toFixed(1)}`)
    );
  }

  console.log(chalk.gray('\n└' + '─'.repeat(68) + '┘'));
}

/**
 * Display every state's action values as a table
 */
export function displayQValues<A>(qTable: QTable<A>): void {
  const rows = [...qTable.entries()];
  const actionNames = [...new Set(rows.flatMap(([, actions]) => [...actions.keys()].map(String)))];

  const table = new Table({
    head: [chalk.white.bold('State'), ...actionNames.map((name) => chalk.white.bold(name))],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const [state, actions] of rows) {
    const values = new Map([...actions].map(([action, value]): [string, number] => [String(action), value]));
    table.push([
      state.key,
      ...actionNames.map((name) => {
        const value = values.get(name);
        return value === undefined ? chalk.gray('-') : formatReward(value);
      }),
    ]);
  }

  console.log(chalk.bold(`\n  🧮 Q-Values (${qTable.toString()}):\n`));
  console.log(table.toString());
}

export function displayGreedyPath<A>(rollout: GreedyRollout<A>): void {
  console.log(chalk.bold('\n  🧭 Greedy Policy Rollout:\n'));
  console.log(chalk.white(`   Path:    ${rollout.states.join(chalk.gray(' → '))}`));
  console.log(chalk.white(`   Moves:   ${rollout.actions.map(String).join(', ') || chalk.gray('(none)')}`));
  console.log(chalk.white(`   Reward:  `) + formatReward(rollout.totalReward));

  if (rollout.terminated) {
    console.log(chalk.green('\n   ✓ Reached a terminal state'));
  } else {
    console.log(chalk.yellow('\n   ⚠ Stopped at the step limit; more training may help'));
  }
}

function formatReward(reward: number): string {
  const formatted = reward.toFixed(3);

  if (reward > 0) return chalk.green(formatted);
  if (reward === 0) return chalk.gray(formatted);
  return chalk.red(formatted);
}
