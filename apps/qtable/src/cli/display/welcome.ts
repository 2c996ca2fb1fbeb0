/**
 * Q-Table CLI - Welcome Screen
 */

import chalk from 'chalk';

export function displayWelcome(): void {
  const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('║')}            ${chalk.magenta.bold('Q-Table')} ${chalk.white.bold('Trainer')} ${chalk.gray('- Tabular Reinforcement Learning')}        ${chalk.cyan('║')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════════════╝')}

${chalk.gray('An agent learns to cross a small grid world: reach the goal (G),')}
${chalk.gray('avoid the pits (X), and pay 1 for every step taken.')}

${chalk.cyan.bold('How it works:')}
  ${chalk.white('1.')} ${chalk.green('Enumerate')} every reachable state and its legal moves
  ${chalk.white('2.')} ${chalk.green('Explore')} with a decaying ε-greedy policy
  ${chalk.white('3.')} ${chalk.green('Update')} each Q-value with the one-step Q-learning rule
  ${chalk.white('4.')} ${chalk.green('Follow')} the learned greedy policy

${chalk.gray('─'.repeat(70))}
`;

  console.log(banner);
}
