/**
 * Q-Table CLI - Grid Policy Display
 */

import chalk from 'chalk';
import { QTable } from '../../rl/q-table';
import { GridLayout, GridWorldState, Move } from '../../environments/grid-world';

const ARROWS: Record<Move, string> = {
  up: '↑',
  down: '↓',
  left: '←',
  right: '→',
};

/**
 * Plain-text policy map: one row per grid row, one glyph per cell.
 * G = goal, X = pit, · = no value learned yet, ? = cell not in the table,
 * otherwise the arrow of the highest-valued move (first one on ties).
 */
export function renderPolicyGrid(qTable: QTable<Move>, layout: GridLayout): string[] {
  const byKey = new Map<string, Map<Move, number>>();
  for (const [state, actions] of qTable.entries()) {
    byKey.set(state.key, actions);
  }

  const lines: string[] = [];
  for (let row = 0; row < layout.rows; row++) {
    const glyphs: string[] = [];
    for (let col = 0; col < layout.cols; col++) {
      glyphs.push(cellGlyph(byKey, layout, row, col));
    }
    lines.push(glyphs.join(' '));
  }
  return lines;
}

function cellGlyph(
  byKey: Map<string, Map<Move, number>>,
  layout: GridLayout,
  row: number,
  col: number
): string {
  if (layout.goal.row === row && layout.goal.col === col) return 'G';
  if (layout.pits.some((pit) => pit.row === row && pit.col === col)) return 'X';

  const actions = byKey.get(`${row},${col}`);
  if (!actions) return '?';

  let best: Move | undefined;
  let bestValue = -Infinity;
  let anyNonZero = false;
  for (const [move, value] of actions) {
    if (value !== 0) anyNonZero = true;
    if (value > bestValue) {
      bestValue = value;
      best = move;
    }
  }

  return best === undefined || !anyNonZero ? '·' : ARROWS[best];
}

export function displayPolicy(qTable: QTable<Move>, start: GridWorldState): void {
  console.log(chalk.bold('\n  🗺️  Learned Policy:\n'));
  const layout = start.layout;

  renderPolicyGrid(qTable, layout).forEach((line, row) => {
    const colored = line
      .split(' ')
      .map((glyph, col) => {
        if (glyph === 'G') return chalk.green.bold(glyph);
        if (glyph === 'X') return chalk.red.bold(glyph);
        if (row === layout.start.row && col === layout.start.col) return chalk.cyan.bold(glyph);
        return chalk.white(glyph);
      })
      .join(' ');
    console.log(`     ${colored}`);
  });
}
