import { ActionValue, RandomSource } from './types';
import { TerminalStateError } from '../utils/errors';

/**
 * Select the highest-valued action. Equal maxima are broken uniformly at
 * random with `rnd`, so a fixed seed always yields the same choice.
 */
export function selectBestAction<A>(
  actions: ActionValue<A>[],
  rnd: RandomSource
): ActionValue<A> {
  if (actions.length === 0) {
    throw new TerminalStateError();
  }

  let maxValue = -Infinity;
  let best: ActionValue<A>[] = [];

  for (const entry of actions) {
    if (entry.value > maxValue) {
      maxValue = entry.value;
      best = [entry];
    } else if (entry.value === maxValue) {
      best.push(entry);
    }
  }

  // All values NaN: nothing compares greater than -Infinity
  if (best.length === 0) {
    best = actions;
  }

  return best.length === 1 ? best[0] : best[rnd.nextInt(best.length)];
}
