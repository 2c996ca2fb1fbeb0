import { CONFIG } from '../../utils/config';

export const EPS_DROPOFF = CONFIG.rl.epsilonDropoff;

/**
 * Exploration probability for an episode: `epsilon + dropoff / (episode + dropoff)`.
 *
 * Starts above 1 at episode 0 (always explore) and decays toward `epsilon`.
 */
export function explorationRate(
  epsilon: number,
  episodeNumber: number,
  dropoff: number = EPS_DROPOFF
): number {
  return epsilon + dropoff / (episodeNumber + dropoff);
}
