export { QTable } from './q-table';
export { QLearner } from './q-learner';
export type { EpisodeListener } from './q-learner';
export { SeededRandom, defaultRandom } from './random';
export { selectBestAction } from './selection';
export { explorationRate, EPS_DROPOFF } from './exploration/epsilon-decay';

export * from './types';
