/**
 * Source of uniform random numbers. Injected so tests can be deterministic.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
}

export interface ActionValue<A> {
  action: A;
  value: number;
}

/**
 * A position in a finite state space, supplied by the problem domain.
 *
 * States are compared by `key`: two instances with the same key are treated
 * as the same state. Actions are compared with SameValueZero, so primitive
 * actions (strings, numbers) are the natural choice.
 */
export interface State<A> {
  readonly key: string;
  /** Reward for having just transitioned into this state */
  readonly rewardForLastMove: number;
  getLegalTransitions(): A[];
  makeTransition(action: A): State<A>;
  /** Pick the highest-valued entry, breaking ties with `rnd` */
  selectBestAction(actions: ActionValue<A>[], rnd: RandomSource): ActionValue<A>;
}

/**
 * Pre-built table: state to (action to value)
 */
export type TableSeed<A> = Iterable<readonly [State<A>, Map<A, number>]>;

export interface QTableOptions<A> {
  table?: TableSeed<A>;
  epsilon?: number;
  rnd?: RandomSource;
  /** Abort traversal once more than this many states are discovered */
  maxStates?: number;
}

export interface QLearnerOptions {
  learningRate: number;
  futureRewardDiscount: number;
  maxStepsPerEpisode: number;
}

export interface EpisodeSummary {
  episode: number;
  steps: number;
  totalReward: number;
  /** False when the step cap ended the episode before a terminal state */
  terminated: boolean;
}

export interface GreedyRollout<A> {
  actions: A[];
  states: string[];
  totalReward: number;
  terminated: boolean;
}
