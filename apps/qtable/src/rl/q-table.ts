import {
  ActionValue,
  QTableOptions,
  RandomSource,
  State,
  TableSeed,
} from './types';
import { defaultRandom } from './random';
import { explorationRate } from './exploration/epsilon-decay';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';
import {
  StateSpaceLimitError,
  TerminalStateError,
  UnknownActionError,
  UnknownStateError,
} from '../utils/errors';
import { tableOptionsSchema, updateParamsSchema, validate } from '../utils/validation';

interface TableEntry<A> {
  state: State<A>;
  actions: Map<A, number>;
}

const log = createLogger('QTable');

/**
 * Map from states to their legal actions and the estimated value of taking
 * each one. Values start at 0 and are refined by `update`.
 *
 * The set of states and each state's action set are fixed at construction;
 * only the values change afterwards.
 */
export class QTable<A> {
  private readonly table: Map<string, TableEntry<A>>;
  private readonly epsilon: number;
  private readonly rnd: RandomSource;

  /**
   * @param initialState - traversal root; ignored when `options.table` is given
   * @param options.epsilon - base exploration rate, approached as episodes grow
   * @param options.rnd - random source for exploration and tie-breaking
   */
  constructor(initialState: State<A>, options: QTableOptions<A> = {}) {
    const { epsilon, maxStates } = validate(
      tableOptionsSchema,
      { epsilon: options.epsilon ?? CONFIG.rl.epsilon, maxStates: options.maxStates },
      'Invalid Q-table options'
    );
    this.epsilon = epsilon;
    this.rnd = options.rnd ?? defaultRandom;

    this.table = options.table
      ? this.adoptTable(options.table)
      : this.createInitializedTable(initialState, maxStates);

    log.debug(`Built Q-table with ${this.table.size} states`, {
      source: options.table ? 'supplied' : 'traversal',
    });
  }

  get size(): number {
    return this.table.size;
  }

  has(state: State<A>): boolean {
    return this.table.has(state.key);
  }

  getBestMove(state: State<A>): ActionValue<A> {
    const actionList = this.nonTerminalActions(state);
    return state.selectBestAction(actionList, this.rnd);
  }

  /**
   * Snapshot of every action and its current value, in legal-transition order
   */
  getPossibleActions(state: State<A>): ActionValue<A>[] {
    return toActionList(this.entryFor(state).actions);
  }

  /**
   * Epsilon-greedy selection. Exploration decays with the episode number.
   */
  getNextAction(state: State<A>, episodeNumber: number): ActionValue<A> {
    const actionList = this.nonTerminalActions(state);

    const eps = this.getExplorationRate(episodeNumber);
    if (this.rnd.next() < eps) {
      return actionList[this.rnd.nextInt(actionList.length)];
    }
    return state.selectBestAction(actionList, this.rnd);
  }

  getExplorationRate(episodeNumber: number): number {
    return explorationRate(this.epsilon, episodeNumber);
  }

  /**
   * One-step Q-learning update of the value stored for `(state, action)`:
   * `v + learningRate * (reward + futureRewardDiscount * futureValue - v)`.
   * A terminal `nextState` contributes no future value.
   */
  update(
    state: State<A>,
    action: ActionValue<A>,
    nextState: State<A>,
    learningRate: number,
    futureRewardDiscount: number = 1.0
  ): void {
    validate(
      updateParamsSchema,
      { learningRate, futureRewardDiscount },
      'Invalid Q-learning update parameters'
    );

    const stateActions = this.entryFor(state).actions;
    const oldValue = stateActions.get(action.action);
    if (oldValue === undefined) {
      throw new UnknownActionError(state.key, action.action);
    }

    const nextActions = this.entryFor(nextState).actions;
    const futureValue = nextActions.size === 0
      ? 0.0
      : nextState.selectBestAction(toActionList(nextActions), this.rnd).value;
    const reward = nextState.rewardForLastMove;

    const newValue = oldValue + learningRate * (reward + futureRewardDiscount * futureValue - oldValue);
    stateActions.set(action.action, newValue);
  }

  /**
   * The live action-value map for a state. Not a copy.
   */
  getActions(state: State<A>): Map<A, number> {
    return this.entryFor(state).actions;
  }

  /**
   * Diagnostic dump of the first `n` states whose action values sum above 0
   */
  getFirstNEntriesWithNon0Actions(n: number): string {
    const lines: string[] = [];
    for (const [key, entry] of this.table) {
      if (lines.length >= n) break;
      let sum = 0;
      for (const value of entry.actions.values()) sum += value;
      if (sum > 0) {
        lines.push(`${key} -> ${formatActions(entry.actions)}`);
      }
    }
    return lines.join('\n');
  }

  /**
   * Iterate the table in insertion order
   */
  *entries(): IterableIterator<[State<A>, Map<A, number>]> {
    for (const entry of this.table.values()) {
      yield [entry.state, entry.actions];
    }
  }

  toString(): string {
    return `numEntries=${this.table.size}`;
  }

  private entryFor(state: State<A>): TableEntry<A> {
    const entry = this.table.get(state.key);
    if (!entry) {
      throw new UnknownStateError(state.key);
    }
    return entry;
  }

  private nonTerminalActions(state: State<A>): ActionValue<A>[] {
    const actionList = toActionList(this.entryFor(state).actions);
    if (actionList.length === 0) {
      throw new TerminalStateError(state.key);
    }
    return actionList;
  }

  private adoptTable(seed: TableSeed<A>): Map<string, TableEntry<A>> {
    const table = new Map<string, TableEntry<A>>();
    for (const [state, actions] of seed) {
      table.set(state.key, { state, actions });
    }
    return table;
  }

  /**
   * Depth-first traversal with an explicit stack. A state already in the
   * table is not expanded again, which also terminates cycles.
   */
  private createInitializedTable(
    initialState: State<A>,
    maxStates?: number
  ): Map<string, TableEntry<A>> {
    const table = new Map<string, TableEntry<A>>();
    const pending: State<A>[] = [initialState];

    while (pending.length > 0) {
      const currentState = pending.pop();
      if (currentState === undefined || table.has(currentState.key)) {
        continue;
      }

      const moves = new Map<A, number>();
      for (const move of currentState.getLegalTransitions()) {
        moves.set(move, 0.0);
      }
      table.set(currentState.key, { state: currentState, actions: moves });

      if (maxStates !== undefined && table.size > maxStates) {
        throw new StateSpaceLimitError(maxStates);
      }

      // Pushed in reverse so the first legal move is expanded first
      const successors = [...moves.keys()].map((move) => currentState.makeTransition(move));
      for (let i = successors.length - 1; i >= 0; i--) {
        if (!table.has(successors[i].key)) {
          pending.push(successors[i]);
        }
      }
    }

    return table;
  }
}

function toActionList<A>(actions: Map<A, number>): ActionValue<A>[] {
  return [...actions].map(([action, value]) => ({ action, value }));
}

function formatActions<A>(actions: Map<A, number>): string {
  return [...actions].map(([action, value]) => `${String(action)}: ${value}`).join(', ');
}
