/**
 * Agent Lifecycle State Machine
 *
 * Defines the agent lifecycle states and the fixed transition table that every
 * state change is validated against.
 *
 * Healthy flow:  unknown → starting → running → stopping → stopped
 * Pause/resume:  running → paused → running
 * Any non-terminal state may fail; both terminal states may restart via starting.
 */

/**
 * Agent lifecycle states
 */
export enum State {
  /** Constructed, never started */
  Unknown = 'unknown',
  /** Start hook in progress */
  Starting = 'starting',
  /** Actively running */
  Running = 'running',
  /** Suspended; may resume */
  Paused = 'paused',
  /** Stop hook in progress */
  Stopping = 'stopping',
  /** Stopped cleanly */
  Stopped = 'stopped',
  /** A lifecycle hook failed */
  Failed = 'failed'
}

export const ALL_STATES: readonly State[] = Object.freeze(Object.values(State));

/**
 * State Transition Map
 * Defines all valid state transitions in the agent lifecycle
 */
export const VALID_TRANSITIONS: ReadonlyMap<State, readonly State[]> = new Map<State, readonly State[]>([
  [State.Unknown, [State.Starting, State.Failed]],
  [State.Starting, [State.Running, State.Failed, State.Stopping]],
  [State.Running, [State.Paused, State.Stopping, State.Failed]],
  [State.Paused, [State.Running, State.Stopping, State.Failed]],
  [State.Stopping, [State.Stopped, State.Failed]],

  // Terminal states may only restart
  [State.Stopped, [State.Starting]],
  [State.Failed, [State.Starting]]
]);

const STATE_VALUES: ReadonlySet<string> = new Set<string>(ALL_STATES);

/**
 * Check if a value is one of the seven lifecycle states
 *
 * @example
 * ```typescript
 * isValidState('running'); // true
 * isValidState('');        // false
 * ```
 */
export function isValidState(value: unknown): value is State {
  return typeof value === 'string' && STATE_VALUES.has(value);
}

/**
 * Check if a state is terminal (stopped or failed)
 */
export function isTerminal(state: State): boolean {
  return state === State.Stopped || state === State.Failed;
}

/**
 * Check if a state transition is valid according to the state machine.
 * A transition to the same state is never valid.
 *
 * @example
 * ```typescript
 * isValidTransition(State.Running, State.Paused);  // true
 * isValidTransition(State.Running, State.Running); // false
 * isValidTransition(State.Stopped, State.Running); // false (restart via starting)
 * ```
 */
export function isValidTransition(from: State, to: State): boolean {
  if (from === to) {
    return false;
  }

  const allowedTransitions = VALID_TRANSITIONS.get(from);
  if (!allowedTransitions) {
    return false;
  }

  return allowedTransitions.includes(to);
}

/**
 * Get all valid next states for a state
 */
export function getValidNextStates(state: State): readonly State[] {
  return VALID_TRANSITIONS.get(state) ?? [];
}
