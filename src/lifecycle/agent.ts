/**
 * BaseAgent - lifecycle-managed agent
 *
 * Governs when agent work may run: validated state transitions, lifecycle hooks
 * around start/stop/pause/resume, and state-change notifications with per-handler
 * fault isolation.
 *
 * Concurrency: {@link BaseAgent.setState} is synchronous, so the transition check,
 * the state write and the handler fan-out for one transition always complete
 * before any other caller observes or changes the state. Callers interleave only
 * while a hook is awaited. When several callers race for the same transition,
 * exactly one wins and the rest receive a conflict error.
 *
 * State-change handlers run inside that critical section. They must be fast and
 * must not call the agent's mutating methods.
 */

import { ErrorCode, type PlatformError, conflict, unavailable, wrap } from '../errors/index.js';
import type { StructuredLogger } from '../logging/logger.js';
import { type Capability, cloneCapabilities } from './capability.js';
import { State, isValidTransition } from './state.js';

/**
 * Lifecycle hook. Receives the caller's abort signal and is responsible for
 * honoring it; the agent never cancels a running hook.
 */
export type Hook = (signal: AbortSignal) => Promise<void> | void;

/**
 * Observer notified synchronously after every successful transition
 */
export type StateChangeHandler = (from: State, to: State) => void;

export interface LifecycleHooks {
  onStart?: Hook;
  onStop?: Hook;
  onPause?: Hook;
  onResume?: Hook;
}

/**
 * Point-in-time agent snapshot. `startedAt` and `uptimeMs` are only reported
 * while the agent is running.
 */
export interface AgentInfo {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly state: State;
  readonly capabilities: readonly Capability[];
  readonly startedAt: Date | null;
  readonly uptimeMs: number;
}

/**
 * Public agent contract
 */
export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  getState(): State;
  getCapabilities(): Capability[];
  getInfo(): AgentInfo;
  health(): Promise<void>;
  start(signal?: AbortSignal): Promise<void>;
  stop(signal?: AbortSignal): Promise<void>;
  pause(signal?: AbortSignal): Promise<void>;
  resume(signal?: AbortSignal): Promise<void>;
}

/**
 * Construction options. Use {@link AgentBuilder} rather than building these by
 * hand: the builder validates identity and capabilities and copies its inputs.
 */
export interface BaseAgentOptions {
  id: string;
  name: string;
  version: string;
  capabilities: Capability[];
  logger: StructuredLogger;
  hooks: LifecycleHooks;
  stateHandlers: StateChangeHandler[];
}

type LifecycleOperation = 'start' | 'stop' | 'pause' | 'resume';

export class BaseAgent implements Agent {
  readonly id: string;
  readonly name: string;
  readonly version: string;

  private state: State = State.Unknown;
  private startedAt: Date | null = null;

  private readonly capabilities: readonly Capability[];
  private readonly logger: StructuredLogger;
  private readonly hooks: Readonly<LifecycleHooks>;
  private readonly stateHandlers: readonly StateChangeHandler[];

  constructor(options: BaseAgentOptions) {
    this.id = options.id;
    this.name = options.name;
    this.version = options.version;
    this.capabilities = options.capabilities;
    this.logger = options.logger;
    this.hooks = { ...options.hooks };
    this.stateHandlers = [...options.stateHandlers];
  }

  getState(): State {
    return this.state;
  }

  /**
   * Deep copy of the advertised capabilities
   */
  getCapabilities(): Capability[] {
    return cloneCapabilities(this.capabilities);
  }

  getInfo(): AgentInfo {
    const startedAt = this.state === State.Running ? this.startedAt : null;

    return Object.freeze({
      id: this.id,
      name: this.name,
      version: this.version,
      state: this.state,
      capabilities: cloneCapabilities(this.capabilities),
      startedAt: startedAt ? new Date(startedAt.getTime()) : null,
      uptimeMs: startedAt ? Math.max(0, Date.now() - startedAt.getTime()) : 0
    });
  }

  /**
   * Resolves when the agent is running.
   *
   * @throws {PlatformError} UNAVAIL_001 naming the current state otherwise
   */
  async health(): Promise<void> {
    const state = this.state;
    if (state !== State.Running) {
      throw unavailable(`agent is not running, current state is "${state}"`);
    }
  }

  /**
   * Move to `to` and notify every state-change handler in registration order.
   *
   * A throwing (or rejecting) handler is logged and skipped; it never aborts the
   * transition or prevents later handlers from running.
   *
   * @throws {PlatformError} CONF_001 if the transition is not permitted
   */
  setState(to: State): void {
    const from = this.state;
    if (!isValidTransition(from, to)) {
      throw transitionConflict(from, to);
    }

    this.state = to;

    for (const handler of this.stateHandlers) {
      try {
        const result: unknown = handler(from, to);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerFailure(error, from, to));
        }
      } catch (error) {
        this.reportHandlerFailure(error, from, to);
      }
    }
  }

  /**
   * unknown|stopped|failed → starting → running
   *
   * The start hook runs while the agent is `starting`. If it fails the agent is
   * left `failed` and the hook's error is the cause of the returned error.
   */
  async start(signal?: AbortSignal): Promise<void> {
    this.ensureNotAborted(signal, 'start');
    this.setState(State.Starting);

    this.logger.info('starting agent', { ...this.logContext(), agentVersion: this.version });

    await this.runHook('start', this.hooks.onStart, signal);

    this.startedAt = new Date();
    try {
      this.setState(State.Running);
    } catch (error) {
      // a concurrent stop() won while the hook ran
      this.startedAt = null;
      throw error;
    }

    this.logger.info('agent started', this.logContext());
  }

  /**
   * → stopping → stopped. Stopping an already stopped agent is a no-op.
   */
  async stop(signal?: AbortSignal): Promise<void> {
    this.ensureNotAborted(signal, 'stop');

    if (this.state === State.Stopped) {
      return;
    }

    this.setState(State.Stopping);

    this.logger.info('stopping agent', this.logContext());

    await this.runHook('stop', this.hooks.onStop, signal);

    this.startedAt = null;
    this.setState(State.Stopped);

    this.logger.info('agent stopped', this.logContext());
  }

  /**
   * running → paused. There is no transient state: the pause hook runs while
   * the agent is still `running`.
   */
  async pause(signal?: AbortSignal): Promise<void> {
    this.ensureNotAborted(signal, 'pause');
    this.ensureTransition(State.Paused);

    this.logger.info('pausing agent', this.logContext());

    await this.runHook('pause', this.hooks.onPause, signal);

    this.setState(State.Paused);

    this.logger.info('agent paused', this.logContext());
  }

  /**
   * paused → running. The resume hook runs while the agent is still `paused`.
   */
  async resume(signal?: AbortSignal): Promise<void> {
    this.ensureNotAborted(signal, 'resume');
    this.ensureTransition(State.Running, State.Paused);

    this.logger.info('resuming agent', this.logContext());

    await this.runHook('resume', this.hooks.onResume, signal);

    this.setState(State.Running);

    this.logger.info('agent resumed', this.logContext());
  }

  private logContext(): Record<string, unknown> {
    return { agentId: this.id, agentName: this.name };
  }

  private ensureNotAborted(signal: AbortSignal | undefined, operation: LifecycleOperation): void {
    if (signal?.aborted) {
      throw wrap(signal.reason, ErrorCode.Timeout, `${operation} canceled before execution`);
    }
  }

  /**
   * Fail fast before running a hook for a transition that cannot happen.
   * `requiredFrom` narrows the accepted source state further than the table.
   */
  private ensureTransition(to: State, requiredFrom?: State): void {
    const from = this.state;
    if (!isValidTransition(from, to) || (requiredFrom !== undefined && from !== requiredFrom)) {
      throw transitionConflict(from, to);
    }
  }

  private async runHook(
    operation: LifecycleOperation,
    hook: Hook | undefined,
    signal: AbortSignal | undefined
  ): Promise<void> {
    if (!hook) {
      return;
    }

    try {
      await hook(signal ?? new AbortController().signal);
    } catch (error) {
      this.logger.error(`${operation} hook failed`, { ...this.logContext(), error });
      this.markFailed();
      throw wrap(error, ErrorCode.Internal, `${operation} hook failed`);
    }
  }

  /**
   * Best-effort move to `failed` after a hook error. Only impossible when a
   * concurrent caller already drove the agent to a terminal state.
   */
  private markFailed(): void {
    if (isValidTransition(this.state, State.Failed)) {
      this.setState(State.Failed);
      return;
    }
    this.logger.warn('agent could not be marked failed', { ...this.logContext(), state: this.state });
  }

  private reportHandlerFailure(error: unknown, from: State, to: State): void {
    this.logger.error('state change handler failed', {
      ...this.logContext(),
      from,
      to,
      error
    });
  }
}

function transitionConflict(from: State, to: State): PlatformError {
  return conflict(`invalid state transition from "${from}" to "${to}"`);
}
