/**
 * AgentBuilder - fluent construction of {@link BaseAgent}
 *
 * Inputs accumulate without validation; {@link AgentBuilder.build} validates
 * everything at once and copies every mutable input so later changes to the
 * caller's objects never reach the agent.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder('agent-001', 'summarizer', '1.0.0')
 *   .withCapability(newCapability('summarize', '1.0.0'))
 *   .withOnStart(async (signal) => { await warmUp(signal); })
 *   .onStateChange((from, to) => console.log(`${from} → ${to}`))
 *   .build();
 * ```
 */

import { validation } from '../errors/index.js';
import { getLogger, type StructuredLogger } from '../logging/logger.js';
import { BaseAgent, type Hook, type LifecycleHooks, type StateChangeHandler } from './agent.js';
import { type Capability, cloneCapability, validateCapability } from './capability.js';

export class AgentBuilder {
  private readonly capabilities: Capability[] = [];
  private readonly stateHandlers: StateChangeHandler[] = [];
  private readonly hooks: LifecycleHooks = {};
  private logger: StructuredLogger | undefined;

  constructor(
    private readonly id: string,
    private readonly name: string,
    private readonly version: string
  ) {}

  withCapability(capability: Capability): this {
    this.capabilities.push(capability);
    return this;
  }

  withCapabilities(capabilities: readonly Capability[]): this {
    this.capabilities.push(...capabilities);
    return this;
  }

  /**
   * Logger for lifecycle events and handler failures. Defaults to the
   * process-wide logger.
   */
  withLogger(logger: StructuredLogger): this {
    this.logger = logger;
    return this;
  }

  withOnStart(hook: Hook): this {
    this.hooks.onStart = hook;
    return this;
  }

  withOnStop(hook: Hook): this {
    this.hooks.onStop = hook;
    return this;
  }

  withOnPause(hook: Hook): this {
    this.hooks.onPause = hook;
    return this;
  }

  withOnResume(hook: Hook): this {
    this.hooks.onResume = hook;
    return this;
  }

  /**
   * Register a state-change handler. Handlers are notified in registration order.
   */
  onStateChange(handler: StateChangeHandler): this {
    this.stateHandlers.push(handler);
    return this;
  }

  /**
   * @throws {PlatformError} VAL_001 for an empty id, name or version, or for the
   *   first capability without a name or version
   */
  build(): BaseAgent {
    if (this.id === '') {
      throw validation('agent id must not be empty');
    }
    if (this.name === '') {
      throw validation('agent name must not be empty');
    }
    if (this.version === '') {
      throw validation('agent version must not be empty');
    }

    // Capabilities may be plain objects that never went through newCapability
    for (const capability of this.capabilities) {
      validateCapability(capability);
    }

    return new BaseAgent({
      id: this.id,
      name: this.name,
      version: this.version,
      capabilities: this.capabilities.map(cloneCapability),
      logger: this.logger ?? getLogger(),
      hooks: { ...this.hooks },
      stateHandlers: [...this.stateHandlers]
    });
  }
}
