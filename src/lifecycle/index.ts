/**
 * Agent Lifecycle Module
 *
 * @example
 * ```typescript
 * import { AgentBuilder, State } from './lifecycle/index.js';
 *
 * const agent = new AgentBuilder('agent-001', 'worker', '1.0.0').build();
 * await agent.start();
 * agent.getState(); // State.Running
 * await agent.stop();
 * ```
 */

export {
  State,
  ALL_STATES,
  VALID_TRANSITIONS,
  isValidState,
  isTerminal,
  isValidTransition,
  getValidNextStates
} from './state.js';

export {
  type Capability,
  newCapability,
  cloneCapability,
  cloneCapabilities,
  validateCapability
} from './capability.js';

export {
  BaseAgent,
  type Agent,
  type AgentInfo,
  type BaseAgentOptions,
  type Hook,
  type LifecycleHooks,
  type StateChangeHandler
} from './agent.js';

export { AgentBuilder } from './agent-builder.js';

export {
  CapabilityJSONSchema,
  AgentInfoJSONSchema,
  agentInfoToJSON,
  serializeAgentInfo,
  type AgentInfoJSON
} from './serialization.js';
