/**
 * Builds agents from service configuration
 */

import { validation } from '../errors/index.js';
import { AgentBuilder, newCapability, type Capability } from '../lifecycle/index.js';
import type { AgentConfig } from '../config/index.js';
import type { StructuredLogger } from '../logging/logger.js';

/**
 * Parse a `name@version` capability reference
 *
 * @example
 * ```typescript
 * parseCapabilityRef('summarize@1.2.0'); // { name: 'summarize', version: '1.2.0', description: '' }
 * ```
 */
export function parseCapabilityRef(ref: string): Capability {
  const separator = ref.lastIndexOf('@');
  if (separator <= 0) {
    throw validation(`capability reference "${ref}" must be in name@version form`);
  }
  return newCapability(ref.slice(0, separator), ref.slice(separator + 1));
}

/**
 * Start an AgentBuilder from the `agent` configuration section
 */
export function agentBuilderFromConfig(config: AgentConfig, logger: StructuredLogger): AgentBuilder {
  return new AgentBuilder(config.id, config.name, config.version)
    .withCapabilities(config.capabilities.map(parseCapabilityRef))
    .withLogger(logger);
}
