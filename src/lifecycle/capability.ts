/**
 * Agent Capabilities
 *
 * A capability is one discrete, versioned feature an agent advertises.
 * Capabilities are plain values; the agent clones them whenever they cross its
 * public boundary so callers can never alias its internal metadata maps.
 */

import { validation } from '../errors/index.js';

export interface Capability {
  /** Identity of the capability, e.g. "text-generation" */
  name: string;
  /** Semantic version, e.g. "1.2.0" */
  version: string;
  /** Free-text description */
  description: string;
  /** Arbitrary string key/value pairs; absent when empty */
  metadata?: Record<string, string>;
}

function copyMetadata(metadata: Readonly<Record<string, string>> | undefined): Record<string, string> | undefined {
  if (!metadata || Object.keys(metadata).length === 0) {
    return undefined;
  }
  return { ...metadata };
}

function build(
  name: string,
  version: string,
  description: string,
  metadata: Readonly<Record<string, string>> | undefined
): Capability {
  const capability: Capability = { name, version, description };
  const copied = copyMetadata(metadata);
  if (copied) {
    capability.metadata = copied;
  }
  return capability;
}

/**
 * Check that a capability has a name and a version.
 *
 * @throws {PlatformError} VAL_001 naming the missing field
 */
export function validateCapability(capability: Pick<Capability, 'name' | 'version'>): void {
  if (capability.name === '') {
    throw validation('capability name must not be empty');
  }
  if (capability.version === '') {
    throw validation(`capability "${capability.name}" version must not be empty`);
  }
}

/**
 * Create a validated capability. The metadata map is copied; an empty map is
 * stored as absent.
 *
 * @example
 * ```typescript
 * const cap = newCapability('summarize', '1.0.0', 'Summarizes documents', { model: 'small' });
 * ```
 */
export function newCapability(
  name: string,
  version: string,
  description = '',
  metadata?: Readonly<Record<string, string>>
): Capability {
  validateCapability({ name, version });
  return build(name, version, description, metadata);
}

/**
 * Copy a capability, including an independent copy of its metadata.
 */
export function cloneCapability(capability: Readonly<Capability>): Capability {
  return build(capability.name, capability.version, capability.description, capability.metadata);
}

export function cloneCapabilities(capabilities: readonly Capability[]): Capability[] {
  return capabilities.map(cloneCapability);
}
