/**
 * Agent info serialization
 *
 * JSON shape of {@link AgentInfo} snapshots, for status endpoints and logs.
 * Empty capability lists and the running-only timestamp fields are omitted.
 */

import { z } from 'zod';
import type { AgentInfo } from './agent.js';
import { State } from './state.js';

/**
 * Zod Schema for a serialized capability
 */
export const CapabilityJSONSchema = z.object({
  name: z.string().min(1, { message: 'capability name must not be empty' }),
  version: z.string().min(1, { message: 'capability version must not be empty' }),
  description: z.string(),
  metadata: z.record(z.string()).optional(),
});

/**
 * Zod Schema for a serialized agent info snapshot
 */
export const AgentInfoJSONSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.string().min(1),
  state: z.nativeEnum(State),
  capabilities: z.array(CapabilityJSONSchema).optional(),
  startedAt: z.string().datetime().optional(),
  uptimeMs: z.number().int().nonnegative().optional(),
});

export type AgentInfoJSON = z.infer<typeof AgentInfoJSONSchema>;

/**
 * Convert an info snapshot to its JSON form
 */
export function agentInfoToJSON(info: AgentInfo): AgentInfoJSON {
  const json: AgentInfoJSON = {
    id: info.id,
    name: info.name,
    version: info.version,
    state: info.state,
  };

  if (info.capabilities.length > 0) {
    json.capabilities = info.capabilities.map((capability) => ({
      name: capability.name,
      version: capability.version,
      description: capability.description,
      ...(capability.metadata ? { metadata: { ...capability.metadata } } : {}),
    }));
  }

  if (info.startedAt) {
    json.startedAt = info.startedAt.toISOString();
    json.uptimeMs = Math.round(info.uptimeMs);
  }

  return json;
}

/**
 * Serialize an info snapshot to a JSON string
 */
export function serializeAgentInfo(info: AgentInfo, pretty = false): string {
  return JSON.stringify(agentInfoToJSON(info), null, pretty ? 2 : undefined);
}
