/**
 * Service Configuration Schema
 *
 * TypeScript types and Zod schemas for the configuration an agent service
 * loads at startup.
 */

import { z } from 'zod';

/**
 * Capability reference in `name@version` form
 *
 * @example "summarize@1.0.0"
 */
export const CAPABILITY_REF_PATTERN = /^[^@\s]+@[^@\s]+$/;

/**
 * Zod Schema for Agent Configuration
 */
export const AgentConfigSchema = z.object({
  /** Unique agent instance identifier */
  id: z.string().min(1),
  /** Human-readable agent name */
  name: z.string().min(1),
  /** Agent semantic version */
  version: z.string().min(1),
  /** Advertised capabilities as `name@version` references */
  capabilities: z.array(
    z.string().regex(CAPABILITY_REF_PATTERN, {
      message: 'capability must be in name@version form',
    }),
  ),
});

/**
 * Zod Schema for Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  /** Optional file path for log output */
  filePath: z.string().optional(),
  consoleOutput: z.boolean(),
  /** Emit JSON lines instead of the human-readable format */
  json: z.boolean(),
});

/**
 * Complete Service Configuration Schema
 */
export const ServiceConfigSchema = z.object({
  agent: AgentConfigSchema,
  logging: LoggingConfigSchema,
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
