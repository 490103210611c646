/**
 * Execution Records
 *
 * One execution is one unit of agent work done on behalf of an identity: who
 * asked, what was asked, where it ran and how it ended. Records are plain
 * values; the wire form uses snake_case keys and ISO-8601 timestamps.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ErrorCode, PlatformError, newError, wrap } from '../errors/index.js';

export const EXECUTION_SCHEMA_VERSION = 1;

export enum ExecutionStatus {
  Pending = 'pending',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Canceled = 'canceled',
  Timeout = 'timeout'
}

const TERMINAL_STATUSES: ReadonlySet<string> = new Set([
  ExecutionStatus.Completed,
  ExecutionStatus.Failed,
  ExecutionStatus.Canceled,
  ExecutionStatus.Timeout
]);

export function isValidExecutionStatus(value: unknown): value is ExecutionStatus {
  return Object.values(ExecutionStatus).some((status) => status === value);
}

/**
 * Completed, failed, canceled and timed-out executions never change status again
 */
export function isTerminalExecutionStatus(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface Execution {
  id: string;
  identityId: string;
  /** What the caller asked for, in its own words */
  intent: string;
  status: ExecutionStatus;
  startTime: Date;
  endTime?: Date;
  podName?: string;
  namespace: string;
  model?: string;
  tokensUsed: number;
  errorMessage?: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * An execution whose status has not been checked yet, e.g. one assembled from
 * storage
 */
export type UncheckedExecution = Readonly<Omit<Execution, 'status'>> & { readonly status: string };

function requireNonEmpty(value: string, message: string): void {
  if (value === '') {
    throw newError(ErrorCode.ValidationRequired, message);
  }
}

function isSet(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Create a pending execution with a fresh id. Start, creation and update times
 * are the same instant.
 *
 * @throws {PlatformError} VAL_002 for an empty identity id, intent or namespace
 */
export function newExecution(identityId: string, intent: string, namespace: string): Execution {
  requireNonEmpty(identityId, 'execution identity id must not be empty');
  requireNonEmpty(intent, 'execution intent must not be empty');
  requireNonEmpty(namespace, 'execution namespace must not be empty');

  const now = new Date();
  return {
    id: uuidv4(),
    identityId,
    intent,
    status: ExecutionStatus.Pending,
    startTime: now,
    namespace,
    tokensUsed: 0,
    metadata: {},
    createdAt: new Date(now.getTime()),
    updatedAt: new Date(now.getTime())
  };
}

/**
 * Check an execution record field by field, stopping at the first problem.
 *
 * @throws {PlatformError} VAL_002 for a missing field, VAL_001 for an unknown
 * status, VAL_004 for a negative token count
 */
export function validateExecution(execution: UncheckedExecution): void {
  requireNonEmpty(execution.id, 'execution id is required');
  requireNonEmpty(execution.identityId, 'execution identity id is required');
  requireNonEmpty(execution.intent, 'execution intent is required');
  requireNonEmpty(execution.namespace, 'execution namespace is required');

  if (!isValidExecutionStatus(execution.status)) {
    throw newError(ErrorCode.Validation, `invalid execution status "${execution.status}"`);
  }

  if (!isSet(execution.startTime)) {
    throw newError(ErrorCode.ValidationRequired, 'execution start time is required');
  }
  if (!isSet(execution.createdAt)) {
    throw newError(ErrorCode.ValidationRequired, 'execution creation time is required');
  }
  if (!isSet(execution.updatedAt)) {
    throw newError(ErrorCode.ValidationRequired, 'execution update time is required');
  }

  if (execution.tokensUsed < 0) {
    throw newError(
      ErrorCode.ValidationRange,
      `execution tokensUsed must not be negative, got ${execution.tokensUsed}`
    );
  }
}

export function isExecutionTerminal(execution: Pick<Execution, 'status'>): boolean {
  return isTerminalExecutionStatus(execution.status);
}

/**
 * Milliseconds from start to end, or to `now` while the execution has no end
 * time. Zero when the start time is not set.
 */
export function executionDuration(
  execution: Pick<Execution, 'startTime' | 'endTime'>,
  now: Date = new Date()
): number {
  if (!isSet(execution.startTime)) {
    return 0;
  }
  const end = execution.endTime ?? now;
  return end.getTime() - execution.startTime.getTime();
}

/**
 * Zod Schema for a serialized execution
 */
export const ExecutionJSONSchema = z.object({
  id: z.string(),
  identity_id: z.string(),
  intent: z.string(),
  status: z.nativeEnum(ExecutionStatus),
  start_time: z.string().datetime({ offset: true }),
  end_time: z.string().datetime({ offset: true }).optional(),
  pod_name: z.string().optional(),
  namespace: z.string(),
  model: z.string().optional(),
  tokens_used: z.number().int().optional(),
  error_message: z.string().optional(),
  metadata: z.record(z.unknown()),
  created_at: z.string().datetime({ offset: true }),
  updated_at: z.string().datetime({ offset: true })
});

export type ExecutionJSON = z.infer<typeof ExecutionJSONSchema>;

/**
 * Convert an execution to its wire form. Unset optional fields and a zero
 * token count are omitted; metadata is always present.
 */
export function executionToJSON(execution: Execution): ExecutionJSON {
  const json: ExecutionJSON = {
    id: execution.id,
    identity_id: execution.identityId,
    intent: execution.intent,
    status: execution.status,
    start_time: execution.startTime.toISOString(),
    namespace: execution.namespace,
    metadata: { ...execution.metadata },
    created_at: execution.createdAt.toISOString(),
    updated_at: execution.updatedAt.toISOString()
  };

  if (execution.endTime) {
    json.end_time = execution.endTime.toISOString();
  }
  if (execution.podName) {
    json.pod_name = execution.podName;
  }
  if (execution.model) {
    json.model = execution.model;
  }
  if (execution.tokensUsed !== 0) {
    json.tokens_used = execution.tokensUsed;
  }
  if (execution.errorMessage) {
    json.error_message = execution.errorMessage;
  }

  return json;
}

export function serializeExecution(execution: Execution, pretty = false): string {
  return JSON.stringify(executionToJSON(execution), null, pretty ? 2 : undefined);
}

/**
 * Parse and validate a serialized execution.
 *
 * @throws {PlatformError} VAL_001 for malformed JSON or a shape mismatch, or
 * whatever {@link validateExecution} raises for the decoded record
 */
export function parseExecution(text: string): Execution {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw wrap(error, ErrorCode.Validation, 'execution is not valid JSON');
  }

  const result = ExecutionJSONSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PlatformError(ErrorCode.Validation, `invalid execution: ${issues.join('; ')}`, {
      cause: result.error
    });
  }

  const json = result.data;
  const execution: Execution = {
    id: json.id,
    identityId: json.identity_id,
    intent: json.intent,
    status: json.status,
    startTime: new Date(json.start_time),
    namespace: json.namespace,
    tokensUsed: json.tokens_used ?? 0,
    metadata: { ...json.metadata },
    createdAt: new Date(json.created_at),
    updatedAt: new Date(json.updated_at)
  };
  if (json.end_time !== undefined) {
    execution.endTime = new Date(json.end_time);
  }
  if (json.pod_name !== undefined) {
    execution.podName = json.pod_name;
  }
  if (json.model !== undefined) {
    execution.model = json.model;
  }
  if (json.error_message !== undefined) {
    execution.errorMessage = json.error_message;
  }

  validateExecution(execution);
  return execution;
}
