import { describe, it, expect } from 'vitest';
import {
  EXECUTION_SCHEMA_VERSION,
  ExecutionJSONSchema,
  ExecutionStatus,
  executionDuration,
  executionToJSON,
  isExecutionTerminal,
  isTerminalExecutionStatus,
  isValidExecutionStatus,
  newExecution,
  parseExecution,
  serializeExecution,
  validateExecution,
  type Execution
} from '../../src/models/execution.js';
import { ErrorCode, getCode } from '../../src/errors/index.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function execution(overrides: Partial<Execution> = {}): Execution {
  return {
    id: 'exec-001',
    identityId: 'user-123',
    intent: 'summarize the report',
    status: ExecutionStatus.Running,
    startTime: new Date('2026-01-01T00:00:00.000Z'),
    namespace: 'default',
    tokensUsed: 0,
    metadata: {},
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:05.000Z'),
    ...overrides
  };
}

describe('Execution', () => {
  it('should be at schema version 1', () => {
    expect(EXECUTION_SCHEMA_VERSION).toBe(1);
  });

  describe('Status', () => {
    it('should accept the six statuses only', () => {
      expect(Object.values(ExecutionStatus).every(isValidExecutionStatus)).toBe(true);
      expect(isValidExecutionStatus('paused')).toBe(false);
      expect(isValidExecutionStatus('')).toBe(false);
    });

    it('should treat finished statuses as terminal', () => {
      expect(isTerminalExecutionStatus(ExecutionStatus.Completed)).toBe(true);
      expect(isTerminalExecutionStatus(ExecutionStatus.Failed)).toBe(true);
      expect(isTerminalExecutionStatus(ExecutionStatus.Canceled)).toBe(true);
      expect(isTerminalExecutionStatus(ExecutionStatus.Timeout)).toBe(true);
      expect(isTerminalExecutionStatus(ExecutionStatus.Pending)).toBe(false);
      expect(isTerminalExecutionStatus(ExecutionStatus.Running)).toBe(false);
    });

    it('should report terminal executions', () => {
      expect(isExecutionTerminal(execution({ status: ExecutionStatus.Failed }))).toBe(true);
      expect(isExecutionTerminal(execution())).toBe(false);
    });
  });

  describe('newExecution()', () => {
    it('should create a pending execution with a fresh id', () => {
      const created = newExecution('user-123', 'summarize the report', 'default');

      expect(created.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(created).toMatchObject({
        identityId: 'user-123',
        intent: 'summarize the report',
        namespace: 'default',
        status: ExecutionStatus.Pending,
        tokensUsed: 0,
        metadata: {}
      });
      expect(created.endTime).toBeUndefined();
      expect(created.createdAt.getTime()).toBe(created.startTime.getTime());
      expect(created.updatedAt.getTime()).toBe(created.startTime.getTime());
    });

    it('should give every execution its own id', () => {
      const first = newExecution('user-123', 'a', 'default');
      const second = newExecution('user-123', 'a', 'default');
      expect(first.id).not.toBe(second.id);
    });

    it('should produce a record that passes validation', () => {
      expect(() => validateExecution(newExecution('user-123', 'a', 'default'))).not.toThrow();
    });

    it.each([
      [['', 'a', 'default'], 'execution identity id must not be empty'],
      [['user-123', '', 'default'], 'execution intent must not be empty'],
      [['user-123', 'a', ''], 'execution namespace must not be empty'],
      [['', '', ''], 'execution identity id must not be empty']
    ] as const)('should reject %j', ([identityId, intent, namespace], message) => {
      const error = thrownBy(() => newExecution(identityId, intent, namespace));
      expect(getCode(error)).toBe(ErrorCode.ValidationRequired);
      expect(error).toHaveProperty('message', message);
    });
  });

  describe('validateExecution()', () => {
    it('should accept a complete record', () => {
      expect(() => validateExecution(execution())).not.toThrow();
    });

    it.each([
      ['id', { id: '' }, 'execution id is required'],
      ['identity id', { identityId: '' }, 'execution identity id is required'],
      ['intent', { intent: '' }, 'execution intent is required'],
      ['namespace', { namespace: '' }, 'execution namespace is required'],
      ['start time', { startTime: new Date(Number.NaN) }, 'execution start time is required'],
      ['creation time', { createdAt: new Date(Number.NaN) }, 'execution creation time is required'],
      ['update time', { updatedAt: new Date(Number.NaN) }, 'execution update time is required']
    ])('should require the %s', (_field, overrides, message) => {
      const error = thrownBy(() => validateExecution(execution(overrides)));
      expect(getCode(error)).toBe(ErrorCode.ValidationRequired);
      expect(error).toHaveProperty('message', message);
    });

    it('should reject an unknown status', () => {
      const error = thrownBy(() => validateExecution({ ...execution(), status: 'paused' }));
      expect(getCode(error)).toBe(ErrorCode.Validation);
      expect(error).toHaveProperty('message', 'invalid execution status "paused"');
    });

    it('should reject a negative token count', () => {
      const error = thrownBy(() => validateExecution(execution({ tokensUsed: -5 })));
      expect(getCode(error)).toBe(ErrorCode.ValidationRange);
      expect(error).toHaveProperty('message', 'execution tokensUsed must not be negative, got -5');
    });

    it('should report the first problem only', () => {
      const error = thrownBy(() => validateExecution({ ...execution({ id: '', tokensUsed: -1 }), status: 'x' }));
      expect(error).toHaveProperty('message', 'execution id is required');
    });
  });

  describe('executionDuration()', () => {
    it('should measure start to end', () => {
      const finished = execution({ endTime: new Date('2026-01-01T00:01:30.000Z') });
      expect(executionDuration(finished)).toBe(90_000);
    });

    it('should measure to now while running', () => {
      const now = new Date('2026-01-01T00:00:02.500Z');
      expect(executionDuration(execution(), now)).toBe(2_500);
    });

    it('should be zero without a start time', () => {
      expect(executionDuration(execution({ startTime: new Date(Number.NaN) }))).toBe(0);
    });
  });

  describe('Serialization', () => {
    it('should use snake_case keys and omit unset fields', () => {
      expect(executionToJSON(execution())).toEqual({
        id: 'exec-001',
        identity_id: 'user-123',
        intent: 'summarize the report',
        status: 'running',
        start_time: '2026-01-01T00:00:00.000Z',
        namespace: 'default',
        metadata: {},
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:05.000Z'
      });
    });

    it('should include optional fields when set', () => {
      const json = executionToJSON(
        execution({
          status: ExecutionStatus.Failed,
          endTime: new Date('2026-01-01T00:00:10.000Z'),
          podName: 'worker-0',
          model: 'small',
          tokensUsed: 420,
          errorMessage: 'upstream closed the stream',
          metadata: { attempt: 2 }
        })
      );

      expect(json).toMatchObject({
        status: 'failed',
        end_time: '2026-01-01T00:00:10.000Z',
        pod_name: 'worker-0',
        model: 'small',
        tokens_used: 420,
        error_message: 'upstream closed the stream',
        metadata: { attempt: 2 }
      });
      expect(ExecutionJSONSchema.safeParse(json).success).toBe(true);
    });

    it('should copy metadata into the wire form', () => {
      const record = execution({ metadata: { attempt: 1 } });
      const json = executionToJSON(record);
      record.metadata.attempt = 2;
      expect(json.metadata).toEqual({ attempt: 1 });
    });

    it('should parse what it serializes', () => {
      const record = execution({
        endTime: new Date('2026-01-01T00:00:10.000Z'),
        model: 'small',
        tokensUsed: 12,
        metadata: { source: 'cli' }
      });

      expect(parseExecution(serializeExecution(record, true))).toEqual(record);
    });

    it('should default a missing token count to zero', () => {
      const text = JSON.stringify({
        id: 'exec-002',
        identity_id: 'svc-router',
        intent: 'route',
        status: 'pending',
        start_time: '2026-02-01T10:00:00Z',
        namespace: 'jobs',
        metadata: {},
        created_at: '2026-02-01T10:00:00Z',
        updated_at: '2026-02-01T10:00:00Z'
      });

      const parsed = parseExecution(text);
      expect(parsed.tokensUsed).toBe(0);
      expect(parsed.startTime.toISOString()).toBe('2026-02-01T10:00:00.000Z');
    });

    it('should reject malformed JSON', () => {
      const error = thrownBy(() => parseExecution('{not json'));
      expect(getCode(error)).toBe(ErrorCode.Validation);
      expect(error).toHaveProperty('message', 'execution is not valid JSON');
    });

    it('should reject an unknown status in the wire form', () => {
      const json = { ...executionToJSON(execution()), status: 'paused' };
      const error = thrownBy(() => parseExecution(JSON.stringify(json)));
      expect(getCode(error)).toBe(ErrorCode.Validation);
      expect(error).toHaveProperty('message', expect.stringMatching(/^invalid execution: status: /));
    });

    it('should validate the decoded record', () => {
      const json = { ...executionToJSON(execution()), intent: '' };
      const error = thrownBy(() => parseExecution(JSON.stringify(json)));
      expect(getCode(error)).toBe(ErrorCode.ValidationRequired);
      expect(error).toHaveProperty('message', 'execution intent is required');
    });
  });
});
