/**
 * Data Models Module
 */

export {
  EXECUTION_SCHEMA_VERSION,
  ExecutionStatus,
  ExecutionJSONSchema,
  isValidExecutionStatus,
  isTerminalExecutionStatus,
  newExecution,
  validateExecution,
  isExecutionTerminal,
  executionDuration,
  executionToJSON,
  serializeExecution,
  parseExecution,
  type Execution,
  type ExecutionJSON,
  type UncheckedExecution
} from './execution.js';
