export {
  classifyCompletion,
  formatFileTimestamp,
  formatOutcomeDump,
  formatSummaryLine,
  formatSummaryTimestamp,
  isPass,
  outcomeKinds,
  outcomeLabel,
  type Outcome,
  type OutcomeKind,
} from './outcome.js';

export {
  SpawnError,
  SupervisedProcess,
  type CompletionResult,
  type CompletionState,
  type ProcessState,
  type SpawnImpl,
} from './supervisedProcess.js';

export { exitCodeFromExitEvent, isProcessAlive, signalProcess, type ProcessSignalTarget } from './processTermination.js';
export { buildCommandVector, splitShellWords, COMMAND_PLACEHOLDER } from './commandLine.js';
export { buildSummaryFileName, deriveRunLogDir, SummarySink, SUMMARY_TIMESTAMP_TOKEN } from './summarySink.js';
export { PipelineRun, runLogPath, sanitizeRunId, type PipelineRunParams } from './pipelineRun.js';

export {
  formatIterationLine,
  runEnduranceLoop,
  type EnduranceLoopParams,
  type EnduranceResult,
  type EnduranceStopReason,
  type OutcomePair,
} from './enduranceLoop.js';

export {
  parseTestRecords,
  RECORD_DELIMITER,
  RECORD_FIELD_COUNT,
  TestRecordError,
  type ParsedTestRecords,
  type TestRecord,
} from './testRecords.js';

export {
  readTestRecordFile,
  runTestSession,
  type RecordResult,
  type SessionResult,
  type TestSessionParams,
} from './testDriver.js';

export {
  ConfigError,
  resolveSupervisorConfig,
  supervisorConfigSchema,
  type SupervisorConfig,
  type SupervisorConfigInput,
} from './config.js';

export { main, type MainDeps } from './cli.js';
