/**
 * Octet Format Headless Harness - Module Exports
 *
 * A text-based harness for the byte parser and formatter.
 * Enables scripted testing via a stdin/stdout command protocol.
 */

export { CommandParser, createCommandParser, CommandSyntaxError, isCommandType } from './CommandParser.js';

export { HarnessRunner, createHarnessRunner, CommandTimeoutError, formatOutput } from './HarnessRunner.js';

export {
  RegressionRunner,
  createRegressionRunner,
  discoverFiles,
  executeTestFile,
  executeBatch,
  getGoldenPath,
  loadGoldenFile,
  saveGoldenFile,
  outputsToGoldenContent,
  compareGolden,
  formatTestResult,
  formatBatchSummary,
  formatBatchAsJson,
  SCRIPT_EXTENSION,
  GOLDEN_EXTENSION,
} from './RegressionRunner.js';

export type {
  CommandType,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  ErrorOutput,
  InfoOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
  SafetyErrorType,
  TimeoutErrorOutput,
  StepLimitErrorOutput,
  AbortErrorOutput,
} from './types.js';

export type {
  ErrorType,
  TestFileResult,
  BatchResult,
  RegressionRunnerOptions,
} from './RegressionRunner.js';

export { DEFAULT_CONFIG } from './types.js';
export { DEFAULT_REGRESSION_OPTIONS } from './RegressionRunner.js';
