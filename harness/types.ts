/**
 * Octet Format Headless Harness - Types
 *
 * Command protocol and output types for stdin/stdout testing.
 */

import type { NumericErrorKind } from '../core/errors/NumericErrors.js';
import type { ProfileName } from '../core/conventions/NumericConventions.js';

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  // Conversion
  | 'PARSE'           // PARSE " 12 " style=Integer profile=de-DE
  | 'TRY_PARSE'       // TRY_PARSE abc style=HexNumber
  | 'FORMAT'          // FORMAT 42 x4 profile=fr-FR

  // Value semantics
  | 'COMPARE'         // COMPARE 234 null
  | 'EQUALS'          // EQUALS 78 78
  | 'HASH'            // HASH 78

  // Conventions
  | 'CONVENTIONS'     // CONVENTIONS de-DE | CONVENTIONS '{"decimalSeparator":","}'
  | 'GET_CONVENTIONS' // GET_CONVENTIONS

  // Utility
  | 'ECHO'            // ECHO message (for debugging)
  | 'SLEEP'           // SLEEP 100 (ms, for timing tests)
  | 'ASSERT'          // ASSERT == 12 | ASSERT success == false
  | 'ASSERT_ERROR'    // ASSERT_ERROR [Overflow] (next command should fail)

  // Control
  | 'RESET'           // RESET (invariant conventions, no last value)
  | 'QUIT';           // QUIT

export interface ParsedCommand {
  type: CommandType;
  args: string[];
  /** Whether each arg was written in quotes (a bare `null` means no text) */
  quoted: boolean[];
  options: Record<string, string | boolean | number>;
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'    // Command result
  | 'value'     // Parsed, formatted or computed value
  | 'error'     // Error message
  | 'info'      // Info message
  | 'assert'    // Assertion result
  | 'echo';     // Echo output

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  value: unknown;
}

export type SafetyErrorType = 'CommandTimeout' | 'StepLimitExceeded' | 'ScriptAborted';

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  /** Set when the command failed with a library error */
  errorKind?: NumericErrorKind;
  /** Set when the harness itself stopped the command */
  errorType?: SafetyErrorType;
  stack?: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: unknown;
  actual: unknown;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | ErrorOutput
  | InfoOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in pretty output */
  includeTimestamps: boolean;
  /** Include line numbers in output */
  includeLineNumbers: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Verbose mode (extra logging) */
  verbose: boolean;
  /** Conventions the runner starts from and returns to on RESET */
  profile: ProfileName;

  // === Safety Configuration ===
  /** Per-command timeout in milliseconds (default: 2000ms) */
  commandTimeoutMs: number;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Maximum SLEEP duration in ms (default: 10000ms) */
  maxSleepMs: number;
  /** Continue execution on timeout (vs. abort script) */
  continueOnTimeout: boolean;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: true,
  includeLineNumbers: true,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  profile: 'invariant',
  // Safety defaults
  commandTimeoutMs: 2000,
  maxStepsPerScript: 10000,
  maxSleepMs: 10000,
  continueOnTimeout: false,
};

// =============================================================================
// Safety Error Types
// =============================================================================

export interface TimeoutErrorOutput extends ErrorOutput {
  errorType: 'CommandTimeout';
  timeoutMs: number;
}

export interface StepLimitErrorOutput extends ErrorOutput {
  errorType: 'StepLimitExceeded';
  stepCount: number;
  maxSteps: number;
}

export interface AbortErrorOutput extends ErrorOutput {
  errorType: 'ScriptAborted';
  reason: string;
}
