/**
 * Octet Format Headless Harness - Runner
 *
 * Executes parsed commands against a parser, formatter and conventions
 * provider owned by the runner, and produces structured output.
 */

import type {
  ParsedCommand,
  Output,
  ResultOutput,
  ValueOutput,
  ErrorOutput,
  InfoOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
  TimeoutErrorOutput,
  StepLimitErrorOutput,
  AbortErrorOutput,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { CommandParser, CommandSyntaxError } from './CommandParser.js';
import {
  type NumericConventions,
  conventionsFromObject,
  getConventions,
  isProfileName,
} from '../core/conventions/NumericConventions.js';
import {
  type ConventionProvider,
  createConventionProvider,
} from '../core/conventions/ConventionProvider.js';
import { type ByteParser, createByteParser } from '../core/parsing/ByteParser.js';
import { type NumberStyle, NumberStyles, parseNumberStyle } from '../core/parsing/NumberStyles.js';
import { type ByteFormatter, createByteFormatter } from '../core/formatting/ByteFormatter.js';
import { UInt8 } from '../core/types/UInt8.js';
import {
  type NumericErrorKind,
  InvalidArgumentError,
  isNumericError,
  isNumericErrorKind,
} from '../core/errors/NumericErrors.js';

// =============================================================================
// Custom Error Classes
// =============================================================================

/**
 * Error thrown when a command exceeds its timeout.
 */
export class CommandTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/** Pending ASSERT_ERROR expectation; a null kind accepts any failure */
interface ExpectedError {
  kind: NumericErrorKind | null;
}

const NUMERIC_TEXT = /^-?\d+(\.\d+)?$/;

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private parser: CommandParser;
  private conventions: ConventionProvider;
  private byteParser: ByteParser;
  private formatter: ByteFormatter;

  // Assertion state
  private lastValue: unknown = undefined;
  private expectError: ExpectedError | null = null;

  // === Safety state ===
  /** Abort controller for cancellation */
  private abortController: AbortController | null = null;
  /** Current step count in script execution */
  private stepCount: number = 0;
  /** Whether the runner is currently executing */
  private isExecuting: boolean = false;

  // Output handler
  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);

    this.parser = new CommandParser();
    this.conventions = createConventionProvider(getConventions(this.config.profile), {
      onChange: (next) => {
        if (this.config.verbose) {
          console.log(`[Conventions] ${JSON.stringify(next)}`);
        }
      },
    });
    this.byteParser = createByteParser(this.conventions);
    this.formatter = createByteFormatter(this.conventions);
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command with timeout protection.
   * This is the primary async entry point for command execution.
   */
  async execute(cmd: ParsedCommand): Promise<Output> {
    if (this.abortController?.signal.aborted) {
      return this.createAbortError('Script was aborted', cmd);
    }

    if (this.config.echoCommands) {
      this.emit(this.createEcho(cmd.raw, cmd));
    }

    // A pending expectation applies to the next command, not ASSERT_ERROR itself
    const expected = cmd.type === 'ASSERT_ERROR' ? null : this.expectError;
    if (expected) {
      this.expectError = null;
    }

    try {
      const result = await this.executeWithTimeout(cmd);

      if (expected && result.type !== 'error') {
        return this.createError('Expected error but command succeeded', cmd);
      }

      return result;
    } catch (error) {
      if (expected) {
        return this.matchExpectedError(error, expected, cmd);
      }
      return this.createErrorFromException(error, cmd);
    }
  }

  /**
   * Execute a command with timeout wrapper.
   * @internal
   */
  private async executeWithTimeout(cmd: ParsedCommand): Promise<Output> {
    const timeoutMs = this.config.commandTimeoutMs;
    const commandAbort = new AbortController();
    const scriptSignal = this.abortController?.signal;
    const onScriptAbort = (): void => commandAbort.abort();
    scriptSignal?.addEventListener('abort', onScriptAbort, { once: true });
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<Output>((_, reject) => {
      timer = setTimeout(() => {
        commandAbort.abort();
        reject(new CommandTimeoutError(cmd.raw, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.executeCommand(cmd, commandAbort.signal),
        timeoutPromise,
      ]);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        return this.createTimeoutError(error.command, error.timeoutMs, cmd);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      scriptSignal?.removeEventListener('abort', onScriptAbort);
    }
  }

  /**
   * Execute multiple commands with step limit protection.
   */
  async executeAll(commands: ParsedCommand[]): Promise<Output[]> {
    const outputs: Output[] = [];
    this.stepCount = 0;
    this.abortController = new AbortController();
    this.isExecuting = true;

    try {
      for (const cmd of commands) {
        if (this.abortController.signal.aborted) {
          const aborted = this.createAbortError('Script was aborted', cmd);
          outputs.push(aborted);
          this.emit(aborted);
          break;
        }

        this.stepCount++;
        if (this.stepCount > this.config.maxStepsPerScript) {
          const limited = this.createStepLimitError(this.stepCount, this.config.maxStepsPerScript, cmd);
          outputs.push(limited);
          this.emit(limited);
          break;
        }

        const output = await this.execute(cmd);
        outputs.push(output);
        this.emit(output);

        if (output.type === 'error') {
          if (output.errorType === 'CommandTimeout' && !this.config.continueOnTimeout) {
            break;
          }
          if (this.config.stopOnError) {
            break;
          }
        }

        if (cmd.type === 'QUIT') {
          break;
        }
      }
    } finally {
      this.isExecuting = false;
      this.abortController = null;
    }

    return outputs;
  }

  /**
   * Route command to appropriate handler.
   * Returns a promise to support async commands like SLEEP.
   */
  private async executeCommand(cmd: ParsedCommand, signal: AbortSignal): Promise<Output> {
    switch (cmd.type) {
      // Conversion
      case 'PARSE': return this.cmdParse(cmd);
      case 'TRY_PARSE': return this.cmdTryParse(cmd);
      case 'FORMAT': return this.cmdFormat(cmd);

      // Value semantics
      case 'COMPARE': return this.cmdCompare(cmd);
      case 'EQUALS': return this.cmdEquals(cmd);
      case 'HASH': return this.cmdHash(cmd);

      // Conventions
      case 'CONVENTIONS': return this.cmdConventions(cmd);
      case 'GET_CONVENTIONS': return this.createValue(this.conventions.current(), cmd);

      // Utility
      case 'ECHO': return this.cmdEcho(cmd);
      case 'SLEEP': return await this.cmdSleep(cmd, signal);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);

      // Control
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.createInfo('Quitting', cmd);
    }
  }

  // ===========================================================================
  // Conversion Commands
  // ===========================================================================

  private cmdParse(cmd: ParsedCommand): Output {
    const text = this.requireTextArg(cmd, 0, 'PARSE requires text (or null)');
    const value = this.byteParser.parse(text, this.styleOption(cmd), this.conventionsOption(cmd));
    return this.createValue(value, cmd);
  }

  private cmdTryParse(cmd: ParsedCommand): Output {
    const text = this.requireTextArg(cmd, 0, 'TRY_PARSE requires text (or null)');
    const result = this.byteParser.tryParse(text, this.styleOption(cmd), this.conventionsOption(cmd));
    return this.createValue({ success: result.success, value: result.value }, cmd);
  }

  private cmdFormat(cmd: ParsedCommand): Output {
    const value = this.numberArg(cmd, 0, 'FORMAT requires a value');
    const token = cmd.args.length > 1 ? this.textArg(cmd, 1) : null;
    return this.createValue(this.formatter.format(value, token, this.conventionsOption(cmd)), cmd);
  }

  // ===========================================================================
  // Value Semantics Commands
  // ===========================================================================

  private cmdCompare(cmd: ParsedCommand): Output {
    const left = UInt8.of(this.numberArg(cmd, 0, 'COMPARE requires two operands'));
    if (cmd.args.length < 2) throw new Error('COMPARE requires two operands');
    const result = left.compareTo(this.operandArg(cmd, 1));
    return this.createValue(Math.sign(result), cmd);
  }

  private cmdEquals(cmd: ParsedCommand): Output {
    const left = UInt8.of(this.numberArg(cmd, 0, 'EQUALS requires two operands'));
    if (cmd.args.length < 2) throw new Error('EQUALS requires two operands');
    return this.createValue(left.equals(this.operandArg(cmd, 1)), cmd);
  }

  private cmdHash(cmd: ParsedCommand): Output {
    const value = UInt8.of(this.numberArg(cmd, 0, 'HASH requires a value'));
    return this.createValue(value.hashCode(), cmd);
  }

  // ===========================================================================
  // Conventions Commands
  // ===========================================================================

  private cmdConventions(cmd: ParsedCommand): Output {
    const spec = cmd.args[0];
    if (spec === undefined) throw new Error('CONVENTIONS requires a profile name or JSON object');

    if (spec.trimStart().startsWith('{')) {
      let data: unknown;
      try {
        data = JSON.parse(spec);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidArgumentError('conventions', `Invalid JSON: ${reason}`);
      }
      this.conventions.update(conventionsFromObject(data, this.conventions.current()));
    } else if (isProfileName(spec)) {
      this.conventions.update(getConventions(spec));
    } else {
      throw new InvalidArgumentError('profile', `Unknown profile '${spec}'`);
    }

    return this.createResult(true, this.conventions.current(), cmd);
  }

  // ===========================================================================
  // Argument Helpers
  // ===========================================================================

  /**
   * Text argument; a bare (unquoted) `null` means no text.
   */
  private textArg(cmd: ParsedCommand, index: number): string | null {
    const text = cmd.args[index];
    if (text === undefined) return null;
    return text === 'null' && !cmd.quoted[index] ? null : text;
  }

  private requireTextArg(cmd: ParsedCommand, index: number, usage: string): string | null {
    if (cmd.args[index] === undefined) throw new Error(usage);
    return this.textArg(cmd, index);
  }

  private numberArg(cmd: ParsedCommand, index: number, usage: string): number {
    const text = cmd.args[index];
    if (text === undefined) throw new Error(usage);
    if (!NUMERIC_TEXT.test(text)) {
      throw new InvalidArgumentError('value', `Expected a number, got '${text}'`);
    }
    return Number(text);
  }

  /**
   * Right-hand operand of COMPARE/EQUALS: null, a UInt8 for numeric text,
   * otherwise the text itself.
   */
  private operandArg(cmd: ParsedCommand, index: number): unknown {
    const text = this.textArg(cmd, index);
    if (text === null) return null;
    if (!cmd.quoted[index] && NUMERIC_TEXT.test(text)) {
      return UInt8.of(Number(text));
    }
    return text;
  }

  private styleOption(cmd: ParsedCommand): NumberStyle {
    const raw = cmd.options.style;
    if (raw === undefined) return NumberStyles.Integer;
    if (typeof raw === 'boolean') {
      throw new InvalidArgumentError('style', `Expected style names or bits, got ${raw}`);
    }
    return parseNumberStyle(String(raw));
  }

  private conventionsOption(cmd: ParsedCommand): NumericConventions | null {
    const raw = cmd.options.profile;
    if (raw === undefined) return null;
    const name = String(raw);
    if (!isProfileName(name)) {
      throw new InvalidArgumentError('profile', `Unknown profile '${name}'`);
    }
    return getConventions(name);
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  private cmdEcho(cmd: ParsedCommand): Output {
    const message = cmd.args.join(' ');
    return this.createEcho(message, cmd);
  }

  private async cmdSleep(cmd: ParsedCommand, signal: AbortSignal): Promise<Output> {
    const requestedMs = parseInt(cmd.args[0] ?? '0', 10);

    if (isNaN(requestedMs) || requestedMs < 0) {
      throw new Error(`SLEEP requires a positive integer, got: ${cmd.args[0]}`);
    }

    // Cap sleep duration to maxSleepMs
    const maxSleepMs = this.config.maxSleepMs;
    const actualMs = Math.min(requestedMs, maxSleepMs);
    const wasCapped = requestedMs > maxSleepMs;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, actualMs);
      signal.addEventListener('abort', () => {
        clearTimeout(timer);
        resolve();
      }, { once: true });
    });

    return this.createResult(true, {
      slept: actualMs,
      requested: requestedMs,
      capped: wasCapped,
    }, cmd);
  }

  /**
   * ASSERT <op> <expected> checks the last value; ASSERT <field> <op>
   * <expected> checks one field of it (e.g. `success` after TRY_PARSE).
   */
  private cmdAssert(cmd: ParsedCommand): Output {
    if (cmd.args.length !== 2 && cmd.args.length !== 3) {
      throw new Error('ASSERT requires [field] operator expected');
    }
    const hasField = cmd.args.length === 3;
    const field = hasField ? cmd.args[0] : null;
    const operator = cmd.args[hasField ? 1 : 0];
    const expectedIndex = hasField ? 2 : 1;
    const expectedText = cmd.args[expectedIndex];
    const expectedQuoted = cmd.quoted[expectedIndex];

    if (this.lastValue === undefined) {
      throw new Error('ASSERT requires a previous value');
    }
    const actual = field === null ? this.lastValue : this.fieldOf(this.lastValue, field);

    let passed: boolean;
    switch (operator) {
      case '==':
      case '=':
        passed = this.valueMatches(actual, expectedText, expectedQuoted);
        break;
      case '!=':
      case '<>':
        passed = !this.valueMatches(actual, expectedText, expectedQuoted);
        break;
      case '>':
      case '<':
      case '>=':
      case '<=':
        passed = this.compareOrdered(actual, operator, expectedText);
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    const expected = !expectedQuoted && NUMERIC_TEXT.test(expectedText) ? Number(expectedText) : expectedText;
    const target = field === null ? 'value' : field;

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${target} ${operator} ${expectedText}`,
    };

    return output;
  }

  private fieldOf(value: unknown, field: string): unknown {
    if (typeof value !== 'object' || value === null) {
      throw new Error(`Last value has no field '${field}'`);
    }
    const entries: Array<[string, unknown]> = Object.entries(value);
    const entry = entries.find(([key]) => key === field);
    if (!entry) {
      throw new Error(`Last value has no field '${field}'`);
    }
    return entry[1];
  }

  /**
   * Numbers compare numerically against unquoted numeric text, objects by
   * their JSON text, everything else by its string form.
   */
  private valueMatches(actual: unknown, expectedText: string, expectedQuoted: boolean): boolean {
    if (typeof actual === 'number' && !expectedQuoted && NUMERIC_TEXT.test(expectedText)) {
      return actual === Number(expectedText);
    }
    if (typeof actual === 'object' && actual !== null) {
      return JSON.stringify(actual) === expectedText;
    }
    return String(actual) === expectedText;
  }

  private compareOrdered(actual: unknown, operator: '>' | '<' | '>=' | '<=', expectedText: string): boolean {
    if (typeof actual !== 'number' || !NUMERIC_TEXT.test(expectedText)) {
      throw new Error(`ASSERT ${operator} requires numeric values`);
    }
    const left = actual;
    const right = Number(expectedText);
    switch (operator) {
      case '>': return left > right;
      case '<': return left < right;
      case '>=': return left >= right;
      case '<=': return left <= right;
    }
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    const raw = cmd.args[0];
    let kind: NumericErrorKind | null = null;
    if (raw !== undefined) {
      if (!isNumericErrorKind(raw)) {
        throw new Error(`Unknown error kind: ${raw}`);
      }
      kind = raw;
    }
    this.expectError = { kind };
    return this.createInfo(
      kind === null ? 'Expecting error on next command' : `Expecting ${kind} error on next command`,
      cmd
    );
  }

  private matchExpectedError(error: unknown, expected: ExpectedError, cmd: ParsedCommand): Output {
    const actualKind = isNumericError(error) ? error.kind : null;

    if (expected.kind === null || expected.kind === actualKind) {
      const label = actualKind ?? (error instanceof Error ? error.name : 'Error');
      return this.createResult(true, { expectedError: label }, cmd);
    }

    const message = error instanceof Error ? error.message : String(error);
    return this.createError(
      `Expected ${expected.kind} error but got ${actualKind ?? 'non-library error'}: ${message}`,
      cmd
    );
  }

  // ===========================================================================
  // Control Commands
  // ===========================================================================

  private cmdReset(cmd: ParsedCommand): Output {
    this.conventions.update(getConventions(this.config.profile));
    this.lastValue = undefined;
    this.expectError = null;

    return this.createResult(true, { reset: true }, cmd);
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private lineNumberOf(cmd: ParsedCommand): number | undefined {
    return this.config.includeLineNumbers ? cmd.lineNumber : undefined;
  }

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      success,
      data,
    };
  }

  private createValue(value: unknown, cmd: ParsedCommand): ValueOutput {
    this.lastValue = value;
    return {
      type: 'value',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      value,
    };
  }

  private createError(
    message: string,
    cmd: ParsedCommand,
    details: Pick<ErrorOutput, 'errorKind' | 'stack'> = {}
  ): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message,
      ...details,
    };
  }

  private createErrorFromException(error: unknown, cmd: ParsedCommand): ErrorOutput {
    const err = error instanceof Error ? error : new Error(String(error));
    return this.createError(err.message, cmd, {
      errorKind: isNumericError(err) ? err.kind : undefined,
      stack: this.config.verbose ? err.stack : undefined,
    });
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message,
    };
  }

  // ===========================================================================
  // Safety Error Helpers
  // ===========================================================================

  private createTimeoutError(command: string, timeoutMs: number, cmd: ParsedCommand): TimeoutErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message: `Command timed out after ${timeoutMs}ms: ${command}`,
      errorType: 'CommandTimeout',
      timeoutMs,
    };
  }

  private createStepLimitError(stepCount: number, maxSteps: number, cmd: ParsedCommand): StepLimitErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message: `Step limit exceeded: ${stepCount} steps (max: ${maxSteps})`,
      errorType: 'StepLimitExceeded',
      stepCount,
      maxSteps,
    };
  }

  private createAbortError(reason: string, cmd: ParsedCommand): AbortErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: this.lineNumberOf(cmd),
      message: `Script aborted: ${reason}`,
      errorType: 'ScriptAborted',
      reason,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    const line = formatOutput(output, this.config);
    if (output.type === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  /**
   * Set a custom output handler.
   */
  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute a single line of input (for interactive mode).
   * Returns false if QUIT command was executed.
   */
  async executeLine(line: string, lineNumber: number = 0): Promise<boolean> {
    let cmd: ParsedCommand | null;
    try {
      cmd = this.parser.parse(line, lineNumber);
    } catch (error) {
      if (!(error instanceof CommandSyntaxError)) throw error;
      this.emit({
        type: 'error',
        timestamp: Date.now(),
        lineNumber: this.config.includeLineNumbers ? lineNumber : undefined,
        message: error.message,
      });
      if (this.config.stopOnError) throw error;
      return true;
    }

    if (!cmd) {
      return true;
    }

    const output = await this.execute(cmd);
    this.emit(output);

    if (cmd.type === 'QUIT') {
      return false;
    }

    if (output.type === 'error' && this.config.stopOnError) {
      throw new Error(output.message);
    }

    return true;
  }

  /**
   * Execute a script (multiple lines) with timeouts, step limits and abort
   * handling.
   *
   * @throws CommandSyntaxError before anything runs if a line is malformed
   */
  async executeScript(script: string): Promise<Output[]> {
    const commands = this.parser.parseScript(script);
    return this.executeAll(commands);
  }

  /**
   * Request abort of running script.
   * Can be called from signal handlers (e.g., SIGINT).
   */
  abort(reason: string = 'User requested abort'): void {
    if (this.abortController && this.isExecuting) {
      this.abortController.abort();
      if (this.config.verbose) {
        console.log(`[Abort] ${reason}`);
      }
    }
  }

  isRunning(): boolean {
    return this.isExecuting;
  }

  getStepCount(): number {
    return this.stepCount;
  }

  /**
   * Conventions currently used when a command names no profile.
   */
  getConventions(): NumericConventions {
    return this.conventions.current();
  }
}

// =============================================================================
// Output Formatting
// =============================================================================

/**
 * Render one output line: JSON, or a short human-readable form.
 */
export function formatOutput(output: Output, config: Pick<HarnessConfig, 'outputFormat' | 'includeTimestamps'>): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output);
  }

  const time = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';
  const line = output.lineNumber !== undefined ? `[${output.lineNumber}] ` : '';
  const prefix = `${time}${line}`;

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'FAIL'}${output.data !== undefined ? `: ${JSON.stringify(output.data)}` : ''}`;
    case 'value':
      return `${prefix}VALUE: ${JSON.stringify(output.value)}`;
    case 'error':
      return `${prefix}ERROR${output.errorKind ? ` (${output.errorKind})` : ''}: ${output.message}`;
    case 'info':
      return `${prefix}INFO: ${output.message}`;
    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}`;
    case 'echo':
      return `${prefix}ECHO: ${output.message}`;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
