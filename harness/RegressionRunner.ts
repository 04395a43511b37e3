/**
 * Octet Format Headless Harness - Regression Runner
 *
 * Batch execution of .u8 scripts as regression tests.
 *
 * Features:
 * - File discovery via simple glob patterns
 * - Isolated execution (fresh runner per file)
 * - Per-file and global reporting
 * - Golden file comparison of the output stream
 * - CI-grade exit codes (see cli.ts)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createHarnessRunner } from './HarnessRunner.js';
import { type HarnessConfig, type Output, DEFAULT_CONFIG } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Error classification for test failures */
export type ErrorType = 'Timeout' | 'StepLimit' | 'Assertion' | 'Runtime' | 'Golden';

/** Result of executing a single script */
export interface TestFileResult {
  filePath: string;
  fileName: string;
  passed: boolean;
  durationMs: number;
  /** Number of commands executed */
  commandCount: number;
  /** First failure, if any */
  error?: {
    type: ErrorType;
    message: string;
    lineNumber?: number;
    command?: string;
  };
  /** Golden file status, when golden comparison is enabled */
  golden?: {
    created: boolean;
    matched: boolean;
    diffSummary?: string;
  };
  /** All outputs from the script */
  outputs: Output[];
}

/** Result of batch execution */
export interface BatchResult {
  results: TestFileResult[];
  total: number;
  passed: number;
  failed: number;
  totalDurationMs: number;
  allPassed: boolean;
}

export interface RegressionRunnerOptions {
  /** Enable golden file comparison */
  golden: boolean;
  /** Rewrite golden files even if they exist */
  updateGolden: boolean;
  /** Harness configuration overrides */
  config: Partial<HarnessConfig>;
  verbose: boolean;
  outputFormat: 'pretty' | 'json';
  /** Run only scripts whose file name contains this substring */
  filter?: string;
  /** Stop on first failure */
  failFast: boolean;
}

export const DEFAULT_REGRESSION_OPTIONS: RegressionRunnerOptions = {
  golden: false,
  updateGolden: false,
  config: {},
  verbose: false,
  outputFormat: 'pretty',
  failFast: false,
};

export const SCRIPT_EXTENSION = '.u8';
export const GOLDEN_EXTENSION = '.golden';

// =============================================================================
// File Discovery
// =============================================================================

/**
 * Resolve a path or pattern to script files, sorted.
 *
 * Supports:
 * - Exact paths: scripts/parse.u8
 * - Directories: scripts/ (every .u8 file directly inside)
 * - Wildcards: scripts/*.u8
 * - Recursive: scripts/**\/*.u8
 */
export function discoverFiles(pattern: string, basePath: string = process.cwd()): string[] {
  const resolved = path.resolve(basePath, pattern);
  if (fs.existsSync(resolved)) {
    const stat = fs.statSync(resolved);
    if (stat.isFile()) return [resolved];
    if (stat.isDirectory()) return scanDirectory(resolved, `*${SCRIPT_EXTENSION}`, false);
  }

  const parts = pattern.replace(/\\/g, '/').split('/');
  const firstWild = parts.findIndex((part) => part.includes('*') || part.includes('?'));
  if (firstWild === -1) return [];

  const baseDir = path.resolve(basePath, ...parts.slice(0, firstWild));
  if (!fs.existsSync(baseDir) || !fs.statSync(baseDir).isDirectory()) {
    return [];
  }

  const recursive = parts.slice(firstWild).includes('**');
  return scanDirectory(baseDir, parts[parts.length - 1], recursive);
}

function scanDirectory(dir: string, namePattern: string, recursive: boolean): string[] {
  const regex = globToRegex(namePattern);
  const files: string[] = [];

  const visit = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (recursive) visit(fullPath);
      } else if (entry.isFile() && regex.test(entry.name)) {
        files.push(fullPath);
      }
    }
  };

  visit(dir);
  return files.sort();
}

/**
 * `*` matches any run of characters, `?` a single one.
 */
function globToRegex(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`, 'i');
}

// =============================================================================
// Golden Files
// =============================================================================

export function getGoldenPath(scriptPath: string): string {
  const dir = path.dirname(scriptPath);
  const base = path.basename(scriptPath, path.extname(scriptPath));
  return path.join(dir, `${base}${GOLDEN_EXTENSION}`);
}

export function loadGoldenFile(goldenPath: string): string | null {
  return fs.existsSync(goldenPath) ? fs.readFileSync(goldenPath, 'utf-8') : null;
}

export function saveGoldenFile(goldenPath: string, content: string): void {
  fs.writeFileSync(goldenPath, content, 'utf-8');
}

/**
 * One JSON object per output line, timestamps removed.
 */
export function outputsToGoldenContent(outputs: Output[]): string {
  return outputs
    .map((output) => {
      const { timestamp: _timestamp, ...rest } = output;
      return JSON.stringify(rest);
    })
    .join('\n') + '\n';
}

/**
 * Compare golden contents line by line. Returns null on a match, or a
 * summary of the first difference.
 */
export function compareGolden(expected: string, actual: string): string | null {
  const expectedLines = expected.trimEnd().split('\n');
  const actualLines = actual.trimEnd().split('\n');
  const length = Math.max(expectedLines.length, actualLines.length);

  const differing: number[] = [];
  for (let i = 0; i < length; i++) {
    if ((expectedLines[i] ?? '') !== (actualLines[i] ?? '')) {
      differing.push(i);
    }
  }
  if (differing.length === 0) return null;

  const first = differing[0];
  const clip = (text: string): string => (text.length > 80 ? `${text.substring(0, 80)}...` : text);
  return [
    `First difference at line ${first + 1}:`,
    `  Expected: ${clip(expectedLines[first] ?? '')}`,
    `  Actual:   ${clip(actualLines[first] ?? '')}`,
    `Total: ${differing.length} line(s) differ`,
  ].join('\n');
}

// =============================================================================
// Script Execution
// =============================================================================

function classifyFailure(outputs: Output[]): TestFileResult['error'] {
  for (const output of outputs) {
    if (output.type === 'error') {
      let type: ErrorType = 'Runtime';
      if (output.errorType === 'CommandTimeout') type = 'Timeout';
      else if (output.errorType === 'StepLimitExceeded') type = 'StepLimit';
      return { type, message: output.message, lineNumber: output.lineNumber, command: output.command };
    }
    if (output.type === 'assert' && !output.passed) {
      return {
        type: 'Assertion',
        message: output.message ?? `Expected ${JSON.stringify(output.expected)}, got ${JSON.stringify(output.actual)}`,
        lineNumber: output.lineNumber,
        command: output.command,
      };
    }
  }
  return undefined;
}

/**
 * Run one script in a fresh runner.
 */
export async function executeTestFile(
  filePath: string,
  options: RegressionRunnerOptions
): Promise<TestFileResult> {
  const fileName = path.basename(filePath);
  const startTime = Date.now();
  const outputs: Output[] = [];

  const runner = createHarnessRunner(
    { ...DEFAULT_CONFIG, ...options.config, outputFormat: 'json' },
    (output) => outputs.push(output)
  );

  let error: TestFileResult['error'];
  try {
    const script = fs.readFileSync(filePath, 'utf-8');
    await runner.executeScript(script);
    error = classifyFailure(outputs);
  } catch (failure) {
    error = {
      type: 'Runtime',
      message: failure instanceof Error ? failure.message : String(failure),
    };
  }

  let golden: TestFileResult['golden'];
  if (options.golden && !error) {
    const goldenPath = getGoldenPath(filePath);
    const actualContent = outputsToGoldenContent(outputs);
    const existing = loadGoldenFile(goldenPath);

    if (existing === null || options.updateGolden) {
      saveGoldenFile(goldenPath, actualContent);
      golden = { created: true, matched: true };
    } else {
      const diffSummary = compareGolden(existing, actualContent);
      golden = diffSummary === null
        ? { created: false, matched: true }
        : { created: false, matched: false, diffSummary };
      if (diffSummary !== null) {
        error = { type: 'Golden', message: 'Golden file mismatch' };
      }
    }
  }

  return {
    filePath,
    fileName,
    passed: error === undefined,
    durationMs: Date.now() - startTime,
    commandCount: runner.getStepCount(),
    error,
    golden,
    outputs,
  };
}

/**
 * Run scripts in order, honoring the filter and fail-fast options.
 */
export async function executeBatch(
  files: string[],
  options: RegressionRunnerOptions,
  onFileComplete?: (result: TestFileResult, index: number, total: number) => void
): Promise<BatchResult> {
  const startTime = Date.now();
  const filter = options.filter?.toLowerCase();
  const selected = filter === undefined
    ? files
    : files.filter((file) => path.basename(file).toLowerCase().includes(filter));

  const results: TestFileResult[] = [];
  for (let i = 0; i < selected.length; i++) {
    const result = await executeTestFile(selected[i], options);
    results.push(result);
    onFileComplete?.(result, i, selected.length);

    if (options.failFast && !result.passed) {
      break;
    }
  }

  const passed = results.filter((r) => r.passed).length;
  return {
    results,
    total: results.length,
    passed,
    failed: results.length - passed,
    totalDurationMs: Date.now() - startTime,
    allPassed: passed === results.length,
  };
}

// =============================================================================
// Reporting
// =============================================================================

/** ANSI color codes for terminal output */
const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
};

export function formatTestResult(result: TestFileResult, verbose: boolean = false): string {
  const status = result.passed
    ? `${colors.green}PASS${colors.reset}`
    : `${colors.red}FAIL${colors.reset}`;
  const lines = [`${status} ${result.fileName} ${colors.gray}(${result.durationMs}ms)${colors.reset}`];

  if (result.golden?.created) {
    lines[0] += ` ${colors.yellow}[golden created]${colors.reset}`;
  } else if (result.golden && !result.golden.matched) {
    lines[0] += ` ${colors.red}[golden mismatch]${colors.reset}`;
  }

  if (result.error) {
    lines.push(`     ${colors.red}${result.error.type}: ${result.error.message}${colors.reset}`);
    if (result.error.lineNumber !== undefined) {
      lines.push(`     at line ${result.error.lineNumber}: ${result.error.command ?? ''}`);
    }
    if (verbose && result.golden?.diffSummary) {
      lines.push(`     ${result.golden.diffSummary.replace(/\n/g, '\n     ')}`);
    }
  }

  return lines.join('\n');
}

export function formatBatchSummary(batch: BatchResult): string {
  const verdict = batch.allPassed
    ? `${colors.green}${colors.bold}All scripts passed${colors.reset}`
    : `${colors.red}${colors.bold}${batch.failed} script(s) failed${colors.reset}`;

  return [
    '',
    '─'.repeat(50),
    `${colors.bold}Total:${colors.reset}  ${batch.total}   ` +
      `${colors.green}Passed:${colors.reset} ${batch.passed}   ` +
      `${colors.red}Failed:${colors.reset} ${batch.failed}   ` +
      `${colors.gray}Time:${colors.reset} ${batch.totalDurationMs}ms`,
    verdict,
    '',
  ].join('\n');
}

export function formatBatchAsJson(batch: BatchResult): string {
  return JSON.stringify({
    total: batch.total,
    passed: batch.passed,
    failed: batch.failed,
    durationMs: batch.totalDurationMs,
    allPassed: batch.allPassed,
    results: batch.results.map((r) => ({
      file: r.fileName,
      passed: r.passed,
      durationMs: r.durationMs,
      commandCount: r.commandCount,
      error: r.error,
      golden: r.golden ? { created: r.golden.created, matched: r.golden.matched } : undefined,
    })),
  }, null, 2);
}

// =============================================================================
// Main Runner Class
// =============================================================================

/**
 * Regression runner for .u8 scripts.
 */
export class RegressionRunner {
  private options: RegressionRunnerOptions;

  constructor(options: Partial<RegressionRunnerOptions> = {}) {
    this.options = { ...DEFAULT_REGRESSION_OPTIONS, ...options };
  }

  /**
   * Run every script matching one or more patterns, printing a report.
   */
  async run(patterns: string | string[], basePath?: string): Promise<BatchResult> {
    const list = Array.isArray(patterns) ? patterns : [patterns];
    const files = Array.from(
      new Set(list.flatMap((pattern) => discoverFiles(pattern, basePath)))
    ).sort();

    if (files.length === 0) {
      console.error(`No scripts found matching: ${list.join(', ')}`);
      return { results: [], total: 0, passed: 0, failed: 0, totalDurationMs: 0, allPassed: true };
    }

    if (this.options.verbose) {
      console.log(`Found ${files.length} script(s)\n`);
    }

    const batch = await executeBatch(files, this.options, (result) => {
      if (this.options.outputFormat === 'pretty') {
        console.log(formatTestResult(result, this.options.verbose));
      }
    });

    console.log(this.options.outputFormat === 'pretty' ? formatBatchSummary(batch) : formatBatchAsJson(batch));
    return batch;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createRegressionRunner(
  options?: Partial<RegressionRunnerOptions>
): RegressionRunner {
  return new RegressionRunner(options);
}
