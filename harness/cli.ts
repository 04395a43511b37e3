#!/usr/bin/env node
/**
 * Octet Format Headless Harness - CLI Entry Point
 *
 * Usage:
 *   # REPL or piped mode
 *   octet-harness [options]
 *   octet-harness < script.u8
 *   echo "PARSE ff style=HexNumber" | octet-harness
 *
 *   # Regression runner
 *   octet-harness run <glob-or-path...> [options]
 *   octet-harness run harness/scripts --golden
 */

import * as readline from 'node:readline';
import { type HarnessRunner, createHarnessRunner, formatOutput } from './HarnessRunner.js';
import { type HarnessConfig, DEFAULT_CONFIG } from './types.js';
import {
  type RegressionRunnerOptions,
  createRegressionRunner,
} from './RegressionRunner.js';
import { isProfileName, listProfiles } from '../core/conventions/NumericConventions.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
  /** Subcommand: 'run' for regression scripts, undefined for REPL */
  subcommand?: 'run';
  /** Positional arguments of the subcommand */
  subcommandArgs: string[];
  runOptions: Partial<RegressionRunnerOptions>;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
    subcommandArgs: [],
    runOptions: {},
  };

  let i = 0;
  if (args[0] === 'run') {
    result.subcommand = 'run';
    result.runOptions.outputFormat = 'pretty';
    i = 1;
  }

  for (; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        result.runOptions.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        result.runOptions.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        result.runOptions.verbose = true;
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--profile': {
        const name = requireValue(args, ++i, '--profile');
        if (!isProfileName(name)) {
          throw new UsageError(`Unknown profile '${name}' (expected one of ${listProfiles().join(', ')})`);
        }
        result.config.profile = name;
        break;
      }
      case '--timeout': {
        const ms = Number(requireValue(args, ++i, '--timeout'));
        if (!Number.isInteger(ms) || ms <= 0) {
          throw new UsageError('--timeout requires a positive integer');
        }
        result.config.commandTimeoutMs = ms;
        break;
      }
      // Run command options
      case '--golden':
        result.runOptions.golden = true;
        break;
      case '--update-golden':
        result.runOptions.golden = true;
        result.runOptions.updateGolden = true;
        break;
      case '--fail-fast':
        result.runOptions.failFast = true;
        break;
      case '--filter':
        result.runOptions.filter = requireValue(args, ++i, '--filter');
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (result.subcommand) {
          result.subcommandArgs.push(arg);
        }
    }
  }

  return result;
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Octet Format Headless Harness

USAGE:
  octet-harness [options]                     Interactive or piped commands
  octet-harness run <glob-or-path...> [opts]  Run .u8 regression scripts

OPTIONS:
  --pretty           Human-readable output (default: JSON)
  --json             JSON output (one object per line)
  --no-timestamps    Omit timestamps from pretty output
  --stop-on-error    Stop execution on first error
  --echo             Echo commands before executing
  --profile <name>   Starting conventions (${listProfiles().join(', ')})
  --timeout <ms>     Per-command timeout
  --verbose, -v      Verbose mode with extra logging
  --interactive, -i  Force interactive mode
  --help, -h         Show this help message

RUN OPTIONS:
  --golden           Compare output with .golden files (created if missing)
  --update-golden    Rewrite .golden files (implies --golden)
  --filter <str>     Run only scripts whose name contains <str>
  --fail-fast        Stop on first failing script

COMMANDS:
  PARSE <text> [style=<styles>] [profile=<name>]      Parse a byte
  TRY_PARSE <text> [style=<styles>] [profile=<name>]  Parse without raising
  FORMAT <value> [token] [profile=<name>]             Format a byte (G, D, X, N)
  COMPARE <a> <b>                                     Sign of a.compareTo(b)
  EQUALS <a> <b>                                      a.equals(b)
  HASH <a>                                            Hash code
  CONVENTIONS <profile | JSON>                        Replace current conventions
  GET_CONVENTIONS                                     Show current conventions
  ECHO <message>                                      Print message
  SLEEP <ms>                                          Sleep for milliseconds
  ASSERT [field] <op> <expected>                      Check the last value
  ASSERT_ERROR [kind]                                 Expect next command to fail
  RESET                                               Restore starting state
  QUIT                                                Exit

  Quote text to keep spaces: PARSE "  12  ". A bare null passes no text.
  Styles are names joined by | or numbers: style=Integer|AllowParentheses

EXAMPLES:
  ASSERT_ERROR Overflow
  PARSE "(1,000)" style=Currency

  FORMAT 42 x4
  ASSERT == 002a

  TRY_PARSE 300
  ASSERT success == false
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<number> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (cliArgs.subcommand === 'run') {
    return runRegressionScripts(cliArgs);
  }

  const config: HarnessConfig = { ...DEFAULT_CONFIG, ...cliArgs.config };
  const runner = createHarnessRunner(config, (output) => {
    console.log(formatOutput(output, config));
  });

  if (cliArgs.interactive || process.stdin.isTTY) {
    return runInteractive(runner, config);
  }
  process.once('SIGINT', () => runner.abort('Interrupted'));
  return runPiped(runner);
}

// =============================================================================
// Modes
// =============================================================================

async function runRegressionScripts(cliArgs: CLIArgs): Promise<number> {
  const patterns = cliArgs.subcommandArgs;
  if (patterns.length === 0) {
    console.error('Error: run requires at least one file, directory or glob pattern');
    console.error('Usage: octet-harness run <glob-or-path...> [options]');
    return 1;
  }

  const runner = createRegressionRunner({ ...cliArgs.runOptions, config: cliArgs.config });
  const batch = await runner.run(patterns);
  return batch.allPassed ? 0 : 1;
}

async function runInteractive(runner: HarnessRunner, config: HarnessConfig): Promise<number> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'u8> ',
  });

  if (config.verbose) {
    console.log('Octet Format Headless Harness');
    console.log('Type "help" for commands, "quit" to exit.\n');
  }

  rl.on('SIGINT', () => rl.close());
  rl.prompt();
  let lineNumber = 0;

  for await (const line of rl) {
    lineNumber++;
    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    try {
      if (!(await runner.executeLine(line, lineNumber))) {
        rl.close();
        return 0;
      }
    } catch (error) {
      // executeLine only throws under --stop-on-error, after emitting the error
      if (config.verbose) {
        console.error(error instanceof Error ? error.message : String(error));
      }
      rl.close();
      return 1;
    }

    rl.prompt();
  }

  return 0;
}

async function runPiped(runner: HarnessRunner): Promise<number> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  const outputs = await runner.executeScript(lines.join('\n'));
  const failed = outputs.some((o) => o.type === 'error' || (o.type === 'assert' && !o.passed));
  return failed ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof UsageError) {
      console.error(error.message);
      process.exitCode = 2;
      return;
    }
    console.error('Fatal error:', error);
    process.exitCode = 1;
  }
);
