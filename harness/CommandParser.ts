/**
 * Octet Format Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Conversion:
 *   PARSE 123                              - Parse with the Integer style
 *   PARSE "  (1,000)  " style=Currency     - Quoted text keeps its spaces
 *   PARSE null                             - Bare null passes no text
 *   TRY_PARSE ff style=HexNumber           - Parse without raising
 *   FORMAT 42 x4 profile=de-DE             - Format with a token
 *
 * Value semantics:
 *   COMPARE 234 235 / EQUALS 78 78 / HASH 78
 *
 * Conventions:
 *   CONVENTIONS fr-FR                      - Switch to a built-in profile
 *   CONVENTIONS '{"negativeSign":"neg"}'   - Overrides as JSON
 *   GET_CONVENTIONS
 *
 * Quoted tokens are always positional, so `PARSE "a=b"` passes the text
 * `a=b` instead of an option.
 */

import type { CommandType, ParsedCommand } from './types.js';

// =============================================================================
// Command Parser
// =============================================================================

const VALID_COMMANDS: readonly CommandType[] = [
  // Conversion
  'PARSE', 'TRY_PARSE', 'FORMAT',
  // Value semantics
  'COMPARE', 'EQUALS', 'HASH',
  // Conventions
  'CONVENTIONS', 'GET_CONVENTIONS',
  // Utility
  'ECHO', 'SLEEP', 'ASSERT', 'ASSERT_ERROR',
  // Control
  'RESET', 'QUIT',
];

export function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.some((command) => command === value);
}

interface Token {
  text: string;
  quoted: boolean;
}

export class CommandParser {
  /**
   * Parse a single command line. Returns null for blank lines and comments.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    const commandStr = tokens[0].text.toUpperCase();
    if (tokens[0].quoted || !isCommandType(commandStr)) {
      throw new CommandSyntaxError(`Unknown command: ${commandStr}`, lineNumber, trimmed);
    }

    const args: string[] = [];
    const quoted: boolean[] = [];
    const options: Record<string, string | boolean | number> = {};

    for (let i = 1; i < tokens.length; i++) {
      const token = tokens[i];

      // key=value, where key is an identifier and the token was not quoted
      const eqIndex = token.text.indexOf('=');
      const key = eqIndex > 0 ? token.text.substring(0, eqIndex) : '';
      if (!token.quoted && /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
        options[key] = this.parseOptionValue(token.text.substring(eqIndex + 1));
        continue;
      }

      args.push(token.text);
      quoted.push(token.quoted);
    }

    return {
      type: commandStr,
      args,
      quoted,
      options,
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines. Line numbers are 1-based.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';
    // Quotes right after `key=` form the option value, not a new token
    let optionValue = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (inQuotes) {
        if (char === quoteChar) {
          tokens.push({ text: current, quoted: !optionValue });
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          const next = line[i + 1];
          if (next === quoteChar || next === '\\') {
            current += next;
            i++;
          } else if (next === 'n' || next === 't') {
            current += next === 'n' ? '\n' : '\t';
            i++;
          } else if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(line.substring(i + 2, i + 6))) {
            current += String.fromCharCode(parseInt(line.substring(i + 2, i + 6), 16));
            i += 5;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        optionValue = current.endsWith('=');
        if (current !== '' && !optionValue) {
          tokens.push({ text: current, quoted: false });
          current = '';
        }
        inQuotes = true;
        quoteChar = char;
      } else if (char === ' ' || char === '\t') {
        if (current !== '') {
          tokens.push({ text: current, quoted: false });
          current = '';
        }
      } else {
        current += char;
      }
    }

    if (inQuotes) {
      throw new CommandSyntaxError('Unterminated string', lineNumber, line);
    }

    if (current !== '') {
      tokens.push({ text: current, quoted: false });
    }

    return tokens;
  }

  /**
   * Parse an option value to appropriate type.
   */
  private parseOptionValue(value: string): string | boolean | number {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    if (/^-?\d+(\.\d+)?$/.test(value)) {
      return parseFloat(value);
    }

    return value;
  }
}

// =============================================================================
// Syntax Error
// =============================================================================

export class CommandSyntaxError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Syntax error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'CommandSyntaxError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
