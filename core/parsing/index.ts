/**
 * Octet Format - Parsing Module Exports
 */

export {
  NumberStyles,
  validateNumberStyle,
  hasFlag,
  parseNumberStyle,
  describeNumberStyle,
} from './NumberStyles.js';
export type { NumberStyle, NumberStyleName } from './NumberStyles.js';

export {
  ByteParser,
  byteParser,
  createByteParser,
  scanNumber,
  computeByte,
} from './ByteParser.js';
export type {
  TryParseResult,
  ScannedNumber,
  ParseFailure,
  ParseOutcome,
} from './ByteParser.js';
