/**
 * Octet Format - Formatting Module Exports
 */

export { ByteFormatter, byteFormatter, createByteFormatter } from './ByteFormatter.js';
export type { FormatKind, FormatSpec } from './ByteFormatter.js';
