/**
 * Octet Format - Value Types
 */

export { UInt8, MIN_VALUE, MAX_VALUE, isByteValue, compare } from './UInt8.js';
