/**
 * Octet Format - Error Module Exports
 */

export {
  NumericError,
  NullInputError,
  InvalidStyleError,
  FormatError,
  OverflowError,
  InvalidFormatError,
  InvalidArgumentError,
  NUMERIC_ERROR_KINDS,
  isNumericError,
  isNumericErrorKind,
} from './NumericErrors.js';
export type { NumericErrorKind } from './NumericErrors.js';
