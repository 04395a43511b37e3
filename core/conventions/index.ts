/**
 * Octet Format - Conventions Module Exports
 */

export {
  DEFAULT_CONVENTIONS,
  createConventions,
  conventionsFromObject,
  validateConventions,
  getConventions,
  isProfileName,
  listProfiles,
  groupDigits,
} from './NumericConventions.js';
export type {
  NumericConventions,
  ConventionOverrides,
  ProfileName,
} from './NumericConventions.js';

export {
  ConventionProvider,
  currentConventions,
  createConventionProvider,
  resolveConventions,
} from './ConventionProvider.js';
export type {
  ConventionSource,
  ConventionProviderEvents,
} from './ConventionProvider.js';
