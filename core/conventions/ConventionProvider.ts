/**
 * Octet Format - Convention Provider
 *
 * Holds the "current" conventions snapshot used when a caller passes none.
 * The provider is owned by the host (process startup, locale switch); the
 * parser and formatter only ever call `current()`.
 */

import {
  type NumericConventions,
  DEFAULT_CONVENTIONS,
  createConventions,
  validateConventions,
} from './NumericConventions.js';

// =============================================================================
// Types
// =============================================================================

export interface ConventionSource {
  /** Current snapshot. Read once per formatting/parsing call. */
  current(): NumericConventions;
}

export interface ConventionProviderEvents {
  /** Called after the snapshot has been replaced */
  onChange?: (next: NumericConventions, previous: NumericConventions) => void;
}

/**
 * Validate a snapshot before it is installed. Frozen snapshots keep their
 * identity; anything else is copied and frozen.
 */
function toSnapshot(conventions: NumericConventions): NumericConventions {
  if (Object.isFrozen(conventions) && Object.isFrozen(conventions.groupSizes)) {
    validateConventions(conventions);
    return conventions;
  }
  return createConventions(conventions);
}

// =============================================================================
// ConventionProvider Class
// =============================================================================

export class ConventionProvider implements ConventionSource {
  private snapshot: NumericConventions;
  private events: ConventionProviderEvents;

  constructor(
    initial: NumericConventions = DEFAULT_CONVENTIONS,
    events: ConventionProviderEvents = {}
  ) {
    this.snapshot = toSnapshot(initial);
    this.events = events;
  }

  current(): NumericConventions {
    return this.snapshot;
  }

  /**
   * Replace the current snapshot. Snapshots are swapped whole, so a call
   * that already read the old one keeps a consistent view.
   */
  update(next: NumericConventions): void {
    const previous = this.snapshot;
    this.snapshot = toSnapshot(next);
    this.events.onChange?.(this.snapshot, previous);
  }

  /**
   * Restore the invariant conventions.
   */
  reset(): void {
    this.update(DEFAULT_CONVENTIONS);
  }

  setEventHandlers(events: ConventionProviderEvents): void {
    this.events = events;
  }
}

// =============================================================================
// Singleton Instance
// =============================================================================

/** Process-wide provider consulted when no conventions are given */
export const currentConventions = new ConventionProvider();

// =============================================================================
// Factory Function
// =============================================================================

export function createConventionProvider(
  initial?: NumericConventions,
  events?: ConventionProviderEvents
): ConventionProvider {
  return new ConventionProvider(initial, events);
}

/**
 * Resolve an optional conventions argument against a source.
 */
export function resolveConventions(
  conventions: NumericConventions | null | undefined,
  source: ConventionSource = currentConventions
): NumericConventions {
  return conventions ?? source.current();
}
