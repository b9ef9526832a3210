import { Platform } from './types.js';

/**
 * Programmer-facing error for trees that violate structural invariants or that a
 * translator cannot express. Raised regardless of linter mode.
 */
export class QueryStructureError extends Error {
  /** Platform whose rules were violated, when known */
  public readonly platform?: Platform;

  /** Short description of the offending node */
  public readonly node?: string;

  constructor(message: string, options: { platform?: Platform; node?: string } = {}) {
    super(message);
    this.name = 'QueryStructureError';
    this.platform = options.platform;
    this.node = options.node;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryStructureError);
    }
  }
}
