/**
 * Error thrown when a mock or stub cannot be registered or removed
 */

import type { SubstitutionKind } from '../types';

export type SubstitutionFailure =
  | 'missing-name'
  | 'missing-implementation'
  | 'invalid-implementation'
  | 'builtin'
  | 'already-registered'
  | 'not-registered';

export class SubstitutionError extends Error {
  public readonly reason: SubstitutionFailure;
  public readonly kind: SubstitutionKind;
  public readonly target: string;

  constructor(message: string, reason: SubstitutionFailure, kind: SubstitutionKind, target: string) {
    super(message);
    this.name = 'SubstitutionError';
    this.reason = reason;
    this.kind = kind;
    this.target = target;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SubstitutionError);
    }
  }
}
