/**
 * Error thrown on an illegal test lifecycle transition
 */

import type { ExecutionState } from '../types';

export class ExecutionStateError extends Error {
  public readonly from: ExecutionState;
  public readonly to: ExecutionState;

  constructor(from: ExecutionState, to: ExecutionState) {
    super(`Illegal test state transition: ${from} -> ${to}`);
    this.name = 'ExecutionStateError';
    this.from = from;
    this.to = to;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExecutionStateError);
    }
  }
}
