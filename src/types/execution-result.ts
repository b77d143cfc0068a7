/**
 * Execution outcome types
 */

import type { TestCase } from './test-case';

export type ExecutionState =
  | 'pending'
  | 'running'
  | 'passed'
  | 'failed'
  | 'skipped'
  | 'expected-fail'
  | 'unexpected-pass';

export type TerminalState = Exclude<ExecutionState, 'pending' | 'running'>;

export type TestStatus = 'PASS' | 'FAIL' | 'SKIP' | 'TODO';

export interface ExecutionResult {
  readonly testCase: TestCase;
  readonly state: TerminalState;
  readonly status: TestStatus;
  readonly output: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly countsAsPassing: boolean;
}

/**
 * One line of the result stream, field names as consumed by report tooling
 */
export interface ResultRecord {
  readonly file: string;
  readonly test: string;
  readonly status: TestStatus;
  readonly message: string;
  readonly duration_ms: number;
}

export interface RunCounts {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly todo: number;
}
