/**
 * Plain console reporter
 */

import type { ExecutionPlan, ExecutionResult, RunCounts } from '../types';
import { cleanOutput } from '../utils/sanitize';

export type LineWriter = (line: string) => void;

/**
 * What the test runner drives while a plan executes
 */
export interface RunReporter {
  start(plan: ExecutionPlan): void;
  result(result: ExecutionResult): void;
  note(text: string): void;
  finish(counts: RunCounts): void;
}

const RULE = '-'.repeat(40);

export class ConsoleReporter implements RunReporter {
  constructor(
    private readonly writeLine: LineWriter,
    private readonly verbose: boolean = false
  ) {}

  start(plan: ExecutionPlan): void {
    for (const failure of plan.loadFailures) {
      this.writeLine(`Error: ${failure.message}`);
    }
    this.writeLine(plan.total === 0 ? 'No tests found.' : `Found ${plan.total} tests.`);
  }

  result(result: ExecutionResult): void {
    const { name, directive } = result.testCase;
    const reason = directive.kind === 'none' ? '' : directive.reason;

    switch (result.state) {
      case 'skipped':
        this.writeLine(reason === '' ? `SKIP: ${name}` : `SKIP: ${name} (${reason})`);
        return;
      case 'expected-fail':
        this.writeLine(`TODO: ${name} (${result.durationMs}ms)${reason === '' ? '' : ` # ${reason}`}`);
        break;
      case 'unexpected-pass':
        this.writeLine(`PASS: ${name} (${result.durationMs}ms) # TODO unexpectedly passed`);
        break;
      case 'passed':
        this.writeLine(`PASS: ${name} (${result.durationMs}ms)`);
        break;
      case 'failed':
        this.writeLine(`FAIL: ${name} (${result.durationMs}ms)`);
        break;
    }

    if (result.state === 'failed' || this.verbose) {
      this.writeOutput(result.output);
    }
  }

  note(text: string): void {
    this.writeLine('');
    for (const line of text.split('\n')) {
      this.writeLine(line);
    }
  }

  finish(counts: RunCounts): void {
    this.writeLine('');
    this.writeLine(RULE);
    this.writeLine('Test Summary');
    this.writeLine(RULE);
    this.writeLine(`Total tests: ${counts.total}`);
    this.writeLine(`Passed: ${counts.passed}`);
    this.writeLine(`Failed: ${counts.failed}`);
    if (counts.skipped > 0) {
      this.writeLine(`Skipped: ${counts.skipped}`);
    }
    if (counts.todo > 0) {
      this.writeLine(`Todo: ${counts.todo}`);
    }
    this.writeLine(RULE);
  }

  private writeOutput(output: string): void {
    const cleaned = cleanOutput(output);
    if (cleaned === '') {
      return;
    }
    for (const line of cleaned.split('\n')) {
      this.writeLine(`    ${line}`);
    }
  }
}
