/**
 * Test Runner Component
 *
 * Drives an execution plan strictly in order: each test runs to completion
 * in the isolated executor before the next starts, and every result is fed
 * to the result stream and the reporters as soon as it exists.
 */

import type { ExecutionPlan, ExecutionResult, RunCounts, TestCase } from '../types';
import type { RunReporter } from './console-reporter';
import type { ResultStream } from './result-stream';
import { logger } from '../utils/logger';

/**
 * Runs one test case; the isolated executor is the production implementation
 */
export interface TestExecutor {
  execute(testCase: TestCase): Promise<ExecutionResult>;
}

export interface RunOutcome {
  readonly results: readonly ExecutionResult[];
  readonly counts: RunCounts;
}

/**
 * Interface for sequential plan execution
 */
export interface TestRunner {
  run(plan: ExecutionPlan): Promise<RunOutcome>;
}

/**
 * Counts results; skipped and todo tests count as passed
 */
export function tally(results: readonly ExecutionResult[]): RunCounts {
  let passed = 0;
  let skipped = 0;
  let todo = 0;

  for (const result of results) {
    if (result.countsAsPassing) {
      passed += 1;
    }
    if (result.state === 'skipped') {
      skipped += 1;
    }
    if (result.state === 'expected-fail' || result.state === 'unexpected-pass') {
      todo += 1;
    }
  }

  return { total: results.length, passed, failed: results.length - passed, skipped, todo };
}

/**
 * Implementation of TestRunner over an executor, a result stream and reporters
 */
export class TestRunnerImpl implements TestRunner {
  /**
   * @param executor - Runs each test in isolation
   * @param reporters - Receive the plan, every result and the final counts
   * @param stream - Staging stream for result records, when one is kept
   */
  constructor(
    private readonly executor: TestExecutor,
    private readonly reporters: readonly RunReporter[],
    private readonly stream?: ResultStream
  ) {}

  async run(plan: ExecutionPlan): Promise<RunOutcome> {
    logger.info('Running tests', { total: plan.total, loadFailures: plan.loadFailures.length });

    for (const reporter of this.reporters) {
      reporter.start(plan);
    }

    const results: ExecutionResult[] = [];
    for (const testCase of plan.cases) {
      const result = await this.executor.execute(testCase);
      results.push(result);
      this.stream?.append(result);
      for (const reporter of this.reporters) {
        reporter.result(result);
      }
    }

    const counts = tally(results);
    for (const reporter of this.reporters) {
      reporter.finish(counts);
    }

    logger.info('Test run completed', { ...counts });
    return { results, counts };
  }
}
