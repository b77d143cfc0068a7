import { describe, it, expect, beforeEach } from 'vitest';
import { ConsoleReporter } from './console-reporter';
import type { Directive, ExecutionResult, TerminalState, TestCase, TestStatus } from '../types';

const STATUS: Record<TerminalState, TestStatus> = {
  passed: 'PASS',
  'unexpected-pass': 'PASS',
  failed: 'FAIL',
  skipped: 'SKIP',
  'expected-fail': 'TODO'
};

function makeResult(name: string, state: TerminalState, output: string = '', directive: Directive = { kind: 'none' }): ExecutionResult {
  const testCase: TestCase = {
    file: { path: '/work/math_test.js', relativePath: 'math_test.js', pattern: '*_test.js' },
    name,
    directive
  };
  return {
    testCase,
    state,
    status: STATUS[state],
    output,
    exitCode: state === 'failed' ? 1 : 0,
    durationMs: 2,
    countsAsPassing: state !== 'failed'
  };
}

describe('ConsoleReporter', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
  });

  it('should announce the number of tests', () => {
    const reporter = new ConsoleReporter((line) => lines.push(line));

    reporter.start({ cases: [], total: 0, loadFailures: [] });
    reporter.start({ cases: [], total: 4, loadFailures: [] });

    expect(lines).toEqual(['No tests found.', 'Found 4 tests.']);
  });

  it('should print one line per result and failure output', () => {
    const reporter = new ConsoleReporter((line) => lines.push(line));

    reporter.result(makeResult('test_add', 'passed', 'PASS: should be equal'));
    reporter.result(makeResult('test_sub', 'failed', "\u001b[31mFAIL: Expected '1', got '2'\u001b[0m\n  expected: 1"));
    reporter.result(makeResult('test_net', 'skipped', '', { kind: 'skip', reason: 'offline' }));
    reporter.result(makeResult('test_wip', 'expected-fail', 'boom', { kind: 'todo', reason: 'later' }));
    reporter.result(makeResult('test_done', 'unexpected-pass', '', { kind: 'todo', reason: '' }));

    expect(lines).toEqual([
      'PASS: test_add (2ms)',
      'FAIL: test_sub (2ms)',
      "    FAIL: Expected '1', got '2'",
      '      expected: 1',
      'SKIP: test_net (offline)',
      'TODO: test_wip (2ms) # later',
      'PASS: test_done (2ms) # TODO unexpectedly passed'
    ]);
  });

  it('should print all output in verbose mode', () => {
    const reporter = new ConsoleReporter((line) => lines.push(line), true);

    reporter.result(makeResult('test_add', 'passed', 'PASS: should be equal\n'));

    expect(lines).toEqual(['PASS: test_add (2ms)', '    PASS: should be equal']);
  });

  it('should print a summary block', () => {
    const reporter = new ConsoleReporter((line) => lines.push(line));

    reporter.finish({ total: 4, passed: 3, failed: 1, skipped: 1, todo: 0 });

    const rule = '-'.repeat(40);
    expect(lines).toEqual(['', rule, 'Test Summary', rule, 'Total tests: 4', 'Passed: 3', 'Failed: 1', 'Skipped: 1', rule]);
  });
});
