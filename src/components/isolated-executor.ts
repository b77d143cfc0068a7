/**
 * Isolated Executor
 *
 * Runs one planned test in a fresh script context and turns what happened
 * into a frozen ExecutionResult. Each test walks a small lifecycle:
 * pending → running → terminal, or pending → skipped for skip directives.
 */

import { performance } from 'perf_hooks';
import type { Directive, ExecutionResult, ExecutionState, TerminalState, TestCase, TestStatus } from '../types';
import { ExecutionStateError } from '../errors';
import { ScriptContext } from './script-context';
import type { TraceCollector } from './trace-collector';
import { trimTrailingNewlines } from '../utils/sanitize';
import { logger } from '../utils/logger';

const TRANSITIONS: Record<ExecutionState, readonly ExecutionState[]> = {
  pending: ['running', 'skipped'],
  running: ['passed', 'failed', 'expected-fail', 'unexpected-pass'],
  passed: [],
  failed: [],
  skipped: [],
  'expected-fail': [],
  'unexpected-pass': []
};

const STATUS_BY_STATE: Record<TerminalState, TestStatus> = {
  passed: 'PASS',
  'unexpected-pass': 'PASS',
  failed: 'FAIL',
  skipped: 'SKIP',
  'expected-fail': 'TODO'
};

export class TestLifecycle {
  private current: ExecutionState = 'pending';

  get state(): ExecutionState {
    return this.current;
  }

  /**
   * @throws {ExecutionStateError} When the move is not allowed from the current state
   */
  transition(next: ExecutionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new ExecutionStateError(this.current, next);
    }
    this.current = next;
  }
}

/**
 * Terminal state for a completed (not skipped) test
 */
export function terminalState(directive: Directive, exitCode: number): TerminalState {
  if (directive.kind === 'todo') {
    return exitCode === 0 ? 'unexpected-pass' : 'expected-fail';
  }
  return exitCode === 0 ? 'passed' : 'failed';
}

type RejectionListener = (reason: unknown, promise: Promise<unknown>) => void;

/**
 * Holds the process's unhandledRejection event while one context runs.
 *
 * Rejections of promises the context created are reported as failures of
 * the running test. Anything else goes to the listeners that were installed
 * before, which are put back on release.
 */
export class RejectionTrap {
  private suspended: RejectionListener[] = [];
  private readonly listener: RejectionListener = (reason, promise) => this.handle(reason, promise);
  private installed = false;

  constructor(private readonly context: ScriptContext) {}

  install(): void {
    if (this.installed) {
      return;
    }
    this.suspended = process.listeners('unhandledRejection');
    process.removeAllListeners('unhandledRejection');
    process.on('unhandledRejection', this.listener);
    this.installed = true;
  }

  release(): void {
    if (!this.installed) {
      return;
    }
    process.removeListener('unhandledRejection', this.listener);
    for (const listener of this.suspended) {
      process.on('unhandledRejection', listener);
    }
    this.suspended = [];
    this.installed = false;
  }

  private handle(reason: unknown, promise: Promise<unknown>): void {
    if (this.context.ownsPromise(promise)) {
      this.context.reportAsyncError(reason);
      return;
    }
    if (this.suspended.length === 0) {
      logger.warn('Unhandled rejection outside the running test', { reason: String(reason) });
    }
    for (const listener of this.suspended) {
      listener(reason, promise);
    }
  }
}

export interface IsolatedExecutorOptions {
  readonly rootDir: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly traceCollector?: TraceCollector;
  readonly clock?: () => number;
}

export class IsolatedExecutor {
  private readonly clock: () => number;

  constructor(private readonly options: IsolatedExecutorOptions) {
    this.clock = options.clock ?? (() => performance.now());
  }

  async execute(testCase: TestCase): Promise<ExecutionResult> {
    const lifecycle = new TestLifecycle();

    if (testCase.directive.kind === 'skip') {
      lifecycle.transition('skipped');
      return createResult(testCase, 'skipped', '', 0, 0);
    }

    lifecycle.transition('running');
    const started = this.clock();
    const collector = this.options.traceCollector;
    const context = new ScriptContext({
      cwd: this.options.rootDir,
      env: this.options.env,
      name: `${testCase.file.relativePath}:${testCase.name}`,
      tracing: collector ? { collector, sink: collector.beginTest(testCase.name) } : undefined
    });

    const trap = new RejectionTrap(context);
    trap.install();

    let exitCode: number;
    try {
      const completed = await this.runInContext(context, testCase);
      const asyncStatus = await context.settle();
      exitCode = completed !== 0 ? completed : asyncStatus;
    } finally {
      context.dispose();
      trap.release();
    }

    const durationMs = Math.max(0, Math.round(this.clock() - started));
    const state = terminalState(testCase.directive, exitCode);
    lifecycle.transition(state);

    logger.debug('Test finished', {
      file: testCase.file.relativePath,
      test: testCase.name,
      state,
      exitCode,
      durationMs
    });

    return createResult(testCase, state, trimTrailingNewlines(context.output.text()), exitCode, durationMs);
  }

  private async runInContext(context: ScriptContext, testCase: TestCase): Promise<number> {
    try {
      context.source(testCase.file.path);
    } catch (error) {
      return context.reportError(error);
    }
    return context.invoke(testCase.name);
  }
}

function createResult(
  testCase: TestCase,
  state: TerminalState,
  output: string,
  exitCode: number,
  durationMs: number
): ExecutionResult {
  return Object.freeze({
    testCase,
    state,
    status: STATUS_BY_STATE[state],
    output,
    exitCode,
    durationMs,
    countsAsPassing: state !== 'failed'
  });
}
