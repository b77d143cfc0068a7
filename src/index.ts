/**
 * Main entry point for trialrun
 *
 * Orchestrates one run: discovery → execution → coverage → report
 */

import { TestDiscovery } from './components/test-discovery';
import { IsolatedExecutor } from './components/isolated-executor';
import { TestRunnerImpl, type RunOutcome } from './components/test-runner';
import { TraceCollector } from './components/trace-collector';
import { CoverageAnalyzer } from './components/coverage-analyzer';
import { TapReporter } from './components/tap-reporter';
import { ConsoleReporter, type LineWriter, type RunReporter } from './components/console-reporter';
import { ResultStream } from './components/result-stream';
import { logger } from './utils/logger';
import { TempWorkspace } from './utils/temp-workspace';
import type { CoverageSummary, ExecutionPlan, HarnessConfig, HarnessPhase, PhaseResult, RunSummary } from './types';
import { CoverageThresholdError } from './errors';

export * from './types';
export * from './errors';
export * from './utils';
export { TestDiscovery, findTestFiles, extractDirective } from './components/test-discovery';
export { IsolatedExecutor, TestLifecycle, terminalState } from './components/isolated-executor';
export { TestRunnerImpl, tally } from './components/test-runner';
export type { TestExecutor, TestRunner, RunOutcome } from './components/test-runner';
export { ScriptContext } from './components/script-context';
export { SubstitutionRegistry } from './components/substitution-registry';
export { TraceCollector, TraceSink } from './components/trace-collector';
export { CoverageAnalyzer, formatStatsTokens } from './components/coverage-analyzer';
export { instrumentSource } from './components/instrumenter';
export { isExecutableLine } from './components/line-classifier';
export { TapReporter } from './components/tap-reporter';
export { ConsoleReporter } from './components/console-reporter';
export type { LineWriter, RunReporter } from './components/console-reporter';
export { ResultStream } from './components/result-stream';
export { ConfigLoader, parseCommandLine } from './components/config-loader';
export * from './components/assertions';

export interface TestHarnessOptions {
  /** Destination of reporter lines; stdout by default */
  readonly writeLine?: LineWriter;
  /** Environment copied into every script context */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly clock?: () => number;
}

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

interface CoverageOutcome {
  readonly summary: CoverageSummary;
  readonly thresholdMet: boolean;
}

/**
 * Runs every discovered test once and reports the results
 */
export class TestHarness {
  private readonly writeLine: LineWriter;
  private readonly clock: () => number;

  constructor(
    private readonly config: HarnessConfig,
    private readonly options: TestHarnessOptions = {}
  ) {
    this.writeLine = options.writeLine ?? writeStdout;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Execute the run
   *
   * Test failures and a missed coverage threshold make the summary
   * unsuccessful. Configuration and discovery errors are thrown.
   */
  async run(): Promise<RunSummary> {
    const phases: PhaseResult[] = [];
    const errors: string[] = [];
    const workspace = TempWorkspace.create();

    logger.info('Starting test run', {
      rootDir: this.config.rootDir,
      filePattern: this.config.filePattern,
      workspace: workspace.path
    });

    try {
      const plan = await this.executePhase(phases, 'discovery', async () =>
        new TestDiscovery({
          rootDir: this.config.rootDir,
          filePattern: this.config.filePattern,
          procedurePrefix: this.config.procedurePrefix,
          env: this.options.env
        }).discover()
      );

      const collector = this.config.coverage.enabled ? new TraceCollector(workspace.directory('coverage')) : undefined;
      const reporter = this.createReporter();
      const stream = new ResultStream(workspace.file('results.jsonl'));

      const outcome = await this.executePhase(phases, 'execution', () => this.execute(plan, reporter, stream, collector));

      let coverage: CoverageOutcome | undefined;
      if (collector) {
        coverage = await this.executePhase(phases, 'coverage', async () => this.analyzeCoverage(collector, reporter, errors));
      }

      await this.executePhase(phases, 'report', async () => {
        if (this.config.resultsFile !== undefined) {
          stream.writeResultsFile(this.config.resultsFile);
          logger.info('Results file written', { path: this.config.resultsFile });
        }
      });

      const success = outcome.counts.failed === 0 && (coverage?.thresholdMet ?? true);
      logger.info('Test run completed', { ...outcome.counts, success });

      return {
        ...outcome.counts,
        success,
        results: outcome.results,
        phases,
        coverage: coverage?.summary,
        errors
      };
    } finally {
      workspace.dispose();
    }
  }

  private createReporter(): RunReporter {
    return this.config.tap ? new TapReporter(this.writeLine) : new ConsoleReporter(this.writeLine, this.config.verbose);
  }

  private execute(
    plan: ExecutionPlan,
    reporter: RunReporter,
    stream: ResultStream,
    collector: TraceCollector | undefined
  ): Promise<RunOutcome> {
    const executor = new IsolatedExecutor({
      rootDir: this.config.rootDir,
      env: this.options.env,
      traceCollector: collector,
      clock: this.clock
    });
    return new TestRunnerImpl(executor, [reporter], stream).run(plan);
  }

  private analyzeCoverage(collector: TraceCollector, reporter: RunReporter, errors: string[]): CoverageOutcome {
    const { targets, jsonReport, threshold } = this.config.coverage;
    const analyzer = CoverageAnalyzer.fromRecordFiles(collector.recordFiles());

    reporter.note(analyzer.generateTextReport(targets, this.config.rootDir));

    if (jsonReport !== undefined) {
      analyzer.writeJsonReport(jsonReport, targets);
      logger.info('Coverage report written', { path: jsonReport });
    }

    let thresholdMet = true;
    if (threshold !== undefined) {
      try {
        analyzer.assertThreshold(threshold);
      } catch (error) {
        if (!(error instanceof CoverageThresholdError)) {
          throw error;
        }
        thresholdMet = false;
        errors.push(error.message);
        logger.warn('Coverage threshold not met', { percentage: error.actualCoverage, threshold: error.threshold });
      }
    }

    return { summary: analyzer.summarize(targets), thresholdMet };
  }

  /**
   * Execute a single phase, recording its outcome
   */
  private async executePhase<T>(phases: PhaseResult[], name: HarnessPhase, phase: () => Promise<T>): Promise<T> {
    const started = this.clock();

    try {
      const value = await phase();
      phases.push({ name, success: true, duration: Math.round(this.clock() - started) });
      return value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      phases.push({ name, success: false, duration: Math.round(this.clock() - started), error: message });

      logger.error(`Phase ${name} failed`, error, { phase: name });
      throw error;
    }
  }
}
