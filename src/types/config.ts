/**
 * Harness configuration types
 */

import type { ExecutionResult, RunCounts } from './execution-result';
import type { CoverageSummary } from './coverage';

export interface CoverageConfig {
  readonly enabled: boolean;
  readonly threshold?: number;
  readonly targets: readonly string[];
  readonly jsonReport?: string;
}

export interface HarnessConfig {
  readonly rootDir: string;
  readonly filePattern: string;
  readonly procedurePrefix: string;
  readonly tap: boolean;
  readonly verbose: boolean;
  readonly coverage: CoverageConfig;
  readonly resultsFile?: string;
}

export type HarnessPhase = 'discovery' | 'execution' | 'coverage' | 'report';

export interface PhaseResult {
  readonly name: HarnessPhase;
  readonly success: boolean;
  readonly duration: number;
  readonly error?: string;
}

export interface RunSummary extends RunCounts {
  readonly success: boolean;
  readonly results: readonly ExecutionResult[];
  readonly phases: readonly PhaseResult[];
  readonly coverage?: CoverageSummary;
  readonly errors: readonly string[];
}
