/**
 * Line coverage types
 */

export interface TraceRecord {
  readonly file: string;
  readonly line: number;
}

export interface CoverageStats {
  readonly executableLines: number;
  readonly coveredLines: number;
  readonly percentage: number;
}

export interface FileCoverage extends CoverageStats {
  readonly file: string;
}

export interface CoverageSummary {
  readonly files: readonly FileCoverage[];
  readonly executableLines: number;
  readonly coveredLines: number;
  readonly percentage: number;
}

export type LineState = 'covered' | 'uncovered';

export interface CoverageJsonReport {
  readonly files: Record<string, {
    readonly total_lines: number;
    readonly covered_lines: number;
    readonly coverage_percent: number;
    readonly lines: Record<string, LineState>;
  }>;
  readonly summary: {
    readonly total_lines: number;
    readonly covered_lines: number;
    readonly coverage_percent: number;
  };
}

export interface ThresholdCheck {
  readonly percentage: number;
  readonly threshold: number;
  readonly meetsThreshold: boolean;
}
