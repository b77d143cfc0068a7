/**
 * Error thrown when aggregate line coverage is below the configured minimum
 */

export class CoverageThresholdError extends Error {
  public readonly actualCoverage: number;
  public readonly threshold: number;

  constructor(message: string, actualCoverage: number, threshold: number, cause?: Error) {
    super(message, { cause });
    this.name = 'CoverageThresholdError';
    this.actualCoverage = actualCoverage;
    this.threshold = threshold;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CoverageThresholdError);
    }
  }
}
