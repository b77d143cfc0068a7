/**
 * Coverage aggregation and reporting
 *
 * Trace records from every test are merged into one set of executed lines
 * per file. Statistics divide that set by the file's executable lines as
 * decided by the line classifier.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CoverageThresholdError } from '../errors';
import type {
  CoverageJsonReport,
  CoverageStats,
  CoverageSummary,
  FileCoverage,
  LineState,
  ThresholdCheck,
  TraceRecord
} from '../types';
import { executableLineNumbers } from './line-classifier';
import { logger } from '../utils/logger';

export const COVERAGE_REPORT_HEADER = '--- Coverage Report ---';

export function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

function ratio(covered: number, executable: number): number {
  return executable === 0 ? 0 : (covered / executable) * 100;
}

/**
 * Parses one `path:line` record; the last colon separates the line number
 */
export function parseTraceRecord(text: string): TraceRecord | undefined {
  const separator = text.lastIndexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  const line = Number(text.slice(separator + 1));
  if (!Number.isInteger(line) || line < 1) {
    return undefined;
  }
  return { file: text.slice(0, separator), line };
}

/**
 * Renders stats as `executable covered percent`
 */
export function formatStatsTokens(stats: CoverageStats): string {
  const percent = stats.executableLines === 0 ? '0' : stats.percentage.toFixed(1);
  return `${stats.executableLines} ${stats.coveredLines} ${percent}`;
}

function formatPercent(covered: number, executable: number): string {
  return executable === 0 ? '0' : roundToOneDecimal(ratio(covered, executable)).toFixed(1);
}

export class CoverageAnalyzer {
  private readonly executed = new Map<string, Set<number>>();
  private readonly executableCache = new Map<string, number[] | null>();

  /**
   * Builds an analyzer from trace record files
   */
  static fromRecordFiles(recordFiles: readonly string[]): CoverageAnalyzer {
    const analyzer = new CoverageAnalyzer();
    for (const recordFile of recordFiles) {
      analyzer.addRecordText(fs.readFileSync(recordFile, 'utf8'));
    }
    logger.debug('Aggregated trace records', {
      recordFiles: recordFiles.length,
      tracedFiles: analyzer.tracedFiles().length
    });
    return analyzer;
  }

  addRecord(record: TraceRecord): void {
    const file = path.resolve(record.file);
    let lines = this.executed.get(file);
    if (!lines) {
      lines = new Set<number>();
      this.executed.set(file, lines);
    }
    lines.add(record.line);
  }

  addRecordText(text: string): void {
    for (const entry of text.split('\n')) {
      const record = parseTraceRecord(entry.trim());
      if (record) {
        this.addRecord(record);
      }
    }
  }

  coveredLines(file: string): ReadonlySet<number> {
    return this.executed.get(path.resolve(file)) ?? new Set<number>();
  }

  tracedFiles(): string[] {
    return [...this.executed.keys()].sort();
  }

  getCoverageStats(file: string): CoverageStats {
    const executable = this.executableLines(file);
    if (executable === undefined) {
      return { executableLines: 0, coveredLines: 0, percentage: 0 };
    }
    const hits = this.coveredLines(file);
    const covered = executable.filter((line) => hits.has(line)).length;
    return {
      executableLines: executable.length,
      coveredLines: covered,
      percentage: roundToOneDecimal(ratio(covered, executable.length))
    };
  }

  /**
   * Per-file stats for traced files and any declared targets, sorted by path
   */
  summarize(targets: readonly string[] = []): CoverageSummary {
    const files = new Set(this.tracedFiles());
    for (const target of targets) {
      files.add(path.resolve(target));
    }

    const entries: FileCoverage[] = [...files].sort().map((file) => ({ file, ...this.getCoverageStats(file) }));
    const executableLines = entries.reduce((sum, entry) => sum + entry.executableLines, 0);
    const coveredLines = entries.reduce((sum, entry) => sum + entry.coveredLines, 0);

    return {
      files: entries,
      executableLines,
      coveredLines,
      percentage: roundToOneDecimal(ratio(coveredLines, executableLines))
    };
  }

  /**
   * Aggregate coverage over traced files, as a whole percent, against a minimum
   */
  checkThreshold(threshold: number): ThresholdCheck {
    const { executableLines, coveredLines } = this.summarize();
    const percentage = Math.round(ratio(coveredLines, executableLines));
    return { percentage, threshold, meetsThreshold: percentage >= threshold };
  }

  /**
   * @throws {CoverageThresholdError} When coverage is below the threshold
   */
  assertThreshold(threshold: number): ThresholdCheck {
    const check = this.checkThreshold(threshold);
    if (!check.meetsThreshold) {
      throw new CoverageThresholdError(
        `Coverage ${check.percentage}% is below threshold ${threshold}%`,
        check.percentage,
        threshold
      );
    }
    return check;
  }

  generateTextReport(targets: readonly string[] = [], displayRoot: string = process.cwd()): string {
    const summary = this.summarize(targets);
    const lines = [COVERAGE_REPORT_HEADER];

    for (const entry of summary.files) {
      lines.push(`Coverage: ${displayPath(entry.file, displayRoot)}`);
      lines.push(`  Lines: ${entry.coveredLines}/${entry.executableLines} (${formatPercent(entry.coveredLines, entry.executableLines)}%)`);
    }

    lines.push(
      `Total: ${summary.coveredLines}/${summary.executableLines} (${formatPercent(summary.coveredLines, summary.executableLines)}%)`
    );
    return lines.join('\n');
  }

  generateJsonReport(targets: readonly string[] = []): CoverageJsonReport {
    const summary = this.summarize(targets);
    const files: Record<string, CoverageJsonReport['files'][string]> = {};

    for (const entry of summary.files) {
      const hits = this.coveredLines(entry.file);
      const lines: Record<string, LineState> = {};
      for (const line of this.executableLines(entry.file) ?? []) {
        lines[String(line)] = hits.has(line) ? 'covered' : 'uncovered';
      }
      files[entry.file] = {
        total_lines: entry.executableLines,
        covered_lines: entry.coveredLines,
        coverage_percent: entry.percentage,
        lines
      };
    }

    return {
      files,
      summary: {
        total_lines: summary.executableLines,
        covered_lines: summary.coveredLines,
        coverage_percent: Math.round(ratio(summary.coveredLines, summary.executableLines) * 100) / 100
      }
    };
  }

  writeJsonReport(outputPath: string, targets: readonly string[] = []): void {
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(this.generateJsonReport(targets), null, 2) + '\n');
    logger.info('Wrote coverage report', { path: outputPath });
  }

  private executableLines(file: string): number[] | undefined {
    const absolute = path.resolve(file);
    const cached = this.executableCache.get(absolute);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    let lines: number[] | null = null;
    if (fs.existsSync(absolute) && fs.statSync(absolute).isFile()) {
      lines = executableLineNumbers(fs.readFileSync(absolute, 'utf8'));
    }
    this.executableCache.set(absolute, lines);
    return lines ?? undefined;
  }
}

function displayPath(file: string, root: string): string {
  const relative = path.relative(root, file);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return file;
  }
  return `.${path.sep}${relative}`;
}
