/**
 * Result stream
 *
 * One JSON line per finished test, staged in the run's temporary workspace.
 * The staged lines are the source for the optional results file.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ExecutionResult, ResultRecord, TestStatus } from '../types';
import { stripAnsi } from '../utils/sanitize';
import { logger } from '../utils/logger';

export interface ResultsFile {
  readonly summary: {
    readonly total: number;
    readonly passed: number;
    readonly failed: number;
  };
  readonly results: readonly ResultRecord[];
}

const STATUSES: ReadonlySet<string> = new Set<TestStatus>(['PASS', 'FAIL', 'SKIP', 'TODO']);

function isStatus(value: unknown): value is TestStatus {
  return typeof value === 'string' && STATUSES.has(value);
}

export function toResultRecord(result: ExecutionResult): ResultRecord {
  const carriesOutput = result.status === 'FAIL' || result.status === 'TODO';
  return {
    file: result.testCase.file.relativePath,
    test: result.testCase.name,
    status: result.status,
    message: carriesOutput ? stripAnsi(result.output) : '',
    duration_ms: result.durationMs
  };
}

/**
 * Parses one staged line, or undefined when it is not a result record
 */
export function parseResultRecord(line: string): ResultRecord | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  const file: unknown = Reflect.get(value, 'file');
  const test: unknown = Reflect.get(value, 'test');
  const status: unknown = Reflect.get(value, 'status');
  const message: unknown = Reflect.get(value, 'message');
  const durationMs: unknown = Reflect.get(value, 'duration_ms');

  if (
    typeof file !== 'string' ||
    typeof test !== 'string' ||
    !isStatus(status) ||
    typeof message !== 'string' ||
    typeof durationMs !== 'number'
  ) {
    return undefined;
  }
  return { file, test, status, message, duration_ms: durationMs };
}

export class ResultStream {
  constructor(readonly stagingFile: string) {}

  append(result: ExecutionResult): ResultRecord {
    const record = toResultRecord(result);
    fs.appendFileSync(this.stagingFile, JSON.stringify(record) + '\n');
    return record;
  }

  records(): ResultRecord[] {
    if (!fs.existsSync(this.stagingFile)) {
      return [];
    }
    const records: ResultRecord[] = [];
    for (const line of fs.readFileSync(this.stagingFile, 'utf8').split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      const record = parseResultRecord(line);
      if (record) {
        records.push(record);
      } else {
        logger.warn('Ignoring malformed result line', { file: this.stagingFile });
      }
    }
    return records;
  }

  /**
   * Summary and records in the results file layout; TODO and SKIP count as passed
   */
  toResultsFile(): ResultsFile {
    const results = this.records();
    const failed = results.filter((record) => record.status === 'FAIL').length;
    return {
      summary: { total: results.length, passed: results.length - failed, failed },
      results
    };
  }

  writeResultsFile(outputPath: string): void {
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(this.toResultsFile(), null, 2) + '\n');
    logger.info('Wrote results file', { path: outputPath });
  }
}
