/**
 * Run-scoped line trace collection
 *
 * The collector owns the file id table and the instrumented-source cache for
 * a run. Each test gets its own TraceSink, which buffers `path:line` records
 * and appends them to a per-test record file in the run's trace directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { instrumentSource, type InstrumentedSource } from './instrumenter';
import { logger } from '../utils/logger';

export const TRACE_BATCH_SIZE = 50;

export const TRACE_RECORD_EXTENSION = '.cov';

const INSTRUMENTABLE_EXTENSIONS: ReadonlySet<string> = new Set(['.js', '.cjs']);

const ENGINE_ROOT = path.resolve(__dirname, '..', '..');

/**
 * The harness's own sources are never traced
 */
export const ENGINE_DIRECTORIES: readonly string[] = [
  path.join(ENGINE_ROOT, 'src'),
  path.join(ENGINE_ROOT, 'dist')
];

export interface TraceCollectorOptions {
  readonly batchSize?: number;
  readonly excludedDirectories?: readonly string[];
}

export class TraceSink {
  private buffer: string[] = [];
  private finalized = false;

  constructor(
    readonly recordPath: string,
    private readonly resolveFile: (fileId: number) => string | undefined,
    private readonly batchSize: number = TRACE_BATCH_SIZE
  ) {}

  record(fileId: number, line: number): void {
    if (this.finalized) {
      return;
    }
    const file = this.resolveFile(fileId);
    if (file === undefined || !Number.isInteger(line) || line < 1) {
      return;
    }

    this.buffer.push(`${file}:${line}`);
    if (this.buffer.length >= this.batchSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    fs.appendFileSync(this.recordPath, this.buffer.join('\n') + '\n');
    this.buffer = [];
  }

  /**
   * Writes what is buffered; later records are ignored
   */
  finalize(): void {
    if (this.finalized) {
      return;
    }
    this.flush();
    this.finalized = true;
  }

  get pending(): number {
    return this.buffer.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }
}

export class TraceCollector {
  private readonly files: string[] = [];
  private readonly fileIds = new Map<string, number>();
  private readonly cache = new Map<string, InstrumentedSource>();
  private readonly declined = new Set<string>();
  private readonly batchSize: number;
  private readonly excluded: readonly string[];
  private sinkCount = 0;

  constructor(readonly recordDirectory: string, options: TraceCollectorOptions = {}) {
    this.batchSize = options.batchSize ?? TRACE_BATCH_SIZE;
    this.excluded = (options.excludedDirectories ?? ENGINE_DIRECTORIES).map((dir) => path.resolve(dir));
    fs.mkdirSync(recordDirectory, { recursive: true });
  }

  /**
   * Whether a file is traced: a script extension, outside the harness itself
   */
  supports(filePath: string): boolean {
    const absolute = path.resolve(filePath);
    if (this.excluded.some((dir) => absolute === dir || absolute.startsWith(dir + path.sep))) {
      return false;
    }
    return INSTRUMENTABLE_EXTENSIONS.has(path.extname(absolute).toLowerCase());
  }

  /**
   * Returns instrumented code for a file, or undefined when it is not traced
   */
  instrument(filePath: string, source: string): string | undefined {
    const absolute = path.resolve(filePath);

    if (!this.supports(absolute)) {
      if (!this.declined.has(absolute)) {
        this.declined.add(absolute);
        logger.warn('Coverage is not collected for this file', { file: absolute });
      }
      return undefined;
    }

    const cached = this.cache.get(absolute);
    if (cached) {
      return cached.code;
    }

    const instrumented = instrumentSource(source, absolute, this.fileId(absolute));
    this.cache.set(absolute, instrumented);
    logger.debug('Instrumented script', { file: absolute, lines: instrumented.markedLines.length });
    return instrumented.code;
  }

  fileId(filePath: string): number {
    const absolute = path.resolve(filePath);
    const existing = this.fileIds.get(absolute);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.files.length;
    this.files.push(absolute);
    this.fileIds.set(absolute, id);
    return id;
  }

  filePath(fileId: number): string | undefined {
    return this.files[fileId];
  }

  /**
   * Opens the trace sink for one test
   */
  beginTest(testName: string): TraceSink {
    this.sinkCount += 1;
    const safeName = testName.replace(/[^\w.-]/g, '_');
    const recordPath = path.join(this.recordDirectory, `${this.sinkCount}-${safeName}${TRACE_RECORD_EXTENSION}`);
    return new TraceSink(recordPath, (fileId) => this.filePath(fileId), this.batchSize);
  }

  /**
   * Record files written so far, in creation order
   */
  recordFiles(): string[] {
    if (!fs.existsSync(this.recordDirectory)) {
      return [];
    }
    return fs
      .readdirSync(this.recordDirectory)
      .filter((name) => name.endsWith(TRACE_RECORD_EXTENSION))
      .sort((a, b) => Number.parseInt(a, 10) - Number.parseInt(b, 10))
      .map((name) => path.join(this.recordDirectory, name));
  }

  get instrumentedFiles(): readonly string[] {
    return [...this.cache.keys()];
  }
}
