import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CoverageAnalyzer, formatStatsTokens, parseTraceRecord } from './coverage-analyzer';
import { CoverageThresholdError } from '../errors';

const LIB_SOURCE = [
  '// math helpers',
  'function add(a, b) {',
  '  return a + b;',
  '}',
  'function sub(a, b) {',
  '  return a - b;',
  '}',
  'var ready = true;',
  ''
].join('\n');

describe('parseTraceRecord', () => {
  it('should split on the last colon', () => {
    expect(parseTraceRecord('/work/a:b/lib.js:12')).toEqual({ file: '/work/a:b/lib.js', line: 12 });
  });

  it.each(['no-separator', ':5', '/work/lib.js:0', '/work/lib.js:x', ''])('should reject %j', (text) => {
    expect(parseTraceRecord(text)).toBeUndefined();
  });
});

describe('CoverageAnalyzer', () => {
  let root: string;
  let lib: string;
  let other: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'coverage-analyzer-'));
    lib = path.join(root, 'lib.js');
    other = path.join(root, 'other.js');
    fs.writeFileSync(lib, LIB_SOURCE);
    fs.writeFileSync(other, 'var x = 1;\n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function analyzerWithHits(): CoverageAnalyzer {
    const analyzer = new CoverageAnalyzer();
    analyzer.addRecordText(`${lib}:3\n${lib}:8\n${lib}:8\n`);
    return analyzer;
  }

  it('should aggregate record files into a deduplicated line set', () => {
    const first = path.join(root, '1-test_a.cov');
    const second = path.join(root, '2-test_b.cov');
    fs.writeFileSync(first, `${lib}:3\n${lib}:8\n`);
    fs.writeFileSync(second, `${lib}:8\n\n`);

    const analyzer = CoverageAnalyzer.fromRecordFiles([first, second]);

    expect([...analyzer.coveredLines(lib)]).toEqual([3, 8]);
    expect(analyzer.tracedFiles()).toEqual([lib]);
  });

  it('should compute stats from executable lines', () => {
    const stats = analyzerWithHits().getCoverageStats(lib);

    expect(stats).toEqual({ executableLines: 3, coveredLines: 2, percentage: 66.7 });
    expect(formatStatsTokens(stats)).toBe('3 2 66.7');
  });

  it('should report zeros for a missing file', () => {
    const stats = new CoverageAnalyzer().getCoverageStats(path.join(root, 'missing.js'));

    expect(formatStatsTokens(stats)).toBe('0 0 0');
  });

  it('should print a bare zero percent when nothing is executable', () => {
    const comments = path.join(root, 'comments.js');
    fs.writeFileSync(comments, '// nothing here\n');

    expect(formatStatsTokens(new CoverageAnalyzer().getCoverageStats(comments))).toBe('0 0 0');
  });

  it('should give the same stats when the same records are merged twice', () => {
    const analyzer = analyzerWithHits();
    const before = analyzer.getCoverageStats(lib);

    analyzer.addRecordText(`${lib}:3\n${lib}:8\n`);

    expect(analyzer.getCoverageStats(lib)).toEqual(before);
  });

  it('should pass a threshold at or below the rounded aggregate', () => {
    expect(analyzerWithHits().checkThreshold(67)).toEqual({ percentage: 67, threshold: 67, meetsThreshold: true });
  });

  it('should throw when coverage is below the threshold', () => {
    const analyzer = analyzerWithHits();

    expect(() => analyzer.assertThreshold(70)).toThrow(CoverageThresholdError);
    expect(() => analyzer.assertThreshold(70)).toThrow('Coverage 67% is below threshold 70%');
  });

  it('should ignore declared targets when checking the threshold', () => {
    const analyzer = analyzerWithHits();
    const withTargets = analyzer.summarize([other]);

    expect(withTargets.percentage).toBe(50);
    expect(analyzer.checkThreshold(60).meetsThreshold).toBe(true);
  });

  it('should render the text report with targets that were never run', () => {
    const report = analyzerWithHits().generateTextReport([other], root);

    expect(report).toBe(
      [
        '--- Coverage Report ---',
        'Coverage: ./lib.js',
        '  Lines: 2/3 (66.7%)',
        'Coverage: ./other.js',
        '  Lines: 0/1 (0.0%)',
        'Total: 2/4 (50.0%)'
      ].join('\n')
    );
  });

  it('should build the JSON report with a per-line map', () => {
    const report = analyzerWithHits().generateJsonReport();

    expect(report).toEqual({
      files: {
        [lib]: {
          total_lines: 3,
          covered_lines: 2,
          coverage_percent: 66.7,
          lines: { '3': 'covered', '6': 'uncovered', '8': 'covered' }
        }
      },
      summary: { total_lines: 3, covered_lines: 2, coverage_percent: 66.67 }
    });
  });

  it('should write the JSON report to a file', () => {
    const output = path.join(root, 'reports', 'coverage.json');

    analyzerWithHits().writeJsonReport(output);

    const written: unknown = JSON.parse(fs.readFileSync(output, 'utf8'));
    expect(written).toEqual(analyzerWithHits().generateJsonReport());
  });
});
