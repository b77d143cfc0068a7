import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  TestDiscovery,
  declarationOffset,
  extractDirective,
  findTestFiles,
  orderByDeclaration,
  validateDiscoveryOptions
} from './test-discovery';
import { DiscoveryError, ValidationError } from '../errors';
import { logger } from '../utils/logger';

describe('test discovery', () => {
  let root: string;

  function write(relativePath: string, content: string): void {
    const file = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'test-discovery-'));
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('findTestFiles', () => {
    it('should walk in sorted order and skip dependency and VCS directories', () => {
      for (const name of ['b_test.js', 'a_test.js', 'Z_test.js', 'helper.js', 'sub/c_test.js', 'node_modules/x_test.js', '.git/y_test.js']) {
        write(name, '');
      }

      const files = findTestFiles(root, '*_test.js');

      expect(files.map((file) => file.relativePath)).toEqual([
        'Z_test.js',
        'a_test.js',
        'b_test.js',
        path.join('sub', 'c_test.js')
      ]);
      expect(files[0]).toEqual({ path: path.join(root, 'Z_test.js'), relativePath: 'Z_test.js', pattern: '*_test.js' });
    });

    it('should return nothing for an empty tree', () => {
      expect(findTestFiles(root, '*_test.js')).toEqual([]);
    });
  });

  describe('extractDirective', () => {
    const source = [
      '// @SKIP needs network',
      'function test_remote() {}',
      '// @TODO',
      'async function test_later() {}',
      '// @SKIPPED not a directive',
      'function test_odd() {}',
      '// @SKIP far away',
      '',
      'function test_plain() {}'
    ].join('\n');

    it('should read the comment directly above the declaration', () => {
      expect(extractDirective(source, 'test_remote')).toEqual({ kind: 'skip', reason: 'needs network' });
      expect(extractDirective(source, 'test_later')).toEqual({ kind: 'todo', reason: '' });
    });

    it('should ignore lookalike and distant comments', () => {
      expect(extractDirective(source, 'test_odd')).toEqual({ kind: 'none' });
      expect(extractDirective(source, 'test_plain')).toEqual({ kind: 'none' });
      expect(extractDirective(source, 'test_missing')).toEqual({ kind: 'none' });
    });
  });

  describe('orderByDeclaration', () => {
    it('should order by declaration offset and keep unknown names last', () => {
      const source = 'function test_b() {}\nvar test_a = function () {};\n';

      expect(declarationOffset(source, 'test_b')).toBe(0);
      expect(declarationOffset(source, 'test_a')).toBe(24);
      expect(orderByDeclaration(source, ['test_zz', 'test_a', 'test_y', 'test_b'])).toEqual([
        'test_b',
        'test_a',
        'test_zz',
        'test_y'
      ]);
    });

    it('should not mistake comparisons or longer names for declarations', () => {
      const source = 'if (test_a == 1) {}\nvar test_ab = 2;\n';

      expect(declarationOffset(source, 'test_a')).toBe(Number.POSITIVE_INFINITY);
    });
  });

  describe('validateDiscoveryOptions', () => {
    it('should collect every problem', () => {
      try {
        validateDiscoveryOptions({ rootDir: root, filePattern: 'tests/*_test.js', procedurePrefix: '1abc' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.validationErrors).toEqual([
            'file pattern must match a file name, not a path: tests/*_test.js',
            "procedure prefix must start like an identifier: '1abc'"
          ]);
        }
      }
    });

    it('should reject an empty pattern', () => {
      expect(() => validateDiscoveryOptions({ rootDir: root, filePattern: ' ', procedurePrefix: 'test_' })).toThrow(
        ValidationError
      );
    });
  });

  describe('TestDiscovery', () => {
    it('should plan test cases with directives and record load failures', () => {
      write(
        'math_test.js',
        [
          '// @SKIP needs network',
          'function test_remote() {}',
          'function test_add() {}',
          '// @TODO not implemented',
          'function test_later() {}',
          'function helper() {}'
        ].join('\n')
      );
      write('broken_test.js', 'function test_x( {\n');
      write('thrower_test.js', "throw new Error('top level');\n");

      const plan = new TestDiscovery({ rootDir: root, filePattern: '*_test.js', procedurePrefix: 'test_' }).discover();

      expect(plan.total).toBe(3);
      expect(plan.cases.map((testCase) => [testCase.name, testCase.directive])).toEqual([
        ['test_remote', { kind: 'skip', reason: 'needs network' }],
        ['test_add', { kind: 'none' }],
        ['test_later', { kind: 'todo', reason: 'not implemented' }]
      ]);
      expect(plan.cases[0].file.relativePath).toBe('math_test.js');

      expect(plan.loadFailures.map((failure) => failure.file.relativePath)).toEqual(['broken_test.js', 'thrower_test.js']);
      expect(plan.loadFailures[0].message).toMatch(/^Could not load broken_test\.js: SyntaxError: /);
      expect(plan.loadFailures[1].message).toBe('Could not load thrower_test.js: Error: top level');
      expect(plan.loadFailures[1].error).toBeInstanceOf(DiscoveryError);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('should honour a custom prefix', () => {
      write('custom_test.js', 'function check_one() {}\nfunction test_two() {}\n');

      const plan = new TestDiscovery({ rootDir: root, filePattern: '*_test.js', procedurePrefix: 'check_' }).discover();

      expect(plan.cases.map((testCase) => testCase.name)).toEqual(['check_one']);
    });

    it('should produce an empty plan when nothing matches', () => {
      const plan = new TestDiscovery({ rootDir: root, filePattern: '*_test.js', procedurePrefix: 'test_' }).discover();

      expect(plan).toEqual({ cases: [], total: 0, loadFailures: [] });
    });

    it('should validate before reading any file', () => {
      const discovery = new TestDiscovery({ rootDir: path.join(root, 'missing'), filePattern: '', procedurePrefix: 'test_' });

      expect(() => discovery.discover()).toThrow(ValidationError);
    });
  });
});
