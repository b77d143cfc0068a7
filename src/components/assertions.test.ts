import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as vm from 'vm';
import {
  assertCommandFailed,
  assertCommandSucceeded,
  assertEquals,
  assertFunctionDefined,
  assertNotEquals,
  assertOutputContains,
  assertOutputEquals,
  assertVariableSet,
  createAssertionBindings,
  formatOutcome,
  formatValue,
  valuesEqual,
  type AssertionHost
} from './assertions';
import type { CommandResult } from '../types';

describe('formatValue', () => {
  it('should print strings verbatim and inspect everything else', () => {
    expect(formatValue('it\'s')).toBe("it's");
    expect(formatValue(42)).toBe('42');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue({ a: [1, 2] })).toBe('{ a: [ 1, 2 ] }');
  });
});

describe('valuesEqual', () => {
  it('should treat arrays and plain objects from another realm as equal', () => {
    const foreign: unknown = vm.runInNewContext("({ status: 0, stdout: 'hi\\n', list: [1, [2]] })");

    expect(valuesEqual({ status: 0, stdout: 'hi\n', list: [1, [2]] }, foreign)).toBe(true);
    expect(valuesEqual({ status: 1, stdout: 'hi\n', list: [1, [2]] }, foreign)).toBe(false);
    expect(assertEquals(foreign, { status: 0, stdout: 'hi\n', list: [1, [2]] }).passed).toBe(true);
    expect(assertNotEquals(foreign, { status: 0, stdout: 'hi\n', list: [1, [2]] }).passed).toBe(false);
  });

  it('should still compare keys, lengths and class instances strictly', () => {
    class Point {
      constructor(readonly x: number) {}
    }

    expect(valuesEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(valuesEqual([1, 2], [1, 2, 3])).toBe(false);
    expect(valuesEqual(new Point(1), { x: 1 })).toBe(false);
    expect(valuesEqual(new Point(1), new Point(1))).toBe(true);
    expect(valuesEqual(Number.NaN, Number.NaN)).toBe(true);
  });

  it('should terminate on circular structures', () => {
    const left: Record<string, unknown> = { name: 'node' };
    left.self = left;
    const right: Record<string, unknown> = { name: 'node' };
    right.self = right;

    expect(valuesEqual(left, right)).toBe(true);
  });
});

describe('assertion primitives', () => {
  it('should compare values deeply', () => {
    expect(assertEquals({ a: [1] }, { a: [1] }).passed).toBe(true);
    expect(assertEquals(1, '1')).toEqual({
      passed: false,
      label: 'should be equal',
      message: "Expected '1', got '1'",
      expected: '1',
      actual: '1'
    });
  });

  it('should use a custom failure message', () => {
    expect(assertEquals(1, 2, 'totals differ').message).toBe('totals differ');
  });

  it('should check inequality', () => {
    expect(assertNotEquals(1, 2).passed).toBe(true);
    expect(assertNotEquals('a', 'a')).toMatchObject({
      passed: false,
      message: "Expected values to be different, but both were 'a'",
      expected: "anything but 'a'",
      actual: 'a'
    });
  });

  it('should check command status', () => {
    expect(assertCommandSucceeded('ls', 0).label).toBe('command should succeed: ls');
    expect(assertCommandSucceeded('ls', 2)).toMatchObject({
      passed: false,
      message: 'command failed with exit code 2: ls',
      actual: 'exit status 2'
    });
    expect(assertCommandFailed('false', 1).passed).toBe(true);
    expect(assertCommandFailed('true', 0).message).toBe('command succeeded, but was expected to fail: true');
  });

  it('should compare output without trailing newlines', () => {
    expect(assertOutputEquals('hello', 'greet', 'hello\n\n').passed).toBe(true);
    expect(assertOutputEquals('hello', 'greet', 'hi\n')).toMatchObject({ passed: false, expected: 'hello', actual: 'hi' });
    expect(assertOutputContains('ell', 'greet', 'hello\n').label).toBe("output of 'greet' should contain 'ell'");
    expect(assertOutputContains('xyz', 'greet', 'hello').passed).toBe(false);
  });

  it('should report variables and functions', () => {
    expect(assertVariableSet('HOME', false)).toMatchObject({ passed: false, message: "variable 'HOME' is not set", actual: 'unset' });
    expect(assertFunctionDefined('deploy', 'function').passed).toBe(true);
    expect(assertFunctionDefined('deploy', 'number')).toMatchObject({ passed: false, actual: 'number' });
  });
});

describe('formatOutcome', () => {
  it('should render a pass as one line', () => {
    expect(formatOutcome(assertEquals(1, 1))).toBe('PASS: should be equal\n');
  });

  it('should render a failure with expected and actual', () => {
    expect(formatOutcome(assertEquals(1, 2))).toBe("FAIL: Expected '1', got '2'\n  expected: 1\n  actual:   2\n");
  });
});

describe('createAssertionBindings', () => {
  let root: string;
  let written: string[];
  let commands: Record<string, CommandResult>;
  let bindings: ReturnType<typeof createAssertionBindings>;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'assertions-'));
    written = [];
    commands = {
      ok: { status: 0, stdout: 'done\n', stderr: '' },
      broken: { status: 3, stdout: '', stderr: 'boom\n' }
    };
    const host: AssertionHost = {
      write: (text) => written.push(text),
      invoke: (command) => commands[String(command)] ?? { status: 127, stdout: '', stderr: '' },
      describeCommand: (command, args) => [String(command), ...args.map(String)].join(' '),
      resolvePath: (target) => path.resolve(root, target),
      isVariableSet: (name) => name === 'DEFINED',
      bindingType: (name) => (name === 'deploy' ? 'function' : 'undefined')
    };
    bindings = createAssertionBindings(host);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const call = (name: string, ...args: unknown[]): unknown => {
    const binding = bindings[name];
    if (!binding) {
      throw new Error(`no binding ${name}`);
    }
    return binding(...args);
  };

  it('should write the outcome and return whether it passed', () => {
    expect(call('assert_equals', 1, 1)).toBe(true);
    expect(call('assert_not_equals', 1, 1)).toBe(false);

    expect(written).toEqual([
      'PASS: should be equal\n',
      "FAIL: Expected values to be different, but both were '1'\n  expected: anything but '1'\n  actual:   1\n"
    ]);
  });

  it('should run commands through the host', () => {
    expect(call('assert_success', 'ok')).toBe(true);
    expect(call('assert_fail', 'broken')).toBe(true);
    expect(call('assert_output_equals', 'done', 'ok')).toBe(true);
    expect(call('assert_output_contains', 'on', 'ok')).toBe(true);
    expect(call('assert_success', 'broken', '--flag')).toBe(false);

    expect(written[4]).toBe(
      'FAIL: command failed with exit code 3: broken --flag\n  expected: exit status 0\n  actual:   exit status 3\n'
    );
  });

  it('should resolve paths against the host directory', () => {
    fs.writeFileSync(path.join(root, 'present.txt'), '');

    expect(call('assert_path_exists', 'present.txt')).toBe(true);
    expect(call('assert_file_exists', 'missing.txt')).toBe(false);
    expect(call('assert_path_absent', 'missing.txt')).toBe(true);
    expect(call('assert_file_not_exists', 'present.txt')).toBe(false);
  });

  it('should check variables and functions', () => {
    expect(call('assert_variable_set', 'DEFINED')).toBe(true);
    expect(call('assert_is_variable_set', 'MISSING')).toBe(false);
    expect(call('assert_function_defined', 'deploy')).toBe(true);
    expect(call('assert_function_defined', 'other')).toBe(false);
  });
});
