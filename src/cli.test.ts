/**
 * Tests for CLI entry point
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, runCli, type CliIo } from './cli';
import { USAGE } from './components/config-loader';

describe('CLI Entry Point', () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIo;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    stdout = [];
    stderr = [];
    io = {
      writeLine: (line) => stdout.push(line),
      writeError: (line) => stderr.push(line),
      env: {},
      cwd: root
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should print usage for --help', async () => {
    expect(await runCli(['--help'], io)).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual([USAGE]);
  });

  it('should exit 0 when every test passes', async () => {
    fs.writeFileSync(path.join(root, 'ok_test.js'), 'function test_ok() {\n  return assert_equals(1, 1);\n}\n');

    expect(await runCli([], io)).toBe(EXIT_SUCCESS);
    expect(stdout[0]).toBe('Found 1 tests.');
    expect(stdout[1]).toMatch(/^PASS: test_ok \(\d+ms\)$/);
  });

  it('should exit 1 when a test fails', async () => {
    fs.writeFileSync(path.join(root, 'bad_test.js'), 'function test_bad() {\n  return false;\n}\n');

    expect(await runCli(['--tap'], io)).toBe(EXIT_FAILURE);
    expect(stdout.slice(0, 3)).toEqual(['TAP version 13', '1..1', 'not ok 1 - test_bad']);
  });

  it('should exit 0 with no tests', async () => {
    expect(await runCli([], io)).toBe(EXIT_SUCCESS);
    expect(stdout[0]).toBe('No tests found.');
  });

  it('should exit 2 on an unknown flag', async () => {
    expect(await runCli(['--watch'], io)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Error: Invalid command line');
    expect(stderr[stderr.length - 1]).toBe('Run trialrun --help for usage.');
  });

  it('should exit 2 on invalid configuration', async () => {
    expect(await runCli(['--root', 'missing', '--prefix', '9x'], io)).toBe(EXIT_USAGE);
    expect(stderr).toEqual([
      'Error: Configuration validation failed',
      `  - root directory does not exist: ${path.join(root, 'missing')}`,
      "  - procedure prefix must start like an identifier: '9x'",
      'Run trialrun --help for usage.'
    ]);
  });

  it('should exit 1 and print the message when coverage is below the minimum', async () => {
    fs.writeFileSync(path.join(root, 'lib.js'), 'function used() {\n  return 1;\n}\nfunction unused() {\n  return 2;\n}\n');
    fs.writeFileSync(
      path.join(root, 'lib_test.js'),
      "source('lib.js');\nfunction test_used() {\n  return used() === 1;\n}\n"
    );

    expect(await runCli(['--min-coverage', '90'], io)).toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['Coverage 75% is below threshold 90%']);
  });

  it('should pick up settings from the environment', async () => {
    fs.writeFileSync(path.join(root, 'math_spec.js'), 'function check_math() {\n  return true;\n}\n');

    const code = await runCli([], { ...io, env: { TRIALRUN_PATTERN: '*_spec.js', TRIALRUN_PREFIX: 'check_', TRIALRUN_TAP: '1' } });

    expect(code).toBe(EXIT_SUCCESS);
    expect(stdout).toEqual(['TAP version 13', '1..1', 'ok 1 - check_math']);
  });
});
