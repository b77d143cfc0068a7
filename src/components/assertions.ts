/**
 * Assertion primitives
 *
 * Each primitive performs one check and returns an outcome carrying the
 * expected and actual values. Nothing here ends a test: the script bindings
 * print the outcome and hand back a boolean, and the test procedure decides
 * what its own completion status is.
 */

import * as fs from 'fs';
import { inspect, isDeepStrictEqual } from 'util';
import type { CommandResult, ScriptCallable } from '../types';
import { trimTrailingNewlines } from '../utils/sanitize';

export interface AssertionOutcome {
  readonly passed: boolean;
  readonly label: string;
  readonly message: string;
  readonly expected: string;
  readonly actual: string;
}

/**
 * Renders a value without truncation: strings verbatim, everything else inspected in full
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value, {
    depth: Infinity,
    maxArrayLength: Infinity,
    maxStringLength: Infinity,
    breakLength: Infinity
  });
}

function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === null || (typeof prototype === 'object' && Object.getPrototypeOf(prototype) === null);
}

/**
 * Deep equality that ignores which realm built an array or plain object.
 *
 * Script literals come from the test's context while run() results and ENV
 * come from the harness, so their prototypes never match. Everything else
 * is compared strictly.
 */
export function valuesEqual(left: unknown, right: unknown, seen: WeakMap<object, object> = new WeakMap()): boolean {
  if (Array.isArray(left) && Array.isArray(right)) {
    const items: readonly unknown[] = left;
    const others: readonly unknown[] = right;
    if (seen.get(left) === right) {
      return true;
    }
    seen.set(left, right);
    return items.length === others.length && items.every((item, index) => valuesEqual(item, others[index], seen));
  }
  if (isPlainObject(left) && isPlainObject(right)) {
    if (seen.get(left) === right) {
      return true;
    }
    seen.set(left, right);
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every(
        (key) => Object.prototype.hasOwnProperty.call(right, key) && valuesEqual(Reflect.get(left, key), Reflect.get(right, key), seen)
      )
    );
  }
  return isDeepStrictEqual(left, right);
}

function outcome(passed: boolean, label: string, message: string, expected: string, actual: string): AssertionOutcome {
  return { passed, label, message, expected, actual };
}

export function assertEquals(expected: unknown, actual: unknown, message?: string): AssertionOutcome {
  const expectedText = formatValue(expected);
  const actualText = formatValue(actual);
  return outcome(
    valuesEqual(expected, actual),
    'should be equal',
    message ?? `Expected '${expectedText}', got '${actualText}'`,
    expectedText,
    actualText
  );
}

export function assertNotEquals(unexpected: unknown, actual: unknown, message?: string): AssertionOutcome {
  const actualText = formatValue(actual);
  return outcome(
    !valuesEqual(unexpected, actual),
    'should not be equal',
    message ?? `Expected values to be different, but both were '${actualText}'`,
    `anything but '${formatValue(unexpected)}'`,
    actualText
  );
}

export function assertCommandSucceeded(command: string, status: number): AssertionOutcome {
  return status === 0
    ? outcome(true, `command should succeed: ${command}`, '', 'exit status 0', 'exit status 0')
    : outcome(false, `command should succeed: ${command}`, `command failed with exit code ${status}: ${command}`, 'exit status 0', `exit status ${status}`);
}

export function assertCommandFailed(command: string, status: number): AssertionOutcome {
  return status !== 0
    ? outcome(true, `command should fail: ${command}`, '', 'non-zero exit status', `exit status ${status}`)
    : outcome(false, `command should fail: ${command}`, `command succeeded, but was expected to fail: ${command}`, 'non-zero exit status', 'exit status 0');
}

export function assertOutputEquals(expected: string, command: string, stdout: string): AssertionOutcome {
  const actual = trimTrailingNewlines(stdout);
  return outcome(
    actual === expected,
    `output of '${command}' should equal expected`,
    `output of '${command}' did not match`,
    expected,
    actual
  );
}

export function assertOutputContains(needle: string, command: string, stdout: string): AssertionOutcome {
  const actual = trimTrailingNewlines(stdout);
  return outcome(
    actual.includes(needle),
    `output of '${command}' should contain '${needle}'`,
    `output of '${command}' does not contain '${needle}'`,
    needle,
    actual
  );
}

export function assertPathExists(displayPath: string, resolvedPath: string): AssertionOutcome {
  const exists = fs.existsSync(resolvedPath);
  return outcome(exists, `path should exist: ${displayPath}`, `path does not exist: ${displayPath}`, 'present', exists ? 'present' : 'absent');
}

export function assertPathAbsent(displayPath: string, resolvedPath: string): AssertionOutcome {
  const exists = fs.existsSync(resolvedPath);
  return outcome(!exists, `path should be absent: ${displayPath}`, `path exists but should not: ${displayPath}`, 'absent', exists ? 'present' : 'absent');
}

export function assertVariableSet(name: string, isSet: boolean): AssertionOutcome {
  return outcome(isSet, `variable '${name}' should be set`, `variable '${name}' is not set`, 'set', isSet ? 'set' : 'unset');
}

export function assertFunctionDefined(name: string, bindingType: string): AssertionOutcome {
  return outcome(
    bindingType === 'function',
    `function '${name}' should be defined`,
    `function '${name}' is not defined`,
    'function',
    bindingType
  );
}

/**
 * Renders an outcome the way it appears in captured test output
 */
export function formatOutcome(result: AssertionOutcome): string {
  if (result.passed) {
    return `PASS: ${result.label}\n`;
  }
  return `FAIL: ${result.message}\n  expected: ${result.expected}\n  actual:   ${result.actual}\n`;
}

/**
 * What the script bindings need from the context they run in
 */
export interface AssertionHost {
  write(text: string): void;
  invoke(command: unknown, args: unknown[]): CommandResult;
  describeCommand(command: unknown, args: unknown[]): string;
  resolvePath(target: string): string;
  isVariableSet(name: string): boolean;
  bindingType(name: string): string;
}

/**
 * Script-facing assertion functions, named by the scripting convention
 */
export function createAssertionBindings(host: AssertionHost): Record<string, ScriptCallable> {
  const report = (result: AssertionOutcome): boolean => {
    host.write(formatOutcome(result));
    return result.passed;
  };

  const optionalMessage = (value: unknown): string | undefined =>
    value === undefined ? undefined : String(value);

  const pathExists = (target: unknown): boolean => {
    const display = String(target);
    return report(assertPathExists(display, host.resolvePath(display)));
  };

  const pathAbsent = (target: unknown): boolean => {
    const display = String(target);
    return report(assertPathAbsent(display, host.resolvePath(display)));
  };

  const variableSet = (name: unknown): boolean => {
    const variable = String(name);
    return report(assertVariableSet(variable, host.isVariableSet(variable)));
  };

  return {
    assert_equals: (expected, actual, message) =>
      report(assertEquals(expected, actual, optionalMessage(message))),
    assert_not_equals: (unexpected, actual, message) =>
      report(assertNotEquals(unexpected, actual, optionalMessage(message))),
    assert_success: (command, ...args) =>
      report(assertCommandSucceeded(host.describeCommand(command, args), host.invoke(command, args).status)),
    assert_fail: (command, ...args) =>
      report(assertCommandFailed(host.describeCommand(command, args), host.invoke(command, args).status)),
    assert_output_equals: (expected, command, ...args) =>
      report(assertOutputEquals(String(expected), host.describeCommand(command, args), host.invoke(command, args).stdout)),
    assert_output_contains: (needle, command, ...args) =>
      report(assertOutputContains(String(needle), host.describeCommand(command, args), host.invoke(command, args).stdout)),
    assert_path_exists: pathExists,
    assert_file_exists: pathExists,
    assert_path_absent: pathAbsent,
    assert_file_not_exists: pathAbsent,
    assert_variable_set: variableSet,
    assert_is_variable_set: variableSet,
    assert_function_defined: (name) => {
      const procedure = String(name);
      return report(assertFunctionDefined(procedure, host.bindingType(procedure)));
    }
  };
}
