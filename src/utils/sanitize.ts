/**
 * String cleanup applied to captured test output before it is reported
 */

// CSI sequences such as colors and cursor movement
const ANSI_PATTERN = /\u001b\[[0-9;?]*[A-Za-z]/g;

/**
 * Removes ANSI escape sequences
 */
export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '');
}

/**
 * Escapes a value for a YAML single-quoted scalar: quotes are doubled
 */
export function escapeSingleQuoted(input: string): string {
  return input.replace(/'/g, "''");
}

/**
 * Removes trailing newlines the way shell command substitution does
 */
export function trimTrailingNewlines(input: string): string {
  return input.replace(/(\r?\n)+$/, '');
}

/**
 * Prepares captured output for reporting: ANSI stripped, trailing newlines removed
 *
 * @param input - Raw captured output
 * @returns The cleaned text
 */
export function cleanOutput(input: string): string {
  return trimTrailingNewlines(stripAnsi(input));
}
