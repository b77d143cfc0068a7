#!/usr/bin/env node
/**
 * CLI entry point for trialrun
 *
 * Exit codes:
 * - 0: Every test passed (skipped and todo tests count as passed) and the
 *      coverage threshold, if any, was met
 * - 1: A test failed, the coverage threshold was missed, or the run crashed
 * - 2: Invalid command line or configuration
 */

import { TestHarness } from './index';
import { ConfigLoader, USAGE, parseCommandLine } from './components/config-loader';
import type { LineWriter } from './components/console-reporter';
import { ValidationError } from './errors';
import { logger } from './utils/logger';
import { TempWorkspace } from './utils/temp-workspace';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  readonly writeLine: LineWriter;
  readonly writeError: LineWriter;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly cwd: string;
}

const processIo: CliIo = {
  writeLine: (line) => {
    process.stdout.write(`${line}\n`);
  },
  writeError: (line) => {
    process.stderr.write(`${line}\n`);
  },
  env: process.env,
  cwd: process.cwd()
};

function reportValidationError(error: ValidationError, writeError: LineWriter): void {
  writeError(`Error: ${error.message}`);
  for (const problem of error.validationErrors) {
    writeError(`  - ${problem}`);
  }
}

/**
 * Runs the harness for one command line
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let harness: TestHarness;

  try {
    const commandLine = parseCommandLine(argv);
    if (commandLine.help) {
      io.writeLine(USAGE);
      return EXIT_SUCCESS;
    }

    const config = new ConfigLoader(io.env).load(commandLine.overrides, io.cwd);
    harness = new TestHarness(config, { writeLine: io.writeLine, env: io.env });
  } catch (error) {
    if (error instanceof ValidationError) {
      reportValidationError(error, io.writeError);
      io.writeError('Run trialrun --help for usage.');
      return EXIT_USAGE;
    }
    throw error;
  }

  try {
    const summary = await harness.run();
    for (const message of summary.errors) {
      io.writeError(message);
    }
    return summary.success ? EXIT_SUCCESS : EXIT_FAILURE;
  } catch (error) {
    if (error instanceof ValidationError) {
      reportValidationError(error, io.writeError);
      return EXIT_USAGE;
    }

    logger.error('Test run failed', error);
    io.writeError(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}

/**
 * Process entry: installs cleanup handlers, runs, exits
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  TempWorkspace.installSignalHandlers();

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', reason);
    process.stderr.write(`FATAL ERROR: Unhandled promise rejection: ${String(reason)}\n`);
    process.exit(EXIT_FAILURE);
  });

  process.exitCode = await runCli(argv);
}

if (typeof require !== 'undefined' && require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error', error);
    process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(EXIT_FAILURE);
  });
}
