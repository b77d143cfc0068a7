/**
 * Configuration Loader - Merges and validates harness configuration
 *
 * Sources, later ones winning: built-in defaults, `trialrun.config.json` in
 * the root directory, TRIALRUN_* environment variables, command-line flags.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { ValidationError } from '../errors';
import type { CoverageConfig, HarnessConfig } from '../types';
import { logger } from '../utils/logger';

export const CONFIG_FILE_NAME = 'trialrun.config.json';

export const DEFAULT_FILE_PATTERN = '*_test.js';

export const DEFAULT_PROCEDURE_PREFIX = 'test_';

/**
 * Settings that can come from any source; unset fields fall through
 */
export interface ConfigOverrides {
  readonly rootDir?: string;
  readonly filePattern?: string;
  readonly procedurePrefix?: string;
  readonly tap?: boolean;
  readonly verbose?: boolean;
  readonly coverage?: boolean;
  readonly minCoverage?: number;
  readonly coverageJson?: string;
  readonly coverageTargets?: readonly string[];
  readonly resultsFile?: string;
}

export interface CommandLine {
  readonly overrides: ConfigOverrides;
  readonly help: boolean;
}

export const USAGE = [
  'Usage: trialrun [options] [pattern]',
  '',
  'Discovers and runs test procedures in files matching pattern (default: *_test.js).',
  '',
  'Options:',
  '  --root <dir>              Directory to search (default: current directory)',
  '  --prefix <prefix>         Test procedure name prefix (default: test_)',
  '  --tap                     Emit TAP version 13 on stdout',
  '  --verbose                 Print captured output for every test',
  '  --coverage                Collect line coverage',
  '  --min-coverage <percent>  Fail when coverage is below percent (enables coverage)',
  '  --coverage-json <file>    Write a JSON coverage report (enables coverage)',
  '  --coverage-target <file>  Include file in the coverage report (repeatable)',
  '  --json <file>             Write a JSON results file',
  '  -h, --help                Show this help'
].join('\n');

const TRUE_VALUES: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['0', 'false', 'no', 'off', '']);

function parseNumber(value: string, source: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ValidationError('Configuration validation failed', [`${source} must be a number, got '${value}'`]);
  }
  return parsed;
}

/**
 * Parses command-line arguments into overrides
 *
 * @throws {ValidationError} On unknown flags or malformed values
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const { values, positionals } = parseFlags(argv);
  if (positionals.length > 1) {
    throw new ValidationError('Invalid command line', [`expected at most one pattern, got: ${positionals.join(' ')}`]);
  }

  const minCoverage = values['min-coverage'];
  return {
    help: values.help ?? false,
    overrides: {
      rootDir: values.root,
      filePattern: positionals[0],
      procedurePrefix: values.prefix,
      tap: values.tap,
      verbose: values.verbose,
      coverage: values.coverage,
      minCoverage: minCoverage === undefined ? undefined : parseNumber(minCoverage, '--min-coverage'),
      coverageJson: values['coverage-json'],
      coverageTargets: values['coverage-target'],
      resultsFile: values.json
    }
  };
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        root: { type: 'string' },
        prefix: { type: 'string' },
        tap: { type: 'boolean' },
        verbose: { type: 'boolean' },
        coverage: { type: 'boolean' },
        'min-coverage': { type: 'string' },
        'coverage-json': { type: 'string' },
        'coverage-target': { type: 'string', multiple: true },
        json: { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError('Invalid command line', [message], error instanceof Error ? error : undefined);
  }
}

export class ConfigLoader {
  constructor(private readonly env: Readonly<Record<string, string | undefined>> = process.env) {}

  /**
   * Load configuration for a run
   *
   * @param overrides - Command-line settings, applied last
   * @param cwd - Base for a relative root directory
   * @throws {ValidationError} When any source is malformed or the merged result is invalid
   */
  load(overrides: ConfigOverrides = {}, cwd: string = process.cwd()): HarnessConfig {
    const rootDir = path.resolve(cwd, overrides.rootDir ?? '.');
    const fromFile = this.loadConfigFile(rootDir);
    const fromEnv = this.loadEnvironment();
    const merged = mergeOverrides(overrides, fromEnv, fromFile);

    const thresholdOrReport = merged.minCoverage !== undefined || merged.coverageJson !== undefined;
    const coverage: CoverageConfig = {
      enabled: (merged.coverage ?? false) || thresholdOrReport,
      threshold: merged.minCoverage,
      targets: (merged.coverageTargets ?? []).map((target) => path.resolve(rootDir, target)),
      jsonReport: merged.coverageJson === undefined ? undefined : path.resolve(cwd, merged.coverageJson)
    };

    const config: HarnessConfig = {
      rootDir,
      filePattern: merged.filePattern ?? DEFAULT_FILE_PATTERN,
      procedurePrefix: merged.procedurePrefix ?? DEFAULT_PROCEDURE_PREFIX,
      tap: merged.tap ?? false,
      verbose: merged.verbose ?? false,
      coverage,
      resultsFile: merged.resultsFile === undefined ? undefined : path.resolve(cwd, merged.resultsFile)
    };

    this.validateConfig(config);
    logger.info('Configuration loaded', {
      rootDir: config.rootDir,
      filePattern: config.filePattern,
      tap: config.tap,
      coverage: config.coverage.enabled
    });
    return config;
  }

  /**
   * Validate configuration
   */
  validateConfig(config: HarnessConfig): void {
    const errors: string[] = [];

    if (!fs.existsSync(config.rootDir) || !fs.statSync(config.rootDir).isDirectory()) {
      errors.push(`root directory does not exist: ${config.rootDir}`);
    }

    if (config.filePattern.trim() === '') {
      errors.push('file pattern must not be empty');
    } else if (/[\\/]/.test(config.filePattern)) {
      errors.push(`file pattern must match a file name, not a path: ${config.filePattern}`);
    }

    if (!/^[A-Za-z_$][\w$]*$/.test(config.procedurePrefix)) {
      errors.push(`procedure prefix must start like an identifier: '${config.procedurePrefix}'`);
    }

    const { threshold } = config.coverage;
    if (threshold !== undefined && (threshold < 0 || threshold > 100)) {
      errors.push('minimum coverage must be between 0 and 100');
    }

    if (errors.length > 0) {
      throw new ValidationError('Configuration validation failed', errors);
    }
  }

  /**
   * Settings from `trialrun.config.json`, or none when the file is absent
   */
  loadConfigFile(rootDir: string): ConfigOverrides {
    const file = path.join(rootDir, CONFIG_FILE_NAME);
    if (!fs.existsSync(file)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      throw new ValidationError(
        `Could not read ${CONFIG_FILE_NAME}`,
        [error instanceof Error ? error.message : String(error)],
        error instanceof Error ? error : undefined
      );
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ValidationError(`Could not read ${CONFIG_FILE_NAME}`, ['expected a JSON object']);
    }

    const record: object = raw;
    const errors: string[] = [];
    const read = <T>(key: string, guard: (value: unknown) => value is T, expected: string): T | undefined => {
      const value: unknown = Reflect.get(record, key);
      if (value === undefined) {
        return undefined;
      }
      if (!guard(value)) {
        errors.push(`${key} must be ${expected}`);
        return undefined;
      }
      return value;
    };

    const overrides: ConfigOverrides = {
      filePattern: read('pattern', isString, 'a string'),
      procedurePrefix: read('prefix', isString, 'a string'),
      tap: read('tap', isBoolean, 'a boolean'),
      verbose: read('verbose', isBoolean, 'a boolean'),
      coverage: read('coverage', isBoolean, 'a boolean'),
      minCoverage: read('minCoverage', isNumber, 'a number'),
      coverageJson: read('coverageJson', isString, 'a string'),
      coverageTargets: read('coverageTargets', isStringArray, 'an array of strings'),
      resultsFile: read('resultsFile', isString, 'a string')
    };

    if (errors.length > 0) {
      throw new ValidationError(`Invalid ${CONFIG_FILE_NAME}`, errors);
    }

    logger.debug('Read configuration file', { file });
    return overrides;
  }

  /**
   * Settings from TRIALRUN_* environment variables
   */
  loadEnvironment(): ConfigOverrides {
    const minCoverage = this.env.TRIALRUN_MIN_COVERAGE;
    return {
      filePattern: this.env.TRIALRUN_PATTERN,
      procedurePrefix: this.env.TRIALRUN_PREFIX,
      tap: this.getBooleanEnv('TRIALRUN_TAP'),
      verbose: this.getBooleanEnv('TRIALRUN_VERBOSE'),
      coverage: this.getBooleanEnv('TRIALRUN_COVERAGE'),
      minCoverage: minCoverage === undefined ? undefined : parseNumber(minCoverage, 'TRIALRUN_MIN_COVERAGE'),
      coverageJson: this.env.TRIALRUN_COVERAGE_JSON,
      resultsFile: this.env.TRIALRUN_RESULTS_FILE
    };
  }

  private getBooleanEnv(name: string): boolean | undefined {
    const value = this.env[name];
    if (value === undefined) {
      return undefined;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    throw new ValidationError('Configuration validation failed', [`${name} must be a boolean, got '${value}'`]);
  }
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Combines layers field by field; the first layer that sets a field wins
 */
export function mergeOverrides(...layers: readonly ConfigOverrides[]): ConfigOverrides {
  const first = <K extends keyof ConfigOverrides>(key: K): ConfigOverrides[K] => {
    for (const layer of layers) {
      if (layer[key] !== undefined) {
        return layer[key];
      }
    }
    return undefined;
  };

  return {
    rootDir: first('rootDir'),
    filePattern: first('filePattern'),
    procedurePrefix: first('procedurePrefix'),
    tap: first('tap'),
    verbose: first('verbose'),
    coverage: first('coverage'),
    minCoverage: first('minCoverage'),
    coverageJson: first('coverageJson'),
    coverageTargets: first('coverageTargets'),
    resultsFile: first('resultsFile')
  };
}
